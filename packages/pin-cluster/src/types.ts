/** A WGS84 position in degrees. */
export interface Coordinate {
  lat: number;
  lng: number;
}

/**
 * A single place on the map. Owned by the caller; the engine never mutates it.
 */
export interface Pin {
  id: string;
  coordinate: Coordinate;
  /** true when the current user has been there (rendered red, otherwise grey) */
  isVisited: boolean;
}

/**
 * The visible map region: a center point plus angular width/height in degrees.
 */
export interface Viewport {
  centerLat: number;
  centerLng: number;
  spanLatDeg: number;
  spanLngDeg: number;
}

/** Pins grouped by a single seed during partitioning. */
export interface ClusterGroup {
  members: Pin[];
}

export interface Cluster {
  /** Generated per call, never stable across calls */
  id: string;
  /** Arithmetic mean of member coordinates */
  coordinate: Coordinate;
  memberIds: string[];
  count: number;
  /** true iff any member is visited */
  isVisited: boolean;
}

/**
 * One renderable marker: either a pin on its own or a cluster of pins.
 */
export type ClusterItem =
  | { kind: "single"; pin: Pin }
  | { kind: "cluster"; cluster: Cluster };

/** Lower bound (inclusive) of a zoom range and the radius used from there on. */
export interface DistanceTier {
  minZoom: number;
  radiusMeters: number;
}

export type ClusterSizeTier = "smallest" | "small" | "medium" | "large" | "largest";

/**
 * Options for configuring the PinClusterEngine.
 */
export interface PinClusterEngineOptions {
  /** Zoom above which every pin is emitted on its own. Default: 16 */
  cutoffZoom?: number;
  /** Radius tiers, strictly ascending by minZoom. Default: DEFAULT_DISTANCE_TIERS */
  tiers?: readonly DistanceTier[];
  /** Cluster id factory. Default: crypto.randomUUID */
  createId?: () => string;
}
