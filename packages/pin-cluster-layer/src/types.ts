import type { CompositeLayerProps, PickingInfo } from "@deck.gl/core";
import type { Table } from "apache-arrow";
import type { ClusterItem, Pin, PinClusterEngine } from "pin-cluster";

/** RGBA color as a 4-element tuple, each channel 0-255. */
export type ColorRGBA = [number, number, number, number];

/** Props for PinClusterLayer. */
export interface PinClusterLayerProps extends CompositeLayerProps {
  // Data
  data: Table;
  geometryColumn?: string;
  idColumn?: string;
  visitedColumn?: string;

  // Clustering (passed through to PinClusterEngine)
  cutoffZoom?: number;
  createClusterId?: () => string;

  // Styling
  visitedColor?: ColorRGBA;
  /** Clusters without a visited pin */
  unvisitedColor?: ColorRGBA;
  /** Individual pins not yet visited */
  unvisitedPinColor?: ColorRGBA;
  selectedColor?: ColorRGBA;
  outlineColor?: ColorRGBA;
  textColor?: ColorRGBA;

  // Interaction state
  /** Pin id or cluster id to highlight */
  selectedItemId?: string | null;
}

/** Fill colors by marker state. */
export interface MarkerPalette {
  visited: ColorRGBA;
  unvisitedCluster: ColorRGBA;
  unvisitedPin: ColorRGBA;
  selected: ColorRGBA;
}

/** Picking info returned by PinClusterLayer. */
export interface PinClusterPickingInfo extends PickingInfo {
  /** Whether the picked object is a cluster (vs individual pin). */
  isCluster: boolean;
  /** Cluster id, or the pin id for an individual pin. Empty when nothing was picked. */
  itemId: string;
  /** Number of pins behind the picked marker (0 when nothing was picked). */
  pointCount: number;
  /** Ids of every pin behind the picked marker. */
  pinIds: string[];
}

/** Internal layer state. */
export interface PinClusterLayerState {
  [key: string]: unknown;
  engine: PinClusterEngine | null;
  pins: Pin[];
  items: ClusterItem[];
  /** Radius of the last clustering pass; null when it ran past the cutoff. */
  lastRadius: number | null | undefined;
}
