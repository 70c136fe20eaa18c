export { PinClusterEngine, cluster } from "./pin-cluster-engine";
export { estimateZoom, MIN_ZOOM, MAX_ZOOM } from "./zoom";
export {
  DEFAULT_CUTOFF_ZOOM,
  DEFAULT_DISTANCE_TIERS,
  clusterRadiusForZoom,
  shouldCluster,
  validateTiers,
} from "./distance-policy";
export { groupPins } from "./greedy-grouper";
export {
  summarizeGroup,
  itemId,
  itemCoordinate,
  itemCount,
  clusterSizeTier,
} from "./summarize";
export { EARTH_RADIUS_METERS, haversineMeters, wrapLng } from "./geo";
export {
  viewportFromBounds,
  fitViewport,
  zoomInViewport,
  zoomOutViewport,
  viewportContains,
  pinsInViewport,
} from "./viewport";
export { getCoordBuffer, pinsFromTable } from "./arrow-helpers";
export type { PinColumns } from "./arrow-helpers";
export type {
  Cluster,
  ClusterGroup,
  ClusterItem,
  ClusterSizeTier,
  Coordinate,
  DistanceTier,
  Pin,
  PinClusterEngineOptions,
  Viewport,
} from "./types";
