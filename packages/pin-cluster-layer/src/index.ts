export { PinClusterLayer } from "./pin-cluster-layer";
export type {
  PinClusterLayerProps,
  PinClusterPickingInfo,
  ColorRGBA,
  MarkerPalette,
} from "./types";
export {
  PIN_DIAMETER,
  CLUSTER_OUTLINE_WIDTH,
  clusterDiameter,
  labelFontSize,
  computeFillColors,
  computeRadii,
  computeOutlineWidths,
  computeTexts,
  computeLabelSizes,
  computePositions,
} from "./style-helpers";
export { resolvePickingInfo } from "./picking";

// Re-export engine types for convenience
export { PinClusterEngine } from "pin-cluster";
export type { ClusterItem, Pin, Viewport } from "pin-cluster";
