import { clusterSizeTier, itemCoordinate, itemCount, itemId } from "pin-cluster";
import type { ClusterItem, ClusterSizeTier } from "pin-cluster";
import type { ColorRGBA, MarkerPalette } from "./types";

/** Diameter of an individual pin marker, in pixels. */
export const PIN_DIAMETER = 32;

/** Width of the white ring drawn outside every cluster's fill. */
export const CLUSTER_OUTLINE_WIDTH = 2;

const CLUSTER_DIAMETERS: Record<ClusterSizeTier, number> = {
  smallest: 38,
  small: 44,
  medium: 50,
  large: 56,
  largest: 62,
};

const LABEL_FONT_SIZES: Record<ClusterSizeTier, number> = {
  smallest: 14,
  small: 16,
  medium: 18,
  large: 20,
  largest: 22,
};

/** Inner diameter of a cluster marker, in pixels. */
export function clusterDiameter(count: number): number {
  return CLUSTER_DIAMETERS[clusterSizeTier(count)];
}

/** Font size of a cluster's count label, in pixels. */
export function labelFontSize(count: number): number {
  return LABEL_FONT_SIZES[clusterSizeTier(count)];
}

/**
 * Compute fill colors for each item.
 *
 * - Selected item → `selected`
 * - Visited pin, or cluster with any visited pin → `visited`
 * - Unvisited cluster → `unvisitedCluster`; unvisited pin → `unvisitedPin`
 */
export function computeFillColors(
  items: readonly ClusterItem[],
  selectedItemId: string | null | undefined,
  palette: MarkerPalette,
): Uint8Array {
  const colors = new Uint8Array(items.length * 4);

  for (let i = 0; i < items.length; i++) {
    const item = items[i];

    let color: ColorRGBA;
    if (selectedItemId != null && itemId(item) === selectedItemId) {
      color = palette.selected;
    } else if (item.kind === "single") {
      color = item.pin.isVisited ? palette.visited : palette.unvisitedPin;
    } else {
      color = item.cluster.isVisited
        ? palette.visited
        : palette.unvisitedCluster;
    }

    colors.set(color, i * 4);
  }

  return colors;
}

/**
 * Marker radius in pixels. Pins share one size; clusters grow by tier. deck.gl
 * centres the stroke on the radius, so cluster radii sit half a ring width
 * out and the fill keeps the tier diameter.
 */
export function computeRadii(items: readonly ClusterItem[]): Float32Array {
  const radii = new Float32Array(items.length);
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    radii[i] =
      item.kind === "single"
        ? PIN_DIAMETER / 2
        : (clusterDiameter(item.cluster.count) + CLUSTER_OUTLINE_WIDTH) / 2;
  }
  return radii;
}

/**
 * Outline width per item: the white ring around clusters, none for pins.
 */
export function computeOutlineWidths(
  items: readonly ClusterItem[],
): Float32Array {
  const widths = new Float32Array(items.length);
  for (let i = 0; i < items.length; i++) {
    widths[i] = items[i].kind === "cluster" ? CLUSTER_OUTLINE_WIDTH : 0;
  }
  return widths;
}

/**
 * Compute text labels for clusters. Individual pins get null.
 */
export function computeTexts(items: readonly ClusterItem[]): (string | null)[] {
  return items.map((item) =>
    item.kind === "cluster" ? String(itemCount(item)) : null,
  );
}

/**
 * Label font size per item; 0 for individual pins.
 */
export function computeLabelSizes(items: readonly ClusterItem[]): Float32Array {
  const sizes = new Float32Array(items.length);
  for (let i = 0; i < items.length; i++) {
    const item = items[i];
    sizes[i] = item.kind === "cluster" ? labelFontSize(item.cluster.count) : 0;
  }
  return sizes;
}

/**
 * Interleaved [lng0, lat0, lng1, lat1, ...] marker positions.
 */
export function computePositions(items: readonly ClusterItem[]): Float64Array {
  const positions = new Float64Array(items.length * 2);
  for (let i = 0; i < items.length; i++) {
    const { lat, lng } = itemCoordinate(items[i]);
    positions[i * 2] = lng;
    positions[i * 2 + 1] = lat;
  }
  return positions;
}
