import type { Viewport } from "./types";

export const MIN_ZOOM = 0;
export const MAX_ZOOM = 20;

/**
 * Normalized zoom level from the visible longitude span.
 *
 * Each halving of the visible width is one zoom step in, like tile zoom
 * numbering: 0 shows the whole world, 20 a single building. A span that is
 * zero, negative or NaN is treated as fully zoomed in.
 */
export function estimateZoom({ spanLngDeg }: Pick<Viewport, "spanLngDeg">): number {
  if (!(spanLngDeg > 0)) return MAX_ZOOM;
  const zoom = Math.log2(360 / spanLngDeg);
  return zoom < MIN_ZOOM ? MIN_ZOOM : zoom > MAX_ZOOM ? MAX_ZOOM : zoom;
}
