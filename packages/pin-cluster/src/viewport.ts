import { wrapLng } from "./geo";
import type { Coordinate, Pin, Viewport } from "./types";

const SINGLE_PIN_SPAN = 0.02;
const MIN_FIT_SPAN = 0.01;
const FIT_PADDING = 1.3;
const MAX_ZOOM_OUT_SPAN = 10;
const WORLD_SPAN_LAT = 180;
const WORLD_SPAN_LNG = 360;

/**
 * Viewport from a renderer's [west, south, east, north] bounds. An east edge
 * left of the west edge means the box crosses the antimeridian.
 */
export function viewportFromBounds([west, south, east, north]: [
  number,
  number,
  number,
  number,
]): Viewport {
  const spanLngDeg = east >= west ? east - west : east - west + 360;
  return {
    centerLat: (south + north) / 2,
    centerLng: wrapLng(west + spanLngDeg / 2),
    spanLatDeg: north - south,
    spanLngDeg,
  };
}

/**
 * Region showing every pin with some padding, or null without pins. Spans
 * never exceed the whole world. Longitudes are boxed without wrapping, so
 * pins on both sides of the antimeridian fit to a world-wide span.
 */
export function fitViewport(pins: readonly Pin[]): Viewport | null {
  if (pins.length === 0) return null;

  if (pins.length === 1) {
    const { lat, lng } = pins[0].coordinate;
    return {
      centerLat: lat,
      centerLng: lng,
      spanLatDeg: SINGLE_PIN_SPAN,
      spanLngDeg: SINGLE_PIN_SPAN,
    };
  }

  let minLat = Infinity;
  let maxLat = -Infinity;
  let minLng = Infinity;
  let maxLng = -Infinity;
  for (const { coordinate } of pins) {
    minLat = Math.min(minLat, coordinate.lat);
    maxLat = Math.max(maxLat, coordinate.lat);
    minLng = Math.min(minLng, coordinate.lng);
    maxLng = Math.max(maxLng, coordinate.lng);
  }

  return {
    centerLat: (minLat + maxLat) / 2,
    centerLng: (minLng + maxLng) / 2,
    spanLatDeg: fitSpan(maxLat - minLat, WORLD_SPAN_LAT),
    spanLngDeg: fitSpan(maxLng - minLng, WORLD_SPAN_LNG),
  };
}

function fitSpan(extent: number, world: number): number {
  return Math.min(Math.max(extent * FIT_PADDING, MIN_FIT_SPAN), world);
}

/** One zoom step in: both spans halved. */
export function zoomInViewport(viewport: Viewport): Viewport {
  return {
    ...viewport,
    spanLatDeg: viewport.spanLatDeg * 0.5,
    spanLngDeg: viewport.spanLngDeg * 0.5,
  };
}

/** One zoom step out: both spans doubled, capped at 10°. */
export function zoomOutViewport(viewport: Viewport): Viewport {
  return {
    ...viewport,
    spanLatDeg: Math.min(viewport.spanLatDeg * 2, MAX_ZOOM_OUT_SPAN),
    spanLngDeg: Math.min(viewport.spanLngDeg * 2, MAX_ZOOM_OUT_SPAN),
  };
}

export function viewportContains(
  viewport: Viewport,
  { lat, lng }: Coordinate,
): boolean {
  if (Math.abs(lat - viewport.centerLat) > viewport.spanLatDeg / 2) {
    return false;
  }
  if (viewport.spanLngDeg >= 360) return true;
  return (
    Math.abs(wrapLng(lng - viewport.centerLng)) <= viewport.spanLngDeg / 2
  );
}

/**
 * Pins inside the viewport, in input order, keeping at most `limit`.
 */
export function pinsInViewport(
  pins: readonly Pin[],
  viewport: Viewport,
  limit = Infinity,
): Pin[] {
  const visible: Pin[] = [];
  for (const pin of pins) {
    if (visible.length >= limit) break;
    if (viewportContains(viewport, pin.coordinate)) visible.push(pin);
  }
  return visible;
}
