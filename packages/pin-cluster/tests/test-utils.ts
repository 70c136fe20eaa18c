import {
  vectorFromArray,
  Table,
  Float64,
  Bool,
  Utf8,
  Field,
  FixedSizeList,
} from "apache-arrow";
import type { Pin, Viewport } from "../src/index";

/** Meters per degree of longitude at the equator (haversine, mean radius). */
export const METERS_PER_DEGREE = (6_371_008.8 * Math.PI) / 180;

export function pin(
  id: string,
  lat: number,
  lng: number,
  isVisited = false,
): Pin {
  return { id, coordinate: { lat, lng }, isVisited };
}

/**
 * Viewport whose longitude span maps to exactly `zoom` (span = 360 / 2^zoom).
 */
export function viewportAtZoom(
  zoom: number,
  centerLat = 0,
  centerLng = 0,
): Viewport {
  const span = 360 / Math.pow(2, zoom);
  return { centerLat, centerLng, spanLatDeg: span, spanLngDeg: span };
}

/**
 * Build an Arrow Table with a GeoArrow Point geometry column, a string id
 * column and a boolean visited column.
 */
export function buildPinTable(
  rows: { id: string; lng: number; lat: number; visited?: boolean }[],
): Table {
  const childField = new Field("xy", new Float64());
  const listType = new FixedSizeList(2, childField);
  const geomVector = vectorFromArray(
    rows.map(({ lng, lat }) => [lng, lat]),
    listType,
  );
  const idVector = vectorFromArray(
    rows.map((r) => r.id),
    new Utf8(),
  );
  const visitedVector = vectorFromArray(
    rows.map((r) => r.visited ?? false),
    new Bool(),
  );

  return new Table({
    geometry: geomVector,
    id: idVector,
    visited: visitedVector,
  });
}

/**
 * Build a multi-chunk table by splitting rows into `chunkCount` batches.
 */
export function buildMultiChunkPinTable(
  rows: { id: string; lng: number; lat: number; visited?: boolean }[],
  chunkCount: number,
): Table {
  const chunkSize = Math.ceil(rows.length / chunkCount);
  const tables: Table[] = [];

  for (let c = 0; c < chunkCount; c++) {
    const slice = rows.slice(c * chunkSize, (c + 1) * chunkSize);
    if (slice.length === 0) continue;
    tables.push(buildPinTable(slice));
  }

  return new Table(tables.flatMap((t) => t.batches));
}

/**
 * Deterministic pseudo-random pins scattered within `spreadDeg` of a center.
 */
export function generateTestPins(
  count: number,
  center: { lat: number; lng: number } = { lat: 35.68, lng: 139.76 },
  spreadDeg = 0.05,
): Pin[] {
  const pins: Pin[] = [];
  let seed = 42;
  const rand = () => {
    seed = (seed * 16807) % 2147483647;
    return seed / 2147483647;
  };

  for (let i = 0; i < count; i++) {
    const lat = center.lat + (rand() * 2 - 1) * spreadDeg;
    const lng = center.lng + (rand() * 2 - 1) * spreadDeg;
    pins.push(pin(`pin-${i}`, lat, lng, rand() < 0.3));
  }
  return pins;
}
