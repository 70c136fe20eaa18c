/**
 * Great-circle utilities on a spherical Earth.
 */

import type { Coordinate } from "./types";

/** Mean Earth radius (IUGG) in meters */
export const EARTH_RADIUS_METERS = 6_371_008.8;

const DEG = Math.PI / 180;

/** Haversine distance between two coordinates, in meters */
export function haversineMeters(a: Coordinate, b: Coordinate): number {
  const dLat = (b.lat - a.lat) * DEG;
  const dLng = (b.lng - a.lng) * DEG;
  const sinLat = Math.sin(dLat / 2);
  const sinLng = Math.sin(dLng / 2);
  const h =
    sinLat * sinLat +
    Math.cos(a.lat * DEG) * Math.cos(b.lat * DEG) * sinLng * sinLng;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

/** Wrap a longitude into [-180, 180) */
export function wrapLng(lng: number): number {
  return ((((lng + 180) % 360) + 360) % 360) - 180;
}

/**
 * Degree bounding box that contains every point closer than `radiusMeters`
 * to `center`. Returns one box, or two when it crosses the antimeridian.
 * Boxes are [minLng, minLat, maxLng, maxLat] with longitudes in [-180, 180].
 */
export function searchBoxes(
  center: Coordinate,
  radiusMeters: number,
): [number, number, number, number][] {
  // Slightly padded: the box must contain the whole disc after rounding.
  const angular = (radiusMeters / EARTH_RADIUS_METERS) * 1.000001;
  const dLat = angular / DEG;
  const minLat = center.lat - dLat;
  const maxLat = center.lat + dLat;

  if (angular >= Math.PI / 2 || Math.abs(center.lat) + dLat >= 90) {
    return [[-180, minLat, 180, maxLat]];
  }

  const ratio = Math.sin(angular) / Math.cos(center.lat * DEG);
  if (ratio >= 1) return [[-180, minLat, 180, maxLat]];

  const dLng = (Math.asin(ratio) / DEG) * 1.000001;
  const lng = wrapLng(center.lng);
  const minLng = lng - dLng;
  const maxLng = lng + dLng;

  if (maxLng - minLng >= 360) return [[-180, minLat, 180, maxLat]];
  if (minLng < -180) {
    return [
      [-180, minLat, maxLng, maxLat],
      [minLng + 360, minLat, 180, maxLat],
    ];
  }
  if (maxLng > 180) {
    return [
      [minLng, minLat, 180, maxLat],
      [-180, minLat, maxLng - 360, maxLat],
    ];
  }
  return [[minLng, minLat, maxLng, maxLat]];
}
