import type { DistanceTier } from "./types";

/** Above this zoom every pin is rendered on its own. */
export const DEFAULT_CUTOFF_ZOOM = 16;

/**
 * Clustering radius per zoom range. The tiers from 16 up sit past the
 * default cutoff: only zoom exactly 16 ever reaches the 30 m tier.
 */
export const DEFAULT_DISTANCE_TIERS: readonly DistanceTier[] = [
  { minZoom: 0, radiusMeters: 5000 },
  { minZoom: 10, radiusMeters: 1000 },
  { minZoom: 12, radiusMeters: 300 },
  { minZoom: 14, radiusMeters: 100 },
  { minZoom: 16, radiusMeters: 30 },
  { minZoom: 18, radiusMeters: 0 },
];

/** Whether pins are grouped at all at this zoom. */
export function shouldCluster(
  zoom: number,
  cutoffZoom = DEFAULT_CUTOFF_ZOOM,
): boolean {
  return !(zoom > cutoffZoom);
}

/**
 * Radius of the last tier whose `minZoom` is at or below `zoom`. Zooms below
 * the first tier fall into it.
 */
export function clusterRadiusForZoom(
  zoom: number,
  tiers: readonly DistanceTier[] = DEFAULT_DISTANCE_TIERS,
): number {
  let radius = tiers[0].radiusMeters;
  for (const tier of tiers) {
    if (zoom < tier.minZoom) break;
    radius = tier.radiusMeters;
  }
  return radius;
}

/**
 * Throws when tiers are empty, out of order or carry an unusable radius.
 */
export function validateTiers(tiers: readonly DistanceTier[]): void {
  if (tiers.length === 0) {
    throw new Error("Distance tiers must not be empty");
  }
  for (let i = 0; i < tiers.length; i++) {
    const { minZoom, radiusMeters } = tiers[i];
    if (!Number.isFinite(minZoom)) {
      throw new Error(`Distance tier ${i} has a non-finite minZoom`);
    }
    if (!Number.isFinite(radiusMeters) || radiusMeters < 0) {
      throw new Error(
        `Distance tier ${i} has an invalid radius: ${radiusMeters}`,
      );
    }
    if (i > 0 && minZoom <= tiers[i - 1].minZoom) {
      throw new Error(
        `Distance tiers must be strictly ascending by minZoom (tier ${i})`,
      );
    }
  }
}
