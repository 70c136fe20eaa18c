import {
  DEFAULT_CUTOFF_ZOOM,
  DEFAULT_DISTANCE_TIERS,
  clusterRadiusForZoom,
  shouldCluster,
  validateTiers,
} from "./distance-policy";
import { groupPins } from "./greedy-grouper";
import { summarizeGroup } from "./summarize";
import { estimateZoom } from "./zoom";
import type {
  ClusterItem,
  DistanceTier,
  Pin,
  PinClusterEngineOptions,
  Viewport,
} from "./types";

const randomId = () => crypto.randomUUID();

/**
 * Zoom-adaptive pin clustering.
 *
 * Holds only its validated configuration: every {@link cluster} call starts
 * from scratch, keeps nothing afterwards and is safe to run for several
 * viewports at once. Callers that recluster on every pan should debounce,
 * or compare {@link resolveRadius} results, since each call is O(n²) in the
 * worst case.
 */
export class PinClusterEngine {
  readonly cutoffZoom: number;
  readonly tiers: readonly DistanceTier[];
  readonly createId: () => string;

  constructor(options: PinClusterEngineOptions = {}) {
    this.cutoffZoom = options.cutoffZoom ?? DEFAULT_CUTOFF_ZOOM;
    this.tiers = options.tiers ?? DEFAULT_DISTANCE_TIERS;
    this.createId = options.createId ?? randomId;

    if (!Number.isFinite(this.cutoffZoom)) {
      throw new Error(`cutoffZoom must be finite, got ${this.cutoffZoom}`);
    }
    validateTiers(this.tiers);
  }

  /**
   * Radius in meters used for this viewport, or null when the zoom is past
   * the cutoff and pins are not grouped. Two viewports with the same result
   * produce the same grouping.
   */
  resolveRadius(viewport: Viewport): number | null {
    const zoom = estimateZoom(viewport);
    if (!shouldCluster(zoom, this.cutoffZoom)) return null;
    return clusterRadiusForZoom(zoom, this.tiers);
  }

  /**
   * Partition pins into singles and clusters for the given viewport. Pins
   * keep caller order: seeds are taken first-come, and clusters list their
   * members in input order.
   */
  cluster(pins: readonly Pin[], viewport: Viewport): ClusterItem[] {
    if (pins.length === 0) return [];

    const radius = this.resolveRadius(viewport);
    if (radius === null) {
      return pins.map((pin): ClusterItem => ({ kind: "single", pin }));
    }

    return groupPins(pins, radius).map((group) =>
      summarizeGroup(group, this.createId),
    );
  }
}

const defaultEngine = new PinClusterEngine();

/** {@link PinClusterEngine.cluster} with the default tiers and cutoff. */
export function cluster(pins: readonly Pin[], viewport: Viewport): ClusterItem[] {
  return defaultEngine.cluster(pins, viewport);
}
