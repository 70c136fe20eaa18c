import KDBush from "kdbush";
import { haversineMeters, searchBoxes, wrapLng } from "./geo";
import type { ClusterGroup, Pin } from "./types";

/**
 * Partition pins by seed-anchored single linkage, in one pass.
 *
 * The first pin still unassigned becomes a seed and takes every later
 * unassigned pin closer than `radiusMeters` to *it*. Distance to other
 * members is never considered, so grouping is neither transitive nor
 * complete-linkage, and the result depends on input order.
 *
 * A KD-tree narrows each seed's scan to pins inside a degree box around it;
 * survivors are visited in input order so the outcome matches a plain scan.
 * Worst case is still O(n²), when most pins fall within one radius.
 */
export function groupPins(pins: readonly Pin[], radiusMeters: number): ClusterGroup[] {
  const n = pins.length;
  if (n === 0) return [];
  if (!(radiusMeters > 0)) return pins.map((pin) => ({ members: [pin] }));

  const tree = createTree(pins);
  const taken = new Uint8Array(n);
  const groups: ClusterGroup[] = [];

  for (let i = 0; i < n; i++) {
    if (taken[i]) continue;
    taken[i] = 1;

    const seed = pins[i];
    const members = [seed];

    const candidates: number[] = [];
    for (const [minLng, minLat, maxLng, maxLat] of searchBoxes(
      seed.coordinate,
      radiusMeters,
    )) {
      for (const id of tree.range(minLng, minLat, maxLng, maxLat)) {
        if (!taken[id]) candidates.push(id);
      }
    }
    candidates.sort((a, b) => a - b);

    for (const id of candidates) {
      const other = pins[id];
      if (haversineMeters(seed.coordinate, other.coordinate) < radiusMeters) {
        taken[id] = 1;
        members.push(other);
      }
    }

    groups.push({ members });
  }

  return groups;
}

function createTree(pins: readonly Pin[]): KDBush {
  const tree = new KDBush(pins.length, 64, Float64Array);
  for (const { coordinate } of pins) {
    tree.add(wrapLng(coordinate.lng), coordinate.lat);
  }
  tree.finish();
  return tree;
}
