import type { ClusterGroup, ClusterItem, ClusterSizeTier, Coordinate } from "./types";

/**
 * Turn one group into a renderable item. A lone pin passes through; larger
 * groups become a cluster positioned at the plain mean of member lat/lng,
 * which holds at neighbourhood-to-city scale but not near the poles or
 * across the antimeridian.
 */
export function summarizeGroup(
  group: ClusterGroup,
  createId: () => string,
): ClusterItem {
  const { members } = group;
  if (members.length === 1) return { kind: "single", pin: members[0] };

  let sumLat = 0;
  let sumLng = 0;
  let isVisited = false;
  const memberIds: string[] = new Array(members.length);

  for (let i = 0; i < members.length; i++) {
    const pin = members[i];
    sumLat += pin.coordinate.lat;
    sumLng += pin.coordinate.lng;
    isVisited ||= pin.isVisited;
    memberIds[i] = pin.id;
  }

  return {
    kind: "cluster",
    cluster: {
      id: createId(),
      coordinate: {
        lat: sumLat / members.length,
        lng: sumLng / members.length,
      },
      memberIds,
      count: members.length,
      isVisited,
    },
  };
}

/** Id of the pin or cluster behind an item. */
export function itemId(item: ClusterItem): string {
  return item.kind === "single" ? item.pin.id : item.cluster.id;
}

/** Where an item is drawn. */
export function itemCoordinate(item: ClusterItem): Coordinate {
  return item.kind === "single" ? item.pin.coordinate : item.cluster.coordinate;
}

/** Number of pins an item stands for. */
export function itemCount(item: ClusterItem): number {
  return item.kind === "single" ? 1 : item.cluster.count;
}

/**
 * Presentation tier for a cluster marker. Marker diameter and label size
 * share these breakpoints.
 */
export function clusterSizeTier(count: number): ClusterSizeTier {
  if (count <= 5) return "smallest";
  if (count <= 10) return "small";
  if (count <= 20) return "medium";
  if (count <= 50) return "large";
  return "largest";
}
