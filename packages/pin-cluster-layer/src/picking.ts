import type { PickingInfo } from "@deck.gl/core";
import { itemCount, itemId } from "pin-cluster";
import type { ClusterItem } from "pin-cluster";
import type { PinClusterPickingInfo } from "./types";

/**
 * Resolve a raw picking info into a PinClusterPickingInfo.
 *
 * For clusters: the pin ids come from the cluster's member list.
 * For individual pins: the item id IS the pin id.
 */
export function resolvePickingInfo(
  info: PickingInfo,
  items: readonly ClusterItem[] | null,
): PinClusterPickingInfo {
  const item = items && info.index >= 0 ? items[info.index] : undefined;

  if (!item) {
    return {
      ...info,
      isCluster: false,
      itemId: "",
      pointCount: 0,
      pinIds: [],
    };
  }

  return {
    ...info,
    object: item,
    isCluster: item.kind === "cluster",
    itemId: itemId(item),
    pointCount: itemCount(item),
    pinIds: item.kind === "cluster" ? [...item.cluster.memberIds] : [item.pin.id],
  };
}
