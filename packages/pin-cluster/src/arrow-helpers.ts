import type { Table, Vector } from "apache-arrow";
import type { Pin } from "./types";

type PointChunk = Vector["data"][number];

/** Interleaved [lng, lat] values of one point chunk, or null when not packed as Float64. */
function packedPoints(chunk: PointChunk): Float64Array | null {
  const child = chunk.children?.[0];
  const values: unknown = child?.values;
  if (!child || !(values instanceof Float64Array)) return null;
  // Child rows are two per parent row
  const from = (child.offset ?? 0) * 2;
  return values.subarray(from, from + chunk.length * 2);
}

/**
 * Pin positions of a GeoArrow point column (`FixedSizeList[2]<Float64>`) as
 * one interleaved [lng0, lat0, lng1, lat1, ...] buffer, one pair per row.
 * A single packed chunk is returned as a view over Arrow's memory. Rows the
 * column cannot unpack come back as NaN.
 */
export function getCoordBuffer({ geomCol }: { geomCol: Vector }): Float64Array {
  if (geomCol.data.length === 1) {
    const only = packedPoints(geomCol.data[0]);
    if (only) return only;
  }

  const coords = new Float64Array(geomCol.length * 2);
  let row = 0;
  for (const chunk of geomCol.data) {
    const packed = packedPoints(chunk);
    if (packed) {
      coords.set(packed, row * 2);
    } else {
      for (let j = row; j < row + chunk.length; j++) {
        const point = geomCol.get(j);
        coords[j * 2] = point ? point[0] : NaN;
        coords[j * 2 + 1] = point ? point[1] : NaN;
      }
    }
    row += chunk.length;
  }
  return coords;
}

export interface PinColumns {
  /** Default: "geometry" */
  geometryColumn?: string;
  /** Default: "id" */
  idColumn?: string;
  /** Boolean column; pins count as unvisited when absent. Default: "visited" */
  visitedColumn?: string;
  /** 0 = row excluded, non-zero = included. Length must equal table.numRows. */
  filterMask?: Uint8Array | null;
}

/**
 * Read pins from an Arrow Table, in row order. Rows without a usable
 * position or id are skipped.
 */
export function pinsFromTable(table: Table, columns: PinColumns = {}): Pin[] {
  const geometryColumn = columns.geometryColumn ?? "geometry";
  const idColumn = columns.idColumn ?? "id";
  const visitedColumn = columns.visitedColumn ?? "visited";
  const filterMask = columns.filterMask ?? null;

  const geomCol = table.getChild(geometryColumn);
  if (!geomCol) {
    throw new Error(
      `Geometry column "${geometryColumn}" not found in Arrow Table`,
    );
  }
  const idCol = table.getChild(idColumn);
  if (!idCol) {
    throw new Error(`Id column "${idColumn}" not found in Arrow Table`);
  }
  const visitedCol = table.getChild(visitedColumn);

  const coords = getCoordBuffer({ geomCol });
  const pins: Pin[] = [];

  for (let i = 0; i < table.numRows; i++) {
    if (filterMask && !filterMask[i]) continue;

    const lng = coords[i * 2];
    const lat = coords[i * 2 + 1];
    if (Number.isNaN(lng) || Number.isNaN(lat) || !geomCol.isValid(i)) {
      continue;
    }

    const id: unknown = idCol.get(i);
    if (id === null || id === undefined) continue;

    pins.push({
      id: String(id),
      coordinate: { lat, lng },
      isVisited: visitedCol?.get(i) === true,
    });
  }

  return pins;
}
