import { describe, it, expect } from "vitest";
import { PinClusterEngine, cluster, itemCount } from "../src/index";
import type { Cluster, ClusterItem, Pin } from "../src/index";
import { generateTestPins, pin, viewportAtZoom } from "./test-utils";

const clusters = (items: ClusterItem[]): Cluster[] =>
  items.flatMap((item) => (item.kind === "cluster" ? [item.cluster] : []));

const memberships = (items: ClusterItem[]): string[][] =>
  items.map((item) =>
    item.kind === "single" ? [item.pin.id] : item.cluster.memberIds,
  );

function counter(prefix = "cluster") {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

describe("cluster", () => {
  it("returns nothing for no pins", () => {
    expect(cluster([], viewportAtZoom(3))).toEqual([]);
    expect(cluster([], viewportAtZoom(18))).toEqual([]);
  });

  it("merges three nearby pins into one cluster at zoom 12", () => {
    const pins = [
      pin("a", 35.0, 139.0),
      pin("b", 35.0002, 139.0001),
      pin("c", 34.9998, 139.0002),
    ];

    const items = cluster(pins, viewportAtZoom(12));

    expect(items).toHaveLength(1);
    const [only] = clusters(items);
    expect(only.count).toBe(3);
    expect(only.memberIds).toEqual(["a", "b", "c"]);
    expect(only.coordinate.lat).toBeCloseTo(35.0, 9);
    expect(only.coordinate.lng).toBeCloseTo(139.0001, 9);
  });

  it("keeps a distant pin apart at a 300 m radius", () => {
    const a = pin("A", 0, 0);
    const b = pin("B", 0, 0.0009);
    const c = pin("C", 0, 0.09);
    const engine = new PinClusterEngine({ createId: counter() });

    const items = engine.cluster([a, b, c], viewportAtZoom(13));

    expect(items).toEqual([
      {
        kind: "cluster",
        cluster: {
          id: "cluster-1",
          coordinate: { lat: 0, lng: 0.00045 },
          memberIds: ["A", "B"],
          count: 2,
          isVisited: false,
        },
      },
      { kind: "single", pin: c },
    ]);
  });

  it("skips clustering above zoom 16", () => {
    const pins = [pin("A", 0, 0), pin("B", 0, 0.0009), pin("C", 0, 0.09)];

    const items = cluster(pins, viewportAtZoom(17));

    expect(items).toEqual(pins.map((p) => ({ kind: "single", pin: p })));
  });

  it("never merges past the cutoff, even pins sharing a position", () => {
    const pins = [pin("p", 5, 5), pin("q", 5, 5), pin("r", 5, 5)];
    for (const zoom of [16.01, 17, 19.5, 20]) {
      const items = cluster(pins, viewportAtZoom(zoom));
      expect(items.every((item) => item.kind === "single")).toBe(true);
      expect(items).toHaveLength(3);
    }
  });

  it("still clusters at exactly zoom 16", () => {
    // ~20 m apart: inside the 30 m tier that zoom 16 reaches
    const pins = [pin("a", 0, 0), pin("b", 0, 0.00018)];
    expect(memberships(cluster(pins, viewportAtZoom(16)))).toEqual([
      ["a", "b"],
    ]);
    expect(memberships(cluster(pins, viewportAtZoom(16.5)))).toEqual([
      ["a"],
      ["b"],
    ]);
  });

  it("treats a collapsed viewport as fully zoomed in", () => {
    const pins = [pin("p", 5, 5), pin("q", 5, 5)];
    const items = cluster(pins, {
      centerLat: 5,
      centerLng: 5,
      spanLatDeg: 0,
      spanLngDeg: 0,
    });
    expect(memberships(items)).toEqual([["p"], ["q"]]);
  });

  it("marks a cluster visited when any member is visited", () => {
    const pins = [pin("v", 0, 0, true), pin("u", 0, 0.0001, false)];
    const [only] = clusters(cluster(pins, viewportAtZoom(12)));
    expect(only.isVisited).toBe(true);
  });

  it("leaves a cluster of unvisited pins unvisited", () => {
    const pins = [pin("u1", 0, 0), pin("u2", 0, 0.0001)];
    const [only] = clusters(cluster(pins, viewportAtZoom(12)));
    expect(only.isVisited).toBe(false);
  });

  it("conserves every pin at every zoom", () => {
    const pins = generateTestPins(300);
    const expected = pins.map((p) => p.id).sort();

    for (let zoom = 0; zoom <= 20; zoom += 0.5) {
      const items = cluster(pins, viewportAtZoom(zoom));
      const total = items.reduce((sum, item) => sum + itemCount(item), 0);
      expect(total).toBe(pins.length);
      expect(memberships(items).flat().sort()).toEqual(expected);
    }
  });

  it("places every cluster at the mean of its members", () => {
    const pins = generateTestPins(200);
    const byId = new Map<string, Pin>(pins.map((p) => [p.id, p]));

    for (const c of clusters(cluster(pins, viewportAtZoom(11)))) {
      const members = c.memberIds.map((id) => byId.get(id));
      let lat = 0;
      let lng = 0;
      let visited = false;
      for (const m of members) {
        expect(m).toBeDefined();
        if (!m) continue;
        lat += m.coordinate.lat;
        lng += m.coordinate.lng;
        visited ||= m.isVisited;
      }
      expect(c.coordinate.lat).toBeCloseTo(lat / members.length, 9);
      expect(c.coordinate.lng).toBeCloseTo(lng / members.length, 9);
      expect(c.count).toBe(members.length);
      expect(c.isVisited).toBe(visited);
    }
  });

  it("gives identical memberships but fresh ids on repeated calls", () => {
    const pins = generateTestPins(200);
    const viewport = viewportAtZoom(10.5);

    const first = cluster(pins, viewport);
    const second = cluster(pins, viewport);

    expect(memberships(second)).toEqual(memberships(first));

    const firstIds = clusters(first).map((c) => c.id);
    const secondIds = clusters(second).map((c) => c.id);
    expect(firstIds.length).toBeGreaterThan(0);
    for (const id of secondIds) expect(firstIds).not.toContain(id);
  });

  it("ignores the viewport center", () => {
    const pins = generateTestPins(100);
    const here = cluster(pins, viewportAtZoom(12, 0, 0));
    const there = cluster(pins, viewportAtZoom(12, -40, 120));
    expect(memberships(there)).toEqual(memberships(here));
  });
});

describe("PinClusterEngine", () => {
  it("uses the default tiers and cutoff", () => {
    const engine = new PinClusterEngine();
    expect(engine.cutoffZoom).toBe(16);
    expect(engine.resolveRadius(viewportAtZoom(5))).toBe(5000);
    expect(engine.resolveRadius(viewportAtZoom(11))).toBe(1000);
    expect(engine.resolveRadius(viewportAtZoom(13))).toBe(300);
    expect(engine.resolveRadius(viewportAtZoom(15))).toBe(100);
    expect(engine.resolveRadius(viewportAtZoom(16.5))).toBeNull();
  });

  it("resolves a collapsed viewport past the cutoff", () => {
    const engine = new PinClusterEngine();
    expect(
      engine.resolveRadius({
        centerLat: 0,
        centerLng: 0,
        spanLatDeg: 0,
        spanLngDeg: -1,
      }),
    ).toBeNull();
  });

  it("lets a custom cutoff reach the zero-radius tier", () => {
    const engine = new PinClusterEngine({ cutoffZoom: 20 });
    const pins = [pin("p", 1, 1), pin("q", 1, 1)];

    expect(engine.resolveRadius(viewportAtZoom(19))).toBe(0);
    expect(memberships(engine.cluster(pins, viewportAtZoom(19)))).toEqual([
      ["p"],
      ["q"],
    ]);
  });

  it("uses custom tiers", () => {
    const engine = new PinClusterEngine({
      tiers: [{ minZoom: 0, radiusMeters: 50_000 }],
      createId: counter("group"),
    });
    const pins = [pin("a", 0, 0), pin("b", 0, 0.3)];

    const items = engine.cluster(pins, viewportAtZoom(14));

    expect(memberships(items)).toEqual([["a", "b"]]);
    expect(clusters(items)[0].id).toBe("group-1");
  });

  it("generates UUIDs by default", () => {
    const pins = [pin("a", 0, 0), pin("b", 0, 0)];
    const [only] = clusters(new PinClusterEngine().cluster(pins, viewportAtZoom(12)));
    expect(only.id).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
    );
  });

  it("rejects invalid options", () => {
    expect(() => new PinClusterEngine({ tiers: [] })).toThrow(
      "Distance tiers must not be empty",
    );
    expect(() => new PinClusterEngine({ cutoffZoom: NaN })).toThrow(
      "cutoffZoom must be finite, got NaN",
    );
  });
});
