#!/usr/bin/env npx tsx
/**
 * pin-cluster — Benchmark Suite
 *
 * Times cluster() per viewport change across pin counts and zoom tiers, and
 * compares the indexed grouper against a plain seed scan.
 * Run: npm run bench -w pin-cluster
 */

import {
  PinClusterEngine,
  groupPins,
  haversineMeters,
} from "../src/index";
import type { Pin } from "../src/index";
import { generateTestPins, viewportAtZoom } from "../tests/test-utils";
import { ReportTable, count, duration, radius, section, speedup } from "./format";

// ─── Configuration ──────────────────────────────────────────────────────────

const BASE_SIZES = [50, 200, 1_000, 5_000];
const INCLUDE_20K = process.argv.includes("--20k");
const DATASET_SIZES = INCLUDE_20K ? [...BASE_SIZES, 20_000] : BASE_SIZES;
const WARMUP_RUNS = 3;
const BENCH_RUNS = 10;
// One zoom per reachable tier, plus one past the cutoff
const ZOOM_LEVELS = [8, 11, 13, 15, 16, 17];
// Roughly a metropolitan area
const SPREAD_DEG = 0.2;

// ─── Timing Utilities ───────────────────────────────────────────────────────

interface TimingResult {
  median: number;
  p95: number;
}

function measure(fn: () => void, runs: number, warmup: number): TimingResult {
  for (let i = 0; i < warmup; i++) fn();

  const samples: number[] = [];
  for (let i = 0; i < runs; i++) {
    const start = performance.now();
    fn();
    samples.push(performance.now() - start);
  }

  samples.sort((a, b) => a - b);
  return {
    median: samples[Math.floor(samples.length / 2)],
    p95: samples[Math.floor(samples.length * 0.95)],
  };
}

/** Seed scan over the whole remaining list, without an index. */
function scanGroups(pins: readonly Pin[], radiusMeters: number): number {
  const remaining = [...pins];
  let groups = 0;
  for (let seed = remaining.shift(); seed; seed = remaining.shift()) {
    for (let i = 0; i < remaining.length; ) {
      if (haversineMeters(seed.coordinate, remaining[i].coordinate) < radiusMeters) {
        remaining.splice(i, 1);
      } else {
        i++;
      }
    }
    groups++;
  }
  return groups;
}

// ─── Main ───────────────────────────────────────────────────────────────────

function main() {
  console.log("pin-cluster benchmark");
  const engine = new PinClusterEngine();

  section("cluster() per viewport change");
  const perZoom = new ReportTable([
    { label: "Pins", width: 8 },
    { label: "Zoom", width: 4 },
    { label: "Radius", width: 6 },
    { label: "Items", width: 8 },
    { label: "Median", width: 10 },
    { label: "p95", width: 10 },
  ]);
  perZoom.printHeader();

  for (const size of DATASET_SIZES) {
    const pins = generateTestPins(size, undefined, SPREAD_DEG);
    for (const zoom of ZOOM_LEVELS) {
      const viewport = viewportAtZoom(zoom);
      const time = measure(
        () => engine.cluster(pins, viewport),
        BENCH_RUNS,
        WARMUP_RUNS,
      );
      perZoom.printRow([
        count(size),
        String(zoom),
        radius(engine.resolveRadius(viewport)),
        count(engine.cluster(pins, viewport).length),
        duration(time.median),
        duration(time.p95),
      ]);
    }
  }

  section(
    "Indexed grouping vs plain scan",
    "Same groups either way; the index only narrows each seed's scan.",
  );
  const versus = new ReportTable([
    { label: "Pins", width: 8 },
    { label: "Radius", width: 6 },
    { label: "Groups", width: 8 },
    { label: "Scan", width: 10 },
    { label: "Indexed", width: 10 },
    { label: "", width: 14, align: "left" },
  ]);
  versus.printHeader();

  for (const size of DATASET_SIZES) {
    const pins = generateTestPins(size, undefined, SPREAD_DEG);
    for (const meters of [100, 1000, 5000]) {
      const scan = measure(() => scanGroups(pins, meters), BENCH_RUNS, WARMUP_RUNS);
      const indexed = measure(() => groupPins(pins, meters), BENCH_RUNS, WARMUP_RUNS);
      versus.printRow([
        count(size),
        radius(meters),
        count(groupPins(pins, meters).length),
        duration(scan.median),
        duration(indexed.median),
        speedup(scan.median, indexed.median),
      ]);
    }
  }
  console.log("");
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
