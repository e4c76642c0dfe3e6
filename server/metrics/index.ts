import { Counter, Histogram, Registry } from "prom-client";
import type { TExtremaMode } from "@shared/extrema-tracking";

const registry = new Registry();

const detectRunsTotal = new Counter({
  name: "extrema_detect_runs_total",
  help: "Extrema detection runs",
  labelNames: ["mode"],
  registers: [registry],
});

const detectedTotal = new Counter({
  name: "extrema_detected_total",
  help: "Extrema found across all detection runs",
  labelNames: ["mode"],
  registers: [registry],
});

const trackRunsTotal = new Counter({
  name: "extrema_track_runs_total",
  help: "Tracking runs grouped by outcome",
  labelNames: ["status"],
  registers: [registry],
});

const trackBirthsTotal = new Counter({
  name: "extrema_track_births_total",
  help: "Tracks started partway through a traversal",
  registers: [registry],
});

const trackDeathsTotal = new Counter({
  name: "extrema_track_deaths_total",
  help: "Tracks that stopped growing before the end of a traversal",
  registers: [registry],
});

const trackLatency = new Histogram({
  name: "extrema_track_latency_ms",
  help: "Wall-clock duration of a detect+track run in milliseconds",
  buckets: [1, 5, 10, 25, 50, 100, 250, 500, 1000, 5000],
  registers: [registry],
});

export const metrics = {
  recordDetection(mode: TExtremaMode, found: number): void {
    detectRunsTotal.inc({ mode });
    detectedTotal.inc({ mode }, found);
  },
  recordTracking(latencyMs: number, ok: boolean, births = 0, deaths = 0): void {
    trackRunsTotal.inc({ status: ok ? "ok" : "error" });
    trackLatency.observe(latencyMs);
    if (births > 0) trackBirthsTotal.inc(births);
    if (deaths > 0) trackDeathsTotal.inc(deaths);
  },
};

export async function getMetricsText(): Promise<string> {
  return registry.metrics();
}

export function resetMetrics(): void {
  registry.resetMetrics();
}
