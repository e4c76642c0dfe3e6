import path from "node:path";
import { beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { getMetricsText, resetMetrics } from "../server/metrics";
import { loadExtremaTrackingDataset, runExtremaTrackingDataset } from "../tools/extrema-track-runner";

const DATASET_PATH = path.resolve(process.cwd(), "datasets", "drifting-peaks.fixture.json");
const GENERATED_AT = "2026-01-01T00:00:00.000Z";

const signalsOf = (points: Array<{ signal_value: number }> | undefined) =>
  (points ?? []).map((p) => p.signal_value);

describe("extrema tracking CLI", () => {
  beforeEach(() => {
    resetMetrics();
  });

  it("links drifting peaks and a late-born peak into three tracks", async () => {
    const dataset = await loadExtremaTrackingDataset(DATASET_PATH);
    const report = runExtremaTrackingDataset(dataset, {
      dataset_path: DATASET_PATH,
      generated_at_iso: GENERATED_AT,
    });

    expect(report.signal_axis).toBe("frequency_ghz");
    expect(report.control_axis).toBe("bias_v");
    expect(report.range).toEqual({ start: 0, stop: 8 });
    expect(report.extrema_count).toBe(23);
    expect(report.track_count).toBe(3);
    expect(report.tracks.map((t) => t.id)).toEqual([1, 2, 3]);
    expect(signalsOf(report.tracks[0]?.points)).toEqual([3, 3.25, 3.5, 3.75, 4, 4.25, 4.5, 4.75, 5]);
    expect(signalsOf(report.tracks[1]?.points)).toEqual([
      8.5, 8.25, 8, 7.75, 7.5, 7.25, 7, 6.75, 6.5,
    ]);
    expect(signalsOf(report.tracks[2]?.points)).toEqual([1, 1, 1, 1, 1]);
    expect(report.tracks[2]?.points[0]?.control_value).toBe(0.4);

    expect(report.transitions).toHaveLength(8);
    expect(report.transitions.map((t) => t.births)).toEqual([0, 0, 0, 1, 0, 0, 0, 0]);
    expect(report.transitions.every((t) => t.deaths === 0)).toBe(true);
    expect(report.transitions[3]?.track_ids).toEqual([3, 1, 2]);

    expect(report.summaries.map((s) => s.lifetime_steps)).toEqual([9, 9, 5]);
    expect(report.survival.total_tracks).toBe(3);
    expect(report.survival.max_lifetime_steps).toBe(9);
    expect(report.survival.points[5]?.survival).toBeCloseTo(2 / 3, 12);
  });

  it("produces the same hashes for the same input", async () => {
    const dataset = await loadExtremaTrackingDataset(DATASET_PATH);
    const a = runExtremaTrackingDataset(dataset, { generated_at_iso: GENERATED_AT });
    const b = runExtremaTrackingDataset(dataset, { generated_at_iso: GENERATED_AT });
    expect(a.inputs_hash).toBe(b.inputs_hash);
    expect(a.result_hash).toBe(b.result_hash);
    expect(a).toEqual(b);
  });

  it("restarts ids when the range starts after a birth", async () => {
    const dataset = await loadExtremaTrackingDataset(DATASET_PATH);
    const report = runExtremaTrackingDataset({ ...dataset, range: { start: 4, stop: 8 } });
    expect(report.track_count).toBe(3);
    expect(report.tracks.map((t) => signalsOf(t.points)[0])).toEqual([1, 4, 7.5]);
    expect(report.transitions.map((t) => t.from_index)).toEqual([4, 5, 6, 7]);
  });

  it("records detection and tracking counters", async () => {
    const dataset = await loadExtremaTrackingDataset(DATASET_PATH);
    runExtremaTrackingDataset(dataset, { generated_at_iso: GENERATED_AT });
    const text = await getMetricsText();
    expect(text).toContain('extrema_detect_runs_total{mode="maxima"} 1');
    expect(text).toContain('extrema_detected_total{mode="maxima"} 23');
    expect(text).toContain('extrema_track_runs_total{status="ok"} 1');
    expect(text).toContain("extrema_track_births_total 1");
    expect(text).toContain("extrema_track_deaths_total 0");
  });

  it("rejects a fractional range before anything runs", async () => {
    const dataset = await loadExtremaTrackingDataset(DATASET_PATH);
    expect(() => runExtremaTrackingDataset({ ...dataset, range: { start: 2, stop: 2.5 } })).toThrow(
      ZodError,
    );
    const text = await getMetricsText();
    expect(text).not.toContain("extrema_detect_runs_total{");
  });
});
