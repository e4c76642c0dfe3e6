import type { TExtremaTrackSummary, TTrackSurvivalResult } from "@shared/extrema-tracking";
import { hashStableJson } from "../../utils/content-hash";

export type TrackSurvivalOptions = {
  bootstrap_samples?: number;
  seed?: string;
  ci_lower?: number;
  ci_upper?: number;
};

type TrackSurvivalPoint = TTrackSurvivalResult["points"][number];

const clamp01 = (value: number) => Math.min(1, Math.max(0, value));

const percentile = (values: number[], p: number): number => {
  if (!values.length) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const pos = clamp01(p) * (sorted.length - 1);
  const lower = Math.floor(pos);
  const upper = Math.ceil(pos);
  if (lower === upper) return sorted[lower];
  const t = pos - lower;
  return sorted[lower] * (1 - t) + sorted[upper] * t;
};

const seedFrom = (value: unknown): number => {
  const hash = hashStableJson(value).replace(/^sha256:/, "");
  const seed = parseInt(hash.slice(0, 8), 16);
  return Number.isFinite(seed) ? seed : 0;
};

const mulberry32 = (seed: number) => {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

/** S(t) = share of tracks seen for at least t slices; hazard is the drop from S(t-1). */
export const computeSurvivalSeries = (lifetimes: number[], maxLifetime: number) => {
  const total = lifetimes.length;
  const survival: number[] = [];
  const hazard: number[] = [];
  const meanResidual: number[] = [];
  let prevSurvival = 1;
  for (let t = 1; t <= maxLifetime; t += 1) {
    let survivors = 0;
    let residualSum = 0;
    for (const value of lifetimes) {
      if (value >= t) {
        survivors += 1;
        residualSum += value - t;
      }
    }
    const s = total > 0 ? clamp01(survivors / total) : 0;
    const h = prevSurvival > 0 ? clamp01((prevSurvival - s) / prevSurvival) : 0;
    survival.push(s);
    hazard.push(h);
    meanResidual.push(survivors > 0 ? residualSum / survivors : 0);
    prevSurvival = s;
  }
  return { survival, hazard, meanResidual };
};

const ciOf = (samples: number[], lower_q: number, upper_q: number) => ({
  lower: percentile(samples, lower_q),
  upper: percentile(samples, upper_q),
});

export const buildTrackSurvival = (
  summaries: TExtremaTrackSummary[],
  options?: TrackSurvivalOptions,
): TTrackSurvivalResult => {
  const lifetimes = summaries
    .map((summary) => summary.lifetime_steps)
    .filter((value) => Number.isFinite(value) && value > 0);
  if (!lifetimes.length) {
    return { total_tracks: 0, max_lifetime_steps: 0, points: [] };
  }
  const maxLifetime = Math.max(...lifetimes);
  const base = computeSurvivalSeries(lifetimes, maxLifetime);
  const points: TrackSurvivalPoint[] = base.survival.map((s, idx) => ({
    t_steps: idx + 1,
    survival: s,
    hazard: base.hazard[idx],
    mean_residual_life: base.meanResidual[idx],
  }));

  const samples = Math.max(0, Math.floor(options?.bootstrap_samples ?? 0));
  if (samples <= 0) {
    return { total_tracks: lifetimes.length, max_lifetime_steps: maxLifetime, points };
  }

  const seed = options?.seed ?? hashStableJson({ lifetimes, max_lifetime_steps: maxLifetime });
  const lower_q = clamp01(options?.ci_lower ?? 0.05);
  const upper_q = clamp01(options?.ci_upper ?? 0.95);
  const rng = mulberry32(seedFrom(`${seed}:track_survival`));

  const survivalSamples = Array.from({ length: maxLifetime }, (): number[] => []);
  const hazardSamples = Array.from({ length: maxLifetime }, (): number[] => []);
  const mrlSamples = Array.from({ length: maxLifetime }, (): number[] => []);

  for (let b = 0; b < samples; b += 1) {
    const resampled = lifetimes.map(() => lifetimes[Math.floor(rng() * lifetimes.length)]);
    const series = computeSurvivalSeries(resampled, maxLifetime);
    for (let i = 0; i < maxLifetime; i++) {
      survivalSamples[i].push(series.survival[i]);
      hazardSamples[i].push(series.hazard[i]);
      mrlSamples[i].push(series.meanResidual[i]);
    }
  }

  points.forEach((point, i) => {
    point.survival_ci = ciOf(survivalSamples[i], lower_q, upper_q);
    point.hazard_ci = ciOf(hazardSamples[i], lower_q, upper_q);
    point.mean_residual_life_ci = ciOf(mrlSamples[i], lower_q, upper_q);
  });

  return {
    total_tracks: lifetimes.length,
    max_lifetime_steps: maxLifetime,
    points,
    bootstrap: { samples, seed, lower_q, upper_q },
  };
};
