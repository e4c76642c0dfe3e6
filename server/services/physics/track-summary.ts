import type { TExtremaTrackSummary, TTrackPoint } from "@shared/extrema-tracking";

export const summarizeTrack = (id: number, points: TTrackPoint[]): TExtremaTrackSummary => {
  const controls = points.map((p) => p.control_value);
  const first = Math.min(...controls);
  const last = Math.max(...controls);
  const meanSignal = points.reduce((sum, p) => sum + p.signal_value, 0) / points.length;
  return {
    id,
    point_count: points.length,
    lifetime_steps: new Set(controls).size,
    first_control: first,
    last_control: last,
    span_control: last - first,
    mean_signal: meanSignal,
  };
};

export const summarizeTracks = (tracks: Map<number, TTrackPoint[]>): TExtremaTrackSummary[] =>
  Array.from(tracks.entries())
    .filter(([, points]) => points.length > 0)
    .sort(([a], [b]) => a - b)
    .map(([id, points]) => summarizeTrack(id, points));
