import fs from "node:fs/promises";
import {
  ExtremaTrackingDataset,
  ExtremaTrackingReport,
  type TExtremaMatching,
  type TExtremaTrackingDataset,
  type TExtremaTrackingDatasetInput,
  type TExtremaTrackingReport,
} from "@shared/extrema-tracking";
import {
  EXTREMA_FOLLOW_TRAJECTORY,
  EXTREMA_MATCHING,
  EXTREMA_SURVIVAL_BOOTSTRAP,
  EXTREMA_TRACE,
} from "../server/config/env";
import { metrics } from "../server/metrics";
import { detectExtrema } from "../server/services/physics/extrema-detection";
import { trackExtrema, type ExtremaTrackingResult } from "../server/services/physics/extrema-tracking";
import { buildScalarField2D, otherDim, resolveFieldDim } from "../server/services/physics/scalar-field";
import { summarizeTracks } from "../server/services/physics/track-summary";
import { buildTrackSurvival } from "../server/services/physics/track-survival";
import { hashStableJson } from "../server/utils/content-hash";
import { log } from "../server/utils/log";

export type RunOptions = {
  dataset_path?: string;
  generated_at_iso?: string;
  follow_trajectory?: boolean;
  matching?: TExtremaMatching;
  bootstrap_samples?: number;
  trace?: boolean;
};

export async function loadExtremaTrackingDataset(
  datasetPath: string,
): Promise<TExtremaTrackingDataset> {
  const src = await fs.readFile(datasetPath, "utf8");
  return ExtremaTrackingDataset.parse(JSON.parse(src));
}

const traceTransitions = (result: ExtremaTrackingResult): void => {
  for (const t of result.transitions) {
    log(
      `${t.from_index}->${t.to_index} prev=${t.prev_count} next=${t.next_count} ` +
        `continued=${t.continued} births=${t.births} deaths=${t.deaths}`,
      "extrema-tracking",
    );
  }
};

export function runExtremaTrackingDataset(
  dataset: TExtremaTrackingDatasetInput,
  opts: RunOptions = {},
): TExtremaTrackingReport {
  const normalized = ExtremaTrackingDataset.parse(dataset);
  const field = buildScalarField2D(normalized.field);
  const signalDim = resolveFieldDim(field, normalized.signal_axis);
  const controlDim = otherDim(signalDim);
  const followTrajectory =
    opts.follow_trajectory ?? normalized.follow_trajectory ?? EXTREMA_FOLLOW_TRAJECTORY;
  const matching = opts.matching ?? normalized.matching ?? EXTREMA_MATCHING;
  const range = normalized.range ?? { start: 0, stop: field.shape[controlDim] - 1 };

  const started = performance.now();
  const detected = detectExtrema(field, signalDim, {
    mode: normalized.mode,
    kernel: normalized.kernel,
  });
  metrics.recordDetection(normalized.mode, detected.indices[0].length);

  let result: ExtremaTrackingResult;
  try {
    result = trackExtrema(range, detected.indices, detected.values, {
      follow_trajectory: followTrajectory,
      matching,
    });
  } catch (err) {
    metrics.recordTracking(performance.now() - started, false);
    log(`tracking failed: ${err instanceof Error ? err.message : String(err)}`, "extrema-tracking", "error");
    throw err;
  }

  const births = result.transitions.reduce((sum, t) => sum + t.births, 0);
  const deaths = result.transitions.reduce((sum, t) => sum + t.deaths, 0);
  metrics.recordTracking(performance.now() - started, true, births, deaths);
  if (opts.trace ?? EXTREMA_TRACE) {
    traceTransitions(result);
  }

  const summaries = summarizeTracks(result.tracks);
  const survival = buildTrackSurvival(summaries, {
    bootstrap_samples: opts.bootstrap_samples ?? EXTREMA_SURVIVAL_BOOTSTRAP,
  });

  log(
    `${detected.indices[0].length} extrema -> ${result.tracks.size} tracks over control ` +
      `[${range.start}, ${range.stop}] (${matching}, trajectory ${followTrajectory ? "on" : "off"})`,
    "extrema-tracking",
  );

  return ExtremaTrackingReport.parse({
    schema_version: "extrema_tracking_report/1",
    generated_at_iso: opts.generated_at_iso ?? new Date().toISOString(),
    dataset_path: opts.dataset_path,
    inputs_hash: hashStableJson(normalized),
    result_hash: hashStableJson({ tracks: result.tracks, transitions: result.transitions }),
    signal_axis: field.axes[signalDim].name,
    control_axis: field.axes[controlDim].name,
    mode: normalized.mode,
    follow_trajectory: followTrajectory,
    matching,
    range,
    extrema_count: detected.indices[0].length,
    track_count: result.tracks.size,
    tracks: Array.from(result.tracks.entries(), ([id, points]) => ({ id, points })),
    summaries,
    transitions: result.transitions,
    survival,
  });
}
