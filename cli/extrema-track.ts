#!/usr/bin/env -S tsx
import fs from "node:fs/promises";
import path from "node:path";
import { ExtremaMatching } from "@shared/extrema-tracking";
import {
  loadExtremaTrackingDataset,
  runExtremaTrackingDataset,
} from "../tools/extrema-track-runner";
import { setLogStdout } from "../server/utils/log";

type CliArgs = {
  dataset?: string;
  out?: string;
  matching?: string;
  followTrajectory?: boolean;
};

function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const parsed: CliArgs = {};
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if ((token === "-d" || token === "--dataset") && args[i + 1]) {
      parsed.dataset = args[i + 1];
      i += 1;
    } else if ((token === "-o" || token === "--out") && args[i + 1]) {
      parsed.out = args[i + 1];
      i += 1;
    } else if (token === "--matching" && args[i + 1]) {
      parsed.matching = args[i + 1];
      i += 1;
    } else if (token === "--no-trajectory") {
      parsed.followTrajectory = false;
    }
  }
  return parsed;
}

async function main() {
  const args = parseArgs();
  // stdout carries the report; keep log lines off it.
  setLogStdout(false);
  const datasetPath = path.resolve(args.dataset ?? "datasets/drifting-peaks.fixture.json");
  const dataset = await loadExtremaTrackingDataset(datasetPath);
  const matching = args.matching ? ExtremaMatching.parse(args.matching) : undefined;
  const report = runExtremaTrackingDataset(dataset, {
    dataset_path: datasetPath,
    follow_trajectory: args.followTrajectory,
    matching,
  });

  if (args.out) {
    const outPath = path.resolve(args.out);
    await fs.writeFile(outPath, JSON.stringify(report, null, 2));
    console.error(`wrote report to ${outPath}`);
  }

  console.log(JSON.stringify(report, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
