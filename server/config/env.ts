// Centralized environment switches for extrema detection and tracking
import { ExtremaMatching, type TExtremaMatching } from "@shared/extrema-tracking";

type Env = Record<string, string | undefined>;

export const flagEnabled = (value: string | undefined, defaultValue: boolean): boolean => {
  if (value === undefined) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return defaultValue;
};

const parseMatching = (value: string | undefined): TExtremaMatching => {
  const parsed = ExtremaMatching.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : "exclusive";
};

const parseCount = (value: string | undefined, fallback: number, max: number): number => {
  const requested = Number(value ?? fallback);
  if (!Number.isFinite(requested) || requested < 0) {
    return fallback;
  }
  return Math.min(Math.floor(requested), max);
};

export type ExtremaTrackingEnv = {
  followTrajectory: boolean;
  matching: TExtremaMatching;
  trace: boolean;
  logStdout: boolean;
  survivalBootstrap: number;
};

export const readExtremaTrackingEnv = (env: Env = process.env): ExtremaTrackingEnv => ({
  followTrajectory: flagEnabled(env.EXTREMA_FOLLOW_TRAJECTORY, true),
  matching: parseMatching(env.EXTREMA_MATCHING),
  trace: flagEnabled(env.EXTREMA_TRACE, false),
  logStdout: flagEnabled(env.EXTREMA_LOG_STDOUT, true),
  survivalBootstrap: parseCount(env.EXTREMA_SURVIVAL_BOOTSTRAP, 0, 5000),
});

const initial = readExtremaTrackingEnv();

export const EXTREMA_FOLLOW_TRAJECTORY = initial.followTrajectory;
export const EXTREMA_MATCHING = initial.matching;
export const EXTREMA_TRACE = initial.trace;
export const EXTREMA_LOG_STDOUT = initial.logStdout;
export const EXTREMA_SURVIVAL_BOOTSTRAP = initial.survivalBootstrap;
