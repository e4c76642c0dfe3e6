import {
  DEFAULT_SMOOTHING_KERNEL,
  type TExtremaMode,
  type TSmoothingKernel,
} from "@shared/extrema-tracking";
import { createKernelSmoother, type FieldSmoother } from "./field-smoothing";
import { findLocalExtrema } from "./local-extrema";
import { otherDim, resolveFieldDim, type FieldDim, type ScalarField2D } from "./scalar-field";

/**
 * 2xN matrices of detected extrema. Row 0 is the signal axis, row 1 the
 * control axis; column k of `indices` and `values` describe the same extremum.
 */
export type ExtremaMatrices = {
  indices: [number[], number[]];
  values: [number[], number[]];
};

export type DetectExtremaOptions = {
  mode?: TExtremaMode;
  kernel?: TSmoothingKernel;
  /** Replaces kernel smoothing entirely when given. */
  smoother?: FieldSmoother;
};

export const detectExtrema = (
  field: ScalarField2D,
  signalAxis: string | FieldDim,
  options: DetectExtremaOptions = {},
): ExtremaMatrices => {
  const signalDim = resolveFieldDim(field, signalAxis);
  const controlDim = otherDim(signalDim);
  const smoother = options.smoother ?? createKernelSmoother(options.kernel ?? DEFAULT_SMOOTHING_KERNEL);
  const smoothed = smoother(field, signalDim);

  // Boundary extrema along the signal axis are artifacts; along the control axis they are real.
  const edges: [boolean, boolean] = [true, true];
  edges[signalDim] = false;
  const found = findLocalExtrema(smoothed, {
    mode: options.mode ?? "maxima",
    region: [signalDim],
    edges,
  });

  const entries = found.map((idx) => ({ signal: idx[signalDim], control: idx[controlDim] }));
  entries.sort((a, b) => a.control - b.control || a.signal - b.signal);

  const signalValues = field.axes[signalDim].values;
  const controlValues = field.axes[controlDim].values;
  return {
    indices: [entries.map((e) => e.signal), entries.map((e) => e.control)],
    values: [
      entries.map((e) => signalValues[e.signal]),
      entries.map((e) => controlValues[e.control]),
    ],
  };
};
