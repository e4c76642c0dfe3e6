import {
  DEFAULT_SMOOTHING_KERNEL,
  SmoothingKernel,
  type TSmoothingKernel,
} from "@shared/extrema-tracking";
import { SmoothingKernelError } from "./extrema-errors";
import { otherDim, type FieldDim, type ScalarField2D } from "./scalar-field";

export type FieldSmoother = (field: ScalarField2D, signalDim: FieldDim) => ScalarField2D;

/** Sampled gaussian over `size` taps centred on zero, normalised to unit sum. */
export const gaussianWeights = (sigma: number, size: number): Float64Array => {
  const weights = new Float64Array(size);
  const half = (size - 1) / 2;
  let sum = 0;
  for (let i = 0; i < size; i++) {
    const x = i - half;
    const w = Math.exp(-(x * x) / (2 * sigma * sigma));
    weights[i] = w;
    sum += w;
  }
  for (let i = 0; i < size; i++) {
    weights[i] /= sum;
  }
  return weights;
};

export const boxWeights = (size: number): Float64Array => new Float64Array(size).fill(1 / size);

const kernelWeights = (
  kernel: TSmoothingKernel,
): { signal: Float64Array; control: Float64Array } | null => {
  switch (kernel.kind) {
    case "gaussian":
      return {
        signal: gaussianWeights(kernel.sigma_signal, kernel.size_signal),
        control: gaussianWeights(kernel.sigma_control, kernel.size_control),
      };
    case "box":
      return {
        signal: boxWeights(kernel.size_signal),
        control: boxWeights(kernel.size_control),
      };
    case "none":
      return null;
  }
};

// Correlation along one dimension; out-of-range samples replicate the nearest edge value.
const filterAlong = (
  data: Float64Array,
  shape: [number, number],
  dim: FieldDim,
  weights: Float64Array,
): Float64Array => {
  if (weights.length === 1) return new Float64Array(data);
  const [n0, n1] = shape;
  const half = (weights.length - 1) / 2;
  const len = dim === 0 ? n0 : n1;
  const stride = dim === 0 ? n1 : 1;
  const lines = dim === 0 ? n1 : n0;
  const lineStride = dim === 0 ? 1 : n1;
  const out = new Float64Array(data.length);
  for (let line = 0; line < lines; line++) {
    const base = line * lineStride;
    for (let i = 0; i < len; i++) {
      let acc = 0;
      for (let k = 0; k < weights.length; k++) {
        const j = Math.min(len - 1, Math.max(0, i + k - half));
        acc += weights[k] * data[base + j * stride];
      }
      out[base + i * stride] = acc;
    }
  }
  return out;
};

export const smoothField = (
  field: ScalarField2D,
  signalDim: FieldDim,
  kernel: TSmoothingKernel = DEFAULT_SMOOTHING_KERNEL,
): ScalarField2D => {
  const weights = kernelWeights(SmoothingKernel.parse(kernel));
  if (!weights) {
    return { ...field, data: new Float64Array(field.data) };
  }
  const controlDim = otherDim(signalDim);
  for (const [dim, w] of [
    [signalDim, weights.signal],
    [controlDim, weights.control],
  ] as const) {
    if (w.length > field.shape[dim]) {
      throw new SmoothingKernelError(field.axes[dim].name, w.length, field.shape[dim]);
    }
  }
  const alongSignal = filterAlong(field.data, field.shape, signalDim, weights.signal);
  const data = filterAlong(alongSignal, field.shape, controlDim, weights.control);
  return { ...field, data };
};

export const createKernelSmoother =
  (kernel: TSmoothingKernel = DEFAULT_SMOOTHING_KERNEL): FieldSmoother =>
  (field, signalDim) =>
    smoothField(field, signalDim, kernel);
