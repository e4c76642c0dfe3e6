import { describe, expect, it, vi } from "vitest";
import { detectExtrema } from "../server/services/physics/extrema-detection";
import { FieldShapeError, SmoothingKernelError } from "../server/services/physics/extrema-errors";
import { buildScalarField2D, type ScalarField2D } from "../server/services/physics/scalar-field";

const FREQ = [100, 101, 102, 103, 104, 105, 106, 107, 108];
const BIAS = [0.5, 1.0, 1.5];

// Columns (one per bias value) of unit spikes on a zero background.
const spikes: Array<number[]> = [
  [0, 5], // edge spike on the signal axis plus an interior one
  [4],
  [2, 8], // interior spike plus an edge spike at the far end
];

const spikeField = (): ScalarField2D =>
  buildScalarField2D({
    axes: [
      { name: "freq", values: FREQ },
      { name: "bias", values: BIAS },
    ],
    data: FREQ.map((_, i) => spikes.map((col) => (col.includes(i) ? 1 : 0))),
  });

const transpose = (field: ScalarField2D): ScalarField2D =>
  buildScalarField2D({
    axes: [field.axes[1], field.axes[0]],
    data: field.axes[1].values.map((_, i1) =>
      field.axes[0].values.map((_, i0) => field.data[i0 * field.shape[1] + i1]),
    ),
  });

describe("extrema detection", () => {
  it("drops signal-axis boundary extrema and keeps control-axis boundary slices", () => {
    const out = detectExtrema(spikeField(), "freq");
    expect(out.indices).toEqual([
      [5, 4, 2],
      [0, 1, 2],
    ]);
    expect(out.values).toEqual([
      [105, 104, 102],
      [0.5, 1.0, 1.5],
    ]);
  });

  it("finds minima of a negated field at the same places", () => {
    const field = spikeField();
    const negated: ScalarField2D = { ...field, data: field.data.map((v) => -v) };
    expect(detectExtrema(negated, "freq", { mode: "minima" })).toEqual(
      detectExtrema(field, "freq"),
    );
  });

  it("keeps rows ordered signal then control when the signal axis is dimension 1", () => {
    const field = spikeField();
    expect(detectExtrema(transpose(field), "freq")).toEqual(detectExtrema(field, "freq"));
    expect(detectExtrema(field, 0)).toEqual(detectExtrema(field, "freq"));
  });

  it("uses a caller-supplied smoother instead of the kernel", () => {
    const field = buildScalarField2D({
      axes: [
        { name: "freq", values: [0, 1, 2, 3, 4, 5, 6] },
        { name: "bias", values: [0] },
      ],
      data: [[0], [1], [0], [1], [0], [1], [0]],
    });
    const smoother = vi.fn((f: ScalarField2D) => f);
    const out = detectExtrema(field, "freq", { smoother });
    expect(smoother).toHaveBeenCalledTimes(1);
    expect(smoother).toHaveBeenCalledWith(field, 0);
    expect(out.indices[0]).toEqual([1, 3, 5]);

    const raw = detectExtrema(field, "freq", { kernel: { kind: "none" } });
    expect(raw.indices[0]).toEqual([1, 3, 5]);
  });

  it("propagates smoothing and axis errors", () => {
    const short = buildScalarField2D({
      axes: [
        { name: "freq", values: [0, 1, 2] },
        { name: "bias", values: [0, 1] },
      ],
      data: [
        [0, 0],
        [1, 1],
        [0, 0],
      ],
    });
    expect(() => detectExtrema(short, "freq")).toThrow(SmoothingKernelError);
    expect(() => detectExtrema(short, "time")).toThrow(FieldShapeError);
  });

  it("returns empty matrices for a flat field", () => {
    const flat = buildScalarField2D({
      axes: [
        { name: "freq", values: FREQ },
        { name: "bias", values: [0] },
      ],
      data: FREQ.map(() => [2]),
    });
    expect(detectExtrema(flat, "freq")).toEqual({ indices: [[], []], values: [[], []] });
  });
});
