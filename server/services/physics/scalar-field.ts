import { ScalarField2DInput, type TFieldAxis } from "@shared/extrema-tracking";
import { FieldShapeError } from "./extrema-errors";

export type FieldDim = 0 | 1;

/**
 * Dense 2D field, row-major: `data[i0 * shape[1] + i1]` sits at
 * (`axes[0].values[i0]`, `axes[1].values[i1]`).
 */
export type ScalarField2D = {
  shape: [number, number];
  data: Float64Array;
  axes: [TFieldAxis, TFieldAxis];
};

export const buildScalarField2D = (input: unknown): ScalarField2D => {
  const parsed = ScalarField2DInput.parse(input);
  const n0 = parsed.axes[0].values.length;
  const n1 = parsed.axes[1].values.length;
  const data = new Float64Array(n0 * n1);
  for (let i0 = 0; i0 < n0; i0++) {
    const row = parsed.data[i0];
    for (let i1 = 0; i1 < n1; i1++) {
      data[i0 * n1 + i1] = row[i1];
    }
  }
  return { shape: [n0, n1], data, axes: parsed.axes };
};

export const createScalarField2D = (
  axes: [TFieldAxis, TFieldAxis],
  data: Float64Array,
): ScalarField2D => {
  const shape: [number, number] = [axes[0].values.length, axes[1].values.length];
  if (data.length !== shape[0] * shape[1]) {
    throw new FieldShapeError(
      `Field data has ${data.length} values; axes describe ${shape[0]}x${shape[1]}.`,
    );
  }
  return { shape, data, axes };
};

export const resolveFieldDim = (field: ScalarField2D, axis: string | FieldDim): FieldDim => {
  if (axis === 0 || axis === 1) return axis;
  if (field.axes[0].name === axis) return 0;
  if (field.axes[1].name === axis) return 1;
  throw new FieldShapeError(
    `Unknown axis "${axis}"; field axes are "${field.axes[0].name}" and "${field.axes[1].name}".`,
  );
};

export const otherDim = (dim: FieldDim): FieldDim => (dim === 0 ? 1 : 0);
