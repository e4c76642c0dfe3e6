import type { TExtremaMode } from "@shared/extrema-tracking";
import type { FieldDim, ScalarField2D } from "./scalar-field";

export type LocalExtremaOptions = {
  mode: TExtremaMode;
  /** Dimensions whose ±1 neighbours take part in the comparison. */
  region: FieldDim[];
  /** Per dimension; `false` drops candidates on that dimension's first and last index. */
  edges: [boolean, boolean];
};

export type GridIndex2D = [number, number];

const isExtremum = (
  field: ScalarField2D,
  i0: number,
  i1: number,
  region: FieldDim[],
  mode: TExtremaMode,
): boolean => {
  const [n0, n1] = field.shape;
  const val = field.data[i0 * n1 + i1];
  if (!Number.isFinite(val)) return false;
  let compared = 0;
  for (const dim of region) {
    for (const step of [-1, 1]) {
      const j0 = dim === 0 ? i0 + step : i0;
      const j1 = dim === 1 ? i1 + step : i1;
      if (j0 < 0 || j1 < 0 || j0 >= n0 || j1 >= n1) continue;
      const nval = field.data[j0 * n1 + j1];
      if (!Number.isFinite(nval)) continue;
      compared += 1;
      if (mode === "maxima" ? !(val > nval) : !(val < nval)) {
        return false;
      }
    }
  }
  return compared > 0;
};

/**
 * Strict local extrema of `field`. Results come back with dimension 0 varying
 * fastest, so they are grouped by the dimension-1 index.
 */
export const findLocalExtrema = (
  field: ScalarField2D,
  options: LocalExtremaOptions,
): GridIndex2D[] => {
  const [n0, n1] = field.shape;
  const region = Array.from(new Set(options.region));
  const lo0 = options.edges[0] ? 0 : 1;
  const hi0 = options.edges[0] ? n0 - 1 : n0 - 2;
  const lo1 = options.edges[1] ? 0 : 1;
  const hi1 = options.edges[1] ? n1 - 1 : n1 - 2;
  const out: GridIndex2D[] = [];
  for (let i1 = lo1; i1 <= hi1; i1++) {
    for (let i0 = lo0; i0 <= hi0; i0++) {
      if (isExtremum(field, i0, i1, region, options.mode)) {
        out.push([i0, i1]);
      }
    }
  }
  return out;
};
