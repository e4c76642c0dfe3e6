import { describe, expect, it } from "vitest";
import { findLocalExtrema } from "../server/services/physics/local-extrema";
import { buildScalarField2D, createScalarField2D } from "../server/services/physics/scalar-field";

// Two control columns of five signal samples each.
const field = buildScalarField2D({
  axes: [
    { name: "freq", values: [0, 1, 2, 3, 4] },
    { name: "bias", values: [0, 1] },
  ],
  data: [
    [0, 1],
    [2, 0],
    [1, 0],
    [3, 0],
    [0, 1],
  ],
});

describe("local extrema search", () => {
  it("finds strict maxima along the region dimension and skips plateaus", () => {
    const found = findLocalExtrema(field, { mode: "maxima", region: [0], edges: [false, true] });
    expect(found).toEqual([
      [1, 0],
      [3, 0],
    ]);
  });

  it("finds strict minima", () => {
    const found = findLocalExtrema(field, { mode: "minima", region: [0], edges: [false, true] });
    expect(found).toEqual([[2, 0]]);
  });

  it("reports boundary extrema only where edges are allowed, grouped by dimension 1", () => {
    const found = findLocalExtrema(field, { mode: "maxima", region: [0], edges: [true, true] });
    expect(found).toEqual([
      [1, 0],
      [3, 0],
      [0, 1],
      [4, 1],
    ]);
  });

  it("ignores non-finite samples", () => {
    const withGap = createScalarField2D(
      [
        { name: "freq", values: [0, 1, 2, 3, 4] },
        { name: "bias", values: [0] },
      ],
      Float64Array.from([0, Number.NaN, 1, 0, 0]),
    );
    const found = findLocalExtrema(withGap, { mode: "maxima", region: [0], edges: [false, true] });
    expect(found).toEqual([[2, 0]]);
  });
});
