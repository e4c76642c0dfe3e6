import {
  ExtremaTrackingOptions,
  type TControlIndexRange,
  type TExtremaMatching,
  type TExtremaTrackingOptions,
  type TExtremaTransition,
  type TTrackPoint,
} from "@shared/extrema-tracking";
import { EXTREMA_FOLLOW_TRAJECTORY, EXTREMA_MATCHING } from "../../config/env";
import { ExtremaRangeError, ExtremaShapeError } from "./extrema-errors";

/** A 2xN matrix given as its two rows. */
export type ExtremaMatrix = ReadonlyArray<ArrayLike<number>>;

export type ExtremaTrackingResult = {
  tracks: Map<number, TTrackPoint[]>;
  transitions: TExtremaTransition[];
};

type Pair = { prev: number; next: number; dist: number };

// Loop-carried state: the slice last visited, the id each of its points
// belongs to, and the displacement that brought each point there.
type TrackingState = {
  index: number;
  points: TTrackPoint[];
  trackIds: number[];
  displacement: Array<TTrackPoint | undefined>;
};

export const controlIndexRange = (start: number, stop: number): TControlIndexRange => ({
  start,
  stop,
});

const assertRange = (range: TControlIndexRange): void => {
  const { start, stop } = range;
  if (!Number.isInteger(start) || !Number.isInteger(stop)) {
    throw new ExtremaRangeError(start, stop, `Control index range bounds must be integers, got [${start}, ${stop}].`);
  }
  if (stop < start) {
    throw new ExtremaRangeError(start, stop, `Control index range [${start}, ${stop}] is empty.`);
  }
};

const assertMatrices = (indices: ExtremaMatrix, values: ExtremaMatrix): number => {
  const indexCols = indices.map((row) => row.length);
  const valueCols = values.map((row) => row.length);
  const detail = {
    index_rows: indices.length,
    value_rows: values.length,
    index_cols: indexCols,
    value_cols: valueCols,
  };
  if (indices.length !== 2 || values.length !== 2) {
    throw new ExtremaShapeError(
      `Expected 2-row index and value matrices, got ${indices.length} and ${values.length} rows.`,
      detail,
    );
  }
  const cols = indexCols[0];
  if ([...indexCols, ...valueCols].some((count) => count !== cols)) {
    throw new ExtremaShapeError(
      `Index and value matrices disagree on column count (${indexCols.join("/")} vs ${valueCols.join("/")}).`,
      detail,
    );
  }
  return cols;
};

const groupByControlIndex = (
  indices: ExtremaMatrix,
  values: ExtremaMatrix,
  cols: number,
): Map<number, TTrackPoint[]> => {
  const slices = new Map<number, TTrackPoint[]>();
  for (let k = 0; k < cols; k++) {
    const controlIndex = indices[1][k];
    const point = { signal_value: values[0][k], control_value: values[1][k] };
    const slice = slices.get(controlIndex);
    if (slice) {
      slice.push(point);
    } else {
      slices.set(controlIndex, [point]);
    }
  }
  return slices;
};

const distance = (a: TTrackPoint, b: TTrackPoint): number =>
  Math.hypot(a.signal_value - b.signal_value, a.control_value - b.control_value);

/**
 * Where each previous point is expected to land in the next slice: its last
 * observed displacement, rescaled from that step's control spacing to
 * `controlStep`. Points without a displacement stay where they are.
 */
export const predictSlicePositions = (
  points: TTrackPoint[],
  displacement: Array<TTrackPoint | undefined>,
  controlStep: number,
): TTrackPoint[] =>
  points.map((point, i) => {
    const delta = displacement[i];
    if (!delta || delta.control_value === 0 || !Number.isFinite(controlStep)) {
      return point;
    }
    const scale = controlStep / delta.control_value;
    return {
      signal_value: point.signal_value + delta.signal_value * scale,
      control_value: point.control_value + delta.control_value * scale,
    };
  });

/**
 * Row-greedy nearest-neighbour pairing with the smaller side as rows. Ties go
 * to the lowest column. "exclusive" takes each column at most once;
 * "row-minimum" lets several rows claim the same column.
 */
export const matchSlices = (
  prev: TTrackPoint[],
  next: TTrackPoint[],
  matching: TExtremaMatching,
): Pair[] => {
  const prevAsRows = prev.length <= next.length;
  const rows = prevAsRows ? prev : next;
  const cols = prevAsRows ? next : prev;
  const claimed = new Uint8Array(cols.length);
  const pairs: Pair[] = [];
  for (let i = 0; i < rows.length; i++) {
    let best = -1;
    let bestDist = Number.POSITIVE_INFINITY;
    for (let j = 0; j < cols.length; j++) {
      if (matching === "exclusive" && claimed[j]) continue;
      const dist = distance(rows[i], cols[j]);
      if (best < 0 || dist < bestDist) {
        best = j;
        bestDist = dist;
      }
    }
    if (best < 0) continue;
    claimed[best] = 1;
    pairs.push(
      prevAsRows
        ? { prev: i, next: best, dist: bestDist }
        : { prev: best, next: i, dist: bestDist },
    );
  }
  return pairs;
};

export const trackExtrema = (
  range: TControlIndexRange,
  indices: ExtremaMatrix,
  values: ExtremaMatrix,
  options: TExtremaTrackingOptions = {},
): ExtremaTrackingResult => {
  assertRange(range);
  const cols = assertMatrices(indices, values);
  const parsed = ExtremaTrackingOptions.parse(options);
  const followTrajectory = parsed.follow_trajectory ?? EXTREMA_FOLLOW_TRAJECTORY;
  const matching = parsed.matching ?? EXTREMA_MATCHING;

  const slices = groupByControlIndex(indices, values, cols);
  const sliceAt = (index: number): TTrackPoint[] => slices.get(index) ?? [];

  const tracks = new Map<number, TTrackPoint[]>();
  const transitions: TExtremaTransition[] = [];
  let nextId = 1;
  const mint = (points: TTrackPoint[]): number => {
    const id = nextId++;
    tracks.set(id, points);
    return id;
  };

  let state: TrackingState = {
    index: range.start,
    points: sliceAt(range.start),
    trackIds: [],
    displacement: [],
  };

  if (range.start === range.stop) {
    for (const point of state.points) {
      mint([point]);
    }
    return { tracks, transitions };
  }

  let first = true;
  while (state.index < range.stop) {
    const nextIndex = state.index + 1;
    const prevPoints = state.points;
    const nextPoints = sliceAt(nextIndex);

    let compareAgainst = prevPoints;
    if (followTrajectory && !first && prevPoints.length > 0 && nextPoints.length > 0) {
      const controlStep = nextPoints[0].control_value - prevPoints[0].control_value;
      compareAgainst = predictSlicePositions(prevPoints, state.displacement, controlStep);
    }

    const pairs = matchSlices(compareAgainst, nextPoints, matching);
    const nextIds = new Array<number>(nextPoints.length).fill(0);
    const nextDisplacement = new Array<TTrackPoint | undefined>(nextPoints.length);
    const prevClaimed = new Uint8Array(prevPoints.length);
    const continuedIds = new Set<number>();

    for (const pair of pairs) {
      const prevPoint = prevPoints[pair.prev];
      const nextPoint = nextPoints[pair.next];
      let id: number;
      if (first) {
        id = mint([prevPoint, nextPoint]);
      } else {
        id = state.trackIds[pair.prev];
        tracks.get(id)?.push(nextPoint);
      }
      prevClaimed[pair.prev] = 1;
      continuedIds.add(id);
      // Last claim wins when a column was taken more than once.
      nextIds[pair.next] = id;
      nextDisplacement[pair.next] = {
        signal_value: nextPoint.signal_value - prevPoint.signal_value,
        control_value: nextPoint.control_value - prevPoint.control_value,
      };
    }

    let deaths = 0;
    for (let i = 0; i < prevPoints.length; i++) {
      if (prevClaimed[i]) continue;
      deaths += 1;
      if (first) {
        mint([prevPoints[i]]);
      }
    }

    let births = 0;
    for (let j = 0; j < nextPoints.length; j++) {
      if (nextIds[j] !== 0) continue;
      births += 1;
      nextIds[j] = mint([nextPoints[j]]);
    }

    transitions.push({
      from_index: state.index,
      to_index: nextIndex,
      prev_count: prevPoints.length,
      next_count: nextPoints.length,
      continued: continuedIds.size,
      births,
      deaths,
      track_ids: nextIds,
      distances: pairs.map((pair) => pair.dist),
    });

    state = {
      index: nextIndex,
      points: nextPoints,
      trackIds: nextIds,
      displacement: nextDisplacement,
    };
    first = false;
  }

  return { tracks, transitions };
};
