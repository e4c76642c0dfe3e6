import { z } from "zod";

const isStrictlyMonotonic = (values: number[]): boolean => {
  if (values.length < 2) return true;
  const sign = Math.sign(values[1] - values[0]);
  if (sign === 0) return false;
  for (let i = 1; i < values.length; i++) {
    if (Math.sign(values[i] - values[i - 1]) !== sign) return false;
  }
  return true;
};

export const FieldAxis = z.object({
  name: z.string().min(1),
  values: z
    .array(z.number().finite())
    .min(1)
    .refine(isStrictlyMonotonic, { message: "Axis values must be strictly monotonic." }),
});

export type TFieldAxis = z.infer<typeof FieldAxis>;

/**
 * JSON form of a 2D field. `data[i0][i1]` is the value at
 * (`axes[0].values[i0]`, `axes[1].values[i1]`).
 */
export const ScalarField2DInput = z
  .object({
    axes: z.tuple([FieldAxis, FieldAxis]),
    data: z.array(z.array(z.number())).min(1),
  })
  .superRefine((value, ctx) => {
    const [a0, a1] = value.axes;
    if (a0.name === a1.name) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Axis names must be distinct.",
        path: ["axes"],
      });
    }
    if (value.data.length !== a0.values.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${a0.values.length} rows for axis "${a0.name}", got ${value.data.length}.`,
        path: ["data"],
      });
    }
    value.data.forEach((row, idx) => {
      if (row.length !== a1.values.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Row ${idx} has ${row.length} values; axis "${a1.name}" has ${a1.values.length}.`,
          path: ["data", idx],
        });
      }
    });
  });

export type TScalarField2DInput = z.infer<typeof ScalarField2DInput>;

export const ExtremaMode = z.enum(["maxima", "minima"]);
export type TExtremaMode = z.infer<typeof ExtremaMode>;

const OddKernelSize = z
  .number()
  .int()
  .positive()
  .refine((value) => value % 2 === 1, { message: "Kernel size must be odd." });

export const GaussianSmoothingKernel = z.object({
  kind: z.literal("gaussian"),
  sigma_signal: z.number().positive(),
  sigma_control: z.number().positive(),
  size_signal: OddKernelSize,
  size_control: OddKernelSize,
});

export const BoxSmoothingKernel = z.object({
  kind: z.literal("box"),
  size_signal: OddKernelSize,
  size_control: OddKernelSize,
});

export const IdentitySmoothingKernel = z.object({
  kind: z.literal("none"),
});

export const SmoothingKernel = z.discriminatedUnion("kind", [
  GaussianSmoothingKernel,
  BoxSmoothingKernel,
  IdentitySmoothingKernel,
]);

export type TSmoothingKernel = z.infer<typeof SmoothingKernel>;

// Mild blur: sigma 3 over 5 taps along the signal axis, untouched along the control axis.
export const DEFAULT_SMOOTHING_KERNEL: TSmoothingKernel = {
  kind: "gaussian",
  sigma_signal: 3,
  sigma_control: 1,
  size_signal: 5,
  size_control: 1,
};

export const ExtremaMatching = z.enum(["exclusive", "row-minimum"]);
export type TExtremaMatching = z.infer<typeof ExtremaMatching>;

export const ControlIndexRange = z
  .object({
    start: z.number().int(),
    stop: z.number().int(),
  })
  .refine((value) => value.stop >= value.start, {
    message: "Control index range is empty.",
  });

export type TControlIndexRange = z.infer<typeof ControlIndexRange>;

export const ExtremaTrackingOptions = z.object({
  follow_trajectory: z.boolean().optional(),
  matching: ExtremaMatching.optional(),
});

export type TExtremaTrackingOptions = z.infer<typeof ExtremaTrackingOptions>;

export const TrackPoint = z.object({
  signal_value: z.number(),
  control_value: z.number(),
});

export type TTrackPoint = z.infer<typeof TrackPoint>;

export const ExtremaTransition = z.object({
  from_index: z.number().int(),
  to_index: z.number().int(),
  prev_count: z.number().int().nonnegative(),
  next_count: z.number().int().nonnegative(),
  continued: z.number().int().nonnegative(),
  births: z.number().int().nonnegative(),
  deaths: z.number().int().nonnegative(),
  track_ids: z.array(z.number().int().positive()),
  distances: z.array(z.number().nonnegative()),
});

export type TExtremaTransition = z.infer<typeof ExtremaTransition>;

export const ExtremaTrackSummary = z.object({
  id: z.number().int().positive(),
  point_count: z.number().int().positive(),
  lifetime_steps: z.number().int().positive(),
  first_control: z.number(),
  last_control: z.number(),
  span_control: z.number(),
  mean_signal: z.number(),
});

export type TExtremaTrackSummary = z.infer<typeof ExtremaTrackSummary>;

export const ExtremaTrackingDataset = z.object({
  field: ScalarField2DInput,
  signal_axis: z.union([z.string().min(1), z.literal(0), z.literal(1)]),
  mode: ExtremaMode.default("maxima"),
  kernel: SmoothingKernel.optional(),
  range: ControlIndexRange.optional(),
  follow_trajectory: z.boolean().optional(),
  matching: ExtremaMatching.optional(),
});

export type TExtremaTrackingDataset = z.infer<typeof ExtremaTrackingDataset>;
export type TExtremaTrackingDatasetInput = z.input<typeof ExtremaTrackingDataset>;

export const TrackSurvivalCI = z.object({
  lower: z.number(),
  upper: z.number(),
});

export const TrackSurvivalPoint = z.object({
  t_steps: z.number().int().positive(),
  survival: z.number().min(0).max(1),
  hazard: z.number().min(0).max(1),
  mean_residual_life: z.number().nonnegative(),
  survival_ci: TrackSurvivalCI.optional(),
  hazard_ci: TrackSurvivalCI.optional(),
  mean_residual_life_ci: TrackSurvivalCI.optional(),
});

export const TrackSurvivalResult = z.object({
  total_tracks: z.number().int().nonnegative(),
  max_lifetime_steps: z.number().int().nonnegative(),
  points: z.array(TrackSurvivalPoint),
  bootstrap: z
    .object({
      samples: z.number().int().positive(),
      seed: z.string(),
      lower_q: z.number(),
      upper_q: z.number(),
    })
    .optional(),
});

export type TTrackSurvivalResult = z.infer<typeof TrackSurvivalResult>;

export const ExtremaTrackingReport = z.object({
  schema_version: z.literal("extrema_tracking_report/1"),
  generated_at_iso: z.string(),
  dataset_path: z.string().optional(),
  inputs_hash: z.string().min(8),
  result_hash: z.string().min(8),
  signal_axis: z.string(),
  control_axis: z.string(),
  mode: ExtremaMode,
  follow_trajectory: z.boolean(),
  matching: ExtremaMatching,
  range: z.object({ start: z.number().int(), stop: z.number().int() }),
  extrema_count: z.number().int().nonnegative(),
  track_count: z.number().int().nonnegative(),
  tracks: z.array(z.object({ id: z.number().int().positive(), points: z.array(TrackPoint) })),
  summaries: z.array(ExtremaTrackSummary),
  transitions: z.array(ExtremaTransition),
  survival: TrackSurvivalResult,
});

export type TExtremaTrackingReport = z.infer<typeof ExtremaTrackingReport>;
