export class ExtremaRangeError extends Error {
  readonly start: number;
  readonly stop: number;

  constructor(start: number, stop: number, message?: string) {
    super(message ?? `Invalid control index range [${start}, ${stop}].`);
    this.name = "ExtremaRangeError";
    this.start = start;
    this.stop = stop;
  }
}

export class ExtremaShapeError extends Error {
  readonly detail: { index_rows: number; value_rows: number; index_cols: number[]; value_cols: number[] };

  constructor(
    message: string,
    detail: { index_rows: number; value_rows: number; index_cols: number[]; value_cols: number[] },
  ) {
    super(message);
    this.name = "ExtremaShapeError";
    this.detail = detail;
  }
}

export class FieldShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FieldShapeError";
  }
}

export class SmoothingKernelError extends Error {
  readonly axis: string;
  readonly kernel_size: number;
  readonly axis_length: number;

  constructor(axis: string, kernelSize: number, axisLength: number) {
    super(
      `Smoothing kernel of ${kernelSize} taps does not fit axis "${axis}" of length ${axisLength}.`,
    );
    this.name = "SmoothingKernelError";
    this.axis = axis;
    this.kernel_size = kernelSize;
    this.axis_length = axisLength;
  }
}
