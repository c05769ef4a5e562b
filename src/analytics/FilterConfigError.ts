export type FilterConfigErrorCode =
  | "invalid_date"
  | "start_after_end"
  | "date_out_of_range"
  | "threshold_out_of_range";

export type FilterConfigField =
  | "startDate"
  | "endDate"
  | "minRating"
  | "minRatingCount"
  | "growthThresholdPct";

export class FilterConfigError extends Error {
  readonly status = "invalid_filters" as const;
  readonly code: FilterConfigErrorCode;
  readonly field: FilterConfigField;

  constructor(code: FilterConfigErrorCode, field: FilterConfigField, message: string) {
    super(message);
    this.name = "FilterConfigError";
    this.code = code;
    this.field = field;
  }
}

export const isFilterConfigError = (error: unknown): error is FilterConfigError =>
  error instanceof FilterConfigError;
