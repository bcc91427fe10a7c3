import { IsBoolean, IsInt, Max, Min, ValidateIf } from 'class-validator';

// observation_id is an int4 column on Postgres
const INT4_MIN = -2147483648;
const INT4_MAX = 2147483647;

// Only an absent field falls back to the default; an explicit null is invalid
const isPresent = (_: object, value: unknown) => value !== undefined;

/**
 * Optional body for POST /predict.
 * Without an id the demo's fixed observation 0 is used.
 */
export class PredictRequestDto {
  @ValidateIf(isPresent)
  @IsInt()
  @Min(INT4_MIN)
  @Max(INT4_MAX)
  observation_id?: number;
}

/**
 * Optional body for POST /update.
 * Both fields fall back to the demo literals (observation 0, label false).
 */
export class UpdateRequestDto {
  @ValidateIf(isPresent)
  @IsInt()
  @Min(INT4_MIN)
  @Max(INT4_MAX)
  observation_id?: number;

  @ValidateIf(isPresent)
  @IsBoolean()
  true_class?: boolean;
}
