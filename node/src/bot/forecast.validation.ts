import { DateTime } from 'luxon';
import { z } from 'zod';

export const FORECAST_ARG_COUNT = 7;

const HOUR_PATTERN = /^\d{1,2}$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

const hour = (label: string) =>
  z
    .string()
    .regex(HOUR_PATTERN, `${label} must be a whole hour`)
    .pipe(
      z.coerce
        .number()
        .min(0, `${label} must be between 0 and 23`)
        .max(23, `${label} must be between 0 and 23`),
    );

// Plain decimal degrees; no hex, exponent or infinity spellings.
const coordinate = (label: string) =>
  z.string().regex(DECIMAL_PATTERN, `${label} must be a number`).pipe(z.coerce.number());

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const forecastArgsSchema = z.object({
  latitude: coordinate('lat'),
  longitude: coordinate('lon'),
  timezone: z.string().min(1, 'timezone is required'),
  date: z
    .string()
    .regex(DATE_PATTERN, 'date must be YYYY-MM-DD')
    .refine((value) => !DATE_PATTERN.test(value) || DateTime.fromISO(value).isValid, 'date is not a calendar day'),
  startHour: hour('start_hr'),
  endHour: hour('end_hr'),
  models: z.string().min(1, 'models are required'),
});

export type ForecastArgs = z.infer<typeof forecastArgsSchema>;

/** Whitespace-separated command arguments. */
export function tokenize(argsText: string): string[] {
  return argsText.split(/\s+/).filter(Boolean);
}

/**
 * Validates the positional forecast arguments.
 * Tokens after the seventh are ignored.
 */
export function validateForecastArgs(tokens: readonly string[]):
  | { success: true; data: ForecastArgs }
  | { success: false; error: string[] } {
  if (tokens.length < FORECAST_ARG_COUNT) {
    return { success: false, error: [] };
  }

  const [latitude, longitude, timezone, date, startHour, endHour, models] = tokens;
  const result = forecastArgsSchema.safeParse({ latitude, longitude, timezone, date, startHour, endHour, models });

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => e.message),
    };
  }

  // Checked after the per-field rules so a bad hour is reported once.
  if (result.data.startHour > result.data.endHour) {
    return { success: false, error: ['start_hr must not be after end_hr'] };
  }

  return { success: true, data: result.data };
}
