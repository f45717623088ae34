/**
 * Error taxonomy for the forecast pipeline.
 * Every error carries a stable `code` the command boundary switches on.
 */

export type ForecastErrorCode =
  | 'USAGE'
  | 'UNKNOWN_MODEL'
  | 'NO_VALID_MODELS'
  | 'UPSTREAM'
  | 'MALFORMED_RESPONSE'
  | 'CONFIG';

export abstract class ForecastBotError extends Error {
  abstract readonly code: ForecastErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** User-correctable command problem; replied as help text. */
export class UsageError extends ForecastBotError {
  readonly code = 'USAGE';

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(message);
  }
}

export class UnknownModelError extends ForecastBotError {
  readonly code = 'UNKNOWN_MODEL';

  constructor(readonly model: string) {
    super(`Unknown model: ${model}`);
  }
}

export class NoValidModelsError extends ForecastBotError {
  readonly code = 'NO_VALID_MODELS';

  constructor() {
    super('No valid models. Use /models');
  }
}

/** Network failure, timeout or non-2xx answer from the weather provider. */
export class UpstreamError extends ForecastBotError {
  readonly code: ForecastErrorCode = 'UPSTREAM';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Provider answered 2xx but the hourly payload is not what we expect. */
export class MalformedResponseError extends UpstreamError {
  readonly code: ForecastErrorCode = 'MALFORMED_RESPONSE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, undefined, options);
  }
}

export class ConfigError extends ForecastBotError {
  readonly code = 'CONFIG';

  constructor(
    message: string,
    readonly errors: Array<{ path: string; message: string }> = [],
  ) {
    super(message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
