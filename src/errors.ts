// src/errors.ts

/** Base class for every error the date shifter raises. */
export class DateShiftError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid run configuration. Raised before any file is touched. */
export class ConfigurationError extends DateShiftError {}

export class InputNotFoundError extends DateShiftError {
  constructor(public readonly path: string) {
    super(`Input file not found: ${path}`);
  }
}

export class EncodingDetectionError extends DateShiftError {}

/**
 * A matched token that does not parse under the configured format, or that
 * names an impossible calendar date. Recovered per token.
 */
export class DateParseError extends DateShiftError {
  constructor(
    public readonly token: string,
    reason: string,
  ) {
    super(`Invalid date format or value: ${token}. ${reason}`);
  }
}

/** Any other failure while shifting or rendering a parsed date. Recovered per token. */
export class UnexpectedShiftError extends DateShiftError {
  constructor(
    public readonly token: string,
    cause: unknown,
  ) {
    super(`Error shifting date ${token}: ${errorMessage(cause)}`, { cause });
  }
}

/** Read or write failure inside the main loop. Output may be partially written. */
export class FileProcessingError extends DateShiftError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
