// src/shift/shifter.ts
import { addDays, type CalendarDate } from '../dates/calendar.js';
import { DEFAULT_DATE_FORMAT, formatDate, parseDate } from '../dates/format.js';
import { ConfigurationError, DateParseError, UnexpectedShiftError } from '../errors.js';
import { consoleLogger, type Logger } from '../log.js';
import type { RandomSource } from '../random/rng.js';

/**
 * Lexical shape the scanner looks for. Fixed to YYYY-MM-DD whatever the
 * configured format is: tokens that do not parse under another format are
 * found here and then left untouched.
 */
export const DATE_TOKEN_SOURCE = '\\d{4}-\\d{2}-\\d{2}';

const DATE_TOKEN_RE = new RegExp(DATE_TOKEN_SOURCE, 'g');

export interface ShiftOptions {
  maxShiftDays: number;
  dateFormat?: string;
}

export type ShiftOutcome =
  | { ok: true; value: string; shiftDays: number }
  | { ok: false; error: DateParseError | UnexpectedShiftError };

export interface ShiftStats {
  matched: number;
  shifted: number;
  skipped: number;
}

export function assertMaxShiftDays(maxShiftDays: number): void {
  if (!Number.isInteger(maxShiftDays) || maxShiftDays <= 0) {
    throw new ConfigurationError('max_shift_days must be a positive integer.');
  }
}

/**
 * Shift a single date token. The random draw happens only once the token has
 * parsed, so a malformed token leaves the stream where it was.
 */
export function shiftDate(token: string, options: ShiftOptions, random: RandomSource): ShiftOutcome {
  const format = options.dateFormat ?? DEFAULT_DATE_FORMAT;

  let parsed: CalendarDate;
  try {
    parsed = parseDate(token, format);
  } catch (err) {
    if (err instanceof DateParseError) return { ok: false, error: err };
    return { ok: false, error: new UnexpectedShiftError(token, err) };
  }

  try {
    const shiftDays = random.nextInt(-options.maxShiftDays, options.maxShiftDays);
    return { ok: true, value: formatDate(addDays(parsed, shiftDays), format), shiftDays };
  } catch (err) {
    return { ok: false, error: new UnexpectedShiftError(token, err) };
  }
}

export interface DateShifterOptions extends ShiftOptions {
  random: RandomSource;
  logger?: Logger;
}

/**
 * Rewrites every date token in the text it is given, drawing from one shared
 * random stream. Keeps running counts across calls.
 */
export class DateShifter {
  readonly stats: ShiftStats = { matched: 0, shifted: 0, skipped: 0 };
  private readonly options: ShiftOptions;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(options: DateShifterOptions) {
    assertMaxShiftDays(options.maxShiftDays);
    this.options = { maxShiftDays: options.maxShiftDays, dateFormat: options.dateFormat ?? DEFAULT_DATE_FORMAT };
    this.random = options.random;
    this.logger = options.logger ?? consoleLogger;
  }

  shiftText(text: string): string {
    return text.replace(DATE_TOKEN_RE, (token) => {
      this.stats.matched++;
      const outcome = shiftDate(token, this.options, this.random);
      if (outcome.ok) {
        this.stats.shifted++;
        return outcome.value;
      }

      this.stats.skipped++;
      if (outcome.error instanceof DateParseError) {
        this.logger.warn(outcome.error.message);
      } else {
        this.logger.error(outcome.error.message);
      }
      return token;
    });
  }
}
