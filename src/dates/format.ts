// src/dates/format.ts
import {
  addDays,
  checkDate,
  dayOfYear,
  monthName,
  monthNames,
  weekday,
  weekdayNames,
  type CalendarDate,
} from './calendar.js';
import { DateParseError, errorMessage } from '../errors.js';

export const DEFAULT_DATE_FORMAT = '%Y-%m-%d';

type Field =
  | 'year'
  | 'year2'
  | 'month'
  | 'monthAbbr'
  | 'monthFull'
  | 'day'
  | 'yday'
  | 'weekdayAbbr'
  | 'weekdayFull'
  | 'hour'
  | 'minute'
  | 'second';

interface CompiledFormat {
  regex: RegExp;
  fields: Field[];
}

function alternation(names: readonly string[]): string {
  // Longest first so "June" is not cut short by "Jun"
  return [...names].sort((a, b) => b.length - a.length).join('|');
}

const abbreviations = (names: readonly string[]) => names.map(n => n.slice(0, 3));

const DIRECTIVES: Record<string, { field: Field; pattern: string }> = {
  Y: { field: 'year', pattern: '\\d\\d\\d\\d' },
  y: { field: 'year2', pattern: '\\d\\d' },
  m: { field: 'month', pattern: '1[0-2]|0[1-9]|[1-9]' },
  d: { field: 'day', pattern: '3[01]|[12]\\d|0[1-9]|[1-9]| [1-9]' },
  j: { field: 'yday', pattern: '36[0-6]|3[0-5]\\d|[12]\\d\\d|0[1-9]\\d|00[1-9]|[1-9]\\d|0[1-9]|[1-9]' },
  b: { field: 'monthAbbr', pattern: alternation(abbreviations(monthNames())) },
  h: { field: 'monthAbbr', pattern: alternation(abbreviations(monthNames())) },
  B: { field: 'monthFull', pattern: alternation(monthNames()) },
  a: { field: 'weekdayAbbr', pattern: alternation(abbreviations(weekdayNames())) },
  A: { field: 'weekdayFull', pattern: alternation(weekdayNames()) },
  H: { field: 'hour', pattern: '2[0-3]|[0-1]\\d|\\d' },
  M: { field: 'minute', pattern: '[0-5]\\d|\\d' },
  S: { field: 'second', pattern: '6[0-1]|[0-5]\\d|\\d' },
};

const compiled = new Map<string, CompiledFormat | string>();

/** Compile a format to an anchored regex. Returns an error message for bad formats. */
function compileFormat(format: string): CompiledFormat | string {
  const cached = compiled.get(format);
  if (cached !== undefined) return cached;

  let source = '';
  const fields: Field[] = [];
  let error: string | undefined;

  for (let i = 0; i < format.length && error === undefined; i++) {
    const ch = format[i];
    if (ch !== '%') {
      if (/\s/.test(ch)) {
        while (i + 1 < format.length && /\s/.test(format[i + 1])) i++;
        source += '\\s+';
      } else {
        source += ch.replace(/[.*+?^${}()|[\]\\/-]/g, '\\$&');
      }
      continue;
    }

    const directive = format[++i];
    if (directive === undefined) {
      error = `stray % in format '${format}'`;
    } else if (directive === '%') {
      source += '%';
    } else {
      const spec = DIRECTIVES[directive];
      if (!spec) {
        error = `'${directive}' is a bad directive in format '${format}'`;
      } else {
        source += `(${spec.pattern})`;
        fields.push(spec.field);
      }
    }
  }

  const result = error ?? { regex: new RegExp(`^${source}$`, 'i'), fields };
  compiled.set(format, result);
  return result;
}

function indexOfName(names: readonly string[], value: string): number {
  const lower = value.toLowerCase();
  return names.findIndex(n => n.toLowerCase() === lower);
}

/**
 * Parse `text` as a calendar date under a strftime-style `format`.
 * The whole text must match. Throws DateParseError on any mismatch or
 * impossible date.
 */
export function parseDate(text: string, format: string = DEFAULT_DATE_FORMAT): CalendarDate {
  const compiledFormat = compileFormat(format);
  if (typeof compiledFormat === 'string') {
    throw new DateParseError(text, compiledFormat);
  }

  const match = compiledFormat.regex.exec(text);
  if (!match) {
    throw new DateParseError(text, `time data '${text}' does not match format '${format}'`);
  }

  let year = 1900;
  let month = 1;
  let day = 1;
  let yday: number | undefined;

  const { fields } = compiledFormat;
  for (let index = 0; index < fields.length; index++) {
    const value = match[index + 1];
    switch (fields[index]) {
      case 'year':
        year = parseInt(value, 10);
        break;
      case 'year2': {
        const short = parseInt(value, 10);
        year = short <= 68 ? 2000 + short : 1900 + short;
        break;
      }
      case 'month':
        month = parseInt(value, 10);
        break;
      case 'monthAbbr':
        month = indexOfName(abbreviations(monthNames()), value) + 1;
        break;
      case 'monthFull':
        month = indexOfName(monthNames(), value) + 1;
        break;
      case 'day':
        day = parseInt(value.trim(), 10);
        break;
      case 'yday':
        yday = parseInt(value, 10);
        break;
      // Weekday and time of day carry nothing a calendar date keeps
      default:
        break;
    }
  }

  if (yday !== undefined) {
    const jan1: CalendarDate = { year, month: 1, day: 1 };
    const invalid = checkDate(jan1);
    if (invalid) throw new DateParseError(text, invalid);
    try {
      return addDays(jan1, yday - 1);
    } catch (err) {
      throw new DateParseError(text, errorMessage(err));
    }
  }

  const date = { year, month, day };
  const invalid = checkDate(date);
  if (invalid) throw new DateParseError(text, invalid);
  return date;
}

const pad = (value: number, width: number) => String(value).padStart(width, '0');

/** Render a calendar date with a strftime-style format. Unknown directives are copied through. */
export function formatDate(date: CalendarDate, format: string = DEFAULT_DATE_FORMAT): string {
  let out = '';
  for (let i = 0; i < format.length; i++) {
    const ch = format[i];
    if (ch !== '%' || i === format.length - 1) {
      out += ch;
      continue;
    }
    const directive = format[++i];
    switch (directive) {
      case 'Y': out += pad(date.year, 4); break;
      case 'y': out += pad(date.year % 100, 2); break;
      case 'm': out += pad(date.month, 2); break;
      case 'd': out += pad(date.day, 2); break;
      case 'j': out += pad(dayOfYear(date), 3); break;
      case 'b':
      case 'h': out += monthName(date.month).slice(0, 3); break;
      case 'B': out += monthName(date.month); break;
      case 'a': out += weekdayNames()[weekday(date)].slice(0, 3); break;
      case 'A': out += weekdayNames()[weekday(date)]; break;
      case 'H':
      case 'M':
      case 'S': out += '00'; break;
      case '%': out += '%'; break;
      default: out += `%${directive}`;
    }
  }
  return out;
}
