// src/index.ts
export {
  anonymizeFile,
  anonymizeText,
  type AnonymizeFileOptions,
  type AnonymizeTextOptions,
  type AnonymizeResult,
  type AnonymizeTextResult,
} from './anonymize.js';
export {
  DEFAULT_MAX_SHIFT_DAYS,
  runConfigSchema,
  shiftSettingsSchema,
  validateRunConfig,
  validateShiftSettings,
  type RunConfig,
  type RunConfigInput,
  type ShiftSettings,
} from './config.js';
export { DATE_TOKEN_SOURCE, DateShifter, shiftDate, type ShiftOutcome, type ShiftStats } from './shift/shifter.js';
export { DEFAULT_DATE_FORMAT, parseDate, formatDate } from './dates/format.js';
export { addDays, daysBetween, type CalendarDate } from './dates/calendar.js';
export { SeededRandom, createRandomSource, type RandomSource } from './random/rng.js';
export { detectEncoding, resolveEncoding, type EncodingDetector } from './encoding/detect.js';
export { LineSplitter, splitLines } from './io/lines.js';
export { consoleLogger, createRecordingLogger, type Logger } from './log.js';
export {
  DateShiftError,
  ConfigurationError,
  InputNotFoundError,
  EncodingDetectionError,
  DateParseError,
  UnexpectedShiftError,
  FileProcessingError,
} from './errors.js';
