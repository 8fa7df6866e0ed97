// src/config.ts
import { z } from 'zod';
import { DEFAULT_DATE_FORMAT } from './dates/format.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_MAX_SHIFT_DAYS = 365;

const MAX_SHIFT_MESSAGE = 'max_shift_days must be a positive integer.';

/** Settings that control how dates are shifted, independent of any file. */
export const shiftSettingsSchema = z.object({
  maxShiftDays: z.number().int(MAX_SHIFT_MESSAGE).positive(MAX_SHIFT_MESSAGE).default(DEFAULT_MAX_SHIFT_DAYS),
  seed: z
    .number()
    .int('seed must be an integer.')
    .refine(Number.isSafeInteger, 'seed must be a safe integer.')
    .optional(),
  dateFormat: z.string().min(1, 'date_format must not be empty.').default(DEFAULT_DATE_FORMAT),
});

export const runConfigSchema = shiftSettingsSchema.extend({
  inputFile: z.string().min(1, 'input_file is required.'),
  outputFile: z.string().min(1, 'output_file is required.'),
  encoding: z.string().min(1, 'encoding must not be empty.').optional(),
});

export type ShiftSettings = z.infer<typeof shiftSettingsSchema>;
export type ShiftSettingsInput = z.input<typeof shiftSettingsSchema>;
export type RunConfig = z.infer<typeof runConfigSchema>;
export type RunConfigInput = z.input<typeof runConfigSchema>;

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const messages = [...new Set(result.error.issues.map(issue => issue.message))];
    throw new ConfigurationError(messages.join(' '));
  }
  return result.data;
}

export function validateShiftSettings(input: unknown): ShiftSettings {
  return validate(shiftSettingsSchema, input);
}

/** Validate a run configuration. Throws ConfigurationError before any I/O happens. */
export function validateRunConfig(input: unknown): RunConfig {
  return validate(runConfigSchema, input);
}
