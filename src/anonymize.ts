// src/anonymize.ts
import { access, open } from 'node:fs/promises';
import iconv from 'iconv-lite';
import {
  validateRunConfig,
  validateShiftSettings,
  type RunConfigInput,
  type ShiftSettingsInput,
} from './config.js';
import { resolveEncoding, type EncodingDetector } from './encoding/detect.js';
import { DateShiftError, FileProcessingError, InputNotFoundError, errorMessage } from './errors.js';
import { LineSplitter, splitLines } from './io/lines.js';
import { consoleLogger, type Logger } from './log.js';
import { createRandomSource, type RandomSource } from './random/rng.js';
import { DateShifter, type ShiftStats } from './shift/shifter.js';

const CHUNK_SIZE = 64 * 1024;

interface Collaborators {
  logger?: Logger;
  /** Replaces the generator the seed would build. */
  random?: RandomSource;
}

export interface AnonymizeFileOptions extends RunConfigInput, Collaborators {
  detector?: EncodingDetector;
}

export type AnonymizeTextOptions = ShiftSettingsInput & Collaborators;

export interface AnonymizeResult extends ShiftStats {
  inputFile: string;
  outputFile: string;
  encoding: string;
  lines: number;
}

export interface AnonymizeTextResult extends ShiftStats {
  text: string;
  lines: number;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Shift every date in an in-memory string. Same rules as the file pipeline:
 * one random stream, tokens rewritten left to right, line by line.
 */
export function anonymizeText(text: string, options: AnonymizeTextOptions = {}): AnonymizeTextResult {
  const { logger = consoleLogger, random, ...settings } = options;
  const config = validateShiftSettings(settings);
  const shifter = new DateShifter({
    maxShiftDays: config.maxShiftDays,
    dateFormat: config.dateFormat,
    random: random ?? createRandomSource(config.seed),
    logger,
  });

  const lines = splitLines(text);
  const output = lines.map(line => shifter.shiftText(line)).join('');
  return { text: output, lines: lines.length, ...shifter.stats };
}

/**
 * Read `inputFile`, shift every YYYY-MM-DD token, write `outputFile` in the
 * same encoding. Lines stream through one at a time, so file size is not
 * bounded by memory.
 *
 * Configuration, missing input and encoding problems throw before anything
 * is opened. A failure inside the read/write loop throws FileProcessingError;
 * whatever was already written stays on disk.
 */
export async function anonymizeFile(options: AnonymizeFileOptions): Promise<AnonymizeResult> {
  const { logger = consoleLogger, random, detector, ...runConfig } = options;
  const config = validateRunConfig(runConfig);

  if (!(await exists(config.inputFile))) {
    throw new InputNotFoundError(config.inputFile);
  }

  const encoding = await resolveEncoding(config.inputFile, config.encoding, detector);
  const shifter = new DateShifter({
    maxShiftDays: config.maxShiftDays,
    dateFormat: config.dateFormat,
    random: random ?? createRandomSource(config.seed),
    logger,
  });

  let lines = 0;
  try {
    const input = await open(config.inputFile, 'r');
    try {
      const output = await open(config.outputFile, 'w');
      try {
        // BOMs pass through as ordinary characters
        const decoder = iconv.getDecoder(encoding, { stripBOM: false });
        const encoder = iconv.getEncoder(encoding, { addBOM: false });
        const splitter = new LineSplitter();

        // One write per read chunk
        const writeLines = async (batch: string[]): Promise<void> => {
          const encoded: Buffer[] = [];
          for (const line of batch) {
            lines++;
            encoded.push(encoder.write(shifter.shiftText(line)));
          }
          const bytes = Buffer.concat(encoded);
          if (bytes.length > 0) await output.write(bytes);
        };

        for (;;) {
          const chunk = Buffer.alloc(CHUNK_SIZE);
          const { bytesRead } = await input.read(chunk, 0, CHUNK_SIZE, null);
          if (bytesRead === 0) break;
          await writeLines(splitter.push(decoder.write(chunk.subarray(0, bytesRead))));
        }
        await writeLines(splitter.push(decoder.end() ?? ''));
        await writeLines(splitter.flush());

        const tail = encoder.end();
        if (tail && tail.length > 0) await output.write(tail);
      } finally {
        await output.close();
      }
    } finally {
      await input.close();
    }
  } catch (err) {
    if (err instanceof DateShiftError) throw err;
    throw new FileProcessingError(`An error occurred during anonymization: ${errorMessage(err)}`, { cause: err });
  }

  const { matched, shifted, skipped } = shifter.stats;
  logger.info(
    `Successfully anonymized data from ${config.inputFile} to ${config.outputFile} ` +
    `(${shifted} of ${matched} dates shifted)`,
  );

  return {
    inputFile: config.inputFile,
    outputFile: config.outputFile,
    encoding,
    lines,
    matched,
    shifted,
    skipped,
  };
}
