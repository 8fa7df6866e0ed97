// src/encoding/detect.ts
import { readFile } from 'node:fs/promises';
import chardet from 'chardet';
import iconv from 'iconv-lite';
import { ConfigurationError, EncodingDetectionError, errorMessage } from '../errors.js';

/** Best-guess charset label for raw bytes, or null when there is nothing to go on. */
export type EncodingDetector = (bytes: Buffer) => string | null;

export const detectEncoding: EncodingDetector = (bytes) => {
  if (bytes.length === 0) return null;
  return chardet.detect(bytes);
};

export function isSupportedEncoding(label: string): boolean {
  return iconv.encodingExists(label);
}

/**
 * Pick the encoding for a file. An explicit label wins without looking at
 * the content; otherwise the whole file is read and handed to the detector.
 */
export async function resolveEncoding(
  path: string,
  override?: string,
  detector: EncodingDetector = detectEncoding,
): Promise<string> {
  if (override) {
    if (!isSupportedEncoding(override)) {
      throw new ConfigurationError(`Unsupported encoding: ${override}`);
    }
    return override;
  }

  let bytes: Buffer;
  try {
    bytes = await readFile(path);
  } catch (err) {
    throw new EncodingDetectionError(`Error detecting encoding: ${errorMessage(err)}`, { cause: err });
  }

  const detected = detector(bytes);
  if (!detected) {
    throw new EncodingDetectionError('Could not detect file encoding. Please specify it using --encoding.');
  }
  if (!isSupportedEncoding(detected)) {
    throw new EncodingDetectionError(
      `Detected encoding ${detected} is not supported. Please specify it using --encoding.`,
    );
  }
  return detected;
}
