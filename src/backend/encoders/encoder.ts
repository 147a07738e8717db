/**
 * Encoder Adapter contract
 *
 * Everything that turns text into a vector sits behind IEncoder, so the
 * index and matcher never know which backend produced an embedding.
 *
 * Contract:
 * - encode() takes NORMALIZED text (see normalizeText) and returns a vector
 *   of exactly `dimension` floats
 * - identical input + identical configuration = identical output
 * - empty or oversized input fails with EncodingError, as does any backend failure
 */

import { QueryContext } from '../../shared/types';
import { EncodingError, toError } from '../services/errors';

export interface IEncoder {
  /** Backend identifier, e.g. "hashing" or "ollama:nomic-embed-text" */
  readonly name: string;
  /** Vector length produced by encode(); 0 until init() has run */
  readonly dimension: number;
  /** Load the model / probe the backend. Idempotent. */
  init(): Promise<void>;
  encode(normalizedText: string): Promise<number[]>;
  /** Optional: encode several normalized texts in one backend call, in order */
  encodeBatch?(normalizedTexts: string[]): Promise<number[][]>;
  /** Whether the backend can currently serve encode() calls */
  isAvailable(): Promise<boolean>;
  /** Release anything init() acquired. */
  dispose(): Promise<void>;
}

export const DEFAULT_MAX_INPUT_LENGTH = 2000;

/**
 * Normalize text before encoding: trim, lowercase, collapse whitespace.
 */
export function normalizeText(text: string): string {
  return text.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Reject input an encoder must never see.
 * Shared by every IEncoder implementation.
 */
export function assertEncodable(normalizedText: string, maxInputLength: number): void {
  if (normalizedText.length === 0) {
    throw new EncodingError('Cannot encode empty text');
  }
  if (normalizedText.length > maxInputLength) {
    throw new EncodingError(
      `Text is ${normalizedText.length} characters, above the ${maxInputLength} character limit`
    );
  }
}

/**
 * Check a backend's output against the encoder's declared dimension.
 */
export function assertDimension(vector: number[], dimension: number, encoderName: string): number[] {
  if (vector.length !== dimension) {
    throw new EncodingError(
      `Encoder ${encoderName} returned ${vector.length} dimensions, expected ${dimension}`
    );
  }
  if (!vector.every((v) => Number.isFinite(v))) {
    throw new EncodingError(`Encoder ${encoderName} returned a non-finite value`);
  }
  return vector;
}

/**
 * Normalize and encode raw user text in one step.
 *
 * Any failure surfaces as EncodingError; non-encoding errors thrown by a
 * backend are wrapped so callers only have one type to handle.
 */
export async function encodeText(encoder: IEncoder, rawText: string): Promise<QueryContext> {
  const normalizedText = normalizeText(rawText);
  try {
    const embedding = await encoder.encode(normalizedText);
    return { rawText, normalizedText, embedding };
  } catch (error) {
    if (error instanceof EncodingError) {
      throw error;
    }
    const cause = toError(error);
    throw new EncodingError(`Encoder ${encoder.name} failed: ${cause.message}`, cause);
  }
}
