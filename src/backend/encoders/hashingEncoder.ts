/**
 * Hashing Encoder
 *
 * A local, dependency-free encoder based on the "hashing trick":
 * every word and every character trigram of a word is hashed into one of
 * `dimension` buckets, and the bucket counts form the vector.
 *
 * It captures lexical overlap rather than meaning, so "hours" and "open"
 * are unrelated to it. Use it offline or for development; use the Ollama
 * encoder when paraphrases need to match.
 */

import { IEncoder, assertEncodable, DEFAULT_MAX_INPUT_LENGTH } from './encoder';

export interface HashingEncoderConfig {
  /** Number of hash buckets (vector length) */
  dimension: number;
  /** Weight of a whole-word feature relative to a trigram feature */
  wordWeight: number;
  maxInputLength: number;
}

export const DEFAULT_HASHING_CONFIG: HashingEncoderConfig = {
  dimension: 256,
  wordWeight: 2,
  maxInputLength: DEFAULT_MAX_INPUT_LENGTH,
};

/**
 * 32-bit FNV-1a hash.
 */
export function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Split normalized text into word tokens (letters and digits only).
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

export class HashingEncoder implements IEncoder {
  readonly name = 'hashing';
  private readonly config: HashingEncoderConfig;

  constructor(config: Partial<HashingEncoderConfig> = {}) {
    this.config = { ...DEFAULT_HASHING_CONFIG, ...config };
    if (!Number.isInteger(this.config.dimension) || this.config.dimension <= 0) {
      throw new Error(`Hashing encoder dimension must be a positive integer, got ${this.config.dimension}`);
    }
  }

  get dimension(): number {
    return this.config.dimension;
  }

  async init(): Promise<void> {
    // Nothing to load.
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }

  async encode(normalizedText: string): Promise<number[]> {
    assertEncodable(normalizedText, this.config.maxInputLength);

    const vector = new Array<number>(this.config.dimension).fill(0);
    for (const token of tokenize(normalizedText)) {
      this.addFeature(vector, `w:${token}`, this.config.wordWeight);
      const padded = `#${token}#`;
      for (let i = 0; i + 3 <= padded.length; i++) {
        this.addFeature(vector, `t:${padded.slice(i, i + 3)}`, 1);
      }
    }

    return l2Normalize(vector);
  }

  async dispose(): Promise<void> {
    // Nothing to release.
  }

  private addFeature(vector: number[], feature: string, weight: number): void {
    const hash = fnv1a(feature);
    const bucket = hash % this.config.dimension;
    // A second hash bit decides the sign so collisions tend to cancel out
    const sign = (hash & 0x80000000) === 0 ? 1 : -1;
    vector[bucket] = (vector[bucket] ?? 0) + sign * weight;
  }
}

function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) {
    return vector;
  }
  return vector.map((v) => v / norm);
}

export function createHashingEncoder(config?: Partial<HashingEncoderConfig>): HashingEncoder {
  return new HashingEncoder(config);
}
