/**
 * Ollama Encoder
 *
 * Encoder adapter over Ollama's /api/embed. The vector dimension depends on
 * the pulled model, so init() probes it once; encode() before init() fails
 * instead of guessing. encodeBatch() lets the index embed a whole profile
 * in one request.
 */

import { IOllamaClient, OllamaError } from '../clients/ollamaClient';
import {
  IEncoder,
  assertEncodable,
  assertDimension,
  DEFAULT_MAX_INPUT_LENGTH,
} from './encoder';
import { EncodingError } from '../services/errors';

const DIMENSION_PROBE_TEXT = 'dimension probe';

export interface OllamaEncoderConfig {
  /** Reported in `name`; should match the client's embedding model */
  model: string;
  maxInputLength: number;
}

export class OllamaEncoder implements IEncoder {
  private readonly client: IOllamaClient;
  private readonly config: OllamaEncoderConfig;
  private probedDimension = 0;
  private initializing: Promise<void> | null = null;

  constructor(client: IOllamaClient, config: Partial<OllamaEncoderConfig> = {}) {
    this.client = client;
    this.config = {
      model: config.model ?? 'unknown',
      maxInputLength: config.maxInputLength ?? DEFAULT_MAX_INPUT_LENGTH,
    };
  }

  get name(): string {
    return `ollama:${this.config.model}`;
  }

  get dimension(): number {
    return this.probedDimension;
  }

  /**
   * Probe the model once. Concurrent callers share the same probe.
   */
  init(): Promise<void> {
    if (this.probedDimension > 0) {
      return Promise.resolve();
    }
    if (!this.initializing) {
      this.initializing = this.probe().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  async encode(normalizedText: string): Promise<number[]> {
    const [vector] = await this.encodeBatch([normalizedText]);
    if (!vector) {
      throw new EncodingError(`Encoder ${this.name} returned no embedding`);
    }
    return vector;
  }

  async encodeBatch(normalizedTexts: string[]): Promise<number[][]> {
    for (const text of normalizedTexts) {
      assertEncodable(text, this.config.maxInputLength);
    }
    if (this.probedDimension === 0) {
      throw new EncodingError(`Encoder ${this.name} is not initialized. Call init() first.`);
    }

    const vectors = await this.request(normalizedTexts);
    return vectors.map((vector) => assertDimension(vector, this.probedDimension, this.name));
  }

  isAvailable(): Promise<boolean> {
    return this.client.isAvailable();
  }

  async dispose(): Promise<void> {
    this.probedDimension = 0;
  }

  private async request(texts: string[]): Promise<number[][]> {
    try {
      return await this.client.embed(texts);
    } catch (error) {
      if (error instanceof OllamaError) {
        throw new EncodingError(error.message, error);
      }
      throw error;
    }
  }

  private async probe(): Promise<void> {
    console.log(`Probing embedding model: ${this.name}`);
    const [vector] = await this.request([DIMENSION_PROBE_TEXT]);
    if (!vector || vector.length === 0) {
      throw new EncodingError(`Encoder ${this.name} returned an empty embedding`);
    }
    this.probedDimension = vector.length;
    console.log(`Embedding model ready: ${this.name} (${vector.length} dimensions)`);
  }
}

export function createOllamaEncoder(
  client: IOllamaClient,
  config?: Partial<OllamaEncoderConfig>
): OllamaEncoder {
  return new OllamaEncoder(client, config);
}
