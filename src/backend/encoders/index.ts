/**
 * Encoder adapters
 *
 * createEncoder() picks the implementation from configuration once, at
 * startup. Nothing downstream branches on the encoder kind.
 */

import { createOllamaClient } from '../clients/ollamaClient';
import type { EncoderSettings } from '../config';
import type { IEncoder } from './encoder';
import { createHashingEncoder } from './hashingEncoder';
import { createOllamaEncoder } from './ollamaEncoder';

export function createEncoder(settings: EncoderSettings): IEncoder {
  switch (settings.kind) {
    case 'hashing':
      return createHashingEncoder({
        dimension: settings.hashingDimension,
        maxInputLength: settings.maxInputLength,
      });
    case 'ollama':
      return createOllamaEncoder(
        createOllamaClient({
          baseUrl: settings.ollamaBaseUrl,
          embeddingModel: settings.ollamaEmbeddingModel,
          timeoutMs: settings.ollamaTimeoutMs,
        }),
        { model: settings.ollamaEmbeddingModel, maxInputLength: settings.maxInputLength }
      );
  }
}

export {
  normalizeText,
  encodeText,
  assertEncodable,
  assertDimension,
  DEFAULT_MAX_INPUT_LENGTH,
} from './encoder';
export type { IEncoder } from './encoder';
export { HashingEncoder, createHashingEncoder, DEFAULT_HASHING_CONFIG, tokenize, fnv1a } from './hashingEncoder';
export type { HashingEncoderConfig } from './hashingEncoder';
export { OllamaEncoder, createOllamaEncoder } from './ollamaEncoder';
export type { OllamaEncoderConfig } from './ollamaEncoder';
