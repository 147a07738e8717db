/**
 * Hashing encoder and shared encoder helpers
 */

import { HashingEncoder, createHashingEncoder, fnv1a, tokenize } from '../hashingEncoder';
import { IEncoder, normalizeText, encodeText, assertDimension } from '../encoder';
import { createEncoder } from '..';
import { EncodingError } from '../../services/errors';
import { cosineSimilarity } from '../../services/faqIndex';

describe('normalizeText', () => {
    it('should trim, lowercase and collapse whitespace', () => {
        expect(normalizeText('  What ARE\tyour\n\nHours?  ')).toBe('what are your hours?');
    });
});

describe('tokenize', () => {
    it('should split on anything that is not a letter or digit', () => {
        expect(tokenize('Hello, World! Open 24/7')).toEqual(['hello', 'world', 'open', '24', '7']);
    });

    it('should keep accented letters', () => {
        expect(tokenize('café au lait')).toEqual(['café', 'au', 'lait']);
    });
});

describe('fnv1a', () => {
    it('should match the reference 32-bit values', () => {
        expect(fnv1a('')).toBe(0x811c9dc5);
        expect(fnv1a('a')).toBe(0xe40c292c);
    });
});

describe('HashingEncoder', () => {
    let encoder: HashingEncoder;

    beforeEach(() => {
        encoder = createHashingEncoder();
    });

    it('should produce unit vectors of the configured dimension', async () => {
        const vector = await encoder.encode('what are your hours?');

        expect(vector).toHaveLength(256);
        expect(Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0))).toBeCloseTo(1, 10);
    });

    it('should be deterministic', async () => {
        const first = await encoder.encode('where are you located?');
        const second = await createHashingEncoder().encode('where are you located?');

        expect(second).toEqual(first);
    });

    it('should score shared wording above unrelated wording', async () => {
        const hours = await encoder.encode('what are your hours');
        const sameWords = await encoder.encode('what are your hours today');
        const unrelated = await encoder.encode('is there parking nearby');

        expect(cosineSimilarity(hours, sameWords)).toBeGreaterThan(cosineSimilarity(hours, unrelated));
    });

    it('should encode text without words to the zero vector', async () => {
        const vector = await encoder.encode('?!');
        expect(vector.every((v) => v === 0)).toBe(true);
    });

    it('should reject empty text', async () => {
        await expect(encoder.encode('')).rejects.toBeInstanceOf(EncodingError);
    });

    it('should reject text over the input limit', async () => {
        const small = createHashingEncoder({ maxInputLength: 10 });
        await expect(small.encode('a'.repeat(11))).rejects.toThrow(
            'Text is 11 characters, above the 10 character limit'
        );
    });

    it('should refuse a non-positive dimension', () => {
        expect(() => new HashingEncoder({ dimension: 0 })).toThrow(
            'Hashing encoder dimension must be a positive integer, got 0'
        );
    });

    it('should always be available', async () => {
        await expect(encoder.isAvailable()).resolves.toBe(true);
        expect(encoder.name).toBe('hashing');
    });
});

describe('encodeText', () => {
    it('should normalize before encoding', async () => {
        const encoder = createHashingEncoder({ dimension: 16 });
        const context = await encodeText(encoder, '  When are   you OPEN? ');

        expect(context.rawText).toBe('  When are   you OPEN? ');
        expect(context.normalizedText).toBe('when are you open?');
        expect(context.embedding).toEqual(await encoder.encode('when are you open?'));
    });

    it('should wrap backend failures in EncodingError', async () => {
        const broken: IEncoder = {
            name: 'broken',
            dimension: 2,
            init: async () => undefined,
            isAvailable: async () => false,
            dispose: async () => undefined,
            encode: async () => {
                throw new Error('socket hang up');
            },
        };

        const attempt = encodeText(broken, 'hello');
        await expect(attempt).rejects.toBeInstanceOf(EncodingError);
        await expect(attempt).rejects.toThrow('Encoder broken failed: socket hang up');
    });
});

describe('assertDimension', () => {
    it('should pass a well-formed vector through', () => {
        expect(assertDimension([0.5, 0.5], 2, 'test')).toEqual([0.5, 0.5]);
    });

    it('should reject the wrong length', () => {
        expect(() => assertDimension([1], 2, 'test')).toThrow('Encoder test returned 1 dimensions, expected 2');
    });

    it('should reject non-finite values', () => {
        expect(() => assertDimension([1, NaN], 2, 'test')).toThrow('Encoder test returned a non-finite value');
    });
});

describe('createEncoder', () => {
    const settings = {
        kind: 'hashing' as const,
        maxInputLength: 500,
        hashingDimension: 32,
        ollamaBaseUrl: 'http://localhost:11434',
        ollamaEmbeddingModel: 'nomic-embed-text',
        ollamaTimeoutMs: 1000,
    };

    it('should build the hashing encoder', () => {
        const encoder = createEncoder(settings);
        expect(encoder.name).toBe('hashing');
        expect(encoder.dimension).toBe(32);
    });

    it('should build the Ollama encoder without contacting Ollama', () => {
        const encoder = createEncoder({ ...settings, kind: 'ollama' });
        expect(encoder.name).toBe('ollama:nomic-embed-text');
        expect(encoder.dimension).toBe(0);
    });
});
