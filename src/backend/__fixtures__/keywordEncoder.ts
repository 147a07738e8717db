/**
 * Test encoders
 *
 * KeywordEncoder maps words to fixed "concept" dimensions, so tests can
 * exercise paraphrase matching ("When are you open?" → hours) with scores
 * that are easy to work out by hand. Words outside every concept are
 * ignored; text with no concept words encodes to the zero vector.
 */

import { IEncoder, assertEncodable, DEFAULT_MAX_INPUT_LENGTH } from '../encoders/encoder';
import { tokenize } from '../encoders/hashingEncoder';

export type Concepts = ReadonlyArray<readonly [string, readonly string[]]>;

export const DEFAULT_CONCEPTS: Concepts = [
    ['hours', ['hours', 'open', 'opening', 'close', 'closing']],
    ['location', ['where', 'located', 'location', 'address']],
    ['returns', ['return', 'returns', 'refund', 'policy']],
    ['parking', ['parking', 'park']],
];

export class KeywordEncoder implements IEncoder {
    readonly name: string;
    readonly dimension: number;
    /** Every text passed to encode(), in call order */
    readonly calls: string[] = [];
    private readonly concepts: Concepts;

    constructor(concepts: Concepts = DEFAULT_CONCEPTS, name = 'keyword') {
        this.concepts = concepts;
        this.dimension = concepts.length;
        this.name = name;
    }

    async init(): Promise<void> {}

    async isAvailable(): Promise<boolean> {
        return true;
    }

    async dispose(): Promise<void> {}

    async encode(normalizedText: string): Promise<number[]> {
        assertEncodable(normalizedText, DEFAULT_MAX_INPUT_LENGTH);
        this.calls.push(normalizedText);

        const vector = new Array<number>(this.dimension).fill(0);
        for (const token of tokenize(normalizedText)) {
            this.concepts.forEach(([, words], i) => {
                if (words.includes(token)) {
                    vector[i] += 1;
                }
            });
        }

        const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
        return norm === 0 ? vector : vector.map((v) => v / norm);
    }
}

/**
 * Encoder whose encode() always rejects with the given error.
 */
export class FailingEncoder implements IEncoder {
    readonly name = 'failing';
    readonly dimension = 4;

    constructor(private readonly error: Error = new Error('encoder offline')) {}

    async init(): Promise<void> {}

    async isAvailable(): Promise<boolean> {
        return false;
    }

    async dispose(): Promise<void> {}

    async encode(): Promise<number[]> {
        throw this.error;
    }
}
