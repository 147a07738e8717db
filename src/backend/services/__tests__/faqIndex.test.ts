/**
 * FAQ Index Tests
 *
 * Covers rebuild atomicity, exact ranking and tie order, incremental
 * writes, and encoder switching.
 */

import * as fc from 'fast-check';
import { FaqIndex, createFaqIndex, cosineSimilarity, normalizeTags } from '../faqIndex';
import { IndexBuildError } from '../errors';
import { KeywordEncoder, FailingEncoder } from '../../__fixtures__/keywordEncoder';
import { createHashingEncoder } from '../../encoders/hashingEncoder';
import { IEncoder } from '../../encoders/encoder';
import { FaqInput } from '../../../shared/types';

const HOURS: FaqInput = { id: 'hours', question: 'What are your hours?', answer: '9-5 Mon-Fri' };
const LOCATION: FaqInput = { id: 'location', question: 'Where are you located?', answer: '123 Main St' };
const PARKING: FaqInput = { id: 'parking', question: 'Do you have parking?', answer: 'Free lot behind the store' };

describe('cosineSimilarity', () => {
    it('should return 1 for identical vectors', () => {
        expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBeCloseTo(1, 10);
    });

    it('should return -1 for opposite vectors', () => {
        expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1, 10);
    });

    it('should return 0 when either vector is all zeros', () => {
        expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    });

    it('should throw on a dimension mismatch', () => {
        expect(() => cosineSimilarity([1, 0], [1, 0, 0])).toThrow('Vector dimension mismatch: 2 vs 3');
    });
});

describe('normalizeTags', () => {
    it('should trim, drop blanks and duplicates, and keep first-seen order', () => {
        expect(normalizeTags([' hours', 'open', '', 'hours ', 'Open'])).toEqual(['hours', 'open', 'Open']);
    });

    it('should return an empty array for undefined', () => {
        expect(normalizeTags(undefined)).toEqual([]);
    });
});

describe('FaqIndex', () => {
    let encoder: KeywordEncoder;
    let index: FaqIndex;

    beforeEach(() => {
        encoder = new KeywordEncoder();
        index = createFaqIndex(encoder);
    });

    describe('rebuild', () => {
        it('should index every entry and trim its text', async () => {
            const entries = await index.rebuild([
                { question: '  What are your hours? ', answer: ' 9-5 Mon-Fri ', tags: ['hours', ' hours ', ''] },
                LOCATION,
            ]);

            expect(entries).toHaveLength(2);
            expect(index.size()).toBe(2);
            expect(entries[0].question).toBe('What are your hours?');
            expect(entries[0].answer).toBe('9-5 Mon-Fri');
            expect(entries[0].tags).toEqual(['hours']);
            expect(typeof entries[0].id).toBe('string');
            expect(entries[1].id).toBe('location');
            expect(entries[0].embedding).toHaveLength(encoder.dimension);
        });

        it('should encode the normalized question', async () => {
            await index.rebuild([{ question: '  What ARE   your Hours? ', answer: 'x' }]);
            expect(encoder.calls).toEqual(['what are your hours?']);
        });

        it('should replace the previous entries wholesale', async () => {
            await index.rebuild([HOURS, LOCATION]);
            await index.rebuild([PARKING]);

            expect(index.entries().map((e) => e.id)).toEqual(['parking']);
            expect(index.get('hours')).toBeUndefined();
        });

        it('should accept an empty input', async () => {
            await index.rebuild([HOURS]);
            await expect(index.rebuild([])).resolves.toEqual([]);
            expect(index.size()).toBe(0);
        });

        it('should fail on an empty question and keep the previous index', async () => {
            await index.rebuild([HOURS, LOCATION]);

            const failed = index.rebuild([PARKING, { question: '   ', answer: 'orphan' }]);
            await expect(failed).rejects.toBeInstanceOf(IndexBuildError);
            await expect(failed).rejects.toMatchObject({ position: 1 });

            expect(index.size()).toBe(2);
            const results = index.query(await encoder.encode('when are you open'), 1);
            expect(results[0].entry.id).toBe('hours');
        });

        it('should fail on an empty answer', async () => {
            await expect(index.rebuild([{ question: 'What are your hours?', answer: '' }])).rejects.toThrow(
                'FAQ at position 0 has an empty answer'
            );
        });

        it('should fail on duplicate ids', async () => {
            await expect(index.rebuild([HOURS, { ...LOCATION, id: 'hours' }])).rejects.toThrow(
                'Duplicate FAQ id: hours'
            );
            expect(index.size()).toBe(0);
        });

        it('should wrap encoder failures with the failing position', async () => {
            const failing = createFaqIndex(new FailingEncoder());
            const failed = failing.rebuild([HOURS]);

            await expect(failed).rejects.toBeInstanceOf(IndexBuildError);
            await expect(failed).rejects.toThrow('Failed to encode FAQ at position 0: encoder offline');
        });

        describe('with a batching encoder', () => {
            let batches: string[][];
            let batching: IEncoder;

            beforeEach(() => {
                batches = [];
                batching = {
                    name: 'batching',
                    dimension: encoder.dimension,
                    init: async () => undefined,
                    isAvailable: async () => true,
                    dispose: async () => undefined,
                    encode: (text) => encoder.encode(text),
                    encodeBatch: async (texts) => {
                        batches.push(texts);
                        return Promise.all(texts.map((text) => encoder.encode(text)));
                    },
                };
            });

            it('should embed every question in one call', async () => {
                const batched = createFaqIndex(batching);

                await batched.rebuild([HOURS, LOCATION, PARKING]);

                expect(batches).toEqual([['what are your hours?', 'where are you located?', 'do you have parking?']]);
                const results = batched.query(await encoder.encode('when are you open'), 1);
                expect(results[0].entry.id).toBe('hours');
            });

            it('should validate every entry before encoding', async () => {
                const batched = createFaqIndex(batching);

                await expect(batched.rebuild([HOURS, { question: 'Parking?', answer: ' ' }])).rejects.toMatchObject({
                    position: 1,
                });
                expect(batches).toEqual([]);
            });

            it('should fail when the batch comes back short', async () => {
                const short = createFaqIndex({ ...batching, encodeBatch: async () => [[1, 0, 0, 0]] });
                await short.rebuild([HOURS]);

                await expect(short.rebuild([HOURS, LOCATION])).rejects.toThrow(
                    'Encoder batching returned 1 embeddings for 2 FAQs'
                );
                expect(short.size()).toBe(1);
            });
        });
    });

    describe('query', () => {
        it('should return nothing from an empty index', async () => {
            expect(index.query(await encoder.encode('hours'), 3)).toEqual([]);
        });

        it('should return nothing for k <= 0', async () => {
            await index.rebuild([HOURS]);
            expect(index.query(await encoder.encode('hours'), 0)).toEqual([]);
        });

        it('should rank by similarity and cap at k', async () => {
            await index.rebuild([LOCATION, PARKING, HOURS]);
            const results = index.query(await encoder.encode('when are you open'), 2);

            expect(results).toHaveLength(2);
            expect(results[0].entry.id).toBe('hours');
            expect(results[0].score).toBeCloseTo(1, 10);
            expect(results[1].score).toBe(0);
        });

        it('should break ties by insertion order', async () => {
            const opening: FaqInput = { id: 'opening', question: 'Opening hours?', answer: 'From 9' };

            await index.rebuild([HOURS, opening]);
            const forward = index.query(await encoder.encode('hours'), 2).map((r) => r.entry.id);

            await index.rebuild([opening, HOURS]);
            const reversed = index.query(await encoder.encode('hours'), 2).map((r) => r.entry.id);

            expect(forward).toEqual(['hours', 'opening']);
            expect(reversed).toEqual(['opening', 'hours']);
        });

        it('should score an entry queried with its own question at 1', async () => {
            const [entry] = await index.rebuild([HOURS, LOCATION]);
            const results = index.query(entry.embedding, 1);

            expect(results[0].entry.id).toBe('hours');
            expect(results[0].score).toBeCloseTo(1, 10);
        });

        it('should return the same results for the same query', async () => {
            await index.rebuild([HOURS, LOCATION, PARKING]);
            const embedding = await encoder.encode('hours or location');

            expect(index.query(embedding, 3)).toEqual(index.query(embedding, 3));
        });
    });

    describe('add', () => {
        it('should append a searchable entry without re-encoding the others', async () => {
            await index.rebuild([HOURS, LOCATION]);
            const callsBefore = encoder.calls.length;

            const entry = await index.add(PARKING);

            expect(encoder.calls.length).toBe(callsBefore + 1);
            expect(index.entries().map((e) => e.id)).toEqual(['hours', 'location', 'parking']);
            expect(index.query(await encoder.encode('is there parking'), 1)[0].entry).toEqual(entry);
        });

        it('should generate an id when none is given', async () => {
            const entry = await index.add({ question: 'Do you have parking?', answer: 'Yes' });
            expect(entry.id).toMatch(/^[0-9a-f-]{36}$/);
        });

        it('should reject an id that is already taken', async () => {
            await index.rebuild([HOURS]);
            await expect(index.add({ ...PARKING, id: 'hours' })).rejects.toBeInstanceOf(IndexBuildError);
            expect(index.size()).toBe(1);
        });
    });

    describe('update', () => {
        beforeEach(async () => {
            await index.rebuild([HOURS, LOCATION]);
        });

        it('should not re-encode when only the answer changes', async () => {
            const callsBefore = encoder.calls.length;
            const before = index.get('hours');

            const updated = await index.update('hours', { answer: '10-6 Mon-Sat' });

            expect(encoder.calls.length).toBe(callsBefore);
            expect(updated?.answer).toBe('10-6 Mon-Sat');
            expect(updated?.embedding).toEqual(before?.embedding);
        });

        it('should not re-encode when the question only changes in case or spacing', async () => {
            const callsBefore = encoder.calls.length;
            await index.update('hours', { question: 'what are  your HOURS?' });
            expect(encoder.calls.length).toBe(callsBefore);
            expect(index.get('hours')?.question).toBe('what are  your HOURS?');
        });

        it('should re-encode when the question changes', async () => {
            const updated = await index.update('hours', { question: 'Do you have parking?' });

            expect(encoder.calls[encoder.calls.length - 1]).toBe('do you have parking?');
            expect(updated?.embedding).toEqual([0, 0, 0, 1]);
            expect(index.entries().map((e) => e.id)).toEqual(['hours', 'location']);
        });

        it('should replace tags', async () => {
            const updated = await index.update('location', { tags: ['address', ' address'] });
            expect(updated?.tags).toEqual(['address']);
        });

        it('should return null for an unknown id', async () => {
            await expect(index.update('missing', { answer: 'x' })).resolves.toBeNull();
        });

        it('should reject an empty answer and keep the entry', async () => {
            await expect(index.update('hours', { answer: '  ' })).rejects.toBeInstanceOf(IndexBuildError);
            expect(index.get('hours')?.answer).toBe('9-5 Mon-Fri');
        });
    });

    describe('remove', () => {
        it('should remove an entry once', async () => {
            await index.rebuild([HOURS, LOCATION]);

            await expect(index.remove('hours')).resolves.toBe(true);
            await expect(index.remove('hours')).resolves.toBe(false);
            expect(index.entries().map((e) => e.id)).toEqual(['location']);
        });
    });

    describe('write ordering', () => {
        it('should apply concurrent writes in call order', async () => {
            const added = index.add(PARKING);
            const removed = index.remove('parking');

            await expect(added).resolves.toMatchObject({ id: 'parking' });
            await expect(removed).resolves.toBe(true);
            expect(index.size()).toBe(0);
        });

        it('should keep accepting writes after a failed one', async () => {
            await expect(index.add({ question: 'Do you have parking?', answer: '' })).rejects.toBeInstanceOf(
                IndexBuildError
            );
            await expect(index.add(PARKING)).resolves.toMatchObject({ id: 'parking' });
        });
    });

    describe('setEncoder', () => {
        it('should re-embed every entry with the new encoder', async () => {
            await index.rebuild([HOURS, LOCATION]);
            const hashing = createHashingEncoder({ dimension: 64 });

            await index.setEncoder(hashing);

            expect(index.encoder).toBe(hashing);
            expect(index.entries().every((e) => e.embedding.length === 64)).toBe(true);
            expect(index.entries().map((e) => e.id)).toEqual(['hours', 'location']);
        });

        it('should keep the old encoder and entries when re-embedding fails', async () => {
            await index.rebuild([HOURS]);
            const before = index.entries();

            await expect(index.setEncoder(new FailingEncoder())).rejects.toBeInstanceOf(IndexBuildError);

            expect(index.encoder).toBe(encoder);
            expect(index.entries()).toEqual(before);
        });
    });

    describe('properties', () => {
        const question = fc
            .string({ minLength: 1, maxLength: 40 })
            .filter((s) => s.trim().length > 0);

        it('should hold one entry per input and return sorted, capped results', async () => {
            await fc.assert(
                fc.asyncProperty(fc.array(question, { maxLength: 12 }), fc.integer({ min: 1, max: 5 }), async (questions, k) => {
                    const hashingIndex = createFaqIndex(createHashingEncoder({ dimension: 32 }));
                    await hashingIndex.rebuild(questions.map((q) => ({ question: q, answer: 'answer' })));

                    expect(hashingIndex.size()).toBe(questions.length);

                    const embedding = await hashingIndex.encoder.encode('what are your hours');
                    const scores = hashingIndex.query(embedding, k).map((r) => r.score);
                    expect(scores).toHaveLength(Math.min(k, questions.length));
                    for (let i = 1; i < scores.length; i++) {
                        expect(scores[i - 1]).toBeGreaterThanOrEqual(scores[i]);
                    }
                }),
                { numRuns: 50 }
            );
        });
    });
});
