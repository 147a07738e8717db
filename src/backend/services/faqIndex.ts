/**
 * FAQ Index
 *
 * In-memory semantic index over a business's FAQ entries.
 *
 * HOW IT WORKS:
 * 1. Each FAQ question is normalized and converted to an embedding vector
 * 2. A user query is converted to an embedding vector the same way
 * 3. We rank entries whose vectors are "close" to the query vector
 * 4. Closeness is measured using cosine similarity
 *
 * CONSISTENCY:
 * The active entries live in an immutable snapshot. Every write (rebuild,
 * add, update, remove, encoder swap) builds a new snapshot off to the side
 * and swaps the reference in one assignment, and writes run one at a time.
 * query() is synchronous and only ever sees a complete snapshot.
 */

import { v4 as uuidv4 } from 'uuid';
import { FaqEntry, FaqInput } from '../../shared/types';
import { IEncoder, normalizeText } from '../encoders/encoder';
import { IndexBuildError, toError } from './errors';

/**
 * Result of a similarity search.
 */
export interface SearchResult {
  entry: FaqEntry;
  score: number; // Cosine similarity score (-1 to 1, higher = more similar)
}

export type FaqChanges = Partial<Pick<FaqInput, 'question' | 'answer' | 'tags'>>;

/**
 * Interface for FAQ index operations.
 */
export interface IFaqIndex {
  rebuild(inputs: FaqInput[]): Promise<FaqEntry[]>;
  query(queryEmbedding: number[], k: number): SearchResult[];
  add(input: FaqInput): Promise<FaqEntry>;
  update(id: string, changes: FaqChanges): Promise<FaqEntry | null>;
  remove(id: string): Promise<boolean>;
  setEncoder(encoder: IEncoder): Promise<void>;
  get(id: string): FaqEntry | undefined;
  entries(): FaqEntry[];
  size(): number;
  readonly encoder: IEncoder;
}

interface IndexSnapshot {
  readonly entries: readonly FaqEntry[];
  readonly byId: ReadonlyMap<string, FaqEntry>;
}

const EMPTY_SNAPSHOT: IndexSnapshot = { entries: [], byId: new Map() };

/**
 * Calculate cosine similarity between two vectors.
 *
 * - 1.0 = identical direction (most similar)
 * - 0.0 = perpendicular (unrelated)
 * - -1.0 = opposite direction
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  if (a.length === 0) {
    return 0;
  }

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    magnitudeA += aVal * aVal;
    magnitudeB += bVal * bVal;
  }

  const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

  // Zero vectors are unrelated to everything
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Trim tags, drop blanks and duplicates, keep first-seen order.
 */
export function normalizeTags(tags: readonly string[] | undefined): string[] {
  const seen = new Set<string>();
  for (const tag of tags ?? []) {
    const trimmed = tag.trim();
    if (trimmed.length > 0) {
      seen.add(trimmed);
    }
  }
  return [...seen];
}

/**
 * In-memory FAQ index with exact linear-scan search.
 *
 * One instance per business profile; instances share nothing but,
 * possibly, the encoder (which is reentrant).
 */
export class FaqIndex implements IFaqIndex {
  private snapshot: IndexSnapshot = EMPTY_SNAPSHOT;
  private activeEncoder: IEncoder;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(encoder: IEncoder) {
    this.activeEncoder = encoder;
  }

  get encoder(): IEncoder {
    return this.activeEncoder;
  }

  /**
   * Replace the whole index with `inputs`, all-or-nothing.
   *
   * @throws IndexBuildError if any entry fails; the previous entries stay active
   */
  rebuild(inputs: FaqInput[]): Promise<FaqEntry[]> {
    return this.enqueue(async () => {
      const next = await this.buildSnapshot(inputs, this.activeEncoder);
      this.snapshot = next;
      return [...next.entries];
    });
  }

  /**
   * Rank entries by similarity to the query embedding.
   *
   * Brute-force O(n): the query is compared with every entry. Ties keep
   * insertion order (the earlier entry ranks first).
   *
   * @param queryEmbedding - The embedding vector to search for
   * @param k - Maximum number of results to return
   * @returns Results sorted by similarity (highest first)
   */
  query(queryEmbedding: number[], k: number): SearchResult[] {
    const { entries } = this.snapshot;
    if (entries.length === 0 || k <= 0) {
      return [];
    }

    const ranked = entries.map((entry, position) => ({
      entry,
      position,
      score: cosineSimilarity(queryEmbedding, entry.embedding),
    }));

    ranked.sort((a, b) => b.score - a.score || a.position - b.position);

    return ranked.slice(0, k).map(({ entry, score }) => ({ entry, score }));
  }

  /**
   * Encode and append one entry without a full rebuild.
   *
   * @throws IndexBuildError if the entry cannot be encoded or its id is taken
   */
  add(input: FaqInput): Promise<FaqEntry> {
    return this.enqueue(async () => {
      const current = this.snapshot;
      const entry = await this.createEntry(input, current.entries.length, this.activeEncoder);
      if (current.byId.has(entry.id)) {
        throw new IndexBuildError(`Duplicate FAQ id: ${entry.id}`, current.entries.length);
      }
      this.snapshot = makeSnapshot([...current.entries, entry]);
      return entry;
    });
  }

  /**
   * Change an entry in place. The question is re-embedded only when its
   * normalized text actually changes.
   *
   * @returns The updated entry, or null if no entry has this id
   */
  update(id: string, changes: FaqChanges): Promise<FaqEntry | null> {
    return this.enqueue(async () => {
      const current = this.snapshot;
      const position = current.entries.findIndex((e) => e.id === id);
      const existing = current.entries[position];
      if (!existing) {
        return null;
      }

      const question = changes.question ?? existing.question;
      const answer = changes.answer ?? existing.answer;
      const tags = changes.tags !== undefined ? normalizeTags(changes.tags) : existing.tags;

      let updated: FaqEntry;
      if (normalizeText(question) !== normalizeText(existing.question)) {
        updated = await this.createEntry({ id, question, answer, tags }, position, this.activeEncoder);
      } else {
        if (answer.trim().length === 0) {
          throw new IndexBuildError(`FAQ ${id} has an empty answer`, position);
        }
        updated = { ...existing, question, answer, tags };
      }

      const entries = [...current.entries];
      entries[position] = updated;
      this.snapshot = makeSnapshot(entries);
      return updated;
    });
  }

  /**
   * Remove an entry. Removing an unknown id is a no-op.
   *
   * @returns true if an entry was removed
   */
  remove(id: string): Promise<boolean> {
    return this.enqueue(async () => {
      const current = this.snapshot;
      if (!current.byId.has(id)) {
        return false;
      }
      this.snapshot = makeSnapshot(current.entries.filter((e) => e.id !== id));
      return true;
    });
  }

  /**
   * Switch to a different encoder. All entries are re-embedded with it,
   * so vectors of different dimensions never coexist. If re-embedding
   * fails, the old encoder and entries stay active.
   */
  setEncoder(encoder: IEncoder): Promise<void> {
    return this.enqueue(async () => {
      const inputs: FaqInput[] = this.snapshot.entries.map(({ id, question, answer, tags }) => ({
        id,
        question,
        answer,
        tags,
      }));
      const next = await this.buildSnapshot(inputs, encoder);
      this.activeEncoder = encoder;
      this.snapshot = next;
    });
  }

  /**
   * Get an entry by ID.
   */
  get(id: string): FaqEntry | undefined {
    return this.snapshot.byId.get(id);
  }

  /**
   * All entries in insertion order.
   */
  entries(): FaqEntry[] {
    return [...this.snapshot.entries];
  }

  size(): number {
    return this.snapshot.entries.length;
  }

  /**
   * Run writes one at a time. A failed write does not block the next one;
   * its error reaches the caller through the returned promise.
   */
  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    this.writeQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async buildSnapshot(inputs: FaqInput[], encoder: IEncoder): Promise<IndexSnapshot> {
    const ids = new Set<string>();
    const prepared = inputs.map((input, position) => {
      const entry = prepareInput(input, position);
      if (ids.has(entry.id)) {
        throw new IndexBuildError(`Duplicate FAQ id: ${entry.id}`, position);
      }
      ids.add(entry.id);
      return entry;
    });

    const embeddings = await this.embedQuestions(
      prepared.map((entry) => entry.normalizedQuestion),
      encoder
    );

    const entries = prepared.map((entry, position) =>
      toEntry(entry, embeddings[position] ?? [], position, encoder)
    );
    const first = entries[0];
    const odd = entries.findIndex((entry) => entry.embedding.length !== first?.embedding.length);
    if (first && odd >= 0) {
      throw new IndexBuildError(
        `Embedding dimension changed mid-build: ${first.embedding.length} vs ${entries[odd]?.embedding.length}`,
        odd
      );
    }

    return makeSnapshot(entries);
  }

  /**
   * One request for the whole profile when the encoder batches,
   * otherwise one encode() per question in order.
   */
  private async embedQuestions(questions: string[], encoder: IEncoder): Promise<number[][]> {
    if (encoder.encodeBatch && questions.length > 0) {
      let vectors: number[][];
      try {
        vectors = await encoder.encodeBatch(questions);
      } catch (error) {
        const cause = toError(error);
        throw new IndexBuildError(`Failed to encode ${questions.length} FAQs: ${cause.message}`, undefined, cause);
      }
      if (vectors.length !== questions.length) {
        throw new IndexBuildError(
          `Encoder ${encoder.name} returned ${vectors.length} embeddings for ${questions.length} FAQs`
        );
      }
      return vectors;
    }

    const vectors: number[][] = [];
    for (let position = 0; position < questions.length; position++) {
      vectors.push(await encodeQuestion(questions[position] ?? '', position, encoder));
    }
    return vectors;
  }

  private async createEntry(input: FaqInput, position: number, encoder: IEncoder): Promise<FaqEntry> {
    const prepared = prepareInput(input, position);
    const embedding = await encodeQuestion(prepared.normalizedQuestion, position, encoder);
    return toEntry(prepared, embedding, position, encoder);
  }
}

interface PreparedInput {
  id: string;
  question: string;
  normalizedQuestion: string;
  answer: string;
  tags: string[];
}

function prepareInput(input: FaqInput, position: number): PreparedInput {
  const normalizedQuestion = normalizeText(input.question ?? '');
  if (normalizedQuestion.length === 0) {
    throw new IndexBuildError(`FAQ at position ${position} has an empty question`, position);
  }
  if ((input.answer ?? '').trim().length === 0) {
    throw new IndexBuildError(`FAQ at position ${position} has an empty answer`, position);
  }
  return {
    id: input.id ?? uuidv4(),
    question: input.question.trim(),
    normalizedQuestion,
    answer: input.answer.trim(),
    tags: normalizeTags(input.tags),
  };
}

async function encodeQuestion(normalizedQuestion: string, position: number, encoder: IEncoder): Promise<number[]> {
  try {
    return await encoder.encode(normalizedQuestion);
  } catch (error) {
    const cause = toError(error);
    throw new IndexBuildError(`Failed to encode FAQ at position ${position}: ${cause.message}`, position, cause);
  }
}

function toEntry(prepared: PreparedInput, embedding: number[], position: number, encoder: IEncoder): FaqEntry {
  if (encoder.dimension > 0 && embedding.length !== encoder.dimension) {
    throw new IndexBuildError(
      `FAQ at position ${position} has ${embedding.length} dimensions, encoder declares ${encoder.dimension}`,
      position
    );
  }
  const { id, question, answer, tags } = prepared;
  return { id, question, answer, tags, embedding };
}

function makeSnapshot(entries: FaqEntry[]): IndexSnapshot {
  return {
    entries,
    byId: new Map(entries.map((entry) => [entry.id, entry])),
  };
}

/**
 * Factory function to create an FAQ index.
 */
export function createFaqIndex(encoder: IEncoder): FaqIndex {
  return new FaqIndex(encoder);
}
