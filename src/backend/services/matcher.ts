/**
 * Matcher Service
 *
 * Turns one user utterance into one MatchDecision:
 *
 *   encode query ──► top-K from the index ──► threshold policy
 *                                              ├─ answered
 *                                              ├─ clarify
 *                                              └─ no_match
 *
 * A single best-score threshold is not enough when two FAQs are nearly
 * synonymous, so answering also requires the best entry to beat the
 * runner-up by a margin. Otherwise, a reasonably good top score asks the
 * user to pick.
 *
 * The matcher keeps no state between calls. Conversation context lives in
 * the SessionManager.
 */

import { FaqEntry, MatchDecision, NoMatchReason, ScoredCandidate } from '../../shared/types';
import { encodeText, normalizeText } from '../encoders/encoder';
import { tokenize } from '../encoders/hashingEncoder';
import { EncodingError } from './errors';
import { IFaqIndex, SearchResult, cosineSimilarity } from './faqIndex';

/**
 * Decision thresholds. All are inclusive lower bounds on a [-1, 1] cosine scale.
 */
export interface MatcherConfig {
    /** Minimum top score to answer directly */
    answerThreshold: number;
    /** Minimum lead of the top score over the second-best to answer directly */
    marginThreshold: number;
    /** Minimum top score to offer a clarification */
    clarifyThreshold: number;
    /** How many candidates to fetch (and offer when clarifying) */
    candidateCount: number;
    /** Upper bound on one decision, encoder latency included */
    timeoutMs: number;
}

/**
 * Default matcher configuration.
 *
 * These are starting points, not tuned constants: the right values depend
 * on the encoder and on how similar a business's FAQs are to each other.
 */
export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
    answerThreshold: 0.75,
    marginThreshold: 0.05,
    clarifyThreshold: 0.5,
    candidateCount: 3,
    timeoutMs: 5000,
};

// Scores within SCORE_EPSILON below a threshold count as reaching it
const SCORE_EPSILON = 1e-9;

const ORDINAL_WORDS = new Map<string, number>([
    ['first', 1],
    ['1st', 1],
    ['one', 1],
    ['second', 2],
    ['2nd', 2],
    ['two', 2],
    ['third', 3],
    ['3rd', 3],
    ['three', 3],
]);

// Words that say nothing about which candidate the user means
const FOLLOW_UP_STOP_WORDS = new Set([
    'a', 'an', 'the', 'is', 'are', 'was', 'you', 'your', 'i', 'me', 'my',
    'what', 'when', 'where', 'how', 'do', 'does', 'of', 'to', 'for', 'and',
    'or', 'about', 'tell', 'please', 'it', 'that', 'this', 'in', 'on', 'at',
    'one', 'want', 'mean', 'meant', 'yes',
]);

function noMatch(reason: NoMatchReason): MatchDecision {
    return { kind: 'no_match', reason };
}

/**
 * Apply the threshold policy to ranked search results.
 *
 * Exported separately so the policy can be tested without an encoder.
 */
export function classify(
    results: ReadonlyArray<ScoredCandidate>,
    config: MatcherConfig
): MatchDecision {
    const top = results[0];
    if (!top) {
        return noMatch('empty_index');
    }

    const second = results[1];
    // With a single candidate there is nothing to confuse it with
    const margin = second ? top.score - second.score : Infinity;

    if (
        top.score + SCORE_EPSILON >= config.answerThreshold &&
        margin + SCORE_EPSILON >= config.marginThreshold
    ) {
        return { kind: 'answered', entryId: top.entryId, score: top.score };
    }

    if (top.score + SCORE_EPSILON >= config.clarifyThreshold) {
        return {
            kind: 'clarify',
            candidates: results.map(({ entryId, score }) => ({ entryId, score })),
        };
    }

    return noMatch('below_threshold');
}

/**
 * Resolve `promise`, or `onTimeout()` if it takes longer than `timeoutMs`.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    onTimeout: () => T
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<T>((resolve) => {
        timer = setTimeout(() => resolve(onTimeout()), timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

export interface IMatcher {
    decide(rawText: string): Promise<MatchDecision>;
    evaluate(rawText: string): Promise<MatchDecision>;
    selectCandidate(followUp: string, candidates: ScoredCandidate[]): Promise<string | null>;
}

export class Matcher implements IMatcher {
    private readonly index: IFaqIndex;
    private readonly config: MatcherConfig;

    constructor(index: IFaqIndex, config: Partial<MatcherConfig> = {}) {
        this.index = index;
        this.config = { ...DEFAULT_MATCHER_CONFIG, ...config };
    }

    getConfig(): MatcherConfig {
        return { ...this.config };
    }

    /**
     * Decide how to respond to one user utterance.
     *
     * Never rejects: encoding failures, timeouts and unexpected errors all
     * come back as a no_match decision.
     */
    async decide(rawText: string): Promise<MatchDecision> {
        try {
            return await withTimeout(this.evaluate(rawText), this.config.timeoutMs, () => {
                console.error(`Match timed out after ${this.config.timeoutMs}ms`);
                return noMatch('timeout');
            });
        } catch (error) {
            console.error('Unexpected error while matching query:', error);
            return noMatch('error');
        }
    }

    /**
     * Work out which pending candidate a clarification follow-up refers to.
     *
     * Tried in order:
     * 1. An ordinal ("2", "second", "option 1")
     * 2. Words shared with exactly one candidate's question or tags
     * 3. Embedding similarity against the candidates only, held to the
     *    clarify threshold and the answer margin
     *
     * @returns The chosen entry id, or null if the follow-up is not a choice
     */
    async selectCandidate(followUp: string, candidates: ScoredCandidate[]): Promise<string | null> {
        const live = candidates
            .map((candidate) => this.index.get(candidate.entryId))
            .filter((entry): entry is FaqEntry => entry !== undefined);
        if (live.length === 0) {
            return null;
        }

        const normalized = normalizeText(followUp);

        const ordinal = parseOrdinal(normalized);
        if (ordinal !== null) {
            return live[ordinal - 1]?.id ?? null;
        }

        const words = tokenize(normalized).filter((w) => !FOLLOW_UP_STOP_WORDS.has(w));
        if (words.length > 0) {
            const overlaps = live.map((entry) => {
                const vocabulary = new Set([
                    ...tokenize(entry.question),
                    ...entry.tags.flatMap((tag) => tokenize(tag)),
                ]);
                return words.filter((w) => vocabulary.has(w)).length;
            });
            const best = Math.max(...overlaps);
            if (best > 0 && overlaps.filter((n) => n === best).length === 1) {
                return live[overlaps.indexOf(best)]?.id ?? null;
            }
        }

        let embedding: number[];
        try {
            ({ embedding } = await encodeText(this.index.encoder, followUp));
        } catch (error) {
            if (error instanceof EncodingError) {
                return null;
            }
            throw error;
        }

        const ranked = live
            .map((entry) => ({ id: entry.id, score: cosineSimilarity(embedding, entry.embedding) }))
            .sort((a, b) => b.score - a.score);
        const top = ranked[0];
        const second = ranked[1];
        if (!top || top.score + SCORE_EPSILON < this.config.clarifyThreshold) {
            return null;
        }
        if (second && top.score - second.score + SCORE_EPSILON < this.config.marginThreshold) {
            return null;
        }
        return top.id;
    }

    /**
     * decide() without the timeout or the catch-all, for callers that bound
     * a larger piece of work themselves. Encoding failures still come back
     * as no_match.
     */
    async evaluate(rawText: string): Promise<MatchDecision> {
        let embedding: number[];
        try {
            ({ embedding } = await encodeText(this.index.encoder, rawText));
        } catch (error) {
            if (error instanceof EncodingError) {
                return noMatch('encoding_error');
            }
            throw error;
        }

        const results: SearchResult[] = this.index.query(embedding, this.config.candidateCount);
        return classify(
            results.map(({ entry, score }) => ({ entryId: entry.id, score })),
            this.config
        );
    }
}

function parseOrdinal(normalized: string): number | null {
    const cleaned = normalized.replace(/[.!?]+$/, '');
    const numeric = /^(?:option |number |#)?(\d+)$/.exec(cleaned);
    if (numeric?.[1]) {
        const n = Number(numeric[1]);
        return n >= 1 ? n : null;
    }
    const word = cleaned.replace(/^(?:the )/, '').replace(/ (?:one|option)$/, '');
    return ORDINAL_WORDS.get(word) ?? null;
}

/**
 * Factory function to create a matcher.
 */
export function createMatcher(index: IFaqIndex, config?: Partial<MatcherConfig>): Matcher {
    return new Matcher(index, config);
}
