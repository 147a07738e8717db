/**
 * Response Formatter Service
 *
 * Turns a MatchDecision into the text the end user sees.
 *
 * - answered: the FAQ's answer, verbatim
 * - clarify: a short "did you mean" prompt with a numbered list of questions
 * - no_match: the configured fallback message
 *
 * Users never see an error string: anything that can't be rendered
 * (e.g. an entry removed between matching and formatting) falls back too.
 */

import { ClarificationOption, FaqEntry, MatchDecision } from '../../shared/types';

/**
 * Configuration for the response formatter.
 */
export interface FormatterConfig {
  /** Sent for no_match decisions and anything that can't be rendered */
  fallbackMessage: string;
  /** First line of a clarification prompt */
  clarificationPrompt: string;
  /** Last line of a clarification prompt */
  clarificationHint: string;
}

/**
 * Default formatter configuration.
 */
export const DEFAULT_FORMATTER_CONFIG: FormatterConfig = {
  fallbackMessage:
    "I'm sorry, I don't have an answer to that yet. Please contact us directly and we'll be happy to help.",
  clarificationPrompt: 'Did you mean one of these?',
  clarificationHint: 'Reply with the number or a few words from the question.',
};

/**
 * A decision rendered for display.
 */
export interface FormattedResponse {
  content: string;
  /** Questions the user can choose from; null unless clarifying */
  options: ClarificationOption[] | null;
}

export type EntryLookup = (entryId: string) => FaqEntry | undefined;

/**
 * Resolve clarification candidates to displayable questions, best first.
 * Candidates whose entry no longer exists are skipped.
 */
export function buildClarificationOptions(
  entryIds: readonly string[],
  lookup: EntryLookup
): ClarificationOption[] {
  const options: ClarificationOption[] = [];
  for (const entryId of entryIds) {
    const entry = lookup(entryId);
    if (entry) {
      options.push({ entryId, question: entry.question });
    }
  }
  return options;
}

/**
 * Render a numbered clarification prompt.
 */
export function formatClarification(
  options: readonly ClarificationOption[],
  config: FormatterConfig = DEFAULT_FORMATTER_CONFIG
): string {
  const lines = options.map((option, i) => `${i + 1}. ${option.question}`);
  return [config.clarificationPrompt, ...lines, config.clarificationHint].join('\n');
}

/**
 * Formats a decision for display.
 */
export function formatDecision(
  decision: MatchDecision,
  lookup: EntryLookup,
  config: FormatterConfig = DEFAULT_FORMATTER_CONFIG
): FormattedResponse {
  const fallback: FormattedResponse = { content: config.fallbackMessage, options: null };

  switch (decision.kind) {
    case 'answered': {
      const entry = lookup(decision.entryId);
      return entry ? { content: entry.answer, options: null } : fallback;
    }
    case 'clarify': {
      const options = buildClarificationOptions(
        decision.candidates.map((c) => c.entryId),
        lookup
      );
      if (options.length === 0) {
        return fallback;
      }
      return { content: formatClarification(options, config), options };
    }
    case 'no_match':
      return fallback;
  }
}

/**
 * Interface for the response formatter service.
 */
export interface IResponseFormatter {
  format(decision: MatchDecision, lookup: EntryLookup): FormattedResponse;
  readonly fallbackMessage: string;
}

/**
 * Response Formatter class implementation.
 *
 * Holds the configured messages so callers don't pass them around.
 */
export class ResponseFormatter implements IResponseFormatter {
  private readonly config: FormatterConfig;

  constructor(config: Partial<FormatterConfig> = {}) {
    this.config = { ...DEFAULT_FORMATTER_CONFIG, ...config };
  }

  get fallbackMessage(): string {
    return this.config.fallbackMessage;
  }

  format(decision: MatchDecision, lookup: EntryLookup): FormattedResponse {
    return formatDecision(decision, lookup, this.config);
  }
}

/**
 * Factory function to create a response formatter.
 */
export function createResponseFormatter(
  config?: Partial<FormatterConfig>
): ResponseFormatter {
  return new ResponseFormatter(config);
}
