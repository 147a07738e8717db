/**
 * Chatbot Service
 *
 * One chatbot = one business profile + its own FAQ index, matcher,
 * session store and response formatter. This is the component the HTTP
 * layer talks to:
 *
 * 1. TRAIN: rebuild the index from the whole profile (all-or-nothing)
 * 2. CHAT: session context → matcher → formatter → reply
 * 3. MAINTAIN: add/update/remove single FAQs, export the profile
 *
 * Chatbots are independent: nothing here is shared across instances except
 * the encoder, which is reentrant.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  BusinessProfile,
  ChatReply,
  FaqEntry,
  FaqInput,
  MatchDecision,
  PortableProfile,
  ScoredCandidate,
} from '../../shared/types';
import { IEncoder } from '../encoders/encoder';
import { ChatbotNotFoundError } from './errors';
import { FaqChanges, FaqIndex, createFaqIndex } from './faqIndex';
import { Matcher, MatcherConfig, createMatcher, withTimeout } from './matcher';
import { exportProfile } from './profileBridge';
import { FormatterConfig, ResponseFormatter, createResponseFormatter } from './responseFormatter';
import { Clock, SessionManager, SessionManagerConfig, createSessionManager } from './sessionManager';

/**
 * Per-chatbot settings. Anything omitted uses the component defaults.
 */
export interface ChatbotOptions {
  matcher?: Partial<MatcherConfig>;
  session?: Partial<SessionManagerConfig>;
  formatter?: Partial<FormatterConfig>;
  clock?: Clock;
  /** Run the idle-session sweep on a timer (off in tests) */
  autoExpireSessions?: boolean;
}

/**
 * An FAQ entry as shown to API clients (no embedding).
 */
export type FaqView = Omit<FaqEntry, 'embedding'>;

/**
 * Outcome of one turn, worked out before anything is recorded.
 */
type TurnPlan =
  | { kind: 'decided'; decision: MatchDecision }
  | { kind: 'chosen'; entryId: string; candidates: ScoredCandidate[] }
  | { kind: 'unresolved'; candidates: ScoredCandidate[] };

export class ChatbotService {
  readonly id: string;
  private readonly index: FaqIndex;
  private readonly matcher: Matcher;
  private readonly sessions: SessionManager;
  private readonly formatter: ResponseFormatter;
  private details: Omit<BusinessProfile, 'faqs'> = { name: '', description: '' };

  constructor(id: string, encoder: IEncoder, options: ChatbotOptions = {}) {
    this.id = id;
    this.index = createFaqIndex(encoder);
    this.matcher = createMatcher(this.index, options.matcher);
    this.sessions = createSessionManager(options.session, options.clock);
    this.formatter = createResponseFormatter(options.formatter);

    if (options.autoExpireSessions) {
      this.sessions.startExpiryTimer();
    }
  }

  /**
   * Replace the chatbot's knowledge with `profile`.
   *
   * @returns Number of indexed FAQs
   * @throws IndexBuildError if any FAQ can't be indexed; the chatbot keeps
   *         serving its previous FAQs and profile details
   */
  async train(profile: BusinessProfile): Promise<number> {
    const entries = await this.index.rebuild(profile.faqs);
    this.details = {
      name: profile.name,
      description: profile.description,
      ...(profile.industry ? { industry: profile.industry } : {}),
    };
    console.log(`Chatbot ${this.id} trained: ${profile.name} (${entries.length} FAQs)`);
    return entries.length;
  }

  /**
   * Answer one user message.
   *
   * If the conversation has a pending clarification, the message is first
   * read as a choice between the offered questions. Otherwise (or if it
   * isn't a choice) it is matched as a fresh question.
   *
   * Never rejects: any failure is answered with the fallback message.
   */
  async handleMessage(message: string, conversationId?: string): Promise<ChatReply> {
    const session = this.sessions.getOrCreate(conversationId);
    const id = session.conversationId;

    let decision: MatchDecision;
    try {
      decision = await this.decideTurn(id, message);
    } catch (error) {
      console.error(`Chatbot ${this.id} failed to handle message:`, error);
      decision = { kind: 'no_match', reason: 'error' };
      this.sessions.recordTurn(id, decision);
    }

    const formatted = this.formatter.format(decision, (entryId) => this.index.get(entryId));
    return {
      conversationId: id,
      response: formatted.content,
      decision: decision.kind,
      pendingClarification: formatted.options,
    };
  }

  /**
   * Add one FAQ without retraining.
   */
  addFaq(input: FaqInput): Promise<FaqEntry> {
    return this.index.add(input);
  }

  /**
   * Change one FAQ; the question is re-embedded only if it changed.
   *
   * @returns null if no FAQ has this id
   */
  updateFaq(faqId: string, changes: FaqChanges): Promise<FaqEntry | null> {
    return this.index.update(faqId, changes);
  }

  /**
   * Remove one FAQ. Unknown ids are ignored.
   */
  removeFaq(faqId: string): Promise<boolean> {
    return this.index.remove(faqId);
  }

  /**
   * Re-embed everything with a different encoder.
   */
  setEncoder(encoder: IEncoder): Promise<void> {
    return this.index.setEncoder(encoder);
  }

  listFaqs(): FaqView[] {
    return this.index.entries().map(({ id, question, answer, tags }) => ({ id, question, answer, tags }));
  }

  /**
   * The profile as it stands now, including FAQs added or removed since training.
   */
  getProfile(): BusinessProfile {
    return {
      ...this.details,
      faqs: this.index.entries().map(({ question, answer, tags }) => ({ question, answer, tags: [...tags] })),
    };
  }

  exportProfile(now?: Date): PortableProfile {
    return exportProfile(this.getProfile(), now);
  }

  getSessions(): SessionManager {
    return this.sessions;
  }

  faqCount(): number {
    return this.index.size();
  }

  dispose(): void {
    this.sessions.stop();
  }

  private async decideTurn(conversationId: string, message: string): Promise<MatchDecision> {
    const pending = this.sessions.getPendingClarification(conversationId);
    const { timeoutMs } = this.matcher.getConfig();

    // One bound for the whole turn, follow-up reading included
    const plan = await withTimeout(this.planTurn(message, pending), timeoutMs, (): TurnPlan => {
      console.error(`Chatbot ${this.id} timed out after ${timeoutMs}ms`);
      return { kind: 'decided', decision: { kind: 'no_match', reason: 'timeout' } };
    });

    if (plan.kind === 'chosen') {
      const resolved = this.sessions.resolveClarification(conversationId, plan.entryId);
      if (resolved) {
        return resolved;
      }
    }

    if (plan.kind === 'decided') {
      this.sessions.recordTurn(conversationId, plan.decision);
      return plan.decision;
    }

    const abandoned = this.sessions.recordUnresolvedFollowUp(conversationId);
    if (abandoned) {
      return abandoned;
    }
    // Still within the allowed follow-ups: ask again
    const reoffer: MatchDecision = { kind: 'clarify', candidates: plan.candidates };
    this.sessions.recordReoffer(conversationId, reoffer);
    return reoffer;
  }

  /**
   * Work out the turn's outcome without touching session state, so a turn
   * that times out leaves nothing half-recorded.
   */
  private async planTurn(message: string, pending: ScoredCandidate[] | null): Promise<TurnPlan> {
    if (!pending) {
      return { kind: 'decided', decision: await this.matcher.evaluate(message) };
    }

    const chosen = await this.matcher.selectCandidate(message, pending);
    if (chosen) {
      return { kind: 'chosen', entryId: chosen, candidates: pending };
    }

    // Not a choice: maybe it's a new question
    const fresh = await this.matcher.evaluate(message);
    if (fresh.kind !== 'no_match') {
      return { kind: 'decided', decision: fresh };
    }
    return { kind: 'unresolved', candidates: pending };
  }
}

/**
 * Registry of independent chatbots, keyed by id.
 */
export class ChatbotRegistry {
  private readonly chatbots = new Map<string, ChatbotService>();
  private encoder: IEncoder;
  private readonly options: ChatbotOptions;

  constructor(encoder: IEncoder, options: ChatbotOptions = {}) {
    this.encoder = encoder;
    this.options = options;
  }

  get activeEncoder(): IEncoder {
    return this.encoder;
  }

  /**
   * Train a new chatbot and register it. Nothing is registered if training fails.
   */
  async create(profile: BusinessProfile, chatbotId: string = uuidv4()): Promise<ChatbotService> {
    const chatbot = new ChatbotService(chatbotId, this.encoder, this.options);
    try {
      await chatbot.train(profile);
    } catch (error) {
      chatbot.dispose();
      throw error;
    }
    this.chatbots.get(chatbotId)?.dispose();
    this.chatbots.set(chatbotId, chatbot);
    return chatbot;
  }

  /**
   * @throws ChatbotNotFoundError
   */
  get(chatbotId: string): ChatbotService {
    const chatbot = this.chatbots.get(chatbotId);
    if (!chatbot) {
      throw new ChatbotNotFoundError(chatbotId);
    }
    return chatbot;
  }

  has(chatbotId: string): boolean {
    return this.chatbots.has(chatbotId);
  }

  delete(chatbotId: string): boolean {
    const chatbot = this.chatbots.get(chatbotId);
    if (!chatbot) {
      return false;
    }
    chatbot.dispose();
    return this.chatbots.delete(chatbotId);
  }

  list(): ChatbotService[] {
    return [...this.chatbots.values()];
  }

  size(): number {
    return this.chatbots.size;
  }

  /**
   * Switch every chatbot to a new encoder, re-embedding all FAQs.
   * Chatbots that fail to re-embed keep the old encoder.
   *
   * @returns Ids of chatbots that could not switch
   */
  async setEncoder(encoder: IEncoder): Promise<string[]> {
    this.encoder = encoder;
    const failed: string[] = [];
    for (const chatbot of this.chatbots.values()) {
      try {
        await chatbot.setEncoder(encoder);
      } catch (error) {
        console.error(`Chatbot ${chatbot.id} kept its previous encoder:`, error);
        failed.push(chatbot.id);
      }
    }
    return failed;
  }

  dispose(): void {
    for (const chatbot of this.chatbots.values()) {
      chatbot.dispose();
    }
    this.chatbots.clear();
  }
}

export function createChatbotRegistry(encoder: IEncoder, options?: ChatbotOptions): ChatbotRegistry {
  return new ChatbotRegistry(encoder, options);
}
