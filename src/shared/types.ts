/**
 * Shared type definitions for the FAQ chatbot builder
 *
 * These types define the contract between the matching engine and
 * whatever renders the conversation. They're organized by domain:
 * - FAQs: Business data and indexed entries
 * - Matching: Per-query decisions
 * - Sessions: Conversation context
 * - Export: Portable profile record
 * - API: Request/response shapes
 */

// ============================================================================
// FAQ Types
// ============================================================================

/**
 * A question/answer pair as supplied by the business.
 * Tags are optional labels used for clarification follow-ups.
 */
export interface FaqInput {
    id?: string;
    question: string;
    answer: string;
    tags?: string[];
}

/**
 * An FAQ entry owned by the index, with its question embedding.
 * The embedding is recomputed whenever the question text changes.
 */
export interface FaqEntry {
    id: string;
    question: string;
    answer: string;
    tags: string[];
    embedding: number[];
}

/**
 * Everything a business hands in for one chatbot.
 * Replaced wholesale on every retrain.
 */
export interface BusinessProfile {
    name: string;
    description: string;
    industry?: string;
    faqs: FaqInput[];
}

// ============================================================================
// Matching Types
// ============================================================================

/**
 * A user utterance after normalization and encoding.
 * Lives for exactly one decision.
 */
export interface QueryContext {
    rawText: string;
    normalizedText: string;
    embedding: number[];
}

export interface ScoredCandidate {
    entryId: string;
    score: number;
}

export type NoMatchReason =
    | 'empty_index'
    | 'below_threshold'
    | 'encoding_error'
    | 'timeout'
    | 'unresolved_clarification'
    | 'error';

export interface AnsweredDecision {
    kind: 'answered';
    entryId: string;
    score: number;
}

export interface ClarifyDecision {
    kind: 'clarify';
    candidates: ScoredCandidate[];
}

export interface NoMatchDecision {
    kind: 'no_match';
    reason: NoMatchReason;
}

/**
 * Outcome of matching one query. Produced once, never mutated.
 */
export type MatchDecision = AnsweredDecision | ClarifyDecision | NoMatchDecision;

export type DecisionKind = MatchDecision['kind'];

// ============================================================================
// Session Types
// ============================================================================

export type SessionStatus = 'active' | 'expired';

/**
 * Per-conversation context carried between turns.
 */
export interface SessionState {
    conversationId: string;
    status: SessionStatus;
    lastDecision?: MatchDecision;
    /** Candidates offered in the last clarification prompt, best first */
    pendingClarification?: ScoredCandidate[];
    /** Follow-ups that failed to pick one of the pending candidates */
    unresolvedTurns: number;
    turnCount: number;
    history: MatchDecision[];
    createdAt: Date;
    lastActiveAt: Date;
}

// ============================================================================
// Export Types (JSON serialization)
// ============================================================================

export interface PortableFaq {
    question: string;
    answer: string;
    tags: string[];
}

/**
 * Portable chatbot configuration. Embeddings are never stored here;
 * they are recomputed from question text on import.
 */
export interface PortableProfile {
    business_name: string;
    description: string;
    industry?: string;
    faqs: PortableFaq[];
    metadata: {
        created_at: string; // ISO date
        version: string;
    };
}

// ============================================================================
// API Types
// ============================================================================

/**
 * Request body for POST /api/chatbots and PUT /api/chatbots/:id
 */
export interface TrainRequest {
    name: string;
    description?: string;
    industry?: string;
    includeIndustryFaqs?: boolean;
    faqs?: FaqInput[];
    /** FAQs as free text, one "Q: ... A: ..." pair per line */
    faqText?: string;
}

export interface TrainResponse {
    chatbotId: string;
    faqCount: number;
}

/**
 * Request body for POST /api/chatbots/:id/chat
 */
export interface ChatRequest {
    conversationId?: string;
    message: string;
}

/**
 * Response body for POST /api/chatbots/:id/chat
 */
export interface ChatReply {
    conversationId: string;
    response: string;
    decision: DecisionKind;
    /** Candidate questions the user can pick from, when clarifying */
    pendingClarification: ClarificationOption[] | null;
}

export interface ClarificationOption {
    entryId: string;
    question: string;
}

/**
 * Response body for GET /api/health
 */
export interface HealthResponse {
    status: 'ok' | 'error';
    encoder: string;
    encoderAvailable: boolean;
    chatbots: number;
}

/**
 * Result of query validation.
 * Invalid queries are rejected before processing.
 */
export interface ValidationResult {
    valid: boolean;
    error?: string;
}
