/**
 * Backend services
 *
 * Core business logic components:
 * - FaqIndex: Embedded FAQ entries with exact cosine search
 * - Matcher: Answer / clarify / no-match decisions
 * - SessionManager: Per-conversation context and clarification state
 * - ProfileBridge: Portable export format, FAQ text parsing, industry starters
 * - ResponseFormatter: Decision → user-visible text
 * - ChatbotService: One trained chatbot; ChatbotRegistry holds many
 * - QueryProcessor: Request validation
 */

export {
    ChatbotError,
    ChatbotErrorCode,
    EncodingError,
    IndexBuildError,
    SchemaError,
    ChatbotNotFoundError,
} from './errors';

export {
    FaqIndex,
    createFaqIndex,
    cosineSimilarity,
    normalizeTags,
} from './faqIndex';

export type { IFaqIndex, SearchResult, FaqChanges } from './faqIndex';

export {
    Matcher,
    createMatcher,
    classify,
    withTimeout,
    DEFAULT_MATCHER_CONFIG,
} from './matcher';

export type { MatcherConfig, IMatcher } from './matcher';

export {
    SessionManager,
    createSessionManager,
    DEFAULT_SESSION_CONFIG,
} from './sessionManager';

export type { SessionManagerConfig, ISessionManager, Clock } from './sessionManager';

export {
    exportProfile,
    importProfile,
    serializeProfile,
    parseProfileJson,
    saveProfileToFile,
    loadProfileFromFile,
    parseFaqText,
    loadIndustryFaqs,
    withIndustryFaqs,
    EXPORT_FORMAT_VERSION,
    DEFAULT_INDUSTRY_FAQS_PATH,
} from './profileBridge';

export type { IndustryFaqTable } from './profileBridge';

export {
    ResponseFormatter,
    createResponseFormatter,
    formatDecision,
    formatClarification,
    buildClarificationOptions,
    DEFAULT_FORMATTER_CONFIG,
} from './responseFormatter';

export type {
    FormattedResponse,
    FormatterConfig,
    IResponseFormatter,
    EntryLookup,
} from './responseFormatter';

export {
    ChatbotService,
    ChatbotRegistry,
    createChatbotRegistry,
} from './chatbotService';

export type { ChatbotOptions, FaqView } from './chatbotService';

export {
    validateQuery,
    buildProfileFromRequest,
    parseFaqInput,
    parseFaqChanges,
} from './queryProcessor';
