/**
 * Error types for the FAQ matching engine.
 *
 * Every failure the engine reports is one of these, so callers can branch
 * on `code` (or `instanceof`) instead of parsing messages.
 */

export enum ChatbotErrorCode {
    /** Input text was empty/oversized, or the encoder backend failed */
    ENCODING_FAILED = 'ENCODING_FAILED',
    /** An entry could not be indexed; the previous index is still active */
    INDEX_BUILD_FAILED = 'INDEX_BUILD_FAILED',
    /** A portable record was malformed */
    INVALID_SCHEMA = 'INVALID_SCHEMA',
    /** No chatbot is registered under the requested id */
    CHATBOT_NOT_FOUND = 'CHATBOT_NOT_FOUND',
}

/**
 * Base class for engine errors.
 */
export class ChatbotError extends Error {
    constructor(
        message: string,
        public readonly code: ChatbotErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'ChatbotError';
    }
}

export class EncodingError extends ChatbotError {
    constructor(message: string, cause?: Error) {
        super(message, ChatbotErrorCode.ENCODING_FAILED, cause);
        this.name = 'EncodingError';
    }
}

export class IndexBuildError extends ChatbotError {
    constructor(
        message: string,
        /** Position of the offending entry in the rebuild input, if any */
        public readonly position?: number,
        cause?: Error
    ) {
        super(message, ChatbotErrorCode.INDEX_BUILD_FAILED, cause);
        this.name = 'IndexBuildError';
    }
}

export class SchemaError extends ChatbotError {
    constructor(message: string, public readonly issues: string[] = []) {
        super(message, ChatbotErrorCode.INVALID_SCHEMA);
        this.name = 'SchemaError';
    }
}

export class ChatbotNotFoundError extends ChatbotError {
    constructor(chatbotId: string) {
        super(`Chatbot not found: ${chatbotId}`, ChatbotErrorCode.CHATBOT_NOT_FOUND);
        this.name = 'ChatbotNotFoundError';
    }
}

/**
 * Normalizes an unknown thrown value into an Error for `cause` fields.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
