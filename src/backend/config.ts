/**
 * Application configuration
 *
 * Every tunable the engine uses is read here, once, from the environment.
 * Values that fail to parse fall back to their defaults.
 */

import * as path from 'path';
import dotenv from 'dotenv';
import { DEFAULT_MAX_INPUT_LENGTH } from './encoders/encoder';
import { DEFAULT_HASHING_CONFIG } from './encoders/hashingEncoder';
import { DEFAULT_OLLAMA_CONFIG } from './clients/ollamaClient';
import { DEFAULT_MATCHER_CONFIG, MatcherConfig } from './services/matcher';
import { DEFAULT_SESSION_CONFIG, SessionManagerConfig } from './services/sessionManager';
import { DEFAULT_FORMATTER_CONFIG, FormatterConfig } from './services/responseFormatter';

export type EncoderKind = 'hashing' | 'ollama';

export interface EncoderSettings {
    kind: EncoderKind;
    maxInputLength: number;
    hashingDimension: number;
    ollamaBaseUrl: string;
    ollamaEmbeddingModel: string;
    ollamaTimeoutMs: number;
}

export interface AppConfig {
    port: number;
    corsOrigin: string;
    /** Where exported profiles are written */
    dataDir: string;
    encoder: EncoderSettings;
    matcher: MatcherConfig;
    session: SessionManagerConfig;
    formatter: FormatterConfig;
}

type Env = Record<string, string | undefined>;

/**
 * Load a .env file into process.env. Call once at startup, before loadConfig().
 */
export function loadEnvFile(envPath?: string): void {
    dotenv.config(envPath ? { path: envPath } : undefined);
}

function readString(env: Env, key: string, fallback: string): string {
    return env[key]?.trim() || fallback;
}

function readNumber(env: Env, key: string, fallback: number, min: number, max: number): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isFinite(n)) {
        console.error(`Ignoring ${key}=${raw}: not a number, using ${fallback}`);
        return fallback;
    }
    return Math.min(max, Math.max(min, n));
}

function readInteger(env: Env, key: string, fallback: number, min: number, max: number): number {
    return Math.floor(readNumber(env, key, fallback, min, max));
}

function readEncoderKind(env: Env): EncoderKind {
    const raw = (env.ENCODER ?? '').trim().toLowerCase();
    if (raw === '' || raw === 'hashing') return 'hashing';
    if (raw === 'ollama') return 'ollama';
    throw new Error(`Unknown ENCODER "${raw}". Supported encoders: hashing, ollama`);
}

/**
 * Build the configuration from an environment map.
 *
 * @param env - Defaults to process.env; tests pass a plain object
 */
export function loadConfig(env: Env = process.env): AppConfig {
    return {
        port: readInteger(env, 'PORT', 3001, 0, 65535),
        corsOrigin: readString(env, 'CORS_ORIGIN', '*'),
        dataDir: readString(env, 'DATA_DIR', path.join(process.cwd(), 'data')),
        encoder: {
            kind: readEncoderKind(env),
            maxInputLength: readInteger(env, 'MAX_INPUT_LENGTH', DEFAULT_MAX_INPUT_LENGTH, 1, 100000),
            hashingDimension: readInteger(env, 'HASHING_DIMENSION', DEFAULT_HASHING_CONFIG.dimension, 8, 65536),
            ollamaBaseUrl: readString(env, 'OLLAMA_BASE_URL', DEFAULT_OLLAMA_CONFIG.baseUrl),
            ollamaEmbeddingModel: readString(env, 'OLLAMA_EMBEDDING_MODEL', DEFAULT_OLLAMA_CONFIG.embeddingModel),
            ollamaTimeoutMs: readInteger(env, 'OLLAMA_TIMEOUT_MS', DEFAULT_OLLAMA_CONFIG.timeoutMs, 100, 600000),
        },
        matcher: {
            answerThreshold: readNumber(env, 'ANSWER_THRESHOLD', DEFAULT_MATCHER_CONFIG.answerThreshold, -1, 1),
            marginThreshold: readNumber(env, 'MARGIN_THRESHOLD', DEFAULT_MATCHER_CONFIG.marginThreshold, 0, 2),
            clarifyThreshold: readNumber(env, 'CLARIFY_THRESHOLD', DEFAULT_MATCHER_CONFIG.clarifyThreshold, -1, 1),
            candidateCount: readInteger(env, 'CANDIDATE_COUNT', DEFAULT_MATCHER_CONFIG.candidateCount, 1, 20),
            timeoutMs: readInteger(env, 'MATCH_TIMEOUT_MS', DEFAULT_MATCHER_CONFIG.timeoutMs, 1, 600000),
        },
        session: {
            maxClarificationTurns: readInteger(
                env,
                'MAX_CLARIFICATION_TURNS',
                DEFAULT_SESSION_CONFIG.maxClarificationTurns,
                1,
                100
            ),
            idleTimeoutMs: readInteger(
                env,
                'SESSION_IDLE_TIMEOUT_MS',
                DEFAULT_SESSION_CONFIG.idleTimeoutMs,
                1000,
                7 * 24 * 60 * 60 * 1000
            ),
        },
        formatter: {
            ...DEFAULT_FORMATTER_CONFIG,
            fallbackMessage: readString(env, 'FALLBACK_MESSAGE', DEFAULT_FORMATTER_CONFIG.fallbackMessage),
        },
    };
}
