/**
 * Ollama Client
 *
 * Embedding transport for a local Ollama instance. Only two endpoints are
 * used:
 * - POST /api/embed: batch embeddings (`input` is an array, one vector back per item)
 * - GET /api/tags: the pulled models, for health checks
 *
 * Every call is a single stateless HTTP request, so one client is shared by
 * all chatbots.
 */

export interface OllamaClientConfig {
    /** Base URL for the Ollama API */
    baseUrl: string;
    /** Embedding model; must already be pulled */
    embeddingModel: string;
    /** Per-request timeout for /api/embed */
    timeoutMs: number;
    /** Per-request timeout for /api/tags */
    healthTimeoutMs: number;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 30000,
    healthTimeoutMs: 5000,
};

export enum OllamaErrorCode {
    /** Nothing is listening at baseUrl */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    TIMEOUT = 'TIMEOUT',
    /** The embedding model hasn't been pulled */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Non-2xx status, or a body we can't read */
    API_ERROR = 'API_ERROR',
    UNKNOWN = 'UNKNOWN',
}

export class OllamaError extends Error {
    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'OllamaError';
    }
}

/**
 * What the encoder needs from Ollama. Tests hand in a stub.
 */
export interface IOllamaClient {
    /** true once Ollama answers and the embedding model is pulled */
    isAvailable(): Promise<boolean>;
    /** One vector per input text, in input order */
    embed(texts: string[]): Promise<number[][]>;
}

type BodyReader<T> = (body: unknown) => T | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null;
}

function isVector(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

const readEmbeddings: BodyReader<number[][]> = (body) => {
    const embeddings = isRecord(body) ? body.embeddings : undefined;
    if (!Array.isArray(embeddings)) {
        return undefined;
    }
    return embeddings.every(isVector) ? embeddings : undefined;
};

const readModelNames: BodyReader<string[]> = (body) => {
    const models = isRecord(body) ? body.models : undefined;
    if (!Array.isArray(models)) {
        return undefined;
    }
    return models.flatMap((model: unknown) =>
        isRecord(model) && typeof model.name === 'string' ? [model.name] : []
    );
};

/**
 * Ollama tags untagged pulls as ":latest", so "nomic-embed-text" and
 * "nomic-embed-text:latest" name the same model.
 */
export function sameModel(a: string, b: string): boolean {
    const withTag = (name: string) => (name.includes(':') ? name : `${name}:latest`);
    return withTag(a) === withTag(b);
}

export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    get model(): string {
        return this.config.embeddingModel;
    }

    async isAvailable(): Promise<boolean> {
        try {
            const models = await this.listModels();
            return models.some((name) => sameModel(name, this.config.embeddingModel));
        } catch (error) {
            console.error('Ollama health check failed:', error instanceof Error ? error.message : error);
            return false;
        }
    }

    /**
     * Names of the models pulled into this Ollama instance.
     *
     * @throws OllamaError
     */
    listModels(): Promise<string[]> {
        return this.call('GET', '/api/tags', undefined, this.config.healthTimeoutMs, readModelNames);
    }

    /**
     * Embed every text in one request.
     *
     * @throws OllamaError, including when the vector count doesn't match the input
     */
    async embed(texts: string[]): Promise<number[][]> {
        if (texts.length === 0) {
            return [];
        }
        const embeddings = await this.call(
            'POST',
            '/api/embed',
            { model: this.config.embeddingModel, input: texts },
            this.config.timeoutMs,
            readEmbeddings
        );
        if (embeddings.length !== texts.length) {
            throw new OllamaError(
                `Ollama returned ${embeddings.length} embeddings for ${texts.length} inputs`,
                OllamaErrorCode.API_ERROR
            );
        }
        return embeddings;
    }

    private async call<T>(
        method: 'GET' | 'POST',
        endpoint: string,
        payload: object | undefined,
        timeoutMs: number,
        read: BodyReader<T>
    ): Promise<T> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), timeoutMs);

        let response: Response;
        try {
            response = await fetch(`${this.config.baseUrl}${endpoint}`, {
                method,
                signal: controller.signal,
                ...(payload === undefined
                    ? {}
                    : { headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(payload) }),
            });
        } catch (error) {
            throw this.transportError(error, timeoutMs);
        } finally {
            clearTimeout(timer);
        }

        const body: unknown = await response.json().catch(() => undefined);

        if (!response.ok) {
            throw this.statusError(response.status, body);
        }

        const value = read(body);
        if (value === undefined) {
            throw new OllamaError(`Unexpected response body from ${endpoint}`, OllamaErrorCode.API_ERROR);
        }
        return value;
    }

    private transportError(error: unknown, timeoutMs: number): OllamaError {
        if (error instanceof Error && error.name === 'AbortError') {
            return new OllamaError(`Request timed out after ${timeoutMs}ms`, OllamaErrorCode.TIMEOUT, error);
        }
        if (error instanceof TypeError) {
            return new OllamaError(
                `Cannot reach Ollama at ${this.config.baseUrl}. Is \`ollama serve\` running?`,
                OllamaErrorCode.CONNECTION_REFUSED,
                error
            );
        }
        const cause = error instanceof Error ? error : undefined;
        return new OllamaError(`Ollama request failed: ${String(error)}`, OllamaErrorCode.UNKNOWN, cause);
    }

    private statusError(status: number, body: unknown): OllamaError {
        const detail = isRecord(body) && typeof body.error === 'string' ? body.error : `HTTP ${status}`;
        const model = this.config.embeddingModel;

        if (status === 404 || /model .*not found/i.test(detail)) {
            return new OllamaError(
                `Embedding model "${model}" is not pulled. Run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }
        return new OllamaError(`Ollama returned ${status}: ${detail}`, OllamaErrorCode.API_ERROR);
    }
}

export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
