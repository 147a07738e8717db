/**
 * Express Server Configuration and Routes
 *
 * This is the HTTP layer of the FAQ chatbot backend.
 * It exposes REST endpoints for:
 * - Health checks (encoder availability)
 * - Training and retraining chatbots from business profiles
 * - Chat interactions (matching and clarification)
 * - Single FAQ maintenance
 * - Export / import of the portable profile record
 *
 * ARCHITECTURE NOTES:
 * - Routes only validate and delegate; chatbots live in the ChatbotRegistry
 * - CORS is enabled for whatever UI embeds the chatbot
 * - Error handling middleware maps engine errors to status codes
 */

import * as path from 'path';
import type { Server } from 'http';
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import multer from 'multer';
import {
    ChatRequest,
    HealthResponse,
    TrainResponse,
} from '../../shared/types';
import { IEncoder } from '../encoders/encoder';
import {
    ChatbotRegistry,
    ChatbotOptions,
    ChatbotError,
    ChatbotErrorCode,
    IndustryFaqTable,
    buildProfileFromRequest,
    createChatbotRegistry,
    importProfile,
    parseFaqChanges,
    parseFaqInput,
    parseProfileJson,
    saveProfileToFile,
    validateQuery,
} from '../services';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin?: string;
    /** Directory for saved exports */
    dataDir: string;
    /** Longest accepted chat message */
    maxQueryLength?: number;
    /** Shared encoder (required unless a registry is injected) */
    encoder?: IEncoder;
    /** Per-chatbot settings for chatbots this server creates */
    chatbotOptions?: ChatbotOptions;
    /** Chatbot registry instance (for dependency injection) */
    registry?: ChatbotRegistry;
    /** Industry starter FAQs offered to training requests */
    industryFaqs?: IndustryFaqTable;
    /** Largest accepted JSON body or uploaded export file, in bytes */
    maxUploadBytes?: number;
}

export const DEFAULT_MAX_UPLOAD_BYTES = 2 * 1024 * 1024;

/**
 * body-parser marks an oversized body with this type (and status 413).
 */
function isOversizedBody(err: Error): boolean {
    return 'type' in err && err.type === 'entity.too.large';
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 3001,
    corsOrigin: '*',
    dataDir: path.join(process.cwd(), 'data'),
};

/**
 * Custom error class for API errors.
 * Includes HTTP status code for proper response handling.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

const STATUS_BY_CODE: Record<ChatbotErrorCode, number> = {
    [ChatbotErrorCode.INVALID_SCHEMA]: 400,
    [ChatbotErrorCode.CHATBOT_NOT_FOUND]: 404,
    [ChatbotErrorCode.INDEX_BUILD_FAILED]: 422,
    [ChatbotErrorCode.ENCODING_FAILED]: 422,
};

function requireParam(req: Request, name: string): string {
    const value = req.params[name];
    if (!value) {
        throw new ApiError(`${name} is required`, 400, 'MISSING_PARAMETER');
    }
    return value;
}

/**
 * Creates and configures the Express application.
 *
 * @param config - Server configuration options
 * @returns Configured Express application
 */
export function createApp(config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    let registry: ChatbotRegistry;
    if (mergedConfig.registry) {
        registry = mergedConfig.registry;
    } else if (mergedConfig.encoder) {
        registry = createChatbotRegistry(mergedConfig.encoder, mergedConfig.chatbotOptions);
    } else {
        throw new Error('createApp needs either an encoder or a chatbot registry');
    }

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'PUT', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    const maxUploadBytes = mergedConfig.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;

    app.use(express.json({ limit: maxUploadBytes }));

    // Export files can be uploaded as multipart/form-data; keep them in memory
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: maxUploadBytes,
        },
    });

    app.use((req: Request, _res: Response, next: NextFunction) => {
        console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * Reports whether the encoder can serve requests. Returns 503 when it
     * can't, so load balancers stop routing chat traffic here.
     */
    app.get('/api/health', async (_req: Request, res: Response) => {
        const encoder = registry.activeEncoder;
        let encoderAvailable = false;
        try {
            encoderAvailable = await encoder.isAvailable();
        } catch (error) {
            console.error('Health check error:', error);
        }

        const response: HealthResponse = {
            status: encoderAvailable ? 'ok' : 'error',
            encoder: encoder.name,
            encoderAvailable,
            chatbots: registry.size(),
        };
        res.status(encoderAvailable ? 200 : 503).json(response);
    });

    // =========================================================================
    // Training Endpoints
    // =========================================================================

    /**
     * POST /api/chatbots
     *
     * Create and train a chatbot from a business profile.
     */
    app.post('/api/chatbots', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const profile = buildProfileFromRequest(req.body, mergedConfig.industryFaqs);
            const chatbot = await registry.create(profile);

            const response: TrainResponse = {
                chatbotId: chatbot.id,
                faqCount: chatbot.faqCount(),
            };
            res.status(201).json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * PUT /api/chatbots/:id
     *
     * Retrain an existing chatbot wholesale. On failure the chatbot keeps
     * answering from its previous FAQs.
     */
    app.put('/api/chatbots/:id', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            const profile = buildProfileFromRequest(req.body, mergedConfig.industryFaqs);
            const faqCount = await chatbot.train(profile);

            const response: TrainResponse = { chatbotId: chatbot.id, faqCount };
            res.json(response);
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /api/chatbots/:id
     */
    app.get('/api/chatbots/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            const { name, description, industry } = chatbot.getProfile();
            res.json({
                chatbotId: chatbot.id,
                name,
                description,
                industry,
                faqs: chatbot.listFaqs(),
            });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/chatbots/:id
     */
    app.delete('/api/chatbots/:id', (req: Request, res: Response, next: NextFunction) => {
        try {
            const id = requireParam(req, 'id');
            if (!registry.delete(id)) {
                throw new ApiError('Chatbot not found', 404, ChatbotErrorCode.CHATBOT_NOT_FOUND);
            }
            res.json({ success: true });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // FAQ Endpoints
    // =========================================================================

    /**
     * POST /api/chatbots/:id/faqs
     *
     * Add one FAQ without retraining.
     */
    app.post('/api/chatbots/:id/faqs', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            const { id, question, answer, tags } = await chatbot.addFaq(parseFaqInput(req.body));
            res.status(201).json({ faq: { id, question, answer, tags } });
        } catch (error) {
            next(error);
        }
    });

    /**
     * PUT /api/chatbots/:id/faqs/:faqId
     */
    app.put('/api/chatbots/:id/faqs/:faqId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            const updated = await chatbot.updateFaq(requireParam(req, 'faqId'), parseFaqChanges(req.body));
            if (!updated) {
                throw new ApiError('FAQ not found', 404, 'FAQ_NOT_FOUND');
            }
            const { id, question, answer, tags } = updated;
            res.json({ faq: { id, question, answer, tags } });
        } catch (error) {
            next(error);
        }
    });

    /**
     * DELETE /api/chatbots/:id/faqs/:faqId
     *
     * Idempotent: removing an unknown FAQ succeeds with removed=false.
     */
    app.delete('/api/chatbots/:id/faqs/:faqId', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            const removed = await chatbot.removeFaq(requireParam(req, 'faqId'));
            res.json({ success: true, removed });
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Chat Endpoint
    // =========================================================================

    /**
     * POST /api/chatbots/:id/chat
     *
     * Send a message and receive the matched answer, a clarification
     * prompt, or the fallback message.
     */
    app.post('/api/chatbots/:id/chat', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            const { conversationId, message } = req.body as Partial<ChatRequest>;

            const validation = validateQuery(message, mergedConfig.maxQueryLength);
            if (!validation.valid || typeof message !== 'string') {
                res.status(400).json({
                    error: validation.error,
                    code: 'INVALID_QUERY',
                });
                return;
            }
            if (conversationId !== undefined && typeof conversationId !== 'string') {
                res.status(400).json({
                    error: 'conversationId must be a string',
                    code: 'INVALID_CONVERSATION_ID',
                });
                return;
            }

            res.json(await chatbot.handleMessage(message, conversationId));
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Export / Import Endpoints
    // =========================================================================

    /**
     * GET /api/chatbots/:id/export
     *
     * Download the portable profile record.
     */
    app.get('/api/chatbots/:id/export', (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            res.setHeader('Content-Disposition', `attachment; filename="chatbot-${chatbot.id}.json"`);
            res.json(chatbot.exportProfile());
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/chatbots/:id/export/file
     *
     * Save the portable record under the data directory.
     */
    app.post('/api/chatbots/:id/export/file', async (req: Request, res: Response, next: NextFunction) => {
        try {
            const chatbot = registry.get(requireParam(req, 'id'));
            const filePath = path.join(mergedConfig.dataDir, 'exports', `chatbot-${chatbot.id}.json`);
            await saveProfileToFile(filePath, chatbot.getProfile());
            res.status(201).json({ path: filePath });
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /api/chatbots/import
     *
     * Create a chatbot from a portable record, sent either as the JSON body
     * or as a multipart upload in the `file` field. Embeddings are always
     * recomputed.
     */
    app.post('/api/chatbots/import', upload.single('file'), async (req: Request, res: Response, next: NextFunction) => {
        try {
            const profile = req.file
                ? parseProfileJson(req.file.buffer.toString('utf-8'))
                : importProfile(req.body);
            const chatbot = await registry.create(profile);

            const response: TrainResponse = {
                chatbotId: chatbot.id,
                faqCount: chatbot.faqCount(),
            };
            res.status(201).json(response);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling Middleware
    // =========================================================================

    /**
     * Global error handler.
     *
     * Engine errors carry a code that maps to a status; anything else is a
     * 500 with a generic message so internals don't leak.
     */
    app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof ApiError) {
            res.status(err.statusCode).json({
                error: err.message,
                code: err.code,
            });
            return;
        }

        if (err instanceof ChatbotError) {
            res.status(STATUS_BY_CODE[err.code]).json({
                error: err.message,
                code: err.code,
            });
            return;
        }

        if ((err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE') || isOversizedBody(err)) {
            res.status(413).json({
                error: `Upload exceeds the ${maxUploadBytes} byte limit`,
                code: 'PAYLOAD_TOO_LARGE',
            });
            return;
        }

        if (err instanceof multer.MulterError) {
            res.status(400).json({
                error: err.message,
                code: 'INVALID_UPLOAD',
            });
            return;
        }

        if (err instanceof SyntaxError) {
            res.status(400).json({
                error: 'Request body is not valid JSON',
                code: 'INVALID_JSON',
            });
            return;
        }

        console.error('Unhandled error:', err);
        res.status(500).json({
            error: 'Internal server error',
        });
    });

    return app;
}

/**
 * Starts the Express server.
 *
 * @param app - The Express application to start
 * @param port - Port to listen on
 * @returns The listening HTTP server, once it is accepting connections
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port
): Promise<Server> {
    return new Promise((resolve) => {
        const server = app.listen(port, () => {
            console.log(`FAQ chatbot server running on port ${port}`);
            console.log(`Health check: http://localhost:${port}/api/health`);
            resolve(server);
        });
    });
}
