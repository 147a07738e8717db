/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration and route handlers
 * - services/: Matching engine (FaqIndex, Matcher, SessionManager, ...)
 * - encoders/: Text → vector adapters (hashing, Ollama)
 * - clients/: External service clients (OllamaClient)
 *
 * When run directly, this file loads configuration, initializes the
 * encoder once, and starts the server. The encoder is released on
 * SIGINT/SIGTERM.
 */

import { loadConfig, loadEnvFile, AppConfig } from './config';
import { createEncoder } from './encoders';
import { createApp, startServer } from './server';
import { createChatbotRegistry, loadIndustryFaqs } from './services';

// Re-export server components
export {
    createApp,
    startServer,
    ApiError,
    DEFAULT_SERVER_CONFIG,
} from './server';

export type { ServerConfig } from './server';

export * from './services';
export * from './encoders';
export { loadConfig, loadEnvFile } from './config';
export type { AppConfig, EncoderSettings, EncoderKind } from './config';

export {
    OllamaClient,
    createOllamaClient,
    sameModel,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
} from './clients/ollamaClient';

export type { OllamaClientConfig, IOllamaClient } from './clients/ollamaClient';

/**
 * Boot the service: encoder init, registry, HTTP server, shutdown hooks.
 */
export async function main(config: AppConfig): Promise<void> {
    const encoder = createEncoder(config.encoder);
    await encoder.init();

    const registry = createChatbotRegistry(encoder, {
        matcher: config.matcher,
        session: config.session,
        formatter: config.formatter,
        autoExpireSessions: true,
    });

    const app = createApp({
        port: config.port,
        corsOrigin: config.corsOrigin,
        dataDir: config.dataDir,
        maxQueryLength: config.encoder.maxInputLength,
        registry,
        industryFaqs: loadIndustryFaqs(),
    });
    const server = await startServer(app, config.port);

    const shutdown = (signal: string) => {
        console.log(`${signal} received, shutting down`);
        server.close();
        registry.dispose();
        encoder
            .dispose()
            .catch((error: Error) => console.error('Failed to release encoder:', error))
            .finally(() => process.exit(0));
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

// Main entry point - start server when run directly
if (require.main === module) {
    loadEnvFile();

    main(loadConfig())
        .then(() => {
            console.log('Server started successfully');
        })
        .catch((error: Error) => {
            console.error('Failed to start server:', error);
            process.exit(1);
        });
}
