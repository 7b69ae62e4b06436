/**
 * Barcode API - Main Entry Point
 *
 * Orchestrates server startup:
 * - Environment loading and validation
 * - HTTP server startup
 * - Graceful shutdown coordination
 */

import { loadEnv } from '@src/lib/env/load-env.js';
import { FORMAT_REGISTRY } from '@src/lib/barcode/format-registry.js';
import { logger } from '@src/lib/logger.js';
import { loadServiceConfig } from '@src/lib/service-config.js';
import { startHttpServer } from '@src/servers/http.js';

// Load environment-specific .env file
const envFile = process.env.NODE_ENV ? `.env.${process.env.NODE_ENV}` : '.env';
const env = loadEnv({ path: envFile });
logger.debug(env.found ? 'Loaded environment file' : 'Environment file not found', {
    path: env.path,
    loaded: env.loaded.length,
    skipped: env.skipped,
});

// Fails startup on invalid values
const config = loadServiceConfig();

logger.info('Starting barcode API', {
    nodeEnv: config.nodeEnv,
    host: config.host,
    port: config.port,
    maxUploadBytes: config.maxUploadBytes,
    formats: FORMAT_REGISTRY.ids().length,
});

const httpServer = startHttpServer(config, FORMAT_REGISTRY);

// Graceful shutdown
const gracefulShutdown = async () => {
    logger.info('Shutting down servers gracefully');

    try {
        await httpServer.stop();
        process.exit(0);
    } catch (error) {
        logger.error('Shutdown failed', { error: error instanceof Error ? error.message : String(error) });
        process.exit(1);
    }
};

process.on('SIGINT', () => void gracefulShutdown());
process.on('SIGTERM', () => void gracefulShutdown());

// Named export for testing
const app = httpServer.app;
export { app };
