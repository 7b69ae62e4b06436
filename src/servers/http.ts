/**
 * HTTP Server
 *
 * Hono-based HTTP API for barcode/QR generation and scanning.
 * Served on Node through @hono/node-server.
 */

import { serve, type ServerType } from '@hono/node-server';
import { Hono } from 'hono';

import { createInternalError } from '@src/lib/api-helpers.js';
import { FORMAT_REGISTRY, type FormatRegistry } from '@src/lib/barcode/format-registry.js';
import { DEFAULT_MAX_UPLOAD_BYTES } from '@src/lib/constants.js';
import { HttpErrors } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import type { ServiceConfig } from '@src/lib/service-config.js';

// Middleware
import * as middleware from '@src/lib/middleware/index.js';

// Public endpoints
import RootGet from '@src/routes/root/GET.js';
import HealthGet from '@src/routes/health/GET.js';
import FormatsGet from '@src/routes/formats/GET.js';

// Generation endpoints
import GeneratePost from '@src/routes/generate/POST.js';
import GenerateImagePost from '@src/routes/generate/image/POST.js';
import GenerateQuickGet from '@src/routes/generate/quick/GET.js';
import CreateBarcodePost from '@src/routes/create-barcode/POST.js';
import CreateQrCodePost from '@src/routes/create-qr-code/POST.js';

// Scanning
import ScanImagePost from '@src/routes/scan-image/POST.js';

const log = logger.child('http');

export interface HttpAppOptions {
    maxUploadBytes?: number;
}

/**
 * Create and configure the Hono HTTP app
 */
export function createHttpApp(registry: FormatRegistry = FORMAT_REGISTRY, options: HttpAppOptions = {}): Hono {
    const app = new Hono();
    const maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;

    // Request logging (first, so it sees the final status)
    app.use('*', middleware.requestTrackerMiddleware);
    app.use('*', middleware.contextInitializerMiddleware(registry));

    // Upload limit before any multipart parsing; JSON parsing everywhere else
    app.use('/scan-image', middleware.uploadLimitMiddleware(maxUploadBytes));
    app.use('*', middleware.bodyParserMiddleware);

    // Public endpoints
    app.get('/', RootGet);
    app.get('/health', HealthGet);
    app.get('/formats', FormatsGet);
    app.get('/supported-formats', FormatsGet);

    // Generation
    app.post('/generate', GeneratePost);
    app.post('/generate/image', GenerateImagePost);
    app.get('/generate/quick', GenerateQuickGet);
    app.post('/create-barcode', CreateBarcodePost);
    app.post('/create-qr-code', CreateQrCodePost);

    // Scanning
    app.post('/scan-image', ScanImagePost);

    // Error handling
    app.onError((err, c) => createInternalError(c, err));

    // 404 handler
    app.notFound((c) => createInternalError(c, HttpErrors.notFound()));

    return app;
}

export interface HttpServerHandle {
    app: Hono;
    server: ServerType;
    stop: () => Promise<void>;
}

/**
 * Start the HTTP server
 */
export function startHttpServer(
    config: Pick<ServiceConfig, 'port' | 'host' | 'maxUploadBytes'>,
    registry: FormatRegistry = FORMAT_REGISTRY
): HttpServerHandle {
    const app = createHttpApp(registry, { maxUploadBytes: config.maxUploadBytes });

    const server = serve({ fetch: app.fetch, port: config.port, hostname: config.host }, (info) => {
        log.info('HTTP server running', { port: info.port, url: `http://localhost:${info.port}` });
    });

    return {
        app,
        server,
        stop: () =>
            new Promise<void>((resolve, reject) => {
                server.close((error) => {
                    if (error) {
                        reject(error);
                        return;
                    }
                    log.info('HTTP server stopped');
                    resolve();
                });
            }),
    };
}
