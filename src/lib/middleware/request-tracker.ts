/**
 * Request Tracking Middleware
 *
 * Logs every request on completion with method, path, status and duration.
 */

import type { Context, Next } from 'hono';

import { logger } from '@src/lib/logger.js';

const log = logger.child('http');

export async function requestTrackerMiddleware(context: Context, next: Next) {
    const startTime = process.hrtime.bigint();

    await next();

    log.time('Request completed', startTime, {
        method: context.req.method,
        path: context.req.path,
        status: context.res.status,
    });
}
