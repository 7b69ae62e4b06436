/**
 * Request Body Parser Middleware
 *
 * Parses JSON request bodies and stores the result under
 * context.get('parsedBody') for route handlers to consume.
 *
 * Multipart bodies are left untouched for the route to read.
 * An empty body leaves parsedBody undefined.
 */

import type { Context, Next } from 'hono';

import { ApiErrorCode } from '@src/lib/api-helpers.js';
import { HttpErrors } from '@src/lib/errors/http-error.js';

export async function bodyParserMiddleware(context: Context, next: Next) {
    // Skip parsing if no body (GET, DELETE, etc.)
    if (context.req.method === 'GET' || context.req.method === 'DELETE' || context.req.method === 'HEAD') {
        return await next();
    }

    const contentType = (context.req.header('content-type') ?? '').toLowerCase();
    if (contentType.startsWith('multipart/')) {
        return await next();
    }

    const text = await context.req.text();
    if (text.trim().length === 0) {
        return await next();
    }

    let parsedBody: unknown;
    try {
        parsedBody = JSON.parse(text);
    } catch (error) {
        throw HttpErrors.badRequest('Invalid JSON body', ApiErrorCode.JSON_PARSE_ERROR, {
            reason: error instanceof Error ? error.message : String(error),
        });
    }

    context.set('parsedBody', parsedBody);
    return await next();
}
