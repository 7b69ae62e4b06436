/**
 * Context Initializer Middleware
 *
 * Attaches the shared, read-only format registry to every request so route
 * handlers resolve formats through `context.get('formats')` instead of a
 * module import.
 */

import type { Context, MiddlewareHandler, Next } from 'hono';

import type { FormatRegistry } from '@src/lib/barcode/format-registry.js';

declare module 'hono' {
    interface ContextVariableMap {
        formats: FormatRegistry;
        parsedBody: unknown;
    }
}

export function contextInitializerMiddleware(registry: FormatRegistry): MiddlewareHandler {
    return async (context: Context, next: Next) => {
        context.set('formats', registry);
        await next();
    };
}
