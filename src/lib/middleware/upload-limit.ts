/**
 * Upload size limit for multipart routes.
 */

import type { MiddlewareHandler } from 'hono';
import { bodyLimit } from 'hono/body-limit';

import { ApiErrorCode, createErrorResponse } from '@src/lib/api-helpers.js';

export function uploadLimitMiddleware(maxSize: number): MiddlewareHandler {
    return bodyLimit({
        maxSize,
        onError: (c) =>
            createErrorResponse(c, `Upload exceeds ${maxSize} bytes`, ApiErrorCode.BODY_TOO_LARGE, 413, {
                max_bytes: maxSize,
            }),
    });
}
