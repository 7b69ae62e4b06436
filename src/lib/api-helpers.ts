import type { Context } from 'hono';

import { isHttpError, type ErrorDetails } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';

/**
 * API Request/Response Helpers
 *
 * Error envelope, status mapping and the app-level error handler.
 */

// ===========================
// Response Types & Interfaces
// ===========================

export interface ApiErrorResponse {
    success: false;
    error: string;
    error_code: ApiErrorCode | string;
    data?: ErrorDetails;
}

export enum ApiErrorCode {
    VALIDATION_ERROR = 'VALIDATION_ERROR',
    ENCODING_ERROR = 'ENCODING_ERROR',
    DECODING_ERROR = 'DECODING_ERROR',
    NOT_FOUND = 'NOT_FOUND',
    INTERNAL_ERROR = 'INTERNAL_ERROR',
    JSON_PARSE_ERROR = 'JSON_PARSE_ERROR',
    BODY_TOO_LARGE = 'BODY_TOO_LARGE',
}

// Status codes an error response may carry; anything else becomes 500
const ERROR_STATUSES = [400, 401, 403, 404, 405, 409, 413, 415, 422, 500, 501, 503] as const;

export type ErrorStatus = (typeof ERROR_STATUSES)[number];

export function toErrorStatus(statusCode: number): ErrorStatus {
    return ERROR_STATUSES.find((status) => status === statusCode) ?? 500;
}

// Error response helpers
export function createErrorResponse(
    c: Context,
    error: string,
    errorCode: ApiErrorCode | string,
    status: ErrorStatus = 400,
    data?: ErrorDetails
) {
    const response: ApiErrorResponse = {
        success: false,
        error,
        error_code: errorCode,
        ...(data && { data }),
    };
    return c.json(response, status);
}

/**
 * App-level error handler.
 *
 * HttpError instances keep their status, code, message and details.
 * Anything else is logged in full and answered with a generic 500.
 */
export function createInternalError(c: Context, error: unknown) {
    if (isHttpError(error)) {
        const status = toErrorStatus(error.statusCode);
        if (status >= 500) {
            logger.error('Request failed', { path: c.req.path, error: error.message, stack: error.stack });
        }
        return createErrorResponse(c, error.message, error.errorCode ?? ApiErrorCode.INTERNAL_ERROR, status, error.details);
    }

    logger.error('Unhandled error', {
        method: c.req.method,
        path: c.req.path,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
    });

    return createErrorResponse(c, 'Internal server error', ApiErrorCode.INTERNAL_ERROR, 500);
}
