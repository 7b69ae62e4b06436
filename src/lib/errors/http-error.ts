/**
 * HttpError - Structured HTTP error handling for API responses
 *
 * Separates business logic errors from HTTP transport concerns.
 * Business logic returns or throws semantic errors, the app-level error
 * handler maps them onto status codes and the JSON error envelope.
 *
 * Error taxonomy:
 * - ValidationError (400): request input is malformed
 * - EncodingError (400): input was well-formed but the symbology encoder rejected it
 * - DecodingError (400): uploaded bytes are not a decodable image, or a payload is not text
 * - anything else (500): unexpected, sanitized before it reaches the client
 */

export type ErrorDetails = Record<string, unknown>;

export class HttpError extends Error {
    public readonly name: string = 'HttpError';

    constructor(
        public readonly statusCode: number,
        message: string,
        public readonly errorCode?: string,
        public readonly details?: ErrorDetails
    ) {
        super(message);

        // Maintain proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Client input is malformed. Raised before any library call.
 */
export class ValidationError extends HttpError {
    public readonly name: string = 'ValidationError';

    constructor(message: string, details?: ErrorDetails) {
        super(400, message, 'VALIDATION_ERROR', details);
    }
}

/**
 * The symbology or QR encoder refused the (already validated) data.
 * Carries the original data, format and the library's own message.
 */
export class EncodingError extends HttpError {
    public readonly name: string = 'EncodingError';

    constructor(
        public readonly data: string,
        public readonly format: string,
        public readonly reason: string
    ) {
        super(400, `Invalid data '${data}' for format '${format}': ${reason}`, 'ENCODING_ERROR', {
            data,
            format,
            reason,
        });
    }
}

/**
 * Uploaded bytes could not be decoded, or a detected payload was not valid text.
 */
export class DecodingError extends HttpError {
    public readonly name: string = 'DecodingError';

    constructor(message: string, details?: ErrorDetails) {
        super(400, message, 'DECODING_ERROR', details);
    }
}

/**
 * Factory methods for common HTTP error scenarios
 */
export class HttpErrors {
    static badRequest(message: string, errorCode = 'BAD_REQUEST', details?: ErrorDetails) {
        return new HttpError(400, message, errorCode, details);
    }

    static notFound(message = 'Not found', errorCode = 'NOT_FOUND') {
        return new HttpError(404, message, errorCode);
    }
}

/**
 * Type guard for HttpError instances
 */
export function isHttpError(error: unknown): error is HttpError {
    return error instanceof HttpError;
}
