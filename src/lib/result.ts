/**
 * Explicit success/failure values returned across dispatcher boundaries.
 *
 * Library calls that throw are caught where they are made and turned into
 * a `{ success: false, error }` value, so callers can tell the failure
 * categories apart without inspecting thrown objects.
 */

export type Result<T, E extends Error = Error> =
    | { success: true; value: T }
    | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
    return { success: true, value };
}

export function fail<E extends Error>(error: E): { success: false; error: E } {
    return { success: false, error };
}

/**
 * Unwrap a result, throwing its error.
 * Route handlers use this; the app-level error handler maps the error to a response.
 */
export function unwrap<T, E extends Error>(result: Result<T, E>): T {
    if (!result.success) {
        throw result.error;
    }
    return result.value;
}
