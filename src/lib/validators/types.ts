/**
 * Type Validator
 *
 * Validates that request field values match their declared types.
 * Supports: text, numeric, integer.
 */

import type { FieldViolation, RequestRecord } from './required.js';

export type FieldType = 'text' | 'numeric' | 'integer';

/**
 * Validate that field values match their declared types
 *
 * @param record - The request body being validated
 * @param typedFields - Map of field names to their declared type
 * @returns Array of violations (empty if valid)
 */
export function validateTypes(record: RequestRecord, typedFields: ReadonlyMap<string, FieldType>): FieldViolation[] {
    const errors: FieldViolation[] = [];

    // Iterate only over fields present in the record
    for (const [fieldName, value] of Object.entries(record)) {
        const type = typedFields.get(fieldName);
        if (!type) {
            continue;
        }

        // Allow null/undefined for optional fields (required validator handles this)
        if (value === null || value === undefined) {
            continue;
        }

        const error = validateScalarType(value, type);
        if (error) {
            errors.push({
                field: fieldName,
                message: `Field '${fieldName}' ${error}`,
                code: 'INVALID_TYPE',
            });
        }
    }

    return errors;
}

/**
 * Validate a single value against its expected type
 * @returns Error message if invalid, null if valid
 */
export function validateScalarType(value: unknown, type: FieldType): string | null {
    switch (type) {
        case 'text':
            if (typeof value !== 'string') {
                return `expected string but got ${typeof value}`;
            }
            return null;

        case 'integer':
            if (typeof value !== 'number' || !Number.isInteger(value)) {
                return `expected integer but got ${describeValue(value)}`;
            }
            return null;

        case 'numeric':
            if (typeof value !== 'number' || isNaN(value)) {
                return `expected number but got ${typeof value}`;
            }
            if (!isFinite(value)) {
                return `expected finite number but got ${value}`;
            }
            return null;
    }
}

function describeValue(value: unknown): string {
    return typeof value === 'number' ? String(value) : typeof value;
}
