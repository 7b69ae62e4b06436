/**
 * Constraints Validator
 *
 * Validates numeric ranges (minimum/maximum, exclusive minimum).
 */

import type { FieldViolation, RequestRecord } from './required.js';

export interface ConstraintInfo {
    minimum?: number;
    maximum?: number;
    /** Value must be strictly greater than this */
    exclusiveMinimum?: number;
}

/**
 * Validate that field values meet their constraint requirements
 *
 * Non-numeric values are skipped; the type validator reports those.
 *
 * @param record - The request body being validated
 * @param rangeFields - Map of field names to their constraint info
 * @returns Array of violations (empty if valid)
 */
export function validateConstraints(
    record: RequestRecord,
    rangeFields: ReadonlyMap<string, ConstraintInfo>
): FieldViolation[] {
    const errors: FieldViolation[] = [];

    if (rangeFields.size === 0) {
        return errors;
    }

    for (const [fieldName, value] of Object.entries(record)) {
        const constraints = rangeFields.get(fieldName);
        if (!constraints) {
            continue;
        }

        if (value === null || value === undefined) {
            continue;
        }

        if (typeof value === 'number' && !isNaN(value)) {
            if (constraints.exclusiveMinimum !== undefined && value <= constraints.exclusiveMinimum) {
                errors.push({
                    field: fieldName,
                    message: `Field '${fieldName}' value ${value} must be greater than ${constraints.exclusiveMinimum}`,
                    code: 'VALUE_NOT_POSITIVE',
                });
            }

            if (constraints.minimum !== undefined && value < constraints.minimum) {
                errors.push({
                    field: fieldName,
                    message: `Field '${fieldName}' value ${value} is less than minimum ${constraints.minimum}`,
                    code: 'VALUE_BELOW_MINIMUM',
                });
            }

            if (constraints.maximum !== undefined && value > constraints.maximum) {
                errors.push({
                    field: fieldName,
                    message: `Field '${fieldName}' value ${value} is greater than maximum ${constraints.maximum}`,
                    code: 'VALUE_ABOVE_MAXIMUM',
                });
            }
        }
    }

    return errors;
}
