/**
 * Enum Validator
 *
 * Validates that field values are in their allowed enum list.
 */

import type { FieldViolation, RequestRecord } from './required.js';

/**
 * Validate that field values are in their allowed enum lists
 *
 * Comparison is case-sensitive; callers normalize case before validating
 * where a field accepts either.
 *
 * @param record - The request body being validated
 * @param enumFields - Map of field names to their allowed values
 * @returns Array of violations (empty if valid)
 */
export function validateEnums(
    record: RequestRecord,
    enumFields: ReadonlyMap<string, readonly string[]>
): FieldViolation[] {
    const errors: FieldViolation[] = [];

    for (const [fieldName, value] of Object.entries(record)) {
        const allowedValues = enumFields.get(fieldName);
        if (!allowedValues || allowedValues.length === 0) {
            continue;
        }

        if (value === null || value === undefined) {
            continue;
        }

        if (typeof value !== 'string' || !allowedValues.includes(value)) {
            errors.push({
                field: fieldName,
                message: `Field '${fieldName}' value '${String(value)}' is not in allowed list: [${allowedValues.join(', ')}]`,
                code: 'INVALID_ENUM_VALUE',
            });
        }
    }

    return errors;
}
