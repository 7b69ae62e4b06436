/**
 * Required Field Validator
 *
 * Validates that all required fields are present and non-null.
 * Returns array of violations for missing required fields.
 */

export interface FieldViolation {
    field: string;
    message: string;
    code: string;
}

export type RequestRecord = Record<string, unknown>;

/**
 * Validate that all required fields are present and have non-null values
 *
 * @param record - The request body being validated
 * @param requiredFields - Set of field names that are required
 * @returns Array of violations (empty if valid)
 */
export function validateRequired(record: RequestRecord, requiredFields: ReadonlySet<string>): FieldViolation[] {
    const errors: FieldViolation[] = [];

    for (const fieldName of requiredFields) {
        const value = record[fieldName];

        if (value === null || value === undefined) {
            errors.push({
                field: fieldName,
                message: `Field '${fieldName}' is required but missing or null`,
                code: 'REQUIRED_FIELD_MISSING',
            });
        }
    }

    return errors;
}
