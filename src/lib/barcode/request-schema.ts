/**
 * Request Schema & Validator
 *
 * Accepted request shapes for barcode generation, QR generation and the
 * quick query-string path. Rejects malformed input with a field-specific
 * message before any encoder runs.
 *
 * Symbology rules (checksums, exact encodability) are left to the encoder;
 * the only data-shape rule enforced here is the fixed-length digit pre-check.
 */

import {
    BARCODE_DIMENSION_MAX,
    DEFAULT_BARCODE_STYLING,
    DEFAULT_QR_OPTIONS,
    FONT_SIZE_MAX,
    FONT_SIZE_MIN,
    QR_BORDER_MAX,
    QR_BOX_SIZE_MAX,
    QR_VERSION_MAX,
    QR_VERSION_MIN,
} from '@src/lib/constants.js';
import { ValidationError } from '@src/lib/errors/http-error.js';
import { fail, ok, type Result } from '@src/lib/result.js';
import {
    validateConstraints,
    validateEnums,
    validateRequired,
    validateTypes,
    type ConstraintInfo,
    type FieldType,
    type FieldViolation,
    type RequestRecord,
} from '@src/lib/validators/index.js';
import { normalizeColor } from './colors.js';
import type { FormatRegistry } from './format-registry.js';
import {
    ERROR_CORRECTION_LEVELS,
    type BarcodeRequest,
    type FormatId,
    type QrCodeRequest,
    type ReturnFormat,
} from './types.js';

/**
 * Exact digit counts checked before encoding. The encoder appends the
 * check digit itself.
 */
export const FIXED_LENGTH_FORMATS: Readonly<Partial<Record<FormatId, number>>> = Object.freeze({
    ean8: 7,
    ean13: 12,
    upc: 11,
    isbn10: 9,
    isbn13: 12,
});

const RETURN_FORMAT_ALIASES: Readonly<Record<string, ReturnFormat>> = Object.freeze({
    inline: 'inline',
    base64: 'inline',
    file: 'file',
    image: 'file',
});

interface FieldRule {
    type?: FieldType;
    required?: boolean;
    constraints?: ConstraintInfo;
    enum?: readonly string[];
}

interface CompiledRules {
    required: ReadonlySet<string>;
    types: ReadonlyMap<string, FieldType>;
    constraints: ReadonlyMap<string, ConstraintInfo>;
    enums: ReadonlyMap<string, readonly string[]>;
}

function compileRules(rules: Readonly<Record<string, FieldRule>>): CompiledRules {
    const required = new Set<string>();
    const types = new Map<string, FieldType>();
    const constraints = new Map<string, ConstraintInfo>();
    const enums = new Map<string, readonly string[]>();

    for (const [field, rule] of Object.entries(rules)) {
        if (rule.required) required.add(field);
        if (rule.type) types.set(field, rule.type);
        if (rule.constraints) constraints.set(field, rule.constraints);
        if (rule.enum) enums.set(field, rule.enum);
    }

    return { required, types, constraints, enums };
}

function positiveUpTo(maximum: number): ConstraintInfo {
    return { exclusiveMinimum: 0, maximum };
}

const COLOR_FIELDS = {
    barcode: ['background_color', 'foreground_color', 'background', 'foreground'],
    qrcode: ['fill_color', 'back_color'],
} as const;

const BARCODE_RULES = compileRules({
    data: { type: 'text', required: true },
    format: { type: 'text', required: true },
    width: { type: 'numeric', constraints: positiveUpTo(BARCODE_DIMENSION_MAX.width) },
    height: { type: 'numeric', constraints: positiveUpTo(BARCODE_DIMENSION_MAX.height) },
    quiet_zone: { type: 'numeric', constraints: positiveUpTo(BARCODE_DIMENSION_MAX.quietZone) },
    text_distance: { type: 'numeric', constraints: positiveUpTo(BARCODE_DIMENSION_MAX.textDistance) },
    font_size: { type: 'integer', constraints: { minimum: FONT_SIZE_MIN, maximum: FONT_SIZE_MAX } },
    background_color: { type: 'text' },
    foreground_color: { type: 'text' },
    background: { type: 'text' },
    foreground: { type: 'text' },
    return_format: { enum: Object.keys(RETURN_FORMAT_ALIASES) },
});

const QR_RULES = compileRules({
    data: { type: 'text', required: true },
    version: { type: 'integer', constraints: { minimum: QR_VERSION_MIN, maximum: QR_VERSION_MAX } },
    error_correction: { enum: ERROR_CORRECTION_LEVELS },
    box_size: { type: 'integer', constraints: { minimum: 1, maximum: QR_BOX_SIZE_MAX } },
    border: { type: 'integer', constraints: { minimum: 0, maximum: QR_BORDER_MAX } },
    fill_color: { type: 'text' },
    back_color: { type: 'text' },
    return_format: { enum: Object.keys(RETURN_FORMAT_ALIASES) },
});

function isRecord(value: unknown): value is RequestRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function checkRules(record: RequestRecord, rules: CompiledRules): FieldViolation[] {
    return [
        ...validateRequired(record, rules.required),
        ...validateTypes(record, rules.types),
        ...validateConstraints(record, rules.constraints),
        ...validateEnums(record, rules.enums),
    ];
}

function checkData(record: RequestRecord): FieldViolation[] {
    const { data } = record;
    if (typeof data === 'string' && data.trim().length === 0) {
        return [{ field: 'data', message: 'data cannot be empty', code: 'DATA_EMPTY' }];
    }
    return [];
}

function checkColors(record: RequestRecord, fields: readonly string[]): FieldViolation[] {
    const errors: FieldViolation[] = [];
    for (const field of fields) {
        const value = record[field];
        if (typeof value === 'string' && normalizeColor(value) === undefined) {
            errors.push({
                field,
                message: `Field '${field}' value '${value}' is not a recognized color`,
                code: 'INVALID_COLOR',
            });
        }
    }
    return errors;
}

function toValidationError(violations: FieldViolation[]): ValidationError {
    return new ValidationError(violations[0].message, { validation_errors: violations });
}

function optionalNumber(record: RequestRecord, field: string, fallback: number): number {
    const value = record[field];
    return typeof value === 'number' ? value : fallback;
}

function optionalColor(record: RequestRecord, fields: readonly string[], fallback: string): string {
    for (const field of fields) {
        const value = record[field];
        if (typeof value === 'string') {
            const color = normalizeColor(value);
            if (color) return color;
        }
    }
    // Fallbacks are constants that always resolve
    return normalizeColor(fallback) ?? '000000';
}

/**
 * Map a requested return format (or its alias) to the canonical value
 */
export function parseReturnFormat(value: unknown, fallback: ReturnFormat = 'inline'): ReturnFormat {
    if (typeof value !== 'string') {
        return fallback;
    }
    return RETURN_FORMAT_ALIASES[value] ?? fallback;
}

/**
 * Fixed-length digit pre-check for the formats listed in FIXED_LENGTH_FORMATS.
 * Formats not in the table always pass.
 */
export function checkDataShape(data: string, format: FormatId): ValidationError | undefined {
    const length = FIXED_LENGTH_FORMATS[format];
    if (length === undefined) {
        return undefined;
    }

    if (data.length !== length || !/^\d+$/.test(data)) {
        return new ValidationError(`invalid data length/format for ${format}`, {
            format,
            expected_length: length,
            actual_length: data.length,
            numeric_only: true,
        });
    }

    return undefined;
}

/**
 * Validate a barcode generation body.
 *
 * A body whose format is `qrcode` is accepted too; its background and
 * foreground colours become the QR back and fill colours.
 */
export function parseBarcodeRequest(
    body: unknown,
    registry: FormatRegistry,
    fallbackReturnFormat: ReturnFormat = 'inline'
): Result<BarcodeRequest, ValidationError> {
    if (!isRecord(body)) {
        return fail(new ValidationError('Request body must be an object'));
    }

    const violations = [...checkData(body), ...checkRules(body, BARCODE_RULES)];

    const { data, format } = body;
    if (typeof format === 'string' && !registry.has(format)) {
        violations.push({
            field: 'format',
            message: 'unsupported format',
            code: 'UNSUPPORTED_FORMAT',
        });
    }

    violations.push(...checkColors(body, COLOR_FIELDS.barcode));

    if (violations.length > 0) {
        return fail(toValidationError(violations));
    }

    // The rules above already reject these; narrowed for the compiler
    if (typeof data !== 'string' || typeof format !== 'string' || !registry.has(format)) {
        return fail(new ValidationError('data and format are required'));
    }

    const trimmed = data.trim();
    const shapeError = checkDataShape(trimmed, format);
    if (shapeError) {
        return fail(shapeError);
    }

    return ok({
        kind: 'barcode',
        data: trimmed,
        format,
        styling: {
            width: optionalNumber(body, 'width', DEFAULT_BARCODE_STYLING.width),
            height: optionalNumber(body, 'height', DEFAULT_BARCODE_STYLING.height),
            quietZone: optionalNumber(body, 'quiet_zone', DEFAULT_BARCODE_STYLING.quietZone),
            fontSize: optionalNumber(body, 'font_size', DEFAULT_BARCODE_STYLING.fontSize),
            textDistance: optionalNumber(body, 'text_distance', DEFAULT_BARCODE_STYLING.textDistance),
            background: optionalColor(body, ['background_color', 'background'], DEFAULT_BARCODE_STYLING.background),
            foreground: optionalColor(body, ['foreground_color', 'foreground'], DEFAULT_BARCODE_STYLING.foreground),
        },
        returnFormat: parseReturnFormat(body.return_format, fallbackReturnFormat),
    });
}

/**
 * Validate a QR code generation body
 */
export function parseQrCodeRequest(
    body: unknown,
    fallbackReturnFormat: ReturnFormat = 'inline'
): Result<QrCodeRequest, ValidationError> {
    if (!isRecord(body)) {
        return fail(new ValidationError('Request body must be an object'));
    }

    // Error correction level is case-insensitive on input
    const level = body.error_correction;
    const record: RequestRecord = typeof level === 'string' ? { ...body, error_correction: level.toUpperCase() } : body;

    const violations = [...checkData(record), ...checkRules(record, QR_RULES), ...checkColors(record, COLOR_FIELDS.qrcode)];

    if (violations.length > 0) {
        return fail(toValidationError(violations));
    }

    const { data, version } = record;
    if (typeof data !== 'string') {
        return fail(new ValidationError('data is required'));
    }

    const errorCorrection = ERROR_CORRECTION_LEVELS.find((level) => level === record.error_correction);

    return ok({
        kind: 'qrcode',
        data: data.trim(),
        version: typeof version === 'number' ? version : undefined,
        errorCorrection: errorCorrection ?? DEFAULT_QR_OPTIONS.errorCorrection,
        boxSize: optionalNumber(record, 'box_size', DEFAULT_QR_OPTIONS.boxSize),
        border: optionalNumber(record, 'border', DEFAULT_QR_OPTIONS.border),
        fill: optionalColor(record, ['fill_color'], DEFAULT_QR_OPTIONS.fill),
        back: optionalColor(record, ['back_color'], DEFAULT_QR_OPTIONS.back),
        returnFormat: parseReturnFormat(record.return_format, fallbackReturnFormat),
    });
}

/**
 * Build a barcode body from the quick-generate query string.
 * Styling is left to the defaults.
 */
export function quickRequestBody(query: Record<string, string | undefined>): RequestRecord {
    return {
        data: query.data,
        format: query.format ?? 'code128',
    };
}

/**
 * Query flag parsing for `return_image`
 */
export function isTruthyFlag(value: string | undefined): boolean {
    return value !== undefined && ['true', '1', 'yes'].includes(value.toLowerCase());
}
