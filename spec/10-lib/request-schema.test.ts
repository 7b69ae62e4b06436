import { describe, it, expect } from 'vitest';

import { FORMAT_REGISTRY } from '@src/lib/barcode/format-registry.js';
import {
    checkDataShape,
    isTruthyFlag,
    parseBarcodeRequest,
    parseQrCodeRequest,
    parseReturnFormat,
    quickRequestBody,
} from '@src/lib/barcode/request-schema.js';
import type { BarcodeRequest, QrCodeRequest } from '@src/lib/barcode/types.js';
import { ValidationError } from '@src/lib/errors/http-error.js';
import type { Result } from '@src/lib/result.js';

function parseBarcode(body: unknown): Result<BarcodeRequest, ValidationError> {
    return parseBarcodeRequest(body, FORMAT_REGISTRY);
}

function expectValid<T>(result: Result<T, ValidationError>): T {
    if (!result.success) {
        throw new Error(`Expected a valid request but got: ${result.error.message}`);
    }
    return result.value;
}

function expectInvalid<T>(result: Result<T, ValidationError>): ValidationError {
    if (result.success) {
        throw new Error('Expected a validation error');
    }
    expect(result.error).toBeInstanceOf(ValidationError);
    return result.error;
}

function violationCodes(error: ValidationError): unknown[] {
    const violations = error.details?.validation_errors;
    return Array.isArray(violations) ? violations.map((violation) => violation.code) : [];
}

describe('parseBarcodeRequest', () => {
    describe('defaults', () => {
        it('should trim data and apply default styling', () => {
            const request = expectValid(parseBarcode({ data: '  TEST123  ', format: 'code128' }));

            expect(request).toEqual({
                kind: 'barcode',
                data: 'TEST123',
                format: 'code128',
                styling: {
                    width: 2,
                    height: 15,
                    quietZone: 6.5,
                    fontSize: 10,
                    textDistance: 5,
                    background: 'ffffff',
                    foreground: '000000',
                },
                returnFormat: 'inline',
            });
        });

        it('should accept qrcode as a barcode format', () => {
            expect(expectValid(parseBarcode({ data: 'hello', format: 'qrcode' })).format).toBe('qrcode');
        });
    });

    describe('data', () => {
        it('should reject whitespace-only data', () => {
            expect(expectInvalid(parseBarcode({ data: '   ', format: 'code128' })).message).toBe('data cannot be empty');
        });

        it('should reject missing data', () => {
            expect(expectInvalid(parseBarcode({ format: 'code128' })).message).toBe(
                "Field 'data' is required but missing or null"
            );
        });

        it('should reject a body that is not an object', () => {
            expect(expectInvalid(parseBarcode('code128')).message).toBe('Request body must be an object');
            expect(expectInvalid(parseBarcode(undefined)).message).toBe('Request body must be an object');
            expect(expectInvalid(parseBarcode([1, 2])).message).toBe('Request body must be an object');
        });
    });

    describe('format', () => {
        it('should reject formats outside the registry', () => {
            const error = expectInvalid(parseBarcode({ data: 'x', format: 'aztec' }));
            expect(error.message).toBe('unsupported format');
            expect(violationCodes(error)).toEqual(['UNSUPPORTED_FORMAT']);
        });

        it('should reject a missing format', () => {
            expect(expectInvalid(parseBarcode({ data: 'x' })).message).toBe(
                "Field 'format' is required but missing or null"
            );
        });
    });

    describe('fixed-length data', () => {
        it('should accept 12 digits for ean13', () => {
            expect(expectValid(parseBarcode({ data: '123456789012', format: 'ean13' })).data).toBe('123456789012');
        });

        it('should reject short ean13 data with the expected length', () => {
            const error = expectInvalid(parseBarcode({ data: '12345', format: 'ean13' }));
            expect(error.message).toBe('invalid data length/format for ean13');
            expect(error.details).toEqual({
                format: 'ean13',
                expected_length: 12,
                actual_length: 5,
                numeric_only: true,
            });
        });

        it('should accept 11 digits for upc and reject letters', () => {
            expect(expectValid(parseBarcode({ data: '12345678901', format: 'upc' })).format).toBe('upc');
            expect(expectInvalid(parseBarcode({ data: '1234567890A', format: 'upc' })).message).toBe(
                'invalid data length/format for upc'
            );
        });

        it('should leave variable-length formats alone', () => {
            expect(checkDataShape('ABC', 'code128')).toBeUndefined();
            expect(checkDataShape('1234567', 'ean8')).toBeUndefined();
            expect(checkDataShape('123456789', 'isbn10')).toBeUndefined();
        });
    });

    describe('styling', () => {
        it('should accept font sizes at both bounds', () => {
            expect(expectValid(parseBarcode({ data: 'A', format: 'code128', font_size: 1 })).styling.fontSize).toBe(1);
            expect(expectValid(parseBarcode({ data: 'A', format: 'code128', font_size: 100 })).styling.fontSize).toBe(100);
        });

        it('should reject font sizes outside 1..100', () => {
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', font_size: 0 })).message).toBe(
                "Field 'font_size' value 0 is less than minimum 1"
            );
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', font_size: 101 })).message).toBe(
                "Field 'font_size' value 101 is greater than maximum 100"
            );
        });

        it('should reject a fractional font size', () => {
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', font_size: 10.5 })).message).toBe(
                "Field 'font_size' expected integer but got 10.5"
            );
        });

        it('should require positive dimensions', () => {
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', width: 0 })).message).toBe(
                "Field 'width' value 0 must be greater than 0"
            );
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', quiet_zone: -1 })).message).toBe(
                "Field 'quiet_zone' value -1 must be greater than 0"
            );
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', height: 'tall' })).message).toBe(
                "Field 'height' expected number but got string"
            );
        });

        it('should cap dimensions', () => {
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', width: 21 })).message).toBe(
                "Field 'width' value 21 is greater than maximum 20"
            );
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', height: 201 })).message).toBe(
                "Field 'height' value 201 is greater than maximum 200"
            );
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', quiet_zone: 101 })).message).toBe(
                "Field 'quiet_zone' value 101 is greater than maximum 100"
            );
            const { styling } = expectValid(
                parseBarcode({ data: 'A', format: 'code128', width: 20, height: 200, quiet_zone: 100, text_distance: 100 })
            );
            expect(styling.width).toBe(20);
            expect(styling.height).toBe(200);
        });

        it('should keep explicit dimensions', () => {
            const { styling } = expectValid(
                parseBarcode({ data: 'A', format: 'code128', width: 3, height: 20, quiet_zone: 2, text_distance: 1 })
            );
            expect(styling.width).toBe(3);
            expect(styling.height).toBe(20);
            expect(styling.quietZone).toBe(2);
            expect(styling.textDistance).toBe(1);
        });

        it('should normalize colours and prefer the long field names', () => {
            const { styling } = expectValid(
                parseBarcode({
                    data: 'A',
                    format: 'code128',
                    background_color: '#FFF',
                    background: 'blue',
                    foreground: 'navy',
                })
            );
            expect(styling.background).toBe('ffffff');
            expect(styling.foreground).toBe('000080');
        });

        it('should reject unknown colours naming the field', () => {
            expect(
                expectInvalid(parseBarcode({ data: 'A', format: 'code128', foreground_color: 'notacolor' })).message
            ).toBe("Field 'foreground_color' value 'notacolor' is not a recognized color");
        });

        it('should report every violation in order', () => {
            const error = expectInvalid(parseBarcode({ data: '', format: 'aztec', width: 0 }));
            expect(error.message).toBe('data cannot be empty');
            expect(violationCodes(error)).toEqual(['DATA_EMPTY', 'VALUE_NOT_POSITIVE', 'UNSUPPORTED_FORMAT']);
        });
    });

    describe('return format', () => {
        it('should map aliases to canonical values', () => {
            expect(expectValid(parseBarcode({ data: 'A', format: 'code128', return_format: 'base64' })).returnFormat).toBe('inline');
            expect(expectValid(parseBarcode({ data: 'A', format: 'code128', return_format: 'image' })).returnFormat).toBe('file');
            expect(expectValid(parseBarcode({ data: 'A', format: 'code128', return_format: 'file' })).returnFormat).toBe('file');
        });

        it('should reject unknown return formats', () => {
            expect(expectInvalid(parseBarcode({ data: 'A', format: 'code128', return_format: 'pdf' })).message).toBe(
                "Field 'return_format' value 'pdf' is not in allowed list: [inline, base64, file, image]"
            );
        });

        it('should fall back to the caller default', () => {
            const request = expectValid(parseBarcodeRequest({ data: 'A', format: 'code128' }, FORMAT_REGISTRY, 'file'));
            expect(request.returnFormat).toBe('file');
            expect(parseReturnFormat(undefined)).toBe('inline');
            expect(parseReturnFormat(42, 'file')).toBe('file');
        });
    });
});

describe('parseQrCodeRequest', () => {
    function parseQr(body: unknown): Result<QrCodeRequest, ValidationError> {
        return parseQrCodeRequest(body);
    }

    it('should apply QR defaults', () => {
        expect(expectValid(parseQr({ data: ' hello ' }))).toEqual({
            kind: 'qrcode',
            data: 'hello',
            version: undefined,
            errorCorrection: 'M',
            boxSize: 10,
            border: 4,
            fill: '000000',
            back: 'ffffff',
            returnFormat: 'inline',
        });
    });

    it('should accept error correction in any case', () => {
        expect(expectValid(parseQr({ data: 'x', error_correction: 'h' })).errorCorrection).toBe('H');
        expect(expectInvalid(parseQr({ data: 'x', error_correction: 'x' })).message).toBe(
            "Field 'error_correction' value 'X' is not in allowed list: [L, M, Q, H]"
        );
    });

    it('should bound the version to 1..40', () => {
        expect(expectValid(parseQr({ data: 'x', version: 5 })).version).toBe(5);
        expect(expectInvalid(parseQr({ data: 'x', version: 0 })).message).toBe(
            "Field 'version' value 0 is less than minimum 1"
        );
        expect(expectInvalid(parseQr({ data: 'x', version: 41 })).message).toBe(
            "Field 'version' value 41 is greater than maximum 40"
        );
    });

    it('should bound box size and border', () => {
        expect(expectInvalid(parseQr({ data: 'x', box_size: 0 })).message).toBe(
            "Field 'box_size' value 0 is less than minimum 1"
        );
        expect(expectInvalid(parseQr({ data: 'x', box_size: 101 })).message).toBe(
            "Field 'box_size' value 101 is greater than maximum 100"
        );
        expect(expectInvalid(parseQr({ data: 'x', border: -1 })).message).toBe(
            "Field 'border' value -1 is less than minimum 0"
        );
        expect(expectValid(parseQr({ data: 'x', border: 0 })).border).toBe(0);
        expect(expectValid(parseQr({ data: 'x', border: 100 })).border).toBe(100);
        expect(expectInvalid(parseQr({ data: 'x', border: 101 })).message).toBe(
            "Field 'border' value 101 is greater than maximum 100"
        );
    });

    it('should normalize fill and back colours', () => {
        const request = expectValid(parseQr({ data: 'x', fill_color: '#FF0000', back_color: 'yellow' }));
        expect(request.fill).toBe('ff0000');
        expect(request.back).toBe('ffff00');
        expect(expectInvalid(parseQr({ data: 'x', back_color: 'nope' })).message).toBe(
            "Field 'back_color' value 'nope' is not a recognized color"
        );
    });

    it('should not accept object property names as colours', () => {
        expect(expectInvalid(parseQr({ data: 'x', fill_color: 'constructor' })).message).toBe(
            "Field 'fill_color' value 'constructor' is not a recognized color"
        );
        expect(expectInvalid(parseQr({ data: 'x', back_color: '__proto__' })).message).toBe(
            "Field 'back_color' value '__proto__' is not a recognized color"
        );
    });

    it('should reject empty data', () => {
        expect(expectInvalid(parseQr({ data: '' })).message).toBe('data cannot be empty');
    });
});

describe('quick query helpers', () => {
    it('should default the quick format to code128', () => {
        expect(quickRequestBody({ data: 'A1' })).toEqual({ data: 'A1', format: 'code128' });
        expect(quickRequestBody({ data: 'A1', format: 'ean8' })).toEqual({ data: 'A1', format: 'ean8' });
    });

    it('should read truthy query flags', () => {
        expect(isTruthyFlag('TRUE')).toBe(true);
        expect(isTruthyFlag('1')).toBe(true);
        expect(isTruthyFlag('yes')).toBe(true);
        expect(isTruthyFlag('no')).toBe(false);
        expect(isTruthyFlag(undefined)).toBe(false);
    });
});
