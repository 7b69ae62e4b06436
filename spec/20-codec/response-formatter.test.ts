import { describe, it, expect } from 'vitest';

import {
    dataHash,
    downloadFilename,
    formatFile,
    formatInline,
    formatScanReport,
} from '@src/lib/barcode/response-formatter.js';
import type { EncodedImage, FormatId } from '@src/lib/barcode/types.js';

function image(format: FormatId, data: string, bytes = Buffer.from([1, 2, 3])): EncodedImage {
    return { bytes, format, data, mimeType: 'image/png' };
}

describe('Response formatter', () => {
    describe('download file names', () => {
        it('should hash data to 16 hex characters', () => {
            expect(dataHash('hello')).toBe('2cf24dba5fb0a30e');
            expect(dataHash('hello')).toBe(dataHash('hello'));
        });

        it('should use filename-safe barcode data as-is', () => {
            expect(downloadFilename(image('code128', 'TEST-1.2_3'))).toBe('code128_TEST-1.2_3.png');
        });

        it('should hash barcode data that is not filename-safe', () => {
            expect(downloadFilename(image('code128', 'a/b c'))).toBe(`code128_${dataHash('a/b c')}.png`);
        });

        it('should always hash QR payloads', () => {
            expect(downloadFilename(image('qrcode', 'hello'))).toBe('qrcode_2cf24dba5fb0a30e.png');
        });
    });

    describe('inline', () => {
        it('should embed the PNG as base64', () => {
            expect(formatInline(image('ean8', '1234567'))).toEqual({
                success: true,
                format: 'ean8',
                data: '1234567',
                image_base64: 'AQID',
                message: 'Barcode generated successfully',
            });
        });

        it('should name QR codes in the message', () => {
            expect(formatInline(image('qrcode', 'x')).message).toBe('QR code generated successfully');
        });
    });

    describe('file', () => {
        it('should return the bytes with download headers', () => {
            const file = formatFile(image('upc', '12345678901'));

            expect([...new Uint8Array(file.body)]).toEqual([1, 2, 3]);
            expect(file.headers).toEqual({
                'Content-Type': 'image/png',
                'Content-Length': '3',
                'Content-Disposition': 'attachment; filename=upc_12345678901.png',
            });
        });

        it('should copy bytes out of a shared buffer', () => {
            const pooled = Buffer.from([9, 9, 1, 2, 9]).subarray(2, 4);
            const file = formatFile(image('code128', 'A', pooled));

            expect(file.body.byteLength).toBe(2);
            expect([...new Uint8Array(file.body)]).toEqual([1, 2]);
        });
    });

    describe('scan reports', () => {
        it('should describe an empty scan', () => {
            expect(formatScanReport({ count: 0, results: [] })).toEqual({
                success: true,
                codes_found: 0,
                results: [],
                message: 'No codes found in image',
            });
        });

        it('should count found codes', () => {
            const result = { decoded_text: 'A', symbol_type: 'CODE_128', quality: null, polygon: [] };
            expect(formatScanReport({ count: 2, results: [result, result] }).message).toBe('Found 2 code(s) in image');
        });
    });
});
