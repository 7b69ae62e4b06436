/**
 * Response Formatter
 *
 * Frames an EncodedImage either as a base64 JSON body or as a PNG download.
 * Pixel content is never touched here.
 */

import { createHash } from 'crypto';

import type { EncodedImage, GenerationResponse, ScanReport, ScanResponse } from './types.js';

const SAFE_FILENAME_DATA = /^[A-Za-z0-9._-]+$/;

export interface FileResponse {
    body: ArrayBuffer;
    headers: Record<string, string>;
}

/**
 * Stable 16 hex character digest of the encoded text
 */
export function dataHash(data: string): string {
    return createHash('sha256').update(data, 'utf8').digest('hex').slice(0, 16);
}

/**
 * `<format>_<data-or-hash>.png`. QR payloads always use the hash; barcode
 * data is used as-is only when it is filename-safe.
 */
export function downloadFilename(image: EncodedImage): string {
    const useData = image.format !== 'qrcode' && SAFE_FILENAME_DATA.test(image.data);
    return `${image.format}_${useData ? image.data : dataHash(image.data)}.png`;
}

export function generationMessage(image: EncodedImage): string {
    return image.format === 'qrcode' ? 'QR code generated successfully' : 'Barcode generated successfully';
}

export function formatInline(image: EncodedImage): GenerationResponse {
    return {
        success: true,
        format: image.format,
        data: image.data,
        image_base64: image.bytes.toString('base64'),
        message: generationMessage(image),
    };
}

export function formatFile(image: EncodedImage): FileResponse {
    // Copy into a standalone ArrayBuffer; Buffer views may share a pooled one
    const body = new ArrayBuffer(image.bytes.byteLength);
    new Uint8Array(body).set(image.bytes);

    return {
        body,
        headers: {
            'Content-Type': image.mimeType,
            'Content-Length': String(image.bytes.byteLength),
            'Content-Disposition': `attachment; filename=${downloadFilename(image)}`,
        },
    };
}

export function formatScanReport(report: ScanReport): ScanResponse {
    return {
        success: true,
        codes_found: report.count,
        results: report.results,
        message: report.count === 0 ? 'No codes found in image' : `Found ${report.count} code(s) in image`,
    };
}
