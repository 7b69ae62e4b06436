/**
 * Decoding Dispatcher
 *
 * Scans an uploaded image for barcodes and QR codes:
 * 1. reject uploads not declared as images
 * 2. decode with sharp, flattened onto white and reduced to one grey channel
 * 3. run the zxing reader once over the whole image
 * 4. normalize each detection into a ScanResult
 *
 * Finding nothing is a successful, empty report.
 */

import {
    BarcodeFormat,
    BinaryBitmap,
    ChecksumException,
    DecodeHintType,
    FormatException,
    HybridBinarizer,
    MultiFormatReader,
    NotFoundException,
    RGBLuminanceSource,
    type Result as ZxingResult,
} from '@zxing/library';
import sharp from 'sharp';

import { DecodingError, ValidationError } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import { fail, ok, type Result } from '@src/lib/result.js';
import type { ScanReport, ScanResult, ScanUpload } from './types.js';

const log = logger.child('decoder');

/** Grey raster, one byte per pixel */
export interface GrayRaster {
    luminance: Uint8ClampedArray;
    width: number;
    height: number;
}

/**
 * Raw detection as the detector hands it over, before normalization
 */
export interface RawDetection {
    text: string;
    format: string;
    points: ReadonlyArray<{ x: number; y: number }>;
    quality?: number;
}

export type Detector = (raster: GrayRaster) => RawDetection[];

export function isImageContentType(contentType: string | undefined): boolean {
    return contentType !== undefined && contentType.toLowerCase().startsWith('image/');
}

/**
 * Decode image bytes into a single-channel raster.
 * Throws when the bytes are not an image sharp can read.
 */
export async function toGrayRaster(bytes: Uint8Array): Promise<GrayRaster> {
    const { data, info } = await sharp(bytes)
        .flatten({ background: '#ffffff' })
        .grayscale()
        .raw()
        .toBuffer({ resolveWithObject: true });

    const { width, height, channels } = info;
    const luminance = new Uint8ClampedArray(width * height);
    for (let i = 0; i < luminance.length; i++) {
        luminance[i] = data[i * channels];
    }

    return { luminance, width, height };
}

function isNoSymbol(error: unknown): boolean {
    return (
        error instanceof NotFoundException ||
        error instanceof ChecksumException ||
        error instanceof FormatException
    );
}

function toRawDetection(result: ZxingResult): RawDetection {
    return {
        text: result.getText(),
        format: BarcodeFormat[result.getBarcodeFormat()],
        points: result.getResultPoints().map((point) => ({ x: point.getX(), y: point.getY() })),
    };
}

/**
 * Run the zxing multi-format reader over the whole raster.
 * The reader reports at most one symbol per pass.
 */
export function zxingDetector(raster: GrayRaster): RawDetection[] {
    const source = new RGBLuminanceSource(raster.luminance, raster.width, raster.height);
    const bitmap = new BinaryBitmap(new HybridBinarizer(source));
    const hints = new Map<DecodeHintType, unknown>([[DecodeHintType.TRY_HARDER, true]]);
    const reader = new MultiFormatReader();

    try {
        return [toRawDetection(reader.decode(bitmap, hints))];
    } catch (error) {
        if (isNoSymbol(error)) {
            return [];
        }
        throw error;
    }
}

/**
 * Normalize one raw detection. A payload holding U+FFFD did not decode as
 * text in the detector's charset and is reported, not dropped.
 */
export function normalizeDetection(detection: RawDetection): Result<ScanResult, DecodingError> {
    if (detection.text.includes('\uFFFD')) {
        return fail(
            new DecodingError('decoded payload is not valid text', {
                symbol_type: detection.format,
            })
        );
    }

    return ok({
        decoded_text: detection.text,
        symbol_type: detection.format,
        quality: detection.quality === undefined ? null : Math.round(detection.quality),
        polygon: detection.points.map((point) => ({ x: Math.round(point.x), y: Math.round(point.y) })),
    });
}

/**
 * Scan an uploaded image for codes
 */
export async function scan(
    upload: ScanUpload,
    detector: Detector = zxingDetector
): Promise<Result<ScanReport, ValidationError | DecodingError>> {
    if (!isImageContentType(upload.contentType)) {
        return fail(new ValidationError('file must be an image', { content_type: upload.contentType ?? null }));
    }

    let raster: GrayRaster;
    try {
        raster = await toGrayRaster(upload.bytes);
    } catch (error) {
        log.warn('Image decode failed', { reason: error instanceof Error ? error.message : String(error) });
        return fail(new DecodingError('invalid image format'));
    }

    const startTime = process.hrtime.bigint();
    let detections: RawDetection[];
    try {
        detections = detector(raster);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        log.warn('Symbol detection failed', { reason });
        return fail(new DecodingError('symbol detection failed', { reason }));
    }
    log.time('Scanned', startTime, { width: raster.width, height: raster.height, found: detections.length });

    const results: ScanResult[] = [];
    for (const detection of detections) {
        const normalized = normalizeDetection(detection);
        if (!normalized.success) {
            return normalized;
        }
        results.push(normalized.value);
    }

    return ok({ count: results.length, results });
}
