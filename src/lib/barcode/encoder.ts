/**
 * Encoding Dispatcher
 *
 * Turns a validated generation request into PNG bytes:
 * - barcodes: format registry handle → bwip-js, which renders PNG directly
 * - QR codes: qr builds the module matrix, sharp writes it as PNG
 *
 * Encoder failures never escape as thrown errors; they come back as an
 * EncodingError result carrying the data, format and library message.
 */

import bwipjs from 'bwip-js';
import encodeQR from 'qr';
import sharp from 'sharp';

import {
    DEFAULT_QR_OPTIONS,
    PNG_MIME_TYPE,
    QR_IMAGE_SIZE_MAX,
    QR_VERSION_MAX,
    QR_VERSION_MIN,
} from '@src/lib/constants.js';
import { EncodingError } from '@src/lib/errors/http-error.js';
import { logger } from '@src/lib/logger.js';
import { fail, ok, type Result } from '@src/lib/result.js';
import { hexToRgb, type Rgb } from './colors.js';
import { FORMAT_REGISTRY, type FormatRegistry, type SymbologyFlags, type SymbologyHandle } from './format-registry.js';
import type {
    BarcodeRequest,
    EncodedImage,
    ErrorCorrectionLevel,
    FormatId,
    GenerationRequest,
    QrCodeRequest,
} from './types.js';

const log = logger.child('encoder');

type QrEncodeOptions = NonNullable<Parameters<typeof encodeQR>[2]>;
type QrEcc = NonNullable<QrEncodeOptions['ecc']>;
type QrVersion = NonNullable<QrEncodeOptions['version']>;

const ECC_BY_LEVEL: Readonly<Record<ErrorCorrectionLevel, QrEcc>> = {
    L: 'low',
    M: 'medium',
    Q: 'quartile',
    H: 'high',
};

/**
 * bwip-js render options assembled from the request styling
 */
export interface SymbologyRenderOptions extends SymbologyFlags {
    bcid: string;
    text: string;
    scaleX: number;
    scaleY: number;
    height: number;
    includetext: boolean;
    textxalign: 'center';
    textsize: number;
    textyoffset: number;
    paddingwidth: number;
    paddingheight: number;
    backgroundcolor: string;
    barcolor: string;
    textcolor: string;
}

function isQrVersion(value: number): value is QrVersion {
    return Number.isInteger(value) && value >= QR_VERSION_MIN && value <= QR_VERSION_MAX;
}

/**
 * Map request styling onto bwip-js options.
 *
 * Width is the module scale (at least 1); the quiet zone becomes the
 * horizontal padding and half of it the vertical padding.
 */
export function buildRenderOptions(request: BarcodeRequest, handle: SymbologyHandle): SymbologyRenderOptions {
    const { styling } = request;
    const scale = Math.max(1, Math.round(styling.width));
    const text = handle.prepare ? handle.prepare(request.data) : request.data;

    return {
        bcid: handle.bcid,
        text,
        scaleX: scale,
        scaleY: scale,
        height: styling.height,
        includetext: true,
        textxalign: 'center',
        textsize: styling.fontSize,
        textyoffset: -styling.textDistance,
        paddingwidth: Math.round(styling.quietZone),
        paddingheight: Math.max(1, Math.round(styling.quietZone / 2)),
        backgroundcolor: styling.background,
        barcolor: styling.foreground,
        textcolor: styling.foreground,
        ...handle.flags?.(request.data),
    };
}

/**
 * Expand a QR module matrix into RGB pixels, `boxSize` pixels per module
 * with `border` light modules on every side. Throws when the image side
 * would exceed QR_IMAGE_SIZE_MAX.
 */
export function rasterizeMatrix(
    matrix: ReadonlyArray<ReadonlyArray<unknown>>,
    boxSize: number,
    border: number,
    dark: Rgb,
    light: Rgb
): { pixels: Buffer; size: number } {
    const modules = matrix.length + border * 2;
    const size = modules * boxSize;
    if (size > QR_IMAGE_SIZE_MAX) {
        throw new Error(`QR image would be ${size}px wide, above the ${QR_IMAGE_SIZE_MAX}px limit`);
    }

    const pixels = Buffer.alloc(size * size * 3);

    for (let offset = 0; offset < pixels.length; offset += 3) {
        pixels[offset] = light[0];
        pixels[offset + 1] = light[1];
        pixels[offset + 2] = light[2];
    }

    matrix.forEach((row, rowIndex) => {
        row.forEach((cell, columnIndex) => {
            if (!cell) {
                return;
            }
            const top = (rowIndex + border) * boxSize;
            const left = (columnIndex + border) * boxSize;
            for (let y = top; y < top + boxSize; y++) {
                for (let x = left; x < left + boxSize; x++) {
                    const offset = (y * size + x) * 3;
                    pixels[offset] = dark[0];
                    pixels[offset + 1] = dark[1];
                    pixels[offset + 2] = dark[2];
                }
            }
        });
    });

    return { pixels, size };
}

async function renderBarcode(request: BarcodeRequest, handle: SymbologyHandle): Promise<Buffer> {
    return bwipjs.toBuffer(buildRenderOptions(request, handle));
}

async function renderQrCode(request: QrCodeRequest): Promise<Buffer> {
    const ecc = ECC_BY_LEVEL[request.errorCorrection];
    let options: QrEncodeOptions = { ecc, border: 0 };

    if (request.version !== undefined) {
        if (!isQrVersion(request.version)) {
            throw new Error(`QR version must be an integer between ${QR_VERSION_MIN} and ${QR_VERSION_MAX}`);
        }
        options = { ...options, version: request.version };
    }

    // Border and box size are applied while rasterizing, so the matrix comes back bare
    const matrix = encodeQR(request.data, 'raw', options);
    if (!Array.isArray(matrix)) {
        throw new Error('QR encoder did not return a module matrix');
    }

    const { pixels, size } = rasterizeMatrix(
        matrix,
        request.boxSize,
        request.border,
        hexToRgb(request.fill),
        hexToRgb(request.back)
    );

    return sharp(pixels, { raw: { width: size, height: size, channels: 3 } })
        .png()
        .toBuffer();
}

/**
 * QR defaults for a barcode request whose format is `qrcode`
 */
function barcodeToQrRequest(request: BarcodeRequest): QrCodeRequest {
    return {
        kind: 'qrcode',
        data: request.data,
        errorCorrection: DEFAULT_QR_OPTIONS.errorCorrection,
        boxSize: DEFAULT_QR_OPTIONS.boxSize,
        border: DEFAULT_QR_OPTIONS.border,
        fill: request.styling.foreground,
        back: request.styling.background,
        returnFormat: request.returnFormat,
    };
}

function render(request: GenerationRequest, registry: FormatRegistry): Promise<Buffer> {
    if (request.kind === 'qrcode') {
        return renderQrCode(request);
    }

    const handle = registry.lookup(request.format);
    if (!handle) {
        throw new Error('unsupported format');
    }

    return handle.kind === 'qrcode' ? renderQrCode(barcodeToQrRequest(request)) : renderBarcode(request, handle);
}

/**
 * Encode a validated request into an in-memory PNG
 */
export async function encode(
    request: GenerationRequest,
    registry: FormatRegistry = FORMAT_REGISTRY
): Promise<Result<EncodedImage, EncodingError>> {
    const format: FormatId = request.kind === 'qrcode' ? 'qrcode' : request.format;
    const startTime = process.hrtime.bigint();

    try {
        const bytes = await render(request, registry);
        log.time('Encoded', startTime, { format, bytes: bytes.length });
        return ok({ bytes, format, data: request.data, mimeType: PNG_MIME_TYPE });
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        log.warn('Encoding failed', { format, reason });
        return fail(new EncodingError(request.data, format, reason));
    }
}
