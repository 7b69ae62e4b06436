/**
 * Request-scoped values flowing through validation, encoding, scanning and
 * response framing. Nothing here outlives a single request.
 */

export const BARCODE_FORMAT_IDS = [
    'code128',
    'code39',
    'ean8',
    'ean13',
    'ean14',
    'jan',
    'upc',
    'isbn10',
    'isbn13',
    'issn',
    'itf',
    'pzn',
] as const;

export type BarcodeFormatId = (typeof BARCODE_FORMAT_IDS)[number];

export type FormatId = BarcodeFormatId | 'qrcode';

export type ReturnFormat = 'inline' | 'file';

export type ErrorCorrectionLevel = 'L' | 'M' | 'Q' | 'H';

export const ERROR_CORRECTION_LEVELS: readonly ErrorCorrectionLevel[] = ['L', 'M', 'Q', 'H'];

export interface BarcodeStyling {
    /** Module width, used as the horizontal scale factor */
    width: number;
    /** Bar height in millimetres */
    height: number;
    quietZone: number;
    fontSize: number;
    textDistance: number;
    /** Normalized `rrggbb` */
    background: string;
    /** Normalized `rrggbb` */
    foreground: string;
}

export interface BarcodeRequest {
    kind: 'barcode';
    data: string;
    format: FormatId;
    styling: BarcodeStyling;
    returnFormat: ReturnFormat;
}

export interface QrCodeRequest {
    kind: 'qrcode';
    data: string;
    /** Omitted: the smallest version that holds the data */
    version?: number;
    errorCorrection: ErrorCorrectionLevel;
    boxSize: number;
    border: number;
    /** Normalized `rrggbb` */
    fill: string;
    /** Normalized `rrggbb` */
    back: string;
    returnFormat: ReturnFormat;
}

export type GenerationRequest = BarcodeRequest | QrCodeRequest;

export interface EncodedImage {
    bytes: Buffer;
    format: FormatId;
    data: string;
    mimeType: 'image/png';
}

export interface ScanUpload {
    /** Declared content type of the uploaded part, if any */
    contentType?: string;
    bytes: Uint8Array;
}

export interface PolygonPoint {
    x: number;
    y: number;
}

export interface ScanResult {
    decoded_text: string;
    symbol_type: string;
    quality: number | null;
    polygon: PolygonPoint[];
}

export interface ScanReport {
    count: number;
    results: ScanResult[];
}

export interface GenerationResponse {
    success: true;
    format: FormatId;
    data: string;
    image_base64: string;
    message: string;
}

export interface ScanResponse {
    success: true;
    codes_found: number;
    results: ScanResult[];
    message: string;
}
