/**
 * Application-wide constants
 *
 * Centralized defaults and limits used throughout the application.
 */

export const SERVICE_NAME = 'barcode-api';

export const SERVICE_VERSION = '2.0.0';

/**
 * Default barcode styling, applied to every field the request leaves out.
 * Dimensions are in the encoder's units (module scale, millimetres, points).
 */
export const DEFAULT_BARCODE_STYLING = {
    width: 2.0,
    height: 15.0,
    quietZone: 6.5,
    fontSize: 10,
    textDistance: 5.0,
    background: 'white',
    foreground: 'black',
} as const;

/**
 * Font size bounds (inclusive)
 */
export const FONT_SIZE_MIN = 1;
export const FONT_SIZE_MAX = 100;

/**
 * Upper bounds for barcode dimensions (lower bound is "greater than 0")
 */
export const BARCODE_DIMENSION_MAX = {
    width: 20,
    height: 200,
    quietZone: 100,
    textDistance: 100,
} as const;

/**
 * QR code defaults and bounds
 */
export const DEFAULT_QR_OPTIONS = {
    errorCorrection: 'M',
    boxSize: 10,
    border: 4,
    fill: 'black',
    back: 'white',
} as const;

export const QR_VERSION_MIN = 1;
export const QR_VERSION_MAX = 40;

/**
 * Largest pixel size of one QR module. A version 40 symbol at this size
 * with a 4 module border is 18,500 px wide.
 */
export const QR_BOX_SIZE_MAX = 100;

export const QR_BORDER_MAX = 100;

/**
 * Largest QR image side in pixels, checked before the raster is allocated
 */
export const QR_IMAGE_SIZE_MAX = 4096;

/**
 * Default maximum accepted upload size for /scan-image (10 MiB)
 */
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const PNG_MIME_TYPE = 'image/png';
