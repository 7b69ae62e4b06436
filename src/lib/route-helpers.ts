import type { Context } from 'hono';

import { encode } from '@src/lib/barcode/encoder.js';
import { parseBarcodeRequest, parseQrCodeRequest } from '@src/lib/barcode/request-schema.js';
import { formatFile, formatInline } from '@src/lib/barcode/response-formatter.js';
import type { GenerationRequest, ReturnFormat } from '@src/lib/barcode/types.js';
import { unwrap } from '@src/lib/result.js';

/**
 * Route handler utilities shared by the generation endpoints.
 *
 * Failed results are unwrapped into thrown HttpErrors; the app-level
 * error handler turns them into the JSON error envelope.
 */

export type GenerationKind = 'barcode' | 'qrcode';

/**
 * Validate the parsed JSON body as a barcode or QR code request
 */
export function readGenerationRequest(
    context: Context,
    kind: GenerationKind,
    fallbackReturnFormat: ReturnFormat = 'inline'
): GenerationRequest {
    const body = context.get('parsedBody');
    return kind === 'qrcode'
        ? unwrap(parseQrCodeRequest(body, fallbackReturnFormat))
        : unwrap(parseBarcodeRequest(body, context.get('formats'), fallbackReturnFormat));
}

/**
 * Encode a validated request and reply inline (JSON + base64) or as a PNG download
 */
export async function respondWithImage(context: Context, request: GenerationRequest, returnFormat: ReturnFormat) {
    const image = unwrap(await encode(request, context.get('formats')));

    if (returnFormat === 'file') {
        const file = formatFile(image);
        return context.body(file.body, 200, file.headers);
    }

    return context.json(formatInline(image));
}
