import type { Context } from 'hono';

import { readGenerationRequest, respondWithImage } from '@src/lib/route-helpers.js';

/**
 * POST /create-qr-code - Generate a QR code honouring `return_format`
 */
export default async function (context: Context) {
    const request = readGenerationRequest(context, 'qrcode');
    return respondWithImage(context, request, request.returnFormat);
}
