import type { Context } from 'hono';

import { readGenerationRequest, respondWithImage } from '@src/lib/route-helpers.js';

/**
 * POST /create-barcode - Generate a barcode honouring `return_format`
 *
 * `return_format` accepts inline | file, and the aliases base64 | image.
 */
export default async function (context: Context) {
    const request = readGenerationRequest(context, 'barcode');
    return respondWithImage(context, request, request.returnFormat);
}
