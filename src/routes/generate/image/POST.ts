import type { Context } from 'hono';

import { readGenerationRequest, respondWithImage } from '@src/lib/route-helpers.js';

/**
 * POST /generate/image - Generate a barcode, always answered as a PNG download
 */
export default async function (context: Context) {
    const request = readGenerationRequest(context, 'barcode', 'file');
    return respondWithImage(context, request, 'file');
}
