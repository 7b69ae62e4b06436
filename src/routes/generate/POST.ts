import type { Context } from 'hono';

import { readGenerationRequest, respondWithImage } from '@src/lib/route-helpers.js';

/**
 * POST /generate - Generate a barcode, always answered as base64 JSON
 */
export default async function (context: Context) {
    const request = readGenerationRequest(context, 'barcode');
    return respondWithImage(context, request, 'inline');
}
