import type { Context } from 'hono';

import { isTruthyFlag, parseBarcodeRequest, quickRequestBody } from '@src/lib/barcode/request-schema.js';
import { unwrap } from '@src/lib/result.js';
import { respondWithImage } from '@src/lib/route-helpers.js';

/**
 * GET /generate/quick?data=...&format=...&return_image=true
 *
 * Default styling. `return_image` switches from base64 JSON to a PNG download.
 */
export default async function (context: Context) {
    const query = context.req.query();
    const returnFormat = isTruthyFlag(query.return_image) ? 'file' : 'inline';
    const request = unwrap(parseBarcodeRequest(quickRequestBody(query), context.get('formats'), returnFormat));
    return respondWithImage(context, request, request.returnFormat);
}
