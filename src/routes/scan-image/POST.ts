import type { Context } from 'hono';

import { scan } from '@src/lib/barcode/decoder.js';
import { formatScanReport } from '@src/lib/barcode/response-formatter.js';
import { ValidationError } from '@src/lib/errors/http-error.js';
import { unwrap } from '@src/lib/result.js';

async function readForm(context: Context) {
    try {
        return await context.req.parseBody();
    } catch (error) {
        throw new ValidationError('invalid multipart body', {
            field: 'image',
            reason: error instanceof Error ? error.message : String(error),
        });
    }
}

/**
 * POST /scan-image - Detect barcodes and QR codes in an uploaded image
 *
 * Expects multipart/form-data with the file under the `image` field.
 */
export default async function (context: Context) {
    const form = await readForm(context);
    const upload = form['image'];

    if (upload === undefined || typeof upload === 'string') {
        throw new ValidationError('image file is required', { field: 'image' });
    }

    const bytes = new Uint8Array(await upload.arrayBuffer());
    const report = unwrap(await scan({ contentType: upload.type || undefined, bytes }));

    return context.json(formatScanReport(report));
}
