import type { Context } from 'hono';

import { SERVICE_NAME, SERVICE_VERSION } from '@src/lib/constants.js';

/**
 * GET / - API root endpoint
 *
 * Returns service information, supported formats and available endpoints.
 */
export default function (context: Context) {
    return context.json({
        success: true,
        data: {
            name: SERVICE_NAME,
            version: SERVICE_VERSION,
            description: 'Barcode and QR code generation and scanning',
            formats: context.get('formats').ids(),
            endpoints: {
                health: ['/health'],
                formats: ['/formats', '/supported-formats'],
                generate: ['/generate', '/generate/image', '/generate/quick'],
                create: ['/create-barcode', '/create-qr-code'],
                scan: ['/scan-image'],
            },
        },
    });
}
