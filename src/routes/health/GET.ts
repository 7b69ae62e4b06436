import type { Context } from 'hono';

import { SERVICE_NAME } from '@src/lib/constants.js';

/**
 * GET /health - Health check endpoint
 *
 * Returns server health status for monitoring and load balancers.
 */
export default function (context: Context) {
    return context.json({
        success: true,
        status: 'healthy',
        service: SERVICE_NAME,
    });
}
