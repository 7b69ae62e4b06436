import type { Context } from 'hono';

/**
 * GET /formats (alias /supported-formats)
 *
 * Format ids in registry order with their descriptions.
 */
export default function (context: Context) {
    const formats = context.get('formats');
    return context.json({
        success: true,
        supported_formats: formats.ids(),
        format_details: formats.describe(),
    });
}
