/**
 * Middleware Barrel Export
 *
 * - Request logging
 * - Shared format registry on the context
 * - JSON body parsing and upload limits
 */

export { requestTrackerMiddleware } from './request-tracker.js';
export { contextInitializerMiddleware } from './context-initializer.js';
export { bodyParserMiddleware } from './body-parser.js';
export { uploadLimitMiddleware } from './upload-limit.js';
