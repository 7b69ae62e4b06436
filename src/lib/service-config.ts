/**
 * Service configuration
 *
 * Reads the environment once at startup into a typed, frozen object.
 * Invalid values stop the process before the server binds.
 *
 * Variables:
 * - PORT (default 8000)
 * - HOST (default 0.0.0.0)
 * - NODE_ENV (default development)
 * - MAX_UPLOAD_BYTES (default 10 MiB): largest accepted /scan-image body
 */

import { DEFAULT_MAX_UPLOAD_BYTES } from '@src/lib/constants.js';

export interface ServiceConfig {
    port: number;
    host: string;
    nodeEnv: string;
    maxUploadBytes: number;
}

function positiveInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
        return fallback;
    }

    const value = Number(raw);
    if (!Number.isInteger(value) || value <= 0) {
        throw Error(`Fatal: environment value "${name}" must be a positive integer, got "${raw}"`);
    }

    return value;
}

export function loadServiceConfig(env: NodeJS.ProcessEnv = process.env): Readonly<ServiceConfig> {
    const port = positiveInteger(env, 'PORT', 8000);
    if (port > 65535) {
        throw Error(`Fatal: environment value "PORT" is out of range: ${port}`);
    }

    return Object.freeze({
        port,
        host: env.HOST || '0.0.0.0',
        nodeEnv: env.NODE_ENV || 'development',
        maxUploadBytes: positiveInteger(env, 'MAX_UPLOAD_BYTES', DEFAULT_MAX_UPLOAD_BYTES),
    });
}
