/**
 * .env loader
 *
 * Reads KEY=VALUE lines into process.env (or a supplied target) and reports
 * which keys were written and which were kept because they were already set.
 * Blank lines and `#` comments are ignored. A value wrapped in matching
 * quotes is taken literally; otherwise anything after `#` is dropped.
 */

import { existsSync, readFileSync } from 'fs';

export interface LoadEnvOptions {
    /** default: '.env' */
    path?: string;
    /** Replace variables that are already set (default: false) */
    override?: boolean;
    /** default: process.env */
    target?: NodeJS.ProcessEnv;
}

export interface LoadEnvSummary {
    path: string;
    found: boolean;
    /** Keys written to the target, in file order */
    loaded: string[];
    /** Keys already present in the target and left as they were */
    skipped: string[];
}

const ASSIGNMENT = /^([^=\s#][^=]*?)\s*=\s*(.*)$/;

function unquote(value: string): string {
    const quote = value[0];
    if ((quote === '"' || quote === "'") && value.length >= 2 && value.endsWith(quote)) {
        return value.slice(1, -1);
    }

    const comment = value.indexOf('#');
    return comment === -1 ? value : value.slice(0, comment).trim();
}

/**
 * Parse .env text into key/value pairs. A repeated key keeps its last value.
 */
export function parseEnvText(text: string): Map<string, string> {
    const entries = new Map<string, string>();

    for (const line of text.split(/\r?\n/)) {
        const match = ASSIGNMENT.exec(line.trim());
        if (match) {
            entries.set(match[1], unquote(match[2]));
        }
    }

    return entries;
}

/**
 * Load a .env file. A missing file yields `found: false` and changes nothing.
 */
export function loadEnv(options: LoadEnvOptions = {}): LoadEnvSummary {
    const { path = '.env', override = false, target = process.env } = options;
    const summary: LoadEnvSummary = { path, found: existsSync(path), loaded: [], skipped: [] };

    if (!summary.found) {
        return summary;
    }

    for (const [key, value] of parseEnvText(readFileSync(path, 'utf-8'))) {
        if (target[key] !== undefined && !override) {
            summary.skipped.push(key);
            continue;
        }
        target[key] = value;
        summary.loaded.push(key);
    }

    return summary;
}
