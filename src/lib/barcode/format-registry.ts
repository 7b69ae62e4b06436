/**
 * Format Registry
 *
 * Static table from format id to what is needed to encode it. Built once at
 * process start, frozen, and handed to request handlers by reference.
 *
 * Adding a symbology means adding one entry below and, when it has a fixed
 * numeric length, a row in FIXED_LENGTH_FORMATS (request-schema.ts).
 */

import type { BarcodeFormatId, FormatId } from './types.js';

/**
 * Symbology-specific encoder options, named as the encoder names them
 */
export interface SymbologyFlags {
    pzn7?: boolean;
    pzn8?: boolean;
}

export interface SymbologyHandle {
    kind: 'barcode';
    id: BarcodeFormatId;
    description: string;
    /** bwip-js symbology identifier */
    bcid: string;
    /**
     * Map request text to the text the symbology encoder takes.
     * Throws when the data cannot be represented; the encoding dispatcher
     * reports that as an EncodingError.
     */
    prepare?: (data: string) => string;
    /** Extra encoder flags that depend on the data */
    flags?: (data: string) => SymbologyFlags;
}

export interface QrCodeHandle {
    kind: 'qrcode';
    id: 'qrcode';
    description: string;
}

export type EncoderHandle = SymbologyHandle | QrCodeHandle;

function requirePrefix(label: string, prefixes: readonly string[]) {
    return (data: string): string => {
        if (!prefixes.some((prefix) => data.startsWith(prefix))) {
            throw new Error(`${label} must start with ${prefixes.join(' or ')}`);
        }
        return data;
    };
}

// ISSN is carried in an EAN-13 as 977 + the 7 ISSN digits (no check) + 00
function issnToEan(data: string): string {
    const digits = data.replace(/-/g, '');
    if (!/^\d{7}[\dXx]?$/.test(digits)) {
        throw new Error('ISSN must be 7 digits, optionally followed by its check digit');
    }
    return `977${digits.slice(0, 7)}00`;
}

const FORMAT_TABLE: readonly EncoderHandle[] = [
    { kind: 'barcode', id: 'code128', bcid: 'code128', description: 'Code 128 - Variable length, alphanumeric' },
    {
        kind: 'barcode',
        id: 'code39',
        bcid: 'code39',
        description: 'Code 39 - Variable length, alphanumeric',
        prepare: (data) => data.toUpperCase(),
    },
    { kind: 'barcode', id: 'ean8', bcid: 'ean8', description: 'EAN-8 - 8 digits' },
    { kind: 'barcode', id: 'ean13', bcid: 'ean13', description: 'EAN-13 - 13 digits' },
    {
        kind: 'barcode',
        id: 'ean14',
        bcid: 'ean14',
        description: 'EAN-14 - 14 digits',
        prepare: (data) => `(01)${data}`,
    },
    {
        kind: 'barcode',
        id: 'jan',
        bcid: 'ean13',
        description: 'JAN - Japanese Article Number',
        prepare: requirePrefix('JAN', ['45', '49']),
    },
    { kind: 'barcode', id: 'upc', bcid: 'upca', description: 'UPC-A - 12 digits' },
    {
        kind: 'barcode',
        id: 'isbn10',
        bcid: 'ean13',
        description: 'ISBN-10 - 10 digits',
        prepare: (data) => `978${data}`,
    },
    {
        kind: 'barcode',
        id: 'isbn13',
        bcid: 'ean13',
        description: 'ISBN-13 - 13 digits',
        prepare: requirePrefix('ISBN-13', ['978', '979']),
    },
    {
        kind: 'barcode',
        id: 'issn',
        bcid: 'ean13',
        description: 'ISSN - International Standard Serial Number',
        prepare: issnToEan,
    },
    { kind: 'barcode', id: 'itf', bcid: 'interleaved2of5', description: 'ITF - Interleaved 2 of 5' },
    {
        kind: 'barcode',
        id: 'pzn',
        bcid: 'pzn',
        description: 'PZN - Pharmazentralnummer',
        // 6 digits is a PZN7, 7 digits a PZN8; the check digit is computed by the encoder
        flags: (data) => (data.length === 7 ? { pzn8: true, pzn7: false } : { pzn7: true, pzn8: false }),
    },
    { kind: 'qrcode', id: 'qrcode', description: 'QR Code - 2D matrix, any text' },
];

/**
 * Read-only lookup table of supported formats
 */
export class FormatRegistry {
    private readonly entries: ReadonlyMap<string, EncoderHandle>;

    constructor(handles: readonly EncoderHandle[]) {
        const entries = new Map<string, EncoderHandle>();
        for (const handle of handles) {
            if (entries.has(handle.id)) {
                throw new Error(`Duplicate format in registry: ${handle.id}`);
            }
            entries.set(handle.id, Object.freeze({ ...handle }));
        }
        this.entries = entries;
        Object.freeze(this);
    }

    lookup(formatId: string): EncoderHandle | undefined {
        return this.entries.get(formatId);
    }

    has(formatId: string): formatId is FormatId {
        return this.entries.has(formatId);
    }

    /**
     * Format ids in table order
     */
    ids(): FormatId[] {
        return [...this.entries.values()].map((handle) => handle.id);
    }

    /**
     * Format id to human-readable description
     */
    describe(): Record<string, string> {
        const details: Record<string, string> = {};
        for (const handle of this.entries.values()) {
            details[handle.id] = handle.description;
        }
        return details;
    }

    handles(): EncoderHandle[] {
        return [...this.entries.values()];
    }
}

export function createFormatRegistry(handles: readonly EncoderHandle[] = FORMAT_TABLE): FormatRegistry {
    return new FormatRegistry(handles);
}

/**
 * Process-wide registry, assembled once at module load
 */
export const FORMAT_REGISTRY = createFormatRegistry();
