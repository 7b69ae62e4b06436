import { describe, it, expect } from 'vitest';

import { hexToRgb, normalizeColor } from '@src/lib/barcode/colors.js';

describe('Colour parsing', () => {
    it('should resolve named colours case-insensitively', () => {
        expect(normalizeColor('Black')).toBe('000000');
        expect(normalizeColor('white')).toBe('ffffff');
        expect(normalizeColor('GREY')).toBe('808080');
    });

    it('should expand short hex colours', () => {
        expect(normalizeColor(' #ABC ')).toBe('aabbcc');
    });

    it('should accept long hex with or without a hash', () => {
        expect(normalizeColor('#A1B2C3')).toBe('a1b2c3');
        expect(normalizeColor('a1b2c3')).toBe('a1b2c3');
    });

    it('should reject anything else', () => {
        expect(normalizeColor('abc')).toBeUndefined();
        expect(normalizeColor('chartreuse')).toBeUndefined();
        expect(normalizeColor('#12345')).toBeUndefined();
        expect(normalizeColor('')).toBeUndefined();
    });

    it('should not resolve object property names', () => {
        expect(normalizeColor('constructor')).toBeUndefined();
        expect(normalizeColor('__proto__')).toBeUndefined();
        expect(normalizeColor('toString')).toBeUndefined();
    });

    it('should split hex into channels', () => {
        expect(hexToRgb('ff8000')).toEqual([255, 128, 0]);
        expect(hexToRgb('000000')).toEqual([0, 0, 0]);
    });
});
