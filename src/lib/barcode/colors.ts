/**
 * Colour parsing for barcode and QR styling fields.
 *
 * Accepts the CSS basic colour keywords, `#rgb`, `#rrggbb` and bare
 * `rrggbb`. Everything is normalized to lower-case `rrggbb`, which is the
 * form bwip-js takes for its colour options.
 */

const NAMED_COLORS: ReadonlyMap<string, string> = new Map([
    ['black', '000000'],
    ['white', 'ffffff'],
    ['red', 'ff0000'],
    ['green', '008000'],
    ['blue', '0000ff'],
    ['yellow', 'ffff00'],
    ['cyan', '00ffff'],
    ['aqua', '00ffff'],
    ['magenta', 'ff00ff'],
    ['fuchsia', 'ff00ff'],
    ['gray', '808080'],
    ['grey', '808080'],
    ['silver', 'c0c0c0'],
    ['maroon', '800000'],
    ['olive', '808000'],
    ['lime', '00ff00'],
    ['teal', '008080'],
    ['navy', '000080'],
    ['purple', '800080'],
    ['orange', 'ffa500'],
    ['brown', 'a52a2a'],
]);

const HEX6 = /^#?([0-9a-f]{6})$/;
const HEX3 = /^#([0-9a-f]{3})$/;

export type Rgb = readonly [red: number, green: number, blue: number];

/**
 * Normalize a colour string to `rrggbb`, or undefined when it is not a colour
 */
export function normalizeColor(value: string): string | undefined {
    const color = value.trim().toLowerCase();

    const named = NAMED_COLORS.get(color);
    if (named) {
        return named;
    }

    const long = HEX6.exec(color);
    if (long) {
        return long[1];
    }

    const short = HEX3.exec(color);
    if (short) {
        return short[1]
            .split('')
            .map((digit) => digit + digit)
            .join('');
    }

    return undefined;
}

/**
 * Convert a normalized `rrggbb` string to its channel values
 */
export function hexToRgb(hex: string): Rgb {
    const value = parseInt(hex, 16);
    return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
}
