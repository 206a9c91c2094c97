/**
 * ANSI color palette used for the review output.
 */

// ============================================================================
// ANSI Color Codes
// ============================================================================

export const COLORS = {
    reset: '\x1b[0m',
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
} as const;

/**
 * Colorizers applied to the fixed parts of the review output
 */
export interface ColorPalette {
    red(text: string): string;
    green(text: string): string;
    yellow(text: string): string;
    blue(text: string): string;
}

function colorize(color: string, text: string): string {
    return `${color}${text}${COLORS.reset}`;
}

export const ansiPalette: ColorPalette = {
    red: (text) => colorize(COLORS.red, text),
    green: (text) => colorize(COLORS.green, text),
    yellow: (text) => colorize(COLORS.yellow, text),
    blue: (text) => colorize(COLORS.blue, text),
};

/** Palette that leaves text untouched (--no-color) */
export const plainPalette: ColorPalette = {
    red: (text) => text,
    green: (text) => text,
    yellow: (text) => text,
    blue: (text) => text,
};

export function getPalette(colors: boolean): ColorPalette {
    return colors ? ansiPalette : plainPalette;
}
