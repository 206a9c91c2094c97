/**
 * Terminal syntax theme
 *
 * Token colors for highlighted code, given as hex and rendered in the nearest
 * xterm 256-color cube entry.
 */

/**
 * Color slots for syntax highlighting tokens
 */
export interface SyntaxColors {
    keyword: string;        // keywords, selector-tags, built-in, names, tags
    string: string;         // strings, titles, sections, attributes, literals
    number: string;         // numbers, symbols, bullets, links
    comment: string;        // comments, quotes, deletions, meta
    function: string;       // function names, class titles
    variable: string;       // variables, template-variables, attrs, params, properties
    type: string;           // types, class names
    regexp: string;         // regexp, selector-attr, selector-pseudo
}

export type SyntaxSlot = keyof SyntaxColors;

/**
 * High-saturation palette for dark terminal backgrounds
 */
export const darkSyntaxColors: SyntaxColors = {
    keyword: '#7dcfff',
    string: '#ce9178',
    number: '#b5cea8',
    comment: '#6a9955',
    function: '#dcdcaa',
    variable: '#9cdcfe',
    type: '#4ec9b0',
    regexp: '#d16969',
};

/**
 * highlight.js scope names and the slot each is painted with
 */
export const SCOPE_SLOTS: Readonly<Record<string, SyntaxSlot>> = {
    'keyword': 'keyword',
    'selector-tag': 'keyword',
    'built_in': 'keyword',
    'name': 'keyword',
    'tag': 'keyword',

    'string': 'string',
    'title': 'string',
    'section': 'string',
    'attribute': 'string',
    'literal': 'string',
    'template-tag': 'string',
    'addition': 'string',

    'number': 'number',
    'symbol': 'number',
    'bullet': 'number',
    'link': 'number',

    'comment': 'comment',
    'quote': 'comment',
    'deletion': 'comment',
    'meta': 'comment',

    'variable': 'variable',
    'template-variable': 'variable',
    'attr': 'variable',
    'params': 'variable',
    'property': 'variable',

    'type': 'type',

    'regexp': 'regexp',
    'selector-attr': 'regexp',
    'selector-pseudo': 'regexp',
};

/** Channel intensities of the 6x6x6 xterm color cube */
const CUBE_LEVELS = [0, 95, 135, 175, 215, 255] as const;

function nearestCubeIndex(value: number): number {
    let best = 0;
    for (let i = 1; i < CUBE_LEVELS.length; i++) {
        if (Math.abs(CUBE_LEVELS[i] - value) < Math.abs(CUBE_LEVELS[best] - value)) {
            best = i;
        }
    }
    return best;
}

/**
 * Map a `#rrggbb` color to the closest xterm 256-color cube index (16-231).
 */
export function hexToAnsi256(hex: string): number {
    const match = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
    if (!match) {
        throw new Error(`Invalid hex color: ${hex}`);
    }
    const [r, g, b] = [match[1], match[2], match[3]].map(part => nearestCubeIndex(parseInt(part, 16)));
    return 16 + 36 * r + 6 * g + b;
}
