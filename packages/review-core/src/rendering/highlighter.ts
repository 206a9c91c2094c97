/**
 * Terminal Highlighter
 *
 * Tokenizes code with highlight.js and re-renders the scoped spans it emits
 * as 256-color ANSI escape sequences.
 */

import hljs from 'highlight.js';
import { darkSyntaxColors, hexToAnsi256, SCOPE_SLOTS } from './syntax-theme';
import type { SyntaxColors, SyntaxSlot } from './syntax-theme';

export interface HighlightOptions {
    /** highlight.js language name (default 'ruby') */
    language?: string;
    /** Emit escape sequences; false returns the code unchanged */
    colors?: boolean;
    /** Token colors (default dark theme) */
    theme?: SyntaxColors;
}

const RESET = '\x1b[0m';

/** Opening span, closing span, or a run of text in highlight.js HTML output */
const TOKEN_PATTERN = /<span class="([^"]*)">|<\/span>|[^<]+/g;

const HTML_ENTITIES: Readonly<Record<string, string>> = {
    '&amp;': '&',
    '&lt;': '<',
    '&gt;': '>',
    '&quot;': '"',
    '&#x27;': "'",
    '&#39;': "'",
};

function unescapeHtml(text: string): string {
    return text.replace(/&(?:amp|lt|gt|quot|#x27|#39);/g, entity => HTML_ENTITIES[entity] ?? entity);
}

/**
 * Resolve the theme slot for a span's class list, e.g. `hljs-title function_`.
 * `parent` is the slot-bearing class list of the enclosing span, if any.
 */
export function slotForClasses(classList: string, parent?: string): SyntaxSlot | undefined {
    const classes = classList.split(/\s+/);
    const scopes = classes
        .filter(c => c.startsWith('hljs-'))
        .map(c => c.slice('hljs-'.length));

    if (scopes.includes('title')) {
        if (classes.includes('function_')) {
            return 'function';
        }
        if (classes.includes('class_')) {
            return 'type';
        }
        if (parent && /\bhljs-(function|class)\b/.test(parent)) {
            return parent.includes('hljs-class') ? 'type' : 'function';
        }
    }

    for (const scope of scopes) {
        const slot = SCOPE_SLOTS[scope];
        if (slot) {
            return slot;
        }
    }
    return undefined;
}

/**
 * Render highlight.js HTML as ANSI text. Each text run is painted with the
 * innermost enclosing span that maps to a theme slot.
 */
export function htmlToAnsi(html: string, theme: SyntaxColors = darkSyntaxColors): string {
    const stack: Array<{ classes: string; slot?: SyntaxSlot }> = [];
    let out = '';

    for (const match of html.matchAll(TOKEN_PATTERN)) {
        const token = match[0];
        if (match[1] !== undefined) {
            const parent = stack.length > 0 ? stack[stack.length - 1].classes : undefined;
            stack.push({ classes: match[1], slot: slotForClasses(match[1], parent) });
        } else if (token === '</span>') {
            stack.pop();
        } else {
            const text = unescapeHtml(token);
            const slot = [...stack].reverse().find(frame => frame.slot !== undefined)?.slot;
            out += slot ? `\x1b[38;5;${hexToAnsi256(theme[slot])}m${text}${RESET}` : text;
        }
    }

    return out;
}

/**
 * Highlight code for a 256-color terminal.
 */
export function highlightCode(code: string, options: HighlightOptions = {}): string {
    if (options.colors === false) {
        return code;
    }
    const language = options.language ?? 'ruby';
    const html = hljs.getLanguage(language)
        ? hljs.highlight(code, { language, ignoreIllegals: true }).value
        : hljs.highlightAuto(code).value;
    return htmlToAnsi(html, options.theme);
}
