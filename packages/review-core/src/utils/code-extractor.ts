/**
 * Code Extractor
 *
 * Pulls the fenced code block for one language out of a completion.
 *
 * The match is greedy and spans newlines: with several fenced blocks in the
 * text it runs from the first opening fence of the language to the last
 * closing fence anywhere after it, intervening prose and fences included.
 */

/**
 * Escape a string for literal use inside a RegExp
 */
function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Build the fence pattern for a language tag (matched case-sensitively).
 */
export function fencePattern(language: string): RegExp {
    return new RegExp('```' + escapeRegExp(language) + '\\n([\\s\\S]*)```');
}

/**
 * Extract the contents of the fenced block tagged with `language`.
 *
 * @returns The text between the opening fence's newline and the final closing
 *          fence, or undefined when no opening fence with that exact tag exists
 */
export function extractCode(text: string, language: string = 'ruby'): string | undefined {
    const match = fencePattern(language).exec(text);
    return match ? match[1] : undefined;
}
