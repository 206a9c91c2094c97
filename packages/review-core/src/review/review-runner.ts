/**
 * Review Runner
 *
 * One review from start to finish: read the clipboard, echo it, ask the
 * completion endpoint about it, then render the answer.
 *
 * The echo is written before the request is built, so any failure after that
 * point (token budget, transport) still follows a visible copy of the input.
 */

import { buildPrompt, computeMaxTokens, promptLength, TARGET_LANGUAGE } from '../ai/prompt-builder';
import { selectModel } from '../ai/model-registry';
import { firstChoice, isErrorResponse, isValidChoice } from '../ai/response-classifier';
import type { CompletionChoice, CompletionError } from '../ai/types';
import { getLogger, LogCategory } from '../logger';
import { getPalette } from '../rendering/colors';
import type { ColorPalette } from '../rendering/colors';
import { highlightCode } from '../rendering/highlighter';
import { extractCode } from '../utils/code-extractor';
import type { ReviewDependencies, ReviewOptions, ReviewResult } from './types';

// ============================================================================
// Output Fragments
// ============================================================================

export const TICK = '✔';
export const NO_RESPONSE = 'No response!!';

/** Fence tag and highlight.js grammar of the answer's code block */
export const FENCE_LANGUAGE = TARGET_LANGUAGE.toLowerCase();

export function delimiter(colors: ColorPalette): string {
    return `\n${colors.red('~'.repeat(20))}\n`;
}

export function formatEcho(text: string, colors: ColorPalette): string {
    const delim = delimiter(colors);
    return delim + colors.yellow(text) + delim;
}

export function formatProviderError(error: CompletionError, colors: ColorPalette): string {
    return colors.red(' ERROR! ') + '\n' +
        colors.red(`   type: ${error.type} `) + '\n' +
        colors.red(`   message: ${error.message} `) + '\n';
}

export function formatChoice(
    choice: CompletionChoice,
    colors: ColorPalette,
    ansi: boolean
): string {
    let out = '';
    if (isValidChoice(choice)) {
        out += `Valid Response: ${colors.green(TICK)}`;
    }

    const code = extractCode(choice.text, FENCE_LANGUAGE);
    if (code !== undefined) {
        const delim = delimiter(colors);
        const highlighted = highlightCode(code, { language: FENCE_LANGUAGE, colors: ansi });
        out += `${delim} ${highlighted} ${delim}`;
    } else {
        out += colors.blue(choice.text);
    }
    return out;
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run one review.
 *
 * Provider error payloads are rendered and reported through `exitCode`;
 * configuration and transport failures are thrown after the echo is written.
 */
export async function runReview(options: ReviewOptions, deps: ReviewDependencies): Promise<ReviewResult> {
    const logger = getLogger();
    const ansi = deps.colors !== false;
    const colors = getPalette(ansi);

    const text = await deps.readClipboard();
    const echo = formatEcho(text, colors);
    deps.write(echo);

    const prompt = buildPrompt(options.mode, text);
    const maxTokens = computeMaxTokens(prompt);
    const model = selectModel(options.modelKey);

    logger.debug(LogCategory.REVIEW, `Mode: ${options.mode}, model: ${model}, prompt: ${promptLength(prompt)} chars`);

    const response = await deps.provider.complete(model, prompt, maxTokens);
    logger.debug(LogCategory.REVIEW, `Raw response: ${JSON.stringify(response, null, 2)}`);

    if (isErrorResponse(response)) {
        const rendered = formatProviderError(response.error, colors);
        deps.write(rendered);
        return { output: echo + rendered, exitCode: 1, response };
    }

    const choice = firstChoice(response);
    const rendered = choice
        ? formatChoice(choice, colors, ansi)
        : colors.red(NO_RESPONSE);
    deps.write(rendered);

    return { output: echo + rendered, exitCode: 0, response };
}
