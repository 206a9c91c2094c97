/**
 * Prompt Builder
 *
 * Turns an instruction verb and a snippet of source code into the single
 * prompt string sent to the completion endpoint, and works out how many
 * tokens are left for the answer.
 */

import { ClipReviewError, ErrorCode } from '../errors';

/**
 * Instruction verbs understood by the prompt template.
 */
export const REVIEW_MODES = ['comment', 'check', 'fix', 'explain'] as const;

export type ReviewMode = typeof REVIEW_MODES[number];

/** Mode used when none is given */
export const DEFAULT_MODE: ReviewMode = 'comment';

/** Source language the tool reviews */
export const TARGET_LANGUAGE = 'Ruby';

/**
 * Total context size of the completion models, prompt and answer together.
 * The prompt is measured in characters against it.
 */
export const TOTAL_TOKEN_BUDGET = 4097;

/**
 * Check if a string is a known review mode.
 */
export function isReviewMode(value: string): value is ReviewMode {
    return (REVIEW_MODES as readonly string[]).includes(value);
}

/**
 * Build the prompt for a review request.
 *
 * The code is interpolated as-is: backticks inside it are not escaped.
 */
export function buildPrompt(mode: ReviewMode, code: string): string {
    return `Can you ${mode} ${TARGET_LANGUAGE} code: \`${code}\`?`;
}

/**
 * Prompt length in characters (code points, so an emoji counts once).
 */
export function promptLength(prompt: string): number {
    return [...prompt].length;
}

/**
 * Number of tokens left for the response once the prompt is accounted for.
 *
 * @throws ClipReviewError with code TOKEN_BUDGET_EXCEEDED when nothing is left
 */
export function computeMaxTokens(prompt: string, totalBudget: number = TOTAL_TOKEN_BUDGET): number {
    const length = promptLength(prompt);
    const remaining = totalBudget - length;
    if (remaining <= 0) {
        throw new ClipReviewError(
            `Prompt is ${length} characters long; the model context holds ${totalBudget}`,
            {
                code: ErrorCode.TOKEN_BUDGET_EXCEEDED,
                meta: { promptLength: length, totalBudget },
            }
        );
    }
    return remaining;
}
