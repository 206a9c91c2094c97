/**
 * Response Classifier
 *
 * Decides whether a completion response is a provider error and whether a
 * choice finished cleanly.
 */

import type { CompletionChoice, CompletionError, CompletionResponse } from './types';

/** Finish reason reported for a clean stop */
export const FINISH_REASON_STOP = 'stop';

/**
 * True iff the response carries an error payload.
 */
export function isErrorResponse(
    response: CompletionResponse
): response is CompletionResponse & { error: CompletionError } {
    return response.error !== undefined;
}

/**
 * True iff generation ended cleanly. A truncated choice is still shown,
 * just without the valid-response marker.
 */
export function isValidChoice(choice: Pick<CompletionChoice, 'finish_reason'>): boolean {
    return choice.finish_reason === FINISH_REASON_STOP;
}

/**
 * The first choice of a response, if any.
 */
export function firstChoice(response: CompletionResponse): CompletionChoice | undefined {
    return response.choices?.[0];
}
