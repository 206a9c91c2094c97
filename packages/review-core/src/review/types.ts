/**
 * Review Runner Types
 */

import type { ReviewMode } from '../ai/prompt-builder';
import type { CompletionProvider, CompletionResponse } from '../ai/types';

/**
 * What to ask for in one review run
 */
export interface ReviewOptions {
    /** Instruction verb embedded in the prompt */
    mode: ReviewMode;
    /** Model key resolved through the registry (unknown keys use the default model) */
    modelKey?: string;
}

/**
 * Collaborators a review run talks to
 */
export interface ReviewDependencies {
    /** Completion backend */
    provider: CompletionProvider;
    /** Reads the text to review; resolves '' when there is none */
    readClipboard: () => Promise<string>;
    /** Output sink; receives the echo first, then the rest of the output */
    write: (text: string) => void;
    /** ANSI colors in the output (default true) */
    colors?: boolean;
}

/**
 * Outcome of a review run
 */
export interface ReviewResult {
    /** Everything written during the run, concatenated */
    output: string;
    /** 1 when the provider returned an error payload, else 0 */
    exitCode: 0 | 1;
    /** The parsed completion response */
    response: CompletionResponse;
}
