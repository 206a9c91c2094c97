/**
 * review-core
 *
 * Asks a hosted completion model about a snippet of Ruby code and renders the
 * answer for a terminal.
 *
 * @example
 * ```typescript
 * import { CompletionClient, runReview } from '@clip-review/review-core';
 *
 * const provider = new CompletionClient({ apiKey: process.env.OPENAI_API_KEY });
 * const result = await runReview(
 *     { mode: 'comment', modelKey: 'davinci003' },
 *     { provider, readClipboard: async () => 'def f; end', write: t => process.stdout.write(t) }
 * );
 * process.exitCode = result.exitCode;
 * ```
 */

// ============================================================================
// Logger
// ============================================================================

export {
    LogCategory,
    consoleLogger,
    nullLogger,
    setLogger,
    getLogger,
    resetLogger
} from './logger';
export type { Logger } from './logger';

// ============================================================================
// Errors
// ============================================================================

export {
    ErrorCode,
    mapSystemErrorCode,
    ClipReviewError,
    isClipReviewError,
    toClipReviewError,
    wrapError,
    logError,
} from './errors';
export type { ErrorCodeType, ErrorMetadata } from './errors';

// ============================================================================
// AI
// ============================================================================

export {
    MODEL_REGISTRY,
    DEFAULT_MODEL_ID,
    selectModel,
    getModelDefinition,
    getAllModels,
    isKnownModelKey,
} from './ai/model-registry';
export type { ModelDefinition, ModelKey } from './ai/model-registry';

export {
    REVIEW_MODES,
    DEFAULT_MODE,
    TARGET_LANGUAGE,
    TOTAL_TOKEN_BUDGET,
    isReviewMode,
    buildPrompt,
    computeMaxTokens,
    promptLength,
} from './ai/prompt-builder';
export type { ReviewMode } from './ai/prompt-builder';

export {
    CompletionClient,
    DEFAULT_BASE_URL,
    parseCompletionResponse,
} from './ai/completion-client';
export type { CompletionClientOptions } from './ai/completion-client';

export {
    FINISH_REASON_STOP,
    isErrorResponse,
    isValidChoice,
    firstChoice,
} from './ai/response-classifier';

export type {
    CompletionChoice,
    CompletionError,
    CompletionProvider,
    CompletionRequest,
    CompletionResponse,
} from './ai/types';

// ============================================================================
// Rendering
// ============================================================================

export { extractCode, fencePattern } from './utils/code-extractor';
export { highlightCode, htmlToAnsi, slotForClasses } from './rendering/highlighter';
export type { HighlightOptions } from './rendering/highlighter';
export { darkSyntaxColors, hexToAnsi256 } from './rendering/syntax-theme';
export type { SyntaxColors, SyntaxSlot } from './rendering/syntax-theme';
export { ansiPalette, plainPalette, getPalette } from './rendering/colors';
export type { ColorPalette } from './rendering/colors';

// ============================================================================
// Review
// ============================================================================

export {
    runReview,
    formatEcho,
    formatChoice,
    formatProviderError,
    delimiter,
    TICK,
    NO_RESPONSE,
    FENCE_LANGUAGE,
} from './review/review-runner';
export type { ReviewOptions, ReviewDependencies, ReviewResult } from './review/types';
