/**
 * ClipReviewError
 *
 * Base error class for every failure raised by review-core.
 * Provides structured error information with:
 * - code: Well-known error code for programmatic handling
 * - cause: Original error that caused this error (error chaining)
 * - meta: Additional context metadata
 */

import { ErrorCode, mapSystemErrorCode } from './error-codes';
import type { ErrorCodeType } from './error-codes';
import { getLogger } from '../logger';

/**
 * Metadata that can be attached to errors for debugging
 */
export interface ErrorMetadata {
    /** Endpoint URL of the failing request */
    url?: string;
    /** Prompt length in characters */
    promptLength?: number;
    /** Context budget the prompt was measured against */
    totalBudget?: number;
    /** Timeout value that was exceeded */
    timeoutMs?: number;
    /** HTTP status code, when one was received */
    statusCode?: number;
    /** Additional custom metadata */
    [key: string]: unknown;
}

/**
 * Base error class for review-core.
 *
 * @example
 * ```typescript
 * throw new ClipReviewError('Completion request failed', {
 *     code: ErrorCode.AI_TRANSPORT_FAILED,
 *     cause: originalError,
 *     meta: { url: 'https://api.openai.com/v1/completions' }
 * });
 * ```
 */
export class ClipReviewError extends Error {
    /** Well-known error code for programmatic handling */
    readonly code: ErrorCodeType;

    /** Original error that caused this error */
    readonly cause?: unknown;

    /** Additional context metadata */
    readonly meta?: ErrorMetadata;

    constructor(
        message: string,
        options?: {
            code?: ErrorCodeType;
            cause?: unknown;
            meta?: ErrorMetadata;
        }
    ) {
        super(message);

        this.name = 'ClipReviewError';
        this.code = options?.code ?? ErrorCode.UNKNOWN;
        this.cause = options?.cause;
        this.meta = options?.meta;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, new.target.prototype);
    }

    /**
     * Get a formatted string representation including code and metadata
     */
    toDetailedString(): string {
        const parts = [`[${this.code}] ${this.message}`];

        if (this.meta && Object.keys(this.meta).length > 0) {
            parts.push(`Meta: ${JSON.stringify(this.meta)}`);
        }

        if (this.cause instanceof Error) {
            parts.push(`Caused by: ${this.cause.message}`);
        } else if (this.cause !== undefined) {
            parts.push(`Caused by: ${String(this.cause)}`);
        }

        return parts.join('\n');
    }
}

/**
 * Type guard to check if an error is a ClipReviewError
 */
export function isClipReviewError(error: unknown): error is ClipReviewError {
    return error instanceof ClipReviewError;
}

/**
 * Read the `code` property Node attaches to system errors
 */
function systemErrorCode(error: Error): string | undefined {
    if ('code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Convert any error to a ClipReviewError.
 * If already a ClipReviewError, returns as-is.
 * Otherwise wraps the error with appropriate code detection.
 */
export function toClipReviewError(
    error: unknown,
    defaultCode: ErrorCodeType = ErrorCode.UNKNOWN,
    meta?: ErrorMetadata
): ClipReviewError {
    if (isClipReviewError(error)) {
        if (meta) {
            return new ClipReviewError(error.message, {
                code: error.code,
                cause: error.cause,
                meta: { ...error.meta, ...meta },
            });
        }
        return error;
    }

    if (error instanceof Error) {
        const nodeCode = systemErrorCode(error);
        const detectedCode = nodeCode ? mapSystemErrorCode(nodeCode) : defaultCode;

        return new ClipReviewError(error.message, {
            code: detectedCode !== ErrorCode.UNKNOWN ? detectedCode : defaultCode,
            cause: error,
            meta,
        });
    }

    const message = typeof error === 'string' ? error : String(error);
    return new ClipReviewError(message, {
        code: defaultCode,
        cause: error,
        meta,
    });
}

/**
 * Wrap an error with a new message while preserving the original as cause.
 */
export function wrapError(
    message: string,
    cause: unknown,
    code?: ErrorCodeType,
    meta?: ErrorMetadata
): ClipReviewError {
    const causeError = isClipReviewError(cause) ? cause : undefined;
    const effectiveCode = code ?? causeError?.code ?? ErrorCode.UNKNOWN;
    const effectiveMeta = meta ?? causeError?.meta;

    return new ClipReviewError(message, {
        code: effectiveCode,
        cause,
        meta: effectiveMeta,
    });
}

/**
 * Log an error with structured information.
 * Uses the global logger and formats ClipReviewError specially.
 */
export function logError(
    category: string,
    message: string,
    error: unknown
): void {
    const logger = getLogger();

    if (isClipReviewError(error)) {
        const details = [
            `[${error.code}]`,
            error.message,
        ];

        if (error.meta && Object.keys(error.meta).length > 0) {
            details.push(`(${JSON.stringify(error.meta)})`);
        }

        logger.error(category, `${message}: ${details.join(' ')}`, error);
    } else if (error instanceof Error) {
        logger.error(category, `${message}: ${error.message}`, error);
    } else {
        logger.error(category, `${message}: ${String(error)}`);
    }
}
