/**
 * Errors Module - Public API
 */

export {
    ErrorCode,
    mapSystemErrorCode,
} from './error-codes';
export type { ErrorCodeType } from './error-codes';

export {
    ClipReviewError,
    isClipReviewError,
    toClipReviewError,
    wrapError,
    logError,
} from './clip-review-error';
export type { ErrorMetadata } from './clip-review-error';
