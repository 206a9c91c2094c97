/**
 * Error Codes for review-core
 *
 * Well-known error codes so callers can branch on failures without parsing
 * messages. The CLI maps these onto process exit codes.
 *
 * Categories:
 * - Configuration: MISSING_CREDENTIAL, TOKEN_BUDGET_EXCEEDED
 * - AI operations: AI_TRANSPORT_FAILED, AI_RESPONSE_PARSE_FAILED
 * - Control flow: TIMEOUT
 */

/**
 * Error codes as a const object for type safety and autocompletion
 */
export const ErrorCode = {
    // =========================================================================
    // Configuration
    // =========================================================================
    /** No API credential was supplied */
    MISSING_CREDENTIAL: 'MISSING_CREDENTIAL',
    /** Prompt leaves no room for a response within the model's context */
    TOKEN_BUDGET_EXCEEDED: 'TOKEN_BUDGET_EXCEEDED',

    // =========================================================================
    // AI Operations
    // =========================================================================
    /** The completion request never produced an HTTP response */
    AI_TRANSPORT_FAILED: 'AI_TRANSPORT_FAILED',
    /** The completion endpoint answered with something other than JSON */
    AI_RESPONSE_PARSE_FAILED: 'AI_RESPONSE_PARSE_FAILED',

    // =========================================================================
    // Control Flow
    // =========================================================================
    /** Operation exceeded its timeout limit */
    TIMEOUT: 'TIMEOUT',

    // =========================================================================
    // Unknown / Fallback
    // =========================================================================
    /** Error code could not be determined */
    UNKNOWN: 'UNKNOWN',
} as const;

/**
 * Type representing valid error codes
 */
export type ErrorCodeType = typeof ErrorCode[keyof typeof ErrorCode];

/**
 * Map Node.js system error codes to our error codes
 */
export function mapSystemErrorCode(nodeCode: string): ErrorCodeType {
    switch (nodeCode) {
        case 'ETIMEDOUT':
        case 'ESOCKETTIMEDOUT':
            return ErrorCode.TIMEOUT;
        case 'ECONNREFUSED':
        case 'ECONNRESET':
        case 'ENOTFOUND':
        case 'EAI_AGAIN':
        case 'EPIPE':
            return ErrorCode.AI_TRANSPORT_FAILED;
        default:
            return ErrorCode.UNKNOWN;
    }
}
