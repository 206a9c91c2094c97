/**
 * Process exit codes
 */

export const EXIT_CODES = {
    SUCCESS: 0,
    /** The completion API answered with an error payload */
    PROVIDER_ERROR: 1,
    /** Missing credential, or a prompt too long for the model */
    CONFIG_ERROR: 2,
    /** The completion API could not be reached or answered garbage */
    AI_UNAVAILABLE: 3,
    INTERNAL_ERROR: 4,
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];
