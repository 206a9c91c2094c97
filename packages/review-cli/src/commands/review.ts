/**
 * Review Command
 *
 * Reviews the clipboard contents: builds the completion client, runs one
 * review and maps the outcome onto a process exit code.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import {
    CompletionClient,
    ErrorCode,
    LogCategory,
    getLogger,
    isClipReviewError,
    runReview,
    setLogger,
} from '@clip-review/review-core';
import type {
    CompletionClientOptions,
    CompletionProvider,
    ErrorCodeType,
    ReviewMode,
} from '@clip-review/review-core';
import { readClipboard } from '../clipboard';
import { ENV_API_KEY } from '../config';
import {
    Spinner,
    createCLILogger,
    printError,
    printWarning,
    setColorEnabled,
    setVerbosity,
} from '../logger';
import { EXIT_CODES } from '../exit-codes';
import type { ExitCode } from '../exit-codes';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the review command
 */
export interface ReviewCommandOptions {
    /** Instruction verb */
    mode: ReviewMode;
    /** Model key */
    model: string;
    /** Completion API credential */
    apiKey?: string;
    /** Completion API base URL */
    baseUrl: string;
    /** Request timeout in seconds */
    timeout?: number;
    /** Debug logging */
    verbose: boolean;
    /** Colored output */
    color: boolean;
}

/**
 * Replaceable collaborators (tests inject fakes)
 */
export interface ReviewCommandDeps {
    readClipboard?: () => Promise<string>;
    write?: (text: string) => void;
    createProvider?: (options: CompletionClientOptions) => CompletionProvider;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Exit code for a failure thrown while reviewing
 */
export function exitCodeForError(code: ErrorCodeType): ExitCode {
    switch (code) {
        case ErrorCode.MISSING_CREDENTIAL:
        case ErrorCode.TOKEN_BUDGET_EXCEEDED:
            return EXIT_CODES.CONFIG_ERROR;
        case ErrorCode.AI_TRANSPORT_FAILED:
        case ErrorCode.AI_RESPONSE_PARSE_FAILED:
        case ErrorCode.TIMEOUT:
            return EXIT_CODES.AI_UNAVAILABLE;
        default:
            return EXIT_CODES.INTERNAL_ERROR;
    }
}

/**
 * Show a spinner on stderr for the duration of each completion request
 */
export function withSpinner(provider: CompletionProvider, spinner: Spinner): CompletionProvider {
    return {
        async complete(model, prompt, maxTokens) {
            spinner.start(`Asking ${model}...`);
            try {
                return await provider.complete(model, prompt, maxTokens);
            } finally {
                spinner.stop();
            }
        },
    };
}

// ============================================================================
// Review Command
// ============================================================================

/**
 * Execute the review command
 *
 * @returns exit code
 */
export async function executeReview(
    options: ReviewCommandOptions,
    deps: ReviewCommandDeps = {}
): Promise<ExitCode> {
    setColorEnabled(options.color);
    if (options.verbose) {
        setVerbosity('verbose');
    }
    setLogger(createCLILogger());

    const write = deps.write ?? ((text: string) => { process.stdout.write(text); });
    const createProvider = deps.createProvider ?? ((clientOptions: CompletionClientOptions) => new CompletionClient(clientOptions));
    const read = deps.readClipboard ?? (() => readClipboard());

    try {
        // The credential is checked before the clipboard is touched
        const provider = createProvider({
            apiKey: options.apiKey,
            baseUrl: options.baseUrl,
            timeoutMs: options.timeout ? options.timeout * 1000 : undefined,
        });

        const result = await runReview(
            { mode: options.mode, modelKey: options.model },
            {
                provider: withSpinner(provider, new Spinner()),
                readClipboard: async () => {
                    const text = await read();
                    if (text === '') {
                        printWarning('Clipboard is empty');
                    }
                    return text;
                },
                write,
                colors: options.color,
            }
        );
        write('\n');

        return result.exitCode === 1 ? EXIT_CODES.PROVIDER_ERROR : EXIT_CODES.SUCCESS;
    } catch (error) {
        if (isClipReviewError(error)) {
            if (error.code === ErrorCode.MISSING_CREDENTIAL) {
                printError(`${ENV_API_KEY} is not set`);
            } else {
                printError(error.message);
            }
            getLogger().debug(LogCategory.REVIEW, error.toDetailedString());
            return exitCodeForError(error.code);
        }
        throw error;
    }
}
