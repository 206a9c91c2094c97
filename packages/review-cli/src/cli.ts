/**
 * CLI Argument Parser
 *
 * Defines the clip-review command and its options using Commander, and
 * routes parsed arguments to the command handlers.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { Argument, Command, InvalidArgumentError } from 'commander';
import { DEFAULT_MODE, REVIEW_MODES, getAllModels, isReviewMode } from '@clip-review/review-core';
import { executeReview } from './commands/review';
import type { ReviewCommandOptions } from './commands/review';
import { executeListModels } from './commands/list-models';
import { mergeConfig, resolveConfig } from './config';
import type { CLIConfig } from './config';

export { EXIT_CODES } from './exit-codes';

// ============================================================================
// Types
// ============================================================================

/**
 * Options as parsed by commander
 */
export interface ParsedOptions {
    model?: string;
    baseUrl?: string;
    timeout?: number;
    verbose?: boolean;
    /** false when --no-color is passed */
    color?: boolean;
    listModels?: boolean;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Parse a strictly positive integer option value
 */
export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Expected a positive integer.');
    }
    return parsed;
}

/**
 * Combine environment configuration with parsed command-line arguments
 */
export function buildReviewOptions(
    mode: string | undefined,
    opts: ParsedOptions,
    env: NodeJS.ProcessEnv = process.env
): ReviewCommandOptions {
    const flags: CLIConfig = {
        mode: mode && isReviewMode(mode) ? mode : undefined,
        model: opts.model,
        baseUrl: opts.baseUrl,
        timeout: opts.timeout,
        // --no-color can only switch colors off; its default must not undo NO_COLOR
        color: opts.color === false ? false : undefined,
        verbose: opts.verbose ? true : undefined,
    };
    return mergeConfig(resolveConfig(env), flags);
}

// ============================================================================
// CLI Setup
// ============================================================================

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
    const program = new Command();
    const modelKeys = getAllModels().map(m => m.key).join(', ');

    program
        .name('clip-review')
        .description('Ask a completion model to review the Ruby code on the clipboard')
        .version('1.0.0')
        .addArgument(
            new Argument('[mode]', 'What to ask for')
                .choices(REVIEW_MODES)
                .default(DEFAULT_MODE)
        )
        .option('-m, --model <key>', `Model key (${modelKeys})`)
        .option('--base-url <url>', 'Completion API base URL')
        .option('--timeout <seconds>', 'Request timeout in seconds (default: wait indefinitely)', parsePositiveInt)
        .option('-v, --verbose', 'Verbose logging, including the raw response', false)
        .option('--no-color', 'Disable colored output')
        .option('--list-models', 'List model keys and exit', false)
        .action(async (mode: string | undefined, opts: ParsedOptions) => {
            const options = buildReviewOptions(mode, opts);

            if (opts.listModels) {
                process.exit(executeListModels(options.model));
            }

            const exitCode = await executeReview(options);
            process.exit(exitCode);
        });

    return program;
}
