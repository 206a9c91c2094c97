/**
 * CLI Configuration
 *
 * Resolves CLI configuration from environment variables. There is no config
 * file; command-line options are merged on top of the result.
 *
 * Environment:
 *   OPENAI_API_KEY   Bearer credential for the completion API (required)
 *   OPENAI_BASE_URL  Completion API base URL
 *   NO_COLOR         Disable colored output when set
 */

import { DEFAULT_BASE_URL, DEFAULT_MODE } from '@clip-review/review-core';
import type { ReviewMode } from '@clip-review/review-core';

// ============================================================================
// Types
// ============================================================================

/**
 * Partial configuration from one source (environment or flags)
 */
export interface CLIConfig {
    /** Completion API credential */
    apiKey?: string;
    /** Completion API base URL */
    baseUrl?: string;
    /** Model key */
    model?: string;
    /** Instruction verb */
    mode?: ReviewMode;
    /** Request timeout in seconds */
    timeout?: number;
    /** Colored output */
    color?: boolean;
    /** Debug logging */
    verbose?: boolean;
}

/**
 * Resolved CLI configuration with all defaults applied
 */
export interface ResolvedCLIConfig {
    apiKey?: string;
    baseUrl: string;
    model: string;
    mode: ReviewMode;
    timeout?: number;
    color: boolean;
    verbose: boolean;
}

// ============================================================================
// Constants
// ============================================================================

export const ENV_API_KEY = 'OPENAI_API_KEY';
export const ENV_BASE_URL = 'OPENAI_BASE_URL';
export const ENV_NO_COLOR = 'NO_COLOR';

/** Default configuration values */
export const DEFAULT_CONFIG: ResolvedCLIConfig = {
    baseUrl: DEFAULT_BASE_URL,
    model: 'davinci003',
    mode: DEFAULT_MODE,
    color: true,
    verbose: false,
};

// ============================================================================
// Config Resolution
// ============================================================================

/**
 * Read configuration from environment variables.
 * Empty values count as unset.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): CLIConfig {
    const result: CLIConfig = {};

    const apiKey = env[ENV_API_KEY];
    if (apiKey && apiKey.trim() !== '') {
        result.apiKey = apiKey;
    }

    const baseUrl = env[ENV_BASE_URL];
    if (baseUrl && baseUrl.trim() !== '') {
        result.baseUrl = baseUrl.trim();
    }

    if (env[ENV_NO_COLOR] !== undefined) {
        result.color = false;
    }

    return result;
}

/**
 * Resolve CLI configuration by merging the environment with defaults.
 * Command-line options should be applied on top of the result.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): ResolvedCLIConfig {
    return mergeConfig(DEFAULT_CONFIG, loadEnvConfig(env));
}

/**
 * Merge a partial config on top of a base config
 */
export function mergeConfig(base: ResolvedCLIConfig, override?: CLIConfig): ResolvedCLIConfig {
    if (!override) {
        return { ...base };
    }

    return {
        apiKey: override.apiKey ?? base.apiKey,
        baseUrl: override.baseUrl ?? base.baseUrl,
        model: override.model ?? base.model,
        mode: override.mode ?? base.mode,
        timeout: override.timeout ?? base.timeout,
        color: override.color ?? base.color,
        verbose: override.verbose ?? base.verbose,
    };
}
