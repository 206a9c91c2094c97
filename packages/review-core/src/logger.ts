/**
 * Logger abstraction for review-core.
 *
 * The core never writes diagnostics directly; it goes through a logger that the
 * host (CLI, tests) can replace.
 *
 * Usage:
 *   import { getLogger, setLogger } from '@clip-review/review-core';
 *
 *   const logger = getLogger();
 *   logger.debug(LogCategory.AI, 'Raw completion response: ...');
 *
 *   // The CLI swaps in a stderr logger that honours --verbose
 *   setLogger(createCLILogger());
 */

/**
 * Log categories for different subsystems
 */
export enum LogCategory {
    /** Completion API calls */
    AI = 'AI',
    /** Clipboard access */
    CLIPBOARD = 'Clipboard',
    /** Review run orchestration */
    REVIEW = 'Review',
    /** General operations */
    GENERAL = 'General'
}

/**
 * Logger interface that can be implemented by different environments.
 */
export interface Logger {
    /**
     * Log a debug message (verbose, for development)
     */
    debug(category: string, message: string): void;

    /**
     * Log an informational message
     */
    info(category: string, message: string): void;

    /**
     * Log a warning message
     */
    warn(category: string, message: string): void;

    /**
     * Log an error message with optional Error object
     */
    error(category: string, message: string, error?: Error): void;
}

/**
 * Console-based logger implementation.
 */
export const consoleLogger: Logger = {
    debug: (cat, msg) => console.debug(`[DEBUG] [${cat}] ${msg}`),
    info: (cat, msg) => console.log(`[INFO] [${cat}] ${msg}`),
    warn: (cat, msg) => console.warn(`[WARN] [${cat}] ${msg}`),
    error: (cat, msg, err) => console.error(`[ERROR] [${cat}] ${msg}`, err || ''),
};

/**
 * Null logger that discards all messages.
 */
export const nullLogger: Logger = {
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
};

let globalLogger: Logger = consoleLogger;

/**
 * Set the global logger instance.
 */
export function setLogger(logger: Logger): void {
    globalLogger = logger;
}

/**
 * Get the current global logger instance.
 */
export function getLogger(): Logger {
    return globalLogger;
}

/**
 * Reset the logger to the default console logger.
 * Primarily useful for testing.
 */
export function resetLogger(): void {
    globalLogger = consoleLogger;
}
