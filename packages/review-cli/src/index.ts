#!/usr/bin/env node

/**
 * clip-review CLI Entry Point
 *
 * Sends the Ruby code on the clipboard to a completion model and prints the
 * answer.
 *
 * Usage:
 *   clip-review [comment|check|fix|explain] [options]
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { LogCategory, logError } from '@clip-review/review-core';
import { createProgram, EXIT_CODES } from './cli';

async function main(): Promise<void> {
    try {
        const program = createProgram();
        await program.parseAsync(process.argv);
    } catch (error) {
        logError(LogCategory.GENERAL, 'clip-review failed', error);
        process.exit(EXIT_CODES.INTERNAL_ERROR);
    }
}

void main();
