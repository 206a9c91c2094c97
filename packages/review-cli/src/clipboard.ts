/**
 * Clipboard Reader
 *
 * Reads the system clipboard as plain text through the platform's clipboard
 * command. Never throws: an empty or unreachable clipboard reads as ''.
 *
 * Cross-platform compatible (Linux/Mac/Windows).
 */

import { execFile } from 'child_process';
import { getLogger, LogCategory } from '@clip-review/review-core';

// ============================================================================
// Types
// ============================================================================

export interface ClipboardCommand {
    command: string;
    args: string[];
}

/**
 * Runs a command and resolves its stdout; rejects on a non-zero exit
 */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export interface ClipboardReadOptions {
    platform?: NodeJS.Platform;
    run?: CommandRunner;
}

// ============================================================================
// Commands
// ============================================================================

/**
 * Candidate clipboard commands for a platform, in the order they are tried
 */
export function clipboardCommands(platform: NodeJS.Platform = process.platform): ClipboardCommand[] {
    if (platform === 'darwin') {
        return [{ command: 'pbpaste', args: [] }];
    }
    if (platform === 'win32') {
        return [{ command: 'powershell', args: ['-NoProfile', '-Command', 'Get-Clipboard'] }];
    }
    return [
        { command: 'xclip', args: ['-o', '-selection', 'clipboard'] },
        { command: 'xsel', args: ['--clipboard', '--output'] },
    ];
}

/**
 * Default runner built on child_process.execFile
 */
export function execFileAsync(command: string, args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
        execFile(
            command,
            args,
            {
                timeout: 30000, // 30 second default timeout
                maxBuffer: 10 * 1024 * 1024, // 10MB buffer
                encoding: 'utf-8',
            },
            (error, stdout) => {
                if (error) {
                    reject(error);
                } else {
                    resolve(stdout);
                }
            }
        );
    });
}

// ============================================================================
// Reader
// ============================================================================

/**
 * Read the clipboard text.
 *
 * Tries each candidate command in turn and returns the first successful
 * output unchanged. Returns '' when every command fails.
 */
export async function readClipboard(options: ClipboardReadOptions = {}): Promise<string> {
    const logger = getLogger();
    const run = options.run ?? execFileAsync;
    const failures: string[] = [];

    for (const { command, args } of clipboardCommands(options.platform)) {
        try {
            const text = await run(command, args);
            logger.debug(LogCategory.CLIPBOARD, `Read ${text.length} characters with ${command}`);
            return text;
        } catch (error) {
            failures.push(`${command}: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    logger.warn(LogCategory.CLIPBOARD, `Could not read the clipboard (${failures.join('; ')})`);
    return '';
}
