/**
 * Clipboard Tests
 *
 * Tests for platform command selection and the fallback chain, using an
 * injected command runner.
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { resetLogger, setLogger } from '@clip-review/review-core';
import type { Logger } from '@clip-review/review-core';
import { clipboardCommands, readClipboard } from '../src/clipboard';
import type { CommandRunner } from '../src/clipboard';

function createMockLogger(): Logger {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    };
}

describe('Clipboard', () => {
    afterEach(() => {
        resetLogger();
    });

    describe('clipboardCommands', () => {
        it('should use pbpaste on macOS', () => {
            expect(clipboardCommands('darwin')).toEqual([{ command: 'pbpaste', args: [] }]);
        });

        it('should use PowerShell on Windows', () => {
            expect(clipboardCommands('win32')).toEqual([
                { command: 'powershell', args: ['-NoProfile', '-Command', 'Get-Clipboard'] },
            ]);
        });

        it('should try xclip then xsel on Linux', () => {
            expect(clipboardCommands('linux').map(c => c.command)).toEqual(['xclip', 'xsel']);
        });
    });

    describe('readClipboard', () => {
        it('should return the first command output unchanged', async () => {
            const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>()
                .mockResolvedValue('def f\n  1\nend\n');
            setLogger(createMockLogger());

            const text = await readClipboard({ platform: 'darwin', run });

            expect(text).toBe('def f\n  1\nend\n');
            expect(run).toHaveBeenCalledWith('pbpaste', []);
        });

        it('should fall back to the next command', async () => {
            const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>()
                .mockRejectedValueOnce(new Error('spawn xclip ENOENT'))
                .mockResolvedValueOnce('puts 1');
            setLogger(createMockLogger());

            const text = await readClipboard({ platform: 'linux', run });

            expect(text).toBe('puts 1');
            expect(run).toHaveBeenNthCalledWith(2, 'xsel', ['--clipboard', '--output']);
        });

        it('should return an empty string and warn when every command fails', async () => {
            const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>()
                .mockRejectedValueOnce(new Error('spawn xclip ENOENT'))
                .mockRejectedValueOnce(new Error('spawn xsel ENOENT'));
            const logger = createMockLogger();
            setLogger(logger);

            const text = await readClipboard({ platform: 'linux', run });

            expect(text).toBe('');
            expect(logger.warn).toHaveBeenCalledWith(
                'Clipboard',
                'Could not read the clipboard (xclip: spawn xclip ENOENT; xsel: spawn xsel ENOENT)'
            );
        });
    });
});
