/**
 * Review Command Tests
 *
 * Runs the review command against an injected clipboard, writer and
 * completion provider, and checks the exit code for each outcome.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { ClipReviewError, ErrorCode, resetLogger } from '@clip-review/review-core';
import type { CompletionProvider, CompletionResponse } from '@clip-review/review-core';
import { executeReview, exitCodeForError, withSpinner } from '../../src/commands/review';
import type { ReviewCommandOptions } from '../../src/commands/review';
import { setColorEnabled, setVerbosity, Spinner, SYMBOLS } from '../../src/logger';

const DELIM = '\n' + '~'.repeat(20) + '\n';

function baseOptions(overrides: Partial<ReviewCommandOptions> = {}): ReviewCommandOptions {
    return {
        mode: 'comment',
        model: 'davinci003',
        apiKey: 'test-secret',
        baseUrl: 'http://127.0.0.1:1/v1',
        verbose: false,
        color: false,
        ...overrides,
    };
}

function createHarness(clipboard: string, response: CompletionResponse | Error) {
    const chunks: string[] = [];
    const complete = vi.fn<Parameters<CompletionProvider['complete']>, ReturnType<CompletionProvider['complete']>>();
    if (response instanceof Error) {
        complete.mockRejectedValue(response);
    } else {
        complete.mockResolvedValue(response);
    }
    const readClipboard = vi.fn<[], Promise<string>>().mockResolvedValue(clipboard);
    const createProvider = vi.fn(() => ({ complete }));
    return {
        chunks,
        complete,
        readClipboard,
        createProvider,
        deps: {
            readClipboard,
            createProvider,
            write: (text: string) => { chunks.push(text); },
        },
    };
}

describe('Review Command', () => {
    let stderrSpy: MockInstance;

    beforeEach(() => {
        stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    });

    afterEach(() => {
        stderrSpy.mockRestore();
        setColorEnabled(true);
        setVerbosity('normal');
        resetLogger();
    });

    // ========================================================================
    // Outcomes
    // ========================================================================

    it('should print the echo and the answer, and succeed', async () => {
        const h = createHarness('puts 1', {
            choices: [{ text: 'Looks fine.', finish_reason: 'stop' }],
        });

        const code = await executeReview(baseOptions(), h.deps);

        expect(code).toBe(0);
        expect(h.chunks).toEqual([
            `${DELIM}puts 1${DELIM}`,
            'Valid Response: ✔Looks fine.',
            '\n',
        ]);
        const prompt = 'Can you comment Ruby code: `puts 1`?';
        expect(h.complete).toHaveBeenCalledWith('text-davinci-003', prompt, 4097 - prompt.length);
    });

    it('should pass the mode and model through', async () => {
        const h = createHarness('x = 1', { choices: [] });

        const code = await executeReview(baseOptions({ mode: 'fix', model: 'turbo' }), h.deps);

        expect(code).toBe(0);
        expect(h.chunks[1]).toBe('No response!!');
        expect(h.complete).toHaveBeenCalledWith('gpt-3.5-turbo', 'Can you fix Ruby code: `x = 1`?', expect.any(Number));
    });

    it('should exit 1 on a provider error payload', async () => {
        const h = createHarness('puts 1', {
            error: { type: 'invalid_request_error', message: 'bad model' },
        });

        const code = await executeReview(baseOptions(), h.deps);

        expect(code).toBe(1);
        expect(h.chunks[1]).toBe(' ERROR! \n   type: invalid_request_error \n   message: bad model \n');
    });

    it('should exit 2 without reading the clipboard when the key is missing', async () => {
        const readClipboard = vi.fn<[], Promise<string>>().mockResolvedValue('puts 1');
        const chunks: string[] = [];

        const code = await executeReview(
            baseOptions({ apiKey: undefined }),
            { readClipboard, write: (text) => { chunks.push(text); } }
        );

        expect(code).toBe(2);
        expect(readClipboard).not.toHaveBeenCalled();
        expect(chunks).toEqual([]);
        expect(stderrSpy).toHaveBeenCalledWith(`${SYMBOLS.error} OPENAI_API_KEY is not set\n`);
    });

    it('should exit 2 when the prompt exceeds the token budget', async () => {
        const h = createHarness('x'.repeat(5000), { choices: [] });

        const code = await executeReview(baseOptions(), h.deps);

        expect(code).toBe(2);
        expect(h.complete).not.toHaveBeenCalled();
        expect(h.chunks).toEqual([`${DELIM}${'x'.repeat(5000)}${DELIM}`]);
    });

    it('should exit 3 when the endpoint is unreachable', async () => {
        const h = createHarness('puts 1', new ClipReviewError('connect ECONNREFUSED', {
            code: ErrorCode.AI_TRANSPORT_FAILED,
        }));

        const code = await executeReview(baseOptions(), h.deps);

        expect(code).toBe(3);
        expect(stderrSpy).toHaveBeenCalledWith(`${SYMBOLS.error} connect ECONNREFUSED\n`);
    });

    it('should rethrow errors it does not recognise', async () => {
        const h = createHarness('puts 1', new TypeError('unexpected'));

        await expect(executeReview(baseOptions(), h.deps)).rejects.toThrow('unexpected');
    });

    it('should warn about an empty clipboard and still ask', async () => {
        const h = createHarness('', { choices: [{ text: 'Nothing to see.', finish_reason: 'length' }] });

        const code = await executeReview(baseOptions(), h.deps);

        expect(code).toBe(0);
        expect(stderrSpy).toHaveBeenCalledWith(`${SYMBOLS.warning} Clipboard is empty\n`);
        expect(h.chunks[1]).toBe('Nothing to see.');
    });

    it('should build the provider from the options', async () => {
        const h = createHarness('puts 1', { choices: [] });

        await executeReview(baseOptions({ timeout: 5 }), h.deps);

        expect(h.createProvider).toHaveBeenCalledWith({
            apiKey: 'test-secret',
            baseUrl: 'http://127.0.0.1:1/v1',
            timeoutMs: 5000,
        });
    });

    // ========================================================================
    // Helpers
    // ========================================================================

    describe('exitCodeForError', () => {
        it('should map configuration failures to 2', () => {
            expect(exitCodeForError(ErrorCode.MISSING_CREDENTIAL)).toBe(2);
            expect(exitCodeForError(ErrorCode.TOKEN_BUDGET_EXCEEDED)).toBe(2);
        });

        it('should map endpoint failures to 3', () => {
            expect(exitCodeForError(ErrorCode.AI_TRANSPORT_FAILED)).toBe(3);
            expect(exitCodeForError(ErrorCode.AI_RESPONSE_PARSE_FAILED)).toBe(3);
            expect(exitCodeForError(ErrorCode.TIMEOUT)).toBe(3);
        });

        it('should map anything else to 4', () => {
            expect(exitCodeForError(ErrorCode.UNKNOWN)).toBe(4);
        });
    });

    describe('withSpinner', () => {
        it('should stop the spinner when the request fails', async () => {
            const spinner = new Spinner();
            const provider: CompletionProvider = {
                complete: () => Promise.reject(new Error('down')),
            };

            await expect(withSpinner(provider, spinner).complete('gpt-3.5-turbo', 'p', 10)).rejects.toThrow('down');
            expect(spinner.isRunning).toBe(false);
            expect(spinner.message).toBe('Asking gpt-3.5-turbo...');
        });
    });
});
