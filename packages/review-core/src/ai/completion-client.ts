/**
 * Completion Client
 *
 * Sends one prompt to a hosted text-completion endpoint and hands back the
 * parsed body untouched, provider error payloads included. There is no retry;
 * a timeout applies only when one is configured.
 */

import { ClipReviewError, ErrorCode, wrapError } from '../errors';
import { getLogger, LogCategory } from '../logger';
import { httpPostJson } from '../utils/http-utils';
import type {
    CompletionChoice,
    CompletionError,
    CompletionProvider,
    CompletionRequest,
    CompletionResponse,
} from './types';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for constructing a completion client
 */
export interface CompletionClientOptions {
    /** Bearer credential for the completion API */
    apiKey: string | undefined;
    /** API base URL; `/completions` is appended */
    baseUrl?: string;
    /** Request timeout in milliseconds (unset: wait indefinitely) */
    timeoutMs?: number;
}

/** Default completion API base URL */
export const DEFAULT_BASE_URL = 'https://api.openai.com/v1';

// ============================================================================
// Response Parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Any truthy `error` is a provider error; a bare value becomes the message.
 */
function parseError(value: unknown): CompletionError | undefined {
    if (!value) {
        return undefined;
    }
    if (!isRecord(value)) {
        return { type: '', message: typeof value === 'string' ? value : JSON.stringify(value) };
    }
    return {
        type: typeof value.type === 'string' ? value.type : String(value.type ?? ''),
        message: typeof value.message === 'string' ? value.message : String(value.message ?? ''),
    };
}

function parseChoices(value: unknown): CompletionChoice[] | undefined {
    if (!Array.isArray(value)) {
        return undefined;
    }
    const choices: CompletionChoice[] = [];
    for (const item of value) {
        if (isRecord(item) && typeof item.text === 'string') {
            choices.push({
                text: item.text,
                finish_reason: typeof item.finish_reason === 'string' ? item.finish_reason : null,
            });
        }
    }
    return choices;
}

/**
 * Narrow a decoded JSON body to a {@link CompletionResponse}.
 * Fields other than `error` and `choices` are dropped.
 *
 * @throws ClipReviewError with code AI_RESPONSE_PARSE_FAILED for a non-object body
 */
export function parseCompletionResponse(value: unknown): CompletionResponse {
    if (!isRecord(value)) {
        throw new ClipReviewError('Completion response is not a JSON object', {
            code: ErrorCode.AI_RESPONSE_PARSE_FAILED,
        });
    }

    const response: CompletionResponse = {};
    const error = parseError(value.error);
    if (error) {
        response.error = error;
    }
    const choices = parseChoices(value.choices);
    if (choices) {
        response.choices = choices;
    }
    return response;
}

// ============================================================================
// Client
// ============================================================================

/**
 * HTTP client for the completion endpoint.
 */
export class CompletionClient implements CompletionProvider {
    private readonly apiKey: string;
    private readonly endpoint: string;
    private readonly timeoutMs?: number;

    /**
     * @throws ClipReviewError with code MISSING_CREDENTIAL when no key is given
     */
    constructor(options: CompletionClientOptions) {
        if (!options.apiKey || options.apiKey.trim() === '') {
            throw new ClipReviewError('No API key supplied for the completion endpoint', {
                code: ErrorCode.MISSING_CREDENTIAL,
            });
        }
        this.apiKey = options.apiKey;
        this.endpoint = `${(options.baseUrl || DEFAULT_BASE_URL).replace(/\/+$/, '')}/completions`;
        this.timeoutMs = options.timeoutMs;
    }

    async complete(model: string, prompt: string, maxTokens: number): Promise<CompletionResponse> {
        const logger = getLogger();
        const request: CompletionRequest = {
            model,
            prompt,
            max_tokens: maxTokens,
        };

        logger.debug(LogCategory.AI, `POST ${this.endpoint} (model: ${model}, max_tokens: ${maxTokens})`);

        const res = await httpPostJson(this.endpoint, request, {
            headers: { 'Authorization': `Bearer ${this.apiKey}` },
            timeout: this.timeoutMs,
        });

        logger.debug(LogCategory.AI, `HTTP ${res.statusCode}, ${res.body.length} bytes`);

        let decoded: unknown;
        try {
            decoded = JSON.parse(res.body);
        } catch (error) {
            throw wrapError(
                `Completion endpoint returned a non-JSON body (HTTP ${res.statusCode})`,
                error,
                ErrorCode.AI_RESPONSE_PARSE_FAILED,
                { url: this.endpoint, statusCode: res.statusCode }
            );
        }

        return parseCompletionResponse(decoded);
    }
}
