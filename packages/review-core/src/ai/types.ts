/**
 * Completion API Types
 *
 * Shapes of the text-completion endpoint's request and response. The endpoint
 * owns this contract; field names follow its wire format.
 */

/**
 * Error payload returned by the provider
 */
export interface CompletionError {
    type: string;
    message: string;
}

/**
 * One candidate completion
 */
export interface CompletionChoice {
    text: string;
    /** 'stop' on a clean finish, 'length' when truncated */
    finish_reason: string | null;
}

/**
 * Parsed body of a completion response
 */
export interface CompletionResponse {
    error?: CompletionError;
    choices?: CompletionChoice[];
}

/**
 * Request body sent to the completion endpoint
 */
export interface CompletionRequest {
    model: string;
    prompt: string;
    max_tokens: number;
}

/**
 * Anything that can answer a completion request.
 * The review runner depends on this rather than on the HTTP client.
 */
export interface CompletionProvider {
    complete(model: string, prompt: string, maxTokens: number): Promise<CompletionResponse>;
}
