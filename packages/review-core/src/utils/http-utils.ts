/**
 * HTTP utilities
 * Uses native Node.js http/https modules
 */

import * as https from 'https';
import * as http from 'http';
import { ClipReviewError, ErrorCode, toClipReviewError } from '../errors';

export interface HttpResponse {
    statusCode: number;
    body: string;
    headers: http.IncomingHttpHeaders;
}

export interface HttpPostOptions {
    headers?: Record<string, string>;
    /** Socket idle timeout in milliseconds; 0 or absent waits indefinitely */
    timeout?: number;
}

/**
 * POST a JSON body and collect the full response.
 *
 * Resolves for every HTTP status; rejects when no complete response arrives
 * (connection failure or drop, or the optional timeout elapsing).
 *
 * @param url The URL to post to
 * @param payload Value serialized as the JSON request body
 * @param options Optional request options
 */
export function httpPostJson(url: string, payload: unknown, options?: HttpPostOptions): Promise<HttpResponse> {
    return new Promise((resolve, reject) => {
        const urlObj = new URL(url);
        const isHttps = urlObj.protocol === 'https:';
        const client = isHttps ? https : http;
        const body = JSON.stringify(payload);

        const requestOptions: https.RequestOptions = {
            hostname: urlObj.hostname,
            port: urlObj.port || (isHttps ? 443 : 80),
            path: urlObj.pathname + urlObj.search,
            method: 'POST',
            headers: {
                'User-Agent': 'clip-review',
                'Accept': 'application/json',
                'Content-Type': 'application/json',
                'Content-Length': Buffer.byteLength(body),
                ...options?.headers
            },
        };
        if (options?.timeout) {
            requestOptions.timeout = options.timeout;
        }

        const req = client.request(requestOptions, (res) => {
            let responseBody = '';

            res.setEncoding('utf-8');
            res.on('data', (chunk) => {
                responseBody += chunk;
            });

            res.on('end', () => {
                resolve({
                    statusCode: res.statusCode || 0,
                    body: responseBody,
                    headers: res.headers
                });
            });

            res.on('error', (error) => {
                reject(toClipReviewError(error, ErrorCode.AI_TRANSPORT_FAILED, { url, statusCode: res.statusCode }));
            });

            // Connection dropped mid-body; 'end' will never fire
            res.on('close', () => {
                if (!res.complete) {
                    reject(new ClipReviewError('Connection closed before the response was complete', {
                        code: ErrorCode.AI_TRANSPORT_FAILED,
                        meta: { url, statusCode: res.statusCode },
                    }));
                }
            });
        });

        req.on('error', (error) => {
            reject(toClipReviewError(error, ErrorCode.AI_TRANSPORT_FAILED, { url }));
        });

        req.on('timeout', () => {
            reject(new ClipReviewError('Request timed out', {
                code: ErrorCode.TIMEOUT,
                meta: { url, timeoutMs: options?.timeout },
            }));
            req.destroy();
        });

        req.write(body);
        req.end();
    });
}
