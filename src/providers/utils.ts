/**
 * Shared utilities for provider adapters.
 */
import { ProviderError } from '../utils/errors.js';
import { HttpError } from '../utils/http-client.js';

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((item) => typeof item === 'number' && Number.isFinite(item));
}

export function numberOr(value: unknown, fallback: number): number {
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function stringOr(value: unknown, fallback: string): string {
    return typeof value === 'string' ? value : fallback;
}

/**
 * Translate a transport failure into a ProviderError, keeping the
 * retryable classification made by the HTTP client.
 */
export function toProviderError(error: unknown, provider: string, operation: string): ProviderError {
    if (error instanceof ProviderError) return error;

    if (error instanceof HttpError) {
        return new ProviderError(
            `${provider} ${operation} failed: ${error.message}${describeBody(error.response)}`,
            provider,
            error.retryable,
            error.status || undefined,
            { cause: error }
        );
    }

    return new ProviderError(
        `${provider} ${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
        provider,
        false,
        undefined,
        { cause: error }
    );
}

/**
 * Error for a 2xx response whose body does not have the expected shape.
 */
export function malformedResponse(provider: string, operation: string, detail: string): ProviderError {
    return new ProviderError(`${provider} ${operation} returned a malformed response: ${detail}`, provider, false);
}

/**
 * Join a base URL and a path without doubling slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
    return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function describeBody(body: unknown): string {
    const error = isRecord(body) ? body['error'] : undefined;
    if (typeof error === 'string') return ` (${error})`;

    const message = isRecord(error) ? error['message'] : undefined;
    return typeof message === 'string' ? ` (${message})` : '';
}
