import { getLogger } from './logger.js';

const logger = getLogger();

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set([
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'EPIPE',
    'EAI_AGAIN',
    'UND_ERR_SOCKET',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
]);

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await new Promise((resolve) => setTimeout(resolve, waitMs));
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-provider rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    ollama: { tokensPerSecond: 100, maxBurst: 100 },   // Local, effectively unlimited
    default: { tokensPerSecond: 5, maxBurst: 5 },
};

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-provider rate limiting
}

/**
 * HTTP response wrapper. `data` is parsed JSON or text; callers validate it.
 */
export interface HttpResponse {
    status: number;
    headers: Record<string, string>;
    data: unknown;
    ok: boolean;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

/**
 * Centralized HTTP client with per-provider rate limiting and error classification.
 *
 * Each call makes exactly one attempt; retries belong to the caller's
 * RetryPolicy so that every provider call site shares one bound.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: { timeout?: number; version?: string }) {
        this.defaultTimeout = options?.timeout ?? 60000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = `authorfit/${version}`;
    }

    /**
     * Make a single HTTP request with rate limiting.
     * @throws HttpError on a non-2xx status, a timeout, or a network failure
     */
    async request(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        // Acquire rate limit token
        await this.getBucket(source).acquire();

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body !== undefined) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method,
                headers: requestHeaders,
                body: requestBody,
                signal: controller.signal,
            });

            const contentType = response.headers.get('content-type') ?? '';
            const data: unknown = contentType.includes('application/json')
                ? await response.json()
                : await response.text();

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                const retryable = RETRYABLE_STATUS_CODES.has(response.status);
                logger.debug({ status: response.status, retryable, url }, 'HTTP error response');
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    retryable,
                    data
                );
            }

            return { status: response.status, headers: responseHeaders, data, ok: true };
        } catch (error) {
            if (error instanceof HttpError) throw error;

            if (error instanceof Error && error.name === 'AbortError') {
                throw new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
            }

            const code = errorCode(error);
            throw new HttpError(
                `Network error: ${error instanceof Error ? error.message : String(error)}`,
                0,
                code !== undefined && RETRYABLE_ERROR_CODES.has(code)
            );
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Convenience method for POST requests with a JSON body.
     */
    async post(url: string, body: object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
        return this.request(url, { ...options, method: 'POST', body });
    }

    private getBucket(source: string): TokenBucket {
        const existing = this.buckets.get(source);
        if (existing) return existing;

        const config = RATE_LIMITS[source] ?? RATE_LIMITS['default'] ?? { tokensPerSecond: 5, maxBurst: 5 };
        const bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
        this.buckets.set(source, bucket);
        return bucket;
    }
}

/**
 * Extract a system error code from a fetch failure (undici puts it on `cause`).
 */
function errorCode(error: unknown): string | undefined {
    const candidates = [error, error instanceof Error ? error.cause : undefined];
    for (const candidate of candidates) {
        if (typeof candidate === 'object' && candidate !== null && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}
