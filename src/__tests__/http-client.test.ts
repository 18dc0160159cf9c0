import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HttpClient, HttpError } from '../utils/http-client.js';

function jsonResponse(body: unknown, status = 200): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json' },
    });
}

describe('HttpClient', () => {
    let client: HttpClient;

    beforeEach(() => {
        client = new HttpClient({ timeout: 5000 });
    });

    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('responses', () => {
        it('should parse JSON bodies', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ data: [1, 2] })));

            const response = await client.request('https://api.example.com');

            expect(response.ok).toBe(true);
            expect(response.status).toBe(200);
            expect(response.data).toEqual({ data: [1, 2] });
        });

        it('should send objects as JSON with a user agent', async () => {
            const fetchMock = vi.fn(async (_url: string, _init: RequestInit) => jsonResponse({}));
            vi.stubGlobal('fetch', fetchMock);

            await client.post('https://api.example.com/embed', { input: 'x' }, { headers: { Authorization: 'Bearer test-secret' } });

            const init = fetchMock.mock.calls[0]?.[1];
            expect(init?.method).toBe('POST');
            expect(init?.body).toBe('{"input":"x"}');
            expect(init?.headers).toEqual({
                'User-Agent': 'authorfit/1.0.0',
                Authorization: 'Bearer test-secret',
                'Content-Type': 'application/json',
            });
        });
    });

    describe('error classification', () => {
        it.each([
            [429, true],
            [503, true],
            [408, true],
            [400, false],
            [401, false],
            [404, false],
        ])('should classify HTTP %i as retryable=%s', async (status, retryable) => {
            vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'nope' }, status)));

            const error = await client.request('https://api.example.com').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            if (error instanceof HttpError) {
                expect(error.status).toBe(status);
                expect(error.retryable).toBe(retryable);
                expect(error.response).toEqual({ error: 'nope' });
            }
        });

        it('should treat connection resets as retryable', async () => {
            const reset = Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' });
            vi.stubGlobal('fetch', vi.fn(async () => {
                throw new TypeError('fetch failed', { cause: reset });
            }));

            const error = await client.request('https://api.example.com').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(HttpError);
            if (error instanceof HttpError) {
                expect(error.retryable).toBe(true);
                expect(error.message).toBe('Network error: fetch failed');
            }
        });

        it('should not retry unknown network failures', async () => {
            vi.stubGlobal('fetch', vi.fn(async () => {
                throw new Error('certificate has expired');
            }));

            await expect(client.request('https://api.example.com')).rejects.toMatchObject({ retryable: false, status: 0 });
        });
    });
});
