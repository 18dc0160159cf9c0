import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, EMBEDDING_STRATEGIES } from '../types/index.js';

describe('Types', () => {
    describe('EMBEDDING_STRATEGIES', () => {
        it('should list both strategies', () => {
            expect(EMBEDDING_STRATEGIES).toEqual(['aggregate', 'summarize']);
        });
    });

    describe('DEFAULT_CONFIG', () => {
        it('should aggregate by default', () => {
            expect(DEFAULT_CONFIG.strategy).toBe('aggregate');
        });

        it('should retry 10 times with a fixed 1 s delay', () => {
            expect(DEFAULT_CONFIG.retry).toEqual({ maxAttempts: 10, delayMs: 1000, backoff: 'fixed' });
        });

        it('should pause 2 s between authors', () => {
            expect(DEFAULT_CONFIG.batch.authorDelayMs).toBe(2000);
        });

        it('should leave the device choice to the runtime', () => {
            expect(DEFAULT_CONFIG.embedding.device).toBe('auto');
        });

        it('should explain nobody by default', () => {
            expect(DEFAULT_CONFIG.explain).toBe(0);
        });
    });
});
