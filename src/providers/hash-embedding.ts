/**
 * Deterministic local embedding provider for offline runs and testing.
 *
 * Every content word hashes into a fixed set of dimensions, so texts that share
 * words have overlapping components and a higher cosine similarity. A small
 * order-dependent component separates texts with the same bag of words.
 * Vectors are unit length. No network, no model download.
 */
import type { EmbeddingProvider } from '../types/index.js';
import { tokenize } from '../nlp/tokenizer.js';

export const DEFAULT_HASH_DIMENSIONS = 256;

/** Dimensions each word contributes to */
const CONTRIBUTIONS_PER_WORD = 16;

/** Weight of the order-dependent component */
const ORDER_WEIGHT = 0.1;

/**
 * FNV-1a 32-bit hash.
 */
function hashString(str: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < str.length; i++) {
        hash ^= str.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193) >>> 0;
    }
    return hash;
}

/**
 * Seeded xorshift32 PRNG returning values in [0, 1].
 */
function createSeededRng(seed: number): () => number {
    let state = seed === 0 ? 1 : seed;
    return () => {
        state ^= state << 13;
        state ^= state >> 17;
        state ^= state << 5;
        state = state >>> 0;
        return state / 0xffffffff;
    };
}

export class HashEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'hash';
    readonly model: string;
    readonly dimensions: number;

    /**
     * @param model - Model label; a trailing number (e.g. `hash-512`) sets the dimensionality
     */
    constructor(model = `hash-${DEFAULT_HASH_DIMENSIONS}`) {
        this.model = model;
        const match = /(\d+)$/.exec(model);
        const parsed = match?.[1] !== undefined ? parseInt(match[1], 10) : NaN;
        this.dimensions = parsed > 0 ? parsed : DEFAULT_HASH_DIMENSIONS;
    }

    async embed(text: string): Promise<number[]> {
        return this.generate(text);
    }

    private generate(text: string): number[] {
        const vector = new Array<number>(this.dimensions).fill(0);
        const words = tokenize(text);

        if (words.length === 0) {
            // No content words: derive the whole vector from the raw text
            const rng = createSeededRng(hashString(text || 'empty'));
            for (let i = 0; i < this.dimensions; i++) {
                vector[i] = rng() * 2 - 1;
            }
        } else {
            for (const word of words) {
                const rng = createSeededRng(hashString(word));
                for (let c = 0; c < CONTRIBUTIONS_PER_WORD; c++) {
                    const dim = Math.floor(rng() * this.dimensions) % this.dimensions;
                    vector[dim] = (vector[dim] ?? 0) + (rng() * 2 - 1);
                }
            }

            const orderRng = createSeededRng(hashString(words.join(' ')));
            for (let i = 0; i < this.dimensions; i++) {
                vector[i] = (vector[i] ?? 0) + ORDER_WEIGHT * (orderRng() * 2 - 1);
            }
        }

        const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
        if (magnitude === 0) {
            vector[0] = 1;
            return vector;
        }
        return vector.map((v) => v / magnitude);
    }
}
