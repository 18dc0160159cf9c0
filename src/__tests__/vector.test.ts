import { describe, it, expect } from 'vitest';
import { cosineSimilarity, l2Norm, l2Normalize, meanVector } from '../embedding/vector.js';

describe('vector helpers', () => {
    describe('meanVector', () => {
        it('should average element-wise', () => {
            expect(meanVector([[1, 2, 3], [3, 4, 5]])).toEqual([2, 3, 4]);
        });

        it('should return a copy of a single vector', () => {
            expect(meanVector([[0.5, -1]])).toEqual([0.5, -1]);
        });

        it('should reject an empty list', () => {
            expect(() => meanVector([])).toThrow('empty');
        });

        it('should reject mixed dimensionalities', () => {
            expect(() => meanVector([[1, 2], [1, 2, 3]])).toThrow('Dimension mismatch');
        });
    });

    describe('l2Normalize', () => {
        it('should scale to unit length', () => {
            expect(l2Normalize([3, 4])).toEqual([0.6, 0.8]);
            expect(l2Norm(l2Normalize([1, 2, 2]))).toBeCloseTo(1, 10);
        });

        it('should leave a zero vector unchanged', () => {
            expect(l2Normalize([0, 0])).toEqual([0, 0]);
        });
    });

    describe('cosineSimilarity', () => {
        it('should be 1 for parallel vectors regardless of magnitude', () => {
            expect(cosineSimilarity([1, 2, 3], [10, 20, 30])).toBeCloseTo(1, 10);
        });

        it('should be 0 for orthogonal vectors', () => {
            expect(cosineSimilarity([1, 0], [0, 5])).toBe(0);
        });

        it('should be -1 for opposite vectors', () => {
            expect(cosineSimilarity([1, 1], [-2, -2])).toBeCloseTo(-1, 10);
        });

        it('should be 0 when either vector is zero', () => {
            expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
        });

        it('should reject mismatched dimensionalities', () => {
            expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Dimension mismatch: 2 vs 3');
        });
    });
});
