/**
 * Dense vector helpers for embedding arithmetic.
 */

/**
 * Element-wise arithmetic mean of equally sized vectors.
 * @throws Error when the list is empty or the dimensionalities differ
 */
export function meanVector(vectors: readonly number[][]): number[] {
    const first = vectors[0];
    if (!first) throw new Error('Cannot average an empty list of vectors');

    const dims = first.length;
    const sum = new Array<number>(dims).fill(0);

    for (const vector of vectors) {
        if (vector.length !== dims) {
            throw new Error(`Dimension mismatch: expected ${dims}, got ${vector.length}`);
        }
        for (let i = 0; i < dims; i++) {
            sum[i] = (sum[i] ?? 0) + (vector[i] ?? 0);
        }
    }

    return sum.map((value) => value / vectors.length);
}

export function l2Norm(vector: readonly number[]): number {
    let total = 0;
    for (const value of vector) total += value * value;
    return Math.sqrt(total);
}

/**
 * Scale a vector to unit length. A zero vector is returned unchanged.
 */
export function l2Normalize(vector: readonly number[]): number[] {
    const norm = l2Norm(vector);
    if (norm === 0) return [...vector];
    return vector.map((value) => value / norm);
}

/**
 * Cosine similarity of two dense vectors, computed on explicitly
 * L2-normalized copies. Returns a value in [-1, 1]; 0 if either vector is zero.
 *
 * @throws Error when the dimensionalities differ
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Dimension mismatch: ${a.length} vs ${b.length}`);
    }

    const unitA = l2Normalize(a);
    const unitB = l2Normalize(b);

    let dot = 0;
    for (let i = 0; i < unitA.length; i++) {
        dot += (unitA[i] ?? 0) * (unitB[i] ?? 0);
    }

    // Clamp rounding noise
    return Math.max(-1, Math.min(1, dot));
}
