import { EmbeddingVector } from '../types/catalog';

/**
 * Vector Utilities
 *
 * Plain-array vector math for brute-force similarity scans.
 */

export function dotProduct(a: EmbeddingVector, b: EmbeddingVector): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
        sum += a[i] * b[i];
    }
    return sum;
}

export function magnitude(vector: EmbeddingVector): number {
    return Math.sqrt(dotProduct(vector, vector));
}

/**
 * True for an array whose every element is a number. Stored jsonb values
 * are not guaranteed to be arrays.
 */
export function isNumberArray(value: unknown): value is number[] {
    return Array.isArray(value) && value.every((item: unknown) => typeof item === 'number');
}

/**
 * Finite components only, and not the zero vector (whose angle is undefined).
 */
export function isUsableVector(vector: unknown): vector is EmbeddingVector {
    if (!isNumberArray(vector) || vector.length === 0) {
        return false;
    }
    if (!vector.every(Number.isFinite)) {
        return false;
    }
    return magnitude(vector) > 0;
}

/**
 * Cosine distance: 1 - dot(a, b) / (|a| * |b|).
 *
 * Range [0, 2]. Both vectors must have the same length and non-zero
 * magnitude; callers check that with `isUsableVector` first.
 *
 * @example
 * cosineDistance([1, 0], [1, 0]); // 0
 * cosineDistance([1, 0], [0, 1]); // 1
 */
export function cosineDistance(a: EmbeddingVector, b: EmbeddingVector): number {
    if (a.length !== b.length) {
        throw new Error(`Vector length mismatch: ${a.length} vs ${b.length}`);
    }
    return 1 - dotProduct(a, b) / (magnitude(a) * magnitude(b));
}

/**
 * Similarity score in [0, 1] derived from cosine distance. Opposed vectors
 * (negative cosine) score 0; rounding overshoot above 1 is clamped.
 */
export function distanceToSimilarity(distance: number): number {
    return Math.min(1, Math.max(0, 1 - distance));
}
