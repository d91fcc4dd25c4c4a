import { describe, it, expect } from 'vitest';
import {
    cosineDistance,
    distanceToSimilarity,
    dotProduct,
    isUsableVector,
    magnitude
} from '../../../src/utils/vector.util';

describe('vector utilities', () => {
    it('computes dot product and magnitude', () => {
        expect(dotProduct([1, 2, 3], [4, 5, 6])).toBe(32);
        expect(magnitude([3, 4])).toBe(5);
    });

    it('gives cosine distance 0 for parallel and 1 for orthogonal vectors', () => {
        expect(cosineDistance([1, 0], [1, 0])).toBe(0);
        expect(cosineDistance([1, 0], [0, 1])).toBe(1);
        expect(cosineDistance([2, 0], [5, 0])).toBe(0);
        expect(cosineDistance([1, 0], [-1, 0])).toBe(2);
    });

    it('throws on vectors of different length', () => {
        expect(() => cosineDistance([1, 0], [1, 0, 0])).toThrow('Vector length mismatch: 2 vs 3');
    });

    it('clamps similarity to [0, 1]', () => {
        expect(distanceToSimilarity(0)).toBe(1);
        expect(distanceToSimilarity(0.25)).toBe(0.75);
        expect(distanceToSimilarity(2)).toBe(0);
        expect(distanceToSimilarity(-1e-12)).toBe(1);
    });

    it('rejects missing, empty, zero and non-finite vectors', () => {
        expect(isUsableVector(undefined)).toBe(false);
        expect(isUsableVector(null)).toBe(false);
        expect(isUsableVector([])).toBe(false);
        expect(isUsableVector([0, 0, 0])).toBe(false);
        expect(isUsableVector([1, Number.NaN])).toBe(false);
        expect(isUsableVector([1, Number.POSITIVE_INFINITY])).toBe(false);
        expect(isUsableVector([0, 0.5])).toBe(true);
    });

    it('rejects values that are not numeric arrays', () => {
        expect(isUsableVector('[1,0]')).toBe(false);
        expect(isUsableVector({ 0: 1, 1: 0 })).toBe(false);
        expect(isUsableVector([1, '0'])).toBe(false);
    });
});
