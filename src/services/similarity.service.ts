import {
    AttributeComparable,
    AttributeMatch,
    Embeddable,
    EmbeddingVector,
    FindSimilarOutcome,
    PublicRecord,
    SimilarityResult
} from '../types/catalog';
import { InvalidRequestError } from '../utils/errors';
import { cosineDistance, distanceToSimilarity, isUsableVector } from '../utils/vector.util';

/**
 * Similarity Retrieval Engine
 *
 * Brute-force cosine ranking over an in-memory candidate corpus, plus the
 * category + price fallback used when vectors are unavailable. Every
 * function here is pure: no I/O, no shared state, inputs are never mutated.
 *
 * Only malformed requests throw (InvalidRequestError). "Nothing matched"
 * is always an empty result.
 */

/** Threshold applied by find-similar lookups. */
export const DEFAULT_FIND_SIMILAR_THRESHOLD = 0.5;

function assertLimit(limit: number): void {
    if (!Number.isInteger(limit)) {
        throw new InvalidRequestError(`limit must be an integer, got ${limit}`);
    }
}

function assertThreshold(threshold: number): void {
    if (!Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
        throw new InvalidRequestError(`similarityThreshold must be within [0, 1], got ${threshold}`);
    }
}

function compareIds(a: string, b: string): number {
    return a.localeCompare(b, 'en', { numeric: true });
}

export function stripEmbedding<T extends Embeddable>(record: T): PublicRecord<T> {
    const { embedding: _embedding, ...rest } = record;
    return rest;
}

/**
 * Rank candidates by cosine similarity to `queryVector`.
 *
 * Candidates whose embedding is missing, degenerate or of another length
 * are skipped. Ties keep the candidates' original order.
 *
 * @throws InvalidRequestError on an empty or zero query vector, a
 * non-integer limit or a threshold outside [0, 1]
 */
export function rankBySimilarity<T extends Embeddable>(
    queryVector: EmbeddingVector,
    candidates: readonly T[],
    limit: number,
    similarityThreshold: number
): SimilarityResult<T>[] {
    if (queryVector.length === 0) {
        throw new InvalidRequestError('queryVector must not be empty');
    }
    if (!isUsableVector(queryVector)) {
        throw new InvalidRequestError('queryVector must have finite components and a non-zero magnitude');
    }
    assertLimit(limit);
    assertThreshold(similarityThreshold);

    if (limit <= 0) {
        return [];
    }

    const scored: SimilarityResult<T>[] = [];
    for (const candidate of candidates) {
        const embedding = candidate.embedding;
        if (!isUsableVector(embedding) || embedding.length !== queryVector.length) {
            continue;
        }

        const similarity = distanceToSimilarity(cosineDistance(queryVector, embedding));
        if (similarity < similarityThreshold) {
            continue;
        }

        scored.push({ record: stripEmbedding(candidate), similarity });
    }

    // Array.prototype.sort is stable, so equal scores keep corpus order
    scored.sort((a, b) => b.similarity - a.similarity);

    return scored.slice(0, limit);
}

/**
 * Records most similar to `sourceRecord`, never including the source itself.
 *
 * Returns `{ status: 'no_embedding' }` when the source has no usable
 * embedding; the caller is expected to try `fallbackByAttributes` next.
 */
export function findSimilarToRecord<T extends Embeddable>(
    sourceRecord: T,
    candidates: readonly T[],
    limit: number,
    similarityThreshold: number = DEFAULT_FIND_SIMILAR_THRESHOLD
): FindSimilarOutcome<T> {
    assertLimit(limit);

    const queryVector = sourceRecord.embedding;
    if (!isUsableVector(queryVector)) {
        return { status: 'no_embedding' };
    }

    const others = candidates.filter(candidate => candidate.id !== sourceRecord.id);

    return {
        status: 'ok',
        results: rankBySimilarity(queryVector, others, limit, similarityThreshold)
    };
}

/**
 * Degraded-mode recommendations: active records of the same category,
 * closest price first, ties broken by identifier. Candidates without a
 * price (or all of them, when the source has none) sort last.
 */
export function fallbackByAttributes<T extends AttributeComparable & Embeddable>(
    sourceRecord: T,
    candidates: readonly T[],
    limit: number
): AttributeMatch<T>[] {
    assertLimit(limit);

    if (limit <= 0) {
        return [];
    }

    const sourcePrice = sourceRecord.price;
    const matches = candidates
        .filter(candidate =>
            candidate.category === sourceRecord.category &&
            candidate.id !== sourceRecord.id &&
            candidate.isActive
        )
        .map(candidate => ({
            candidate,
            distance: sourcePrice !== undefined && candidate.price !== undefined
                ? Math.abs(candidate.price - sourcePrice)
                : Number.POSITIVE_INFINITY
        }));

    matches.sort((a, b) => {
        if (a.distance !== b.distance) {
            return a.distance < b.distance ? -1 : 1;
        }
        return compareIds(a.candidate.id, b.candidate.id);
    });

    return matches.slice(0, limit).map(({ candidate, distance }) => ({
        record: stripEmbedding(candidate),
        priceDistance: Number.isFinite(distance) ? distance : null
    }));
}
