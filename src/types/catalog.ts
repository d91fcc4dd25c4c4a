/**
 * Catalog Types
 *
 * Plain records handed to the similarity engine and returned by the API.
 * Optional fields are modelled as optional so absence is visible in the
 * type rather than discovered at runtime.
 */

export type EmbeddingVector = number[];

/**
 * Anything that can take part in vector ranking.
 */
export interface Embeddable {
    id: string;
    embedding?: EmbeddingVector | null;
}

/**
 * Anything that can take part in the category + price fallback.
 */
export interface AttributeComparable {
    id: string;
    category: string;
    price?: number;
    isActive: boolean;
}

export interface ProductRecord extends Embeddable, AttributeComparable {
    sku: string;
    name: string;
    brand: string;
    subcategory?: string;
    description: string;
    stockQuantity: number;
}

export type SentimentLabel = 'positive' | 'neutral' | 'negative';

export interface ReviewRecord extends Embeddable {
    productId: string;
    customerId?: string;
    customerName?: string;
    rating: number;
    title: string;
    reviewText: string;
    sentimentLabel?: SentimentLabel;
    sentimentScore?: number;
    verifiedPurchase: boolean;
    helpfulCount: number;
    createdAt: Date;
}

/**
 * A record as exposed to callers: the embedding never leaves the service.
 */
export type PublicRecord<T extends Embeddable> = Omit<T, 'embedding'>;

export interface SimilarityResult<T extends Embeddable> {
    record: PublicRecord<T>;
    similarity: number;
}

export interface AttributeMatch<T extends AttributeComparable & Embeddable> {
    record: PublicRecord<T>;
    /** Absolute price difference to the source, null when either price is unknown */
    priceDistance: number | null;
}

/**
 * Outcome of a find-similar lookup. `no_embedding` tells the caller to
 * switch to the attribute fallback.
 */
export type FindSimilarOutcome<T extends Embeddable> =
    | { status: 'ok'; results: SimilarityResult<T>[] }
    | { status: 'no_embedding' };

export interface ReviewSummary {
    productId: string;
    totalReviews: number;
    avgRating: number;
    fiveStarCount: number;
    fourStarCount: number;
    threeStarCount: number;
    twoStarCount: number;
    oneStarCount: number;
    verifiedPurchaseCount: number;
}

export interface TopRatedProduct {
    product: PublicRecord<ProductRecord>;
    summary: ReviewSummary;
}
