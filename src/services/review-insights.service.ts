import { logger, ILogger } from '../config/logger';
import { ProductRecord, ReviewRecord, ReviewSummary, SentimentLabel } from '../types/catalog';
import { NotFoundError } from '../utils/errors';
import { getCatalogService, ICatalogService } from './catalog.service';

export interface SentimentBucket {
    sentiment: SentimentLabel;
    count: number;
    percentage: number;
    avgRating: number;
}

export interface SentimentBreakdown {
    category: string | null;
    totalReviews: number;
    buckets: SentimentBucket[];
}

export interface BestReviewedProduct {
    productId: string;
    productName: string;
    positiveReviews: number;
    avgRating: number;
}

export interface RatingBand {
    count: number;
    percentage: number;
}

/**
 * Sentiment of one product's reviews. The distribution is by star rating:
 * positive 4-5, neutral 3, negative 1-2.
 */
export interface ProductSentiment {
    productId: string;
    productName: string;
    totalReviews: number;
    avgRating: number;
    avgSentimentScore: number | null;
    distribution: Record<SentimentLabel, RatingBand>;
    overall: SentimentLabel | null;
}

export interface ComparedProduct {
    productId: string;
    productName: string;
    totalReviews: number;
    avgRating: number;
}

export interface ProductComparison {
    first: ComparedProduct;
    second: ComparedProduct;
    /** Product with the higher average rating; null on a tie. */
    betterRatedProductId: string | null;
}

export interface IReviewInsightsService {
    getSentimentBreakdown(category?: string): Promise<SentimentBreakdown>;
    getBestReviewedProducts(options?: { category?: string; limit?: number }): Promise<BestReviewedProduct[]>;
    getProductSentiment(productId: string): Promise<ProductSentiment>;
    compareProducts(firstId: string, secondId: string): Promise<ProductComparison>;
}

/** Reviews read per product for the sentiment trend. */
export const PRODUCT_SENTIMENT_REVIEW_LIMIT = 100;

const SENTIMENT_ORDER: readonly SentimentLabel[] = ['positive', 'neutral', 'negative'];

function round(value: number, decimals: number): number {
    const factor = Math.pow(10, decimals);
    return Math.round(value * factor) / factor;
}

function averageRating(reviews: readonly ReviewRecord[]): number {
    if (reviews.length === 0) {
        return 0;
    }
    return reviews.reduce((sum, review) => sum + review.rating, 0) / reviews.length;
}

function ratingBand(rating: number): SentimentLabel {
    if (rating >= 4) {
        return 'positive';
    }
    return rating <= 2 ? 'negative' : 'neutral';
}

function overallVerdict(avgRating: number): SentimentLabel {
    if (avgRating >= 4) {
        return 'positive';
    }
    return avgRating >= 3 ? 'neutral' : 'negative';
}

function toComparedProduct(product: ProductRecord, summary: ReviewSummary): ComparedProduct {
    return {
        productId: product.id,
        productName: product.name,
        totalReviews: summary.totalReviews,
        avgRating: round(summary.avgRating, 2)
    };
}

/**
 * Review Insights Service
 *
 * Sentiment aggregates over stored review labels, optionally scoped to a
 * product category, plus per-product sentiment and comparisons.
 */
export class ReviewInsightsService implements IReviewInsightsService {
    constructor(
        private catalog: ICatalogService,
        private logger: ILogger
    ) { }

    static create(): ReviewInsightsService {
        return new ReviewInsightsService(getCatalogService(), logger);
    }

    /**
     * Share of each sentiment label. Percentages have one decimal, average
     * ratings two. Labels without reviews are left out; unlabelled reviews
     * count towards the total only.
     */
    async getSentimentBreakdown(category?: string): Promise<SentimentBreakdown> {
        const { reviews } = await this.loadScope(category);

        const buckets: SentimentBucket[] = [];
        for (const sentiment of SENTIMENT_ORDER) {
            const labelled = reviews.filter(review => review.sentimentLabel === sentiment);
            if (labelled.length === 0) {
                continue;
            }
            buckets.push({
                sentiment,
                count: labelled.length,
                percentage: round((labelled.length / reviews.length) * 100, 1),
                avgRating: round(averageRating(labelled), 2)
            });
        }

        this.logger.info({
            category: category ?? null,
            totalReviews: reviews.length
        }, 'Sentiment breakdown computed');

        return { category: category ?? null, totalReviews: reviews.length, buckets };
    }

    /**
     * Products ranked by the average rating of their positive reviews, then
     * by how many positive reviews they have.
     */
    async getBestReviewedProducts(options: { category?: string; limit?: number } = {}): Promise<BestReviewedProduct[]> {
        const { category, limit = 5 } = options;
        const { reviews, products } = await this.loadScope(category);

        const positiveByProduct = new Map<string, ReviewRecord[]>();
        for (const review of reviews) {
            if (review.sentimentLabel !== 'positive') {
                continue;
            }
            const bucket = positiveByProduct.get(review.productId) ?? [];
            bucket.push(review);
            positiveByProduct.set(review.productId, bucket);
        }

        const names = new Map(products.map(product => [product.id, product.name]));

        const ranked: BestReviewedProduct[] = [...positiveByProduct.entries()].map(([productId, positive]) => ({
            productId,
            productName: names.get(productId) ?? productId,
            positiveReviews: positive.length,
            avgRating: round(averageRating(positive), 2)
        }));

        ranked.sort((a, b) =>
            b.avgRating - a.avgRating ||
            b.positiveReviews - a.positiveReviews ||
            a.productId.localeCompare(b.productId, 'en', { numeric: true })
        );

        return ranked.slice(0, limit);
    }

    /**
     * Rating distribution, averages and an overall verdict for the most
     * recent reviews of one product. `overall` is null without reviews.
     *
     * @throws NotFoundError when the product does not exist
     */
    async getProductSentiment(productId: string): Promise<ProductSentiment> {
        const product = await this.requireProduct(productId);
        const reviews = await this.catalog.listReviews({ productId, limit: PRODUCT_SENTIMENT_REVIEW_LIMIT });

        const distribution: Record<SentimentLabel, RatingBand> = {
            positive: { count: 0, percentage: 0 },
            neutral: { count: 0, percentage: 0 },
            negative: { count: 0, percentage: 0 }
        };
        for (const review of reviews) {
            distribution[ratingBand(review.rating)].count++;
        }
        for (const band of Object.values(distribution)) {
            band.percentage = reviews.length > 0 ? round((band.count / reviews.length) * 100, 1) : 0;
        }

        const scores = reviews.flatMap(review => review.sentimentScore === undefined ? [] : [review.sentimentScore]);
        const avgRating = averageRating(reviews);

        this.logger.info({ productId, totalReviews: reviews.length }, 'Product sentiment computed');

        return {
            productId,
            productName: product.name,
            totalReviews: reviews.length,
            avgRating: round(avgRating, 2),
            avgSentimentScore: scores.length > 0
                ? round(scores.reduce((sum, score) => sum + score, 0) / scores.length, 2)
                : null,
            distribution,
            overall: reviews.length > 0 ? overallVerdict(avgRating) : null
        };
    }

    /**
     * Review summaries of two products side by side.
     *
     * @throws NotFoundError when either product does not exist
     */
    async compareProducts(firstId: string, secondId: string): Promise<ProductComparison> {
        const [firstProduct, secondProduct] = await Promise.all([
            this.requireProduct(firstId),
            this.requireProduct(secondId)
        ]);
        const [firstSummary, secondSummary] = await Promise.all([
            this.catalog.getReviewSummary(firstId),
            this.catalog.getReviewSummary(secondId)
        ]);

        const first = toComparedProduct(firstProduct, firstSummary);
        const second = toComparedProduct(secondProduct, secondSummary);

        let betterRatedProductId: string | null = null;
        if (first.avgRating > second.avgRating) {
            betterRatedProductId = first.productId;
        } else if (second.avgRating > first.avgRating) {
            betterRatedProductId = second.productId;
        }

        return { first, second, betterRatedProductId };
    }

    private async requireProduct(productId: string): Promise<ProductRecord> {
        const product = await this.catalog.getProduct(productId);
        if (!product) {
            throw new NotFoundError(`Product ${productId} not found`);
        }
        return product;
    }

    private async loadScope(category?: string): Promise<{ products: ProductRecord[]; reviews: ReviewRecord[] }> {
        if (!category) {
            const [products, reviews] = await Promise.all([
                this.catalog.listActiveProducts(),
                this.catalog.listReviews()
            ]);
            return { products, reviews };
        }

        const products = await this.catalog.listProductsByCategory(category, undefined, 1000);
        if (products.length === 0) {
            return { products, reviews: [] };
        }

        const reviews = await this.catalog.listReviews({ productIds: products.map(product => product.id) });
        return { products, reviews };
    }
}

// Singleton instance
let reviewInsightsService: ReviewInsightsService | null = null;

export function getReviewInsightsService(): ReviewInsightsService {
    if (!reviewInsightsService) {
        reviewInsightsService = ReviewInsightsService.create();
    }
    return reviewInsightsService;
}
