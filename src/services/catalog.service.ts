import { FindOptionsWhere, ILike, In, IsNull } from 'typeorm';
import { AppDataSource } from '../db/data-source';
import { Product } from '../db/entities/product.entity';
import { Review } from '../db/entities/review.entity';
import { IRepository } from '../db/interfaces';
import { logger, ILogger } from '../config/logger';
import {
    EmbeddingVector,
    ProductRecord,
    ReviewRecord,
    ReviewSummary,
    SentimentLabel,
    TopRatedProduct
} from '../types/catalog';
import { stripEmbedding } from './similarity.service';
import { isNumberArray } from '../utils/vector.util';

export interface ICatalogService {
    getProduct(id: string): Promise<ProductRecord | null>;
    listActiveProducts(limit?: number): Promise<ProductRecord[]>;
    listProductsByCategory(category: string, subcategory?: string, limit?: number): Promise<ProductRecord[]>;
    searchProductsText(term: string, limit?: number): Promise<ProductRecord[]>;
    getCategories(): Promise<string[]>;
    listReviews(options?: { productId?: string; productIds?: string[]; limit?: number }): Promise<ReviewRecord[]>;
    getReviewSummary(productId: string): Promise<ReviewSummary>;
    getTopRatedProducts(options?: { category?: string; minReviews?: number; limit?: number }): Promise<TopRatedProduct[]>;
    findProductsMissingEmbeddings(limit: number): Promise<ProductRecord[]>;
    findReviewsMissingEmbeddings(limit: number): Promise<ReviewRecord[]>;
    updateProductEmbedding(id: string, embedding: EmbeddingVector): Promise<void>;
    updateReviewEmbedding(id: string, embedding: EmbeddingVector): Promise<void>;
}

const SENTIMENT_LABELS: readonly SentimentLabel[] = ['positive', 'neutral', 'negative'];

function toSentimentLabel(value: string | null): SentimentLabel | undefined {
    return SENTIMENT_LABELS.find(label => label === value);
}

/**
 * The jsonb column can hold anything a writer put there; only numeric
 * arrays are treated as embeddings.
 */
function toEmbedding(value: unknown): EmbeddingVector | null {
    return isNumberArray(value) ? value : null;
}

export function toProductRecord(entity: Product): ProductRecord {
    return {
        id: entity.id,
        sku: entity.sku,
        name: entity.name,
        brand: entity.brand,
        category: entity.category,
        subcategory: entity.subcategory ?? undefined,
        description: entity.description,
        price: entity.price === null ? undefined : parseFloat(entity.price),
        stockQuantity: entity.stock_quantity,
        isActive: entity.is_active,
        embedding: toEmbedding(entity.embedding)
    };
}

export function toReviewRecord(entity: Review): ReviewRecord {
    return {
        id: entity.id,
        productId: entity.product_id,
        customerId: entity.customer_id ?? undefined,
        customerName: entity.customer_name ?? undefined,
        rating: entity.rating,
        title: entity.title,
        reviewText: entity.review_text,
        sentimentLabel: toSentimentLabel(entity.sentiment_label),
        sentimentScore: entity.sentiment_score ?? undefined,
        verifiedPurchase: entity.verified_purchase,
        helpfulCount: entity.helpful_count,
        createdAt: entity.created_at,
        embedding: toEmbedding(entity.embedding)
    };
}

/**
 * Escape LIKE wildcards so a search term is matched literally.
 */
function escapeLikePattern(term: string): string {
    return term.replace(/[\\%_]/g, match => `\\${match}`);
}

export function summarizeReviews(
    productId: string,
    reviews: ReadonlyArray<Pick<ReviewRecord, 'rating' | 'verifiedPurchase'>>
): ReviewSummary {
    const countStars = (stars: number) => reviews.filter(review => review.rating === stars).length;
    const totalRating = reviews.reduce((sum, review) => sum + review.rating, 0);

    return {
        productId,
        totalReviews: reviews.length,
        avgRating: reviews.length > 0 ? totalRating / reviews.length : 0,
        fiveStarCount: countStars(5),
        fourStarCount: countStars(4),
        threeStarCount: countStars(3),
        twoStarCount: countStars(2),
        oneStarCount: countStars(1),
        verifiedPurchaseCount: reviews.filter(review => review.verifiedPurchase).length
    };
}

/**
 * Catalog Service with Dependency Injection
 *
 * Read and embedding-update access to products and reviews in PostgreSQL.
 * Returns plain catalog records; entities never leave this service.
 */
export class CatalogService implements ICatalogService {
    constructor(
        private productRepository: IRepository<Product>,
        private reviewRepository: IRepository<Review>,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): CatalogService {
        return new CatalogService(
            AppDataSource.getRepository(Product),
            AppDataSource.getRepository(Review),
            logger
        );
    }

    async getProduct(id: string): Promise<ProductRecord | null> {
        const product = await this.productRepository.findOne({ where: { id } });
        return product ? toProductRecord(product) : null;
    }

    async listActiveProducts(limit: number = 1000): Promise<ProductRecord[]> {
        const products = await this.productRepository.find({
            where: { is_active: true },
            order: { id: 'ASC' },
            take: limit
        });

        this.logger.debug({ count: products.length, limit }, 'Active products loaded');
        this.warnIfTruncated(products.length, limit, { scope: 'active' });

        return products.map(toProductRecord);
    }

    async listProductsByCategory(category: string, subcategory?: string, limit: number = 100): Promise<ProductRecord[]> {
        const where: FindOptionsWhere<Product> = { category, is_active: true };
        if (subcategory) {
            where.subcategory = subcategory;
        }

        const products = await this.productRepository.find({
            where,
            order: { name: 'ASC' },
            take: limit
        });
        this.warnIfTruncated(products.length, limit, { scope: 'category', category, subcategory });

        return products.map(toProductRecord);
    }

    /**
     * Case-insensitive substring search over name, description and brand.
     */
    async searchProductsText(term: string, limit: number = 50): Promise<ProductRecord[]> {
        const pattern = `%${escapeLikePattern(term.trim())}%`;

        const products = await this.productRepository.find({
            where: [
                { is_active: true, name: ILike(pattern) },
                { is_active: true, description: ILike(pattern) },
                { is_active: true, brand: ILike(pattern) }
            ],
            order: { name: 'ASC' },
            take: limit
        });

        this.logger.info({
            term: term.substring(0, 100),
            resultsCount: products.length
        }, 'Keyword product search completed');

        return products.map(toProductRecord);
    }

    async getCategories(): Promise<string[]> {
        const products = await this.productRepository.find({
            select: { category: true },
            where: { is_active: true }
        });

        const categories = new Set(products.map(product => product.category).filter(Boolean));
        return [...categories].sort((a, b) => a.localeCompare(b, 'en'));
    }

    /**
     * Reviews newest first, optionally restricted to one or several products.
     */
    async listReviews(options: { productId?: string; productIds?: string[]; limit?: number } = {}): Promise<ReviewRecord[]> {
        const { productId, productIds, limit } = options;

        let where: FindOptionsWhere<Review> = {};
        if (productId) {
            where = { product_id: productId };
        } else if (productIds) {
            where = { product_id: In(productIds) };
        }

        const reviews = await this.reviewRepository.find({
            where,
            order: { created_at: 'DESC' },
            take: limit
        });

        return reviews.map(toReviewRecord);
    }

    async getReviewSummary(productId: string): Promise<ReviewSummary> {
        const reviews = await this.listReviews({ productId });
        return summarizeReviews(productId, reviews);
    }

    /**
     * Products with at least `minReviews` reviews, best average rating first,
     * then most reviews.
     */
    async getTopRatedProducts(options: { category?: string; minReviews?: number; limit?: number } = {}): Promise<TopRatedProduct[]> {
        const { category, minReviews = 3, limit = 10 } = options;

        const products = category
            ? await this.listProductsByCategory(category, undefined, 1000)
            : await this.listActiveProducts();

        if (products.length === 0) {
            return [];
        }

        const reviews = await this.listReviews({ productIds: products.map(product => product.id) });
        const reviewsByProduct = new Map<string, ReviewRecord[]>();
        for (const review of reviews) {
            const bucket = reviewsByProduct.get(review.productId) ?? [];
            bucket.push(review);
            reviewsByProduct.set(review.productId, bucket);
        }

        const ranked: TopRatedProduct[] = [];
        for (const product of products) {
            const summary = summarizeReviews(product.id, reviewsByProduct.get(product.id) ?? []);
            if (summary.totalReviews >= minReviews) {
                ranked.push({ product: stripEmbedding(product), summary });
            }
        }

        ranked.sort((a, b) =>
            b.summary.avgRating - a.summary.avgRating ||
            b.summary.totalReviews - a.summary.totalReviews ||
            a.product.id.localeCompare(b.product.id, 'en', { numeric: true })
        );

        return ranked.slice(0, limit);
    }

    /**
     * A listing that fills its limit exactly has probably left rows out.
     */
    private warnIfTruncated(count: number, limit: number, context: object): void {
        if (limit > 0 && count === limit) {
            this.logger.warn({ ...context, limit }, 'Product listing reached its limit, later products are not loaded');
        }
    }

    async findProductsMissingEmbeddings(limit: number): Promise<ProductRecord[]> {
        const products = await this.productRepository.find({
            where: { embedding: IsNull() },
            order: { id: 'ASC' },
            take: limit
        });
        return products.map(toProductRecord);
    }

    async findReviewsMissingEmbeddings(limit: number): Promise<ReviewRecord[]> {
        const reviews = await this.reviewRepository.find({
            where: { embedding: IsNull() },
            order: { id: 'ASC' },
            take: limit
        });
        return reviews.map(toReviewRecord);
    }

    async updateProductEmbedding(id: string, embedding: EmbeddingVector): Promise<void> {
        const result = await this.productRepository.update({ id }, { embedding });
        this.logger.debug({ productId: id, dimension: embedding.length, affected: result.affected }, 'Product embedding updated');
    }

    async updateReviewEmbedding(id: string, embedding: EmbeddingVector): Promise<void> {
        const result = await this.reviewRepository.update({ id }, { embedding });
        this.logger.debug({ reviewId: id, dimension: embedding.length, affected: result.affected }, 'Review embedding updated');
    }
}

// Singleton instance
let catalogService: CatalogService | null = null;

export function getCatalogService(): CatalogService {
    if (!catalogService) {
        catalogService = CatalogService.create();
    }
    return catalogService;
}
