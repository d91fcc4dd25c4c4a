import { logger, ILogger } from '../config/logger';
import {
    AttributeMatch,
    ProductRecord,
    PublicRecord,
    ReviewRecord,
    SimilarityResult,
    TopRatedProduct
} from '../types/catalog';
import { NotFoundError, ProviderUnavailableError, getErrorMessage } from '../utils/errors';
import { getCatalogService, ICatalogService } from './catalog.service';
import { getOpenAIService, IEmbeddingProvider } from './openai.service';
import {
    fallbackByAttributes,
    findSimilarToRecord,
    rankBySimilarity,
    stripEmbedding
} from './similarity.service';

/**
 * Similarity lower bounds on the [0, 1] scale produced by the engine.
 * Query-to-description pairs score well below description-to-description
 * pairs, hence the lower search threshold.
 */
export const PRODUCT_SEARCH_THRESHOLD = 0.4;
export const REVIEW_SEARCH_THRESHOLD = 0.4;
export const SIMILAR_PRODUCTS_THRESHOLD = 0.5;

/** Upper bound on the corpus loaded for one brute-force scan. */
export const MAX_CORPUS_SIZE = 5000;

export type ProductSearchOutcome =
    | { strategy: 'semantic'; results: SimilarityResult<ProductRecord>[] }
    | { strategy: 'keyword'; reason: string; results: PublicRecord<ProductRecord>[] };

export type SimilarProductsOutcome =
    | {
        strategy: 'semantic';
        source: PublicRecord<ProductRecord>;
        results: SimilarityResult<ProductRecord>[];
    }
    | {
        strategy: 'attribute';
        source: PublicRecord<ProductRecord>;
        reason: 'no_embedding' | 'no_semantic_match';
        results: AttributeMatch<ProductRecord>[];
    };

export interface SearchOptions {
    limit?: number;
    threshold?: number;
}

export interface IRecommendationService {
    searchProducts(query: string, options?: SearchOptions): Promise<ProductSearchOutcome>;
    findSimilarProducts(productId: string, options?: { limit?: number }): Promise<SimilarProductsOutcome>;
    searchReviews(query: string, options?: SearchOptions & { productId?: string }): Promise<SimilarityResult<ReviewRecord>[]>;
    getProduct(productId: string): Promise<PublicRecord<ProductRecord>>;
    getTopRatedProducts(options?: { category?: string; minReviews?: number; limit?: number }): Promise<TopRatedProduct[]>;
    getCategories(): Promise<string[]>;
}

/**
 * Recommendation Service with Dependency Injection
 *
 * Turns free text into query vectors, loads the candidate corpus and drives
 * the similarity engine. Owns every degraded-mode decision:
 * - semantic product search falls back to keyword search when the
 *   embedding provider is unavailable
 * - similar products fall back to category + price when the source has no
 *   embedding or nothing clears the threshold
 */
export class RecommendationService implements IRecommendationService {
    constructor(
        private catalog: ICatalogService,
        private embeddings: IEmbeddingProvider,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): RecommendationService {
        return new RecommendationService(
            getCatalogService(),
            getOpenAIService(),
            logger
        );
    }

    async searchProducts(query: string, options: SearchOptions = {}): Promise<ProductSearchOutcome> {
        const { limit = 5, threshold = PRODUCT_SEARCH_THRESHOLD } = options;

        let queryVector: number[];
        try {
            queryVector = await this.embeddings.generateEmbedding(query);
        } catch (error) {
            if (!(error instanceof ProviderUnavailableError)) {
                throw error;
            }

            this.logger.warn({
                query: query.substring(0, 100),
                error: error.message
            }, 'Semantic search unavailable, falling back to keyword search');

            const products = await this.catalog.searchProductsText(query, limit);
            return {
                strategy: 'keyword',
                reason: error.message,
                results: products.map(stripEmbedding)
            };
        }

        const candidates = await this.catalog.listActiveProducts(MAX_CORPUS_SIZE);
        const results = rankBySimilarity(queryVector, candidates, limit, threshold);

        this.logger.info({
            query: query.substring(0, 100),
            candidatesCount: candidates.length,
            resultsCount: results.length,
            threshold
        }, 'Semantic product search completed');

        return { strategy: 'semantic', results };
    }

    /**
     * @throws NotFoundError when the product does not exist
     */
    async findSimilarProducts(productId: string, options: { limit?: number } = {}): Promise<SimilarProductsOutcome> {
        const { limit = 5 } = options;

        const source = await this.catalog.getProduct(productId);
        if (!source) {
            throw new NotFoundError(`Product ${productId} not found`);
        }

        if (Number.isInteger(limit) && limit <= 0) {
            return { strategy: 'semantic', source: stripEmbedding(source), results: [] };
        }

        const candidates = await this.catalog.listActiveProducts(MAX_CORPUS_SIZE);
        const outcome = findSimilarToRecord(source, candidates, limit, SIMILAR_PRODUCTS_THRESHOLD);

        if (outcome.status === 'ok' && outcome.results.length > 0) {
            this.logger.info({
                productId,
                resultsCount: outcome.results.length
            }, 'Similar products found by embedding');

            return { strategy: 'semantic', source: stripEmbedding(source), results: outcome.results };
        }

        const reason = outcome.status === 'no_embedding' ? 'no_embedding' : 'no_semantic_match';
        const results = fallbackByAttributes(source, candidates, limit);

        this.logger.info({
            productId,
            category: source.category,
            reason,
            resultsCount: results.length
        }, 'Similar products found by category and price');

        return { strategy: 'attribute', source: stripEmbedding(source), reason, results };
    }

    /**
     * Semantic review search. Provider failures propagate: there is no
     * meaningful keyword substitute for "reviews that say something like X".
     */
    async searchReviews(
        query: string,
        options: SearchOptions & { productId?: string } = {}
    ): Promise<SimilarityResult<ReviewRecord>[]> {
        const { limit = 10, threshold = REVIEW_SEARCH_THRESHOLD, productId } = options;

        try {
            const queryVector = await this.embeddings.generateEmbedding(query);
            const reviews = await this.catalog.listReviews({ productId, limit: MAX_CORPUS_SIZE });
            const results = rankBySimilarity(queryVector, reviews, limit, threshold);

            this.logger.info({
                query: query.substring(0, 100),
                productId,
                candidatesCount: reviews.length,
                resultsCount: results.length
            }, 'Semantic review search completed');

            return results;
        } catch (error) {
            this.logger.error({ query: query.substring(0, 100), error: getErrorMessage(error) }, 'Review search failed');
            throw error;
        }
    }

    async getProduct(productId: string): Promise<PublicRecord<ProductRecord>> {
        const product = await this.catalog.getProduct(productId);
        if (!product) {
            throw new NotFoundError(`Product ${productId} not found`);
        }
        return stripEmbedding(product);
    }

    async getTopRatedProducts(options: { category?: string; minReviews?: number; limit?: number } = {}): Promise<TopRatedProduct[]> {
        return await this.catalog.getTopRatedProducts(options);
    }

    async getCategories(): Promise<string[]> {
        return await this.catalog.getCategories();
    }
}

// Singleton instance
let recommendationService: RecommendationService | null = null;

export function getRecommendationService(): RecommendationService {
    if (!recommendationService) {
        recommendationService = RecommendationService.create();
    }
    return recommendationService;
}
