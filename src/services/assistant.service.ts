import { logger, ILogger } from '../config/logger';
import { ProductRecord, PublicRecord } from '../types/catalog';
import { NotFoundError, getErrorMessage } from '../utils/errors';
import { getOpenAIService, IOpenAIService } from './openai.service';
import {
    getRecommendationService,
    IRecommendationService,
    ProductSearchOutcome,
    SimilarProductsOutcome
} from './recommendation.service';
import {
    BestReviewedProduct,
    getReviewInsightsService,
    IReviewInsightsService,
    SentimentBreakdown
} from './review-insights.service';

export type AssistantIntent =
    | 'best_reviewed'
    | 'sentiment'
    | 'similar_products'
    | 'product_search'
    | 'general';

export interface RoutedQuery {
    intent: AssistantIntent;
    category?: string;
    productId?: string;
}

export interface AssistantReply {
    intent: AssistantIntent;
    answer: string;
    context: string;
    generated: boolean;
}

export const KNOWN_CATEGORIES = ['Electronics', 'Clothing', 'Home', 'Sports'] as const;

const SENTIMENT_WORDS = ['sentiment', 'review', 'reviews', 'feedback', 'rating', 'ratings'];
const BEST_WORDS = ['best', 'highest', 'top'];
const SIMILAR_WORDS = ['similar', 'like', 'alternative', 'alternatives'];
const PRODUCT_WORDS = ['product', 'products', 'recommend', 'find', 'search', 'buy', 'need', 'want', 'looking'];
const PRODUCT_ID_PATTERN = /\bPROD-\d+\b/i;

const SYSTEM_PROMPT = `You are a retail catalog assistant. Answer the customer's question in a few sentences using only the catalog context provided. If the context is empty or does not answer the question, say so plainly. Quote prices and scores exactly as given.`;

const CAPABILITIES = 'I can search the catalog, find products similar to a product ID (for example PROD-001), and summarise review sentiment by category.';

/**
 * Keyword routing. Review and sentiment questions win over everything
 * else; similar-product lookups need an explicit product ID.
 */
export function routeQuery(message: string): RoutedQuery {
    const lower = message.toLowerCase();
    const words: string[] = lower.match(/[a-z0-9-]+/g) ?? [];
    const has = (candidates: readonly string[]) => candidates.some(word => words.includes(word));

    const category = KNOWN_CATEGORIES.find(name => words.includes(name.toLowerCase()));
    const productId = message.match(PRODUCT_ID_PATTERN)?.[0].toUpperCase();

    if (has(SENTIMENT_WORDS)) {
        return { intent: has(BEST_WORDS) ? 'best_reviewed' : 'sentiment', category };
    }
    if (productId && has(SIMILAR_WORDS)) {
        return { intent: 'similar_products', productId };
    }
    if (productId || has(PRODUCT_WORDS)) {
        return { intent: 'product_search', category };
    }
    return { intent: 'general' };
}

function formatPrice(price: number | undefined): string {
    return price === undefined ? 'price n/a' : `$${price.toFixed(2)}`;
}

function describeProduct(product: PublicRecord<ProductRecord>): string {
    return `${product.name} (${product.brand}, ${product.category}) ${formatPrice(product.price)}`;
}

export function renderSentiment(breakdown: SentimentBreakdown): string {
    const scope = breakdown.category ?? 'all';
    if (breakdown.totalReviews === 0) {
        return `No reviews found for ${scope} products.`;
    }

    const lines = breakdown.buckets.map(bucket =>
        `- ${bucket.sentiment}: ${bucket.percentage.toFixed(1)}% (${bucket.count} reviews, avg rating ${bucket.avgRating.toFixed(2)})`
    );
    return [`Sentiment for ${scope} products (${breakdown.totalReviews} reviews):`, ...lines].join('\n');
}

export function renderBestReviewed(products: BestReviewedProduct[], category?: string): string {
    const scope = category ? `${category} products` : 'products';
    if (products.length === 0) {
        return `No positive reviews found for ${scope}.`;
    }

    const lines = products.map(product =>
        `- ${product.productName}: avg rating ${product.avgRating.toFixed(2)} (${product.positiveReviews} positive reviews)`
    );
    return [`Best reviewed ${scope}:`, ...lines].join('\n');
}

export function renderSimilar(outcome: SimilarProductsOutcome): string {
    const header = `Products similar to ${outcome.source.name}:`;

    if (outcome.strategy === 'semantic') {
        const lines = outcome.results.map(result =>
            `- ${describeProduct(result.record)}, match ${Math.round(result.similarity * 100)}%`
        );
        return [header, ...lines].join('\n');
    }

    if (outcome.results.length === 0) {
        return `No similar products found in the ${outcome.source.category} category.`;
    }

    const lines = outcome.results.map(match =>
        `- ${describeProduct(match.record)}, price difference ${match.priceDistance === null ? 'n/a' : `$${match.priceDistance.toFixed(2)}`}`
    );
    return [`${header} (same category, closest price)`, ...lines].join('\n');
}

export function renderSearch(outcome: ProductSearchOutcome): string {
    if (outcome.results.length === 0) {
        return 'No matching products found.';
    }

    if (outcome.strategy === 'semantic') {
        const lines = outcome.results.map(result =>
            `- ${describeProduct(result.record)}, match ${Math.round(result.similarity * 100)}%`
        );
        return ['Matching products:', ...lines].join('\n');
    }

    const lines = outcome.results.map(product => `- ${describeProduct(product)}`);
    return ['Matching products (keyword search):', ...lines].join('\n');
}

/**
 * Assistant Service with Dependency Injection
 *
 * Routes a chat message to the right catalog lookup, then lets the LLM
 * phrase the answer from that context. When the completion fails the
 * rendered context is returned as the answer.
 */
export class AssistantService {
    constructor(
        private recommendations: IRecommendationService,
        private insights: IReviewInsightsService,
        private openai: IOpenAIService,
        private logger: ILogger
    ) { }

    static create(): AssistantService {
        return new AssistantService(
            getRecommendationService(),
            getReviewInsightsService(),
            getOpenAIService(),
            logger
        );
    }

    async answer(message: string): Promise<AssistantReply> {
        const routed = routeQuery(message);
        const context = await this.buildContext(message, routed);

        this.logger.info({
            intent: routed.intent,
            category: routed.category,
            productId: routed.productId,
            contextLength: context.length
        }, 'Assistant query routed');

        try {
            const userContent = context
                ? `Question: ${message}\n\nCatalog context:\n${context}`
                : `Question: ${message}\n\nCatalog context: (none)\n\nCapabilities: ${CAPABILITIES}`;

            const answer = await this.openai.generateCompletion([
                { role: 'system', content: SYSTEM_PROMPT },
                { role: 'user', content: userContent }
            ], { temperature: 0.2, max_tokens: 500 });

            return { intent: routed.intent, answer, context, generated: true };

        } catch (error) {
            this.logger.warn({
                intent: routed.intent,
                error: getErrorMessage(error)
            }, 'Completion failed, answering with raw context');

            return {
                intent: routed.intent,
                answer: context || CAPABILITIES,
                context,
                generated: false
            };
        }
    }

    private async buildContext(message: string, routed: RoutedQuery): Promise<string> {
        switch (routed.intent) {
            case 'best_reviewed': {
                const products = await this.insights.getBestReviewedProducts({ category: routed.category, limit: 5 });
                return renderBestReviewed(products, routed.category);
            }
            case 'sentiment': {
                const breakdown = await this.insights.getSentimentBreakdown(routed.category);
                return renderSentiment(breakdown);
            }
            case 'similar_products': {
                if (!routed.productId) {
                    return '';
                }
                try {
                    const outcome = await this.recommendations.findSimilarProducts(routed.productId, { limit: 5 });
                    return renderSimilar(outcome);
                } catch (error) {
                    if (error instanceof NotFoundError) {
                        return `Product ${routed.productId} was not found in the catalog.`;
                    }
                    throw error;
                }
            }
            case 'product_search': {
                const outcome = await this.recommendations.searchProducts(message, { limit: 5 });
                return renderSearch(outcome);
            }
            case 'general':
                return '';
        }
    }
}

// Singleton instance
let assistantService: AssistantService | null = null;

export function getAssistantService(): AssistantService {
    if (!assistantService) {
        assistantService = AssistantService.create();
    }
    return assistantService;
}
