import { describe, it, expect, beforeEach } from 'vitest';
import {
    PRODUCT_SENTIMENT_REVIEW_LIMIT,
    ReviewInsightsService
} from '../../../src/services/review-insights.service';
import { ReviewSummary } from '../../../src/types/catalog';
import { NotFoundError } from '../../../src/utils/errors';
import { createMockCatalog, createMockLogger, makeProduct, makeReview } from '../../helpers/factories';

describe('Review Insights Service', () => {
    let catalog: ReturnType<typeof createMockCatalog>;
    let service: ReviewInsightsService;

    const headphones = makeProduct({ id: 'PROD-001', name: 'Headphones' });
    const blender = makeProduct({ id: 'PROD-002', name: 'Blender', category: 'Home' });

    const reviews = [
        makeReview({ id: 'R1', productId: 'PROD-001', rating: 5, sentimentLabel: 'positive' }),
        makeReview({ id: 'R2', productId: 'PROD-001', rating: 4, sentimentLabel: 'positive' }),
        makeReview({ id: 'R3', productId: 'PROD-002', rating: 5, sentimentLabel: 'positive' }),
        makeReview({ id: 'R4', productId: 'PROD-002', rating: 2, sentimentLabel: 'negative' }),
        makeReview({ id: 'R5', productId: 'PROD-001', rating: 3, sentimentLabel: 'neutral' }),
        makeReview({ id: 'R6', productId: 'PROD-002', rating: 4, sentimentLabel: undefined })
    ];

    beforeEach(() => {
        catalog = createMockCatalog();
        service = new ReviewInsightsService(catalog, createMockLogger());
    });

    describe('getSentimentBreakdown', () => {
        it('should aggregate every review when no category is given', async () => {
            catalog.listActiveProducts.mockResolvedValue([headphones, blender]);
            catalog.listReviews.mockResolvedValue(reviews);

            const breakdown = await service.getSentimentBreakdown();

            expect(catalog.listReviews).toHaveBeenCalledWith();
            expect(breakdown).toEqual({
                category: null,
                totalReviews: 6,
                buckets: [
                    { sentiment: 'positive', count: 3, percentage: 50, avgRating: 4.67 },
                    { sentiment: 'neutral', count: 1, percentage: 16.7, avgRating: 3 },
                    { sentiment: 'negative', count: 1, percentage: 16.7, avgRating: 2 }
                ]
            });
        });

        it('should scope reviews to the products of a category', async () => {
            catalog.listProductsByCategory.mockResolvedValue([blender]);
            catalog.listReviews.mockResolvedValue(reviews.filter(review => review.productId === 'PROD-002'));

            const breakdown = await service.getSentimentBreakdown('Home');

            expect(catalog.listProductsByCategory).toHaveBeenCalledWith('Home', undefined, 1000);
            expect(catalog.listReviews).toHaveBeenCalledWith({ productIds: ['PROD-002'] });
            expect(breakdown.totalReviews).toBe(3);
            expect(breakdown.buckets.map(bucket => [bucket.sentiment, bucket.percentage])).toEqual([
                ['positive', 33.3],
                ['negative', 33.3]
            ]);
        });

        it('should return an empty breakdown for a category without products', async () => {
            catalog.listProductsByCategory.mockResolvedValue([]);

            const breakdown = await service.getSentimentBreakdown('Garden');

            expect(breakdown).toEqual({ category: 'Garden', totalReviews: 0, buckets: [] });
            expect(catalog.listReviews).not.toHaveBeenCalled();
        });
    });

    describe('getBestReviewedProducts', () => {
        it('should rank products by the average rating of their positive reviews', async () => {
            catalog.listActiveProducts.mockResolvedValue([headphones, blender]);
            catalog.listReviews.mockResolvedValue(reviews);

            const best = await service.getBestReviewedProducts();

            expect(best).toEqual([
                { productId: 'PROD-002', productName: 'Blender', positiveReviews: 1, avgRating: 5 },
                { productId: 'PROD-001', productName: 'Headphones', positiveReviews: 2, avgRating: 4.5 }
            ]);
        });

        it('should break rating ties by number of positive reviews', async () => {
            catalog.listActiveProducts.mockResolvedValue([headphones, blender]);
            catalog.listReviews.mockResolvedValue([
                makeReview({ id: 'R1', productId: 'PROD-001', rating: 5 }),
                makeReview({ id: 'R2', productId: 'PROD-002', rating: 5 }),
                makeReview({ id: 'R3', productId: 'PROD-002', rating: 5 })
            ]);

            const best = await service.getBestReviewedProducts({ limit: 1 });

            expect(best).toEqual([
                { productId: 'PROD-002', productName: 'Blender', positiveReviews: 2, avgRating: 5 }
            ]);
        });
    });

    describe('getProductSentiment', () => {
        it('should band ratings and average the sentiment scores that exist', async () => {
            catalog.getProduct.mockResolvedValue(headphones);
            catalog.listReviews.mockResolvedValue([
                makeReview({ id: 'R1', productId: 'PROD-001', rating: 5, sentimentScore: 0.9 }),
                makeReview({ id: 'R2', productId: 'PROD-001', rating: 4, sentimentScore: 0.6 }),
                makeReview({ id: 'R3', productId: 'PROD-001', rating: 3 }),
                makeReview({ id: 'R4', productId: 'PROD-001', rating: 1, sentimentScore: -0.5 })
            ]);

            const sentiment = await service.getProductSentiment('PROD-001');

            expect(catalog.listReviews).toHaveBeenCalledWith({
                productId: 'PROD-001',
                limit: PRODUCT_SENTIMENT_REVIEW_LIMIT
            });
            expect(sentiment).toEqual({
                productId: 'PROD-001',
                productName: 'Headphones',
                totalReviews: 4,
                avgRating: 3.25,
                avgSentimentScore: 0.33,
                distribution: {
                    positive: { count: 2, percentage: 50 },
                    neutral: { count: 1, percentage: 25 },
                    negative: { count: 1, percentage: 25 }
                },
                overall: 'neutral'
            });
        });

        it('should call a product rated 4 or more on average positive', async () => {
            catalog.getProduct.mockResolvedValue(headphones);
            catalog.listReviews.mockResolvedValue([
                makeReview({ id: 'R1', productId: 'PROD-001', rating: 5 }),
                makeReview({ id: 'R2', productId: 'PROD-001', rating: 4 }),
                makeReview({ id: 'R3', productId: 'PROD-001', rating: 4 })
            ]);

            const sentiment = await service.getProductSentiment('PROD-001');

            expect(sentiment.overall).toBe('positive');
            expect(sentiment.avgRating).toBe(4.33);
            expect(sentiment.avgSentimentScore).toBeNull();
            expect(sentiment.distribution.positive).toEqual({ count: 3, percentage: 100 });
        });

        it('should report an empty distribution and no verdict without reviews', async () => {
            catalog.getProduct.mockResolvedValue(blender);
            catalog.listReviews.mockResolvedValue([]);

            const sentiment = await service.getProductSentiment('PROD-002');

            expect(sentiment.totalReviews).toBe(0);
            expect(sentiment.avgRating).toBe(0);
            expect(sentiment.overall).toBeNull();
            expect(sentiment.distribution.negative).toEqual({ count: 0, percentage: 0 });
        });

        it('should throw NotFoundError for an unknown product', async () => {
            catalog.getProduct.mockResolvedValue(null);

            await expect(service.getProductSentiment('PROD-404')).rejects.toThrow(NotFoundError);
            expect(catalog.listReviews).not.toHaveBeenCalled();
        });
    });

    describe('compareProducts', () => {
        const summary = (productId: string, totalReviews: number, avgRating: number): ReviewSummary => ({
            productId,
            totalReviews,
            avgRating,
            fiveStarCount: 0,
            fourStarCount: 0,
            threeStarCount: 0,
            twoStarCount: 0,
            oneStarCount: 0,
            verifiedPurchaseCount: 0
        });

        beforeEach(() => {
            catalog.getProduct.mockImplementation(async id => [headphones, blender].find(product => product.id === id) ?? null);
        });

        it('should name the product with the higher average rating', async () => {
            catalog.getReviewSummary.mockImplementation(async id =>
                id === 'PROD-001' ? summary(id, 3, 13 / 3) : summary(id, 2, 3.5)
            );

            const comparison = await service.compareProducts('PROD-001', 'PROD-002');

            expect(comparison).toEqual({
                first: { productId: 'PROD-001', productName: 'Headphones', totalReviews: 3, avgRating: 4.33 },
                second: { productId: 'PROD-002', productName: 'Blender', totalReviews: 2, avgRating: 3.5 },
                betterRatedProductId: 'PROD-001'
            });
        });

        it('should report no winner on equal ratings', async () => {
            catalog.getReviewSummary.mockImplementation(async id => summary(id, 4, 4));

            const comparison = await service.compareProducts('PROD-002', 'PROD-001');

            expect(comparison.first.productId).toBe('PROD-002');
            expect(comparison.betterRatedProductId).toBeNull();
        });

        it('should throw NotFoundError when either product is missing', async () => {
            await expect(service.compareProducts('PROD-001', 'PROD-404')).rejects.toThrow('Product PROD-404 not found');
            expect(catalog.getReviewSummary).not.toHaveBeenCalled();
        });
    });
});
