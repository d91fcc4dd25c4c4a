import { describe, it, expect, beforeEach } from 'vitest';
import {
    buildProductText,
    buildReviewText,
    EmbeddingWorker
} from '../../../src/workers/embedding-worker';
import {
    createMockCatalog,
    createMockEmbeddingProvider,
    createMockLogger,
    makeProduct,
    makeReview
} from '../../helpers/factories';

describe('Embedding Worker', () => {
    let catalog: ReturnType<typeof createMockCatalog>;
    let embeddings: ReturnType<typeof createMockEmbeddingProvider>;
    let logger: ReturnType<typeof createMockLogger>;
    let worker: EmbeddingWorker;

    beforeEach(() => {
        catalog = createMockCatalog();
        embeddings = createMockEmbeddingProvider();
        logger = createMockLogger();
        worker = new EmbeddingWorker(catalog, embeddings, logger);
    });

    describe('embedding text', () => {
        it('should join product name, brand, category and description', () => {
            const product = makeProduct({
                id: 'PROD-001',
                name: 'Trail Shoe',
                brand: 'Peak',
                category: 'Sports',
                description: 'Grippy outsole'
            });

            expect(buildProductText(product)).toBe('Trail Shoe\nPeak\nSports\nGrippy outsole');
        });

        it('should skip blank product fields', () => {
            const product = makeProduct({ id: 'PROD-002', name: 'Mug', brand: ' ', category: 'Home', description: '' });
            expect(buildProductText(product)).toBe('Mug\nHome');
        });

        it('should join review title and text', () => {
            const review = makeReview({ id: 'R1', productId: 'PROD-001', title: 'Comfy', reviewText: 'Wore them all day' });
            expect(buildReviewText(review)).toBe('Comfy\nWore them all day');
        });
    });

    describe('processBackfill', () => {
        it('should embed a batch of products in one call and store each vector', async () => {
            const first = makeProduct({ id: 'PROD-001', name: 'A', brand: 'B', category: 'C', description: 'D' });
            const second = makeProduct({ id: 'PROD-002', name: 'E', brand: 'F', category: 'G', description: 'H' });
            catalog.findProductsMissingEmbeddings.mockResolvedValue([first, second]);
            embeddings.generateEmbeddings.mockResolvedValue([[1, 0], [0, 1]]);
            catalog.updateProductEmbedding.mockResolvedValue();

            const result = await worker.processBackfill({ id: 'job-1', data: { target: 'products', batchSize: 50 } });

            expect(catalog.findProductsMissingEmbeddings).toHaveBeenCalledWith(50);
            expect(embeddings.generateEmbeddings).toHaveBeenCalledTimes(1);
            expect(embeddings.generateEmbeddings).toHaveBeenCalledWith(['A\nB\nC\nD', 'E\nF\nG\nH']);
            expect(catalog.updateProductEmbedding).toHaveBeenNthCalledWith(1, 'PROD-001', [1, 0]);
            expect(catalog.updateProductEmbedding).toHaveBeenNthCalledWith(2, 'PROD-002', [0, 1]);
            expect(result).toEqual({ target: 'products', processed: 2 });
        });

        it('should embed reviews', async () => {
            catalog.findReviewsMissingEmbeddings.mockResolvedValue([
                makeReview({ id: 'R1', productId: 'PROD-001', title: 'Loud', reviewText: 'Great bass' })
            ]);
            embeddings.generateEmbeddings.mockResolvedValue([[0.5, 0.5]]);
            catalog.updateReviewEmbedding.mockResolvedValue();

            const result = await worker.processBackfill({ id: 'job-2', data: { target: 'reviews', batchSize: 10 } });

            expect(embeddings.generateEmbeddings).toHaveBeenCalledWith(['Loud\nGreat bass']);
            expect(catalog.updateReviewEmbedding).toHaveBeenCalledWith('R1', [0.5, 0.5]);
            expect(result).toEqual({ target: 'reviews', processed: 1 });
        });

        it('should not call the provider when nothing is missing', async () => {
            catalog.findProductsMissingEmbeddings.mockResolvedValue([]);

            const result = await worker.processBackfill({ id: 'job-3', data: { target: 'products', batchSize: 10 } });

            expect(result).toEqual({ target: 'products', processed: 0 });
            expect(embeddings.generateEmbeddings).not.toHaveBeenCalled();
        });

        it('should rethrow provider failures so the job is retried', async () => {
            catalog.findReviewsMissingEmbeddings.mockResolvedValue([makeReview({ id: 'R1', productId: 'PROD-001' })]);
            embeddings.generateEmbeddings.mockRejectedValue(new Error('Rate limit exceeded'));

            await expect(worker.processBackfill({ id: 'job-4', data: { target: 'reviews', batchSize: 10 } }))
                .rejects.toThrow('Rate limit exceeded');

            expect(catalog.updateReviewEmbedding).not.toHaveBeenCalled();
            expect(logger.error).toHaveBeenCalledWith(
                { jobId: 'job-4', target: 'reviews', error: 'Rate limit exceeded' },
                'Embedding backfill failed'
            );
        });
    });
});
