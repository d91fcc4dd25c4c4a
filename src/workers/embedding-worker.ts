import { Job } from 'bullmq';
import { logger, ILogger } from '../config/logger';
import { BackfillJobData, BackfillResult } from '../queue/queue-config';
import { ProductRecord, ReviewRecord } from '../types/catalog';
import { getErrorMessage } from '../utils/errors';
import { getCatalogService, ICatalogService } from '../services/catalog.service';
import { getOpenAIService, IEmbeddingProvider } from '../services/openai.service';

/** The parts of a BullMQ job the worker reads. */
export type BackfillJob = Pick<Job<BackfillJobData, BackfillResult>, 'id' | 'data'>;

export function buildProductText(product: ProductRecord): string {
    return [product.name, product.brand, product.category, product.description]
        .filter(part => part.trim().length > 0)
        .join('\n');
}

export function buildReviewText(review: ReviewRecord): string {
    return `${review.title}\n${review.reviewText}`;
}

/**
 * Embedding Worker with Dependency Injection
 *
 * Fills in missing embeddings one batch per job. Each job embeds up to
 * `batchSize` rows in a single provider call; enqueue again to continue.
 */
export class EmbeddingWorker {
    constructor(
        private catalog: ICatalogService,
        private embeddings: IEmbeddingProvider,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): EmbeddingWorker {
        return new EmbeddingWorker(getCatalogService(), getOpenAIService(), logger);
    }

    async processBackfill(job: BackfillJob): Promise<BackfillResult> {
        const { target, batchSize } = job.data;

        this.logger.info({ jobId: job.id, target, batchSize }, 'Starting embedding backfill');

        try {
            const processed = target === 'products'
                ? await this.backfillProducts(batchSize)
                : await this.backfillReviews(batchSize);

            this.logger.info({ jobId: job.id, target, processed }, 'Embedding backfill batch stored');

            return { target, processed };
        } catch (error) {
            // Let the error bubble up so BullMQ retries the job
            this.logger.error({ jobId: job.id, target, error: getErrorMessage(error) }, 'Embedding backfill failed');
            throw error;
        }
    }

    private async backfillProducts(batchSize: number): Promise<number> {
        const products = await this.catalog.findProductsMissingEmbeddings(batchSize);
        if (products.length === 0) {
            return 0;
        }

        const vectors = await this.embeddings.generateEmbeddings(products.map(buildProductText));
        for (const [index, product] of products.entries()) {
            await this.catalog.updateProductEmbedding(product.id, vectors[index]);
        }
        return products.length;
    }

    private async backfillReviews(batchSize: number): Promise<number> {
        const reviews = await this.catalog.findReviewsMissingEmbeddings(batchSize);
        if (reviews.length === 0) {
            return 0;
        }

        const vectors = await this.embeddings.generateEmbeddings(reviews.map(buildReviewText));
        for (const [index, review] of reviews.entries()) {
            await this.catalog.updateReviewEmbedding(review.id, vectors[index]);
        }
        return reviews.length;
    }
}

// Export worker function for BullMQ
export async function embeddingProcessor(job: Job<BackfillJobData, BackfillResult>): Promise<BackfillResult> {
    const worker = EmbeddingWorker.create();
    return await worker.processBackfill(job);
}
