import { Job, Queue, Worker, QueueEvents } from 'bullmq';
import { Redis } from 'ioredis';
import { logger } from '../config/logger';
import { Env, getEnv } from '../config/env';

export const EMBEDDING_QUEUE_NAME = 'embedding';

export type BackfillTarget = 'products' | 'reviews';

export interface BackfillJobData {
    target: BackfillTarget;
    batchSize: number;
}

export interface BackfillResult {
    target: BackfillTarget;
    processed: number;
}

export type BackfillProcessor = (job: Job<BackfillJobData, BackfillResult>) => Promise<BackfillResult>;

/**
 * Queue Configuration
 *
 * BullMQ setup for embedding backfill. Jobs embed catalog rows that have
 * no vector yet, one batch per job.
 */
export class QueueConfig {
    private redis: Redis;
    private embeddingQueue: Queue<BackfillJobData, BackfillResult>;
    private embeddingWorker: Worker<BackfillJobData, BackfillResult> | null = null;
    private queueEvents: QueueEvents;

    constructor(env: Env = getEnv()) {
        // Redis connection
        this.redis = new Redis(env.REDIS_URL, {
            enableReadyCheck: false,
            maxRetriesPerRequest: null,
        });

        this.embeddingQueue = new Queue<BackfillJobData, BackfillResult>(EMBEDDING_QUEUE_NAME, {
            connection: this.redis,
            defaultJobOptions: {
                removeOnComplete: 10,
                removeOnFail: 5,
                attempts: env.EMBEDDING_MAX_ATTEMPTS,
                backoff: {
                    type: 'exponential',
                    delay: env.EMBEDDING_BACKOFF_MS,
                },
            },
        });

        // Queue events for monitoring
        this.queueEvents = new QueueEvents(EMBEDDING_QUEUE_NAME, {
            connection: this.redis,
        });

        this.setupEventListeners();
    }

    getEmbeddingQueue(): Queue<BackfillJobData, BackfillResult> {
        return this.embeddingQueue;
    }

    /**
     * Start the embedding worker
     */
    startWorker(processor: BackfillProcessor): void {
        this.embeddingWorker = new Worker<BackfillJobData, BackfillResult>(EMBEDDING_QUEUE_NAME, processor, {
            connection: this.redis,
            concurrency: 1, // Batches write to the same tables
        });

        this.embeddingWorker.on('completed', (job) => {
            logger.info({
                jobId: job.id,
                target: job.data.target,
                processed: job.returnvalue.processed,
                duration: job.finishedOn !== undefined && job.processedOn !== undefined
                    ? job.finishedOn - job.processedOn
                    : undefined
            }, 'Embedding backfill job completed');
        });

        this.embeddingWorker.on('failed', (job, err) => {
            logger.error({
                jobId: job?.id,
                target: job?.data.target,
                error: err.message,
                attempts: job?.attemptsMade
            }, 'Embedding backfill job failed');
        });

        this.embeddingWorker.on('stalled', (jobId) => {
            logger.warn({ jobId }, 'Embedding backfill job stalled');
        });
    }

    /**
     * Setup queue event listeners
     */
    private setupEventListeners(): void {
        this.queueEvents.on('waiting', ({ jobId }) => {
            logger.info({ jobId }, 'Job waiting in queue');
        });

        this.queueEvents.on('active', ({ jobId }) => {
            logger.info({ jobId }, 'Job started processing');
        });

        this.queueEvents.on('failed', ({ jobId, failedReason }) => {
            logger.error({ jobId, failedReason }, 'Job failed');
        });
    }

    /**
     * Close all connections
     */
    async close(): Promise<void> {
        await this.embeddingWorker?.close();
        await this.embeddingQueue.close();
        await this.queueEvents.close();
        await this.redis.quit();
    }
}

// Singleton instance
let queueConfig: QueueConfig | null = null;

export function getQueueConfig(): QueueConfig {
    if (!queueConfig) {
        queueConfig = new QueueConfig();
    }
    return queueConfig;
}
