import { Router, Request, Response } from "express";
import { z } from "zod";
import { logger } from "../config/logger";
import { getQueueConfig } from "../queue/queue-config";
import { sendError } from "./error-handler";

const router = Router();

const backfillSchema = z.object({
    target: z.enum(['products', 'reviews']),
    batchSize: z.number().int().min(1).max(500).default(100)
});

const jobIdSchema = z.object({
    jobId: z.string().min(1)
});

/**
 * POST /embeddings/backfill
 *
 * Queue one batch of embedding generation for rows that have none.
 *
 * Body: { target: 'products' | 'reviews', batchSize?: number }
 * Returns: { jobId, target, batchSize }
 */
router.post('/backfill', async (req: Request, res: Response) => {
    try {
        const { target, batchSize } = backfillSchema.parse(req.body);

        const queue = getQueueConfig().getEmbeddingQueue();
        const job = await queue.add('backfill', { target, batchSize });

        logger.info({ jobId: job.id, target, batchSize }, 'Embedding backfill job added to queue');

        res.status(202).json({ jobId: job.id, target, batchSize });
    } catch (error) {
        sendError(res, error, 'Embedding backfill');
    }
});

/**
 * GET /embeddings/backfill/:jobId
 *
 * Returns the job state and, once completed, how many rows were embedded.
 */
router.get('/backfill/:jobId', async (req: Request, res: Response) => {
    try {
        const { jobId } = jobIdSchema.parse(req.params);

        const job = await getQueueConfig().getEmbeddingQueue().getJob(jobId);
        if (!job) {
            return res.status(404).json({ error: 'Job not found' });
        }

        const state = await job.getState();

        res.json({
            jobId: job.id,
            state,
            target: job.data.target,
            batchSize: job.data.batchSize,
            attemptsMade: job.attemptsMade,
            result: state === 'completed' ? job.returnvalue : null,
            failedReason: job.failedReason ?? null
        });
    } catch (error) {
        sendError(res, error, 'Backfill status lookup');
    }
});

export { router as embeddingRoutes };
