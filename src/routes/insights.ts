import { Router, Request, Response } from "express";
import { z } from "zod";
import { getReviewInsightsService } from "../services/review-insights.service";
import { sendError } from "./error-handler";

const router = Router();

const sentimentQuerySchema = z.object({
    category: z.string().min(1).optional()
});

const bestReviewedQuerySchema = sentimentQuerySchema.extend({
    limit: z.coerce.number().int().min(1).max(50).optional()
});

const productParamsSchema = z.object({
    id: z.string().min(1)
});

const compareQuerySchema = z.object({
    first: z.string().min(1),
    second: z.string().min(1)
});

router.get('/sentiment', async (req: Request, res: Response) => {
    try {
        const { category } = sentimentQuerySchema.parse(req.query);
        const breakdown = await getReviewInsightsService().getSentimentBreakdown(category);
        res.json(breakdown);
    } catch (error) {
        sendError(res, error, 'Sentiment breakdown');
    }
});

router.get('/best-reviewed', async (req: Request, res: Response) => {
    try {
        const options = bestReviewedQuerySchema.parse(req.query);
        const products = await getReviewInsightsService().getBestReviewedProducts(options);
        res.json({ category: options.category ?? null, products });
    } catch (error) {
        sendError(res, error, 'Best reviewed lookup');
    }
});

router.get('/products/:id/sentiment', async (req: Request, res: Response) => {
    try {
        const { id } = productParamsSchema.parse(req.params);
        const sentiment = await getReviewInsightsService().getProductSentiment(id);
        res.json(sentiment);
    } catch (error) {
        sendError(res, error, 'Product sentiment');
    }
});

router.get('/compare', async (req: Request, res: Response) => {
    try {
        const { first, second } = compareQuerySchema.parse(req.query);
        const comparison = await getReviewInsightsService().compareProducts(first, second);
        res.json(comparison);
    } catch (error) {
        sendError(res, error, 'Product comparison');
    }
});

export { router as insightRoutes };
