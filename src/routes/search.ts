import { Router, Request, Response } from "express";
import { z } from "zod";
import { getRecommendationService } from "../services/recommendation.service";
import { sendError } from "./error-handler";

const router = Router();

const productSearchSchema = z.object({
    query: z.string().trim().min(1, "Query is required"),
    limit: z.number().int().min(0).max(50).optional(),
    threshold: z.number().min(0).max(1).optional()
});

const reviewSearchSchema = productSearchSchema.extend({
    productId: z.string().min(1).optional()
});

/**
 * POST /search/products
 *
 * Semantic product search. Falls back to keyword search when the embedding
 * provider is unavailable; `strategy` says which one answered.
 *
 * Body: { query: string, limit?: number, threshold?: number }
 */
router.post('/products', async (req: Request, res: Response) => {
    try {
        const { query, limit, threshold } = productSearchSchema.parse(req.body);
        const outcome = await getRecommendationService().searchProducts(query, { limit, threshold });

        res.json({ query, ...outcome });
    } catch (error) {
        sendError(res, error, 'Product search');
    }
});

/**
 * POST /search/reviews
 *
 * Body: { query: string, productId?: string, limit?: number, threshold?: number }
 */
router.post('/reviews', async (req: Request, res: Response) => {
    try {
        const { query, productId, limit, threshold } = reviewSearchSchema.parse(req.body);
        const results = await getRecommendationService().searchReviews(query, { productId, limit, threshold });

        res.json({ query, productId: productId ?? null, results });
    } catch (error) {
        sendError(res, error, 'Review search');
    }
});

export { router as searchRoutes };
