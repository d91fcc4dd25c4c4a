import { Router, Request, Response } from "express";
import { z } from "zod";
import { getRecommendationService } from "../services/recommendation.service";
import { getCatalogService } from "../services/catalog.service";
import { sendError } from "./error-handler";

const router = Router();

const topRatedQuerySchema = z.object({
    category: z.string().min(1).optional(),
    minReviews: z.coerce.number().int().min(0).optional(),
    limit: z.coerce.number().int().min(1).max(100).optional()
});

const similarQuerySchema = z.object({
    limit: z.coerce.number().int().min(0).max(50).optional()
});

const productIdSchema = z.object({
    id: z.string().trim().min(1, "Product ID is required")
});

// Static paths first so they are not captured by /:id

router.get('/categories', async (req: Request, res: Response) => {
    try {
        const categories = await getRecommendationService().getCategories();
        res.json({ categories });
    } catch (error) {
        sendError(res, error, 'Category listing');
    }
});

/**
 * GET /products/top-rated?category&minReviews&limit
 */
router.get('/top-rated', async (req: Request, res: Response) => {
    try {
        const options = topRatedQuerySchema.parse(req.query);
        const products = await getRecommendationService().getTopRatedProducts(options);
        res.json({ products });
    } catch (error) {
        sendError(res, error, 'Top rated lookup');
    }
});

/**
 * GET /products/:id
 *
 * The product with its review summary.
 */
router.get('/:id', async (req: Request, res: Response) => {
    try {
        const { id } = productIdSchema.parse(req.params);
        const product = await getRecommendationService().getProduct(id);
        const reviewSummary = await getCatalogService().getReviewSummary(id);

        res.json({ product, reviewSummary });
    } catch (error) {
        sendError(res, error, 'Product lookup');
    }
});

/**
 * GET /products/:id/similar?limit
 *
 * Nearest products by embedding, or by category and price when the product
 * has no embedding or nothing clears the similarity threshold.
 */
router.get('/:id/similar', async (req: Request, res: Response) => {
    try {
        const { id } = productIdSchema.parse(req.params);
        const { limit } = similarQuerySchema.parse(req.query);
        const outcome = await getRecommendationService().findSimilarProducts(id, { limit });

        res.json(outcome);
    } catch (error) {
        sendError(res, error, 'Similar products lookup');
    }
});

export { router as productRoutes };
