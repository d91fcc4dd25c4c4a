import express, { Request, Response } from "express";
import { getEnv } from "./config/env";
import { AppDataSource } from "./db/data-source";
import { searchRoutes } from "./routes/search";
import { productRoutes } from "./routes/products";
import { insightRoutes } from "./routes/insights";
import { chatRoutes } from "./routes/chat";
import { embeddingRoutes } from "./routes/embeddings";
import { logger } from "./config/logger";
import { getQueueConfig } from "./queue/queue-config";
import { embeddingProcessor } from "./workers/embedding-worker";
import { getOpenAIService } from "./services/openai.service";
import { getErrorMessage } from "./utils/errors";

const env = getEnv();
const app = express();

// Middleware
app.use(express.json());
app.use(express.urlencoded({ extended: true }));

// Routes
app.use("/search", searchRoutes);
app.use("/products", productRoutes);
app.use("/insights", insightRoutes);
app.use("/chat", chatRoutes);
app.use("/embeddings", embeddingRoutes);

// Health check
app.get("/health", (req: Request, res: Response) => {
    res.json({
        status: "ok",
        database: AppDataSource.isInitialized ? "connected" : "disconnected",
        timestamp: new Date().toISOString()
    });
});

// Root route
app.get("/", (req: Request, res: Response) => {
    res.json({
        message: "Catalog Similarity API",
        version: "1.0.0",
        description: "Semantic product search, similar products and review insights over a product catalog",
        endpoints: {
            "Search": {
                "POST /search/products": "Semantic product search (keyword fallback)",
                "POST /search/reviews": "Semantic review search"
            },
            "Products": {
                "GET /products/categories": "List categories",
                "GET /products/top-rated": "Top rated products",
                "GET /products/:id": "Product with review summary",
                "GET /products/:id/similar": "Similar products (attribute fallback)"
            },
            "Insights": {
                "GET /insights/sentiment": "Review sentiment breakdown",
                "GET /insights/best-reviewed": "Products with the best positive reviews",
                "GET /insights/products/:id/sentiment": "Rating distribution and verdict for one product",
                "GET /insights/compare?first=&second=": "Compare the reviews of two products"
            },
            "Assistant": {
                "POST /chat": "Ask a question about the catalog"
            },
            "Embeddings": {
                "POST /embeddings/backfill": "Queue embedding generation (async)",
                "GET /embeddings/backfill/:jobId": "Backfill job status"
            },
            "System": {
                "GET /health": "Health check",
                "GET /": "API information"
            }
        },
        infrastructure: {
            "Queue System": "BullMQ with Redis",
            "Database": "PostgreSQL with TypeORM (embeddings as jsonb)",
            "Embeddings": env.AZURE_OPENAI_ENDPOINT ? "Azure OpenAI" : "OpenAI"
        }
    });
});

// Initialize database and start server
async function startServer(): Promise<void> {
    try {
        await AppDataSource.initialize();
        logger.info({}, "Database connection established");

        const openaiService = getOpenAIService();
        const openaiConnected = await openaiService.testConnection();
        if (openaiConnected) {
            logger.info({}, "Embedding provider connected");
        } else {
            logger.warn({}, "Embedding provider unreachable, semantic search will fall back to keyword search");
        }

        const queueConfig = getQueueConfig();
        queueConfig.startWorker(embeddingProcessor);
        logger.info({}, "Queue system initialized and worker started");

        const server = app.listen(env.PORT, () => {
            logger.info({ port: env.PORT }, `Server running at http://localhost:${env.PORT}`);
        });

        process.once("SIGTERM", () => {
            logger.info({}, "Shutting down");
            server.close();
            queueConfig.close()
                .then(() => AppDataSource.destroy())
                .catch(error => logger.error({ error: getErrorMessage(error) }, "Shutdown failed"));
        });
    } catch (error) {
        logger.error({ error: getErrorMessage(error) }, "Failed to start server");
        process.exit(1);
    }
}

void startServer();
