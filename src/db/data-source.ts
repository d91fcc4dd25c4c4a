import "reflect-metadata";
import { DataSource } from "typeorm";
import { getEnv } from "../config/env";
import { Product } from "./entities/product.entity";
import { Review } from "./entities/review.entity";
import { CreateProductTable1760860800000 } from "./migrations/1760860800000-create-product-table";
import { CreateReviewTable1760860900000 } from "./migrations/1760860900000-create-review-table";

const env = getEnv();

export const AppDataSource = new DataSource({
    type: "postgres",
    url: env.DATABASE_URL,
    synchronize: false,
    migrationsRun: env.DB_MIGRATIONS_RUN,
    logging: env.NODE_ENV === 'development',
    entities: [Product, Review],
    migrations: [CreateProductTable1760860800000, CreateReviewTable1760860900000],
});
