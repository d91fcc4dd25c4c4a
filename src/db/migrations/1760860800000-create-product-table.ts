import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateProductTable1760860800000 implements MigrationInterface {
    name = 'CreateProductTable1760860800000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "products" ("id" character varying(50) NOT NULL, "sku" character varying(50) NOT NULL, "name" character varying(255) NOT NULL, "brand" character varying(100) NOT NULL, "category" character varying(100) NOT NULL, "subcategory" character varying(100), "description" text NOT NULL, "price" numeric(10,2), "stock_quantity" integer NOT NULL DEFAULT 0, "is_active" boolean NOT NULL DEFAULT true, "embedding" jsonb, "created_at" TIMESTAMP NOT NULL DEFAULT now(), "updated_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "UQ_products_sku" UNIQUE ("sku"), CONSTRAINT "PK_products_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_products_category" ON "products" ("category")`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP INDEX "IDX_products_category"`);
        await queryRunner.query(`DROP TABLE "products"`);
    }

}
