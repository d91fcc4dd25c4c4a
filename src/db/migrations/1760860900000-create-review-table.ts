import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateReviewTable1760860900000 implements MigrationInterface {
    name = 'CreateReviewTable1760860900000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "reviews" ("id" character varying(100) NOT NULL, "product_id" character varying(50) NOT NULL, "customer_id" character varying(50), "customer_name" character varying(200), "rating" smallint NOT NULL, "title" character varying(255) NOT NULL, "review_text" text NOT NULL, "sentiment_label" character varying(20), "sentiment_score" real, "verified_purchase" boolean NOT NULL DEFAULT false, "helpful_count" integer NOT NULL DEFAULT 0, "embedding" jsonb, "created_at" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_reviews_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE INDEX "IDX_reviews_product_id" ON "reviews" ("product_id")`);
        await queryRunner.query(`ALTER TABLE "reviews" ADD CONSTRAINT "FK_reviews_product_id" FOREIGN KEY ("product_id") REFERENCES "products"("id") ON DELETE CASCADE ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "reviews" DROP CONSTRAINT "FK_reviews_product_id"`);
        await queryRunner.query(`DROP INDEX "IDX_reviews_product_id"`);
        await queryRunner.query(`DROP TABLE "reviews"`);
    }

}
