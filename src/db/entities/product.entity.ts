import { Column, Entity, PrimaryColumn, CreateDateColumn, UpdateDateColumn, Index } from "typeorm";

/**
 * Product Entity
 *
 * Catalog products searched by the similarity engine. `embedding` holds the
 * description vector as a JSON array of floats; it is null until the
 * embedding backfill job has processed the product.
 *
 * Embedding text: name, brand, category and description joined by newlines
 * (see EmbeddingWorker.buildProductText).
 */
@Entity({ name: "products" })
export class Product {
    @PrimaryColumn({
        type: "varchar",
        length: 50
    })
    id!: string; // e.g. PROD-001

    @Column({
        type: "varchar",
        length: 50,
        unique: true
    })
    sku!: string;

    @Column({
        type: "varchar",
        length: 255
    })
    name!: string;

    @Column({
        type: "varchar",
        length: 100
    })
    brand!: string;

    @Index()
    @Column({
        type: "varchar",
        length: 100
    })
    category!: string; // coarse partition key used by the attribute fallback

    @Column({
        type: "varchar",
        length: 100,
        nullable: true
    })
    subcategory!: string | null;

    @Column({
        type: "text"
    })
    description!: string;

    @Column({
        type: "numeric",
        precision: 10,
        scale: 2,
        nullable: true
    })
    price!: string | null; // pg returns numeric as string

    @Column({
        name: "stock_quantity",
        type: "integer",
        default: 0
    })
    stock_quantity!: number;

    @Column({
        name: "is_active",
        type: "boolean",
        default: true
    })
    is_active!: boolean;

    @Column({
        type: "jsonb",
        nullable: true
    })
    embedding!: number[] | null;

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;

    @UpdateDateColumn({ name: "updated_at" })
    updated_at!: Date;
}
