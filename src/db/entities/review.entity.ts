import { Column, Entity, PrimaryColumn, CreateDateColumn, ManyToOne, JoinColumn, Index } from "typeorm";
import { Product } from "./product.entity";

/**
 * Review Entity
 *
 * Customer reviews of catalog products. Review text is embedded the same
 * way as product descriptions so reviews can be searched semantically.
 *
 * sentiment_label: positive, neutral, negative
 * sentiment_score: -1 (negative) to 1 (positive)
 */
@Entity({ name: "reviews" })
export class Review {
    @PrimaryColumn({
        type: "varchar",
        length: 100
    })
    id!: string;

    @Index()
    @Column({
        name: "product_id",
        type: "varchar",
        length: 50
    })
    product_id!: string;

    @ManyToOne(() => Product, { onDelete: "CASCADE" })
    @JoinColumn({ name: "product_id" })
    product?: Product;

    @Column({
        name: "customer_id",
        type: "varchar",
        length: 50,
        nullable: true
    })
    customer_id!: string | null;

    @Column({
        name: "customer_name",
        type: "varchar",
        length: 200,
        nullable: true
    })
    customer_name!: string | null;

    @Column({
        type: "smallint"
    })
    rating!: number; // 1-5

    @Column({
        type: "varchar",
        length: 255
    })
    title!: string;

    @Column({
        name: "review_text",
        type: "text"
    })
    review_text!: string;

    @Column({
        name: "sentiment_label",
        type: "varchar",
        length: 20,
        nullable: true
    })
    sentiment_label!: string | null;

    @Column({
        name: "sentiment_score",
        type: "real",
        nullable: true
    })
    sentiment_score!: number | null;

    @Column({
        name: "verified_purchase",
        type: "boolean",
        default: false
    })
    verified_purchase!: boolean;

    @Column({
        name: "helpful_count",
        type: "integer",
        default: 0
    })
    helpful_count!: number;

    @Column({
        type: "jsonb",
        nullable: true
    })
    embedding!: number[] | null;

    @CreateDateColumn({ name: "created_at" })
    created_at!: Date;
}
