// src/core/common/entities/canonical-invoice-record.entity.ts
import {
    Column,
    CreateDateColumn,
    Entity,
    Index,
    PrimaryGeneratedColumn,
} from 'typeorm';

/** One canonical invoice as emitted by a pricing run. Amounts are already rounded. */
@Entity('canonical_invoices')
@Index(['transactionId', 'reconciledAt'])
export class CanonicalInvoiceRecord {

    @PrimaryGeneratedColumn('increment')
    id!: number;

    @Index()
    @Column({ type: 'nvarchar', length: 36 })
    runId!: string;

    // Ingestion caps keys at MAX_KEY_LENGTH
    @Column({ type: 'nvarchar', length: 64 })
    transactionId!: string;

    /** Comma-joined; one invoice may carry any number of customers */
    @Column({ type: 'nvarchar', length: 'MAX' })
    customerIds!: string;

    @Column({ type: 'nvarchar', length: 10 }) // YYYY-MM-DD
    transactionDate!: string;

    @Column({ type: 'int' })
    lineCount!: number;

    @Column({ type: 'int' })
    totalQuantity!: number;

    @Column({ type: 'decimal', precision: 18, scale: 2, default: 0 })
    basePrice!: number;

    @Column({ type: 'decimal', precision: 18, scale: 2, default: 0 })
    discountEffect!: number;

    @Column({ type: 'decimal', precision: 18, scale: 2, default: 0 })
    priceAfterDiscount!: number;

    @Column({ type: 'decimal', precision: 18, scale: 2, default: 0 })
    taxEffect!: number;

    @Column({ type: 'decimal', precision: 18, scale: 2, default: 0 })
    priceAfterTax!: number;

    @Column({ type: 'decimal', precision: 18, scale: 2, default: 0 })
    deliveryCharge!: number;

    @Column({ type: 'decimal', precision: 18, scale: 2, default: 0 })
    finalPrice!: number;

    @Column({ type: 'bit', default: true })
    deliveryConsistent!: boolean;

    @Column({ type: 'nvarchar', length: 'MAX' })
    observedDeliveryCharges!: string;

    @Column({ type: 'datetime2' })
    reconciledAt!: Date;

    @CreateDateColumn({ type: 'datetime2' })
    createdAt!: Date;
}
