// src/core/common/entities/pricing-anomaly-record.entity.ts
import {
    Column,
    CreateDateColumn,
    Entity,
    Index,
    PrimaryGeneratedColumn,
} from 'typeorm';
import { AnomalyKind } from '../interfaces/models';

@Entity('pricing_anomalies')
@Index(['runId', 'kind'])
export class PricingAnomalyRecord {

    @PrimaryGeneratedColumn('increment')
    id!: number;

    @Column({ type: 'nvarchar', length: 36 })
    runId!: string;

    @Column({ type: 'nvarchar', length: 40 })
    kind!: AnomalyKind;

    @Index()
    @Column({ type: 'nvarchar', length: 255 })
    subjectId!: string;

    @Column({ type: 'nvarchar', length: 255 })
    rule!: string;

    @Column({ type: 'decimal', precision: 18, scale: 2, nullable: true })
    threshold!: number | null;

    @Column({ type: 'nvarchar', length: 'MAX' })
    evidence!: string;

    @Column({ type: 'datetime2' })
    detectedAt!: Date;

    @CreateDateColumn({ type: 'datetime2' })
    createdAt!: Date;
}
