// src/core/common/entities/index.ts

export * from './canonical-invoice-record.entity';
export * from './pricing-anomaly-record.entity';
