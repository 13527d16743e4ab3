// src/core/reconciliation/index.ts

export * from './invoice-reconciler.service';
export * from './pricing-run.service';
export * from './interfaces/services';
