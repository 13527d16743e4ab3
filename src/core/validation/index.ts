// src/core/validation/index.ts

export * from './validation.service';
export * from './normalization.utils';
export * from './interfaces/services';
