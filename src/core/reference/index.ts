// src/core/reference/index.ts

export * from './reference-resolver';
export * from './interfaces/services';
