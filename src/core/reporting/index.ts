// src/core/reporting/index.ts

export * from './report-generator.service';
export * from './interfaces/services';
