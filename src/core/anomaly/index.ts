// src/core/anomaly/index.ts

export * from './anomaly-scanner.service';
export * from './interfaces/services';
