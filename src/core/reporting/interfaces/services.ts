// src/core/reporting/interfaces/services.ts
import { AnomalyKind, PricingRunResult } from '../../common/interfaces/models';

/** Potential options for report generation */
export interface ReportOptions {
    /** Adds the per-line breakdown sheet. Defaults to true. */
    includeLines?: boolean;
    generatedAt?: Date;
}

/** Defines the contract for the Report Generator Service */
export interface IReportGeneratorService {
    /**
     * Generates an Excel workbook from a pricing run.
     * @returns A promise resolving to a Buffer containing the .xlsx file content.
     */
    generateReport(result: PricingRunResult, options?: ReportOptions): Promise<Buffer>;

    /** Flattens a run into rows ready for the canonical invoice repository. */
    prepareDataForStorage(result: PricingRunResult, runId: string, runAt: Date): StorablePricingRun;
}

export interface StorableInvoiceRecord {
    runId: string;
    transactionId: string;
    /** Comma-separated when the lines named more than one customer */
    customerIds: string;
    transactionDate: string;
    lineCount: number;
    totalQuantity: number;
    basePrice: number;
    discountEffect: number;
    priceAfterDiscount: number;
    taxEffect: number;
    priceAfterTax: number;
    deliveryCharge: number;
    finalPrice: number;
    deliveryConsistent: boolean;
    observedDeliveryCharges: string;
    reconciledAt: Date;
}

export interface StorableAnomalyRecord {
    runId: string;
    kind: AnomalyKind;
    subjectId: string;
    rule: string;
    threshold: number | null;
    /** JSON text of the evidence object */
    evidence: string;
    detectedAt: Date;
}

export interface StorablePricingRun {
    runId: string;
    invoices: StorableInvoiceRecord[];
    anomalies: StorableAnomalyRecord[];
}
