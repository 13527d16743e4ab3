// src/core/reconciliation/pricing-run.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AnomalyScannerService, AnomalyScanOptions } from '../anomaly';
import { ValidationError } from '../common/errors';
import { DiscountRule, LineItem, PricingRunResult, TaxRate } from '../common/interfaces/models';
import { InvoiceReconcilerService } from './invoice-reconciler.service';
import { PartitionedReconciliationOptions } from './interfaces/services';

export interface PricingRunInput {
    lines: readonly LineItem[];
    discountRules: readonly DiscountRule[];
    taxRates: readonly TaxRate[];
}

export type PricingRunOptions = PartitionedReconciliationOptions & AnomalyScanOptions;

/**
 * One batch through the core: reconcile every transaction, then scan the
 * accepted lines and the canonical invoices for anomalies.
 */
@singleton()
@injectable()
export class PricingRunService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(InvoiceReconcilerService) private reconciler: InvoiceReconcilerService,
        @inject(AnomalyScannerService) private scanner: AnomalyScannerService
    ) {
        this.logger.info('PricingRunService initialized.');
    }

    async run(input: PricingRunInput, options?: PricingRunOptions): Promise<PricingRunResult> {
        if (input.lines.length === 0) {
            throw new ValidationError('No line items to reconcile.');
        }

        const outcome = await this.reconciler.reconcileInPartitions(
            input.lines, input.discountRules, input.taxRates, options
        );
        if (outcome.cancelled) {
            this.logger.warn(`Pricing run cancelled; reporting ${outcome.completedPartitions}/${outcome.totalPartitions} completed partitions.`);
        }

        // Price consistency looks at the lines that actually made it into an invoice.
        const acceptedLines = outcome.invoices.flatMap(invoice => invoice.lines.map(line => line.item));
        const report = this.scanner.scanAll(acceptedLines, outcome.invoices, options);

        const result: PricingRunResult = {
            summary: {
                lineCount: input.lines.length,
                acceptedLineCount: acceptedLines.length,
                rejectedLineCount: outcome.rejected.length,
                invoiceCount: outcome.invoices.length,
                inconsistentInvoiceCount: outcome.invoices.filter(invoice => !invoice.deliveryConsistent).length,
                cancelled: outcome.cancelled,
                anomalyCounts: report.countsByKind,
            },
            invoices: outcome.invoices,
            rejected: outcome.rejected,
            anomalies: report.records,
        };

        this.logger.info(`Pricing run finished. Invoices: ${result.summary.invoiceCount}, Rejected lines: ${result.summary.rejectedLineCount}, Anomalies: ${report.records.length}`);
        return result;
    }
}
