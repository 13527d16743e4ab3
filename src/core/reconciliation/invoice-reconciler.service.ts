// src/core/reconciliation/invoice-reconciler.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { MalformedRecordError } from '../common/errors';
import {
    DiscountRule, Invoice, LineItem, PartitionedReconciliationOutcome, ReconciledLine,
    ReconciliationOutcome, RejectedLine, TaxRate
} from '../common/interfaces/models';
import { distinct, groupBy, monthOfDay, roundTo, sleep } from '../common/utils';
import { IReferenceResolver, ReferenceResolver } from '../reference';
import { IInvoiceReconciler, PartitionedReconciliationOptions, ReconciliationOptions } from './interfaces/services';

const ISO_DAY = /^\d{4}-\d{2}-\d{2}$/;

type TransactionGroup = readonly [transactionId: string, lines: readonly LineItem[]];

// --- Line and invoice building blocks ---

/** Collects every reason a line cannot be priced; throws when there is at least one. */
export function assertWellFormed(item: LineItem): void {
    const reasons: string[] = [];
    if (item.transactionId.trim() === '') {
        reasons.push('transaction id is empty');
    }
    if (!Number.isInteger(item.quantity) || item.quantity <= 0) {
        reasons.push(`quantity must be a positive integer (got ${item.quantity})`);
    }
    if (!Number.isFinite(item.unitPrice) || item.unitPrice < 0) {
        reasons.push(`unit price must be a non-negative number (got ${item.unitPrice})`);
    }
    if (!Number.isFinite(item.deliveryCharge) || item.deliveryCharge < 0) {
        reasons.push(`delivery charge must be a non-negative number (got ${item.deliveryCharge})`);
    }
    if (!ISO_DAY.test(item.transactionDate)) {
        reasons.push(`transaction date must be YYYY-MM-DD (got "${item.transactionDate}")`);
    }
    if (reasons.length > 0) {
        throw new MalformedRecordError(reasons);
    }
}

/**
 * Prices one line. Tax is applied to the post-discount amount; nothing is
 * rounded here.
 */
export function priceLine(item: LineItem, resolver: IReferenceResolver): ReconciledLine {
    const month = monthOfDay(item.transactionDate);
    const discount = resolver.explainDiscount(item.productCategory, month, item.couponStatus);
    const taxRate = resolver.resolveTax(item.productCategory);

    const basePrice = item.quantity * item.unitPrice;
    const discountEffect = basePrice * discount.rate;
    const priceAfterDiscount = basePrice - discountEffect;
    const taxEffect = priceAfterDiscount * taxRate;
    const priceAfterTax = priceAfterDiscount + taxEffect;

    return { item, month, discount, taxRate, basePrice, discountEffect, priceAfterDiscount, taxEffect, priceAfterTax };
}

/**
 * Folds the priced lines of one transaction into its canonical invoice.
 * Sums stay exact until the final rounding to `precision`.
 */
export function buildInvoice(transactionId: string, lines: readonly ReconciledLine[], precision: number): Invoice {
    let basePrice = 0;
    let discountEffect = 0;
    let taxEffect = 0;
    let priceAfterDiscount = 0;
    let priceAfterTax = 0;
    let totalQuantity = 0;
    for (const line of lines) {
        basePrice += line.basePrice;
        discountEffect += line.discountEffect;
        taxEffect += line.taxEffect;
        priceAfterDiscount += line.priceAfterDiscount;
        priceAfterTax += line.priceAfterTax;
        totalQuantity += line.item.quantity;
    }

    const observedDeliveryCharges = distinct(lines.map(line => line.item.deliveryCharge));
    const deliveryCharge = roundTo(Math.max(...observedDeliveryCharges), precision);
    const reportedPriceAfterTax = roundTo(priceAfterTax, precision);

    return {
        transactionId,
        customerIds: distinct(lines.map(line => line.item.customerId)),
        lines,
        totalQuantity,
        basePrice: roundTo(basePrice, precision),
        discountEffect: roundTo(discountEffect, precision),
        taxEffect: roundTo(taxEffect, precision),
        priceAfterDiscount: roundTo(priceAfterDiscount, precision),
        priceAfterTax: reportedPriceAfterTax,
        deliveryCharge,
        finalPrice: roundTo(reportedPriceAfterTax + deliveryCharge, precision),
        observedDeliveryCharges,
        deliveryConsistent: observedDeliveryCharges.length === 1,
    };
}

@singleton()
@injectable()
export class InvoiceReconcilerService implements IInvoiceReconciler {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('InvoiceReconcilerService initialized.');
    }

    reconcile(
        lines: readonly LineItem[],
        discountRules: readonly DiscountRule[],
        taxRates: readonly TaxRate[],
        options?: ReconciliationOptions
    ): ReconciliationOutcome {
        const precision = options?.currencyPrecision ?? config.pricing.currencyPrecision;
        const resolver = new ReferenceResolver(discountRules, taxRates, options?.discountTieBreak ?? config.pricing.discountTieBreak);

        this.logger.info(`Starting invoice reconciliation. Lines: ${lines.length}, Discount rules: ${discountRules.length}, Tax rates: ${taxRates.length}`);
        const groups = [...groupBy(lines, line => line.transactionId)];
        const outcome = this.reconcileGroups(groups, resolver, precision);
        this.logOutcome(outcome);
        return outcome;
    }

    async reconcileInPartitions(
        lines: readonly LineItem[],
        discountRules: readonly DiscountRule[],
        taxRates: readonly TaxRate[],
        options?: PartitionedReconciliationOptions
    ): Promise<PartitionedReconciliationOutcome> {
        const precision = options?.currencyPrecision ?? config.pricing.currencyPrecision;
        const partitionSize = options?.partitionSize ?? config.pricing.partitionSize;
        if (!Number.isInteger(partitionSize) || partitionSize < 1) {
            throw new RangeError(`partitionSize must be a positive integer (got ${partitionSize})`);
        }
        const resolver = new ReferenceResolver(discountRules, taxRates, options?.discountTieBreak ?? config.pricing.discountTieBreak);

        const groups = [...groupBy(lines, line => line.transactionId)];
        const partitions: TransactionGroup[][] = [];
        for (let start = 0; start < groups.length; start += partitionSize) {
            partitions.push(groups.slice(start, start + partitionSize));
        }
        this.logger.info(`Starting partitioned reconciliation. Transactions: ${groups.length}, Partitions: ${partitions.length} (size ${partitionSize})`);

        const invoices: Invoice[] = [];
        const rejected: RejectedLine[] = [];
        let completedPartitions = 0;
        let cancelled = false;

        for (const partition of partitions) {
            if (options?.signal?.aborted) {
                cancelled = true;
                this.logger.warn(`Reconciliation stopped after ${completedPartitions}/${partitions.length} partitions.`);
                break;
            }
            // Each partition owns its transaction ids; results append to this run's own slots.
            const partial = this.reconcileGroups(partition, resolver, precision);
            invoices.push(...partial.invoices);
            rejected.push(...partial.rejected);
            completedPartitions++;
            options?.onPartitionComplete?.({ completedPartitions, totalPartitions: partitions.length });

            if (completedPartitions < partitions.length) {
                await sleep(0);
            }
        }

        const outcome = { invoices, rejected, totalPartitions: partitions.length, completedPartitions, cancelled };
        this.logOutcome(outcome);
        return outcome;
    }

    private reconcileGroups(
        groups: readonly TransactionGroup[],
        resolver: IReferenceResolver,
        precision: number
    ): ReconciliationOutcome {
        const invoices: Invoice[] = [];
        const rejected: RejectedLine[] = [];

        for (const [transactionId, groupLines] of groups) {
            const priced: ReconciledLine[] = [];
            for (const item of groupLines) {
                try {
                    assertWellFormed(item);
                    priced.push(priceLine(item, resolver));
                } catch (error) {
                    if (!(error instanceof MalformedRecordError)) {
                        throw error;
                    }
                    rejected.push({ item, reasons: error.reasons });
                    this.logger.warn(`Rejected line [Txn: ${transactionId || 'N/A'}, SKU: ${item.productSku}, Row: ${item.sourceRow ?? 'N/A'}]: ${error.message}`);
                }
            }

            if (priced.length === 0) {
                this.logger.warn(`No valid lines left for transaction ${transactionId || 'N/A'}; no invoice emitted.`);
                continue;
            }

            const invoice = buildInvoice(transactionId, priced, precision);
            if (!invoice.deliveryConsistent) {
                this.logger.warn(`Transaction ${transactionId} carries ${invoice.observedDeliveryCharges.length} different delivery charges [${invoice.observedDeliveryCharges.join(', ')}]; using ${invoice.deliveryCharge}.`);
            }
            invoices.push(invoice);
        }

        return { invoices, rejected };
    }

    private logOutcome(outcome: ReconciliationOutcome): void {
        const inconsistent = outcome.invoices.filter(invoice => !invoice.deliveryConsistent).length;
        this.logger.info(`Reconciliation completed. Invoices: ${outcome.invoices.length}, Rejected lines: ${outcome.rejected.length}, Delivery inconsistencies: ${inconsistent}`);
    }
}
