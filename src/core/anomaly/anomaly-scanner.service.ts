// src/core/anomaly/anomaly-scanner.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import {
    AmbiguousDiscountRuleAnomaly, AnomalyKind, AnomalyRecord, AnomalyReport, DeliveryRatioAnomaly,
    HighDeliveryChargeAnomaly, Invoice, InvoiceInconsistencyAnomaly, LineItem,
    UnitPriceInconsistencyAnomaly, ZeroBasePriceAnomaly, ZeroDeliveryAnomaly
} from '../common/interfaces/models';
import { distinct, groupBy, roundTo } from '../common/utils';
import { AnomalyScanOptions, IAnomalyScanner } from './interfaces/services';

/** Ratios are compared after rounding to this many decimals. */
const RATIO_PRECISION = 2;

export const ANOMALY_KINDS: readonly AnomalyKind[] = [
    'unit-price-inconsistency',
    'delivery-ratio',
    'zero-base-price',
    'invoice-inconsistency',
    'zero-delivery',
    'high-delivery-charge',
    'ambiguous-discount-rule',
];

export const emptyAnomalyCounts = (): Record<AnomalyKind, number> => ({
    'unit-price-inconsistency': 0,
    'delivery-ratio': 0,
    'zero-base-price': 0,
    'invoice-inconsistency': 0,
    'zero-delivery': 0,
    'high-delivery-charge': 0,
    'ambiguous-discount-rule': 0,
});

@singleton()
@injectable()
export class AnomalyScannerService implements IAnomalyScanner {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('AnomalyScannerService initialized.');
    }

    // --- Line-level scans ---

    scanPriceConsistency(lines: readonly LineItem[]): UnitPriceInconsistencyAnomaly[] {
        const records: UnitPriceInconsistencyAnomaly[] = [];
        const groups = groupBy(lines, line => `${line.productSku}|${line.transactionDate}|${line.location}`);

        for (const [subjectId, group] of groups) {
            const distinctPrices = distinct(group.map(line => line.unitPrice));
            if (distinctPrices.length <= 1) continue;

            const [first] = group;
            records.push({
                kind: 'unit-price-inconsistency',
                subjectId,
                evidence: {
                    productSku: first.productSku,
                    transactionDate: first.transactionDate,
                    location: first.location,
                    distinctPrices,
                    observations: group.map(line => ({
                        transactionId: line.transactionId,
                        unitPrice: line.unitPrice,
                        quantity: line.quantity,
                        couponStatus: line.couponStatus,
                    })),
                },
                basis: { rule: 'more than one distinct unit price for the same SKU, date and location', threshold: 1 },
            });
        }

        this.logger.info(`Price consistency scan: ${groups.size} SKU/date/location groups, ${records.length} inconsistent.`);
        return records;
    }

    // --- Invoice-level scans ---

    scanDeliveryRatio(
        invoices: readonly Invoice[],
        thresholdPct: number = config.pricing.deliveryRatioThresholdPct
    ): Array<DeliveryRatioAnomaly | ZeroBasePriceAnomaly> {
        const records: Array<DeliveryRatioAnomaly | ZeroBasePriceAnomaly> = [];
        let zeroBaseCount = 0;

        for (const invoice of invoices) {
            if (invoice.basePrice === 0) {
                // Undefined ratio: reported on its own, never divided.
                zeroBaseCount++;
                records.push({
                    kind: 'zero-base-price',
                    subjectId: invoice.transactionId,
                    evidence: { deliveryCharge: invoice.deliveryCharge, lineCount: invoice.lines.length },
                    basis: { rule: 'base price is zero; delivery ratio undefined' },
                });
                continue;
            }

            const ratioPct = roundTo(invoice.deliveryCharge * 100 / invoice.basePrice, RATIO_PRECISION);
            if (ratioPct >= thresholdPct) {
                records.push({
                    kind: 'delivery-ratio',
                    subjectId: invoice.transactionId,
                    evidence: { deliveryCharge: invoice.deliveryCharge, basePrice: invoice.basePrice, ratioPct },
                    basis: { rule: 'deliveryCharge * 100 / basePrice >= threshold', threshold: thresholdPct },
                });
            }
        }

        this.logger.info(`Delivery ratio scan (threshold ${thresholdPct}%): ${records.length - zeroBaseCount} flagged, ${zeroBaseCount} zero-base-price invoices.`);
        return records;
    }

    scanInvoiceConsistency(invoices: readonly Invoice[]): InvoiceInconsistencyAnomaly[] {
        const records: InvoiceInconsistencyAnomaly[] = invoices
            .filter(invoice => !invoice.deliveryConsistent)
            .map(invoice => ({
                kind: 'invoice-inconsistency',
                subjectId: invoice.transactionId,
                evidence: {
                    observedDeliveryCharges: invoice.observedDeliveryCharges,
                    canonicalDeliveryCharge: invoice.deliveryCharge,
                },
                basis: { rule: 'lines of one invoice carry different delivery charges; the maximum is used' },
            }));

        this.logger.info(`Invoice consistency scan: ${records.length} invoices with disagreeing delivery charges.`);
        return records;
    }

    scanZeroDelivery(invoices: readonly Invoice[]): ZeroDeliveryAnomaly[] {
        const byCategory = new Map<string, { transactionIds: string[]; lineCount: number }>();

        for (const invoice of invoices) {
            if (invoice.deliveryCharge !== 0) continue;
            for (const line of invoice.lines) {
                const category = line.item.productCategory;
                let entry = byCategory.get(category);
                if (!entry) {
                    entry = { transactionIds: [], lineCount: 0 };
                    byCategory.set(category, entry);
                }
                if (!entry.transactionIds.includes(invoice.transactionId)) {
                    entry.transactionIds.push(invoice.transactionId);
                }
                entry.lineCount++;
            }
        }

        const records: ZeroDeliveryAnomaly[] = [...byCategory].map(([productCategory, entry]) => ({
            kind: 'zero-delivery',
            subjectId: productCategory,
            evidence: { productCategory, transactionIds: entry.transactionIds, lineCount: entry.lineCount },
            basis: { rule: 'invoice delivery charge is zero' },
        }));

        this.logger.info(`Zero delivery scan: ${records.length} product categories with free-delivery invoices.`);
        return records;
    }

    scanHighDeliveryCharge(
        invoices: readonly Invoice[],
        thresholdAmount: number = config.pricing.highDeliveryAmount
    ): HighDeliveryChargeAnomaly[] {
        const records: HighDeliveryChargeAnomaly[] = invoices
            .filter(invoice => invoice.deliveryCharge >= thresholdAmount)
            .map(invoice => ({
                kind: 'high-delivery-charge',
                subjectId: invoice.transactionId,
                evidence: {
                    deliveryCharge: invoice.deliveryCharge,
                    totalQuantity: invoice.totalQuantity,
                    unitPrices: distinct(invoice.lines.map(line => line.item.unitPrice)),
                },
                basis: { rule: 'deliveryCharge >= threshold', threshold: thresholdAmount },
            }));

        this.logger.info(`High delivery charge scan (threshold ${thresholdAmount}): ${records.length} invoices.`);
        return records;
    }

    scanDiscountAmbiguity(invoices: readonly Invoice[]): AmbiguousDiscountRuleAnomaly[] {
        const byKey = new Map<string, {
            productCategory: string;
            month: number;
            candidateCouponCodes: string[];
            appliedCouponCode: string;
            transactionIds: string[];
        }>();

        for (const invoice of invoices) {
            for (const line of invoice.lines) {
                const { appliedRule, candidates } = line.discount;
                if (!appliedRule || candidates.length < 2) continue;

                const key = `${appliedRule.productCategory}|${line.month}`;
                let entry = byKey.get(key);
                if (!entry) {
                    entry = {
                        productCategory: appliedRule.productCategory,
                        month: line.month,
                        candidateCouponCodes: candidates.map(rule => rule.couponCode),
                        appliedCouponCode: appliedRule.couponCode,
                        transactionIds: [],
                    };
                    byKey.set(key, entry);
                }
                if (!entry.transactionIds.includes(invoice.transactionId)) {
                    entry.transactionIds.push(invoice.transactionId);
                }
            }
        }

        const records: AmbiguousDiscountRuleAnomaly[] = [...byKey].map(([subjectId, evidence]) => ({
            kind: 'ambiguous-discount-rule',
            subjectId,
            evidence,
            basis: { rule: 'more than one discount rule matches the category and month; one was picked by the configured tie-break' },
        }));

        this.logger.info(`Discount ambiguity scan: ${records.length} category/month pairs with competing rules.`);
        return records;
    }

    // --- Aggregate ---

    scanAll(lines: readonly LineItem[], invoices: readonly Invoice[], options?: AnomalyScanOptions): AnomalyReport {
        const records: AnomalyRecord[] = [
            ...this.scanInvoiceConsistency(invoices),
            ...this.scanDeliveryRatio(invoices, options?.deliveryRatioThresholdPct ?? config.pricing.deliveryRatioThresholdPct),
            ...this.scanPriceConsistency(lines),
            ...this.scanZeroDelivery(invoices),
            ...this.scanHighDeliveryCharge(invoices, options?.highDeliveryAmount ?? config.pricing.highDeliveryAmount),
            ...this.scanDiscountAmbiguity(invoices),
        ];

        const countsByKind = emptyAnomalyCounts();
        for (const record of records) {
            countsByKind[record.kind]++;
        }
        return { records, countsByKind };
    }
}
