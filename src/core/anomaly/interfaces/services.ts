// src/core/anomaly/interfaces/services.ts
import {
    AmbiguousDiscountRuleAnomaly, AnomalyReport, HighDeliveryChargeAnomaly, Invoice,
    InvoiceInconsistencyAnomaly, LineItem, DeliveryRatioAnomaly, UnitPriceInconsistencyAnomaly,
    ZeroBasePriceAnomaly, ZeroDeliveryAnomaly
} from '../../common/interfaces/models';

/** Thresholds for a scan run; unset fields fall back to config */
export interface AnomalyScanOptions {
    deliveryRatioThresholdPct?: number;
    highDeliveryAmount?: number;
}

/**
 * Read-only scans over line items and canonical invoices.
 * Emission order follows first-seen grouping keys and carries no meaning.
 */
export interface IAnomalyScanner {
    /** One record per (SKU, date, location) group quoting more than one unit price. */
    scanPriceConsistency(lines: readonly LineItem[]): UnitPriceInconsistencyAnomaly[];

    /**
     * Flags invoices whose delivery charge is at least `thresholdPct` percent of the base price.
     * Invoices with a zero base price are never divided; they come back as `zero-base-price`.
     */
    scanDeliveryRatio(invoices: readonly Invoice[], thresholdPct?: number): Array<DeliveryRatioAnomaly | ZeroBasePriceAnomaly>;

    /** One record per invoice whose lines disagreed on the delivery charge. */
    scanInvoiceConsistency(invoices: readonly Invoice[]): InvoiceInconsistencyAnomaly[];

    /** Zero-delivery invoices grouped by product category, without asserting a cause. */
    scanZeroDelivery(invoices: readonly Invoice[]): ZeroDeliveryAnomaly[];

    /** Invoices whose canonical delivery charge reaches `thresholdAmount`. */
    scanHighDeliveryCharge(invoices: readonly Invoice[], thresholdAmount?: number): HighDeliveryChargeAnomaly[];

    /** (category, month) pairs where a used coupon matched more than one discount rule. */
    scanDiscountAmbiguity(invoices: readonly Invoice[]): AmbiguousDiscountRuleAnomaly[];

    /** Runs every scan and tallies the records per kind. */
    scanAll(lines: readonly LineItem[], invoices: readonly Invoice[], options?: AnomalyScanOptions): AnomalyReport;
}
