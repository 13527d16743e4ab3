// src/core/common/interfaces/models.ts

/** Coupon state recorded on a sales line. Only `used` activates a discount. */
export type CouponStatus = 'used' | 'not_used' | 'clicked';

/**
 * One row of a raw transaction, referencing a single product within an invoice.
 * Created by ingestion and never mutated afterwards.
 */
export interface LineItem {
    readonly customerId: string;
    /** Invoice key. Grouping on it is exact. */
    readonly transactionId: string;
    /** Calendar day in "YYYY-MM-DD" form */
    readonly transactionDate: string;
    readonly productCategory: string;
    readonly productDescription: string;
    readonly productSku: string;
    readonly quantity: number;
    readonly unitPrice: number;
    /** Invoice-level charge, physically repeated on every line of the invoice */
    readonly deliveryCharge: number;
    readonly couponStatus: CouponStatus;
    readonly location: string;
    /** Row number in the uploaded file, for tracing */
    readonly sourceRow?: number;
}

export interface DiscountRule {
    readonly productCategory: string;
    /** Calendar month, 1-12 */
    readonly month: number;
    readonly couponCode: string;
    /** 0-100 */
    readonly discountPct: number;
}

export interface TaxRate {
    readonly productCategory: string;
    /** GST percentage, 0-100 */
    readonly gstPct: number;
}

/** Customer table entry used to fill the location of sales lines. */
export interface CustomerLocation {
    readonly customerId: string;
    readonly location: string;
}

/** Outcome of a discount lookup, including every rule that competed for the line. */
export interface DiscountResolution {
    /** Fraction 0-1 */
    readonly rate: number;
    readonly appliedRule?: DiscountRule;
    /** All rules matching (category, month), in tie-break order */
    readonly candidates: readonly DiscountRule[];
}

/** Per-line monetary breakdown. Amounts are unrounded. */
export interface ReconciledLine {
    readonly item: LineItem;
    readonly month: number;
    readonly discount: DiscountResolution;
    /** Fraction 0-1 */
    readonly taxRate: number;
    readonly basePrice: number;
    readonly discountEffect: number;
    readonly priceAfterDiscount: number;
    readonly taxEffect: number;
    readonly priceAfterTax: number;
}

/**
 * Canonical aggregate of all accepted line items sharing one transaction id.
 * Monetary fields are rounded to the configured currency precision.
 */
export interface Invoice {
    readonly transactionId: string;
    readonly customerIds: readonly string[];
    readonly lines: readonly ReconciledLine[];
    readonly totalQuantity: number;
    readonly basePrice: number;
    readonly discountEffect: number;
    readonly taxEffect: number;
    readonly priceAfterDiscount: number;
    readonly priceAfterTax: number;
    /** Single canonical value; the max when the lines disagree */
    readonly deliveryCharge: number;
    readonly finalPrice: number;
    /** Distinct delivery charges seen on the lines, in first-seen order */
    readonly observedDeliveryCharges: readonly number[];
    /** False when the lines carried more than one distinct delivery charge */
    readonly deliveryConsistent: boolean;
}

export interface RejectedLine {
    readonly item: LineItem;
    readonly reasons: readonly string[];
}

export interface ReconciliationOutcome {
    readonly invoices: Invoice[];
    readonly rejected: RejectedLine[];
}

export interface PartitionedReconciliationOutcome extends ReconciliationOutcome {
    readonly totalPartitions: number;
    readonly completedPartitions: number;
    /** True when the caller's signal stopped further partitions from being scheduled */
    readonly cancelled: boolean;
}

// --- Anomalies ---

export type AnomalyKind =
    | 'unit-price-inconsistency'
    | 'delivery-ratio'
    | 'zero-base-price'
    | 'invoice-inconsistency'
    | 'zero-delivery'
    | 'high-delivery-charge'
    | 'ambiguous-discount-rule';

export interface AnomalyBasis {
    readonly rule: string;
    readonly threshold?: number;
}

export interface PriceObservation {
    readonly transactionId: string;
    readonly unitPrice: number;
    readonly quantity: number;
    readonly couponStatus: CouponStatus;
}

interface AnomalyRecordBase<K extends AnomalyKind, E> {
    readonly kind: K;
    /** Transaction id, or a "|"-joined group key for grouped scans */
    readonly subjectId: string;
    readonly evidence: E;
    readonly basis: AnomalyBasis;
}

export type UnitPriceInconsistencyAnomaly = AnomalyRecordBase<'unit-price-inconsistency', {
    readonly productSku: string;
    readonly transactionDate: string;
    readonly location: string;
    readonly distinctPrices: readonly number[];
    readonly observations: readonly PriceObservation[];
}>;

export type DeliveryRatioAnomaly = AnomalyRecordBase<'delivery-ratio', {
    readonly deliveryCharge: number;
    readonly basePrice: number;
    /** Percentage, rounded to 2 decimals */
    readonly ratioPct: number;
}>;

export type ZeroBasePriceAnomaly = AnomalyRecordBase<'zero-base-price', {
    readonly deliveryCharge: number;
    readonly lineCount: number;
}>;

export type InvoiceInconsistencyAnomaly = AnomalyRecordBase<'invoice-inconsistency', {
    readonly observedDeliveryCharges: readonly number[];
    readonly canonicalDeliveryCharge: number;
}>;

export type ZeroDeliveryAnomaly = AnomalyRecordBase<'zero-delivery', {
    readonly productCategory: string;
    readonly transactionIds: readonly string[];
    readonly lineCount: number;
}>;

export type HighDeliveryChargeAnomaly = AnomalyRecordBase<'high-delivery-charge', {
    readonly deliveryCharge: number;
    readonly totalQuantity: number;
    readonly unitPrices: readonly number[];
}>;

export type AmbiguousDiscountRuleAnomaly = AnomalyRecordBase<'ambiguous-discount-rule', {
    readonly productCategory: string;
    readonly month: number;
    readonly candidateCouponCodes: readonly string[];
    readonly appliedCouponCode: string;
    readonly transactionIds: readonly string[];
}>;

export type AnomalyRecord =
    | UnitPriceInconsistencyAnomaly
    | DeliveryRatioAnomaly
    | ZeroBasePriceAnomaly
    | InvoiceInconsistencyAnomaly
    | ZeroDeliveryAnomaly
    | HighDeliveryChargeAnomaly
    | AmbiguousDiscountRuleAnomaly;

export interface AnomalyReport {
    readonly records: AnomalyRecord[];
    readonly countsByKind: Record<AnomalyKind, number>;
}

// --- Pricing run ---

export interface PricingRunSummary {
    readonly lineCount: number;
    readonly acceptedLineCount: number;
    readonly rejectedLineCount: number;
    readonly invoiceCount: number;
    readonly inconsistentInvoiceCount: number;
    /** True when the run stopped before every partition was reconciled */
    readonly cancelled: boolean;
    readonly anomalyCounts: Record<AnomalyKind, number>;
}

export interface PricingRunResult {
    readonly summary: PricingRunSummary;
    readonly invoices: Invoice[];
    readonly rejected: RejectedLine[];
    readonly anomalies: AnomalyRecord[];
}
