// src/core/reference/reference-resolver.ts
import { DiscountTieBreak } from '../../config';
import { CouponStatus, DiscountResolution, DiscountRule, TaxRate } from '../common/interfaces/models';
import { IReferenceResolver } from './interfaces/services';

const NO_CANDIDATES: readonly DiscountRule[] = Object.freeze([]);

const compareCouponCodes = (a: DiscountRule, b: DiscountRule): number =>
    a.couponCode < b.couponCode ? -1 : a.couponCode > b.couponCode ? 1 : 0;

/** Orderings for rules competing for the same (category, month). Array.prototype.sort is stable. */
const TIE_BREAK_COMPARATORS: Record<DiscountTieBreak, (a: DiscountRule, b: DiscountRule) => number> = {
    'lowest-coupon-code': compareCouponCodes,
    'highest-discount': (a, b) => (b.discountPct - a.discountPct) || compareCouponCodes(a, b),
    'lowest-discount': (a, b) => (a.discountPct - b.discountPct) || compareCouponCodes(a, b),
};

const discountKey = (category: string, month: number): string => `${category}\u0000${month}`;

/**
 * Lookup over a discount schedule and a tax table for one reconciliation pass.
 * Absent matches resolve to a zero rate. Indexes are built once and never mutated.
 */
export class ReferenceResolver implements IReferenceResolver {
    private readonly discountIndex = new Map<string, readonly DiscountRule[]>();
    private readonly taxIndex = new Map<string, number>();

    constructor(
        discountRules: readonly DiscountRule[],
        taxRates: readonly TaxRate[],
        tieBreak: DiscountTieBreak = 'lowest-coupon-code'
    ) {
        const grouped = new Map<string, DiscountRule[]>();
        for (const rule of discountRules) {
            const key = discountKey(rule.productCategory, rule.month);
            const bucket = grouped.get(key);
            if (bucket) {
                bucket.push(rule);
            } else {
                grouped.set(key, [rule]);
            }
        }
        const comparator = TIE_BREAK_COMPARATORS[tieBreak];
        for (const [key, rules] of grouped) {
            this.discountIndex.set(key, Object.freeze([...rules].sort(comparator)));
        }

        // First row wins; ingestion already warns about conflicting duplicates.
        for (const rate of taxRates) {
            if (!this.taxIndex.has(rate.productCategory)) {
                this.taxIndex.set(rate.productCategory, rate.gstPct / 100);
            }
        }
    }

    resolveDiscount(category: string, month: number, couponStatus: CouponStatus): number {
        return this.explainDiscount(category, month, couponStatus).rate;
    }

    explainDiscount(category: string, month: number, couponStatus: CouponStatus): DiscountResolution {
        if (couponStatus !== 'used') {
            return { rate: 0, candidates: NO_CANDIDATES };
        }
        const candidates = this.discountIndex.get(discountKey(category, month)) ?? NO_CANDIDATES;
        const [appliedRule] = candidates;
        if (!appliedRule) {
            return { rate: 0, candidates };
        }
        return { rate: appliedRule.discountPct / 100, appliedRule, candidates };
    }

    resolveTax(category: string): number {
        return this.taxIndex.get(category) ?? 0;
    }
}
