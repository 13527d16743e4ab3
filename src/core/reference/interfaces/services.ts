// src/core/reference/interfaces/services.ts
import { CouponStatus, DiscountResolution } from '../../common/interfaces/models';

/** Defines the contract for resolving discount and tax rates for a sales line */
export interface IReferenceResolver {
    /**
     * Effective discount fraction for a line.
     * @param category - Product category of the line.
     * @param month - Calendar month (1-12) of the transaction date.
     * @param couponStatus - Only `used` can produce a non-zero rate.
     * @returns A rate in [0, 1]; 0 when no rule matches.
     */
    resolveDiscount(category: string, month: number, couponStatus: CouponStatus): number;

    /** Same lookup as `resolveDiscount`, also returning the applied rule and every candidate. */
    explainDiscount(category: string, month: number, couponStatus: CouponStatus): DiscountResolution;

    /** GST fraction for a category; 0 when the category has no tax row. */
    resolveTax(category: string): number;
}
