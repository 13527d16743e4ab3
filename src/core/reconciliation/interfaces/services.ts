// src/core/reconciliation/interfaces/services.ts
import { DiscountTieBreak } from '../../../config';
import {
    DiscountRule, LineItem, PartitionedReconciliationOutcome, ReconciliationOutcome, TaxRate
} from '../../common/interfaces/models';

/** Options for configuring a reconciliation run; unset fields fall back to config */
export interface ReconciliationOptions {
    currencyPrecision?: number;
    discountTieBreak?: DiscountTieBreak;
}

export interface PartitionProgress {
    readonly completedPartitions: number;
    readonly totalPartitions: number;
}

export interface PartitionedReconciliationOptions extends ReconciliationOptions {
    /** Transaction ids per partition */
    partitionSize?: number;
    /** Once aborted, no further partition is scheduled */
    signal?: AbortSignal;
    onPartitionComplete?: (progress: PartitionProgress) => void;
}

/** Defines the contract for the Invoice Reconciler */
export interface IInvoiceReconciler {
    /**
     * Groups line items by transaction id and builds one canonical invoice per group.
     * Malformed lines are rejected individually and never abort the batch.
     * Identical inputs always produce identical output.
     */
    reconcile(
        lines: readonly LineItem[],
        discountRules: readonly DiscountRule[],
        taxRates: readonly TaxRate[],
        options?: ReconciliationOptions
    ): ReconciliationOutcome;

    /**
     * Same result as `reconcile`, computed one partition of transaction ids at a
     * time and yielding between partitions. Completed partitions stay valid when
     * the signal stops the run early.
     */
    reconcileInPartitions(
        lines: readonly LineItem[],
        discountRules: readonly DiscountRule[],
        taxRates: readonly TaxRate[],
        options?: PartitionedReconciliationOptions
    ): Promise<PartitionedReconciliationOutcome>;
}
