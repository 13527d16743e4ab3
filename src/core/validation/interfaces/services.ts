// src/core/validation/interfaces/services.ts
import { DateOrder } from '../../../config';
import { CustomerLocation, DiscountRule, LineItem, TaxRate } from '../../common/interfaces/models';
import { DatasetKind, RawRecord } from '../../parsing/interfaces/services';

/** A raw record that did not survive standardization, or a duplicate that was dropped. */
export interface IngestionIssue {
    dataset: DatasetKind;
    recordId: string;
    originalLineNumber: number;
    message: string;
}

export interface StandardizationResult<T> {
    valid: T[];
    issues: IngestionIssue[];
}

export interface LineItemStandardizationOptions {
    /** Defaults to the configured ingestion date order */
    dateOrder?: DateOrder;
}

export interface IValidationService {
    /**
     * Converts raw sales rows into line items. Missing locations are filled from
     * the customer table, then fall back to a placeholder.
     */
    standardizeLineItems(
        records: RawRecord<'lineItems'>[],
        customers?: readonly CustomerLocation[],
        options?: LineItemStandardizationOptions
    ): StandardizationResult<LineItem>;

    standardizeDiscountRules(records: RawRecord<'discounts'>[]): StandardizationResult<DiscountRule>;

    /** The first row of each category wins; later rows are reported as issues. */
    standardizeTaxRates(records: RawRecord<'taxes'>[]): StandardizationResult<TaxRate>;

    standardizeCustomerLocations(records: RawRecord<'customers'>[]): StandardizationResult<CustomerLocation>;
}
