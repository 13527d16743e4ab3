// src/core/validation/validation.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config from '../../config';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ValidationError, errorMessage } from '../common/errors';
import { CustomerLocation, DiscountRule, LineItem, TaxRate } from '../common/interfaces/models';
import { formatIsoDay } from '../common/utils';
import { DatasetKind, RawRecord } from '../parsing/interfaces/services';
import {
    IngestionIssue,
    IValidationService,
    LineItemStandardizationOptions,
    StandardizationResult
} from './interfaces/services';
import {
    normalizeCouponStatus,
    normalizeText,
    parseDateValue,
    parseMonth,
    parseNumeric,
    parsePercentage
} from './normalization.utils';

export const UNKNOWN_LOCATION = 'UNKNOWN_LOCATION';

/** Widest identifier the stored invoice and anomaly columns take. */
export const MAX_KEY_LENGTH = 64;

function requireText(raw: unknown, label: string, maxLength?: number): string {
    const text = normalizeText(raw);
    if (!text) {
        throw new ValidationError(`Missing ${label}`);
    }
    if (maxLength !== undefined && text.length > maxLength) {
        throw new ValidationError(`${label} exceeds ${maxLength} characters: ${text.slice(0, 20)}...`);
    }
    return text;
}

const requireKey = (raw: unknown, label: string): string => requireText(raw, label, MAX_KEY_LENGTH);

function requireNumber(raw: unknown, label: string): number {
    const value = parseNumeric(raw);
    if (value === null) {
        throw new ValidationError(`Missing or invalid ${label}: ${String(raw)}`);
    }
    return value;
}

@singleton()
@injectable()
export class ValidationService implements IValidationService {

    constructor(@inject(LOGGER_TOKEN) private logger: Logger) {
        this.logger.info('ValidationService initialized.');
    }

    standardizeLineItems(
        records: RawRecord<'lineItems'>[],
        customers: readonly CustomerLocation[] = [],
        options?: LineItemStandardizationOptions
    ): StandardizationResult<LineItem> {
        const dateOrder = options?.dateOrder ?? config.ingestion.dateOrder;
        const locationByCustomer = new Map(customers.map(c => [c.customerId, c.location]));
        let filledFromCustomers = 0;
        let placeholders = 0;

        const { valid, issues } = this.standardize(records, 'lineItems', ({ values, originalLineNumber }) => {
            const customerId = requireKey(values.customerId, 'CustomerID');

            const parsedDate = parseDateValue(values.transactionDate, dateOrder);
            if (!parsedDate) {
                throw new ValidationError(`Invalid Date format or value: ${String(values.transactionDate)}`);
            }
            const couponStatus = normalizeCouponStatus(values.couponStatus);
            if (!couponStatus) {
                throw new ValidationError(`Invalid Coupon Status: ${String(values.couponStatus)}`);
            }

            const suppliedLocation = normalizeText(values.location);
            const customerLocation = suppliedLocation ? undefined : locationByCustomer.get(customerId);
            const location = suppliedLocation
                ? requireKey(suppliedLocation, 'Location')
                : customerLocation ?? UNKNOWN_LOCATION;

            // Range checks on quantity and money belong to the reconciler, which rejects per line.
            const item: LineItem = {
                customerId,
                transactionId: requireKey(values.transactionId, 'Transaction ID'),
                transactionDate: formatIsoDay(parsedDate),
                productCategory: requireKey(values.productCategory, 'Product Category'),
                productDescription: normalizeText(values.productDescription),
                productSku: requireKey(values.productSku, 'Product SKU'),
                quantity: requireNumber(values.quantity, 'Quantity'),
                unitPrice: requireNumber(values.unitPrice, 'Unit Price'),
                deliveryCharge: requireNumber(values.deliveryCharge, 'Delivery Charge'),
                couponStatus,
                location,
                sourceRow: originalLineNumber,
            };

            if (!suppliedLocation) {
                if (customerLocation) {
                    filledFromCustomers++;
                } else {
                    placeholders++;
                }
            }
            return item;
        });

        if (filledFromCustomers > 0) {
            this.logger.info(`Filled location for ${filledFromCustomers} line items from customer data.`);
        }
        if (placeholders > 0) {
            this.logger.warn(`No location known for ${placeholders} line items; using ${UNKNOWN_LOCATION}.`);
        }
        return { valid, issues };
    }

    standardizeDiscountRules(records: RawRecord<'discounts'>[]): StandardizationResult<DiscountRule> {
        const { valid, issues } = this.standardize(records, 'discounts', ({ values }) => {
            const month = parseMonth(values.month);
            if (month === null) {
                throw new ValidationError(`Invalid Month: ${String(values.month)}`);
            }
            const discountPct = parsePercentage(values.discountPct);
            if (discountPct === null || discountPct < 0 || discountPct > 100) {
                throw new ValidationError(`Discount percentage must be within 0-100: ${String(values.discountPct)}`);
            }
            return {
                productCategory: requireKey(values.productCategory, 'Product Category'),
                month,
                couponCode: requireText(values.couponCode, 'Coupon Code'),
                discountPct,
            };
        });
        return { valid, issues };
    }

    standardizeTaxRates(records: RawRecord<'taxes'>[]): StandardizationResult<TaxRate> {
        const result = this.standardize(records, 'taxes', ({ values }) => {
            const gstPct = parsePercentage(values.gstPct);
            if (gstPct === null || gstPct < 0 || gstPct > 100) {
                throw new ValidationError(`GST percentage must be within 0-100: ${String(values.gstPct)}`);
            }
            return { productCategory: requireKey(values.productCategory, 'Product Category'), gstPct };
        });
        return this.dropDuplicates(result, records, 'taxes', rate => rate.productCategory);
    }

    standardizeCustomerLocations(records: RawRecord<'customers'>[]): StandardizationResult<CustomerLocation> {
        const result = this.standardize(records, 'customers', ({ values }) => ({
            customerId: requireKey(values.customerId, 'CustomerID'),
            location: requireKey(values.location, 'Location'),
        }));
        return this.dropDuplicates(result, records, 'customers', customer => customer.customerId);
    }

    /** Runs the converter on every record; a failing record becomes an issue and the loop carries on. */
    private standardize<D extends DatasetKind, T>(
        records: RawRecord<D>[],
        dataset: D,
        convert: (record: RawRecord<D>) => T
    ): StandardizationResult<T> & { sources: RawRecord<D>[] } {
        this.logger.info(`Validating and standardizing ${records.length} ${dataset} records`);
        const valid: T[] = [];
        const sources: RawRecord<D>[] = [];
        const issues: IngestionIssue[] = [];

        for (const record of records) {
            try {
                valid.push(convert(record));
                sources.push(record);
            } catch (error) {
                const message = errorMessage(error);
                issues.push({ dataset, recordId: record.id, originalLineNumber: record.originalLineNumber, message });
                this.logger.warn(`Record validation failed [${dataset} line ${record.originalLineNumber}]: ${message}`);
            }
        }

        this.logger.info(`Validation complete for ${dataset}. Valid records: ${valid.length}, Invalid records: ${issues.length}`);
        return { valid, issues, sources };
    }

    private dropDuplicates<D extends DatasetKind, T>(
        result: StandardizationResult<T> & { sources: RawRecord<D>[] },
        records: RawRecord<D>[],
        dataset: D,
        keyOf: (value: T) => string
    ): StandardizationResult<T> {
        const seen = new Set<string>();
        const valid: T[] = [];
        const issues = [...result.issues];

        result.valid.forEach((value, index) => {
            const key = keyOf(value);
            if (!seen.has(key)) {
                seen.add(key);
                valid.push(value);
                return;
            }
            const source = result.sources[index];
            const message = `Duplicate ${dataset} entry for "${key}" ignored; the first occurrence is kept`;
            issues.push({ dataset, recordId: source.id, originalLineNumber: source.originalLineNumber, message });
            this.logger.warn(`${message} (line ${source.originalLineNumber})`);
        });

        if (issues.length > result.issues.length) {
            this.logger.info(`${issues.length - result.issues.length} of ${records.length} ${dataset} records were duplicates.`);
        }
        return { valid, issues };
    }
}
