// tests/pricing.controller.test.ts
import { AnomalyScannerService } from '../src/core/anomaly';
import { CanonicalInvoiceRecord, PricingAnomalyRecord } from '../src/core/common/entities';
import { NotFoundError, ValidationError } from '../src/core/common/errors';
import { ICanonicalInvoiceRepository, StoredInvoice } from '../src/core/common/interfaces/repositories';
import { FileParserService } from '../src/core/parsing';
import { InvoiceReconcilerService, PricingRunService } from '../src/core/reconciliation';
import { StorablePricingRun } from '../src/core/reporting/interfaces/services';
import { ReportGeneratorService } from '../src/core/reporting';
import { ValidationService } from '../src/core/validation';
import { parseRunOptions, PricingController, PricingUploads } from '../src/infrastructure/webserver/controllers/pricing.controller';
import { silentLogger } from './helpers';

class InMemoryInvoiceRepository implements ICanonicalInvoiceRepository {
    readonly invoices: CanonicalInvoiceRecord[] = [];
    readonly anomalies: PricingAnomalyRecord[] = [];
    private nextId = 1;

    async saveRun(run: StorablePricingRun): Promise<void> {
        const createdAt = new Date();
        run.invoices.forEach(invoice => this.invoices.push(Object.assign(new CanonicalInvoiceRecord(), invoice, { id: this.nextId++, createdAt })));
        run.anomalies.forEach(anomaly => this.anomalies.push(Object.assign(new PricingAnomalyRecord(), anomaly, { id: this.nextId++, createdAt })));
    }

    async findLatestByTransactionId(transactionId: string): Promise<StoredInvoice | null> {
        const matches = this.invoices.filter(invoice => invoice.transactionId === transactionId);
        const invoice = matches[matches.length - 1];
        if (!invoice) return null;
        const anomalies = this.anomalies.filter(anomaly => anomaly.runId === invoice.runId && anomaly.subjectId === transactionId);
        return { invoice, anomalies };
    }
}

const jsonFile = (rows: unknown): Buffer => Buffer.from(JSON.stringify(rows));

const uploads = (): PricingUploads => ({
    lineItems: jsonFile([
        {
            CustomerID: 'C-100', Transaction_ID: 'T-1', Transaction_Date: '2019-01-05', Product_SKU: 'SKU-THERMO',
            Product_Description: 'Learning thermostat', Product_Category: 'Nest-USA', Quantity: 2, Avg_Price: 10,
            Delivery_Charges: 6, Coupon_Status: 'Used',
        },
        {
            CustomerID: 'C-100', Transaction_ID: 'T-1', Transaction_Date: '2019-01-05', Product_SKU: 'SKU-PEN',
            Product_Description: 'Pen', Product_Category: 'Office', Quantity: 1, Avg_Price: 5,
            Delivery_Charges: 6, Coupon_Status: 'Not Used',
        },
        {
            CustomerID: 'C-100', Transaction_ID: 'T-2', Transaction_Date: '2019-02-30', Product_SKU: 'SKU-PEN',
            Product_Description: 'Pen', Product_Category: 'Office', Quantity: 1, Avg_Price: 5,
            Delivery_Charges: 6, Coupon_Status: 'Used',
        },
    ]),
    discounts: jsonFile([{ Month: 'Jan', Product_Category: 'Nest-USA', Coupon_Code: 'ELEC10', Discount_pct: 10 }]),
    taxes: jsonFile({ taxes: [{ Product_Category: 'Nest-USA', GST: 18 }, { Product_Category: 'Office', GST: '18%' }] }),
    customers: jsonFile([{ CustomerID: 'C-100', Location: 'Chicago' }]),
});

describe('PricingController', () => {
    const logger = silentLogger();
    let repository: InMemoryInvoiceRepository;
    let controller: PricingController;

    beforeEach(() => {
        repository = new InMemoryInvoiceRepository();
        controller = new PricingController(
            logger,
            new FileParserService(logger),
            new ValidationService(logger),
            new PricingRunService(logger, new InvoiceReconcilerService(logger), new AnomalyScannerService(logger)),
            new ReportGeneratorService(logger),
            repository
        );
    });

    describe('reconcileUploads', () => {
        it('runs uploaded files end to end and reports ingestion issues', async () => {
            const { result, ingestionIssues } = await controller.reconcileUploads(uploads(), {});

            expect(result.invoices.map(invoice => [invoice.transactionId, invoice.finalPrice])).toEqual([['T-1', 33.14]]);
            expect(result.invoices[0].lines.map(line => line.item.location)).toEqual(['Chicago', 'Chicago']);
            expect(ingestionIssues).toHaveLength(1);
            expect(ingestionIssues[0].dataset).toBe('lineItems');
            expect(ingestionIssues[0].originalLineNumber).toBe(3);
            expect(ingestionIssues[0].message).toBe('Invalid Date format or value: 2019-02-30');
        });

        it('applies options from the request body', async () => {
            const { result } = await controller.reconcileUploads(uploads(), { highDeliveryAmount: '5' });
            expect(result.summary.anomalyCounts['high-delivery-charge']).toBe(1);
        });

        it('requires the line item, discount and tax files', async () => {
            const { discounts, ...withoutDiscounts } = uploads();
            expect(discounts).toBeDefined();

            await expect(controller.reconcileUploads({}, {})).rejects.toThrow('A line items file ("lineItems") is required.');
            await expect(controller.reconcileUploads(withoutDiscounts, {})).rejects.toThrow('A discount rules file ("discounts") is required.');
        });

        it('runs without a customer file', async () => {
            const { customers, ...withoutCustomers } = uploads();
            expect(customers).toBeDefined();

            const { result } = await controller.reconcileUploads(withoutCustomers, {});
            expect(result.invoices[0].lines[0].item.location).toBe('UNKNOWN_LOCATION');
        });
    });

    describe('exportUploads', () => {
        it('returns an xlsx workbook', async () => {
            const buffer = await controller.exportUploads(uploads(), {});
            expect(buffer.subarray(0, 2).toString()).toBe('PK');
        });
    });

    describe('persistUploads and findStoredInvoice', () => {
        it('stores the run and finds the invoice by transaction id', async () => {
            const persisted = await controller.persistUploads(uploads(), {});

            expect(persisted.storedInvoices).toBe(1);
            expect(persisted.storedAnomalies).toBe(0);
            expect(repository.invoices[0].runId).toBe(persisted.runId);

            const stored = await controller.findStoredInvoice(' T-1 ');
            expect(stored.invoice.finalPrice).toBe(33.14);
            expect(stored.invoice.customerIds).toBe('C-100');
            expect(stored.anomalies).toEqual([]);
        });

        it('refuses to store a cancelled run', async () => {
            const abort = new AbortController();
            abort.abort();

            await expect(controller.persistUploads(uploads(), {}, abort.signal)).rejects.toBeInstanceOf(ValidationError);
            expect(repository.invoices).toHaveLength(0);
        });

        it('rejects a blank id and reports an unknown one as not found', async () => {
            await expect(controller.findStoredInvoice('  ')).rejects.toBeInstanceOf(ValidationError);
            await expect(controller.findStoredInvoice('T-404')).rejects.toBeInstanceOf(NotFoundError);
        });
    });
});

describe('parseRunOptions', () => {
    it('reads numeric fields sent as strings', () => {
        expect(parseRunOptions({ deliveryRatioThresholdPct: '50', highDeliveryAmount: '250', discountTieBreak: 'highest-discount' }))
            .toEqual({ deliveryRatioThresholdPct: 50, highDeliveryAmount: 250, discountTieBreak: 'highest-discount' });
    });

    it('ignores empty fields and non-object bodies', () => {
        expect(parseRunOptions({ deliveryRatioThresholdPct: '' })).toEqual({});
        expect(parseRunOptions(undefined)).toEqual({});
    });

    it('rejects out-of-range or unknown values', () => {
        expect(() => parseRunOptions({ deliveryRatioThresholdPct: '0' })).toThrow('deliveryRatioThresholdPct must be a positive number.');
        expect(() => parseRunOptions({ highDeliveryAmount: '-1' })).toThrow('highDeliveryAmount must be a non-negative number.');
        expect(() => parseRunOptions({ discountTieBreak: 'random' }))
            .toThrow('discountTieBreak must be one of: lowest-coupon-code, highest-discount, lowest-discount.');
    });
});
