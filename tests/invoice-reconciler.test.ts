// tests/invoice-reconciler.test.ts
import { AnomalyScannerService } from '../src/core/anomaly';
import { MalformedRecordError } from '../src/core/common/errors';
import { LineItem } from '../src/core/common/interfaces/models';
import { assertWellFormed, InvoiceReconcilerService } from '../src/core/reconciliation';
import { discountRules, makeLine, silentLogger, taxRates } from './helpers';

describe('InvoiceReconcilerService', () => {
    const reconciler = new InvoiceReconcilerService(silentLogger());

    const twoLineInvoice: LineItem[] = [
        makeLine({ quantity: 2, unitPrice: 10 }),
        makeLine({ productCategory: 'Office', productSku: 'SKU-PEN', quantity: 1, unitPrice: 5 }),
    ];

    describe('reconcile', () => {
        it('aggregates the lines of a transaction into one canonical invoice', () => {
            const { invoices, rejected } = reconciler.reconcile(twoLineInvoice, discountRules, taxRates);

            expect(rejected).toHaveLength(0);
            expect(invoices).toHaveLength(1);
            const [invoice] = invoices;
            expect(invoice.transactionId).toBe('T-1');
            expect(invoice.customerIds).toEqual(['C-100']);
            expect(invoice.totalQuantity).toBe(3);
            expect(invoice.basePrice).toBe(25);
            expect(invoice.discountEffect).toBe(2);
            expect(invoice.priceAfterDiscount).toBe(23);
            expect(invoice.taxEffect).toBe(4.14);
            expect(invoice.priceAfterTax).toBe(27.14);
            expect(invoice.deliveryCharge).toBe(6);
            expect(invoice.finalPrice).toBe(33.14);
            expect(invoice.deliveryConsistent).toBe(true);
            expect(invoice.observedDeliveryCharges).toEqual([6]);
        });

        it('counts the delivery charge once per invoice, not once per line', () => {
            const [invoice] = reconciler.reconcile(twoLineInvoice, discountRules, taxRates).invoices;
            expect(invoice.finalPrice - invoice.priceAfterTax).toBeCloseTo(6, 10);
        });

        it('uses the maximum delivery charge and flags disagreeing lines', () => {
            const lines = [
                makeLine({ transactionId: 'T-2', deliveryCharge: 6 }),
                makeLine({ transactionId: 'T-2', productSku: 'SKU-CAM', deliveryCharge: 8 }),
            ];
            const [invoice] = reconciler.reconcile(lines, [], []).invoices;

            expect(invoice.deliveryCharge).toBe(8);
            expect(invoice.observedDeliveryCharges).toEqual([6, 8]);
            expect(invoice.deliveryConsistent).toBe(false);
            expect(invoice.finalPrice).toBe(58);
        });

        it('applies tax to the discounted amount', () => {
            const lines = [makeLine({
                transactionId: 'T-3',
                transactionDate: '2019-02-10',
                productCategory: 'Apparel',
                quantity: 4,
                unitPrice: 25,
                deliveryCharge: 0,
            })];
            const [invoice] = reconciler.reconcile(lines, discountRules, taxRates).invoices;

            expect(invoice.basePrice).toBe(100);
            expect(invoice.discountEffect).toBe(20);
            expect(invoice.taxEffect).toBe(8);
            expect(invoice.priceAfterTax).toBe(88);
            expect(invoice.finalPrice).toBe(88);
        });

        it('prices lines without reference data at zero discount and zero tax', () => {
            const lines = [makeLine({ productCategory: 'Gift Cards', unitPrice: 40, deliveryCharge: 0 })];
            const [invoice] = reconciler.reconcile(lines, discountRules, taxRates).invoices;

            expect(invoice.discountEffect).toBe(0);
            expect(invoice.taxEffect).toBe(0);
            expect(invoice.finalPrice).toBe(40);
        });

        it('rejects malformed lines individually without dropping the rest of the invoice', () => {
            const bad = makeLine({ productSku: 'SKU-BAD', quantity: 0 });
            const { invoices, rejected } = reconciler.reconcile([...twoLineInvoice, bad], discountRules, taxRates);

            expect(rejected).toEqual([{ item: bad, reasons: ['quantity must be a positive integer (got 0)'] }]);
            expect(invoices[0].lines).toHaveLength(2);
            expect(invoices[0].finalPrice).toBe(33.14);
        });

        it('emits no invoice when every line of a transaction is rejected', () => {
            const lines = [
                makeLine({ transactionId: 'T-9', unitPrice: -1 }),
                makeLine({ transactionId: 'T-1' }),
            ];
            const { invoices, rejected } = reconciler.reconcile(lines, [], []);

            expect(invoices.map(invoice => invoice.transactionId)).toEqual(['T-1']);
            expect(rejected).toHaveLength(1);
        });

        it('accounts for every input line exactly once', () => {
            const lines = [
                ...twoLineInvoice,
                makeLine({ transactionId: 'T-2', quantity: 1.5 }),
                makeLine({ transactionId: 'T-2', productSku: 'SKU-CAM' }),
                makeLine({ transactionId: 'T-5', deliveryCharge: Number.NaN }),
            ];
            const { invoices, rejected } = reconciler.reconcile(lines, discountRules, taxRates);
            const accepted = invoices.reduce((sum, invoice) => sum + invoice.lines.length, 0);

            expect(accepted + rejected.length).toBe(lines.length);
            expect(rejected).toHaveLength(2);
        });

        it('returns identical output for identical input', () => {
            const first = reconciler.reconcile(twoLineInvoice, discountRules, taxRates);
            const second = reconciler.reconcile(twoLineInvoice, discountRules, taxRates);
            expect(second).toEqual(first);
        });

        it('does not depend on line order', () => {
            const lines = [
                ...twoLineInvoice,
                makeLine({ transactionId: 'T-2', unitPrice: 12 }),
                makeLine({ transactionId: 'T-2', productSku: 'SKU-CAM', unitPrice: 30 }),
            ];
            const totals = (input: LineItem[]) => reconciler.reconcile(input, discountRules, taxRates).invoices
                .map(invoice => [invoice.transactionId, invoice.finalPrice, invoice.taxEffect])
                .sort();

            expect(totals([...lines].reverse())).toEqual(totals(lines));
        });

        it('rounds to the requested currency precision', () => {
            const [invoice] = reconciler.reconcile(twoLineInvoice, discountRules, taxRates, { currencyPrecision: 0 }).invoices;
            expect(invoice.taxEffect).toBe(4);
            expect(invoice.finalPrice).toBe(33);
        });
    });

    describe('two apparel lines, one with a used coupon', () => {
        const apparelRules = [{ productCategory: 'Apparel', month: 1, couponCode: 'APP10', discountPct: 10 }];
        const apparelTax = [{ productCategory: 'Apparel', gstPct: 18 }];
        const lineA = makeLine({ transactionId: 'T1', productCategory: 'Apparel', productSku: 'SKU-TEE', quantity: 2, unitPrice: 10, couponStatus: 'used' });
        const lineB = makeLine({ transactionId: 'T1', productCategory: 'Apparel', productSku: 'SKU-CAP', quantity: 1, unitPrice: 5, couponStatus: 'not_used' });

        it('discounts only the line whose coupon was used', () => {
            const [invoice] = reconciler.reconcile([lineA, lineB], apparelRules, apparelTax).invoices;

            expect(invoice.lines.map(line => line.discountEffect)).toEqual([2, 0]);
            expect([
                invoice.basePrice, invoice.discountEffect, invoice.priceAfterDiscount,
                invoice.taxEffect, invoice.priceAfterTax, invoice.deliveryCharge, invoice.finalPrice,
            ]).toEqual([25, 2, 23, 4.14, 27.14, 6, 33.14]);
            expect(invoice.deliveryConsistent).toBe(true);
        });

        it('takes the larger delivery charge and raises one inconsistency when line B disagrees', () => {
            const { invoices } = reconciler.reconcile([lineA, { ...lineB, deliveryCharge: 8 }], apparelRules, apparelTax);
            const [invoice] = invoices;

            expect(invoice.priceAfterTax).toBe(27.14);
            expect(invoice.deliveryCharge).toBe(8);
            expect(invoice.finalPrice).toBe(35.14);
            expect(invoice.deliveryConsistent).toBe(false);

            const records = new AnomalyScannerService(silentLogger()).scanInvoiceConsistency(invoices);
            expect(records.map(record => [record.kind, record.subjectId])).toEqual([['invoice-inconsistency', 'T1']]);
        });
    });

    describe('reconcileInPartitions', () => {
        const lines = ['T-1', 'T-2', 'T-3', 'T-4', 'T-5'].map(transactionId => makeLine({ transactionId }));

        it('produces the same invoices as a single pass', async () => {
            const single = reconciler.reconcile(lines, discountRules, taxRates);
            const partitioned = await reconciler.reconcileInPartitions(lines, discountRules, taxRates, { partitionSize: 2 });

            expect(partitioned.totalPartitions).toBe(3);
            expect(partitioned.completedPartitions).toBe(3);
            expect(partitioned.cancelled).toBe(false);
            expect(partitioned.invoices).toEqual(single.invoices);
        });

        it('stops scheduling partitions once the signal is aborted', async () => {
            const controller = new AbortController();
            const outcome = await reconciler.reconcileInPartitions(lines, discountRules, taxRates, {
                partitionSize: 2,
                signal: controller.signal,
                onPartitionComplete: () => controller.abort(),
            });

            expect(outcome.cancelled).toBe(true);
            expect(outcome.completedPartitions).toBe(1);
            expect(outcome.invoices.map(invoice => invoice.transactionId)).toEqual(['T-1', 'T-2']);
        });

        it('reports progress after every partition', async () => {
            const progress = jest.fn();
            await reconciler.reconcileInPartitions(lines, discountRules, taxRates, { partitionSize: 3, onPartitionComplete: progress });

            expect(progress.mock.calls).toEqual([
                [{ completedPartitions: 1, totalPartitions: 2 }],
                [{ completedPartitions: 2, totalPartitions: 2 }],
            ]);
        });

        it('rejects a non-positive partition size', async () => {
            await expect(reconciler.reconcileInPartitions(lines, [], [], { partitionSize: 0 })).rejects.toThrow(RangeError);
        });
    });
});

describe('assertWellFormed', () => {
    it('collects every problem with a line', () => {
        const line = makeLine({ transactionId: ' ', unitPrice: -3, transactionDate: '05/01/2019' });
        let caught: unknown;
        try {
            assertWellFormed(line);
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(MalformedRecordError);
        expect(caught instanceof MalformedRecordError && caught.reasons).toEqual([
            'transaction id is empty',
            'unit price must be a non-negative number (got -3)',
            'transaction date must be YYYY-MM-DD (got "05/01/2019")',
        ]);
    });

    it('accepts a zero unit price and a zero delivery charge', () => {
        expect(() => assertWellFormed(makeLine({ unitPrice: 0, deliveryCharge: 0 }))).not.toThrow();
    });
});
