// tests/fixtures.ts
import { LineItem } from '../src/core/common/interfaces/models';
import { makeLine } from './helpers';

/** Two invoices (T-2 with disagreeing delivery charges) and one unusable line. */
export const sampleLines: LineItem[] = [
    makeLine({ transactionId: 'T-1', quantity: 2, unitPrice: 10, sourceRow: 2 }),
    makeLine({ transactionId: 'T-1', productCategory: 'Office', productSku: 'SKU-PEN', unitPrice: 5, sourceRow: 3 }),
    makeLine({ transactionId: 'T-2', unitPrice: 25, deliveryCharge: 6, sourceRow: 4 }),
    makeLine({ transactionId: 'T-2', productSku: 'SKU-CAM', deliveryCharge: 8, sourceRow: 5 }),
    makeLine({ transactionId: 'T-3', quantity: 0, sourceRow: 6 }),
];
