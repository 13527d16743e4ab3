// tests/helpers.ts
import 'reflect-metadata';
import winston from 'winston';
import { DiscountRule, LineItem, TaxRate } from '../src/core/common/interfaces/models';

export const silentLogger = (): winston.Logger =>
    winston.createLogger({ silent: true, transports: [new winston.transports.Console()] });

export const makeLine = (overrides: Partial<LineItem> = {}): LineItem => ({
    customerId: 'C-100',
    transactionId: 'T-1',
    transactionDate: '2019-01-05',
    productCategory: 'Nest-USA',
    productDescription: 'Learning thermostat',
    productSku: 'SKU-THERMO',
    quantity: 1,
    unitPrice: 25,
    deliveryCharge: 6,
    couponStatus: 'used',
    location: 'Chicago',
    ...overrides,
});

export const discountRules: DiscountRule[] = [
    { productCategory: 'Nest-USA', month: 1, couponCode: 'ELEC10', discountPct: 10 },
    { productCategory: 'Apparel', month: 2, couponCode: 'SALE20', discountPct: 20 },
];

export const taxRates: TaxRate[] = [
    { productCategory: 'Nest-USA', gstPct: 18 },
    { productCategory: 'Office', gstPct: 18 },
    { productCategory: 'Apparel', gstPct: 10 },
];
