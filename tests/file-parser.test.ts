// tests/file-parser.test.ts
import * as XLSX from 'xlsx';
import { FileParsingError } from '../src/core/common/errors';
import { FileParserService } from '../src/core/parsing';
import { silentLogger } from './helpers';

const workbookBuffer = (rows: Record<string, unknown>[], sheetName = 'Online_Sales'): Buffer => {
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), sheetName);
    const buffer: Buffer = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
    return buffer;
};

describe('FileParserService', () => {
    const parser = new FileParserService(silentLogger());

    it('maps spreadsheet columns onto line item fields', async () => {
        const buffer = workbookBuffer([
            {
                CustomerID: 17850,
                Transaction_ID: 16679,
                Transaction_Date: 43466,
                Product_SKU: 'GGOENEBJ079499',
                Product_Description: 'Nest Learning Thermostat',
                Product_Category: 'Nest-USA',
                Quantity: 1,
                Avg_Price: 153.71,
                Delivery_Charges: 6.5,
                Coupon_Status: 'Used',
                Warehouse: 'North',
            },
        ]);
        const records = await parser.parseFile(buffer, 'lineItems');

        expect(records).toHaveLength(1);
        expect(records[0].dataset).toBe('lineItems');
        expect(records[0].originalLineNumber).toBe(2);
        expect(records[0].values).toEqual({
            customerId: 17850,
            transactionId: 16679,
            transactionDate: 43466,
            productSku: 'GGOENEBJ079499',
            productDescription: 'Nest Learning Thermostat',
            productCategory: 'Nest-USA',
            quantity: 1,
            unitPrice: 153.71,
            deliveryCharge: 6.5,
            couponStatus: 'Used',
        });
    });

    it('reads a named sheet and fails on a missing one', async () => {
        const buffer = workbookBuffer([{ Product_Category: 'Office', GST: 0.1 }], 'Tax_amount');

        const records = await parser.parseFile(buffer, 'taxes', { sheetName: 'Tax_amount' });
        expect(records[0].values).toEqual({ productCategory: 'Office', gstPct: 0.1 });

        await expect(parser.parseFile(buffer, 'taxes', { sheetName: 'Nope' })).rejects.toThrow('Sheet "Nope" not found.');
    });

    it('reads CSV through the spreadsheet path', async () => {
        const csv = Buffer.from('CustomerID,Location\n12346,New York\n12347,Chicago\n');
        const records = await parser.parseFile(csv, 'customers');

        expect(records.map(record => String(record.values.customerId))).toEqual(['12346', '12347']);
        expect(records.map(record => record.values.location)).toEqual(['New York', 'Chicago']);
    });

    it('reads a JSON array or an object keyed by dataset name', async () => {
        const bare = Buffer.from(JSON.stringify([{ Month: 'Jan', Product_Category: 'Apparel', Coupon_Code: 'SALE10', Discount_pct: 10 }]));
        const keyed = Buffer.from(JSON.stringify({ discounts: [{ month: 2, category: 'Bags', code: 'BAG5', discount: 5 }, 'oops'] }));

        const fromBare = await parser.parseFile(bare, 'discounts');
        const fromKeyed = await parser.parseFile(keyed, 'discounts');

        expect(fromBare[0].values).toEqual({ month: 'Jan', productCategory: 'Apparel', couponCode: 'SALE10', discountPct: 10 });
        expect(fromBare[0].originalLineNumber).toBe(1);
        expect(fromKeyed).toHaveLength(1);
        expect(fromKeyed[0].values).toEqual({ month: 2, productCategory: 'Bags', couponCode: 'BAG5', discountPct: 5 });
    });

    it('skips rows with no recognised values', async () => {
        const json = Buffer.from(JSON.stringify([{ Notes: 'header comment' }, { Product_Category: 'Office', GST: 18 }]));
        const records = await parser.parseFile(json, 'taxes');

        expect(records).toHaveLength(1);
        expect(records[0].originalLineNumber).toBe(2);
    });

    it('assigns a distinct id to every record', async () => {
        const json = Buffer.from(JSON.stringify([{ Product_Category: 'A', GST: 5 }, { Product_Category: 'B', GST: 5 }]));
        const [first, second] = await parser.parseFile(json, 'taxes');
        expect(first.id).not.toBe(second.id);
    });

    it('wraps unreadable JSON in a FileParsingError', async () => {
        await expect(parser.parseFile(Buffer.from('[not json'), 'taxes')).rejects.toBeInstanceOf(FileParsingError);
    });

    it('rejects JSON without a usable array', async () => {
        await expect(parser.parseFile(Buffer.from('{"rows": []}'), 'taxes'))
            .rejects.toThrow('Invalid JSON structure: expected an array of taxes rows or an object with a "taxes" array');
    });
});
