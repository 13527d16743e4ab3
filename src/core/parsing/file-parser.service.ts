// src/core/parsing/file-parser.service.ts
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from 'winston';
import * as XLSX from 'xlsx';

import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { AppError, FileParsingError, errorMessage } from '../common/errors';
import { DatasetFieldMap, DatasetKind, FileParsingOptions, IFileParserService, RawRecord } from './interfaces/services';

/**
 * Column aliases per dataset, keyed by the header lower-cased with everything
 * but letters and digits removed ("Transaction_ID" -> "transactionid").
 */
const HEADER_MAPS: { [D in DatasetKind]: Record<string, DatasetFieldMap[D]> } = {
    lineItems: {
        'customerid': 'customerId', 'customer': 'customerId',
        'transactionid': 'transactionId', 'invoiceid': 'transactionId', 'transaction': 'transactionId',
        'transactiondate': 'transactionDate', 'date': 'transactionDate',
        'productsku': 'productSku', 'sku': 'productSku',
        'productdescription': 'productDescription', 'description': 'productDescription',
        'productcategory': 'productCategory', 'category': 'productCategory',
        'quantity': 'quantity', 'qty': 'quantity',
        'avgprice': 'unitPrice', 'unitprice': 'unitPrice', 'price': 'unitPrice',
        'deliverycharges': 'deliveryCharge', 'deliverycharge': 'deliveryCharge', 'delivery': 'deliveryCharge',
        'couponstatus': 'couponStatus', 'coupon': 'couponStatus',
        'location': 'location', 'city': 'location',
    },
    discounts: {
        'month': 'month', 'period': 'month',
        'productcategory': 'productCategory', 'category': 'productCategory',
        'couponcode': 'couponCode', 'code': 'couponCode',
        'discountpct': 'discountPct', 'discount': 'discountPct', 'discountpercentage': 'discountPct',
    },
    taxes: {
        'productcategory': 'productCategory', 'category': 'productCategory',
        'gst': 'gstPct', 'gstpct': 'gstPct', 'taxrate': 'gstPct', 'tax': 'gstPct',
    },
    customers: {
        'customerid': 'customerId', 'customer': 'customerId',
        'location': 'location', 'city': 'location',
    },
};

export function normalizeHeader(header: string): string {
    return header.trim().toLowerCase().replace(/[^a-z0-9]/g, '');
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@singleton()
@injectable()
export class FileParserService implements IFileParserService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('FileParserService initialized.');
    }

    async parseFile<D extends DatasetKind>(
        fileBuffer: Buffer,
        dataset: D,
        options?: FileParsingOptions
    ): Promise<RawRecord<D>[]> {
        // Try to infer type if not provided
        let fileType = options?.fileTypeHint;
        if (!fileType) {
            const startChar = fileBuffer.toString('utf8', 0, 64).trim().charAt(0);
            fileType = startChar === '{' || startChar === '[' ? 'json' : 'excel';
            this.logger.debug(`Inferred file type for ${dataset} as: ${fileType}`);
        }

        this.logger.info(`Attempting to parse ${dataset} file as ${fileType}`);

        try {
            const rows = fileType === 'json'
                ? this.readJsonRows(fileBuffer, dataset)
                : this.readSheetRows(fileBuffer, options?.sheetName);
            const records = this.mapRows(rows, dataset, fileType === 'json' ? 1 : 2);
            this.logger.info(`Parsed ${records.length} ${dataset} records (${rows.length} rows read).`);
            return records;
        } catch (error) {
            this.logger.error(`File parsing failed for ${dataset}: ${errorMessage(error)}`);
            if (error instanceof AppError) {
                throw error;
            }
            throw new FileParsingError(`Failed to parse ${dataset} file`, error instanceof Error ? error : undefined);
        }
    }

    private readSheetRows(buffer: Buffer, sheetName?: string): Record<string, unknown>[] {
        // raw: CSV cells stay strings; dates in real workbooks arrive as serial numbers.
        const workbook = XLSX.read(buffer, { type: 'buffer', raw: true, cellDates: false });
        const targetSheet = sheetName ?? workbook.SheetNames[0];
        if (!targetSheet) { throw new FileParsingError('No sheets found in the workbook.'); }
        const worksheet = workbook.Sheets[targetSheet];
        if (!worksheet) { throw new FileParsingError(`Sheet "${targetSheet}" not found.`); }

        return XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, { raw: true, defval: null });
    }

    private readJsonRows(buffer: Buffer, dataset: DatasetKind): Record<string, unknown>[] {
        const parsed: unknown = JSON.parse(buffer.toString('utf-8'));
        // Either a bare array of rows or an object holding the array under the dataset name.
        const rows = isPlainRecord(parsed) ? parsed[dataset] : parsed;
        if (!Array.isArray(rows)) {
            throw new FileParsingError(`Invalid JSON structure: expected an array of ${dataset} rows or an object with a "${dataset}" array`);
        }
        return rows.filter((row, index): row is Record<string, unknown> => {
            if (isPlainRecord(row)) return true;
            this.logger.warn(`Skipping ${dataset} JSON entry ${index + 1}: not an object.`);
            return false;
        });
    }

    private mapRows<D extends DatasetKind>(
        rows: Record<string, unknown>[],
        dataset: D,
        firstLineNumber: number
    ): RawRecord<D>[] {
        const headerMap: Record<string, DatasetFieldMap[D]> = HEADER_MAPS[dataset];
        const unknownHeaders = new Set<string>();
        const records: RawRecord<D>[] = [];

        rows.forEach((row, index) => {
            const values: Partial<Record<DatasetFieldMap[D], unknown>> = {};
            let mappedCount = 0;
            for (const header of Object.keys(row)) {
                const mappedKey = headerMap[normalizeHeader(header)];
                if (mappedKey === undefined) {
                    unknownHeaders.add(header);
                    continue;
                }
                const value = row[header];
                if (value !== null && value !== undefined && value !== '') {
                    values[mappedKey] = value;
                    mappedCount++;
                }
            }
            if (mappedCount > 0) {
                records.push({ id: uuidv4(), dataset, originalLineNumber: index + firstLineNumber, values });
            }
        });

        if (unknownHeaders.size > 0) {
            this.logger.debug(`Ignored unrecognised ${dataset} columns: ${[...unknownHeaders].join(', ')}`);
        }
        return records;
    }
}
