// src/core/parsing/interfaces/services.ts
import { CustomerLocation, DiscountRule, LineItem, TaxRate } from '../../common/interfaces/models';

export type LineItemField = Exclude<keyof LineItem, 'sourceRow'>;

/** Canonical field names each uploaded dataset maps its columns onto */
export interface DatasetFieldMap {
    lineItems: LineItemField;
    discounts: keyof DiscountRule;
    taxes: keyof TaxRate;
    customers: keyof CustomerLocation;
}

export type DatasetKind = keyof DatasetFieldMap;

/** One parsed row before validation: recognised columns only, values untouched. */
export interface RawRecord<D extends DatasetKind> {
    /** Unique identifier assigned during parsing */
    id: string;
    dataset: D;
    /** Line number in the source file (header is line 1 for sheets) */
    originalLineNumber: number;
    values: Partial<Record<DatasetFieldMap[D], unknown>>;
}

/** Potential options for file parsing */
export interface FileParsingOptions {
    fileTypeHint?: 'excel' | 'json'; // CSV is read through the spreadsheet path
    sheetName?: string;
}

/** Defines the contract for the File Parser Service */
export interface IFileParserService {
    /**
     * Parses an uploaded spreadsheet, CSV or JSON file into raw records of one dataset.
     * @throws {FileParsingError} If the file cannot be read at all.
     */
    parseFile<D extends DatasetKind>(
        fileBuffer: Buffer,
        dataset: D,
        options?: FileParsingOptions
    ): Promise<RawRecord<D>[]>;
}
