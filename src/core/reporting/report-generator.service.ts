// src/core/reporting/report-generator.service.ts
import ExcelJS, { Row, Workbook, Worksheet } from 'exceljs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import { LOGGER_TOKEN } from '../../infrastructure/logger';
import { ANOMALY_KINDS } from '../anomaly';
import { AppError, errorMessage } from '../common/errors';
import { AnomalyRecord, Invoice, PricingRunResult, PricingRunSummary, RejectedLine } from '../common/interfaces/models';
import {
    IReportGeneratorService,
    ReportOptions,
    StorableAnomalyRecord,
    StorableInvoiceRecord,
    StorablePricingRun
} from './interfaces/services';

const CURRENCY_FORMAT = '#,##0.00';
const PERCENT_FORMAT = '0.00%';
const COUNT_FORMAT = '#,##0';

@singleton()
@injectable()
export class ReportGeneratorService implements IReportGeneratorService {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger
    ) {
        this.logger.info('ReportGeneratorService initialized.');
    }

    async generateReport(result: PricingRunResult, options?: ReportOptions): Promise<Buffer> {
        this.logger.info('Generating pricing Excel report...');
        try {
            const workbook = new ExcelJS.Workbook();
            this.setWorkbookProperties(workbook, options?.generatedAt ?? new Date());
            this.createSummarySheet(workbook, result.summary);
            this.createInvoicesSheet(workbook, result.invoices);
            if (options?.includeLines ?? true) {
                this.createInvoiceLinesSheet(workbook, result.invoices);
            }
            this.createAnomaliesSheet(workbook, result.anomalies);
            this.createRejectedSheet(workbook, result.rejected);

            const buffer = Buffer.from(await workbook.xlsx.writeBuffer());
            this.logger.info(`Excel report generated successfully (${buffer.length} bytes).`);
            return buffer;
        } catch (error) {
            this.logger.error(`Failed to generate Excel report: ${errorMessage(error)}`);
            if (error instanceof AppError) throw error;
            throw new AppError('ReportGenerationError', 'Failed to generate Excel report', 500, false);
        }
    }

    prepareDataForStorage(result: PricingRunResult, runId: string, runAt: Date): StorablePricingRun {
        this.logger.info(`Preparing run ${runId} for database storage...`);

        const invoices: StorableInvoiceRecord[] = result.invoices.map(invoice => ({
            runId,
            transactionId: invoice.transactionId,
            customerIds: invoice.customerIds.join(','),
            transactionDate: invoice.lines[0]?.item.transactionDate ?? '',
            lineCount: invoice.lines.length,
            totalQuantity: invoice.totalQuantity,
            basePrice: invoice.basePrice,
            discountEffect: invoice.discountEffect,
            priceAfterDiscount: invoice.priceAfterDiscount,
            taxEffect: invoice.taxEffect,
            priceAfterTax: invoice.priceAfterTax,
            deliveryCharge: invoice.deliveryCharge,
            finalPrice: invoice.finalPrice,
            deliveryConsistent: invoice.deliveryConsistent,
            observedDeliveryCharges: invoice.observedDeliveryCharges.join(','),
            reconciledAt: runAt,
        }));

        const anomalies: StorableAnomalyRecord[] = result.anomalies.map(anomaly => ({
            runId,
            kind: anomaly.kind,
            subjectId: anomaly.subjectId,
            rule: anomaly.basis.rule,
            threshold: anomaly.basis.threshold ?? null,
            evidence: JSON.stringify(anomaly.evidence),
            detectedAt: runAt,
        }));

        this.logger.info(`Prepared ${invoices.length} invoices and ${anomalies.length} anomalies for storage.`);
        return { runId, invoices, anomalies };
    }

    private setWorkbookProperties(workbook: Workbook, timestamp: Date): void {
        workbook.creator = 'Sales Invoice Reconciler';
        workbook.created = timestamp;
        workbook.modified = timestamp;
    }

    private createSummarySheet(workbook: Workbook, summary: PricingRunSummary): void {
        const sheet = workbook.addWorksheet('Summary');

        const titleRow = sheet.addRow(['Invoice Pricing Summary']);
        titleRow.font = { bold: true, size: 16 };
        sheet.mergeCells('A1:B1');
        sheet.addRow([]);

        const addCountRow = (label: string, count: number) => {
            sheet.addRow([label, count]).getCell(2).numFmt = COUNT_FORMAT;
        };
        addCountRow('Line items received', summary.lineCount);
        addCountRow('Line items accepted', summary.acceptedLineCount);
        addCountRow('Line items rejected', summary.rejectedLineCount);
        addCountRow('Invoices', summary.invoiceCount);
        addCountRow('Invoices with inconsistent delivery charge', summary.inconsistentInvoiceCount);
        sheet.addRow(['Run cancelled', summary.cancelled ? 'Yes' : 'No']);
        sheet.addRow([]);

        const headerRow = sheet.addRow(['Anomaly', 'Count']);
        headerRow.font = { bold: true };
        ANOMALY_KINDS.forEach(kind => addCountRow(kind, summary.anomalyCounts[kind]));

        sheet.getColumn(1).width = 45;
        sheet.getColumn(2).width = 12;
    }

    private createInvoicesSheet(workbook: Workbook, invoices: readonly Invoice[]): void {
        const sheet = workbook.addWorksheet('Invoices');
        const headers = [
            'Transaction ID', 'Customer IDs', 'Lines', 'Quantity',
            'Base Price', 'Discount', 'After Discount', 'Tax', 'After Tax',
            'Delivery Charge', 'Final Price', 'Delivery Consistent', 'Observed Delivery Charges'
        ];
        this.styleHeaderRow(sheet.addRow(headers), headers);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        invoices.forEach(invoice => {
            const row = sheet.addRow([
                invoice.transactionId,
                invoice.customerIds.join(', '),
                invoice.lines.length,
                invoice.totalQuantity,
                invoice.basePrice,
                invoice.discountEffect,
                invoice.priceAfterDiscount,
                invoice.taxEffect,
                invoice.priceAfterTax,
                invoice.deliveryCharge,
                invoice.finalPrice,
                invoice.deliveryConsistent ? 'Yes' : 'No',
                invoice.observedDeliveryCharges.join(', '),
            ]);
            this.formatDataRow(row, [5, 6, 7, 8, 9, 10, 11]);
        });

        this.autoFitColumns(sheet, headers);
    }

    private createInvoiceLinesSheet(workbook: Workbook, invoices: readonly Invoice[]): void {
        const sheet = workbook.addWorksheet('Invoice Lines');
        const headers = [
            'Transaction ID', 'Date', 'Customer ID', 'SKU', 'Category', 'Quantity', 'Unit Price',
            'Coupon Status', 'Applied Coupon', 'Discount Rate', 'Tax Rate',
            'Base Price', 'Discount', 'After Discount', 'Tax', 'After Tax'
        ];
        this.styleHeaderRow(sheet.addRow(headers), headers);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        // Line amounts are left unrounded; only invoice totals are rounded.
        invoices.forEach(invoice => invoice.lines.forEach(line => {
            const row = sheet.addRow([
                invoice.transactionId,
                line.item.transactionDate,
                line.item.customerId,
                line.item.productSku,
                line.item.productCategory,
                line.item.quantity,
                line.item.unitPrice,
                line.item.couponStatus,
                line.discount.appliedRule?.couponCode ?? '',
                line.discount.rate,
                line.taxRate,
                line.basePrice,
                line.discountEffect,
                line.priceAfterDiscount,
                line.taxEffect,
                line.priceAfterTax,
            ]);
            this.formatDataRow(row, [7, 12, 13, 14, 15, 16]);
            row.getCell(10).numFmt = PERCENT_FORMAT;
            row.getCell(11).numFmt = PERCENT_FORMAT;
        }));

        this.autoFitColumns(sheet, headers);
    }

    private createAnomaliesSheet(workbook: Workbook, anomalies: readonly AnomalyRecord[]): void {
        const sheet = workbook.addWorksheet('Anomalies');
        const headers = ['Kind', 'Subject', 'Rule', 'Threshold', 'Evidence'];
        this.styleHeaderRow(sheet.addRow(headers), headers);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        anomalies.forEach(anomaly => {
            sheet.addRow([
                anomaly.kind,
                anomaly.subjectId,
                anomaly.basis.rule,
                anomaly.basis.threshold ?? '',
                JSON.stringify(anomaly.evidence),
            ]);
        });

        this.autoFitColumns(sheet, headers);
    }

    private createRejectedSheet(workbook: Workbook, rejected: readonly RejectedLine[]): void {
        const sheet = workbook.addWorksheet('Rejected Lines');
        const headers = ['Source Row', 'Transaction ID', 'SKU', 'Quantity', 'Unit Price', 'Delivery Charge', 'Reasons'];
        this.styleHeaderRow(sheet.addRow(headers), headers);
        sheet.views = [{ state: 'frozen', ySplit: 1 }];

        rejected.forEach(({ item, reasons }) => {
            const row = sheet.addRow([
                item.sourceRow ?? '',
                item.transactionId,
                item.productSku,
                item.quantity,
                item.unitPrice,
                item.deliveryCharge,
                reasons.join('; '),
            ]);
            this.formatDataRow(row, [5, 6]);
        });

        this.autoFitColumns(sheet, headers);
    }

    private styleHeaderRow(row: Row, headers: string[]): void {
        for (let i = 1; i <= headers.length; i++) {
            const cell = row.getCell(i);
            cell.font = { bold: true, color: { argb: 'FFFFFFFF' } };
            cell.alignment = { vertical: 'middle', horizontal: 'center', wrapText: true };
            cell.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: 'FF1F4E79' } };
            cell.border = {
                top: { style: 'thin' },
                left: { style: 'thin' },
                bottom: { style: 'thin' },
                right: { style: 'thin' }
            };
        }
    }

    private formatDataRow(row: Row, currencyColIndices: number[]): void {
        currencyColIndices.forEach(idx => {
            row.getCell(idx).numFmt = CURRENCY_FORMAT;
        });
    }

    /** Widths from the header and the first rows of data */
    private autoFitColumns(sheet: Worksheet, headers: string[]): void {
        const scanRowCount = 21;
        headers.forEach((header, i) => {
            const column = sheet.getColumn(i + 1);
            let maxLength = header.length;
            column.eachCell({ includeEmpty: false }, (cell, rowNumber) => {
                if (rowNumber > scanRowCount || cell.value === null || cell.value === undefined) return;
                maxLength = Math.max(maxLength, String(cell.value).length);
            });
            column.width = Math.min(maxLength + 2, 60);
        });
    }
}
