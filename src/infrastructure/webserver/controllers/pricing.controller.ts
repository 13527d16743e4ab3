// src/infrastructure/webserver/controllers/pricing.controller.ts
import { NextFunction, Request, Response } from 'express';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import { Logger } from 'winston';
import config, { DISCOUNT_TIE_BREAKS } from '../../../config';
import { NotFoundError, ValidationError } from '../../../core/common/errors';
import { PricingRunResult, PricingRunSummary } from '../../../core/common/interfaces/models';
import { CANONICAL_INVOICE_REPOSITORY_TOKEN, ICanonicalInvoiceRepository, StoredInvoice } from '../../../core/common/interfaces/repositories';
import { generateUniqueId } from '../../../core/common/utils';
import { DatasetKind, FileParserService } from '../../../core/parsing';
import { PricingRunOptions, PricingRunService } from '../../../core/reconciliation';
import { ReportGeneratorService } from '../../../core/reporting';
import { IngestionIssue, parseNumeric, ValidationService } from '../../../core/validation';
import { LOGGER_TOKEN } from '../../logger';

/** File contents per upload field; customers is optional. */
export type PricingUploads = Partial<Record<DatasetKind, Buffer>>;

export interface UploadedRun {
    result: PricingRunResult;
    ingestionIssues: IngestionIssue[];
}

export interface PersistedRun {
    runId: string;
    summary: PricingRunSummary;
    storedInvoices: number;
    storedAnomalies: number;
    ingestionIssues: IngestionIssue[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

const UPLOAD_FIELDS: readonly DatasetKind[] = ['lineItems', 'discounts', 'taxes', 'customers'];

/** Buffers of the first file in each known field of a multer `fields()` upload. */
export function collectUploads(files: Request['files']): PricingUploads {
    const uploads: PricingUploads = {};
    if (!files || Array.isArray(files)) return uploads;
    for (const field of UPLOAD_FIELDS) {
        const file = files[field]?.[0];
        if (file) uploads[field] = file.buffer;
    }
    return uploads;
}

/**
 * Reads the tunable scan and tie-break options from a multipart or JSON body.
 * Absent fields fall back to configuration inside the services.
 */
export function parseRunOptions(body: unknown): PricingRunOptions {
    const options: PricingRunOptions = {};
    if (!isRecord(body)) return options;

    if (body.deliveryRatioThresholdPct !== undefined && body.deliveryRatioThresholdPct !== '') {
        const threshold = parseNumeric(body.deliveryRatioThresholdPct);
        if (threshold === null || threshold <= 0) {
            throw new ValidationError('deliveryRatioThresholdPct must be a positive number.');
        }
        options.deliveryRatioThresholdPct = threshold;
    }
    if (body.highDeliveryAmount !== undefined && body.highDeliveryAmount !== '') {
        const amount = parseNumeric(body.highDeliveryAmount);
        if (amount === null || amount < 0) {
            throw new ValidationError('highDeliveryAmount must be a non-negative number.');
        }
        options.highDeliveryAmount = amount;
    }
    if (body.discountTieBreak !== undefined && body.discountTieBreak !== '') {
        const tieBreak = DISCOUNT_TIE_BREAKS.find(candidate => candidate === body.discountTieBreak);
        if (!tieBreak) {
            throw new ValidationError(`discountTieBreak must be one of: ${DISCOUNT_TIE_BREAKS.join(', ')}.`);
        }
        options.discountTieBreak = tieBreak;
    }
    return options;
}

@singleton()
@injectable()
export class PricingController {

    constructor(
        @inject(LOGGER_TOKEN) private logger: Logger,
        @inject(FileParserService) private fileParser: FileParserService,
        @inject(ValidationService) private validationService: ValidationService,
        @inject(PricingRunService) private pricingRun: PricingRunService,
        @inject(ReportGeneratorService) private reporter: ReportGeneratorService,
        @inject(CANONICAL_INVOICE_REPOSITORY_TOKEN) private invoiceRepo: ICanonicalInvoiceRepository
    ) {
        this.logger.info('PricingController initialized.');
    }

    /** POST /api/pricing/reconcile: JSON result of a run over the uploaded files. */
    public handleReconcile = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        this.logger.info('Received request to reconcile uploaded pricing files.');
        try {
            const { result, ingestionIssues } = await this.withDisconnectSignal(res, signal =>
                this.reconcileUploads(collectUploads(req.files), req.body, signal));
            res.status(200).json({ ...result, ingestionIssues });
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/pricing/reconcile/export: the same run delivered as an Excel workbook. */
    public handleExport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        this.logger.info('Received request to export pricing report.');
        try {
            const buffer = await this.withDisconnectSignal(res, signal =>
                this.exportUploads(collectUploads(req.files), req.body, signal));
            const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
            res.setHeader('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet');
            res.setHeader('Content-Disposition', `attachment; filename="pricing_report_${timestamp}.xlsx"`);
            res.status(200).send(buffer);
        } catch (error) {
            next(error);
        }
    };

    /** POST /api/pricing/reconcile/persist: runs, stores invoices and anomalies, returns the run id. */
    public handlePersist = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        this.logger.info('Received request to reconcile and persist pricing run.');
        try {
            const persisted = await this.withDisconnectSignal(res, signal =>
                this.persistUploads(collectUploads(req.files), req.body, signal));
            res.status(201).json(persisted);
        } catch (error) {
            next(error);
        }
    };

    /** GET /api/pricing/invoices/:transactionId */
    public handleGetInvoice = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            const stored = await this.findStoredInvoice(req.params.transactionId ?? '');
            res.status(200).json(stored);
        } catch (error) {
            next(error);
        }
    };

    /** Parse, standardize and run. */
    async reconcileUploads(uploads: PricingUploads, body: unknown, signal?: AbortSignal): Promise<UploadedRun> {
        const { lineItems, discounts, taxes, customers } = uploads;
        if (!lineItems) throw new ValidationError('A line items file ("lineItems") is required.');
        if (!discounts) throw new ValidationError('A discount rules file ("discounts") is required.');
        if (!taxes) throw new ValidationError('A tax rates file ("taxes") is required.');

        const options = parseRunOptions(body);
        this.logger.info('Using pricing options:', { ...config.pricing, ...options });

        const customerRecords = customers ? await this.fileParser.parseFile(customers, 'customers') : [];
        const [lineRecords, discountRecords, taxRecords] = await Promise.all([
            this.fileParser.parseFile(lineItems, 'lineItems'),
            this.fileParser.parseFile(discounts, 'discounts'),
            this.fileParser.parseFile(taxes, 'taxes'),
        ]);

        const customerResult = this.validationService.standardizeCustomerLocations(customerRecords);
        const lineResult = this.validationService.standardizeLineItems(lineRecords, customerResult.valid);
        const discountResult = this.validationService.standardizeDiscountRules(discountRecords);
        const taxResult = this.validationService.standardizeTaxRates(taxRecords);
        const ingestionIssues = [
            ...customerResult.issues, ...lineResult.issues, ...discountResult.issues, ...taxResult.issues,
        ];

        const result = await this.pricingRun.run(
            { lines: lineResult.valid, discountRules: discountResult.valid, taxRates: taxResult.valid },
            {
                ...options,
                signal,
                onPartitionComplete: progress => this.logger.debug(
                    `Partition ${progress.completedPartitions}/${progress.totalPartitions} reconciled.`
                ),
            }
        );
        return { result, ingestionIssues };
    }

    async exportUploads(uploads: PricingUploads, body: unknown, signal?: AbortSignal): Promise<Buffer> {
        const { result } = await this.reconcileUploads(uploads, body, signal);
        return this.reporter.generateReport(result);
    }

    async persistUploads(uploads: PricingUploads, body: unknown, signal?: AbortSignal): Promise<PersistedRun> {
        const { result, ingestionIssues } = await this.reconcileUploads(uploads, body, signal);
        if (result.summary.cancelled) {
            throw new ValidationError('Run was cancelled before completion; nothing was stored.');
        }
        const runId = generateUniqueId();
        const storable = this.reporter.prepareDataForStorage(result, runId, new Date());
        await this.invoiceRepo.saveRun(storable);
        this.logger.info(`Pricing run ${runId} persisted.`);
        return {
            runId,
            summary: result.summary,
            storedInvoices: storable.invoices.length,
            storedAnomalies: storable.anomalies.length,
            ingestionIssues,
        };
    }

    async findStoredInvoice(rawTransactionId: string): Promise<StoredInvoice> {
        const transactionId = rawTransactionId.trim();
        if (!transactionId) {
            throw new ValidationError('transactionId is required.');
        }
        const stored = await this.invoiceRepo.findLatestByTransactionId(transactionId);
        if (!stored) {
            throw new NotFoundError(`No stored invoice for transaction ${transactionId}.`);
        }
        return stored;
    }

    /** Aborts the signal when the client goes away before the response is written. */
    private async withDisconnectSignal<T>(res: Response, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
        const abort = new AbortController();
        const onClose = () => {
            if (!res.writableEnded) {
                this.logger.warn('Client disconnected; cancelling remaining partitions.');
                abort.abort();
            }
        };
        res.on('close', onClose);
        try {
            return await work(abort.signal);
        } finally {
            res.off('close', onClose);
        }
    }
}
