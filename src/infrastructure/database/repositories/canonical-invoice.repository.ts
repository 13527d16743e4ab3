// src/infrastructure/database/repositories/canonical-invoice.repository.ts
import 'reflect-metadata';
import { inject, injectable } from 'tsyringe';
import { DataSource } from 'typeorm';
import winston from 'winston';

import { LOGGER_TOKEN } from '../../logger';
import { AppDataSource } from '../providers/data-source.provider';

import { CanonicalInvoiceRecord, PricingAnomalyRecord } from '../../../core/common/entities';
import { AppError, PersistenceError, errorMessage } from '../../../core/common/errors';
import { ICanonicalInvoiceRepository, StoredInvoice } from '../../../core/common/interfaces/repositories';
import { StorablePricingRun } from '../../../core/reporting/interfaces/services';

@injectable()
export class CanonicalInvoiceRepository implements ICanonicalInvoiceRepository {

    private initPromise: Promise<DataSource> | null = null;

    constructor(
        @inject(LOGGER_TOKEN) private readonly logger: winston.Logger,
        @inject(AppDataSource) private readonly dataSourceProvider: AppDataSource
    ) {
        this.logger.info('CanonicalInvoiceRepository initialized.');
    }

    /** Initializes the DataSource on first use; a failed attempt is retried on the next call. */
    private async getDataSource(): Promise<DataSource> {
        if (!this.initPromise) {
            this.initPromise = this.dataSourceProvider.init();
        }
        try {
            return await this.initPromise;
        } catch (error) {
            this.initPromise = null;
            throw error;
        }
    }

    async saveRun(run: StorablePricingRun): Promise<void> {
        if (run.invoices.length === 0 && run.anomalies.length === 0) {
            this.logger.info(`CanonicalInvoiceRepository: Run ${run.runId} has nothing to save.`);
            return;
        }

        const dataSource = await this.getDataSource();
        this.logger.info(`CanonicalInvoiceRepository: Saving run ${run.runId} (${run.invoices.length} invoices, ${run.anomalies.length} anomalies)...`);

        try {
            await dataSource.transaction(async manager => {
                const invoices = run.invoices.map(dto => manager.create(CanonicalInvoiceRecord, dto));
                const anomalies = run.anomalies.map(dto => manager.create(PricingAnomalyRecord, dto));
                await manager.save(invoices, { chunk: 100 });
                await manager.save(anomalies, { chunk: 100 });
            });
            this.logger.info(`CanonicalInvoiceRepository: Run ${run.runId} saved.`);
        } catch (error) {
            this.logger.error('CanonicalInvoiceRepository: Error saving pricing run.', {
                errorMessage: errorMessage(error),
                runId: run.runId,
            });
            throw new PersistenceError(`Failed to save pricing run: ${errorMessage(error)}`);
        }
    }

    async findLatestByTransactionId(transactionId: string): Promise<StoredInvoice | null> {
        const dataSource = await this.getDataSource();
        this.logger.debug(`CanonicalInvoiceRepository: Finding latest invoice ${transactionId}`);
        try {
            const invoice = await dataSource.getRepository(CanonicalInvoiceRecord).findOne({
                where: { transactionId },
                order: { reconciledAt: 'DESC', id: 'DESC' },
            });
            if (!invoice) {
                return null;
            }
            // Only anomalies whose subject is the invoice itself; grouped scans key on other values.
            const anomalies = await dataSource.getRepository(PricingAnomalyRecord).find({
                where: { runId: invoice.runId, subjectId: transactionId },
                order: { id: 'ASC' },
            });
            return { invoice, anomalies };
        } catch (error) {
            if (error instanceof AppError) throw error;
            this.logger.error(`CanonicalInvoiceRepository: Error finding invoice ${transactionId}.`, { errorMessage: errorMessage(error) });
            throw new PersistenceError(`Failed to load invoice ${transactionId}: ${errorMessage(error)}`);
        }
    }
}
