// src/infrastructure/database/providers/data-source.provider.ts
import 'reflect-metadata';
import { inject, injectable } from "tsyringe";
import { DataSource, DataSourceOptions } from "typeorm";
import winston from "winston";

import config, { AppConfig } from "../../../config";
import { LOGGER_TOKEN } from "../../../infrastructure/logger";
import { CanonicalInvoiceRecord, PricingAnomalyRecord } from "../../../core/common/entities";
import { PersistenceError, errorMessage } from "../../../core/common/errors";

/** Owns the single TypeORM DataSource; repositories call init() lazily. */
@injectable()
export class AppDataSource {

    private _dataSource: DataSource | null = null;
    private readonly logger: winston.Logger;
    private readonly settings: AppConfig['database'];

    constructor(@inject(LOGGER_TOKEN) logger: winston.Logger) {
        this.logger = logger;
        this.settings = config.database;
        this.logger.info('AppDataSource service initialized.');
    }

    get enabled(): boolean {
        return this.settings.enabled;
    }

    async init(): Promise<DataSource> {
        if (!this.settings.enabled) {
            throw new PersistenceError('Database persistence is disabled (set DB_ENABLED=true).', 503);
        }
        if (this._dataSource && this._dataSource.isInitialized) {
            return this._dataSource;
        }

        if (!this._dataSource) {
            this.logger.info("AppDataSource: Creating new DataSource instance.");
            const options: DataSourceOptions = {
                type: this.settings.type,
                host: this.settings.host,
                port: this.settings.port,
                username: this.settings.username,
                password: this.settings.password,
                database: this.settings.database,
                synchronize: this.settings.synchronize,
                logging: this.settings.logging,
                entities: [CanonicalInvoiceRecord, PricingAnomalyRecord],
                subscribers: [],
                migrations: [],
                connectionTimeout: 150000,
                extra: {
                    trustServerCertificate: true
                },
                options: {
                    encrypt: false,
                },
            };
            this.logger.info(`AppDataSource: Configuring DataSource for ${this.settings.database} on ${this.settings.host}:${this.settings.port}`);
            this._dataSource = new DataSource(options);
        }

        try {
            this.logger.info("AppDataSource: Attempting to initialize TypeORM DataSource...");
            await this._dataSource.initialize();
            this.logger.info(`AppDataSource: TypeORM DataSource initialized successfully! [${this.settings.database}@${this.settings.host}]`);
        } catch (err) {
            this.logger.error("AppDataSource: Error during Data Source initialization", {
                message: errorMessage(err),
                db_host: this.settings.host,
                db_name: this.settings.database
            });
            this._dataSource = null;
            throw new PersistenceError(`Database unavailable: ${errorMessage(err)}`, 503);
        }

        return this._dataSource;
    }

    async close(): Promise<void> {
        if (this._dataSource && this._dataSource.isInitialized) {
            this.logger.info("AppDataSource: Attempting to close TypeORM DataSource...");
            await this._dataSource.destroy();
            this.logger.info("AppDataSource: TypeORM DataSource has been closed successfully!");
        }
        this._dataSource = null;
    }
}
