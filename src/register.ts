// src/register.ts

import { container } from "tsyringe";
import { Logger } from "winston";
import { AnomalyScannerService } from "./core/anomaly";
import { CANONICAL_INVOICE_REPOSITORY_TOKEN } from "./core/common/interfaces/repositories";
import { FileParserService } from "./core/parsing";
import { InvoiceReconcilerService, PricingRunService } from "./core/reconciliation";
import { ReportGeneratorService } from "./core/reporting";
import { ValidationService } from "./core/validation";
import { AppDataSource } from "./infrastructure/database/providers/data-source.provider";
import { CanonicalInvoiceRepository } from "./infrastructure/database/repositories/canonical-invoice.repository";
import loggerInstance, { LOGGER_TOKEN } from "./infrastructure/logger";
import { PricingController } from "./infrastructure/webserver/controllers/pricing.controller";

export function registerDependencies(logger: Logger = loggerInstance): void {
    // Logger first: every service below injects it
    container.register(LOGGER_TOKEN, { useValue: logger });

    container.registerSingleton(AppDataSource);
    container.register(CANONICAL_INVOICE_REPOSITORY_TOKEN, {
        useClass: CanonicalInvoiceRepository
    });

    container.registerSingleton(FileParserService);
    container.registerSingleton(ValidationService);
    container.registerSingleton(InvoiceReconcilerService);
    container.registerSingleton(AnomalyScannerService);
    container.registerSingleton(PricingRunService);
    container.registerSingleton(ReportGeneratorService);

    container.registerSingleton(PricingController);

    logger.debug("Dependency registration complete.");
}
