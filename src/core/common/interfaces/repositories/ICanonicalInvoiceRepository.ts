// src/core/common/interfaces/repositories/ICanonicalInvoiceRepository.ts

import { CanonicalInvoiceRecord, PricingAnomalyRecord } from '../../entities';
import { StorablePricingRun } from '../../../reporting/interfaces/services';

/** A stored invoice together with the anomalies its run raised against it. */
export interface StoredInvoice {
    invoice: CanonicalInvoiceRecord;
    anomalies: PricingAnomalyRecord[];
}

/**
 * Data access for persisted pricing runs.
 */
export interface ICanonicalInvoiceRepository {
    /**
     * Stores every invoice and anomaly of one run in a single transaction.
     * @throws {PersistenceError} If the run could not be stored.
     */
    saveRun(run: StorablePricingRun): Promise<void>;

    /**
     * The most recently reconciled copy of an invoice, or null when none was stored.
     */
    findLatestByTransactionId(transactionId: string): Promise<StoredInvoice | null>;
}

export const CANONICAL_INVOICE_REPOSITORY_TOKEN = Symbol.for('ICanonicalInvoiceRepository');
