// src/infrastructure/webserver/routes/pricing.routes.ts
import { Router } from 'express';
import { container } from 'tsyringe';
import { PricingController } from '../controllers/pricing.controller';
import { uploadPricingFiles } from '../middleware/upload.middleware';

const router = Router();

const pricingController = container.resolve(PricingController);

// POST /api/pricing/reconcile - Upload line items, discounts, taxes (and optionally customers)
router.post('/reconcile', uploadPricingFiles, pricingController.handleReconcile);

// POST /api/pricing/reconcile/export - Same uploads, Excel report back
router.post('/reconcile/export', uploadPricingFiles, pricingController.handleExport);

// POST /api/pricing/reconcile/persist - Same uploads, stored under a new run id
router.post('/reconcile/persist', uploadPricingFiles, pricingController.handlePersist);

// GET /api/pricing/invoices/:transactionId - Latest stored copy of an invoice
router.get('/invoices/:transactionId', pricingController.handleGetInvoice);

export default router;
