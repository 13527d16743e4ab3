// src/infrastructure/webserver/middleware/upload.middleware.ts
import multer from 'multer';
import { FileParsingError } from '../../../core/common/errors';

// Buffers go straight to the parser; nothing touches disk
const storage = multer.memoryStorage();

const ALLOWED_MIMES = [
    'application/vnd.ms-excel', // .xls, and .csv from some browsers
    'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet', // .xlsx
    'application/json',
    'text/csv',
];

// Only the mimetype is inspected; the extension is not trusted
export const fileFilter = (_req: unknown, file: Pick<Express.Multer.File, 'mimetype'>, cb: multer.FileFilterCallback) => {
    if (ALLOWED_MIMES.includes(file.mimetype)) {
        cb(null, true);
    } else {
        cb(new FileParsingError(`Invalid file type: ${file.mimetype}. Only Excel (.xls, .xlsx), CSV and JSON are allowed.`));
    }
};

const upload = multer({
    storage: storage,
    fileFilter: fileFilter,
    limits: {
        fileSize: 20 * 1024 * 1024, // 20 MB
    }
});

/**
 * Expects 'lineItems', 'discounts' and 'taxes'; 'customers' is optional.
 */
export const uploadPricingFiles = upload.fields([
    { name: 'lineItems', maxCount: 1 },
    { name: 'discounts', maxCount: 1 },
    { name: 'taxes', maxCount: 1 },
    { name: 'customers', maxCount: 1 },
]);
