// src/core/common/errors.ts

/**
 * Base class for custom application errors.
 * Allows for operational errors (expected, like validation) vs programmer errors.
 */
export class AppError extends Error {
    public readonly statusCode: number;
    public readonly isOperational: boolean;

    constructor(
        name: string,
        message: string,
        statusCode: number = 500,
        isOperational: boolean = true
        ) {
        super(message);
        this.name = name;
        this.statusCode = statusCode;
        this.isOperational = isOperational;

        // Maintain proper stack trace (only available on V8)
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, this.constructor);
        }

        // Set the prototype explicitly for extending built-in classes
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

// --- Startup ---

/**
 * Error for issues during configuration loading or validation.
 */
export class ConfigurationError extends AppError {
    constructor(message: string) {
        // Configuration errors prevent startup; never operational.
        super('ConfigurationError', message, 500, false);
    }
}

// --- Request and ingestion ---

/**
 * Error for request or ingestion validation failures.
 */
export class ValidationError extends AppError {
    constructor(message: string = 'Data validation failed') {
        super('ValidationError', message, 400, true);
    }
}

/**
 * Error for resources not found.
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super('NotFoundError', message, 404, true);
    }
}

/**
 * Error specifically for failures during file parsing.
 */
export class FileParsingError extends AppError {
    constructor(message: string, originalError?: Error) {
        const fullMessage = originalError
            ? `${message}: ${originalError.message}`
            : message;
        super('FileParsingError', fullMessage, 400, true);
        // Point at the parser failure, not at this wrapper
        if (originalError) {
            this.stack = originalError.stack;
        }
    }
}

// --- Reconciliation and storage ---

/**
 * A single line item that cannot take part in invoice aggregation.
 * Raised and caught per record; it never aborts a batch.
 */
export class MalformedRecordError extends AppError {
    public readonly reasons: string[];

    constructor(reasons: string[]) {
        super('MalformedRecordError', `Malformed record: ${reasons.join('; ')}`, 422, true);
        this.reasons = reasons;
    }
}

/**
 * Storage of canonical invoices or anomalies failed or is not configured.
 */
export class PersistenceError extends AppError {
    constructor(message: string, statusCode: number = 500) {
        // 503 (disabled or unreachable) is reported to clients; anything else is a 500
        super('PersistenceError', message, statusCode, statusCode === 503);
    }
}

/** Best-effort message extraction for values caught as `unknown`. */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
