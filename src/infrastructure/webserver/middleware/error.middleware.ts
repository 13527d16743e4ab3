// src/infrastructure/webserver/middleware/error.middleware.ts
import { NextFunction, Request, Response } from 'express';
import { MulterError } from 'multer';
import { container } from 'tsyringe';
import { Logger } from 'winston';
import config, { NodeEnv } from '../../../config';
import { AppError } from '../../../core/common/errors';
import { LOGGER_TOKEN } from '../../logger';

export interface ErrorResponseBody {
    message: string;
    error?: string;
    stack?: string;
}

export interface ErrorResponse {
    statusCode: number;
    body: ErrorResponseBody;
}

/**
 * Maps an error to the status code and JSON body the API answers with.
 * Only operational AppErrors expose their own message and status.
 */
export function toErrorResponse(err: Error, nodeEnv: NodeEnv = config.nodeEnv): ErrorResponse {
    let statusCode = 500;
    let message = 'An unexpected internal server error occurred.';

    if (err instanceof AppError && err.isOperational) {
        statusCode = err.statusCode;
        message = err.message;
    }
    // Upload limits, unexpected field names
    else if (err instanceof MulterError) {
        statusCode = 400;
        message = `File upload error: ${err.message}`;
    }
    // express.json() attaches the raw body to its SyntaxError
    else if (err instanceof SyntaxError && 'body' in err) {
        statusCode = 400;
        message = 'Malformed JSON body.';
    }

    const body: ErrorResponseBody = { message };

    // Stack traces stay out of production responses
    if (nodeEnv !== 'production') {
        body.error = err.message;
        body.stack = err.stack;
    }

    return { statusCode, body };
}

/**
 * Express error handling middleware function.
 * Must be registered AFTER all other routes and middleware.
 */
export const errorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction // four parameters mark this as an error handler
): void => {
    // Resolved per call so errors raised during startup still get logged
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    logger.error(`[ErrorHandler] ${err.name}: ${err.message}`, {
        error: {
            name: err.name,
            message: err.message,
            stack: err.stack,
            ...(err instanceof AppError && {
                statusCode: err.statusCode,
                isOperational: err.isOperational,
            }),
        },
        request: {
            method: req.method,
            url: req.originalUrl,
            ip: req.ip,
            // body left out: uploads are large and may hold customer data
        },
    });

    if (res.headersSent) {
       // e.g. an export that failed mid-stream
       logger.warn('[ErrorHandler] Headers already sent, cannot send error response.');
       return;
    }

    const { statusCode, body } = toErrorResponse(err);
    res.status(statusCode).json(body);
};
