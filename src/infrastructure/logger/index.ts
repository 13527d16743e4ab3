// src/infrastructure/logger/index.ts
import winston from 'winston';
import config, { AppConfig } from '../../config';

export const LOGGER_TOKEN = Symbol.for('AppLogger');

/**
 * Builds the application logger. JSON lines in production, colourized text in
 * development, and silent under test runs.
 */
export const createAppLogger = (cfg: AppConfig = config): winston.Logger => {
    const logFormat = winston.format.combine(
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.errors({ stack: true }),
        cfg.nodeEnv === 'production'
            ? winston.format.json()
            : winston.format.printf(info => `${info.timestamp} ${info.level}: ${info.message} ${info.stack ? '\n' + info.stack : ''}`)
    );

    const transports: winston.transport[] = [
        new winston.transports.Console({
            format: cfg.nodeEnv === 'development'
                ? winston.format.combine(
                    winston.format.colorize(),
                    logFormat
                )
                : logFormat,
            level: cfg.logLevel,
            handleExceptions: true,
            handleRejections: true,
        }),
    ];

    const logger = winston.createLogger({
        level: cfg.logLevel,
        format: logFormat,
        transports: transports,
        silent: cfg.nodeEnv === 'test',
        exitOnError: false,
    });

    logger.info(`Logger initialized in ${cfg.nodeEnv} mode (Level: ${cfg.logLevel}).`);
    return logger;
};

const loggerInstance = createAppLogger();

export default loggerInstance;
