// src/main.ts

import 'reflect-metadata';
import config, { describeConfig } from './config';
import { registerDependencies } from './register';

// Before anything resolves from the container
registerDependencies();

import { container } from 'tsyringe';
import { Logger } from 'winston';
import { errorMessage } from './core/common/errors';
import { AppDataSource } from './infrastructure/database/providers/data-source.provider';
import { LOGGER_TOKEN } from './infrastructure/logger';
import { Server } from './infrastructure/webserver/server';

async function bootstrap(): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);

    try {
        logger.info(`Application starting in ${config.nodeEnv} mode...`);
        describeConfig(config).forEach(line => logger.info(line));

        const dataSourceProvider = container.resolve(AppDataSource);
        if (dataSourceProvider.enabled) {
            logger.info('Initializing database connection...');
            await dataSourceProvider.init();
            logger.info('Database connection initialized successfully.');
        } else {
            logger.warn('Database disabled; persistence endpoints will answer 503.');
        }

        // Routes resolve their controllers at import time, so the server is resolved last.
        const server = container.resolve(Server);
        await server.start(config.port);
    } catch (error) {
        logger.error('Failed to bootstrap application:', {
            message: errorMessage(error),
            stack: error instanceof Error ? error.stack : undefined,
        });
        process.exit(1);
    }
}

async function gracefulShutdown(signal: string): Promise<void> {
    const logger = container.resolve<Logger>(LOGGER_TOKEN);
    const server = container.resolve(Server);
    const dataSourceProvider = container.resolve(AppDataSource);

    logger.warn(`Received ${signal}. Initiating graceful shutdown...`);

    try {
        await server.stop();
        await dataSourceProvider.close();
        logger.info('Application shut down gracefully.');
        process.exit(0);
    } catch (error) {
        logger.error(`Error during graceful shutdown: ${errorMessage(error)}`);
        process.exit(1);
    }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

void bootstrap();
