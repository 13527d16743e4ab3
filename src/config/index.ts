// src/config/index.ts
import { ConfigurationError } from '../core/common/errors';

// --- Interfaces ---

export type NodeEnv = 'development' | 'production' | 'test';
export type LogLevel = 'error' | 'warn' | 'info' | 'http' | 'verbose' | 'debug' | 'silly';
export type DiscountTieBreak = 'lowest-coupon-code' | 'highest-discount' | 'lowest-discount';

/** How "NN/NN/YYYY" and "NN-NN-YYYY" dates are read; 'unambiguous' rejects 05/01/2019 and accepts 13/01/2019. */
export type DateOrder = 'day-first' | 'month-first' | 'unambiguous';

export const DISCOUNT_TIE_BREAKS: readonly DiscountTieBreak[] = ['lowest-coupon-code', 'highest-discount', 'lowest-discount'];
export const DATE_ORDERS: readonly DateOrder[] = ['day-first', 'month-first', 'unambiguous'];

interface DatabaseConfig {
    readonly enabled: boolean;
    readonly type: 'mssql';
    readonly host: string;
    readonly port: number;
    readonly username: string;
    readonly password?: string;
    readonly database: string;
    readonly synchronize: boolean;
    readonly logging: boolean;
}

export interface PricingConfig {
    /** Delivery-to-base-price percentage at or above which an invoice is flagged */
    readonly deliveryRatioThresholdPct: number;
    /** Decimal places for reported currency values */
    readonly currencyPrecision: number;
    readonly discountTieBreak: DiscountTieBreak;
    /** Absolute delivery charge at or above which an invoice is listed for review */
    readonly highDeliveryAmount: number;
    /** Transaction ids reconciled per partition */
    readonly partitionSize: number;
}

export interface IngestionConfig {
    readonly dateOrder: DateOrder;
}

export interface AppConfig {
    readonly nodeEnv: NodeEnv;
    readonly port: number;
    readonly logLevel: LogLevel;
    readonly pricing: PricingConfig;
    readonly ingestion: IngestionConfig;
    readonly database: DatabaseConfig;
}

// --- Helper Functions ---
function parseIntEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueInt = Number(valueStr);
        if (Number.isInteger(valueInt)) {
            return valueInt;
        }
        throw new ConfigurationError(`Invalid integer format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseFloatEnv(varName: string, defaultValue?: number): number {
    const valueStr = process.env[varName];
    if (valueStr) {
        const valueFloat = parseFloat(valueStr);
        if (!isNaN(valueFloat)) {
            return valueFloat;
        }
        throw new ConfigurationError(`Invalid float format for environment variable ${varName}: ${valueStr}`);
    }
    if (defaultValue !== undefined) {
        return defaultValue;
    }
    throw new ConfigurationError(`Missing required environment variable: ${varName}`);
}

function parseBooleanEnv(varName: string, defaultValue: boolean): boolean {
    const valueStr = process.env[varName];
    if (valueStr === undefined || valueStr === '') {
        return defaultValue;
    }
    return valueStr.trim().toLowerCase() === 'true';
}

function parseEnumEnv<T extends string>(varName: string, allowed: readonly T[], defaultValue: T): T {
    const valueStr = process.env[varName];
    if (!valueStr) {
        return defaultValue;
    }
    const match = allowed.find(candidate => candidate === valueStr);
    if (match === undefined) {
        throw new ConfigurationError(`Invalid value for ${varName}: ${valueStr}. Expected one of: ${allowed.join(', ')}`);
    }
    return match;
}

const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

// --- Load, Validate, and Export Configuration ---
export function loadConfig(): AppConfig {
    const loaded: AppConfig = {
        nodeEnv: parseEnumEnv('NODE_ENV', NODE_ENVS, 'development'),
        port: parseIntEnv('APP_PORT', 3000),
        logLevel: parseEnumEnv('LOG_LEVEL', LOG_LEVELS, 'info'),

        pricing: {
            deliveryRatioThresholdPct: parseFloatEnv('PRICING_DELIVERY_RATIO_THRESHOLD_PCT', 100),
            currencyPrecision: parseIntEnv('PRICING_CURRENCY_PRECISION', 2),
            discountTieBreak: parseEnumEnv('PRICING_DISCOUNT_TIE_BREAK', DISCOUNT_TIE_BREAKS, 'lowest-coupon-code'),
            highDeliveryAmount: parseFloatEnv('PRICING_HIGH_DELIVERY_AMOUNT', 500),
            partitionSize: parseIntEnv('PRICING_PARTITION_SIZE', 500),
        },

        ingestion: {
            dateOrder: parseEnumEnv('INGEST_DATE_ORDER', DATE_ORDERS, 'unambiguous'),
        },

        database: {
            enabled: parseBooleanEnv('DB_ENABLED', false),
            type: 'mssql',
            host: process.env.DB_HOST || 'localhost',
            port: parseIntEnv('DB_PORT', 1433),
            username: process.env.DB_USER || 'sa',
            password: process.env.DB_PASS,
            database: process.env.DB_NAME || 'sales_pricing',
            synchronize: parseBooleanEnv('DB_SYNCHRONIZE', false),
            logging: parseBooleanEnv('DB_LOGGING', false),
        },
    };

    // --- Validation ---
    if (loaded.pricing.currencyPrecision < 0 || loaded.pricing.currencyPrecision > 6) {
        throw new ConfigurationError(`PRICING_CURRENCY_PRECISION must be between 0 and 6, got ${loaded.pricing.currencyPrecision}`);
    }
    if (loaded.pricing.deliveryRatioThresholdPct < 0) {
        throw new ConfigurationError('PRICING_DELIVERY_RATIO_THRESHOLD_PCT must not be negative');
    }
    if (loaded.pricing.highDeliveryAmount < 0) {
        throw new ConfigurationError('PRICING_HIGH_DELIVERY_AMOUNT must not be negative');
    }
    if (loaded.pricing.partitionSize < 1) {
        throw new ConfigurationError('PRICING_PARTITION_SIZE must be at least 1');
    }
    if (loaded.database.enabled && !loaded.database.password) {
        throw new ConfigurationError('DB_PASS is required when DB_ENABLED=true');
    }

    // --- Freeze Configuration ---
    Object.freeze(loaded.pricing);
    Object.freeze(loaded.ingestion);
    Object.freeze(loaded.database);
    return Object.freeze(loaded);
}

/** Lines describing the effective configuration, with secrets left out. */
export function describeConfig(cfg: AppConfig): string[] {
    return [
        '-------------------- Configuration Loaded --------------------',
        `NODE_ENV: ${cfg.nodeEnv}`,
        `PORT: ${cfg.port}`,
        `LOG_LEVEL: ${cfg.logLevel}`,
        `Delivery Ratio Threshold (%): ${cfg.pricing.deliveryRatioThresholdPct}`,
        `Currency Precision: ${cfg.pricing.currencyPrecision}`,
        `Discount Tie-Break: ${cfg.pricing.discountTieBreak}`,
        `High Delivery Amount: ${cfg.pricing.highDeliveryAmount}`,
        `Partition Size: ${cfg.pricing.partitionSize}`,
        `Date Order: ${cfg.ingestion.dateOrder}`,
        `DB Enabled: ${cfg.database.enabled}`,
        `DB Host: ${cfg.database.host}:${cfg.database.port}`,
        `DB Name: ${cfg.database.database}`,
        '--------------------------------------------------------------',
    ];
}

const config = loadConfig();

export default config;
