// Configuration Constants for the Rebalancing Engine

import dotenv from 'dotenv';
dotenv.config();

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

function readLogLevel(value: string | undefined): LogLevel {
    switch (value) {
        case 'error':
        case 'warn':
        case 'info':
        case 'debug':
            return value;
        default:
            return 'info';
    }
}

export const REBALANCE_CONFIG = {
    // Logging
    LOG_LEVEL: readLogLevel(process.env.LOG_LEVEL),
    SILENT_LOGS: process.env.NODE_ENV === 'test',

    // Used when the portfolio configuration has no min_trade_volume of its own
    DEFAULT_MIN_TRADE_VOLUME: process.env.REBALANCE_MIN_TRADE_VOLUME || '0',

    // Throw ReconciliationFailure instead of returning it
    STRICT_MODE: process.env.REBALANCE_STRICT === 'true',

    // ═══════════════════════════════════════════════════════════════════════════
    // DECIMAL CONTEXT
    // All monetary arithmetic goes through one bignumber.js clone so that
    // nothing in the engine ever touches binary floating point.
    // ═══════════════════════════════════════════════════════════════════════════
    DECIMAL_PLACES: 28,

    // Report formatting
    REPORT_AMOUNT_DECIMALS: 2,
    REPORT_INDENT: '  ',
} as const;
