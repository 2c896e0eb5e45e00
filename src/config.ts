import 'dotenv/config';
import { deriveOracleKey } from './crypto';

// This module is responsible for loading and validating environment variables.
// It will throw an error and prevent the app from starting if critical variables are missing.

const oracleSecret = process.env.ORACLE_SECRET;
if (!oracleSecret) {
    throw new Error('ORACLE_SECRET environment variable is not set. Please create a .env file.');
}

function readInt(name: string, fallback: number, min = 0): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    if (!Number.isSafeInteger(value) || value < min) {
        throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
    }
    return value;
}

function readFlag(name: string, fallback: boolean): boolean {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    return raw === '1' || raw === 'true' || raw === 'yes';
}

export const config = {
    port: readInt('PORT', 3000),

    // Raffle parameters, fixed for the lifetime of the process.
    entranceFee: readInt('ENTRANCE_FEE', 10_000, 1),
    drawIntervalMs: readInt('DRAW_INTERVAL_SECONDS', 30) * 1000,

    // Oracle request parameters (gas lane, subscription, callback limit).
    keyHash: process.env.VRF_KEY_HASH || '0x474e34a077df58807dbe9c96d3c009b23b3c6d0cce433e59bbf5b34f823bc56c',
    subscriptionId: readInt('VRF_SUBSCRIPTION_ID', 1),
    callbackGasLimit: readInt('CALLBACK_GAS_LIMIT', 500_000, 1),
    // Simulated block time for the local coordinator: fulfillment waits confirmations * blockTimeMs.
    blockTimeMs: readInt('BLOCK_TIME_MS', 2_000),

    keeperEnabled: readFlag('KEEPER_ENABLED', true),
    keeperCron: process.env.KEEPER_CRON || '*/5 * * * * *',

    // Empty disables the operator-only routes.
    operatorToken: process.env.OPERATOR_TOKEN || '',
};

/**
 * The key the local coordinator derives random words from, derived from ORACLE_SECRET.
 */
export const oracleKey = deriveOracleKey(oracleSecret);
