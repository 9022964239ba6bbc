// src/config/index.ts

import dotenv from 'dotenv';
import { LAUNCH_CONSTANTS } from '../constants/launch-constants';

// Load environment variables
dotenv.config();

export type StoreDriver = 'memory' | 'postgres';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface Config {
  // Storage
  STORE_DRIVER: StoreDriver;
  POSTGRES_HOST: string;
  POSTGRES_PORT: number;
  POSTGRES_USER: string;
  POSTGRES_PASSWORD: string;
  POSTGRES_DB: string;
  DB_POOL_MAX: number;

  // Curve economics
  PLATFORM_FEE_BPS: number;
  DEFAULT_CREATOR_FEE_BPS: number;
  MAX_CREATOR_FEE_BPS: number;
  INITIAL_VIRTUAL_ETH: bigint;
  INITIAL_VIRTUAL_TOKENS: bigint;

  // Chains and callers
  CHAIN_IDS: number[];
  RELAY_IDENTITY: string;
  AUTHORIZED_CALLERS: string[];
  ADMIN_IDENTITY: string;

  // Fan-out
  retry: RetryPolicy;
  FANOUT_CONCURRENCY: number;

  // API
  API_PORT: number;

  // Logging
  LOG_LEVEL: string;
  LOG_TO_FILE: boolean;
}

type Env = Record<string, string | undefined>;

function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

function parseBigInt(value: string | undefined, fallback: bigint, key: string): bigint {
  if (!value) return fallback;
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${key} must be a non-negative integer, got "${value}"`);
  }
  return BigInt(value.trim());
}

function parseStoreDriver(value: string | undefined): StoreDriver {
  const driver = value || 'memory';
  if (driver !== 'memory' && driver !== 'postgres') {
    throw new Error(`Unknown STORE_DRIVER "${driver}"`);
  }
  return driver;
}

export function loadConfig(env: Env = process.env): Config {
  return {
    // Storage
    STORE_DRIVER: parseStoreDriver(env.STORE_DRIVER),
    POSTGRES_HOST: env.POSTGRES_HOST || 'localhost',
    POSTGRES_PORT: parseInt(env.POSTGRES_PORT || '5432'),
    POSTGRES_USER: env.POSTGRES_USER || 'launchpad',
    POSTGRES_PASSWORD: env.POSTGRES_PASSWORD || '',
    POSTGRES_DB: env.POSTGRES_DB || 'launchpad',
    DB_POOL_MAX: parseInt(env.DB_POOL_MAX || '20'),

    // Curve economics
    PLATFORM_FEE_BPS: parseInt(env.PLATFORM_FEE_BPS || String(LAUNCH_CONSTANTS.PLATFORM_FEE_BPS)),
    DEFAULT_CREATOR_FEE_BPS: parseInt(env.DEFAULT_CREATOR_FEE_BPS || String(LAUNCH_CONSTANTS.DEFAULT_CREATOR_FEE_BPS)),
    MAX_CREATOR_FEE_BPS: parseInt(env.MAX_CREATOR_FEE_BPS || String(LAUNCH_CONSTANTS.MAX_CREATOR_FEE_BPS)),
    INITIAL_VIRTUAL_ETH: parseBigInt(env.INITIAL_VIRTUAL_ETH, LAUNCH_CONSTANTS.INITIAL_VIRTUAL_ETH, 'INITIAL_VIRTUAL_ETH'),
    INITIAL_VIRTUAL_TOKENS: parseBigInt(env.INITIAL_VIRTUAL_TOKENS, LAUNCH_CONSTANTS.INITIAL_VIRTUAL_TOKENS, 'INITIAL_VIRTUAL_TOKENS'),

    // Chains and callers
    CHAIN_IDS: parseList(env.CHAIN_IDS).map(id => parseInt(id)),
    RELAY_IDENTITY: (env.RELAY_IDENTITY || '').toLowerCase(),
    AUTHORIZED_CALLERS: parseList(env.AUTHORIZED_CALLERS).map(caller => caller.toLowerCase()),
    ADMIN_IDENTITY: (env.ADMIN_IDENTITY || '').toLowerCase(),

    // Fan-out
    retry: {
      maxAttempts: parseInt(env.RETRY_MAX_ATTEMPTS || '5'),
      baseDelayMs: parseInt(env.RETRY_BASE_DELAY_MS || '500'),
      maxDelayMs: parseInt(env.RETRY_MAX_DELAY_MS || '30000'),
      timeoutMs: parseInt(env.CHAIN_CALL_TIMEOUT_MS || '15000')
    },
    FANOUT_CONCURRENCY: parseInt(env.FANOUT_CONCURRENCY || '8'),

    // API
    API_PORT: parseInt(env.API_PORT || '3001'),

    // Logging
    LOG_LEVEL: env.LOG_LEVEL || 'info',
    LOG_TO_FILE: env.LOG_TO_FILE === 'true'
  };
}

export const config: Config = loadConfig();

// Validate configuration
export function validateConfig(cfg: Config = config): void {
  const problems: string[] = [];

  if (cfg.STORE_DRIVER === 'postgres' && !cfg.POSTGRES_PASSWORD) {
    problems.push('POSTGRES_PASSWORD is required when STORE_DRIVER=postgres');
  }

  const maxFeeBps = Number(LAUNCH_CONSTANTS.BPS_DENOMINATOR);
  if (!Number.isInteger(cfg.PLATFORM_FEE_BPS) || cfg.PLATFORM_FEE_BPS < 0 || cfg.PLATFORM_FEE_BPS >= maxFeeBps) {
    problems.push(`PLATFORM_FEE_BPS must be in [0, ${maxFeeBps})`);
  }
  if (cfg.MAX_CREATOR_FEE_BPS < 0 || cfg.PLATFORM_FEE_BPS + cfg.MAX_CREATOR_FEE_BPS >= maxFeeBps) {
    problems.push('PLATFORM_FEE_BPS + MAX_CREATOR_FEE_BPS must stay below 10000');
  }
  if (cfg.DEFAULT_CREATOR_FEE_BPS < 0 || cfg.DEFAULT_CREATOR_FEE_BPS > cfg.MAX_CREATOR_FEE_BPS) {
    problems.push('DEFAULT_CREATOR_FEE_BPS must be between 0 and MAX_CREATOR_FEE_BPS');
  }

  if (cfg.INITIAL_VIRTUAL_ETH <= 0n || cfg.INITIAL_VIRTUAL_TOKENS <= 0n) {
    problems.push('Initial virtual reserves must be positive');
  } else if (cfg.INITIAL_VIRTUAL_TOKENS <= LAUNCH_CONSTANTS.CURVE_SUPPLY) {
    problems.push(`INITIAL_VIRTUAL_TOKENS must exceed CURVE_SUPPLY (${LAUNCH_CONSTANTS.CURVE_SUPPLY})`);
  }

  if (cfg.CHAIN_IDS.some(id => !Number.isSafeInteger(id) || id <= 0)) {
    problems.push('CHAIN_IDS must be positive integers');
  }

  if (cfg.RELAY_IDENTITY && cfg.AUTHORIZED_CALLERS.length === 0) {
    problems.push('AUTHORIZED_CALLERS must not be empty when RELAY_IDENTITY is set');
  }

  if (cfg.retry.maxAttempts < 1) {
    problems.push('RETRY_MAX_ATTEMPTS must be at least 1');
  }
  if (cfg.retry.baseDelayMs < 0 || cfg.retry.maxDelayMs < cfg.retry.baseDelayMs) {
    problems.push('RETRY_MAX_DELAY_MS must be >= RETRY_BASE_DELAY_MS >= 0');
  }
  if (cfg.retry.timeoutMs <= 0) {
    problems.push('CHAIN_CALL_TIMEOUT_MS must be positive');
  }
  if (cfg.FANOUT_CONCURRENCY < 1) {
    problems.push('FANOUT_CONCURRENCY must be at least 1');
  }

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join('; ')}`);
  }
}
