/**
 * Replica configuration
 *
 * Values come from the environment, with a `.env` file loaded through dotenv.
 *
 * @module config
 */

import * as dotenv from 'dotenv';
import { LogLevel, configureLogger, createLogger, parseLogLevel } from '../utils/logger.js';

const logger = createLogger('config');

export interface ReplicaConfig {
  /** Directory holding the local LevelDB store */
  dataDir: string;
  logLevel: LogLevel;
  logJson: boolean;
  /** PBKDF2 iterations for master key derivation */
  kdfIterations: number;
  /** Remote timestamps further ahead of the wall clock than this are logged */
  maxClockSkewMs: number;
  /** History fetched on an account's first bank sync */
  bankSyncLookbackDays: number;
  /** Date distance allowed when fuzzy-matching imported transactions */
  fuzzyMatchWindowDays: number;
}

export const DEFAULT_CONFIG: ReplicaConfig = {
  dataDir: './data',
  logLevel: LogLevel.INFO,
  logJson: false,
  kdfIterations: 10_000,
  maxClockSkewMs: 5 * 60 * 1000,
  bankSyncLookbackDays: 90,
  fuzzyMatchWindowDays: 7,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, min: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    logger.warn(`Ignoring invalid ${key}, using default`, { value: raw, default: fallback });
    return fallback;
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

/**
 * Build a config from an environment map. Pure: no file access.
 */
export function configFromEnv(env: Env): ReplicaConfig {
  let logLevel = DEFAULT_CONFIG.logLevel;
  const rawLevel = env.LEDGER_LOG_LEVEL;
  if (rawLevel !== undefined && rawLevel.trim() !== '') {
    const parsed = parseLogLevel(rawLevel);
    if (parsed === null) {
      logger.warn('Ignoring invalid LEDGER_LOG_LEVEL, using default', { value: rawLevel });
    } else {
      logLevel = parsed;
    }
  }

  return {
    dataDir: env.LEDGER_DATA_DIR?.trim() || DEFAULT_CONFIG.dataDir,
    logLevel,
    logJson: readBool(env, 'LEDGER_LOG_JSON', DEFAULT_CONFIG.logJson),
    kdfIterations: readInt(env, 'LEDGER_KDF_ITERATIONS', DEFAULT_CONFIG.kdfIterations, 1),
    maxClockSkewMs: readInt(env, 'LEDGER_MAX_CLOCK_SKEW_MS', DEFAULT_CONFIG.maxClockSkewMs, 0),
    bankSyncLookbackDays: readInt(env, 'LEDGER_BANK_LOOKBACK_DAYS', DEFAULT_CONFIG.bankSyncLookbackDays, 1),
    fuzzyMatchWindowDays: readInt(env, 'LEDGER_MATCH_WINDOW_DAYS', DEFAULT_CONFIG.fuzzyMatchWindowDays, 0),
  };
}

/**
 * Load `.env` into the process environment, build the config and apply its
 * logging settings.
 */
export function loadConfig(env: Env = process.env): ReplicaConfig {
  dotenv.config();
  const config = configFromEnv(env);
  configureLogger({ level: config.logLevel, json: config.logJson });
  return config;
}
