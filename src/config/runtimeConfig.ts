/**
 * Unified runtime configuration loader.
 *
 * Goals:
 *  - Provide a single parsed, typed surface for environment driven behavior.
 *  - Keep process.env reads out of the services; they receive the parsed config.
 *
 * All variables share the PROMPT_LEDGER_ prefix:
 *  PROFILE, LOG_LEVEL, LOG_JSON, LOG_FILE, LOG_SYNC, VERBOSE, PROTOCOL_LOG,
 *  STORE (memory|file), DATA_DIR, ATOMIC_WRITE_RETRIES, ATOMIC_WRITE_BACKOFF_MS,
 *  SCAN_PATTERNS_FILE, DEFAULT_BRANCH, HISTORY_LIMIT_MAX, MAX_CONTENT_BYTES
 */
import path from 'path';
import { getBooleanEnv, getEnumEnv, getIntEnv, getStringEnv } from '../utils/envUtils';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type StoreKind = 'memory' | 'file';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const STORE_KINDS: readonly StoreKind[] = ['memory', 'file'];

export const ENV_PREFIX = 'PROMPT_LEDGER_';

export interface LoggingConfig {
  level: LogLevel;
  json: boolean;
  sync: boolean;
  verbose: boolean;
  protocol: boolean;
  file?: string;
}

export interface StoreConfig {
  kind: StoreKind;
  dataDir: string;
}

export interface AtomicFsConfig {
  retries: number;
  backoffMs: number;
}

export interface ScannerConfig {
  patternsFile?: string;
}

export interface VersioningConfig {
  defaultBranch: string;
  historyLimitMax: number;
  maxContentBytes: number;
}

export interface RuntimeConfig {
  profile: string;
  logging: LoggingConfig;
  store: StoreConfig;
  atomicFs: AtomicFsConfig;
  scanner: ScannerConfig;
  versioning: VersioningConfig;
}

function envName(suffix: string): string {
  return ENV_PREFIX + suffix;
}

function toAbsolute(raw: string | undefined, fallback: string): string {
  const value = raw && raw.trim().length ? raw.trim() : fallback;
  return path.isAbsolute(value) ? value : path.resolve(process.cwd(), value);
}

function clamp(value: number, min: number, max: number): number {
  if(value < min) return min;
  if(value > max) return max;
  return value;
}

function parseLoggingConfig(env: NodeJS.ProcessEnv): LoggingConfig {
  const rawFile = env[envName('LOG_FILE')];
  return {
    level: getEnumEnv(envName('LOG_LEVEL'), LOG_LEVELS, 'info', env),
    json: getBooleanEnv(envName('LOG_JSON'), false, env),
    sync: getBooleanEnv(envName('LOG_SYNC'), false, env),
    verbose: getBooleanEnv(envName('VERBOSE'), false, env),
    protocol: getBooleanEnv(envName('PROTOCOL_LOG'), false, env),
    file: rawFile && rawFile.trim().length ? toAbsolute(rawFile, rawFile) : undefined,
  };
}

function parseStoreConfig(env: NodeJS.ProcessEnv): StoreConfig {
  return {
    kind: getEnumEnv(envName('STORE'), STORE_KINDS, 'memory', env),
    dataDir: toAbsolute(env[envName('DATA_DIR')], path.join('data', 'store')),
  };
}

function parseAtomicFsConfig(env: NodeJS.ProcessEnv): AtomicFsConfig {
  return {
    retries: clamp(getIntEnv(envName('ATOMIC_WRITE_RETRIES'), 5, env), 1, 20),
    backoffMs: clamp(getIntEnv(envName('ATOMIC_WRITE_BACKOFF_MS'), 10, env), 1, 1000),
  };
}

function parseVersioningConfig(env: NodeJS.ProcessEnv): VersioningConfig {
  return {
    defaultBranch: getStringEnv(envName('DEFAULT_BRANCH'), 'main', env),
    historyLimitMax: clamp(getIntEnv(envName('HISTORY_LIMIT_MAX'), 200, env), 1, 10_000),
    maxContentBytes: Math.max(1024, getIntEnv(envName('MAX_CONTENT_BYTES'), 50 * 1024, env)),
  };
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const patternsFile = env[envName('SCAN_PATTERNS_FILE')];
  return {
    profile: getStringEnv(envName('PROFILE'), 'default', env),
    logging: parseLoggingConfig(env),
    store: parseStoreConfig(env),
    atomicFs: parseAtomicFsConfig(env),
    scanner: { patternsFile: patternsFile && patternsFile.trim().length ? toAbsolute(patternsFile, patternsFile) : undefined },
    versioning: parseVersioningConfig(env),
  };
}

let _cached: RuntimeConfig | undefined;
export function getRuntimeConfig(): RuntimeConfig {
  if(!_cached) _cached = loadRuntimeConfig();
  return _cached;
}
