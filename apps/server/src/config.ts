import type { LevelWithSilent } from 'pino';
import { DEFAULT_SEARCH_CONCURRENCY, DEFAULT_SEARCH_TIMEOUT_MS, DEFAULT_SESSION_TTL_MS, DEFAULT_USER_AGENT } from '@trawl/search';
import { DEFAULT_SERVICE_NAME, parseLogLevel } from './observability/logger.js';
import { PORTAL_IDS, type PortalId } from './portals.js';

export const TRANSPORTS = ['http', 'stdio'] as const;
export type Transport = (typeof TRANSPORTS)[number];

export interface AppConfig {
  portal: PortalId;
  transport: Transport;
  host: string;
  port: number;
  userAgent: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  searchTimeoutMs: number;
  searchConcurrency: number;
  sessionTtlMs: number;
  sessionSweepIntervalMs: number;
  logLevel: LevelWithSilent;
  serviceName: string;
}

type Env = Record<string, string | undefined>;

function readIntEnv(env: Env, name: string, fallback: number, min = 1): number {
  const raw = env[name];
  if (!raw) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < min) {
    return fallback;
  }

  return Math.floor(parsed);
}

function readStringEnv(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

function readChoiceEnv<T extends string>(env: Env, name: string, choices: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) {
    return fallback;
  }

  const choice = choices.find((candidate) => candidate === raw);
  if (!choice) {
    throw new Error(`${name} must be one of: ${choices.join(', ')} (got "${raw}")`);
  }

  return choice;
}

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    portal: readChoiceEnv(env, 'PORTAL', PORTAL_IDS, 'stepstone'),
    transport: readChoiceEnv(env, 'TRANSPORT', TRANSPORTS, 'http'),
    host: readStringEnv(env, 'HOST', '127.0.0.1'),
    port: readIntEnv(env, 'PORT', 8080, 0),
    userAgent: readStringEnv(env, 'USER_AGENT', DEFAULT_USER_AGENT),
    requestTimeoutMs: readIntEnv(env, 'REQUEST_TIMEOUT_MS', 10_000),
    maxRetries: readIntEnv(env, 'MAX_RETRIES', 3, 0),
    retryBackoffMs: readIntEnv(env, 'RETRY_BACKOFF_MS', 500, 0),
    searchTimeoutMs: readIntEnv(env, 'SEARCH_TIMEOUT_MS', DEFAULT_SEARCH_TIMEOUT_MS),
    searchConcurrency: readIntEnv(env, 'SEARCH_CONCURRENCY', DEFAULT_SEARCH_CONCURRENCY),
    sessionTtlMs: readIntEnv(env, 'SESSION_TTL_MS', DEFAULT_SESSION_TTL_MS),
    sessionSweepIntervalMs: readIntEnv(env, 'SESSION_SWEEP_INTERVAL_MS', 5 * 60 * 1000),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    serviceName: readStringEnv(env, 'LOG_SERVICE_NAME', DEFAULT_SERVICE_NAME),
  };
}
