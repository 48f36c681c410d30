import { readFile, writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import {
  DEFAULT_API_BASE_URL,
  DEFAULT_BATCH_CONCURRENCY,
  DEFAULT_DUE_OFFSET,
  DEFAULT_PAGE_SIZE,
  DEFAULT_REQUEST_TIMEOUT_MS,
  MAX_PAGE_SIZE,
  type LogLevel,
} from '@tasksync/protocol';
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from './retrier.js';
import type { Credentials, TaskSyncConfig } from './types.js';

const DEFAULT_CONFIG_DIR = join(homedir(), '.tasksync');

export const DEFAULT_CONFIG: TaskSyncConfig = {
  configDir: DEFAULT_CONFIG_DIR,
  apiBaseUrl: DEFAULT_API_BASE_URL,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  retry: { ...DEFAULT_RETRY_POLICY },
  batchConcurrency: DEFAULT_BATCH_CONCURRENCY,
  pageSize: DEFAULT_PAGE_SIZE,
  dueOffset: DEFAULT_DUE_OFFSET,
  logLevel: 'info',
};

export type ConfigOverrides = Partial<Omit<TaskSyncConfig, 'configDir' | 'retry'>> & { retry?: Partial<RetryPolicy> };

// ──────────────────────────────────────────────
// Value parsing
// ──────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toText(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function toLogLevel(value: unknown): LogLevel | undefined {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error' ? value : undefined;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function fromFile(raw: Record<string, unknown>): ConfigOverrides {
  const retry: Record<string, unknown> = isRecord(raw.retry) ? raw.retry : {};
  return {
    apiBaseUrl: toText(raw.apiBaseUrl),
    requestTimeoutMs: toNumber(raw.requestTimeoutMs),
    retry: {
      maxAttempts: toNumber(retry.maxAttempts),
      baseDelayMs: toNumber(retry.baseDelayMs),
      maxDelayMs: toNumber(retry.maxDelayMs),
    },
    batchConcurrency: toNumber(raw.batchConcurrency),
    pageSize: toNumber(raw.pageSize),
    dueOffset: toText(raw.dueOffset),
    logLevel: toLogLevel(raw.logLevel),
  };
}

function fromEnv(env: NodeJS.ProcessEnv): ConfigOverrides {
  return {
    apiBaseUrl: toText(env.TASKSYNC_API_BASE_URL),
    requestTimeoutMs: toNumber(env.TASKSYNC_REQUEST_TIMEOUT_MS),
    retry: {
      maxAttempts: toNumber(env.TASKSYNC_MAX_ATTEMPTS),
      baseDelayMs: toNumber(env.TASKSYNC_BASE_DELAY_MS),
      maxDelayMs: toNumber(env.TASKSYNC_MAX_DELAY_MS),
    },
    batchConcurrency: toNumber(env.TASKSYNC_BATCH_CONCURRENCY),
    pageSize: toNumber(env.TASKSYNC_PAGE_SIZE),
    dueOffset: toText(env.TASKSYNC_DUE_OFFSET),
    logLevel: toLogLevel(env.TASKSYNC_LOG_LEVEL),
  };
}

function applyOverrides(base: TaskSyncConfig, overrides: ConfigOverrides): TaskSyncConfig {
  return {
    configDir: base.configDir,
    apiBaseUrl: overrides.apiBaseUrl ?? base.apiBaseUrl,
    requestTimeoutMs: overrides.requestTimeoutMs ?? base.requestTimeoutMs,
    retry: {
      maxAttempts: overrides.retry?.maxAttempts ?? base.retry.maxAttempts,
      baseDelayMs: overrides.retry?.baseDelayMs ?? base.retry.baseDelayMs,
      maxDelayMs: overrides.retry?.maxDelayMs ?? base.retry.maxDelayMs,
    },
    batchConcurrency: overrides.batchConcurrency ?? base.batchConcurrency,
    pageSize: overrides.pageSize ?? base.pageSize,
    dueOffset: overrides.dueOffset ?? base.dueOffset,
    logLevel: overrides.logLevel ?? base.logLevel,
  };
}

function normalize(config: TaskSyncConfig): TaskSyncConfig {
  return {
    ...config,
    apiBaseUrl: config.apiBaseUrl.replace(/\/+$/, ''),
    retry: {
      maxAttempts: Math.max(1, Math.floor(config.retry.maxAttempts)),
      baseDelayMs: Math.max(0, config.retry.baseDelayMs),
      maxDelayMs: Math.max(0, config.retry.maxDelayMs),
    },
    batchConcurrency: Math.max(1, Math.floor(config.batchConcurrency)),
    pageSize: Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(config.pageSize))),
  };
}

async function readJson(path: string): Promise<Record<string, unknown> | null> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${path}: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (!isRecord(parsed)) {
    throw new Error(`Expected a JSON object in ${path}`);
  }
  return parsed;
}

// ──────────────────────────────────────────────
// Public API
// ──────────────────────────────────────────────

export async function ensureConfigDir(configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await mkdir(configDir, { recursive: true });
}

/**
 * Load configuration: defaults, then config.json, then TASKSYNC_*
 * environment variables. A missing file is not an error.
 */
export async function loadConfig(
  configDir: string = DEFAULT_CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TaskSyncConfig> {
  const fileConfig = await readJson(join(configDir, 'config.json'));
  let config: TaskSyncConfig = { ...DEFAULT_CONFIG, retry: { ...DEFAULT_CONFIG.retry }, configDir };
  if (fileConfig) config = applyOverrides(config, fromFile(fileConfig));
  config = applyOverrides(config, fromEnv(env));
  return normalize(config);
}

export async function saveConfig(
  config: ConfigOverrides,
  configDir: string = DEFAULT_CONFIG_DIR,
): Promise<void> {
  await ensureConfigDir(configDir);
  const configPath = join(configDir, 'config.json');
  const existing: Record<string, unknown> = (await readJson(configPath)) ?? {};
  const current = normalize(applyOverrides({ ...DEFAULT_CONFIG, configDir }, fromFile(existing)));
  const { configDir: _dir, ...merged } = normalize(applyOverrides(current, config));
  await writeFile(configPath, JSON.stringify(merged, null, 2), 'utf-8');
}

export async function loadCredentials(
  configDir: string = DEFAULT_CONFIG_DIR,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Credentials> {
  const stored: Record<string, unknown> = (await readJson(join(configDir, 'credentials.json'))) ?? {};
  return {
    accessToken: toText(env.TASKSYNC_ACCESS_TOKEN) ?? toText(stored.accessToken),
    appId: toText(env.TASKSYNC_APP_ID) ?? toText(stored.appId),
    appSecret: toText(env.TASKSYNC_APP_SECRET) ?? toText(stored.appSecret),
  };
}

export async function saveCredentials(creds: Credentials, configDir: string = DEFAULT_CONFIG_DIR): Promise<void> {
  await ensureConfigDir(configDir);
  const credPath = join(configDir, 'credentials.json');
  await writeFile(credPath, JSON.stringify(creds, null, 2), { mode: 0o600 });
}
