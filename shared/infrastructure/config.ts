/**
 * Configuration module for docs-librarian
 *
 * Loads configuration from defaults, config files and environment variables,
 * in that order of precedence (later sources win).
 */

import fs from 'fs';
import path from 'path';
import os from 'os';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../domain/errors.js';

const configSchema = z.object({
  /** Base directory for data storage (logs) */
  dataDir: z.string().min(1),

  logLevel: z.enum(['debug', 'info', 'warn', 'error']),

  /** Write logs to `<dataDir>/logs` instead of stderr */
  logToFile: z.boolean(),

  /** Maximum number of pages downloaded at once */
  maxConcurrentRequests: z.number().int().positive(),

  http: z.object({
    userAgent: z.string().min(1),
    timeoutMs: z.number().int().positive(),
    retries: z.number().int().nonnegative(),
    retryDelayMs: z.number().int().nonnegative(),
    /** Requests per minute and host */
    rateLimit: z.number().int().positive()
  }),

  index: z.object({
    qdrantUrl: z.string().url(),
    collectionName: z.string().min(1),
    /** Timeout applied to every index service call */
    callTimeoutMs: z.number().int().positive(),
    browsePageSize: z.number().int().positive()
  }),

  /** Priority given to sites indexed without an explicit one */
  defaultPriority: z.number().int()
});

export type LibrarianConfig = z.infer<typeof configSchema>;

const fileConfigSchema = configSchema.deepPartial();

type FileConfig = z.infer<typeof fileConfigSchema>;

export interface LoadConfigOptions {
  /** Environment to read LIBRARIAN_* variables from */
  env?: NodeJS.ProcessEnv;

  /** Directory searched for docs-librarian.config.json */
  cwd?: string;

  /** Home directory holding .docs-librarian/config.json */
  homeDir?: string;
}

function defaultConfig(homeDir: string): LibrarianConfig {
  return {
    dataDir: path.join(homeDir, '.docs-librarian'),
    logLevel: 'info',
    logToFile: false,
    maxConcurrentRequests: 5,
    http: {
      userAgent: 'docs-librarian/1.0',
      timeoutMs: 10000,
      retries: 3,
      retryDelayMs: 1000,
      rateLimit: 120
    },
    index: {
      qdrantUrl: 'http://localhost:6333',
      collectionName: 'docs_librarian',
      callTimeoutMs: 30000,
      browsePageSize: 1000
    },
    defaultPriority: 0
  };
}

// Load a config file; a missing file contributes nothing
function loadConfigFromFile(filePath: string): FileConfig {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`cannot parse ${filePath}`, { cause: error instanceof Error ? error.message : String(error) });
  }

  const result = fileConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`invalid values in ${filePath}`, { issues: result.error.issues });
  }
  return result.data;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function toBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return value === 'true' || value === '1';
}

function loadConfigFromEnv(env: NodeJS.ProcessEnv): FileConfig {
  return {
    dataDir: env.LIBRARIAN_DATA_DIR,
    logLevel: env.LIBRARIAN_LOG_LEVEL === undefined ? undefined : parseEnvLogLevel(env.LIBRARIAN_LOG_LEVEL),
    logToFile: toBoolean(env.LIBRARIAN_LOG_TO_FILE),
    maxConcurrentRequests: toNumber(env.LIBRARIAN_MAX_CONCURRENT_REQUESTS),
    http: {
      userAgent: env.LIBRARIAN_HTTP_USER_AGENT,
      timeoutMs: toNumber(env.LIBRARIAN_HTTP_TIMEOUT_MS),
      retries: toNumber(env.LIBRARIAN_HTTP_RETRIES),
      retryDelayMs: toNumber(env.LIBRARIAN_HTTP_RETRY_DELAY_MS),
      rateLimit: toNumber(env.LIBRARIAN_HTTP_RATE_LIMIT)
    },
    index: {
      qdrantUrl: env.LIBRARIAN_QDRANT_URL,
      collectionName: env.LIBRARIAN_INDEX_COLLECTION,
      callTimeoutMs: toNumber(env.LIBRARIAN_INDEX_CALL_TIMEOUT_MS),
      browsePageSize: toNumber(env.LIBRARIAN_INDEX_BROWSE_PAGE_SIZE)
    },
    defaultPriority: toNumber(env.LIBRARIAN_DEFAULT_PRIORITY)
  };
}

function parseEnvLogLevel(value: string): LibrarianConfig['logLevel'] {
  const result = configSchema.shape.logLevel.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new ConfigurationError(`LIBRARIAN_LOG_LEVEL must be one of debug, info, warn, error (got '${value}')`);
  }
  return result.data;
}

// Later layers win field by field; undefined fields fall through
function merge(base: FileConfig, override: FileConfig): FileConfig {
  return {
    dataDir: override.dataDir ?? base.dataDir,
    logLevel: override.logLevel ?? base.logLevel,
    logToFile: override.logToFile ?? base.logToFile,
    maxConcurrentRequests: override.maxConcurrentRequests ?? base.maxConcurrentRequests,
    http: {
      userAgent: override.http?.userAgent ?? base.http?.userAgent,
      timeoutMs: override.http?.timeoutMs ?? base.http?.timeoutMs,
      retries: override.http?.retries ?? base.http?.retries,
      retryDelayMs: override.http?.retryDelayMs ?? base.http?.retryDelayMs,
      rateLimit: override.http?.rateLimit ?? base.http?.rateLimit
    },
    index: {
      qdrantUrl: override.index?.qdrantUrl ?? base.index?.qdrantUrl,
      collectionName: override.index?.collectionName ?? base.index?.collectionName,
      callTimeoutMs: override.index?.callTimeoutMs ?? base.index?.callTimeoutMs,
      browsePageSize: override.index?.browsePageSize ?? base.index?.browsePageSize
    },
    defaultPriority: override.defaultPriority ?? base.defaultPriority
  };
}

/**
 * Load and validate the configuration.
 * Precedence: defaults < ~/.docs-librarian/config.json < ./docs-librarian.config.json < environment
 * @throws ConfigurationError when a source holds an invalid value
 */
export function loadConfig(options: LoadConfigOptions = {}): LibrarianConfig {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const cwd = options.cwd ?? process.cwd();

  const layers = [
    loadConfigFromFile(path.join(homeDir, '.docs-librarian', 'config.json')),
    loadConfigFromFile(path.join(cwd, 'docs-librarian.config.json')),
    loadConfigFromEnv(env)
  ];
  const merged = layers.reduce<FileConfig>((acc, layer) => merge(acc, layer), defaultConfig(homeDir));

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`${issue ? issue.path.join('.') : 'config'}: ${issue ? issue.message : 'invalid'}`, {
      issues: result.error.issues
    });
  }
  return result.data;
}

let config: LibrarianConfig | undefined;

/**
 * Get the process configuration, loading it (and .env) on first use
 */
export function getConfig(): LibrarianConfig {
  if (!config) {
    dotenv.config();
    config = loadConfig();
  }
  return config;
}

/**
 * Reload configuration from all sources
 */
export function reloadConfig(): LibrarianConfig {
  config = undefined;
  return getConfig();
}
