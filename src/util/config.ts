import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import logger from './logger';
import env from './env';
import { ValidationError, describeError } from './errors';
import type { ConnectorConfig } from '../connector';

// --- Zod Schemas ---

const LetterboxdSchema = z.object({
  baseUrl: z.string().url().optional(),
  username: z.string().min(1).optional(),
  password: z.string().min(1).optional(),
}).refine(data => (data.username === undefined) === (data.password === undefined), {
  message: 'username and password must be configured together',
  path: ['username'],
});

const ConfigSchema = z.object({
  letterboxd: LetterboxdSchema.default({}),
  cache: z.object({
    path: z.string().optional(),
  }).default({}),
  export: z.object({
    directory: z.string().optional(),
  }).default({}),
  enrichment: z.object({
    concurrency: z.number().int().positive().optional(),
  }).default({}),
  requestTimeoutMs: z.number().int().positive().optional(),
});

export type FileConfig = z.infer<typeof ConfigSchema>;

export interface Credentials {
  username: string;
  password: string;
}

export interface AppConfig {
  baseUrl: string;
  credentials?: Credentials;
  cachePath: string;
  exportDir: string;
  enrichConcurrency: number;
  requestTimeoutMs?: number;
}

// --- Loader Logic ---

function readConfigFile(cwd: string): unknown {
  const candidates = [
    path.resolve(cwd, 'config', 'config.yaml'),
    path.resolve(cwd, 'config.yaml'), // Support root config.yaml too
  ];

  const configPath = candidates.find(candidate => fs.existsSync(candidate));
  if (!configPath) {
    logger.info('No config.yaml found. Using Environment Variables only.');
    return {};
  }

  logger.info(`Loading configuration from ${configPath}`);
  try {
    // An empty file loads as undefined
    return yaml.load(fs.readFileSync(configPath, 'utf8')) ?? {};
  } catch (e: unknown) {
    throw new ValidationError(`Failed to parse ${configPath}: ${describeError(e)}`, { cause: e });
  }
}

/**
 * Loads `config/config.yaml` (or `./config.yaml`) and fills whatever it leaves
 * out from the environment. Values from the file win.
 */
export function loadConfig(cwd: string = process.cwd()): AppConfig {
  const result = ConfigSchema.safeParse(readConfigFile(cwd));
  if (!result.success) {
    logger.error('Configuration validation failed:');
    result.error.issues.forEach(err => {
      logger.error(`- ${err.path.join('.')}: ${err.message}`);
    });
    throw new ValidationError('Configuration validation failed', { cause: result.error });
  }

  const file = result.data;

  // --- Hybrid Merge: fall back to ENV where the file is silent ---

  let credentials: Credentials | undefined;
  if (file.letterboxd.username !== undefined && file.letterboxd.password !== undefined) {
    credentials = { username: file.letterboxd.username, password: file.letterboxd.password };
  } else if (env.LETTERBOXD_USERNAME !== undefined && env.LETTERBOXD_PASSWORD !== undefined) {
    credentials = { username: env.LETTERBOXD_USERNAME, password: env.LETTERBOXD_PASSWORD };
    logger.info('Using Letterboxd credentials from Environment Variables');
  }

  const config: AppConfig = {
    baseUrl: file.letterboxd.baseUrl ?? env.LETTERBOXD_BASE_URL,
    credentials,
    cachePath: path.resolve(cwd, file.cache.path ?? path.join(env.DATA_DIR, env.CACHE_FILE)),
    exportDir: path.resolve(cwd, file.export.directory ?? env.EXPORT_DIR ?? path.join(env.DATA_DIR, 'export')),
    enrichConcurrency: file.enrichment.concurrency ?? env.ENRICH_CONCURRENCY,
    requestTimeoutMs: file.requestTimeoutMs ?? env.REQUEST_TIMEOUT_MS,
  };

  return Object.freeze(config);
}

export function toConnectorConfig(config: AppConfig): ConnectorConfig {
  return {
    baseUrl: config.baseUrl,
    cachePath: config.cachePath,
    enrichConcurrency: config.enrichConcurrency,
    requestTimeoutMs: config.requestTimeoutMs,
  };
}
