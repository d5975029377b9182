import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import logger from './logger';
import env from './env';
import { MAX_PAGE_SIZE } from './constants';

// --- Zod Schemas ---

// Defaults fit a Riot development key: 20 requests/s, 100 requests/2min.
const RateLimitSchema = z.object({
  maxConcurrent: z.number().int().positive().default(1),
  minTime: z.number().int().min(0).default(50),
  // null turns the reservoir off, e.g. for a production key.
  reservoir: z.number().int().positive().nullable().default(100),
  reservoirRefreshIntervalMs: z.number().int().positive().default(120_000),
});

const RiotSchema = z.object({
  pageSize: z.number().int().min(1).max(MAX_PAGE_SIZE).default(MAX_PAGE_SIZE),
  retries: z.number().int().min(1).default(5),
  retryDelayMs: z.number().int().min(0).default(2000),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  rateLimit: RateLimitSchema.default({}),
});

const ConfigSchema = z.object({
  riot: RiotSchema.default({}),
  output: z.object({
    directory: z.string().default('.'),
  }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RiotSettings = z.infer<typeof RiotSchema>;
export type RateLimitSettings = z.infer<typeof RateLimitSchema>;

export const defaultRiotSettings: RiotSettings = RiotSchema.parse({});

// --- Loader Logic ---

function findConfigFile(explicitPath?: string): string | null {
  if (explicitPath) return path.resolve(process.cwd(), explicitPath);
  if (env.CONFIG_PATH) return path.resolve(process.cwd(), env.CONFIG_PATH);

  const candidates = [
    path.resolve(process.cwd(), 'config', 'config.yaml'),
    path.resolve(process.cwd(), 'config.yaml'),
  ];
  return candidates.find(candidate => fs.existsSync(candidate)) ?? null;
}

function loadConfig(explicitPath?: string): Config {
  const configPath = findConfigFile(explicitPath);

  let loadedConfig: unknown = {};

  if (configPath && fs.existsSync(configPath)) {
    logger.info(`Loading configuration from ${configPath}`);
    try {
      const fileContents = fs.readFileSync(configPath, 'utf8');
      // An empty file parses to undefined.
      loadedConfig = yaml.load(fileContents) ?? {};
    } catch (e) {
      logger.error(`Failed to parse ${configPath}: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  } else if (configPath) {
    logger.error(`Configuration file not found: ${configPath}`);
    process.exit(1);
  } else {
    logger.debug('No config.yaml found. Using defaults and environment variables.');
  }

  const result = ConfigSchema.safeParse(loadedConfig);
  if (!result.success) {
    logger.error('Configuration validation failed:');
    result.error.issues.forEach(err => {
      logger.error(`- ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }

  const config = result.data;

  if (env.RIOT_PAGE_SIZE !== undefined) {
    config.riot.pageSize = env.RIOT_PAGE_SIZE;
  }

  return config;
}

export { loadConfig };
