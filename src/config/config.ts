import * as dotenv from 'dotenv';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../utils/errorHandler';

dotenv.config();

export const CacheConfigSchema = z.object({
  directory: z.string().min(1).default(() => defaultCacheDir()),
  ttl: z.number().int().positive().optional(),        // seconds
  maxSize: z.number().int().positive().optional(),    // bytes
  maxCount: z.number().int().positive().optional(),
});

export const FetcherConfigSchema = z.object({
  backends: z.array(z.string()).min(1).optional(),
  minWidth: z.number().int().positive().default(1920),
  minHeight: z.number().int().positive().default(1080),
  keywords: z.array(z.string()).optional(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export const ConfigSchema = z.object({
  cache: CacheConfigSchema.default({}),
  fetcher: FetcherConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type FetcherConfig = z.infer<typeof FetcherConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export function defaultCacheDir(): string {
  const base = process.env.XDG_CACHE_HOME || path.join(os.homedir(), '.cache');
  return path.join(base, 'wallpaper-fetcher', 'online');
}

export function expandHome(dir: string): string {
  if (dir === '~' || dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(1));
  }
  return dir;
}

function resolveEnvValue(value: string, env: NodeJS.ProcessEnv): string {
  if (!value.startsWith('env:')) {
    return value;
  }
  const envKey = value.substring(4);
  const envValue = env[envKey];
  if (envValue === undefined || envValue === '') {
    throw new ConfigError(`Environment variable ${envKey} is not set`);
  }
  return envValue;
}

/**
 * Replaces "env:NAME" strings anywhere in the parsed JSON.
 */
export function resolveEnvObject(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return resolveEnvValue(value, env);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvObject(item, env));
  }
  if (value && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvObject(item, env);
    }
    return resolved;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyEnvOverrides(data: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const cache: Record<string, unknown> = isRecord(data.cache) ? { ...data.cache } : {};
  const fetcher: Record<string, unknown> = isRecord(data.fetcher) ? { ...data.fetcher } : {};

  if (env.WALLPAPER_CACHE_DIR) {
    cache.directory = env.WALLPAPER_CACHE_DIR;
  }
  if (env.WALLPAPER_BACKENDS) {
    fetcher.backends = env.WALLPAPER_BACKENDS.split(',').map(name => name.trim()).filter(Boolean);
  }

  return { ...data, cache, fetcher };
}

function readConfigFile(configPath?: string): unknown {
  if (configPath) {
    if (!fs.existsSync(configPath)) {
      throw new ConfigError(`Configuration file not found: ${configPath}`);
    }
    return fs.readJsonSync(configPath);
  }

  const defaultPath = path.join(process.cwd(), 'config', 'config.json');
  const examplePath = path.join(process.cwd(), 'config', 'config.example.json');
  if (fs.existsSync(defaultPath)) {
    return fs.readJsonSync(defaultPath);
  }
  if (fs.existsSync(examplePath)) {
    return fs.readJsonSync(examplePath);
  }
  return {};
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const raw = resolveEnvObject(readConfigFile(configPath), env);
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object');
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(raw, env));
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  const config = result.data;
  config.cache.directory = path.resolve(expandHome(config.cache.directory));
  return config;
}
