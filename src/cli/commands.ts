import { initBackends } from '../backends';
import { ImageCache } from '../cache/imageCache';
import { Config, loadConfig } from '../config/config';
import { withOnlineFetcher } from '../fetcher/onlineFetcher';
import { InvalidArgumentError } from '../utils/errorHandler';
import { logger, parseLogLevel } from '../utils/logger';

export interface FetchOptions {
  width?: string;
  height?: string;
  keywords?: string[];
  backend?: string;
  config?: string;
}

export interface CacheCommandOptions {
  config?: string;
  maxAge?: string;
}

function parsePositiveInt(value: string | undefined, label: string, fallback: number): number {
  if (value === undefined) return fallback;
  const parsed = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Invalid ${label}: ${value}. Must be a positive integer`);
  }
  return parsed;
}

export function prepare(configPath?: string): Config {
  const config = loadConfig(configPath);
  // LOG_LEVEL wins over the file
  logger.setLevel(parseLogLevel(process.env.LOG_LEVEL, parseLogLevel(config.logging.level)));
  return config;
}

export function createCache(config: Config): ImageCache {
  return new ImageCache(config.cache.directory, {
    ttl: config.cache.ttl,
    maxSize: config.cache.maxSize,
    maxCount: config.cache.maxCount,
  });
}

export async function fetchCommand(options: FetchOptions): Promise<string> {
  const config = prepare(options.config);
  const keywords = options.keywords && options.keywords.length > 0 ? options.keywords : config.fetcher.keywords;

  return withOnlineFetcher(
    { cache: createCache(config), backends: config.fetcher.backends },
    fetcher => fetcher.getImage({
      minWidth: parsePositiveInt(options.width, 'width', config.fetcher.minWidth),
      minHeight: parsePositiveInt(options.height, 'height', config.fetcher.minHeight),
      keywords,
      backend: options.backend,
    })
  );
}

export function backendsCommand(): string[] {
  const registry = initBackends();
  return registry.list().map(name => {
    const backend = registry.get(name);
    const keywords = backend.supportsKeywords ? 'keywords' : 'no keywords';
    return `${name.padEnd(10)} ${keywords.padEnd(12)} ${backend.baseUrl}`;
  });
}

export async function cacheStatsCommand(options: CacheCommandOptions): Promise<string> {
  const config = prepare(options.config);
  const stats = await createCache(config).stats();
  return `${config.cache.directory}: ${stats.count} files, ${stats.size} bytes`;
}

export async function cacheCleanCommand(options: CacheCommandOptions): Promise<number> {
  const config = prepare(options.config);
  const maxAge = options.maxAge === undefined ? undefined : parsePositiveInt(options.maxAge, 'max age', 0);
  return createCache(config).cleanup(maxAge);
}

export async function cacheClearCommand(options: CacheCommandOptions): Promise<number> {
  const config = prepare(options.config);
  return createCache(config).clear();
}
