import { Backend, BackendRegistry, initBackends } from '../backends';
import { ImageCache } from '../cache/imageCache';
import { HttpClient, HttpSession } from '../http/session';
import { ImageInfo } from '../types/imageInfo';
import {
  BackendError,
  ClientError,
  InvalidArgumentError,
  NoBackendAvailableError,
} from '../utils/errorHandler';
import { Logger, logger as defaultLogger } from '../utils/logger';

export const DEFAULT_WALLPAPER_WIDTH = 1920;
export const DEFAULT_WALLPAPER_HEIGHT = 1080;

export type Shuffle = <T>(items: T[]) => T[];

export interface OnlineFetcherOptions {
  cache: ImageCache;
  backends?: string[] | null;       // null/undefined enables every registered backend
  registry?: BackendRegistry;
  shuffle?: Shuffle;
  createSession?: () => HttpClient;
  logger?: Pick<Logger, 'debug' | 'info' | 'warn'>;
}

export interface GetImageInput {
  minWidth?: number;
  minHeight?: number;
  keywords?: string[];
  backend?: string | null;          // force one backend, skipping the shuffle
}

/** Fisher-Yates, in place. */
export function shuffleInPlace<T>(items: T[], random: () => number = Math.random): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [items[i], items[j]] = [items[j], items[i]];
  }
  return items;
}

const defaultShuffle: Shuffle = items => shuffleInPlace([...items]);

export function cacheKeyFor(info: ImageInfo): string {
  return `${info.source}:${info.imageId}:${info.url}`;
}

/**
 * Fetches a wallpaper from the enabled backends, trying them one at a time
 * in random order, and returns the path of the cached file.
 */
export class OnlineFetcher {
  readonly cache: ImageCache;
  private readonly registry: BackendRegistry;
  private readonly backendNames: string[];
  private readonly shuffle: Shuffle;
  private readonly createSession: () => HttpClient;
  private readonly log: Pick<Logger, 'debug' | 'info' | 'warn'>;
  private session: HttpClient | null = null;
  // Downloads in progress, by cache key
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(options: OnlineFetcherOptions) {
    this.cache = options.cache;
    this.registry = options.registry ?? initBackends();
    this.shuffle = options.shuffle ?? defaultShuffle;
    this.createSession = options.createSession ?? (() => new HttpSession());
    this.log = options.logger ?? defaultLogger;

    const available = this.registry.list();
    if (options.backends === undefined || options.backends === null) {
      this.backendNames = available;
    } else {
      const invalid = options.backends.filter(name => !this.registry.has(name));
      if (invalid.length > 0) {
        throw new InvalidArgumentError(
          `Unknown backends: ${invalid.join(', ')}. Available: ${available.join(', ')}`
        );
      }
      this.backendNames = Array.from(new Set(options.backends));
    }

    if (this.backendNames.length === 0) {
      throw new InvalidArgumentError('At least one backend must be enabled');
    }
  }

  get backends(): string[] {
    return [...this.backendNames];
  }

  get availableBackends(): string[] {
    return this.registry.list();
  }

  private getSession(): HttpClient {
    if (!this.session || this.session.closed) {
      this.session = this.createSession();
    }
    return this.session;
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (session && !session.closed) {
      await session.close();
    }
  }

  private selectBackends(backend: string | null | undefined): string[] {
    if (backend !== undefined && backend !== null) {
      if (!this.backendNames.includes(backend)) {
        throw new InvalidArgumentError(
          `Backend '${backend}' not enabled. Enabled: ${this.backendNames.join(', ')}`
        );
      }
      return [backend];
    }
    return this.shuffle([...this.backendNames]);
  }

  private async tryBackend(
    session: HttpClient,
    backend: Backend,
    minWidth: number,
    minHeight: number,
    keywords: string[] | undefined
  ): Promise<string> {
    this.log.debug(`Trying backend: ${backend.name}`);
    const info = await backend.fetchImageInfo(session, minWidth, minHeight, keywords);

    const key = cacheKeyFor(info);
    const cached = await this.cache.get(key, info.extension);
    if (cached) {
      this.log.debug(`Cache hit: ${cached}`);
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.log.debug(`Waiting on in-flight download for ${info.url}`);
      return pending;
    }

    const download = this.downloadAndStore(session, key, info);
    this.inFlight.set(key, download);
    try {
      const stored = await download;
      this.log.info(`Downloaded from ${backend.name}: ${stored}`);
      return stored;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async downloadAndStore(session: HttpClient, key: string, info: ImageInfo): Promise<string> {
    const data = await session.download(info.url);
    return this.cache.store(key, data, info.extension);
  }

  /**
   * @throws InvalidArgumentError when `backend` is not enabled
   * @throws NoBackendAvailableError when every backend tried has failed
   */
  async getImage(input: GetImageInput = {}): Promise<string> {
    const minWidth = input.minWidth ?? DEFAULT_WALLPAPER_WIDTH;
    const minHeight = input.minHeight ?? DEFAULT_WALLPAPER_HEIGHT;
    const backendsToTry = this.selectBackends(input.backend);
    const session = this.getSession();

    const tried: string[] = [];
    let lastError: unknown = undefined;

    for (const name of backendsToTry) {
      tried.push(name);
      try {
        return await this.tryBackend(session, this.registry.get(name), minWidth, minHeight, input.keywords);
      } catch (error) {
        if (error instanceof BackendError) {
          this.log.warn(`Backend ${name} failed: ${error.detail}`);
        } else if (error instanceof ClientError) {
          this.log.warn(`Network error with ${name}: ${error.message}`);
        } else {
          throw error;
        }
        lastError = error;
      }
    }

    throw new NoBackendAvailableError(`All backends failed. Tried: ${tried.join(', ')}`, tried, {
      cause: lastError,
    });
  }
}

/**
 * Runs `fn` with a fetcher whose session is closed however `fn` exits.
 */
export async function withOnlineFetcher<T>(
  options: OnlineFetcherOptions,
  fn: (fetcher: OnlineFetcher) => Promise<T>
): Promise<T> {
  const fetcher = new OnlineFetcher(options);
  try {
    return await fn(fetcher);
  } finally {
    await fetcher.close();
  }
}
