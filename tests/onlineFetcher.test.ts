import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';

vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

import { BackendRegistry } from '../src/backends';
import { ImageCache } from '../src/cache/imageCache';
import {
  OnlineFetcher,
  OnlineFetcherOptions,
  cacheKeyFor,
  shuffleInPlace,
  withOnlineFetcher,
} from '../src/fetcher/onlineFetcher';
import { createImageInfo } from '../src/types/imageInfo';
import {
  BackendError,
  ClientError,
  InvalidArgumentError,
  NoBackendAvailableError,
} from '../src/utils/errorHandler';
import { FakeSession } from './helpers/fakeSession';
import { StubBackend } from './helpers/stubBackend';

const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x01]);

function identity<T>(items: T[]): T[] {
  return items;
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}

describe('OnlineFetcher', () => {
  let cacheDir: string;
  let cache: ImageCache;
  let session: FakeSession;
  let createSession: Mock<() => FakeSession>;
  let log: { debug: Mock<(message: string) => void>; info: Mock<(message: string) => void>; warn: Mock<(message: string) => void> };
  let alpha: StubBackend;
  let beta: StubBackend;
  let gamma: StubBackend;
  let registry: BackendRegistry;

  function makeFetcher(overrides: Partial<OnlineFetcherOptions> = {}): OnlineFetcher {
    return new OnlineFetcher({
      cache,
      registry,
      shuffle: identity,
      createSession,
      logger: log,
      ...overrides,
    });
  }

  beforeEach(async () => {
    cacheDir = await fs.mkdtemp(path.join(os.tmpdir(), 'online-fetcher-'));
    cache = new ImageCache(cacheDir);
    session = new FakeSession();
    createSession = vi.fn<() => FakeSession>(() => session);
    log = {
      debug: vi.fn<(message: string) => void>(),
      info: vi.fn<(message: string) => void>(),
      warn: vi.fn<(message: string) => void>(),
    };
    alpha = new StubBackend('alpha');
    beta = new StubBackend('beta');
    gamma = new StubBackend('gamma');
    registry = new BackendRegistry().register(alpha).register(beta).register(gamma);
  });

  afterEach(async () => {
    await fs.remove(cacheDir);
  });

  describe('construction', () => {
    it('enables every registered backend by default', () => {
      expect(makeFetcher().backends).toEqual(['alpha', 'beta', 'gamma']);
    });

    it('keeps the requested subset', () => {
      const fetcher = makeFetcher({ backends: ['gamma', 'alpha'] });
      expect(fetcher.backends).toEqual(['gamma', 'alpha']);
      expect(fetcher.availableBackends).toEqual(['alpha', 'beta', 'gamma']);
    });

    it('rejects unknown backend names and lists the available ones', () => {
      expect(() => makeFetcher({ backends: ['alpha', 'nope'] })).toThrow(InvalidArgumentError);
      expect(() => makeFetcher({ backends: ['alpha', 'nope'] })).toThrow(
        'Unknown backends: nope. Available: alpha, beta, gamma'
      );
    });

    it('rejects an empty backend set', () => {
      expect(() => makeFetcher({ backends: [] })).toThrow('At least one backend must be enabled');
      expect(() => makeFetcher({ registry: new BackendRegistry() })).toThrow(InvalidArgumentError);
    });
  });

  describe('getImage', () => {
    it('downloads, stores and returns the image from the first working backend', async () => {
      alpha.resolves({ url: 'http://img/1', source: 'picsum', imageId: '42', extension: 'png' });
      session.download.mockResolvedValue(PNG_BYTES);

      const result = await makeFetcher().getImage();

      expect(result.endsWith('.png')).toBe(true);
      expect(await fs.readFile(result)).toEqual(PNG_BYTES);
      expect(session.download).toHaveBeenCalledWith('http://img/1');
      expect(result).toBe(cache.pathFor('picsum:42:http://img/1', 'png'));
    });

    it('reuses the cached file on a repeat fetch of the same image', async () => {
      alpha.resolves({ url: 'http://img/1', source: 'picsum', imageId: '42', extension: 'png' });
      session.download.mockResolvedValue(PNG_BYTES);
      const fetcher = makeFetcher();

      const first = await fetcher.getImage();
      const second = await fetcher.getImage({ backend: 'alpha' });

      expect(second).toBe(first);
      expect(session.download).toHaveBeenCalledTimes(1);
    });

    it('returns a cached entry without downloading', async () => {
      const info = createImageInfo({ url: 'https://beta.example.test/x.jpg', source: 'beta', imageId: '7' });
      beta.fetchImageInfo.mockResolvedValue(info);
      const cachedPath = await cache.store(cacheKeyFor(info), Buffer.from('cached'), info.extension);

      const result = await makeFetcher({ backends: ['beta'] }).getImage();

      expect(result).toBe(cachedPath);
      expect(session.download).not.toHaveBeenCalled();
    });

    it('passes size and keywords through to the backend', async () => {
      alpha.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));

      await makeFetcher().getImage({ minWidth: 2560, minHeight: 1440, keywords: ['forest'] });

      expect(alpha.fetchImageInfo).toHaveBeenCalledWith(session, 2560, 1440, ['forest']);
    });

    it('defaults to a 1920x1080 minimum', async () => {
      alpha.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));

      await makeFetcher().getImage();

      expect(alpha.fetchImageInfo).toHaveBeenCalledWith(session, 1920, 1080, undefined);
    });

    it('moves on to the next backend after a failure', async () => {
      alpha.fails();
      beta.resolves();
      gamma.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));

      const result = await makeFetcher().getImage();

      expect(result).toBe(cache.pathFor(cacheKeyFor(createImageInfo({
        url: 'https://beta.example.test/image.jpg',
        source: 'beta',
        imageId: 'beta-1',
      }))));
      expect(gamma.fetchImageInfo).not.toHaveBeenCalled();
      expect(log.warn).toHaveBeenCalledWith('Backend alpha failed: No images found matching criteria');
    });

    it('treats a failed download as a backend failure', async () => {
      alpha.resolves();
      beta.resolves();
      session.download
        .mockRejectedValueOnce(new ClientError('HTTP 404 downloading https://alpha.example.test/image.jpg', 404))
        .mockResolvedValueOnce(Buffer.from('data'));

      const result = await makeFetcher().getImage();

      expect(path.basename(result)).toBe(path.basename(cache.pathFor('beta:beta-1:https://beta.example.test/image.jpg')));
      expect(log.warn).toHaveBeenCalledWith(
        'Network error with alpha: HTTP 404 downloading https://alpha.example.test/image.jpg'
      );
    });

    it('raises NoBackendAvailableError naming every backend tried once', async () => {
      alpha.fails('first');
      beta.fails('second');
      gamma.fails('third');

      const error = await captureError(makeFetcher().getImage());

      expect(error).toBeInstanceOf(NoBackendAvailableError);
      const noBackend = error as NoBackendAvailableError;
      expect(noBackend.tried).toEqual(['alpha', 'beta', 'gamma']);
      expect(noBackend.message).toBe('All backends failed. Tried: alpha, beta, gamma');
      expect(noBackend.cause).toBeInstanceOf(BackendError);
      expect((noBackend.cause as BackendError).message).toBe('gamma: third');
      expect(alpha.fetchImageInfo).toHaveBeenCalledTimes(1);
      expect(beta.fetchImageInfo).toHaveBeenCalledTimes(1);
      expect(gamma.fetchImageInfo).toHaveBeenCalledTimes(1);
      expect(log.warn).toHaveBeenCalledTimes(3);
    });

    it('tries backends in the shuffled order', async () => {
      alpha.fails();
      beta.fails();
      gamma.fails();
      const reverse = <T>(items: T[]): T[] => [...items].reverse();

      const error = await captureError(makeFetcher({ shuffle: reverse }).getImage());

      expect((error as NoBackendAvailableError).tried).toEqual(['gamma', 'beta', 'alpha']);
    });

    it('fails without trying other backends when the cache cannot be written', async () => {
      alpha.resolves();
      beta.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));
      // A directory at the target path makes the store fail
      await fs.ensureDir(cache.pathFor('alpha:alpha-1:https://alpha.example.test/image.jpg'));

      await expect(makeFetcher().getImage()).rejects.toThrow();

      expect(session.download).toHaveBeenCalledTimes(1);
      expect(beta.fetchImageInfo).not.toHaveBeenCalled();
      expect(log.warn).not.toHaveBeenCalled();
    });

    it('lets unexpected errors through', async () => {
      const boom = new TypeError('boom');
      alpha.fetchImageInfo.mockRejectedValue(boom);
      beta.resolves();

      await expect(makeFetcher().getImage()).rejects.toBe(boom);
      expect(beta.fetchImageInfo).not.toHaveBeenCalled();
    });
  });

  describe('forced backend', () => {
    it('tries only the named backend and skips the shuffle', async () => {
      const shuffle = vi.fn(identity);
      beta.fails();

      const error = await captureError(makeFetcher({ shuffle }).getImage({ backend: 'beta' }));

      expect((error as NoBackendAvailableError).tried).toEqual(['beta']);
      expect(shuffle).not.toHaveBeenCalled();
      expect(alpha.fetchImageInfo).not.toHaveBeenCalled();
      expect(gamma.fetchImageInfo).not.toHaveBeenCalled();
    });

    it('rejects a backend that is not enabled before any network work', async () => {
      const fetcher = makeFetcher({ backends: ['alpha', 'beta'] });

      await expect(fetcher.getImage({ backend: 'gamma' })).rejects.toThrow(
        "Backend 'gamma' not enabled. Enabled: alpha, beta"
      );
      await expect(fetcher.getImage({ backend: 'unknown' })).rejects.toBeInstanceOf(InvalidArgumentError);
      expect(createSession).not.toHaveBeenCalled();
      expect(gamma.fetchImageInfo).not.toHaveBeenCalled();
    });
  });

  describe('session lifecycle', () => {
    it('creates the session lazily and reuses it', async () => {
      alpha.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));
      const fetcher = makeFetcher();
      expect(createSession).not.toHaveBeenCalled();

      await fetcher.getImage();
      await fetcher.getImage();

      expect(createSession).toHaveBeenCalledTimes(1);
    });

    it('recreates the session after close', async () => {
      alpha.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));
      const fetcher = makeFetcher();

      await fetcher.getImage();
      await fetcher.close();
      expect(session.close).toHaveBeenCalledTimes(1);

      await fetcher.getImage();
      expect(createSession).toHaveBeenCalledTimes(2);
    });

    it('closes idempotently', async () => {
      alpha.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));
      const fetcher = makeFetcher();
      await fetcher.getImage();

      await fetcher.close();
      await fetcher.close();

      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('closes the session when the scoped block throws', async () => {
      alpha.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));

      const error = await captureError(
        withOnlineFetcher({ cache, registry, shuffle: identity, createSession, logger: log }, async fetcher => {
          await fetcher.getImage();
          throw new Error('caller failed');
        })
      );

      expect((error as Error).message).toBe('caller failed');
      expect(session.close).toHaveBeenCalledTimes(1);
    });

    it('returns the scoped result and closes', async () => {
      alpha.resolves();
      session.download.mockResolvedValue(Buffer.from('data'));

      const result = await withOnlineFetcher(
        { cache, registry, shuffle: identity, createSession, logger: log },
        fetcher => fetcher.getImage()
      );

      expect(result).toBe(cache.pathFor('alpha:alpha-1:https://alpha.example.test/image.jpg'));
      expect(session.closed).toBe(true);
    });
  });

  describe('concurrent fetches', () => {
    it('shares one download between concurrent misses for the same image', async () => {
      alpha.resolves();
      let release: (data: Buffer) => void = () => undefined;
      session.download.mockImplementation(
        () => new Promise<Buffer>(resolve => {
          release = resolve;
        })
      );
      const fetcher = makeFetcher();

      const first = fetcher.getImage();
      await vi.waitFor(() => expect(session.download).toHaveBeenCalledTimes(1));
      const second = fetcher.getImage();
      await vi.waitFor(() =>
        expect(log.debug).toHaveBeenCalledWith('Waiting on in-flight download for https://alpha.example.test/image.jpg')
      );
      release(Buffer.from('shared'));

      const [a, b] = await Promise.all([first, second]);
      expect(a).toBe(b);
      expect(session.download).toHaveBeenCalledTimes(1);
    });
  });

  describe('shuffleInPlace', () => {
    it('permutes without losing items', () => {
      const items = ['a', 'b', 'c', 'd'];
      expect(shuffleInPlace([...items], () => 0).sort()).toEqual(items);
    });

    it('follows the random source', () => {
      // i=2: j=0 -> [c,b,a]; i=1: j=0 -> [b,c,a]
      expect(shuffleInPlace(['a', 'b', 'c'], () => 0)).toEqual(['b', 'c', 'a']);
    });
  });
});
