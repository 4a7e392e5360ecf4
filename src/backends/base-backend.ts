import { z } from 'zod';
import { HttpClient } from '../http/session';
import { createImageInfo, ImageInfo } from '../types/imageInfo';
import { BackendError, ClientError } from '../utils/errorHandler';

export const HTTP_OK = 200;

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export interface Backend {
  readonly name: string;
  readonly supportsKeywords: boolean;
  readonly baseUrl: string;

  /**
   * Resolves metadata for one random image meeting the size constraints.
   * Backends without keyword support ignore `keywords`.
   * @throws BackendError when the source cannot supply an image.
   */
  fetchImageInfo(
    session: HttpClient,
    minWidth: number,
    minHeight: number,
    keywords?: string[]
  ): Promise<ImageInfo>;
}

export function pickRandom<T>(items: readonly T[], random: RandomSource = Math.random): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
}

/** Integer in [min, max]. */
export function randomInt(min: number, max: number, random: RandomSource = Math.random): number {
  return min + Math.min(Math.floor(random() * (max - min + 1)), max - min);
}

export function toBackendError(backendName: string, error: unknown): BackendError {
  if (error instanceof BackendError) {
    return error;
  }
  if (error instanceof ClientError) {
    return new BackendError(backendName, error.message, { cause: error });
  }
  throw error;
}

export function parsePayload<S extends z.ZodTypeAny>(
  backendName: string,
  schema: S,
  data: unknown
): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new BackendError(backendName, `Invalid response: ${issue ? issue.message : 'unparseable'}${where}`);
  }
  return result.data;
}

/**
 * Fetches image info from a URL that redirects to the final image. The
 * dimensions reported are the requested ones, not measured.
 */
export async function fetchRedirectImage(
  session: HttpClient,
  url: string,
  backendName: string,
  dimensions: [number, number],
  idExtractor?: (finalUrl: string) => string
): Promise<ImageInfo> {
  try {
    const response = await session.follow(url);
    if (response.status !== HTTP_OK) {
      throw new BackendError(backendName, `HTTP ${response.status}`);
    }

    return createImageInfo({
      url: response.url,
      width: dimensions[0],
      height: dimensions[1],
      source: backendName,
      imageId: idExtractor ? idExtractor(response.url) : '',
      extension: 'jpg',
    });
  } catch (error) {
    throw toBackendError(backendName, error);
  }
}
