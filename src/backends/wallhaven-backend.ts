import * as path from 'path';
import { z } from 'zod';
import { HttpClient } from '../http/session';
import { createImageInfo, DEFAULT_EXTENSION, ImageInfo } from '../types/imageInfo';
import { BackendError } from '../utils/errorHandler';
import { Backend, HTTP_OK, parsePayload, pickRandom, RandomSource, toBackendError } from './base-backend';

const WallhavenImageSchema = z.object({
  id: z.string().default(''),
  path: z.string(),
  dimension_x: z.number().int().optional(),
  dimension_y: z.number().int().optional(),
  category: z.string().optional(),
  views: z.number().optional(),
  favorites: z.number().optional(),
});

const WallhavenSearchSchema = z.object({
  data: z.array(WallhavenImageSchema).default([]),
});

export type WallhavenImage = z.infer<typeof WallhavenImageSchema>;

const EXTENSION_PATTERN = /^[a-z0-9]+$/;

/**
 * Extension of the last path segment, or 'jpg' when it has none.
 */
export function extensionFromPath(imageUrl: string): string {
  const pathname = URL.canParse(imageUrl) ? new URL(imageUrl).pathname : imageUrl;
  const extension = path.posix.extname(pathname).slice(1).toLowerCase();
  return EXTENSION_PATTERN.test(extension) ? extension : DEFAULT_EXTENSION;
}

/**
 * Wallhaven: dedicated wallpaper site. Searches SFW general images at or
 * above the requested resolution, sorted randomly.
 * See https://wallhaven.cc/help/api
 */
export class WallhavenBackend implements Backend {
  readonly name = 'wallhaven';
  readonly supportsKeywords = true;
  readonly baseUrl = 'https://wallhaven.cc/api/v1';

  constructor(private readonly random: RandomSource = Math.random) {}

  async fetchImageInfo(
    session: HttpClient,
    minWidth: number,
    minHeight: number,
    keywords?: string[]
  ): Promise<ImageInfo> {
    const params: Record<string, string> = {
      categories: '100', // general only
      purity: '100',     // SFW only
      sorting: 'random',
      atleast: `${minWidth}x${minHeight}`,
    };
    if (keywords && keywords.length > 0) {
      params.q = keywords.join(' ');
    }

    try {
      const response = await session.getJson(`${this.baseUrl}/search`, { params });
      if (response.status !== HTTP_OK) {
        throw new BackendError(this.name, `HTTP ${response.status}`);
      }

      const payload = parsePayload(this.name, WallhavenSearchSchema, response.data);
      if (payload.data.length === 0) {
        throw new BackendError(this.name, 'No images found matching criteria');
      }

      return this.toImageInfo(pickRandom(payload.data, this.random));
    } catch (error) {
      throw toBackendError(this.name, error);
    }
  }

  private toImageInfo(image: WallhavenImage): ImageInfo {
    return createImageInfo({
      url: image.path,
      width: image.dimension_x,
      height: image.dimension_y,
      source: this.name,
      imageId: image.id,
      extension: extensionFromPath(image.path),
      extra: {
        category: image.category ?? '',
        views: image.views === undefined ? '' : String(image.views),
        favorites: image.favorites === undefined ? '' : String(image.favorites),
      },
    });
  }
}
