import { z } from 'zod';
import { HttpClient } from '../http/session';
import { createImageInfo, ImageInfo } from '../types/imageInfo';
import { BackendError } from '../utils/errorHandler';
import { Backend, HTTP_OK, parsePayload, pickRandom, RandomSource, toBackendError } from './base-backend';

// Bing's standard wallpaper resolution
export const BING_WIDTH = 1920;
export const BING_HEIGHT = 1080;

const BingArchiveSchema = z.object({
  images: z.array(
    z.object({
      url: z.string().default(''),
      urlbase: z.string().default(''),
      title: z.string().default(''),
      copyright: z.string().default(''),
      startdate: z.string().default(''),
    })
  ).default([]),
});

/**
 * Bing daily wallpaper archive (last 8 days). No keywords, no size
 * filtering; the size arguments are accepted but not applied.
 */
export class BingBackend implements Backend {
  readonly name = 'bing';
  readonly supportsKeywords = false;
  readonly baseUrl = 'https://www.bing.com';

  constructor(private readonly random: RandomSource = Math.random) {}

  async fetchImageInfo(session: HttpClient): Promise<ImageInfo> {
    const params = {
      format: 'js',
      idx: '0', // start from today
      n: '8',   // archive maximum
      mkt: 'en-US',
    };

    try {
      const response = await session.getJson(`${this.baseUrl}/HPImageArchive.aspx`, { params });
      if (response.status !== HTTP_OK) {
        throw new BackendError(this.name, `HTTP ${response.status}`);
      }

      const { images } = parsePayload(this.name, BingArchiveSchema, response.data);
      if (images.length === 0) {
        throw new BackendError(this.name, 'No images available');
      }

      const image = pickRandom(images, this.random);
      if (!image.url) {
        throw new BackendError(this.name, 'No URL in image data');
      }

      // Paths are relative and default to 1080p; ask for UHD instead
      const fullUrl = `${this.baseUrl}${image.url.replaceAll('1920x1080', 'UHD')}`;
      const urlbase = image.urlbase;
      const imageId = urlbase.includes('.') ? urlbase.slice(urlbase.lastIndexOf('.') + 1) : urlbase;

      return createImageInfo({
        url: fullUrl,
        width: BING_WIDTH,
        height: BING_HEIGHT,
        source: this.name,
        imageId,
        extension: 'jpg',
        extra: {
          title: image.title,
          copyright: image.copyright,
          date: image.startdate,
        },
      });
    } catch (error) {
      throw toBackendError(this.name, error);
    }
  }
}
