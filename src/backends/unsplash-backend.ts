import { HttpClient } from '../http/session';
import { ImageInfo } from '../types/imageInfo';
import { Backend, fetchRedirectImage, RandomSource, randomInt } from './base-backend';

/**
 * Unsplash Source: URL-based random photos, optionally matching keywords.
 */
export class UnsplashBackend implements Backend {
  readonly name = 'unsplash';
  readonly supportsKeywords = true;
  readonly baseUrl = 'https://source.unsplash.com';

  constructor(private readonly random: RandomSource = Math.random) {}

  static extractId(url: string): string {
    if (!url.includes('unsplash.com/photos/')) {
      return '';
    }
    const parts = url.split('photos/');
    return parts[1].split('/')[0].split('?')[0];
  }

  buildUrl(minWidth: number, minHeight: number, keywords?: string[]): string {
    let url = `${this.baseUrl}/random/${minWidth}x${minHeight}`;
    if (keywords && keywords.length > 0) {
      url = `${url}/?${keywords.join(',')}`;
    }

    const cacheBuster = randomInt(1, 1_000_000, this.random);
    const separator = url.includes('?') ? '&' : '?';
    return `${url}${separator}_=${cacheBuster}`;
  }

  async fetchImageInfo(
    session: HttpClient,
    minWidth: number,
    minHeight: number,
    keywords?: string[]
  ): Promise<ImageInfo> {
    return fetchRedirectImage(
      session,
      this.buildUrl(minWidth, minHeight, keywords),
      this.name,
      [minWidth, minHeight],
      UnsplashBackend.extractId
    );
  }
}
