import { HttpClient } from '../http/session';
import { ImageInfo } from '../types/imageInfo';
import { Backend, fetchRedirectImage, RandomSource, randomInt } from './base-backend';

/**
 * Picsum Photos: random placeholder photography at the requested size.
 * No keywords. https://picsum.photos/
 */
export class PicsumBackend implements Backend {
  readonly name = 'picsum';
  readonly supportsKeywords = false;
  readonly baseUrl = 'https://picsum.photos';

  constructor(private readonly random: RandomSource = Math.random) {}

  /** e.g. https://fastly.picsum.photos/id/237/1920/1080.jpg?hmac=... yields "237" */
  static extractId(url: string): string {
    const parts = url.split('/id/');
    if (parts.length > 1) {
      return parts[1].split('/')[0];
    }
    return '';
  }

  async fetchImageInfo(session: HttpClient, minWidth: number, minHeight: number): Promise<ImageInfo> {
    // Seeding varies the image between calls
    const seed = randomInt(1, 1_000_000, this.random);
    const url = `${this.baseUrl}/seed/${seed}/${minWidth}/${minHeight}`;

    return fetchRedirectImage(session, url, this.name, [minWidth, minHeight], PicsumBackend.extractId);
  }
}
