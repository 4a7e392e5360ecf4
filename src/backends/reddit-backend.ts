import { z } from 'zod';
import { HttpClient } from '../http/session';
import { createImageInfo, ImageInfo } from '../types/imageInfo';
import { BackendError } from '../utils/errorHandler';
import { Backend, HTTP_OK, parsePayload, pickRandom, RandomSource, toBackendError } from './base-backend';

export const DEFAULT_SUBREDDITS = ['wallpapers', 'wallpaper', 'MinimalWallpaper'];

export const KEYWORD_SUBREDDITS: Record<string, string[]> = {
  nature: ['EarthPorn', 'natureporn', 'SkyPorn'],
  landscape: ['EarthPorn', 'LandscapePhotography'],
  city: ['CityPorn', 'cityphotos'],
  space: ['spaceporn', 'astrophotography'],
  minimal: ['MinimalWallpaper', 'minimalism'],
  dark: ['Amoledbackgrounds', 'darkwallpapers'],
  anime: ['Animewallpaper', 'AnimeWallpapersSFW'],
  art: ['ArtPorn', 'ImaginaryLandscapes'],
  car: ['carporn', 'Autos'],
  architecture: ['ArchitecturePorn', 'architecture'],
};

const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.webp'];
const IMAGE_HOSTS = ['i.redd.it', 'i.imgur.com'];

const PreviewSourceSchema = z.object({
  width: z.number().optional(),
  height: z.number().optional(),
});

const RedditPostSchema = z.object({
  id: z.string().default(''),
  url: z.string().default(''),
  title: z.string().default(''),
  subreddit: z.string().default(''),
  score: z.number().default(0),
  is_self: z.boolean().default(false),
  preview: z.object({
    images: z.array(z.object({ source: PreviewSourceSchema.default({}) })).default([]),
  }).optional(),
});

const RedditListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: RedditPostSchema.default({}) })).default([]),
  }).default({}),
});

export type RedditPost = z.infer<typeof RedditPostSchema>;

function previewSize(post: RedditPost): { width?: number; height?: number } | null {
  const images = post.preview?.images ?? [];
  return images.length > 0 ? images[0].source : null;
}

/**
 * Reddit public JSON listings of wallpaper subreddits. Keywords map onto
 * curated subreddits; an unknown keyword is tried as a subreddit name.
 */
export class RedditBackend implements Backend {
  readonly name = 'reddit';
  readonly supportsKeywords = true;
  readonly baseUrl = 'https://www.reddit.com';

  constructor(private readonly random: RandomSource = Math.random) {}

  getSubreddits(keywords?: string[]): string[] {
    if (!keywords || keywords.length === 0) {
      return DEFAULT_SUBREDDITS;
    }

    const subreddits: string[] = [];
    for (const keyword of keywords) {
      const mapped = KEYWORD_SUBREDDITS[keyword.toLowerCase()];
      if (mapped) {
        subreddits.push(...mapped);
      } else if (keyword) {
        subreddits.push(keyword);
      }
    }
    return subreddits.length > 0 ? subreddits : DEFAULT_SUBREDDITS;
  }

  static isImageUrl(url: string): boolean {
    const lower = url.toLowerCase();
    return IMAGE_EXTENSIONS.some(ext => lower.endsWith(ext)) || IMAGE_HOSTS.some(host => lower.includes(host));
  }

  filterPosts(posts: RedditPost[], minWidth: number, minHeight: number): RedditPost[] {
    return posts.filter(post => {
      if (post.is_self || !RedditBackend.isImageUrl(post.url)) {
        return false;
      }
      // Posts without a preview are kept; their size is unknown
      const size = previewSize(post);
      if (size) {
        return (size.width ?? 0) >= minWidth && (size.height ?? 0) >= minHeight;
      }
      return true;
    });
  }

  async fetchImageInfo(
    session: HttpClient,
    minWidth: number,
    minHeight: number,
    keywords?: string[]
  ): Promise<ImageInfo> {
    const subreddit = pickRandom(this.getSubreddits(keywords), this.random);

    try {
      const response = await session.getJson(`${this.baseUrl}/r/${subreddit}/hot.json`, {
        params: { limit: '50' },
      });
      if (response.status !== HTTP_OK) {
        throw new BackendError(this.name, `HTTP ${response.status} from r/${subreddit}`);
      }

      const listing = parsePayload(this.name, RedditListingSchema, response.data);
      const candidates = this.filterPosts(
        listing.data.children.map(child => child.data),
        minWidth,
        minHeight
      );
      if (candidates.length === 0) {
        throw new BackendError(this.name, `No images found in r/${subreddit} matching size`);
      }

      return this.toImageInfo(pickRandom(candidates, this.random));
    } catch (error) {
      throw toBackendError(this.name, error);
    }
  }

  private toImageInfo(post: RedditPost): ImageInfo {
    const size = previewSize(post);
    const lower = post.url.toLowerCase();
    const extension = ['png', 'webp', 'jpeg', 'jpg'].find(ext => lower.includes(`.${ext}`)) ?? 'jpg';

    return createImageInfo({
      url: post.url,
      width: size?.width,
      height: size?.height,
      source: this.name,
      imageId: post.id,
      extension,
      extra: {
        title: post.title,
        subreddit: post.subreddit,
        score: String(post.score),
      },
    });
  }
}
