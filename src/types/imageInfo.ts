export interface ImageInfo {
  readonly url: string;            // Final download URL
  readonly width?: number;         // Best effort, absent when the source does not say
  readonly height?: number;
  readonly source: string;         // Backend name
  readonly imageId: string;        // Stable id from the source, '' when unknown
  readonly extension: string;      // Lower-case, no leading dot
  readonly extra: Readonly<Record<string, string>>;
}

export interface ImageInfoInput {
  url: string;
  width?: number | null;
  height?: number | null;
  source?: string;
  imageId?: string;
  extension?: string;
  extra?: Record<string, string>;
}

export const DEFAULT_EXTENSION = 'jpg';

export function createImageInfo(input: ImageInfoInput): ImageInfo {
  const info: ImageInfo = {
    url: input.url,
    width: input.width ?? undefined,
    height: input.height ?? undefined,
    source: input.source ?? '',
    imageId: input.imageId ?? '',
    extension: (input.extension || DEFAULT_EXTENSION).toLowerCase(),
    extra: Object.freeze({ ...(input.extra ?? {}) }),
  };
  return Object.freeze(info);
}
