export * from './backends';
export * from './cache/imageCache';
export * from './config/config';
export * from './fetcher/onlineFetcher';
export * from './http/session';
export * from './types/imageInfo';
export * from './utils/errorHandler';
export { logger, Logger, LogLevel } from './utils/logger';
