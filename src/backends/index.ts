import { BackendRegistry } from './registry';
import { BingBackend } from './bing-backend';
import { PicsumBackend } from './picsum-backend';
import { RedditBackend } from './reddit-backend';
import { UnsplashBackend } from './unsplash-backend';
import { WallhavenBackend } from './wallhaven-backend';

export * from './base-backend';
export * from './registry';
export * from './bing-backend';
export * from './picsum-backend';
export * from './reddit-backend';
export * from './unsplash-backend';
export * from './wallhaven-backend';

let defaultRegistry: BackendRegistry | null = null;

export function registerBuiltinBackends(registry: BackendRegistry): BackendRegistry {
  return registry
    .register(new BingBackend())
    .register(new PicsumBackend())
    .register(new RedditBackend())
    .register(new UnsplashBackend())
    .register(new WallhavenBackend());
}

/**
 * Builds the process-wide registry on first call; later calls return it.
 */
export function initBackends(): BackendRegistry {
  if (!defaultRegistry) {
    defaultRegistry = registerBuiltinBackends(new BackendRegistry());
  }
  return defaultRegistry;
}
