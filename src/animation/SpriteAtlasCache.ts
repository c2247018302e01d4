/**
 * Sprite Atlas Cache
 * Decodes each sprite sheet once and shares it between every animation
 * player that references it. Sheets are read-only once loaded.
 */

import { logger } from '../utils/logging/logger.js';

import type { ImageLoader, Surface } from '../platform/types.js';

export class SpriteAtlasCache {
  private loader: ImageLoader;
  private cache: Map<string, Surface> = new Map();

  constructor(loader: ImageLoader) {
    this.loader = loader;
  }

  /**
   * Get the decoded sheet for `path`, loading it on first request.
   * Failed loads are not cached, so a later call retries.
   *
   * @throws AssetError when the loader cannot provide the image
   */
  get(path: string): Surface {
    const cached = this.cache.get(path);
    if (cached) {
      return cached;
    }

    const image = this.loader.loadImage(path);
    this.cache.set(path, image);
    logger.debug(`Loaded sprite sheet ${path}`, { component: 'sprites' });
    return image;
  }

  has(path: string): boolean {
    return this.cache.has(path);
  }

  get size(): number {
    return this.cache.size;
  }

  /**
   * Get list of all loaded sheet paths
   */
  getLoadedPaths(): string[] {
    return Array.from(this.cache.keys());
  }
}
