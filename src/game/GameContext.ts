/**
 * Game Context
 * Process-scoped services and flags, built once at startup and passed down
 */

import { AudioService } from '../audio/audioService.js';
import { SpriteAtlasCache } from '../animation/SpriteAtlasCache.js';
import { TiledJsonMapSource } from '../level/tiledJson.js';
import { PausableClock, SystemClock } from '../time/clock.js';

import type { GameConfig } from '../config/env.js';
import type { EntityServices } from '../entities/types.js';
import type { TileMapSource } from '../level/tileMap.js';
import type { Platform } from '../platform/types.js';
import type { Clock } from '../time/clock.js';

export interface GameContext {
  readonly config: GameConfig;
  readonly platform: Platform;
  /** Real time; drives the screen-to-screen fades */
  readonly clock: Clock;
  /** Gameplay time; stops while the game is paused */
  readonly gameClock: PausableClock;
  readonly sprites: SpriteAtlasCache;
  readonly audio: AudioService;
  readonly maps: TileMapSource;
  /** Debug overlay toggle */
  debug: boolean;
  highScore: number;
}

export interface GameContextOptions {
  /** Defaults to the host monotonic timer */
  clock?: Clock;
  /** Defaults to Tiled JSON maps under `config.mapDir` */
  maps?: TileMapSource;
}

export function createGameContext(
  config: GameConfig,
  platform: Platform,
  options: GameContextOptions = {}
): GameContext {
  const clock = options.clock ?? new SystemClock();
  const sprites = new SpriteAtlasCache(platform);

  return {
    config,
    platform,
    clock,
    gameClock: new PausableClock(clock),
    sprites,
    audio: new AudioService(platform.audio),
    maps: options.maps ?? new TiledJsonMapSource(config.mapDir, sprites),
    debug: config.debug,
    highScore: 0,
  };
}

/**
 * Services handed to every entity, bound to the gameplay clock
 */
export function getEntityServices(context: GameContext): EntityServices {
  return {
    clock: context.gameClock,
    sprites: context.sprites,
    audio: context.audio,
  };
}
