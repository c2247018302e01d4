/**
 * Tile-based action game engine
 *
 * Usage:
 *   const game = createGame(platform);
 *   game.runtime.start(screen);
 */

import { loadGameConfig } from './config/env.js';
import { createGameContext } from './game/GameContext.js';
import { GameRuntime } from './game/GameRuntime.js';
import { GameStateManager } from './game/GameStateManager.js';
import { InputManager } from './game/InputManager.js';
import { logger } from './utils/logging/logger.js';

import type { EnvSource, GameConfig } from './config/env.js';
import type { GameContext } from './game/GameContext.js';
import type { TileMapSource } from './level/tileMap.js';
import type { Platform } from './platform/types.js';
import type { Clock } from './time/clock.js';

export * from './config/constants.js';
export * from './config/env.js';
export * from './utils/errorTypes.js';
export * from './utils/logging/index.js';
export * from './geometry/rect.js';
export { GAME_KEYS } from './platform/types.js';
export type {
  AudioOutput,
  Color,
  Font,
  GameKey,
  ImageLoader,
  KeyboardState,
  Platform,
  Surface,
} from './platform/types.js';
export * from './time/clock.js';
export * from './audio/audioService.js';
export * from './animation/AnimationPlayer.js';
export * from './animation/SpriteAtlasCache.js';
export * from './entities/types.js';
export * from './entities/clips.js';
export * from './entities/Player.js';
export * from './entities/Enemy.js';
export * from './entities/Pickup.js';
export * from './entities/Door.js';
export * from './entities/Hud.js';
export * from './level/tileMap.js';
export * from './level/tiledJson.js';
export * from './level/objectConfig.js';
export * from './level/collisionGrid.js';
export * from './level/LevelLoader.js';
export * from './game/GameContext.js';
export * from './game/InputManager.js';
export * from './game/GameStateManager.js';
export * from './game/GameRuntime.js';

export interface CreateGameOptions {
  /** Ready-made configuration; when absent it is read from `env` */
  config?: GameConfig;
  /** Environment to read configuration from, defaults to process.env */
  env?: EnvSource;
  clock?: Clock;
  maps?: TileMapSource;
}

export interface Game {
  config: GameConfig;
  context: GameContext;
  manager: GameStateManager;
  input: InputManager;
  runtime: GameRuntime;
}

/**
 * Build a game on top of a platform. Nothing is loaded or played until the
 * runtime runs its first frame, apart from the logo and title art.
 *
 * @throws ConfigError when the environment configuration is invalid
 */
export function createGame(platform: Platform, options: CreateGameOptions = {}): Game {
  const config = options.config ?? loadGameConfig(options.env);
  logger.setLevel(config.logLevel);

  const context = createGameContext(config, platform, { clock: options.clock, maps: options.maps });
  const manager = new GameStateManager(context);
  const input = new InputManager();
  const runtime = new GameRuntime({
    manager,
    input,
    keyboard: platform.keyboard,
    clock: context.clock,
    targetFps: config.targetFps,
  });

  logger.info(`Game created with ${config.levels.length} levels`, { component: 'runtime' });
  return { config, context, manager, input, runtime };
}
