/**
 * Game Runtime
 * Drives the frame loop: input, state update, then drawing
 */

import { getErrorMessage } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';

import type { KeyboardState, Surface } from '../platform/types.js';
import type { Clock } from '../time/clock.js';
import type { GameStateManager } from './GameStateManager.js';
import type { InputManager } from './InputManager.js';

export type RunState = 'stopped' | 'running';

export interface GameRuntimeConfig {
  manager: GameStateManager;
  input: InputManager;
  keyboard: KeyboardState;
  clock: Clock;
  targetFps?: number;
}

export interface FrameStats {
  /** Frames run since the runtime was created */
  frame: number;
  targetFps: number;
  /** Frames counted over the last full second */
  fps: number;
}

export class GameRuntime {
  private manager: GameStateManager;
  private input: InputManager;
  private keyboard: KeyboardState;
  private clock: Clock;

  private state: RunState = 'stopped';
  private timer: ReturnType<typeof setInterval> | null = null;
  private fpsUpdateTime: number | null = null;
  private framesSinceFpsUpdate = 0;

  readonly stats: FrameStats;

  constructor(config: GameRuntimeConfig) {
    this.manager = config.manager;
    this.input = config.input;
    this.keyboard = config.keyboard;
    this.clock = config.clock;

    this.stats = {
      frame: 0,
      targetFps: config.targetFps ?? 60,
      fps: 0,
    };
  }

  getState(): RunState {
    return this.state;
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  /**
   * Run one frame. An error thrown by game code is logged and the frame is
   * abandoned; the next frame runs normally.
   */
  frame(screen: Surface): void {
    try {
      this.input.update(this.keyboard);
      this.manager.handleInput(this.input);
      this.manager.update();
      this.manager.draw(screen);
    } catch (error) {
      logger.error(`Frame ${this.stats.frame} failed: ${getErrorMessage(error)}`, error, { component: 'runtime' });
    }

    this.stats.frame++;
    this.updateFps();
  }

  private updateFps(): void {
    const now = this.clock.now();
    if (this.fpsUpdateTime === null) {
      this.fpsUpdateTime = now;
    }

    this.framesSinceFpsUpdate++;
    if (now - this.fpsUpdateTime >= 1) {
      this.stats.fps = Math.round(this.framesSinceFpsUpdate / (now - this.fpsUpdateTime));
      this.framesSinceFpsUpdate = 0;
      this.fpsUpdateTime = now;
    }
  }

  /**
   * Run frames on a fixed timer until stop() is called
   */
  start(screen: Surface): void {
    if (this.state === 'running') return;

    this.state = 'running';
    this.fpsUpdateTime = null;
    this.framesSinceFpsUpdate = 0;
    this.timer = setInterval(() => this.frame(screen), 1000 / this.stats.targetFps);
    logger.info(`Game loop started at ${this.stats.targetFps} fps`, { component: 'runtime' });
  }

  stop(): void {
    if (this.state === 'stopped') return;

    this.state = 'stopped';
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.input.reset();
    logger.info(`Game loop stopped after ${this.stats.frame} frames`, { component: 'runtime' });
  }
}
