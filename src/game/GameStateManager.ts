/**
 * Game State Manager
 *
 * Top-level state machine: logo splash, title screen, then gameplay.
 * Every state change goes through a fade to black; while it runs, input is
 * ignored and the current state is frozen.
 */

import {
  ASSETS,
  COLORS,
  SCREEN,
  SOUNDS,
  TITLE_LAYOUT,
  TIMINGS,
} from '../config/constants.js';
import { assertNever } from '../entities/types.js';
import { centeredAt } from '../geometry/rect.js';
import { LevelLoader } from '../level/LevelLoader.js';
import { getErrorMessage } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';
import { getEntityServices } from './GameContext.js';

import type { Font, Surface } from '../platform/types.js';
import type { GameContext } from './GameContext.js';
import type { InputManager } from './InputManager.js';

export type GameState = 'logo' | 'title' | 'game';

interface StateTransition {
  startedAt: number;
  next: GameState;
}

const SCREEN_CENTER = { x: Math.floor(SCREEN.WIDTH / 2), y: Math.floor(SCREEN.HEIGHT / 2) };

export class GameStateManager {
  private context: GameContext;

  private _state: GameState = 'logo';
  private _paused = false;
  private transition: StateTransition | null = null;
  private _levelLoader: LevelLoader | null = null;

  // Logo state
  private logoStartedAt: number | null = null;
  private logoSoundPlayed = false;
  private logoImage: Surface;

  // Title state
  private titleImage: Surface;
  private titleFontSmall: Font;
  private titleFontLarge: Font;

  constructor(context: GameContext) {
    this.context = context;
    this.logoImage = this.loadLogoImage();
    this.titleImage = this.loadTitleImage();
    this.titleFontSmall = this.loadTitleFont(TITLE_LAYOUT.SMALL_FONT_SIZE);
    this.titleFontLarge = this.loadTitleFont(TITLE_LAYOUT.LARGE_FONT_SIZE);
  }

  get state(): GameState {
    return this._state;
  }

  get paused(): boolean {
    return this._paused;
  }

  /** Created on the first entry to the game state */
  get levelLoader(): LevelLoader | null {
    return this._levelLoader;
  }

  isTransitioning(): boolean {
    return this.transition !== null;
  }

  // ===========================================================================
  // ASSETS
  // ===========================================================================

  private loadLogoImage(): Surface {
    try {
      return this.context.platform.loadImage(ASSETS.LOGO_IMAGE);
    } catch (error) {
      logger.warn(`Could not load logo image: ${getErrorMessage(error)}`, { component: 'state' });
    }

    const fallback = this.context.platform.createSurface(SCREEN.WIDTH, SCREEN.HEIGHT);
    fallback.fill(COLORS.LOGO_FALLBACK);
    const text = this.context.platform.defaultFont(TITLE_LAYOUT.LOGO_FALLBACK_FONT_SIZE).render('GAME', COLORS.TEXT);
    fallback.blit(text, centeredAt(SCREEN_CENTER, text.width, text.height));
    return fallback;
  }

  private loadTitleImage(): Surface {
    try {
      return this.context.platform.loadImage(ASSETS.TITLE_IMAGE);
    } catch (error) {
      logger.warn(`Could not load title image: ${getErrorMessage(error)}`, { component: 'state' });
    }

    const fallback = this.context.platform.createSurface(SCREEN.WIDTH, SCREEN.HEIGHT);
    fallback.fill(COLORS.TITLE_FALLBACK);
    return fallback;
  }

  private loadTitleFont(size: number): Font {
    try {
      return this.context.platform.loadFont(ASSETS.TITLE_FONT, size);
    } catch (error) {
      logger.warn(`Could not load title font at size ${size}: ${getErrorMessage(error)}`, { component: 'state' });
      return this.context.platform.defaultFont(size);
    }
  }

  // ===========================================================================
  // TRANSITIONS
  // ===========================================================================

  /**
   * Begin a fade to `next`. False while another transition is running.
   */
  startStateTransition(next: GameState): boolean {
    if (this.transition) {
      return false;
    }

    this.transition = { startedAt: this.context.clock.now(), next };
    return true;
  }

  private changeState(next: GameState): void {
    const previous = this._state;
    this._state = next;

    switch (next) {
      case 'game':
        if (previous !== 'game' && !this._levelLoader) {
          this._levelLoader = this.createLevelLoader();
          this._levelLoader.loadCurrentLevel();
        }
        break;
      case 'logo':
        this.logoStartedAt = null;
        this.logoSoundPlayed = false;
        break;
      case 'title':
        break;
      default:
        assertNever(next);
    }

    logger.info(`Entered ${next} state`, { component: 'state', from: previous });
  }

  private createLevelLoader(): LevelLoader {
    const { context } = this;
    return new LevelLoader({
      levels: context.config.levels,
      maps: context.maps,
      services: getEntityServices(context),
      createSurface: (width, height) => context.platform.createSurface(width, height),
      isDebug: () => context.debug,
    });
  }

  // ===========================================================================
  // UPDATE
  // ===========================================================================

  update(): void {
    if (this.transition) {
      if (this.context.clock.now() - this.transition.startedAt >= TIMINGS.TRANSITION_DURATION) {
        const { next } = this.transition;
        this.transition = null;
        this.changeState(next);
      }
      return;
    }

    switch (this._state) {
      case 'logo':
        this.updateLogo();
        break;
      case 'title':
        // Static; waits for input
        break;
      case 'game':
        if (!this._paused && this._levelLoader) {
          this._levelLoader.update();
        }
        break;
      default:
        assertNever(this._state);
    }
  }

  private updateLogo(): void {
    const now = this.context.clock.now();
    if (this.logoStartedAt === null) {
      this.logoStartedAt = now;
    }

    const elapsed = now - this.logoStartedAt;

    if (!this.logoSoundPlayed && elapsed >= TIMINGS.LOGO.SOUND_DELAY) {
      this.context.audio.playSound(SOUNDS.LOGO_STINGER);
      this.logoSoundPlayed = true;
    }

    if (elapsed >= TIMINGS.LOGO.DURATION) {
      this.startStateTransition('title');
    }
  }

  // ===========================================================================
  // INPUT
  // ===========================================================================

  handleInput(input: InputManager): void {
    if (this.transition) return;

    switch (this._state) {
      case 'logo':
        break;
      case 'title':
        if (input.isKeyPressed('action')) {
          logger.info('Starting game from title screen', { component: 'state' });
          this.startStateTransition('game');
        }
        break;
      case 'game':
        this.handleGameInput(input);
        break;
      default:
        assertNever(this._state);
    }
  }

  private handleGameInput(input: InputManager): void {
    if (input.isKeyPressed('pause')) {
      this.togglePause();
    }
    if (input.isKeyPressed('debug')) {
      this.toggleDebug();
    }

    const loader = this._levelLoader;
    const player = loader?.player;
    if (this._paused || !loader || !player) return;

    if (input.isKeyPressed('action')) {
      player.startAttack();
    }

    if (player.state !== 'attacking' && !loader.isTransitioning()) {
      const direction = input.getMoveDirection();
      if (direction) {
        loader.movePlayer(direction.dx, direction.dy);
      }
    }
  }

  /**
   * Pause or resume gameplay. Only takes effect in the game state.
   */
  togglePause(): void {
    if (this._state !== 'game') return;

    this._paused = !this._paused;
    this.context.gameClock.setPaused(this._paused);
    this._levelLoader?.setPaused(this._paused);
    logger.info(`Game ${this._paused ? 'paused' : 'unpaused'}`, { component: 'state' });
  }

  toggleDebug(): void {
    this.context.debug = !this.context.debug;
    logger.info(`Debug mode: ${this.context.debug ? 'ON' : 'OFF'}`, { component: 'state' });
  }

  // ===========================================================================
  // RENDERING
  // ===========================================================================

  draw(screen: Surface): void {
    switch (this._state) {
      case 'logo':
        this.drawLogo(screen);
        break;
      case 'title':
        this.drawTitle(screen);
        break;
      case 'game':
        this.drawGame(screen);
        break;
      default:
        assertNever(this._state);
    }

    // Always last
    if (this.transition) {
      const progress = Math.min(
        1,
        (this.context.clock.now() - this.transition.startedAt) / TIMINGS.TRANSITION_DURATION
      );
      screen.fill({ ...COLORS.BLACK, a: Math.floor(255 * progress) });
    }
  }

  private drawLogo(screen: Surface): void {
    screen.fill(COLORS.BLACK);
    screen.blit(this.logoImage, centeredAt(SCREEN_CENTER, this.logoImage.width, this.logoImage.height));
  }

  private drawTitle(screen: Surface): void {
    screen.fill(COLORS.BLACK);
    screen.blit(this.titleImage, centeredAt(SCREEN_CENTER, this.titleImage.width, this.titleImage.height));

    const highScore = this.titleFontSmall.render(`High Score: ${this.context.highScore}`, COLORS.TEXT);
    screen.blit(
      highScore,
      centeredAt({ x: SCREEN_CENTER.x, y: TITLE_LAYOUT.HIGH_SCORE_Y }, highScore.width, highScore.height)
    );

    const pressStart = this.titleFontLarge.render('PRESS START', COLORS.TEXT);
    screen.blit(
      pressStart,
      centeredAt({ x: SCREEN_CENTER.x, y: TITLE_LAYOUT.PRESS_START_Y }, pressStart.width, pressStart.height)
    );
  }

  private drawGame(screen: Surface): void {
    if (!this._levelLoader) return;

    this._levelLoader.draw(screen);

    if (this._paused) {
      screen.fill(COLORS.PAUSE_OVERLAY);

      if (this.context.debug) {
        screen.fill(COLORS.PAUSE_MARKER, { x: SCREEN.WIDTH - 8, y: 4, width: 4, height: 4 });
      }
    }
  }
}
