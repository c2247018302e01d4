/**
 * Player
 * Grid-stepping hero with a melee attack, a hurt window with invincibility,
 * and a terminal death sequence
 */

import { AnimationPlayer } from '../animation/AnimationPlayer.js';
import {
  ASSETS,
  PLAYER_MAX_HEALTH,
  SOUNDS,
  SPRITE_SIZES,
  TILE_SIZE,
  TIMINGS,
} from '../config/constants.js';
import { createRect, snapToGrid } from '../geometry/rect.js';
import { logger } from '../utils/logging/logger.js';
import { assertNever } from './types.js';
import { PLAYER_CLIPS, SWORD_CLIPS } from './clips.js';

import type { Rect, Surface } from '../platform/types.js';
import type { EntityServices, Facing, PlayerState } from './types.js';
import type { PlayerClip, SwordClip } from './clips.js';

export class Player {
  readonly kind = 'player' as const;
  readonly maxHealth = PLAYER_MAX_HEALTH;

  x: number;
  y: number;
  facing: Facing = 'right';
  health = PLAYER_MAX_HEALTH;
  keys = 0;

  private _state: PlayerState = 'idle';
  private stateTimer = 0;
  private _invincibleTimer = 0;
  private lastMove = Number.NEGATIVE_INFINITY;
  private lastUpdate: number | null = null;

  private services: EntityServices;
  readonly anim: AnimationPlayer<PlayerClip>;
  readonly swordAnim: AnimationPlayer<SwordClip>;

  constructor(x: number, y: number, services: EntityServices) {
    this.x = snapToGrid(x, TILE_SIZE);
    this.y = snapToGrid(y, TILE_SIZE);
    this.services = services;

    this.anim = new AnimationPlayer({
      sheet: services.sprites.get(ASSETS.PLAYER_SHEET),
      tileSize: SPRITE_SIZES.PLAYER,
      clips: PLAYER_CLIPS,
      clock: services.clock,
    });
    this.swordAnim = new AnimationPlayer({
      sheet: services.sprites.get(ASSETS.SWORD_SHEET),
      tileSize: SPRITE_SIZES.SWORD,
      clips: SWORD_CLIPS,
      clock: services.clock,
    });
    this.anim.play('idle_right');
  }

  get state(): PlayerState {
    return this._state;
  }

  /** Seconds of invincibility left */
  get invincibleTimer(): number {
    return this._invincibleTimer;
  }

  isInvincible(): boolean {
    return this._invincibleTimer > 0;
  }

  isDead(): boolean {
    return this.health <= 0;
  }

  setPaused(paused: boolean): void {
    this.anim.setPaused(paused);
    this.swordAnim.setPaused(paused);
  }

  update(): void {
    const now = this.services.clock.now();

    if (this._invincibleTimer > 0) {
      const elapsed = now - (this.lastUpdate ?? now);
      this._invincibleTimer = Math.max(0, this._invincibleTimer - elapsed);
    }

    switch (this._state) {
      case 'dying':
        // Play the death clip once, then hold its last frame for good
        if (!this.anim.isFinished()) {
          this.anim.update(now);
        }
        break;
      case 'hurt':
        if (now - this.stateTimer >= TIMINGS.PLAYER.HURT_DURATION) {
          this._state = 'idle';
        }
        this.anim.update(now);
        break;
      case 'attacking':
        if (now - this.stateTimer >= TIMINGS.PLAYER.ATTACK_DURATION) {
          this._state = 'idle';
        }
        this.swordAnim.update(now);
        this.anim.update(now);
        break;
      case 'idle':
      case 'moving':
        this.anim.play(`${this._state === 'moving' ? 'walk' : 'idle'}_${this.facing}`, false);
        this.anim.update(now);
        break;
      default:
        assertNever(this._state);
    }

    this.lastUpdate = now;
  }

  /**
   * Step one tile. The caller has already checked the level's collision
   * grid; this enforces state, cooldown and level bounds.
   */
  move(dx: number, dy: number, levelWidth: number, levelHeight: number, now: number): boolean {
    if (this._state === 'attacking' || this._state === 'hurt' || this._state === 'dying') {
      return false;
    }
    if (now - this.lastMove < TIMINGS.PLAYER.MOVE_COOLDOWN) {
      return false;
    }

    const newX = this.x + dx * TILE_SIZE;
    const newY = this.y + dy * TILE_SIZE;

    if (newX < 0 || newX > levelWidth - TILE_SIZE || newY < 0 || newY > levelHeight - TILE_SIZE) {
      return false;
    }

    if (dx > 0) {
      this.facing = 'right';
    } else if (dx < 0) {
      this.facing = 'left';
    }

    this.x = newX;
    this.y = newY;
    this.lastMove = now;
    this._state = 'moving';
    return true;
  }

  startAttack(): boolean {
    if (this._state === 'attacking' || this._state === 'hurt' || this._state === 'dying') {
      return false;
    }

    this._state = 'attacking';
    this.stateTimer = this.services.clock.now();
    this.services.audio.playSound(SOUNDS.ATTACK);
    this.swordAnim.play(`attack_${this.facing}`, true);
    return true;
  }

  takeDamage(amount: number = 1): boolean {
    if (this._invincibleTimer > 0 || this._state === 'hurt' || this._state === 'dying') {
      return false;
    }

    this.health -= amount;
    if (this.health <= 0) {
      this.startDeath();
    } else {
      this.startHurt();
    }
    return true;
  }

  /**
   * Restore health up to the maximum. Returns false when already full.
   */
  heal(amount: number = 1): boolean {
    if (this.health >= this.maxHealth) {
      return false;
    }
    this.health = Math.min(this.maxHealth, this.health + amount);
    return true;
  }

  addKey(): void {
    this.keys++;
  }

  private startHurt(): void {
    this._state = 'hurt';
    this.stateTimer = this.services.clock.now();
    this._invincibleTimer = TIMINGS.PLAYER.INVINCIBILITY;
    this.services.audio.playSound(SOUNDS.HIT);
    this.anim.play(`hurt_${this.facing}`, true);
  }

  private startDeath(): void {
    logger.info('Player died', { component: 'player' });
    this._state = 'dying';
    this.stateTimer = this.services.clock.now();
    this.services.audio.stopMusic();
    this.services.audio.playSound(SOUNDS.GAME_OVER);
    this.anim.play(`die_${this.facing}`, true);
  }

  getRect(): Rect {
    return createRect(this.x, this.y, TILE_SIZE, TILE_SIZE);
  }

  /**
   * Hitbox of the sword: one tile beside the player on the facing side.
   * Null unless attacking.
   */
  getSwordRect(): Rect | null {
    if (this._state !== 'attacking') return null;

    const x = this.facing === 'right' ? this.x + TILE_SIZE : this.x - TILE_SIZE;
    return createRect(x, this.y, TILE_SIZE, TILE_SIZE);
  }

  draw(screen: Surface, cameraX: number, cameraY: number): void {
    const screenX = this.x - cameraX;
    const screenY = this.y - cameraY;

    // Blink while invincible, but not during the hurt or death clips
    if (this._invincibleTimer > 0 && this._state !== 'hurt' && this._state !== 'dying') {
      if (Math.floor(this.services.clock.now() * TIMINGS.BLINK_RATE) % 2 === 1) {
        return;
      }
    }

    const frame = this.anim.getFrame();
    if (frame) {
      screen.blit(frame, { x: screenX, y: screenY });
    }

    if (this._state === 'attacking') {
      const swordFrame = this.swordAnim.getFrame();
      if (swordFrame) {
        // 48px sword tile centred on the player tile
        screen.blit(swordFrame, { x: screenX - TILE_SIZE, y: screenY - TILE_SIZE });
      }
    }
  }
}
