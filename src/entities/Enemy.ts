/**
 * Enemy
 * Patrols back and forth along one axis, pausing at the end of every leg
 */

import { AnimationPlayer } from '../animation/AnimationPlayer.js';
import { ASSETS, ENEMY_DEFAULTS, SOUNDS, SPRITE_SIZES, TILE_SIZE, TIMINGS } from '../config/constants.js';
import { createRect, snapToGrid } from '../geometry/rect.js';
import { ENEMY_CLIPS } from './clips.js';
import { assertNever, flipFacing } from './types.js';

import type { Rect, Surface } from '../platform/types.js';
import type { EnemyClip } from './clips.js';
import type { CollisionQuery, EnemyState, EntityServices, Facing, MovementAxis } from './types.js';

export interface EnemyOptions {
  /** Selects the sprite sheet `images/enemy_<type>.png` */
  enemyType?: string;
  movement?: MovementAxis;
  /** Tiles walked per patrol leg */
  blocks?: number;
}

export class Enemy {
  readonly kind = 'enemy' as const;

  x: number;
  y: number;
  readonly startX: number;
  readonly startY: number;
  readonly enemyType: string;
  readonly movement: MovementAxis;
  readonly blocks: number;
  readonly moveCooldown = TIMINGS.ENEMY.MOVE_COOLDOWN;

  facing: Facing = 'right';
  blocksMoved = 0;

  private _state: EnemyState = 'moving';
  private stateTimer = 0;
  private lastMove = Number.NEGATIVE_INFINITY;

  private services: EntityServices;
  readonly anim: AnimationPlayer<EnemyClip>;

  constructor(x: number, y: number, services: EntityServices, options: EnemyOptions = {}) {
    this.x = snapToGrid(x, TILE_SIZE);
    this.y = snapToGrid(y, TILE_SIZE);
    this.startX = this.x;
    this.startY = this.y;
    this.enemyType = options.enemyType ?? ENEMY_DEFAULTS.TYPE;
    this.movement = options.movement ?? ENEMY_DEFAULTS.MOVEMENT;
    this.blocks = options.blocks ?? ENEMY_DEFAULTS.BLOCKS;
    this.services = services;

    this.anim = new AnimationPlayer({
      sheet: services.sprites.get(ASSETS.enemySheet(this.enemyType)),
      tileSize: SPRITE_SIZES.ENEMY,
      clips: ENEMY_CLIPS,
      clock: services.clock,
    });
    this.anim.play('walk_right');
  }

  get state(): EnemyState {
    return this._state;
  }

  /** Hurt and dying enemies neither deal nor take hits */
  isVulnerable(): boolean {
    return this._state !== 'hurt' && this._state !== 'dying';
  }

  setPaused(paused: boolean): void {
    this.anim.setPaused(paused);
  }

  update(level: CollisionQuery | null = null): void {
    const now = this.services.clock.now();

    switch (this._state) {
      case 'dying':
        if (now - this.stateTimer >= TIMINGS.ENEMY.DEATH_DURATION) {
          return;
        }
        break;
      case 'hurt':
        if (now - this.stateTimer >= TIMINGS.ENEMY.HURT_DURATION) {
          this._state = 'moving';
          this.anim.play(`walk_${this.facing}`);
        }
        break;
      case 'moving':
        this.updateMovement(now, level);
        break;
      case 'idle':
        if (now - this.stateTimer >= TIMINGS.ENEMY.IDLE_DURATION) {
          this.facing = flipFacing(this.facing);
          this._state = 'moving';
          this.blocksMoved = 0;
          this.anim.play(`walk_${this.facing}`);
        }
        break;
      default:
        assertNever(this._state);
    }

    this.anim.update(now);
  }

  private updateMovement(now: number, level: CollisionQuery | null): void {
    if (now - this.lastMove < this.moveCooldown) return;

    const step = this.facing === 'right' ? 1 : -1;
    const dx = this.movement === 'horizontal' ? step : 0;
    const dy = this.movement === 'vertical' ? step : 0;

    const newX = this.x + dx * TILE_SIZE;
    const newY = this.y + dy * TILE_SIZE;

    const canMove = level ? !level.isPositionBlocked(newX, newY) : true;

    if (canMove) {
      this.x = newX;
      this.y = newY;
      this.blocksMoved++;
      this.lastMove = now;

      if (this.blocksMoved >= this.blocks) {
        this.enterIdle(now);
      }
    } else {
      // Wall ahead: rest now, turn around once the rest is over
      this.enterIdle(now);
    }
  }

  private enterIdle(now: number): void {
    this._state = 'idle';
    this.stateTimer = now;
    this.anim.play(`idle_${this.facing}`);
  }

  takeDamage(): boolean {
    if (!this.isVulnerable()) {
      return false;
    }

    this._state = 'hurt';
    this.stateTimer = this.services.clock.now();
    this.anim.play(`hurt_${this.facing}`, true);
    return true;
  }

  startDeath(): void {
    this._state = 'dying';
    this.stateTimer = this.services.clock.now();
    this.services.audio.playSound(SOUNDS.HIT);
  }

  shouldBeRemoved(): boolean {
    return (
      this._state === 'dying' &&
      this.services.clock.now() - this.stateTimer >= TIMINGS.ENEMY.DEATH_DURATION
    );
  }

  getRect(): Rect {
    return createRect(this.x, this.y, TILE_SIZE, TILE_SIZE);
  }

  draw(screen: Surface, cameraX: number, cameraY: number): void {
    if (this._state === 'dying') {
      if (Math.floor(this.services.clock.now() * TIMINGS.BLINK_RATE) % 2 === 1) {
        return;
      }
    }

    const frame = this.anim.getFrame();
    if (frame) {
      screen.blit(frame, { x: this.x - cameraX, y: this.y - cameraY });
    }
  }
}
