/**
 * Pickup
 * Collectible item with a per-type effect on the player
 */

import { AnimationPlayer } from '../animation/AnimationPlayer.js';
import { ASSETS, SCREEN, SOUNDS, SPRITE_SIZES, TILE_SIZE } from '../config/constants.js';
import { createRect, isOnScreen, snapToGrid } from '../geometry/rect.js';
import { logger } from '../utils/logging/logger.js';
import { PICKUP_CLIPS } from './clips.js';

import type { Rect, Surface } from '../platform/types.js';
import type { PickupClip } from './clips.js';
import type { Player } from './Player.js';
import type { EntityServices, PickupType } from './types.js';

type PickupEffect = (player: Player, services: EntityServices) => void;

/**
 * Effect applied on collection, one entry per pickup type. Adding a type to
 * PICKUP_TYPES without an entry here is a compile error.
 */
const PICKUP_EFFECTS: Record<PickupType, PickupEffect> = {
  heart: (player, services) => {
    if (player.heal(1)) {
      logger.debug(`Health restored to ${player.health}/${player.maxHealth}`, { component: 'pickup' });
      services.audio.playSound(SOUNDS.HEAL);
    } else {
      services.audio.playSound(SOUNDS.HEALTH_FULL);
    }
  },
  key: (player, services) => {
    player.addKey();
    logger.debug(`Key collected, holding ${player.keys}`, { component: 'pickup' });
    services.audio.playSound(SOUNDS.KEY);
  },
};

export class Pickup {
  readonly x: number;
  readonly y: number;
  readonly pickupType: PickupType;

  private _collected = false;
  private services: EntityServices;
  readonly anim: AnimationPlayer<PickupClip>;

  constructor(x: number, y: number, pickupType: PickupType, services: EntityServices) {
    this.x = snapToGrid(x, TILE_SIZE);
    this.y = snapToGrid(y, TILE_SIZE);
    this.pickupType = pickupType;
    this.services = services;

    this.anim = new AnimationPlayer({
      sheet: services.sprites.get(ASSETS.PICKUP_SHEET),
      tileSize: SPRITE_SIZES.PICKUP,
      clips: PICKUP_CLIPS,
      clock: services.clock,
    });
    this.anim.play(pickupType);
  }

  get collected(): boolean {
    return this._collected;
  }

  setPaused(paused: boolean): void {
    this.anim.setPaused(paused);
  }

  update(): void {
    if (!this._collected) {
      this.anim.update();
    }
  }

  collect(player: Player): boolean {
    if (this._collected) {
      return false;
    }

    this._collected = true;
    PICKUP_EFFECTS[this.pickupType](player, this.services);
    return true;
  }

  shouldBeRemoved(): boolean {
    return this._collected;
  }

  getRect(): Rect {
    return createRect(this.x, this.y, TILE_SIZE, TILE_SIZE);
  }

  draw(screen: Surface, cameraX: number, cameraY: number): void {
    if (this._collected) return;

    const screenX = this.x - cameraX;
    const screenY = this.y - cameraY;
    if (!isOnScreen(screenX, screenY, TILE_SIZE, TILE_SIZE, SCREEN.WIDTH, SCREEN.HEIGHT)) {
      return;
    }

    const frame = this.anim.getFrame();
    if (frame) {
      screen.blit(frame, { x: screenX, y: screenY });
    }
  }
}
