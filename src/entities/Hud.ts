/**
 * Heads-up display: one heart per point of maximum health
 */

import { ASSETS, HUD_LAYOUT, SPRITE_SIZES } from '../config/constants.js';

import type { SpriteAtlasCache } from '../animation/SpriteAtlasCache.js';
import type { Surface } from '../platform/types.js';

export interface HealthSource {
  readonly health: number;
  readonly maxHealth: number;
}

export class Hud {
  private fullHeart: Surface;
  private emptyHeart: Surface;

  constructor(sprites: SpriteAtlasCache) {
    const sheet = sprites.get(ASSETS.HUD_SHEET);
    const size = SPRITE_SIZES.HUD;
    this.fullHeart = sheet.subsurface({ x: HUD_LAYOUT.FULL_HEART_COL * size, y: 0, width: size, height: size });
    this.emptyHeart = sheet.subsurface({ x: HUD_LAYOUT.EMPTY_HEART_COL * size, y: 0, width: size, height: size });
  }

  draw(screen: Surface, player: HealthSource): void {
    for (let i = 0; i < player.maxHealth; i++) {
      const heart = i < player.health ? this.fullHeart : this.emptyHeart;
      screen.blit(heart, { x: HUD_LAYOUT.X + i * SPRITE_SIZES.HUD, y: HUD_LAYOUT.Y });
    }
  }
}
