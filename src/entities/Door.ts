import { createRect, rectsIntersect } from '../geometry/rect.js';

import type { Rect } from '../platform/types.js';

/**
 * Level exit. Unlocked doors send the player to the next level.
 */
export class Door {
  readonly rect: Rect;
  locked: boolean;

  constructor(x: number, y: number, width: number, height: number, locked: boolean = true) {
    this.rect = createRect(x, y, width, height);
    this.locked = locked;
  }

  canEnter(): boolean {
    return !this.locked;
  }

  checkCollision(playerRect: Rect): boolean {
    return rectsIntersect(this.rect, playerRect);
  }
}
