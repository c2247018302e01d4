/**
 * Input Manager
 * Polls the platform key state once per frame and derives edge states
 */

import { GAME_KEYS } from '../platform/types.js';

import type { GameKey, KeyboardState } from '../platform/types.js';

export type KeyState = 'up' | 'down' | 'pressed' | 'released';

export interface MoveDirection {
  dx: number;
  dy: number;
}

const DIRECTIONS: ReadonlyArray<{ key: GameKey; direction: MoveDirection }> = [
  { key: 'left', direction: { dx: -1, dy: 0 } },
  { key: 'right', direction: { dx: 1, dy: 0 } },
  { key: 'up', direction: { dx: 0, dy: -1 } },
  { key: 'down', direction: { dx: 0, dy: 1 } },
];

export class InputManager {
  private keys: Map<GameKey, KeyState> = new Map();

  /**
   * Sample the keyboard. Call once at the start of every frame.
   */
  update(keyboard: KeyboardState): void {
    for (const key of GAME_KEYS) {
      const wasDown = this.isKeyDown(key);
      const isDown = keyboard.isDown(key);

      if (isDown) {
        this.keys.set(key, wasDown ? 'down' : 'pressed');
      } else {
        this.keys.set(key, wasDown ? 'released' : 'up');
      }
    }
  }

  getKeyState(key: GameKey): KeyState {
    return this.keys.get(key) ?? 'up';
  }

  /**
   * Check if a key is currently held down
   */
  isKeyDown(key: GameKey): boolean {
    const state = this.keys.get(key);
    return state === 'down' || state === 'pressed';
  }

  /**
   * Check if a key went down this frame
   */
  isKeyPressed(key: GameKey): boolean {
    return this.keys.get(key) === 'pressed';
  }

  /**
   * Check if a key went up this frame
   */
  isKeyReleased(key: GameKey): boolean {
    return this.keys.get(key) === 'released';
  }

  /**
   * Held movement direction. A direction only counts while none of the
   * other three is held, so diagonals and opposing keys give null.
   */
  getMoveDirection(): MoveDirection | null {
    const held = DIRECTIONS.filter(({ key }) => this.isKeyDown(key));
    return held.length === 1 ? held[0].direction : null;
  }

  /**
   * Reset all input state
   */
  reset(): void {
    this.keys.clear();
  }
}
