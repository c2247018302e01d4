/**
 * Entity Types
 * Closed state sets and shared service bundle for the entity state machines
 */

import type { AudioService } from '../audio/audioService.js';
import type { SpriteAtlasCache } from '../animation/SpriteAtlasCache.js';
import type { Clock } from '../time/clock.js';

export type Facing = 'left' | 'right';

export type PlayerState = 'idle' | 'moving' | 'attacking' | 'hurt' | 'dying';

export type EnemyState = 'moving' | 'idle' | 'hurt' | 'dying';

export type MovementAxis = 'horizontal' | 'vertical';

export const PICKUP_TYPES = ['heart', 'key'] as const;

export type PickupType = (typeof PICKUP_TYPES)[number];

/**
 * Services every entity needs. `clock` is the gameplay clock, which stops
 * while the game is paused.
 */
export interface EntityServices {
  clock: Clock;
  sprites: SpriteAtlasCache;
  audio: AudioService;
}

/**
 * Level collision lookup handed to enemies during their update.
 */
export interface CollisionQuery {
  isPositionBlocked(x: number, y: number): boolean;
}

export function flipFacing(facing: Facing): Facing {
  return facing === 'right' ? 'left' : 'right';
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled state: ${String(value)}`);
}
