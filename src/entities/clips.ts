/**
 * Sprite-sheet clip tables for every animated entity.
 * Frame coordinates are [row, column] in tiles of the owning sheet.
 */

import type { ClipSet } from '../animation/AnimationPlayer.js';
import type { Facing, PickupType } from './types.js';

export type PlayerClip = `${'idle' | 'walk' | 'hurt' | 'die'}_${Facing}`;
export type SwordClip = `attack_${Facing}`;
export type EnemyClip = `${'idle' | 'walk' | 'hurt'}_${Facing}`;
export type PickupClip = PickupType;

export const PLAYER_CLIPS = {
  idle_right: { frames: [[0, 0], [0, 1], [0, 2]], duration: 0.6, loop: true },
  idle_left: { frames: [[1, 0], [1, 1], [1, 2]], duration: 0.6, loop: true },
  walk_right: { frames: [[2, 0], [2, 1], [2, 2], [2, 3]], duration: 0.6, loop: true },
  walk_left: { frames: [[3, 0], [3, 1], [3, 2], [3, 3]], duration: 0.6, loop: true },
  hurt_right: { frames: [[4, 1], [4, 2], [4, 3], [4, 4], [4, 5]], duration: 0.6, loop: false },
  hurt_left: { frames: [[5, 1], [5, 2], [5, 3], [5, 4], [5, 5]], duration: 0.6, loop: false },
  die_right: { frames: [[6, 1], [6, 2], [6, 3]], duration: 0.6, loop: false },
  die_left: { frames: [[7, 1], [7, 2], [7, 3]], duration: 0.6, loop: false },
} as const satisfies ClipSet<PlayerClip>;

export const SWORD_CLIPS = {
  attack_left: { frames: [[0, 0], [0, 1], [0, 2], [0, 3], [0, 4]], duration: 0.1, loop: false },
  attack_right: { frames: [[2, 0], [2, 1], [2, 2], [2, 3], [2, 4]], duration: 0.1, loop: false },
} as const satisfies ClipSet<SwordClip>;

export const ENEMY_CLIPS = {
  idle_right: { frames: [[0, 0], [0, 1]], duration: 0.6, loop: true },
  idle_left: { frames: [[1, 0], [1, 1]], duration: 0.6, loop: true },
  walk_right: { frames: [[2, 0], [2, 1], [2, 2]], duration: 0.4, loop: true },
  walk_left: { frames: [[3, 0], [3, 1], [3, 2]], duration: 0.4, loop: true },
  hurt_right: { frames: [[4, 0], [4, 1], [4, 2], [4, 3]], duration: 0.2, loop: false },
  hurt_left: { frames: [[5, 0], [5, 1], [5, 2], [5, 3]], duration: 0.2, loop: false },
} as const satisfies ClipSet<EnemyClip>;

export const PICKUP_CLIPS = {
  heart: { frames: [[4, 0], [4, 1], [4, 2], [4, 3]], duration: 0.6, loop: true },
  key: { frames: [[0, 0], [0, 1], [0, 2], [0, 3]], duration: 0.6, loop: true },
} as const satisfies ClipSet<PickupClip>;
