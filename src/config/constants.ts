/**
 * Centralized Constants Configuration
 *
 * Namespaced access to the fixed timings, sizes, asset paths and sound ids
 * used by the engine. Runtime-tunable values (levels, log level, fps) live in
 * env.ts instead.
 *
 * Usage:
 *   import { TILE_SIZE, TIMINGS, SOUNDS } from '../config/constants.js';
 *
 *   if (now - this.stateTimer >= TIMINGS.PLAYER.HURT_DURATION) { ... }
 */

import type { Color } from '../platform/types.js';

/** Edge length of one map tile, in pixels. Every entity position is a multiple of it. */
export const TILE_SIZE = 16;

export const SCREEN = {
  WIDTH: 320,
  HEIGHT: 240,
} as const;

/**
 * All durations are in seconds of clock time.
 */
export const TIMINGS = {
  TRANSITION_DURATION: 0.5,
  LOGO: {
    DURATION: 3.0,
    SOUND_DELAY: 0.3,
  },
  PLAYER: {
    MOVE_COOLDOWN: 0.15,
    ATTACK_DURATION: 0.5,
    HURT_DURATION: 1.0,
    INVINCIBILITY: 1.8,
  },
  ENEMY: {
    MOVE_COOLDOWN: 0.3,
    IDLE_DURATION: 3.0,
    HURT_DURATION: 0.8,
    DEATH_DURATION: 1.0,
  },
  /** Frame time shared by every animated map tile */
  ANIMATED_TILE_FRAME: 0.6,
  /** Blink parity window: draws are skipped while floor(now * BLINK_RATE) is odd */
  BLINK_RATE: 10,
} as const;

export const PLAYER_MAX_HEALTH = 3;

export const ENEMY_DEFAULTS = {
  TYPE: 'rat',
  MOVEMENT: 'horizontal',
  BLOCKS: 2,
} as const;

export const LAYERS = {
  COLLIDERS: 'colliders',
  BACKGROUND: 'background',
  ANIMATED: 'animated',
  OBJECTS: 'objects',
} as const;

export const ASSETS = {
  LOGO_IMAGE: 'images/state_logo.png',
  TITLE_IMAGE: 'images/state_title.png',
  TITLE_FONT: 'fonts/early-gameboy.ttf',
  PLAYER_SHEET: 'images/player.png',
  SWORD_SHEET: 'images/weapons_animated.png',
  PICKUP_SHEET: 'images/pickup_animated.png',
  HUD_SHEET: 'images/ui_hud.png',
  enemySheet: (enemyType: string): string => `images/enemy_${enemyType}.png`,
} as const;

export const SPRITE_SIZES = {
  PLAYER: TILE_SIZE,
  SWORD: 48,
  ENEMY: TILE_SIZE,
  PICKUP: TILE_SIZE,
  HUD: TILE_SIZE,
} as const;

/**
 * Sound effect ids as understood by the platform audio layer.
 */
export const SOUNDS = {
  LOGO_STINGER: 'gold_2',
  ATTACK: 'sword_2',
  HIT: 'hit_7',
  GAME_OVER: 'game_over',
  DOOR: 'wings',
  HEAL: 'gold_2',
  HEALTH_FULL: 'hit_7',
  KEY: 'gold_2',
} as const;

export type SoundId = (typeof SOUNDS)[keyof typeof SOUNDS];

export const COLORS = {
  TEXT: { r: 120, g: 164, b: 106 },
  BLACK: { r: 0, g: 0, b: 0 },
  LOGO_FALLBACK: { r: 64, g: 64, b: 64 },
  TITLE_FALLBACK: { r: 32, g: 32, b: 64 },
  DEBUG_COLLIDER: { r: 255, g: 0, b: 0, a: 128 },
  DEBUG_DOOR_OPEN: { r: 0, g: 255, b: 0, a: 128 },
  DEBUG_DOOR_LOCKED: { r: 255, g: 255, b: 0, a: 128 },
  DEBUG_PICKUP: { r: 0, g: 0, b: 255, a: 128 },
  PAUSE_OVERLAY: { r: 0, g: 0, b: 0, a: 96 },
  PAUSE_MARKER: { r: 255, g: 255, b: 0 },
} as const satisfies Record<string, Color>;

export const TITLE_LAYOUT = {
  HIGH_SCORE_Y: 160,
  PRESS_START_Y: 192,
  SMALL_FONT_SIZE: 12,
  LARGE_FONT_SIZE: 16,
  LOGO_FALLBACK_FONT_SIZE: 36,
} as const;

export const HUD_LAYOUT = {
  X: 16,
  Y: 16,
  FULL_HEART_COL: 0,
  EMPTY_HEART_COL: 2,
} as const;
