/**
 * Platform Layer Contract
 *
 * The engine never decodes files, talks to an audio device or polls hardware
 * itself. A host (a browser canvas, an SDL binding, a headless test harness)
 * implements these interfaces and hands them to createGame().
 */

import type { Point, Rect } from '../geometry/rect.js';

export type { Point, Rect } from '../geometry/rect.js';

/**
 * RGB color with optional alpha (0-255, default opaque).
 */
export interface Color {
  r: number;
  g: number;
  b: number;
  a?: number;
}

/**
 * A drawable image. Surfaces returned by `subsurface` share pixels with
 * their parent and are treated as read-only by the engine.
 */
export interface Surface {
  readonly width: number;
  readonly height: number;
  /** Copy `source` (or the `area` of it) with its top-left corner at `dest` */
  blit(source: Surface, dest: Point, area?: Rect): void;
  /** Fill the whole surface, or `rect`, blending by the color's alpha */
  fill(color: Color, rect?: Rect): void;
  /** View onto a sub-rectangle of this surface */
  subsurface(rect: Rect): Surface;
}

export interface Font {
  render(text: string, color: Color): Surface;
}

export interface ImageLoader {
  /**
   * Decode an image file.
   * @throws AssetError when the file is missing or undecodable
   */
  loadImage(path: string): Surface;
}

/**
 * Fire-and-forget audio. Implementations may throw; the engine wraps every
 * call in AudioService and carries on.
 */
export interface AudioOutput {
  playSound(id: string): void;
  playMusic(track: string): void;
  stopMusic(): void;
}

export const GAME_KEYS = ['left', 'right', 'up', 'down', 'action', 'pause', 'debug'] as const;

export type GameKey = (typeof GAME_KEYS)[number];

/**
 * Per-frame key query. `action` doubles as attack in game and confirm on
 * the title screen.
 */
export interface KeyboardState {
  isDown(key: GameKey): boolean;
}

export interface Platform extends ImageLoader {
  /**
   * @throws AssetError when the font file is missing or undecodable
   */
  loadFont(path: string, size: number): Font;
  /** Built-in font; never fails */
  defaultFont(size: number): Font;
  createSurface(width: number, height: number): Surface;
  readonly audio: AudioOutput;
  readonly keyboard: KeyboardState;
}
