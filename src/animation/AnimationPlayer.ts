/**
 * Animation Player
 * Frame-timing state machine over a named set of sprite-sheet clips
 */

import { AnimationError } from '../utils/errorTypes.js';

import type { Clock } from '../time/clock.js';
import type { Rect, Surface } from '../platform/types.js';

/** Grid coordinate of a frame in the sheet: [row, column] */
export type FrameCoord = readonly [row: number, col: number];

export interface AnimationClip {
  frames: readonly FrameCoord[];
  /** Seconds each frame stays on screen */
  duration: number;
  loop: boolean;
}

export type ClipSet<Name extends string = string> = Readonly<Record<Name, AnimationClip>>;

export interface AnimationPlayerConfig<Name extends string> {
  /** Shared sheet, usually from SpriteAtlasCache */
  sheet: Surface;
  /** Edge length of one square frame in the sheet */
  tileSize: number;
  clips: ClipSet<Name>;
  clock: Clock;
}

/**
 * Throws when a clip set breaks the clip invariants.
 */
export function validateClips(clips: ClipSet): void {
  for (const [name, clip] of Object.entries(clips)) {
    if (clip.frames.length === 0) {
      throw new AnimationError(`Animation clip "${name}" has no frames`, { clip: name });
    }
    if (!(clip.duration > 0)) {
      throw new AnimationError(`Animation clip "${name}" needs a positive frame duration`, {
        clip: name,
        duration: clip.duration,
      });
    }
  }
}

/**
 * Plays one clip at a time. Frames are cut from the sheet on first use and
 * cached for the lifetime of the player.
 *
 * @example
 * ```typescript
 * const anim = new AnimationPlayer({ sheet, tileSize: 16, clips, clock });
 * anim.play('walk_left', false); // no restart if already walking left
 * anim.update();
 * const frame = anim.getFrame();
 * if (frame) screen.blit(frame, { x, y });
 * ```
 */
export class AnimationPlayer<Name extends string = string> {
  private sheet: Surface;
  private tileSize: number;
  private clips: ClipSet<Name>;
  private clock: Clock;
  private frames: Map<string, Surface> = new Map();

  private currentClip: Name | null = null;
  private frameIndex = 0;
  private lastAdvance = 0;
  private finished = false;
  private paused = false;
  private pausedAt: number | null = null;

  constructor(config: AnimationPlayerConfig<Name>) {
    validateClips(config.clips);
    this.sheet = config.sheet;
    this.tileSize = config.tileSize;
    this.clips = config.clips;
    this.clock = config.clock;
  }

  getCurrentClip(): Name | null {
    return this.currentClip;
  }

  getFrameIndex(): number {
    return this.frameIndex;
  }

  isFinished(): boolean {
    return this.finished;
  }

  isPaused(): boolean {
    return this.paused;
  }

  hasClip(name: string): name is Name {
    return Object.prototype.hasOwnProperty.call(this.clips, name);
  }

  /**
   * Select a clip. Restarts it when it differs from the current one or
   * `reset` is set; otherwise leaves frame state alone.
   */
  play(name: Name, reset: boolean = true): void {
    if (!this.hasClip(name)) return;

    if (this.currentClip !== name || reset) {
      this.currentClip = name;
      this.frameIndex = 0;
      this.lastAdvance = this.clock.now();
      this.finished = false;
      if (this.paused) {
        this.pausedAt = this.lastAdvance;
      }
    }
  }

  setPaused(paused: boolean): void {
    if (paused === this.paused) return;

    const now = this.clock.now();
    if (paused) {
      this.pausedAt = now;
    } else if (this.pausedAt !== null) {
      // Time spent paused does not count toward the next frame
      this.lastAdvance += now - this.pausedAt;
      this.pausedAt = null;
    }
    this.paused = paused;
  }

  /**
   * Advance by every whole frame duration elapsed since the last advance.
   */
  update(now: number = this.clock.now()): void {
    if (this.currentClip === null || this.finished || this.paused) return;

    const clip = this.clips[this.currentClip];
    const lastIndex = clip.frames.length - 1;

    while (now - this.lastAdvance >= clip.duration) {
      this.lastAdvance += clip.duration;
      this.frameIndex++;

      if (this.frameIndex > lastIndex) {
        if (clip.loop) {
          this.frameIndex = 0;
        } else {
          this.frameIndex = lastIndex;
          this.finished = true;
          break;
        }
      }
    }
  }

  /**
   * Current frame image, or null when no clip has been played yet
   */
  getFrame(): Surface | null {
    if (this.currentClip === null) return null;

    const clip = this.clips[this.currentClip];
    const index = Math.min(this.frameIndex, clip.frames.length - 1);
    const key = `${this.currentClip}:${index}`;

    let frame = this.frames.get(key);
    if (!frame) {
      frame = this.sheet.subsurface(this.getFrameRect(clip.frames[index]));
      this.frames.set(key, frame);
    }
    return frame;
  }

  private getFrameRect([row, col]: FrameCoord): Rect {
    return {
      x: col * this.tileSize,
      y: row * this.tileSize,
      width: this.tileSize,
      height: this.tileSize,
    };
  }
}
