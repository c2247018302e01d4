/**
 * Audio Service
 * Fire-and-forget sound and music calls. A failing audio backend is logged
 * and otherwise ignored, so gameplay never depends on sound.
 */

import { logger } from '../utils/logging/logger.js';
import { getErrorMessage } from '../utils/errorTypes.js';

import type { AudioOutput } from '../platform/types.js';
import type { SoundId } from '../config/constants.js';

export class AudioService {
  private output: AudioOutput;
  private currentTrack: string | null = null;

  constructor(output: AudioOutput) {
    this.output = output;
  }

  /**
   * Track most recently started, or null after stopMusic()
   */
  getCurrentTrack(): string | null {
    return this.currentTrack;
  }

  playSound(id: SoundId): void {
    try {
      this.output.playSound(id);
    } catch (error) {
      logger.warn(`Could not play sound ${id}: ${getErrorMessage(error)}`, { component: 'audio' });
    }
  }

  playMusic(track: string): void {
    try {
      this.output.playMusic(track);
      this.currentTrack = track;
    } catch (error) {
      this.currentTrack = null;
      logger.warn(`Could not play music ${track}: ${getErrorMessage(error)}`, { component: 'audio' });
    }
  }

  stopMusic(): void {
    this.currentTrack = null;
    try {
      this.output.stopMusic();
    } catch (error) {
      logger.warn(`Could not stop music: ${getErrorMessage(error)}`, { component: 'audio' });
    }
  }
}
