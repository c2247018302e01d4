/**
 * Engine Error Type Definitions
 *
 * Errors raised inside the engine. Level loading and asset fallbacks catch
 * them at the point of occurrence; callers of the game loop only ever see
 * boolean outcomes.
 */

/**
 * Error type discriminator for engine errors.
 * Used in discriminated unions for exhaustive error handling.
 */
export type GameErrorType =
  | 'ASSET_ERROR'
  | 'MAP_FORMAT_ERROR'
  | 'CONFIG_ERROR'
  | 'ANIMATION_ERROR';

/**
 * Base class for engine errors.
 * Provides common structure and serialization for all engine errors.
 */
export abstract class GameError extends Error {
  abstract readonly type: GameErrorType;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): { type: GameErrorType; message: string; context?: Record<string, unknown> } {
    return {
      type: this.type,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

/**
 * An image, font, map or audio resource could not be found or decoded.
 *
 * @example
 * throw new AssetError('Image not found', 'images/player.png');
 */
export class AssetError extends GameError {
  readonly type = 'ASSET_ERROR' as const;

  constructor(
    message: string,
    public readonly assetPath?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(assetPath && { assetPath }) });
  }

  static notFound(assetPath: string): AssetError {
    return new AssetError(`Asset not found: ${assetPath}`, assetPath);
  }
}

export function isAssetError(error: unknown): error is AssetError {
  return error instanceof AssetError;
}

/**
 * A tile-map document does not have the shape the engine reads.
 *
 * @example
 * throw new MapFormatError('Compressed layer data is not supported', { layer: 'background' });
 */
export class MapFormatError extends GameError {
  readonly type = 'MAP_FORMAT_ERROR' as const;
}

export function isMapFormatError(error: unknown): error is MapFormatError {
  return error instanceof MapFormatError;
}

/**
 * Environment configuration failed validation at startup.
 */
export class ConfigError extends GameError {
  readonly type = 'CONFIG_ERROR' as const;

  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, issues.length > 0 ? { issues } : undefined);
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * An animation clip definition violates its invariants (empty frame list,
 * non-positive frame duration).
 */
export class AnimationError extends GameError {
  readonly type = 'ANIMATION_ERROR' as const;
}

export function isGameError(error: unknown): error is GameError {
  return error instanceof GameError;
}

/**
 * Extract a printable message from anything that was thrown.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
