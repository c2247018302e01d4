/**
 * In-process stand-ins for the platform layer, the clock and the map source
 */

import { AudioService } from '../../src/audio/audioService.js';
import { SpriteAtlasCache } from '../../src/animation/SpriteAtlasCache.js';
import { AssetError } from '../../src/utils/errorTypes.js';

import type { EntityServices } from '../../src/entities/types.js';
import type { MapLayer, MapObject, MapPropertyValue, TileMap, TileMapSource } from '../../src/level/tileMap.js';
import type {
  AudioOutput,
  Color,
  Font,
  GameKey,
  KeyboardState,
  Platform,
  Point,
  Rect,
  Surface,
} from '../../src/platform/types.js';
import type { Clock } from '../../src/time/clock.js';

// =============================================================================
// CLOCK
// =============================================================================

export class ManualClock implements Clock {
  private time: number;

  constructor(start: number = 0) {
    this.time = start;
  }

  now(): number {
    return this.time;
  }

  advance(seconds: number): void {
    this.time += seconds;
  }

  set(seconds: number): void {
    this.time = seconds;
  }
}

// =============================================================================
// SURFACES
// =============================================================================

export interface BlitCall {
  source: Surface;
  dest: Point;
  area?: Rect;
}

export interface FillCall {
  color: Color;
  rect?: Rect;
}

/**
 * Surface that records what is drawn onto it
 */
export class FakeSurface implements Surface {
  readonly width: number;
  readonly height: number;
  readonly label: string;
  readonly blits: BlitCall[] = [];
  readonly fills: FillCall[] = [];
  readonly subsurfaces: Rect[] = [];

  constructor(width: number, height: number, label: string) {
    this.width = width;
    this.height = height;
    this.label = label;
  }

  blit(source: Surface, dest: Point, area?: Rect): void {
    this.blits.push({ source, dest: { x: dest.x, y: dest.y }, ...(area && { area }) });
  }

  fill(color: Color, rect?: Rect): void {
    this.fills.push({ color: { ...color }, ...(rect && { rect }) });
  }

  subsurface(rect: Rect): Surface {
    this.subsurfaces.push(rect);
    return new FakeSurface(rect.width, rect.height, `${this.label}@${rect.x},${rect.y}`);
  }

  /** Labels of blitted surfaces, in draw order */
  blitLabels(): string[] {
    return this.blits.map((call) => labelOf(call.source));
  }

  clear(): void {
    this.blits.length = 0;
    this.fills.length = 0;
  }
}

export function labelOf(surface: Surface | null): string {
  if (surface === null) return 'null';
  return surface instanceof FakeSurface ? surface.label : 'unknown';
}

/** Glyphs are 8x8 */
export class FakeFont implements Font {
  readonly name: string;
  readonly rendered: string[] = [];

  constructor(name: string) {
    this.name = name;
  }

  render(text: string, _color: Color): Surface {
    this.rendered.push(text);
    return new FakeSurface(text.length * 8, 8, `${this.name}:${text}`);
  }
}

// =============================================================================
// AUDIO AND INPUT
// =============================================================================

export class FakeAudioOutput implements AudioOutput {
  readonly calls: string[] = [];
  failing = false;

  playSound(id: string): void {
    if (this.failing) throw new Error('audio device unavailable');
    this.calls.push(`sound:${id}`);
  }

  playMusic(track: string): void {
    if (this.failing) throw new Error('audio device unavailable');
    this.calls.push(`music:${track}`);
  }

  stopMusic(): void {
    if (this.failing) throw new Error('audio device unavailable');
    this.calls.push('stop');
  }

  sounds(): string[] {
    return this.calls.filter((call) => call.startsWith('sound:')).map((call) => call.slice('sound:'.length));
  }
}

export class FakeKeyboard implements KeyboardState {
  readonly held: Set<GameKey> = new Set();

  isDown(key: GameKey): boolean {
    return this.held.has(key);
  }

  press(...keys: GameKey[]): void {
    for (const key of keys) this.held.add(key);
  }

  release(...keys: GameKey[]): void {
    for (const key of keys) this.held.delete(key);
  }
}

// =============================================================================
// PLATFORM
// =============================================================================

export class FakePlatform implements Platform {
  readonly audio = new FakeAudioOutput();
  readonly keyboard = new FakeKeyboard();
  /** Paths that fail to load */
  readonly missing: Set<string> = new Set();
  readonly imageSizes: Map<string, { width: number; height: number }> = new Map();
  readonly loadedImages: string[] = [];
  readonly createdSurfaces: FakeSurface[] = [];

  loadImage(path: string): Surface {
    if (this.missing.has(path)) {
      throw AssetError.notFound(path);
    }
    this.loadedImages.push(path);
    const size = this.imageSizes.get(path) ?? { width: 256, height: 256 };
    return new FakeSurface(size.width, size.height, path);
  }

  loadFont(path: string, size: number): Font {
    if (this.missing.has(path)) {
      throw AssetError.notFound(path);
    }
    return new FakeFont(`${path}#${size}`);
  }

  defaultFont(size: number): Font {
    return new FakeFont(`default#${size}`);
  }

  createSurface(width: number, height: number): FakeSurface {
    const surface = new FakeSurface(width, height, `surface#${this.createdSurfaces.length}`);
    this.createdSurfaces.push(surface);
    return surface;
  }
}

export interface TestServices extends EntityServices {
  clock: ManualClock;
  platform: FakePlatform;
}

export function createTestServices(clock: ManualClock = new ManualClock()): TestServices {
  const platform = new FakePlatform();
  return {
    clock,
    platform,
    sprites: new SpriteAtlasCache(platform),
    audio: new AudioService(platform.audio),
  };
}

// =============================================================================
// MAPS
// =============================================================================

/**
 * Turn rows of text into a gid grid: `.` is empty, a digit is that gid,
 * any other character is gid 1.
 */
export function gidRows(rows: string[]): number[][] {
  return rows.map((row) =>
    Array.from(row, (char) => {
      if (char === '.') return 0;
      const digit = Number(char);
      return Number.isInteger(digit) ? digit : 1;
    })
  );
}

let nextObjectId = 1;

export function mapObject(
  name: string,
  x: number,
  y: number,
  properties: Record<string, MapPropertyValue> = {},
  size: { width: number; height: number } = { width: 16, height: 16 }
): MapObject {
  return { id: nextObjectId++, name, x, y, width: size.width, height: size.height, properties };
}

export interface TestMapOptions {
  colliders?: string[];
  background?: string[];
  animated?: string[];
  objects?: MapObject[];
  /** Frame gids per animated gid */
  animations?: Record<number, number[]>;
  /** Defaults to the width of the longest layer row */
  width?: number;
  height?: number;
}

/**
 * In-memory map with 16px tiles. Tile images are FakeSurfaces labelled
 * `tile:<gid>`.
 */
export function createTestMap(options: TestMapOptions): TileMap {
  const layers: MapLayer[] = [];
  const tileRows: Array<[string, string[] | undefined]> = [
    ['background', options.background],
    ['colliders', options.colliders],
    ['animated', options.animated],
  ];

  let width = options.width ?? 0;
  let height = options.height ?? 0;
  for (const [name, rows] of tileRows) {
    if (!rows) continue;
    const gids = gidRows(rows);
    const layerWidth = Math.max(0, ...gids.map((row) => row.length));
    width = Math.max(width, layerWidth);
    height = Math.max(height, gids.length);
    layers.push({ kind: 'tiles', name, width: layerWidth, height: gids.length, gids });
  }
  if (options.objects) {
    layers.push({ kind: 'objects', name: 'objects', objects: options.objects });
  }

  const images = new Map<number, Surface>();
  const animations = options.animations ?? {};

  return {
    width,
    height,
    tileWidth: 16,
    tileHeight: 16,
    layers,
    tileImage(gid: number): Surface | null {
      if (gid <= 0) return null;
      let image = images.get(gid);
      if (!image) {
        image = new FakeSurface(16, 16, `tile:${gid}`);
        images.set(gid, image);
      }
      return image;
    },
    tileAnimation(gid: number): readonly number[] | null {
      return animations[gid] ?? null;
    },
  };
}

/**
 * Map source backed by a dictionary; unknown levels fail like a missing file
 */
export class MemoryMapSource implements TileMapSource {
  readonly maps: Map<string, TileMap> = new Map();
  readonly loads: string[] = [];

  constructor(maps: Record<string, TileMap> = {}) {
    for (const [name, map] of Object.entries(maps)) {
      this.maps.set(name, map);
    }
  }

  load(levelName: string): TileMap {
    this.loads.push(levelName);
    const map = this.maps.get(levelName);
    if (!map) {
      throw AssetError.notFound(`${levelName}.tmj`);
    }
    return map;
  }
}
