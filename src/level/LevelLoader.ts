/**
 * Level Loader
 *
 * Builds a playable level from a tile map and runs it: entity updates,
 * collision resolution, cleanup, rendering and the fade between levels.
 *
 * A level is built completely before anything is replaced, so a failed load
 * leaves the current level running.
 */

import { COLORS, LAYERS, SCREEN, SOUNDS, TILE_SIZE, TIMINGS } from '../config/constants.js';
import { Door } from '../entities/Door.js';
import { Enemy } from '../entities/Enemy.js';
import { Hud } from '../entities/Hud.js';
import { Pickup } from '../entities/Pickup.js';
import { Player } from '../entities/Player.js';
import { isOnScreen, rectsIntersect } from '../geometry/rect.js';
import { logger } from '../utils/logging/logger.js';
import { CollisionGrid } from './collisionGrid.js';
import { parseLevelObject } from './objectConfig.js';
import { findObjectLayer, findTileLayer, forEachTile } from './tileMap.js';

import type { CollisionQuery, EntityServices } from '../entities/types.js';
import type { Surface } from '../platform/types.js';
import type { TileMap, TileMapSource } from './tileMap.js';

export type LevelEntity = Player | Enemy;

export interface AnimatedTile {
  x: number;
  y: number;
  frames: Surface[];
}

export interface LevelLoaderOptions {
  /** Level names in play order */
  levels: readonly string[];
  maps: TileMapSource;
  /** Entity services; `services.clock` must be the pausable gameplay clock */
  services: EntityServices;
  createSurface: (width: number, height: number) => Surface;
  /** Read every frame to decide whether the debug overlay is drawn */
  isDebug?: () => boolean;
}

interface BuiltLevel {
  name: string;
  map: TileMap;
  grid: CollisionGrid;
  background: Surface;
  animatedTiles: AnimatedTile[];
  entities: LevelEntity[];
  player: Player | null;
  doors: Door[];
  pickups: Pickup[];
  hud: Hud;
  music: string | null;
}

export class LevelLoader implements CollisionQuery {
  private levels: readonly string[];
  private maps: TileMapSource;
  private services: EntityServices;
  private createSurface: (width: number, height: number) => Surface;
  private isDebug: () => boolean;

  private levelIndex = 0;
  private levelName: string | null = null;
  private map: TileMap | null = null;
  private grid: CollisionGrid = CollisionGrid.empty(TILE_SIZE);
  private background: Surface | null = null;
  private animatedTiles: AnimatedTile[] = [];
  private entities: LevelEntity[] = [];
  private _player: Player | null = null;
  private _doors: Door[] = [];
  private _pickups: Pickup[] = [];
  private hud: Hud | null = null;

  private paused = false;
  private transitionStartedAt: number | null = null;

  // Fixed camera; levels are a single screen
  readonly cameraX = 0;
  readonly cameraY = 0;

  constructor(options: LevelLoaderOptions) {
    this.levels = options.levels;
    this.maps = options.maps;
    this.services = options.services;
    this.createSurface = options.createSurface;
    this.isDebug = options.isDebug ?? (() => false);
  }

  // ===========================================================================
  // ACCESSORS
  // ===========================================================================

  get player(): Player | null {
    return this._player;
  }

  get enemies(): Enemy[] {
    return this.entities.filter((entity): entity is Enemy => entity.kind === 'enemy');
  }

  get pickups(): readonly Pickup[] {
    return this._pickups;
  }

  get doors(): readonly Door[] {
    return this._doors;
  }

  get collisionGrid(): CollisionGrid {
    return this.grid;
  }

  get currentLevelIndex(): number {
    return this.levelIndex;
  }

  /** Name of the level currently loaded, or null before the first load */
  get currentLevelName(): string | null {
    return this.levelName;
  }

  getEntities(): readonly LevelEntity[] {
    return this.entities;
  }

  getAnimatedTiles(): readonly AnimatedTile[] {
    return this.animatedTiles;
  }

  isTransitioning(): boolean {
    return this.transitionStartedAt !== null;
  }

  /**
   * Level size in pixels, or 0x0 before the first load
   */
  getLevelSize(): { width: number; height: number } {
    if (!this.map) {
      return { width: 0, height: 0 };
    }
    return {
      width: this.map.width * this.map.tileWidth,
      height: this.map.height * this.map.tileHeight,
    };
  }

  // ===========================================================================
  // LOADING
  // ===========================================================================

  /**
   * Load the level at the current index. Returns false, keeping the running
   * level, when the map or any asset it needs cannot be loaded.
   */
  loadCurrentLevel(): boolean {
    const levelName = this.levels[this.levelIndex];
    if (levelName === undefined) {
      return false;
    }

    let level: BuiltLevel;
    try {
      level = this.buildLevel(levelName);
    } catch (error) {
      logger.error('Failed to load level', error, { component: 'level', level: levelName });
      return false;
    }

    this.commit(level);
    logger.info('Loaded level', {
      component: 'level',
      level: levelName,
      enemies: this.enemies.length,
      pickups: level.pickups.length,
      doors: level.doors.length,
    });
    return true;
  }

  private buildLevel(levelName: string): BuiltLevel {
    const map = this.maps.load(levelName);

    const grid = CollisionGrid.fromLayer(findTileLayer(map, LAYERS.COLLIDERS), map.width, map.height, TILE_SIZE);
    const background = this.renderBackground(map);
    const animatedTiles = this.collectAnimatedTiles(map);
    const hud = this.hud ?? new Hud(this.services.sprites);

    const entities: LevelEntity[] = [];
    const doors: Door[] = [];
    const pickups: Pickup[] = [];
    let player: Player | null = null;
    let music: string | null = null;

    const objects = findObjectLayer(map, LAYERS.OBJECTS)?.objects ?? [];
    for (const object of objects) {
      const spec = parseLevelObject(object);
      if (!spec) continue;

      switch (spec.kind) {
        case 'player': {
          if (player) {
            logger.warn(`Extra player object ${object.id} ignored`, { component: 'level', level: levelName });
            break;
          }
          player = new Player(spec.rect.x, spec.rect.y, this.services);
          if (this._player) {
            player.health = this._player.health;
          }
          entities.push(player);
          break;
        }
        case 'door':
          doors.push(new Door(spec.rect.x, spec.rect.y, spec.rect.width, spec.rect.height, spec.config.locked));
          break;
        case 'pickup':
          pickups.push(new Pickup(spec.rect.x, spec.rect.y, spec.config.pickup_type, this.services));
          break;
        case 'enemy':
          entities.push(
            new Enemy(spec.rect.x, spec.rect.y, this.services, {
              enemyType: spec.config.enemy_type,
              movement: spec.config.enemy_movement,
              blocks: spec.config.blocks,
            })
          );
          break;
        case 'info':
          music = spec.config.music ?? music;
          break;
      }
    }

    if (!player) {
      logger.warn('No player object', { component: 'level', level: levelName });
    }

    return { name: levelName, map, grid, background, animatedTiles, entities, player, doors, pickups, hud, music };
  }

  /**
   * Composite the background and collider layers into one level-sized image
   */
  private renderBackground(map: TileMap): Surface {
    const surface = this.createSurface(map.width * map.tileWidth, map.height * map.tileHeight);

    for (const layerName of [LAYERS.BACKGROUND, LAYERS.COLLIDERS]) {
      const layer = findTileLayer(map, layerName);
      if (!layer) continue;

      forEachTile(layer, (col, row, gid) => {
        const tile = map.tileImage(gid);
        if (tile) {
          surface.blit(tile, { x: col * map.tileWidth, y: row * map.tileHeight });
        }
      });
    }

    return surface;
  }

  private collectAnimatedTiles(map: TileMap): AnimatedTile[] {
    const layer = findTileLayer(map, LAYERS.ANIMATED);
    if (!layer) return [];

    const tiles: AnimatedTile[] = [];
    forEachTile(layer, (col, row, gid) => {
      const frameGids = map.tileAnimation(gid) ?? [];
      const frames: Surface[] = [];
      for (const frameGid of frameGids) {
        const image = map.tileImage(frameGid);
        if (image) frames.push(image);
      }
      // Static tiles on this layer are not drawn
      if (frames.length > 1) {
        tiles.push({ x: col * map.tileWidth, y: row * map.tileHeight, frames });
      }
    });
    return tiles;
  }

  private commit(level: BuiltLevel): void {
    this.levelName = level.name;
    this.map = level.map;
    this.grid = level.grid;
    this.background = level.background;
    this.animatedTiles = level.animatedTiles;
    this.entities = level.entities;
    this._player = level.player;
    this._doors = level.doors;
    this._pickups = level.pickups;
    this.hud = level.hud;

    if (this.paused) {
      this.setPaused(true);
    }

    if (level.music) {
      this.services.audio.stopMusic();
      this.services.audio.playMusic(level.music);
    }
  }

  // ===========================================================================
  // LEVEL SEQUENCE
  // ===========================================================================

  /**
   * Begin the fade out of the current level. False while already fading.
   */
  startTransition(): boolean {
    if (this.transitionStartedAt !== null) {
      return false;
    }
    this.transitionStartedAt = this.services.clock.now();
    return true;
  }

  /**
   * Advance to the next level. Past the last level the index stays on the
   * last one and nothing is loaded.
   */
  nextLevel(): boolean {
    const nextIndex = this.levelIndex + 1;
    if (nextIndex >= this.levels.length) {
      this.levelIndex = Math.max(0, this.levels.length - 1);
      logger.info('All levels completed', { component: 'level' });
      return false;
    }

    const previousIndex = this.levelIndex;
    this.levelIndex = nextIndex;
    if (!this.loadCurrentLevel()) {
      this.levelIndex = previousIndex;
      return false;
    }
    return true;
  }

  // ===========================================================================
  // SIMULATION
  // ===========================================================================

  update(): void {
    if (this.transitionStartedAt !== null) {
      if (this.services.clock.now() - this.transitionStartedAt >= TIMINGS.TRANSITION_DURATION) {
        this.transitionStartedAt = null;
        this.nextLevel();
      }
      return;
    }

    for (const entity of this.entities) {
      if (entity.kind === 'enemy') {
        entity.update(this);
      } else {
        entity.update();
      }
    }

    for (const pickup of this._pickups) {
      pickup.update();
    }

    this.checkCollisions();

    this.entities = this.entities.filter((entity) => !(entity.kind === 'enemy' && entity.shouldBeRemoved()));
    this._pickups = this._pickups.filter((pickup) => !pickup.shouldBeRemoved());
  }

  /**
   * Resolve this frame's overlaps: one pickup, then doors (which end the
   * frame), then enemy contact, then the sword.
   */
  checkCollisions(): void {
    const player = this._player;
    if (!player) return;

    const playerRect = player.getRect();

    for (const pickup of this._pickups) {
      if (!pickup.collected && rectsIntersect(playerRect, pickup.getRect())) {
        pickup.collect(player);
        break;
      }
    }

    if (this.transitionStartedAt === null) {
      for (const door of this._doors) {
        if (door.checkCollision(playerRect) && door.canEnter()) {
          logger.debug('Player entered door', { component: 'level' });
          this.services.audio.playSound(SOUNDS.DOOR);
          this.startTransition();
          return;
        }
      }
    }

    const enemies = this.enemies;

    if (!player.isInvincible()) {
      const attacker = enemies.find((enemy) => enemy.isVulnerable() && rectsIntersect(playerRect, enemy.getRect()));
      if (attacker) {
        player.takeDamage(1);
      }
    }

    const swordRect = player.getSwordRect();
    if (swordRect) {
      const target = enemies.find((enemy) => enemy.isVulnerable() && rectsIntersect(swordRect, enemy.getRect()));
      if (target && target.takeDamage()) {
        target.startDeath();
      }
    }
  }

  isPositionBlocked(x: number, y: number): boolean {
    return this.grid.isBlocked(x, y);
  }

  /**
   * Step the player one tile if the destination tile is open. The player
   * still applies its own state, cooldown and bounds checks.
   */
  movePlayer(dx: number, dy: number): boolean {
    const player = this._player;
    if (!player) return false;

    const newX = player.x + dx * TILE_SIZE;
    const newY = player.y + dy * TILE_SIZE;
    if (this.isPositionBlocked(newX, newY)) {
      return false;
    }

    const { width, height } = this.getLevelSize();
    return player.move(dx, dy, width, height, this.services.clock.now());
  }

  /**
   * Freeze or resume every animation in the level. Levels loaded while
   * paused start paused.
   */
  setPaused(paused: boolean): void {
    this.paused = paused;
    for (const entity of this.entities) {
      entity.setPaused(paused);
    }
    for (const pickup of this._pickups) {
      pickup.setPaused(paused);
    }
  }

  // ===========================================================================
  // RENDERING
  // ===========================================================================

  draw(screen: Surface): void {
    if (this.background) {
      screen.blit(this.background, { x: 0, y: 0 }, {
        x: this.cameraX,
        y: this.cameraY,
        width: SCREEN.WIDTH,
        height: SCREEN.HEIGHT,
      });
    }

    this.drawAnimatedTiles(screen);

    for (const pickup of this._pickups) {
      pickup.draw(screen, this.cameraX, this.cameraY);
    }

    for (const entity of this.entities) {
      entity.draw(screen, this.cameraX, this.cameraY);
    }

    if (this._player && this.hud) {
      this.hud.draw(screen, this._player);
    }

    if (this.isDebug()) {
      this.drawDebug(screen);
    }

    if (this.transitionStartedAt !== null) {
      const progress = Math.min(
        1,
        (this.services.clock.now() - this.transitionStartedAt) / TIMINGS.TRANSITION_DURATION
      );
      screen.fill({ ...COLORS.BLACK, a: Math.floor(255 * progress) });
    }
  }

  private drawAnimatedTiles(screen: Surface): void {
    if (this.animatedTiles.length === 0) return;

    const frameTime = Math.floor(this.services.clock.now() / TIMINGS.ANIMATED_TILE_FRAME);
    for (const tile of this.animatedTiles) {
      const screenX = tile.x - this.cameraX;
      const screenY = tile.y - this.cameraY;
      if (!isOnScreen(screenX, screenY, TILE_SIZE, TILE_SIZE, SCREEN.WIDTH, SCREEN.HEIGHT)) {
        continue;
      }

      const frame = tile.frames[frameTime % tile.frames.length];
      if (frame) {
        screen.blit(frame, { x: screenX, y: screenY });
      }
    }
  }

  private drawDebug(screen: Surface): void {
    this.grid.forEachBlocked((col, row) => {
      const screenX = col * TILE_SIZE - this.cameraX;
      const screenY = row * TILE_SIZE - this.cameraY;
      if (isOnScreen(screenX, screenY, TILE_SIZE, TILE_SIZE, SCREEN.WIDTH, SCREEN.HEIGHT)) {
        screen.fill(COLORS.DEBUG_COLLIDER, { x: screenX, y: screenY, width: TILE_SIZE, height: TILE_SIZE });
      }
    });

    for (const door of this._doors) {
      const { width, height } = door.rect;
      const screenX = door.rect.x - this.cameraX;
      const screenY = door.rect.y - this.cameraY;
      if (isOnScreen(screenX, screenY, width, height, SCREEN.WIDTH, SCREEN.HEIGHT)) {
        const color = door.canEnter() ? COLORS.DEBUG_DOOR_OPEN : COLORS.DEBUG_DOOR_LOCKED;
        screen.fill(color, { x: screenX, y: screenY, width, height });
      }
    }

    for (const pickup of this._pickups) {
      if (pickup.collected) continue;

      const screenX = pickup.x - this.cameraX;
      const screenY = pickup.y - this.cameraY;
      if (isOnScreen(screenX, screenY, TILE_SIZE, TILE_SIZE, SCREEN.WIDTH, SCREEN.HEIGHT)) {
        screen.fill(COLORS.DEBUG_PICKUP, { x: screenX, y: screenY, width: TILE_SIZE, height: TILE_SIZE });
      }
    }
  }
}
