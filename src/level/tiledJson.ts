/**
 * Tiled JSON Map Reader
 *
 * Reads orthogonal maps saved by the Tiled editor in its JSON format (.tmj)
 * into the engine's TileMap model. Supported:
 * - embedded tilesets backed by a single sheet image (margin and spacing honored)
 * - tile layer data as a plain array or uncompressed base64
 * - tile animations from the tileset's `tiles[].animation`
 * - typed custom properties on objects
 *
 * External tilesets (.tsx), compressed layer data and infinite maps are
 * rejected with a MapFormatError.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { z } from 'zod';

import { AssetError, MapFormatError, getErrorMessage } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';
import { formatZodIssues } from '../utils/validation.js';

import type { SpriteAtlasCache } from '../animation/SpriteAtlasCache.js';
import type { Rect, Surface } from '../platform/types.js';
import type {
  MapLayer,
  MapObject,
  MapPropertyValue,
  TileMap,
  TileMapSource,
} from './tileMap.js';

/** Tiled stores flip and rotation flags in the top four bits of a GID */
const GID_MASK = 0x0fffffff;

export const TILED_MAP_EXTENSION = '.tmj';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

const propertySchema = z.object({
  name: z.string(),
  type: z.string().optional(),
  value: z.unknown(),
});

const objectSchema = z.object({
  id: z.number().int(),
  name: z.string().default(''),
  x: z.number(),
  y: z.number(),
  width: z.number().nonnegative().default(0),
  height: z.number().nonnegative().default(0),
  gid: z.number().int().nonnegative().optional(),
  properties: z.array(propertySchema).default([]),
});

const tileLayerSchema = z.object({
  type: z.literal('tilelayer'),
  name: z.string(),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  data: z.union([z.array(z.number().int().nonnegative()), z.string()]),
  encoding: z.enum(['csv', 'base64']).optional(),
  compression: z.string().optional(),
});

const objectLayerSchema = z.object({
  type: z.literal('objectgroup'),
  name: z.string(),
  objects: z.array(objectSchema).default([]),
});

const otherLayerSchema = z.object({
  type: z.enum(['imagelayer', 'group']),
  name: z.string(),
});

const layerSchema = z.discriminatedUnion('type', [tileLayerSchema, objectLayerSchema, otherLayerSchema]);

const tileDefinitionSchema = z.object({
  id: z.number().int().nonnegative(),
  animation: z
    .array(
      z.object({
        tileid: z.number().int().nonnegative(),
        duration: z.number().nonnegative(),
      })
    )
    .optional(),
});

const tilesetSchema = z.object({
  firstgid: z.number().int().positive(),
  source: z.string().optional(),
  name: z.string().optional(),
  image: z.string().optional(),
  tilewidth: z.number().int().positive().optional(),
  tileheight: z.number().int().positive().optional(),
  columns: z.number().int().nonnegative().optional(),
  tilecount: z.number().int().nonnegative().optional(),
  margin: z.number().int().nonnegative().default(0),
  spacing: z.number().int().nonnegative().default(0),
  tiles: z.array(tileDefinitionSchema).default([]),
});

const mapSchema = z.object({
  orientation: z.string().default('orthogonal'),
  infinite: z.boolean().default(false),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  tilewidth: z.number().int().positive(),
  tileheight: z.number().int().positive(),
  layers: z.array(layerSchema),
  tilesets: z.array(tilesetSchema).default([]),
});

type TiledTileLayer = z.infer<typeof tileLayerSchema>;
type TiledObject = z.infer<typeof objectSchema>;
type TiledTileset = z.infer<typeof tilesetSchema>;

// =============================================================================
// TILESETS
// =============================================================================

interface ResolvedTileset {
  firstGid: number;
  tileCount: number;
  columns: number;
  tileWidth: number;
  tileHeight: number;
  margin: number;
  spacing: number;
  image: Surface;
  animations: Map<number, number[]>;
}

/**
 * Resolves a tileset image path, as written in the map, to a decoded image.
 */
export type TilesetImageResolver = (imagePath: string) => Surface;

function resolveTileset(tileset: TiledTileset, resolveImage: TilesetImageResolver): ResolvedTileset {
  const label = tileset.name ?? `firstgid ${tileset.firstgid}`;

  if (tileset.source !== undefined) {
    throw new MapFormatError(`External tileset ${tileset.source} is not supported; embed it in the map`, {
      tileset: label,
    });
  }
  if (
    tileset.image === undefined ||
    tileset.tilewidth === undefined ||
    tileset.tileheight === undefined ||
    tileset.columns === undefined ||
    tileset.tilecount === undefined
  ) {
    throw new MapFormatError(`Tileset ${label} must be backed by a single image`, { tileset: label });
  }

  const animations = new Map<number, number[]>();
  for (const tile of tileset.tiles) {
    if (tile.animation && tile.animation.length > 0) {
      animations.set(
        tile.id,
        tile.animation.map((frame) => tileset.firstgid + frame.tileid)
      );
    }
  }

  return {
    firstGid: tileset.firstgid,
    tileCount: tileset.tilecount,
    columns: tileset.columns,
    tileWidth: tileset.tilewidth,
    tileHeight: tileset.tileheight,
    margin: tileset.margin,
    spacing: tileset.spacing,
    image: resolveImage(tileset.image),
    animations,
  };
}

/**
 * Source rectangle of a local tile id inside its tileset image
 */
function getTileRect(tileset: ResolvedTileset, localId: number): Rect {
  const col = localId % tileset.columns;
  const row = Math.floor(localId / tileset.columns);

  return {
    x: tileset.margin + col * (tileset.tileWidth + tileset.spacing),
    y: tileset.margin + row * (tileset.tileHeight + tileset.spacing),
    width: tileset.tileWidth,
    height: tileset.tileHeight,
  };
}

// =============================================================================
// LAYERS
// =============================================================================

function decodeTileData(layer: TiledTileLayer): number[] {
  if (Array.isArray(layer.data)) {
    return layer.data;
  }

  if (layer.encoding !== 'base64') {
    throw new MapFormatError(`Layer ${layer.name} has string data without base64 encoding`, { layer: layer.name });
  }
  if (layer.compression) {
    throw new MapFormatError(`Layer ${layer.name} uses ${layer.compression} compression, which is not supported`, {
      layer: layer.name,
    });
  }

  const bytes = Buffer.from(layer.data, 'base64');
  if (bytes.length % 4 !== 0) {
    throw new MapFormatError(`Layer ${layer.name} base64 data is not a whole number of tiles`, { layer: layer.name });
  }

  const gids: number[] = [];
  for (let offset = 0; offset < bytes.length; offset += 4) {
    gids.push(bytes.readUInt32LE(offset));
  }
  return gids;
}

function toTileRows(layer: TiledTileLayer): number[][] {
  const gids = decodeTileData(layer);
  if (gids.length !== layer.width * layer.height) {
    throw new MapFormatError(
      `Layer ${layer.name} has ${gids.length} tiles, expected ${layer.width}x${layer.height}`,
      { layer: layer.name }
    );
  }

  const rows: number[][] = [];
  for (let row = 0; row < layer.height; row++) {
    rows.push(gids.slice(row * layer.width, (row + 1) * layer.width).map((gid) => gid & GID_MASK));
  }
  return rows;
}

function toProperties(object: TiledObject): Record<string, MapPropertyValue> {
  const properties: Record<string, MapPropertyValue> = {};
  for (const property of object.properties) {
    const value = property.value;
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      properties[property.name] = value;
    } else {
      logger.debug(`Skipping ${property.type ?? 'untyped'} property ${property.name} on object ${object.id}`, {
        component: 'tiled',
      });
    }
  }
  return properties;
}

function toMapObject(object: TiledObject): MapObject {
  return {
    id: object.id,
    name: object.name,
    x: object.x,
    // Tile objects are anchored at their bottom-left corner
    y: object.gid !== undefined ? object.y - object.height : object.y,
    width: object.width,
    height: object.height,
    properties: toProperties(object),
  };
}

// =============================================================================
// MAP
// =============================================================================

class TiledMap implements TileMap {
  readonly width: number;
  readonly height: number;
  readonly tileWidth: number;
  readonly tileHeight: number;
  readonly layers: readonly MapLayer[];

  private tilesets: ResolvedTileset[];
  private tileCache: Map<number, Surface | null> = new Map();

  constructor(
    size: { width: number; height: number; tileWidth: number; tileHeight: number },
    layers: MapLayer[],
    tilesets: ResolvedTileset[]
  ) {
    this.width = size.width;
    this.height = size.height;
    this.tileWidth = size.tileWidth;
    this.tileHeight = size.tileHeight;
    this.layers = layers;
    // Highest firstgid first, so the first match owns the gid
    this.tilesets = [...tilesets].sort((a, b) => b.firstGid - a.firstGid);
  }

  private findTileset(gid: number): { tileset: ResolvedTileset; localId: number } | null {
    if (gid <= 0) return null;

    for (const tileset of this.tilesets) {
      if (gid >= tileset.firstGid) {
        const localId = gid - tileset.firstGid;
        return localId < tileset.tileCount ? { tileset, localId } : null;
      }
    }
    return null;
  }

  tileImage(gid: number): Surface | null {
    const cached = this.tileCache.get(gid);
    if (cached !== undefined) {
      return cached;
    }

    const found = this.findTileset(gid);
    const image = found ? found.tileset.image.subsurface(getTileRect(found.tileset, found.localId)) : null;
    this.tileCache.set(gid, image);
    return image;
  }

  tileAnimation(gid: number): readonly number[] | null {
    const found = this.findTileset(gid);
    if (!found) return null;
    return found.tileset.animations.get(found.localId) ?? null;
  }
}

/**
 * Parse a decoded Tiled JSON document.
 *
 * @throws MapFormatError when the document is not a supported Tiled map
 * @throws AssetError when a tileset image cannot be resolved
 */
export function parseTiledMap(json: unknown, resolveImage: TilesetImageResolver): TileMap {
  const result = mapSchema.safeParse(json);
  if (!result.success) {
    const issues = formatZodIssues(result.error);
    throw new MapFormatError(`Invalid Tiled map: ${issues.join('; ')}`, { issues });
  }

  const map = result.data;
  if (map.orientation !== 'orthogonal') {
    throw new MapFormatError(`Map orientation ${map.orientation} is not supported`);
  }
  if (map.infinite) {
    throw new MapFormatError('Infinite maps are not supported');
  }

  const layers: MapLayer[] = [];
  for (const layer of map.layers) {
    switch (layer.type) {
      case 'tilelayer':
        layers.push({
          kind: 'tiles',
          name: layer.name,
          width: layer.width,
          height: layer.height,
          gids: toTileRows(layer),
        });
        break;
      case 'objectgroup':
        layers.push({
          kind: 'objects',
          name: layer.name,
          objects: layer.objects.map(toMapObject),
        });
        break;
      default:
        logger.debug(`Ignoring ${layer.type} layer ${layer.name}`, { component: 'tiled' });
    }
  }

  const tilesets = map.tilesets.map((tileset) => resolveTileset(tileset, resolveImage));

  return new TiledMap(
    { width: map.width, height: map.height, tileWidth: map.tilewidth, tileHeight: map.tileheight },
    layers,
    tilesets
  );
}

/**
 * Loads `<mapDir>/<level>.tmj` from disk. Tileset images are resolved
 * relative to the map file and decoded through the shared sprite cache.
 */
export class TiledJsonMapSource implements TileMapSource {
  private mapDir: string;
  private sprites: SpriteAtlasCache;

  constructor(mapDir: string, sprites: SpriteAtlasCache) {
    this.mapDir = mapDir;
    this.sprites = sprites;
  }

  getMapPath(levelName: string): string {
    return join(this.mapDir, `${levelName}${TILED_MAP_EXTENSION}`);
  }

  load(levelName: string): TileMap {
    const mapPath = this.getMapPath(levelName);

    let text: string;
    try {
      text = readFileSync(mapPath, 'utf-8');
    } catch (error) {
      throw new AssetError(`Could not read map ${mapPath}: ${getErrorMessage(error)}`, mapPath);
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new MapFormatError(`Map ${mapPath} is not valid JSON: ${getErrorMessage(error)}`, { mapPath });
    }

    const mapDir = dirname(mapPath);
    return parseTiledMap(json, (imagePath) => this.sprites.get(join(mapDir, imagePath)));
  }
}
