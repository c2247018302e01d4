/**
 * Tile Map Model
 * Format-independent view of a level map as the level loader consumes it
 */

import type { Surface } from '../platform/types.js';

export type MapPropertyValue = string | number | boolean;

export interface MapObject {
  id: number;
  name: string;
  /** Top-left corner in map pixels */
  x: number;
  y: number;
  width: number;
  height: number;
  properties: Readonly<Record<string, MapPropertyValue>>;
}

export interface TileLayer {
  kind: 'tiles';
  name: string;
  width: number;
  height: number;
  /** Global tile ids by row then column; 0 means empty */
  gids: readonly (readonly number[])[];
}

export interface ObjectLayer {
  kind: 'objects';
  name: string;
  objects: readonly MapObject[];
}

export type MapLayer = TileLayer | ObjectLayer;

export interface TileMap {
  /** Size in tiles */
  readonly width: number;
  readonly height: number;
  /** Tile size in pixels */
  readonly tileWidth: number;
  readonly tileHeight: number;
  readonly layers: readonly MapLayer[];
  /** Image of a tile, or null for 0 and ids outside every tileset */
  tileImage(gid: number): Surface | null;
  /** Frame gids of an animated tile, or null for a static tile */
  tileAnimation(gid: number): readonly number[] | null;
}

/**
 * Loads the map of a level by name.
 */
export interface TileMapSource {
  /**
   * @throws AssetError when the map (or an image it references) is missing
   * @throws MapFormatError when the map document is malformed
   */
  load(levelName: string): TileMap;
}

export function findTileLayer(map: TileMap, name: string): TileLayer | null {
  for (const layer of map.layers) {
    if (layer.kind === 'tiles' && layer.name === name) {
      return layer;
    }
  }
  return null;
}

export function findObjectLayer(map: TileMap, name: string): ObjectLayer | null {
  for (const layer of map.layers) {
    if (layer.kind === 'objects' && layer.name === name) {
      return layer;
    }
  }
  return null;
}

/**
 * Visit every non-empty cell of a tile layer.
 */
export function forEachTile(
  layer: TileLayer,
  visit: (col: number, row: number, gid: number) => void
): void {
  layer.gids.forEach((row, rowIndex) => {
    row.forEach((gid, colIndex) => {
      if (gid !== 0) {
        visit(colIndex, rowIndex, gid);
      }
    });
  });
}
