import { toTileIndex } from '../geometry/rect.js';

import type { TileLayer } from './tileMap.js';

/**
 * Per-tile blocked flags derived from a level's collider layer. Any tile
 * present on that layer blocks movement. Lookups outside the grid report
 * blocked.
 */
export class CollisionGrid {
  private cells: readonly (readonly boolean[])[];
  readonly tileSize: number;

  constructor(cells: readonly (readonly boolean[])[], tileSize: number) {
    this.cells = cells;
    this.tileSize = tileSize;
  }

  static empty(tileSize: number): CollisionGrid {
    return new CollisionGrid([], tileSize);
  }

  /**
   * Build a cols x rows grid. A missing collider layer leaves every tile
   * inside the grid open.
   */
  static fromLayer(layer: TileLayer | null, cols: number, rows: number, tileSize: number): CollisionGrid {
    const cells: boolean[][] = [];
    for (let row = 0; row < rows; row++) {
      const layerRow = layer?.gids[row];
      const cellRow: boolean[] = [];
      for (let col = 0; col < cols; col++) {
        cellRow.push((layerRow?.[col] ?? 0) !== 0);
      }
      cells.push(cellRow);
    }
    return new CollisionGrid(cells, tileSize);
  }

  get rows(): number {
    return this.cells.length;
  }

  get cols(): number {
    return this.cells[0]?.length ?? 0;
  }

  isTileBlocked(col: number, row: number): boolean {
    const cells = this.cells[row];
    if (!cells || col < 0 || col >= cells.length) {
      return true;
    }
    return cells[col] ?? true;
  }

  /**
   * Whether the tile containing pixel (x, y) blocks movement
   */
  isBlocked(x: number, y: number): boolean {
    return this.isTileBlocked(toTileIndex(x, this.tileSize), toTileIndex(y, this.tileSize));
  }

  forEachBlocked(visit: (col: number, row: number) => void): void {
    this.cells.forEach((row, rowIndex) => {
      row.forEach((blocked, colIndex) => {
        if (blocked) visit(colIndex, rowIndex);
      });
    });
  }
}
