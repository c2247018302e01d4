/**
 * Axis-aligned rectangle helpers in pixel space
 */

export interface Point {
  x: number;
  y: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export function createRect(x: number, y: number, width: number, height: number): Rect {
  return { x, y, width, height };
}

export function isEmptyRect(rect: Rect): boolean {
  return rect.width <= 0 || rect.height <= 0;
}

/**
 * True when the two rectangles share a region of positive area.
 * Rectangles that only touch along an edge do not intersect, and empty
 * rectangles intersect nothing.
 */
export function rectsIntersect(a: Rect, b: Rect): boolean {
  if (isEmptyRect(a) || isEmptyRect(b)) {
    return false;
  }
  return (
    a.x < b.x + b.width &&
    b.x < a.x + a.width &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}

/**
 * Snap a pixel coordinate down onto the tile grid.
 */
export function snapToGrid(value: number, tileSize: number): number {
  return Math.floor(value / tileSize) * tileSize;
}

/**
 * Tile index containing a pixel coordinate.
 */
export function toTileIndex(value: number, tileSize: number): number {
  return Math.floor(value / tileSize);
}

/**
 * Top-left position that centers a box of the given size on a point.
 */
export function centeredAt(center: Point, width: number, height: number): Point {
  return {
    x: center.x - Math.floor(width / 2),
    y: center.y - Math.floor(height / 2),
  };
}

/**
 * Whether a box drawn at the given screen position is at least partly inside
 * the viewport, allowing a margin of one box size on the leading edges.
 */
export function isOnScreen(
  screenX: number,
  screenY: number,
  width: number,
  height: number,
  viewportWidth: number,
  viewportHeight: number
): boolean {
  return (
    screenX >= -width &&
    screenX <= viewportWidth &&
    screenY >= -height &&
    screenY <= viewportHeight
  );
}
