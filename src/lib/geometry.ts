import type { Point, Rect } from "./types";

/**
 * Smallest integer rectangle enclosing `rect`: min corner floored, max corner
 * ceiled. A rectangle with negative width or height encloses nothing and maps
 * to the empty rectangle at the origin.
 */
export function integerBounds(rect: Rect): Rect {
  if (rect.width < 0 || rect.height < 0) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }
  const x = Math.floor(rect.x);
  const y = Math.floor(rect.y);
  const x2 = Math.ceil(rect.x + rect.width);
  const y2 = Math.ceil(rect.y + rect.height);
  return { x, y, width: x2 - x, height: y2 - y };
}

export function unionRect(a: Rect, b: Rect): Rect {
  const x = Math.min(a.x, b.x);
  const y = Math.min(a.y, b.y);
  const x2 = Math.max(a.x + a.width, b.x + b.width);
  const y2 = Math.max(a.y + a.height, b.y + b.height);
  return { x, y, width: x2 - x, height: y2 - y };
}

export function centreOf(rect: Rect): Point {
  return { x: rect.x + rect.width / 2, y: rect.y + rect.height / 2 };
}
