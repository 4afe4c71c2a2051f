/**
 * Bounding-box helpers shared by the resolver and the mapper.
 */

import type { BoundingBox } from './types.js';

export function right(box: BoundingBox): number {
  return box.x + box.width;
}

export function bottom(box: BoundingBox): number {
  return box.y + box.height;
}

export function centerX(box: BoundingBox): number {
  return box.x + box.width / 2;
}

export function centerY(box: BoundingBox): number {
  return box.y + box.height / 2;
}

/**
 * Length of the shared x-range of two boxes; 0 when disjoint.
 */
export function horizontalOverlap(a: BoundingBox, b: BoundingBox): number {
  return Math.max(0, Math.min(right(a), right(b)) - Math.max(a.x, b.x));
}

/**
 * Merge multiple bounding boxes into one
 */
export function mergeBoundingBoxes(boxes: BoundingBox[]): BoundingBox {
  if (boxes.length === 0) {
    return { x: 0, y: 0, width: 0, height: 0 };
  }

  let minX = Infinity, minY = Infinity, maxX = -Infinity, maxY = -Infinity;

  for (const box of boxes) {
    minX = Math.min(minX, box.x);
    minY = Math.min(minY, box.y);
    maxX = Math.max(maxX, box.x + box.width);
    maxY = Math.max(maxY, box.y + box.height);
  }

  return {
    x: minX,
    y: minY,
    width: maxX - minX,
    height: maxY - minY
  };
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function median(values: number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Average advance of one character inside the box, or 0 for empty text or
 * a zero-width box.
 */
export function charWidth(box: BoundingBox, text: string): number {
  const length = Array.from(text).length;
  if (length === 0 || box.width <= 0) return 0;
  return box.width / length;
}
