/**
 * Scale Anchor Resolution
 *
 * Converts a touch point into the normalized anchor a zoom scales about.
 */

import { CENTER_ANCHOR, clamp, type Point, type ReadingDirection, type Size, type UnitPoint } from './types';

function normalizeAxis(value: number, extent: number): number {
  if (extent <= 0) return CENTER_ANCHOR.x;
  return clamp(value / extent, 0, 1);
}

/**
 * Resolve the scale anchor for a touch point.
 *
 * Vertical reading always anchors on the center so zoom bounds stay centered
 * on the page content. Otherwise the touch point is normalized against the
 * viewport and clamped, since touch points can be reported slightly outside it.
 */
export function resolveScaleAnchor(
  point: Point,
  readingDirection: ReadingDirection,
  viewport: Size
): UnitPoint {
  if (readingDirection === 'vertical') {
    return { ...CENTER_ANCHOR };
  }

  return {
    x: normalizeAxis(point.x, viewport.width),
    y: normalizeAxis(point.y, viewport.height),
  };
}
