/**
 * Offset Constraint Engine
 *
 * Keeps the pan offset inside the range where the scaled page still covers
 * the viewport. The page scales symmetrically about the viewport center, so
 * the legal range on each axis is:
 * ```
 * maxOffset = extent × (scale − 1) / 2
 * ```
 * At scale 1 both bounds collapse to 0, which recenters an unscaled page.
 * The same bound applies to every reading direction; vertical reading keeps
 * its content centered through the scale anchor instead.
 */

import { clamp, type Size } from './types';

export const MIN_SCALE = 1;

/**
 * Clamp a scale into [1, maximumScaleFactor]. Every scale mutation goes
 * through here; there is no zooming out past fit.
 */
export function clampScale(scale: number, maximumScaleFactor: number): number {
  return clamp(scale, MIN_SCALE, Math.max(MIN_SCALE, maximumScaleFactor));
}

/**
 * Largest offset magnitude allowed on each axis
 */
export function getMaxOffset(scale: number, viewport: Size): Size {
  const overflow = Math.max(0, scale - 1) / 2;
  return {
    width: viewport.width * overflow,
    height: viewport.height * overflow,
  };
}

function clampAxis(value: number, limit: number): number {
  if (limit <= 0) return 0;
  return clamp(value, -limit, limit);
}

/**
 * Return the nearest in-bounds offset for `candidate`.
 * Idempotent: constraining an already constrained offset returns it unchanged.
 */
export function constrainOffset(candidate: Size, scale: number, viewport: Size): Size {
  const max = getMaxOffset(scale, viewport);
  return {
    width: clampAxis(candidate.width, max.width),
    height: clampAxis(candidate.height, max.height),
  };
}
