/**
 * Tap Region Classification
 *
 * Splits the viewport horizontally into three hot zones:
 * ```
 * | left (20%) |      center (60%)      | right (20%) |
 * ```
 * Side zones turn pages, the center zone toggles the overlay panel.
 */

import type { ReadingDirection, TapOutcome, TapRegion } from './types';

export const DEFAULT_TAP_REGION_THRESHOLD = 0.2;

/**
 * Classify a tap by its horizontal position.
 * Points exactly on a zone boundary belong to the center.
 */
export function classifyTapRegion(
  pointX: number,
  viewportWidth: number,
  threshold: number = DEFAULT_TAP_REGION_THRESHOLD
): TapRegion {
  const leftThreshold = viewportWidth * threshold;
  const rightThreshold = viewportWidth * (1 - threshold);

  if (pointX < leftThreshold) {
    return 'left';
  } else if (pointX > rightThreshold) {
    return 'right';
  }
  return 'center';
}

/**
 * Map a tap region to its action. Right-to-left reading flips page order,
 * so the left zone moves forward.
 */
export function resolveTapOutcome(region: TapRegion, readingDirection: ReadingDirection): TapOutcome {
  const isRightToLeft = readingDirection === 'rightToLeft';

  switch (region) {
    case 'left':
      return { kind: 'navigate', delta: isRightToLeft ? 1 : -1 };
    case 'right':
      return { kind: 'navigate', delta: isRightToLeft ? -1 : 1 };
    case 'center':
      return { kind: 'togglePanel' };
  }
}
