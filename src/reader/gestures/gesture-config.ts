/**
 * Gesture Configuration
 *
 * Builds the immutable per-session configuration from reader settings.
 * Settings arrive from persisted user preferences, so every value is
 * normalized rather than trusted: non-finite factors fall back to defaults,
 * and the double-tap factor is kept inside the zoom range.
 *
 * @example
 * ```typescript
 * const config = createGestureConfiguration({ readingDirection: 'rightToLeft' });
 * config.doubleTapScaleFactor; // 2
 * ```
 */

import { clamp, READING_DIRECTIONS, type ReadingDirection, type TransformAnimation } from './types';

/**
 * User-facing settings the coordinator depends on
 */
export interface ReaderGestureSettings {
  readingDirection: ReadingDirection;
  /** Scale a double tap zooms to from the unscaled state */
  doubleTapScaleFactor: number;
  /** Upper bound for every scale change */
  maximumScaleFactor: number;
}

export interface GestureConfiguration extends Readonly<ReaderGestureSettings> {
  /** Fraction of the viewport width covered by each side tap zone */
  readonly tapRegionThreshold: number;
  /** Pinch ends closer than this to 1.0 snap back to unscaled */
  readonly snapToOneThreshold: number;
  /** Multiplier applied to drag translations */
  readonly dragSensitivity: number;
  /** Predicted downward travel needed to dismiss the panel */
  readonly panelDismissThreshold: number;
  readonly doubleTapAnimation: TransformAnimation;
  readonly snapAnimation: TransformAnimation;
}

export const DEFAULT_READER_GESTURE_SETTINGS: Readonly<ReaderGestureSettings> = Object.freeze({
  readingDirection: 'leftToRight',
  doubleTapScaleFactor: 2.0,
  maximumScaleFactor: 3.0,
});

const TUNING = {
  tapRegionThreshold: 0.2,
  snapToOneThreshold: 0.05,
  dragSensitivity: 2.0,
  panelDismissThreshold: 30,
  doubleTapAnimation: Object.freeze({ duration: 0.25, easing: 'easeInOut' } as const),
  snapAnimation: Object.freeze({ duration: 0.2, easing: 'easeOut' } as const),
};

function isReadingDirection(value: unknown): value is ReadingDirection {
  return READING_DIRECTIONS.some((direction) => direction === value);
}

function finiteOr(value: number, fallback: number, name: string): number {
  if (Number.isFinite(value)) return value;
  console.warn(`[GestureConfig] ${name} is not a finite number, using ${fallback}:`, value);
  return fallback;
}

/**
 * Normalize settings so the resulting configuration can never violate the
 * scale invariant.
 */
export function normalizeGestureSettings(
  settings: Partial<ReaderGestureSettings> = {}
): ReaderGestureSettings {
  const merged = { ...DEFAULT_READER_GESTURE_SETTINGS, ...settings };

  let readingDirection = merged.readingDirection;
  if (!isReadingDirection(readingDirection)) {
    console.warn('[GestureConfig] Unknown reading direction, using leftToRight:', readingDirection);
    readingDirection = 'leftToRight';
  }

  let maximumScaleFactor = finiteOr(
    merged.maximumScaleFactor,
    DEFAULT_READER_GESTURE_SETTINGS.maximumScaleFactor,
    'maximumScaleFactor'
  );
  if (maximumScaleFactor < 1) {
    console.warn(`[GestureConfig] maximumScaleFactor ${maximumScaleFactor} below 1, raising to 1`);
    maximumScaleFactor = 1;
  }

  const requestedDoubleTap = finiteOr(
    merged.doubleTapScaleFactor,
    DEFAULT_READER_GESTURE_SETTINGS.doubleTapScaleFactor,
    'doubleTapScaleFactor'
  );
  const doubleTapScaleFactor = clamp(requestedDoubleTap, 1, maximumScaleFactor);
  if (doubleTapScaleFactor !== requestedDoubleTap) {
    console.warn(
      `[GestureConfig] doubleTapScaleFactor ${requestedDoubleTap} outside [1, ${maximumScaleFactor}], using ${doubleTapScaleFactor}`
    );
  }

  return { readingDirection, doubleTapScaleFactor, maximumScaleFactor };
}

/**
 * Create a frozen configuration for one reading session
 */
export function createGestureConfiguration(
  settings?: Partial<ReaderGestureSettings>
): GestureConfiguration {
  return Object.freeze({
    ...TUNING,
    ...normalizeGestureSettings(settings),
  });
}
