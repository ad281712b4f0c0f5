/**
 * Reader Gesture Types
 *
 * Shared geometry and state shapes for the gesture-to-transform controller.
 *
 * Coordinate conventions:
 * - Point: screen coordinates in device-independent units (0,0 is top-left)
 * - Size: a width/height pair, also used for pan offsets and translations
 * - UnitPoint: a normalized point in [0,1]×[0,1] relative to the viewport
 */

export interface Point {
  x: number;
  y: number;
}

export interface Size {
  width: number;
  height: number;
}

export type UnitPoint = Point;

export const ZERO_SIZE: Readonly<Size> = Object.freeze({ width: 0, height: 0 });

export const CENTER_ANCHOR: Readonly<UnitPoint> = Object.freeze({ x: 0.5, y: 0.5 });

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

export type ReadingDirection = 'leftToRight' | 'rightToLeft' | 'vertical';

export const READING_DIRECTIONS: readonly ReadingDirection[] = ['leftToRight', 'rightToLeft', 'vertical'];

/**
 * Horizontal hot zone a tap landed in
 */
export type TapRegion = 'left' | 'center' | 'right';

/**
 * Visual transform applied to the page surface
 */
export interface TransformState {
  /** Zoom level, always within [1, maximumScaleFactor] */
  readonly scale: number;
  /** Pan offset, always within the bounds for the current scale and viewport */
  readonly offset: Readonly<Size>;
  /** Normalized point the zoom is visually centered on */
  readonly scaleAnchor: Readonly<UnitPoint>;
}

export type AnimationEasing = 'easeInOut' | 'easeOut';

/**
 * Request for the rendering layer to animate towards the published state
 */
export interface TransformAnimation {
  /** Duration in seconds */
  readonly duration: number;
  readonly easing: AnimationEasing;
}

export type GestureKind =
  | 'setup'
  | 'cleanup'
  | 'doubleTap'
  | 'pinchChanged'
  | 'pinchEnded'
  | 'dragChanged'
  | 'dragEnded';

/**
 * Value published to the rendering layer after every transform change.
 * A null animation means the state applies immediately.
 */
export interface TransformUpdate {
  readonly state: TransformState;
  readonly animation: TransformAnimation | null;
  readonly cause: GestureKind;
}

/**
 * Interaction phase derived from the transform and the active gesture
 */
export type GesturePhase = 'idle' | 'zoomed' | 'panning' | 'pinching';

/**
 * Supplies the current viewport size. Read on every handler call since
 * rotation can change it between gestures.
 */
export interface ViewportMetrics {
  getViewportSize(): Size;
}

/**
 * Navigation and panel side effects issued by the coordinator
 */
export interface ReaderNavigationDelegate {
  /** Move by `delta` pages (+1 next, -1 previous) */
  navigate(delta: number): void;
  togglePanel(): void;
  dismissPanel(): void;
}

export type TapOutcome =
  | { kind: 'navigate'; delta: number }
  | { kind: 'togglePanel' };

/**
 * Drag values delivered for the panel-dismiss swipe
 */
export interface DismissSwipeValue {
  translation: Size;
  /** Where the gesture layer predicts the swipe would come to rest */
  predictedEndTranslation: Size;
}
