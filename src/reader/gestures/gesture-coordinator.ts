/**
 * Gesture Coordinator
 *
 * Single owner of the page surface transform. Receives already-recognised
 * gesture events, keeps scale and offset inside their bounds, and dispatches
 * navigation and panel side effects.
 *
 * State Flow:
 * ```
 * IDLE ──[double tap / pinch]──> ZOOMED ──[drag started]──> PANNING ──[drag ended]──> ZOOMED
 *   ^                              │
 *   └──[double tap / pinch snap]───┘        (any) ──[pinch changed]──> PINCHING ──[pinch ended]──> IDLE | ZOOMED
 * ```
 *
 * Drag handlers are no-ops while unscaled, so the gesture layer can register
 * every recognizer unconditionally.
 *
 * @example
 * ```typescript
 * const coordinator = new GestureCoordinator({ viewport, delegate, settings });
 * coordinator.subscribe(({ state, animation }) => applyTransform(state, animation));
 *
 * coordinator.handleDoubleTap(touchPoint);
 * ```
 */

import { writable, type Readable, type Subscriber, type Unsubscriber, type Writable } from 'svelte/store';
import {
  createGestureConfiguration,
  type GestureConfiguration,
  type ReaderGestureSettings,
} from './gesture-config';
import { clampScale, constrainOffset } from './offset-constraints';
import { resolveScaleAnchor } from './scale-anchor';
import { classifyTapRegion, resolveTapOutcome } from './tap-region';
import {
  CENTER_ANCHOR,
  ZERO_SIZE,
  type DismissSwipeValue,
  type GestureKind,
  type GesturePhase,
  type Point,
  type ReaderNavigationDelegate,
  type Size,
  type TapOutcome,
  type TransformAnimation,
  type TransformState,
  type TransformUpdate,
  type UnitPoint,
  type ViewportMetrics,
} from './types';

export interface GestureCoordinatorOptions {
  viewport: ViewportMetrics;
  delegate: ReaderNavigationDelegate;
  settings?: Partial<ReaderGestureSettings>;
  /** Log per-frame pinch and drag updates */
  verbose?: boolean;
}

/**
 * Working values for the gesture sequence in progress
 */
interface GestureAccumulator {
  /** Scale at the start of the pinch sequence or last commit */
  baseScale: number;
  /** Offset at the start of the pan sequence or last commit */
  baseOffset: Size;
  /** Delta accumulated by the drag in progress */
  currentPanOffset: Size;
}

function createInitialState(): TransformState {
  return Object.freeze({
    scale: 1,
    offset: ZERO_SIZE,
    scaleAnchor: CENTER_ANCHOR,
  });
}

function createAccumulator(): GestureAccumulator {
  return {
    baseScale: 1,
    baseOffset: ZERO_SIZE,
    currentPanOffset: ZERO_SIZE,
  };
}

function isFiniteSize(size: Size): boolean {
  return Number.isFinite(size.width) && Number.isFinite(size.height);
}

export class GestureCoordinator {
  private state: TransformState = createInitialState();
  private accumulator: GestureAccumulator = createAccumulator();
  private pinching = false;
  private dragging = false;

  private settings: ReaderGestureSettings;
  private config: GestureConfiguration;

  private readonly viewport: ViewportMetrics;
  private readonly delegate: ReaderNavigationDelegate;
  private readonly verbose: boolean;
  private readonly store: Writable<TransformUpdate>;

  /** Transform updates for the rendering layer */
  readonly transform: Readable<TransformUpdate>;

  constructor(options: GestureCoordinatorOptions) {
    this.viewport = options.viewport;
    this.delegate = options.delegate;
    this.verbose = options.verbose ?? false;
    this.config = createGestureConfiguration(options.settings);
    this.settings = this.settingsFromConfig();

    this.store = writable<TransformUpdate>({
      state: this.state,
      animation: null,
      cause: 'setup',
    });
    this.transform = { subscribe: this.store.subscribe };
  }

  // ─────────────────────────────────────────────────────────────────
  // Read API
  // ─────────────────────────────────────────────────────────────────

  /**
   * Subscribe to transform updates. The listener is called immediately with
   * the latest update, then once per committing handler.
   */
  subscribe(run: Subscriber<TransformUpdate>): Unsubscriber {
    return this.store.subscribe(run);
  }

  getState(): TransformState {
    return this.state;
  }

  getPhase(): GesturePhase {
    if (this.pinching) return 'pinching';
    if (this.state.scale <= 1) return 'idle';
    return this.dragging ? 'panning' : 'zoomed';
  }

  getSettings(): ReaderGestureSettings {
    return { ...this.settings };
  }

  getConfiguration(): GestureConfiguration {
    return this.config;
  }

  // ─────────────────────────────────────────────────────────────────
  // Session lifecycle
  // ─────────────────────────────────────────────────────────────────

  /**
   * Replace the configuration and start a fresh session
   */
  setup(settings: Partial<ReaderGestureSettings>): void {
    this.config = createGestureConfiguration(settings);
    this.settings = this.settingsFromConfig();
    console.log('[GestureCoordinator] Setup:', this.settings);
    this.resetToDefaults('setup');
  }

  /**
   * Reset all transform state. Safe to call repeatedly.
   */
  cleanup(): void {
    console.log('[GestureCoordinator] Cleanup');
    this.resetToDefaults('cleanup');
  }

  // ─────────────────────────────────────────────────────────────────
  // Tap gestures
  // ─────────────────────────────────────────────────────────────────

  /**
   * Turn the page or toggle the panel depending on where the tap landed.
   * Vertical reading, or a tap without a known touch point, always toggles.
   */
  handleSingleTap(point: Point | null): TapOutcome {
    const { readingDirection } = this.config;
    console.log('[GestureCoordinator] Handle single tap', { readingDirection, point });

    let outcome: TapOutcome;
    if (readingDirection === 'vertical' || !point) {
      outcome = { kind: 'togglePanel' };
    } else {
      const { width } = this.readViewport();
      const region = classifyTapRegion(point.x, width, this.config.tapRegionThreshold);
      outcome = resolveTapOutcome(region, readingDirection);
    }

    if (outcome.kind === 'navigate') {
      this.delegate.navigate(outcome.delta);
    } else {
      this.delegate.togglePanel();
    }
    return outcome;
  }

  /**
   * Toggle between unscaled and the double-tap scale
   */
  handleDoubleTap(point: Point | null): void {
    const targetScale = this.state.scale === 1 ? this.config.doubleTapScaleFactor : 1;
    console.log('[GestureCoordinator] Handle double tap', {
      currentScale: this.state.scale,
      targetScale,
    });

    const viewport = this.readViewport();
    let scaleAnchor = point ? this.resolveAnchor(point, viewport) : this.state.scaleAnchor;
    let offset: Size;

    if (targetScale === 1) {
      offset = ZERO_SIZE;
      scaleAnchor = CENTER_ANCHOR;
    } else {
      offset = constrainOffset(this.state.offset, targetScale, viewport);
    }

    this.commit({ scale: targetScale, offset, scaleAnchor }, 'doubleTap', this.config.doubleTapAnimation);
    this.commitBase();
  }

  // ─────────────────────────────────────────────────────────────────
  // Pinch gestures
  // ─────────────────────────────────────────────────────────────────

  /**
   * Apply a pinch magnification relative to the base scale. A value of
   * exactly 1 marks the start of a new sequence.
   */
  handlePinchChanged(value: number, point: Point | null): void {
    if (!Number.isFinite(value)) {
      console.warn('[GestureCoordinator] Ignoring non-finite pinch value:', value);
      return;
    }

    if (value === 1) {
      this.accumulator.baseScale = this.state.scale;
    }
    this.pinching = true;

    const viewport = this.readViewport();
    const scaleAnchor = point ? this.resolveAnchor(point, viewport) : this.state.scaleAnchor;
    const scale = clampScale(value * this.accumulator.baseScale, this.config.maximumScaleFactor);
    const offset = constrainOffset(this.state.offset, scale, viewport);

    if (this.verbose) {
      console.log('[GestureCoordinator] Pinch changed', { value, scale, scaleAnchor });
    }

    this.commit({ scale, offset, scaleAnchor }, 'pinchChanged', null);
  }

  /**
   * Settle the pinch. Ending within the snap threshold of 1 animates back
   * to the unscaled, centered state.
   */
  handlePinchEnded(value: number): void {
    this.pinching = false;

    if (!Number.isFinite(value)) {
      console.warn('[GestureCoordinator] Ignoring non-finite pinch end value:', value);
      return;
    }

    const finalScale = clampScale(value * this.accumulator.baseScale, this.config.maximumScaleFactor);
    console.log('[GestureCoordinator] Handle pinch ended', { value, finalScale });

    if (Math.abs(finalScale - 1) < this.config.snapToOneThreshold) {
      this.commit(
        { scale: 1, offset: ZERO_SIZE, scaleAnchor: CENTER_ANCHOR },
        'pinchEnded',
        this.config.snapAnimation
      );
    } else {
      const offset = constrainOffset(this.state.offset, finalScale, this.readViewport());
      this.commit({ ...this.state, scale: finalScale, offset }, 'pinchEnded', null);
    }

    this.commitBase();
  }

  // ─────────────────────────────────────────────────────────────────
  // Drag gestures (only while zoomed)
  // ─────────────────────────────────────────────────────────────────

  handleDragStarted(): void {
    if (this.state.scale <= 1) return;

    console.log('[GestureCoordinator] Handle drag started');
    this.accumulator.currentPanOffset = ZERO_SIZE;
    this.dragging = true;
  }

  handleDragChanged(translation: Size): void {
    if (this.state.scale <= 1) return;

    if (!isFiniteSize(translation)) {
      console.warn('[GestureCoordinator] Ignoring non-finite drag translation:', translation);
      return;
    }

    const sensitivity = this.config.dragSensitivity;
    const adjustedTranslation: Size = {
      width: translation.width * sensitivity,
      height: translation.height * sensitivity,
    };
    this.accumulator.currentPanOffset = adjustedTranslation;
    this.dragging = true;

    const { baseOffset } = this.accumulator;
    const totalOffset: Size = {
      width: baseOffset.width + adjustedTranslation.width,
      height: baseOffset.height + adjustedTranslation.height,
    };
    const offset = constrainOffset(totalOffset, this.state.scale, this.readViewport());

    if (this.verbose) {
      console.log('[GestureCoordinator] Drag changed', { adjustedTranslation, totalOffset, offset });
    }

    this.commit({ ...this.state, offset }, 'dragChanged', null);
  }

  handleDragEnded(): void {
    if (this.state.scale <= 1) return;

    console.log('[GestureCoordinator] Handle drag ended');
    const finalOffset = constrainOffset(this.state.offset, this.state.scale, this.readViewport());

    this.dragging = false;
    this.commit({ ...this.state, offset: finalOffset }, 'dragEnded', null);
    this.accumulator.baseOffset = finalOffset;
    this.accumulator.currentPanOffset = ZERO_SIZE;
  }

  // ─────────────────────────────────────────────────────────────────
  // Panel gestures
  // ─────────────────────────────────────────────────────────────────

  /**
   * Dismiss the panel when the swipe is predicted to travel far enough down
   *
   * @returns true if the panel was dismissed
   */
  handlePanelDismissSwipe(value: DismissSwipeValue): boolean {
    console.log('[GestureCoordinator] Handle control panel dismiss', {
      translation: value.translation,
    });

    if (value.predictedEndTranslation.height > this.config.panelDismissThreshold) {
      this.delegate.dismissPanel();
      return true;
    }
    return false;
  }

  // ─────────────────────────────────────────────────────────────────
  // Private Methods
  // ─────────────────────────────────────────────────────────────────

  private settingsFromConfig(): ReaderGestureSettings {
    const { readingDirection, doubleTapScaleFactor, maximumScaleFactor } = this.config;
    return { readingDirection, doubleTapScaleFactor, maximumScaleFactor };
  }

  private readViewport(): Size {
    const { width, height } = this.viewport.getViewportSize();
    return { width, height };
  }

  private resolveAnchor(point: Point, viewport: Size): UnitPoint {
    return resolveScaleAnchor(point, this.config.readingDirection, viewport);
  }

  private resetToDefaults(cause: GestureKind): void {
    this.accumulator = createAccumulator();
    this.pinching = false;
    this.dragging = false;
    this.commit(createInitialState(), cause, null);
  }

  /**
   * Record the committed transform as the base for the next sequence
   */
  private commitBase(): void {
    this.accumulator.baseScale = this.state.scale;
    this.accumulator.baseOffset = this.state.offset;
  }

  /**
   * Replace the transform and publish it
   */
  private commit(next: TransformState, cause: GestureKind, animation: TransformAnimation | null): void {
    this.state = Object.freeze({
      scale: next.scale,
      offset: Object.freeze({ ...next.offset }),
      scaleAnchor: Object.freeze({ ...next.scaleAnchor }),
    });

    if (this.state.scale <= 1) {
      this.dragging = false;
    }

    this.store.set({ state: this.state, animation, cause });
  }
}
