/**
 * Reading Gesture Bindings
 *
 * Glue between a gesture recognizer layer and the GestureCoordinator:
 * - Enablement predicates for each recognizer
 * - A navigation delegate that moves a page cursor
 * - Bindings that forward recognizer callbacks to the coordinator
 *
 * Recognizers only report "changed" and "ended" for drags, so the bindings
 * synthesize the drag start from the first change of each sequence.
 */

import type { GestureCoordinator } from './gesture-coordinator';
import type {
  DismissSwipeValue,
  Point,
  ReaderNavigationDelegate,
  Size,
  TapOutcome,
} from './types';

/**
 * How taps coexist with the other recognizers. While zoomed, taps fire
 * alongside drags; while unscaled they are the only single-finger gesture.
 */
export type TapMode = 'simultaneous' | 'exclusive';

export interface GestureEnablement {
  drag: boolean;
  tapMode: TapMode;
  magnification: boolean;
}

/**
 * Minimal page model the navigation delegate drives
 */
export interface PageCursor {
  readonly index: number;
  update(index: number): void;
}

export interface PanelControls {
  toggle(): void;
  dismiss(): void;
}

export function getGestureEnablement(coordinator: GestureCoordinator): GestureEnablement {
  const zoomed = coordinator.getState().scale > 1;
  return {
    drag: zoomed,
    tapMode: zoomed ? 'simultaneous' : 'exclusive',
    magnification: true,
  };
}

export function createPageNavigationDelegate(
  page: PageCursor,
  panel: PanelControls
): ReaderNavigationDelegate {
  return {
    navigate(delta: number): void {
      const newIndex = page.index + delta;
      page.update(newIndex);
      console.log('[ReadingGestures] Page navigation', { newIndex });
    },
    togglePanel(): void {
      panel.toggle();
    },
    dismissPanel(): void {
      panel.dismiss();
    },
  };
}

export interface ReadingGestureBindings {
  singleTap(point: Point | null): TapOutcome;
  doubleTap(point: Point | null): void;
  magnificationChanged(value: number, point: Point | null): void;
  magnificationEnded(value: number): void;
  /** @returns false when the drag recognizer is disabled and the event was dropped */
  dragChanged(translation: Size): boolean;
  dragEnded(): void;
  panelDismiss(value: DismissSwipeValue): boolean;
  enablement(): GestureEnablement;
}

export function bindReadingGestures(coordinator: GestureCoordinator): ReadingGestureBindings {
  let dragInProgress = false;

  return {
    singleTap: (point) => coordinator.handleSingleTap(point),
    doubleTap: (point) => coordinator.handleDoubleTap(point),
    magnificationChanged: (value, point) => coordinator.handlePinchChanged(value, point),
    magnificationEnded: (value) => coordinator.handlePinchEnded(value),

    dragChanged(translation) {
      if (!getGestureEnablement(coordinator).drag) {
        dragInProgress = false;
        return false;
      }
      if (!dragInProgress) {
        dragInProgress = true;
        coordinator.handleDragStarted();
      }
      coordinator.handleDragChanged(translation);
      return true;
    },

    dragEnded() {
      const wasInProgress = dragInProgress;
      dragInProgress = false;
      if (wasInProgress) {
        coordinator.handleDragEnded();
      }
    },

    panelDismiss: (value) => coordinator.handlePanelDismissSwipe(value),
    enablement: () => getGestureEnablement(coordinator),
  };
}
