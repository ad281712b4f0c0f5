/**
 * Viewport and delegate fakes for gesture tests
 */

import { vi } from 'vitest';
import type { ReaderNavigationDelegate, Size, ViewportMetrics } from '../../../reader/gestures/types';

/**
 * Viewport whose size can change between gestures, like a device rotation
 */
export class FakeViewport implements ViewportMetrics {
  private size: Size;
  reads = 0;

  constructor(width = 400, height = 800) {
    this.size = { width, height };
  }

  getViewportSize(): Size {
    this.reads++;
    return { ...this.size };
  }

  resize(width: number, height: number): void {
    this.size = { width, height };
  }
}

export function createRecordingDelegate() {
  return {
    navigate: vi.fn<[number], void>(),
    togglePanel: vi.fn<[], void>(),
    dismissPanel: vi.fn<[], void>(),
  } satisfies ReaderNavigationDelegate;
}
