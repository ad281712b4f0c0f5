import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  createGestureConfiguration,
  normalizeGestureSettings,
  DEFAULT_READER_GESTURE_SETTINGS,
  type ReaderGestureSettings,
} from '@/reader/gestures/gesture-config';

describe('Gesture configuration', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('uses the defaults when no settings are given', () => {
    const config = createGestureConfiguration();

    expect(config.readingDirection).toBe('leftToRight');
    expect(config.doubleTapScaleFactor).toBe(2);
    expect(config.maximumScaleFactor).toBe(3);
    expect(config.tapRegionThreshold).toBe(0.2);
    expect(config.snapToOneThreshold).toBe(0.05);
    expect(config.dragSensitivity).toBe(2);
    expect(config.panelDismissThreshold).toBe(30);
    expect(config.doubleTapAnimation).toEqual({ duration: 0.25, easing: 'easeInOut' });
    expect(config.snapAnimation).toEqual({ duration: 0.2, easing: 'easeOut' });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it('merges partial settings over the defaults', () => {
    const config = createGestureConfiguration({ readingDirection: 'rightToLeft', maximumScaleFactor: 5 });

    expect(config.readingDirection).toBe('rightToLeft');
    expect(config.doubleTapScaleFactor).toBe(DEFAULT_READER_GESTURE_SETTINGS.doubleTapScaleFactor);
    expect(config.maximumScaleFactor).toBe(5);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(createGestureConfiguration())).toBe(true);
  });

  it('keeps the double-tap factor inside the zoom range', () => {
    expect(normalizeGestureSettings({ doubleTapScaleFactor: 5, maximumScaleFactor: 3 }).doubleTapScaleFactor).toBe(3);
    expect(normalizeGestureSettings({ doubleTapScaleFactor: 0.5 }).doubleTapScaleFactor).toBe(1);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('raises a maximum below 1', () => {
    const settings = normalizeGestureSettings({ maximumScaleFactor: 0.5, doubleTapScaleFactor: 2 });

    expect(settings.maximumScaleFactor).toBe(1);
    expect(settings.doubleTapScaleFactor).toBe(1);
  });

  it('falls back to defaults for non-finite factors', () => {
    const settings = normalizeGestureSettings({ maximumScaleFactor: Number.NaN, doubleTapScaleFactor: Infinity });

    expect(settings.maximumScaleFactor).toBe(3);
    expect(settings.doubleTapScaleFactor).toBe(2);
  });

  it('falls back to left-to-right for an unknown reading direction', () => {
    const stored: Partial<ReaderGestureSettings> = JSON.parse('{"readingDirection":"diagonal"}');

    expect(normalizeGestureSettings(stored).readingDirection).toBe('leftToRight');
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
