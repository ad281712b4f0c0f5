import { describe, it, expect } from 'vitest';

import { resolveScaleAnchor } from '@/reader/gestures/scale-anchor';

const viewport = { width: 400, height: 800 };

describe('resolveScaleAnchor', () => {
  it('normalizes the touch point against the viewport', () => {
    expect(resolveScaleAnchor({ x: 100, y: 200 }, 'leftToRight', viewport)).toEqual({ x: 0.25, y: 0.25 });
    expect(resolveScaleAnchor({ x: 300, y: 600 }, 'rightToLeft', viewport)).toEqual({ x: 0.75, y: 0.75 });
  });

  it('clamps points reported outside the viewport', () => {
    expect(resolveScaleAnchor({ x: -10, y: 900 }, 'leftToRight', viewport)).toEqual({ x: 0, y: 1 });
  });

  it('pins the anchor to the center for vertical reading', () => {
    const points = [
      { x: 0, y: 0 },
      { x: 400, y: 800 },
      { x: 37, y: 512 },
    ];
    for (const point of points) {
      expect(resolveScaleAnchor(point, 'vertical', viewport)).toEqual({ x: 0.5, y: 0.5 });
    }
  });

  it('falls back to the center on a collapsed viewport axis', () => {
    expect(resolveScaleAnchor({ x: 50, y: 200 }, 'leftToRight', { width: 0, height: 800 })).toEqual({ x: 0.5, y: 0.25 });
  });
});
