import { describe, it, expect, vi } from 'vitest';
import { computeRegionRect, computeScanRegion, mapToNormalized } from './regionMapper';
import type { NormalizedRect } from '../devices/types';

describe('computeScanRegion', () => {
  it('centers a square box in the display', () => {
    const res = computeScanRegion({ width: 375, height: 667 }, 200);
    expect(res).toEqual({ ok: true, value: { x: 87.5, y: 233.5, width: 200, height: 200 } });
  });

  it('stays centered and inside the bounds for every box up to the short side', () => {
    const displays = [
      { width: 320, height: 480 },
      { width: 1024, height: 768 },
      { width: 201, height: 201 },
    ];
    for (const display of displays) {
      for (const box of [1, 50, 199, Math.min(display.width, display.height)]) {
        const res = computeScanRegion(display, box);
        if (!res.ok) throw new Error(`unexpected ${res.error.code}`);
        const r = res.value;
        expect(r.width).toBe(box);
        expect(r.height).toBe(box);
        expect(r.x + r.width / 2).toBeCloseTo(display.width / 2);
        expect(r.y + r.height / 2).toBeCloseTo(display.height / 2);
        expect(r.x).toBeGreaterThanOrEqual(0);
        expect(r.y).toBeGreaterThanOrEqual(0);
        expect(r.x + r.width).toBeLessThanOrEqual(display.width);
        expect(r.y + r.height).toBeLessThanOrEqual(display.height);
      }
    }
  });

  it('does not clamp oversized boxes in display space', () => {
    const res = computeScanRegion({ width: 100, height: 80 }, 150);
    expect(res).toEqual({ ok: true, value: { x: -25, y: -35, width: 150, height: 150 } });
  });

  it('reports geometry_unavailable before the first layout pass', () => {
    for (const size of [null, undefined, { width: 0, height: 100 }, { width: 320, height: Number.NaN }]) {
      const res = computeScanRegion(size, 200);
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe('geometry_unavailable');
    }
  });

  it('rejects non-positive box sizes', () => {
    for (const box of [0, -10, Number.NaN, Number.POSITIVE_INFINITY]) {
      const res = computeScanRegion({ width: 320, height: 480 }, box);
      expect(res.ok).toBe(false);
      if (!res.ok) expect(res.error.code).toBe('invalid_box_size');
    }
  });

  it('supports rectangular regions', () => {
    const res = computeRegionRect({ width: 400, height: 300 }, { widthPx: 300, heightPx: 100 });
    expect(res).toEqual({ ok: true, value: { x: 50, y: 100, width: 300, height: 100 } });
  });
});

describe('mapToNormalized', () => {
  it('passes the display rect to the collaborator and returns an in-range result as is', () => {
    const mapped: NormalizedRect = { x: 0.25, y: 0.2, width: 0.5, height: 0.4 };
    const frameRectFor = vi.fn(() => mapped);
    const rect = { x: 10, y: 20, width: 30, height: 30 };
    expect(mapToNormalized(rect, frameRectFor)).toBe(mapped);
    expect(frameRectFor).toHaveBeenCalledWith(rect);
  });

  it('clamps results that leave the unit square', () => {
    const res = mapToNormalized({ x: 0, y: 0, width: 1, height: 1 }, () => ({ x: -0.1, y: 0.2, width: 0.5, height: 0.9 }));
    expect(res.x).toBe(0);
    expect(res.y).toBeCloseTo(0.2);
    expect(res.width).toBeCloseTo(0.4);
    expect(res.height).toBeCloseTo(0.8);
  });
});
