import type { NormalizedRect } from "../devices/types";

function clamp01(v: number) {
  if (Number.isNaN(v)) return 0;
  return Math.max(0, Math.min(1, v));
}

export function isNormalizedRect(rect: NormalizedRect): boolean {
  const { x, y, width, height } = rect;
  if (![x, y, width, height].every(Number.isFinite)) return false;
  return x >= 0 && y >= 0 && width >= 0 && height >= 0 && x + width <= 1 && y + height <= 1;
}

// Edges are clamped independently; size is whatever remains between them.
export function clampNormalizedRect(rect: NormalizedRect): NormalizedRect {
  const x0 = clamp01(rect.x);
  const y0 = clamp01(rect.y);
  const x1 = clamp01(rect.x + rect.width);
  const y1 = clamp01(rect.y + rect.height);
  return {
    x: x0,
    y: y0,
    width: Math.max(0, x1 - x0),
    height: Math.max(0, y1 - y0),
  };
}

export const FULL_FRAME: NormalizedRect = Object.freeze({ x: 0, y: 0, width: 1, height: 1 });
