import type { DisplayRect, DisplaySize, NormalizedRect, Result } from "../devices/types";
import type { FrameRectFor } from "../devices/display";
import { clampNormalizedRect, isNormalizedRect } from "../geometry/rect";

export interface ScanRegion {
  widthPx: number;
  heightPx: number;
}

export type RegionErrorCode = "geometry_unavailable" | "invalid_box_size";

const isPositive = (v: number) => Number.isFinite(v) && v > 0;

function hasLayout(size: DisplaySize | null | undefined): size is DisplaySize {
  return !!size && isPositive(size.width) && isPositive(size.height);
}

/**
 * Rectangle of the given size centered in the display. Oversized regions keep their
 * size and center, so the origin can go negative; clamping happens once the rect is
 * in normalized space.
 */
export function computeRegionRect(
  displaySize: DisplaySize | null | undefined,
  region: ScanRegion,
): Result<DisplayRect, RegionErrorCode> {
  if (!isPositive(region.widthPx) || !isPositive(region.heightPx)) {
    return {
      ok: false,
      error: { code: "invalid_box_size", message: `Scan box must be positive, got ${region.widthPx}x${region.heightPx}` },
    };
  }
  if (!hasLayout(displaySize)) {
    return { ok: false, error: { code: "geometry_unavailable", message: "Display size is not known yet" } };
  }
  return {
    ok: true,
    value: {
      x: displaySize.width / 2 - region.widthPx / 2,
      y: displaySize.height / 2 - region.heightPx / 2,
      width: region.widthPx,
      height: region.heightPx,
    },
  };
}

export function computeScanRegion(
  displaySize: DisplaySize | null | undefined,
  boxSize: number,
): Result<DisplayRect, RegionErrorCode> {
  return computeRegionRect(displaySize, { widthPx: boxSize, heightPx: boxSize });
}

// The display layer owns orientation and crop math; only out-of-range results are touched.
export function mapToNormalized(displayRect: DisplayRect, frameRectFor: FrameRectFor): NormalizedRect {
  const mapped = frameRectFor(displayRect);
  return isNormalizedRect(mapped) ? mapped : clampNormalizedRect(mapped);
}
