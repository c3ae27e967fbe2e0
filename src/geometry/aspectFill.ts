import type { DisplaySize, NormalizedRect, OrientationState } from "../devices/types";
import type { FrameRectFor } from "../devices/display";
import { clampNormalizedRect } from "./rect";

export interface AspectFillOptions {
  /** Frame size in the sensor's native (landscape-right) orientation. */
  frameSize: DisplaySize;
  displaySize: DisplaySize;
  orientation: OrientationState;
}

type Point = { x: number; y: number };

const isPortrait = (o: OrientationState) => o === "portrait" || o === "portraitUpsideDown";

// (u, v) are normalized within the frame as shown on screen
function toSensor(u: number, v: number, orientation: OrientationState): Point {
  switch (orientation) {
    case "portrait":
      return { x: v, y: 1 - u };
    case "portraitUpsideDown":
      return { x: 1 - v, y: u };
    case "landscapeLeft":
      return { x: 1 - u, y: 1 - v };
    case "landscapeRight":
      return { x: u, y: v };
  }
}

/**
 * Builds a `frameRectFor` for a preview that aspect-fills the display: the rotated frame
 * is scaled until it covers both display dimensions and centered, so the overflowing
 * axis is cropped evenly on both sides.
 */
export function createAspectFillTransform(opts: AspectFillOptions): FrameRectFor {
  const { frameSize, displaySize, orientation } = opts;
  const shownW = isPortrait(orientation) ? frameSize.height : frameSize.width;
  const shownH = isPortrait(orientation) ? frameSize.width : frameSize.height;
  const scale = Math.max(displaySize.width / shownW, displaySize.height / shownH);
  const scaledW = shownW * scale;
  const scaledH = shownH * scale;
  const offsetX = (displaySize.width - scaledW) / 2;
  const offsetY = (displaySize.height - scaledH) / 2;

  return (rect): NormalizedRect => {
    const a = toSensor((rect.x - offsetX) / scaledW, (rect.y - offsetY) / scaledH, orientation);
    const b = toSensor(
      (rect.x + rect.width - offsetX) / scaledW,
      (rect.y + rect.height - offsetY) / scaledH,
      orientation,
    );
    return clampNormalizedRect({
      x: Math.min(a.x, b.x),
      y: Math.min(a.y, b.y),
      width: Math.abs(b.x - a.x),
      height: Math.abs(b.y - a.y),
    });
  };
}
