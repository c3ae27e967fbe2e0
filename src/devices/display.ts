import type { DisplayRect, DisplaySize, NormalizedRect } from "./types";

export type FrameRectFor = (rect: DisplayRect) => NormalizedRect;

export interface DisplayDevice {
  kind: "display";
  /** `null` until the first layout pass has produced bounds. */
  size(): DisplaySize | null;
  frameRectFor: FrameRectFor;
}
