import type { DisplayRect, DisplaySize, NormalizedRect, OrientationState } from "../types";
import type { DisplayDevice } from "../display";
import { createAspectFillTransform } from "../../geometry/aspectFill";
import { FULL_FRAME } from "../../geometry/rect";

export interface MockDisplayOptions {
  size?: DisplaySize | null;
  frameSize?: DisplaySize;
  orientation?: OrientationState;
}

export class MockDisplayDevice implements DisplayDevice {
  public kind = "display" as const;
  public frameRectCalls = 0;
  private currentSize: DisplaySize | null;
  private readonly frameSize: DisplaySize;
  private orientation: OrientationState;

  constructor(opts?: MockDisplayOptions) {
    this.currentSize = opts?.size ?? null;
    this.frameSize = opts?.frameSize ?? { width: 1920, height: 1080 };
    this.orientation = opts?.orientation ?? "portrait";
  }

  size(): DisplaySize | null {
    return this.currentSize;
  }

  frameRectFor(rect: DisplayRect): NormalizedRect {
    this.frameRectCalls += 1;
    if (!this.currentSize) return { ...FULL_FRAME };
    return createAspectFillTransform({
      frameSize: this.frameSize,
      displaySize: this.currentSize,
      orientation: this.orientation,
    })(rect);
  }

  // Test helpers to simulate layout passes and rotation
  public __setSize(size: DisplaySize | null) {
    this.currentSize = size;
  }

  public __setOrientation(orientation: OrientationState) {
    this.orientation = orientation;
  }
}
