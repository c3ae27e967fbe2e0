import type { NormalizedRect } from "../types";
import type { CaptureDevice, DetectionEvent, DetectionSink } from "../capture";

export interface MockCaptureOptions {
  failArm?: boolean;
}

export class MockCaptureDevice implements CaptureDevice {
  public kind = "capture" as const;
  // arm/disarm in call order; tests may push their own markers to check interleaving
  public readonly calls: string[] = [];
  private sink: DetectionSink | null = null;
  private armed = false;
  private roi: NormalizedRect | null = null;
  private failArm: boolean;

  constructor(opts?: MockCaptureOptions) {
    this.failArm = !!opts?.failArm;
  }

  get isArmed() { return this.armed; }
  get armedRoi() { return this.roi; }
  get armCount() { return this.calls.filter(c => c === "arm").length; }
  get disarmCount() { return this.calls.filter(c => c === "disarm").length; }

  connect(sink: DetectionSink) {
    this.sink = sink;
  }

  armDetector(roi: NormalizedRect | null) {
    if (this.failArm) {
      this.failArm = false;
      throw new Error("Injected: no video input");
    }
    this.calls.push("arm");
    this.armed = true;
    this.roi = roi;
  }

  disarmDetector() {
    this.calls.push("disarm");
    this.armed = false;
  }

  // helper to simulate a processed frame; like a real output, nothing is produced while disarmed
  emit(batch: DetectionEvent[]): boolean {
    if (!this.armed) return false;
    this.sink?.handleDetectionBatch(batch);
    return true;
  }

  // a batch that was already in flight when the detector was disarmed
  deliverLate(batch: DetectionEvent[]) {
    this.sink?.handleDetectionBatch(batch);
  }

  failSetup(error: unknown = new Error("Injected: capture unavailable")) {
    this.armed = false;
    this.sink?.handleSetupFailed(error);
  }
}
