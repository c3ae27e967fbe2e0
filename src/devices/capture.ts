import type { NormalizedRect } from "./types";

export interface DetectionEvent {
  typeTag: string; // e.g. "QR", "EAN-13"
  content?: string | null; // decoded payload, absent when undecodable
  bounds: NormalizedRect;
}

// Intake side exposed by the session
export interface DetectionSink {
  handleDetectionBatch(events: readonly DetectionEvent[]): void;
  handleSetupFailed(error: unknown): void;
}

/**
 * Frame acquisition side of the scanner. While armed the device hands every processed
 * frame's detections to the sink's `handleDetectionBatch`, and reports a failed input
 * setup through `handleSetupFailed` at most once.
 */
export interface CaptureDevice {
  kind: "capture";
  /** `null` means full-frame scanning. */
  armDetector(roi: NormalizedRect | null): void;
  disarmDetector(): void;
  connect?(sink: DetectionSink): void;
}
