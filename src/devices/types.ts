// Common geometry and error types shared by the scan core and its collaborators

export interface DisplaySize {
  width: number;
  height: number;
}

// Display points, origin top-left
export interface DisplayRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

// Detector space: every component in [0, 1], origin top-left, independent of rotation
export interface NormalizedRect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type OrientationState =
  | "portrait"
  | "portraitUpsideDown"
  | "landscapeLeft"
  | "landscapeRight";

export type ScanErrorCode =
  | "geometry_unavailable"
  | "invalid_box_size"
  | "region_not_configured"
  | "setup_failed"
  | "callback_failure";

export interface ScanError<E extends ScanErrorCode = ScanErrorCode> {
  code: E;
  message?: string;
  cause?: unknown;
}

export type Result<T, E extends string = string> =
  | { ok: true; value: T }
  | { ok: false; error: { code: E; message?: string } };
