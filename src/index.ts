export type {
  DisplayRect,
  DisplaySize,
  NormalizedRect,
  OrientationState,
  Result,
  ScanError,
  ScanErrorCode,
} from './devices/types';
export type { CaptureDevice, DetectionEvent, DetectionSink } from './devices/capture';
export type { DisplayDevice, FrameRectFor } from './devices/display';
export { MockCaptureDevice, type MockCaptureOptions } from './devices/mocks/mockCapture';
export { MockDisplayDevice, type MockDisplayOptions } from './devices/mocks/mockDisplay';

export { createAspectFillTransform, type AspectFillOptions } from './geometry/aspectFill';
export { clampNormalizedRect, isNormalizedRect, FULL_FRAME } from './geometry/rect';

export {
  computeRegionRect,
  computeScanRegion,
  mapToNormalized,
  type RegionErrorCode,
  type ScanRegion,
} from './scanner/regionMapper';
export {
  DEFAULT_HOOKS,
  ScanSession,
  selectDetection,
  type ScanSessionHooks,
  type ScanSessionOptions,
  type SelectedDetection,
  type SessionState,
} from './scanner/scanSession';

export { createConsoleLogger, type ConsoleLoggerOptions, type ScanLogger } from './services/logger';
export {
  DEFAULT_BOX_SIZE,
  getEnvScannerConfig,
  parseScannerConfigFromEnv,
  sessionOptionsFromConfig,
  type ConfiguredSessionOptions,
  type ScannerConfig,
} from './services/scannerConfig';
export {
  ScanMetric,
  ScanTelemetry,
  type Labels,
  type ScanMetricName,
  type ScanTelemetryOptions,
  type TelemetrySnapshot,
} from './services/telemetry';

export { useScanSession } from './hooks/useScanSession';
