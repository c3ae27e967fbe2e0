import type { CaptureDevice, DetectionEvent, DetectionSink } from "../devices/capture";
import type { DisplayDevice } from "../devices/display";
import type { DisplayRect, NormalizedRect, OrientationState, Result, ScanError } from "../devices/types";
import { createConsoleLogger, type ScanLogger } from "../services/logger";
import { DEFAULT_BOX_SIZE } from "../services/scannerConfig";
import { ScanMetric, ScanTelemetry } from "../services/telemetry";
import { computeRegionRect, mapToNormalized, type RegionErrorCode, type ScanRegion } from "./regionMapper";

export type SessionState = "idle" | "scanning" | "haltedOnDetection";

export type SelectedDetection = DetectionEvent & { content: string };

export interface ScanSessionHooks {
  onFail: (error: ScanError<"setup_failed">) => void;
  /** `true` halts, `false` resumes scanning. */
  onCapture: (content: string) => boolean;
  beforeStart: () => void;
  afterStop: () => void;
  onWarning: (warning: ScanError<"region_not_configured">) => void;
}

type HookName = keyof ScanSessionHooks | "stateListener";

const noop = () => {};

export const DEFAULT_HOOKS: Readonly<ScanSessionHooks> = Object.freeze({
  onFail: noop,
  onCapture: () => true,
  beforeStart: noop,
  afterStop: noop,
  onWarning: noop,
});

export interface ScanSessionOptions {
  capture: CaptureDevice;
  display: DisplayDevice;
  boxSize?: number;
  /** Takes precedence over `boxSize` for non-square scan boxes. */
  region?: ScanRegion;
  /** Empty or absent accepts any type tag. */
  symbologies?: readonly string[];
  hooks?: Partial<ScanSessionHooks>;
  logger?: ScanLogger;
  /** Defaults to a fresh registry owned by this session. */
  telemetry?: ScanTelemetry;
}

function hasContent(ev: DetectionEvent): ev is SelectedDetection {
  return typeof ev.content === "string" && ev.content.length > 0;
}

// First qualifying event in arrival order wins; the rest of the batch is ignored.
export function selectDetection(
  batch: readonly DetectionEvent[],
  symbologies?: readonly string[],
): SelectedDetection | null {
  const filter = symbologies && symbologies.length > 0 ? symbologies : null;
  for (const ev of batch) {
    if (filter && !filter.includes(ev.typeTag)) continue;
    if (hasContent(ev)) return ev;
  }
  return null;
}

function resolveHooks(hooks?: Partial<ScanSessionHooks>): ScanSessionHooks {
  return {
    onFail: hooks?.onFail ?? DEFAULT_HOOKS.onFail,
    onCapture: hooks?.onCapture ?? DEFAULT_HOOKS.onCapture,
    beforeStart: hooks?.beforeStart ?? DEFAULT_HOOKS.beforeStart,
    afterStop: hooks?.afterStop ?? DEFAULT_HOOKS.afterStop,
    onWarning: hooks?.onWarning ?? DEFAULT_HOOKS.onWarning,
  };
}

const describeError = (err: unknown) => (err instanceof Error ? err.message : String(err));

/**
 * Scan lifecycle: idle → scanning → haltedOnDetection → (scanning | idle).
 *
 * Every entry point is synchronous and expects to be called from one event loop. The
 * detector is always disarmed before the capture callback runs, so a code cannot be
 * reported twice while the caller is deciding what to do with it.
 */
export class ScanSession implements DetectionSink {
  private readonly capture: CaptureDevice;
  private readonly display: DisplayDevice;
  private readonly hooks: ScanSessionHooks;
  private readonly logger: ScanLogger;
  readonly telemetry: ScanTelemetry;
  private readonly symbologies?: readonly string[];

  private region: ScanRegion;
  private regionRequested = false;
  private currentState: SessionState = "idle";
  private rect: DisplayRect | null = null;
  private roi: NormalizedRect | null = null;
  private currentOrientation: OrientationState | null = null;
  private detection: SelectedDetection | null = null;
  private error: ScanError | null = null;
  private listeners: Array<(state: SessionState) => void> = [];

  constructor(opts: ScanSessionOptions) {
    this.capture = opts.capture;
    this.display = opts.display;
    this.hooks = resolveHooks(opts.hooks);
    this.logger = opts.logger ?? createConsoleLogger();
    this.telemetry = opts.telemetry ?? new ScanTelemetry();
    this.symbologies = opts.symbologies;
    const box = opts.boxSize ?? DEFAULT_BOX_SIZE;
    this.region = opts.region ?? { widthPx: box, heightPx: box };
    this.capture.connect?.(this);
  }

  get state(): SessionState { return this.currentState; }
  get regionOfInterest(): NormalizedRect | null { return this.roi && { ...this.roi }; }
  get displayRect(): DisplayRect | null { return this.rect && { ...this.rect }; }
  get orientation(): OrientationState | null { return this.currentOrientation; }
  get lastDetection(): SelectedDetection | null { return this.detection; }
  get lastError(): ScanError | null { return this.error; }

  /**
   * Computes the scan box from the current display size and maps it into detector
   * space. A failure clears any previous region, so a later `start()` scans full-frame.
   */
  configureRegion(region?: number | ScanRegion): Result<NormalizedRect, RegionErrorCode> {
    if (region !== undefined) {
      this.region = typeof region === "number" ? { widthPx: region, heightPx: region } : region;
    }
    this.regionRequested = true;
    const rect = computeRegionRect(this.display.size(), this.region);
    if (!rect.ok) {
      this.rect = null;
      this.roi = null;
      this.logger.warn(`scan region unavailable (${rect.error.code}): ${rect.error.message ?? ""}`);
      return rect;
    }
    this.rect = rect.value;
    this.roi = this.mapRect(rect.value);
    this.logger.debug("scan region configured", this.roi);
    return { ok: true, value: { ...this.roi } };
  }

  /** Re-runs the region computation after the display bounds changed. */
  handleLayoutChanged(): Result<NormalizedRect, RegionErrorCode> | null {
    if (!this.regionRequested) return null;
    return this.configureRegion();
  }

  /**
   * Recomputes the region against the display's current size, which a rotation may
   * already have swapped. Applies from the next arm; an armed detector keeps its region.
   */
  handleOrientationChanged(orientation: OrientationState): void {
    this.currentOrientation = orientation;
    this.logger.debug(`orientation changed to ${orientation}`);
    if (this.regionRequested) this.configureRegion();
  }

  start(): void {
    if (this.currentState === "scanning") {
      this.logger.debug("start ignored: already scanning");
      return;
    }
    this.detection = null;
    this.error = null;
    if (!this.roi) {
      const warning: ScanError<"region_not_configured"> = {
        code: "region_not_configured",
        message: "No scan region configured; scanning the full frame",
      };
      this.logger.warn(warning.message ?? warning.code);
      this.invokeHook("onWarning", () => this.hooks.onWarning(warning));
    }
    this.arm();
  }

  stop(): void {
    switch (this.currentState) {
      case "idle":
        return;
      case "scanning":
        this.disarm();
        this.setState("idle");
        this.invokeHook("afterStop", () => this.hooks.afterStop());
        return;
      case "haltedOnDetection":
        // already disarmed when the detection was taken
        this.setState("idle");
        return;
    }
  }

  handleDetectionBatch(events: readonly DetectionEvent[]): void {
    if (this.currentState !== "scanning") {
      this.telemetry.count(ScanMetric.batchDropped);
      this.logger.debug(`batch of ${events.length} dropped in state ${this.currentState}`);
      return;
    }
    const selected = selectDetection(events, this.symbologies);
    if (!selected) {
      this.telemetry.count(ScanMetric.batchEmpty);
      return;
    }

    this.detection = selected;
    this.telemetry.count(ScanMetric.selected, { symbology: selected.typeTag });
    this.disarm();
    this.setState("haltedOnDetection");
    this.invokeHook("afterStop", () => this.hooks.afterStop());
    // A listener or afterStop may already have stopped the session; nothing left to decide.
    if (this.currentState !== "haltedOnDetection") return;

    let halt = true;
    try {
      halt = this.hooks.onCapture(selected.content) !== false;
    } catch (err) {
      this.reportCallbackFailure("onCapture", err);
    }

    // The callback may have called start() or stop() itself; that decision stands.
    if (this.currentState !== "haltedOnDetection") return;
    if (halt) {
      this.setState("idle");
      return;
    }
    this.arm();
  }

  handleSetupFailed(cause: unknown): void {
    const error: ScanError<"setup_failed"> = { code: "setup_failed", message: describeError(cause), cause };
    this.error = error;
    this.telemetry.count(ScanMetric.setupFailed);
    this.logger.error(`capture setup failed: ${error.message ?? ""}`);
    this.setState("idle");
    this.invokeHook("onFail", () => this.hooks.onFail(error));
  }

  on(event: "state", handler: (state: SessionState) => void): () => void {
    this.listeners.push(handler);
    // Emit current immediately so subscribers have a baseline
    handler(this.currentState);
    return () => {
      this.listeners = this.listeners.filter(h => h !== handler);
    };
  }

  // Copied so the collaborator can neither see nor mutate what the session stores.
  private mapRect(rect: DisplayRect): NormalizedRect {
    return { ...mapToNormalized({ ...rect }, r => this.display.frameRectFor(r)) };
  }

  private arm(): void {
    this.invokeHook("beforeStart", () => this.hooks.beforeStart());
    try {
      this.capture.armDetector(this.roi && { ...this.roi });
    } catch (err) {
      this.handleSetupFailed(err);
      return;
    }
    this.telemetry.count(ScanMetric.arm);
    this.setState("scanning");
  }

  private disarm(): void {
    try {
      this.capture.disarmDetector();
    } catch (err) {
      this.logger.error(`disarm failed: ${describeError(err)}`);
    }
    this.telemetry.count(ScanMetric.disarm);
  }

  private setState(next: SessionState): void {
    if (next === this.currentState) return;
    this.currentState = next;
    this.telemetry.gauge(ScanMetric.scanning, next === "scanning" ? 1 : 0);
    for (const l of this.listeners) {
      // a listener moved the session on; the rest hear about the newer state instead
      if (this.currentState !== next) break;
      this.invokeHook("stateListener", () => l(next));
    }
  }

  private invokeHook(name: HookName, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.reportCallbackFailure(name, err);
    }
  }

  private reportCallbackFailure(hook: HookName, err: unknown): void {
    this.error = { code: "callback_failure", message: `${hook}: ${describeError(err)}`, cause: err };
    this.telemetry.count(ScanMetric.callbackFailure, { hook });
    this.logger.error(`${hook} hook failed`, err);
  }
}
