// Per-session metrics registry; a host app reads snapshots and ships them wherever it likes.
export type Labels = Record<string, string | number>;

export const ScanMetric = {
  arm: 'scan.session.arm',
  disarm: 'scan.session.disarm',
  scanning: 'scan.session.scanning',
  selected: 'scan.detection.selected',
  batchEmpty: 'scan.batch.empty',
  batchDropped: 'scan.batch.dropped',
  callbackFailure: 'scan.callback.failure',
  setupFailed: 'scan.setup.failed',
} as const;

export type ScanMetricName = (typeof ScanMetric)[keyof typeof ScanMetric];

export interface TelemetrySnapshot {
  sessionId: string;
  counters: Map<string, number>;
  gauges: Map<string, number>;
}

export interface ScanTelemetryOptions {
  sessionId?: string;
  logToConsole?: boolean;
}

function metricKey(name: string, labels?: Labels): string {
  if (!labels || Object.keys(labels).length === 0) return name;
  const parts = Object.keys(labels)
    .sort()
    .map(k => `${k}=${String(labels[k])}`);
  return `${name}{${parts.join(',')}}`;
}

let nextSessionId = 1;

export class ScanTelemetry {
  readonly sessionId: string;
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();
  private logToConsole: boolean;

  constructor(opts?: ScanTelemetryOptions) {
    this.sessionId = opts?.sessionId ?? `scan-${nextSessionId++}`;
    this.logToConsole = !!opts?.logToConsole;
  }

  setConsoleLogging(enable: boolean) {
    this.logToConsole = enable;
  }

  count(name: ScanMetricName, labels?: Labels, by = 1) {
    const k = metricKey(name, labels);
    const v = (this.counters.get(k) ?? 0) + by;
    this.counters.set(k, v);
    if (this.logToConsole) console.debug(`[telemetry] ${this.sessionId} counter ${k} = ${v}`);
  }

  gauge(name: ScanMetricName, value: number, labels?: Labels) {
    const k = metricKey(name, labels);
    this.gauges.set(k, value);
    if (this.logToConsole) console.debug(`[telemetry] ${this.sessionId} gauge ${k} = ${value}`);
  }

  counter(name: ScanMetricName, labels?: Labels): number {
    return this.counters.get(metricKey(name, labels)) ?? 0;
  }

  gaugeValue(name: ScanMetricName, labels?: Labels): number | undefined {
    return this.gauges.get(metricKey(name, labels));
  }

  snapshot(): TelemetrySnapshot {
    return {
      sessionId: this.sessionId,
      counters: new Map(this.counters),
      gauges: new Map(this.gauges),
    };
  }

  reset() {
    this.counters.clear();
    this.gauges.clear();
  }
}
