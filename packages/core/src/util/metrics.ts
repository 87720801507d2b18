import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  PARSE: 'parseMs',
  DECODE: 'decodeMs',
  ENCODE: 'encodeMs',
  SERIALIZE: 'serializeMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

export interface MetricsSnapshot {
  parseMs: number;
  decodeMs: number;
  encodeMs: number;
  serializeMs: number;
  pairsDecoded: number;
  pairsEncoded: number;
  schemaCacheMisses: number;
}

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  parseMs: 0,
  decodeMs: 0,
  encodeMs: 0,
  serializeMs: 0,
  pairsDecoded: 0,
  pairsEncoded: 0,
  schemaCacheMisses: 0,
};

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      parseMs: { total: 0 },
      decodeMs: { total: 0 },
      encodeMs: { total: 0 },
      serializeMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    this.recordDuration(phase, this.now() - current.startedAt);
    this.timers[key] = { total: this.snapshot[key] };
  }

  /**
   * Time a synchronous section. The timer is closed even when `fn` throws.
   */
  public measure<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }

  public addPairsDecoded(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.pairsDecoded += count;
  }

  public addPairsEncoded(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.pairsEncoded += count;
  }

  public addSchemaCacheMisses(count: number): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot.schemaCacheMisses += count;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
