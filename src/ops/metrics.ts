export type MetricEvent =
  | 'sessionStarted'
  | 'sessionConfirmed'
  | 'sessionCancelled'
  | 'sessionTimedOut'
  | 'inputDropped'
  | 'inputRejected'
  | 'postFailed'
  | 'signalApplied'
  | 'signalReversed'
  | 'signalNotFound'
  | 'signalNotOwner'
  | 'signalStale'
  | 'signalUnrecognized';

export type MetricsSnapshot = {
  counts: Record<MetricEvent, number>;
  activeSessions: number;
  updatedAt: Date | null;
};

const zeroCounts = (): Record<MetricEvent, number> => ({
  sessionStarted: 0,
  sessionConfirmed: 0,
  sessionCancelled: 0,
  sessionTimedOut: 0,
  inputDropped: 0,
  inputRejected: 0,
  postFailed: 0,
  signalApplied: 0,
  signalReversed: 0,
  signalNotFound: 0,
  signalNotOwner: 0,
  signalStale: 0,
  signalUnrecognized: 0,
});

/** Process-local counters for the wizard and settlement paths. */
export class EngineMetrics {
  private counts = zeroCounts();
  private updatedAt: Date | null = null;

  constructor(private readonly clock: () => Date = () => new Date()) {}

  record(event: MetricEvent, amount = 1): void {
    if (!Number.isFinite(amount) || amount <= 0) {
      throw new Error('EngineMetrics amount must be a positive number');
    }
    this.counts[event] += amount;
    this.updatedAt = this.clock();
  }

  count(event: MetricEvent): number {
    return this.counts[event];
  }

  reset(): void {
    this.counts = zeroCounts();
    this.updatedAt = null;
  }

  snapshot(): MetricsSnapshot {
    const ended = this.counts.sessionConfirmed + this.counts.sessionCancelled + this.counts.sessionTimedOut;
    return {
      counts: { ...this.counts },
      activeSessions: Math.max(0, this.counts.sessionStarted - ended),
      updatedAt: this.updatedAt,
    };
  }
}
