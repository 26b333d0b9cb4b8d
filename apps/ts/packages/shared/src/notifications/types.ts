import type { RunSummary } from '../market-sync/run-summary';
import type { BackendKind } from '../replication/backends/types';

/**
 * Non-retryable backend failure needing operator action
 */
export interface BackendAlert {
  backend: string;
  kind: BackendKind;
  location: string;
  failure: 'quota_exceeded' | 'unauthorized';
  message: string;
  occurredAt: Date;
}

export interface AlertSink {
  escalate(alert: BackendAlert): Promise<void>;
}

/**
 * Delivery of run reports. Callers treat delivery as best effort.
 */
export interface Notifier extends AlertSink {
  readonly name: string;
  notify(summary: RunSummary): Promise<void>;
}
