import client from 'prom-client';

import type { PlatformName, TransferReport } from '@tracklift/contracts';

import type { Admission } from './rate-governor/governor';
import type { TransferMetrics } from './transfer/orchestrator';

export interface AppMetrics extends TransferMetrics {
  readonly registry: client.Registry;
  httpRequest(route: string, method: string, status: number): void;
  rateLimitDecision(admission: Admission): void;
}

/**
 * Prometheus counters for the service, on a registry of their own so several
 * app instances can live in one process.
 */
export function createMetrics(options: { collectDefaults?: boolean } = {}): AppMetrics {
  const registry = new client.Registry();

  if (options.collectDefaults ?? true) {
    client.collectDefaultMetrics({ register: registry, prefix: 'tracklift_' });
  }

  const httpRequests = new client.Counter({
    name: 'tracklift_http_requests_total',
    help: 'Total number of HTTP requests',
    labelNames: ['route', 'method', 'status'],
    registers: [registry],
  });

  const transfers = new client.Counter({
    name: 'tracklift_transfers_total',
    help: 'Playlist transfers by source, target and outcome',
    labelNames: ['source', 'target', 'outcome'],
    registers: [registry],
  });

  const transferFailures = new client.Counter({
    name: 'tracklift_transfer_failures_total',
    help: 'Failed transfers by error code',
    labelNames: ['code'],
    registers: [registry],
  });

  const tracks = new client.Counter({
    name: 'tracklift_tracks_total',
    help: 'Tracks processed by destination platform and match result',
    labelNames: ['target', 'result'],
    registers: [registry],
  });

  const rateLimitDecisions = new client.Counter({
    name: 'tracklift_rate_limit_decisions_total',
    help: 'Rate governor decisions',
    labelNames: ['decision', 'mode'],
    registers: [registry],
  });

  return {
    registry,
    httpRequest: (route, method, status) => httpRequests.inc({ route, method, status: String(status) }),
    transferStarted: (source: PlatformName, target: PlatformName) =>
      transfers.inc({ source, target, outcome: 'started' }),
    transferSucceeded: (source: PlatformName, target: PlatformName, report: TransferReport) => {
      transfers.inc({ source, target, outcome: 'succeeded' });
      for (const [tier, count] of Object.entries(report.byTier)) {
        if (count > 0) tracks.inc({ target, result: tier }, count);
      }
      if (report.unresolved > 0) tracks.inc({ target, result: 'unresolved' }, report.unresolved);
    },
    transferFailed: (source, target, code) => {
      transfers.inc({ source, target, outcome: 'failed' });
      transferFailures.inc({ code });
    },
    rateLimitDecision: (admission) =>
      rateLimitDecisions.inc(
        admission.allowed ? { decision: 'allowed', mode: admission.mode } : { decision: 'denied', mode: 'enforced' },
      ),
  };
}
