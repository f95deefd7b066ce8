import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { toErrorMessage } from '../infra/errors';
import { createMeta, eventBus, type EventBus, type HealthReport } from '../core/events/EventBus';
import type { IngestWorker, WorkerHealthSnapshot } from '../workers/types';

export interface HealthMonitorOptions {
  bus?: EventBus;
  checkIntervalMs?: number;
  statusLogIntervalMs?: number;
  now?: () => number;
}

export const HEALTH_DEFAULTS = {
  checkIntervalMs: 30_000,
  statusLogIntervalMs: 60_000,
} as const;

/**
 * Reads every worker's health snapshot on a fixed period and publishes the
 * aggregate as `health:report`. Verbose status logging runs on its own cadence.
 * Never touches worker state.
 */
export class HealthMonitor {
  private readonly bus: EventBus;
  private readonly checkIntervalMs: number;
  private readonly statusLogIntervalMs: number;
  private readonly now: () => number;
  private workers: readonly IngestWorker[] = [];
  private checkTimer: NodeJS.Timeout | null = null;
  private statusTimer: NodeJS.Timeout | null = null;
  private lastReport?: HealthReport;

  constructor(opts: HealthMonitorOptions = {}) {
    this.bus = opts.bus ?? eventBus;
    this.checkIntervalMs = opts.checkIntervalMs ?? HEALTH_DEFAULTS.checkIntervalMs;
    this.statusLogIntervalMs = opts.statusLogIntervalMs ?? HEALTH_DEFAULTS.statusLogIntervalMs;
    this.now = opts.now ?? (() => Date.now());
  }

  check(workers: readonly IngestWorker[]): Map<string, WorkerHealthSnapshot> {
    const snapshots = new Map<string, WorkerHealthSnapshot>();
    for (const worker of workers) {
      try {
        snapshots.set(worker.id, worker.healthCheck());
      } catch (err) {
        snapshots.set(worker.id, {
          workerId: worker.id,
          isRunning: false,
          stalenessThresholdMs: 0,
          isHealthy: false,
          reason: `health check failed: ${toErrorMessage(err)}`,
        });
      }
    }
    return snapshots;
  }

  start(workers: readonly IngestWorker[]): void {
    if (this.checkTimer) return;
    this.workers = workers;
    this.checkTimer = setInterval(() => this.runOnce(), this.checkIntervalMs);
    this.checkTimer.unref?.();
    this.statusTimer = setInterval(() => this.logStatus(), this.statusLogIntervalMs);
    this.statusTimer.unref?.();
    logger.info(
      m('health', `[Health] monitor started: check every ${Math.round(this.checkIntervalMs / 1000)}s, status every ${Math.round(this.statusLogIntervalMs / 1000)}s`)
    );
  }

  stop(): void {
    if (this.checkTimer) {
      clearInterval(this.checkTimer);
      this.checkTimer = null;
    }
    if (this.statusTimer) {
      clearInterval(this.statusTimer);
      this.statusTimer = null;
    }
  }

  isActive(): boolean {
    return this.checkTimer !== null;
  }

  /** Evaluates every worker once and publishes the report. */
  runOnce(workers: readonly IngestWorker[] = this.workers): HealthReport {
    const snapshots = Array.from(this.check(workers).values());
    const report: HealthReport = {
      meta: createMeta('health', { ts: this.now() }),
      healthy: snapshots.every((snapshot) => snapshot.isHealthy),
      workers: snapshots,
    };
    this.lastReport = report;

    for (const snapshot of snapshots) {
      if (!snapshot.isHealthy) {
        logger.warn(m('health', `[Health] ${snapshot.workerId} unhealthy: ${snapshot.reason ?? 'unknown'}`));
      }
    }
    this.bus.publish('health:report', report);
    return report;
  }

  getLastReport(): HealthReport | undefined {
    return this.lastReport;
  }

  logStatus(workers: readonly IngestWorker[] = this.workers): void {
    const snapshots = Array.from(this.check(workers).values());
    const healthy = snapshots.filter((snapshot) => snapshot.isHealthy).length;
    logger.info(m('health', `[Health] status: ${healthy}/${snapshots.length} workers healthy`));
    for (const snapshot of snapshots) {
      logger.info(`[Health]   ${formatSnapshot(snapshot, this.now())}`);
    }
  }
}

export function formatSnapshot(snapshot: WorkerHealthSnapshot, now: number): string {
  const parts = [snapshot.workerId, snapshot.isHealthy ? 'OK' : 'UNHEALTHY'];
  if (!snapshot.isHealthy && snapshot.reason) parts.push(`(${snapshot.reason})`);
  parts.push(`running=${snapshot.isRunning}`);
  parts.push(`lastUpdate=${snapshot.lastUpdateAt === undefined ? 'never' : `${Math.round((now - snapshot.lastUpdateAt) / 1000)}s ago`}`);
  for (const [key, value] of Object.entries(snapshot.details ?? {})) {
    if (value === undefined) continue;
    parts.push(`${key}=${value}`);
  }
  return parts.join(' ');
}
