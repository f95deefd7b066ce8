import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { ConfigError, toErrorMessage } from '../infra/errors';
import { settleWithin, sleepUnlessAborted } from '../core/time/timers';
import {
  createMeta,
  eventBus,
  type EventBus,
  type HealthReport,
  type RestartReason,
  type SupervisorLifecycle,
} from '../core/events/EventBus';
import type { IngestWorker } from '../workers/types';
import { HealthMonitor } from './HealthMonitor';

export type TaskStatus = 'idle' | 'running' | 'completed' | 'failed';

export interface SupervisorOptions {
  bus?: EventBus;
  healthCheckIntervalMs?: number;
  statusLogIntervalMs?: number;
  startStaggerMs?: number;
  restartDelayMs?: number;
  unhealthyGraceMs?: number;
  stopTimeoutMs?: number;
  /** Unset = restart forever. */
  maxRestarts?: number;
  autoRestart?: boolean;
  now?: () => number;
}

export const SUPERVISOR_DEFAULTS = {
  startStaggerMs: 1_000,
  restartDelayMs: 10_000,
  unhealthyGraceMs: 120_000,
  stopTimeoutMs: 10_000,
  shutdownTimeoutMs: 15_000,
} as const;

export interface WorkerStatus {
  workerId: string;
  taskStatus: TaskStatus;
  restartCount: number;
  lastRestartAt?: number;
  unhealthySince?: number;
  restarting: boolean;
  abandoned: boolean;
  lastError?: string;
}

export interface ShutdownResult {
  stopped: string[];
  abandoned: string[];
}

interface WorkerEntry {
  worker: IngestWorker;
  task?: Promise<void>;
  taskStatus: TaskStatus;
  restartCount: number;
  lastRestartAt?: number;
  unhealthySince?: number;
  restarting: boolean;
  abandoned: boolean;
  lastError?: string;
}

/**
 * Owns the worker set: starts each worker as its own task, watches health
 * reports and restarts workers whose task exited or that stayed unhealthy past
 * the grace window. Shutdown stops everything concurrently under a deadline.
 */
export class Supervisor {
  private readonly bus: EventBus;
  private readonly monitor: HealthMonitor;
  private readonly entries = new Map<string, WorkerEntry>();
  private readonly startStaggerMs: number;
  private readonly restartDelayMs: number;
  private readonly unhealthyGraceMs: number;
  private readonly stopTimeoutMs: number;
  private readonly maxRestarts?: number;
  private readonly autoRestart: boolean;
  private readonly now: () => number;
  private readonly abort = new AbortController();
  private readonly inFlightRestarts = new Set<Promise<void>>();
  private lifecycle: SupervisorLifecycle = 'IDLE';
  private shutdownPromise?: Promise<ShutdownResult>;

  private readonly onHealthReport = (report: HealthReport) => {
    this.handleHealthReport(report);
  };

  constructor(workers: readonly IngestWorker[], opts: SupervisorOptions = {}) {
    this.bus = opts.bus ?? eventBus;
    this.now = opts.now ?? (() => Date.now());
    this.monitor = new HealthMonitor({
      bus: this.bus,
      checkIntervalMs: opts.healthCheckIntervalMs,
      statusLogIntervalMs: opts.statusLogIntervalMs,
      now: this.now,
    });
    this.startStaggerMs = opts.startStaggerMs ?? SUPERVISOR_DEFAULTS.startStaggerMs;
    this.restartDelayMs = opts.restartDelayMs ?? SUPERVISOR_DEFAULTS.restartDelayMs;
    this.unhealthyGraceMs = opts.unhealthyGraceMs ?? SUPERVISOR_DEFAULTS.unhealthyGraceMs;
    this.stopTimeoutMs = opts.stopTimeoutMs ?? SUPERVISOR_DEFAULTS.stopTimeoutMs;
    this.maxRestarts = opts.maxRestarts;
    this.autoRestart = opts.autoRestart ?? true;

    for (const worker of workers) {
      if (this.entries.has(worker.id)) {
        throw new ConfigError('Duplicate worker id', { workerId: worker.id });
      }
      this.entries.set(worker.id, {
        worker,
        taskStatus: 'idle',
        restartCount: 0,
        restarting: false,
        abandoned: false,
      });
    }
  }

  getLifecycle(): SupervisorLifecycle {
    return this.lifecycle;
  }

  getHealthMonitor(): HealthMonitor {
    return this.monitor;
  }

  getStatus(): WorkerStatus[] {
    return Array.from(this.entries.values()).map((entry) => ({
      workerId: entry.worker.id,
      taskStatus: entry.taskStatus,
      restartCount: entry.restartCount,
      lastRestartAt: entry.lastRestartAt,
      unhealthySince: entry.unhealthySince,
      restarting: entry.restarting,
      abandoned: entry.abandoned,
      lastError: entry.lastError,
    }));
  }

  async start(): Promise<void> {
    if (this.lifecycle !== 'IDLE') {
      logger.warn(m('warn', `[Supervisor] start() ignored in state ${this.lifecycle}`));
      return;
    }
    this.setLifecycle('STARTING');
    this.bus.subscribe('health:report', this.onHealthReport);

    let index = 0;
    for (const entry of this.entries.values()) {
      if (index > 0) {
        // разносим подключения, чтобы не бить биржу пачкой коннектов
        const slept = await sleepUnlessAborted(this.startStaggerMs, this.abort.signal);
        if (!slept) return;
      }
      this.launch(entry);
      index += 1;
    }

    this.monitor.start(Array.from(this.entries.values()).map((entry) => entry.worker));
    this.setLifecycle('RUNNING');
    logger.info(m('ok', `[Supervisor] running ${this.entries.size} worker(s)`));
  }

  shutdown(timeoutMs: number = SUPERVISOR_DEFAULTS.shutdownTimeoutMs): Promise<ShutdownResult> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(timeoutMs);
    }
    return this.shutdownPromise;
  }

  private async runShutdown(timeoutMs: number): Promise<ShutdownResult> {
    logger.info(m('shutdown', `[Supervisor] shutdown requested (timeout ${timeoutMs}ms)`));
    this.setLifecycle('STOPPING');
    this.monitor.stop();
    this.bus.unsubscribe('health:report', this.onHealthReport);
    this.abort.abort();

    const pendingRestarts = settleWithin(Promise.all(Array.from(this.inFlightRestarts)), timeoutMs);
    const results = await Promise.all(
      Array.from(this.entries.values()).map(async (entry) => {
        const id = entry.worker.id;
        const stopping = this.stopWorker(entry);
        const outcome = await settleWithin(Promise.all([stopping, entry.task ?? Promise.resolve()]), timeoutMs);
        return { id, settled: outcome.settled };
      })
    );
    await pendingRestarts;

    const stopped = results.filter((r) => r.settled).map((r) => r.id);
    const abandoned = results.filter((r) => !r.settled).map((r) => r.id);
    for (const id of abandoned) {
      logger.warn(m('timeout', `[Supervisor] ${id} did not stop within ${timeoutMs}ms, abandoning task (potential leak)`));
    }

    this.setLifecycle('STOPPED');
    logger.info(m('shutdown', `[Supervisor] stopped=${stopped.length} abandoned=${abandoned.length}`));
    return { stopped, abandoned };
  }

  private launch(entry: WorkerEntry): void {
    const id = entry.worker.id;
    entry.taskStatus = 'running';
    entry.lastError = undefined;
    let task: Promise<void>;
    try {
      task = entry.worker.start();
    } catch (err) {
      task = Promise.reject(err);
    }
    entry.task = task;
    void task.then(
      () => this.onTaskExit(entry, task, false),
      (err: unknown) => this.onTaskExit(entry, task, true, err)
    );
    logger.info(m('lifecycle', `[Supervisor] ${id} task started`));
  }

  private onTaskExit(entry: WorkerEntry, task: Promise<void>, failed: boolean, err?: unknown): void {
    if (entry.task !== task) return;
    entry.taskStatus = failed ? 'failed' : 'completed';
    entry.lastError = failed ? toErrorMessage(err) : undefined;

    // остановка по нашей команде: ни рестарт, ни shutdown не считаются падением
    if (entry.restarting || this.lifecycle === 'STOPPING' || this.lifecycle === 'STOPPED') return;

    if (failed) {
      logger.error(m('error', `[Supervisor] ${entry.worker.id} task failed: ${entry.lastError}`));
    } else {
      logger.warn(m('warn', `[Supervisor] ${entry.worker.id} task completed unexpectedly`));
    }
    this.bus.publish('supervisor:worker_exited', {
      meta: createMeta('supervisor', { ts: this.now() }),
      workerId: entry.worker.id,
      kind: failed ? 'failed' : 'completed',
      error: entry.lastError,
    });
  }

  private handleHealthReport(report: HealthReport): void {
    if (this.lifecycle !== 'RUNNING') return;
    const now = this.now();
    const snapshots = new Map(report.workers.map((snapshot) => [snapshot.workerId, snapshot]));

    for (const entry of this.entries.values()) {
      if (entry.restarting || entry.abandoned) continue;

      const snapshot = snapshots.get(entry.worker.id);
      if (snapshot && !snapshot.isHealthy) {
        entry.unhealthySince ??= now;
      } else {
        entry.unhealthySince = undefined;
      }

      if (!this.autoRestart) continue;

      if (entry.taskStatus === 'completed' || entry.taskStatus === 'failed') {
        this.requestRestart(entry, 'task_exited');
        continue;
      }
      if (entry.unhealthySince !== undefined && now - entry.unhealthySince > this.unhealthyGraceMs) {
        logger.warn(
          m('restart', `[Supervisor] ${entry.worker.id} unhealthy for ${Math.round((now - entry.unhealthySince) / 1000)}s: ${snapshot?.reason ?? 'unknown'}`)
        );
        this.requestRestart(entry, 'unhealthy');
      }
    }
  }

  private requestRestart(entry: WorkerEntry, reason: RestartReason): void {
    if (this.maxRestarts !== undefined && entry.restartCount >= this.maxRestarts) {
      if (!entry.abandoned) {
        entry.abandoned = true;
        logger.error(
          m('error', `[Supervisor] ${entry.worker.id} reached max restarts (${this.maxRestarts}), giving up`)
        );
        this.bus.publish('supervisor:worker_abandoned', {
          meta: createMeta('supervisor', { ts: this.now() }),
          workerId: entry.worker.id,
          restartCount: entry.restartCount,
          maxRestarts: this.maxRestarts,
        });
      }
      return;
    }

    entry.restarting = true;
    const restart: Promise<void> = this.restart(entry, reason)
      .catch((err: unknown) => {
        logger.error(m('error', `[Supervisor] restart of ${entry.worker.id} failed: ${toErrorMessage(err)}`));
      })
      .finally(() => {
        entry.restarting = false;
        this.inFlightRestarts.delete(restart);
      });
    this.inFlightRestarts.add(restart);
  }

  private async restart(entry: WorkerEntry, reason: RestartReason): Promise<void> {
    const id = entry.worker.id;
    logger.warn(m('restart', `[Supervisor] restarting ${id} (${reason}) in ${this.restartDelayMs}ms`));

    const outcome = await settleWithin(this.stopWorker(entry), this.stopTimeoutMs);
    if (!outcome.settled) {
      logger.warn(m('timeout', `[Supervisor] ${id} stop() exceeded ${this.stopTimeoutMs}ms, starting anyway`));
    }

    const slept = await sleepUnlessAborted(this.restartDelayMs, this.abort.signal);
    if (!slept || this.lifecycle !== 'RUNNING') return;

    entry.restartCount += 1;
    entry.lastRestartAt = this.now();
    entry.unhealthySince = undefined;
    this.launch(entry);

    logger.info(m('restart', `[Supervisor] ${id} restarted (restart #${entry.restartCount})`));
    this.bus.publish('supervisor:worker_restarted', {
      meta: createMeta('supervisor', { ts: this.now() }),
      workerId: id,
      reason,
      restartCount: entry.restartCount,
    });
  }

  private async stopWorker(entry: WorkerEntry): Promise<void> {
    try {
      await entry.worker.stop();
    } catch (err) {
      logger.error(m('error', `[Supervisor] ${entry.worker.id} stop() failed: ${toErrorMessage(err)}`));
    }
  }

  private setLifecycle(next: SupervisorLifecycle): void {
    if (this.lifecycle === next) return;
    this.lifecycle = next;
    this.bus.publish('supervisor:state', {
      meta: createMeta('supervisor', { ts: this.now() }),
      lifecycle: next,
    });
  }
}
