import path from 'node:path';
import type { HealthReport, SupervisorLifecycle } from '../../core/events/EventBus';
import type { WorkerStatus } from '../../control/Supervisor';
import { RotatingFileWriter } from '../logger/RotatingFileWriter';

export interface HealthReporterOptions {
  runId: string;
  logDir: string;
  intervalMs?: number;
  maxBytes?: number;
  maxFiles?: number;
  appVersion?: string;
  getReport?: () => HealthReport | undefined;
  getSupervisorStatus?: () => WorkerStatus[];
  getLifecycle?: () => SupervisorLifecycle;
  now?: () => number;
}

type HealthReporterResolvedOptions = Required<Pick<HealthReporterOptions, 'runId' | 'logDir' | 'intervalMs' | 'maxBytes' | 'maxFiles' | 'now'>> &
  Pick<HealthReporterOptions, 'appVersion' | 'getReport' | 'getSupervisorStatus' | 'getLifecycle'>;

export interface HealthLine {
  ts: number;
  iso: string;
  runId: string;
  appVersion?: string;
  pid: number;
  uptimeSec: number;
  lifecycle?: SupervisorLifecycle;
  healthy?: boolean;
  reportAgeMs?: number;
  workers?: HealthReport['workers'];
  supervisor?: WorkerStatus[];
}

/** Appends one JSON line per interval to `<logDir>/health.jsonl`. */
export class HealthReporter {
  private readonly opts: HealthReporterResolvedOptions;
  private readonly writer: RotatingFileWriter;
  private timer?: NodeJS.Timeout;

  constructor(options: HealthReporterOptions) {
    this.opts = {
      ...options,
      intervalMs: options.intervalMs ?? 60_000,
      maxBytes: options.maxBytes ?? 10_485_760,
      maxFiles: options.maxFiles ?? 5,
      now: options.now ?? (() => Date.now()),
    };

    this.writer = new RotatingFileWriter(path.join(this.opts.logDir, 'health.jsonl'), {
      maxBytes: this.opts.maxBytes,
      maxFiles: this.opts.maxFiles,
    });
  }

  start(): void {
    if (this.timer || this.opts.intervalMs <= 0) return;
    this.timer = setInterval(() => {
      this.snapshot();
    }, this.opts.intervalMs);
    this.timer.unref?.();
  }

  stop(options: { finalSnapshot?: boolean } = {}): void {
    if (options.finalSnapshot) {
      this.snapshot();
    }
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.writer.close();
  }

  snapshot(): HealthLine {
    const ts = this.opts.now();
    const report = this.opts.getReport?.();
    const line: HealthLine = {
      ts,
      iso: new Date(ts).toISOString(),
      runId: this.opts.runId,
      appVersion: this.opts.appVersion,
      pid: process.pid,
      uptimeSec: Math.max(0, Math.floor(process.uptime())),
      lifecycle: this.opts.getLifecycle?.(),
      healthy: report?.healthy,
      reportAgeMs: report ? ts - report.meta.ts : undefined,
      workers: report?.workers,
      supervisor: this.opts.getSupervisorStatus?.(),
    };
    this.writer.write(JSON.stringify(line));
    return line;
  }
}
