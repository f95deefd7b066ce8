import type { IngestWorker, WorkerHealthSnapshot, WorkerUpdateListener } from '../../src/workers/types';

/** Worker whose task, health and stop behaviour the test controls directly. */
export class FakeWorker implements IngestWorker {
  starts = 0;
  stops = 0;
  healthy = true;
  hangOnStop = false;
  throwOnHealthCheck?: Error;
  private running = false;
  private finish?: (err?: Error) => void;

  constructor(readonly id: string) {}

  start(): Promise<void> {
    this.starts += 1;
    this.running = true;
    return new Promise<void>((resolve, reject) => {
      this.finish = (err) => {
        this.running = false;
        this.finish = undefined;
        if (err) reject(err);
        else resolve();
      };
    });
  }

  stop(): Promise<void> {
    this.stops += 1;
    if (this.hangOnStop) return new Promise<void>(() => undefined);
    this.finish?.();
    return Promise.resolve();
  }

  crash(err: Error): void {
    this.finish?.(err);
  }

  complete(): void {
    this.finish?.();
  }

  isRunning(): boolean {
    return this.running;
  }

  healthCheck(): WorkerHealthSnapshot {
    if (this.throwOnHealthCheck) throw this.throwOnHealthCheck;
    const isHealthy = this.running && this.healthy;
    return {
      workerId: this.id,
      isRunning: this.running,
      stalenessThresholdMs: 60_000,
      isHealthy,
      reason: isHealthy ? undefined : this.running ? 'stale: no data' : 'not running',
    };
  }

  onUpdate(_listener: WorkerUpdateListener): () => void {
    return () => undefined;
  }
}
