import type { FieldMap } from '../store/FieldStore';

export interface WorkerHealthSnapshot {
    workerId: string;
    isRunning: boolean;
    lastUpdateAt?: number;
    stalenessThresholdMs: number;
    isHealthy: boolean;
    reason?: string;
    details?: Record<string, string | number | boolean | undefined>;
}

/** Emitted synchronously after every successful store write. */
export interface WorkerUpdate {
    workerId: string;
    key: string;
    instrumentId: string;
    fields: FieldMap;
    ts: number;
}

export type WorkerUpdateListener = (update: WorkerUpdate) => void;

/**
 * A supervised ingestion worker.
 *
 * start() is the worker's task: it resolves when the worker has been stopped and
 * rejects only on an unexpected failure. stop() may be called while the task is
 * parked in connect/receive/sleep and resolves once the task has exited.
 */
export interface IngestWorker {
    readonly id: string;
    start(): Promise<void>;
    stop(): Promise<void>;
    healthCheck(): WorkerHealthSnapshot;
    onUpdate(listener: WorkerUpdateListener): () => void;
}
