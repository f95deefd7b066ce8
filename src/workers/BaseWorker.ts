import EventEmitter from 'eventemitter3';
import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { toErrorMessage } from '../infra/errors';
import type { IngestWorker, WorkerHealthSnapshot, WorkerUpdate, WorkerUpdateListener } from './types';

type WorkerEvents = {
    update: [update: WorkerUpdate];
};

export interface HealthInputs {
    isRunning: boolean;
    lastUpdateAt?: number;
    stalenessThresholdMs: number;
    now: number;
}

export function evaluateHealth(input: HealthInputs): Pick<WorkerHealthSnapshot, 'isHealthy' | 'reason'> {
    if (!input.isRunning) return { isHealthy: false, reason: 'not running' };
    if (input.lastUpdateAt === undefined) return { isHealthy: false, reason: 'no updates received yet' };
    const ageMs = input.now - input.lastUpdateAt;
    if (ageMs >= input.stalenessThresholdMs) {
        return {
            isHealthy: false,
            reason: `stale: last update ${Math.round(ageMs / 1000)}s ago (threshold ${Math.round(input.stalenessThresholdMs / 1000)}s)`,
        };
    }
    return { isHealthy: true };
}

/**
 * Records the time of the latest store write. Registered as an ordinary update
 * listener so health tracking does not hook into the write path itself.
 */
export class LastUpdateTracker {
    private lastUpdateAt?: number;

    readonly listener: WorkerUpdateListener = (update) => {
        this.lastUpdateAt = update.ts;
    };

    getLastUpdateAt(): number | undefined {
        return this.lastUpdateAt;
    }
}

export interface BaseWorkerOptions {
    id: string;
    stalenessThresholdMs: number;
    now?: () => number;
}

export abstract class BaseWorker implements IngestWorker {
    readonly id: string;
    protected readonly stalenessThresholdMs: number;
    protected readonly now: () => number;
    protected readonly tracker = new LastUpdateTracker();
    private readonly updates = new EventEmitter<WorkerEvents>();

    protected constructor(options: BaseWorkerOptions) {
        this.id = options.id;
        this.stalenessThresholdMs = options.stalenessThresholdMs;
        this.now = options.now ?? (() => Date.now());
        this.onUpdate(this.tracker.listener);
    }

    abstract start(): Promise<void>;
    abstract stop(): Promise<void>;
    protected abstract isRunning(): boolean;
    protected abstract healthDetails(): WorkerHealthSnapshot['details'];

    onUpdate(listener: WorkerUpdateListener): () => void {
        const wrapped = (update: WorkerUpdate) => {
            try {
                listener(update);
            } catch (err) {
                logger.warn(m('warn', `[${this.id}] update listener failed: ${toErrorMessage(err)}`));
            }
        };
        this.updates.on('update', wrapped);
        return () => {
            this.updates.off('update', wrapped);
        };
    }

    healthCheck(): WorkerHealthSnapshot {
        const isRunning = this.isRunning();
        const lastUpdateAt = this.tracker.getLastUpdateAt();
        const verdict = evaluateHealth({
            isRunning,
            lastUpdateAt,
            stalenessThresholdMs: this.stalenessThresholdMs,
            now: this.now(),
        });
        return {
            workerId: this.id,
            isRunning,
            lastUpdateAt,
            stalenessThresholdMs: this.stalenessThresholdMs,
            ...verdict,
            details: this.healthDetails(),
        };
    }

    protected emitUpdate(update: WorkerUpdate): void {
        this.updates.emit('update', update);
    }
}
