import EventEmitter from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import type { WorkerHealthSnapshot } from '../../workers/types';

// ============================================================================
// Shared meta
// ----------------------------------------------------------------------------
// Базовые поля для трассировки событий:
// - source: кто инициатор (health monitor / supervisor / worker / cli)
// - correlationId: связывает цепочку событий в один "flow"
// - ts: unix ms (когда событие создано внутри процесса)
// ============================================================================

export type EventSource = 'system' | 'health' | 'supervisor' | 'worker' | 'cli';

export interface EventMeta {
    source: EventSource;
    ts: number;
    correlationId?: string;
}

export const newCorrelationId = (): string => randomUUID();

export function createMeta(
    source: EventSource,
    opts: {
        correlationId?: string;
        ts?: number;
    } = {}
): EventMeta {
    return {
        source,
        ts: opts.ts ?? Date.now(),
        correlationId: opts.correlationId,
    };
}

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

export interface HealthReport {
    meta: EventMeta;
    healthy: boolean;
    workers: WorkerHealthSnapshot[];
}

export type WorkerExitKind = 'completed' | 'failed';

export interface WorkerExited {
    meta: EventMeta;
    workerId: string;
    kind: WorkerExitKind;
    error?: string;
}

export type RestartReason = 'task_exited' | 'unhealthy';

export interface WorkerRestarted {
    meta: EventMeta;
    workerId: string;
    reason: RestartReason;
    restartCount: number;
}

export interface WorkerAbandoned {
    meta: EventMeta;
    workerId: string;
    restartCount: number;
    maxRestarts: number;
}

export type SupervisorLifecycle = 'IDLE' | 'STARTING' | 'RUNNING' | 'STOPPING' | 'STOPPED';

export interface SupervisorStateChanged {
    meta: EventMeta;
    lifecycle: SupervisorLifecycle;
}

// ---------------------------------------------------------------------------
// Карта событий: topic -> payload. Каждый topic несёт ровно один payload-объект.
// ---------------------------------------------------------------------------
export type BusEventMap = {
    'health:report': HealthReport;
    'supervisor:worker_exited': WorkerExited;
    'supervisor:worker_restarted': WorkerRestarted;
    'supervisor:worker_abandoned': WorkerAbandoned;
    'supervisor:state': SupervisorStateChanged;
};

export type BusEventName = keyof BusEventMap;

export class EventBus {
    private readonly emitter = new EventEmitter();

    public publish<T extends BusEventName>(topic: T, payload: BusEventMap[T]): boolean {
        return this.emitter.emit(topic, payload);
    }

    public subscribe<T extends BusEventName>(topic: T, handler: (payload: BusEventMap[T]) => void): this {
        this.emitter.on(topic, handler);
        return this;
    }

    public unsubscribe<T extends BusEventName>(topic: T, handler: (payload: BusEventMap[T]) => void): this {
        this.emitter.off(topic, handler);
        return this;
    }

    public listenerCount(topic: BusEventName): number {
        return this.emitter.listenerCount(topic);
    }

    public clear(): void {
        this.emitter.removeAllListeners();
    }
}

export const eventBus = new EventBus();
