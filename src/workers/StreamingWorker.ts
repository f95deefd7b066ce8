import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { toCanonicalInstrument } from '../core/market/symbols';
import { sleepUnlessAborted, toIsoUtc } from '../core/time/timers';
import { formatErrorDetails, toErrorMessage, TransportError } from '../infra/errors';
import { buildFieldKey, DEFAULT_RECORD_TTL_SEC, FIELD, type FieldMap, type FieldStore } from '../store/FieldStore';
import { wsConnector, type DataUpdate, type StreamCodec, type StreamConnection, type StreamConnector, type StreamMessage } from '../exchange/stream';
import { BaseWorker } from './BaseWorker';
import type { WorkerHealthSnapshot } from './types';

export type StreamState = 'DISCONNECTED' | 'CONNECTING' | 'SUBSCRIBED' | 'STREAMING';

export interface StreamingWorkerOptions {
    id: string;
    /** Key prefix in the field store, e.g. `bybit_spot`. */
    source: string;
    url: string;
    symbols: string[];
    store: FieldStore;
    codec: StreamCodec;
    connector?: StreamConnector;
    ttlSec?: number;
    connectTimeoutMs?: number;
    reconnectDelayMs?: number;
    watchdogIntervalMs?: number;
    messageTimeoutMs?: number;
    /** 0 disables the heartbeat. */
    pingIntervalMs?: number;
    stalenessThresholdMs?: number;
    now?: () => number;
}

export const STREAM_DEFAULTS = {
    connectTimeoutMs: 15_000,
    reconnectDelayMs: 5_000,
    watchdogIntervalMs: 30_000,
    messageTimeoutMs: 60_000,
    pingIntervalMs: 20_000,
    stalenessThresholdMs: 60_000,
} as const;

interface ActiveSession {
    /** Resolves once the connection has closed (or the worker was stopped). */
    closed: Promise<void>;
}

/**
 * Keeps one streaming connection alive for as long as the worker runs:
 * connect, subscribe, stream until the connection drops, wait a fixed delay and
 * start over. A watchdog terminates connections that went silent.
 */
export class StreamingWorker extends BaseWorker {
    private readonly source: string;
    private readonly url: string;
    private readonly symbols: string[];
    private readonly store: FieldStore;
    private readonly codec: StreamCodec;
    private readonly connector: StreamConnector;
    private readonly ttlSec: number;
    private readonly connectTimeoutMs: number;
    private readonly reconnectDelayMs: number;
    private readonly watchdogIntervalMs: number;
    private readonly messageTimeoutMs: number;
    private readonly pingIntervalMs: number;

    private state: StreamState = 'DISCONNECTED';
    private running = false;
    private abort?: AbortController;
    private runPromise?: Promise<void>;
    private connection?: StreamConnection;
    private watchdogTimer: NodeJS.Timeout | null = null;
    private pingTimer: NodeJS.Timeout | null = null;
    private writeChain: Promise<void> = Promise.resolve();

    private lastMessageAt?: number;
    private connectAttempt = 0;
    private reconnects = 0;
    private messages = 0;
    private dataUpdates = 0;
    private stored = 0;
    private parseErrors = 0;
    private storeErrors = 0;
    private watchdogTrips = 0;

    constructor(options: StreamingWorkerOptions) {
        super({
            id: options.id,
            stalenessThresholdMs: options.stalenessThresholdMs ?? STREAM_DEFAULTS.stalenessThresholdMs,
            now: options.now,
        });
        this.source = options.source;
        this.url = options.url;
        this.symbols = [...options.symbols];
        this.store = options.store;
        this.codec = options.codec;
        this.connector = options.connector ?? wsConnector;
        this.ttlSec = options.ttlSec ?? DEFAULT_RECORD_TTL_SEC;
        this.connectTimeoutMs = options.connectTimeoutMs ?? STREAM_DEFAULTS.connectTimeoutMs;
        this.reconnectDelayMs = options.reconnectDelayMs ?? STREAM_DEFAULTS.reconnectDelayMs;
        this.watchdogIntervalMs = options.watchdogIntervalMs ?? STREAM_DEFAULTS.watchdogIntervalMs;
        this.messageTimeoutMs = options.messageTimeoutMs ?? STREAM_DEFAULTS.messageTimeoutMs;
        this.pingIntervalMs = options.pingIntervalMs ?? STREAM_DEFAULTS.pingIntervalMs;
    }

    getState(): StreamState {
        return this.state;
    }

    start(): Promise<void> {
        // предыдущий прогон ещё доживает после abort (например, висит запись в store):
        // не возвращаем его, а запускаем новый цикл рядом
        if (this.runPromise && this.abort && !this.abort.signal.aborted) return this.runPromise;
        if (this.runPromise) {
            logger.warn(m('restart', `[${this.id}] previous run still winding down, starting a new one`));
        }
        const abort = new AbortController();
        this.abort = abort;
        this.running = true;
        this.writeChain = Promise.resolve();
        logger.info(m('lifecycle', `[${this.id}] starting: ${this.symbols.length} symbols via ${this.url}`));
        const run: Promise<void> = this.runLoop(abort.signal).finally(() => {
            if (this.runPromise !== run) return;
            this.running = false;
            this.runPromise = undefined;
        });
        this.runPromise = run;
        return run;
    }

    async stop(): Promise<void> {
        const run = this.runPromise;
        if (!run) return;
        logger.info(m('shutdown', `[${this.id}] stopping`));
        this.running = false;
        this.abort?.abort();
        try {
            await run;
        } catch (err) {
            logger.warn(m('warn', `[${this.id}] run loop ended with error during stop: ${toErrorMessage(err)}`));
        }
        logger.info(m('ok', `[${this.id}] stopped`));
    }

    protected isRunning(): boolean {
        return this.running;
    }

    protected healthDetails(): WorkerHealthSnapshot['details'] {
        return {
            state: this.state,
            connectAttempt: this.connectAttempt,
            reconnects: this.reconnects,
            messages: this.messages,
            dataUpdates: this.dataUpdates,
            stored: this.stored,
            parseErrors: this.parseErrors,
            storeErrors: this.storeErrors,
            watchdogTrips: this.watchdogTrips,
            lastMessageAgeMs: this.lastMessageAt === undefined ? undefined : this.now() - this.lastMessageAt,
        };
    }

    private async runLoop(signal: AbortSignal): Promise<void> {
        while (!signal.aborted) {
            this.connectAttempt += 1;
            logger.info(m('connect', `[${this.id}] connecting to ${this.url} (attempt ${this.connectAttempt})`));
            try {
                const session = await this.connect(signal);
                await session.closed;
            } catch (err) {
                if (signal.aborted) break;
                const details = formatErrorDetails(err);
                logger.warn(m('warn', `[${this.id}] connect failed: ${toErrorMessage(err)}${details ? ` ${details}` : ''}`));
            }
            if (signal.aborted) break;
            this.setState('DISCONNECTED');

            this.reconnects += 1;
            logger.info(m('lifecycle', `[${this.id}] reconnecting in ${this.reconnectDelayMs}ms`));
            const slept = await sleepUnlessAborted(this.reconnectDelayMs, signal);
            if (!slept) break;
        }

        const writes = this.writeChain;
        // новый прогон уже владеет соединением и таймерами
        if (this.abort?.signal === signal) {
            this.stopTimers();
            this.connection = undefined;
            this.setState('DISCONNECTED');
        }
        // дописываем то, что уже было принято до остановки
        await writes;
    }

    /**
     * Opens the connection and sends the subscriptions. Resolves once subscribed;
     * rejects with TransportError when the connection cannot be opened in time.
     */
    private connect(signal: AbortSignal): Promise<ActiveSession> {
        this.setState('CONNECTING');

        return new Promise<ActiveSession>((resolve, reject) => {
            let connection: StreamConnection | undefined;
            let opened = false;
            let failed = false;
            let markClosed: () => void = () => undefined;
            const closed = new Promise<void>((res) => {
                markClosed = res;
            });

            const fail = (err: Error) => {
                if (opened || failed) return;
                failed = true;
                clearTimeout(connectTimer);
                signal.removeEventListener('abort', onAbort);
                reject(err);
            };

            const onAbort = () => {
                if (!opened) {
                    fail(new TransportError('connect aborted', { url: this.url }));
                    connection?.terminate();
                    return;
                }
                this.stopTimers();
                connection?.close(1000, 'worker stopped');
                markClosed();
            };

            const connectTimer = setTimeout(() => {
                logger.warn(m('timeout', `[${this.id}] connect timeout (${this.connectTimeoutMs}ms)`));
                fail(new TransportError('connect timeout', { url: this.url, timeoutMs: this.connectTimeoutMs }));
                connection?.terminate();
            }, this.connectTimeoutMs);

            signal.addEventListener('abort', onAbort, { once: true });

            try {
                connection = this.connector(this.url, {
                    onOpen: () => {
                        if (failed) return;
                        opened = true;
                        clearTimeout(connectTimer);
                        this.connectAttempt = 0;
                        this.connection = connection;
                        this.lastMessageAt = this.now();
                        logger.info(m('socket', `[${this.id}] connection open`));
                        if (!this.subscribe(connection)) {
                            resolve({ closed });
                            connection?.terminate();
                            return;
                        }
                        this.setState('SUBSCRIBED');
                        this.startTimers();
                        resolve({ closed });
                    },
                    onMessage: (text) => this.handleRaw(text),
                    onClose: (code, reason) => {
                        if (this.connection === connection) {
                            this.stopTimers();
                            this.connection = undefined;
                            this.setState('DISCONNECTED');
                        }
                        const msg = `[${this.id}] connection closed code=${code}${reason ? ` reason=${reason}` : ''}`;
                        if (code === 1000) logger.info(m('socket', msg));
                        else logger.warn(m('socket', msg));
                        fail(new TransportError('connection closed before open', { url: this.url, code }));
                        signal.removeEventListener('abort', onAbort);
                        markClosed();
                    },
                    onError: (err) => {
                        logger.warn(m('warn', `[${this.id}] socket error: ${err.message}`));
                        if (!opened) {
                            fail(new TransportError('connection error', { url: this.url }, err));
                            connection?.terminate();
                        }
                    },
                });
            } catch (err) {
                fail(new TransportError('failed to create connection', { url: this.url }, err));
            }
        });
    }

    private subscribe(connection: StreamConnection | undefined): boolean {
        if (!connection) return false;
        const messages = this.codec.buildSubscribeMessages(this.symbols);
        try {
            for (const message of messages) connection.send(message);
        } catch (err) {
            logger.error(m('error', `[${this.id}] subscribe send failed: ${toErrorMessage(err)}`));
            return false;
        }
        logger.info(m('connect', `[${this.id}] subscribe sent: ${this.symbols.length} symbols in ${messages.length} request(s)`));
        return true;
    }

    private handleRaw(text: string): void {
        let message: StreamMessage;
        try {
            message = this.codec.decode(text);
        } catch (err) {
            this.parseErrors += 1;
            const details = formatErrorDetails(err);
            logger.warn(m('warn', `[${this.id}] discarded message: ${toErrorMessage(err)}${details ? ` ${details}` : ''}`));
            return;
        }

        this.lastMessageAt = this.now();
        this.messages += 1;

        switch (message.kind) {
            case 'subscribe_ack':
                if (message.success) {
                    logger.info(m('ok', `[${this.id}] subscription confirmed`));
                } else {
                    logger.warn(m('warn', `[${this.id}] subscription rejected: ${message.message ?? 'no reason given'}`));
                }
                return;
            case 'unrecognized':
                logger.debug(`[${this.id}] ignored message (${message.reason})`);
                return;
            case 'data_update':
                this.handleDataUpdate(message);
                return;
        }
    }

    private handleDataUpdate(update: DataUpdate): void {
        this.dataUpdates += 1;
        if (this.state === 'SUBSCRIBED') this.setState('STREAMING');

        const instrumentId = toCanonicalInstrument(update.symbol);
        if (!instrumentId || update.lastPrice === undefined) {
            logger.debug(`[${this.id}] skipped ${update.topic}: no instrument or price`);
            return;
        }

        const fields: FieldMap = {
            [FIELD.lastPrice]: update.lastPrice,
            [FIELD.priceTimestamp]: toIsoUtc(this.now()),
            [FIELD.sourceSymbol]: update.symbol,
        };
        const key = buildFieldKey(this.source, instrumentId);
        // одна цепочка записей на воркер: порядок записей = порядок сообщений
        this.writeChain = this.writeChain.then(() => this.persist(key, instrumentId, fields));
    }

    private async persist(key: string, instrumentId: string, fields: FieldMap): Promise<void> {
        try {
            await this.store.mergeFields(key, fields, this.ttlSec);
        } catch (err) {
            this.storeErrors += 1;
            logger.error(m('store', `[${this.id}] store write failed for ${key}: ${toErrorMessage(err)}`));
            return;
        }
        this.stored += 1;
        this.emitUpdate({ workerId: this.id, key, instrumentId, fields, ts: this.now() });
    }

    private startTimers(): void {
        this.stopTimers();
        this.watchdogTimer = setInterval(() => this.checkWatchdog(), this.watchdogIntervalMs);
        this.watchdogTimer.unref?.();
        if (this.pingIntervalMs > 0) {
            const ping = this.codec.buildPing();
            if (ping !== undefined) {
                this.pingTimer = setInterval(() => this.sendPing(ping), this.pingIntervalMs);
                this.pingTimer.unref?.();
            }
        }
    }

    private stopTimers(): void {
        if (this.watchdogTimer) {
            clearInterval(this.watchdogTimer);
            this.watchdogTimer = null;
        }
        if (this.pingTimer) {
            clearInterval(this.pingTimer);
            this.pingTimer = null;
        }
    }

    private checkWatchdog(): void {
        const connection = this.connection;
        if (!connection || this.lastMessageAt === undefined) return;
        const silentMs = this.now() - this.lastMessageAt;
        if (silentMs <= this.messageTimeoutMs) return;
        this.watchdogTrips += 1;
        logger.warn(
            m('watchdog', `[${this.id}] no messages for ${Math.round(silentMs / 1000)}s (timeout ${Math.round(this.messageTimeoutMs / 1000)}s), terminating connection`)
        );
        connection.terminate();
    }

    private sendPing(ping: string): void {
        const connection = this.connection;
        if (!connection || !connection.isOpen()) return;
        try {
            connection.send(ping);
        } catch (err) {
            logger.warn(m('heartbeat', `[${this.id}] ping failed: ${toErrorMessage(err)}`));
        }
    }

    private setState(next: StreamState): void {
        if (this.state === next) return;
        logger.debug(`[${this.id}] state ${this.state} -> ${next}`);
        this.state = next;
    }
}
