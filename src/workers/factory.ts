import type { AppConfig, StreamVenue } from '../infra/config';
import type { FieldStore } from '../store/FieldStore';
import { wsConnector, type StreamCodec, type StreamConnector } from '../exchange/stream';
import { bybitTickerCodec } from '../exchange/bybit/tickerCodec';
import { CoinDcxFundingClient } from '../exchange/coindcx/restClient';
import { coinDcxTradeCodec } from '../exchange/coindcx/tradeCodec';
import { socketIoConnector } from '../exchange/coindcx/socketConnector';
import { StreamingWorker } from './StreamingWorker';
import { PollingWorker } from './PollingWorker';
import type { IngestWorker } from './types';

const VENUES: Record<StreamVenue, { codec: StreamCodec; connector: StreamConnector }> = {
    bybit: { codec: bybitTickerCodec, connector: wsConnector },
    coindcx: { codec: coinDcxTradeCodec, connector: socketIoConnector },
};

export interface WorkerFactoryDeps {
    /** Replaces the venue transport for every stream (tests). */
    connector?: StreamConnector;
    fetchImpl?: typeof fetch;
    now?: () => number;
}

/** Builds one worker per enabled service, streams first. */
export function createWorkers(config: AppConfig, store: FieldStore, deps: WorkerFactoryDeps = {}): IngestWorker[] {
    const workers: IngestWorker[] = [];
    const ttlSec = config.store.ttlSec;

    for (const stream of config.streams) {
        if (!stream.enabled) continue;
        const venue = VENUES[stream.venue];
        workers.push(
            new StreamingWorker({
                id: stream.id,
                source: stream.source,
                url: stream.url,
                symbols: stream.symbols,
                store,
                codec: venue.codec,
                connector: deps.connector ?? venue.connector,
                ttlSec,
                connectTimeoutMs: stream.connectTimeoutMs,
                reconnectDelayMs: stream.reconnectDelayMs,
                watchdogIntervalMs: stream.watchdogIntervalMs,
                messageTimeoutMs: stream.messageTimeoutMs,
                pingIntervalMs: stream.pingIntervalMs,
                stalenessThresholdMs: stream.stalenessThresholdMs,
                now: deps.now,
            })
        );
    }

    for (const service of config.funding) {
        if (!service.enabled) continue;
        workers.push(
            new PollingWorker({
                id: service.id,
                source: service.source,
                symbols: service.symbols,
                store,
                client: new CoinDcxFundingClient({
                    url: service.url,
                    timeoutMs: service.requestTimeoutMs,
                    fetchImpl: deps.fetchImpl,
                }),
                ttlSec,
                fetchIntervalMs: service.fetchIntervalMs,
                retryAttempts: service.retryAttempts,
                retryBaseMs: service.retryBaseMs,
                stalenessThresholdMs: service.stalenessThresholdMs,
                now: deps.now,
            })
        );
    }

    return workers;
}
