import { logger } from '../infra/logger';
import { m } from '../core/logMarkers';
import { normalizeSymbolList, toCanonicalInstrument } from '../core/market/symbols';
import { sleepUnlessAborted, toIsoUtc } from '../core/time/timers';
import { formatErrorDetails, isAbortError, ParseError, toErrorMessage } from '../infra/errors';
import { buildFieldKey, DEFAULT_RECORD_TTL_SEC, FIELD, type FieldMap, type FieldStore } from '../store/FieldStore';
import type { FundingEntry, FundingResponseShape, FundingSnapshot, FundingSource } from '../exchange/coindcx/restClient';
import { BaseWorker } from './BaseWorker';
import type { WorkerHealthSnapshot } from './types';

export interface PollingWorkerOptions {
    id: string;
    source: string;
    symbols: string[];
    store: FieldStore;
    client: FundingSource;
    ttlSec?: number;
    fetchIntervalMs?: number;
    /** Total request attempts per cycle. */
    retryAttempts?: number;
    retryBaseMs?: number;
    /** Defaults to twice the fetch interval. */
    stalenessThresholdMs?: number;
    now?: () => number;
}

export interface FetchCycleSummary {
    ok: boolean;
    attempts: number;
    stored: number;
    missing: string[];
    failedWrites: number;
    error?: string;
}

export const POLL_DEFAULTS = {
    fetchIntervalMs: 60_000,
    retryAttempts: 3,
    retryBaseMs: 1_000,
} as const;

export function computeRetryDelayMs(attempt: number, baseMs: number): number {
    return 2 ** attempt * baseMs;
}

/**
 * Fetches one batch funding snapshot per cycle at a fixed rate and merges the
 * configured symbols into the field store. A failed or slow cycle never shifts
 * the schedule: overrun slots are skipped, not queued.
 */
export class PollingWorker extends BaseWorker {
    private readonly source: string;
    private readonly symbols: string[];
    private readonly store: FieldStore;
    private readonly client: FundingSource;
    private readonly ttlSec: number;
    private readonly fetchIntervalMs: number;
    private readonly retryAttempts: number;
    private readonly retryBaseMs: number;

    private running = false;
    private abort?: AbortController;
    private runPromise?: Promise<void>;
    private detectedShape?: FundingResponseShape;

    private cycles = 0;
    private failedCycles = 0;
    private skippedSlots = 0;
    private lastCycle?: FetchCycleSummary;

    constructor(options: PollingWorkerOptions) {
        const fetchIntervalMs = options.fetchIntervalMs ?? POLL_DEFAULTS.fetchIntervalMs;
        super({
            id: options.id,
            stalenessThresholdMs: options.stalenessThresholdMs ?? fetchIntervalMs * 2,
            now: options.now,
        });
        this.source = options.source;
        this.symbols = normalizeSymbolList(options.symbols);
        this.store = options.store;
        this.client = options.client;
        this.ttlSec = options.ttlSec ?? DEFAULT_RECORD_TTL_SEC;
        this.fetchIntervalMs = fetchIntervalMs;
        this.retryAttempts = Math.max(1, options.retryAttempts ?? POLL_DEFAULTS.retryAttempts);
        this.retryBaseMs = options.retryBaseMs ?? POLL_DEFAULTS.retryBaseMs;
    }

    start(): Promise<void> {
        // старый прогон после abort может ещё ждать store; новый цикл его не ждёт
        if (this.runPromise && this.abort && !this.abort.signal.aborted) return this.runPromise;
        if (this.runPromise) {
            logger.warn(m('restart', `[${this.id}] previous run still winding down, starting a new one`));
        }
        const abort = new AbortController();
        this.abort = abort;
        this.running = true;
        logger.info(
            m('lifecycle', `[${this.id}] starting: ${this.symbols.length} symbols every ${Math.round(this.fetchIntervalMs / 1000)}s from ${this.client.url}`)
        );
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
            cycles: this.cycles,
            failedCycles: this.failedCycles,
            skippedSlots: this.skippedSlots,
            lastCycleOk: this.lastCycle?.ok,
            lastStored: this.lastCycle?.stored,
            lastMissing: this.lastCycle?.missing.length,
            shape: this.detectedShape,
        };
    }

    private async runLoop(signal: AbortSignal): Promise<void> {
        const startedAt = this.now();
        let slot = 0;

        while (!signal.aborted) {
            await this.fetchAndStore(signal);
            if (signal.aborted) break;

            slot += 1;
            let nextAt = startedAt + slot * this.fetchIntervalMs;
            const now = this.now();
            if (nextAt < now) {
                const skipped = Math.ceil((now - nextAt) / this.fetchIntervalMs);
                slot += skipped;
                nextAt = startedAt + slot * this.fetchIntervalMs;
                this.skippedSlots += skipped;
                logger.warn(m('timeout', `[${this.id}] cycle overran the schedule, skipped ${skipped} slot(s)`));
            }

            const slept = await sleepUnlessAborted(nextAt - now, signal);
            if (!slept) break;
        }
    }

    /** One fetch cycle: request with retry, then merge every configured symbol found. */
    async fetchAndStore(signal?: AbortSignal): Promise<FetchCycleSummary> {
        this.cycles += 1;
        const { snapshot, attempts, error } = await this.fetchWithRetry(signal);

        if (!snapshot) {
            const summary: FetchCycleSummary = {
                ok: false,
                attempts,
                stored: 0,
                missing: [],
                failedWrites: 0,
                error: error === undefined ? 'aborted' : toErrorMessage(error),
            };
            if (!signal?.aborted) {
                this.failedCycles += 1;
                const details = formatErrorDetails(error);
                logger.error(
                    m('poll', `[${this.id}] fetch cycle failed after ${attempts} attempt(s): ${summary.error}${details ? ` ${details}` : ''}`)
                );
            }
            this.lastCycle = summary;
            return summary;
        }

        if (this.detectedShape !== snapshot.shape) {
            this.detectedShape = snapshot.shape;
            logger.info(m('poll', `[${this.id}] funding response shape: ${snapshot.shape}`));
        }

        const summary = await this.storeSnapshot(snapshot);
        summary.attempts = attempts;
        this.lastCycle = summary;
        return summary;
    }

    private async fetchWithRetry(signal?: AbortSignal): Promise<{ snapshot?: FundingSnapshot; attempts: number; error?: unknown }> {
        let attempts = 0;
        let lastError: unknown;

        for (let attempt = 0; attempt < this.retryAttempts; attempt += 1) {
            if (signal?.aborted) break;
            attempts += 1;
            try {
                const snapshot = await this.client.fetchFundingSnapshot({ signal });
                return { snapshot, attempts };
            } catch (err) {
                lastError = err;
                if (signal?.aborted || isAbortError(err)) break;
                // битый ответ повтором не лечится
                if (err instanceof ParseError) break;

                const isLast = attempt === this.retryAttempts - 1;
                logger.warn(m('warn', `[${this.id}] request failed (attempt ${attempts}/${this.retryAttempts}): ${toErrorMessage(err)}`));
                if (isLast) break;

                const delayMs = computeRetryDelayMs(attempt, this.retryBaseMs);
                const slept = await sleepUnlessAborted(delayMs, signal);
                if (!slept) break;
            }
        }

        return { attempts, error: lastError };
    }

    private async storeSnapshot(snapshot: FundingSnapshot): Promise<FetchCycleSummary> {
        const bySymbol = new Map<string, FundingEntry>();
        for (const entry of snapshot.entries) bySymbol.set(entry.symbol, entry);

        const stampedAt = toIsoUtc(this.now());
        const missing: string[] = [];
        let stored = 0;
        let failedWrites = 0;

        for (const symbol of this.symbols) {
            const entry = bySymbol.get(symbol);
            const instrumentId = toCanonicalInstrument(symbol);
            if (!entry || !instrumentId) {
                missing.push(symbol);
                continue;
            }

            const fields = buildFundingFields(entry, stampedAt);
            if (!fields) {
                missing.push(symbol);
                continue;
            }

            const key = buildFieldKey(this.source, instrumentId);
            try {
                await this.store.mergeFields(key, fields, this.ttlSec);
            } catch (err) {
                failedWrites += 1;
                logger.error(m('store', `[${this.id}] store write failed for ${key}: ${toErrorMessage(err)}`));
                continue;
            }
            stored += 1;
            this.emitUpdate({ workerId: this.id, key, instrumentId, fields, ts: this.now() });
        }

        if (missing.length > 0) {
            logger.warn(m('warn', `[${this.id}] symbols missing from response: ${missing.join(', ')}`));
        }
        logger.info(m('poll', `[${this.id}] stored funding for ${stored}/${this.symbols.length} symbols`));

        return { ok: true, attempts: 0, stored, missing, failedWrites };
    }
}

function buildFundingFields(entry: FundingEntry, stampedAt: string): FieldMap | undefined {
    if (entry.currentFundingRate === undefined && entry.estimatedFundingRate === undefined) return undefined;
    const fields: FieldMap = {};
    if (entry.currentFundingRate !== undefined) fields[FIELD.currentFundingRate] = entry.currentFundingRate;
    if (entry.estimatedFundingRate !== undefined) fields[FIELD.estimatedFundingRate] = entry.estimatedFundingRate;
    if (entry.nextFundingTime !== undefined) fields[FIELD.nextFundingTime] = entry.nextFundingTime;
    fields[FIELD.fundingTimestamp] = stampedAt;
    fields[FIELD.sourceSymbol] = entry.symbol;
    return fields;
}
