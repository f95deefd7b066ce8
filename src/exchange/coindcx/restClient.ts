import { ParseError, TransportError } from '../../infra/errors';
import { normalizeSymbol } from '../../core/market/symbols';

// ============================================================================
// CoinDCX futures funding REST
// ----------------------------------------------------------------------------
// Два формата ответа, оба встречаются на публичных эндпоинтах CoinDCX:
//
//  nested (market_data/v3/current_prices/futures/rt):
//    {"ts":..., "prices": {"B-BTC_USDT": {"fr": 0.0001, "efr": 0.00012, "ls": ...}, ...}}
//
//  flat (exchange/v1/derivatives/get_funding_rate):
//    [{"symbol":"B-BTC_USDT","funding_rate":"0.0001","next_funding_time":1700000000000}, ...]
//
// Формат определяется по самому ответу, не по URL.
// ============================================================================

export const COINDCX_FUNDING_RT_URL = 'https://public.coindcx.com/market_data/v3/current_prices/futures/rt';

const DEFAULT_TIMEOUT_MS = 10_000;

export type FundingResponseShape = 'nested' | 'flat';

export interface FundingEntry {
    symbol: string;
    currentFundingRate?: string;
    estimatedFundingRate?: string;
    nextFundingTime?: string;
}

export interface FundingSnapshot {
    shape: FundingResponseShape;
    entries: FundingEntry[];
}

/** Anything the polling worker can pull a funding snapshot from. */
export interface FundingSource {
    readonly url: string;
    fetchFundingSnapshot(opts?: { signal?: AbortSignal }): Promise<FundingSnapshot>;
}

export interface CoinDcxFundingClientOptions {
    url?: string;
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
}

function isObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// числа храним ровно как пришли, без float round-trip
function toDecimalString(value: unknown): string | undefined {
    if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed === '' ? undefined : trimmed;
    }
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
}

export function detectFundingShape(payload: unknown): FundingResponseShape | undefined {
    if (Array.isArray(payload)) return 'flat';
    if (isObject(payload) && isObject(payload.prices)) return 'nested';
    return undefined;
}

export function extractFundingEntries(payload: unknown): FundingSnapshot {
    const shape = detectFundingShape(payload);

    if (shape === 'flat' && Array.isArray(payload)) {
        const entries: FundingEntry[] = [];
        for (const row of payload) {
            if (!isObject(row) || typeof row.symbol !== 'string' || !row.symbol.trim()) continue;
            entries.push({
                symbol: normalizeSymbol(row.symbol),
                currentFundingRate: toDecimalString(row.funding_rate),
                nextFundingTime: toDecimalString(row.next_funding_time),
            });
        }
        return { shape, entries };
    }

    if (shape === 'nested' && isObject(payload) && isObject(payload.prices)) {
        const entries: FundingEntry[] = [];
        for (const [symbol, data] of Object.entries(payload.prices)) {
            if (!isObject(data)) continue;
            entries.push({
                symbol: normalizeSymbol(symbol),
                currentFundingRate: toDecimalString(data.fr),
                estimatedFundingRate: toDecimalString(data.efr),
            });
        }
        return { shape, entries };
    }

    const kind = payload === null ? 'null' : Array.isArray(payload) ? 'array' : typeof payload;
    throw new ParseError('Unrecognized funding response shape', {
        kind,
        keys: isObject(payload) ? Object.keys(payload).slice(0, 10).join(',') : undefined,
    });
}

export class CoinDcxFundingClient implements FundingSource {
    readonly url: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;

    constructor(options: CoinDcxFundingClientOptions = {}) {
        this.url = options.url ?? COINDCX_FUNDING_RT_URL;
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
    }

    async fetchFundingSnapshot(opts: { signal?: AbortSignal } = {}): Promise<FundingSnapshot> {
        const payload = await this.fetchJson(opts.signal);
        return extractFundingEntries(payload);
    }

    private async fetchJson(signal?: AbortSignal): Promise<unknown> {
        if (signal?.aborted) {
            throw new TransportError('CoinDCX request aborted', { url: this.url }, abortReason());
        }

        const controller = new AbortController();
        let timedOut = false;
        const timer = setTimeout(() => {
            timedOut = true;
            controller.abort();
        }, this.timeoutMs);
        const onAbort = () => controller.abort();
        signal?.addEventListener('abort', onAbort, { once: true });

        try {
            let response: Response;
            try {
                response = await this.fetchImpl(this.url, {
                    signal: controller.signal,
                    headers: { accept: 'application/json' },
                });
            } catch (err) {
                if (timedOut) {
                    throw new TransportError('CoinDCX request timeout', { url: this.url, timeoutMs: this.timeoutMs }, err);
                }
                if (signal?.aborted) {
                    throw new TransportError('CoinDCX request aborted', { url: this.url }, abortReason());
                }
                throw new TransportError('CoinDCX request error', { url: this.url }, err);
            }

            if (!response.ok) {
                throw new TransportError('CoinDCX request failed', {
                    url: this.url,
                    status: response.status,
                    statusText: response.statusText,
                });
            }

            let text: string;
            try {
                text = await response.text();
            } catch (err) {
                throw new TransportError('CoinDCX response body read failed', { url: this.url, status: response.status }, err);
            }
            try {
                return JSON.parse(text);
            } catch (err) {
                throw new ParseError('CoinDCX response is not valid JSON', { url: this.url, status: response.status }, err);
            }
        } finally {
            clearTimeout(timer);
            signal?.removeEventListener('abort', onAbort);
        }
    }
}

function abortReason(): Error {
    const err = new Error('request aborted');
    err.name = 'AbortError';
    return err;
}
