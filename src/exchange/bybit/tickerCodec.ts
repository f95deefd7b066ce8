import { ParseError } from '../../infra/errors';
import type { StreamCodec, StreamMessage } from '../stream';

// ============================================================================
// Bybit v5 public ticker stream
// ----------------------------------------------------------------------------
// Подписка:  {"op":"subscribe","args":["tickers.BTCUSDT", ...]}
// Ack:       {"op":"subscribe","success":true,"ret_msg":"","conn_id":"..."}
// Данные:    {"topic":"tickers.BTCUSDT","ts":1700000000000,"data":{"symbol":"BTCUSDT","lastPrice":"..."}}
// Heartbeat: {"op":"ping"} -> {"op":"pong",...} (spot) / {"op":"ping","ret_msg":"pong",...} (linear)
// ============================================================================

export const BYBIT_SPOT_WS_URL = 'wss://stream.bybit.com/v5/public/spot';

/** Bybit rejects a subscribe request with more than 10 args. */
export const BYBIT_MAX_ARGS_PER_SUBSCRIBE = 10;

const TICKER_TOPIC_PREFIX = 'tickers.';
const PREVIEW_LEN = 200;

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

// Bybit шлёт числа то строками, то числами. Храним строкой, как пришло; 0 не теряем.
const toStr = (value: unknown): string | undefined => {
    if (typeof value === 'string') return value === '' ? undefined : value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
};

const preview = (raw: string): string => (raw.length > PREVIEW_LEN ? `${raw.slice(0, PREVIEW_LEN)}…` : raw);

export function buildBybitSubscribeMessages(symbols: readonly string[], maxArgs = BYBIT_MAX_ARGS_PER_SUBSCRIBE): string[] {
    const topics = symbols.map((symbol) => `${TICKER_TOPIC_PREFIX}${symbol}`);
    const messages: string[] = [];
    for (let i = 0; i < topics.length; i += maxArgs) {
        messages.push(JSON.stringify({ op: 'subscribe', args: topics.slice(i, i + maxArgs) }));
    }
    return messages;
}

export function decodeBybitTickerMessage(raw: string): StreamMessage {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new ParseError('Bybit message is not valid JSON', { preview: preview(raw) }, err);
    }
    if (!isObject(parsed)) {
        throw new ParseError('Bybit message is not a JSON object', { preview: preview(raw) });
    }

    const op = parsed.op;
    if (op === 'pong' || (op === 'ping' && parsed.ret_msg === 'pong')) {
        return { kind: 'unrecognized', reason: 'heartbeat' };
    }
    if (op === 'subscribe') {
        return {
            kind: 'subscribe_ack',
            success: parsed.success === true,
            message: toStr(parsed.ret_msg),
        };
    }

    const topic = parsed.topic;
    if (typeof topic !== 'string') {
        return { kind: 'unrecognized', reason: typeof op === 'string' ? `op:${op}` : 'no topic' };
    }
    if (!topic.startsWith(TICKER_TOPIC_PREFIX)) {
        return { kind: 'unrecognized', reason: `topic:${topic}` };
    }

    // data бывает объектом или массивом из одного тикера
    const rawData = parsed.data;
    const ticker: unknown = Array.isArray(rawData) ? rawData[0] : rawData;
    if (!isObject(ticker)) {
        throw new ParseError('Bybit ticker message has no data object', { topic });
    }

    const symbol = toStr(ticker.symbol) ?? topic.slice(TICKER_TOPIC_PREFIX.length);
    if (!symbol) {
        throw new ParseError('Bybit ticker message has no symbol', { topic });
    }

    return {
        kind: 'data_update',
        topic,
        symbol,
        lastPrice: toStr(ticker.lastPrice),
    };
}

export const bybitTickerCodec: StreamCodec = {
    venue: 'bybit',
    buildSubscribeMessages: (symbols) => buildBybitSubscribeMessages(symbols),
    buildPing: () => JSON.stringify({ op: 'ping' }),
    decode: decodeBybitTickerMessage,
};
