import { ParseError } from '../../infra/errors';
import type { StreamCodec, StreamMessage } from '../stream';

// ============================================================================
// CoinDCX futures trade stream (socket.io)
// ----------------------------------------------------------------------------
// socketIoConnector переводит события socket.io в текстовые кадры {event, data}.
// Подписка: emit('join', {channelName: 'B-BTC_USDT@trades-futures'})
// Сделка:   'new-trade' -> {event:'new-trade', data:'{"s":"B-BTC_USDT","p":"43000.1",...}'}
//           внутренний data бывает строкой JSON или уже объектом.
// Heartbeat делает сам socket.io, своего ping нет.
// ============================================================================

export const COINDCX_STREAM_URL = 'wss://stream.coindcx.com';

const TRADE_EVENT = 'new-trade';
const TRADE_CHANNEL_SUFFIX = '@trades-futures';
const PREVIEW_LEN = 200;

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const toStr = (value: unknown): string | undefined => {
    if (typeof value === 'string') return value === '' ? undefined : value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return undefined;
};

const preview = (raw: string): string => (raw.length > PREVIEW_LEN ? `${raw.slice(0, PREVIEW_LEN)}…` : raw);

/** Frame format shared with socketIoConnector. */
export interface SocketFrame {
    event: string;
    data?: unknown;
}

export function buildCoinDcxJoinMessages(symbols: readonly string[]): string[] {
    return symbols.map((symbol) =>
        JSON.stringify({ event: 'join', data: { channelName: `${symbol}${TRADE_CHANNEL_SUFFIX}` } } satisfies SocketFrame)
    );
}

function parseFrame(raw: string): SocketFrame {
    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (err) {
        throw new ParseError('CoinDCX frame is not valid JSON', { preview: preview(raw) }, err);
    }
    if (!isObject(parsed) || typeof parsed.event !== 'string') {
        throw new ParseError('CoinDCX frame has no event name', { preview: preview(raw) });
    }
    return { event: parsed.event, data: parsed.data };
}

function readTradeBody(payload: unknown): JsonObject {
    const inner = isObject(payload) ? payload.data : undefined;
    if (isObject(inner)) return inner;
    if (typeof inner !== 'string') {
        throw new ParseError('CoinDCX trade has no data', { event: TRADE_EVENT });
    }
    let parsed: unknown;
    try {
        parsed = JSON.parse(inner);
    } catch (err) {
        throw new ParseError('CoinDCX trade data is not valid JSON', { preview: preview(inner) }, err);
    }
    if (!isObject(parsed)) throw new ParseError('CoinDCX trade data is not an object', { preview: preview(inner) });
    return parsed;
}

export function decodeCoinDcxTradeFrame(raw: string): StreamMessage {
    const frame = parseFrame(raw);
    if (frame.event !== TRADE_EVENT) {
        return { kind: 'unrecognized', reason: `event:${frame.event}` };
    }

    const trade = readTradeBody(frame.data);
    const symbol = toStr(trade.s);
    if (!symbol) throw new ParseError('CoinDCX trade has no symbol', { event: TRADE_EVENT });

    return {
        kind: 'data_update',
        topic: TRADE_EVENT,
        symbol,
        lastPrice: toStr(trade.p),
    };
}

export const coinDcxTradeCodec: StreamCodec = {
    venue: 'coindcx',
    buildSubscribeMessages: (symbols) => buildCoinDcxJoinMessages(symbols),
    buildPing: () => undefined,
    decode: decodeCoinDcxTradeFrame,
};
