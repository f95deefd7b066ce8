import { describe, expect, it } from 'vitest';
import { buildBybitSubscribeMessages, bybitTickerCodec, decodeBybitTickerMessage } from '../src/exchange/bybit/tickerCodec';
import { ParseError } from '../src/infra/errors';

describe('Bybit ticker codec', () => {
  it('splits subscriptions into requests of at most 10 topics', () => {
    const symbols = Array.from({ length: 12 }, (_, i) => `C${i}USDT`);
    const messages = buildBybitSubscribeMessages(symbols);

    expect(messages).toHaveLength(2);
    expect(JSON.parse(messages[0]).args).toHaveLength(10);
    expect(JSON.parse(messages[1])).toEqual({ op: 'subscribe', args: ['tickers.C10USDT', 'tickers.C11USDT'] });
  });

  it('builds a single subscribe request for a short list', () => {
    expect(bybitTickerCodec.buildSubscribeMessages(['BTCUSDT', 'ETHUSDT'])).toEqual([
      '{"op":"subscribe","args":["tickers.BTCUSDT","tickers.ETHUSDT"]}',
    ]);
    expect(bybitTickerCodec.buildPing()).toBe('{"op":"ping"}');
  });

  it('decodes a ticker snapshot', () => {
    const msg = decodeBybitTickerMessage(
      JSON.stringify({ topic: 'tickers.BTCUSDT', ts: 1700000000123, type: 'snapshot', data: { symbol: 'BTCUSDT', lastPrice: '43000.5' } })
    );
    expect(msg).toEqual({
      kind: 'data_update',
      topic: 'tickers.BTCUSDT',
      symbol: 'BTCUSDT',
      lastPrice: '43000.5',
    });
  });

  it('takes the symbol from the topic and accepts numeric prices and array data', () => {
    const msg = decodeBybitTickerMessage(JSON.stringify({ topic: 'tickers.ETHUSDT', data: [{ lastPrice: 0 }] }));
    expect(msg).toEqual({ kind: 'data_update', topic: 'tickers.ETHUSDT', symbol: 'ETHUSDT', lastPrice: '0' });
  });

  it('reports a delta without lastPrice as an update with no price', () => {
    const msg = decodeBybitTickerMessage(JSON.stringify({ topic: 'tickers.SOLUSDT', type: 'delta', data: { symbol: 'SOLUSDT', lastPrice: '' } }));
    expect(msg).toMatchObject({ kind: 'data_update', symbol: 'SOLUSDT', lastPrice: undefined });
  });

  it('recognizes subscription acks and heartbeats', () => {
    expect(decodeBybitTickerMessage('{"op":"subscribe","success":true,"ret_msg":"","conn_id":"c1"}')).toEqual({
      kind: 'subscribe_ack',
      success: true,
      message: undefined,
    });
    expect(decodeBybitTickerMessage('{"op":"subscribe","success":false,"ret_msg":"error:handler not found"}')).toEqual({
      kind: 'subscribe_ack',
      success: false,
      message: 'error:handler not found',
    });
    expect(decodeBybitTickerMessage('{"op":"pong","args":["1700000000000"]}')).toEqual({ kind: 'unrecognized', reason: 'heartbeat' });
    expect(decodeBybitTickerMessage('{"op":"ping","success":true,"ret_msg":"pong"}')).toEqual({ kind: 'unrecognized', reason: 'heartbeat' });
  });

  it('marks foreign topics and topic-less messages as unrecognized', () => {
    expect(decodeBybitTickerMessage('{"topic":"orderbook.1.BTCUSDT","data":{}}')).toEqual({
      kind: 'unrecognized',
      reason: 'topic:orderbook.1.BTCUSDT',
    });
    expect(decodeBybitTickerMessage('{"op":"auth"}')).toEqual({ kind: 'unrecognized', reason: 'op:auth' });
    expect(decodeBybitTickerMessage('{"hello":1}')).toEqual({ kind: 'unrecognized', reason: 'no topic' });
  });

  it('throws ParseError on malformed payloads', () => {
    expect(() => decodeBybitTickerMessage('not json')).toThrow(ParseError);
    expect(() => decodeBybitTickerMessage('[1,2]')).toThrow('Bybit message is not a JSON object');
    expect(() => decodeBybitTickerMessage('{"topic":"tickers.BTCUSDT","data":"x"}')).toThrow('Bybit ticker message has no data object');
  });

  it('truncates the payload preview attached to a parse error', () => {
    const raw = `{${'x'.repeat(300)}`;
    try {
      decodeBybitTickerMessage(raw);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ParseError);
      const preview = err instanceof ParseError ? err.details?.preview : undefined;
      expect(preview).toBe(`${raw.slice(0, 200)}…`);
    }
  });
});
