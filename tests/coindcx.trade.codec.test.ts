import { describe, expect, it } from 'vitest';
import { buildCoinDcxJoinMessages, coinDcxTradeCodec, decodeCoinDcxTradeFrame } from '../src/exchange/coindcx/tradeCodec';
import { ParseError } from '../src/infra/errors';

const tradeFrame = (data: unknown) => JSON.stringify({ event: 'new-trade', data: { event: 'new-trade', data } });

describe('CoinDCX trade codec', () => {
  it('joins one trades channel per symbol and has no ping of its own', () => {
    expect(buildCoinDcxJoinMessages(['B-BTC_USDT', 'B-ETH_USDT'])).toEqual([
      '{"event":"join","data":{"channelName":"B-BTC_USDT@trades-futures"}}',
      '{"event":"join","data":{"channelName":"B-ETH_USDT@trades-futures"}}',
    ]);
    expect(coinDcxTradeCodec.buildPing()).toBeUndefined();
  });

  it('decodes a trade whose data arrives as a JSON string', () => {
    const msg = decodeCoinDcxTradeFrame(tradeFrame(JSON.stringify({ s: 'B-BTC_USDT', p: '43000.1', q: 0.5 })));
    expect(msg).toEqual({ kind: 'data_update', topic: 'new-trade', symbol: 'B-BTC_USDT', lastPrice: '43000.1' });
  });

  it('decodes a trade whose data is already an object with a numeric price', () => {
    const msg = decodeCoinDcxTradeFrame(tradeFrame({ s: 'B-ETH_USDT', p: 2200.25 }));
    expect(msg).toEqual({ kind: 'data_update', topic: 'new-trade', symbol: 'B-ETH_USDT', lastPrice: '2200.25' });
  });

  it('ignores other socket events', () => {
    expect(decodeCoinDcxTradeFrame('{"event":"depth-update","data":{}}')).toEqual({ kind: 'unrecognized', reason: 'event:depth-update' });
  });

  it('rejects frames it cannot read', () => {
    expect(() => decodeCoinDcxTradeFrame('not json')).toThrow(ParseError);
    expect(() => decodeCoinDcxTradeFrame('{"data":{}}')).toThrow('CoinDCX frame has no event name');
    expect(() => decodeCoinDcxTradeFrame(tradeFrame('{broken'))).toThrow('CoinDCX trade data is not valid JSON');
    expect(() => decodeCoinDcxTradeFrame(tradeFrame({ p: '1' }))).toThrow('CoinDCX trade has no symbol');
    expect(() => decodeCoinDcxTradeFrame('{"event":"new-trade"}')).toThrow('CoinDCX trade has no data');
  });
});
