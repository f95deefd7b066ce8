import { describe, expect, it } from 'vitest';
import { MemoryFieldStore } from '../src/store/MemoryFieldStore';
import { buildFieldKey, parseInstrumentRecord, splitFieldKey } from '../src/store/FieldStore';

describe('MemoryFieldStore', () => {
  it('merges disjoint field subsets from two writers into one record', async () => {
    let now = 1_000;
    const store = new MemoryFieldStore({ now: () => now });

    await store.mergeFields('coindcx_futures:BTC', { last_price: '43000.1', price_timestamp: '2024-01-01T00:00:00.000Z' }, 3600);
    now += 500;
    await store.mergeFields('coindcx_futures:BTC', { current_funding_rate: '0.0001', funding_timestamp: '2024-01-01T00:00:00.500Z' }, 3600);

    expect(await store.read('coindcx_futures:BTC')).toEqual({
      last_price: '43000.1',
      price_timestamp: '2024-01-01T00:00:00.000Z',
      current_funding_rate: '0.0001',
      funding_timestamp: '2024-01-01T00:00:00.500Z',
    });
  });

  it('overwrites a field on a later write', async () => {
    const store = new MemoryFieldStore();
    await store.mergeFields('bybit_spot:ETH', { last_price: '2200' }, 60);
    await store.mergeFields('bybit_spot:ETH', { last_price: '2201.5' }, 60);
    expect(await store.read('bybit_spot:ETH')).toEqual({ last_price: '2201.5' });
  });

  it('expires a record ttl seconds after its latest write', async () => {
    let now = 0;
    const store = new MemoryFieldStore({ now: () => now });

    await store.mergeFields('bybit_spot:SOL', { last_price: '100' }, 10);
    now = 9_000;
    await store.mergeFields('bybit_spot:SOL', { price_timestamp: 'x' }, 10);

    now = 18_999;
    expect(await store.read('bybit_spot:SOL')).toEqual({ last_price: '100', price_timestamp: 'x' });

    now = 19_000;
    expect(await store.read('bybit_spot:SOL')).toBeUndefined();
    expect(store.size()).toBe(0);
  });

  it('lists only live keys under a prefix', async () => {
    let now = 0;
    const store = new MemoryFieldStore({ now: () => now });
    await store.mergeFields('bybit_spot:BTC', { last_price: '1' }, 100);
    await store.mergeFields('bybit_spot:ETH', { last_price: '2' }, 1);
    await store.mergeFields('coindcx_futures:BTC', { current_funding_rate: '0.1' }, 100);

    now = 1_000;
    expect(Array.from(await store.listKeys('bybit_spot:'))).toEqual(['bybit_spot:BTC']);
    expect((await store.listKeys('')).size).toBe(2);
  });

  it('returns copies so callers cannot mutate stored fields', async () => {
    const store = new MemoryFieldStore();
    await store.mergeFields('k:A', { a: '1' }, 60);
    const first = await store.read('k:A');
    if (first) first.a = 'changed';
    expect(await store.read('k:A')).toEqual({ a: '1' });
  });
});

describe('field keys', () => {
  it('builds and splits SOURCE:INSTRUMENT keys', () => {
    expect(buildFieldKey('bybit_spot', 'BTC')).toBe('bybit_spot:BTC');
    expect(splitFieldKey('bybit_spot:BTC')).toEqual({ source: 'bybit_spot', instrumentId: 'BTC' });
    expect(splitFieldKey('no-separator')).toBeUndefined();
    expect(splitFieldKey(':BTC')).toBeUndefined();
    expect(splitFieldKey('bybit_spot:')).toBeUndefined();
  });

  it('maps wire field names onto a typed record', () => {
    const record = parseInstrumentRecord('coindcx_futures:ETH', {
      current_funding_rate: '-0.0002',
      estimated_funding_rate: '0.0001',
      funding_timestamp: '2024-01-01T00:00:00.000Z',
      source_symbol: 'B-ETH_USDT',
    });
    expect(record).toEqual({
      key: 'coindcx_futures:ETH',
      source: 'coindcx_futures',
      instrumentId: 'ETH',
      lastPrice: undefined,
      priceTimestamp: undefined,
      currentFundingRate: '-0.0002',
      estimatedFundingRate: '0.0001',
      nextFundingTime: undefined,
      fundingTimestamp: '2024-01-01T00:00:00.000Z',
      sourceSymbol: 'B-ETH_USDT',
    });
  });
});
