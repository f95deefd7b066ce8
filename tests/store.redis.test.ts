import { describe, expect, it, vi } from 'vitest';
import { RedisFieldStore } from '../src/store/RedisFieldStore';
import { checkFieldStore } from '../src/store/createFieldStore';
import { StoreError } from '../src/infra/errors';
import { logger } from '../src/infra/logger';
import { FakeRedis } from './helpers/fakeRedis';

describe('RedisFieldStore', () => {
  it('writes fields and ttl in one transaction', async () => {
    const redis = new FakeRedis();
    const store = new RedisFieldStore(redis.asClient());

    await store.mergeFields('bybit_spot:BTC', { last_price: '43000' }, 3600);
    await store.mergeFields('bybit_spot:BTC', { price_timestamp: '2024-01-01T00:00:00.000Z' }, 3600);

    expect(redis.calls).toEqual([
      'hset bybit_spot:BTC',
      'expire bybit_spot:BTC 3600',
      'hset bybit_spot:BTC',
      'expire bybit_spot:BTC 3600',
    ]);
    expect(await store.read('bybit_spot:BTC')).toEqual({
      last_price: '43000',
      price_timestamp: '2024-01-01T00:00:00.000Z',
    });
  });

  it('skips empty merges and floors fractional ttl to at least one second', async () => {
    const redis = new FakeRedis();
    const store = new RedisFieldStore(redis.asClient());

    await store.mergeFields('k:A', {}, 60);
    await store.mergeFields('k:A', { a: '1' }, 0.4);

    expect(redis.calls).toEqual(['hset k:A', 'expire k:A 1']);
  });

  it('reports a missing hash as undefined', async () => {
    const store = new RedisFieldStore(new FakeRedis().asClient());
    expect(await store.read('bybit_spot:DOGE')).toBeUndefined();
  });

  it('pages through SCAN until the cursor returns to 0', async () => {
    const redis = new FakeRedis();
    const store = new RedisFieldStore(redis.asClient());
    for (const coin of ['BTC', 'ETH', 'SOL']) {
      await store.mergeFields(`bybit_spot:${coin}`, { last_price: '1' }, 60);
    }
    await store.mergeFields('coindcx_futures:BTC', { current_funding_rate: '0.1' }, 60);
    redis.calls.length = 0;

    const keys = await store.listKeys('bybit_spot:');

    expect(Array.from(keys).sort()).toEqual(['bybit_spot:BTC', 'bybit_spot:ETH', 'bybit_spot:SOL']);
    expect(redis.calls).toEqual(['scan 0', 'scan 2']);
  });

  it('escapes glob characters in the prefix', async () => {
    const redis = new FakeRedis();
    const store = new RedisFieldStore(redis.asClient());
    await store.mergeFields('a*b:X', { v: '1' }, 60);
    await store.mergeFields('aZb:X', { v: '2' }, 60);

    expect(Array.from(await store.listKeys('a*b:'))).toEqual(['a*b:X']);
  });

  it('wraps client failures in StoreError', async () => {
    const redis = new FakeRedis();
    const store = new RedisFieldStore(redis.asClient());

    redis.failNext = new Error('connection reset');
    const write = store.mergeFields('k:A', { a: '1' }, 60);
    await expect(write).rejects.toBeInstanceOf(StoreError);
    await expect(write).rejects.toMatchObject({ message: 'Redis merge failed', details: { key: 'k:A', op: 'multi' } });

    redis.failNext = new Error('connection reset');
    await expect(store.read('k:A')).rejects.toMatchObject({ name: 'StoreError', message: 'Redis read failed' });

    redis.failNext = new Error('connection reset');
    await expect(store.ping()).rejects.toMatchObject({ name: 'StoreError', message: 'Redis ping failed' });
  });

  it('keeps going when the store is unreachable at start-up', async () => {
    const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    const redis = new FakeRedis();
    const store = new RedisFieldStore(redis.asClient());

    redis.failNext = new Error('connect ECONNREFUSED');
    await expect(checkFieldStore(store)).resolves.toBe(false);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toContain('field store unreachable at start-up, continuing: Redis ping failed');

    await expect(checkFieldStore(store)).resolves.toBe(true);
    await store.mergeFields('bybit_spot:BTC', { last_price: '1' }, 60);
    expect(redis.calls).toContain('hset bybit_spot:BTC');
  });

  it('falls back to disconnect when quit fails', async () => {
    const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const redis = new FakeRedis();
    redis.quitError = new Error('already closed');
    const store = new RedisFieldStore(redis.asClient());

    await store.close();

    expect(redis.disconnected).toBe(true);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    warnSpy.mockRestore();
  });
});
