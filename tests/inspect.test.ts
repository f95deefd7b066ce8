import { describe, expect, it } from 'vitest';
import { PassThrough } from 'node:stream';
import { defaultConfig } from '../src/infra/config';
import { MemoryFieldStore } from '../src/store/MemoryFieldStore';
import {
  FUTURES_FRESHNESS_MS,
  INSPECT_USAGE,
  SPOT_FRESHNESS_MS,
  freshnessTargets,
  runInspectCommand,
  startInspectRepl,
  type InspectContext,
} from '../src/cli/inspect';

const NOW = Date.UTC(2024, 0, 1, 12, 0, 0);
const iso = (msAgo: number) => new Date(NOW - msAgo).toISOString();

async function seededContext(): Promise<InspectContext> {
  const store = new MemoryFieldStore({ now: () => NOW });
  await store.mergeFields('bybit_spot:BTC', { last_price: '43000', price_timestamp: iso(5_000), source_symbol: 'BTCUSDT' }, 3600);
  await store.mergeFields('bybit_spot:ETH', { last_price: '2200', price_timestamp: iso(20_000), source_symbol: 'ETHUSDT' }, 3600);
  await store.mergeFields(
    'coindcx_futures:BTC',
    { current_funding_rate: '0.0001', funding_timestamp: iso(400_000), source_symbol: 'B-BTC_USDT' },
    3600
  );
  return { store, targets: freshnessTargets(defaultConfig()), now: () => NOW };
}

describe('inspect commands', () => {
  it('derives one freshness target per enabled service', () => {
    expect(freshnessTargets(defaultConfig())).toEqual([
      { source: 'bybit_spot', thresholdMs: SPOT_FRESHNESS_MS, timestampField: 'price_timestamp' },
      { source: 'coindcx_futures', thresholdMs: FUTURES_FRESHNESS_MS, timestampField: 'funding_timestamp' },
    ]);
  });

  it('prints one record with sorted fields', async () => {
    const ctx = await seededContext();
    expect(await runInspectCommand(['get', 'bybit_spot:BTC'], ctx)).toEqual({
      lines: [
        'bybit_spot:BTC',
        '  last_price = 43000',
        '  price_timestamp = 2024-01-01T11:59:55.000Z',
        '  source_symbol = BTCUSDT',
      ],
      exitCode: 0,
    });
    expect(await runInspectCommand(['get', 'bybit_spot:DOGE'], ctx)).toEqual({ lines: ['bybit_spot:DOGE: not found'], exitCode: 1 });
    expect((await runInspectCommand(['get'], ctx)).exitCode).toBe(2);
  });

  it('lists keys under a prefix', async () => {
    const ctx = await seededContext();
    expect((await runInspectCommand(['keys', 'bybit_spot:'], ctx)).lines).toEqual(['bybit_spot:BTC', 'bybit_spot:ETH']);
    expect((await runInspectCommand(['keys'], ctx)).lines).toEqual(['bybit_spot:BTC', 'bybit_spot:ETH', 'coindcx_futures:BTC']);
    expect((await runInspectCommand(['keys', 'okx:'], ctx)).lines).toEqual(['(no keys)']);
  });

  it('looks a coin up across every source', async () => {
    const ctx = await seededContext();
    const eth = await runInspectCommand(['lookup', 'eth'], ctx);
    expect(eth).toEqual({
      lines: [
        'bybit_spot:ETH',
        '  last_price = 2200',
        '  price_timestamp = 2024-01-01T11:59:40.000Z',
        '  source_symbol = ETHUSDT',
        'coindcx_futures:ETH: not found',
      ],
      exitCode: 0,
    });
    expect((await runInspectCommand(['lookup', 'XRP'], ctx)).exitCode).toBe(1);
  });

  it('reports per-source freshness against its threshold', async () => {
    const ctx = await seededContext();
    expect(await runInspectCommand(['freshness'], ctx)).toEqual({
      lines: [
        'bybit_spot: OK fresh 2/2, newest 5s, oldest 20s (threshold 60s)',
        'coindcx_futures: STALE fresh 0/1, newest 400s, oldest 400s (threshold 300s)',
      ],
      exitCode: 1,
    });
  });

  it('reports a source with no records as empty', async () => {
    const ctx: InspectContext = {
      store: new MemoryFieldStore(),
      targets: [{ source: 'bybit_spot', thresholdMs: SPOT_FRESHNESS_MS, timestampField: 'price_timestamp' }],
      now: () => NOW,
    };
    expect(await runInspectCommand(['freshness'], ctx)).toEqual({
      lines: ['bybit_spot: EMPTY (0 records with price_timestamp)'],
      exitCode: 1,
    });
  });

  it('prints usage for help and unknown commands', async () => {
    const ctx = await seededContext();
    expect(await runInspectCommand([], ctx)).toEqual({ lines: INSPECT_USAGE, exitCode: 0 });
    expect(await runInspectCommand(['drop'], ctx)).toEqual({ lines: ['unknown command: drop', ...INSPECT_USAGE], exitCode: 2 });
  });
});

describe('inspect REPL', () => {
  it('runs commands line by line until exit', async () => {
    const ctx = await seededContext();
    const input = new PassThrough();
    const output = new PassThrough();
    let text = '';
    output.on('data', (chunk: Buffer) => {
      text += chunk.toString();
    });

    const done = startInspectRepl(ctx, { input, output });
    input.write('get bybit_spot:BTC\n');
    input.write('\n');
    input.write('get bybit_spot:DOGE\n');
    input.write('exit\n');
    await done;

    expect(text).toContain('  last_price = 43000\n');
    expect(text).toContain('bybit_spot:DOGE: not found\n');
    expect(text.indexOf('  last_price = 43000')).toBeLessThan(text.indexOf('bybit_spot:DOGE: not found'));
  });
});
