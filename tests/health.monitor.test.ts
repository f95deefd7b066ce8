import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { HealthMonitor, formatSnapshot } from '../src/control/HealthMonitor';
import { createTestEventBus, recordEvents } from '../src/core/events/testing';
import { logger } from '../src/infra/logger';
import { FakeWorker } from './helpers/fakeWorker';

describe('HealthMonitor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    logger.setDisplay(false);
  });

  afterEach(() => {
    vi.useRealTimers();
    logger.setDisplay(true);
  });

  it('publishes an aggregate report of every worker', () => {
    const bus = createTestEventBus();
    const { events: reports, stop } = recordEvents(bus, 'health:report');
    const a = new FakeWorker('a');
    const b = new FakeWorker('b');
    void a.start();
    const monitor = new HealthMonitor({ bus, now: () => 5_000 });

    const report = monitor.runOnce([a, b]);

    expect(reports).toEqual([report]);
    expect(report.healthy).toBe(false);
    expect(report.meta).toMatchObject({ source: 'health', ts: 5_000 });
    expect(report.workers.map((w) => [w.workerId, w.isHealthy, w.reason])).toEqual([
      ['a', true, undefined],
      ['b', false, 'not running'],
    ]);
    expect(monitor.getLastReport()).toBe(report);

    stop();
    monitor.runOnce([a, b]);
    expect(reports).toHaveLength(1);
  });

  it('reports a worker whose health check throws as unhealthy', () => {
    const a = new FakeWorker('a');
    a.throwOnHealthCheck = new Error('boom');
    const monitor = new HealthMonitor({ bus: createTestEventBus() });

    const snapshot = monitor.check([a]).get('a');

    expect(snapshot).toEqual({
      workerId: 'a',
      isRunning: false,
      stalenessThresholdMs: 0,
      isHealthy: false,
      reason: 'health check failed: boom',
    });
  });

  it('checks on its own interval until stopped', async () => {
    const bus = createTestEventBus();
    let count = 0;
    bus.subscribe('health:report', () => {
      count += 1;
    });
    const monitor = new HealthMonitor({ bus, checkIntervalMs: 1_000, statusLogIntervalMs: 5_000 });
    const a = new FakeWorker('a');
    void a.start();

    monitor.start([a]);
    expect(monitor.isActive()).toBe(true);
    await vi.advanceTimersByTimeAsync(3_000);
    expect(count).toBe(3);

    monitor.stop();
    await vi.advanceTimersByTimeAsync(3_000);
    expect(count).toBe(3);
    expect(monitor.isActive()).toBe(false);
  });

  it('formats a snapshot for the status log', () => {
    const line = formatSnapshot(
      {
        workerId: 'bybit_spot',
        isRunning: true,
        lastUpdateAt: 1_000,
        stalenessThresholdMs: 60_000,
        isHealthy: false,
        reason: 'stale: last update 60s ago (threshold 60s)',
        details: { state: 'STREAMING', messages: 5, lastMessageAgeMs: undefined },
      },
      61_000
    );
    expect(line).toBe(
      'bybit_spot UNHEALTHY (stale: last update 60s ago (threshold 60s)) running=true lastUpdate=60s ago state=STREAMING messages=5'
    );
    expect(formatSnapshot({ workerId: 'x', isRunning: false, stalenessThresholdMs: 1, isHealthy: true }, 0)).toBe(
      'x OK running=false lastUpdate=never'
    );
  });
});
