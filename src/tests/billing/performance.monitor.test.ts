// src/tests/billing/performance.monitor.test.ts
import { PerformanceMonitor } from '../../lib/billing/monitoring/performance.monitor';
import { createRequestContext, mark } from '../../lib/billing/utils/request-context';

describe('PerformanceMonitor', () => {
  let now: number;
  let monitor: PerformanceMonitor;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    now = 10_000;
    monitor = new PerformanceMonitor({ slowThresholdMs: 500, windowMs: 60_000, now: () => now });
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('aggregates durations per operation', () => {
    monitor.recordMetric('charge', 100);
    monitor.recordMetric('charge', 300);
    monitor.recordMetric('refund', 50);

    expect(monitor.getOperationStats('charge')).toEqual({
      operation: 'charge',
      count: 2,
      avgDurationMs: 200,
      minDurationMs: 100,
      maxDurationMs: 300,
      totalDurationMs: 400
    });
  });

  it('forgets samples older than the window', () => {
    monitor.recordMetric('charge', 100);
    now += 60_001;

    expect(monitor.getOperationStats('charge').count).toBe(0);
  });

  it('stops tracking an operation once all its samples have aged out', () => {
    monitor.recordMetric('charge', 100);
    now += 60_001;
    monitor.recordMetric('refund', 50);

    expect(monitor.trackedOperations()).toEqual(['refund']);
  });

  it('warns about slow operations', () => {
    monitor.recordMetric('charge', 750);

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('WARN [PerformanceMonitor]: Slow operation'));
  });

  it('closes out a request from its context', () => {
    const context = createRequestContext('req-12345678', () => now);
    now += 40;
    mark(context, 'charged', () => now);
    now += 20;

    const timing = monitor.recordRequest(context, 'POST', '/api/payments/charge', 201);

    expect(timing).toEqual({
      requestId: 'req-12345678',
      method: 'POST',
      path: '/api/payments/charge',
      statusCode: 201,
      durationMs: 60,
      marks: { charged: 40 }
    });
    expect(monitor.getOperationStats('http POST /api/payments/charge').count).toBe(1);
  });
});
