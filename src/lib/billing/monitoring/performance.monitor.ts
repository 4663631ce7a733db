// src/lib/billing/monitoring/performance.monitor.ts
import { BillingLogger, LogContext } from '../utils/logger';
import { RequestContext, elapsedMs } from '../utils/request-context';

export interface OperationStats {
  operation: string;
  count: number;
  avgDurationMs: number;
  minDurationMs: number;
  maxDurationMs: number;
  totalDurationMs: number;
}

export interface RequestTiming {
  requestId: string;
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  marks: Record<string, number>;
}

interface Sample {
  durationMs: number;
  at: number;
}

export interface PerformanceMonitorOptions {
  slowThresholdMs?: number;
  /** How long samples count towards `getOperationStats`. */
  windowMs?: number;
  logger?: BillingLogger;
  now?: () => number;
}

export class PerformanceMonitor {
  private samples: Map<string, Sample[]> = new Map();
  private logger: BillingLogger;
  private slowThresholdMs: number;
  private windowMs: number;
  private now: () => number;

  constructor(options: PerformanceMonitorOptions = {}) {
    this.logger = options.logger ?? new BillingLogger(undefined, 'PerformanceMonitor');
    this.slowThresholdMs = options.slowThresholdMs ?? 1000;
    this.windowMs = options.windowMs ?? 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  recordMetric(operation: string, durationMs: number, context: LogContext = {}): void {
    this.prune();

    const samples = this.samples.get(operation) ?? [];
    samples.push({ durationMs, at: this.now() });
    this.samples.set(operation, samples);

    if (durationMs >= this.slowThresholdMs) {
      this.logger.warn('Slow operation', { operation, durationMs, ...context });
    } else {
      this.logger.debug('Performance metric recorded', { operation, durationMs, ...context });
    }
  }

  /**
   * Closes out a request: records its duration and returns the timing summary.
   * `path` should be the route template so ids do not become separate series.
   */
  recordRequest(context: RequestContext, method: string, path: string, statusCode: number): RequestTiming {
    const timing: RequestTiming = {
      requestId: context.requestId,
      method,
      path,
      statusCode,
      durationMs: elapsedMs(context, this.now),
      marks: Object.fromEntries(context.marks)
    };

    this.recordMetric(`http ${method} ${path}`, timing.durationMs, {
      requestId: timing.requestId,
      statusCode,
      marks: timing.marks
    });

    return timing;
  }

  getOperationStats(operation: string): OperationStats {
    const samples = this.withinWindow(this.samples.get(operation) ?? []);
    const durations = samples.map(sample => sample.durationMs);
    const total = durations.reduce((sum, value) => sum + value, 0);

    return {
      operation,
      count: durations.length,
      avgDurationMs: durations.length > 0 ? total / durations.length : 0,
      minDurationMs: durations.length > 0 ? Math.min(...durations) : 0,
      maxDurationMs: durations.length > 0 ? Math.max(...durations) : 0,
      totalDurationMs: total
    };
  }

  /** Operations with at least one sample inside the window. */
  trackedOperations(): string[] {
    return Array.from(this.samples.keys());
  }

  // Drops aged-out samples and every operation left without any
  private prune(): void {
    for (const [operation, samples] of this.samples) {
      const recent = this.withinWindow(samples);
      if (recent.length === 0) {
        this.samples.delete(operation);
      } else if (recent.length !== samples.length) {
        this.samples.set(operation, recent);
      }
    }
  }

  private withinWindow(samples: Sample[]): Sample[] {
    const cutoff = this.now() - this.windowMs;
    return samples.filter(sample => sample.at >= cutoff);
  }
}
