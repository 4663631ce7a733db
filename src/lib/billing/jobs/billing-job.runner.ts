// src/lib/billing/jobs/billing-job.runner.ts
import { BillingScheduler } from '../subscription/billing.scheduler';
import { BillingResult } from '../subscription/types';
import { BillingLogger } from '../utils/logger';
import { VaultManager } from '../vault/vault.manager';

export type BillingJobName = 'billing' | 'vault-cleanup';

export interface BillingJobRunnerOptions {
  billingIntervalMs?: number;
  cleanupIntervalMs?: number;
  logger?: BillingLogger;
}

export class BillingJobRunner {
  private logger: BillingLogger;
  private billingIntervalMs: number = 60 * 60 * 1000; // 1 hour
  private cleanupIntervalMs: number = 24 * 60 * 60 * 1000; // 1 day
  private inProgress: Set<BillingJobName> = new Set();
  private timers: NodeJS.Timeout[] = [];

  constructor(
    private scheduler: BillingScheduler,
    private vault: VaultManager,
    options: BillingJobRunnerOptions = {}
  ) {
    this.logger = options.logger ?? new BillingLogger(undefined, 'BillingJobRunner');
    this.billingIntervalMs = options.billingIntervalMs || this.billingIntervalMs;
    this.cleanupIntervalMs = options.cleanupIntervalMs || this.cleanupIntervalMs;
  }

  /** Null when a previous run is still going or the run failed. */
  async runBilling(): Promise<BillingResult[] | null> {
    return this.runExclusive('billing', () => this.scheduler.processDue());
  }

  async runCleanup(): Promise<number | null> {
    return this.runExclusive('vault-cleanup', () => this.vault.cleanupExpired());
  }

  start(): void {
    if (this.timers.length > 0) {
      this.stop();
    }

    this.logger.info('Starting billing jobs', {
      billingIntervalMs: this.billingIntervalMs,
      cleanupIntervalMs: this.cleanupIntervalMs
    });

    this.timers.push(
      setInterval(() => {
        this.runBilling().catch(error => {
          this.logger.error('Error in billing job interval', { error });
        });
      }, this.billingIntervalMs),
      setInterval(() => {
        this.runCleanup().catch(error => {
          this.logger.error('Error in billing job interval', { error });
        });
      }, this.cleanupIntervalMs)
    );
  }

  stop(): void {
    if (this.timers.length === 0) {
      return;
    }

    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers = [];
    this.logger.info('Stopped billing jobs');
  }

  isStarted(): boolean {
    return this.timers.length > 0;
  }

  isRunning(job: BillingJobName): boolean {
    return this.inProgress.has(job);
  }

  private async runExclusive<T>(job: BillingJobName, work: () => Promise<T>): Promise<T | null> {
    if (this.inProgress.has(job)) {
      this.logger.warn('Previous run still in progress, skipping', { job });
      return null;
    }

    this.inProgress.add(job);
    const startedAt = Date.now();

    try {
      const result = await work();
      this.logger.info('Job finished', { job, duration: Date.now() - startedAt });
      return result;
    } catch (error) {
      this.logger.error('Job failed', { job, error });
      return null;
    } finally {
      this.inProgress.delete(job);
    }
  }
}
