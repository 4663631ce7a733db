// src/lib/billing/container.ts
import { BillingConfig } from './config/billing.config';
import { DatabaseConnection } from './database/connection';
import { PaymentGatewayFactory } from './gateway/gateway-factory';
import { PaymentGateway } from './gateway/types';
import { BillingJobRunner } from './jobs/billing-job.runner';
import { PerformanceMonitor } from './monitoring/performance.monitor';
import { InMemoryRateLimiter } from './rate-limit/memory-rate-limiter';
import { RateLimiter } from './rate-limit/types';
import { BillingScheduler } from './subscription/billing.scheduler';
import { DatabaseSubscriptionStore } from './subscription/database-subscription.store';
import { InMemorySubscriptionStore, SubscriptionStore } from './subscription/subscription.store';
import { DatabaseTransactionStore } from './transaction/database-transaction.store';
import { InMemoryTransactionStore, TransactionStore } from './transaction/transaction.store';
import { BillingLogger } from './utils/logger';
import { DatabaseVaultStore } from './vault/database-vault.store';
import { VaultManager } from './vault/vault.manager';
import { InMemoryVaultStore, VaultStore } from './vault/vault.store';

export interface BillingContainer {
  config: BillingConfig;
  database: DatabaseConnection | null;
  transactionStore: TransactionStore;
  subscriptionStore: SubscriptionStore;
  vaultStore: VaultStore;
  gateway: PaymentGateway;
  scheduler: BillingScheduler;
  vault: VaultManager;
  rateLimiter: RateLimiter;
  performanceMonitor: PerformanceMonitor;
  jobRunner: BillingJobRunner;
}

export interface ContainerOverrides {
  gateway?: PaymentGateway;
  rateLimiter?: RateLimiter;
  clock?: () => Date;
}

interface Stores {
  database: DatabaseConnection | null;
  transactionStore: TransactionStore;
  subscriptionStore: SubscriptionStore;
  vaultStore: VaultStore;
}

function createStores(config: BillingConfig): Stores {
  if (config.storage === 'memory') {
    return {
      database: null,
      transactionStore: new InMemoryTransactionStore(),
      subscriptionStore: new InMemorySubscriptionStore(),
      vaultStore: new InMemoryVaultStore()
    };
  }

  const database = DatabaseConnection.getInstance(config.database);
  return {
    database,
    transactionStore: new DatabaseTransactionStore(database),
    subscriptionStore: new DatabaseSubscriptionStore(database),
    vaultStore: new DatabaseVaultStore(database)
  };
}

/** Wires stores, gateway and services from one configuration. */
export function createBillingContainer(config: BillingConfig, overrides: ContainerOverrides = {}): BillingContainer {
  const logger = new BillingLogger(config.logLevel, 'BillingContainer');
  const stores = createStores(config);

  const gateway =
    overrides.gateway ??
    PaymentGatewayFactory.createGateway(config.gateway.provider, config.gateway.config, {
      transactionStore: stores.transactionStore,
      clock: overrides.clock
    });

  const serviceOptions = {
    maxAmount: config.gateway.config.maxAmount,
    clock: overrides.clock
  };

  const scheduler = new BillingScheduler(stores.subscriptionStore, gateway, serviceOptions);
  const vault = new VaultManager(stores.vaultStore, gateway, serviceOptions);

  logger.info('Billing services created', {
    storage: config.storage,
    gateway: gateway.name,
    environment: config.gateway.config.environment
  });

  return {
    config,
    ...stores,
    gateway,
    scheduler,
    vault,
    rateLimiter: overrides.rateLimiter ?? new InMemoryRateLimiter(config.rateLimit),
    performanceMonitor: new PerformanceMonitor(),
    jobRunner: new BillingJobRunner(scheduler, vault, {
      billingIntervalMs: config.jobs.billingIntervalMs,
      cleanupIntervalMs: config.jobs.cleanupIntervalMs
    })
  };
}
