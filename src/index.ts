// src/index.ts
import { createApp } from './app';
import { loadConfigFromEnvironment } from './lib/billing/config/billing.config';
import { createBillingContainer } from './lib/billing/container';
import { MigrationManager } from './lib/billing/database/migration';
import { migrations } from './lib/billing/database/migrations';
import { BillingLogger } from './lib/billing/utils/logger';

export async function bootstrap(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const logger = new BillingLogger(config.logLevel, 'App');
  const container = createBillingContainer(config);

  if (container.database) {
    const migrationManager = new MigrationManager(container.database);
    migrations.forEach(migration => migrationManager.registerMigration(migration));
    await migrationManager.initialize();
    const applied = await migrationManager.migrateToLatest();
    logger.info('Database schema ready', { version: applied });
  }

  const app = createApp(container);
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port}`);
  });

  if (config.jobs.enabled) {
    container.jobRunner.start();
  }

  // Handle graceful shutdown
  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, shutting down gracefully');
    container.jobRunner.stop();

    server.close(() => {
      const closing = container.database ? container.database.close() : Promise.resolve();
      closing
        .then(() => process.exit(0))
        .catch(error => {
          logger.error('Error closing database connection', { error });
          process.exit(1);
        });
    });
  });
}

if (require.main === module) {
  bootstrap().catch(error => {
    console.error('Failed to start billing service', error);
    process.exit(1);
  });
}
