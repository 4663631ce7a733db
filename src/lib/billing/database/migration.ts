// src/lib/billing/database/migration.ts
import { BillingLogger } from '../utils/logger';
import { wrapDatabaseError, Database, Queryable } from './connection';

export interface MigrationContext {
  connection: Queryable;
  logger: BillingLogger;
}

export interface Migration {
  version: number;
  name: string;
  up: (context: MigrationContext) => Promise<void>;
  down: (context: MigrationContext) => Promise<void>;
}

interface VersionRow {
  version: number;
}

export class MigrationManager {
  private logger: BillingLogger;
  private migrations: Migration[] = [];
  private tableName: string;

  constructor(private database: Database, options: { tableName?: string } = {}) {
    this.tableName = options.tableName || 'schema_migrations';
    this.logger = new BillingLogger(undefined, 'MigrationManager');
  }

  registerMigration(migration: Migration): void {
    this.migrations.push(migration);

    // Keep migrations sorted by version
    this.migrations.sort((a, b) => a.version - b.version);
  }

  async initialize(): Promise<void> {
    try {
      await this.database.query(`
        CREATE TABLE IF NOT EXISTS ${this.tableName} (
          version INTEGER PRIMARY KEY,
          name VARCHAR(255) NOT NULL,
          applied_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP
        )
      `);
      this.logger.info('Migration manager initialized');
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to initialize migration manager');
    }
  }

  async getCurrentVersion(): Promise<number> {
    try {
      const result = await this.database.query<VersionRow>(
        `SELECT version FROM ${this.tableName} ORDER BY version DESC LIMIT 1`
      );
      return result.rows.length > 0 ? result.rows[0].version : 0;
    } catch (error) {
      throw wrapDatabaseError(error, 'Failed to get current database version');
    }
  }

  async migrateToLatest(): Promise<number> {
    const latest = this.migrations.length > 0 ? this.migrations[this.migrations.length - 1].version : 0;
    await this.migrateToVersion(latest);
    return latest;
  }

  async migrateToVersion(targetVersion: number): Promise<void> {
    const currentVersion = await this.getCurrentVersion();

    this.logger.info('Starting migration', { currentVersion, targetVersion });

    if (currentVersion === targetVersion) {
      this.logger.info('Database is already at target version');
      return;
    }

    await this.database.withTransaction(async connection => {
      if (currentVersion < targetVersion) {
        for (const migration of this.migrations) {
          if (migration.version > currentVersion && migration.version <= targetVersion) {
            this.logger.info(`Applying migration: ${migration.name}`, { version: migration.version });
            await migration.up({ connection, logger: this.logger.child(`Migration-${migration.version}`) });
            await connection.query(`INSERT INTO ${this.tableName} (version, name) VALUES ($1, $2)`, [
              migration.version,
              migration.name
            ]);
          }
        }
        return;
      }

      for (const migration of [...this.migrations].reverse()) {
        if (migration.version <= currentVersion && migration.version > targetVersion) {
          this.logger.info(`Reverting migration: ${migration.name}`, { version: migration.version });
          await migration.down({ connection, logger: this.logger.child(`Migration-${migration.version}`) });
          await connection.query(`DELETE FROM ${this.tableName} WHERE version = $1`, [migration.version]);
        }
      }
    });

    this.logger.info('Migration completed', { targetVersion });
  }
}
