// src/lib/billing/database/migrations/index.ts
import { Migration } from '../migration';
import { initialSchemaMigration } from './001_initial_schema';

export const migrations: Migration[] = [initialSchemaMigration];
