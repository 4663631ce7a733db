// src/lib/billing/database/migrations/001_initial_schema.ts
import { Migration } from '../migration';

export const initialSchemaMigration: Migration = {
  version: 1,
  name: 'Initial billing schema',

  up: async ({ connection, logger }) => {
    logger.info('Creating billing schema');

    await connection.query(`
      CREATE TABLE subscriptions (
        id SERIAL PRIMARY KEY,
        uuid UUID NOT NULL,
        customer_id VARCHAR(255) NOT NULL,
        amount NUMERIC(12,2) NOT NULL CHECK (amount > 0),
        currency CHAR(3) NOT NULL,
        status VARCHAR(20) NOT NULL,
        frequency VARCHAR(20) NOT NULL,
        created_at TIMESTAMPTZ NOT NULL,
        next_billing_at TIMESTAMPTZ NOT NULL,
        last_billing_at TIMESTAMPTZ,
        cancelled_at TIMESTAMPTZ,
        billing_cycle INTEGER NOT NULL DEFAULT 0 CHECK (billing_cycle >= 0),
        metadata JSONB,
        CONSTRAINT subscriptions_cancelled_consistency
          CHECK ((status = 'cancelled') = (cancelled_at IS NOT NULL))
      )
    `);
    await connection.query('CREATE UNIQUE INDEX uniq_subscriptions_uuid ON subscriptions (uuid)');
    await connection.query('CREATE INDEX idx_subscriptions_customer_id ON subscriptions (customer_id, status)');
    await connection.query(
      "CREATE INDEX idx_subscriptions_due ON subscriptions (next_billing_at) WHERE status = 'active'"
    );

    await connection.query(`
      CREATE TABLE payment_vault (
        id SERIAL PRIMARY KEY,
        uuid UUID NOT NULL,
        customer_id VARCHAR(255) NOT NULL,
        gateway_customer_ref VARCHAR(255) NOT NULL,
        payment_method_token VARCHAR(255) NOT NULL,
        payment_method_type VARCHAR(20) NOT NULL,
        last4_digits VARCHAR(4),
        card_brand VARCHAR(50),
        expiry_month VARCHAR(2),
        expiry_year VARCHAR(4),
        billing_name VARCHAR(255),
        billing_address JSONB,
        is_active BOOLEAN NOT NULL DEFAULT true,
        is_default BOOLEAN NOT NULL DEFAULT false,
        created_at TIMESTAMPTZ NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL,
        last_used_at TIMESTAMPTZ,
        metadata JSONB,
        CONSTRAINT payment_vault_inactive_not_default CHECK (is_active OR NOT is_default)
      )
    `);
    await connection.query('CREATE UNIQUE INDEX uniq_payment_vault_uuid ON payment_vault (uuid)');
    await connection.query('CREATE INDEX idx_payment_vault_customer ON payment_vault (customer_id, is_active)');
    await connection.query(
      'CREATE INDEX idx_payment_vault_gateway_token ON payment_vault (gateway_customer_ref, payment_method_token)'
    );
    // At most one active default per customer, enforced by the database itself
    await connection.query(
      'CREATE UNIQUE INDEX uniq_payment_vault_default ON payment_vault (customer_id) WHERE is_default AND is_active'
    );

    await connection.query(`
      CREATE TABLE payment_transactions (
        id SERIAL PRIMARY KEY,
        uuid UUID NOT NULL,
        gateway_transaction_id VARCHAR(100) NOT NULL,
        kind VARCHAR(20) NOT NULL,
        status VARCHAR(30) NOT NULL,
        amount NUMERIC(12,2) NOT NULL,
        refunded_amount NUMERIC(12,2) NOT NULL DEFAULT 0,
        currency CHAR(3) NOT NULL,
        masked_identifier VARCHAR(4) NOT NULL,
        customer_ref VARCHAR(255),
        metadata JSONB,
        created_at TIMESTAMPTZ NOT NULL
      )
    `);
    await connection.query('CREATE UNIQUE INDEX uniq_payment_transactions_uuid ON payment_transactions (uuid)');
    await connection.query(
      'CREATE UNIQUE INDEX uniq_payment_transactions_gateway_id ON payment_transactions (gateway_transaction_id)'
    );
  },

  down: async ({ connection, logger }) => {
    logger.info('Dropping billing schema');

    await connection.query('DROP TABLE IF EXISTS payment_transactions');
    await connection.query('DROP TABLE IF EXISTS payment_vault');
    await connection.query('DROP TABLE IF EXISTS subscriptions');
  }
};
