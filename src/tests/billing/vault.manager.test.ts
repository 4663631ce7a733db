// src/tests/billing/vault.manager.test.ts
import {
  PaymentMethodExpiredError,
  PaymentProcessingError,
  ValidationError,
  VaultNotFoundError
} from '../../lib/billing/utils/error';
import { StorePaymentMethodInput } from '../../lib/billing/utils/validation';
import { PaymentMethodType } from '../../lib/billing/vault/types';
import { VaultManager } from '../../lib/billing/vault/vault.manager';
import { InMemoryVaultStore } from '../../lib/billing/vault/vault.store';
import { FakeGateway, approvedCharge } from '../helpers';

describe('VaultManager', () => {
  let store: InMemoryVaultStore;
  let gateway: FakeGateway;
  let vault: VaultManager;
  let now: Date;

  beforeEach(() => {
    store = new InMemoryVaultStore();
    gateway = new FakeGateway();
    now = new Date(2025, 2, 15, 12, 0);
    vault = new VaultManager(store, gateway, { clock: () => new Date(now.getTime()) });

    // Spy on logger methods to avoid console output
    jest.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const card = (token: string, overrides: Partial<StorePaymentMethodInput> = {}): StorePaymentMethodInput => ({
    customerId: 'cust_001',
    gatewayCustomerRef: 'cus_gw_1',
    paymentMethodToken: token,
    details: { type: PaymentMethodType.CREDIT_CARD, last4: '4242', brand: 'visa', expMonth: 12, expYear: 2030 },
    ...overrides
  });

  // Stores entries one minute apart so creation order is unambiguous
  const storeInOrder = async (...inputs: StorePaymentMethodInput[]) => {
    const entries = [];
    for (const input of inputs) {
      entries.push(await vault.storePaymentMethod(input));
      now = new Date(now.getTime() + 60 * 1000);
    }
    return entries;
  };

  describe('storePaymentMethod', () => {
    it('makes the first active entry of a customer the default', async () => {
      const [first, second] = await storeInOrder(card('pm_test_1'), card('pm_test_2'));

      expect(first.isDefault).toBe(true);
      expect(second.isDefault).toBe(false);
      expect(first.expiryMonth).toBe('12');
      expect(first.expiryYear).toBe('2030');
      expect(first.isActive).toBe(true);
    });

    it('keeps defaults separate per customer', async () => {
      await vault.storePaymentMethod(card('pm_test_1'));
      const other = await vault.storePaymentMethod(card('pm_test_2', { customerId: 'cust_002' }));

      expect(other.isDefault).toBe(true);
    });

    it('fills optional details with null', async () => {
      const entry = await vault.storePaymentMethod({
        customerId: 'cust_001',
        gatewayCustomerRef: 'cus_gw_1',
        paymentMethodToken: 'pm_test_bare'
      });

      expect(entry.paymentMethodType).toBe(PaymentMethodType.CREDIT_CARD);
      expect(entry.last4Digits).toBeNull();
      expect(entry.expiryMonth).toBeNull();
      expect(entry.metadata).toBeNull();
    });

    it('rejects invalid input', async () => {
      await expect(vault.storePaymentMethod(card('pm_test_1', { customerId: 'a b' }))).rejects.toThrow(
        ValidationError
      );
    });
  });

  it('lists active entries default first, then newest first', async () => {
    const [first, second, third] = await storeInOrder(card('pm_test_1'), card('pm_test_2'), card('pm_test_3'));

    const listed = await vault.listActive('cust_001');

    expect(listed.map(entry => entry.uuid)).toEqual([first.uuid, third.uuid, second.uuid]);
  });

  describe('setDefault', () => {
    it('moves the default so exactly one entry holds it', async () => {
      const [first, second] = await storeInOrder(card('pm_test_1'), card('pm_test_2'));

      expect(await vault.setDefault(second.uuid)).toBe(true);

      const listed = await vault.listActive('cust_001');
      expect(listed.filter(entry => entry.isDefault).map(entry => entry.uuid)).toEqual([second.uuid]);
      expect((await vault.getPaymentMethod(first.uuid))?.isDefault).toBe(false);
      expect((await vault.getDefault('cust_001'))?.uuid).toBe(second.uuid);
    });

    it('refuses an inactive entry', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));
      await vault.deactivate(entry.uuid);

      expect(await vault.setDefault(entry.uuid)).toBe(false);
    });
  });

  describe('deactivate', () => {
    it('hands the default to the newest remaining entry', async () => {
      const [first, , third] = await storeInOrder(card('pm_test_1'), card('pm_test_2'), card('pm_test_3'));

      expect(await vault.deactivate(first.uuid)).toBe(true);

      const deactivated = await vault.getPaymentMethod(first.uuid);
      expect(deactivated?.isActive).toBe(false);
      expect(deactivated?.isDefault).toBe(false);
      expect((await vault.getDefault('cust_001'))?.uuid).toBe(third.uuid);
    });

    it('leaves the default alone when a non-default entry goes', async () => {
      const [first, second] = await storeInOrder(card('pm_test_1'), card('pm_test_2'));

      await vault.deactivate(second.uuid);

      expect((await vault.getDefault('cust_001'))?.uuid).toBe(first.uuid);
    });

    it('returns false for a missing or already inactive entry', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));

      expect(await vault.deactivate(entry.uuid)).toBe(true);
      expect(await vault.deactivate(entry.uuid)).toBe(false);
      expect(await vault.deactivate('4f8a7c3e-2b1d-4e5f-9a6b-7c8d9e0f1a2b')).toBe(false);
      expect(await vault.getDefault('cust_001')).toBeNull();
    });
  });

  describe('chargeWithVault', () => {
    it('charges the stored token and marks the entry used', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));
      gateway.chargeCustomer.mockResolvedValue(approvedCharge('pi_test_010', '10.00'));

      const result = await vault.chargeWithVault(entry.uuid, {
        amount: 10,
        currency: 'USD',
        metadata: { orderId: 'order-1' }
      });

      expect(result).toEqual(approvedCharge('pi_test_010', '10.00'));
      expect(gateway.chargeCustomer).toHaveBeenCalledWith({
        customerRef: 'cus_gw_1',
        amount: '10.00',
        currency: 'USD',
        paymentMethodToken: 'pm_test_1',
        metadata: { orderId: 'order-1', vaultId: entry.uuid }
      });
      expect((await vault.getPaymentMethod(entry.uuid))?.lastUsedAt).toEqual(now);
    });

    it('scopes a caller idempotency key to the vault entry', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));
      gateway.chargeCustomer.mockResolvedValue(approvedCharge('pi_test_011', '10.00'));

      await vault.chargeWithVault(entry.uuid, { amount: 10, currency: 'USD', idempotencyKey: 'order-1' });

      expect(gateway.chargeCustomer.mock.calls[0][0].idempotencyKey).toBe(`vault:${entry.uuid}:order-1`);
    });

    it('returns a decline without marking the entry used', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));
      gateway.chargeCustomer.mockResolvedValue({ status: 'declined', code: 'do_not_honor', message: 'Declined' });

      const result = await vault.chargeWithVault(entry.uuid, { amount: '10', currency: 'USD' });

      expect(result).toEqual({ status: 'declined', code: 'do_not_honor', message: 'Declined' });
      expect((await vault.getPaymentMethod(entry.uuid))?.lastUsedAt).toBeNull();
    });

    it('refuses an expired card before reaching the gateway', async () => {
      const [entry] = await storeInOrder(
        card('pm_test_old', { details: { last4: '0005', expMonth: 1, expYear: 2024 } })
      );

      const attempt = vault.chargeWithVault(entry.uuid, { amount: 10, currency: 'USD' });

      await expect(attempt).rejects.toThrow(PaymentMethodExpiredError);
      await expect(attempt).rejects.toMatchObject({ context: { vaultId: entry.uuid, expiry: '01/2024' } });
      expect(gateway.chargeCustomer).not.toHaveBeenCalled();
    });

    it('treats a card as valid through the end of its expiry month', async () => {
      const [entry] = await storeInOrder(card('pm_test_edge', { details: { expMonth: 3, expYear: 2025 } }));
      gateway.chargeCustomer.mockResolvedValue(approvedCharge('pi_test_011', '5.00'));

      const result = await vault.chargeWithVault(entry.uuid, { amount: 5, currency: 'USD' });

      expect(result.status).toBe('success');
    });

    it('refuses an inactive entry', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));
      await vault.deactivate(entry.uuid);

      await expect(vault.chargeWithVault(entry.uuid, { amount: 10, currency: 'USD' })).rejects.toThrow(
        VaultNotFoundError
      );
    });

    it('wraps a thrown gateway error', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));
      gateway.chargeCustomer.mockRejectedValue(new Error('socket hang up'));

      const attempt = vault.chargeWithVault(entry.uuid, { amount: 10, currency: 'USD' });

      await expect(attempt).rejects.toThrow(PaymentProcessingError);
      await expect(attempt).rejects.toThrow('Payment processing failed: socket hang up');
    });

    it('validates the amount', async () => {
      const [entry] = await storeInOrder(card('pm_test_1'));

      await expect(vault.chargeWithVault(entry.uuid, { amount: 0, currency: 'USD' })).rejects.toThrow(
        ValidationError
      );
    });
  });

  describe('cleanupExpired', () => {
    it('deactivates expired cards only, and finds nothing on a second run', async () => {
      const [expiredDefault, expiredOther, bank, valid] = await storeInOrder(
        card('pm_test_exp1', { details: { type: PaymentMethodType.CREDIT_CARD, expMonth: 2, expYear: 2025 } }),
        card('pm_test_exp2', { details: { type: PaymentMethodType.DEBIT_CARD, expMonth: 6, expYear: 2023 } }),
        card('ba_test_1', { details: { type: PaymentMethodType.BANK_ACCOUNT, expMonth: 1, expYear: 2020 } }),
        card('pm_test_ok')
      );

      expect(await vault.getStatistics()).toEqual({ total: 4, active: 4, expired: 2 });
      expect(await vault.cleanupExpired()).toBe(2);
      expect(await vault.cleanupExpired()).toBe(0);

      expect((await vault.getPaymentMethod(expiredDefault.uuid))?.isActive).toBe(false);
      expect((await vault.getPaymentMethod(expiredOther.uuid))?.isActive).toBe(false);
      expect((await vault.getPaymentMethod(bank.uuid))?.isActive).toBe(true);
      expect((await vault.getDefault('cust_001'))?.uuid).toBe(valid.uuid);
      expect(await vault.getStatistics()).toEqual({ total: 4, active: 2, expired: 0 });
    });
  });

  it('finds entries by gateway token regardless of state', async () => {
    const [entry] = await storeInOrder(card('pm_test_1'));
    await vault.deactivate(entry.uuid);

    const found = await vault.findByGatewayToken('cus_gw_1', 'pm_test_1');

    expect(found?.uuid).toBe(entry.uuid);
    expect(found?.isActive).toBe(false);
    expect(await vault.findByGatewayToken('cus_gw_1', 'pm_test_missing')).toBeNull();
  });
});
