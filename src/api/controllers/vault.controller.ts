// src/api/controllers/vault.controller.ts
import { Request, Response } from 'express';
import { ErrorCode, errorHandler } from '../../lib/billing/utils/error';
import { parseOrThrow, storePaymentMethodSchema } from '../../lib/billing/utils/validation';
import { VaultManager } from '../../lib/billing/vault/vault.manager';
import { customerParamsSchema, idParamsSchema, vaultChargeBodySchema } from '../validation/request-schemas';
import { sendData, sendGatewayResult, toVaultEntryView } from '../responses';

export class VaultController {
  constructor(private vault: VaultManager) {}

  storePaymentMethod = async (req: Request, res: Response): Promise<void> => {
    const input = parseOrThrow(storePaymentMethodSchema, req.body, 'Invalid payment method request');
    const entry = await this.vault.storePaymentMethod(input);
    sendData(res, toVaultEntryView(entry), 201);
  };

  getPaymentMethod = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid payment method ID');
    const entry = await this.vault.getPaymentMethod(id);

    if (!entry) {
      throw errorHandler.createError('Payment method not found', ErrorCode.VAULT_NOT_FOUND, { vaultId: id });
    }

    sendData(res, toVaultEntryView(entry));
  };

  listCustomerPaymentMethods = async (req: Request, res: Response): Promise<void> => {
    const { customerId } = parseOrThrow(customerParamsSchema, req.params, 'Invalid customer ID');
    const entries = await this.vault.listActive(customerId);
    sendData(res, entries.map(toVaultEntryView));
  };

  getDefaultPaymentMethod = async (req: Request, res: Response): Promise<void> => {
    const { customerId } = parseOrThrow(customerParamsSchema, req.params, 'Invalid customer ID');
    const entry = await this.vault.getDefault(customerId);

    if (!entry) {
      throw errorHandler.createError('Customer has no default payment method', ErrorCode.VAULT_NOT_FOUND, {
        customerId
      });
    }

    sendData(res, toVaultEntryView(entry));
  };

  setDefault = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid payment method ID');

    if (!(await this.vault.setDefault(id))) {
      throw errorHandler.createError('Payment method not found or inactive', ErrorCode.VAULT_NOT_FOUND, {
        vaultId: id
      });
    }

    sendData(res, { vaultId: id, isDefault: true });
  };

  deactivate = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid payment method ID');

    if (!(await this.vault.deactivate(id))) {
      throw errorHandler.createError('Payment method not found or inactive', ErrorCode.VAULT_NOT_FOUND, {
        vaultId: id
      });
    }

    sendData(res, { vaultId: id, isActive: false });
  };

  charge = async (req: Request, res: Response): Promise<void> => {
    const { id } = parseOrThrow(idParamsSchema, req.params, 'Invalid payment method ID');
    const body = parseOrThrow(vaultChargeBodySchema, req.body, 'Invalid charge request');
    const result = await this.vault.chargeWithVault(id, body);
    sendGatewayResult(res, result);
  };

  cleanupExpired = async (_req: Request, res: Response): Promise<void> => {
    sendData(res, { deactivated: await this.vault.cleanupExpired() });
  };

  getStatistics = async (_req: Request, res: Response): Promise<void> => {
    sendData(res, await this.vault.getStatistics());
  };
}
