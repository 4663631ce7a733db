// src/api/routes/vault.routes.ts
import { Router } from 'express';
import { VaultManager } from '../../lib/billing/vault/vault.manager';
import { VaultController } from '../controllers/vault.controller';
import { asyncHandler } from '../middleware/async-handler';

export function createVaultRoutes(vault: VaultManager): Router {
  const router = Router();
  const controller = new VaultController(vault);

  router.post('/', asyncHandler(controller.storePaymentMethod));
  router.get('/statistics', asyncHandler(controller.getStatistics));
  router.post('/cleanup', asyncHandler(controller.cleanupExpired));

  router.get('/customers/:customerId', asyncHandler(controller.listCustomerPaymentMethods));
  router.get('/customers/:customerId/default', asyncHandler(controller.getDefaultPaymentMethod));

  router.get('/:id', asyncHandler(controller.getPaymentMethod));
  router.delete('/:id', asyncHandler(controller.deactivate));
  router.post('/:id/default', asyncHandler(controller.setDefault));
  router.post('/:id/charge', asyncHandler(controller.charge));

  return router;
}
