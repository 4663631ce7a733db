// src/api/routes/payment.routes.ts
import { Router } from 'express';
import { PaymentGateway } from '../../lib/billing/gateway/types';
import { PaymentController } from '../controllers/payment.controller';
import { asyncHandler } from '../middleware/async-handler';

export function createPaymentRoutes(gateway: PaymentGateway): Router {
  const router = Router();
  const controller = new PaymentController(gateway);

  router.post('/initialize', asyncHandler(controller.initializeCharge));
  router.post('/complete', asyncHandler(controller.completeCharge));
  router.post('/refund', asyncHandler(controller.refund));
  router.post('/charge', asyncHandler(controller.chargeCustomer));

  return router;
}
