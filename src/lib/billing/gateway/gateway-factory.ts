// src/lib/billing/gateway/gateway-factory.ts
import { BillingError, ConfigurationError, getErrorMessage } from '../utils/error';
import { GatewayDependencies } from './base-gateway';
import { StripeGateway } from './stripe-gateway';
import { GatewayConfig, PaymentGateway } from './types';

export type GatewayConstructor = new (config: GatewayConfig, deps: GatewayDependencies) => PaymentGateway;

export class PaymentGatewayFactory {
  private static gateways: ReadonlyMap<string, GatewayConstructor> = new Map<string, GatewayConstructor>([
    ['stripe', StripeGateway]
  ]);

  static createGateway(name: string, config: GatewayConfig, deps: GatewayDependencies): PaymentGateway {
    const Gateway = this.gateways.get(name);

    if (!Gateway) {
      throw new ConfigurationError(`Payment gateway "${name}" not supported`, {
        availableGateways: this.availableGateways()
      });
    }

    try {
      return new Gateway(config, deps);
    } catch (error) {
      if (error instanceof BillingError) {
        throw error;
      }
      throw new ConfigurationError(`Failed to create payment gateway "${name}": ${getErrorMessage(error)}`, {
        gatewayName: name
      });
    }
  }

  static availableGateways(): string[] {
    return Array.from(this.gateways.keys());
  }
}
