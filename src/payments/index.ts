import type { ServiceConfig } from '../config';
import { logger } from '../logger';
import type { LightningGateway } from './gateway';
import { HttpLightningGateway } from './http-gateway';
import { SandboxLightningGateway } from './sandbox-gateway';

export type { GatewayInvoice, LightningGateway, PaymentOutcome, WaitResult } from './gateway';
export { GatewayError } from './gateway';
export { HttpLightningGateway } from './http-gateway';
export { SandboxLightningGateway } from './sandbox-gateway';

export const createGateway = (config: Pick<ServiceConfig, 'sandbox' | 'gateway'>): LightningGateway => {
  if (config.sandbox || !config.gateway.url) {
    logger.warn('Payment sandbox enabled, invoices will confirm without real payments.');
    return new SandboxLightningGateway();
  }
  return new HttpLightningGateway(config.gateway);
};
