/**
 * @packageDocumentation
 * @module NVPCheckout
 * @description
 * Entry point for the PayPal NVP Express Checkout client.
 *
 * Exports:
 * - **createNVPClient**: Factory function for a client with default transport.
 * - **NVPClient**: Sends the Express Checkout procedures.
 * - **NVPResponse / PaymentResponse**: Decoded replies.
 * - **NVPError**: Gateway-declared failures.
 * - **Request builders**: Parameter sets for each procedure, usable without a client.
 */
import { NVPClient } from './nvp/NVPClient';
import { NVPClientConfig } from './types/nvp';

export function createNVPClient(config: NVPClientConfig): NVPClient {
  return new NVPClient(config);
}

export * from './types/nvp';
export * from './types/errors';

export * from './nvp/NVPClient';
export * from './nvp/NVPResponse';
export * from './nvp/PaymentResponse';
export * from './nvp/requests';
export * from './nvp/codec';

export * from './monitoring/AuditLogger';
