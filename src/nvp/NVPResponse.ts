/**
 * @packageDocumentation
 * @module NVPResponse
 * @description
 * Decoded reply of an NVP call.
 *
 * The common header fields are promoted to properties; everything else stays
 * reachable through `values`. The response remembers whether it came from the
 * sandbox so `checkoutUrl()` sends the buyer to the matching site even if the
 * client is later reconfigured.
 */
import { NVPEnvironment, NVPValues } from '../types/nvp';
import { getValue, getValues } from './codec';
import { PaymentResponse } from './PaymentResponse';

export const CHECKOUT_SANDBOX_URL = 'https://www.sandbox.paypal.com/cgi-bin/webscr';
export const CHECKOUT_PRODUCTION_URL = 'https://www.paypal.com/cgi-bin/webscr';

const SUCCESS_ACKS = ['success', 'successwithwarning'];

export class NVPResponse {
  readonly ack: string;
  readonly correlationId: string;
  readonly timestamp: string;
  readonly version: string;
  readonly build: string;
  readonly token: string;

  constructor(
    public readonly values: NVPValues,
    public readonly usedSandbox: boolean
  ) {
    this.ack = getValue(values, 'ACK');
    this.correlationId = getValue(values, 'CORRELATIONID');
    this.timestamp = getValue(values, 'TIMESTAMP');
    this.version = getValue(values, 'VERSION');
    this.build = getValue(values, 'BUILD');
    this.token = getValue(values, 'TOKEN');
  }

  static fromValues(values: NVPValues, sandbox: boolean): NVPResponse {
    return new NVPResponse(values, sandbox);
  }

  get environment(): NVPEnvironment {
    return this.usedSandbox ? 'sandbox' : 'production';
  }

  get(key: string): string {
    return getValue(this.values, key);
  }

  getAll(key: string): readonly string[] {
    return getValues(this.values, key);
  }

  isSuccess(): boolean {
    return SUCCESS_ACKS.includes(this.ack.toLowerCase());
  }

  /**
   * URL to redirect the buyer to for approving the payment.
   */
  checkoutUrl(): string {
    const query = new URLSearchParams();
    query.set('cmd', '_express-checkout');
    query.append('token', this.token);
    const base = this.usedSandbox ? CHECKOUT_SANDBOX_URL : CHECKOUT_PRODUCTION_URL;
    return `${base}?${query.toString()}`;
  }

  toPaymentResponse(): PaymentResponse {
    return PaymentResponse.fromValues(this.values);
  }
}
