/**
 * NVP Protocol Types
 *
 * The Name-Value Pair API encodes both requests and replies as flat
 * `application/x-www-form-urlencoded` strings. Line items are sent as
 * indexed fields (`L_PAYMENTREQUEST_0_NAME0`, `L_PAYMENTREQUEST_0_NAME1`, ...).
 */
import type { AxiosInstance } from 'axios';
import type { AuditLogger } from '../monitoring/AuditLogger';

/**
 * Payment action for DoExpressCheckoutPayment.
 * - 'Sale': capture immediately
 * - 'Authorization': authorize now, capture later
 * - 'Order': ship later
 */
export type PaymentAction = 'Sale' | 'Authorization' | 'Order';

/** Which set of endpoints a call went to */
export type NVPEnvironment = 'sandbox' | 'production';

/**
 * Decoded reply body. A key may appear more than once, so every key maps
 * to the list of its values in the order they were received.
 */
export type NVPValues = Readonly<Record<string, readonly string[]>>;

export interface NVPClientConfig {
  /** API username */
  username: string;
  /** API password */
  password: string;
  /** API signature */
  signature: string;
  /** Use the sandbox endpoints (default: false) */
  sandbox?: boolean;
  /** Transport used for the POST. A fresh axios instance is created when omitted. */
  httpClient?: AxiosInstance;
  /** Records every completed call */
  auditLogger?: AuditLogger;
  /** Log each call to the console (default: false) */
  debug?: boolean;
}

/**
 * Order totals for a physical-goods checkout.
 */
export interface Order {
  subTotal: number;
  shipping: number;
  /** Sent as a trailing negative "DISCOUNT" line item when greater than zero */
  discount: number;
  total: number;
  currencyCode: string;
  returnUrl: string;
  cancelUrl: string;
}

/**
 * Physical line item.
 */
export interface Good {
  /** Merchant item number, sent as L_PAYMENTREQUEST_0_NUMBER{n} when set */
  id?: string;
  name: string;
  amount: number;
  quantity: number;
}

export interface DigitalGood {
  name: string;
  amount: number;
  quantity: number;
}
