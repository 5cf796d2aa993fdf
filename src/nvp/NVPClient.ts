/**
 * NVP Client
 *
 * Signs and sends Express Checkout calls to the PayPal NVP API.
 *
 * Flow of every call:
 * 1. Builder assembles the procedure parameters
 * 2. Client appends USER / PWD / SIGNATURE / VERSION
 * 3. Form-encoded POST to the sandbox or production endpoint
 * 4. Reply body is decoded as a query string
 * 5. Failure ACK or an error code rejects with NVPError; otherwise the
 *    NVPResponse is returned
 *
 * There is no retry here: transport errors surface as the HTTP client raised
 * them and the caller decides what to do.
 */
import axios, { AxiosInstance } from 'axios';
import { AuditLogger } from '../monitoring/AuditLogger';
import { NVPError } from '../types/errors';
import {
  DigitalGood,
  Good,
  NVPClientConfig,
  Order,
  PaymentAction,
} from '../types/nvp';
import { getValue, parseNVP } from './codec';
import { NVPResponse } from './NVPResponse';
import {
  buildDoExpressCheckoutPayment,
  buildGetExpressCheckoutDetails,
  buildSetExpressCheckout,
  buildSetExpressCheckoutDigitalGoods,
} from './requests';

export const NVP_SANDBOX_URL = 'https://api-3t.sandbox.paypal.com/nvp';
export const NVP_PRODUCTION_URL = 'https://api-3t.paypal.com/nvp';
export const NVP_VERSION = '94';

const FAILURE_ACKS = ['failure', 'failurewithwarning'];

type NVPClientOptions = Required<Pick<NVPClientConfig, 'sandbox' | 'debug'>>;

// Default configuration
const DEFAULT_CONFIG: NVPClientOptions = {
  sandbox: false,
  debug: false,
};

export class NVPClient {
  private readonly username: string;
  private readonly password: string;
  private readonly signature: string;
  private readonly http: AxiosInstance;
  private readonly auditLogger?: AuditLogger;
  private readonly config: NVPClientOptions;

  constructor(config: NVPClientConfig) {
    this.username = config.username;
    this.password = config.password;
    this.signature = config.signature;
    this.http = config.httpClient ?? axios.create();
    this.auditLogger = config.auditLogger;
    this.config = {
      sandbox: config.sandbox ?? DEFAULT_CONFIG.sandbox,
      debug: config.debug ?? DEFAULT_CONFIG.debug,
    };
  }

  get usesSandbox(): boolean {
    return this.config.sandbox;
  }

  get endpoint(): string {
    return this.config.sandbox ? NVP_SANDBOX_URL : NVP_PRODUCTION_URL;
  }

  /**
   * Send a raw NVP call.
   *
   * The given parameters are copied, so the caller's set is left untouched.
   *
   * @returns The decoded reply
   * @throws NVPError when the gateway reports a failure; the partially
   * decoded reply is attached as `error.response`
   */
  async performRequest(params: URLSearchParams | Record<string, string>): Promise<NVPResponse> {
    const form = new URLSearchParams(params);
    form.append('USER', this.username);
    form.append('PWD', this.password);
    form.append('SIGNATURE', this.signature);
    form.append('VERSION', NVP_VERSION);

    const method = form.get('METHOD') ?? '';
    const sandbox = this.config.sandbox;

    if (this.config.debug) {
      console.log(`[NVP] ${method} -> ${this.endpoint}`);
    }

    const reply = await this.http.post<string>(this.endpoint, form.toString(), {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      responseType: 'text',
      // Failures are reported in the body, whatever the status line says
      validateStatus: () => true,
    });

    const values = parseNVP(reply.data);
    const response = NVPResponse.fromValues(values, sandbox);
    const errorCode = getValue(values, 'L_ERRORCODE0');
    const failed = errorCode.length > 0 || FAILURE_ACKS.includes(response.ack.toLowerCase());

    this.auditLogger?.log({
      method,
      environment: response.environment,
      ack: response.ack,
      correlationId: response.correlationId,
      errorCode: errorCode || undefined,
      success: !failed,
    });

    if (failed) {
      const error = NVPError.fromValues(values, response);
      if (this.config.debug) {
        console.warn(`[NVP] ${method} failed (${response.correlationId}): ${error.message}`);
      }
      throw error;
    }

    return response;
  }

  async setExpressCheckout(order: Order, goods: Good[]): Promise<NVPResponse> {
    return this.performRequest(buildSetExpressCheckout(order, goods));
  }

  async setExpressCheckoutDigitalGoods(
    paymentAmount: number,
    currencyCode: string,
    returnUrl: string,
    cancelUrl: string,
    goods: DigitalGood[]
  ): Promise<NVPResponse> {
    return this.performRequest(
      buildSetExpressCheckoutDigitalGoods(paymentAmount, currencyCode, returnUrl, cancelUrl, goods)
    );
  }

  /**
   * Complete a checkout the buyer has approved.
   *
   * @param paymentType - 'Sale', 'Authorization' or 'Order' (ship later)
   */
  async doExpressCheckoutPayment(
    token: string,
    payerId: string,
    paymentType: PaymentAction | (string & {}),
    currencyCode: string,
    finalPaymentAmount: number
  ): Promise<NVPResponse> {
    return this.performRequest(
      buildDoExpressCheckoutPayment(token, payerId, paymentType, currencyCode, finalPaymentAmount)
    );
  }

  /** Convenience for an immediate Sale (charge). */
  async doExpressCheckoutSale(
    token: string,
    payerId: string,
    currencyCode: string,
    finalPaymentAmount: number
  ): Promise<NVPResponse> {
    return this.doExpressCheckoutPayment(token, payerId, 'Sale', currencyCode, finalPaymentAmount);
  }

  async getExpressCheckoutDetails(token: string): Promise<NVPResponse> {
    return this.performRequest(buildGetExpressCheckoutDetails(token));
  }
}
