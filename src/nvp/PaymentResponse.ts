/**
 * Payment result fields of a DoExpressCheckoutPayment reply.
 */
import { NVPValues } from '../types/nvp';
import { getValue, parseAmount } from './codec';

export class PaymentResponse {
  transactionId = '';
  status = '';
  type = '';
  fee = 0;
  amount = 0;
  currency = '';
  reasonCode = '';

  static fromValues(values: NVPValues): PaymentResponse {
    return new PaymentResponse().populate(values);
  }

  /**
   * Copy the `PAYMENTINFO_0_*` fields out of a reply.
   *
   * Amounts that do not parse are left at 0 rather than raising.
   */
  populate(values: NVPValues): this {
    this.transactionId = getValue(values, 'PAYMENTINFO_0_TRANSACTIONID');
    this.status = getValue(values, 'PAYMENTINFO_0_PAYMENTSTATUS');
    this.amount = parseAmount(getValue(values, 'PAYMENTINFO_0_AMT'));
    this.fee = parseAmount(getValue(values, 'PAYMENTINFO_0_FEEAMT'));
    this.currency = getValue(values, 'PAYMENTINFO_0_CURRENCYCODE');
    this.type = getValue(values, 'PAYMENTINFO_0_PAYMENTTYPE');
    this.reasonCode = getValue(values, 'PAYMENTINFO_0_REASONCODE');
    return this;
  }
}
