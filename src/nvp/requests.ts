/**
 * Request builders for the Express Checkout procedures.
 *
 * Each builder returns a new parameter set without credentials; the client
 * adds USER/PWD/SIGNATURE/VERSION when the request is sent.
 */
import { DigitalGood, Good, Order, PaymentAction } from '../types/nvp';
import { formatAmount } from './codec';

const ITEM_PREFIX = 'L_PAYMENTREQUEST_0_';

export const DISCOUNT_ITEM_NAME = 'DISCOUNT';

function lineItemField(field: string, index: number): string {
  return `${ITEM_PREFIX}${field}${index}`;
}

/**
 * Fields shared by both SetExpressCheckout variants: immediate sale,
 * guest checkout allowed, no shipping address collected.
 */
function appendCheckoutDefaults(
  params: URLSearchParams,
  currencyCode: string,
  returnUrl: string,
  cancelUrl: string
): void {
  params.append('PAYMENTREQUEST_0_PAYMENTACTION', 'Sale');
  params.append('PAYMENTREQUEST_0_CURRENCYCODE', currencyCode);
  params.append('RETURNURL', returnUrl);
  params.append('CANCELURL', cancelUrl);
  params.append('REQCONFIRMSHIPPING', '0');
  params.append('NOSHIPPING', '1');
  params.append('SOLUTIONTYPE', 'Sole');
}

export function buildSetExpressCheckout(order: Order, goods: Good[]): URLSearchParams {
  const params = new URLSearchParams();
  params.set('METHOD', 'SetExpressCheckout');
  params.append('PAYMENTREQUEST_0_ITEMAMT', formatAmount(order.subTotal));
  params.append('PAYMENTREQUEST_0_SHIPPINGAMT', formatAmount(order.shipping));
  params.append('PAYMENTREQUEST_0_AMT', formatAmount(order.total));
  appendCheckoutDefaults(params, order.currencyCode, order.returnUrl, order.cancelUrl);

  goods.forEach((good, i) => {
    if (good.id) {
      params.append(lineItemField('NUMBER', i), good.id);
    }
    params.append(lineItemField('NAME', i), good.name);
    params.append(lineItemField('AMT', i), formatAmount(good.amount));
    params.append(lineItemField('QTY', i), String(good.quantity));
  });

  if (order.discount > 0) {
    const index = goods.length;
    params.append(lineItemField('NAME', index), DISCOUNT_ITEM_NAME);
    params.append(lineItemField('AMT', index), formatAmount(-order.discount));
    params.append(lineItemField('QTY', index), '1');
  }

  return params;
}

export function buildSetExpressCheckoutDigitalGoods(
  paymentAmount: number,
  currencyCode: string,
  returnUrl: string,
  cancelUrl: string,
  goods: DigitalGood[]
): URLSearchParams {
  const params = new URLSearchParams();
  params.set('METHOD', 'SetExpressCheckout');
  params.append('PAYMENTREQUEST_0_AMT', formatAmount(paymentAmount));
  appendCheckoutDefaults(params, currencyCode, returnUrl, cancelUrl);

  goods.forEach((good, i) => {
    params.append(lineItemField('NAME', i), good.name);
    params.append(lineItemField('AMT', i), formatAmount(good.amount));
    params.append(lineItemField('QTY', i), String(good.quantity));
    params.append(lineItemField('ITEMCATEGORY', i), 'Digital');
  });

  return params;
}

/**
 * @param paymentType - 'Sale', 'Authorization' or 'Order'; other values are sent as given
 */
export function buildDoExpressCheckoutPayment(
  token: string,
  payerId: string,
  paymentType: PaymentAction | (string & {}),
  currencyCode: string,
  finalPaymentAmount: number
): URLSearchParams {
  const params = new URLSearchParams();
  params.set('METHOD', 'DoExpressCheckoutPayment');
  params.append('TOKEN', token);
  params.append('PAYERID', payerId);
  params.append('PAYMENTREQUEST_0_PAYMENTACTION', paymentType);
  params.append('PAYMENTREQUEST_0_CURRENCYCODE', currencyCode);
  params.append('PAYMENTREQUEST_0_AMT', formatAmount(finalPaymentAmount));
  return params;
}

export function buildGetExpressCheckoutDetails(token: string): URLSearchParams {
  const params = new URLSearchParams();
  params.append('TOKEN', token);
  params.set('METHOD', 'GetExpressCheckoutDetails');
  return params;
}

export function sumDigitalGoodAmounts(goods: DigitalGood[]): number {
  return goods.reduce((sum, good) => sum + good.amount * good.quantity, 0);
}
