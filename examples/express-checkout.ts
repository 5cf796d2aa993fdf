/**
 * Example: Express Checkout Flow
 *
 * 1. SetExpressCheckout to obtain a token
 * 2. Redirect the buyer to the checkout URL
 * 3. After approval, read the checkout details and capture the payment
 */

import { createNVPClient, AuditLogger, isNVPError, NVPClientConfig } from '../src';

async function main() {
    const auditLogger = new AuditLogger();
    const config: NVPClientConfig = {
        username: 'test-user',
        password: 'test-password',
        signature: 'test-signature',
        sandbox: true,
        auditLogger,
        debug: true,
    };

    const client = createNVPClient(config);

    try {
        const checkout = await client.setExpressCheckout(
            {
                subTotal: 40,
                shipping: 4.99,
                discount: 5,
                total: 39.99,
                currencyCode: 'USD',
                returnUrl: 'https://shop.example.com/paypal/return',
                cancelUrl: 'https://shop.example.com/paypal/cancel',
            },
            [
                { id: 'MUG-01', name: 'Coffee mug', amount: 15, quantity: 2 },
                { name: 'Sticker pack', amount: 10, quantity: 1 },
            ]
        );

        console.log('Send the buyer to:', checkout.checkoutUrl());

        // The return URL receives ?token=...&PayerID=... once the buyer approves
        const details = await client.getExpressCheckoutDetails(checkout.token);
        const payerId = details.get('PAYERID');

        const result = await client.doExpressCheckoutSale(checkout.token, payerId, 'USD', 39.99);
        const payment = result.toPaymentResponse();
        console.log(`Payment ${payment.transactionId}: ${payment.status} (${payment.amount} ${payment.currency})`);
    } catch (error) {
        if (isNVPError(error)) {
            console.error(`Checkout failed [${error.errorCode}] ${error.longMessage || error.message}`);
        } else {
            throw error;
        }
    }

    console.log('Calls made:', auditLogger.getLogs());
}

main().catch(console.error);
