/**
 * Stripe implementation of PaymentProvider.
 */

import Stripe from 'stripe';
import type { AppConfig } from '../config.js';
import { planPriceMinorUnits, type PlanInfo } from '../common/plan.js';
import type {
  CheckoutSessionRequest,
  PaymentProvider,
  ProviderCheckoutSession,
  ProviderEvent,
  ProviderInvoice,
  ProviderPaymentIntent,
  ProviderSubscription,
} from './payment_provider.js';

type Expandable = string | { id: string } | null;

function idOf(value: Expandable): string | null {
  if (value === null) return null;
  return typeof value === 'string' ? value : value.id;
}

function toProviderSubscription(subscription: Stripe.Subscription): ProviderSubscription {
  return {
    id: subscription.id,
    status: subscription.status,
    customerId: idOf(subscription.customer),
    cancelAtPeriodEnd: subscription.cancel_at_period_end,
  };
}

function toCheckoutSession(session: Stripe.Checkout.Session): ProviderCheckoutSession {
  const subscription = session.subscription;
  return {
    id: session.id,
    url: session.url,
    status: session.status,
    paymentStatus: session.payment_status,
    customerId: idOf(session.customer),
    customerEmail: session.customer_details?.email ?? null,
    subscriptionId: idOf(subscription),
    // only known when the subscription was expanded
    subscriptionStatus: typeof subscription === 'object' && subscription !== null ? subscription.status : null,
  };
}

export class StripePaymentProvider implements PaymentProvider {
  private readonly stripe: Stripe;

  constructor(
    secretKey: string,
    private readonly productId: string | undefined,
    private readonly webhookSecret: string | undefined
  ) {
    this.stripe = new Stripe(secretKey, { apiVersion: '2025-02-24.acacia' });
  }

  async findOrCreateCustomer(email: string, name: string): Promise<string> {
    const customers = await this.stripe.customers.list({
      email,
      limit: 1,
    });
    if (customers.data.length > 0) {
      return customers.data[0].id;
    }
    return this.createCustomer(email, name);
  }

  async createCustomer(email: string, name: string): Promise<string> {
    const customer = await this.stripe.customers.create({ email, name });
    return customer.id;
  }

  async attachDefaultPaymentMethod(customerId: string, paymentMethodId: string): Promise<void> {
    const paymentMethod = await this.stripe.paymentMethods.attach(paymentMethodId, {
      customer: customerId,
    });
    await this.stripe.customers.update(customerId, {
      invoice_settings: { default_payment_method: paymentMethod.id },
    });
  }

  async createSubscription(customerId: string, plan: PlanInfo): Promise<ProviderSubscription> {
    if (!this.productId) {
      throw new Error('STRIPE_PRODUCT_ID not configured');
    }
    // Fails if the product does not exist
    await this.stripe.products.retrieve(this.productId);

    const subscription = await this.stripe.subscriptions.create({
      customer: customerId,
      payment_behavior: 'error_if_incomplete',
      payment_settings: { save_default_payment_method: 'on_subscription' },
      expand: ['latest_invoice.payment_intent'],
      items: [
        {
          price_data: {
            currency: plan.currency,
            product: this.productId,
            unit_amount: planPriceMinorUnits(plan),
            recurring: { interval: 'month' },
          },
        },
      ],
      metadata: { plan: plan.name },
    });
    return toProviderSubscription(subscription);
  }

  async retrieveSubscription(subscriptionId: string): Promise<ProviderSubscription> {
    return toProviderSubscription(await this.stripe.subscriptions.retrieve(subscriptionId));
  }

  async setCancelAtPeriodEnd(subscriptionId: string, cancel: boolean): Promise<void> {
    await this.stripe.subscriptions.update(subscriptionId, { cancel_at_period_end: cancel });
  }

  async listCustomerSubscriptions(customerId: string, limit: number): Promise<ProviderSubscription[]> {
    const subscriptions = await this.stripe.subscriptions.list({ customer: customerId, limit });
    return subscriptions.data.map(toProviderSubscription);
  }

  async retrieveInvoice(invoiceId: string): Promise<ProviderInvoice> {
    const invoice = await this.stripe.invoices.retrieve(invoiceId);
    return {
      id: invoiceId,
      subscriptionId: idOf(invoice.subscription),
      customerId: idOf(invoice.customer),
    };
  }

  async retrieveCustomerEmail(customerId: string): Promise<string | null> {
    const customer = await this.stripe.customers.retrieve(customerId);
    // Deleted customers carry no email
    return 'email' in customer ? customer.email ?? null : null;
  }

  async createCheckoutSession(request: CheckoutSessionRequest): Promise<ProviderCheckoutSession> {
    const session = await this.stripe.checkout.sessions.create({
      mode: 'subscription',
      line_items: [
        {
          price: request.priceId,
          quantity: 1,
        },
      ],
      success_url: request.successUrl,
      cancel_url: request.cancelUrl,
      customer_email: request.customerEmail,
      allow_promotion_codes: true,
    });
    return toCheckoutSession(session);
  }

  async retrieveCheckoutSession(sessionId: string): Promise<ProviderCheckoutSession> {
    const session = await this.stripe.checkout.sessions.retrieve(sessionId, {
      expand: ['subscription', 'customer'],
    });
    return toCheckoutSession(session);
  }

  async createPaymentIntent(amount: number, currency: string): Promise<ProviderPaymentIntent> {
    const intent = await this.stripe.paymentIntents.create({
      amount,
      currency,
      automatic_payment_methods: { enabled: true },
    });
    return { id: intent.id, clientSecret: intent.client_secret };
  }

  constructEvent(rawBody: Buffer | string, signature: string): ProviderEvent {
    if (!this.webhookSecret) {
      throw new Error('STRIPE_WEBHOOK_SECRET not configured');
    }
    const event = this.stripe.webhooks.constructEvent(rawBody, signature, this.webhookSecret);
    return { id: event.id, type: event.type, object: event.data.object };
  }
}

/**
 * @returns null when STRIPE_SECRET_KEY is not set; payment routes then fail with a server error
 */
export function createStripeProvider(config: AppConfig): StripePaymentProvider | null {
  if (!config.stripe.secretKey) {
    console.warn('STRIPE_SECRET_KEY not set. Stripe functionality will be disabled.');
    return null;
  }
  return new StripePaymentProvider(config.stripe.secretKey, config.stripe.productId, config.stripe.webhookSecret);
}
