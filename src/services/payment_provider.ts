/**
 * What the subscription state machine needs from a payment processor.
 * stripe.ts provides the Stripe implementation; tests use an in-process fake.
 */

import type { PlanInfo } from '../common/plan.js';

export interface ProviderSubscription {
  id: string;
  /** provider's own status, e.g. 'active', 'canceled', 'past_due' */
  status: string;
  customerId: string | null;
  cancelAtPeriodEnd: boolean;
}

export interface ProviderInvoice {
  id: string;
  subscriptionId: string | null;
  customerId: string | null;
}

export interface CheckoutSessionRequest {
  /** a recurring price configured at the provider */
  priceId: string;
  customerEmail?: string;
  successUrl: string;
  cancelUrl: string;
}

/** A hosted checkout page and, once paid, the subscription it started. */
export interface ProviderCheckoutSession {
  id: string;
  url: string | null;
  /** 'open', 'complete' or 'expired' */
  status: string | null;
  /** 'paid' once the first invoice is settled */
  paymentStatus: string;
  customerId: string | null;
  customerEmail: string | null;
  subscriptionId: string | null;
  subscriptionStatus: string | null;
}

export interface ProviderPaymentIntent {
  id: string;
  /** handed to the client-side payment form */
  clientSecret: string | null;
}

/** A verified webhook event. `object` is the event payload, unvalidated. */
export interface ProviderEvent {
  id: string;
  type: string;
  object: unknown;
}

export interface PaymentProvider {
  /** Reuse the customer registered under this email, or create one. */
  findOrCreateCustomer(email: string, name: string): Promise<string>;
  createCustomer(email: string, name: string): Promise<string>;
  /** Attach a tokenised payment method and make it the customer's default. */
  attachDefaultPaymentMethod(customerId: string, paymentMethodId: string): Promise<void>;
  /** Start a monthly subscription to the plan, charging immediately. */
  createSubscription(customerId: string, plan: PlanInfo): Promise<ProviderSubscription>;
  retrieveSubscription(subscriptionId: string): Promise<ProviderSubscription>;
  setCancelAtPeriodEnd(subscriptionId: string, cancel: boolean): Promise<void>;
  listCustomerSubscriptions(customerId: string, limit: number): Promise<ProviderSubscription[]>;
  retrieveInvoice(invoiceId: string): Promise<ProviderInvoice>;
  /** @returns null for a deleted customer or one without an email */
  retrieveCustomerEmail(customerId: string): Promise<string | null>;
  createCheckoutSession(request: CheckoutSessionRequest): Promise<ProviderCheckoutSession>;
  retrieveCheckoutSession(sessionId: string): Promise<ProviderCheckoutSession>;
  /** One-off charge in the currency's minor units. */
  createPaymentIntent(amount: number, currency: string): Promise<ProviderPaymentIntent>;
  /**
   * @throws if the signature does not match the raw body
   */
  constructEvent(rawBody: Buffer | string, signature: string): ProviderEvent;
}
