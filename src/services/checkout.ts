/**
 * Stripe-hosted checkout and one-off payment intents, alongside the card-token flow in
 * subscriptions.ts. The web app sends the customer to the hosted page, which returns to
 * `${frontendUrl}/success?session_id=...`; the app then confirms the session here.
 */

import { z } from 'zod';
import { BadRequestError, PaymentProviderError, errorMessage } from '../common/errors.js';
import { SUBSCRIPTION_PLAN, periodEnd } from '../common/plan.js';
import type { User } from '../common/types/index.js';
import type { ProviderCheckoutSession } from './payment_provider.js';
import { type BillingContext, requirePayments } from './subscriptions.js';

/** Stripe fills this in with the real session id on redirect. */
const SESSION_ID_PLACEHOLDER = '{CHECKOUT_SESSION_ID}';

/** Provider statuses that mean the subscription is paid up. */
const PAID_SUBSCRIPTION_STATUSES: ReadonlySet<string> = new Set(['active', 'trialing']);

export const CheckoutSessionRequestSchema = z.object({
  price_id: z.string({ required_error: 'price_id is required' }).trim().min(1, 'price_id is required'),
  customer_email: z.string().trim().nullish(),
});

export const SessionIdQuerySchema = z.object({
  session_id: z.string({ required_error: 'session_id is required' }).trim().min(1, 'session_id is required'),
});

export const PaymentIntentRequestSchema = z.object({
  /** minor units, e.g. cents */
  amount: z
    .number({ required_error: 'amount is required', invalid_type_error: 'amount must be a number' })
    .int('amount must be a whole number of minor units')
    .positive('amount must be positive'),
  currency: z.string().trim().toLowerCase().length(3, 'currency must be a 3-letter code').default('usd'),
});

export interface CheckoutSessionView {
  id: string;
  status: string | null;
  payment_status: string;
  subscription_status: string | null;
  customer_email: string | null;
  subscription_id: string | null;
}

/**
 * @returns the hosted checkout URL
 * @throws PaymentProviderError if the provider rejects the session
 */
export async function createCheckoutSession(
  ctx: BillingContext,
  frontendUrl: string,
  body: unknown
): Promise<{ url: string | null }> {
  const request = CheckoutSessionRequestSchema.parse(body);
  const payments = requirePayments(ctx);
  try {
    const session = await payments.createCheckoutSession({
      priceId: request.price_id,
      customerEmail: request.customer_email || undefined,
      successUrl: `${frontendUrl}/success?session_id=${SESSION_ID_PLACEHOLDER}`,
      cancelUrl: `${frontendUrl}/cancel`,
    });
    return { url: session.url };
  } catch (error) {
    throw new PaymentProviderError(errorMessage(error), error);
  }
}

async function retrieveSession(ctx: BillingContext, query: unknown): Promise<ProviderCheckoutSession> {
  const { session_id } = SessionIdQuerySchema.parse(query);
  const payments = requirePayments(ctx);
  try {
    return await payments.retrieveCheckoutSession(session_id);
  } catch (error) {
    // unknown or malformed session ids
    throw new BadRequestError(errorMessage(error));
  }
}

/**
 * Where a checkout session has got to. Polled by the success page.
 * @throws BadRequestError if the provider does not know the session
 */
export async function getCheckoutSession(ctx: BillingContext, query: unknown): Promise<CheckoutSessionView> {
  const session = await retrieveSession(ctx, query);
  return {
    id: session.id,
    status: session.status,
    payment_status: session.paymentStatus,
    subscription_status: session.subscriptionStatus,
    customer_email: session.customerEmail,
    subscription_id: session.subscriptionId,
  };
}

/**
 * Link a completed checkout to the signed-in user: remember their provider customer, and once
 * the subscription is paid, record it locally (or bring an existing record up to date).
 * @throws BadRequestError if the provider does not know the session
 */
export async function confirmCheckout(
  ctx: BillingContext,
  user: User,
  query: unknown,
  now: Date = new Date()
): Promise<{ ok: true }> {
  const session = await retrieveSession(ctx, query);

  if (session.customerId && session.customerId !== user.stripe_customer_id) {
    await ctx.store.updateUser(user.id, { stripe_customer_id: session.customerId });
  }

  if (session.subscriptionId && session.subscriptionStatus && PAID_SUBSCRIPTION_STATUSES.has(session.subscriptionStatus)) {
    const existing = await ctx.store.getSubscriptionByProviderId(session.subscriptionId);
    if (existing) {
      await ctx.store.updateSubscription(existing.id, { status: 'active', ends_at: periodEnd(now), user_id: user.id });
    } else {
      await ctx.store.createSubscription({
        user_id: user.id,
        user_email: user.email,
        plan: SUBSCRIPTION_PLAN.name,
        status: 'active',
        provider: 'stripe',
        provider_subscription_id: session.subscriptionId,
        starts_at: now,
        ends_at: periodEnd(now),
      });
    }
  }
  return { ok: true };
}

/**
 * @returns the client secret for the client-side payment form
 * @throws BadRequestError if the provider rejects the amount or currency
 */
export async function createPaymentIntent(ctx: BillingContext, body: unknown): Promise<{ clientSecret: string | null }> {
  const request = PaymentIntentRequestSchema.parse(body);
  const payments = requirePayments(ctx);
  try {
    const intent = await payments.createPaymentIntent(request.amount, request.currency);
    return { clientSecret: intent.clientSecret };
  } catch (error) {
    throw new BadRequestError(errorMessage(error));
  }
}
