/**
 * Payment provider webhooks: reconcile local subscription records with what the provider did.
 *
 * Each event id is recorded before it is applied so that a redelivered event is a no-op.
 * If applying fails the record is dropped again, so a manual resend of the event from the
 * provider's dashboard is applied rather than skipped as a duplicate. The webhook route
 * acknowledges verified events regardless, so there is no automatic retry.
 */

import { z } from 'zod';
import { errorMessage } from '../common/errors.js';
import { SUBSCRIPTION_PLAN, periodEnd } from '../common/plan.js';
import type { AccountStore } from '../db/account_store.js';
import type { PaymentProvider, ProviderEvent } from './payment_provider.js';

/** A string id, or an expanded object carrying one. */
const ExpandableId = z
  .union([z.string(), z.object({ id: z.string() }).passthrough()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    return typeof value === 'string' ? value : value.id;
  });

/** The parts of an invoice or payment intent used to find the subscription paid for. */
const PaymentObjectSchema = z
  .object({
    id: z.string().optional(),
    subscription: ExpandableId,
    customer: ExpandableId,
    lines: z
      .object({
        data: z.array(z.object({ subscription: ExpandableId }).passthrough()).default([]),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const ProviderSubscriptionSchema = z
  .object({
    id: z.string().optional(),
    canceled_at: z.number().nullish(),
    ended_at: z.number().nullish(),
    cancel_at: z.number().nullish(),
  })
  .passthrough();

type PaymentObject = z.infer<typeof PaymentObjectSchema>;

export type WebhookOutcome = 'applied' | 'duplicate' | 'ignored';

function fromUnixSeconds(seconds: number): Date {
  return new Date(seconds * 1000);
}

/**
 * Work out which provider subscription a payment is for: the object's own reference, then its
 * line items, then the customer's subscriptions (active first), then a fresh copy of the invoice.
 */
export async function resolvePaidSubscriptionId(payments: PaymentProvider, payment: PaymentObject): Promise<string | null> {
  if (payment.subscription) {
    return payment.subscription;
  }

  for (const line of payment.lines?.data ?? []) {
    if (line.subscription) {
      return line.subscription;
    }
  }

  if (payment.customer) {
    try {
      const subscriptions = await payments.listCustomerSubscriptions(payment.customer, 3);
      const active = subscriptions.find((s) => s.status === 'active');
      const chosen = active ?? subscriptions[0];
      if (chosen) {
        return chosen.id;
      }
    } catch (error) {
      console.warn(`Could not list subscriptions for customer ${payment.customer}:`, errorMessage(error));
    }
  }

  if (payment.id) {
    try {
      const invoice = await payments.retrieveInvoice(payment.id);
      return invoice.subscriptionId;
    } catch (error) {
      console.warn(`Could not retrieve invoice ${payment.id}:`, errorMessage(error));
    }
  }

  return null;
}

/**
 * Who a provider subscription belongs to, by stored customer id, else by the provider's customer email.
 */
async function findSubscriber(
  store: AccountStore,
  payments: PaymentProvider,
  providerSubscriptionId: string
): Promise<{ userId: string | null; email: string | null }> {
  let customerId: string | null = null;
  try {
    customerId = (await payments.retrieveSubscription(providerSubscriptionId)).customerId;
  } catch (error) {
    console.warn(`Could not retrieve subscription ${providerSubscriptionId}:`, errorMessage(error));
  }
  if (!customerId) {
    return { userId: null, email: null };
  }

  const user = await store.getUserByStripeCustomerId(customerId);
  if (user) {
    return { userId: user.id, email: user.email };
  }

  let email: string | null = null;
  try {
    email = await payments.retrieveCustomerEmail(customerId);
  } catch (error) {
    console.warn(`Could not retrieve customer ${customerId}:`, errorMessage(error));
  }
  if (!email) {
    return { userId: null, email: null };
  }
  const byEmail = await store.getUserByEmail(email);
  return { userId: byEmail?.id ?? null, email };
}

/**
 * Payment succeeded: extend the period by one plan duration from now and mark active.
 * With no local record for the subscription, one is created for whoever the provider says owns it.
 */
export async function handlePaymentSucceeded(
  store: AccountStore,
  payments: PaymentProvider,
  object: unknown,
  now: Date = new Date()
): Promise<void> {
  const payment = PaymentObjectSchema.parse(object);
  const providerSubscriptionId = await resolvePaidSubscriptionId(payments, payment);
  if (!providerSubscriptionId) {
    console.warn(`Payment ${payment.id ?? '(no id)'} could not be matched to a subscription`);
    return;
  }

  const existing = await store.getSubscriptionByProviderId(providerSubscriptionId);
  if (existing) {
    await store.updateSubscription(existing.id, { status: 'active', ends_at: periodEnd(now) });
    return;
  }

  const subscriber = await findSubscriber(store, payments, providerSubscriptionId);
  await store.createSubscription({
    user_id: subscriber.userId,
    user_email: subscriber.email,
    plan: SUBSCRIPTION_PLAN.name,
    status: 'active',
    provider: 'stripe',
    provider_subscription_id: providerSubscriptionId,
    starts_at: now,
    ends_at: periodEnd(now),
  });
}

/** Payment failed: access ends now. */
export async function handlePaymentFailed(store: AccountStore, object: unknown, now: Date = new Date()): Promise<void> {
  const invoice = PaymentObjectSchema.parse(object);
  if (!invoice.subscription) {
    return;
  }
  const existing = await store.getSubscriptionByProviderId(invoice.subscription);
  if (existing) {
    await store.updateSubscription(existing.id, { status: 'inactive', ends_at: now });
  }
}

/**
 * Deleted at the provider: cancelled, ending when the provider cancelled it
 * (falling back to when it ended, then to now).
 */
export async function handleSubscriptionDeleted(
  store: AccountStore,
  object: unknown,
  now: Date = new Date()
): Promise<void> {
  const subscription = ProviderSubscriptionSchema.parse(object);
  if (!subscription.id) {
    return;
  }
  const existing = await store.getSubscriptionByProviderId(subscription.id);
  if (!existing) {
    return;
  }
  const endedAt = subscription.canceled_at ?? subscription.ended_at;
  await store.updateSubscription(existing.id, {
    status: 'cancelled',
    ends_at: endedAt ? fromUnixSeconds(endedAt) : now,
  });
}

/**
 * Updated at the provider: only a scheduled cancellation (cancel_at) is acted on; it marks the
 * record cancelled, ending at cancel_at. Other updates are ignored.
 */
export async function handleSubscriptionUpdated(store: AccountStore, object: unknown): Promise<void> {
  const subscription = ProviderSubscriptionSchema.parse(object);
  if (!subscription.id || !subscription.cancel_at) {
    return;
  }
  const existing = await store.getSubscriptionByProviderId(subscription.id);
  if (!existing) {
    return;
  }
  await store.updateSubscription(existing.id, {
    status: 'cancelled',
    ends_at: fromUnixSeconds(subscription.cancel_at),
  });
}

type EventHandler = (store: AccountStore, payments: PaymentProvider, object: unknown, now: Date) => Promise<void>;

/** Event types acted on. `payment_intent.created` is the success signal the billing flow relies on. */
export const WEBHOOK_HANDLERS: ReadonlyMap<string, EventHandler> = new Map<string, EventHandler>([
  ['payment_intent.created', handlePaymentSucceeded],
  ['invoice.payment_failed', (store, _payments, object, now) => handlePaymentFailed(store, object, now)],
  ['customer.subscription.deleted', (store, _payments, object, now) => handleSubscriptionDeleted(store, object, now)],
  ['customer.subscription.updated', (store, _payments, object) => handleSubscriptionUpdated(store, object)],
]);

/**
 * Apply a verified event once.
 * @throws whatever the handler throws, after un-recording the event
 */
export async function dispatchWebhookEvent(
  store: AccountStore,
  payments: PaymentProvider,
  event: ProviderEvent,
  now: Date = new Date()
): Promise<WebhookOutcome> {
  const handler = WEBHOOK_HANDLERS.get(event.type);
  if (!handler) {
    return 'ignored';
  }
  if (!(await store.recordWebhookEvent(event.id, event.type))) {
    return 'duplicate';
  }
  try {
    await handler(store, payments, event.object, now);
  } catch (error) {
    await store.forgetWebhookEvent(event.id);
    throw error;
  }
  return 'applied';
}
