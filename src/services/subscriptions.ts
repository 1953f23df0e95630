/**
 * Subscription lifecycle driven by the user: create, renew, cancel, reactivate, status.
 * Provider-driven changes arrive as webhooks (see webhooks.ts).
 *
 * The local record is what access checks read. Provider calls that fail while starting a
 * subscription abort the request; a failed provider call during cancel does not.
 */

import { z } from 'zod';
import { BadRequestError, NotFoundError, PaymentProviderError, errorMessage } from '../common/errors.js';
import { hashPassword } from '../common/passwords.js';
import { SUBSCRIPTION_PLAN, periodEnd } from '../common/plan.js';
import type { Subscription, SubscriptionStatus, User } from '../common/types/index.js';
import { AccountStore, DuplicateEmailError } from '../db/account_store.js';
import type { PaymentProvider } from './payment_provider.js';
import { EmailSchema, NameSchema, PasswordSchema } from '../common/validation.js';

export interface BillingContext {
  store: AccountStore;
  /** null when no payment provider is configured */
  payments: PaymentProvider | null;
}

export interface PaymentResponse {
  success: boolean;
  subscription_id: string;
  message: string;
}

export const SubscriptionRequestSchema = z.object({
  plan: z.literal('premium').default('premium'),
  payment_provider: z.literal('stripe', {
    errorMap: () => ({ message: 'Only Stripe payment provider is supported' }),
  }).default('stripe'),
  /** tokenised payment method from the client-side card form */
  payment_token: z.string().min(1, 'payment_token is required'),
});

export const SubscriptionWithUserSchema = SubscriptionRequestSchema.extend({
  email: EmailSchema,
  name: NameSchema,
  password: PasswordSchema,
});

export type SubscriptionRequest = z.infer<typeof SubscriptionRequestSchema>;
export type SubscriptionWithUserRequest = z.infer<typeof SubscriptionWithUserSchema>;

/** Statuses that keep access until ends_at. */
const LIVE_STATUSES: ReadonlySet<SubscriptionStatus> = new Set(['active', 'cancelled']);

export function isLive(subscription: Subscription, now: Date): boolean {
  return LIVE_STATUSES.has(subscription.status) && subscription.ends_at.getTime() > now.getTime();
}

/** The stored status, except that active/cancelled records past ends_at read as expired. */
export function effectiveStatus(subscription: Subscription, now: Date): SubscriptionStatus {
  if (LIVE_STATUSES.has(subscription.status) && subscription.ends_at.getTime() <= now.getTime()) {
    return 'expired';
  }
  return subscription.status;
}

/**
 * Admins always have access; everyone else needs their most recent subscription to be live.
 */
export function hasSubscriptionAccess(user: User, latest: Subscription | null, now: Date): boolean {
  if (user.role === 'admin') {
    return true;
  }
  return latest !== null && isLive(latest, now);
}

export function requirePayments(ctx: BillingContext): PaymentProvider {
  if (!ctx.payments) {
    throw new PaymentProviderError('Payment provider is not configured');
  }
  return ctx.payments;
}

interface StartedSubscription {
  customerId: string;
  providerSubscriptionId: string;
}

/**
 * Customer, default payment method and provider subscription, in that order.
 * @throws PaymentProviderError if any provider call fails
 */
async function startProviderSubscription(
  payments: PaymentProvider,
  customer: { email: string; name: string },
  paymentToken: string,
  reuseCustomer: boolean
): Promise<StartedSubscription> {
  try {
    const customerId = reuseCustomer
      ? await payments.findOrCreateCustomer(customer.email, customer.name)
      : await payments.createCustomer(customer.email, customer.name);
    await payments.attachDefaultPaymentMethod(customerId, paymentToken);
    const subscription = await payments.createSubscription(customerId, SUBSCRIPTION_PLAN);
    return { customerId, providerSubscriptionId: subscription.id };
  } catch (error) {
    throw new PaymentProviderError(`Payment processing failed: ${errorMessage(error)}`, error);
  }
}

async function recordNewSubscription(
  store: AccountStore,
  user: User,
  providerSubscriptionId: string,
  now: Date
): Promise<Subscription> {
  return store.createSubscription({
    user_id: user.id,
    user_email: user.email,
    plan: SUBSCRIPTION_PLAN.name,
    status: 'active',
    provider: 'stripe',
    provider_subscription_id: providerSubscriptionId,
    starts_at: now,
    ends_at: periodEnd(now),
  });
}

async function subscribeExistingUser(
  ctx: BillingContext,
  user: User,
  request: SubscriptionRequest,
  now: Date,
  message: string
): Promise<PaymentResponse> {
  const payments = requirePayments(ctx);
  const started = await startProviderSubscription(payments, user, request.payment_token, true);
  await ctx.store.updateUser(user.id, { stripe_customer_id: started.customerId });
  const subscription = await recordNewSubscription(ctx.store, user, started.providerSubscriptionId, now);
  return { success: true, subscription_id: subscription.id, message };
}

/**
 * Subscribe a signed-in user.
 * @throws BadRequestError if their most recent subscription is still live
 */
export async function createSubscriptionForUser(
  ctx: BillingContext,
  user: User,
  request: SubscriptionRequest,
  now: Date = new Date()
): Promise<PaymentResponse> {
  const latest = await ctx.store.getLatestSubscription(user.id);
  if (latest && isLive(latest, now)) {
    throw new BadRequestError('You already have an active subscription');
  }
  return subscribeExistingUser(ctx, user, request, now, 'Subscription activated successfully!');
}

/**
 * Sign up and subscribe in one step. The provider is charged before the account is created,
 * so a declined card leaves no account behind.
 */
export async function createSubscriptionWithRegistration(
  ctx: BillingContext,
  request: SubscriptionWithUserRequest,
  now: Date = new Date()
): Promise<PaymentResponse> {
  if (await ctx.store.getUserByEmail(request.email)) {
    throw new BadRequestError('Email already registered');
  }
  const payments = requirePayments(ctx);
  const started = await startProviderSubscription(payments, request, request.payment_token, false);

  let user: User;
  try {
    user = await ctx.store.createUser({
      email: request.email,
      name: request.name,
      role: 'user',
      password_hash: await hashPassword(request.password),
      stripe_customer_id: started.customerId,
    });
  } catch (error) {
    if (error instanceof DuplicateEmailError) {
      throw new BadRequestError('Email already registered');
    }
    throw error;
  }

  const subscription = await recordNewSubscription(ctx.store, user, started.providerSubscriptionId, now);
  return {
    success: true,
    subscription_id: subscription.id,
    message: 'Account created and subscription activated successfully!',
  };
}

/**
 * Clear the provider's cancel-at-period-end flag and mark the record active again. No new charge.
 */
async function reactivateInPlace(ctx: BillingContext, subscription: Subscription): Promise<PaymentResponse> {
  if (subscription.provider_subscription_id) {
    const payments = requirePayments(ctx);
    try {
      await payments.setCancelAtPeriodEnd(subscription.provider_subscription_id, false);
    } catch (error) {
      throw new PaymentProviderError(`Failed to reactivate subscription: ${errorMessage(error)}`, error);
    }
  }
  await ctx.store.updateSubscription(subscription.id, { status: 'active' });
  return {
    success: true,
    subscription_id: subscription.id,
    message: 'Subscription reactivated successfully! Your access will continue beyond the current period.',
  };
}

/**
 * Renew: a cancelled but unexpired subscription is reactivated in place; an active one is
 * rejected; anything else (none, inactive, expired) starts a new paid subscription.
 */
export async function renewSubscription(
  ctx: BillingContext,
  user: User,
  request: SubscriptionRequest,
  now: Date = new Date()
): Promise<PaymentResponse> {
  const latest = await ctx.store.getLatestSubscription(user.id);
  if (latest && latest.ends_at.getTime() > now.getTime()) {
    if (latest.status === 'cancelled') {
      return reactivateInPlace(ctx, latest);
    }
    if (latest.status === 'active') {
      throw new BadRequestError('You already have an active subscription');
    }
  }
  return subscribeExistingUser(ctx, user, request, now, 'Subscription renewed successfully!');
}

/**
 * Soft-cancel: access continues until ends_at, and the provider stops billing at period end.
 * @returns a message describing what the provider did
 */
export async function cancelSubscription(
  ctx: BillingContext,
  user: User,
  now: Date = new Date()
): Promise<{ message: string }> {
  const subscription = await ctx.store.getLatestSubscription(user.id, 'active');
  if (!subscription || subscription.ends_at.getTime() <= now.getTime()) {
    throw new NotFoundError('No active subscription found');
  }

  let message = 'Subscription cancelled successfully';
  const providerId = subscription.provider_subscription_id;
  if (providerId) {
    try {
      const payments = requirePayments(ctx);
      const remote = await payments.retrieveSubscription(providerId);
      if (remote.status === 'active') {
        await payments.setCancelAtPeriodEnd(providerId, true);
        message =
          "Subscription will be cancelled at the end of your current billing period. You'll retain access until then.";
      } else if (remote.status === 'canceled' || remote.status === 'cancelled') {
        message = 'Subscription is already cancelled';
      } else {
        message = `Subscription status is ${remote.status}. Marked as cancelled in our system.`;
      }
    } catch (error) {
      console.error(`Payment provider error while cancelling subscription ${subscription.id}:`, errorMessage(error));
      message = 'Subscription cancelled in our system. Please contact support if you continue to be charged.';
    }
  }

  await ctx.store.updateSubscription(subscription.id, { status: 'cancelled' });
  return { message };
}

/**
 * @throws NotFoundError unless the most recent subscription is cancelled
 * @throws BadRequestError if it has already expired
 */
export async function reactivateSubscription(
  ctx: BillingContext,
  user: User,
  now: Date = new Date()
): Promise<PaymentResponse> {
  const latest = await ctx.store.getLatestSubscription(user.id);
  if (!latest || latest.status !== 'cancelled') {
    throw new NotFoundError('No cancelled subscription found to reactivate');
  }
  if (latest.ends_at.getTime() <= now.getTime()) {
    throw new BadRequestError(
      'Subscription has expired and cannot be reactivated. Please create a new subscription.'
    );
  }
  return reactivateInPlace(ctx, latest);
}

export interface SubscriptionView extends Subscription {
  effective_status: SubscriptionStatus;
  has_access: boolean;
}

export function toSubscriptionView(subscription: Subscription, now: Date): SubscriptionView {
  return {
    ...subscription,
    effective_status: effectiveStatus(subscription, now),
    has_access: isLive(subscription, now),
  };
}

export async function getSubscriptionStatus(
  store: AccountStore,
  user: User,
  now: Date = new Date()
): Promise<{ subscription: SubscriptionView | null }> {
  const latest = await store.getLatestSubscription(user.id);
  return { subscription: latest ? toSubscriptionView(latest, now) : null };
}
