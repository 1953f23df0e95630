import { FastifyInstance } from 'fastify';
import type { AppContext } from '../app_context.js';
import { PaymentProviderError, errorMessage } from '../common/errors.js';
import { SUBSCRIPTION_PLAN } from '../common/plan.js';
import { createAuthGuards, currentUser } from '../server_auth.js';
import { confirmCheckout, createCheckoutSession, createPaymentIntent, getCheckoutSession } from '../services/checkout.js';
import type { ProviderEvent } from '../services/payment_provider.js';
import {
  SubscriptionRequestSchema,
  SubscriptionWithUserSchema,
  cancelSubscription,
  createSubscriptionForUser,
  createSubscriptionWithRegistration,
  getSubscriptionStatus,
  reactivateSubscription,
  renewSubscription,
} from '../services/subscriptions.js';
import { dispatchWebhookEvent } from '../services/webhooks.js';

/**
 * Stripe webhook. Registered in its own scope so that JSON bodies reach the handler unparsed:
 * the signature is computed over the exact bytes sent.
 */
async function registerWebhookRoute(fastify: FastifyInstance, ctx: AppContext): Promise<void> {
  fastify.addContentTypeParser('application/json', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  // Security: no authentication - uses Stripe signature verification.
  fastify.post('/webhook', async (request, reply) => {
    const payments = ctx.payments;
    if (!payments) {
      throw new PaymentProviderError('Payment provider is not configured');
    }
    const signature = request.headers['stripe-signature'];
    if (typeof signature !== 'string' || signature === '') {
      reply.code(400).send({ error: 'Missing stripe-signature header' });
      return;
    }
    const rawBody = request.body;
    if (!Buffer.isBuffer(rawBody) && typeof rawBody !== 'string') {
      reply.code(400).send({ error: 'Missing request body' });
      return;
    }

    let event: ProviderEvent;
    try {
      event = payments.constructEvent(rawBody, signature);
    } catch (error) {
      request.log.error(`Webhook signature verification failed: ${errorMessage(error)}`);
      reply.code(400).send({ error: `Webhook Error: ${errorMessage(error)}` });
      return;
    }

    // The provider retries on anything but 2xx, so handler failures are logged, not returned.
    try {
      const outcome = await dispatchWebhookEvent(ctx.store, payments, event);
      request.log.info({ eventId: event.id, type: event.type, outcome }, 'Webhook event processed');
    } catch (error) {
      request.log.error({ eventId: event.id, type: event.type, err: error }, 'Webhook event handling failed');
    }
    return { status: 'success' };
  });
}

/**
 * Register payment and subscription endpoints (mounted under /v1/payments).
 */
export async function registerPaymentRoutes(fastify: FastifyInstance, ctx: AppContext): Promise<void> {
  const { requireActiveUser } = createAuthGuards(ctx);

  await fastify.register(async (scoped) => registerWebhookRoute(scoped, ctx));

  // Security: Public endpoint - signs up and subscribes in one step.
  fastify.post('/create-subscription', async (request) => {
    const result = await createSubscriptionWithRegistration(ctx, SubscriptionWithUserSchema.parse(request.body));
    request.log.info({ subscriptionId: result.subscription_id }, 'Account created with subscription');
    return result;
  });

  fastify.post('/create-subscription-for-user', { preHandler: requireActiveUser }, async (request) => {
    return createSubscriptionForUser(ctx, currentUser(request), SubscriptionRequestSchema.parse(request.body));
  });

  fastify.post('/renew-subscription', { preHandler: requireActiveUser }, async (request) => {
    return renewSubscription(ctx, currentUser(request), SubscriptionRequestSchema.parse(request.body));
  });

  fastify.post('/cancel-subscription', { preHandler: requireActiveUser }, async (request) => {
    return cancelSubscription(ctx, currentUser(request));
  });

  fastify.post('/reactivate-subscription', { preHandler: requireActiveUser }, async (request) => {
    return reactivateSubscription(ctx, currentUser(request));
  });

  fastify.get('/subscription', { preHandler: requireActiveUser }, async (request) => {
    return getSubscriptionStatus(ctx.store, currentUser(request));
  });

  // Security: Public endpoint - returns a Stripe-hosted checkout URL.
  fastify.post('/create-checkout-session', async (request) => {
    return createCheckoutSession(ctx, ctx.config.frontendUrl, request.body);
  });

  // Security: Public endpoint - session ids are unguessable.
  fastify.get('/checkout-session', async (request) => {
    return getCheckoutSession(ctx, request.query);
  });

  fastify.post('/confirm', { preHandler: requireActiveUser }, async (request) => {
    const result = await confirmCheckout(ctx, currentUser(request), request.query);
    request.log.info({ userId: currentUser(request).id }, 'Checkout confirmed');
    return result;
  });

  // Security: Public endpoint.
  fastify.post('/create-payment-intent', async (request) => {
    return createPaymentIntent(ctx, request.body);
  });

  fastify.get('/plan', async () => {
    return { plan: SUBSCRIPTION_PLAN };
  });

  // Publishable key only; safe to expose.
  fastify.get('/config', async () => {
    return { stripe: { publishable_key: ctx.config.stripe.publishableKey ?? null } };
  });
}
