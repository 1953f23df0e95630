/**
 * Stored statuses. `expired` is never written by this service: it is derived at read time
 * for active/cancelled records whose ends_at has passed (see effectiveStatus).
 */
export type SubscriptionStatus = 'active' | 'inactive' | 'cancelled' | 'expired';

export type SubscriptionPlanName = 'premium';

export type PaymentProviderName = 'stripe';

export default interface Subscription {
  id: string;
  /** null only for records synthesized from a webhook whose customer matched no user */
  user_id: string | null;
  /** email looked up for webhook-synthesized records */
  user_email: string | null;
  plan: SubscriptionPlanName;
  status: SubscriptionStatus;
  provider: PaymentProviderName;
  provider_subscription_id: string | null;
  starts_at: Date;
  ends_at: Date;
  created_at: Date;
  updated_at: Date;
}
