/**
 * The single subscription plan on offer.
 */

import type { SubscriptionPlanName } from './types/index.js';

export interface PlanInfo {
  name: SubscriptionPlanName;
  /** per period, in `currency` */
  price: number;
  currency: 'usd';
  features: string[];
  duration_days: number;
}

export const SUBSCRIPTION_PLAN: PlanInfo = {
  name: 'premium',
  price: 20.0,
  currency: 'usd',
  features: [
    'Access to all property listings',
    'Detailed property information',
    'Contact information for properties',
    'Advanced search and filtering',
    'Monthly updates',
  ],
  duration_days: 30,
};

const DAY_MS = 24 * 60 * 60 * 1000;

/** End of a paid period that starts at `from`. */
export function periodEnd(from: Date, plan: PlanInfo = SUBSCRIPTION_PLAN): Date {
  return new Date(from.getTime() + plan.duration_days * DAY_MS);
}

/** Plan price in the provider's minor unit (cents). */
export function planPriceMinorUnits(plan: PlanInfo = SUBSCRIPTION_PLAN): number {
  return Math.round(plan.price * 100);
}
