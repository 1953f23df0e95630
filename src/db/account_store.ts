/**
 * Persistence for users, subscriptions, favorites and processed webhook events.
 * db_sql.ts provides the PostgreSQL implementation (sqlAccountStore).
 *
 * Get/update functions return null when the record does not exist.
 */

import type { Favorite, Subscription, SubscriptionStatus, User, UserRole } from '../common/types/index.js';

export interface NewUser {
  email: string;
  name: string;
  role: UserRole;
  password_hash: string;
  is_active?: boolean;
  stripe_customer_id?: string | null;
}

export type UserUpdate = Partial<Pick<User, 'name' | 'password_hash' | 'is_active' | 'stripe_customer_id'>>;

export type NewSubscription = Omit<Subscription, 'id' | 'created_at' | 'updated_at'>;

export type SubscriptionUpdate = Partial<Pick<Subscription, 'status' | 'ends_at' | 'user_id'>>;

/** Thrown by createUser when the email is taken. */
export class DuplicateEmailError extends Error {
  constructor(email: string) {
    super(`Email already registered: ${email}`);
    this.name = 'DuplicateEmailError';
  }
}

/** Thrown by createFavorite when the (user, listing) pair exists. */
export class DuplicateFavoriteError extends Error {
  constructor() {
    super('Favorite already exists');
    this.name = 'DuplicateFavoriteError';
  }
}

export interface AccountStore {
  /** @throws DuplicateEmailError */
  createUser(user: NewUser): Promise<User>;
  getUser(id: string): Promise<User | null>;
  getUserByEmail(email: string): Promise<User | null>;
  getUserByStripeCustomerId(customerId: string): Promise<User | null>;
  updateUser(id: string, updates: UserUpdate): Promise<User | null>;

  createSubscription(subscription: NewSubscription): Promise<Subscription>;
  /** Most recent by created_at, optionally restricted to one stored status. */
  getLatestSubscription(userId: string, status?: SubscriptionStatus): Promise<Subscription | null>;
  getSubscriptionByProviderId(providerSubscriptionId: string): Promise<Subscription | null>;
  updateSubscription(id: string, updates: SubscriptionUpdate): Promise<Subscription | null>;

  getFavorite(userId: string, listingId: string): Promise<Favorite | null>;
  /** @throws DuplicateFavoriteError */
  createFavorite(userId: string, listingId: string): Promise<Favorite>;
  /** @returns false if there was nothing to delete */
  deleteFavorite(userId: string, listingId: string): Promise<boolean>;
  listFavorites(userId: string): Promise<Favorite[]>;

  /**
   * Record a provider webhook event as applied.
   * @returns false if the event was already recorded (a redelivery)
   */
  recordWebhookEvent(eventId: string, type: string): Promise<boolean>;
  /** Drop a recorded event whose handling failed, so a redelivery is applied. */
  forgetWebhookEvent(eventId: string): Promise<void>;
}
