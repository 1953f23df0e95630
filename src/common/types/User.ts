export type UserRole = 'user' | 'admin';

export default interface User {
  id: string;
  email: string;
  name: string;
  role: UserRole;
  /** bcrypt hash, or `sha256:<salt>:<hex>` when bcrypt was unavailable */
  password_hash: string;
  is_active: boolean;
  /** Stripe customer, set once the user has paid through us */
  stripe_customer_id: string | null;
  created_at: Date;
  updated_at: Date;
}

/** User as returned over the API - never carries the password hash */
export type PublicUser = Omit<User, 'password_hash' | 'stripe_customer_id'>;

export function toPublicUser(user: User): PublicUser {
  const { password_hash: _hash, stripe_customer_id: _customer, ...rest } = user;
  return rest;
}
