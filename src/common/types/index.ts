export type { default as User, UserRole, PublicUser } from './User.js';
export type { default as Subscription, SubscriptionStatus, SubscriptionPlanName, PaymentProviderName } from './Subscription.js';
export type { default as Favorite } from './Favorite.js';
export type { default as Listing, ListingDocument, ListingPage } from './Listing.js';
