import type { AppConfig } from './config.js';
import type { ListingSource } from './db/listing_source.js';
import type { BillingContext } from './services/subscriptions.js';

/**
 * Everything a request handler reaches outside the process. index.ts wires the real
 * PostgreSQL, Elasticsearch and Stripe implementations; tests pass in-memory fakes.
 */
export interface AppContext extends BillingContext {
  config: AppConfig;
  listings: ListingSource;
}
