/**
 * In-process stand-ins for PostgreSQL, Elasticsearch and Stripe, plus helpers to build a server around them.
 */

import * as crypto from 'crypto';
import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../src/app_context.js';
import type { AppConfig } from '../src/config.js';
import { fallbackHash } from '../src/common/passwords.js';
import type { PlanInfo } from '../src/common/plan.js';
import { issueToken } from '../src/common/tokens.js';
import type { Favorite, Listing, ListingDocument, Subscription, SubscriptionStatus, User } from '../src/common/types/index.js';
import {
  LISTING_FIELDS,
  extractConstructionYear,
  extractFirstNumber,
  numericPrice,
  toListing,
} from '../src/common/listing_fields.js';
import {
  AccountStore,
  DuplicateEmailError,
  DuplicateFavoriteError,
  NewSubscription,
  NewUser,
  SubscriptionUpdate,
  UserUpdate,
} from '../src/db/account_store.js';
import type { ListingQuery, ListingSource, NumericRange } from '../src/db/listing_source.js';
import type {
  CheckoutSessionRequest,
  PaymentProvider,
  ProviderCheckoutSession,
  ProviderEvent,
  ProviderInvoice,
  ProviderPaymentIntent,
  ProviderSubscription,
} from '../src/services/payment_provider.js';
import { buildServer } from '../src/server.js';

export const TEST_SECRET = 'test-secret';
export const TEST_PASSWORD = 'password123';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    host: '127.0.0.1',
    environment: 'test',
    corsOrigins: true,
    postgres: { ssl: false },
    elasticsearchUrl: 'http://localhost:9200',
    listingsIndexPattern: 'listings-*',
    token: { secret: TEST_SECRET, algorithm: 'HS256', ttlMinutes: 30 },
    stripe: { publishableKey: 'pk_test_placeholder' },
    frontendUrl: 'http://app.test',
    ...overrides,
  };
}

export const DAY_MS = 24 * 60 * 60 * 1000;

export function daysFrom(from: Date, days: number): Date {
  return new Date(from.getTime() + days * DAY_MS);
}

// ===== AccountStore =====

export class MemoryAccountStore implements AccountStore {
  readonly users: User[] = [];
  readonly subscriptions: Subscription[] = [];
  readonly favorites: Favorite[] = [];
  readonly webhookEvents = new Map<string, string>();

  async createUser(user: NewUser): Promise<User> {
    if (this.users.some((u) => u.email === user.email)) {
      throw new DuplicateEmailError(user.email);
    }
    const now = new Date();
    const created: User = {
      id: crypto.randomUUID(),
      email: user.email,
      name: user.name,
      role: user.role,
      password_hash: user.password_hash,
      is_active: user.is_active ?? true,
      stripe_customer_id: user.stripe_customer_id ?? null,
      created_at: now,
      updated_at: now,
    };
    this.users.push(created);
    return { ...created };
  }

  async getUser(id: string): Promise<User | null> {
    const user = this.users.find((u) => u.id === id);
    return user ? { ...user } : null;
  }

  async getUserByEmail(email: string): Promise<User | null> {
    const user = this.users.find((u) => u.email === email);
    return user ? { ...user } : null;
  }

  async getUserByStripeCustomerId(customerId: string): Promise<User | null> {
    const user = this.users.find((u) => u.stripe_customer_id === customerId);
    return user ? { ...user } : null;
  }

  async updateUser(id: string, updates: UserUpdate): Promise<User | null> {
    const user = this.users.find((u) => u.id === id);
    if (!user) return null;
    Object.assign(user, updates, { updated_at: new Date() });
    return { ...user };
  }

  async createSubscription(subscription: NewSubscription): Promise<Subscription> {
    const now = new Date();
    const created: Subscription = { ...subscription, id: crypto.randomUUID(), created_at: now, updated_at: now };
    this.subscriptions.push(created);
    return { ...created };
  }

  /** Later inserts win ties on created_at. */
  async getLatestSubscription(userId: string, status?: SubscriptionStatus): Promise<Subscription | null> {
    let latest: Subscription | null = null;
    for (const s of this.subscriptions) {
      if (s.user_id !== userId || (status && s.status !== status)) continue;
      if (!latest || s.created_at.getTime() >= latest.created_at.getTime()) {
        latest = s;
      }
    }
    return latest ? { ...latest } : null;
  }

  async getSubscriptionByProviderId(providerSubscriptionId: string): Promise<Subscription | null> {
    const found = this.subscriptions.find((s) => s.provider_subscription_id === providerSubscriptionId);
    return found ? { ...found } : null;
  }

  async updateSubscription(id: string, updates: SubscriptionUpdate): Promise<Subscription | null> {
    const subscription = this.subscriptions.find((s) => s.id === id);
    if (!subscription) return null;
    Object.assign(subscription, updates, { updated_at: new Date() });
    return { ...subscription };
  }

  async getFavorite(userId: string, listingId: string): Promise<Favorite | null> {
    const found = this.favorites.find((f) => f.user_id === userId && f.listing_id === listingId);
    return found ? { ...found } : null;
  }

  async createFavorite(userId: string, listingId: string): Promise<Favorite> {
    if (this.favorites.some((f) => f.user_id === userId && f.listing_id === listingId)) {
      throw new DuplicateFavoriteError();
    }
    const favorite: Favorite = { user_id: userId, listing_id: listingId, created_at: new Date() };
    this.favorites.push(favorite);
    return { ...favorite };
  }

  async deleteFavorite(userId: string, listingId: string): Promise<boolean> {
    const index = this.favorites.findIndex((f) => f.user_id === userId && f.listing_id === listingId);
    if (index < 0) return false;
    this.favorites.splice(index, 1);
    return true;
  }

  async listFavorites(userId: string): Promise<Favorite[]> {
    return this.favorites.filter((f) => f.user_id === userId).map((f) => ({ ...f }));
  }

  async recordWebhookEvent(eventId: string, type: string): Promise<boolean> {
    if (this.webhookEvents.has(eventId)) return false;
    this.webhookEvents.set(eventId, type);
    return true;
  }

  async forgetWebhookEvent(eventId: string): Promise<void> {
    this.webhookEvents.delete(eventId);
  }

  /** Insert a user directly, with a fast (non-bcrypt) hash of `password`. */
  addUser(fields: Partial<User> & { email: string }, password: string = TEST_PASSWORD): User {
    const now = new Date();
    const user: User = {
      id: crypto.randomUUID(),
      name: 'Test User',
      role: 'user',
      password_hash: fallbackHash(password, 'test-salt'),
      is_active: true,
      stripe_customer_id: null,
      created_at: now,
      updated_at: now,
      ...fields,
    };
    this.users.push(user);
    return { ...user };
  }

  /** Insert a subscription record directly. */
  addSubscription(fields: Partial<Subscription> & { user_id: string | null; status: SubscriptionStatus; ends_at: Date }): Subscription {
    const created = fields.created_at ?? new Date();
    const subscription: Subscription = {
      id: crypto.randomUUID(),
      user_email: null,
      plan: 'premium',
      provider: 'stripe',
      provider_subscription_id: null,
      starts_at: created,
      created_at: created,
      updated_at: created,
      ...fields,
    };
    this.subscriptions.push(subscription);
    return { ...subscription };
  }
}

// ===== ListingSource =====

export interface StoredListing {
  id: string;
  collection: string;
  doc: ListingDocument;
}

function inRange(value: number | null, range: NumericRange): boolean {
  if (range.min === undefined && range.max === undefined) return true;
  if (value === null) return false;
  if (range.min !== undefined && value < range.min) return false;
  if (range.max !== undefined && value > range.max) return false;
  return true;
}

/** Applies the same filters, sort and paging as the Elasticsearch query. */
export class MemoryListingSource implements ListingSource {
  readonly searches: ListingQuery[] = [];

  constructor(readonly listings: StoredListing[] = []) {}

  private matching(query: ListingQuery, currentYear: number): StoredListing[] {
    return this.listings.filter(({ doc }) => {
      const price = numericPrice(doc[LISTING_FIELDS.salePrice]);
      if (price === null) return false;
      if (query.prefecture !== undefined && doc[LISTING_FIELDS.prefecture] !== query.prefecture) return false;
      if (query.layout !== undefined && doc[LISTING_FIELDS.layout] !== query.layout) return false;
      return (
        inRange(price, query.salePrice) &&
        inRange(extractFirstNumber(doc[LISTING_FIELDS.buildingArea]), query.buildingArea) &&
        inRange(extractFirstNumber(doc[LISTING_FIELDS.landArea]), query.landArea) &&
        inRange(extractConstructionYear(doc[LISTING_FIELDS.constructionDate], currentYear), query.constructionYear)
      );
    });
  }

  async search(query: ListingQuery, currentYear: number): Promise<Listing[]> {
    this.searches.push(query);
    const direction = query.sortOrder === 'asc' ? 1 : -1;
    const sorted = [...this.matching(query, currentYear)].sort((a, b) => {
      if (query.sortBy === 'sale_price') {
        const pa = numericPrice(a.doc[LISTING_FIELDS.salePrice]) ?? 0;
        const pb = numericPrice(b.doc[LISTING_FIELDS.salePrice]) ?? 0;
        return (pa - pb) * direction;
      }
      return String(a.doc.createdAt ?? '').localeCompare(String(b.doc.createdAt ?? '')) * direction;
    });
    const offset = (query.page - 1) * query.limit;
    return sorted
      .slice(offset, offset + query.limit)
      .map(({ id, collection, doc }) => toListing(doc, id, collection, currentYear));
  }

  async count(query: ListingQuery, currentYear: number): Promise<number> {
    return this.matching(query, currentYear).length;
  }

  async findById(id: string, currentYear: number): Promise<Listing | null> {
    const found = this.listings.find((l) => l.id === id);
    return found ? toListing(found.doc, found.id, found.collection, currentYear) : null;
  }
}

// ===== PaymentProvider =====

/** A signature FakePaymentProvider.constructEvent accepts. */
export const VALID_SIGNATURE = 't=1,v1=test-signature';

type ProviderCall = { method: string; args: unknown[] };

/**
 * Records every call. Set `failOn` to make a method throw.
 */
export class FakePaymentProvider implements PaymentProvider {
  readonly calls: ProviderCall[] = [];
  readonly customers = new Map<string, { email: string | null; name: string }>();
  readonly subscriptions = new Map<string, ProviderSubscription>();
  readonly invoices = new Map<string, ProviderInvoice>();
  readonly checkoutSessions = new Map<string, ProviderCheckoutSession>();
  failOn: Set<string> = new Set();
  private counter = 0;

  private record(method: string, args: unknown[]): void {
    this.calls.push({ method, args });
    if (this.failOn.has(method)) {
      throw new Error(`${method} failed`);
    }
  }

  callsTo(method: string): unknown[][] {
    return this.calls.filter((c) => c.method === method).map((c) => c.args);
  }

  private nextId(prefix: string): string {
    this.counter += 1;
    return `${prefix}_test_${this.counter}`;
  }

  async findOrCreateCustomer(email: string, name: string): Promise<string> {
    this.record('findOrCreateCustomer', [email, name]);
    for (const [id, customer] of this.customers) {
      if (customer.email === email) return id;
    }
    const id = this.nextId('cus');
    this.customers.set(id, { email, name });
    return id;
  }

  async createCustomer(email: string, name: string): Promise<string> {
    this.record('createCustomer', [email, name]);
    const id = this.nextId('cus');
    this.customers.set(id, { email, name });
    return id;
  }

  async attachDefaultPaymentMethod(customerId: string, paymentMethodId: string): Promise<void> {
    this.record('attachDefaultPaymentMethod', [customerId, paymentMethodId]);
  }

  async createSubscription(customerId: string, plan: PlanInfo): Promise<ProviderSubscription> {
    this.record('createSubscription', [customerId, plan.name]);
    const subscription: ProviderSubscription = {
      id: this.nextId('sub'),
      status: 'active',
      customerId,
      cancelAtPeriodEnd: false,
    };
    this.subscriptions.set(subscription.id, subscription);
    return { ...subscription };
  }

  async retrieveSubscription(subscriptionId: string): Promise<ProviderSubscription> {
    this.record('retrieveSubscription', [subscriptionId]);
    const subscription = this.subscriptions.get(subscriptionId);
    if (!subscription) {
      throw new Error(`No such subscription: ${subscriptionId}`);
    }
    return { ...subscription };
  }

  async setCancelAtPeriodEnd(subscriptionId: string, cancel: boolean): Promise<void> {
    this.record('setCancelAtPeriodEnd', [subscriptionId, cancel]);
    const subscription = this.subscriptions.get(subscriptionId);
    if (subscription) {
      subscription.cancelAtPeriodEnd = cancel;
    }
  }

  async listCustomerSubscriptions(customerId: string, limit: number): Promise<ProviderSubscription[]> {
    this.record('listCustomerSubscriptions', [customerId, limit]);
    return [...this.subscriptions.values()].filter((s) => s.customerId === customerId).slice(0, limit);
  }

  async retrieveInvoice(invoiceId: string): Promise<ProviderInvoice> {
    this.record('retrieveInvoice', [invoiceId]);
    const invoice = this.invoices.get(invoiceId);
    if (!invoice) {
      throw new Error(`No such invoice: ${invoiceId}`);
    }
    return { ...invoice };
  }

  async retrieveCustomerEmail(customerId: string): Promise<string | null> {
    this.record('retrieveCustomerEmail', [customerId]);
    return this.customers.get(customerId)?.email ?? null;
  }

  async createCheckoutSession(request: CheckoutSessionRequest): Promise<ProviderCheckoutSession> {
    this.record('createCheckoutSession', [request]);
    const id = this.nextId('cs');
    const session: ProviderCheckoutSession = {
      id,
      url: `https://checkout.test/${id}`,
      status: 'open',
      paymentStatus: 'unpaid',
      customerId: null,
      customerEmail: request.customerEmail ?? null,
      subscriptionId: null,
      subscriptionStatus: null,
    };
    this.checkoutSessions.set(id, session);
    return { ...session };
  }

  async retrieveCheckoutSession(sessionId: string): Promise<ProviderCheckoutSession> {
    this.record('retrieveCheckoutSession', [sessionId]);
    const session = this.checkoutSessions.get(sessionId);
    if (!session) {
      throw new Error(`No such checkout.session: '${sessionId}'`);
    }
    return { ...session };
  }

  async createPaymentIntent(amount: number, currency: string): Promise<ProviderPaymentIntent> {
    this.record('createPaymentIntent', [amount, currency]);
    const id = this.nextId('pi');
    return { id, clientSecret: `${id}_secret_placeholder` };
  }

  /** Accepts VALID_SIGNATURE over a JSON body `{id, type, data: {object}}`. */
  constructEvent(rawBody: Buffer | string, signature: string): ProviderEvent {
    this.record('constructEvent', [signature]);
    if (signature !== VALID_SIGNATURE) {
      throw new Error('No signatures found matching the expected signature for payload');
    }
    const parsed: unknown = JSON.parse(rawBody.toString());
    if (
      typeof parsed !== 'object' ||
      parsed === null ||
      !('id' in parsed) ||
      typeof parsed.id !== 'string' ||
      !('type' in parsed) ||
      typeof parsed.type !== 'string'
    ) {
      throw new Error('Malformed event');
    }
    const data = 'data' in parsed && typeof parsed.data === 'object' && parsed.data !== null ? parsed.data : {};
    return { id: parsed.id, type: parsed.type, object: 'object' in data ? data.object : undefined };
  }
}

// ===== Server =====

export interface TestApp {
  app: FastifyInstance;
  ctx: AppContext;
  store: MemoryAccountStore;
  listings: MemoryListingSource;
  payments: FakePaymentProvider;
}

export async function buildTestApp(listings: StoredListing[] = [], withPayments = true): Promise<TestApp> {
  const store = new MemoryAccountStore();
  const listingSource = new MemoryListingSource(listings);
  const payments = new FakePaymentProvider();
  const ctx: AppContext = {
    config: testConfig(),
    store,
    listings: listingSource,
    payments: withPayments ? payments : null,
  };
  const app = await buildServer(ctx, { logger: false });
  return { app, ctx, store, listings: listingSource, payments };
}

export function bearer(email: string, ttlMinutes?: number): { authorization: string } {
  return { authorization: `Bearer ${issueToken(testConfig().token, email, ttlMinutes)}` };
}

export const LISTING_IDS = {
  tokyoCheap: '11111111-1111-4111-8111-111111111111',
  tokyoDear: '22222222-2222-4222-8222-222222222222',
  osaka: 'a3333333-3333-4333-8333-33333333cdef',
  priceOnRequest: '44444444-4444-4444-8444-444444444444',
  missing: '99999999-9999-4999-8999-999999999999',
};

/** Four listings over two collections; one has a non-numeric price. */
export function sampleListings(): StoredListing[] {
  return [
    {
      id: LISTING_IDS.tokyoCheap,
      collection: 'listings-suumo',
      doc: {
        Prefecture: 'Tokyo',
        'Building - Layout': '2LDK',
        'Sale Price': 30000000,
        'Building - Area': '65.5 m²',
        'Land - Area': 'N/A',
        'Building - Construction Date': '2010年3月',
        createdAt: '2024-01-01T00:00:00Z',
      },
    },
    {
      id: LISTING_IDS.tokyoDear,
      collection: 'listings-athome',
      doc: {
        Prefecture: 'Tokyo',
        'Building - Layout': '3LDK',
        'Sale Price': 80000000,
        'Building - Area': '120 m²',
        'Land - Area': '150.25 m²',
        'Building - Construction Date': '5 years',
        createdAt: '2024-03-01T00:00:00Z',
      },
    },
    {
      id: LISTING_IDS.osaka,
      collection: 'listings-suumo',
      doc: {
        Prefecture: 'Osaka',
        'Building - Layout': '2LDK',
        'Sale Price': 45000000,
        'Building - Area': '80 m²',
        'Land - Area': '100 m²',
        'Building - Construction Date': '1995',
        createdAt: '2024-02-01T00:00:00Z',
      },
    },
    {
      id: LISTING_IDS.priceOnRequest,
      collection: 'listings-athome',
      doc: {
        Prefecture: 'Tokyo',
        'Building - Layout': '1K',
        'Sale Price': 'Price on request',
        'Building - Area': '25 m²',
        createdAt: '2024-04-01T00:00:00Z',
      },
    },
  ];
}
