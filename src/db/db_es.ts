/**
 * Elasticsearch access to crawled listings. Each crawl source writes its own index; all of them
 * match one index pattern (LISTINGS_INDEX_PATTERN) and are searched together.
 *
 * Lifecycle: Call initClient() before any operations, closeClient() during shutdown.
 * All functions throw if client not initialized.
 */

import { Client } from '@elastic/elasticsearch';
import type { estypes } from '@elastic/elasticsearch';
import type { ListingDocument } from '../common/types/Listing.js';
import type Listing from '../common/types/Listing.js';
import { LISTING_FIELDS, toListing } from '../common/listing_fields.js';
import { listingByIdSearch, listingQueryToEsCount, listingQueryToEsSearch } from './es_query.js';
import type { ListingQuery, ListingSource } from './listing_source.js';

let client: Client | null = null;
let indexPattern = 'listings-*';

const LISTING_TEMPLATE = 'listings_template';

/**
 * Initialize Elasticsearch client. Must be called before any operations.
 */
export function initClient(elasticsearchUrl: string = 'http://localhost:9200', listingsIndexPattern?: string): void {
  client = new Client({
    node: elasticsearchUrl,
    requestTimeout: 10000,
  });
  if (listingsIndexPattern) {
    indexPattern = listingsIndexPattern;
  }
}

export function getClient(): Client {
  if (!client) {
    throw new Error('Elasticsearch client not initialized. Call initClient() first.');
  }
  return client;
}

export async function closeClient(): Promise<void> {
  if (client) {
    await client.close();
    client = null;
  }
}

/**
 * Install the index template for listing indices. Safe to call multiple times.
 * Only the filter fields are indexed; the numbers come from runtime fields over _source.
 * Indices created before the template keep their own mappings.
 */
export async function ensureListingTemplate(): Promise<void> {
  await getClient().indices.putIndexTemplate({
    name: LISTING_TEMPLATE,
    index_patterns: [indexPattern],
    template: {
      settings: {
        number_of_shards: 1,
        number_of_replicas: 0,
      },
      mappings: {
        dynamic: false,
        properties: {
          [LISTING_FIELDS.prefecture]: { type: 'keyword' },
          [LISTING_FIELDS.layout]: { type: 'keyword' },
          [LISTING_FIELDS.createdAt]: { type: 'date' },
        },
      },
    },
  });
}

function totalHits(total: number | estypes.SearchTotalHits | undefined): number {
  if (total === undefined) return 0;
  return typeof total === 'number' ? total : total.value;
}

function hitsToListings(hits: estypes.SearchHit<ListingDocument>[], currentYear: number): Listing[] {
  const listings: Listing[] = [];
  for (const hit of hits) {
    if (!hit._id) continue;
    listings.push(toListing(hit._source ?? {}, hit._id, hit._index, currentYear));
  }
  return listings;
}

export async function searchListings(query: ListingQuery, currentYear: number): Promise<Listing[]> {
  const result = await getClient().search<ListingDocument>(listingQueryToEsSearch(query, indexPattern, currentYear));
  return hitsToListings(result.hits.hits, currentYear);
}

export async function countListings(query: ListingQuery, currentYear: number): Promise<number> {
  const result = await getClient().search<ListingDocument>(listingQueryToEsCount(query, indexPattern, currentYear));
  return totalHits(result.hits.total);
}

/**
 * @returns the whole stored document, or null if no listing index holds the id
 */
export async function getListingById(id: string, currentYear: number): Promise<Listing | null> {
  const result = await getClient().search<ListingDocument>(listingByIdSearch(id, indexPattern));
  return hitsToListings(result.hits.hits, currentYear)[0] ?? null;
}

export const esListingSource: ListingSource = {
  search: searchListings,
  count: countListings,
  findById: getListingById,
};
