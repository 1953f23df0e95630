/**
 * Read access to crawled listings. db_es.ts provides the Elasticsearch implementation (esListingSource).
 */

import type Listing from '../common/types/Listing.js';

export interface NumericRange {
  min?: number;
  max?: number;
}

export type ListingSortKey = 'createdAt' | 'sale_price';
export type SortOrder = 'asc' | 'desc';

/** A normalised listing search. Ranges are inclusive; an empty range does not filter. */
export interface ListingQuery {
  prefecture?: string;
  layout?: string;
  salePrice: NumericRange;
  buildingArea: NumericRange;
  landArea: NumericRange;
  constructionYear: NumericRange;
  sortBy: ListingSortKey;
  sortOrder: SortOrder;
  /** 1-based */
  page: number;
  limit: number;
}

export interface ListingSource {
  /**
   * One page of matching listings across every source, sorted as requested.
   * `currentYear` resolves "N years" construction dates.
   */
  search(query: ListingQuery, currentYear: number): Promise<Listing[]>;
  /** Number of listings matching the query's filters, ignoring page and limit. */
  count(query: ListingQuery, currentYear: number): Promise<number>;
  findById(id: string, currentYear: number): Promise<Listing | null>;
}
