/**
 * Listing search and lookup: request parameters -> ListingQuery -> one page plus totals.
 */

import { z } from 'zod';
import { BadRequestError, NotFoundError } from '../common/errors.js';
import type Listing from '../common/types/Listing.js';
import type { ListingPage } from '../common/types/Listing.js';
import { canonicalUuid, isUuid } from '../common/utils/ids.js';
import type { ListingQuery, ListingSource, NumericRange } from '../db/listing_source.js';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

const optionalText = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const bound = z.coerce.number().int().optional();

/** Query-string parameters of the listing search. */
export const ListingParamsSchema = z.object({
  prefecture: optionalText,
  layout: optionalText,
  sale_price_min: bound,
  sale_price_max: bound,
  building_area_min: bound,
  building_area_max: bound,
  land_area_min: bound,
  land_area_max: bound,
  construction_year_min: bound,
  construction_year_max: bound,
  sort_by: z.enum(['createdAt', 'sale_price']).default('createdAt'),
  sort_order: z.enum(['asc', 'desc']).default('desc'),
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
});

export type ListingParams = z.infer<typeof ListingParamsSchema>;

function range(min: number | undefined, max: number | undefined): NumericRange {
  const r: NumericRange = {};
  if (min !== undefined) r.min = min;
  if (max !== undefined) r.max = max;
  return r;
}

export function buildListingQuery(params: ListingParams): ListingQuery {
  return {
    prefecture: params.prefecture,
    layout: params.layout,
    salePrice: range(params.sale_price_min, params.sale_price_max),
    buildingArea: range(params.building_area_min, params.building_area_max),
    landArea: range(params.land_area_min, params.land_area_max),
    constructionYear: range(params.construction_year_min, params.construction_year_max),
    sortBy: params.sort_by,
    sortOrder: params.sort_order,
    page: params.page,
    limit: params.limit,
  };
}

/**
 * @param params raw query-string values
 * @throws ZodError for out-of-range or malformed parameters
 */
export async function searchListings(params: unknown, source: ListingSource, now: Date = new Date()): Promise<ListingPage> {
  const query = buildListingQuery(ListingParamsSchema.parse(params));
  const currentYear = now.getUTCFullYear();
  const [totalCount, results] = await Promise.all([
    source.count(query, currentYear),
    source.search(query, currentYear),
  ]);
  return {
    results,
    total_count: totalCount,
    total_pages: Math.ceil(totalCount / query.limit),
    current_page: query.page,
  };
}

/**
 * @throws BadRequestError if the id is not a UUID
 * @throws NotFoundError if no listing source holds it
 */
export async function getListing(id: string, source: ListingSource, now: Date = new Date()): Promise<Listing> {
  if (!isUuid(id)) {
    throw new BadRequestError('Invalid listing ID format');
  }
  const listing = await source.findById(canonicalUuid(id), now.getUTCFullYear());
  if (!listing) {
    throw new NotFoundError('Listing not found');
  }
  return listing;
}
