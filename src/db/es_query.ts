/**
 * Elasticsearch query building for listing search.
 * Converts ListingQuery objects to search requests over the listing index pattern.
 *
 * Crawled values are free text, so the numbers filtered and sorted on are runtime fields computed
 * from _source by painless scripts. They follow the rules in common/listing_fields.ts.
 */

import type { estypes } from '@elastic/elasticsearch';
import { LISTING_FIELDS, LISTING_PROJECTION } from '../common/listing_fields.js';
import type { ListingQuery, NumericRange } from './listing_source.js';

export const SALE_PRICE_NUMERIC = 'sale_price_numeric';
export const BUILDING_AREA_NUMERIC = 'building_area_numeric';
export const LAND_AREA_NUMERIC = 'land_area_numeric';
export const CONSTRUCTION_YEAR = 'construction_year';

/** Emits the first number in a text (or numeric) source field. */
const FIRST_NUMBER_SCRIPT = `
    def v = params._source[params.field];
    if (v instanceof String || v instanceof Number) {
      Matcher m = /([0-9]+(?:\\.[0-9]+)?)/.matcher(v.toString());
      if (m.find()) {
        emit(Double.parseDouble(m.group(1)));
      }
    }`;

const CONSTRUCTION_YEAR_SCRIPT = `
    def v = params._source[params.field];
    if (v instanceof String || v instanceof Number) {
      String s = v.toString();
      if (!s.isEmpty()) {
        Matcher year = /(\\d{4})/.matcher(s);
        if (year.find()) {
          emit(Long.parseLong(year.group(1)));
        } else {
          Matcher age = /(\\d+)\\s*years?/.matcher(s);
          if (age.find()) {
            emit(params.currentYear - Long.parseLong(age.group(1)));
          }
        }
      }
    }`;

const SALE_PRICE_SCRIPT = `
    def v = params._source[params.field];
    if (v instanceof Number) {
      emit(((Number) v).doubleValue());
    }`;

/**
 * Runtime fields for one search. `currentYear` is a parameter so "10 years" resolves against the request's clock.
 */
export function listingRuntimeMappings(currentYear: number): estypes.MappingRuntimeFields {
  return {
    [SALE_PRICE_NUMERIC]: {
      type: 'double',
      script: { source: SALE_PRICE_SCRIPT, params: { field: LISTING_FIELDS.salePrice } },
    },
    [BUILDING_AREA_NUMERIC]: {
      type: 'double',
      script: { source: FIRST_NUMBER_SCRIPT, params: { field: LISTING_FIELDS.buildingArea } },
    },
    [LAND_AREA_NUMERIC]: {
      type: 'double',
      script: { source: FIRST_NUMBER_SCRIPT, params: { field: LISTING_FIELDS.landArea } },
    },
    [CONSTRUCTION_YEAR]: {
      type: 'long',
      script: {
        source: CONSTRUCTION_YEAR_SCRIPT,
        params: { field: LISTING_FIELDS.constructionDate, currentYear },
      },
    },
  };
}

function rangeFilter(field: string, range: NumericRange): estypes.QueryDslQueryContainer | null {
  if (range.min === undefined && range.max === undefined) {
    return null;
  }
  const bounds: estypes.QueryDslNumberRangeQuery = {};
  if (range.min !== undefined) bounds.gte = range.min;
  if (range.max !== undefined) bounds.lte = range.max;
  return { range: { [field]: bounds } };
}

/**
 * Filters shared by the page search and the count.
 * Listings without a numeric sale price are always excluded.
 */
export function listingQueryToEsQuery(query: ListingQuery): estypes.QueryDslQueryContainer {
  const filter: estypes.QueryDslQueryContainer[] = [{ exists: { field: SALE_PRICE_NUMERIC } }];

  if (query.prefecture) {
    filter.push({ term: { [LISTING_FIELDS.prefecture]: query.prefecture } });
  }
  if (query.layout) {
    filter.push({ term: { [LISTING_FIELDS.layout]: query.layout } });
  }

  const ranges = [
    rangeFilter(SALE_PRICE_NUMERIC, query.salePrice),
    rangeFilter(BUILDING_AREA_NUMERIC, query.buildingArea),
    rangeFilter(LAND_AREA_NUMERIC, query.landArea),
    rangeFilter(CONSTRUCTION_YEAR, query.constructionYear),
  ];
  for (const range of ranges) {
    if (range) filter.push(range);
  }

  return { bool: { filter } };
}

export function listingSort(query: ListingQuery): estypes.SortCombinations[] {
  if (query.sortBy === 'sale_price') {
    return [{ [SALE_PRICE_NUMERIC]: { order: query.sortOrder } }];
  }
  return [{ [LISTING_FIELDS.createdAt]: { order: query.sortOrder, unmapped_type: 'date' } }];
}

export function listingOffset(query: ListingQuery): number {
  return (query.page - 1) * query.limit;
}

/**
 * One page of listings across every index matching `indexPattern`.
 */
export function listingQueryToEsSearch(
  query: ListingQuery,
  indexPattern: string,
  currentYear: number
): estypes.SearchRequest {
  return {
    index: indexPattern,
    ignore_unavailable: true,
    allow_no_indices: true,
    runtime_mappings: listingRuntimeMappings(currentYear),
    query: listingQueryToEsQuery(query),
    _source: [...LISTING_PROJECTION],
    sort: listingSort(query),
    from: listingOffset(query),
    size: query.limit,
    track_total_hits: false,
  };
}

/**
 * The same filters with no hits returned; the total is exact.
 */
export function listingQueryToEsCount(
  query: ListingQuery,
  indexPattern: string,
  currentYear: number
): estypes.SearchRequest {
  return {
    index: indexPattern,
    ignore_unavailable: true,
    allow_no_indices: true,
    runtime_mappings: listingRuntimeMappings(currentYear),
    query: listingQueryToEsQuery(query),
    size: 0,
    track_total_hits: true,
  };
}

/** Look up one listing by _id in every listing index. */
export function listingByIdSearch(id: string, indexPattern: string): estypes.SearchRequest {
  return {
    index: indexPattern,
    ignore_unavailable: true,
    allow_no_indices: true,
    query: { ids: { values: [id] } },
    size: 1,
  };
}
