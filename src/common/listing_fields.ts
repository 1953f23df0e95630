/**
 * Crawler field names and the numeric values derived from them.
 *
 * The same extraction rules run inside Elasticsearch as runtime-field scripts (see db/es_query.ts);
 * keep the two in step.
 */

import type Listing from './types/Listing.js';
import type { ListingDocument } from './types/Listing.js';

export const LISTING_FIELDS = {
  prefecture: 'Prefecture',
  layout: 'Building - Layout',
  salePrice: 'Sale Price',
  buildingArea: 'Building - Area',
  landArea: 'Land - Area',
  constructionDate: 'Building - Construction Date',
  createdAt: 'createdAt',
} as const;

/** Fields returned by the list endpoint. Get-by-id returns the whole document. */
export const LISTING_PROJECTION: readonly string[] = [
  'Prefecture',
  'Building - Layout',
  'Sale Price',
  'link',
  'Building - Area',
  'Land - Area',
  'Building - Construction Date',
  'Building - Structure',
  'Property Type',
  'Property Location',
  'Transportation',
  'createdAt',
  'images',
  'Contact Number',
  'Reference URL',
];

export const FIRST_NUMBER_PATTERN = /([0-9]+(?:\.[0-9]+)?)/;
export const FOUR_DIGIT_YEAR_PATTERN = /(\d{4})/;
export const YEARS_AGO_PATTERN = /(\d+)\s*years?/;

function asText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return null;
}

/**
 * First numeric token of a free-text measurement, e.g. "85.3 m²" -> 85.3.
 * Returns null when the field is missing or has no number ("N/A").
 */
export function extractFirstNumber(value: unknown): number | null {
  const text = asText(value);
  if (text === null) return null;
  const match = FIRST_NUMBER_PATTERN.exec(text);
  return match ? parseFloat(match[1]) : null;
}

/**
 * Construction year from text holding either a 4-digit year ("2015", "1990年") or an age
 * ("10 years" -> currentYear - 10). The year wins when both appear. Null when neither matches.
 */
export function extractConstructionYear(value: unknown, currentYear: number): number | null {
  const text = asText(value);
  if (!text) return null;
  const year = FOUR_DIGIT_YEAR_PATTERN.exec(text);
  if (year) {
    return parseInt(year[1], 10);
  }
  const age = YEARS_AGO_PATTERN.exec(text);
  if (age) {
    return currentYear - parseInt(age[1], 10);
  }
  return null;
}

/** Only JSON numbers count as prices; "¥12,000,000" or "negotiable" do not. */
export function numericPrice(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/** A stored document with its id, source collection and derived numbers. */
export function toListing(doc: ListingDocument, id: string, collection: string, currentYear: number): Listing {
  return {
    ...doc,
    _id: id,
    collection,
    building_area_numeric: extractFirstNumber(doc[LISTING_FIELDS.buildingArea]),
    land_area_numeric: extractFirstNumber(doc[LISTING_FIELDS.landArea]),
    construction_year: extractConstructionYear(doc[LISTING_FIELDS.constructionDate], currentYear),
  };
}
