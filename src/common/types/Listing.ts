/**
 * A crawled listing document. Field names are the crawler's; values are loosely typed
 * (prices may be strings, areas are free text such as "85.3 m²").
 */
export interface ListingDocument {
  Prefecture?: string;
  'Building - Layout'?: string;
  'Sale Price'?: unknown;
  'Building - Area'?: unknown;
  'Land - Area'?: unknown;
  'Building - Construction Date'?: unknown;
  createdAt?: string;
  [field: string]: unknown;
}

export default interface Listing extends ListingDocument {
  _id: string;
  /** index (crawl source) the listing was found in */
  collection: string;
  building_area_numeric: number | null;
  land_area_numeric: number | null;
  construction_year: number | null;
}

export interface ListingPage {
  results: Listing[];
  total_count: number;
  total_pages: number;
  current_page: number;
}
