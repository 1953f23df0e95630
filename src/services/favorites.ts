/**
 * Per-user favorite listings.
 */

import { z } from 'zod';
import { BadRequestError, NotFoundError } from '../common/errors.js';
import type { Favorite } from '../common/types/index.js';
import { canonicalUuid, isUuid } from '../common/utils/ids.js';
import { AccountStore, DuplicateFavoriteError } from '../db/account_store.js';
import type { ListingSource } from '../db/listing_source.js';

export const CreateFavoriteSchema = z.object({
  listing_id: z.string({ required_error: 'listing_id is required' }),
});

const ALREADY_FAVORITED = 'Already favoriting this listing';

/** Clients sometimes send the id JSON-quoted or padded. */
export function cleanListingId(raw: string): string {
  return raw.trim().replace(/^["']+|["']+$/g, '').trim();
}

/**
 * @throws BadRequestError for a malformed id or a duplicate
 * @throws NotFoundError if no listing source holds the id
 */
export async function addFavorite(
  store: AccountStore,
  listings: ListingSource,
  userId: string,
  body: unknown,
  now: Date = new Date()
): Promise<Favorite> {
  const rawId = cleanListingId(CreateFavoriteSchema.parse(body).listing_id);
  if (!isUuid(rawId)) {
    throw new BadRequestError('Invalid listing ID format');
  }
  const listingId = canonicalUuid(rawId);
  if (!(await listings.findById(listingId, now.getUTCFullYear()))) {
    throw new NotFoundError('Listing not found');
  }
  if (await store.getFavorite(userId, listingId)) {
    throw new BadRequestError(ALREADY_FAVORITED);
  }
  try {
    return await store.createFavorite(userId, listingId);
  } catch (error) {
    if (error instanceof DuplicateFavoriteError) {
      throw new BadRequestError(ALREADY_FAVORITED);
    }
    throw error;
  }
}

export async function listFavoriteIds(store: AccountStore, userId: string): Promise<{ favorites: string[] }> {
  const favorites = await store.listFavorites(userId);
  return { favorites: favorites.map((f) => f.listing_id) };
}

/** Succeeds whether or not the favorite existed. */
export async function removeFavorite(
  store: AccountStore,
  userId: string,
  listingId: string
): Promise<{ user_id: string; listing_id: string }> {
  const id = isUuid(listingId) ? canonicalUuid(listingId) : listingId;
  await store.deleteFavorite(userId, id);
  return { user_id: userId, listing_id: id };
}
