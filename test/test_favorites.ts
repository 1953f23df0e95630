import tap from 'tap';
import { addFavorite, cleanListingId, listFavoriteIds, removeFavorite } from '../src/services/favorites.js';
import { LISTING_IDS, MemoryAccountStore, MemoryListingSource, sampleListings } from './utils-for-tests.js';

function setup() {
  const store = new MemoryAccountStore();
  const listings = new MemoryListingSource(sampleListings());
  const user = store.addUser({ email: 'fan@example.com' });
  return { store, listings, user };
}

tap.test('cleanListingId - strips whitespace and quotes', t => {
  t.equal(cleanListingId(`  "${LISTING_IDS.osaka}" `), LISTING_IDS.osaka);
  t.equal(cleanListingId(`'${LISTING_IDS.osaka}'`), LISTING_IDS.osaka);
  t.equal(cleanListingId(LISTING_IDS.osaka), LISTING_IDS.osaka);
  t.end();
});

tap.test('addFavorite - stores the cleaned id', async t => {
  const { store, listings, user } = setup();
  const favorite = await addFavorite(store, listings, user.id, { listing_id: ` "${LISTING_IDS.osaka}"` });
  t.equal(favorite.user_id, user.id);
  t.equal(favorite.listing_id, LISTING_IDS.osaka);
  t.same(await listFavoriteIds(store, user.id), { favorites: [LISTING_IDS.osaka] });
});

tap.test('addFavorite - uppercase ids are stored lowercase', async t => {
  const { store, listings, user } = setup();
  const favorite = await addFavorite(store, listings, user.id, { listing_id: LISTING_IDS.osaka.toUpperCase() });
  t.equal(favorite.listing_id, LISTING_IDS.osaka);
  t.same(await removeFavorite(store, user.id, LISTING_IDS.osaka.toUpperCase()), {
    user_id: user.id,
    listing_id: LISTING_IDS.osaka,
  });
  t.same(await listFavoriteIds(store, user.id), { favorites: [] });
});

tap.test('addFavorite - listings with non-numeric prices can still be favorited', async t => {
  const { store, listings, user } = setup();
  const favorite = await addFavorite(store, listings, user.id, { listing_id: LISTING_IDS.priceOnRequest });
  t.equal(favorite.listing_id, LISTING_IDS.priceOnRequest);
});

tap.test('addFavorite - rejects bad ids, missing listings and duplicates', async t => {
  const { store, listings, user } = setup();
  await t.rejects(addFavorite(store, listings, user.id, { listing_id: 'abc' }), {
    statusCode: 400,
    message: 'Invalid listing ID format',
  });
  await t.rejects(addFavorite(store, listings, user.id, { listing_id: LISTING_IDS.missing }), {
    statusCode: 404,
    message: 'Listing not found',
  });
  await addFavorite(store, listings, user.id, { listing_id: LISTING_IDS.tokyoCheap });
  await t.rejects(addFavorite(store, listings, user.id, { listing_id: LISTING_IDS.tokyoCheap }), {
    statusCode: 400,
    message: 'Already favoriting this listing',
  });
  t.equal(store.favorites.length, 1);
});

tap.test('favorites are per user', async t => {
  const { store, listings, user } = setup();
  const other = store.addUser({ email: 'other-fan@example.com' });
  await addFavorite(store, listings, user.id, { listing_id: LISTING_IDS.tokyoCheap });
  await addFavorite(store, listings, other.id, { listing_id: LISTING_IDS.tokyoCheap });
  await addFavorite(store, listings, other.id, { listing_id: LISTING_IDS.osaka });
  t.same(await listFavoriteIds(store, user.id), { favorites: [LISTING_IDS.tokyoCheap] });
  t.same(await listFavoriteIds(store, other.id), { favorites: [LISTING_IDS.tokyoCheap, LISTING_IDS.osaka] });
});

tap.test('removeFavorite - idempotent', async t => {
  const { store, listings, user } = setup();
  await addFavorite(store, listings, user.id, { listing_id: LISTING_IDS.osaka });
  t.same(await removeFavorite(store, user.id, LISTING_IDS.osaka), { user_id: user.id, listing_id: LISTING_IDS.osaka });
  t.same(await removeFavorite(store, user.id, LISTING_IDS.osaka), { user_id: user.id, listing_id: LISTING_IDS.osaka });
  t.same(await listFavoriteIds(store, user.id), { favorites: [] });
});
