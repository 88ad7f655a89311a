import assert from 'node:assert/strict';
import { EventType } from '../src/backend/events/eventNotifier';
import { InvariantViolationError } from '../src/backend/models/errors';
import { AlbumType, VARIOUS_ARTISTS_ID } from '../src/backend/models/mediaItems';
import { ProviderFeature } from '../src/backend/provider/types';
import { mergeListingDuplicates } from '../src/backend/music/base';
import { FailingCacheStore, FakeProvider, createTestMusic } from './support';

async function testAddIsIdempotent() {
  const { music, db, received } = createTestMusic();
  const streaming = new FakeProvider('streaming', 'streaming--1');
  const queen = streaming.addArtist('q1', 'Queen');

  const first = await music.artists.add(queen);
  const second = await music.artists.add(queen);

  assert.equal(second.itemId, first.itemId);
  assert.equal(first.provider, 'library');
  assert.deepEqual(first.providerMappings, [
    { itemId: 'q1', providerDomain: 'streaming', providerInstance: 'streaming--1' },
  ]);
  assert.equal(await db.count('artists'), 1);
  assert.equal(await db.count('provider_mappings'), 1);
  assert.deepEqual(
    received.map((event) => `${event.event} ${event.uri}`),
    [
      `${EventType.MEDIA_ITEM_ADDED} library://artist/${first.itemId}`,
      `${EventType.MEDIA_ITEM_UPDATED} library://artist/${first.itemId}`,
    ],
  );
}

async function testConcurrentAddsConverge() {
  const { music, db } = createTestMusic();
  const items = [1, 2, 3, 4, 5].map((n) =>
    new FakeProvider(`service${n}`, `service${n}--1`).addArtist(`x${n}`, 'Nina Simone', { externalId: 'mbid-nina' }),
  );

  const stored = await Promise.all(items.map((item) => music.artists.add(item)));

  assert.equal(new Set(stored.map((item) => item.itemId)).size, 1);
  assert.equal(await db.count('artists'), 1);
  const [artist] = (await music.artists.libraryItems()).items;
  assert.equal(artist.providerMappings.length, 5);
  assert.equal(await db.count('provider_mappings'), 5);
}

async function testItemsWithoutMappingsAreRejected() {
  const { music, db } = createTestMusic();
  const streaming = new FakeProvider('streaming', 'streaming--1');
  const orphan = { ...streaming.addArtist('o1', 'Orphan'), providerMappings: [] };

  await assert.rejects(() => music.artists.add(orphan), InvariantViolationError);
  assert.equal(await db.count('artists'), 0);
  assert.equal(await db.count('provider_mappings'), 0);

  const stored = await music.artists.add(streaming.addArtist('o2', 'Orphan'));
  await assert.rejects(
    () => music.artists.update(stored.itemId, { ...stored, providerMappings: [] }),
    InvariantViolationError,
  );
  assert.equal((await music.artists.getLibraryItem(stored.itemId)).providerMappings.length, 1);
}

async function testFileProvidersWinDisplayFields() {
  const { music } = createTestMusic();
  const streaming = new FakeProvider('streaming', 'streaming--1');
  const files = new FakeProvider('filesystem_local', 'filesystem_local--1');

  const stored = await music.artists.add(streaming.addArtist('s1', 'Queen'));
  const fromFiles = await music.artists.update(stored.itemId, files.addArtist('f1', 'Queen (Band)'));
  assert.equal(fromFiles.name, 'Queen (Band)');
  assert.equal(fromFiles.sortName, 'queen (band)');

  const fromStreaming = await music.artists.update(stored.itemId, streaming.addArtist('s2', 'QUEEN Official'));
  assert.equal(fromStreaming.name, 'Queen (Band)');
  assert.equal(fromStreaming.sortName, 'queen (band)');
  assert.deepEqual(
    fromStreaming.providerMappings.map((mapping) => `${mapping.providerDomain}/${mapping.itemId}`),
    ['streaming/s1', 'filesystem_local/f1', 'streaming/s2'],
  );

  const edited = await music.artists.update(stored.itemId, { ...fromStreaming, name: 'Queen' }, { overwrite: true });
  assert.equal(edited.name, 'Queen');
  assert.equal(edited.sortName, 'queen');
}

async function testVariousArtistsIsCanonical() {
  const { music, db } = createTestMusic();
  const first = await music.artists.add(new FakeProvider('streaming', 'streaming--1').addArtist('va1', 'various artists'));
  assert.equal(first.name, 'Various Artists');
  assert.equal(first.sortName, 'various artists');
  assert.equal(first.externalId, VARIOUS_ARTISTS_ID);

  const second = await music.artists.add(new FakeProvider('other', 'other--1').addArtist('va2', 'VARIOUS-ARTISTS'));
  assert.equal(second.itemId, first.itemId);
  assert.equal(second.name, 'Various Artists');
  assert.equal(await db.count('artists'), 1);

  const byId = await music.artists.add(
    new FakeProvider('third', 'third--1').addArtist('va3', 'V.A.', { externalId: VARIOUS_ARTISTS_ID }),
  );
  assert.equal(byId.itemId, first.itemId);
  assert.equal(byId.name, 'Various Artists');
}

async function testListingCacheFollowsChecksum() {
  const { music, providers } = createTestMusic();
  const streaming = new FakeProvider('streaming', 'streaming--1', [ProviderFeature.ARTIST_TOPTRACKS]);
  providers.register(streaming);
  const queen = streaming.addArtist('q1', 'Queen', { metadata: { checksum: 'c1' } });
  streaming.addTrack('t1', 'Bohemian Rhapsody', [queen]);
  streaming.topTracks.set('q1', ['t1']);

  const first = await music.artists.tracks(queen);
  const second = await music.artists.tracks(queen);
  assert.equal(streaming.count('getArtistTopTracks'), 1);
  assert.deepEqual(
    second.map((track) => track.name),
    first.map((track) => track.name),
  );
  assert.deepEqual(
    second.map((track) => track.name),
    ['Bohemian Rhapsody'],
  );

  await music.artists.tracks({ ...queen, metadata: { checksum: 'c2' } });
  assert.equal(streaming.count('getArtistTopTracks'), 2);
}

async function testCacheWriteFailureKeepsListing() {
  const { music, providers } = createTestMusic({ cache: new FailingCacheStore() });
  const streaming = new FakeProvider('streaming', 'streaming--1', [ProviderFeature.ARTIST_TOPTRACKS]);
  providers.register(streaming);
  const queen = streaming.addArtist('q1', 'Queen');
  streaming.addTrack('t1', 'Bohemian Rhapsody', [queen]);
  streaming.topTracks.set('q1', ['t1']);

  const tracks = await music.artists.tracks(queen);
  assert.deepEqual(
    tracks.map((track) => track.name),
    ['Bohemian Rhapsody'],
  );
}

async function testMatchingRequiresExactAgreement() {
  const { music, providers } = createTestMusic();
  const home = new FakeProvider('home', 'home--1', [ProviderFeature.SEARCH, ProviderFeature.ARTIST_TOPTRACKS]);
  const tribute = new FakeProvider('tribute', 'tribute--1');
  providers.register(home);
  providers.register(tribute);

  const queen = home.addArtist('h-queen', 'Queen');
  home.addTrack('h-t1', 'Bohemian Rhapsody', [queen]);
  home.topTracks.set('h-queen', ['h-t1']);
  const cover = tribute.addArtist('t-band', 'Queen Tribute Band');
  tribute.addTrack('t-t1', 'Bohemian Rhapsody', [cover]);

  const stored = await music.artists.add(queen);
  const report = await music.artists.match(stored);
  assert.deepEqual(report, { matched: [], unmatched: ['tribute--1'] });
  const unchanged = await music.artists.getLibraryItem(stored.itemId);
  assert.equal(unchanged.providerMappings.length, 1);

  const mirror = new FakeProvider('mirror', 'mirror--1');
  providers.register(mirror);
  const mirrorQueen = mirror.addArtist('m-queen', 'Queen');
  mirror.addTrack('m-t1', 'Bohemian Rhapsody', [mirrorQueen]);

  const second = await music.artists.match(unchanged);
  assert.deepEqual(second, { matched: ['mirror--1'], unmatched: ['tribute--1'] });
  const matched = await music.artists.getLibraryItem(stored.itemId);
  assert.deepEqual(
    matched.providerMappings.map((mapping) => mapping.providerInstance),
    ['home--1', 'mirror--1'],
  );
  assert.equal(mirror.count('getArtist'), 1);
}

/**
 * Library artist known only through a library album on a provider without listings, plus a mirror
 * provider carrying `mirrorAlbumArtist`'s "Time Out".
 */
async function matchThroughAlbums(albumType: AlbumType, mirrorAlbumArtist: string) {
  const { music, providers } = createTestMusic();
  const home = new FakeProvider('home', 'home--1', []);
  const mirror = new FakeProvider('mirror', 'mirror--1');
  providers.register(home);
  providers.register(mirror);

  const artist = home.addArtist('a1', 'Dave Brubeck');
  await music.albums.add(home.addAlbum('al1', 'Time Out', [artist], { albumType }));
  mirror.addArtist('m-brubeck', 'Dave Brubeck');
  const credited = mirror.addArtist('m-credited', mirrorAlbumArtist);
  mirror.addAlbum('m-al1', 'Time Out', [credited]);

  const [stored] = (await music.artists.libraryItems()).items;
  const report = await music.artists.match(stored);
  const after = await music.artists.getLibraryItem(stored.itemId);
  return { report, mirror, mappings: after.providerMappings.map((mapping) => mapping.providerInstance) };
}

async function testArtistMatchFallsBackToAlbums() {
  const matched = await matchThroughAlbums(AlbumType.ALBUM, 'Dave Brubeck');
  assert.deepEqual(matched.report, { matched: ['mirror--1'], unmatched: [] });
  assert.deepEqual(matched.mappings, ['home--1', 'mirror--1']);

  const compilation = await matchThroughAlbums(AlbumType.COMPILATION, 'Dave Brubeck');
  assert.deepEqual(compilation.report, { matched: [], unmatched: ['mirror--1'] });
  assert.equal(compilation.mirror.count('search'), 0);

  const otherArtist = await matchThroughAlbums(AlbumType.ALBUM, 'Paul Desmond');
  assert.deepEqual(otherArtist.report, { matched: [], unmatched: ['mirror--1'] });
  assert.deepEqual(otherArtist.mappings, ['home--1']);
  assert.equal(otherArtist.mirror.count('search'), 3);
}

async function testDeleteGuardsDependents() {
  const { music, db } = createTestMusic();
  const home = new FakeProvider('home', 'home--1');
  const artist = home.addArtist('a1', 'Nick Drake');
  const album = home.addAlbum('al1', 'Pink Moon', [artist]);
  await music.tracks.add(home.addTrack('t1', 'Pink Moon', [artist], album));

  const counts = async () => [
    await db.count('artists'),
    await db.count('albums'),
    await db.count('tracks'),
    await db.count('provider_mappings'),
  ];
  assert.deepEqual(await counts(), [1, 1, 1, 3]);

  const [libraryArtist] = (await music.artists.libraryItems()).items;
  await assert.rejects(() => music.artists.delete(libraryArtist.itemId), InvariantViolationError);
  assert.deepEqual(await counts(), [1, 1, 1, 3]);

  await music.artists.delete(libraryArtist.itemId, { recursive: true });
  assert.deepEqual(await counts(), [0, 0, 0, 0]);
}

async function testRecursiveDeleteStopsOnDependentFailure() {
  const { music, db } = createTestMusic();
  const home = new FakeProvider('home', 'home--1');
  await music.albums.add(home.addAlbum('al1', 'Bryter Layter', [home.addArtist('a1', 'Nick Drake')]));
  music.albums.delete = async () => {
    throw new Error('disk full');
  };

  const [artist] = (await music.artists.libraryItems()).items;
  await assert.rejects(() => music.artists.delete(artist.itemId, { recursive: true }), /disk full/);
  assert.equal(await db.count('artists'), 1);
  assert.equal(await db.count('albums'), 1);
  assert.equal((await music.artists.getLibraryItem(artist.itemId)).name, 'Nick Drake');
}

async function testListingMergeOrsLibraryFlag() {
  const one = new FakeProvider('one', 'one--1');
  const two = new FakeProvider('two', 'two--1');
  const fromOne = one.addAlbum('x', 'Blue', [one.addArtist('ja', 'Joni Mitchell')], { inLibrary: false });
  const fromTwo = two.addAlbum('y', 'Blue', [two.addArtist('jb', 'Joni Mitchell')], { inLibrary: true });

  const merged = mergeListingDuplicates([fromOne, fromTwo]);
  assert.equal(merged.length, 1);
  assert.equal(merged[0].inLibrary, true);
  assert.deepEqual(
    merged[0].providerMappings.map((mapping) => mapping.providerInstance),
    ['one--1', 'two--1'],
  );

  const reversed = mergeListingDuplicates([fromTwo, fromOne]);
  assert.equal(reversed[0].inLibrary, true);
}

async function testFanOutToleratesFailingProvider() {
  const { music, providers } = createTestMusic();
  const one = new FakeProvider('one', 'one--1', [ProviderFeature.ARTIST_ALBUMS]);
  const two = new FakeProvider('two', 'two--1', [ProviderFeature.ARTIST_ALBUMS]);
  providers.register(one);
  providers.register(two);
  const joni = one.addArtist('ja', 'Joni Mitchell');
  one.addAlbum('x', 'Blue', [joni]);
  one.artistAlbums.set('ja', ['x']);
  const joniOnTwo = two.addArtist('jb', 'Joni Mitchell');
  two.failing.add('getArtistAlbums');

  const artist = { ...joni, providerMappings: [...joni.providerMappings, ...joniOnTwo.providerMappings] };
  const albums = await music.artists.albums(artist);
  assert.deepEqual(
    albums.map((album) => album.name),
    ['Blue'],
  );
  assert.equal(two.count('getArtistAlbums'), 1);
}

async function testFailingListenerDoesNotBreakWrites() {
  const { music, events, received } = createTestMusic();
  events.subscribe(() => {
    throw new Error('listener crashed');
  });

  const stored = await music.artists.add(new FakeProvider('home', 'home--1').addArtist('a1', 'Nick Drake'));
  assert.equal(stored.name, 'Nick Drake');
  assert.equal(received.length, 1);
}

async function testAbortedMatchKeepsAddEvent() {
  const { music, db, providers, received } = createTestMusic();
  const home = new FakeProvider('home', 'home--1', [ProviderFeature.ARTIST_TOPTRACKS]);
  const mirror = new FakeProvider('mirror', 'mirror--1');
  providers.register(home);
  providers.register(mirror);
  const artist = home.addArtist('a1', 'Nick Drake');
  home.addTrack('t1', 'Pink Moon', [artist]);
  home.topTracks.set('a1', ['t1']);

  const abort = new AbortController();
  const search = mirror.search.bind(mirror);
  mirror.search = async (query, mediaTypes, limit) => {
    abort.abort();
    return search(query, mediaTypes, limit);
  };

  await assert.rejects(
    () => music.artists.add(artist, { matchProviders: true, signal: abort.signal }),
    { name: 'AbortError' },
  );
  const [stored] = (await music.artists.libraryItems()).items;
  assert.equal(await db.count('artists'), 1);
  assert.deepEqual(
    received.map((event) => `${event.event} ${event.uri}`),
    [`${EventType.MEDIA_ITEM_ADDED} library://artist/${stored.itemId}`],
  );
}

export async function runLibraryTests() {
  await testAddIsIdempotent();
  await testConcurrentAddsConverge();
  await testItemsWithoutMappingsAreRejected();
  await testFileProvidersWinDisplayFields();
  await testVariousArtistsIsCanonical();
  await testListingCacheFollowsChecksum();
  await testCacheWriteFailureKeepsListing();
  await testMatchingRequiresExactAgreement();
  await testArtistMatchFallsBackToAlbums();
  await testDeleteGuardsDependents();
  await testRecursiveDeleteStopsOnDependentFailure();
  await testListingMergeOrsLibraryFlag();
  await testFanOutToleratesFailingProvider();
  await testFailingListenerDoesNotBreakWrites();
  await testAbortedMatchKeepsAddEvent();
}
