import assert from 'node:assert/strict';
import path from 'path';
import { MediaNotFoundError } from '../src/backend/models/errors';
import { MediaType } from '../src/backend/models/mediaItems';
import { ProviderRegistry } from '../src/backend/provider/registry';
import { StaticCatalogProvider } from '../src/backend/provider/staticProvider';
import { createProvider, listProviderTypes, registerConfiguredProviders } from '../src/backend/provider/factory';
import { FakeProvider } from './support';

const CATALOG_FILE = path.join(__dirname, 'fixtures', 'catalog.json');

async function testRegistryResolution() {
  const registry = new ProviderRegistry();
  const streaming = new FakeProvider('streaming', 'streaming--1');
  registry.register(streaming);

  assert.equal(registry.resolve('streaming--1'), streaming);
  assert.equal(registry.resolve('streaming'), streaming);
  assert.equal(registry.resolve('unknown'), undefined);
  assert.equal(registry.resolve(undefined), undefined);

  streaming.available = false;
  assert.equal(registry.resolve('streaming--1'), undefined);
  assert.equal(registry.resolve('streaming'), undefined);
  assert.deepEqual(registry.activeProviders(), []);

  assert.throws(() => registry.register(new FakeProvider('library', 'library')), /reserved/);

  await registry.closeAll();
  streaming.available = true;
  assert.equal(registry.resolve('streaming--1'), undefined);
}

async function testStaticCatalogProvider() {
  const provider = await StaticCatalogProvider.fromFile(CATALOG_FILE, { instanceId: 'static--1' });

  const beatles = await provider.getArtist('ar1');
  assert.equal(beatles.sortName, 'beatles');
  assert.equal(beatles.provider, 'static--1');
  assert.deepEqual(beatles.providerMappings, [{ itemId: 'ar1', providerDomain: 'static', providerInstance: 'static--1' }]);

  const names = (items: Array<{ name: string }>) => items.map((item) => item.name);
  assert.deepEqual(names(await provider.getAlbumTracks('al1')), ['Come Together', 'Something']);
  assert.deepEqual(names(await provider.getPlaylistTracks('pl1')), ['Something', 'Come Together']);
  assert.deepEqual(names(await provider.getArtistTopTracks('ar1')), ['Come Together', 'Something']);
  assert.deepEqual(names(await provider.getArtistAlbums('ar1')), ['Abbey Road']);

  const track = await provider.getTrack('tr1');
  assert.equal(track.album?.name, 'Abbey Road');
  assert.deepEqual(names(track.artists), ['The Beatles']);

  assert.deepEqual(names((await provider.search('beatles abbey', [MediaType.ALBUM], 10)).albums), ['Abbey Road']);
  assert.deepEqual(names((await provider.search('come together', [MediaType.TRACK], 10)).tracks), ['Come Together']);
  assert.deepEqual(await provider.search('  ', [MediaType.ARTIST], 10), {
    artists: [],
    albums: [],
    tracks: [],
    playlists: [],
  });

  assert.deepEqual(names(await provider.getLibraryItems(MediaType.ARTIST)), ['The Beatles']);
  assert.deepEqual(names(await provider.getLibraryItems(MediaType.TRACK)), ['Come Together']);
  assert.deepEqual(names(await provider.getLibraryItems(MediaType.PLAYLIST)), ['Sunday Morning']);

  await assert.rejects(() => provider.getArtist('missing'), MediaNotFoundError);

  const empty = await StaticCatalogProvider.fromFile(path.join(__dirname, 'fixtures', 'absent.json'), {
    instanceId: 'static--empty',
  });
  assert.deepEqual(await empty.getLibraryItems(MediaType.ARTIST), []);
}

async function testProviderFactory() {
  assert.deepEqual(listProviderTypes(), ['StaticCatalogProvider']);

  const created = await createProvider({ type: 'static', instanceId: 'x', options: { catalogFile: CATALOG_FILE } });
  assert.equal(created?.instanceId, 'x');
  assert.equal(created?.domain, 'static');

  assert.equal(await createProvider({ type: 'spotify', instanceId: 'spotify--1', options: {} }), undefined);

  const registry = new ProviderRegistry();
  await registerConfiguredProviders(registry, [
    { type: 'catalog', instanceId: 'local', domain: 'local_catalog', options: { catalogFile: CATALOG_FILE } },
    { type: 'spotify', instanceId: 'spotify--1', options: {} },
  ]);
  assert.deepEqual(
    registry.activeProviders().map((provider) => `${provider.domain}/${provider.instanceId}`),
    ['local_catalog/local'],
  );
}

export async function runProviderTests() {
  await testRegistryResolution();
  await testStaticCatalogProvider();
  await testProviderFactory();
}
