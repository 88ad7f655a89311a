import { setTimeout as delay } from 'node:timers/promises';
import { createSafeString, createSortName } from '../src/backend/models/compare';
import { MediaNotFoundError } from '../src/backend/models/errors';
import {
  Album,
  AlbumType,
  Artist,
  ItemMapping,
  MediaItem,
  MediaType,
  Playlist,
  ProviderMapping,
  SearchResults,
  Track,
  emptySearchResults,
} from '../src/backend/models/mediaItems';
import { MusicProvider, ProviderFeature } from '../src/backend/provider/types';
import { ProviderRegistry } from '../src/backend/provider/registry';
import { MemoryRowStore } from '../src/backend/storage/rowStore';
import { CacheStore, MemoryCacheStore } from '../src/backend/storage/cacheStore';
import { EventNotifier, LibraryEvent } from '../src/backend/events/eventNotifier';
import { MetadataController } from '../src/backend/metadata/metadataController';
import { MusicController } from '../src/backend/music/musicController';
import type { MatchingConfig } from '../src/config/configStore';

/**
 * In-process provider with a hand-built catalog. Counts calls per method and can be told to fail.
 */
export class FakeProvider implements MusicProvider {
  readonly name: string;
  readonly supportedFeatures: Set<ProviderFeature>;
  available = true;

  readonly artists = new Map<string, Artist>();
  readonly albums = new Map<string, Album>();
  readonly tracks = new Map<string, Track>();
  readonly playlists = new Map<string, Playlist>();
  readonly artistAlbums = new Map<string, string[]>();
  readonly topTracks = new Map<string, string[]>();
  readonly albumTracks = new Map<string, string[]>();
  readonly playlistTracks = new Map<string, string[]>();
  readonly similar = new Map<string, string[]>();
  library: MediaItem[] = [];

  /** Methods listed here throw a plain Error. */
  readonly failing = new Set<string>();
  /** When set, getLibraryItems waits for it. */
  libraryGate?: Promise<void>;

  private readonly calls = new Map<string, number>();

  constructor(
    readonly domain: string,
    readonly instanceId: string,
    features: ProviderFeature[] = [ProviderFeature.SEARCH],
  ) {
    this.name = `Fake ${instanceId}`;
    this.supportedFeatures = new Set(features);
  }

  count(method: string): number {
    return this.calls.get(method) ?? 0;
  }

  private record(method: string): void {
    this.calls.set(method, this.count(method) + 1);
    if (this.failing.has(method)) throw new Error(`${this.instanceId}.${method} unavailable`);
  }

  private mapping(itemId: string): ProviderMapping[] {
    return [{ itemId, providerDomain: this.domain, providerInstance: this.instanceId }];
  }

  addArtist(itemId: string, name: string, extra: Partial<Artist> = {}): Artist {
    const artist: Artist = {
      mediaType: MediaType.ARTIST,
      itemId,
      provider: this.instanceId,
      name,
      sortName: createSortName(name),
      version: '',
      metadata: {},
      providerMappings: this.mapping(itemId),
      inLibrary: false,
      ...extra,
    };
    this.artists.set(itemId, artist);
    return artist;
  }

  addAlbum(itemId: string, name: string, artists: Array<Artist | ItemMapping>, extra: Partial<Album> = {}): Album {
    const album: Album = {
      mediaType: MediaType.ALBUM,
      itemId,
      provider: this.instanceId,
      name,
      sortName: createSortName(name),
      version: '',
      metadata: {},
      providerMappings: this.mapping(itemId),
      inLibrary: false,
      artists,
      albumType: AlbumType.ALBUM,
      ...extra,
    };
    this.albums.set(itemId, album);
    return album;
  }

  addTrack(
    itemId: string,
    name: string,
    artists: Array<Artist | ItemMapping>,
    album?: Album,
    extra: Partial<Track> = {},
  ): Track {
    const track: Track = {
      mediaType: MediaType.TRACK,
      itemId,
      provider: this.instanceId,
      name,
      sortName: createSortName(name),
      version: '',
      metadata: {},
      providerMappings: this.mapping(itemId),
      inLibrary: false,
      artists,
      duration: 180,
      ...extra,
    };
    if (album) track.album = album;
    this.tracks.set(itemId, track);
    return track;
  }

  addPlaylist(itemId: string, name: string, owner: string): Playlist {
    const playlist: Playlist = {
      mediaType: MediaType.PLAYLIST,
      itemId,
      provider: this.instanceId,
      name,
      sortName: createSortName(name),
      version: '',
      metadata: {},
      providerMappings: this.mapping(itemId),
      inLibrary: false,
      owner,
      isEditable: false,
    };
    this.playlists.set(itemId, playlist);
    return playlist;
  }

  private lookup<V>(items: Map<string, V>, itemId: string): V {
    const item = items.get(itemId);
    if (!item) throw new MediaNotFoundError(`${itemId} not found on ${this.instanceId}`);
    return structuredClone(item);
  }

  private list<V>(items: Map<string, V>, ids: string[] | undefined): V[] {
    return (ids ?? []).map((id) => this.lookup(items, id));
  }

  async getArtist(itemId: string): Promise<Artist> {
    this.record('getArtist');
    return this.lookup(this.artists, itemId);
  }

  async getAlbum(itemId: string): Promise<Album> {
    this.record('getAlbum');
    return this.lookup(this.albums, itemId);
  }

  async getTrack(itemId: string): Promise<Track> {
    this.record('getTrack');
    return this.lookup(this.tracks, itemId);
  }

  async getPlaylist(itemId: string): Promise<Playlist> {
    this.record('getPlaylist');
    return this.lookup(this.playlists, itemId);
  }

  async getArtistAlbums(itemId: string): Promise<Album[]> {
    this.record('getArtistAlbums');
    return this.list(this.albums, this.artistAlbums.get(itemId));
  }

  async getArtistTopTracks(itemId: string): Promise<Track[]> {
    this.record('getArtistTopTracks');
    return this.list(this.tracks, this.topTracks.get(itemId));
  }

  async getAlbumTracks(itemId: string): Promise<Track[]> {
    this.record('getAlbumTracks');
    return this.list(this.tracks, this.albumTracks.get(itemId));
  }

  async getPlaylistTracks(itemId: string): Promise<Track[]> {
    this.record('getPlaylistTracks');
    return this.list(this.tracks, this.playlistTracks.get(itemId));
  }

  async getSimilarTracks(trackId: string): Promise<Track[]> {
    this.record('getSimilarTracks');
    return this.list(this.tracks, this.similar.get(trackId));
  }

  /** A name hits when either safe string contains the other. */
  async search(query: string, mediaTypes: MediaType[], limit: number): Promise<SearchResults> {
    this.record('search');
    const needle = createSafeString(query);
    const hit = (name: string) => {
      const safe = createSafeString(name);
      return safe.length > 0 && (needle.includes(safe) || safe.includes(needle));
    };
    const results = emptySearchResults();
    const pick = <V extends MediaItem>(items: Map<string, V>) =>
      Array.from(items.values())
        .filter((item) => hit(item.name))
        .slice(0, limit)
        .map((item) => structuredClone(item));
    if (mediaTypes.includes(MediaType.ARTIST)) results.artists = pick(this.artists);
    if (mediaTypes.includes(MediaType.ALBUM)) results.albums = pick(this.albums);
    if (mediaTypes.includes(MediaType.TRACK)) results.tracks = pick(this.tracks);
    if (mediaTypes.includes(MediaType.PLAYLIST)) results.playlists = pick(this.playlists);
    return results;
  }

  async getLibraryItems(mediaType: MediaType): Promise<MediaItem[]> {
    this.record('getLibraryItems');
    if (this.libraryGate) await this.libraryGate;
    return this.library.filter((item) => item.mediaType === mediaType).map((item) => structuredClone(item));
  }
}

export interface SearchGauge {
  inFlight: number;
  peak: number;
}

/** Provider whose searches take a little while; records how many run at once across a shared gauge. */
export class GaugedSearchProvider extends FakeProvider {
  constructor(
    domain: string,
    instanceId: string,
    private readonly gauge: SearchGauge,
  ) {
    super(domain, instanceId);
  }

  async search(query: string, mediaTypes: MediaType[], limit: number): Promise<SearchResults> {
    this.gauge.inFlight += 1;
    this.gauge.peak = Math.max(this.gauge.peak, this.gauge.inFlight);
    try {
      await delay(20);
      return await super.search(query, mediaTypes, limit);
    } finally {
      this.gauge.inFlight -= 1;
    }
  }
}

/** Cache whose writes always fail. */
export class FailingCacheStore extends MemoryCacheStore {
  async set(): Promise<void> {
    throw new Error('cache volume full');
  }
}

export interface TestMusic {
  music: MusicController;
  db: MemoryRowStore;
  providers: ProviderRegistry;
  events: EventNotifier;
  received: LibraryEvent[];
}

/**
 * A music controller on memory stores, with every emitted event captured in `received`.
 */
export function createTestMusic(
  options: { cache?: CacheStore; metadata?: MetadataController; matching?: Partial<MatchingConfig> } = {},
): TestMusic {
  const db = new MemoryRowStore();
  const providers = new ProviderRegistry();
  const events = new EventNotifier();
  const received: LibraryEvent[] = [];
  events.subscribe((event) => received.push(event));
  const music = new MusicController({
    db,
    cache: options.cache ?? new MemoryCacheStore(),
    providers,
    events,
    metadata: options.metadata,
    matching: options.matching,
  });
  return { music, db, providers, events, received };
}

/** Resolves once `release` is called. */
export function createGate(): { promise: Promise<void>; release: () => void } {
  let release = () => {};
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release };
}
