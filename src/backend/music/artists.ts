import { z } from 'zod';
import logger from '../../utils/logger';
import { Row } from '../storage/rowStore';
import { MusicProvider, ProviderFeature, hasFeature } from '../provider/types';
import { compareStrings, createSortName } from '../models/compare';
import { UnsupportedFeatureError, errorMessage } from '../models/errors';
import {
  Album,
  AlbumType,
  Artist,
  ItemMapping,
  MediaType,
  PagedItems,
  SearchResults,
  Track,
  VARIOUS_ARTISTS_ID,
  VARIOUS_ARTISTS_NAME,
  albumSchema,
  itemMappingSchema,
  trackSchema,
} from '../models/mediaItems';
import { DB_TABLE_ALBUMS, DB_TABLE_ARTISTS, DB_TABLE_TRACKS, jsonColumn, parseBaseColumns } from './dbRows';
import { DependentTable, LibraryItemsOptions, MediaControllerBase } from './base';

const DYNAMIC_SEED_TRACKS = 5;

/** True when any credited artist has the given sort name. */
export function creditsArtist(artists: Array<Artist | ItemMapping>, sortName: string): boolean {
  return artists.some((artist) => createSortName(artist.name) === sortName);
}

function shuffle<V>(items: V[]): V[] {
  const copy = [...items];
  for (let i = copy.length - 1; i > 0; i -= 1) {
    const j = Math.floor(Math.random() * (i + 1));
    [copy[i], copy[j]] = [copy[j], copy[i]];
  }
  return copy;
}

export class ArtistsController extends MediaControllerBase<Artist> {
  readonly mediaType = MediaType.ARTIST;
  readonly dbTable = DB_TABLE_ARTISTS;

  protected parseRow(row: Row): Artist {
    return { ...parseBaseColumns(row), mediaType: MediaType.ARTIST };
  }

  protected typeColumns(): Row {
    return {};
  }

  protected fetchFromProvider(provider: MusicProvider, itemId: string): Promise<Artist> {
    return provider.getArtist(itemId);
  }

  protected pickSearchResults(results: SearchResults): Artist[] {
    return results.artists;
  }

  /** "Various Artists" gets one name and one external id, whatever the source called it. */
  protected canonicalize(item: Artist): Artist {
    if (compareStrings(item.name, VARIOUS_ARTISTS_NAME, false)) {
      return { ...item, externalId: VARIOUS_ARTISTS_ID, name: VARIOUS_ARTISTS_NAME, sortName: createSortName(VARIOUS_ARTISTS_NAME) };
    }
    if (item.externalId === VARIOUS_ARTISTS_ID) {
      return { ...item, name: VARIOUS_ARTISTS_NAME, sortName: createSortName(VARIOUS_ARTISTS_NAME) };
    }
    return item;
  }

  protected enrich(item: Artist): Promise<Artist> {
    return this.music.metadata.enrichArtist(item);
  }

  protected dependents(): DependentTable[] {
    return [
      { table: DB_TABLE_ALBUMS, column: 'artists', owner: this.music.albums },
      { table: DB_TABLE_TRACKS, column: 'artists', owner: this.music.tracks },
    ];
  }

  /**
   * Albums of an artist across every provider it is mapped on.
   */
  albums(artist: Artist, signal?: AbortSignal): Promise<Album[]> {
    return this.aggregateListing(
      artist,
      (mapping) =>
        this.fetchProviderListing({
          kind: 'artist_albums',
          mapping,
          checksum: artist.metadata.checksum,
          feature: ProviderFeature.ARTIST_ALBUMS,
          schema: albumSchema,
          native: (provider) => provider.getArtistAlbums?.(mapping.itemId),
          fallback: () => this.libraryChildren(this.music.albums, 'artists', mapping),
        }),
      signal,
    );
  }

  /**
   * Top tracks of an artist across every provider it is mapped on.
   */
  tracks(artist: Artist, signal?: AbortSignal): Promise<Track[]> {
    return this.aggregateListing(
      artist,
      (mapping) =>
        this.fetchProviderListing({
          kind: 'artist_toptracks',
          mapping,
          checksum: artist.metadata.checksum,
          feature: ProviderFeature.ARTIST_TOPTRACKS,
          schema: trackSchema,
          native: (provider) => provider.getArtistTopTracks?.(mapping.itemId),
          fallback: () => this.libraryChildren(this.music.tracks, 'artists', mapping),
        }),
      signal,
    );
  }

  /**
   * Library artists credited first on at least one library album.
   */
  async albumArtists(options: LibraryItemsOptions = {}): Promise<PagedItems<Artist>> {
    const firstArtist = z.object({ artists: jsonColumn(z.array(itemMappingSchema)) });
    const albumRows = await this.music.db.getRows(DB_TABLE_ALBUMS);
    const ids = new Set<string>();
    for (const row of albumRows) {
      const parsed = firstArtist.safeParse(row);
      if (parsed.success && parsed.data.artists.length > 0) ids.add(parsed.data.artists[0].itemId);
    }
    const all = await this.libraryItems({ ...options, limit: Number.MAX_SAFE_INTEGER, offset: 0 });
    const matching = all.items.filter((artist) => ids.has(artist.itemId));
    const limit = options.limit ?? 500;
    const offset = options.offset ?? 0;
    return { items: matching.slice(offset, offset + limit), total: matching.length, limit, offset };
  }

  /**
   * A radio-style mix: a slice of the artist's own top tracks and tracks similar to them, shuffled.
   */
  async dynamicTracks(artist: Artist, limit = 25): Promise<Track[]> {
    const source = this.similarTracksSource(artist);
    if (!source) {
      throw new UnsupportedFeatureError(`No provider of ${artist.name} supports similar tracks`);
    }
    const { provider, getSimilarTracks } = source;
    const onProvider = (track: Track) =>
      track.providerMappings.find((mapping) => mapping.providerInstance === provider.instanceId)?.itemId;

    const topTracks = (await this.tracks(artist)).filter((track) => onProvider(track) !== undefined);
    const similar: Track[] = [];
    for (const seed of shuffle(topTracks).slice(0, DYNAMIC_SEED_TRACKS)) {
      const seedId = onProvider(seed);
      if (seedId === undefined) continue;
      try {
        similar.push(...(await getSimilarTracks(seedId, limit)));
      } catch (error) {
        logger.warn(`[ArtistsController] Similar tracks for ${seedId} on ${provider.instanceId} failed: ${errorMessage(error)}`);
      }
    }

    const ownShare = Math.max(1, Math.ceil(limit / 10));
    const picked = new Map<string, Track>();
    for (const track of [...shuffle(topTracks).slice(0, ownShare), ...shuffle(similar)]) {
      const key = `${track.provider}/${track.itemId}`;
      if (!picked.has(key)) picked.set(key, track);
    }
    return shuffle(Array.from(picked.values())).slice(0, limit);
  }

  private similarTracksSource(
    artist: Artist,
  ): { provider: MusicProvider; getSimilarTracks: (trackId: string, limit: number) => Promise<Track[]> } | undefined {
    for (const mapping of artist.providerMappings) {
      const provider = this.providerFor(mapping);
      if (!provider || !hasFeature(provider, ProviderFeature.SIMILAR_TRACKS) || !provider.getSimilarTracks) continue;
      const getSimilarTracks = provider.getSimilarTracks.bind(provider);
      return { provider, getSimilarTracks };
    }
    return undefined;
  }

  protected async matchOnProvider(artist: Artist, provider: MusicProvider, signal?: AbortSignal): Promise<Artist | undefined> {
    return (
      (await this.matchByTracks(artist, provider, signal)) ?? (await this.matchByAlbums(artist, provider, signal))
    );
  }

  /** Top tracks of the artist searched on the target; hit and one credited artist must agree exactly. */
  private async matchByTracks(artist: Artist, provider: MusicProvider, signal?: AbortSignal): Promise<Artist | undefined> {
    const artistSort = artist.sortName;
    for (const reference of await this.tracks(artist, signal)) {
      const referenceSort = createSortName(reference.name);
      for (const query of [`${artist.name} - ${reference.name}`, `${artist.name} ${reference.name}`, reference.name]) {
        signal?.throwIfAborted();
        for (const hit of await this.music.tracks.searchProvider(provider, query)) {
          if (createSortName(hit.name) !== referenceSort) continue;
          const credited = hit.artists.find((ref) => createSortName(ref.name) === artistSort);
          if (!credited) continue;
          const found = await this.fetchMatchedArtist(credited, provider);
          if (found) return found;
        }
      }
    }
    return undefined;
  }

  /** Non-compilation albums searched on the target; album and album artist must agree exactly. */
  private async matchByAlbums(artist: Artist, provider: MusicProvider, signal?: AbortSignal): Promise<Artist | undefined> {
    const artistSort = artist.sortName;
    const references = (await this.albums(artist, signal)).filter((album) => album.albumType !== AlbumType.COMPILATION);
    for (const reference of references) {
      const referenceSort = createSortName(reference.name);
      for (const query of [reference.name, `${artist.name} - ${reference.name}`, `${artist.name} ${reference.name}`]) {
        signal?.throwIfAborted();
        for (const hit of await this.music.albums.searchProvider(provider, query)) {
          if (createSortName(hit.name) !== referenceSort) continue;
          const albumArtist = hit.artists[0];
          if (!albumArtist || createSortName(albumArtist.name) !== artistSort) continue;
          const found = await this.fetchMatchedArtist(albumArtist, provider);
          if (found) return found;
        }
      }
    }
    return undefined;
  }

  private async fetchMatchedArtist(ref: Artist | ItemMapping, provider: MusicProvider): Promise<Artist | undefined> {
    try {
      return await this.getProviderItem(ref.itemId, provider.instanceId);
    } catch (error) {
      logger.debug(`[ArtistsController] Could not fetch matched artist ${ref.itemId} from ${provider.instanceId}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
