import { z } from 'zod';
import logger from '../../utils/logger';
import { Row } from '../storage/rowStore';
import { MusicProvider, ProviderFeature } from '../provider/types';
import { compareStrings, createSortName } from '../models/compare';
import { errorMessage } from '../models/errors';
import {
  Album,
  AlbumType,
  ItemMapping,
  MediaType,
  SearchResults,
  Track,
  itemMappingSchema,
  normalizeIdentity,
  toItemMapping,
  trackSchema,
} from '../models/mediaItems';
import { DB_TABLE_ALBUMS, DB_TABLE_TRACKS, jsonColumn, parseBaseColumns } from './dbRows';
import { DependentTable, MediaControllerBase } from './base';
import { creditsArtist } from './artists';

const albumColumnsSchema = z.object({
  artists: jsonColumn(z.array(itemMappingSchema)),
  details: jsonColumn(
    z.object({
      albumType: z.nativeEnum(AlbumType).default(AlbumType.UNKNOWN),
      year: z.number().optional(),
    }),
  ),
});

/** Orders album tracks by disc, then track number. */
export function compareTrackPosition(a: Track, b: Track): number {
  return (a.discNumber ?? 1) - (b.discNumber ?? 1) || (a.trackNumber ?? 0) - (b.trackNumber ?? 0);
}

export class AlbumsController extends MediaControllerBase<Album> {
  readonly mediaType = MediaType.ALBUM;
  readonly dbTable = DB_TABLE_ALBUMS;

  protected parseRow(row: Row): Album {
    const columns = albumColumnsSchema.parse(row);
    return {
      ...parseBaseColumns(row),
      mediaType: MediaType.ALBUM,
      artists: columns.artists,
      albumType: columns.details.albumType,
      year: columns.details.year,
    };
  }

  protected typeColumns(item: Album): Row {
    return {
      artists: JSON.stringify(item.artists.map((artist) => toItemMapping(artist))),
      details: JSON.stringify({ albumType: item.albumType, year: item.year }),
    };
  }

  protected fetchFromProvider(provider: MusicProvider, itemId: string): Promise<Album> {
    return provider.getAlbum(itemId);
  }

  protected pickSearchResults(results: SearchResults): Album[] {
    return results.albums;
  }

  protected normalize(item: Album): Album {
    return { ...normalizeIdentity(item), artists: item.artists.map((artist) => normalizeIdentity(artist)) };
  }

  protected enrich(item: Album): Promise<Album> {
    return this.music.metadata.enrichArtistRefs(item);
  }

  protected async resolveReferences(item: Album, signal?: AbortSignal): Promise<Album> {
    const artists: ItemMapping[] = [];
    for (const ref of item.artists) {
      signal?.throwIfAborted();
      artists.push(toItemMapping(await this.music.artists.resolveLibraryRef(ref, signal)));
    }
    return { ...item, artists };
  }

  /** Same name is not enough: version and album artist must agree too. */
  protected isSameEntity(candidate: Album, item: Album): boolean {
    if (!compareStrings(candidate.version, item.version)) return false;
    if (candidate.artists.length === 0 || item.artists.length === 0) return true;
    return creditsArtist(candidate.artists.slice(0, 1), createSortName(item.artists[0].name));
  }

  protected mergeTypeFields(current: Album, incoming: Album, authoritative: boolean): Album {
    const preferIncoming = authoritative || current.artists.length === 0;
    return {
      ...current,
      artists: preferIncoming && incoming.artists.length > 0 ? incoming.artists : current.artists,
      albumType:
        incoming.albumType !== AlbumType.UNKNOWN && (authoritative || current.albumType === AlbumType.UNKNOWN)
          ? incoming.albumType
          : current.albumType,
      year: authoritative ? incoming.year ?? current.year : current.year ?? incoming.year,
    };
  }

  protected dependents(): DependentTable[] {
    return [{ table: DB_TABLE_TRACKS, column: 'album', owner: this.music.tracks }];
  }

  /**
   * Tracks of an album across every provider it is mapped on, in disc/track order.
   */
  async tracks(album: Album, signal?: AbortSignal): Promise<Track[]> {
    const tracks = await this.aggregateListing(
      album,
      (mapping) =>
        this.fetchProviderListing({
          kind: 'album_tracks',
          mapping,
          checksum: album.metadata.checksum,
          feature: ProviderFeature.ALBUM_TRACKS,
          schema: trackSchema,
          native: (provider) => provider.getAlbumTracks?.(mapping.itemId),
          fallback: () => this.libraryChildren(this.music.tracks, 'album', mapping),
        }),
      signal,
    );
    return tracks.sort(compareTrackPosition);
  }

  protected async matchOnProvider(album: Album, provider: MusicProvider, signal?: AbortSignal): Promise<Album | undefined> {
    const albumArtist = album.artists[0];
    if (!albumArtist) return undefined;
    return (
      (await this.matchByTracks(album, albumArtist, provider, signal)) ??
      (await this.matchByAlbumSearch(album, albumArtist, provider, signal))
    );
  }

  /** A hit must agree on track, album and one credited artist. */
  private async matchByTracks(
    album: Album,
    albumArtist: ItemMapping,
    provider: MusicProvider,
    signal?: AbortSignal,
  ): Promise<Album | undefined> {
    const artistSort = createSortName(albumArtist.name);
    for (const reference of await this.tracks(album, signal)) {
      const referenceSort = createSortName(reference.name);
      for (const query of [`${albumArtist.name} - ${reference.name}`, `${albumArtist.name} ${reference.name}`, reference.name]) {
        signal?.throwIfAborted();
        for (const hit of await this.music.tracks.searchProvider(provider, query)) {
          if (createSortName(hit.name) !== referenceSort) continue;
          if (!hit.album || createSortName(hit.album.name) !== album.sortName) continue;
          if (!creditsArtist(hit.artists, artistSort)) continue;
          const found = await this.fetchMatchedAlbum(hit.album.itemId, provider);
          if (found && compareStrings(found.version, album.version)) return found;
        }
      }
    }
    return undefined;
  }

  /** A hit must agree on name, version and album artist. */
  private async matchByAlbumSearch(
    album: Album,
    albumArtist: ItemMapping,
    provider: MusicProvider,
    signal?: AbortSignal,
  ): Promise<Album | undefined> {
    const artistSort = createSortName(albumArtist.name);
    for (const query of [`${albumArtist.name} - ${album.name}`, `${albumArtist.name} ${album.name}`, album.name]) {
      signal?.throwIfAborted();
      for (const hit of await this.searchProvider(provider, query)) {
        if (hit.sortName !== album.sortName || !compareStrings(hit.version, album.version)) continue;
        if (!creditsArtist(hit.artists.slice(0, 1), artistSort)) continue;
        const found = await this.fetchMatchedAlbum(hit.itemId, provider);
        if (found) return found;
      }
    }
    return undefined;
  }

  private async fetchMatchedAlbum(itemId: string, provider: MusicProvider): Promise<Album | undefined> {
    try {
      return await this.getProviderItem(itemId, provider.instanceId);
    } catch (error) {
      logger.debug(`[AlbumsController] Could not fetch matched album ${itemId} from ${provider.instanceId}: ${errorMessage(error)}`);
      return undefined;
    }
  }
}
