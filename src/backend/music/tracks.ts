import { z } from 'zod';
import logger from '../../utils/logger';
import { Row } from '../storage/rowStore';
import { MusicProvider } from '../provider/types';
import { compareStrings, createSortName } from '../models/compare';
import { errorMessage } from '../models/errors';
import {
  ItemMapping,
  MediaType,
  SearchResults,
  Track,
  itemMappingSchema,
  normalizeIdentity,
  toItemMapping,
} from '../models/mediaItems';
import { DB_TABLE_TRACKS, jsonColumn, parseBaseColumns } from './dbRows';
import { MediaControllerBase } from './base';
import { creditsArtist } from './artists';

const trackColumnsSchema = z.object({
  artists: jsonColumn(z.array(itemMappingSchema)),
  album: jsonColumn(itemMappingSchema).nullable(),
  details: jsonColumn(
    z.object({
      duration: z.number().default(0),
      trackNumber: z.number().optional(),
      discNumber: z.number().optional(),
    }),
  ),
});

export class TracksController extends MediaControllerBase<Track> {
  readonly mediaType = MediaType.TRACK;
  readonly dbTable = DB_TABLE_TRACKS;

  protected parseRow(row: Row): Track {
    const columns = trackColumnsSchema.parse(row);
    return {
      ...parseBaseColumns(row),
      mediaType: MediaType.TRACK,
      artists: columns.artists,
      album: columns.album ?? undefined,
      duration: columns.details.duration,
      trackNumber: columns.details.trackNumber,
      discNumber: columns.details.discNumber,
    };
  }

  protected typeColumns(item: Track): Row {
    return {
      artists: JSON.stringify(item.artists.map((artist) => toItemMapping(artist))),
      album: item.album ? JSON.stringify(toItemMapping(item.album)) : null,
      details: JSON.stringify({ duration: item.duration, trackNumber: item.trackNumber, discNumber: item.discNumber }),
    };
  }

  protected fetchFromProvider(provider: MusicProvider, itemId: string): Promise<Track> {
    return provider.getTrack(itemId);
  }

  protected pickSearchResults(results: SearchResults): Track[] {
    return results.tracks;
  }

  protected normalize(item: Track): Track {
    return {
      ...normalizeIdentity(item),
      artists: item.artists.map((artist) => normalizeIdentity(artist)),
      album: item.album ? normalizeIdentity(item.album) : undefined,
    };
  }

  protected enrich(item: Track): Promise<Track> {
    return this.music.metadata.enrichArtistRefs(item);
  }

  /** Album first (it brings its own artists along), then the credited artists. */
  protected async resolveReferences(item: Track, signal?: AbortSignal): Promise<Track> {
    const album = item.album ? toItemMapping(await this.music.albums.resolveLibraryRef(item.album, signal)) : undefined;
    const artists: ItemMapping[] = [];
    for (const ref of item.artists) {
      signal?.throwIfAborted();
      artists.push(toItemMapping(await this.music.artists.resolveLibraryRef(ref, signal)));
    }
    return { ...item, album, artists };
  }

  protected isSameEntity(candidate: Track, item: Track): boolean {
    if (!compareStrings(candidate.version, item.version)) return false;
    if (candidate.album && item.album && !compareStrings(candidate.album.name, item.album.name)) return false;
    if (candidate.artists.length === 0 || item.artists.length === 0) return true;
    return item.artists.some((artist) => creditsArtist(candidate.artists, createSortName(artist.name)));
  }

  protected mergeTypeFields(current: Track, incoming: Track, authoritative: boolean): Track {
    const preferIncoming = authoritative || current.artists.length === 0;
    return {
      ...current,
      artists: preferIncoming && incoming.artists.length > 0 ? incoming.artists : current.artists,
      album: authoritative ? incoming.album ?? current.album : current.album ?? incoming.album,
      duration: (authoritative || current.duration === 0) && incoming.duration > 0 ? incoming.duration : current.duration,
      trackNumber: authoritative ? incoming.trackNumber ?? current.trackNumber : current.trackNumber ?? incoming.trackNumber,
      discNumber: authoritative ? incoming.discNumber ?? current.discNumber : current.discNumber ?? incoming.discNumber,
    };
  }

  /** A hit must agree on name, version and one credited artist. */
  protected async matchOnProvider(track: Track, provider: MusicProvider, signal?: AbortSignal): Promise<Track | undefined> {
    const primary = track.artists[0];
    if (!primary) return undefined;
    const artistSorts = track.artists.map((artist) => createSortName(artist.name));
    for (const query of [`${primary.name} - ${track.name}`, `${primary.name} ${track.name}`, track.name]) {
      signal?.throwIfAborted();
      for (const hit of await this.searchProvider(provider, query)) {
        if (hit.sortName !== track.sortName || !compareStrings(hit.version, track.version)) continue;
        if (!artistSorts.some((sortName) => creditsArtist(hit.artists, sortName))) continue;
        try {
          return await this.getProviderItem(hit.itemId, provider.instanceId);
        } catch (error) {
          logger.debug(`[TracksController] Could not fetch matched track ${hit.itemId} from ${provider.instanceId}: ${errorMessage(error)}`);
        }
      }
    }
    return undefined;
  }
}
