import { z } from 'zod';
import { Row } from '../storage/rowStore';
import { MusicProvider, ProviderFeature } from '../provider/types';
import { compareStrings } from '../models/compare';
import { MediaType, Playlist, SearchResults, Track, trackSchema } from '../models/mediaItems';
import { DB_TABLE_PLAYLISTS, jsonColumn, parseBaseColumns } from './dbRows';
import { MediaControllerBase } from './base';

const playlistColumnsSchema = z.object({
  details: jsonColumn(
    z.object({
      owner: z.string().default(''),
      isEditable: z.boolean().default(false),
    }),
  ),
});

/**
 * Playlists are owned by their provider: they are stored and listed, but never matched elsewhere.
 */
export class PlaylistsController extends MediaControllerBase<Playlist> {
  readonly mediaType = MediaType.PLAYLIST;
  readonly dbTable = DB_TABLE_PLAYLISTS;

  protected parseRow(row: Row): Playlist {
    const { details } = playlistColumnsSchema.parse(row);
    return { ...parseBaseColumns(row), mediaType: MediaType.PLAYLIST, owner: details.owner, isEditable: details.isEditable };
  }

  protected typeColumns(item: Playlist): Row {
    return { details: JSON.stringify({ owner: item.owner, isEditable: item.isEditable }) };
  }

  protected fetchFromProvider(provider: MusicProvider, itemId: string): Promise<Playlist> {
    return provider.getPlaylist(itemId);
  }

  protected pickSearchResults(results: SearchResults): Playlist[] {
    return results.playlists;
  }

  /** Two users' "Favorites" are different playlists. */
  protected isSameEntity(candidate: Playlist, item: Playlist): boolean {
    return compareStrings(candidate.owner, item.owner);
  }

  protected mergeTypeFields(current: Playlist, incoming: Playlist): Playlist {
    return { ...current, owner: current.owner || incoming.owner, isEditable: current.isEditable || incoming.isEditable };
  }

  /** Playlist tracks; providers without the listing contribute nothing. */
  tracks(playlist: Playlist, signal?: AbortSignal): Promise<Track[]> {
    return this.aggregateListing(
      playlist,
      (mapping) =>
        this.fetchProviderListing({
          kind: 'playlist_tracks',
          mapping,
          checksum: playlist.metadata.checksum,
          feature: ProviderFeature.PLAYLIST_TRACKS,
          schema: trackSchema,
          native: (provider) => provider.getPlaylistTracks?.(mapping.itemId),
        }),
      signal,
    );
  }

  protected async matchOnProvider(): Promise<Playlist | undefined> {
    return undefined;
  }
}
