import type { Album, Artist, MediaItem, MediaType, Playlist, SearchResults, Track } from '../models/mediaItems';

/**
 * Optional capabilities a music provider can declare.
 */
export enum ProviderFeature {
  SEARCH = 'search',
  ARTIST_ALBUMS = 'artist_albums',
  ARTIST_TOPTRACKS = 'artist_toptracks',
  ALBUM_TRACKS = 'album_tracks',
  PLAYLIST_TRACKS = 'playlist_tracks',
  SIMILAR_TRACKS = 'similar_tracks',
  LIBRARY_ARTISTS = 'library_artists',
  LIBRARY_ALBUMS = 'library_albums',
  LIBRARY_TRACKS = 'library_tracks',
  LIBRARY_PLAYLISTS = 'library_playlists',
}

/**
 * Contract every provider plugin implements. Optional methods back the matching optional feature;
 * a feature is only usable when it is declared in `supportedFeatures` and the method exists.
 * Items returned carry `provider` = the instance id and a provider mapping for that instance.
 */
export interface MusicProvider {
  readonly domain: string;
  readonly instanceId: string;
  readonly name: string;
  readonly supportedFeatures: ReadonlySet<ProviderFeature>;
  /** Unavailable providers are skipped by fan-out and matching. */
  readonly available: boolean;

  getArtist(itemId: string): Promise<Artist>;
  getAlbum(itemId: string): Promise<Album>;
  getTrack(itemId: string): Promise<Track>;
  getPlaylist(itemId: string): Promise<Playlist>;

  getArtistAlbums?(itemId: string): Promise<Album[]>;
  getArtistTopTracks?(itemId: string): Promise<Track[]>;
  getAlbumTracks?(itemId: string): Promise<Track[]>;
  getPlaylistTracks?(itemId: string): Promise<Track[]>;
  search?(query: string, mediaTypes: MediaType[], limit: number): Promise<SearchResults>;
  getSimilarTracks?(trackId: string, limit: number): Promise<Track[]>;
  getLibraryItems?(mediaType: MediaType): Promise<MediaItem[]>;

  /** Release sockets/timers. */
  close?(): Promise<void>;
}

/** Providers backed by local files are authoritative for display fields. */
export function isFileProvider(domain: string): boolean {
  return domain.startsWith('filesystem');
}

export function hasFeature(provider: MusicProvider, feature: ProviderFeature): boolean {
  return provider.supportedFeatures.has(feature);
}
