import { z } from 'zod';
import logger from '../../utils/logger';
import { readJson } from '../../utils/fileutils';
import { createSafeString, createSortName } from '../models/compare';
import { MediaNotFoundError } from '../models/errors';
import {
  Album,
  AlbumType,
  Artist,
  MediaItem,
  MediaType,
  Playlist,
  ProviderMapping,
  SearchResults,
  Track,
  emptySearchResults,
} from '../models/mediaItems';
import { MusicProvider, ProviderFeature } from './types';

const catalogSchema = z.object({
  artists: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        externalId: z.string().optional(),
        inLibrary: z.boolean().optional(),
        topTrackIds: z.array(z.string()).optional(),
      }),
    )
    .default([]),
  albums: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        version: z.string().optional(),
        artistIds: z.array(z.string()),
        albumType: z.nativeEnum(AlbumType).optional(),
        year: z.number().optional(),
        inLibrary: z.boolean().optional(),
      }),
    )
    .default([]),
  tracks: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        version: z.string().optional(),
        artistIds: z.array(z.string()),
        albumId: z.string().optional(),
        duration: z.number().default(0),
        trackNumber: z.number().optional(),
        inLibrary: z.boolean().optional(),
      }),
    )
    .default([]),
  playlists: z
    .array(
      z.object({
        id: z.string(),
        name: z.string(),
        owner: z.string().default(''),
        trackIds: z.array(z.string()).default([]),
        inLibrary: z.boolean().optional(),
      }),
    )
    .default([]),
});

export type StaticCatalogInput = z.input<typeof catalogSchema>;
type StaticCatalog = z.output<typeof catalogSchema>;

export interface StaticProviderOptions {
  instanceId: string;
  domain?: string;
  name?: string;
  catalog: StaticCatalogInput;
}

const STATIC_FEATURES = [
  ProviderFeature.SEARCH,
  ProviderFeature.ARTIST_ALBUMS,
  ProviderFeature.ARTIST_TOPTRACKS,
  ProviderFeature.ALBUM_TRACKS,
  ProviderFeature.PLAYLIST_TRACKS,
  ProviderFeature.LIBRARY_ARTISTS,
  ProviderFeature.LIBRARY_ALBUMS,
  ProviderFeature.LIBRARY_TRACKS,
  ProviderFeature.LIBRARY_PLAYLISTS,
];

/**
 * StaticCatalogProvider – serves a fixed catalog (inline or from a JSON file).
 * Useful for local collections exported to JSON and as a deterministic provider in development.
 */
export class StaticCatalogProvider implements MusicProvider {
  readonly domain: string;
  readonly instanceId: string;
  readonly name: string;
  readonly supportedFeatures = new Set<ProviderFeature>(STATIC_FEATURES);
  readonly available = true;

  private readonly catalog: StaticCatalog;

  constructor(options: StaticProviderOptions) {
    this.instanceId = options.instanceId;
    this.domain = options.domain ?? 'static';
    this.name = options.name ?? `Static catalog (${options.instanceId})`;
    this.catalog = catalogSchema.parse(options.catalog);
  }

  /**
   * Reads and validates a catalog file.
   */
  static async fromFile(file: string, options: Omit<StaticProviderOptions, 'catalog'>): Promise<StaticCatalogProvider> {
    const raw = await readJson<unknown>(file);
    if (raw === undefined) {
      logger.warn(`[StaticCatalogProvider] Catalog ${file} missing. Serving an empty catalog.`);
    }
    const catalog = catalogSchema.parse(raw ?? {});
    return new StaticCatalogProvider({ ...options, catalog });
  }

  private mapping(itemId: string): ProviderMapping[] {
    return [{ itemId, providerDomain: this.domain, providerInstance: this.instanceId }];
  }

  private buildArtist(id: string): Artist {
    const entry = this.catalog.artists.find((artist) => artist.id === id);
    if (!entry) throw new MediaNotFoundError(`Artist ${id} not found on ${this.instanceId}`);
    return {
      mediaType: MediaType.ARTIST,
      itemId: entry.id,
      provider: this.instanceId,
      name: entry.name,
      sortName: createSortName(entry.name),
      version: '',
      externalId: entry.externalId,
      metadata: {},
      providerMappings: this.mapping(entry.id),
      inLibrary: entry.inLibrary ?? false,
    };
  }

  private buildAlbum(id: string): Album {
    const entry = this.catalog.albums.find((album) => album.id === id);
    if (!entry) throw new MediaNotFoundError(`Album ${id} not found on ${this.instanceId}`);
    return {
      mediaType: MediaType.ALBUM,
      itemId: entry.id,
      provider: this.instanceId,
      name: entry.name,
      sortName: createSortName(entry.name),
      version: entry.version ?? '',
      metadata: {},
      providerMappings: this.mapping(entry.id),
      inLibrary: entry.inLibrary ?? false,
      artists: entry.artistIds.map((artistId) => this.buildArtist(artistId)),
      albumType: entry.albumType ?? AlbumType.UNKNOWN,
      year: entry.year,
    };
  }

  private buildTrack(id: string): Track {
    const entry = this.catalog.tracks.find((track) => track.id === id);
    if (!entry) throw new MediaNotFoundError(`Track ${id} not found on ${this.instanceId}`);
    return {
      mediaType: MediaType.TRACK,
      itemId: entry.id,
      provider: this.instanceId,
      name: entry.name,
      sortName: createSortName(entry.name),
      version: entry.version ?? '',
      metadata: {},
      providerMappings: this.mapping(entry.id),
      inLibrary: entry.inLibrary ?? false,
      artists: entry.artistIds.map((artistId) => this.buildArtist(artistId)),
      album: entry.albumId ? this.buildAlbum(entry.albumId) : undefined,
      duration: entry.duration,
      trackNumber: entry.trackNumber,
    };
  }

  private buildPlaylist(id: string): Playlist {
    const entry = this.catalog.playlists.find((playlist) => playlist.id === id);
    if (!entry) throw new MediaNotFoundError(`Playlist ${id} not found on ${this.instanceId}`);
    return {
      mediaType: MediaType.PLAYLIST,
      itemId: entry.id,
      provider: this.instanceId,
      name: entry.name,
      sortName: createSortName(entry.name),
      version: '',
      metadata: {},
      providerMappings: this.mapping(entry.id),
      inLibrary: entry.inLibrary ?? false,
      owner: entry.owner,
      isEditable: false,
    };
  }

  async getArtist(itemId: string): Promise<Artist> {
    return this.buildArtist(itemId);
  }

  async getAlbum(itemId: string): Promise<Album> {
    return this.buildAlbum(itemId);
  }

  async getTrack(itemId: string): Promise<Track> {
    return this.buildTrack(itemId);
  }

  async getPlaylist(itemId: string): Promise<Playlist> {
    return this.buildPlaylist(itemId);
  }

  async getArtistAlbums(itemId: string): Promise<Album[]> {
    return this.catalog.albums
      .filter((album) => album.artistIds.includes(itemId))
      .map((album) => this.buildAlbum(album.id));
  }

  /** Explicit `topTrackIds` when present, otherwise every track credited to the artist. */
  async getArtistTopTracks(itemId: string): Promise<Track[]> {
    const artist = this.catalog.artists.find((entry) => entry.id === itemId);
    const ids =
      artist?.topTrackIds ??
      this.catalog.tracks.filter((track) => track.artistIds.includes(itemId)).map((track) => track.id);
    return ids.map((id) => this.buildTrack(id));
  }

  async getAlbumTracks(itemId: string): Promise<Track[]> {
    return this.catalog.tracks
      .filter((track) => track.albumId === itemId)
      .map((track) => this.buildTrack(track.id));
  }

  async getPlaylistTracks(itemId: string): Promise<Track[]> {
    const playlist = this.buildPlaylist(itemId);
    const entry = this.catalog.playlists.find((candidate) => candidate.id === playlist.itemId);
    return (entry?.trackIds ?? []).map((id) => this.buildTrack(id));
  }

  /**
   * Substring search on safe strings. Tracks and albums also match on "artist title" combinations.
   */
  async search(query: string, mediaTypes: MediaType[], limit: number): Promise<SearchResults> {
    const needle = createSafeString(query);
    const results = emptySearchResults();
    if (!needle) return results;

    const artistNames = (ids: string[]) =>
      ids.map((id) => this.catalog.artists.find((artist) => artist.id === id)?.name ?? '').join(' ');
    const hit = (...candidates: string[]) => candidates.some((candidate) => createSafeString(candidate).includes(needle));

    if (mediaTypes.includes(MediaType.ARTIST)) {
      results.artists = this.catalog.artists
        .filter((artist) => hit(artist.name))
        .slice(0, limit)
        .map((artist) => this.buildArtist(artist.id));
    }
    if (mediaTypes.includes(MediaType.ALBUM)) {
      results.albums = this.catalog.albums
        .filter((album) => hit(album.name, `${artistNames(album.artistIds)} ${album.name}`))
        .slice(0, limit)
        .map((album) => this.buildAlbum(album.id));
    }
    if (mediaTypes.includes(MediaType.TRACK)) {
      results.tracks = this.catalog.tracks
        .filter((track) => hit(track.name, `${artistNames(track.artistIds)} ${track.name}`))
        .slice(0, limit)
        .map((track) => this.buildTrack(track.id));
    }
    if (mediaTypes.includes(MediaType.PLAYLIST)) {
      results.playlists = this.catalog.playlists
        .filter((playlist) => hit(playlist.name))
        .slice(0, limit)
        .map((playlist) => this.buildPlaylist(playlist.id));
    }
    return results;
  }

  /** Items flagged `inLibrary` in the catalog. */
  async getLibraryItems(mediaType: MediaType): Promise<MediaItem[]> {
    switch (mediaType) {
      case MediaType.ARTIST:
        return this.catalog.artists.filter((entry) => entry.inLibrary).map((entry) => this.buildArtist(entry.id));
      case MediaType.ALBUM:
        return this.catalog.albums.filter((entry) => entry.inLibrary).map((entry) => this.buildAlbum(entry.id));
      case MediaType.TRACK:
        return this.catalog.tracks.filter((entry) => entry.inLibrary).map((entry) => this.buildTrack(entry.id));
      case MediaType.PLAYLIST:
        return this.catalog.playlists.filter((entry) => entry.inLibrary).map((entry) => this.buildPlaylist(entry.id));
      default:
        return [];
    }
  }
}
