import { z } from 'zod';
import { createSortName } from './compare';

/**
 * Media item model shared by providers, storage and controllers.
 * Types are inferred from zod schemas so anything read back from disk or cache is validated once at the edge.
 */

export enum MediaType {
  ARTIST = 'artist',
  ALBUM = 'album',
  TRACK = 'track',
  PLAYLIST = 'playlist',
}

export enum AlbumType {
  ALBUM = 'album',
  SINGLE = 'single',
  COMPILATION = 'compilation',
  EP = 'ep',
  UNKNOWN = 'unknown',
}

/** Provider id used for canonical (locally stored) items. */
export const LIBRARY_PROVIDER = 'library';

export const VARIOUS_ARTISTS_NAME = 'Various Artists';
export const VARIOUS_ARTISTS_ID = '89ad4ac3-39f7-470e-963a-56509c546377';

export const providerMappingSchema = z.object({
  itemId: z.string(),
  providerDomain: z.string(),
  providerInstance: z.string(),
  url: z.string().optional(),
});

export const mediaImageSchema = z.object({
  type: z.string(),
  path: z.string(),
  provider: z.string().optional(),
});

export const metadataSchema = z.object({
  description: z.string().optional(),
  genres: z.array(z.string()).optional(),
  images: z.array(mediaImageSchema).optional(),
  popularity: z.number().optional(),
  checksum: z.string().optional(),
  lastRefresh: z.number().optional(),
});

export const itemMappingSchema = z.object({
  mediaType: z.nativeEnum(MediaType),
  itemId: z.string(),
  provider: z.string(),
  name: z.string(),
  sortName: z.string(),
  version: z.string(),
});

const baseShape = {
  itemId: z.string(),
  provider: z.string(),
  name: z.string(),
  sortName: z.string(),
  version: z.string(),
  externalId: z.string().optional(),
  metadata: metadataSchema,
  providerMappings: z.array(providerMappingSchema),
  inLibrary: z.boolean(),
  timestampAdded: z.number().optional(),
  timestampModified: z.number().optional(),
};

export const artistSchema = z.object({
  ...baseShape,
  mediaType: z.literal(MediaType.ARTIST),
});

const artistRefSchema = z.union([artistSchema, itemMappingSchema]);

export const albumSchema = z.object({
  ...baseShape,
  mediaType: z.literal(MediaType.ALBUM),
  artists: z.array(artistRefSchema),
  albumType: z.nativeEnum(AlbumType),
  year: z.number().optional(),
});

export const trackSchema = z.object({
  ...baseShape,
  mediaType: z.literal(MediaType.TRACK),
  artists: z.array(artistRefSchema),
  album: z.union([albumSchema, itemMappingSchema]).optional(),
  duration: z.number(),
  trackNumber: z.number().optional(),
  discNumber: z.number().optional(),
});

export const playlistSchema = z.object({
  ...baseShape,
  mediaType: z.literal(MediaType.PLAYLIST),
  owner: z.string(),
  isEditable: z.boolean(),
});

export const mediaItemSchema = z.discriminatedUnion('mediaType', [
  artistSchema,
  albumSchema,
  trackSchema,
  playlistSchema,
]);

export type ProviderMapping = z.infer<typeof providerMappingSchema>;
export type MediaImage = z.infer<typeof mediaImageSchema>;
export type MediaItemMetadata = z.infer<typeof metadataSchema>;
export type ItemMapping = z.infer<typeof itemMappingSchema>;
export type Artist = z.infer<typeof artistSchema>;
export type Album = z.infer<typeof albumSchema>;
export type Track = z.infer<typeof trackSchema>;
export type Playlist = z.infer<typeof playlistSchema>;
export type MediaItem = z.infer<typeof mediaItemSchema>;

export interface PagedItems<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

export interface SearchResults {
  artists: Artist[];
  albums: Album[];
  tracks: Track[];
  playlists: Playlist[];
}

export function emptySearchResults(): SearchResults {
  return { artists: [], albums: [], tracks: [], playlists: [] };
}

/** True when the reference is a lightweight mapping rather than a full item. */
export function isItemMapping(ref: MediaItem | ItemMapping): ref is ItemMapping {
  return !('providerMappings' in ref);
}

export function toItemMapping(item: MediaItem | ItemMapping): ItemMapping {
  return {
    mediaType: item.mediaType,
    itemId: item.itemId,
    provider: item.provider,
    name: item.name,
    sortName: item.sortName,
    version: item.version,
  };
}

/** `library://artist/12` or `spotify--main://track/abc`. */
export function itemUri(item: { mediaType: MediaType; provider: string; itemId: string }): string {
  return `${item.provider}://${item.mediaType}/${item.itemId}`;
}

/** Uniqueness key of a provider mapping within one canonical item. */
export function providerMappingKey(mapping: ProviderMapping): string {
  return `${mapping.providerDomain}/${mapping.itemId}`;
}

/**
 * Set union of provider mappings; the first occurrence of a key wins.
 */
export function unionProviderMappings(...sets: ProviderMapping[][]): ProviderMapping[] {
  const merged = new Map<string, ProviderMapping>();
  for (const set of sets) {
    for (const mapping of set) {
      const key = providerMappingKey(mapping);
      if (!merged.has(key)) merged.set(key, { ...mapping });
    }
  }
  return Array.from(merged.values());
}

/**
 * Merges incoming metadata into the current metadata.
 * Collections are unioned. Scalars fill gaps and only replace stored values when `allowOverwrite`
 * is set; freshness markers (`checksum`, `lastRefresh`) always follow the incoming record.
 */
export function mergeMetadata(
  current: MediaItemMetadata,
  incoming: MediaItemMetadata,
  allowOverwrite: boolean,
): MediaItemMetadata {
  const pick = <K extends 'description' | 'popularity'>(key: K): MediaItemMetadata[K] =>
    allowOverwrite ? incoming[key] ?? current[key] : current[key] ?? incoming[key];

  const images = new Map<string, MediaImage>();
  for (const image of [...(current.images ?? []), ...(incoming.images ?? [])]) {
    const key = `${image.type}|${image.path}`;
    if (!images.has(key)) images.set(key, image);
  }
  const genres = Array.from(new Set([...(current.genres ?? []), ...(incoming.genres ?? [])]));

  const merged: MediaItemMetadata = {};
  const description = pick('description');
  const popularity = pick('popularity');
  const checksum = incoming.checksum ?? current.checksum;
  const lastRefresh = incoming.lastRefresh ?? current.lastRefresh;
  if (description !== undefined) merged.description = description;
  if (popularity !== undefined) merged.popularity = popularity;
  if (genres.length > 0) merged.genres = genres;
  if (images.size > 0) merged.images = Array.from(images.values());
  if (checksum !== undefined) merged.checksum = checksum;
  if (lastRefresh !== undefined) merged.lastRefresh = lastRefresh;
  return merged;
}

/**
 * Re-derives identity-sensitive fields so every code path sees the same normalisation.
 */
export function normalizeIdentity<T extends MediaItem | ItemMapping>(item: T): T {
  return { ...item, name: item.name.trim(), sortName: createSortName(item.name), version: item.version.trim() };
}
