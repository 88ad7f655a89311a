import { z } from 'zod';
import {
  Artist,
  LIBRARY_PROVIDER,
  MediaItem,
  MediaType,
  ProviderMapping,
  metadataSchema,
  providerMappingSchema,
} from '../models/mediaItems';
import { Row } from '../storage/rowStore';

export const DB_TABLE_ARTISTS = 'artists';
export const DB_TABLE_ALBUMS = 'albums';
export const DB_TABLE_TRACKS = 'tracks';
export const DB_TABLE_PLAYLISTS = 'playlists';
export const DB_TABLE_PROVIDER_MAPPINGS = 'provider_mappings';

/**
 * Column holding JSON text that decodes into `schema`.
 */
export function jsonColumn<S extends z.ZodTypeAny>(schema: S) {
  return z
    .string()
    .transform((text, ctx): unknown => {
      try {
        return JSON.parse(text);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'column does not hold valid JSON' });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const baseRowSchema = z.object({
  item_id: z.union([z.string(), z.number()]).transform(String),
  name: z.string(),
  sort_name: z.string(),
  version: z.string(),
  external_id: z.string().nullable(),
  in_library: z.boolean(),
  timestamp_added: z.number(),
  timestamp_modified: z.number(),
  metadata: jsonColumn(metadataSchema),
  provider_mappings: jsonColumn(z.array(providerMappingSchema)),
});

const mappingRowSchema = z.object({
  item_id: z.string(),
  media_type: z.nativeEnum(MediaType),
  provider_domain: z.string(),
  provider_instance: z.string(),
  provider_item_id: z.string(),
  url: z.string().nullable(),
});

/** Columns shared by every media table, as a library item (without its discriminant). */
export type BaseFields = Omit<Artist, 'mediaType'>;

export function parseBaseColumns(row: Row): BaseFields {
  const parsed = baseRowSchema.parse(row);
  return {
    itemId: parsed.item_id,
    provider: LIBRARY_PROVIDER,
    name: parsed.name,
    sortName: parsed.sort_name,
    version: parsed.version,
    externalId: parsed.external_id ?? undefined,
    metadata: parsed.metadata,
    providerMappings: parsed.provider_mappings,
    inLibrary: parsed.in_library,
    timestampAdded: parsed.timestamp_added,
    timestampModified: parsed.timestamp_modified,
  };
}

/** Shared columns except ids and timestamps, which the controller owns. */
export function baseColumns(item: MediaItem): Row {
  return {
    name: item.name,
    sort_name: item.sortName,
    version: item.version,
    external_id: item.externalId ?? null,
    in_library: item.inLibrary,
    metadata: JSON.stringify(item.metadata),
    provider_mappings: JSON.stringify(item.providerMappings),
  };
}

export function mappingRow(itemId: string, mediaType: MediaType, mapping: ProviderMapping): Row {
  return {
    item_id: itemId,
    media_type: mediaType,
    provider_domain: mapping.providerDomain,
    provider_instance: mapping.providerInstance,
    provider_item_id: mapping.itemId,
    url: mapping.url ?? null,
  };
}

export function parseMappingRow(row: Row): ProviderMapping & { libraryItemId: string } {
  const parsed = mappingRowSchema.parse(row);
  return {
    libraryItemId: parsed.item_id,
    itemId: parsed.provider_item_id,
    providerDomain: parsed.provider_domain,
    providerInstance: parsed.provider_instance,
    url: parsed.url ?? undefined,
  };
}

/** Substring that identifies a reference to library item `itemId` inside a JSON ref column. */
export function refNeedle(itemId: string): string {
  return `"itemId":${JSON.stringify(itemId)}`;
}

/** Substring that identifies a mapping on `instanceId` inside the provider_mappings column. */
export function providerInstanceNeedle(instanceId: string): string {
  return `"providerInstance":${JSON.stringify(instanceId)}`;
}

export function utcTimestamp(): number {
  return Math.floor(Date.now() / 1000);
}
