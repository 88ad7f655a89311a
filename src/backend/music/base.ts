import PQueue from 'p-queue';
import { z } from 'zod';
import logger from '../../utils/logger';
import type { MatchingConfig } from '../../config/configStore';
import type { CacheStore } from '../storage/cacheStore';
import type { Row, RowQuery, RowStore } from '../storage/rowStore';
import { EventNotifier, EventType } from '../events/eventNotifier';
import type { MetadataController } from '../metadata/metadataController';
import { ProviderRegistry } from '../provider/registry';
import { MusicProvider, ProviderFeature, hasFeature, isFileProvider } from '../provider/types';
import { createSafeString } from '../models/compare';
import {
  InvariantViolationError,
  MediaLibraryError,
  MediaNotFoundError,
  ProviderUnavailableError,
  UnsupportedFeatureError,
  errorMessage,
  isMediaNotFound,
} from '../models/errors';
import {
  ItemMapping,
  LIBRARY_PROVIDER,
  MediaItem,
  PagedItems,
  ProviderMapping,
  SearchResults,
  isItemMapping,
  itemUri,
  mergeMetadata,
  normalizeIdentity,
  providerMappingKey,
  unionProviderMappings,
} from '../models/mediaItems';
import {
  DB_TABLE_PROVIDER_MAPPINGS,
  baseColumns,
  mappingRow,
  parseMappingRow,
  providerInstanceNeedle,
  refNeedle,
  utcTimestamp,
} from './dbRows';
import type { ArtistsController } from './artists';
import type { AlbumsController } from './albums';
import type { TracksController } from './tracks';
import type { PlaylistsController } from './playlists';

/**
 * Everything a media controller needs from its owner. Implemented by MusicController.
 */
export interface MusicContext {
  readonly db: RowStore;
  readonly cache: CacheStore;
  readonly providers: ProviderRegistry;
  readonly events: EventNotifier;
  readonly metadata: MetadataController;
  readonly matching: MatchingConfig;
  readonly artists: ArtistsController;
  readonly albums: AlbumsController;
  readonly tracks: TracksController;
  readonly playlists: PlaylistsController;
}

export interface LibraryItemsOptions {
  inLibrary?: boolean;
  search?: string;
  limit?: number;
  offset?: number;
  orderBy?: string;
  descending?: boolean;
}

export interface GetOptions {
  addToLibrary?: boolean;
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

export interface AddOptions {
  /** Run cross-provider matching once the item is stored. */
  matchProviders?: boolean;
  /** Providers searched at the same time while matching. Defaults to `matching.concurrency`. */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface UpdateOptions {
  /** Explicit user edit: incoming display fields replace the stored ones. */
  overwrite?: boolean;
  signal?: AbortSignal;
}

export interface DeleteOptions {
  recursive?: boolean;
  signal?: AbortSignal;
}

export interface MatchOptions {
  /** Providers searched at the same time. Defaults to `matching.concurrency`. */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface MatchReport {
  matched: string[];
  unmatched: string[];
}

/** A table whose rows reference this controller's items through a JSON ref column. */
export interface DependentTable {
  table: string;
  column: string;
  owner: { delete(itemId: string, options?: DeleteOptions): Promise<void> };
}

export interface ListingRequest<C extends MediaItem> {
  /** Listing kind, part of the cache key (`artist_albums`, `album_tracks`...). */
  kind: string;
  mapping: ProviderMapping;
  checksum?: string;
  feature: ProviderFeature;
  schema: z.ZodType<C, z.ZodTypeDef, unknown>;
  /** Native provider call; `undefined` when the provider does not implement it. */
  native: (provider: MusicProvider) => Promise<C[]> | undefined;
  /** Local approximation used when the provider lacks the feature. */
  fallback?: (provider: MusicProvider) => Promise<C[]>;
}

const DEFAULT_PAGE_SIZE = 500;
const DEPENDENT_SCAN_LIMIT = 100000;

/**
 * Merges per-provider child listings on (safe name, version). Mapping sets are unioned and the
 * library flag is OR-ed, never downgraded.
 */
export function mergeListingDuplicates<C extends MediaItem>(items: C[]): C[] {
  const merged = new Map<string, C>();
  for (const item of items) {
    const key = `${createSafeString(item.name)}.${item.version.toLowerCase()}`;
    const existing = merged.get(key);
    if (!existing) {
      merged.set(key, item);
      continue;
    }
    merged.set(key, {
      ...existing,
      providerMappings: unionProviderMappings(existing.providerMappings, item.providerMappings),
      inLibrary: existing.inLibrary || item.inLibrary,
    });
  }
  return Array.from(merged.values());
}

/**
 * Generic entity controller. One instance per media type; the subclasses only supply the per-type
 * policy (row columns, provider getters, identity checks, dependents and match strategy).
 */
export abstract class MediaControllerBase<T extends MediaItem> {
  abstract readonly mediaType: T['mediaType'];
  abstract readonly dbTable: string;

  /** Serialises identity resolution and writes for this media type. */
  protected readonly addLock = new PQueue({ concurrency: 1 });

  constructor(protected readonly music: MusicContext) {}

  protected abstract parseRow(row: Row): T;
  protected abstract typeColumns(item: T): Row;
  protected abstract fetchFromProvider(provider: MusicProvider, itemId: string): Promise<T>;
  protected abstract pickSearchResults(results: SearchResults): T[];
  protected abstract matchOnProvider(item: T, provider: MusicProvider, signal?: AbortSignal): Promise<T | undefined>;

  /** Re-derives sort names, including those of nested references. */
  protected normalize(item: T): T {
    return normalizeIdentity(item);
  }

  /** Reserved-entity rewrites applied on every ingest. */
  protected canonicalize(item: T): T {
    return item;
  }

  /** Best-effort external metadata lookup. */
  protected async enrich(item: T): Promise<T> {
    return item;
  }

  /** Swaps nested provider references for library references, adding them when needed. */
  protected async resolveReferences(item: T, _signal?: AbortSignal): Promise<T> {
    return item;
  }

  /** Extra identity checks for a candidate found by sort name. */
  protected isSameEntity(_candidate: T, _item: T): boolean {
    return true;
  }

  /** Type-specific fields of a merge; base fields are handled by the caller. */
  protected mergeTypeFields(current: T, _incoming: T, _authoritative: boolean): T {
    return current;
  }

  protected dependents(): DependentTable[] {
    return [];
  }

  protected get logName(): string {
    return `${this.mediaType.charAt(0).toUpperCase()}${this.mediaType.slice(1)}sController`;
  }

  // ---------------------------------------------------------------------------
  // Reads

  async libraryItems(options: LibraryItemsOptions = {}): Promise<PagedItems<T>> {
    const limit = options.limit ?? DEFAULT_PAGE_SIZE;
    const offset = options.offset ?? 0;
    const filter: RowQuery = {
      match: options.inLibrary !== undefined ? { in_library: options.inLibrary } : undefined,
      contains: options.search ? { name: options.search } : undefined,
    };
    const rows = await this.music.db.getRowsFromQuery(this.dbTable, {
      ...filter,
      orderBy: options.orderBy ?? 'sort_name',
      descending: options.descending,
      limit,
      offset,
    });
    const total = await this.music.db.count(this.dbTable, filter);
    return { items: rows.map((row) => this.parseRow(row)), total, limit, offset };
  }

  /** Library rows matching a raw query. */
  async queryLibrary(query: RowQuery, limit?: number): Promise<T[]> {
    const rows = await this.music.db.getRowsFromQuery(this.dbTable, query, limit);
    return rows.map((row) => this.parseRow(row));
  }

  async getLibraryItem(itemId: string): Promise<T> {
    const row = await this.music.db.getRow(this.dbTable, { item_id: itemId });
    if (!row) throw new MediaNotFoundError(`${this.mediaType} ${itemId} not found in library`);
    return this.parseRow(row);
  }

  /**
   * Library item linked to a provider item. `provider` may be an instance id or a domain.
   */
  async getLibraryItemByProviderId(itemId: string, provider: string): Promise<T | undefined> {
    if (provider === LIBRARY_PROVIDER) {
      return this.getLibraryItem(itemId).catch((error: unknown) => {
        if (isMediaNotFound(error)) return undefined;
        throw error;
      });
    }
    const rows = await this.music.db.getRows(DB_TABLE_PROVIDER_MAPPINGS, {
      media_type: this.mediaType,
      provider_item_id: itemId,
    });
    const mapping = rows
      .map((row) => parseMappingRow(row))
      .find((candidate) => candidate.providerInstance === provider || candidate.providerDomain === provider);
    if (!mapping) return undefined;
    const row = await this.music.db.getRow(this.dbTable, { item_id: mapping.libraryItemId });
    return row ? this.parseRow(row) : undefined;
  }

  /**
   * Full record straight from a provider. Provider failures surface as ProviderUnavailableError.
   */
  async getProviderItem(itemId: string, provider: string): Promise<T> {
    if (provider === LIBRARY_PROVIDER) return this.getLibraryItem(itemId);
    const handle = this.music.providers.resolve(provider);
    if (!handle) throw new MediaNotFoundError(`Provider ${provider} is not available`);
    try {
      return this.normalize(await this.fetchFromProvider(handle, itemId));
    } catch (error) {
      if (error instanceof MediaLibraryError) throw error;
      throw new ProviderUnavailableError(
        `${handle.instanceId} failed to return ${this.mediaType} ${itemId}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  async get(itemId: string, provider: string, options: GetOptions = {}): Promise<T> {
    const { addToLibrary = false, forceRefresh = false, signal } = options;
    if (provider === LIBRARY_PROVIDER) {
      const item = await this.getLibraryItem(itemId);
      return forceRefresh ? this.refresh(item, signal) : item;
    }
    const existing = await this.getLibraryItemByProviderId(itemId, provider);
    if (existing && !forceRefresh) return existing;
    const fresh = await this.getProviderItem(itemId, provider);
    if (existing) return this.update(existing.itemId, fresh, { signal });
    if (addToLibrary) return this.add(fresh, { signal });
    return fresh;
  }

  /** Re-reads a library item from the first mapped provider that answers. */
  private async refresh(item: T, signal?: AbortSignal): Promise<T> {
    for (const mapping of item.providerMappings) {
      signal?.throwIfAborted();
      try {
        const fresh = await this.getProviderItem(mapping.itemId, mapping.providerInstance);
        return await this.update(item.itemId, fresh, { signal });
      } catch (error) {
        if (signal?.aborted) throw error;
        logger.warn(`[${this.logName}] Refresh of ${itemUri(item)} from ${mapping.providerInstance} failed: ${errorMessage(error)}`);
      }
    }
    return item;
  }

  /**
   * Search one provider, or the library when `provider` is `library`.
   */
  async search(query: string, provider: string = LIBRARY_PROVIDER, limit = 25): Promise<T[]> {
    if (provider === LIBRARY_PROVIDER) {
      return (await this.libraryItems({ search: query, limit })).items;
    }
    const handle = this.music.providers.resolve(provider);
    if (!handle) throw new MediaNotFoundError(`Provider ${provider} is not available`);
    if (!hasFeature(handle, ProviderFeature.SEARCH) || !handle.search) {
      throw new UnsupportedFeatureError(`${handle.instanceId} does not support search`);
    }
    try {
      const results = await handle.search(query, [this.mediaType], limit);
      return this.pickSearchResults(results).map((item) => this.normalize(item));
    } catch (error) {
      throw new ProviderUnavailableError(`${handle.instanceId} search failed: ${errorMessage(error)}`, error);
    }
  }

  /** Search used by matching: unsupported or failing providers simply yield nothing. */
  async searchProvider(provider: MusicProvider, query: string, limit = 25): Promise<T[]> {
    if (!hasFeature(provider, ProviderFeature.SEARCH) || !provider.search) return [];
    try {
      const results = await provider.search(query, [this.mediaType], limit);
      return this.pickSearchResults(results).map((item) => this.normalize(item));
    } catch (error) {
      logger.warn(`[${this.logName}] Search "${query}" on ${provider.instanceId} failed: ${errorMessage(error)}`);
      return [];
    }
  }

  // ---------------------------------------------------------------------------
  // Writes

  /**
   * Add a provider item to the library, or merge it into the row it resolves to.
   */
  async add(item: T, options: AddOptions = {}): Promise<T> {
    const { matchProviders = false, concurrency, signal } = options;
    if (item.provider === LIBRARY_PROVIDER) {
      return this.update(item.itemId, item, { signal });
    }
    if (item.providerMappings.length === 0) {
      throw new InvariantViolationError(`${this.mediaType} "${item.name}" has no provider mappings`);
    }
    signal?.throwIfAborted();

    const enriched = await this.enrich(this.canonicalize(this.normalize(item)));
    const prepared = this.canonicalize(await this.resolveReferences(enriched, signal));
    signal?.throwIfAborted();

    const { stored, created } = await this.addLock.add(() => this.addLocked(prepared, signal));

    this.music.events.emit(created ? EventType.MEDIA_ITEM_ADDED : EventType.MEDIA_ITEM_UPDATED, itemUri(stored), stored);
    if (!matchProviders) return stored;
    // The row is committed and announced even when matching is aborted.
    await this.match(stored, { concurrency, signal });
    return this.getLibraryItem(stored.itemId);
  }

  private async addLocked(item: T, signal?: AbortSignal): Promise<{ stored: T; created: boolean }> {
    const existing = await this.findExisting(item);
    if (existing) {
      logger.debug(`[${this.logName}] "${item.name}" resolved to ${itemUri(existing)}`);
      return { stored: await this.updateLocked(existing.itemId, item, false), created: false };
    }
    signal?.throwIfAborted();

    const now = utcTimestamp();
    const inserted = await this.music.db.insert(this.dbTable, {
      ...this.toColumns(item),
      timestamp_added: now,
      timestamp_modified: now,
    });
    const itemId = String(inserted.item_id);
    await this.writeMappings(itemId, item.providerMappings);
    logger.debug(`[${this.logName}] Added ${this.mediaType} "${item.name}" as ${itemId}`);
    return { stored: await this.getLibraryItem(itemId), created: true };
  }

  /**
   * Identity resolution: known provider mapping, then external id, then a bounded scan of rows
   * with the same sort name (most recently modified first).
   */
  private async findExisting(item: T): Promise<T | undefined> {
    for (const mapping of item.providerMappings) {
      const rows = await this.music.db.getRows(DB_TABLE_PROVIDER_MAPPINGS, {
        media_type: this.mediaType,
        provider_domain: mapping.providerDomain,
        provider_item_id: mapping.itemId,
      });
      for (const row of rows) {
        const linked = await this.music.db.getRow(this.dbTable, { item_id: parseMappingRow(row).libraryItemId });
        if (linked) return this.parseRow(linked);
      }
    }
    if (item.externalId) {
      const row = await this.music.db.getRow(this.dbTable, { external_id: item.externalId });
      if (row) return this.parseRow(row);
    }
    const candidates = await this.music.db.getRows(
      this.dbTable,
      { sort_name: item.sortName },
      { orderBy: 'timestamp_modified', descending: true, limit: this.music.matching.maxSortNameCandidates },
    );
    for (const row of candidates) {
      const candidate = this.parseRow(row);
      if (this.isSameEntity(candidate, item)) return candidate;
    }
    return undefined;
  }

  /**
   * Merge new data into an existing library item. `overwrite` marks an explicit user edit.
   */
  async update(itemId: string, item: T, options: UpdateOptions = {}): Promise<T> {
    const { overwrite = false, signal } = options;
    if (item.providerMappings.length === 0) {
      throw new InvariantViolationError(`${this.mediaType} "${item.name}" has no provider mappings`);
    }
    signal?.throwIfAborted();
    const prepared = this.canonicalize(await this.resolveReferences(this.canonicalize(this.normalize(item)), signal));
    signal?.throwIfAborted();
    const updated = await this.addLock.add(() => this.updateLocked(itemId, prepared, overwrite));
    this.music.events.emit(EventType.MEDIA_ITEM_UPDATED, itemUri(updated), updated);
    return updated;
  }

  private async updateLocked(itemId: string, item: T, overwrite: boolean): Promise<T> {
    const current = await this.getLibraryItem(itemId);
    const authoritative = overwrite || this.isFileSourced(item);
    const typed = this.mergeTypeFields(current, item, authoritative);
    const merged = this.canonicalize({
      ...typed,
      name: authoritative ? item.name : current.name,
      sortName: authoritative ? item.sortName : current.sortName,
      version: authoritative ? item.version : current.version,
      externalId: authoritative ? item.externalId ?? current.externalId : current.externalId ?? item.externalId,
      metadata: mergeMetadata(current.metadata, item.metadata, authoritative),
      providerMappings: unionProviderMappings(current.providerMappings, item.providerMappings),
      inLibrary: current.inLibrary || item.inLibrary,
    });

    await this.music.db.update(
      this.dbTable,
      { item_id: itemId },
      { ...this.toColumns(merged), timestamp_modified: utcTimestamp() },
    );
    await this.writeMappings(itemId, merged.providerMappings);
    logger.debug(`[${this.logName}] Updated ${this.mediaType} ${itemId} (authoritative: ${authoritative})`);
    return this.getLibraryItem(itemId);
  }

  private isFileSourced(item: T): boolean {
    const source = item.providerMappings.find((mapping) => mapping.providerInstance === item.provider);
    return source !== undefined && isFileProvider(source.providerDomain);
  }

  async setInLibrary(itemId: string, inLibrary: boolean): Promise<T> {
    const updated = await this.music.db.update(
      this.dbTable,
      { item_id: itemId },
      { in_library: inLibrary, timestamp_modified: utcTimestamp() },
    );
    if (updated === 0) throw new MediaNotFoundError(`${this.mediaType} ${itemId} not found in library`);
    const item = await this.getLibraryItem(itemId);
    this.music.events.emit(EventType.MEDIA_ITEM_UPDATED, itemUri(item), item);
    return item;
  }

  /**
   * Delete a library item. Dependents block the delete unless `recursive`, in which case they are
   * deleted first. Not locked: callers must not race a delete against writes to the same id.
   */
  async delete(itemId: string, options: DeleteOptions = {}): Promise<void> {
    const { recursive = false, signal } = options;
    const item = await this.getLibraryItem(itemId);

    const found: Array<{ dependent: DependentTable; ids: string[] }> = [];
    for (const dependent of this.dependents()) {
      const rows = await this.music.db.getRowsFromQuery(
        dependent.table,
        { contains: { [dependent.column]: refNeedle(itemId) } },
        DEPENDENT_SCAN_LIMIT,
      );
      if (rows.length > 0) found.push({ dependent, ids: rows.map((row) => String(row.item_id)) });
    }
    const total = found.reduce((sum, entry) => sum + entry.ids.length, 0);
    if (total > 0 && !recursive) {
      const detail = found.map((entry) => `${entry.ids.length} in ${entry.dependent.table}`).join(', ');
      throw new InvariantViolationError(`${this.mediaType} ${itemId} still has dependents (${detail})`);
    }

    for (const { dependent, ids } of found) {
      for (const id of ids) {
        signal?.throwIfAborted();
        try {
          await dependent.owner.delete(id, { recursive: true, signal });
        } catch (error) {
          if (!isMediaNotFound(error)) throw error;
        }
      }
    }
    signal?.throwIfAborted();

    await this.music.db.delete(this.dbTable, { item_id: itemId });
    await this.music.db.delete(DB_TABLE_PROVIDER_MAPPINGS, { media_type: this.mediaType, item_id: itemId });
    logger.debug(`[${this.logName}] Deleted ${this.mediaType} ${itemId} "${item.name}"`);
    this.music.events.emit(EventType.MEDIA_ITEM_DELETED, itemUri(item), { itemId });
  }

  private toColumns(item: T): Row {
    return { ...baseColumns(item), ...this.typeColumns(item) };
  }

  /** Inserts the mapping-table rows that are not there yet. Mappings only ever grow. */
  private async writeMappings(itemId: string, mappings: ProviderMapping[]): Promise<void> {
    const rows = await this.music.db.getRows(DB_TABLE_PROVIDER_MAPPINGS, { item_id: itemId, media_type: this.mediaType });
    const known = new Set(rows.map((row) => providerMappingKey(parseMappingRow(row))));
    for (const mapping of mappings) {
      if (known.has(providerMappingKey(mapping))) continue;
      await this.music.db.insert(DB_TABLE_PROVIDER_MAPPINGS, mappingRow(itemId, this.mediaType, mapping));
    }
  }

  /**
   * Library item for a nested reference. Library refs are read back, anything else is looked up by
   * provider id and added when unknown.
   */
  async resolveLibraryRef(ref: T | ItemMapping, signal?: AbortSignal): Promise<T> {
    if (ref.provider === LIBRARY_PROVIDER) return this.getLibraryItem(ref.itemId);
    const existing = await this.getLibraryItemByProviderId(ref.itemId, ref.provider);
    if (existing) return existing;
    const full = isItemMapping(ref) ? await this.getProviderItem(ref.itemId, ref.provider) : ref;
    return this.add(full, { signal });
  }

  // ---------------------------------------------------------------------------
  // Listings

  /**
   * One provider's listing for one parent, served from the cache while the checksum matches.
   * An unknown or unavailable provider yields an empty listing.
   */
  protected async fetchProviderListing<C extends MediaItem>(request: ListingRequest<C>): Promise<C[]> {
    const provider = this.music.providers.resolve(request.mapping.providerInstance);
    if (!provider) return [];
    const cacheKey = `${provider.instanceId}.${request.kind}.${request.mapping.itemId}`;

    const cached = await this.readCache(cacheKey, request.checksum);
    if (cached !== undefined) {
      const parsed = z.array(request.schema).safeParse(cached);
      if (parsed.success) return parsed.data;
      logger.debug(`[${this.logName}] Discarding malformed cache entry ${cacheKey}`);
    }

    let items: C[];
    const pending = hasFeature(provider, request.feature) ? request.native(provider) : undefined;
    if (pending) {
      items = (await pending).map((item) => normalizeIdentity(item));
    } else if (request.fallback) {
      items = await request.fallback(provider);
    } else {
      return [];
    }

    void this.music.cache.set(cacheKey, items, request.checksum).catch((error: unknown) => {
      logger.warn(`[${this.logName}] Cache write ${cacheKey} failed: ${errorMessage(error)}`);
    });
    return items;
  }

  private async readCache(key: string, checksum?: string): Promise<unknown> {
    try {
      return await this.music.cache.get(key, checksum);
    } catch (error) {
      logger.warn(`[${this.logName}] Cache read ${key} failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * Fan out over every mapping of `parent` and merge the per-provider listings. A failing provider
   * contributes nothing.
   */
  protected async aggregateListing<C extends MediaItem>(
    parent: T,
    fetchOne: (mapping: ProviderMapping) => Promise<C[]>,
    signal?: AbortSignal,
  ): Promise<C[]> {
    signal?.throwIfAborted();
    const settled = await Promise.allSettled(parent.providerMappings.map((mapping) => fetchOne(mapping)));
    signal?.throwIfAborted();
    const items: C[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        items.push(...result.value);
      } else {
        const instance = parent.providerMappings[index].providerInstance;
        logger.warn(`[${this.logName}] Listing for ${itemUri(parent)} on ${instance} failed: ${errorMessage(result.reason)}`);
      }
    });
    return mergeListingDuplicates(items);
  }

  /**
   * Local approximation of a provider listing: library children that reference the parent's
   * library row and carry a mapping on the same provider instance.
   */
  protected async libraryChildren<C extends MediaItem>(
    children: MediaControllerBase<C>,
    column: string,
    parentMapping: ProviderMapping,
  ): Promise<C[]> {
    const parent = await this.getLibraryItemByProviderId(parentMapping.itemId, parentMapping.providerInstance);
    if (!parent) return [];
    return children.queryLibrary({
      contains: {
        [column]: refNeedle(parent.itemId),
        provider_mappings: providerInstanceNeedle(parentMapping.providerInstance),
      },
    });
  }

  // ---------------------------------------------------------------------------
  // Matching

  /**
   * Link a library item to every active search-capable provider domain it is not mapped on yet.
   * Domains are tried in parallel up to `concurrency`; merges go through the add-lock one at a time.
   */
  async match(item: T, options: MatchOptions = {}): Promise<MatchReport> {
    if (item.provider !== LIBRARY_PROVIDER) {
      throw new InvariantViolationError(`Only library items can be matched (got ${itemUri(item)})`);
    }
    const { signal } = options;
    const concurrency = Math.max(1, options.concurrency ?? this.music.matching.concurrency);
    const mappedDomains = new Set(item.providerMappings.map((mapping) => mapping.providerDomain));
    const byDomain = new Map<string, MusicProvider[]>();
    for (const provider of this.music.providers.activeProviders()) {
      if (mappedDomains.has(provider.domain) || !hasFeature(provider, ProviderFeature.SEARCH)) continue;
      byDomain.set(provider.domain, [...(byDomain.get(provider.domain) ?? []), provider]);
    }

    const report: MatchReport = { matched: [], unmatched: [] };
    if (byDomain.size === 0) return report;

    const queue = new PQueue({ concurrency });
    const settled = await Promise.allSettled(
      Array.from(byDomain.values()).map((providers) =>
        queue.add(() => this.matchDomain(item, providers, report, signal)),
      ),
    );
    signal?.throwIfAborted();
    for (const result of settled) {
      if (result.status === 'rejected') {
        logger.warn(`[${this.logName}] Matching ${itemUri(item)} failed: ${errorMessage(result.reason)}`);
      }
    }
    if (report.matched.length > 0) {
      const updated = await this.getLibraryItem(item.itemId);
      this.music.events.emit(EventType.MEDIA_ITEM_UPDATED, itemUri(updated), updated);
    }
    return report;
  }

  /** Instances of one domain are tried in turn until one matches. */
  private async matchDomain(item: T, providers: MusicProvider[], report: MatchReport, signal?: AbortSignal): Promise<void> {
    for (const provider of providers) {
      signal?.throwIfAborted();
      let found: T | undefined;
      try {
        found = await this.matchOnProvider(item, provider, signal);
      } catch (error) {
        if (signal?.aborted) throw error;
        logger.warn(`[${this.logName}] Match attempt for "${item.name}" on ${provider.instanceId} failed: ${errorMessage(error)}`);
      }
      if (found) {
        const prepared = this.canonicalize(await this.resolveReferences(this.normalize(found), signal));
        signal?.throwIfAborted();
        await this.addLock.add(() => this.updateLocked(item.itemId, prepared, false));
        report.matched.push(provider.instanceId);
        logger.info(`[${this.logName}] Matched ${this.mediaType} "${item.name}" on ${provider.instanceId}`);
        return;
      }
      report.unmatched.push(provider.instanceId);
      logger.debug(`[${this.logName}] No match for ${this.mediaType} "${item.name}" on ${provider.instanceId}`);
    }
  }

  /** Provider handle for a mapping, if that instance is available. */
  protected providerFor(mapping: ProviderMapping): MusicProvider | undefined {
    return this.music.providers.resolve(mapping.providerInstance);
  }
}
