import { v4 as uuidv4 } from 'uuid';
import logger from '../../utils/logger';
import { MatchingConfig, defaultLibraryConfig } from '../../config/configStore';
import type { CacheStore } from '../storage/cacheStore';
import type { RowStore } from '../storage/rowStore';
import { EventNotifier, EventType } from '../events/eventNotifier';
import { MetadataController } from '../metadata/metadataController';
import { ProviderRegistry } from '../provider/registry';
import { MusicProvider, ProviderFeature, hasFeature } from '../provider/types';
import { MediaNotFoundError, errorMessage } from '../models/errors';
import {
  LIBRARY_PROVIDER,
  MediaItem,
  MediaType,
  SearchResults,
  emptySearchResults,
  normalizeIdentity,
} from '../models/mediaItems';
import { providerInstanceNeedle } from './dbRows';
import { AddOptions, MediaControllerBase, MusicContext, mergeListingDuplicates } from './base';
import { ArtistsController } from './artists';
import { AlbumsController } from './albums';
import { TracksController } from './tracks';
import { PlaylistsController } from './playlists';

export const ALL_MEDIA_TYPES: MediaType[] = [MediaType.ARTIST, MediaType.ALBUM, MediaType.TRACK, MediaType.PLAYLIST];

const LIBRARY_FEATURES: Record<MediaType, ProviderFeature> = {
  [MediaType.ARTIST]: ProviderFeature.LIBRARY_ARTISTS,
  [MediaType.ALBUM]: ProviderFeature.LIBRARY_ALBUMS,
  [MediaType.TRACK]: ProviderFeature.LIBRARY_TRACKS,
  [MediaType.PLAYLIST]: ProviderFeature.LIBRARY_PLAYLISTS,
};

export const SYNC_TASKS_URI = 'music://synctasks';

export interface MusicControllerOptions {
  db: RowStore;
  cache: CacheStore;
  providers: ProviderRegistry;
  events?: EventNotifier;
  metadata?: MetadataController;
  matching?: Partial<MatchingConfig>;
}

export interface SearchOptions {
  /** Instance ids or domains; `library` selects the local library. Everything when omitted. */
  providers?: string[];
  mediaTypes?: MediaType[];
  limit?: number;
}

export interface SyncOptions {
  providers?: string[];
  mediaTypes?: MediaType[];
  /** Match concurrency for every item the sync adds. */
  concurrency?: number;
}

/** Public view of a running sync. */
export interface SyncTaskInfo {
  id: string;
  providerDomain: string;
  providerInstance: string;
  mediaTypes: MediaType[];
  startedAt: number;
}

interface SyncTask extends SyncTaskInfo {
  abort: AbortController;
  done: Promise<void>;
}

/**
 * Owns the four media controllers and everything they share: storage, cache, providers, events
 * and library sync jobs.
 */
export class MusicController implements MusicContext {
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

  private readonly tasks = new Map<string, SyncTask>();

  constructor(options: MusicControllerOptions) {
    this.db = options.db;
    this.cache = options.cache;
    this.providers = options.providers;
    this.events = options.events ?? new EventNotifier();
    this.metadata = options.metadata ?? new MetadataController();
    this.matching = { ...defaultLibraryConfig().matching, ...options.matching };

    this.artists = new ArtistsController(this);
    this.albums = new AlbumsController(this);
    this.tracks = new TracksController(this);
    this.playlists = new PlaylistsController(this);
  }

  private selectProviders(filter?: string[]): MusicProvider[] {
    const active = this.providers.activeProviders();
    if (!filter) return active;
    return active.filter((provider) => filter.includes(provider.instanceId) || filter.includes(provider.domain));
  }

  /**
   * Search the library and every selected provider at once. A failing provider contributes nothing.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResults> {
    const mediaTypes = options.mediaTypes ?? ALL_MEDIA_TYPES;
    const limit = options.limit ?? 25;
    const includeLibrary = !options.providers || options.providers.includes(LIBRARY_PROVIDER);
    const providers = this.selectProviders(options.providers).filter((provider) =>
      hasFeature(provider, ProviderFeature.SEARCH),
    );

    const branches: Array<Promise<SearchResults>> = [];
    if (includeLibrary) branches.push(this.searchLibrary(query, mediaTypes, limit));
    for (const provider of providers) {
      branches.push(
        provider.search ? provider.search(query, mediaTypes, limit) : Promise.resolve(emptySearchResults()),
      );
    }

    const collected = emptySearchResults();
    const settled = await Promise.allSettled(branches);
    settled.forEach((result) => {
      if (result.status === 'rejected') {
        logger.warn(`[MusicController] Search "${query}" failed on one provider: ${errorMessage(result.reason)}`);
        return;
      }
      collected.artists.push(...result.value.artists.map((item) => normalizeIdentity(item)));
      collected.albums.push(...result.value.albums.map((item) => normalizeIdentity(item)));
      collected.tracks.push(...result.value.tracks.map((item) => normalizeIdentity(item)));
      collected.playlists.push(...result.value.playlists.map((item) => normalizeIdentity(item)));
    });
    return {
      artists: mergeListingDuplicates(collected.artists),
      albums: mergeListingDuplicates(collected.albums),
      tracks: mergeListingDuplicates(collected.tracks),
      playlists: mergeListingDuplicates(collected.playlists),
    };
  }

  private async searchLibrary(query: string, mediaTypes: MediaType[], limit: number): Promise<SearchResults> {
    const results = emptySearchResults();
    if (mediaTypes.includes(MediaType.ARTIST)) results.artists = await this.artists.search(query, LIBRARY_PROVIDER, limit);
    if (mediaTypes.includes(MediaType.ALBUM)) results.albums = await this.albums.search(query, LIBRARY_PROVIDER, limit);
    if (mediaTypes.includes(MediaType.TRACK)) results.tracks = await this.tracks.search(query, LIBRARY_PROVIDER, limit);
    if (mediaTypes.includes(MediaType.PLAYLIST)) {
      results.playlists = await this.playlists.search(query, LIBRARY_PROVIDER, limit);
    }
    return results;
  }

  /** Adds any media item through the controller of its type. */
  addItem(item: MediaItem, options: AddOptions = {}): Promise<MediaItem> {
    switch (item.mediaType) {
      case MediaType.ARTIST:
        return this.artists.add(item, options);
      case MediaType.ALBUM:
        return this.albums.add(item, options);
      case MediaType.TRACK:
        return this.tracks.add(item, options);
      case MediaType.PLAYLIST:
        return this.playlists.add(item, options);
    }
  }

  // ---------------------------------------------------------------------------
  // Library sync

  /**
   * Start a sync job per selected provider that exposes a library listing for any requested type.
   * A provider already syncing one of those types is skipped.
   */
  startSync(options: SyncOptions = {}): SyncTaskInfo[] {
    const requested = options.mediaTypes ?? ALL_MEDIA_TYPES;
    const started: SyncTaskInfo[] = [];
    for (const provider of this.selectProviders(options.providers)) {
      if (!provider.getLibraryItems) continue;
      const mediaTypes = ALL_MEDIA_TYPES.filter(
        (mediaType) => requested.includes(mediaType) && hasFeature(provider, LIBRARY_FEATURES[mediaType]),
      );
      if (mediaTypes.length === 0) continue;
      const running = Array.from(this.tasks.values()).find(
        (task) =>
          task.providerInstance === provider.instanceId &&
          task.mediaTypes.some((mediaType) => mediaTypes.includes(mediaType)),
      );
      if (running) {
        logger.info(`[MusicController] Sync for ${provider.instanceId} already running (${running.id}), skipping`);
        continue;
      }

      const id = uuidv4();
      const abort = new AbortController();
      const done = this.runSync(provider, mediaTypes, abort.signal, options.concurrency).finally(() => {
        this.tasks.delete(id);
        this.emitSyncTasks();
      });
      const task: SyncTask = {
        id,
        providerDomain: provider.domain,
        providerInstance: provider.instanceId,
        mediaTypes,
        startedAt: Date.now(),
        abort,
        done,
      };
      this.tasks.set(id, task);
      started.push(toSyncTaskInfo(task));
    }
    if (started.length > 0) this.emitSyncTasks();
    return started;
  }

  syncTasks(): SyncTaskInfo[] {
    return Array.from(this.tasks.values()).map((task) => toSyncTaskInfo(task));
  }

  /** Cancels a sync job and waits until it has unwound. */
  async cancelSync(id: string): Promise<void> {
    const task = this.tasks.get(id);
    if (!task) throw new MediaNotFoundError(`Sync task ${id} not found`);
    task.abort.abort();
    await task.done;
  }

  /** Waits for every running sync job; used by tests and shutdown. */
  async waitForSync(): Promise<void> {
    await Promise.allSettled(Array.from(this.tasks.values()).map((task) => task.done));
  }

  async close(): Promise<void> {
    const running = Array.from(this.tasks.values());
    running.forEach((task) => task.abort.abort());
    await Promise.allSettled(running.map((task) => task.done));
  }

  private emitSyncTasks(): void {
    this.events.emit(EventType.SYNC_TASKS_UPDATED, SYNC_TASKS_URI, this.syncTasks());
  }

  private async runSync(
    provider: MusicProvider,
    mediaTypes: MediaType[],
    signal: AbortSignal,
    concurrency?: number,
  ): Promise<void> {
    logger.info(`[MusicController] Sync of ${mediaTypes.join(', ')} on ${provider.instanceId} started`);
    try {
      for (const mediaType of mediaTypes) {
        await this.syncMediaType(provider, mediaType, signal, concurrency);
      }
      logger.info(`[MusicController] Sync on ${provider.instanceId} finished`);
    } catch (error) {
      if (signal.aborted) {
        logger.info(`[MusicController] Sync on ${provider.instanceId} cancelled`);
      } else {
        logger.error(`[MusicController] Sync on ${provider.instanceId} failed: ${errorMessage(error)}`);
      }
    }
  }

  private async syncMediaType(
    provider: MusicProvider,
    mediaType: MediaType,
    signal: AbortSignal,
    concurrency?: number,
  ): Promise<void> {
    if (!provider.getLibraryItems) return;
    const items = await provider.getLibraryItems(mediaType);
    const seen = new Set<string>();
    for (const item of items) {
      signal.throwIfAborted();
      try {
        const stored = await this.addItem(
          { ...item, inLibrary: true },
          { signal, concurrency, matchProviders: item.mediaType !== MediaType.PLAYLIST },
        );
        seen.add(stored.itemId);
      } catch (error) {
        if (signal.aborted) throw error;
        logger.warn(`[MusicController] Sync could not add ${item.mediaType} "${item.name}" from ${provider.instanceId}: ${errorMessage(error)}`);
      }
    }
    signal.throwIfAborted();

    let removed = 0;
    switch (mediaType) {
      case MediaType.ARTIST:
        removed = await this.unflagMissing(this.artists, provider, seen);
        break;
      case MediaType.ALBUM:
        removed = await this.unflagMissing(this.albums, provider, seen);
        break;
      case MediaType.TRACK:
        removed = await this.unflagMissing(this.tracks, provider, seen);
        break;
      case MediaType.PLAYLIST:
        removed = await this.unflagMissing(this.playlists, provider, seen);
        break;
    }
    logger.info(
      `[MusicController] Synced ${items.length} ${mediaType}s from ${provider.instanceId} (${removed} removed from library)`,
    );
  }

  /**
   * Library items only known through this provider that it no longer lists lose their library flag.
   */
  private async unflagMissing<T extends MediaItem>(
    controller: MediaControllerBase<T>,
    provider: MusicProvider,
    seen: Set<string>,
  ): Promise<number> {
    const candidates = await controller.queryLibrary({
      match: { in_library: true },
      contains: { provider_mappings: providerInstanceNeedle(provider.instanceId) },
    });
    let removed = 0;
    for (const item of candidates) {
      if (seen.has(item.itemId)) continue;
      if (item.providerMappings.some((mapping) => mapping.providerInstance !== provider.instanceId)) continue;
      await controller.setInLibrary(item.itemId, false);
      removed += 1;
    }
    return removed;
  }
}

function toSyncTaskInfo(task: SyncTask): SyncTaskInfo {
  return {
    id: task.id,
    providerDomain: task.providerDomain,
    providerInstance: task.providerInstance,
    mediaTypes: [...task.mediaTypes],
    startedAt: task.startedAt,
  };
}
