import logger from './utils/logger';
import { CONFIG_FILE, ensureConfigFile, getLibraryConfig } from './config/config';
import type { LibraryConfig } from './config/configStore';
import { resolveDataDir } from './utils/fileutils';
import { startWebServer } from './http/webserver';
import { MemoryRowStore, RowStore } from './backend/storage/rowStore';
import { JsonRowStore } from './backend/storage/jsonRowStore';
import { CacheStore, FileCacheStore, MemoryCacheStore } from './backend/storage/cacheStore';
import { ProviderRegistry } from './backend/provider/registry';
import { registerConfiguredProviders } from './backend/provider/factory';
import { MusicBrainzClient } from './backend/metadata/musicbrainz';
import { MetadataController } from './backend/metadata/metadataController';
import { MusicController } from './backend/music/musicController';

type ServerHandle = { shutdown: () => Promise<void> };

let serverHandle: ServerHandle | undefined;
let music: MusicController | undefined;
let rowStore: RowStore | undefined;
let shuttingDown = false;

async function openRowStore(config: LibraryConfig): Promise<RowStore> {
  if (config.storage.type === 'memory') {
    logger.warn('[Main] Using volatile in-memory storage; the library is lost on restart');
    return new MemoryRowStore();
  }
  return JsonRowStore.open(resolveDataDir('library'));
}

async function openCacheStore(config: LibraryConfig): Promise<CacheStore> {
  if (config.cache.type === 'memory') return new MemoryCacheStore();
  return FileCacheStore.open(resolveDataDir(''));
}

function createMetadataController(config: LibraryConfig): MetadataController {
  const { musicbrainz } = config.metadata;
  if (!musicbrainz.enabled) return new MetadataController();
  logger.info(`[Main] MusicBrainz lookups enabled (${musicbrainz.baseUrl})`);
  return new MetadataController(new MusicBrainzClient({ baseUrl: musicbrainz.baseUrl, userAgent: musicbrainz.userAgent }));
}

/**
 * Loads the configuration, opens storage, starts the providers and the API server, then kicks off
 * an initial library sync.
 */
async function startApplication() {
  try {
    ensureConfigFile();
    const config = getLibraryConfig();
    logger.info(`[Main] Starting media library (config: ${CONFIG_FILE})`);

    rowStore = await openRowStore(config);
    const cache = await openCacheStore(config);
    const providers = new ProviderRegistry();
    await registerConfiguredProviders(providers, config.providers);

    music = new MusicController({
      db: rowStore,
      cache,
      providers,
      metadata: createMetadataController(config),
      matching: config.matching,
    });
    serverHandle = startWebServer(config.http.port, music);

    const tasks = music.startSync();
    logger.info(`[Main] Started ${tasks.length} library sync task(s)`);
  } catch (error: unknown) {
    if (error instanceof Error) {
      logger.error(`[Main] Error during initialization or setup: ${error.message}`);
    } else {
      logger.error('[Main] Unknown error during initialization or setup.');
    }
    process.exit(1);
  }
}

/**
 * Handle graceful shutdown of the application.
 */
async function handleShutdown(signal: NodeJS.Signals) {
  if (shuttingDown) {
    logger.warn(`[Main] Shutdown already in progress (signal: ${signal}).`);
    return;
  }
  shuttingDown = true;
  logger.info(`[Main] Received shutdown signal: ${signal}. Shutting down gracefully.`);

  const steps: Array<[string, () => Promise<void>]> = [
    ['sync tasks', async () => music?.close()],
    ['API server', async () => serverHandle?.shutdown()],
    ['providers', async () => music?.providers.closeAll()],
    ['storage', async () => (rowStore instanceof JsonRowStore ? rowStore.flush() : undefined)],
  ];
  for (const [name, step] of steps) {
    try {
      await step();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`[Main] Error shutting down ${name}: ${message}`);
    }
  }

  process.exit(0);
}

const shutdownSignals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
shutdownSignals.forEach((signal) => {
  process.on(signal, () => {
    void handleShutdown(signal);
  });
});

void startApplication();
