import path from 'path';
import logger from '../../utils/logger';
import type { ProviderConfigEntry } from '../../config/configStore';
import { resolveDataDir } from '../../utils/fileutils';
import { MusicProvider } from './types';
import { ProviderRegistry } from './registry';
import { StaticCatalogProvider } from './staticProvider';

type ProviderCtor = (entry: ProviderConfigEntry) => Promise<MusicProvider>;

const providers: Record<string, ProviderCtor> = {
  StaticCatalogProvider: (entry) =>
    StaticCatalogProvider.fromFile(
      path.resolve(entry.options.catalogFile ?? path.join(resolveDataDir('catalogs'), `${entry.instanceId}.json`)),
      { instanceId: entry.instanceId, domain: entry.domain, name: entry.name },
    ),
};

const providerAliases: Record<string, keyof typeof providers> = {
  static: 'StaticCatalogProvider',
  catalog: 'StaticCatalogProvider',
};

/** Returns the canonical list of built-in provider types. */
export function listProviderTypes(): string[] {
  return Object.keys(providers);
}

/**
 * Build one provider from its config entry. Unknown types are logged and skipped.
 */
export async function createProvider(entry: ProviderConfigEntry): Promise<MusicProvider | undefined> {
  const resolvedKey = providerAliases[entry.type] ?? entry.type;
  const ctor = providers[resolvedKey];
  if (!ctor) {
    logger.warn(`[ProviderFactory] Unknown provider type "${entry.type}" for ${entry.instanceId}. Skipping.`);
    return undefined;
  }
  logger.info(`[ProviderFactory] Creating ${resolvedKey} instance ${entry.instanceId}`);
  return ctor(entry);
}

/**
 * Instantiate every configured provider and register it. A provider that fails to start is
 * logged and left out; the remaining providers still come up.
 */
export async function registerConfiguredProviders(
  registry: ProviderRegistry,
  entries: ProviderConfigEntry[],
): Promise<void> {
  const results = await Promise.allSettled(entries.map((entry) => createProvider(entry)));
  results.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      if (result.value) registry.register(result.value);
    } else {
      const message = result.reason instanceof Error ? result.reason.message : String(result.reason);
      logger.error(`[ProviderFactory] Failed to start provider ${entries[index].instanceId}: ${message}`);
    }
  });
}
