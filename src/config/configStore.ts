import fs from 'fs';
import path from 'path';

/**
 * Responsible for persisting library configuration to disk and translating raw JSON into runtime-safe structures.
 */

export type StorageType = 'memory' | 'json';

export interface ProviderConfigEntry {
  type: string;
  instanceId: string;
  domain?: string;
  name?: string;
  options: Record<string, string>;
}

export interface MatchingConfig {
  concurrency: number;
  maxSortNameCandidates: number;
}

export interface MusicBrainzConfig {
  enabled: boolean;
  baseUrl: string;
  userAgent: string;
}

export interface LibraryConfig {
  storage: { type: StorageType };
  cache: { type: StorageType };
  providers: ProviderConfigEntry[];
  matching: MatchingConfig;
  metadata: {
    musicbrainz: MusicBrainzConfig;
  };
  http: {
    port: number;
  };
  logging: {
    consoleLevel: string;
    fileLevel: string;
  };
}

/**
 * Loosely typed shape accepted from disk before normalisation.
 */
export interface RawLibraryConfig {
  storage?: { type?: unknown };
  cache?: { type?: unknown };
  providers?: unknown;
  matching?: { concurrency?: unknown; maxSortNameCandidates?: unknown };
  metadata?: { musicbrainz?: { enabled?: unknown; baseUrl?: unknown; userAgent?: unknown } };
  http?: { port?: unknown };
  logging?: { consoleLevel?: unknown; fileLevel?: unknown };
}

export const CONFIG_DIR = process.env.CONFIG_DIR || path.resolve(process.cwd(), 'data');
export const CONFIG_FILE = process.env.CONFIG_FILE || path.join(CONFIG_DIR, 'config.json');

export const MUSICBRAINZ_BASE_URL = 'https://musicbrainz.org/ws/2';

/**
 * Produces a fully populated library config with sensible defaults.
 */
export function defaultLibraryConfig(): LibraryConfig {
  return {
    storage: { type: 'json' },
    cache: { type: 'json' },
    providers: [],
    matching: { concurrency: 2, maxSortNameCandidates: 50 },
    metadata: {
      musicbrainz: {
        enabled: false,
        baseUrl: MUSICBRAINZ_BASE_URL,
        userAgent: 'media-library-core/0.1.0',
      },
    },
    http: { port: 8095 },
    logging: { consoleLevel: 'info', fileLevel: 'none' },
  };
}

/**
 * Reads the on-disk config. Missing or unreadable files yield defaults; nothing is written here.
 */
export function loadLibraryConfig(file: string = CONFIG_FILE): LibraryConfig {
  if (!fs.existsSync(file)) {
    return defaultLibraryConfig();
  }

  try {
    const raw = fs.readFileSync(file, 'utf8');
    const parsed: RawLibraryConfig = JSON.parse(raw);
    return normalizeLibraryConfig(parsed);
  } catch (error) {
    console.warn(`[configStore] Failed to read ${file}. Using defaults.`, error);
    return defaultLibraryConfig();
  }
}

/**
 * Persists a normalized config to disk.
 */
export function saveLibraryConfig(config: LibraryConfig, file: string = CONFIG_FILE): void {
  ensureConfigDir(path.dirname(file));
  const normalized = normalizeLibraryConfig(config);
  fs.writeFileSync(file, `${JSON.stringify(normalized, null, 2)}\n`, 'utf8');
}

function ensureConfigDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function normalizeStorageType(value: unknown, fallback: StorageType): StorageType {
  return value === 'memory' || value === 'json' ? value : fallback;
}

function normalizePositiveInt(value: unknown, fallback: number): number {
  const num = Number(value);
  return Number.isFinite(num) && num >= 1 ? Math.floor(num) : fallback;
}

function normalizeString(value: unknown, fallback: string): string {
  return typeof value === 'string' && value.trim() ? value.trim() : fallback;
}

function normalizeProviderEntry(raw: unknown): ProviderConfigEntry | undefined {
  if (!raw || typeof raw !== 'object') return undefined;
  const entry: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const type = normalizeString(entry.type, '');
  if (!type) return undefined;
  const instanceId = normalizeString(entry.instanceId, type);
  const options: Record<string, string> = {};
  if (entry.options && typeof entry.options === 'object') {
    for (const [key, value] of Object.entries(entry.options)) {
      if (value !== undefined && value !== null) {
        options[key] = String(value);
      }
    }
  }
  return {
    type,
    instanceId,
    domain: typeof entry.domain === 'string' && entry.domain.trim() ? entry.domain.trim() : undefined,
    name: typeof entry.name === 'string' && entry.name.trim() ? entry.name.trim() : undefined,
    options,
  };
}

/**
 * Merges partial config payloads with defaults and strips unsafe values.
 */
export function normalizeLibraryConfig(raw: RawLibraryConfig): LibraryConfig {
  const defaults = defaultLibraryConfig();

  const seen = new Set<string>();
  const providers = Array.isArray(raw?.providers)
    ? raw.providers
        .map((entry: unknown) => normalizeProviderEntry(entry))
        .filter((entry): entry is ProviderConfigEntry => {
          if (!entry || seen.has(entry.instanceId)) return false;
          seen.add(entry.instanceId);
          return true;
        })
    : [];

  const musicbrainz = raw?.metadata?.musicbrainz;

  return {
    storage: { type: normalizeStorageType(raw?.storage?.type, defaults.storage.type) },
    cache: { type: normalizeStorageType(raw?.cache?.type, defaults.cache.type) },
    providers,
    matching: {
      concurrency: normalizePositiveInt(raw?.matching?.concurrency, defaults.matching.concurrency),
      maxSortNameCandidates: normalizePositiveInt(
        raw?.matching?.maxSortNameCandidates,
        defaults.matching.maxSortNameCandidates,
      ),
    },
    metadata: {
      musicbrainz: {
        enabled: typeof musicbrainz?.enabled === 'boolean' ? musicbrainz.enabled : defaults.metadata.musicbrainz.enabled,
        baseUrl: normalizeString(musicbrainz?.baseUrl, defaults.metadata.musicbrainz.baseUrl),
        userAgent: normalizeString(musicbrainz?.userAgent, defaults.metadata.musicbrainz.userAgent),
      },
    },
    http: { port: normalizePositiveInt(raw?.http?.port, defaults.http.port) },
    logging: {
      consoleLevel: normalizeString(raw?.logging?.consoleLevel, defaults.logging.consoleLevel),
      fileLevel: normalizeString(raw?.logging?.fileLevel, defaults.logging.fileLevel),
    },
  };
}
