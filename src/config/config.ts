import fs from 'fs';
import { CONFIG_FILE, LibraryConfig, loadLibraryConfig, saveLibraryConfig } from './configStore';

/**
 * Runtime view of the library configuration. Mirrors the on-disk settings and
 * layers environment overrides on top so deployments can tweak a few knobs without editing JSON.
 */

let libraryConfig: LibraryConfig = applyEnvOverrides(loadLibraryConfig());

function applyEnvOverrides(config: LibraryConfig): LibraryConfig {
  const port = Number(process.env.MEDIA_LIBRARY_PORT);
  const consoleLevel = process.env.MEDIA_LIBRARY_LOG_LEVEL?.trim();
  return {
    ...config,
    http: Number.isFinite(port) && port > 0 ? { port } : config.http,
    logging: consoleLevel ? { ...config.logging, consoleLevel } : config.logging,
  };
}

/**
 * Returns the last loaded configuration.
 */
function getLibraryConfig(): LibraryConfig {
  return libraryConfig;
}

/**
 * Writes the defaults to disk on first start so operators have a file to edit.
 */
function ensureConfigFile(): void {
  if (fs.existsSync(CONFIG_FILE)) return;
  saveLibraryConfig(loadLibraryConfig());
}

export { CONFIG_FILE, getLibraryConfig, ensureConfigFile, applyEnvOverrides };
