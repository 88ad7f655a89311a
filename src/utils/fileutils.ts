import { promises as fs } from "fs";
import path from "path";
import logger from "./logger";

/**
 * File system helpers shared by the JSON-backed row store and cache store.
 * Everything persistent lives below the `data` folder (or `$DATA_DIR`).
 */

/**
 * Creates a directory (and parents) when missing.
 * @throws If creation fails for reasons other than existence.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    logger.warn(`[fileUtils] Failed to ensure directory ${dirPath}: ${(err as Error).message}`);
    throw err;
  }
}

/**
 * Reads and parses a JSON file.
 * Returns `undefined` when the file is missing; unreadable files are logged and treated the same way.
 */
export async function readJson<T>(filePath: string): Promise<T | undefined> {
  try {
    const data = await fs.readFile(filePath, "utf8");
    return JSON.parse(data);
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code !== "ENOENT") {
      logger.warn(`[fileUtils] Failed to read ${filePath}: ${(err as Error).message}`);
    }
    return undefined;
  }
}

/**
 * Serialises `data` to `filePath`. The content is written to a sibling temp file first and renamed
 * into place so a crash mid-write never leaves a truncated table behind.
 */
export async function writeJson(filePath: string, data: unknown): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    await ensureDir(path.dirname(filePath));
    await fs.writeFile(tmpPath, JSON.stringify(data, null, 2), "utf8");
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    logger.warn(`[fileUtils] Failed to write ${filePath}: ${(err as Error).message}`);
    throw err;
  }
}

/**
 * Resolves a subdirectory of the data folder.
 * @param subfolder - e.g. "library" or "cache".
 */
export function resolveDataDir(subfolder: string): string {
  const base = process.env.DATA_DIR || path.resolve(process.cwd(), "data");
  return path.join(base, subfolder);
}
