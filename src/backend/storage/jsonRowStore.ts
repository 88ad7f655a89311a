import { promises as fs } from 'fs';
import path from 'path';
import PQueue from 'p-queue';
import logger from '../../utils/logger';
import { ensureDir, readJson, writeJson } from '../../utils/fileutils';
import { MemoryRowStore, Row } from './rowStore';

/**
 * Row Store persisted as one JSON file per table (`<dir>/<table>.json`).
 * Reads are served from memory; each mutation snapshots the table and queues a write.
 */
export class JsonRowStore extends MemoryRowStore {
  private readonly writeQueue = new PQueue({ concurrency: 1 });

  private constructor(private readonly dir: string) {
    super();
  }

  /**
   * Loads every table file in `dir` and returns a ready store.
   */
  static async open(dir: string): Promise<JsonRowStore> {
    const store = new JsonRowStore(dir);
    await ensureDir(dir);
    const files = (await fs.readdir(dir)).filter((file) => file.endsWith('.json'));
    let maxId = 0;
    for (const file of files) {
      const rows = (await readJson<Row[]>(path.join(dir, file))) ?? [];
      store.tables.set(path.basename(file, '.json'), rows);
      for (const row of rows) {
        const id = Number(row.item_id);
        if (Number.isFinite(id) && id > maxId) maxId = id;
      }
    }
    store.nextId = maxId + 1;
    logger.info(`[JsonRowStore] Loaded ${files.length} tables from ${dir}`);
    return store;
  }

  protected async afterWrite(table: string): Promise<void> {
    const snapshot = this.table(table).map((row) => ({ ...row }));
    await this.writeQueue.add(() => writeJson(path.join(this.dir, `${table}.json`), snapshot));
  }

  /** Resolves once every queued table write has reached disk. */
  async flush(): Promise<void> {
    await this.writeQueue.onIdle();
  }
}
