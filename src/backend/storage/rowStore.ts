/**
 * Row Store contract plus the in-memory engine.
 *
 * Tables hold flat rows of scalar values; structured columns are stored as JSON text, the same way a
 * relational engine would keep them. Only equality and substring predicates are required.
 */

export type RowValue = string | number | boolean | null;
export type Row = Record<string, RowValue>;
export type RowMatch = Record<string, RowValue>;

export interface RowQuery {
  /** Column equality. */
  match?: RowMatch;
  /** Case-insensitive substring test per column (on the column's text form). */
  contains?: Record<string, string>;
  orderBy?: string;
  descending?: boolean;
  limit?: number;
  offset?: number;
}

export interface RowStore {
  getRow(table: string, match: RowMatch): Promise<Row | undefined>;
  getRows(table: string, match?: RowMatch, options?: Omit<RowQuery, 'match' | 'contains'>): Promise<Row[]>;
  getRowsFromQuery(table: string, query: RowQuery, limit?: number): Promise<Row[]>;
  count(table: string, query?: RowQuery): Promise<number>;
  /** Inserts a row; a missing `item_id` is assigned by the store. */
  insert(table: string, row: Row): Promise<Row>;
  update(table: string, match: RowMatch, fields: Row): Promise<number>;
  delete(table: string, match: RowMatch): Promise<number>;
}

function matches(row: Row, query: RowQuery): boolean {
  for (const [column, value] of Object.entries(query.match ?? {})) {
    if (row[column] !== value) return false;
  }
  for (const [column, needle] of Object.entries(query.contains ?? {})) {
    const value = row[column];
    if (value === null || value === undefined) return false;
    if (!String(value).toLowerCase().includes(needle.toLowerCase())) return false;
  }
  return true;
}

function compareValues(a: RowValue | undefined, b: RowValue | undefined): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return -1;
  if (b === null || b === undefined) return 1;
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  return String(a).localeCompare(String(b));
}

/**
 * Applies a query to a list of rows. Exported so persistent engines can reuse the evaluation.
 */
export function selectRows(rows: Row[], query: RowQuery): Row[] {
  let result = rows.filter((row) => matches(row, query));
  if (query.orderBy) {
    const column = query.orderBy;
    const direction = query.descending ? -1 : 1;
    result = [...result].sort((a, b) => compareValues(a[column], b[column]) * direction);
  }
  const offset = query.offset ?? 0;
  const end = query.limit !== undefined ? offset + query.limit : undefined;
  return result.slice(offset, end).map((row) => ({ ...row }));
}

/**
 * Volatile engine used by tests and `storage.type = memory`.
 * Every call copies rows in and out so callers never share references with the table.
 */
export class MemoryRowStore implements RowStore {
  protected readonly tables = new Map<string, Row[]>();
  protected nextId = 1;

  protected table(name: string): Row[] {
    let rows = this.tables.get(name);
    if (!rows) {
      rows = [];
      this.tables.set(name, rows);
    }
    return rows;
  }

  /** Hook for persistent subclasses; called after every mutation of `table`. */
  protected async afterWrite(_table: string): Promise<void> {
    // nothing to persist
  }

  async getRow(table: string, match: RowMatch): Promise<Row | undefined> {
    return selectRows(this.table(table), { match, limit: 1 })[0];
  }

  async getRows(table: string, match?: RowMatch, options?: Omit<RowQuery, 'match' | 'contains'>): Promise<Row[]> {
    return selectRows(this.table(table), { ...options, match });
  }

  async getRowsFromQuery(table: string, query: RowQuery, limit?: number): Promise<Row[]> {
    return selectRows(this.table(table), { ...query, limit: limit ?? query.limit });
  }

  async count(table: string, query: RowQuery = {}): Promise<number> {
    return this.table(table).filter((row) => matches(row, query)).length;
  }

  async insert(table: string, row: Row): Promise<Row> {
    const stored: Row = { ...row };
    if (stored.item_id === undefined || stored.item_id === null) {
      stored.item_id = String(this.nextId++);
    }
    this.table(table).push(stored);
    await this.afterWrite(table);
    return { ...stored };
  }

  async update(table: string, match: RowMatch, fields: Row): Promise<number> {
    let updated = 0;
    for (const row of this.table(table)) {
      if (matches(row, { match })) {
        Object.assign(row, fields);
        updated += 1;
      }
    }
    if (updated > 0) await this.afterWrite(table);
    return updated;
  }

  async delete(table: string, match: RowMatch): Promise<number> {
    const rows = this.table(table);
    const kept = rows.filter((row) => !matches(row, { match }));
    const removed = rows.length - kept.length;
    if (removed > 0) {
      this.tables.set(table, kept);
      await this.afterWrite(table);
    }
    return removed;
  }
}
