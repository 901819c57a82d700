import { promises as fs } from 'fs';
import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { ConsistencyViolationError, StorageError, atomicWrite } from '@logkb/shared';
import { CACHE_SCHEMA_VERSION, CREATE_CACHE_TABLES_SQL } from './schema';

interface CacheRow {
  dims: number;
  vector: Uint8Array;
}

/** Identity of the database file when it was last read or written. Every save renames a new file into place. */
interface DiskStamp {
  ino: number;
  size: number;
  mtimeMs: number;
}

export type PutOutcome = 'inserted' | 'unchanged';

export type PutManyResult =
  | { contentHash: string; outcome: PutOutcome }
  | { contentHash: string; outcome: 'conflict'; cached: number[] };

export interface CacheStats {
  entries: number;
  models: Array<{ modelId: string; entries: number; dims: number }>;
}

const SELECT_ENTRY_SQL = 'SELECT dims, vector FROM embedding_cache WHERE contentHash = ? AND modelId = ?';
const INSERT_ENTRY_SQL =
  'INSERT INTO embedding_cache (contentHash, modelId, dims, vector, createdAt) VALUES (?, ?, ?, ?, ?)';

let sqlJs: Promise<SqlJsStatic> | null = null;

function loadSqlJs(): Promise<SqlJsStatic> {
  sqlJs ??= initSqlJs().catch((error: unknown) => {
    sqlJs = null;
    throw error;
  });
  return sqlJs;
}

function toBlob(vector: ArrayLike<number>): Uint8Array {
  const array = Float32Array.from(vector);
  return new Uint8Array(array.buffer, array.byteOffset, array.byteLength);
}

function fromBlob(blob: Uint8Array, dims: number): number[] {
  const view = new DataView(blob.buffer, blob.byteOffset, blob.byteLength);
  const vector: number[] = [];
  for (let i = 0; i < dims; i++) {
    vector.push(view.getFloat32(i * Float32Array.BYTES_PER_ELEMENT, true));
  }
  return vector;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, i) => byte === b[i]);
}

function toRow(values: SqlValue[]): CacheRow {
  const [dims, vector] = values;
  if (typeof dims !== 'number' || !(vector instanceof Uint8Array)) {
    throw new StorageError('Embedding cache holds a malformed row');
  }
  return { dims, vector };
}

function totalChanges(db: Database): SqlValue | undefined {
  return db.exec('SELECT total_changes()')[0]?.values[0]?.[0];
}

function sameStamp(a: DiskStamp, b: DiskStamp): boolean {
  return a.ino === b.ino && a.size === b.size && a.mtimeMs === b.mtimeMs;
}

async function readStamp(path: string): Promise<DiskStamp | null> {
  try {
    const stat = await fs.stat(path);
    return { ino: stat.ino, size: stat.size, mtimeMs: stat.mtimeMs };
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}

/**
 * Persistent content-addressed store of embeddings keyed by
 * (contentHash, modelId). Shared by every issue: identical text embedded under
 * the same model is reused wherever it appears.
 *
 * The database lives in memory (sql.js) and is written back to its file after
 * every change. Rows another process wrote to the file in the meantime are
 * merged in before the write.
 *
 * Vectors are stored as float32, so equality is decided after rounding the
 * incoming vector to float32.
 */
export class EmbeddingCache {
  private db: Database | null = null;
  private sql: SqlJsStatic | null = null;
  private stamp: DiskStamp | null = null;

  constructor(private readonly dbPath: string) {}

  private get persistent(): boolean {
    return this.dbPath !== ':memory:';
  }

  /** Loads the database file, or starts an empty one when it is missing. */
  async init(): Promise<this> {
    if (this.db) return this;
    try {
      const SQL = await loadSqlJs();
      const bytes = this.persistent ? await this.readFile() : null;
      const db = new SQL.Database(bytes ?? undefined);
      db.exec(CREATE_CACHE_TABLES_SQL);
      db.run('INSERT OR IGNORE INTO cache_meta (key, value) VALUES (?, ?)', [
        'schemaVersion',
        String(CACHE_SCHEMA_VERSION),
      ]);
      this.sql = SQL;
      this.db = db;
    } catch (error) {
      throw new StorageError(`Failed to open embedding cache at ${this.dbPath}`, { cause: error });
    }
    return this;
  }

  close(): void {
    this.db?.close();
    this.db = null;
  }

  private getDb(): Database {
    if (!this.db) {
      throw new Error('Embedding cache not initialized. Call init() first.');
    }
    return this.db;
  }

  private async readFile(): Promise<Uint8Array | null> {
    const stamp = await readStamp(this.dbPath);
    if (!stamp) return null;
    const bytes = await fs.readFile(this.dbPath);
    this.stamp = stamp;
    return new Uint8Array(bytes);
  }

  private selectEntry(contentHash: string, modelId: string): CacheRow | null {
    const stmt = this.getDb().prepare(SELECT_ENTRY_SQL);
    try {
      stmt.bind([contentHash, modelId]);
      return stmt.step() ? toRow(stmt.get()) : null;
    } finally {
      stmt.free();
    }
  }

  get(contentHash: string, modelId: string): number[] | null {
    const row = this.selectEntry(contentHash, modelId);
    return row ? fromBlob(row.vector, row.dims) : null;
  }

  getMany(contentHashes: Iterable<string>, modelId: string): Map<string, number[]> {
    const stmt = this.getDb().prepare(SELECT_ENTRY_SQL);
    const found = new Map<string, number[]>();
    try {
      for (const contentHash of new Set(contentHashes)) {
        stmt.bind([contentHash, modelId]);
        if (stmt.step()) {
          const row = toRow(stmt.get());
          found.set(contentHash, fromBlob(row.vector, row.dims));
        }
        stmt.reset();
      }
    } finally {
      stmt.free();
    }
    return found;
  }

  /**
   * Stores a vector. Writing the identical vector again is a no-op; writing a
   * different one throws `ConsistencyViolationError` and keeps the original.
   */
  async put(contentHash: string, modelId: string, vector: ArrayLike<number>): Promise<PutOutcome> {
    const [result] = await this.putMany([{ contentHash, vector }], modelId);
    if (result.outcome === 'conflict') {
      throw new ConsistencyViolationError(contentHash, modelId);
    }
    return result.outcome;
  }

  /**
   * Stores many vectors in one transaction and saves the file once. Conflicts
   * do not abort the transaction; they are reported with the vector that
   * stays cached.
   */
  async putMany(
    entries: Array<{ contentHash: string; vector: ArrayLike<number> }>,
    modelId: string,
  ): Promise<PutManyResult[]> {
    return this.mutate(() => entries.map(({ contentHash, vector }) => this.putOne(contentHash, modelId, vector)));
  }

  stats(): CacheStats {
    const [result] = this.getDb().exec(
      'SELECT modelId, COUNT(*) AS entries, MAX(dims) AS dims FROM embedding_cache GROUP BY modelId ORDER BY modelId',
    );
    const models = (result?.values ?? []).map(([modelId, entries, dims]) => {
      if (typeof modelId !== 'string' || typeof entries !== 'number' || typeof dims !== 'number') {
        throw new StorageError('Embedding cache holds a malformed row');
      }
      return { modelId, entries, dims };
    });
    return {
      entries: models.reduce((sum, m) => sum + m.entries, 0),
      models,
    };
  }

  /** Removes every entry, or only those of one model. Returns the number removed. */
  async clear(modelId?: string): Promise<number> {
    return this.mutate((db) => {
      if (modelId === undefined) {
        db.run('DELETE FROM embedding_cache');
      } else {
        db.run('DELETE FROM embedding_cache WHERE modelId = ?', [modelId]);
      }
      return db.getRowsModified();
    });
  }

  /**
   * Runs `change` in a transaction on top of the latest file content and
   * writes the database back when a row was touched.
   */
  private async mutate<T>(change: (db: Database) => T): Promise<T> {
    const db = this.getDb();
    await this.mergeFromDisk();
    let result: T;
    let changed: boolean;
    db.run('BEGIN TRANSACTION');
    try {
      const before = totalChanges(db);
      result = change(db);
      changed = totalChanges(db) !== before;
      db.run('COMMIT');
    } catch (error) {
      db.run('ROLLBACK');
      throw error;
    }
    if (changed) {
      await this.save();
    }
    return result;
  }

  /** Copies in rows that another process saved to the file since it was last read. */
  private async mergeFromDisk(): Promise<void> {
    if (!this.persistent || !this.sql) return;
    const stamp = await readStamp(this.dbPath);
    if (!stamp || (this.stamp && sameStamp(stamp, this.stamp))) {
      return;
    }
    const bytes = await this.readFile();
    if (!bytes) return;
    const disk = new this.sql.Database(bytes);
    try {
      const [rows] = disk.exec('SELECT contentHash, modelId, dims, vector, createdAt FROM embedding_cache');
      const db = this.getDb();
      for (const row of rows?.values ?? []) {
        db.run(INSERT_ENTRY_SQL.replace('INSERT', 'INSERT OR IGNORE'), row);
      }
    } finally {
      disk.close();
    }
  }

  private async save(): Promise<void> {
    if (!this.persistent) return;
    try {
      await atomicWrite(this.dbPath, Buffer.from(this.getDb().export()));
      this.stamp = await readStamp(this.dbPath);
    } catch (error) {
      throw new StorageError(`Failed to save embedding cache at ${this.dbPath}`, { cause: error });
    }
  }

  private putOne(contentHash: string, modelId: string, vector: ArrayLike<number>): PutManyResult {
    const blob = toBlob(vector);
    const existing = this.selectEntry(contentHash, modelId);

    if (existing) {
      if (existing.dims === vector.length && sameBytes(existing.vector, blob)) {
        return { contentHash, outcome: 'unchanged' };
      }
      return { contentHash, outcome: 'conflict', cached: fromBlob(existing.vector, existing.dims) };
    }

    this.getDb().run(INSERT_ENTRY_SQL, [contentHash, modelId, vector.length, blob, Date.now()]);
    return { contentHash, outcome: 'inserted' };
  }
}
