// packages/store/src/sqlite/sqlite-store.ts

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import {
  AppError,
  ConfigError,
  MAX_READ_CHUNK_SIZE,
  MAX_WRITE_PAGE_SIZE,
  NoopLogger,
  StoreUnavailableError,
  type Logger,
} from '@embedcache/shared';
import type { KeyValuePair, KeyValueStore, StoreInfo } from '../types';
import { assertValidNamespace, chunk, quoteIdentifier } from '../namespace';

const DEFAULT_READ_CHUNK_SIZE = 500;
const DEFAULT_WRITE_PAGE_SIZE = 1000;

export interface SQLiteKeyValueStoreOptions {
  /** Database file, or ':memory:' */
  path: string;
  readChunkSize?: number;
  writePageSize?: number;
  logger?: Logger;
}

function checkBatchSize(name: string, value: number, max: number): number {
  if (!Number.isInteger(value) || value <= 0 || value > max) {
    throw new ConfigError(`${name} must be an integer between 1 and ${max}, got ${value}`, {
      details: { [name]: value, max },
    });
  }
  return value;
}

/** Database row representation */
interface EntryRow {
  key: string;
  value: Buffer;
}

/**
 * SQLite-backed key-value store. One table per namespace, keyed by the cache
 * key. The database is opened on construction and released by close().
 */
export class SQLiteKeyValueStore implements KeyValueStore {
  private db: Database.Database | null;
  private readonly dbPath: string;
  private readonly readChunkSize: number;
  private readonly writePageSize: number;
  private readonly logger: Logger;
  private readonly provisioned = new Set<string>();

  constructor(options: SQLiteKeyValueStoreOptions) {
    this.dbPath = options.path;
    this.readChunkSize = checkBatchSize(
      'readChunkSize',
      options.readChunkSize ?? DEFAULT_READ_CHUNK_SIZE,
      MAX_READ_CHUNK_SIZE,
    );
    this.writePageSize = checkBatchSize(
      'writePageSize',
      options.writePageSize ?? DEFAULT_WRITE_PAGE_SIZE,
      MAX_WRITE_PAGE_SIZE,
    );
    this.logger = (options.logger ?? new NoopLogger()).child({ store: 'sqlite' });

    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
    } catch (error) {
      throw new StoreUnavailableError(`Failed to open SQLite store at ${this.dbPath}`, {
        cause: error,
        details: { path: this.dbPath },
      });
    }
    this.logger.debug(`opened ${this.dbPath}`);
  }

  async ensureNamespace(name: string): Promise<void> {
    assertValidNamespace(name);
    if (this.provisioned.has(name)) return;

    this.withDb('ensureNamespace', name, (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS ${quoteIdentifier(name)} (
          key TEXT PRIMARY KEY,
          value BLOB NOT NULL
        ) WITHOUT ROWID;
      `);
    });
    this.provisioned.add(name);
    this.logger.debug(`provisioned namespace ${name}`);
  }

  async batchGet(namespace: string, keys: readonly string[]): Promise<Map<string, Uint8Array>> {
    const found = new Map<string, Uint8Array>();
    if (keys.length === 0) return found;
    assertValidNamespace(namespace);

    const distinct = [...new Set(keys)];
    this.withDb('batchGet', namespace, (db) => {
      for (const slice of chunk(distinct, this.readChunkSize)) {
        const placeholders = slice.map(() => '?').join(', ');
        const stmt = db.prepare<string[], EntryRow>(
          `SELECT key, value FROM ${quoteIdentifier(namespace)} WHERE key IN (${placeholders})`,
        );
        for (const row of stmt.all(...slice)) {
          found.set(row.key, new Uint8Array(row.value));
        }
      }
    });
    return found;
  }

  async batchPutIfAbsent(namespace: string, entries: readonly KeyValuePair[]): Promise<void> {
    if (entries.length === 0) return;
    assertValidNamespace(namespace);

    this.withDb('batchPutIfAbsent', namespace, (db) => {
      const table = quoteIdentifier(namespace);
      const writeAll = db.transaction((pages: KeyValuePair[][]) => {
        for (const page of pages) {
          const rows = page.map(() => '(?, ?)').join(', ');
          const params = page.flatMap(([key, value]) => [
            key,
            Buffer.from(value.buffer, value.byteOffset, value.byteLength),
          ]);
          db.prepare(`INSERT OR IGNORE INTO ${table} (key, value) VALUES ${rows}`).run(...params);
        }
      });
      writeAll(chunk(entries, this.writePageSize));
    });
  }

  info(): StoreInfo {
    return { backend: 'sqlite', location: this.dbPath };
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.provisioned.clear();
      this.logger.debug(`closed ${this.dbPath}`);
    }
  }

  /**
   * Runs a driver call, surfacing any driver failure as StoreUnavailableError.
   */
  private withDb<T>(operation: string, namespace: string, fn: (db: Database.Database) => T): T {
    if (!this.db) {
      throw new StoreUnavailableError(`SQLite store at ${this.dbPath} is closed`, {
        details: { operation, namespace },
      });
    }
    try {
      return fn(this.db);
    } catch (error) {
      if (error instanceof AppError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreUnavailableError(`SQLite ${operation} failed: ${message}`, {
        cause: error,
        details: { operation, namespace, path: this.dbPath },
      });
    }
  }
}
