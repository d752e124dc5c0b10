import { Database } from 'node-sqlite3-wasm';
import {
  fail,
  isQualityScore,
  ok,
  type AnnotationRecord,
  type ExportFilter,
  type ExportSummary,
  type FieldValue,
  type QualityScore,
  type RecordStatistics,
  type StoreFailure,
  type StoreResult,
} from '../models';
import type { ToFailureOptions } from '../handlers/store-error.handler';
import { RecordStore, nextTimestamp, type RecordStoreOptions } from './record-store.service';
import { errorCode } from '../../shared/utils/error.utils';
import { isFieldValue } from '../../shared/utils/field-transform.utils';
import { RecordFormatError, isPlainObject } from '../../shared/utils/interchange.utils';

export interface SqliteRecordStoreOptions extends RecordStoreOptions {
  /** Database file, or ":memory:". */
  filename: string;
  busyTimeoutMs: number;
  /** Use an already open connection instead of opening `filename`; the caller keeps ownership. */
  database?: Database;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS annotations (
    model_id   TEXT PRIMARY KEY,
    annotated  INTEGER NOT NULL DEFAULT 0 CHECK (annotated IN (0, 1)),
    uid        TEXT NOT NULL DEFAULT '',
    score      INTEGER NOT NULL DEFAULT 1 CHECK (score IN (0, 1)),
    data       TEXT NOT NULL DEFAULT '{}',
    flags      TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  )
`;

const COLUMNS = 'model_id, annotated, uid, score, data, flags, created_at, updated_at';

/** SQLite result codes recognised from the engine's error text. */
const SQLITE_MESSAGE_CODES: ReadonlyArray<[RegExp, string]> = [
  [/constraint failed/i, 'SQLITE_CONSTRAINT'],
  [/database is locked/i, 'SQLITE_BUSY'],
  [/database table is locked/i, 'SQLITE_LOCKED'],
  [/disk I\/O error/i, 'SQLITE_IOERR'],
  [/unable to open database/i, 'SQLITE_CANTOPEN'],
  [/file is not a database/i, 'SQLITE_NOTADB'],
  [/database disk image is malformed/i, 'SQLITE_CORRUPT'],
];

export class SqliteError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'SqliteError';
  }
}

/** Gives an engine error the SQLite result code its message stands for. */
export function toSqliteError(error: unknown): unknown {
  if (!(error instanceof Error) || errorCode(error) !== undefined) {
    return error;
  }
  const match = SQLITE_MESSAGE_CODES.find(([pattern]) => pattern.test(error.message));
  return match ? new SqliteError(error.message, match[1]) : error;
}

/**
 * Durable record store on a single SQLite table.
 *
 * `claim`, `save` and `insertMany` run in BEGIN IMMEDIATE transactions: the
 * database write lock is taken before the row is read, so the check and the
 * set cannot interleave with another connection's claim or save. Waiting for
 * that lock is bounded by `busyTimeoutMs`.
 */
export class SqliteRecordStore extends RecordStore {
  private db: Database | null;
  private readonly ownsConnection: boolean;
  private readonly filename: string;
  private readonly busyTimeoutMs: number;
  private schemaReady = false;

  constructor(options: SqliteRecordStoreOptions) {
    super(options);
    this.filename = options.filename;
    this.busyTimeoutMs = options.busyTimeoutMs;
    this.db = options.database ?? null;
    this.ownsConnection = options.database === undefined;
  }

  async loadAll(): Promise<StoreResult<Map<string, AnnotationRecord>>> {
    try {
      const rows = this.connection().all(`SELECT ${COLUMNS} FROM annotations ORDER BY rowid`);
      const records = new Map<string, AnnotationRecord>();
      for (const row of rows) {
        const record = parseRow(row);
        records.set(record.id, record);
      }
      return ok(records, `Loaded ${records.size} records`);
    } catch (error) {
      return this.failure(error, 'loadAll', { fallback: 'STORE_UNAVAILABLE' });
    }
  }

  async get(id: string): Promise<StoreResult<AnnotationRecord>> {
    try {
      const record = this.selectRecord(id);
      return record ? ok(record) : fail('NOT_FOUND', `Record ${id} not found`);
    } catch (error) {
      return this.failure(error, 'get', { recordId: id });
    }
  }

  async save(
    id: string,
    fields: Record<string, FieldValue>,
    flags: Record<string, boolean>,
    score: QualityScore,
    owner: string
  ): Promise<StoreResult<AnnotationRecord>> {
    try {
      const result = this.immediate((db): StoreResult<AnnotationRecord> => {
        const existing = this.selectRecord(id);
        if (!existing) {
          return fail('NOT_FOUND', `Record ${id} no longer exists`);
        }
        const next = this.buildSavedRecord(existing, fields, flags, score, owner);
        if (!next.success) {
          return next;
        }
        const record = next.value;
        db.run(
          `UPDATE annotations
              SET annotated = 1, uid = ?, score = ?, data = ?, flags = ?, updated_at = ?
            WHERE model_id = ?`,
          [
            record.owner,
            record.qualityScore,
            JSON.stringify(record.fields),
            JSON.stringify(record.flags),
            record.updatedAt,
            id,
          ]
        );
        return ok(record, `Record ${id} saved`);
      });

      if (result.success) {
        console.log(`[SqliteStore] Saved ${id} for ${owner} (score ${result.value.qualityScore})`);
      }
      return result;
    } catch (error) {
      return this.failure(error, 'save', { recordId: id });
    }
  }

  async claim(id: string, user: string): Promise<StoreResult<boolean>> {
    try {
      return this.immediate((db): StoreResult<boolean> => {
        const existing = this.selectRecord(id);
        if (!existing) {
          return fail('NOT_FOUND', `Record ${id} not found`);
        }
        if (existing.owner === user) {
          return ok(true, `Record ${id} already owned by ${user}`);
        }
        if (existing.owner !== '') {
          return ok(false, `Record ${id} is owned by ${existing.owner}`);
        }
        const { changes } = db.run(`UPDATE annotations SET uid = ?, updated_at = ? WHERE model_id = ? AND uid = ''`, [
          user,
          nextTimestamp(existing.updatedAt),
          id,
        ]);
        return ok(changes === 1, `Record ${id} claimed by ${user}`);
      });
    } catch (error) {
      return this.failure(error, 'claim', { recordId: id });
    }
  }

  async remove(id: string): Promise<StoreResult> {
    try {
      const { changes } = this.connection().run('DELETE FROM annotations WHERE model_id = ?', [id]);
      if (changes === 0) {
        return fail('NOT_FOUND', `Record ${id} not found`);
      }
      console.log(`[SqliteStore] Removed ${id}`);
      return ok(undefined, `Record ${id} removed`);
    } catch (error) {
      return this.failure(error, 'remove', { recordId: id });
    }
  }

  async insertMany(records: AnnotationRecord[]): Promise<StoreResult<number>> {
    try {
      this.immediate(db => {
        for (const record of records) {
          db.run(`INSERT INTO annotations (${COLUMNS}) VALUES (?, ?, ?, ?, ?, ?, ?, ?)`, [
            record.id,
            record.completed ? 1 : 0,
            record.owner,
            record.qualityScore,
            JSON.stringify(record.fields),
            JSON.stringify(record.flags),
            record.createdAt,
            record.updatedAt,
          ]);
        }
      });
      console.log(`[SqliteStore] Inserted ${records.length} records`);
      return ok(records.length, `Inserted ${records.length} records`);
    } catch (error) {
      return this.failure(error, 'insertMany');
    }
  }

  async statistics(): Promise<StoreResult<RecordStatistics>> {
    try {
      const row = this.connection().get(
        'SELECT COUNT(*) AS total, COALESCE(SUM(annotated), 0) AS completed FROM annotations'
      );
      const total = readCount(row, 'total');
      const completed = readCount(row, 'completed');
      return ok({ total, completed, pending: total - completed });
    } catch (error) {
      return this.failure(error, 'statistics', { fallback: 'STORE_UNAVAILABLE' });
    }
  }

  async export(filter: ExportFilter = {}): Promise<StoreResult<ExportSummary>> {
    const snapshot = await this.loadAll();
    if (!snapshot.success) {
      return snapshot;
    }
    return this.writeExport(snapshot.value.values(), filter);
  }

  async close(): Promise<void> {
    if (this.db && this.ownsConnection) {
      this.db.close();
    }
    this.db = null;
    this.schemaReady = false;
  }

  private connection(): Database {
    if (!this.db) {
      this.db = new Database(this.filename);
      console.log(`[SqliteStore] Opened ${this.filename}`);
    }
    if (!this.schemaReady) {
      this.db.exec(`PRAGMA busy_timeout = ${this.busyTimeoutMs}`);
      this.db.exec(SCHEMA);
      this.schemaReady = true;
    }
    return this.db;
  }

  /** Runs `work` under BEGIN IMMEDIATE; any throw rolls the transaction back. */
  private immediate<T>(work: (db: Database) => T): T {
    const db = this.connection();
    db.exec('BEGIN IMMEDIATE');
    try {
      const result = work(db);
      db.exec('COMMIT');
      return result;
    } catch (error) {
      if (db.inTransaction) {
        db.exec('ROLLBACK');
      }
      throw error;
    }
  }

  private selectRecord(id: string): AnnotationRecord | null {
    const row = this.connection().get(`SELECT ${COLUMNS} FROM annotations WHERE model_id = ?`, [id]);
    return row === undefined || row === null ? null : parseRow(row);
  }

  private failure(error: unknown, operation: string, options?: ToFailureOptions): StoreFailure {
    return this.errorHandler.toFailure(toSqliteError(error), operation, options);
  }
}

function parseJsonColumn(text: unknown, column: string, id: string): Record<string, unknown> {
  if (typeof text !== 'string') {
    throw new RecordFormatError(`record "${id}" column ${column} is not text`);
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new RecordFormatError(`record "${id}" column ${column} is not valid JSON`);
  }
  if (!isPlainObject(parsed)) {
    throw new RecordFormatError(`record "${id}" column ${column} is not a JSON object`);
  }
  return parsed;
}

function parseRow(row: unknown): AnnotationRecord {
  if (!isPlainObject(row) || typeof row['model_id'] !== 'string') {
    throw new RecordFormatError('row has no model_id');
  }
  const id = row['model_id'];

  const fields: Record<string, FieldValue> = {};
  for (const [name, value] of Object.entries(parseJsonColumn(row['data'], 'data', id))) {
    if (!isFieldValue(value)) {
      throw new RecordFormatError(`record "${id}" field "${name}" is not a JSON value`);
    }
    fields[name] = value;
  }

  const flags: Record<string, boolean> = {};
  for (const [name, value] of Object.entries(parseJsonColumn(row['flags'], 'flags', id))) {
    flags[name] = value === true;
  }

  const score = row['score'];
  const createdAt = row['created_at'];
  const updatedAt = row['updated_at'];
  if (!isQualityScore(score)) {
    throw new RecordFormatError(`record "${id}" has score ${String(score)}`);
  }
  if (typeof createdAt !== 'string' || typeof updatedAt !== 'string') {
    throw new RecordFormatError(`record "${id}" has no timestamps`);
  }

  return {
    id,
    owner: typeof row['uid'] === 'string' ? row['uid'] : '',
    completed: row['annotated'] === 1,
    qualityScore: score,
    fields,
    flags,
    createdAt,
    updatedAt,
  };
}

function readCount(row: unknown, column: string): number {
  const value = isPlainObject(row) ? row[column] : undefined;
  if (typeof value !== 'number') {
    throw new RecordFormatError(`statistics column ${column} is not a number`);
  }
  return value;
}
