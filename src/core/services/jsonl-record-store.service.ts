import { dirname, join } from 'node:path';
import {
  fail,
  ok,
  type AnnotationRecord,
  type ExportFilter,
  type ExportSummary,
  type FieldValue,
  type QualityScore,
  type RecordStatistics,
  type StoreResult,
} from '../models';
import { FileConnectionError, FileConnectionService } from './file-connection.service';
import { RecordStore, nextTimestamp, type RecordStoreOptions } from './record-store.service';
import { WriteQueue } from './write-queue.service';
import { decodeRecordFile, encodeRecordFile } from '../../shared/utils/interchange.utils';

export interface JsonlRecordStoreOptions extends RecordStoreOptions {
  filePath: string;
  /** Defaults to `backups/` beside the data file. */
  backupDir?: string;
  fileConnection?: FileConnectionService;
}

interface MutationOutcome<T> {
  result: StoreResult<T>;
  /** Whether the changed map must be written out. */
  persist: boolean;
}

type Mutation<T> = (records: Map<string, AnnotationRecord>) => MutationOutcome<T>;

function changed<T>(result: StoreResult<T>): MutationOutcome<T> {
  return { result, persist: result.success };
}

function unchanged<T>(result: StoreResult<T>): MutationOutcome<T> {
  return { result, persist: false };
}

/**
 * Record store backed by one interchange file, held in memory between loads.
 *
 * Single-writer discipline: every read of the file and every mutation runs
 * through one WriteQueue per store instance. A mutation rewrites the whole
 * file (backup first, then temp file + rename) and only then replaces the
 * in-memory map, so a failed write leaves memory as it was.
 * Concurrent writers in other processes are not supported.
 */
export class JsonlRecordStore extends RecordStore {
  private readonly filePath: string;
  private readonly backupDir: string;
  private readonly fileConnection: FileConnectionService;
  private readonly queue = new WriteQueue();
  private records: Map<string, AnnotationRecord> | null = null;

  constructor(options: JsonlRecordStoreOptions) {
    super(options);
    this.filePath = options.filePath;
    this.backupDir = options.backupDir ?? join(dirname(options.filePath), 'backups');
    this.fileConnection = options.fileConnection ?? new FileConnectionService();
  }

  async loadAll(): Promise<StoreResult<Map<string, AnnotationRecord>>> {
    return this.queue.enqueue('loadAll', async () => {
      try {
        this.records = await this.readFromDisk();
        return ok(cloneMap(this.records), `Loaded ${this.records.size} records`);
      } catch (error) {
        return this.errorHandler.toFailure(error, 'loadAll', { fallback: 'STORE_UNAVAILABLE' });
      }
    });
  }

  async get(id: string): Promise<StoreResult<AnnotationRecord>> {
    return this.queue.enqueue(`get ${id}`, async () => {
      try {
        const record = (await this.current()).get(id);
        return record ? ok(structuredClone(record)) : fail('NOT_FOUND', `Record ${id} not found`);
      } catch (error) {
        return this.errorHandler.toFailure(error, 'get', { recordId: id, fallback: 'STORE_UNAVAILABLE' });
      }
    });
  }

  async save(
    id: string,
    fields: Record<string, FieldValue>,
    flags: Record<string, boolean>,
    score: QualityScore,
    owner: string
  ): Promise<StoreResult<AnnotationRecord>> {
    const result = await this.mutate<AnnotationRecord>('save', id, records => {
      const existing = records.get(id);
      if (!existing) {
        return unchanged(fail('NOT_FOUND', `Record ${id} no longer exists`));
      }
      const next = this.buildSavedRecord(existing, fields, flags, score, owner);
      if (next.success) {
        records.set(id, next.value);
      }
      return changed(next);
    });
    if (result.success) {
      console.log(`[JsonlStore] Saved ${id} for ${owner} (score ${result.value.qualityScore})`);
    }
    return result;
  }

  async claim(id: string, user: string): Promise<StoreResult<boolean>> {
    return this.mutate<boolean>('claim', id, records => {
      const existing = records.get(id);
      if (!existing) {
        return unchanged(fail('NOT_FOUND', `Record ${id} not found`));
      }
      if (existing.owner === user) {
        return unchanged(ok(true, `Record ${id} already owned by ${user}`));
      }
      if (existing.owner !== '') {
        return unchanged(ok(false, `Record ${id} is owned by ${existing.owner}`));
      }
      records.set(id, { ...existing, owner: user, updatedAt: nextTimestamp(existing.updatedAt) });
      return changed(ok(true, `Record ${id} claimed by ${user}`));
    });
  }

  async remove(id: string): Promise<StoreResult> {
    return this.mutate<void>('remove', id, records =>
      changed(records.delete(id) ? ok(undefined, `Record ${id} removed`) : fail('NOT_FOUND', `Record ${id} not found`))
    );
  }

  async insertMany(batch: AnnotationRecord[]): Promise<StoreResult<number>> {
    return this.mutate<number>('insertMany', undefined, records => {
      for (const record of batch) {
        if (records.has(record.id)) {
          return unchanged(fail('CONFLICT', `Record ${record.id} already exists`));
        }
        records.set(record.id, structuredClone(record));
      }
      return changed(ok(batch.length, `Inserted ${batch.length} records`));
    });
  }

  async statistics(): Promise<StoreResult<RecordStatistics>> {
    const snapshot = await this.loadAll();
    if (!snapshot.success) {
      return snapshot;
    }
    const all = [...snapshot.value.values()];
    const completed = all.filter(record => record.completed).length;
    return ok({ total: all.length, completed, pending: all.length - completed });
  }

  async export(filter: ExportFilter = {}): Promise<StoreResult<ExportSummary>> {
    const snapshot = await this.loadAll();
    if (!snapshot.success) {
      return snapshot;
    }
    return this.writeExport(snapshot.value.values(), filter);
  }

  async close(): Promise<void> {
    // Let queued writes finish before dropping the in-memory copy.
    await this.queue.enqueue('close', async () => {
      this.records = null;
    });
  }

  /**
   * Applies `change` to a copy of the records and persists the copy.
   * Nothing is written unless the change reports `persist`.
   */
  private mutate<T>(operation: string, recordId: string | undefined, change: Mutation<T>): Promise<StoreResult<T>> {
    const label = recordId === undefined ? operation : `${operation} ${recordId}`;
    return this.queue.enqueue(label, async () => {
      try {
        const next = cloneMap(await this.current());
        const { result, persist } = change(next);
        if (!persist) {
          return result;
        }
        await this.fileConnection.createBackup(this.filePath, this.backupDir);
        await this.fileConnection.writeFileAtomic(this.filePath, encodeRecordFile(next.values()));
        this.records = next;
        return result;
      } catch (error) {
        return this.errorHandler.toFailure(error, operation, { recordId });
      }
    });
  }

  private async current(): Promise<Map<string, AnnotationRecord>> {
    if (!this.records) {
      this.records = await this.readFromDisk();
    }
    return this.records;
  }

  private async readFromDisk(): Promise<Map<string, AnnotationRecord>> {
    try {
      const content = await this.fileConnection.readFile(this.filePath);
      return decodeRecordFile(content);
    } catch (error) {
      if (error instanceof FileConnectionError && error.code === 'FILE_NOT_FOUND') {
        console.warn(`[JsonlStore] ${this.filePath} does not exist yet; starting empty`);
        return new Map();
      }
      throw error;
    }
  }
}

function cloneMap(records: Map<string, AnnotationRecord>): Map<string, AnnotationRecord> {
  const copy = new Map<string, AnnotationRecord>();
  for (const [id, record] of records) {
    copy.set(id, structuredClone(record));
  }
  return copy;
}
