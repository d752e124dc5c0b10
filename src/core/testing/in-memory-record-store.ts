import {
  fail,
  ok,
  type AnnotationRecord,
  type ExportFilter,
  type ExportSummary,
  type FieldDescriptor,
  type FieldValue,
  type QualityScore,
  type RecordStatistics,
  type StoreFailure,
  type StoreResult,
} from '../models';
import { RecordStore, nextTimestamp } from '../services/record-store.service';

/**
 * RecordStore held in a Map, for tests of the services built on the store.
 */
export class InMemoryRecordStore extends RecordStore {
  readonly records = new Map<string, AnnotationRecord>();
  loadCount = 0;
  private nextLoadFailure: StoreFailure | null = null;

  constructor(records: AnnotationRecord[] = [], fields: FieldDescriptor[] = []) {
    super({ fields, exportDir: 'exports' });
    for (const record of records) {
      this.records.set(record.id, structuredClone(record));
    }
  }

  /** Makes the next loadAll() fail with `failure`. */
  failNextLoad(failure: StoreFailure): void {
    this.nextLoadFailure = failure;
  }

  async loadAll(): Promise<StoreResult<Map<string, AnnotationRecord>>> {
    this.loadCount++;
    if (this.nextLoadFailure) {
      const failure = this.nextLoadFailure;
      this.nextLoadFailure = null;
      return failure;
    }
    return ok(structuredClone(this.records));
  }

  async get(id: string): Promise<StoreResult<AnnotationRecord>> {
    const record = this.records.get(id);
    return record ? ok(structuredClone(record)) : fail('NOT_FOUND', `Record ${id} not found`);
  }

  async save(
    id: string,
    fields: Record<string, FieldValue>,
    flags: Record<string, boolean>,
    score: QualityScore,
    owner: string
  ): Promise<StoreResult<AnnotationRecord>> {
    const existing = this.records.get(id);
    if (!existing) {
      return fail('NOT_FOUND', `Record ${id} no longer exists`);
    }
    const next = this.buildSavedRecord(existing, fields, flags, score, owner);
    if (next.success) {
      this.records.set(id, structuredClone(next.value));
    }
    return next;
  }

  async claim(id: string, user: string): Promise<StoreResult<boolean>> {
    const existing = this.records.get(id);
    if (!existing) {
      return fail('NOT_FOUND', `Record ${id} not found`);
    }
    if (existing.owner !== '' && existing.owner !== user) {
      return ok(false, `Record ${id} is owned by ${existing.owner}`);
    }
    this.records.set(id, { ...existing, owner: user, updatedAt: nextTimestamp(existing.updatedAt) });
    return ok(true);
  }

  async remove(id: string): Promise<StoreResult> {
    return this.records.delete(id) ? ok(undefined) : fail('NOT_FOUND', `Record ${id} not found`);
  }

  async insertMany(records: AnnotationRecord[]): Promise<StoreResult<number>> {
    for (const record of records) {
      this.records.set(record.id, structuredClone(record));
    }
    return ok(records.length);
  }

  async statistics(): Promise<StoreResult<RecordStatistics>> {
    const completed = [...this.records.values()].filter(record => record.completed).length;
    return ok({ total: this.records.size, completed, pending: this.records.size - completed });
  }

  async export(filter?: ExportFilter): Promise<StoreResult<ExportSummary>> {
    return this.writeExport(this.records.values(), filter);
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
