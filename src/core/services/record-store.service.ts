import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  deriveQualityScore,
  fail,
  isListTransform,
  ok,
  type AnnotationRecord,
  type ExportFilter,
  type ExportSummary,
  type FieldDescriptor,
  type FieldValue,
  type QualityScore,
  type RecordStatistics,
  type StoreResult,
} from '../models';
import { StoreErrorHandler } from '../handlers/store-error.handler';
import { applySaveTransform } from '../../shared/utils/field-transform.utils';
import { encodeRecordFile } from '../../shared/utils/interchange.utils';
import { formatFileTimestamp } from '../../shared/utils/time-format.utils';

export interface RecordStoreOptions {
  /** Resolved task fields; export uses their transforms. */
  fields: FieldDescriptor[];
  /** Default directory for export files. */
  exportDir: string;
  errorHandler?: StoreErrorHandler;
}

/**
 * Persistence contract over the record table.
 * Implementations: SqliteRecordStore (durable, shared between processes) and
 * JsonlRecordStore (interchange file held in memory, single process).
 *
 * Every method resolves to a StoreResult; none rejects.
 */
export abstract class RecordStore {
  protected readonly fields: FieldDescriptor[];
  protected readonly exportDir: string;
  protected readonly errorHandler: StoreErrorHandler;

  constructor(options: RecordStoreOptions) {
    this.fields = options.fields;
    this.exportDir = options.exportDir;
    this.errorHandler = options.errorHandler ?? new StoreErrorHandler();
  }

  /** Full snapshot in store order. STORE_UNAVAILABLE when the medium cannot be read. */
  abstract loadAll(): Promise<StoreResult<Map<string, AnnotationRecord>>>;

  abstract get(id: string): Promise<StoreResult<AnnotationRecord>>;

  /**
   * Persists fields, flags and score for `owner` and marks the record completed.
   * Fields are merged into the stored map; flags replace the stored flags.
   */
  abstract save(
    id: string,
    fields: Record<string, FieldValue>,
    flags: Record<string, boolean>,
    score: QualityScore,
    owner: string
  ): Promise<StoreResult<AnnotationRecord>>;

  /**
   * Atomic check-and-set of the owner. `true` when `user` now owns the record,
   * `false` (no mutation) when someone else already does.
   */
  abstract claim(id: string, user: string): Promise<StoreResult<boolean>>;

  abstract remove(id: string): Promise<StoreResult>;

  /** Adds new records; an id that already exists fails the whole batch with CONFLICT. */
  abstract insertMany(records: AnnotationRecord[]): Promise<StoreResult<number>>;

  abstract statistics(): Promise<StoreResult<RecordStatistics>>;

  abstract export(filter?: ExportFilter): Promise<StoreResult<ExportSummary>>;

  abstract close(): Promise<void>;

  /**
   * The record as it will be after a save, or the reason the save is refused.
   * Runs inside each implementation's exclusive section.
   */
  protected buildSavedRecord(
    existing: AnnotationRecord,
    fields: Record<string, FieldValue>,
    flags: Record<string, boolean>,
    score: QualityScore,
    owner: string
  ): StoreResult<AnnotationRecord> {
    if (existing.owner !== '' && existing.owner !== owner) {
      return fail('OWNERSHIP_DENIED', `Record ${existing.id} is owned by ${existing.owner}`);
    }

    const qualityScore = deriveQualityScore(flags);
    if (qualityScore !== score) {
      console.warn(`[RecordStore] Score ${score} for ${existing.id} does not match its flags; storing ${qualityScore}`);
    }

    return ok({
      ...existing,
      owner: owner,
      completed: true,
      qualityScore,
      fields: { ...existing.fields, ...fields },
      flags: { ...flags },
      updatedAt: nextTimestamp(existing.updatedAt),
    });
  }

  /**
   * Writes `export_<YYYYMMDD_HHMMSS>.jsonl`. List fields still held as
   * display strings are split back into arrays on the way out.
   */
  protected async writeExport(
    records: Iterable<AnnotationRecord>,
    filter: ExportFilter = {}
  ): Promise<StoreResult<ExportSummary>> {
    const selected: AnnotationRecord[] = [];
    for (const record of records) {
      if (filter.owner !== undefined && record.owner !== filter.owner) continue;
      if (filter.completedOnly && !record.completed) continue;
      selected.push(this.toExportRecord(record));
    }

    const outputDir = filter.outputDir ?? this.exportDir;
    const path = join(outputDir, `export_${formatFileTimestamp(new Date())}.jsonl`);
    try {
      await mkdir(outputDir, { recursive: true });
      await writeFile(path, encodeRecordFile(selected), 'utf-8');
    } catch (error) {
      return this.errorHandler.toFailure(error, 'export');
    }

    console.log(`[RecordStore] Exported ${selected.length} records to ${path}`);
    return ok({ path, exportedCount: selected.length }, `Exported ${selected.length} records`);
  }

  private toExportRecord(record: AnnotationRecord): AnnotationRecord {
    const fields = { ...record.fields };
    for (const field of this.fields) {
      const value = fields[field.name];
      if (isListTransform(field.displayTransform) && typeof value === 'string') {
        fields[field.name] = applySaveTransform(field.displayTransform, value);
      }
    }
    return { ...record, fields };
  }
}

/**
 * Current time as an ISO timestamp, moved past `previous` when the clock has
 * not advanced, so every mutation yields a distinct `updatedAt`.
 */
export function nextTimestamp(previous: string): string {
  const now = Date.now();
  const last = new Date(previous).getTime();
  return new Date(Number.isNaN(last) || now > last ? now : last + 1).toISOString();
}
