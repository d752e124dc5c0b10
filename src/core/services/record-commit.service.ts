import { fail, ok, type AnnotationRecord, type StoreResult } from '../models';
import type { EditSession } from './edit-session.service';
import type { RecordCache } from './record-cache.service';
import type { RecordStore } from './record-store.service';

/**
 * Single entry point for saving an annotator's edits.
 * Steps: build the payload, save under the store's exclusive section,
 * invalidate the cache, re-read and verify the saved record.
 */
export class RecordCommitService {
  constructor(
    private readonly store: RecordStore,
    private readonly cache: RecordCache
  ) {}

  async commit(session: EditSession, user: string): Promise<StoreResult<AnnotationRecord>> {
    const id = session.recordId;
    const payload = session.toSavePayload();
    console.log(`[RecordCommit] Saving ${id} for ${user}`);

    const saved = await this.store.save(id, payload.fields, payload.flags, payload.score, user);
    this.cache.invalidate(`save ${id}`);
    if (!saved.success) {
      console.error(`[RecordCommit] Save of ${id} failed: ${saved.message}`);
      return saved;
    }

    // Verify the write by reading the record back
    const reread = await this.store.get(id);
    if (!reread.success) {
      console.error(`[RecordCommit] Verification read of ${id} failed: ${reread.message}`);
      return reread;
    }
    if (!reread.value.completed) {
      console.error(`[RecordCommit] Verification of ${id} failed: record is not completed after save`);
      return fail('CONFLICT', `Record ${id} was reset by another writer during save`);
    }
    if (reread.value.updatedAt !== saved.value.updatedAt) {
      // The write was accepted; a later save of the same record replaced it.
      console.warn(`[RecordCommit] ${id} was saved again before it could be verified`);
      return ok(reread.value, `Record ${id} saved; it has since been saved again`);
    }

    console.log(`[RecordCommit] Saved ${id} (score ${reread.value.qualityScore})`);
    return ok(reread.value, saved.message);
  }
}
