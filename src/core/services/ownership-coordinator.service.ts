import { fail, ok, type AnnotationRecord, type StoreResult } from '../models';
import type { RecordCache } from './record-cache.service';
import type { RecordStore } from './record-store.service';

/**
 * Browse-to-own: the first annotator to open an unclaimed record becomes its owner.
 *
 * Exactly-one-winner comes from the store's atomic claim. A lost race is an
 * expected outcome and is reported as OWNERSHIP_DENIED; the cache is
 * invalidated either way so the next visibility rebuild sees the new owner.
 */
export class OwnershipCoordinator {
  constructor(
    private readonly store: RecordStore,
    private readonly cache: RecordCache
  ) {}

  async claim(id: string, user: string): Promise<StoreResult> {
    const result = await this.store.claim(id, user);
    if (!result.success) {
      return result;
    }

    this.cache.invalidate(`claim ${id}`);
    if (!result.value) {
      console.warn(`[Ownership] Claim denied: ${result.message}`);
      return fail('OWNERSHIP_DENIED', result.message);
    }
    console.log(`[Ownership] ${user} owns ${id}`);
    return ok(undefined, result.message);
  }

  /**
   * Claims `record` for `user` unless it is already theirs; returns the record
   * as owned by `user`. Records held by someone else are refused without a
   * store call.
   */
  async ensureOwned(record: Readonly<AnnotationRecord>, user: string): Promise<StoreResult<AnnotationRecord>> {
    if (record.owner === user) {
      return ok({ ...record });
    }
    if (record.owner !== '') {
      return fail('OWNERSHIP_DENIED', `Record ${record.id} is owned by ${record.owner}`);
    }

    const claimed = await this.claim(record.id, user);
    if (!claimed.success) {
      return claimed;
    }
    return ok({ ...record, owner: user }, claimed.message);
  }
}
