import { isUnclaimed, ok, type AnnotationRecord, type StoreResult } from '../models';
import type { RecordCache } from './record-cache.service';

export interface ResolvedPosition {
  position: number;
  id: string;
}

/**
 * Ids of the records `user` may navigate: unclaimed or owned by `user`,
 * in store order.
 */
export function refreshVisibleIds(records: Iterable<Readonly<AnnotationRecord>>, user: string): string[] {
  const ids: string[] = [];
  for (const record of records) {
    if (isUnclaimed(record) || record.owner === user) {
      ids.push(record.id);
    }
  }
  return ids;
}

/**
 * An `explicitId` present in `ids` wins over `position`; otherwise the
 * position is clamped into range. Null when there is nothing to show.
 */
export function resolvePosition(
  ids: readonly string[],
  position: number,
  explicitId?: string
): ResolvedPosition | null {
  if (ids.length === 0) {
    return null;
  }
  if (explicitId !== undefined) {
    const explicitPosition = ids.indexOf(explicitId);
    if (explicitPosition >= 0) {
      return { position: explicitPosition, id: explicitId };
    }
  }

  const whole = Number.isFinite(position) ? Math.trunc(position) : 0;
  const clamped = Math.min(Math.max(whole, 0), ids.length - 1);
  return { position: clamped, id: ids[clamped] };
}

interface CachedIndex {
  revision: number;
  ids: readonly string[];
}

/**
 * Per-user visibility, rebuilt whenever the record cache revision moves
 * (reload, claim, save) or a different user asks.
 */
export class VisibilityIndex {
  private readonly indexes = new Map<string, CachedIndex>();

  constructor(private readonly cache: RecordCache) {}

  async visibleIds(user: string): Promise<StoreResult<readonly string[]>> {
    const snapshot = await this.cache.getAll();
    if (!snapshot.success) {
      return snapshot;
    }

    const revision = this.cache.revision;
    const cached = this.indexes.get(user);
    if (cached && cached.revision === revision) {
      return ok(cached.ids);
    }

    const ids = refreshVisibleIds(snapshot.value.values(), user);
    this.indexes.set(user, { revision, ids });
    console.log(`[Visibility] ${user}: ${ids.length} of ${snapshot.value.size} records visible`);
    return ok(ids);
  }

  async resolve(user: string, position: number, explicitId?: string): Promise<StoreResult<ResolvedPosition | null>> {
    const ids = await this.visibleIds(user);
    if (!ids.success) {
      return ids;
    }
    return ok(resolvePosition(ids.value, position, explicitId));
  }

  /** Forget every user's index, e.g. on login. */
  clear(): void {
    this.indexes.clear();
  }
}
