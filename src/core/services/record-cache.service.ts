import { BehaviorSubject, type Observable } from 'rxjs';
import {
  DEFAULT_CACHE_TTL_SECONDS,
  ok,
  type AnnotationRecord,
  type StoreFailure,
  type StoreResult,
} from '../models';
import type { RecordStore } from './record-store.service';

export type RecordSnapshot = ReadonlyMap<string, Readonly<AnnotationRecord>>;

/**
 * Cache state containing the current record snapshot and metadata.
 */
export interface RecordCacheState {
  records: RecordSnapshot | null;
  /** Epoch ms of the last successful load. */
  loadedAt: number | null;
  /** Bumped on every reload and every invalidation. */
  revision: number;
  isLoading: boolean;
  lastError: StoreFailure | null;
}

export interface RecordCacheStats {
  hits: number;
  misses: number;
  invalidations: number;
  size: number;
  revision: number;
  ageSeconds: number | null;
}

/**
 * Owner of the in-memory all-records snapshot that visibility is computed from.
 *
 * The snapshot is reloaded when older than the TTL or after `invalidate()`.
 * Only the claim path (OwnershipCoordinator) and the save path
 * (RecordCommitService) invalidate it.
 */
export class RecordCache {
  private readonly ttlMs: number;
  private readonly cacheStateSubject = new BehaviorSubject<RecordCacheState>({
    records: null,
    loadedAt: null,
    revision: 0,
    isLoading: false,
    lastError: null,
  });
  readonly state$: Observable<RecordCacheState> = this.cacheStateSubject.asObservable();

  private inFlight: Promise<StoreResult<RecordSnapshot>> | null = null;
  private generation = 0;
  private hits = 0;
  private misses = 0;
  private invalidations = 0;

  constructor(
    private readonly store: RecordStore,
    ttlSeconds: number = DEFAULT_CACHE_TTL_SECONDS
  ) {
    this.ttlMs = ttlSeconds * 1000;
  }

  get revision(): number {
    return this.cacheStateSubject.value.revision;
  }

  getState(): RecordCacheState {
    return this.cacheStateSubject.value;
  }

  isStale(now: number = Date.now()): boolean {
    const { records, loadedAt } = this.cacheStateSubject.value;
    return records === null || loadedAt === null || now - loadedAt >= this.ttlMs;
  }

  /**
   * The current snapshot, reloading it first when stale. Concurrent callers
   * share one reload. A failed reload clears the snapshot instead of serving
   * the previous one.
   */
  async getAll(): Promise<StoreResult<RecordSnapshot>> {
    const { records } = this.cacheStateSubject.value;
    if (records !== null && !this.isStale()) {
      this.hits++;
      return ok(records);
    }

    this.misses++;
    if (!this.inFlight) {
      this.inFlight = this.reload(this.generation);
    }
    return this.inFlight;
  }

  /**
   * Drops the snapshot so the next `getAll()` reads the store.
   */
  invalidate(reason: string): void {
    this.generation++;
    this.invalidations++;
    this.inFlight = null;
    const state = this.cacheStateSubject.value;
    this.cacheStateSubject.next({
      ...state,
      records: null,
      loadedAt: null,
      isLoading: false,
      revision: state.revision + 1,
    });
    console.log(`[RecordCache] Invalidated (${reason})`);
  }

  stats(now: number = Date.now()): RecordCacheStats {
    const { records, loadedAt, revision } = this.cacheStateSubject.value;
    return {
      hits: this.hits,
      misses: this.misses,
      invalidations: this.invalidations,
      size: records?.size ?? 0,
      revision,
      ageSeconds: loadedAt === null ? null : Math.floor((now - loadedAt) / 1000),
    };
  }

  /**
   * Reset cache to empty state.
   */
  reset(): void {
    this.generation++;
    this.inFlight = null;
    this.hits = 0;
    this.misses = 0;
    this.invalidations = 0;
    this.cacheStateSubject.next({
      records: null,
      loadedAt: null,
      revision: 0,
      isLoading: false,
      lastError: null,
    });
  }

  private async reload(generation: number): Promise<StoreResult<RecordSnapshot>> {
    this.patchState({ isLoading: true });
    try {
      const result = await this.store.loadAll();
      // An invalidation during the load makes this result stale; keep it out of the cache.
      if (generation !== this.generation) {
        return result;
      }

      const state = this.cacheStateSubject.value;
      if (!result.success) {
        console.error(`[RecordCache] Reload failed: ${result.message}`);
        this.cacheStateSubject.next({
          ...state,
          records: null,
          loadedAt: null,
          isLoading: false,
          lastError: result,
        });
        return result;
      }

      this.cacheStateSubject.next({
        records: result.value,
        loadedAt: Date.now(),
        revision: state.revision + 1,
        isLoading: false,
        lastError: null,
      });
      console.log(`[RecordCache] Reloaded ${result.value.size} records`);
      return ok(result.value, result.message);
    } finally {
      if (generation === this.generation) {
        this.inFlight = null;
        this.patchState({ isLoading: false });
      }
    }
  }

  private patchState(patch: Partial<RecordCacheState>): void {
    this.cacheStateSubject.next({ ...this.cacheStateSubject.value, ...patch });
  }
}
