import { BehaviorSubject, type Observable } from 'rxjs';
import {
  fail,
  ok,
  type ConfirmPendingState,
  type Direction,
  type FieldDescriptor,
  type NavigationResult,
  type NavigationState,
  type NavigationTarget,
  type StoreFailure,
  type StoreResult,
  type ViewingState,
} from '../models';
import { EditSession } from './edit-session.service';
import type { OwnershipCoordinator } from './ownership-coordinator.service';
import type { RecordCache } from './record-cache.service';
import type { RecordCommitService } from './record-commit.service';
import { resolvePosition, type VisibilityIndex } from './visibility-index.service';

export interface NavigationStateMachineOptions {
  user: string;
  fields: readonly FieldDescriptor[];
  cache: RecordCache;
  visibility: VisibilityIndex;
  ownership: OwnershipCoordinator;
  commit: RecordCommitService;
  /** How often a lost claim race is retried on the next visible record. */
  maxClaimAttempts?: number;
}

export interface NavigationProgress {
  /** 1-based */
  current: number;
  total: number;
}

/** Where the record being left sat in the visible list. */
type Origin = Pick<ViewingState, 'recordId' | 'position' | 'total'>;

type Locate = (ids: readonly string[]) => { position: number; explicitId?: string };

const DEFAULT_MAX_CLAIM_ATTEMPTS = 3;

/**
 * One annotator's walk through their visible records.
 *
 *   viewing --navigate--> checking-dirty --clean--> viewing(next)
 *                                        --dirty--> confirm-pending
 *   confirm-pending --saveAndContinue / discardAndContinue--> viewing(next)
 *   confirm-pending --cancel--> viewing(same)
 *
 * A failed save never leaves the current record: the state keeps its kind
 * and carries the failure in `error`. Only one operation runs at a time;
 * a call made while another is in flight is rejected.
 */
export class NavigationStateMachine {
  readonly user: string;
  private readonly fields: readonly FieldDescriptor[];
  private readonly cache: RecordCache;
  private readonly visibility: VisibilityIndex;
  private readonly ownership: OwnershipCoordinator;
  private readonly commitService: RecordCommitService;
  private readonly maxClaimAttempts: number;

  private readonly stateSubject = new BehaviorSubject<NavigationState>({ kind: 'empty' });
  readonly state$: Observable<NavigationState> = this.stateSubject.asObservable();

  private currentSession: EditSession | null = null;
  private busy = false;

  constructor(options: NavigationStateMachineOptions) {
    this.user = options.user;
    this.fields = options.fields;
    this.cache = options.cache;
    this.visibility = options.visibility;
    this.ownership = options.ownership;
    this.commitService = options.commit;
    this.maxClaimAttempts = Math.max(1, options.maxClaimAttempts ?? DEFAULT_MAX_CLAIM_ATTEMPTS);
  }

  get state(): NavigationState {
    return this.stateSubject.value;
  }

  /** Edit session of the record on screen; null in the empty state. */
  get session(): EditSession | null {
    return this.currentSession;
  }

  get progress(): NavigationProgress | null {
    const state = this.state;
    if (state.kind === 'viewing' || state.kind === 'confirm-pending') {
      return { current: state.position + 1, total: state.total };
    }
    return null;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  /**
   * Shows the visible record at `position` (clamped), claiming it if unowned.
   * Refused while the current record has unsaved changes.
   */
  start(position = 0): Promise<NavigationResult> {
    return this.exclusive(async () => {
      if (this.currentSession?.isDirty()) {
        return this.rejected('Save or discard the current changes first');
      }
      const loaded = await this.load(() => ({ position }));
      if (!loaded.success) {
        this.currentSession = null;
        this.setState({ kind: 'empty', error: loaded });
        return this.failed(loaded);
      }
      return this.succeeded(loaded.message);
    });
  }

  requestNavigate(direction: Direction): Promise<NavigationResult> {
    return this.exclusive(async () => {
      const state = this.state;
      if (state.kind !== 'viewing') {
        return this.rejected(`Cannot navigate while ${state.kind}`);
      }
      if (direction === 'next' && state.position >= state.total - 1) {
        return this.rejected('Already at the last record');
      }
      if (direction === 'prev' && state.position <= 0) {
        return this.rejected('Already at the first record');
      }
      return this.checkDirtyAndGo(state, { kind: 'step', direction });
    });
  }

  /**
   * Search by id. Ids the user cannot see report NOT_FOUND and leave the
   * state as it is; visible ids go through the same dirty check as prev/next.
   */
  jumpTo(recordId: string): Promise<NavigationResult> {
    return this.exclusive(async () => {
      const state = this.state;
      if (state.kind !== 'viewing') {
        return this.rejected(`Cannot navigate while ${state.kind}`);
      }
      const ids = await this.visibility.visibleIds(this.user);
      if (!ids.success) {
        this.setState({ ...state, error: ids });
        return this.failed(ids);
      }
      if (!ids.value.includes(recordId)) {
        return this.failed(fail('NOT_FOUND', `Record ${recordId} is not available`));
      }
      return this.checkDirtyAndGo(state, { kind: 'jump', recordId });
    });
  }

  saveAndContinue(): Promise<NavigationResult> {
    return this.exclusive(async () => {
      const state = this.state;
      const session = this.currentSession;
      if (state.kind !== 'confirm-pending' || !session) {
        return this.rejected(`Nothing to confirm while ${state.kind}`);
      }

      const saved = await this.commitService.commit(session, this.user);
      if (!saved.success) {
        this.setState({ ...state, error: saved });
        return this.failed(saved);
      }
      this.currentSession = EditSession.snapshot(saved.value, this.fields);
      return this.go(state, state.target);
    });
  }

  discardAndContinue(): Promise<NavigationResult> {
    return this.exclusive(async () => {
      const state = this.state;
      if (state.kind !== 'confirm-pending') {
        return this.rejected(`Nothing to confirm while ${state.kind}`);
      }
      console.log(`[Navigation] ${this.user} discarded changes to ${state.recordId}`);
      return this.go(state, state.target);
    });
  }

  /** Back to the record with the edits untouched. */
  cancel(): NavigationResult {
    if (this.busy) {
      return this.rejected('Another operation is still running');
    }
    const state = this.state;
    if (state.kind !== 'confirm-pending') {
      return this.rejected(`Nothing to cancel while ${state.kind}`);
    }
    this.setState({ kind: 'viewing', recordId: state.recordId, position: state.position, total: state.total });
    return this.succeeded('Navigation cancelled');
  }

  /** Saves the record on screen and stays on it. */
  save(): Promise<NavigationResult> {
    return this.exclusive(async () => {
      const state = this.state;
      const session = this.currentSession;
      if (state.kind !== 'viewing' || !session) {
        return this.rejected(`Cannot save while ${state.kind}`);
      }

      const saved = await this.commitService.commit(session, this.user);
      if (!saved.success) {
        this.setState({ ...state, error: saved });
        return this.failed(saved);
      }
      this.currentSession = EditSession.snapshot(saved.value, this.fields);
      this.setState({ kind: 'viewing', recordId: state.recordId, position: state.position, total: state.total });
      return this.succeeded(saved.message);
    });
  }

  private checkDirtyAndGo(state: ViewingState, target: NavigationTarget): Promise<NavigationResult> {
    this.setState({ kind: 'checking-dirty', recordId: state.recordId, target });
    if (this.currentSession?.isDirty()) {
      const pending: ConfirmPendingState = {
        kind: 'confirm-pending',
        recordId: state.recordId,
        position: state.position,
        total: state.total,
        target,
      };
      this.setState(pending);
      return Promise.resolve(this.succeeded('Unsaved changes: save or discard them to continue'));
    }
    return this.go(state, target);
  }

  /**
   * Loads the target record; on failure returns to `origin` with the error.
   */
  private async go(origin: Origin, target: NavigationTarget): Promise<NavigationResult> {
    const loaded = await this.load(this.locator(origin, target));
    if (!loaded.success) {
      this.setState({
        kind: 'viewing',
        recordId: origin.recordId,
        position: origin.position,
        total: origin.total,
        error: loaded,
      });
      return this.failed(loaded);
    }
    return this.succeeded(loaded.message);
  }

  private locator(origin: Origin, target: NavigationTarget): Locate {
    if (target.kind === 'jump') {
      const explicitId = target.recordId;
      return () => ({ position: origin.position, explicitId });
    }
    const direction = target.direction;
    const delta = direction === 'next' ? 1 : -1;
    return ids => {
      const index = ids.indexOf(origin.recordId);
      if (index >= 0) {
        return { position: index + delta };
      }
      // The record we left is gone, so its successor moved into its slot.
      return { position: direction === 'next' ? origin.position : origin.position - 1 };
    };
  }

  /**
   * Resolves, claims and snapshots a record. A claim lost to another
   * annotator rebuilds visibility and tries again; a jump target that has
   * left the visible list is NOT_FOUND.
   */
  private async load(locate: Locate): Promise<StoreResult<NavigationState>> {
    for (let attempt = 1; attempt <= this.maxClaimAttempts; attempt++) {
      const ids = await this.visibility.visibleIds(this.user);
      if (!ids.success) {
        return ids;
      }
      const { position, explicitId } = locate(ids.value);
      if (explicitId !== undefined && !ids.value.includes(explicitId)) {
        // A jump never falls back to whatever record now sits at the position.
        return fail('NOT_FOUND', `Record ${explicitId} is not available`);
      }
      const resolved = resolvePosition(ids.value, position, explicitId);
      if (!resolved) {
        this.currentSession = null;
        return ok(this.setState({ kind: 'empty' }), 'No records left to annotate');
      }

      const snapshot = await this.cache.getAll();
      if (!snapshot.success) {
        return snapshot;
      }
      const record = snapshot.value.get(resolved.id);
      if (!record) {
        continue;
      }

      const owned = await this.ownership.ensureOwned(record, this.user);
      if (!owned.success) {
        if (owned.error !== 'OWNERSHIP_DENIED') {
          return owned;
        }
        console.warn(`[Navigation] ${resolved.id} was taken (attempt ${attempt}/${this.maxClaimAttempts})`);
        continue;
      }

      this.currentSession = EditSession.snapshot(owned.value, this.fields);
      const state = this.setState({
        kind: 'viewing',
        recordId: resolved.id,
        position: resolved.position,
        total: ids.value.length,
      });
      return ok(state, `Showing ${resolved.id} (${resolved.position + 1}/${ids.value.length})`);
    }
    return fail('OWNERSHIP_DENIED', `Could not claim a record after ${this.maxClaimAttempts} attempts`);
  }

  private async exclusive(operation: () => Promise<NavigationResult>): Promise<NavigationResult> {
    if (this.busy) {
      return this.rejected('Another operation is still running');
    }
    this.busy = true;
    try {
      return await operation();
    } finally {
      this.busy = false;
    }
  }

  private setState<S extends NavigationState>(state: S): S {
    this.stateSubject.next(state);
    return state;
  }

  private succeeded(message: string): NavigationResult {
    return { success: true, message, state: this.state };
  }

  private rejected(message: string): NavigationResult {
    return { success: false, message, state: this.state };
  }

  private failed(error: StoreFailure): NavigationResult {
    return { success: false, message: error.message, state: this.state, error };
  }
}
