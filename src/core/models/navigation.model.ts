import type { StoreFailure } from './store-result.model';

export type Direction = 'prev' | 'next';

/**
 * Where a pending navigation goes once the annotator confirms it.
 */
export type NavigationTarget =
  | { kind: 'step'; direction: Direction }
  | { kind: 'jump'; recordId: string };

export interface ViewingState {
  kind: 'viewing';
  recordId: string;
  position: number;
  total: number;
  /** Set when the last save or navigation attempt failed. */
  error?: StoreFailure;
}

export interface CheckingDirtyState {
  kind: 'checking-dirty';
  recordId: string;
  target: NavigationTarget;
}

export interface ConfirmPendingState {
  kind: 'confirm-pending';
  recordId: string;
  position: number;
  total: number;
  target: NavigationTarget;
  error?: StoreFailure;
}

export interface EmptyState {
  kind: 'empty';
  error?: StoreFailure;
}

export type NavigationState = ViewingState | CheckingDirtyState | ConfirmPendingState | EmptyState;

export interface NavigationResult {
  success: boolean;
  message: string;
  state: NavigationState;
  error?: StoreFailure;
}
