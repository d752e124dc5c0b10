export type StoreErrorCode =
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'OWNERSHIP_DENIED'
  | 'IO_ERROR'
  | 'STORE_UNAVAILABLE'
  | 'PERMISSION_ERROR'
  | 'INVALID_DATA';

export interface StoreFailure {
  success: false;
  error: StoreErrorCode;
  message: string;
}

export interface StoreSuccess<T> {
  success: true;
  message: string;
  value: T;
}

/**
 * Outcome of a store, cache or coordinator call. Failures are values, not exceptions.
 */
export type StoreResult<T = void> = StoreSuccess<T> | StoreFailure;

export function ok<T>(value: T, message = 'OK'): StoreSuccess<T> {
  return { success: true, message, value };
}

export function fail(error: StoreErrorCode, message: string): StoreFailure {
  return { success: false, error, message };
}
