export * from './core/models';
export { TaskConfigError, resolveTaskConfig, validateTaskConfig } from './core/config/task-config';
export { StoreErrorHandler, type ErrorContext } from './core/handlers/store-error.handler';
export { FileConnectionError, FileConnectionService } from './core/services/file-connection.service';
export { RecordStore, type RecordStoreOptions } from './core/services/record-store.service';
export {
  SqliteError,
  SqliteRecordStore,
  toSqliteError,
  type SqliteRecordStoreOptions,
} from './core/services/sqlite-record-store.service';
export { JsonlRecordStore, type JsonlRecordStoreOptions } from './core/services/jsonl-record-store.service';
export { WriteQueue, type WriteQueueStatus } from './core/services/write-queue.service';
export {
  RecordCache,
  type RecordCacheState,
  type RecordCacheStats,
  type RecordSnapshot,
} from './core/services/record-cache.service';
export { OwnershipCoordinator } from './core/services/ownership-coordinator.service';
export {
  VisibilityIndex,
  refreshVisibleIds,
  resolvePosition,
  type ResolvedPosition,
} from './core/services/visibility-index.service';
export {
  EditSession,
  type ChangedValues,
  type SavePayload,
  type SessionValues,
} from './core/services/edit-session.service';
export { RecordCommitService } from './core/services/record-commit.service';
export {
  NavigationStateMachine,
  type NavigationProgress,
  type NavigationStateMachineOptions,
} from './core/services/navigation-state-machine.service';
export {
  createAnnotationCore,
  createRecordStore,
  type AnnotationCore,
  type LoginResult,
} from './core/annotation-core';
export { applyLoadTransform, applySaveTransform } from './shared/utils/field-transform.utils';
export { displayValuesEqual } from './shared/utils/dirty-check.utils';
export { scaleDimensions } from './shared/utils/scale.utils';
export { decodeRecordLine, encodeRecordLine, RecordFormatError } from './shared/utils/interchange.utils';
