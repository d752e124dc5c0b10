import type { AuthError, Authenticate, NavigationResult, UserIdentity } from './models';
import type { TaskConfig, TaskConfigInput } from './models/task-config.model';
import { TaskConfigError, resolveTaskConfig, validateTaskConfig } from './config/task-config';
import { JsonlRecordStore } from './services/jsonl-record-store.service';
import { NavigationStateMachine } from './services/navigation-state-machine.service';
import { OwnershipCoordinator } from './services/ownership-coordinator.service';
import { RecordCache } from './services/record-cache.service';
import { RecordCommitService } from './services/record-commit.service';
import type { RecordStore } from './services/record-store.service';
import { SqliteRecordStore } from './services/sqlite-record-store.service';
import { VisibilityIndex } from './services/visibility-index.service';

export type LoginResult =
  | { success: true; user: UserIdentity; machine: NavigationStateMachine; navigation: NavigationResult }
  | { success: false; error: AuthError };

/**
 * The shared services of one annotation task. Store, cache and coordinator
 * are shared by every annotator; each annotator gets their own
 * NavigationStateMachine (and with it their own EditSession).
 */
export interface AnnotationCore {
  readonly config: TaskConfig;
  readonly store: RecordStore;
  readonly cache: RecordCache;
  readonly visibility: VisibilityIndex;
  readonly ownership: OwnershipCoordinator;
  readonly commit: RecordCommitService;
  openSession(user: string): NavigationStateMachine;
  /** Verifies credentials, switches to the user and shows their first record. */
  login(authenticate: Authenticate, username: string, password: string): Promise<LoginResult>;
  close(): Promise<void>;
}

/** Picks the backend once, from `storage.kind`. */
export function createRecordStore(config: TaskConfig): RecordStore {
  const common = { fields: config.fields, exportDir: config.exportDir };
  switch (config.storage.kind) {
    case 'sqlite':
      return new SqliteRecordStore({
        ...common,
        filename: config.storage.filename,
        busyTimeoutMs: config.busyTimeoutMs,
      });
    case 'jsonl':
      return new JsonlRecordStore({
        ...common,
        filePath: config.storage.filePath,
        backupDir: config.storage.backupDir,
      });
  }
}

/**
 * Composition root. Throws TaskConfigError for an invalid configuration.
 */
export function createAnnotationCore(input: TaskConfigInput): AnnotationCore {
  const config = resolveTaskConfig(input);
  const validation = validateTaskConfig(config);
  if (!validation.isValid) {
    throw new TaskConfigError(validation.errors);
  }
  for (const warning of validation.warnings) {
    console.warn(`[TaskConfig] ${warning}`);
  }

  const store = createRecordStore(config);
  const cache = new RecordCache(store, config.cacheTtlSeconds);
  const visibility = new VisibilityIndex(cache);
  const ownership = new OwnershipCoordinator(store, cache);
  const commit = new RecordCommitService(store, cache);

  const openSession = (user: string): NavigationStateMachine =>
    new NavigationStateMachine({ user, fields: config.fields, cache, visibility, ownership, commit });

  console.log(`[AnnotationCore] Task "${config.name}" on ${config.storage.kind} storage`);

  return {
    config,
    store,
    cache,
    visibility,
    ownership,
    commit,
    openSession,
    async login(authenticate, username, password) {
      const auth = await authenticate(username, password);
      if (!auth.success) {
        console.warn(`[AnnotationCore] Login failed for ${username}: ${auth.error.message}`);
        return auth;
      }
      visibility.clear();
      const machine = openSession(auth.user.username);
      const navigation = await machine.start();
      console.log(`[AnnotationCore] ${auth.user.username} logged in as ${auth.user.role}`);
      return { success: true, user: auth.user, machine, navigation };
    },
    async close() {
      await store.close();
      cache.reset();
    },
  };
}
