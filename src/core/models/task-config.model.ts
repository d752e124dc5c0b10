/**
 * Task configuration consumed by the core. Loading it from disk is the host's job;
 * the core receives it already parsed.
 */
import type { FieldDescriptor } from './field-descriptor.model';

export type StorageConfig =
  | { kind: 'sqlite'; filename: string }
  | { kind: 'jsonl'; filePath: string; backupDir?: string };

export interface TaskConfig {
  name: string;
  fields: FieldDescriptor[];
  storage: StorageConfig;
  /** Directory export files are written to. */
  exportDir: string;
  /** Maximum age of the cached record set before a reload. */
  cacheTtlSeconds: number;
  /** How long the durable store waits on a locked database before failing. */
  busyTimeoutMs: number;
}

export type TaskConfigInput = Pick<TaskConfig, 'name' | 'fields' | 'storage'> &
  Partial<Omit<TaskConfig, 'name' | 'fields' | 'storage'>>;

export const DEFAULT_EXPORT_DIR = 'exports';
export const DEFAULT_CACHE_TTL_SECONDS = 300;
export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

export interface TaskConfigValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}
