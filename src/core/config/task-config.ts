import {
  DEFAULT_BUSY_TIMEOUT_MS,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_EXPORT_DIR,
  type TaskConfig,
  type TaskConfigInput,
  type TaskConfigValidation,
} from '../models/task-config.model';
import { DISPLAY_TRANSFORM_KINDS } from '../models';

export class TaskConfigError extends Error {
  constructor(public readonly errors: string[]) {
    super('Invalid task configuration: ' + errors.join('; '));
    this.name = 'TaskConfigError';
  }
}

/** Field names the interchange format reserves for record metadata. */
const RESERVED_FIELD_NAMES = new Set(['annotated', 'uid', 'score', 'created_at', 'updated_at']);

export function resolveTaskConfig(input: TaskConfigInput): TaskConfig {
  return {
    name: input.name,
    fields: input.fields,
    storage: input.storage,
    exportDir: input.exportDir ?? DEFAULT_EXPORT_DIR,
    cacheTtlSeconds: input.cacheTtlSeconds ?? DEFAULT_CACHE_TTL_SECONDS,
    busyTimeoutMs: input.busyTimeoutMs ?? DEFAULT_BUSY_TIMEOUT_MS,
  };
}

export function validateTaskConfig(config: TaskConfig): TaskConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.name || config.name.trim() === '') {
    errors.push('name is required');
  }

  const names = new Set<string>();
  config.fields.forEach((field, index) => {
    const prefix = `fields[${index}]`;
    if (!field.name || field.name.trim() === '') {
      errors.push(`${prefix}.name is required`);
      return;
    }
    if (names.has(field.name)) {
      errors.push(`${prefix}.name "${field.name}" is declared twice`);
    }
    names.add(field.name);

    if (RESERVED_FIELD_NAMES.has(field.name) || field.name.startsWith('chk_')) {
      errors.push(`${prefix}.name "${field.name}" is reserved for record metadata`);
    }
    if (!DISPLAY_TRANSFORM_KINDS.includes(field.displayTransform)) {
      errors.push(`${prefix}.displayTransform "${String(field.displayTransform)}" is not supported`);
    }
    if (field.isOwnerComputed && field.hasReviewFlag) {
      warnings.push(`${prefix} "${field.name}" is system-computed; its review flag is never saved`);
    }
  });

  for (const field of config.fields) {
    if (field.scaleOf === undefined) continue;
    const target = config.fields.find(f => f.name === field.scaleOf);
    if (!target) {
      errors.push(`scale field "${field.name}" points at unknown field "${field.scaleOf}"`);
    } else if (target.scaleOf !== undefined) {
      errors.push(`scale field "${field.name}" points at another scale field "${target.name}"`);
    }
  }

  if (config.storage.kind === 'sqlite' && !config.storage.filename) {
    errors.push('storage.filename is required for the sqlite backend');
  }
  if (config.storage.kind === 'jsonl' && !config.storage.filePath) {
    errors.push('storage.filePath is required for the jsonl backend');
  }

  if (!Number.isFinite(config.cacheTtlSeconds) || config.cacheTtlSeconds < 0) {
    errors.push('cacheTtlSeconds must be a non-negative number');
  } else if (config.cacheTtlSeconds > 3600) {
    warnings.push('cacheTtlSeconds above one hour delays seeing other annotators\' claims');
  }
  if (!Number.isInteger(config.busyTimeoutMs) || config.busyTimeoutMs < 0) {
    errors.push('busyTimeoutMs must be a non-negative integer');
  }

  return { isValid: errors.length === 0, errors, warnings };
}
