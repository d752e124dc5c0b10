/**
 * Display transforms between stored field values and their editable form.
 *
 * `load` runs when a record is shown, `save` when the annotator's values are
 * persisted. For every kind, `load(save(load(x)))` equals `load(x)`.
 */
import type { DisplayTransformKind, FieldValue } from '../../core/models';

const LIST_SEPARATORS: Record<'join-with-comma' | 'join-with-newline', { join: string; split: RegExp }> = {
  'join-with-comma': { join: ', ', split: /,/ },
  'join-with-newline': { join: '\n', split: /\r?\n/ },
};

/**
 * Narrows an unknown value (typically straight out of `JSON.parse`) to a field value.
 */
export function isFieldValue(value: unknown): value is FieldValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isFieldValue);
      }
      return Object.values(value).every(isFieldValue);
    default:
      return false;
  }
}

export function applyLoadTransform(kind: DisplayTransformKind, value: FieldValue | undefined): FieldValue {
  if (value === undefined || value === null) {
    return '';
  }

  switch (kind) {
    case 'join-with-comma':
    case 'join-with-newline':
      return Array.isArray(value)
        ? value.map(item => (typeof item === 'string' ? item : JSON.stringify(item))).join(LIST_SEPARATORS[kind].join)
        : value;
    case 'json':
      return typeof value === 'object' ? JSON.stringify(value, null, 2) : value;
    case 'identity':
      return value;
  }
}

export function applySaveTransform(kind: DisplayTransformKind, value: FieldValue | undefined): FieldValue {
  switch (kind) {
    case 'join-with-comma':
    case 'join-with-newline':
      if (typeof value === 'string') {
        return value
          .split(LIST_SEPARATORS[kind].split)
          .map(item => item.trim())
          .filter(item => item !== '');
      }
      return value ?? [];
    case 'json':
      if (typeof value === 'string') {
        if (value.trim() === '') return {};
        return parseJsonOrKeep(value);
      }
      return value ?? {};
    case 'identity':
      return value ?? null;
  }
}

function parseJsonOrKeep(text: string): FieldValue {
  try {
    const parsed: unknown = JSON.parse(text);
    return isFieldValue(parsed) ? parsed : text;
  } catch {
    // Not JSON; the annotator's text is stored as typed.
    return text;
  }
}
