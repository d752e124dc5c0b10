/**
 * Value comparison used to decide whether an edit session diverges from the
 * persisted record. Values are compared in the form the annotator sees them.
 */
import type { FieldValue } from '../../core/models';

/** Delimiters of dimension-like numeric lists, e.g. "0.78*0.41*0.54". */
const DIMENSION_DELIMITERS = ['*', '×'];

/**
 * Canonical string form of a displayed value: trimmed, with null, undefined
 * and the empty string all mapping to "".
 */
export function normalizeDisplayValue(value: FieldValue | undefined): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value.trim();
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value).trim();
}

function isDimensionList(text: string): boolean {
  return DIMENSION_DELIMITERS.some(delimiter => text.includes(delimiter));
}

function toItemSet(value: FieldValue | undefined): Set<string> {
  if (Array.isArray(value)) {
    return new Set(value.map(normalizeDisplayValue));
  }
  const single = normalizeDisplayValue(value);
  return new Set(single === '' ? [] : [single]);
}

function sameItems(a: Set<string>, b: Set<string>): boolean {
  if (a.size !== b.size) return false;
  for (const item of a) {
    if (!b.has(item)) return false;
  }
  return true;
}

/**
 * True when two displayed values mean the same thing to the annotator.
 * - whitespace around values is ignored, and empty equals missing
 * - dimension lists ignore whitespace around their delimiters
 * - multi-select values (arrays) compare as sets
 */
export function displayValuesEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    return sameItems(toItemSet(a), toItemSet(b));
  }

  const left = normalizeDisplayValue(a);
  const right = normalizeDisplayValue(b);

  if (isDimensionList(left) || isDimensionList(right)) {
    return left.replace(/\s+/g, '') === right.replace(/\s+/g, '');
  }
  return left === right;
}

function toItemList(value: FieldValue | undefined): string[] {
  if (Array.isArray(value)) {
    return value.map(normalizeDisplayValue);
  }
  const single = normalizeDisplayValue(value);
  return single === '' ? [] : [single];
}

/**
 * Stored lists: the same items in the same order, repeats included.
 */
export function listItemsEqual(a: FieldValue | undefined, b: FieldValue | undefined): boolean {
  const left = toItemList(a);
  const right = toItemList(b);
  if (left.length !== right.length) return false;
  for (let i = 0; i < left.length; i++) {
    if (left[i] !== right[i]) return false;
  }
  return true;
}

function isObjectValue(value: FieldValue): value is { [key: string]: FieldValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Structural equality of parsed values; object key order does not matter.
 */
export function fieldValuesEqual(a: FieldValue, b: FieldValue): boolean {
  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!fieldValuesEqual(a[i], b[i])) return false;
    }
    return true;
  }
  if (isObjectValue(a) && isObjectValue(b)) {
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    for (const key of keys) {
      if (!(key in b) || !fieldValuesEqual(a[key], b[key])) return false;
    }
    return true;
  }
  return a === b;
}

/**
 * Multiplier value of a scale field; empty or non-numeric input counts as 1.
 */
export function parseMultiplier(value: FieldValue | undefined): number {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 1;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : 1;
  }
  return 1;
}
