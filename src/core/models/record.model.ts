/**
 * A JSON-compatible business value stored in a record field.
 */
export type FieldValue =
  | string
  | number
  | boolean
  | null
  | FieldValue[]
  | { [key: string]: FieldValue };

/**
 * Quality score stamped on every save: 0 when any review flag is set, 1 otherwise.
 */
export type QualityScore = 0 | 1;

/**
 * One unit of annotatable data.
 */
export interface AnnotationRecord {
  id: string;
  /** Annotator holding the record; empty string means unclaimed. */
  owner: string;
  completed: boolean;
  qualityScore: QualityScore;
  fields: Record<string, FieldValue>;
  /** Per-field "needs review" markers, keyed by field name. */
  flags: Record<string, boolean>;
  createdAt: string; // ISO timestamp
  updatedAt: string; // ISO timestamp
}

export interface RecordStatistics {
  total: number;
  completed: number;
  pending: number;
}

export function deriveQualityScore(flags: Record<string, boolean>): QualityScore {
  return Object.values(flags).some(flag => flag) ? 0 : 1;
}

export function isUnclaimed(record: AnnotationRecord): boolean {
  return record.owner === '';
}

export function isQualityScore(value: unknown): value is QualityScore {
  return value === 0 || value === 1;
}
