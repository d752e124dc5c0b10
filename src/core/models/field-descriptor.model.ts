/**
 * How a stored field value is turned into its editable form and back.
 */
export type DisplayTransformKind = 'identity' | 'join-with-comma' | 'join-with-newline' | 'json';

export const DISPLAY_TRANSFORM_KINDS: readonly DisplayTransformKind[] = [
  'identity',
  'join-with-comma',
  'join-with-newline',
  'json',
];

/**
 * Data-only description of one task field, resolved by the task configuration.
 */
export interface FieldDescriptor {
  name: string;
  displayTransform: DisplayTransformKind;
  /** Field carries a "needs review" flag (`chk_<name>` in the interchange format). */
  hasReviewFlag: boolean;
  /** Value is derived by the system; never compared for dirtiness, never saved. */
  isOwnerComputed?: boolean;
  /** Shown to the annotator but not editable. */
  readOnly?: boolean;
  /**
   * Marks a multiplier field. The named base field is displayed as
   * `base × multiplier`; the stored base value never changes.
   */
  scaleOf?: string;
}

export function isListTransform(kind: DisplayTransformKind): boolean {
  return kind === 'join-with-comma' || kind === 'join-with-newline';
}

/** Fields whose working value is compared and persisted. */
export function isEditableField(field: FieldDescriptor): boolean {
  return !field.isOwnerComputed && !field.readOnly;
}
