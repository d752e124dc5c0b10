import {
  deriveQualityScore,
  isEditableField,
  isListTransform,
  type AnnotationRecord,
  type FieldDescriptor,
  type FieldValue,
  type QualityScore,
} from '../models';
import {
  displayValuesEqual,
  fieldValuesEqual,
  listItemsEqual,
  parseMultiplier,
} from '../../shared/utils/dirty-check.utils';
import { applyLoadTransform, applySaveTransform } from '../../shared/utils/field-transform.utils';
import { scaleDimensions } from '../../shared/utils/scale.utils';

export interface SessionValues {
  fields: Record<string, FieldValue>;
  flags: Record<string, boolean>;
}

export interface SavePayload {
  fields: Record<string, FieldValue>;
  flags: Record<string, boolean>;
  score: QualityScore;
}

export interface ChangedValues {
  fields: string[];
  flags: string[];
}

/**
 * The record currently on screen: its persisted values (pristine, in display
 * form) and the annotator's in-progress values (working).
 * Owned by one interaction; never shared.
 */
export class EditSession {
  private working: SessionValues;

  private constructor(
    readonly recordId: string,
    private readonly descriptors: readonly FieldDescriptor[],
    private readonly pristine: SessionValues
  ) {
    this.working = structuredClone(pristine);
  }

  static snapshot(record: Readonly<AnnotationRecord>, descriptors: readonly FieldDescriptor[]): EditSession {
    const pristine: SessionValues = { fields: {}, flags: {} };
    for (const field of descriptors) {
      pristine.fields[field.name] = applyLoadTransform(field.displayTransform, record.fields[field.name]);
      if (field.hasReviewFlag) {
        pristine.flags[field.name] = record.flags[field.name] === true;
      }
    }
    return new EditSession(record.id, descriptors, pristine);
  }

  get pristineValues(): SessionValues {
    return structuredClone(this.pristine);
  }

  get workingValues(): SessionValues {
    return structuredClone(this.working);
  }

  setField(name: string, value: FieldValue): void {
    const field = this.editableField(name);
    this.working.fields[field.name] = value;
  }

  setFlag(name: string, flagged: boolean): void {
    const field = this.editableField(name);
    if (!field.hasReviewFlag) {
      throw new Error(`Field "${name}" has no review flag`);
    }
    this.working.flags[field.name] = flagged;
  }

  /** Back to the persisted values. */
  reset(): void {
    this.working = structuredClone(this.pristine);
  }

  isDirty(working: SessionValues = this.working): boolean {
    for (const field of this.descriptors) {
      if (!isEditableField(field)) continue;
      if (!this.sameField(field, working.fields[field.name])) return true;
      if (field.hasReviewFlag && !this.sameFlag(field, working.flags[field.name])) return true;
    }
    return false;
  }

  changedFields(working: SessionValues = this.working): ChangedValues {
    const changed: ChangedValues = { fields: [], flags: [] };
    for (const field of this.descriptors) {
      if (!isEditableField(field)) continue;
      if (!this.sameField(field, working.fields[field.name])) {
        changed.fields.push(field.name);
      }
      if (field.hasReviewFlag && !this.sameFlag(field, working.flags[field.name])) {
        changed.flags.push(field.name);
      }
    }
    return changed;
  }

  /**
   * What the annotator sees for `name`. A field that some multiplier field
   * scales is shown as base × multiplier; the working value stays the base.
   */
  displayValue(name: string): FieldValue {
    const value = this.working.fields[name] ?? '';
    const scale = this.descriptors.find(field => field.scaleOf === name);
    if (!scale || typeof value !== 'string') {
      return value;
    }
    return scaleDimensions(value, parseMultiplier(this.working.fields[scale.name]));
  }

  /**
   * Working values in stored form. System-computed and read-only fields are
   * left out; the score follows the flags.
   */
  toSavePayload(): SavePayload {
    const payload: SavePayload = { fields: {}, flags: {}, score: 1 };
    for (const field of this.descriptors) {
      if (!isEditableField(field)) continue;
      const value = this.working.fields[field.name];
      payload.fields[field.name] =
        field.scaleOf !== undefined ? parseMultiplier(value) : applySaveTransform(field.displayTransform, value);
      if (field.hasReviewFlag) {
        payload.flags[field.name] = this.working.flags[field.name] === true;
      }
    }
    payload.score = deriveQualityScore(payload.flags);
    return payload;
  }

  private sameField(field: FieldDescriptor, value: FieldValue | undefined): boolean {
    const pristine = this.pristine.fields[field.name];
    if (field.scaleOf !== undefined) {
      return parseMultiplier(pristine) === parseMultiplier(value);
    }
    if (isListTransform(field.displayTransform)) {
      // Order and repeats are part of the stored list.
      return listItemsEqual(
        applySaveTransform(field.displayTransform, pristine),
        applySaveTransform(field.displayTransform, value)
      );
    }
    if (
      field.displayTransform === 'json' &&
      fieldValuesEqual(applySaveTransform('json', pristine), applySaveTransform('json', value))
    ) {
      return true;
    }
    return displayValuesEqual(pristine, value);
  }

  private sameFlag(field: FieldDescriptor, flagged: boolean | undefined): boolean {
    return (this.pristine.flags[field.name] === true) === (flagged === true);
  }

  private editableField(name: string): FieldDescriptor {
    const field = this.descriptors.find(descriptor => descriptor.name === name);
    if (!field) {
      throw new Error(`Unknown field "${name}"`);
    }
    if (!isEditableField(field)) {
      throw new Error(`Field "${name}" is not editable`);
    }
    return field;
  }
}
