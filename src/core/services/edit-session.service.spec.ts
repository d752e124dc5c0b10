import { describe, it, expect } from 'vitest';
import type { AnnotationRecord, FieldDescriptor } from '../models';
import { EditSession } from './edit-session.service';

const FIELDS: FieldDescriptor[] = [
  { name: 'material', displayTransform: 'identity', hasReviewFlag: true },
  { name: 'dimensions', displayTransform: 'identity', hasReviewFlag: true },
  { name: 'scale', displayTransform: 'identity', hasReviewFlag: false, scaleOf: 'dimensions' },
  { name: 'tags', displayTransform: 'join-with-comma', hasReviewFlag: true },
  { name: 'notes', displayTransform: 'json', hasReviewFlag: false },
  { name: 'category', displayTransform: 'identity', hasReviewFlag: false, isOwnerComputed: true },
  { name: 'source', displayTransform: 'identity', hasReviewFlag: false, readOnly: true },
];

const createRecord = (overrides: Partial<AnnotationRecord> = {}): AnnotationRecord => ({
  id: 'r1',
  owner: 'alice',
  completed: false,
  qualityScore: 0,
  fields: {
    material: 'wood',
    dimensions: '1*2*3',
    scale: 2,
    tags: ['chair', 'oak'],
    notes: { parts: 1 },
    category: 'furniture',
    source: 'scan',
  },
  flags: { material: false, tags: true },
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

describe('EditSession', () => {
  describe('snapshot', () => {
    it('should hold display values for every field', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      expect(session.recordId).toBe('r1');
      expect(session.pristineValues).toEqual({
        fields: {
          material: 'wood',
          dimensions: '1*2*3',
          scale: 2,
          tags: 'chair, oak',
          notes: '{\n  "parts": 1\n}',
          category: 'furniture',
          source: 'scan',
        },
        flags: { material: false, dimensions: false, tags: true },
      });
      expect(session.workingValues).toEqual(session.pristineValues);
    });

    it('should not be dirty right after the snapshot', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      expect(session.isDirty()).toBe(false);
    });

    it('should show missing fields as empty and stay clean', () => {
      const session = EditSession.snapshot(createRecord({ fields: { material: 'wood' } }), FIELDS);

      expect(session.workingValues.fields['notes']).toBe('');
      expect(session.isDirty()).toBe(false);
    });
  });

  describe('isDirty', () => {
    it('should detect a changed value', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      session.setField('material', 'metal');

      expect(session.isDirty()).toBe(true);
      expect(session.changedFields()).toEqual({ fields: ['material'], flags: [] });
    });

    it('should ignore surrounding whitespace', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      session.setField('material', '  wood ');
      expect(session.isDirty()).toBe(false);
    });

    it('should ignore whitespace inside dimension lists but not a changed number', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      session.setField('dimensions', '1 * 2 * 3');
      expect(session.isDirty()).toBe(false);

      session.setField('dimensions', '1*2*4');
      expect(session.isDirty()).toBe(true);
    });

    it('should accept list edits that keep the same items in order', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      session.setField('tags', 'chair,oak');
      expect(session.isDirty()).toBe(false);

      session.setField('tags', ['chair', 'oak']);
      expect(session.isDirty()).toBe(false);

      session.setField('tags', 'oak');
      expect(session.isDirty()).toBe(true);
    });

    it('should treat reordered list items as a change', () => {
      const steps: FieldDescriptor[] = [{ name: 'steps', displayTransform: 'join-with-newline', hasReviewFlag: false }];
      const session = EditSession.snapshot(createRecord({ fields: { steps: ['open lid', 'remove tray'] } }), steps);

      session.setField('steps', 'remove tray\nopen lid');

      expect(session.isDirty()).toBe(true);
      expect(session.toSavePayload().fields['steps']).toEqual(['remove tray', 'open lid']);
    });

    it('should treat a dropped duplicate as a change', () => {
      const session = EditSession.snapshot(createRecord({ fields: { tags: ['oak', 'oak', 'chair'] } }), FIELDS);

      session.setField('tags', 'oak, chair');

      expect(session.isDirty()).toBe(true);
      expect(session.changedFields().fields).toEqual(['tags']);
    });

    it('should compare json fields by their parsed value', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      session.setField('notes', '{"parts":1}');
      expect(session.isDirty()).toBe(false);

      session.setField('notes', '{"parts": 2}');
      expect(session.isDirty()).toBe(true);

      session.setField('notes', 'not json');
      expect(session.isDirty()).toBe(true);
    });

    it('should compare multipliers as numbers', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      session.setField('scale', '2.0');
      expect(session.isDirty()).toBe(false);

      session.setField('scale', '2.5');
      expect(session.isDirty()).toBe(true);
    });

    it('should detect a toggled review flag', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      session.setFlag('material', true);

      expect(session.isDirty()).toBe(true);
      expect(session.changedFields()).toEqual({ fields: [], flags: ['material'] });
    });

    it('should check values passed in instead of its own', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      const edited = session.workingValues;
      edited.fields['material'] = 'metal';

      expect(session.isDirty(session.pristineValues)).toBe(false);
      expect(session.isDirty(edited)).toBe(true);
      expect(session.isDirty()).toBe(false);
    });

    it('should be clean again after reset', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      session.setField('material', 'metal');
      session.setFlag('tags', false);

      session.reset();

      expect(session.isDirty()).toBe(false);
    });
  });

  describe('editing rules', () => {
    it('should refuse to edit system-computed or read-only fields', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      expect(() => session.setField('category', 'toys')).toThrow('Field "category" is not editable');
      expect(() => session.setField('source', 'manual')).toThrow('Field "source" is not editable');
    });

    it('should refuse unknown fields and missing review flags', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      expect(() => session.setField('colour', 'red')).toThrow('Unknown field "colour"');
      expect(() => session.setFlag('notes', true)).toThrow('Field "notes" has no review flag');
    });
  });

  describe('displayValue', () => {
    it('should show a scaled field as base times multiplier', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      expect(session.displayValue('dimensions')).toBe('2.00 * 4.00 * 6.00');
      expect(session.workingValues.fields['dimensions']).toBe('1*2*3');
    });

    it('should follow the working multiplier without making the base dirty', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);

      session.setField('scale', '0.5');

      expect(session.displayValue('dimensions')).toBe('0.50 * 1.00 * 1.50');
      expect(session.changedFields()).toEqual({ fields: ['scale'], flags: [] });
    });

    it('should show other fields unchanged', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      expect(session.displayValue('material')).toBe('wood');
    });
  });

  describe('toSavePayload', () => {
    it('should convert working values to stored form and derive the score', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      session.setField('tags', 'oak, chair, ');
      session.setFlag('material', true);

      expect(session.toSavePayload()).toEqual({
        fields: {
          material: 'wood',
          dimensions: '1*2*3',
          scale: 2,
          tags: ['oak', 'chair'],
          notes: { parts: 1 },
        },
        flags: { material: true, dimensions: false, tags: true },
        score: 0,
      });
    });

    it('should score 1 when no flag is set', () => {
      const session = EditSession.snapshot(createRecord(), FIELDS);
      session.setFlag('tags', false);
      expect(session.toSavePayload().score).toBe(1);
    });
  });
});
