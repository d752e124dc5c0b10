import { describe, it, expect } from 'vitest';
import {
  displayValuesEqual,
  fieldValuesEqual,
  listItemsEqual,
  normalizeDisplayValue,
  parseMultiplier,
} from './dirty-check.utils';

describe('dirty check utils', () => {
  describe('normalizeDisplayValue', () => {
    it('should treat missing values as empty', () => {
      expect(normalizeDisplayValue(null)).toBe('');
      expect(normalizeDisplayValue(undefined)).toBe('');
    });

    it('should trim strings and stringify other values', () => {
      expect(normalizeDisplayValue('  wood ')).toBe('wood');
      expect(normalizeDisplayValue(3)).toBe('3');
      expect(normalizeDisplayValue([1, 2])).toBe('[1,2]');
    });
  });

  describe('displayValuesEqual', () => {
    it('should ignore surrounding whitespace', () => {
      expect(displayValuesEqual(' wood ', 'wood')).toBe(true);
    });

    it('should treat null and empty string as equal', () => {
      expect(displayValuesEqual(null, '')).toBe(true);
      expect(displayValuesEqual(undefined, '   ')).toBe(true);
    });

    it('should ignore whitespace inside dimension lists', () => {
      expect(displayValuesEqual('1*2*3', '1 * 2 * 3')).toBe(true);
      expect(displayValuesEqual('0.5×1', '0.5 × 1')).toBe(true);
    });

    it('should detect a real change in a dimension list', () => {
      expect(displayValuesEqual('1*2*3', '1*2*4')).toBe(false);
    });

    it('should not collapse whitespace in ordinary text', () => {
      expect(displayValuesEqual('dark wood', 'darkwood')).toBe(false);
    });

    it('should compare multi-select values as sets', () => {
      expect(displayValuesEqual(['wood', 'metal'], ['metal', 'wood'])).toBe(true);
      expect(displayValuesEqual(['wood'], ['wood', 'metal'])).toBe(false);
      expect(displayValuesEqual('wood', ['wood'])).toBe(true);
    });
  });

  describe('listItemsEqual', () => {
    it('should compare items in order', () => {
      expect(listItemsEqual(['open lid', 'remove tray'], [' open lid', 'remove tray '])).toBe(true);
      expect(listItemsEqual(['open lid', 'remove tray'], ['remove tray', 'open lid'])).toBe(false);
    });

    it('should count repeated items', () => {
      expect(listItemsEqual(['oak', 'oak', 'chair'], ['oak', 'chair'])).toBe(false);
    });

    it('should treat a single value as a one-item list and empty as none', () => {
      expect(listItemsEqual('oak', ['oak'])).toBe(true);
      expect(listItemsEqual('', [])).toBe(true);
    });
  });

  describe('fieldValuesEqual', () => {
    it('should ignore object key order', () => {
      expect(fieldValuesEqual({ parts: 1, colour: 'red' }, { colour: 'red', parts: 1 })).toBe(true);
    });

    it('should compare nested values', () => {
      expect(fieldValuesEqual({ parts: [1, 2] }, { parts: [1, 2] })).toBe(true);
      expect(fieldValuesEqual({ parts: [1, 2] }, { parts: [2, 1] })).toBe(false);
      expect(fieldValuesEqual({ parts: 1 }, { parts: 1, extra: null })).toBe(false);
      expect(fieldValuesEqual([], {})).toBe(false);
    });
  });

  describe('parseMultiplier', () => {
    it('should default to 1 for empty or invalid input', () => {
      expect(parseMultiplier('')).toBe(1);
      expect(parseMultiplier('abc')).toBe(1);
      expect(parseMultiplier(null)).toBe(1);
    });

    it('should read numbers and numeric strings', () => {
      expect(parseMultiplier('2.5')).toBe(2.5);
      expect(parseMultiplier(3)).toBe(3);
    });
  });
});
