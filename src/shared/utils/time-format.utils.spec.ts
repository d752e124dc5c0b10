import { describe, it, expect } from 'vitest';
import { formatFileTimestamp } from './time-format.utils';

describe('time format utils', () => {
  it('should format a local date as YYYYMMDD_HHMMSS', () => {
    expect(formatFileTimestamp(new Date(2024, 0, 15, 14, 30, 45))).toBe('20240115_143045');
    expect(formatFileTimestamp(new Date(2024, 10, 3, 4, 5, 6))).toBe('20241103_040506');
  });
});
