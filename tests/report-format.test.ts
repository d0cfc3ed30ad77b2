import { describe, it, expect } from 'vitest';
import { formatTimestamp } from '../src/utils/report-format';

describe('formatTimestamp', () => {
  it('pads every part to two digits', () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe('2024-01-05 09:03:07');
  });

  it('keeps two-digit parts as they are', () => {
    expect(formatTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe('2023-12-31 23:59:58');
  });
});
