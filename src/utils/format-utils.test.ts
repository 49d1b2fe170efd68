import { describe, test, expect } from 'vitest';
import { formatBytes, formatSizeChange, formatCount } from './format-utils';

describe('formatBytes', () => {
  test('formats each unit', () => {
    expect(formatBytes(0)).toBe('0.0 B');
    expect(formatBytes(512)).toBe('512.0 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MB');
    expect(formatBytes(2 * 1024 ** 3)).toBe('2.0 GB');
  });
});

describe('formatSizeChange', () => {
  test('reports reductions with a minus sign', () => {
    expect(formatSizeChange(2000, 500)).toBe('-75.0%');
  });

  test('reports growth with a plus sign', () => {
    expect(formatSizeChange(1000, 1100)).toBe('+10.0%');
  });

  test('reports no change without a sign', () => {
    expect(formatSizeChange(1000, 1000)).toBe('0.0%');
  });

  test('handles an empty original', () => {
    expect(formatSizeChange(0, 100)).toBe('n/a');
  });
});

describe('formatCount', () => {
  test('pluralizes', () => {
    expect(formatCount(0, 'file')).toBe('0 files');
    expect(formatCount(1, 'file')).toBe('1 file');
    expect(formatCount(2, 'file')).toBe('2 files');
  });
});
