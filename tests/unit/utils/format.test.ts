import { describe, it, expect } from 'vitest';
import { fitColumn, formatBytes, formatTimestamp } from '../../../src/utils/format.js';

describe('formatBytes', () => {
  it('should keep small sizes in bytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
  });

  it('should scale to larger units', () => {
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(2 * 1024 * 1024)).toBe('2.0 MB');
  });
});

describe('formatTimestamp', () => {
  it('should render UTC minutes', () => {
    expect(formatTimestamp(Date.UTC(2026, 0, 2, 3, 4, 5))).toBe('2026-01-02 03:04');
  });
});

describe('fitColumn', () => {
  it('should pad short text and cut long text', () => {
    expect(fitColumn('abc', 5)).toBe('abc  ');
    expect(fitColumn('abcdefgh', 5)).toBe('abcd…');
  });
});
