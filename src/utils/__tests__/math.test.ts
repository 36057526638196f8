import { describe, expect, it } from 'vitest';
import { formatPercent, roundTo } from '../math.js';

describe('formatPercent', () => {
  it('rounds a fraction to a whole percentage', () => {
    expect(formatPercent(0.423)).toBe('42%');
    expect(formatPercent(0.96)).toBe('96%');
    expect(formatPercent(0)).toBe('0%');
  });
});

describe('roundTo', () => {
  it('rounds to the given number of digits', () => {
    expect(roundTo(3.14159, 1)).toBe(3.1);
    expect(roundTo(0.8751, 3)).toBe(0.875);
    expect(roundTo(12.5, 0)).toBe(13);
  });
});
