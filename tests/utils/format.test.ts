import { describe, it, expect } from 'vitest';
import { formatProbability } from '../../src/utils/format';

describe('formatProbability', () => {
  it('prints one decimal place', () => {
    expect(formatProbability(0.1234)).toBe('12.3%');
    expect(formatProbability(1)).toBe('100.0%');
    expect(formatProbability(0)).toBe('0.0%');
  });
});
