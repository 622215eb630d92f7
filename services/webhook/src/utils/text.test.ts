import { describe, it, expect } from 'vitest';
import { formatPercent, toFixed2, truncateChars } from './text';

describe('toFixed2', () => {
  it('rounds exact ties to even', () => {
    expect(toFixed2(0.125)).toBe('0.12');
    expect(toFixed2(0.375)).toBe('0.38');
    expect(toFixed2(-0.125)).toBe('-0.12');
    expect(toFixed2(0.625)).toBe('0.62');
  });

  it('matches toFixed away from ties', () => {
    expect(toFixed2(0.85)).toBe('0.85');
    expect(toFixed2(-0.7)).toBe('-0.70');
    expect(toFixed2(0.5)).toBe('0.50');
    expect(toFixed2(1 / 3)).toBe('0.33');
  });

  it('keeps the sign of negative zero', () => {
    expect(toFixed2(-0)).toBe('-0.00');
    expect(toFixed2(0)).toBe('0.00');
  });
});

describe('formatPercent', () => {
  it('prints integers with one decimal and keeps fractional values', () => {
    expect(formatPercent(59)).toBe('59.0');
    expect(formatPercent(12.5)).toBe('12.5');
  });
});

describe('truncateChars', () => {
  it('counts code points', () => {
    expect(truncateChars('ab🚀cd', 3)).toBe('ab🚀');
    expect(truncateChars('short', 10)).toBe('short');
  });
});
