import { describe, it, expect } from 'vitest';
import {
  parsePrice, parseNumber, parseCoordinate, parseCount, parseText,
  round2, mean, uniqueSorted, sameMembers, seededRandom, drawUniform, formatThousands,
} from '../services/helpers.ts';

describe('field parsers', () => {
  it('parsePrice strips separators', () => {
    expect(parsePrice('1,250,000')).toBe(1250000);
    expect(parsePrice(' 749 000 ')).toBe(749000);
    expect(parsePrice('500000')).toBe(500000);
  });

  it('parsePrice rejects blank, text and negatives', () => {
    expect(parsePrice('')).toBeNull();
    expect(parsePrice('call for price')).toBeNull();
    expect(parsePrice('-5')).toBeNull();
    expect(parsePrice(undefined)).toBeNull();
  });

  it('parseNumber treats NA as missing', () => {
    expect(parseNumber('NA')).toBeNull();
    expect(parseNumber('  ')).toBeNull();
    expect(parseNumber(' 43.5 ')).toBe(43.5);
  });

  it('parseCoordinate enforces the degree limit', () => {
    expect(parseCoordinate('91', 90)).toBeNull();
    expect(parseCoordinate('-123.1', 180)).toBe(-123.1);
    expect(parseCoordinate('-123.1', 90)).toBeNull();
  });

  it('parseCount accepts only non-negative integers', () => {
    expect(parseCount('3')).toBe(3);
    expect(parseCount('0')).toBe(0);
    expect(parseCount('2.5')).toBeNull();
    expect(parseCount('-1')).toBeNull();
  });

  it('parseText trims and drops empty values', () => {
    expect(parseText('  Montréal ')).toBe('Montréal');
    expect(parseText('   ')).toBeNull();
    expect(parseText(undefined)).toBeNull();
  });
});

describe('numeric helpers', () => {
  it('round2 keeps two decimals', () => {
    expect(round2(1 / 3)).toBe(0.33);
    expect(round2(850000)).toBe(850000);
  });

  it('mean of empty input is 0', () => {
    expect(mean([])).toBe(0);
    expect(mean([1, 2, 3])).toBe(2);
  });

  it('formatThousands groups digits', () => {
    expect(formatThousands(749000)).toBe('749,000');
    expect(formatThousands(1200000)).toBe('1,200,000');
  });
});

describe('set helpers', () => {
  it('uniqueSorted dedupes and orders', () => {
    expect(uniqueSorted(['Toronto', 'Halifax', 'Toronto'])).toEqual(['Halifax', 'Toronto']);
  });

  it('sameMembers ignores order and duplicates', () => {
    expect(sameMembers(['a', 'b'], ['b', 'a', 'a'])).toBe(true);
    expect(sameMembers(['a'], ['a', 'b'])).toBe(false);
    expect(sameMembers([], [])).toBe(true);
  });
});

describe('seededRandom', () => {
  it('replays the same sequence for the same seed', () => {
    const a = seededRandom(42);
    const b = seededRandom(42);
    const seqA = Array.from({ length: 5 }, () => a());
    const seqB = Array.from({ length: 5 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it('stays within [0, 1)', () => {
    const rng = seededRandom(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('differs between seeds', () => {
    expect(seededRandom(1)()).not.toBe(seededRandom(2)());
  });

  it('drawUniform maps the unit interval onto [min, max]', () => {
    expect(drawUniform(() => 0, 40000, 120000)).toBe(40000);
    expect(drawUniform(() => 0.5, 40000, 120000)).toBe(80000);
    expect(drawUniform(() => 0.99999, 40000, 120000)).toBe(119999);
  });
});
