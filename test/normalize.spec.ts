import { describe, it, expect } from 'vitest';
import { parseCsv, parseOptionalDatetime, parseOptionalLimit, parseWhereConstraint } from '../src/command/normalize.js';
import { InvalidArgumentError } from '../src/errors.js';

describe('parseCsv', () => {
  it('keeps an omitted flag as null', () => {
    expect(parseCsv(null)).toBeNull();
    expect(parseCsv(undefined)).toBeNull();
  });

  it('turns an empty string into an empty list', () => {
    expect(parseCsv('')).toEqual([]);
  });

  it('trims items and drops blanks, keeping order and duplicates', () => {
    expect(parseCsv('a, b ,,c')).toEqual(['a', 'b', 'c']);
    expect(parseCsv('b,a,b')).toEqual(['b', 'a', 'b']);
    expect(parseCsv(' , ')).toEqual([]);
  });

  it('leaves a descending prefix alone', () => {
    expect(parseCsv('-bookings, metric_time')).toEqual(['-bookings', 'metric_time']);
  });
});

describe('parseOptionalDatetime', () => {
  it('keeps an omitted value as null', () => {
    expect(parseOptionalDatetime(null)).toBeNull();
    expect(parseOptionalDatetime(undefined)).toBeNull();
  });

  it.each([
    ['2024-01-31', '2024-01-31T00:00:00.000Z'],
    ['2024-01-31T12:30', '2024-01-31T12:30:00.000Z'],
    ['2024-01-31T12:30:15', '2024-01-31T12:30:15.000Z'],
    ['2024-01-31 12:30:15.250', '2024-01-31T12:30:15.250Z'],
    ['2024/01/31', '2024-01-31T00:00:00.000Z'],
    ['20240131', '2024-01-31T00:00:00.000Z'],
    ['01/31/2024', '2024-01-31T00:00:00.000Z'],
    ['2024-01-31T12:00:00Z', '2024-01-31T12:00:00.000Z'],
    ['2024-01-31T12:00:00+02:00', '2024-01-31T10:00:00.000Z'],
    ['2024-01-31T00:00:00.000000', '2024-01-31T00:00:00.000Z'],
    ['2024-01-31T12:30:15.123456', '2024-01-31T12:30:15.123Z'],
    ['2024-01-31 12:30:15.5', '2024-01-31T12:30:15.500Z'],
    ['2024-01-31T12', '2024-01-31T12:00:00.000Z'],
    ['2024-1-5', '2024-01-05T00:00:00.000Z'],
    ['2024-1-5 7:05', '2024-01-05T07:05:00.000Z'],
    ['2024-01-31T12:00:00.250000+00:00', '2024-01-31T12:00:00.250Z'],
  ])('parses %s', (input, iso) => {
    expect(parseOptionalDatetime(input)?.toISOString()).toBe(iso);
  });

  it('rejects text that is not a date', () => {
    expect(() => parseOptionalDatetime('next tuesday', 'start-time')).toThrow(
      "Unable to parse timestamp 'next tuesday' for --start-time.",
    );
  });

  it('rejects impossible dates', () => {
    expect(() => parseOptionalDatetime('2024-02-30')).toThrow(InvalidArgumentError);
  });
});

describe('parseWhereConstraint', () => {
  it('wraps a predicate in a one-element list', () => {
    expect(parseWhereConstraint('x > 1')).toEqual(['x > 1']);
  });

  it('treats an omitted or empty predicate as no predicate', () => {
    expect(parseWhereConstraint(undefined)).toBeNull();
    expect(parseWhereConstraint(null)).toBeNull();
    expect(parseWhereConstraint('')).toBeNull();
    expect(parseWhereConstraint('  \t ')).toBeNull();
  });
});

describe('parseOptionalLimit', () => {
  it('passes non-negative integers through', () => {
    expect(parseOptionalLimit(10)).toBe(10);
    expect(parseOptionalLimit('0')).toBe(0);
    expect(parseOptionalLimit(undefined)).toBeNull();
  });

  it.each([[-1], [1.5], [Number.NaN], ['ten']])('rejects %s', (value) => {
    expect(() => parseOptionalLimit(value)).toThrow(InvalidArgumentError);
  });
});
