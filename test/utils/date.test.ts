import { describe, it, expect } from 'vitest';
import { isBlank, parseAmount, parseDate, toIsoDate } from '../../src/utils/date.js';

describe('parseDate', () => {
  it.each([
    ['2024-01-15', '2024-01-15'],
    ['01/15/2024', '2024-01-15'],
    ['1/5/2024', '2024-01-05'],
    ['Jan 15, 2024', '2024-01-15'],
    ['January 15, 2024', '2024-01-15'],
    ['Sept 3, 2024', '2024-09-03'],
    ['  Dec 31,  2023 ', '2023-12-31'],
  ])('should parse %s', (raw, expected) => {
    expect(parseDate(raw)).toBe(expected);
  });

  it.each(['', 'N/A', '2024-02-30', '13/01/2024', 'Foo 1, 2024', '15.01.2024'])(
    'should reject %s',
    (raw) => {
      expect(parseDate(raw)).toBeNull();
    },
  );

  it('should accept Feb 29 only in leap years', () => {
    expect(toIsoDate(2024, 2, 29)).toBe('2024-02-29');
    expect(toIsoDate(2023, 2, 29)).toBeNull();
  });
});

describe('parseAmount', () => {
  it.each([
    ['$0.25', 0.25],
    ['0.2500', 0.25],
    ['$ 0.4512', 0.4512],
    ['$1,234.5', 1234.5],
    ['.75', 0.75],
    ['-$0.10', -0.1],
  ])('should parse %s', (raw, expected) => {
    expect(parseAmount(raw)).toBe(expected);
  });

  it('should return null when no number is present', () => {
    expect(parseAmount('')).toBeNull();
    expect(parseAmount('TBD')).toBeNull();
    expect(parseAmount('$')).toBeNull();
  });

  it.each(['Jan 18, 2024', '2 payments', '01/18/2024', '$0.25 est.', '1,23.4'])(
    'should reject %s, which is not a bare amount',
    (raw) => {
      expect(parseAmount(raw)).toBeNull();
    },
  );
});

describe('isBlank', () => {
  it('should treat placeholders as blank', () => {
    for (const raw of ['', '  ', 'N/A', 'n/a', '--', '-', null, undefined]) {
      expect(isBlank(raw)).toBe(true);
    }
  });

  it('should not treat dates as blank', () => {
    expect(isBlank('01/18/2024')).toBe(false);
  });
});
