import { computeNextRun } from '../schedule';

describe('computeNextRun', () => {
  test('weekly adds seven days across a year boundary', () => {
    expect(computeNextRun('2026-12-28', 'weekly')).toBe('2027-01-04');
  });

  test('monthly clamps to the end of a short month', () => {
    expect(computeNextRun('2026-01-31', 'monthly')).toBe('2026-02-28');
    expect(computeNextRun('2026-03-31', 'monthly')).toBe('2026-04-30');
  });

  test('monthly lands on Feb 29 in a leap year', () => {
    expect(computeNextRun('2028-01-31', 'monthly')).toBe('2028-02-29');
  });

  test('monthly keeps ordinary days', () => {
    expect(computeNextRun('2026-02-15', 'monthly')).toBe('2026-03-15');
  });

  test('quarterly adds three calendar months', () => {
    expect(computeNextRun('2026-11-30', 'quarterly')).toBe('2027-02-28');
    expect(computeNextRun('2026-01-15', 'quarterly')).toBe('2026-04-15');
  });

  test('yearly from Feb 29 clamps to Feb 28', () => {
    expect(computeNextRun('2028-02-29', 'yearly')).toBe('2029-02-28');
    expect(computeNextRun('2026-06-30', 'yearly')).toBe('2027-06-30');
  });

  test('rejects malformed dates', () => {
    expect(() => computeNextRun('2026-02-30', 'monthly')).toThrow(RangeError);
    expect(() => computeNextRun('15/03/2026', 'weekly')).toThrow(RangeError);
  });
});
