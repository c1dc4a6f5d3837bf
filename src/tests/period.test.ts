import { describe, expect, it } from 'vitest';
import { InvalidPeriodError } from '../errors.js';
import { parseOptionalPeriod, parsePeriod } from '../utils/period.js';

describe('period tokens', () => {
  it('accepts year-month tokens', () => {
    expect(parsePeriod('2025-06')).toBe('2025-06');
    expect(parsePeriod(' 2024-12 ')).toBe('2024-12');
  });

  it.each(['2025/06', '2025-6', '2025-13', '2025-00', '25-06', '2025-06-01', ''])('rejects "%s"', (token) => {
    expect(() => parsePeriod(token)).toThrow(InvalidPeriodError);
  });

  it('treats a missing or empty optional period as absent', () => {
    expect(parseOptionalPeriod(undefined)).toBeUndefined();
    expect(parseOptionalPeriod('  ')).toBeUndefined();
    expect(parseOptionalPeriod('2025-01')).toBe('2025-01');
  });
});
