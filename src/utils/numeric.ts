export function toNumeric(value: string | number | null): number | null {
  if (value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export function toNumericOrZero(value: string | number | null): number {
  const result = toNumeric(value);
  return result ?? 0;
}

/** Rounds to the three decimals a `numeric(14,3)` column keeps. */
export function roundQuantity(value: number): number {
  return Number(value.toFixed(3));
}

/**
 * Reads a spreadsheet cell as a number. Strings may carry thousands
 * separators ("1,250"); anything else that is not a finite number is null.
 */
export function cellNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') return toNumeric(value.replace(/,/g, ''));
  return null;
}

export function cellText(value: unknown): string | null {
  if (value == null) return null;
  if (value instanceof Date) return value.toISOString().split('T')[0];
  const str = typeof value === 'number' ? renderNumber(value) : String(value);
  const trimmed = str.trim();
  return trimmed.length ? trimmed : null;
}

function renderNumber(value: number): string {
  if (Number.isInteger(value)) return BigInt(value).toString();
  return String(value);
}
