import { DataConversionError } from '../errors';

// numeric(12,2): at most two decimal places.
const DECIMAL_PATTERN = /^(-?)(\d+)(?:\.(\d{1,2}))?$/;

/** Converts on the digits, never through a binary float. */
export function toCents(value: string | null, entity: string, field: string): number | null {
  if (value === null) {
    return null;
  }

  const match = DECIMAL_PATTERN.exec(value.trim());
  if (!match) {
    throw new DataConversionError(entity, field, value);
  }

  const [, sign, units, fraction = ''] = match;
  const cents = Number(units) * 100 + Number(fraction.padEnd(2, '0'));
  return sign === '-' ? -cents : cents;
}

export function centsToDecimal(cents: number): string {
  return (cents / 100).toFixed(2);
}

/** SQL SUM semantics: absent values are skipped, and an all-absent sum stays absent. */
export function addNullable(total: number | null, value: number | null): number | null {
  if (value === null) {
    return total;
  }
  return (total ?? 0) + value;
}
