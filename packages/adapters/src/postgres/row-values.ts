// pg hands NUMERIC and BIGINT columns back as strings; these coerce row values
// into the shapes the domain expects.

export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value == null) return '';
  return String(value);
}

export function toNullableText(value: unknown): string | null {
  return value == null ? null : toText(value);
}

/** NaN for missing or unparsable values, so the engine can flag the record. */
export function toNumber(value: unknown): number {
  if (value == null || value === '') return Number.NaN;
  return typeof value === 'number' ? value : Number(value);
}

export function toNullableNumber(value: unknown): number | null {
  return value == null ? null : toNumber(value);
}

export function toDate(value: unknown): Date {
  if (value instanceof Date) return value;
  if (typeof value === 'string' || typeof value === 'number') return new Date(value);
  return new Date(Number.NaN);
}

export function toNullableDate(value: unknown): Date | null {
  return value == null ? null : toDate(value);
}

export function toBoolean(value: unknown): boolean {
  return value === true || value === 't' || value === 'true' || value === 1;
}
