const DIGITS = /^\d+$/;

function stripLeadingZeros(id: string): string {
  return id.replace(/^0+(?=\d)/, '');
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order over entity ids: all-digit ids first, compared numerically
 * (without converting, so long ids keep their precision), then every other id
 * in code-unit order.
 */
export function compareIds(a: string, b: string): number {
  const aNumeric = DIGITS.test(a);
  const bNumeric = DIGITS.test(b);
  if (aNumeric !== bNumeric) return aNumeric ? -1 : 1;
  if (!aNumeric) return compareCodeUnits(a, b);

  const aDigits = stripLeadingZeros(a);
  const bDigits = stripLeadingZeros(b);
  if (aDigits.length !== bDigits.length) return aDigits.length - bDigits.length;
  return compareCodeUnits(aDigits, bDigits) || compareCodeUnits(a, b);
}
