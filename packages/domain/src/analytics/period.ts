import type { Period } from '../entities/period.js';
import { InvalidWindowError } from './errors.js';

export const MIN_YEAR = 1970;
export const MAX_YEAR = 9999;

function isValidDate(value: Date): boolean {
  return !Number.isNaN(value.getTime());
}

/** Validate a [start, end) window. An empty window (start === end) is allowed. */
export function toPeriod(periodStart: Date, periodEnd: Date): Period {
  if (!isValidDate(periodStart) || !isValidDate(periodEnd)) {
    throw new InvalidWindowError('period bounds must be valid dates');
  }
  if (periodStart.getTime() > periodEnd.getTime()) {
    throw new InvalidWindowError(
      `period start ${periodStart.toISOString()} is after period end ${periodEnd.toISOString()}`,
    );
  }
  return { start: new Date(periodStart.getTime()), end: new Date(periodEnd.getTime()) };
}

export function isWithin(ts: Date, period: Period): boolean {
  const t = ts.getTime();
  return t >= period.start.getTime() && t < period.end.getTime();
}

export function assertYear(year: number): void {
  if (!Number.isInteger(year) || year < MIN_YEAR || year > MAX_YEAR) {
    throw new InvalidWindowError(`year must be an integer between ${MIN_YEAR} and ${MAX_YEAR}`);
  }
}

/** Calendar year in UTC. */
export function yearPeriod(year: number): Period {
  assertYear(year);
  return {
    start: new Date(Date.UTC(year, 0, 1)),
    end: new Date(Date.UTC(year + 1, 0, 1)),
  };
}

/** The twelve UTC calendar months of `year`, January first. */
export function monthPeriods(year: number): Period[] {
  assertYear(year);
  return Array.from({ length: 12 }, (_v, month) => ({
    start: new Date(Date.UTC(year, month, 1)),
    end: new Date(Date.UTC(year, month + 1, 1)),
  }));
}
