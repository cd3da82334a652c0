import type { MovementRecord } from '../entities/movement-record.js';
import type { FuelRecord } from '../entities/fuel-record.js';
import type { DataIssueType } from '../entities/metrics.js';

export type MovementCheck =
  | { readonly status: 'closed' }
  | { readonly status: 'open' }
  | { readonly status: 'malformed'; readonly issue: DataIssueType };

export function checkMovement(movement: MovementRecord): MovementCheck {
  if (!Number.isFinite(movement.distanceKm)) return { status: 'malformed', issue: 'invalid_distance' };
  if (movement.distanceKm < 0) return { status: 'malformed', issue: 'negative_distance' };
  if (movement.endedAt === null) return { status: 'open' };

  const endMs = movement.endedAt.getTime();
  if (Number.isNaN(endMs)) return { status: 'malformed', issue: 'invalid_end_timestamp' };
  if (endMs < movement.startedAt.getTime()) return { status: 'malformed', issue: 'end_before_start' };
  return { status: 'closed' };
}

/** Returns the first problem found, or null for a usable fill. */
export function checkFuelRecord(record: FuelRecord): DataIssueType | null {
  if (!Number.isFinite(record.liters) || record.liters <= 0) return 'non_positive_liters';
  if (!Number.isFinite(record.cost) || record.cost < 0) return 'invalid_cost';
  return null;
}
