import type { MovementRecord } from '../entities/movement-record.js';
import type { FuelRecord } from '../entities/fuel-record.js';
import type { EntityKind, Period } from '../entities/period.js';
import type { DataIssue, EntityUsage, MetricsSummary, PurposeUsage } from '../entities/metrics.js';
import { isWithin } from './period.js';
import { checkFuelRecord, checkMovement } from './record-checks.js';
import { compareIds } from './ordering.js';

export const USAGE_LIMIT = 5;

export interface EntityRef {
  readonly kind: EntityKind;
  readonly id: string;
}

export interface PeriodAggregate extends MetricsSummary {
  /** Vehicles used by a driver, or drivers of a vehicle */
  readonly counterpartUsage: EntityUsage[];
}

/** Distances, volumes and amounts are summed as integer hundredths. */
const SCALE = 100;

function toHundredths(value: number): number {
  return Math.round(value * SCALE);
}

interface Tally {
  tripCount: number;
  /** hundredths of a km */
  totalKm: number;
}

function bump<K>(tallies: Map<K, Tally>, key: K, km: number): void {
  const tally = tallies.get(key);
  if (tally) {
    tally.tripCount += 1;
    tally.totalKm += km;
  } else {
    tallies.set(key, { tripCount: 1, totalKm: km });
  }
}

function byUsage(a: Tally, b: Tally): number {
  return b.tripCount - a.tripCount || b.totalKm - a.totalKm;
}

export function movementBelongsTo(movement: MovementRecord, entity: EntityRef): boolean {
  return entity.kind === 'driver' ? movement.driverId === entity.id : movement.vehicleId === entity.id;
}

export function fuelBelongsTo(record: FuelRecord, entity: EntityRef): boolean {
  return entity.kind === 'driver' ? record.driverId === entity.id : record.vehicleId === entity.id;
}

function ratio(numerator: number, denominator: number): number | null {
  return denominator === 0 ? null : numerator / denominator;
}

/**
 * Fold the records of one entity inside `period` into a summary. Records of
 * other entities or outside the window are ignored, so callers may pass a
 * broader slice than they need.
 */
export function aggregatePeriod(
  movements: readonly MovementRecord[],
  fuelRecords: readonly FuelRecord[],
  period: Period,
  entity: EntityRef,
): PeriodAggregate {
  const dataIssues: DataIssue[] = [];
  const purposes = new Map<string | null, Tally>();
  const counterparts = new Map<string, Tally>();
  let kmHundredths = 0;
  let tripCount = 0;
  let openMovements = 0;

  for (const movement of movements) {
    if (!movementBelongsTo(movement, entity) || !isWithin(movement.startedAt, period)) continue;

    const check = checkMovement(movement);
    if (check.status === 'open') {
      openMovements += 1;
      continue;
    }
    if (check.status === 'malformed') {
      dataIssues.push({ recordKind: 'movement', recordId: movement.id, issue: check.issue });
      continue;
    }

    const km = toHundredths(movement.distanceKm);
    kmHundredths += km;
    tripCount += 1;
    bump(purposes, movement.purposeId, km);
    bump(counterparts, entity.kind === 'driver' ? movement.vehicleId : movement.driverId, km);
  }

  let litersHundredths = 0;
  let costHundredths = 0;
  let fuelFillCount = 0;
  for (const record of fuelRecords) {
    if (!fuelBelongsTo(record, entity) || !isWithin(record.ts, period)) continue;

    const issue = checkFuelRecord(record);
    if (issue) {
      dataIssues.push({ recordKind: 'fuel', recordId: record.id, issue });
      continue;
    }
    litersHundredths += toHundredths(record.liters);
    costHundredths += toHundredths(record.cost);
    fuelFillCount += 1;
  }

  const purposeBreakdown: PurposeUsage[] = [...purposes.entries()]
    .sort(([aId, a], [bId, b]) => {
      const usage = byUsage(a, b);
      if (usage !== 0) return usage;
      if (aId === null || bId === null) return aId === bId ? 0 : aId === null ? 1 : -1;
      return compareIds(aId, bId);
    })
    .map(([purposeId, tally]) => ({ purposeId, tripCount: tally.tripCount, totalKm: tally.totalKm / SCALE }));

  const counterpartUsage: EntityUsage[] = [...counterparts.entries()]
    .sort(([aId, a], [bId, b]) => byUsage(a, b) || compareIds(aId, bId))
    .slice(0, USAGE_LIMIT)
    .map(([entityId, tally]) => ({ entityId, tripCount: tally.tripCount, totalKm: tally.totalKm / SCALE }));

  return {
    period: { start: new Date(period.start.getTime()), end: new Date(period.end.getTime()) },
    totalKm: kmHundredths / SCALE,
    totalLiters: litersHundredths / SCALE,
    totalCost: costHundredths / SCALE,
    tripCount,
    efficiencyLPer100Km: ratio(litersHundredths * 100, kmHundredths),
    avgTripDistanceKm: ratio(kmHundredths, tripCount * SCALE),
    kmPerLiter: ratio(kmHundredths, litersHundredths),
    costPerKm: ratio(costHundredths, kmHundredths),
    fuelFillCount,
    avgLitersPerFill: ratio(litersHundredths, fuelFillCount * SCALE),
    purposeBreakdown,
    openMovements,
    skippedRecords: dataIssues.length,
    dataIssues,
    counterpartUsage,
  };
}

/** Bucket records by the entity id `keyOf` attributes them to; null keys are dropped. */
export function groupByEntity<T>(
  records: readonly T[],
  keyOf: (record: T) => string | null,
): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const record of records) {
    const key = keyOf(record);
    if (key === null) continue;
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }
  return groups;
}
