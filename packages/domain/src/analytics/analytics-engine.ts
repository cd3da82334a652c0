import type { FleetAnalyticsPort } from '../ports/inbound/fleet-analytics.port.js';
import type { RecordFilter, RecordStorePort } from '../ports/outbound/record-store.port.js';
import type { EntityKind, Period } from '../entities/period.js';
import type { MovementRecord } from '../entities/movement-record.js';
import type { FuelRecord } from '../entities/fuel-record.js';
import type {
  DriverMetricsResult,
  DriverRankingEntry,
  MonthlySummary,
  RankingEntry,
  RankingMetric,
  VehicleMetricsResult,
  VehicleRankingEntry,
} from '../entities/metrics.js';
import { aggregatePeriod, groupByEntity, type PeriodAggregate } from './aggregate.js';
import { isWithin, monthPeriods, toPeriod, yearPeriod } from './period.js';
import { rankSummaries } from './ranking.js';
import { compareIds } from './ordering.js';

const NO_RECORDS: readonly never[] = [];

function toDriverResult(driverId: string, aggregate: PeriodAggregate): DriverMetricsResult {
  const { counterpartUsage, ...summary } = aggregate;
  const metrics = { driverId, ...summary, vehicleUsage: counterpartUsage };
  return aggregate.tripCount > 0
    ? { outcome: 'metrics', ...metrics }
    : { outcome: 'empty_period', ...metrics };
}

function toVehicleResult(vehicleId: string, aggregate: PeriodAggregate): VehicleMetricsResult {
  const { counterpartUsage, ...summary } = aggregate;
  const metrics = { vehicleId, ...summary, driverUsage: counterpartUsage };
  return aggregate.tripCount > 0
    ? { outcome: 'metrics', ...metrics }
    : { outcome: 'empty_period', ...metrics };
}

function entityFilter(kind: EntityKind, entityId: string, period: Period): RecordFilter {
  return kind === 'driver'
    ? { driverId: entityId, from: period.start, to: period.end }
    : { vehicleId: entityId, from: period.start, to: period.end };
}

/**
 * Computes driver and vehicle metrics from the records of an injected store.
 * Holds no state besides the store; every call reads, folds and returns.
 */
export class AnalyticsEngine implements FleetAnalyticsPort {
  constructor(private readonly store: RecordStorePort) {}

  async computeDriverMetrics(driverId: string, periodStart: Date, periodEnd: Date): Promise<DriverMetricsResult> {
    const period = toPeriod(periodStart, periodEnd);
    const { movements, fuelRecords } = await this.readRecords(entityFilter('driver', driverId, period));
    return toDriverResult(driverId, aggregatePeriod(movements, fuelRecords, period, { kind: 'driver', id: driverId }));
  }

  async computeVehicleMetrics(vehicleId: string, periodStart: Date, periodEnd: Date): Promise<VehicleMetricsResult> {
    const period = toPeriod(periodStart, periodEnd);
    const { movements, fuelRecords } = await this.readRecords(entityFilter('vehicle', vehicleId, period));
    return toVehicleResult(
      vehicleId,
      aggregatePeriod(movements, fuelRecords, period, { kind: 'vehicle', id: vehicleId }),
    );
  }

  async rankDrivers(periodStart: Date, periodEnd: Date, metric: RankingMetric): Promise<DriverRankingEntry[]> {
    const ranking = await this.rankEntities('driver', toPeriod(periodStart, periodEnd), metric);
    return ranking.map(({ position, entityId, value, insufficientData }) => ({
      position,
      driverId: entityId,
      value,
      insufficientData,
    }));
  }

  async rankVehicles(periodStart: Date, periodEnd: Date, metric: RankingMetric): Promise<VehicleRankingEntry[]> {
    const ranking = await this.rankEntities('vehicle', toPeriod(periodStart, periodEnd), metric);
    return ranking.map(({ position, entityId, value, insufficientData }) => ({
      position,
      vehicleId: entityId,
      value,
      insufficientData,
    }));
  }

  async monthlyBreakdown(entityId: string, entityKind: EntityKind, year: number): Promise<MonthlySummary[]> {
    const months = monthPeriods(year);
    const { movements, fuelRecords } = await this.readRecords(entityFilter(entityKind, entityId, yearPeriod(year)));

    return months.map((period, idx) => {
      const { counterpartUsage: _counterparts, ...summary } = aggregatePeriod(movements, fuelRecords, period, {
        kind: entityKind,
        id: entityId,
      });
      return { entityKind, entityId, year, month: idx + 1, ...summary };
    });
  }

  async summarizeDrivers(periodStart: Date, periodEnd: Date): Promise<DriverMetricsResult[]> {
    const period = toPeriod(periodStart, periodEnd);
    const [drivers, { movements, fuelRecords }] = await Promise.all([
      this.store.listDrivers(),
      this.readRecords({ from: period.start, to: period.end }),
    ]);
    const movementsByDriver = groupByEntity(movements, (m) => m.driverId);
    const fuelByDriver = groupByEntity(fuelRecords, (f) => f.driverId);

    return drivers
      .map((driver) =>
        toDriverResult(
          driver.id,
          aggregatePeriod(
            movementsByDriver.get(driver.id) ?? NO_RECORDS,
            fuelByDriver.get(driver.id) ?? NO_RECORDS,
            period,
            { kind: 'driver', id: driver.id },
          ),
        ),
      )
      .sort((a, b) => b.totalKm - a.totalKm || compareIds(a.driverId, b.driverId));
  }

  async summarizeVehicles(periodStart: Date, periodEnd: Date): Promise<VehicleMetricsResult[]> {
    const period = toPeriod(periodStart, periodEnd);
    const [vehicles, { movements, fuelRecords }] = await Promise.all([
      this.store.listVehicles(),
      this.readRecords({ from: period.start, to: period.end }),
    ]);
    const movementsByVehicle = groupByEntity(movements, (m) => m.vehicleId);
    const fuelByVehicle = groupByEntity(fuelRecords, (f) => f.vehicleId);

    return vehicles
      .map((vehicle) =>
        toVehicleResult(
          vehicle.id,
          aggregatePeriod(
            movementsByVehicle.get(vehicle.id) ?? NO_RECORDS,
            fuelByVehicle.get(vehicle.id) ?? NO_RECORDS,
            period,
            { kind: 'vehicle', id: vehicle.id },
          ),
        ),
      )
      .sort((a, b) => b.totalKm - a.totalKm || compareIds(a.vehicleId, b.vehicleId));
  }

  private async rankEntities(kind: EntityKind, period: Period, metric: RankingMetric): Promise<RankingEntry[]> {
    const rosterRead: Promise<ReadonlyArray<{ readonly id: string }>> =
      kind === 'driver' ? this.store.listDrivers() : this.store.listVehicles();
    const [roster, { movements, fuelRecords }] = await Promise.all([
      rosterRead,
      this.readRecords({ from: period.start, to: period.end }),
    ]);

    const movementsByEntity = groupByEntity(movements, (m) =>
      isWithin(m.startedAt, period) ? (kind === 'driver' ? m.driverId : m.vehicleId) : null,
    );
    const fuelByEntity = groupByEntity(fuelRecords, (f) =>
      isWithin(f.ts, period) ? (kind === 'driver' ? f.driverId : f.vehicleId) : null,
    );

    const entityIds = new Set<string>(roster.map((entity) => entity.id));
    for (const id of movementsByEntity.keys()) entityIds.add(id);
    for (const id of fuelByEntity.keys()) entityIds.add(id);

    const candidates = [...entityIds].map((entityId) => ({
      entityId,
      summary: aggregatePeriod(
        movementsByEntity.get(entityId) ?? NO_RECORDS,
        fuelByEntity.get(entityId) ?? NO_RECORDS,
        period,
        { kind, id: entityId },
      ),
    }));
    return rankSummaries(candidates, metric);
  }

  private async readRecords(
    filter: RecordFilter,
  ): Promise<{ movements: MovementRecord[]; fuelRecords: FuelRecord[] }> {
    const [movements, fuelRecords] = await Promise.all([
      this.store.fetchMovements(filter),
      this.store.fetchFuelRecords(filter),
    ]);
    return { movements, fuelRecords };
  }
}
