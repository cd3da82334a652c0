/**
 * AnalyticsEngine behaviour against an in-process record store.
 *
 * Fleet used throughout (March 2026 unless noted):
 *   D1 on V1: 50 km + 70 km, one 12 L fill (cost 24)
 *   D2 on V2: one reversed trip (end before start), one 40 km trip, one 6 L fill
 *   D3: rostered, no records
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { AnalyticsEngine, InvalidWindowError } from '../index.js';
import type { DriverMetrics, FuelRecord, MovementRecord, VehicleMetrics } from '../index.js';
import { FakeRecordStore, at, makeDriver, makeFuel, makeMovement, makeVehicle } from './helpers/records.js';

const MAR_1 = at('2026-03-01T00:00:00Z');
const MAR_10 = at('2026-03-10T00:00:00Z');
const MAR_15 = at('2026-03-15T00:00:00Z');
const APR_1 = at('2026-04-01T00:00:00Z');

const MOVEMENTS: MovementRecord[] = [
  makeMovement({ id: 'm1', driverId: 'D1', vehicleId: 'V1', startedAt: at('2026-03-05T08:00:00Z'), endedAt: at('2026-03-05T10:00:00Z'), distanceKm: 50, purposeId: 'p1' }),
  makeMovement({ id: 'm2', driverId: 'D1', vehicleId: 'V1', startedAt: at('2026-03-20T08:00:00Z'), endedAt: at('2026-03-20T11:00:00Z'), distanceKm: 70, purposeId: 'p1' }),
  makeMovement({ id: 'm3', driverId: 'D2', vehicleId: 'V2', startedAt: at('2026-03-10T10:00:00Z'), endedAt: at('2026-03-10T09:00:00Z'), distanceKm: 25 }),
  makeMovement({ id: 'm4', driverId: 'D2', vehicleId: 'V2', startedAt: at('2026-03-11T10:00:00Z'), endedAt: at('2026-03-11T11:00:00Z'), distanceKm: 40 }),
];

const FUEL: FuelRecord[] = [
  makeFuel({ id: 'f1', driverId: 'D1', vehicleId: 'V1', ts: at('2026-03-21T09:00:00Z'), liters: 12, cost: 24 }),
  makeFuel({ id: 'f2', driverId: 'D2', vehicleId: 'V2', ts: at('2026-03-12T09:00:00Z'), liters: 6, cost: 12 }),
];

let store: FakeRecordStore;
let engine: AnalyticsEngine;

beforeEach(() => {
  store = new FakeRecordStore({
    movements: MOVEMENTS,
    fuelRecords: FUEL,
    drivers: [makeDriver('D1'), makeDriver('D2'), makeDriver('D3')],
    vehicles: [makeVehicle('V1'), makeVehicle('V2')],
  });
  engine = new AnalyticsEngine(store);
});

// ═══════════════════════════════════════════════════════════════════════════════
// computeDriverMetrics
// ═══════════════════════════════════════════════════════════════════════════════

describe('computeDriverMetrics', () => {
  it('aggregates two March trips and one fill into 10 L/100km', async () => {
    const result = await engine.computeDriverMetrics('D1', MAR_1, APR_1);

    expect(result.outcome).toBe('metrics');
    expect(result.driverId).toBe('D1');
    expect(result.totalKm).toBe(120);
    expect(result.totalLiters).toBe(12);
    expect(result.efficiencyLPer100Km).toBe(10);
    expect(result.tripCount).toBe(2);
    expect(result.avgTripDistanceKm).toBe(60);
    expect(result.kmPerLiter).toBe(10);
    expect(result.costPerKm).toBeCloseTo(0.2, 10);
    expect(result.totalCost).toBe(24);
    expect(result.skippedRecords).toBe(0);
    expect(result.vehicleUsage).toEqual([{ entityId: 'V1', tripCount: 2, totalKm: 120 }]);
    expect(result.purposeBreakdown).toEqual([{ purposeId: 'p1', tripCount: 2, totalKm: 120 }]);
    expect(result.period).toEqual({ start: MAR_1, end: APR_1 });
  });

  it('excludes a trip that ends before it starts and counts it as skipped', async () => {
    const result = await engine.computeDriverMetrics('D2', MAR_1, APR_1);

    expect(result.outcome).toBe('metrics');
    expect(result.totalKm).toBe(40);
    expect(result.tripCount).toBe(1);
    expect(result.skippedRecords).toBe(1);
    expect(result.dataIssues).toEqual([{ recordKind: 'movement', recordId: 'm3', issue: 'end_before_start' }]);
    expect(result.efficiencyLPer100Km).toBe(15);
  });

  it('returns an empty-period result with absent efficiency when there are no trips', async () => {
    const result = await engine.computeDriverMetrics('D3', MAR_1, APR_1);

    expect(result.outcome).toBe('empty_period');
    expect(result.totalKm).toBe(0);
    expect(result.totalLiters).toBe(0);
    expect(result.tripCount).toBe(0);
    expect(result.efficiencyLPer100Km).toBeNull();
    expect(result.avgTripDistanceKm).toBeNull();
    expect(result.costPerKm).toBeNull();
    expect(result.vehicleUsage).toEqual([]);
  });

  it('reports fuel but no efficiency when fills exist without kilometres', async () => {
    const engineWithFuelOnly = new AnalyticsEngine(
      new FakeRecordStore({
        fuelRecords: [makeFuel({ id: 'f9', driverId: 'D4', ts: at('2026-03-03T09:00:00Z'), liters: 8, cost: 14 })],
      }),
    );

    const result = await engineWithFuelOnly.computeDriverMetrics('D4', MAR_1, APR_1);

    expect(result.outcome).toBe('empty_period');
    expect(result.totalLiters).toBe(8);
    expect(result.efficiencyLPer100Km).toBeNull();
    expect(result.kmPerLiter).toBe(0);
  });

  it('treats the window as half-open', async () => {
    const boundaryStore = new FakeRecordStore({
      movements: [
        makeMovement({ id: 'start', startedAt: MAR_1, endedAt: at('2026-03-01T01:00:00Z'), distanceKm: 5 }),
        makeMovement({ id: 'end', startedAt: APR_1, endedAt: at('2026-04-01T01:00:00Z'), distanceKm: 7 }),
      ],
    });

    const result = await new AnalyticsEngine(boundaryStore).computeDriverMetrics('D1', MAR_1, APR_1);

    expect(result.totalKm).toBe(5);
    expect(result.tripCount).toBe(1);
  });

  it('is additive across a partition of the period', async () => {
    const whole = await engine.computeDriverMetrics('D1', MAR_1, APR_1);
    const first = await engine.computeDriverMetrics('D1', MAR_1, MAR_15);
    const second = await engine.computeDriverMetrics('D1', MAR_15, APR_1);

    expect(first.totalKm).toBe(50);
    expect(second.totalKm).toBe(70);
    expect(first.totalKm + second.totalKm).toBe(whole.totalKm);
    expect(first.totalLiters + second.totalLiters).toBe(whole.totalLiters);
  });

  it('keeps totals exact for two-decimal distances and volumes', async () => {
    const decimalStore = new FakeRecordStore({
      movements: [
        makeMovement({ id: 'x1', startedAt: at('2026-03-02T08:00:00Z'), endedAt: at('2026-03-02T08:10:00Z'), distanceKm: 0.1 }),
        makeMovement({ id: 'x2', startedAt: at('2026-03-12T08:00:00Z'), endedAt: at('2026-03-12T08:10:00Z'), distanceKm: 0.2 }),
        makeMovement({ id: 'x3', startedAt: at('2026-03-13T08:00:00Z'), endedAt: at('2026-03-13T08:10:00Z'), distanceKm: 0.3 }),
      ],
      fuelRecords: [
        makeFuel({ id: 'y1', ts: at('2026-03-12T09:00:00Z'), liters: 0.1, cost: 0.1 }),
        makeFuel({ id: 'y2', ts: at('2026-03-13T09:00:00Z'), liters: 0.2, cost: 0.2 }),
      ],
    });
    const decimalEngine = new AnalyticsEngine(decimalStore);

    const whole = await decimalEngine.computeDriverMetrics('D1', MAR_1, APR_1);
    const first = await decimalEngine.computeDriverMetrics('D1', MAR_1, MAR_10);
    const second = await decimalEngine.computeDriverMetrics('D1', MAR_10, APR_1);

    expect(whole.totalKm).toBe(0.6);
    expect(whole.totalLiters).toBe(0.3);
    expect(whole.totalCost).toBe(0.3);
    expect(second.totalKm).toBe(0.5);
    expect(first.totalKm + second.totalKm).toBe(whole.totalKm);
    expect(whole.efficiencyLPer100Km).toBe(50);
  });

  it('counts valid fills and averages their volume', async () => {
    const d1 = await engine.computeDriverMetrics('D1', MAR_1, APR_1);
    const d3 = await engine.computeDriverMetrics('D3', MAR_1, APR_1);

    expect(d1.fuelFillCount).toBe(1);
    expect(d1.avgLitersPerFill).toBe(12);
    expect(d3.fuelFillCount).toBe(0);
    expect(d3.avgLitersPerFill).toBeNull();
  });

  it('returns identical results for identical calls', async () => {
    const a = await engine.computeDriverMetrics('D2', MAR_1, APR_1);
    const b = await engine.computeDriverMetrics('D2', MAR_1, APR_1);

    expect(b).toEqual(a);
    expect(b).not.toBe(a);
  });

  it('counts open trips separately from malformed ones', async () => {
    const openStore = new FakeRecordStore({
      movements: [
        makeMovement({ id: 'closed', distanceKm: 12 }),
        makeMovement({ id: 'open', startedAt: at('2026-03-04T08:00:00Z'), endedAt: null, distanceKm: 0 }),
      ],
    });

    const result = await new AnalyticsEngine(openStore).computeDriverMetrics('D1', MAR_1, APR_1);

    expect(result.openMovements).toBe(1);
    expect(result.skippedRecords).toBe(0);
    expect(result.tripCount).toBe(1);
  });

  it('rejects a window whose start is after its end without reading the store', async () => {
    await expect(engine.computeDriverMetrics('D1', APR_1, MAR_1)).rejects.toBeInstanceOf(InvalidWindowError);
    expect(store.reads).toBe(0);
  });

  it('accepts an empty window', async () => {
    const result = await engine.computeDriverMetrics('D1', MAR_1, MAR_1);
    expect(result.outcome).toBe('empty_period');
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// computeVehicleMetrics
// ═══════════════════════════════════════════════════════════════════════════════

describe('computeVehicleMetrics', () => {
  it('aggregates by vehicle and lists its drivers', async () => {
    const result = await engine.computeVehicleMetrics('V2', MAR_1, APR_1);

    expect(result.outcome).toBe('metrics');
    expect(result.vehicleId).toBe('V2');
    expect(result.totalKm).toBe(40);
    expect(result.totalLiters).toBe(6);
    expect(result.skippedRecords).toBe(1);
    expect(result.driverUsage).toEqual([{ entityId: 'D2', tripCount: 1, totalKm: 40 }]);
  });

  it('counts fills booked without a driver', async () => {
    const vehicleStore = new FakeRecordStore({
      movements: [makeMovement({ id: 'm', vehicleId: 'V7', distanceKm: 80 })],
      fuelRecords: [makeFuel({ id: 'f', vehicleId: 'V7', driverId: null, liters: 20, cost: 40 })],
    });
    const vehicleEngine = new AnalyticsEngine(vehicleStore);

    const vehicle = await vehicleEngine.computeVehicleMetrics('V7', MAR_1, APR_1);
    const driver = await vehicleEngine.computeDriverMetrics('D1', MAR_1, APR_1);

    expect(vehicle.totalLiters).toBe(20);
    expect(vehicle.efficiencyLPer100Km).toBe(25);
    expect(driver.totalLiters).toBe(0);
    expect(driver.efficiencyLPer100Km).toBe(0);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// Rankings
// ═══════════════════════════════════════════════════════════════════════════════

describe('rankDrivers', () => {
  it('ranks by efficiency ascending and puts zero-km drivers last, flagged', async () => {
    const ranking = await engine.rankDrivers(MAR_1, APR_1, 'efficiency_l_per_100km');

    expect(ranking).toEqual([
      { position: 1, driverId: 'D1', value: 10, insufficientData: false },
      { position: 2, driverId: 'D2', value: 15, insufficientData: false },
      { position: 3, driverId: 'D3', value: null, insufficientData: true },
    ]);
  });

  it('ranks by total km descending', async () => {
    const ranking = await engine.rankDrivers(MAR_1, APR_1, 'total_km');
    expect(ranking.map((entry) => [entry.driverId, entry.value])).toEqual([
      ['D1', 120],
      ['D2', 40],
      ['D3', 0],
    ]);
  });

  it('breaks ties by driver id, numerically for numeric ids', async () => {
    const tieStore = new FakeRecordStore({
      movements: [
        makeMovement({ id: 'a', driverId: '10', distanceKm: 40 }),
        makeMovement({ id: 'b', driverId: 'A', distanceKm: 40 }),
        makeMovement({ id: 'c', driverId: '2', distanceKm: 40 }),
      ],
    });

    const ranking = await new AnalyticsEngine(tieStore).rankDrivers(MAR_1, APR_1, 'total_km');

    expect(ranking.map((entry) => entry.driverId)).toEqual(['2', '10', 'A']);
    expect(ranking.map((entry) => entry.position)).toEqual([1, 2, 3]);
  });

  it('treats equal two-decimal totals as a tie', async () => {
    const tieStore = new FakeRecordStore({
      movements: [
        makeMovement({ id: 'a', driverId: 'D2', distanceKm: 0.1 }),
        makeMovement({ id: 'b', driverId: 'D2', distanceKm: 0.2 }),
        makeMovement({ id: 'c', driverId: 'D1', distanceKm: 0.3 }),
      ],
    });

    const ranking = await new AnalyticsEngine(tieStore).rankDrivers(MAR_1, APR_1, 'total_km');

    expect(ranking).toEqual([
      { position: 1, driverId: 'D1', value: 0.3, insufficientData: false },
      { position: 2, driverId: 'D2', value: 0.3, insufficientData: false },
    ]);
  });

  it('includes drivers that appear in records but not in the roster', async () => {
    const ranking = await engine.rankDrivers(MAR_1, APR_1, 'trip_count');
    const rosterless = new AnalyticsEngine(new FakeRecordStore({ movements: MOVEMENTS, fuelRecords: FUEL }));
    const fromRecords = await rosterless.rankDrivers(MAR_1, APR_1, 'trip_count');

    expect(ranking.map((entry) => entry.driverId)).toEqual(['D1', 'D2', 'D3']);
    expect(fromRecords.map((entry) => entry.driverId)).toEqual(['D1', 'D2']);
  });

  it('rejects an inverted window', async () => {
    await expect(engine.rankDrivers(APR_1, MAR_1, 'total_cost')).rejects.toThrow(InvalidWindowError);
  });
});

describe('rankVehicles', () => {
  it('ranks vehicles by trip count', async () => {
    const ranking = await engine.rankVehicles(MAR_1, APR_1, 'trip_count');
    expect(ranking).toEqual([
      { position: 1, vehicleId: 'V1', value: 2, insufficientData: false },
      { position: 2, vehicleId: 'V2', value: 1, insufficientData: false },
    ]);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// monthlyBreakdown
// ═══════════════════════════════════════════════════════════════════════════════

describe('monthlyBreakdown', () => {
  it('always returns twelve months, zero-valued where nothing happened', async () => {
    const months = await engine.monthlyBreakdown('D1', 'driver', 2026);

    expect(months).toHaveLength(12);
    expect(months.map((m) => m.month)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);
    expect(months[0]?.totalKm).toBe(0);
    expect(months[0]?.efficiencyLPer100Km).toBeNull();
    expect(months[2]?.totalKm).toBe(120);
    expect(months[2]?.totalLiters).toBe(12);
    expect(months[2]?.tripCount).toBe(2);
    expect(months[0]?.period.start.toISOString()).toBe('2026-01-01T00:00:00.000Z');
    expect(months[11]?.period.end.toISOString()).toBe('2027-01-01T00:00:00.000Z');
  });

  it('returns twelve entries for an entity with no records at all', async () => {
    const months = await engine.monthlyBreakdown('V9', 'vehicle', 2025);

    expect(months).toHaveLength(12);
    expect(months.every((m) => m.tripCount === 0 && m.entityKind === 'vehicle' && m.year === 2025)).toBe(true);
  });

  it('matches computeVehicleMetrics for the same month', async () => {
    const months = await engine.monthlyBreakdown('V2', 'vehicle', 2026);
    const march = await engine.computeVehicleMetrics('V2', MAR_1, APR_1);

    expect(months[2]?.totalKm).toBe(march.totalKm);
    expect(months[2]?.skippedRecords).toBe(march.skippedRecords);
  });

  it('rejects years outside the supported range', async () => {
    await expect(engine.monthlyBreakdown('D1', 'driver', 1969)).rejects.toBeInstanceOf(InvalidWindowError);
    await expect(engine.monthlyBreakdown('D1', 'driver', 2026.5)).rejects.toBeInstanceOf(InvalidWindowError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// summarizeDrivers
// ═══════════════════════════════════════════════════════════════════════════════

describe('summarizeDrivers', () => {
  it('returns every rostered driver, most kilometres first', async () => {
    const summary = await engine.summarizeDrivers(MAR_1, APR_1);

    expect(summary.map((s) => [s.driverId, s.totalKm, s.outcome])).toEqual([
      ['D1', 120, 'metrics'],
      ['D2', 40, 'metrics'],
      ['D3', 0, 'empty_period'],
    ]);
  });

  it('agrees with computeDriverMetrics for each driver', async () => {
    const summary = await engine.summarizeDrivers(MAR_1, APR_1);
    const d2 = summary.find((s): s is DriverMetrics => s.driverId === 'D2' && s.outcome === 'metrics');

    expect(d2).toEqual(await engine.computeDriverMetrics('D2', MAR_1, APR_1));
  });
});

// ═══════════════════════════════════════════════════════════════════════════════
// summarizeVehicles
// ═══════════════════════════════════════════════════════════════════════════════

describe('summarizeVehicles', () => {
  it('returns every rostered vehicle, including idle ones, most kilometres first', async () => {
    const fleet = new FakeRecordStore({
      movements: MOVEMENTS,
      fuelRecords: FUEL,
      vehicles: [makeVehicle('V3'), makeVehicle('V2'), makeVehicle('V1')],
    });

    const summary = await new AnalyticsEngine(fleet).summarizeVehicles(MAR_1, APR_1);

    expect(summary.map((s) => [s.vehicleId, s.totalKm, s.fuelFillCount, s.outcome])).toEqual([
      ['V1', 120, 1, 'metrics'],
      ['V2', 40, 1, 'metrics'],
      ['V3', 0, 0, 'empty_period'],
    ]);
    expect(summary[1]?.avgLitersPerFill).toBe(6);
    expect(summary[1]?.skippedRecords).toBe(1);
  });

  it('agrees with computeVehicleMetrics for each vehicle', async () => {
    const summary = await engine.summarizeVehicles(MAR_1, APR_1);
    const v1 = summary.find((s): s is VehicleMetrics => s.vehicleId === 'V1' && s.outcome === 'metrics');

    expect(v1).toEqual(await engine.computeVehicleMetrics('V1', MAR_1, APR_1));
  });

  it('rejects an inverted window', async () => {
    await expect(engine.summarizeVehicles(APR_1, MAR_1)).rejects.toThrow(InvalidWindowError);
  });
});
