import type {
  Driver,
  FuelRecord,
  MovementRecord,
  PurposeListFilters,
  RecordFilter,
  RecordStorePort,
  TripPurpose,
  Vehicle,
} from '@fleet-ledger/domain';
import { isPurposeCategory } from '@fleet-ledger/domain';
import { getPool, type Queryable } from './pool.js';
import {
  toBoolean,
  toDate,
  toNullableDate,
  toNullableNumber,
  toNullableText,
  toNumber,
  toText,
} from './row-values.js';

function buildRecordFilter(
  filter: RecordFilter,
  tsColumn: string,
): { whereSql: string; params: unknown[] } {
  const params: unknown[] = [filter.from, filter.to];
  const where: string[] = [`${tsColumn} >= $1`, `${tsColumn} < $2`];
  let idx = 3;

  if (filter.driverId !== undefined) {
    where.push(`driver_id = $${idx++}`);
    params.push(filter.driverId);
  }
  if (filter.vehicleId !== undefined) {
    where.push(`vehicle_id = $${idx++}`);
    params.push(filter.vehicleId);
  }

  return { whereSql: `WHERE ${where.join(' AND ')}`, params };
}

export class PgRecordStore implements RecordStorePort {
  constructor(private readonly db: Queryable = getPool()) {}

  async fetchMovements(filter: RecordFilter): Promise<MovementRecord[]> {
    const { whereSql, params } = buildRecordFilter(filter, 'started_at');
    const { rows } = await this.db.query(
      `SELECT id, movement_number, vehicle_id, driver_id, started_at, ended_at,
              distance_km, purpose_id, notes
       FROM fleet.movements
       ${whereSql}
       ORDER BY started_at ASC, id ASC`,
      params,
    );
    return rows.map(mapMovementRow);
  }

  async fetchFuelRecords(filter: RecordFilter): Promise<FuelRecord[]> {
    const { whereSql, params } = buildRecordFilter(filter, 'ts');
    const { rows } = await this.db.query(
      `SELECT id, vehicle_id, driver_id, ts, liters, COALESCE(cost, 0) AS cost, odometer_km
       FROM fleet.fuel_records
       ${whereSql}
       ORDER BY ts ASC, id ASC`,
      params,
    );
    return rows.map(mapFuelRow);
  }

  async listDrivers(): Promise<Driver[]> {
    const { rows } = await this.db.query(
      `SELECT id, name, surname, notes, is_active FROM fleet.drivers ORDER BY surname, name, id`,
    );
    return rows.map(mapDriverRow);
  }

  async listVehicles(): Promise<Vehicle[]> {
    const { rows } = await this.db.query(
      `SELECT id, plate, brand, vehicle_type, purpose, is_active FROM fleet.vehicles ORDER BY plate`,
    );
    return rows.map(mapVehicleRow);
  }

  async findDriver(driverId: string): Promise<Driver | null> {
    const { rows } = await this.db.query(
      `SELECT id, name, surname, notes, is_active FROM fleet.drivers WHERE id = $1`,
      [driverId],
    );
    return rows[0] ? mapDriverRow(rows[0]) : null;
  }

  async findVehicle(vehicleId: string): Promise<Vehicle | null> {
    const { rows } = await this.db.query(
      `SELECT id, plate, brand, vehicle_type, purpose, is_active FROM fleet.vehicles WHERE id = $1`,
      [vehicleId],
    );
    return rows[0] ? mapVehicleRow(rows[0]) : null;
  }

  async listPurposes(filters: PurposeListFilters = {}): Promise<TripPurpose[]> {
    const where = filters.includeInactive ? '' : 'WHERE is_active = TRUE';
    const { rows } = await this.db.query(
      `SELECT id, name, description, category, is_active FROM fleet.trip_purposes ${where} ORDER BY name`,
    );
    return rows.map(mapPurposeRow);
  }
}

function mapMovementRow(row: Record<string, unknown>): MovementRecord {
  const movementNumber = toNullableNumber(row['movement_number']);
  return {
    id: toText(row['id']),
    ...(movementNumber === null ? {} : { movementNumber }),
    vehicleId: toText(row['vehicle_id']),
    driverId: toText(row['driver_id']),
    startedAt: toDate(row['started_at']),
    endedAt: toNullableDate(row['ended_at']),
    distanceKm: toNumber(row['distance_km']),
    purposeId: toNullableText(row['purpose_id']),
    notes: toNullableText(row['notes']),
  };
}

function mapFuelRow(row: Record<string, unknown>): FuelRecord {
  return {
    id: toText(row['id']),
    vehicleId: toText(row['vehicle_id']),
    driverId: toNullableText(row['driver_id']),
    ts: toDate(row['ts']),
    liters: toNumber(row['liters']),
    cost: toNumber(row['cost']),
    odometerAtFillKm: toNullableNumber(row['odometer_km']),
  };
}

function mapDriverRow(row: Record<string, unknown>): Driver {
  return {
    id: toText(row['id']),
    name: toText(row['name']),
    surname: toText(row['surname']),
    notes: toNullableText(row['notes']),
    isActive: toBoolean(row['is_active']),
  };
}

function mapVehicleRow(row: Record<string, unknown>): Vehicle {
  return {
    id: toText(row['id']),
    plate: toText(row['plate']),
    brand: toNullableText(row['brand']),
    vehicleType: toNullableText(row['vehicle_type']),
    purpose: toNullableText(row['purpose']),
    isActive: toBoolean(row['is_active']),
  };
}

function mapPurposeRow(row: Record<string, unknown>): TripPurpose {
  const category = row['category'];
  return {
    id: toText(row['id']),
    name: toText(row['name']),
    description: toNullableText(row['description']),
    category: isPurposeCategory(category) ? category : 'general',
    isActive: toBoolean(row['is_active']),
  };
}
