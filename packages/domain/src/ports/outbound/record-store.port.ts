import type { MovementRecord } from '../../entities/movement-record.js';
import type { FuelRecord } from '../../entities/fuel-record.js';
import type { Driver } from '../../entities/driver.js';
import type { Vehicle } from '../../entities/vehicle.js';
import type { TripPurpose } from '../../entities/trip-purpose.js';

export interface RecordFilter {
  driverId?: string;
  vehicleId?: string;
  /** inclusive */
  from: Date;
  /** exclusive */
  to: Date;
}

export interface PurposeListFilters {
  includeInactive?: boolean;
}

/**
 * Read-only source of fleet records. Movements are matched on `startedAt`,
 * fuel records on `ts`.
 */
export interface RecordStorePort {
  fetchMovements(filter: RecordFilter): Promise<MovementRecord[]>;
  fetchFuelRecords(filter: RecordFilter): Promise<FuelRecord[]>;
  listDrivers(): Promise<Driver[]>;
  listVehicles(): Promise<Vehicle[]>;
  findDriver(driverId: string): Promise<Driver | null>;
  findVehicle(vehicleId: string): Promise<Vehicle | null>;
  listPurposes(filters?: PurposeListFilters): Promise<TripPurpose[]>;
}
