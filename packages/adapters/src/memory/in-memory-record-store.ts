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

export interface RecordStoreSeed {
  movements?: readonly MovementRecord[];
  fuelRecords?: readonly FuelRecord[];
  drivers?: readonly Driver[];
  vehicles?: readonly Vehicle[];
  purposes?: readonly TripPurpose[];
}

function matches(
  record: { readonly driverId: string | null; readonly vehicleId: string },
  ts: Date,
  filter: RecordFilter,
): boolean {
  const t = ts.getTime();
  if (!(t >= filter.from.getTime() && t < filter.to.getTime())) return false;
  if (filter.driverId !== undefined && record.driverId !== filter.driverId) return false;
  if (filter.vehicleId !== undefined && record.vehicleId !== filter.vehicleId) return false;
  return true;
}

function byTimeThenId<T extends { readonly id: string }>(tsOf: (record: T) => Date) {
  return (a: T, b: T): number => tsOf(a).getTime() - tsOf(b).getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/** Record store held in process memory, with the same filtering rules as the SQL store. */
export class InMemoryRecordStore implements RecordStorePort {
  private readonly movements: MovementRecord[];
  private readonly fuelRecords: FuelRecord[];
  private readonly drivers: Driver[];
  private readonly vehicles: Vehicle[];
  private readonly purposes: TripPurpose[];

  constructor(seed: RecordStoreSeed = {}) {
    this.movements = [...(seed.movements ?? [])].sort(byTimeThenId((m) => m.startedAt));
    this.fuelRecords = [...(seed.fuelRecords ?? [])].sort(byTimeThenId((f) => f.ts));
    this.drivers = [...(seed.drivers ?? [])];
    this.vehicles = [...(seed.vehicles ?? [])];
    this.purposes = [...(seed.purposes ?? [])];
  }

  async fetchMovements(filter: RecordFilter): Promise<MovementRecord[]> {
    return this.movements.filter((m) => matches(m, m.startedAt, filter));
  }

  async fetchFuelRecords(filter: RecordFilter): Promise<FuelRecord[]> {
    return this.fuelRecords.filter((f) => matches(f, f.ts, filter));
  }

  async listDrivers(): Promise<Driver[]> {
    return [...this.drivers];
  }

  async listVehicles(): Promise<Vehicle[]> {
    return [...this.vehicles];
  }

  async findDriver(driverId: string): Promise<Driver | null> {
    return this.drivers.find((d) => d.id === driverId) ?? null;
  }

  async findVehicle(vehicleId: string): Promise<Vehicle | null> {
    return this.vehicles.find((v) => v.id === vehicleId) ?? null;
  }

  async listPurposes(filters: PurposeListFilters = {}): Promise<TripPurpose[]> {
    return this.purposes.filter((p) => filters.includeInactive || p.isActive);
  }

  /** Counts per collection, for start-up logging. */
  size(): { movements: number; fuelRecords: number; drivers: number; vehicles: number } {
    return {
      movements: this.movements.length,
      fuelRecords: this.fuelRecords.length,
      drivers: this.drivers.length,
      vehicles: this.vehicles.length,
    };
  }
}
