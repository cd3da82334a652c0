export interface FuelRecord {
  readonly id: string;
  readonly vehicleId: string;
  /** Fills booked against a vehicle only count towards vehicle metrics */
  readonly driverId: string | null;
  readonly ts: Date;
  readonly liters: number;
  readonly cost: number;
  readonly odometerAtFillKm: number | null;
}
