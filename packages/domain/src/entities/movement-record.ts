export interface MovementRecord {
  readonly id: string;
  readonly movementNumber?: number;
  readonly vehicleId: string;
  readonly driverId: string;
  readonly startedAt: Date;
  /** null while the trip is still open */
  readonly endedAt: Date | null;
  readonly distanceKm: number;
  readonly purposeId: string | null;
  readonly notes: string | null;
}
