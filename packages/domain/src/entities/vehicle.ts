export interface Vehicle {
  readonly id: string;
  readonly plate: string;       // e.g. "KHI-4821"
  readonly brand: string | null;
  readonly vehicleType: string | null;
  readonly purpose: string | null;
  readonly isActive: boolean;
}
