export const PURPOSE_CATEGORIES = [
  'general',
  'operation',
  'transport',
  'maintenance',
  'cleaning',
  'repair',
  'inspection',
] as const;

export type PurposeCategory = (typeof PURPOSE_CATEGORIES)[number];

export function isPurposeCategory(value: unknown): value is PurposeCategory {
  return typeof value === 'string' && (PURPOSE_CATEGORIES as readonly string[]).includes(value);
}

export interface TripPurpose {
  readonly id: string;
  readonly name: string;
  readonly description: string | null;
  readonly category: PurposeCategory;
  readonly isActive: boolean;
}
