import { readFile } from 'fs/promises';
import { z } from 'zod';
import { PURPOSE_CATEGORIES } from '@fleet-ledger/domain';
import { InMemoryRecordStore, type RecordStoreSeed } from './in-memory-record-store.js';

const id = z.union([z.string().min(1), z.number().int()]).transform(String);
const timestamp = z.union([z.string().datetime({ offset: true }), z.string().date()]).transform((s) => new Date(s));

const movementSchema = z.object({
  id,
  movementNumber: z.number().int().optional(),
  vehicleId: id,
  driverId: id,
  startedAt: timestamp,
  endedAt: timestamp.nullable().default(null),
  distanceKm: z.number(),
  purposeId: id.nullable().default(null),
  notes: z.string().nullable().default(null),
});

const fuelRecordSchema = z.object({
  id,
  vehicleId: id,
  driverId: id.nullable().default(null),
  ts: timestamp,
  liters: z.number(),
  cost: z.number().default(0),
  odometerAtFillKm: z.number().nullable().default(null),
});

const driverSchema = z.object({
  id,
  name: z.string(),
  surname: z.string(),
  notes: z.string().nullable().default(null),
  isActive: z.boolean().default(true),
});

const vehicleSchema = z.object({
  id,
  plate: z.string(),
  brand: z.string().nullable().default(null),
  vehicleType: z.string().nullable().default(null),
  purpose: z.string().nullable().default(null),
  isActive: z.boolean().default(true),
});

const purposeSchema = z.object({
  id,
  name: z.string(),
  description: z.string().nullable().default(null),
  category: z.enum(PURPOSE_CATEGORIES).default('general'),
  isActive: z.boolean().default(true),
});

export const recordSnapshotSchema = z.object({
  movements: z.array(movementSchema).default([]),
  fuelRecords: z.array(fuelRecordSchema).default([]),
  drivers: z.array(driverSchema).default([]),
  vehicles: z.array(vehicleSchema).default([]),
  purposes: z.array(purposeSchema).default([]),
});

/**
 * Validate a JSON snapshot of fleet records. Values the engine treats as
 * malformed (reversed trips, negative distances) are accepted here so they
 * surface as data issues rather than load failures.
 */
export function parseRecordSnapshot(input: unknown): RecordStoreSeed {
  return recordSnapshotSchema.parse(input);
}

export async function loadRecordSnapshot(path: string): Promise<InMemoryRecordStore> {
  const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
  return new InMemoryRecordStore(parseRecordSnapshot(raw));
}
