import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { RANKING_METRICS } from '@fleet-ledger/domain';
import type {
  DriverMetricsResult,
  EntityKind,
  FleetAnalyticsPort,
  MetricsSummary,
  RecordStorePort,
  VehicleMetricsResult,
} from '@fleet-ledger/domain';

export interface AnalyticsRouterDeps {
  analytics: FleetAnalyticsPort;
  store: RecordStorePort;
}

const isoInstantSchema = z
  .union([z.string().date(), z.string().datetime({ offset: true })])
  .transform((value) => new Date(value));

const windowQuerySchema = z.object({
  from: isoInstantSchema.optional(),
  to: isoInstantSchema.optional(),
});

const rankingQuerySchema = windowQuerySchema.extend({
  metric: z.enum(RANKING_METRICS).default('total_km'),
});

const monthlyParamsSchema = z.object({
  entityKind: z.enum(['drivers', 'vehicles']),
  entityId: z.string().trim().min(1),
});

const monthlyQuerySchema = z.object({
  year: z.coerce.number().int().optional(),
});

const driverParamsSchema = z.object({ driverId: z.string().trim().min(1) });
const vehicleParamsSchema = z.object({ vehicleId: z.string().trim().min(1) });

const ENTITY_KIND_BY_SEGMENT: Record<z.infer<typeof monthlyParamsSchema>['entityKind'], EntityKind> = {
  drivers: 'driver',
  vehicles: 'vehicle',
};

/** Missing bounds default to the current UTC calendar month; `to` is exclusive. */
function resolveWindow(query: z.infer<typeof windowQuerySchema>, now = new Date()): { from: Date; to: Date } {
  const from = query.from ?? new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1));
  const to = query.to ?? new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1));
  return { from, to };
}

type ActivityCounts = Pick<MetricsSummary, 'tripCount' | 'openMovements' | 'skippedRecords' | 'fuelFillCount'>;

/** True when any record of the entity fell in the window. */
function hasActivity(summary: ActivityCounts): boolean {
  return summary.tripCount + summary.openMovements + summary.skippedRecords + summary.fuelFillCount > 0;
}

function logSkipped(label: string, summary: Pick<MetricsSummary, 'skippedRecords'>): void {
  if (summary.skippedRecords > 0) {
    console.warn(`[analytics] ${label}: skipped ${summary.skippedRecords} malformed record(s)`);
  }
}

export function createAnalyticsRouter({ analytics, store }: AnalyticsRouterDeps): Router {
  const router = Router();

  /** GET /api/analytics/drivers/summary */
  router.get('/drivers/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { from, to } = resolveWindow(windowQuerySchema.parse(req.query));
      const data: DriverMetricsResult[] = await analytics.summarizeDrivers(from, to);
      const skipped = data.reduce((sum, item) => sum + item.skippedRecords, 0);
      logSkipped('drivers summary', { skippedRecords: skipped });
      return res.json({ data, total: data.length });
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/analytics/vehicles/summary */
  router.get('/vehicles/summary', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { from, to } = resolveWindow(windowQuerySchema.parse(req.query));
      const data: VehicleMetricsResult[] = await analytics.summarizeVehicles(from, to);
      const skipped = data.reduce((sum, item) => sum + item.skippedRecords, 0);
      logSkipped('vehicles summary', { skippedRecords: skipped });
      return res.json({ data, total: data.length });
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/analytics/drivers/ranking */
  router.get('/drivers/ranking', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = rankingQuerySchema.parse(req.query);
      const { from, to } = resolveWindow(query);
      const data = await analytics.rankDrivers(from, to, query.metric);
      return res.json({ metric: query.metric, from, to, data });
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/analytics/vehicles/ranking */
  router.get('/vehicles/ranking', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = rankingQuerySchema.parse(req.query);
      const { from, to } = resolveWindow(query);
      const data = await analytics.rankVehicles(from, to, query.metric);
      return res.json({ metric: query.metric, from, to, data });
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/analytics/drivers/:driverId */
  router.get('/drivers/:driverId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { driverId } = driverParamsSchema.parse(req.params);
      const { from, to } = resolveWindow(windowQuerySchema.parse(req.query));
      const [driver, result] = await Promise.all([
        store.findDriver(driverId),
        analytics.computeDriverMetrics(driverId, from, to),
      ]);
      if (!driver && !hasActivity(result)) return res.status(404).json({ error: 'driver not found' });

      logSkipped(`driver ${driverId}`, result);
      return res.json(result);
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/analytics/vehicles/:vehicleId */
  router.get('/vehicles/:vehicleId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { vehicleId } = vehicleParamsSchema.parse(req.params);
      const { from, to } = resolveWindow(windowQuerySchema.parse(req.query));
      const [vehicle, result] = await Promise.all([
        store.findVehicle(vehicleId),
        analytics.computeVehicleMetrics(vehicleId, from, to),
      ]);
      if (!vehicle && !hasActivity(result)) return res.status(404).json({ error: 'vehicle not found' });

      logSkipped(`vehicle ${vehicleId}`, result);
      return res.json(result);
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/analytics/:entityKind/:entityId/monthly */
  router.get('/:entityKind/:entityId/monthly', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const params = monthlyParamsSchema.parse(req.params);
      const query = monthlyQuerySchema.parse(req.query);
      const year = query.year ?? new Date().getUTCFullYear();
      const entityKind = ENTITY_KIND_BY_SEGMENT[params.entityKind];

      const [known, data] = await Promise.all([
        entityKind === 'driver' ? store.findDriver(params.entityId) : store.findVehicle(params.entityId),
        analytics.monthlyBreakdown(params.entityId, entityKind, year),
      ]);
      if (!known && !data.some(hasActivity)) return res.status(404).json({ error: `${entityKind} not found` });

      return res.json({ entityKind, entityId: params.entityId, year, data });
    } catch (err) {
      return next(err);
    }
  });

  return router;
}
