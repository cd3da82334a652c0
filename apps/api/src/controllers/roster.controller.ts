import { Router } from 'express';
import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import type { RecordStorePort } from '@fleet-ledger/domain';

const listQuerySchema = z.object({
  active: z.enum(['true', 'false']).optional(),
});

const purposesQuerySchema = z.object({
  includeInactive: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

function activeFilter(raw: 'true' | 'false' | undefined): (entity: { isActive: boolean }) => boolean {
  if (raw === undefined) return () => true;
  const wanted = raw === 'true';
  return (entity) => entity.isActive === wanted;
}

/** Read-only driver, vehicle and trip-purpose listings. */
export function createRosterRouters(store: RecordStorePort): {
  driversRouter: Router;
  vehiclesRouter: Router;
  purposesRouter: Router;
} {
  const driversRouter = Router();
  const vehiclesRouter = Router();
  const purposesRouter = Router();

  /** GET /api/drivers */
  driversRouter.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = (await store.listDrivers()).filter(activeFilter(query.active));
      return res.json({ data, total: data.length });
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/vehicles */
  vehiclesRouter.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = listQuerySchema.parse(req.query);
      const data = (await store.listVehicles()).filter(activeFilter(query.active));
      return res.json({ data, total: data.length });
    } catch (err) {
      return next(err);
    }
  });

  /** GET /api/purposes */
  purposesRouter.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { includeInactive } = purposesQuerySchema.parse(req.query);
      const data = await store.listPurposes({ includeInactive });
      return res.json({ data, total: data.length });
    } catch (err) {
      return next(err);
    }
  });

  return { driversRouter, vehiclesRouter, purposesRouter };
}
