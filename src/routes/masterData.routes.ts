import { Router, type Request, type Response } from 'express';
import type { LedgerContext } from '../domains/inventory/unitOfWork';
import { resolveActor } from '../middleware/actor';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { sendInvalidRequest, validateUuidParam } from '../middleware/validation/schema';
import {
  itemListQuerySchema,
  itemSchema,
  itemUpdateSchema,
  locationListQuerySchema,
  locationSchema,
  locationUpdateSchema
} from '../schemas/masterData.schema';
import {
  createItem,
  createLocation,
  deactivateItem,
  deactivateLocation,
  getItem,
  getLocation,
  listItems,
  listLocations,
  updateItem,
  updateLocation
} from '../services/masterData.service';

export function createMasterDataRouter(ctx: LedgerContext) {
  const router = Router();

  router.post(
    '/items',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = itemSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid item.', parsed.error);
      }
      const item = await createItem(ctx, parsed.data, resolveActor(req));
      return res.status(201).json(item);
    })
  );

  router.get(
    '/items',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = itemListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const limit = parsed.data.limit ?? 100;
      const offset = parsed.data.offset ?? 0;
      const items = await listItems(ctx, {
        activeOnly: parsed.data.active_only !== 'false',
        search: parsed.data.search,
        limit,
        offset
      });
      return res.json({ data: items, paging: { limit, offset } });
    })
  );

  router.get(
    '/items/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getItem(ctx, req.params.id));
    })
  );

  router.patch(
    '/items/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = itemUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid item update.', parsed.error);
      }
      return res.json(await updateItem(ctx, req.params.id, parsed.data, resolveActor(req)));
    })
  );

  router.delete(
    '/items/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await deactivateItem(ctx, req.params.id, resolveActor(req)));
    })
  );

  router.post(
    '/locations',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = locationSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid location.', parsed.error);
      }
      const location = await createLocation(ctx, parsed.data, resolveActor(req));
      return res.status(201).json(location);
    })
  );

  router.get(
    '/locations',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = locationListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid query parameters.', parsed.error);
      }
      const locations = await listLocations(ctx, { activeOnly: parsed.data.active_only !== 'false' });
      return res.json({ data: locations });
    })
  );

  router.get(
    '/locations/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getLocation(ctx, req.params.id));
    })
  );

  router.patch(
    '/locations/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = locationUpdateSchema.safeParse(req.body);
      if (!parsed.success) {
        return sendInvalidRequest(res, 'Invalid location update.', parsed.error);
      }
      return res.json(await updateLocation(ctx, req.params.id, parsed.data, resolveActor(req)));
    })
  );

  router.delete(
    '/locations/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await deactivateLocation(ctx, req.params.id, resolveActor(req)));
    })
  );

  return router;
}
