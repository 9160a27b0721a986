import { Router } from 'express';
import { validateRequest } from '../middleware/validateRequest.js';
import type { SkyscannerClient } from '../services/skyscanner.js';
import { logger } from '../utils/logger.js';
import { carRentalSchema, carRentalUrlSchema } from './schemas.js';

export function createCarRentalRouter(client: SkyscannerClient): Router {
  const router = Router();

  router.post('/', validateRequest(carRentalSchema, async (params, req, res) => {
    logger.info('[Car Rental Route] Search request', {
      origin: params.origin.kind,
      departTime: params.departTime.toISOString(),
      returnTime: params.returnTime.toISOString()
    });
    const listing = await client.getCarRental(params);
    res.json({ success: true, data: listing });
  }));

  router.post('/from-url', validateRequest(carRentalUrlSchema, async ({ url }, req, res) => {
    logger.info('[Car Rental Route] Search from URL', { url });
    const listing = await client.getCarRentalFromUrl(url);
    res.json({ success: true, data: listing });
  }));

  return router;
}

export default createCarRentalRouter;
