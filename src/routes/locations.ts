import { Router } from 'express';
import { validateRequest } from '../middleware/validateRequest.js';
import type { SkyscannerClient } from '../services/skyscanner.js';
import { logger } from '../utils/logger.js';
import { airportCodeSchema, airportQuerySchema, locationQuerySchema } from './schemas.js';

export function createLocationsRouter(client: SkyscannerClient): Router {
  const router = Router();

  // Airport autosuggest
  router.get('/airports', validateRequest(airportQuerySchema, async ({ query, departDate, returnDate }, req, res) => {
    logger.info('Searching airports', { query });
    const airports = await client.searchAirports(query, departDate, returnDate);
    res.json({
      success: true,
      data: airports,
      count: airports.length
    });
  }, 'query'));

  router.get('/airports/:code', validateRequest(airportCodeSchema, async ({ code }, req, res) => {
    logger.info('Fetching airport by code', { code });
    const airport = await client.getAirportByCode(code);
    res.json({ success: true, data: airport });
  }, 'params'));

  // Car rental pick-up / drop-off places
  router.get('/search', validateRequest(locationQuerySchema, async ({ query }, req, res) => {
    logger.info('Searching locations', { query });
    const locations = await client.searchLocations(query);
    res.json({
      success: true,
      data: locations,
      count: locations.length
    });
  }, 'query'));

  return router;
}

export default createLocationsRouter;
