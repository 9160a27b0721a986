import { Router } from 'express';
import { validateRequest } from '../middleware/validateRequest.js';
import type { SkyscannerClient } from '../services/skyscanner.js';
import { SearchResult } from '../types/skyscanner.js';
import { logger } from '../utils/logger.js';
import { describePlace, flightSearchSchema, itineraryDetailsSchema } from './schemas.js';

export function createFlightsRouter(client: SkyscannerClient): Router {
  const router = Router();

  // Flight price search; polls until the backend reports completion
  router.post('/', validateRequest(flightSearchSchema, async (params, req, res) => {
    logger.info('[Flights Route] Search request', {
      origin: params.origin.skyCode,
      destination: describePlace(params.destination),
      cabinClass: params.cabinClass,
      adults: params.adults,
      children: params.childAges.length
    });

    const result = await client.getFlightPrices(params);

    res.json({
      success: true,
      data: {
        sessionId: result.sessionId ?? null,
        searchPayload: result.searchPayload,
        origin: result.origin,
        destination: describePlace(result.destination),
        results: result.json
      }
    });
  }));

  // Details of one itinerary from a previous search response
  router.post('/itinerary', validateRequest(itineraryDetailsSchema, async (body, req, res) => {
    const result = new SearchResult({
      json: null,
      sessionId: body.sessionId,
      searchPayload: body.searchPayload,
      origin: body.origin,
      destination: body.destination
    });

    logger.info('[Flights Route] Itinerary details request', {
      itineraryId: body.itineraryId,
      sessionId: body.sessionId
    });

    const details = await client.getItineraryDetails(body.itineraryId, result);
    res.json({ success: true, data: details });
  }));

  return router;
}

export default createFlightsRouter;
