import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { API_CONFIG } from './config/api.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createCarRentalRouter } from './routes/carRental.js';
import { createFlightsRouter } from './routes/flights.js';
import { createLocationsRouter } from './routes/locations.js';
import type { SkyscannerClient } from './services/skyscanner.js';
import { logger } from './utils/logger.js';

export function createApp(client: SkyscannerClient) {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('dev'));
  }

  // Health check endpoint
  app.get(API_CONFIG.ROUTES.HEALTH, (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      market: client.settings.market,
      locale: client.settings.locale,
      currency: client.settings.currency
    });
  });

  // Routes
  app.use(API_CONFIG.ROUTES.FLIGHTS, createFlightsRouter(client));
  app.use(API_CONFIG.ROUTES.LOCATIONS, createLocationsRouter(client));
  app.use(API_CONFIG.ROUTES.CAR_RENTAL, createCarRentalRouter(client));

  logger.info('Routes mounted', {
    flights: true,
    locations: true,
    carRental: true
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
