export * from './types/skyscanner.js';
export * from './types/errors.js';
export { SkyscannerClient } from './services/skyscanner.js';
export type { SkyscannerClientOptions, SkyscannerClientDeps } from './services/skyscanner.js';
export { SearchSessionController } from './services/searchSession.js';
export type { FlightPriceParams, PollingOptions } from './services/searchSession.js';
export { StabilizationPoller } from './services/carRental.js';
export type { CarRentalListing } from './services/carRental.js';
export {
  buildLeg,
  buildSearchPayload,
  buildItineraryDetailRequest,
  buildCarRentalQuery,
  parseCarRentalUrl
} from './services/requestBuilder.js';
export type { CarRentalParams, CarRentalQuery, DetailPayload } from './services/requestBuilder.js';
export { classify, captchaUrl } from './services/responseClassifier.js';
export type { Classification } from './services/responseClassifier.js';
export { AxiosTransport, ANDROID_PROFILE } from './services/transport.js';
export type { HttpTransport, HttpRequest, HttpResponse, ClientProfile } from './services/transport.js';
export { StaticTokenProvider } from './services/authToken.js';
export type { AuthToken, AuthTokenProvider } from './services/authToken.js';
export { createApp } from './app.js';
export { loadConfig } from './config/env.js';
