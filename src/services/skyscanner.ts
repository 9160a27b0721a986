import { randomUUID } from 'crypto';
import { ANDROID_CLIENT, API_CONFIG, fillTemplate } from '../config/api.js';
import { DEFAULT_SEARCH_SETTINGS, type SearchSettings } from '../config/env.js';
import { ConfigurationError, NotFoundError, TransportError, ValidationError } from '../types/errors.js';
import {
  type AirportRef,
  type CalendarDate,
  type LocationRef,
  type SearchResult,
  type UserPreferences,
  formatCalendarDate
} from '../types/skyscanner.js';
import { type Clock, type Sleep, sleep, systemClock } from '../utils/clock.js';
import { logger } from '../utils/logger.js';
import type { AuthToken, AuthTokenProvider } from './authToken.js';
import { type CarRentalListing, StabilizationPoller } from './carRental.js';
import {
  type CarRentalParams,
  buildCarRentalQuery,
  buildItineraryDetailRequest,
  parseCarRentalUrl
} from './requestBuilder.js';
import { isRecord, readJson, unwrap } from './responseClassifier.js';
import { type FlightPriceParams, SearchSessionController } from './searchSession.js';
import { ANDROID_PROFILE, AxiosTransport, type ClientProfile, type HttpTransport } from './transport.js';

export interface SkyscannerClientOptions extends Partial<SearchSettings> {
  profile?: ClientProfile;
}

export interface SkyscannerClientDeps {
  tokenProvider?: AuthTokenProvider;
  // Builds the transport from the identity headers; defaults to axios
  transportFactory?: (headers: Record<string, string>, settings: SearchSettings) => HttpTransport;
  clock?: Clock;
  sleep?: Sleep;
}

export function buildIdentityHeaders(settings: SearchSettings, auth: AuthToken): Record<string, string> {
  return {
    'X-Skyscanner-ChannelId': ANDROID_CLIENT.CHANNEL_ID,
    'X-Skyscanner-Currency': settings.currency,
    'X-Skyscanner-Locale': settings.locale,
    'X-Skyscanner-Market': settings.market,
    'X-Skyscanner-Device': ANDROID_CLIENT.DEVICE,
    'X-Skyscanner-Device-Class': ANDROID_CLIENT.DEVICE_CLASS,
    'X-Skyscanner-Client-Type': ANDROID_CLIENT.CLIENT_TYPE,
    'X-Skyscanner-Client-Network-Type': 'WIFI',
    'Content-Type': 'application/json; charset=UTF-8',
    'X-Px-Authorization': auth.token,
    'X-PX-Os': 'Android',
    'X-Px-Uuid': auth.uuid,
    'X-Px-Mobile-Sdk-Version': ANDROID_CLIENT.PX_SDK_VERSION
  };
}

function itineraryHeaders(): Record<string, string> {
  return {
    'grpc-metadata-x-skyscanner-devicedetection-istablet': 'false',
    'grpc-metadata-x-skyscanner-devicedetection-ismobile': 'true',
    'grpc-metadata-x-skyscanner-channelid': ANDROID_CLIENT.CHANNEL_ID,
    'grpc-metadata-x-skyscanner-viewid': randomUUID(),
    'grpc-metadata-x-skyscanner-clientid': 'skyscanner_app',
    'grpc-metadata-x-skyscanner-client-type': ANDROID_CLIENT.CLIENT_TYPE,
    'grpc-metadata-skyscanner-flights-config-session-id': randomUUID(),
    'grpc-metadata-x-skyscanner-consent-information': 'true',
    'grpc-metadata-x-skyscanner-consent-adverts': 'true',
    'content-type': 'application/json; charset=utf-8',
    'accept-encoding': 'gzip'
  };
}

const asString = (value: unknown): string => (typeof value === 'string' ? value : '');

function toAirport(entry: unknown): AirportRef | null {
  if (!isRecord(entry) || !isRecord(entry.presentation) || !isRecord(entry.navigation)) return null;
  const params = entry.navigation.relevantFlightParams;
  const skyCode = isRecord(params) ? asString(params.skyId) : '';
  const entityId = asString(entry.navigation.entityId);
  if (!entityId || !skyCode) return null;
  return Object.freeze({ title: asString(entry.presentation.title), entityId, skyCode });
}

function toLocation(entry: unknown): LocationRef | null {
  if (!isRecord(entry)) return null;
  const entityId = asString(entry.entity_id);
  if (!entityId) return null;
  const location = asString(entry.location);
  return Object.freeze({
    name: asString(entry.entity_name),
    entityId,
    ...(location ? { location } : {})
  });
}

/**
 * Client for the flight and car rental search backend. Identity headers are
 * resolved once in `create` and shared, read-only, by every search.
 */
export class SkyscannerClient {
  readonly settings: SearchSettings;
  private readonly flights: SearchSessionController;
  private readonly carRental: StabilizationPoller;
  private readonly clock: Clock;

  constructor(
    private readonly transport: HttpTransport,
    settings: SearchSettings,
    deps: Pick<SkyscannerClientDeps, 'clock' | 'sleep'> = {}
  ) {
    this.settings = Object.freeze({ ...settings });
    this.clock = deps.clock ?? systemClock;
    const polling = { retryDelay: this.settings.retryDelay, maxRetries: this.settings.maxRetries };
    this.flights = new SearchSessionController(transport, polling, { clock: this.clock, sleep: deps.sleep });
    this.carRental = new StabilizationPoller(transport, polling, deps.sleep ?? sleep);
  }

  static async create(options: SkyscannerClientOptions = {}, deps: SkyscannerClientDeps = {}): Promise<SkyscannerClient> {
    const { profile = ANDROID_PROFILE, ...overrides } = options;
    const settings: SearchSettings = { ...DEFAULT_SEARCH_SETTINGS, ...overrides };

    let auth: AuthToken;
    if (settings.pxAuthorization) {
      auth = { token: settings.pxAuthorization, uuid: settings.pxUuid ?? randomUUID() };
    } else if (deps.tokenProvider) {
      auth = await deps.tokenProvider.generate(settings.proxy, settings.verify);
    } else {
      throw new ConfigurationError('No PX authorization token supplied and no token provider configured');
    }

    const headers = buildIdentityHeaders(settings, auth);
    const transport = deps.transportFactory
      ? deps.transportFactory(headers, settings)
      : new AxiosTransport({ headers, profile, proxy: settings.proxy, verify: settings.verify });

    logger.info('Search client initialized', {
      profile: profile.name,
      locale: settings.locale,
      market: settings.market,
      currency: settings.currency,
      proxy: Boolean(settings.proxy),
      verify: settings.verify
    });

    return new SkyscannerClient(transport, settings, { clock: deps.clock, sleep: deps.sleep });
  }

  get preferences(): UserPreferences {
    return {
      market: this.settings.market,
      currencyCode: this.settings.currency,
      locale: this.settings.locale
    };
  }

  getFlightPrices(params: FlightPriceParams): Promise<SearchResult> {
    return this.flights.search(params);
  }

  async searchAirports(query: string, departDate?: CalendarDate, returnDate?: CalendarDate): Promise<AirportRef[]> {
    const response = await this.transport.request({
      method: 'GET',
      url: API_CONFIG.ENDPOINTS.SEARCH_ORIGIN,
      params: {
        query,
        inboundDate: departDate ? formatCalendarDate(departDate) : '',
        outboundDate: returnDate ? formatCalendarDate(returnDate) : ''
      }
    });
    const body = unwrap(response, 'Error when scraping airports');
    const data = readJson(body, 'Airport search');
    const suggestions = isRecord(data) ? data.inputSuggest : undefined;
    if (!Array.isArray(suggestions)) {
      throw new TransportError('Airport search: response has no inputSuggest list', response.status, body);
    }
    return suggestions.map(toAirport).filter((airport): airport is AirportRef => airport !== null);
  }

  async getAirportByCode(code: string): Promise<AirportRef> {
    const wanted = code.trim().toUpperCase();
    const airports = await this.searchAirports(wanted);
    const airport = airports.find(candidate => candidate.skyCode.toUpperCase() === wanted);
    if (!airport) {
      throw new NotFoundError(`IATA code not found: ${code}`);
    }
    return airport;
  }

  async searchLocations(query: string): Promise<LocationRef[]> {
    const url = fillTemplate(API_CONFIG.ENDPOINTS.LOCATION_SEARCH, {
      locale: this.settings.locale,
      market: this.settings.market
    }) + encodeURIComponent(query);

    const response = await this.transport.request({
      method: 'GET',
      url,
      params: { autosuggestExp: 'neighborhood_b' }
    });
    const body = unwrap(response, 'Error when scraping locations');
    const data = readJson(body, 'Location search');
    if (!Array.isArray(data)) {
      throw new TransportError('Location search: response is not a list', response.status, body);
    }
    return data.map(toLocation).filter((location): location is LocationRef => location !== null);
  }

  async getItineraryDetails(itineraryId: string, result: SearchResult): Promise<unknown> {
    const payload = buildItineraryDetailRequest(itineraryId, result, this.preferences);
    const response = await this.transport.request({
      method: 'POST',
      url: API_CONFIG.ENDPOINTS.ITINERARY_DETAILS,
      json: payload,
      headers: itineraryHeaders()
    });
    return readJson(unwrap(response, 'Error fetching itinerary details'), 'Itinerary details');
  }

  async getCarRental(params: CarRentalParams): Promise<CarRentalListing> {
    const { departTime, returnTime } = params;
    if (Number.isNaN(departTime.getTime()) || Number.isNaN(returnTime.getTime())) {
      throw new ValidationError('Depart and return time must be valid dates');
    }
    if (returnTime < departTime) {
      throw new ValidationError('Return time cannot be past depart time');
    }
    const now = this.clock.now();
    if (returnTime < now || departTime < now) {
      throw new ValidationError('Return or depart time cannot be in the past');
    }

    const query = buildCarRentalQuery(params, this.preferences);
    logger.info('Searching car rental', { url: query.url, driverOver25: params.driverOver25 });
    return this.carRental.poll(query);
  }

  async getCarRentalFromUrl(url: string): Promise<CarRentalListing> {
    return this.getCarRental(parseCarRentalUrl(url));
  }
}
