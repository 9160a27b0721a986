import { randomUUID } from 'crypto';
import { API_CONFIG } from '../config/api.js';
import { IncompleteSearchError, TransportError, ValidationError } from '../types/errors.js';
import {
  type AirportRef,
  CABIN_CLASSES,
  type CabinClass,
  type DateOrSpecial,
  FLEXIBLE_MARKERS,
  type PlaceOrSpecial,
  SearchResult,
  compareCalendarDates,
  toCalendarDate
} from '../types/skyscanner.js';
import { type Clock, type Sleep, sleep, systemClock } from '../utils/clock.js';
import { logSearch } from '../utils/logger.js';
import { buildSearchPayload } from './requestBuilder.js';
import { completedSessionId, readSearchStatus, unwrap } from './responseClassifier.js';
import type { HttpTransport } from './transport.js';

export interface FlightPriceParams {
  origin: AirportRef;
  destination: PlaceOrSpecial;
  departDate?: DateOrSpecial;
  returnDate?: DateOrSpecial;
  cabinClass?: CabinClass;
  adults?: number;
  childAges?: number[];
}

export interface PollingOptions {
  retryDelay: number; // seconds
  maxRetries: number;
}

export interface SearchSessionDeps {
  clock?: Clock;
  sleep?: Sleep;
}

const MAX_ADULTS = 8;
const MAX_CHILDREN = 8;
const MAX_CHILD_AGE = 17;

const isFlexible = (value: DateOrSpecial | PlaceOrSpecial | undefined): boolean =>
  value?.kind === 'special' && FLEXIBLE_MARKERS.has(value.marker);

/**
 * Drives a unified flight search: one initiate request, then polling until
 * the backend reports the search complete. The backend may hand the search
 * to another session between polls, so every poll goes to the session id
 * returned by the previous response.
 */
export class SearchSessionController {
  private readonly clock: Clock;
  private readonly sleep: Sleep;

  constructor(
    private readonly transport: HttpTransport,
    private readonly options: PollingOptions,
    deps: SearchSessionDeps = {}
  ) {
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? sleep;
  }

  validate(params: FlightPriceParams): void {
    const adults = params.adults ?? 1;
    const childAges = params.childAges ?? [];
    const cabinClass = params.cabinClass ?? CABIN_CLASSES.ECONOMY;
    const { departDate, returnDate, destination } = params;

    if (!Number.isInteger(adults) || adults < 1 || adults > MAX_ADULTS) {
      throw new ValidationError(`Adults must be between 1 and ${MAX_ADULTS}`);
    }
    if (childAges.length > MAX_CHILDREN) {
      throw new ValidationError(`Max ${MAX_ADULTS} adults and ${MAX_CHILDREN} children`);
    }
    if (!childAges.every(age => Number.isInteger(age) && age >= 0 && age <= MAX_CHILD_AGE)) {
      throw new ValidationError('Child ages must be >= 0 and < 18');
    }

    if (departDate?.kind === 'date' && returnDate?.kind === 'date'
      && compareCalendarDates(returnDate.date, departDate.date) < 0) {
      throw new ValidationError('Return date cannot be past departure');
    }

    const today = toCalendarDate(this.clock.now());
    for (const date of [departDate, returnDate]) {
      if (date?.kind === 'date' && compareCalendarDates(date.date, today) < 0) {
        throw new ValidationError('Depart date or return date cannot be in the past');
      }
    }

    if ((isFlexible(departDate) || isFlexible(returnDate) || isFlexible(destination))
      && cabinClass !== CABIN_CLASSES.ECONOMY) {
      throw new ValidationError(
        "To search for cabin class that's not economy enter depart date, return date and destination"
      );
    }
  }

  async search(params: FlightPriceParams): Promise<SearchResult> {
    this.validate(params);

    const searchPayload = buildSearchPayload({
      origin: params.origin,
      destination: params.destination,
      departDate: params.departDate ?? { kind: 'date', date: toCalendarDate(this.clock.now()) },
      returnDate: params.returnDate,
      cabinClass: params.cabinClass ?? CABIN_CLASSES.ECONOMY,
      adults: params.adults ?? 1,
      childAges: params.childAges ?? []
    });

    const headers = {
      'X-Skyscanner-Viewid': randomUUID(),
      'Content-Type': 'application/json; charset=UTF-8',
      'Accept-Encoding': 'gzip, deflate, br'
    };

    logSearch.started(API_CONFIG.ENDPOINTS.UNIFIED_SEARCH, {
      origin: params.origin.skyCode,
      legs: searchPayload.legs.length,
      cabinClass: searchPayload.cabinClass
    });

    const toResult = (payload: Record<string, unknown>, attempts: number): SearchResult => {
      const sessionId = completedSessionId(payload);
      logSearch.completed(attempts, sessionId);
      return new SearchResult({
        json: payload,
        sessionId,
        searchPayload,
        origin: params.origin,
        destination: params.destination
      });
    };

    const initial = await this.transport.request({
      method: 'POST',
      url: API_CONFIG.ENDPOINTS.UNIFIED_SEARCH,
      json: searchPayload,
      headers
    });
    let reading = readSearchStatus(unwrap(initial, 'Error while starting flight search'));

    if (reading.status === 'complete') {
      return toResult(reading.payload, 0);
    }

    let sessionId = this.requireSessionId(reading.sessionId, initial.body);

    for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
      await this.sleep(this.options.retryDelay * 1000);

      const response = await this.transport.request({
        method: 'GET',
        url: API_CONFIG.ENDPOINTS.UNIFIED_SEARCH + sessionId,
        headers
      });
      reading = readSearchStatus(unwrap(response, 'Error while scraping flight'));
      logSearch.polled(attempt, sessionId, reading.status);

      if (reading.status === 'complete') {
        return toResult(reading.payload, attempt);
      }
      sessionId = this.requireSessionId(reading.sessionId, response.body);
    }

    logSearch.exhausted(this.options.maxRetries);
    throw new IncompleteSearchError(this.options.maxRetries);
  }

  private requireSessionId(sessionId: string | undefined, body: string): string {
    if (!sessionId) {
      throw new TransportError('Unified search: incomplete response without a session id', 200, body);
    }
    return sessionId;
  }
}
