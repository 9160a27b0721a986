import {
  API_CONFIG,
  CAR_RENTAL_DEFAULT_PARAMS,
  DRIVER_AGE,
  fillTemplate
} from '../config/api.js';
import { ValidationError } from '../types/errors.js';
import {
  type AirportRef,
  type CabinClass,
  type DateOrSpecial,
  type DatePayload,
  type LegPayload,
  type PlaceOrSpecial,
  type PlacePayload,
  type RentalPlace,
  type SearchPayload,
  type SearchResult,
  type UserPreferences,
  locationRental
} from '../types/skyscanner.js';

export interface FlightSearchParams {
  origin: AirportRef;
  destination: PlaceOrSpecial;
  departDate: DateOrSpecial;
  returnDate?: DateOrSpecial;
  cabinClass: CabinClass;
  adults: number;
  childAges: number[];
}

function encodeDate(date: DateOrSpecial): DatePayload {
  switch (date.kind) {
    case 'date':
      return { '@type': 'date', year: date.date.year, month: date.date.month, day: date.date.day };
    case 'special':
      return { '@type': date.marker };
  }
}

function encodePlace(place: PlaceOrSpecial): PlacePayload {
  switch (place.kind) {
    case 'airport':
      return { '@type': 'entity', entityId: place.airport.entityId };
    case 'special':
      return { '@type': place.marker };
  }
}

/**
 * One directional leg of a unified search. `placeOfStay` anchors the leg to
 * the concrete side: the destination when known, the origin otherwise.
 */
export function buildLeg(date: DateOrSpecial, origin: PlaceOrSpecial, destination: PlaceOrSpecial): LegPayload {
  let placeOfStay: string;
  if (destination.kind === 'airport') {
    placeOfStay = destination.airport.entityId;
  } else if (origin.kind === 'airport') {
    placeOfStay = origin.airport.entityId;
  } else {
    throw new ValidationError('A leg needs a concrete origin or destination');
  }

  return {
    dates: encodeDate(date),
    legOrigin: encodePlace(origin),
    legDestination: encodePlace(destination),
    placeOfStay
  };
}

export function buildSearchPayload(params: FlightSearchParams): SearchPayload {
  const origin: PlaceOrSpecial = { kind: 'airport', airport: params.origin };
  const legs = [buildLeg(params.departDate, origin, params.destination)];

  if (params.returnDate) {
    legs.push(buildLeg(params.returnDate, params.destination, origin));
  }

  return {
    adults: params.adults,
    childAges: [...params.childAges],
    cabinClass: params.cabinClass,
    legs,
    options: null
  };
}

export interface DetailLeg {
  originIata: string;
  destinationIata: string;
  date: { year: number; month: number; day: number };
  addAlternativeOrigins: boolean;
  addAlternativeDestinations: boolean;
  originSkyscannerCode: string;
  destinationSkyscannerCode: string;
  originEntityId: string;
  destinationEntityId: string;
}

export interface DetailPayload {
  itineraryId: string;
  searchSessionId: string;
  featuresEnabled: string[];
  userPreferences: UserPreferences;
  searchRequestDetails: {
    adults: number;
    cabinClass: CabinClass;
    childAges?: number[];
    legs: DetailLeg[];
  };
  options: {
    totalCostOptions: {
      fareAttributeFilters: string[];
    };
  };
}

function entityIdOf(place: PlacePayload, side: string, index: number): string {
  if (place['@type'] !== 'entity') {
    throw new ValidationError(`Leg ${index} has no concrete ${side}, itinerary details need both ends`);
  }
  return place.entityId;
}

/**
 * Resolves a leg endpoint to a sky code. Outbound and return legs swap
 * origin and destination, so each endpoint is matched on its own.
 */
function resolveCode(entityId: string, preferred: AirportRef, other: AirportRef, index: number): string {
  if (entityId === preferred.entityId) return preferred.skyCode;
  if (entityId === other.entityId) return other.skyCode;
  throw new ValidationError(`Leg ${index} place ${entityId} matches neither the searched origin nor destination`);
}

export function buildItineraryDetailRequest(
  itineraryId: string,
  result: SearchResult,
  preferences: UserPreferences
): DetailPayload {
  if (!itineraryId.trim()) {
    throw new ValidationError('An itinerary id is required');
  }
  if (!result.sessionId) {
    throw new ValidationError('The search result carries no session id, itinerary details are unavailable');
  }
  if (result.destination.kind !== 'airport') {
    throw new ValidationError('Itinerary details need a search with a concrete destination');
  }

  const { origin, searchPayload } = result;
  const destination = result.destination.airport;

  const legs = searchPayload.legs.map((leg, index): DetailLeg => {
    const originId = entityIdOf(leg.legOrigin, 'origin', index);
    const destinationId = entityIdOf(leg.legDestination, 'destination', index);

    const originIata = resolveCode(originId, origin, destination, index);
    const destinationIata = resolveCode(destinationId, destination, origin, index);

    if (leg.dates['@type'] !== 'date') {
      throw new ValidationError(`Leg ${index} has a flexible date, itinerary details need a concrete one`);
    }
    const { year, month, day } = leg.dates;

    return {
      originIata,
      destinationIata,
      date: { year, month, day },
      addAlternativeOrigins: false,
      addAlternativeDestinations: false,
      originSkyscannerCode: originIata,
      destinationSkyscannerCode: destinationIata,
      originEntityId: '',
      destinationEntityId: ''
    };
  });

  const payload: DetailPayload = {
    itineraryId,
    searchSessionId: result.sessionId,
    featuresEnabled: ['FEATURES_ENABLED_ITINERARY_LEGACY_INFO'],
    userPreferences: { ...preferences },
    searchRequestDetails: {
      adults: searchPayload.adults,
      cabinClass: searchPayload.cabinClass,
      legs
    },
    options: {
      totalCostOptions: {
        fareAttributeFilters: ['ATTRIBUTE_CABIN_BAGGAGE', 'ATTRIBUTE_CHECKED_BAGGAGE']
      }
    }
  };

  if (searchPayload.childAges.length > 0) {
    payload.searchRequestDetails.childAges = [...searchPayload.childAges];
  }

  return payload;
}

// Car rental

export interface CarRentalParams {
  origin: RentalPlace;
  destination?: RentalPlace;
  departTime: Date;
  returnTime: Date;
  driverOver25: boolean;
}

export interface CarRentalQuery {
  url: string;
  params: Record<string, string>;
}

function encodeRentalPlace(place: RentalPlace): string {
  switch (place.kind) {
    case 'airport':
      return place.airport.entityId;
    case 'location':
      return place.location.entityId;
    case 'coordinates':
      return `${place.coordinates.latitude},${place.coordinates.longitude}`;
  }
}

/** Backend-local date-time, `YYYY-MM-DDTHH:mm`. */
export function formatLocalDateTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}T${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

export function buildCarRentalQuery(
  params: CarRentalParams,
  preferences: UserPreferences
): CarRentalQuery {
  const destination = params.destination ?? params.origin;

  const url = fillTemplate(API_CONFIG.ENDPOINTS.CAR_RENTAL, {
    market: preferences.market,
    locale: preferences.locale,
    currency: preferences.currencyCode,
    driverAge: params.driverOver25 ? DRIVER_AGE.OVER_25 : DRIVER_AGE.UNDER_25,
    firstLocation: encodeRentalPlace(params.origin),
    secondLocation: encodeRentalPlace(destination),
    firstDate: formatLocalDateTime(params.departTime),
    secondDate: formatLocalDateTime(params.returnTime)
  });

  return { url, params: { ...CAR_RENTAL_DEFAULT_PARAMS } };
}

const LOCAL_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2}))?$/;

function parseLocalDateTime(value: string): Date {
  const match = LOCAL_DATE_TIME.exec(value);
  if (!match) {
    throw new ValidationError(`Invalid date-time in car rental URL: ${value}`);
  }
  const [, year, month, day, hour, minute, second = '0'] = match;
  const date = new Date(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second));
  if (date.getMonth() !== Number(month) - 1 || date.getDate() !== Number(day)) {
    throw new ValidationError(`Invalid date-time in car rental URL: ${value}`);
  }
  return date;
}

/**
 * Reads a public car-hire quotes URL, e.g.
 * https://www.skyscanner.net/g/carhire-quotes/GB/en-GB/GBP/30/27544008/27544008/2025-07-01T10:00/2025-08-01T10:00/
 */
export function parseCarRentalUrl(url: string): CarRentalParams {
  const args = url.split('?')[0].split('/');
  if (args.length < 14) {
    throw new ValidationError('URL not valid');
  }

  if (!/^\d+$/.test(args[8])) {
    throw new ValidationError(`Invalid driver age in car rental URL: ${args[8]}`);
  }
  const age = Number(args[8]);

  return {
    origin: locationRental({ name: '', entityId: decodeURIComponent(args[9]) }),
    destination: locationRental({ name: '', entityId: decodeURIComponent(args[10]) }),
    departTime: parseLocalDateTime(decodeURIComponent(args[11])),
    returnTime: parseLocalDateTime(decodeURIComponent(args[12])),
    driverOver25: age >= 25
  };
}
