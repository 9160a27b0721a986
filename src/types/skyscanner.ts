// Domain entities shared by the request builders, pollers and routes.

export interface AirportRef {
  readonly title: string;
  readonly entityId: string;
  readonly skyCode: string;
}

export interface LocationRef {
  readonly name: string;
  readonly entityId: string;
  readonly location?: string; // "lat,lon" hint from the location lookup
}

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

export const CABIN_CLASSES = {
  ECONOMY: 'economy',
  PREMIUM_ECONOMY: 'premium_economy',
  BUSINESS: 'business',
  FIRST: 'first'
} as const;

export type CabinClass = typeof CABIN_CLASSES[keyof typeof CABIN_CLASSES];

export const SPECIAL_MARKERS = {
  ANYTIME: 'anytime',
  EVERYWHERE: 'everywhere'
} as const;

export type SpecialMarker = typeof SPECIAL_MARKERS[keyof typeof SPECIAL_MARKERS];

// Markers that turn a search into a flexible one (economy cabin only)
export const FLEXIBLE_MARKERS: ReadonlySet<SpecialMarker> = new Set<SpecialMarker>([
  SPECIAL_MARKERS.ANYTIME,
  SPECIAL_MARKERS.EVERYWHERE
]);

export interface CalendarDate {
  readonly year: number;
  readonly month: number; // 1-12
  readonly day: number;
}

export type PlaceOrSpecial =
  | { readonly kind: 'airport'; readonly airport: AirportRef }
  | { readonly kind: 'special'; readonly marker: SpecialMarker };

export type DateOrSpecial =
  | { readonly kind: 'date'; readonly date: CalendarDate }
  | { readonly kind: 'special'; readonly marker: SpecialMarker };

export type RentalPlace =
  | { readonly kind: 'airport'; readonly airport: AirportRef }
  | { readonly kind: 'location'; readonly location: LocationRef }
  | { readonly kind: 'coordinates'; readonly coordinates: Coordinates };

export const airportPlace = (airport: AirportRef): PlaceOrSpecial =>
  Object.freeze({ kind: 'airport', airport: Object.freeze({ ...airport }) });

export const specialPlace = (marker: SpecialMarker): PlaceOrSpecial =>
  Object.freeze({ kind: 'special', marker });

export const calendarDate = (year: number, month: number, day: number): DateOrSpecial =>
  Object.freeze({ kind: 'date', date: Object.freeze({ year, month, day }) });

export const specialDate = (marker: SpecialMarker): DateOrSpecial =>
  Object.freeze({ kind: 'special', marker });

export const airportRental = (airport: AirportRef): RentalPlace =>
  Object.freeze({ kind: 'airport', airport: Object.freeze({ ...airport }) });

export const locationRental = (location: LocationRef): RentalPlace =>
  Object.freeze({ kind: 'location', location: Object.freeze({ ...location }) });

export const coordinatesRental = (coordinates: Coordinates): RentalPlace =>
  Object.freeze({ kind: 'coordinates', coordinates: Object.freeze({ ...coordinates }) });

/** Local calendar day of a Date. */
export function toCalendarDate(date: Date): CalendarDate {
  return Object.freeze({
    year: date.getFullYear(),
    month: date.getMonth() + 1,
    day: date.getDate()
  });
}

/** Negative when `a` is before `b`, zero on the same day. */
export function compareCalendarDates(a: CalendarDate, b: CalendarDate): number {
  return (a.year - b.year) || (a.month - b.month) || (a.day - b.day);
}

export function formatCalendarDate(date: CalendarDate): string {
  const m = String(date.month).padStart(2, '0');
  const d = String(date.day).padStart(2, '0');
  return `${date.year}-${m}-${d}`;
}

// Wire shapes of the unified-search request

export type DatePayload =
  | { '@type': 'date'; year: number; month: number; day: number }
  | { '@type': SpecialMarker };

export type PlacePayload =
  | { '@type': 'entity'; entityId: string }
  | { '@type': SpecialMarker };

export interface LegPayload {
  dates: DatePayload;
  legOrigin: PlacePayload;
  legDestination: PlacePayload;
  placeOfStay: string;
}

export interface SearchPayload {
  adults: number;
  childAges: number[];
  cabinClass: CabinClass;
  legs: LegPayload[];
  options: null;
}

export interface UserPreferences {
  market: string;
  currencyCode: string;
  locale: string;
}

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type FrozenSearchPayload = DeepReadonly<SearchPayload>;

function deepFreeze(value: unknown): void {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
}

export interface SearchResultInit {
  json: unknown;
  sessionId?: string;
  searchPayload: SearchPayload | FrozenSearchPayload;
  origin: AirportRef;
  destination: PlaceOrSpecial;
}

/**
 * A completed flight search: the raw payload, the latest session id and the
 * request that produced it. Itinerary detail lookups are built from this.
 */
export class SearchResult {
  readonly json: unknown;
  readonly sessionId?: string;
  readonly searchPayload: FrozenSearchPayload;
  readonly origin: AirportRef;
  readonly destination: PlaceOrSpecial;

  constructor(init: SearchResultInit) {
    this.json = init.json;
    this.sessionId = init.sessionId;
    const payload = structuredClone(init.searchPayload);
    deepFreeze(payload);
    this.searchPayload = payload;
    this.origin = init.origin;
    this.destination = init.destination;
  }
}
