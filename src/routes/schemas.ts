import { z } from 'zod';
import {
  CABIN_CLASSES,
  type PlaceOrSpecial,
  SPECIAL_MARKERS,
  airportPlace,
  calendarDate,
  specialDate,
  specialPlace
} from '../types/skyscanner.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

export const markerSchema = z.enum([SPECIAL_MARKERS.ANYTIME, SPECIAL_MARKERS.EVERYWHERE]);

export const cabinClassSchema = z.enum([
  CABIN_CLASSES.ECONOMY,
  CABIN_CLASSES.PREMIUM_ECONOMY,
  CABIN_CLASSES.BUSINESS,
  CABIN_CLASSES.FIRST
]);

export const airportSchema = z.object({
  title: z.string().default(''),
  entityId: z.string().min(1),
  skyCode: z.string().min(2)
});

export const isoDateSchema = z
  .string()
  .regex(ISO_DATE, 'Expected a YYYY-MM-DD date')
  .transform((value, ctx) => {
    const [year, month, day] = value.split('-').map(Number);
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Not a calendar date: ${value}` });
      return z.NEVER;
    }
    return { year, month, day };
  });

export const dateOrSpecialSchema = z.union([
  markerSchema.transform(specialDate),
  isoDateSchema.transform(date => calendarDate(date.year, date.month, date.day))
]);

export const destinationSchema = z.union([
  markerSchema.transform(specialPlace),
  airportSchema.transform(airportPlace)
]);

export const flightSearchSchema = z.object({
  origin: airportSchema,
  destination: destinationSchema,
  departDate: dateOrSpecialSchema.optional(),
  returnDate: dateOrSpecialSchema.optional(),
  cabinClass: cabinClassSchema.default(CABIN_CLASSES.ECONOMY),
  // ranges are checked by the search controller
  adults: z.number().int().default(1),
  childAges: z.array(z.number().int()).default([])
});

const datePayloadSchema = z.union([
  z.object({
    '@type': z.literal('date'),
    year: z.number().int(),
    month: z.number().int().min(1).max(12),
    day: z.number().int().min(1).max(31)
  }),
  z.object({ '@type': markerSchema })
]);

const placePayloadSchema = z.union([
  z.object({ '@type': z.literal('entity'), entityId: z.string().min(1) }),
  z.object({ '@type': markerSchema })
]);

export const searchPayloadSchema = z.object({
  adults: z.number().int(),
  childAges: z.array(z.number().int()),
  cabinClass: cabinClassSchema,
  legs: z
    .array(
      z.object({
        dates: datePayloadSchema,
        legOrigin: placePayloadSchema,
        legDestination: placePayloadSchema,
        placeOfStay: z.string()
      })
    )
    .min(1)
    .max(2),
  options: z.null().default(null)
});

export const itineraryDetailsSchema = z.object({
  itineraryId: z.string().min(1),
  sessionId: z.string().min(1).optional(),
  searchPayload: searchPayloadSchema,
  origin: airportSchema,
  destination: destinationSchema
});

const locationSchema = z.object({
  name: z.string().default(''),
  entityId: z.string().min(1),
  location: z.string().optional()
});

export const rentalPlaceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('airport'), airport: airportSchema }),
  z.object({ kind: z.literal('location'), location: locationSchema }),
  z.object({
    kind: z.literal('coordinates'),
    coordinates: z.object({
      latitude: z.number().min(-90).max(90),
      longitude: z.number().min(-180).max(180)
    })
  })
]);

export const carRentalSchema = z.object({
  origin: rentalPlaceSchema,
  destination: rentalPlaceSchema.optional(),
  departTime: z.coerce.date(),
  returnTime: z.coerce.date(),
  driverOver25: z.boolean().default(true)
});

export const carRentalUrlSchema = z.object({
  url: z.string().url()
});

export const airportQuerySchema = z.object({
  query: z.string().trim().min(1),
  departDate: isoDateSchema.optional(),
  returnDate: isoDateSchema.optional()
});

export const locationQuerySchema = z.object({
  query: z.string().trim().min(1)
});

export const airportCodeSchema = z.object({
  code: z.string().trim().min(2).max(8)
});

/** Shape a searched destination takes in API responses. */
export const describePlace = (place: PlaceOrSpecial) =>
  place.kind === 'airport' ? place.airport : place.marker;
