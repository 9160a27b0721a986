import { afterEach, describe, expect, it, vi } from 'vitest';
import { DEFAULT_SEARCH_SETTINGS } from '../config/env.js';
import { ConfigurationError, NotFoundError, TransportError, ValidationError } from '../types/errors.js';
import { airportPlace, airportRental, calendarDate } from '../types/skyscanner.js';
import { logger } from '../utils/logger.js';
import { FakeTransport, IST, MXP, complete, fixedClock, json, noSleep } from '../test/fakeTransport.js';
import { StaticTokenProvider } from './authToken.js';
import { SkyscannerClient, buildIdentityHeaders } from './skyscanner.js';

const suggestion = (title: string, entityId: string, skyId: string) => ({
  presentation: { title },
  navigation: { entityId, relevantFlightParams: { skyId } }
});

const clientWith = (transport: FakeTransport) =>
  new SkyscannerClient(transport, DEFAULT_SEARCH_SETTINGS, { clock: fixedClock, sleep: noSleep });

describe('SkyscannerClient.create', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('reports the client profile it was created with', async () => {
    const info = vi.spyOn(logger, 'info');

    await SkyscannerClient.create(
      { pxAuthorization: 'test-token', profile: { name: 'test-profile', headers: {} } },
      { transportFactory: () => new FakeTransport() }
    );
    await SkyscannerClient.create({ pxAuthorization: 'test-token' }, { transportFactory: () => new FakeTransport() });

    expect(info).toHaveBeenCalledWith('Search client initialized', expect.objectContaining({ profile: 'test-profile' }));
    expect(info).toHaveBeenCalledWith(
      'Search client initialized',
      expect.objectContaining({ profile: 'okhttp4_android' })
    );
  });

  it('uses a supplied token for the identity headers', async () => {
    const seen: Record<string, string>[] = [];
    const client = await SkyscannerClient.create(
      { pxAuthorization: 'test-token', pxUuid: 'test-uuid', market: 'IT', currency: 'EUR' },
      {
        transportFactory: headers => {
          seen.push(headers);
          return new FakeTransport();
        }
      }
    );

    expect(client.settings.market).toBe('IT');
    expect(seen[0]['X-Px-Authorization']).toBe('test-token');
    expect(seen[0]['X-Px-Uuid']).toBe('test-uuid');
    expect(seen[0]['X-Skyscanner-Currency']).toBe('EUR');
    expect(seen[0]['X-Skyscanner-Locale']).toBe('en-US');
  });

  it('asks the token provider when no token is supplied', async () => {
    const seen: Record<string, string>[] = [];
    await SkyscannerClient.create({}, {
      tokenProvider: new StaticTokenProvider('provided-token', 'provided-uuid'),
      transportFactory: headers => {
        seen.push(headers);
        return new FakeTransport();
      }
    });

    expect(seen[0]['X-Px-Authorization']).toBe('provided-token');
    expect(seen[0]['X-Px-Uuid']).toBe('provided-uuid');
  });

  it('fails without a token or provider', async () => {
    await expect(SkyscannerClient.create()).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('freezes its settings', async () => {
    const client = await SkyscannerClient.create({ pxAuthorization: 'test-token' }, {
      transportFactory: () => new FakeTransport()
    });
    expect(Object.isFrozen(client.settings)).toBe(true);
    expect(client.preferences).toEqual({ market: 'US', currencyCode: 'USD', locale: 'en-US' });
  });
});

describe('buildIdentityHeaders', () => {
  it('carries the market triple and device identity', () => {
    const headers = buildIdentityHeaders(DEFAULT_SEARCH_SETTINGS, { token: 'test-token', uuid: 'u-1' });

    expect(headers['X-Skyscanner-Market']).toBe('US');
    expect(headers['X-Skyscanner-ChannelId']).toBe('goandroid');
    expect(headers['X-PX-Os']).toBe('Android');
  });
});

describe('SkyscannerClient lookups', () => {
  it('parses airport suggestions and skips incomplete entries', async () => {
    const transport = new FakeTransport([
      json({
        inputSuggest: [
          suggestion('Istanbul', IST.entityId, 'IST'),
          { presentation: { title: 'Broken' }, navigation: {} },
          suggestion('Istanbul Sabiha Gokcen', '128667804', 'SAW')
        ]
      })
    ]);

    const airports = await clientWith(transport).searchAirports('istanbul', calendarDate(2026, 6, 1));

    expect(airports).toEqual([IST, { title: 'Istanbul Sabiha Gokcen', entityId: '128667804', skyCode: 'SAW' }]);
    expect(transport.requests[0].params).toEqual({
      query: 'istanbul',
      inboundDate: '2026-06-01',
      outboundDate: ''
    });
  });

  it('rejects airport responses without a suggestion list', async () => {
    const transport = new FakeTransport([json({ results: [] })]);
    await expect(clientWith(transport).searchAirports('x')).rejects.toBeInstanceOf(TransportError);
  });

  it('finds an airport by its code', async () => {
    const transport = new FakeTransport([
      json({ inputSuggest: [suggestion('Milan', '27544068', 'MILA'), suggestion(MXP.title, MXP.entityId, 'MXP')] })
    ]);

    await expect(clientWith(transport).getAirportByCode('mxp')).resolves.toEqual(MXP);
    expect(transport.requests[0].params?.query).toBe('MXP');
  });

  it('reports unknown codes as not found', async () => {
    const transport = new FakeTransport([json({ inputSuggest: [suggestion('Milan', '27544068', 'MILA')] })]);

    await expect(clientWith(transport).getAirportByCode('zzz')).rejects.toThrow(NotFoundError);
  });

  it('searches car rental locations by market and locale', async () => {
    const transport = new FakeTransport([
      json([
        { entity_name: 'New York', entity_id: '27537542', location: '40.71,-74.00' },
        { entity_name: 'Missing id' }
      ])
    ]);

    const locations = await clientWith(transport).searchLocations('new york');

    expect(locations).toEqual([{ name: 'New York', entityId: '27537542', location: '40.71,-74.00' }]);
    expect(transport.requests[0].url).toBe('https://www.skyscanner.net/g/autosuggest-carhire/US/en-US/new%20york');
    expect(transport.requests[0].params).toEqual({ autosuggestExp: 'neighborhood_b' });
  });
});

describe('SkyscannerClient.getItineraryDetails', () => {
  it('posts the detail request for a completed search', async () => {
    const transport = new FakeTransport([complete('detail-session'), json({ legs: [] })]);
    const client = clientWith(transport);
    const result = await client.getFlightPrices({
      origin: IST,
      destination: airportPlace(MXP),
      departDate: calendarDate(2026, 6, 1)
    });

    const details = await client.getItineraryDetails('itin-7', result);

    expect(details).toEqual({ legs: [] });
    const request = transport.requests[1];
    expect(request.method).toBe('POST');
    expect(request.url).toBe('https://www.skyscanner.net/g/sttc/itinerary-details/v1/itinerary');
    expect(request.json).toMatchObject({ itineraryId: 'itin-7', searchSessionId: 'detail-session' });
    expect(request.headers?.['grpc-metadata-x-skyscanner-channelid']).toBe('goandroid');
  });
});

describe('SkyscannerClient.getCarRental', () => {
  const departTime = new Date(2026, 6, 1, 10, 0);
  const returnTime = new Date(2026, 6, 8, 10, 0);

  it('polls the quotes endpoint until the listing settles', async () => {
    const transport = new FakeTransport([json({ groups_count: 12 }), json({ groups_count: 12 })]);

    const listing = await clientWith(transport).getCarRental({
      origin: airportRental(MXP),
      departTime,
      returnTime,
      driverOver25: true
    });

    expect(listing.groups_count).toBe(12);
    expect(transport.requests[0].url).toBe(
      `https://www.skyscanner.net/g/carhire-quotes/US/en-US/USD/30/${MXP.entityId}/${MXP.entityId}/2026-07-01T10:00/2026-07-08T10:00/`
    );
  });

  it('rejects a return before the pick-up', async () => {
    await expect(clientWith(new FakeTransport()).getCarRental({
      origin: airportRental(MXP),
      departTime: returnTime,
      returnTime: departTime,
      driverOver25: true
    })).rejects.toThrow('Return time cannot be past depart time');
  });

  it('rejects times in the past', async () => {
    await expect(clientWith(new FakeTransport()).getCarRental({
      origin: airportRental(MXP),
      departTime: new Date(2026, 4, 10, 11, 0),
      returnTime,
      driverOver25: true
    })).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects malformed rental urls', async () => {
    await expect(clientWith(new FakeTransport()).getCarRentalFromUrl('https://www.skyscanner.net/g/'))
      .rejects.toThrow('URL not valid');
  });

  it('searches from a copied rental url', async () => {
    const transport = new FakeTransport([json({ groups_count: 3 }), json({ groups_count: 3 })]);
    const url =
      'https://www.skyscanner.net/g/carhire-quotes/GB/en-GB/GBP/21/27544008/27544009/2026-07-01T10:00/2026-07-08T10:00/';

    await clientWith(transport).getCarRentalFromUrl(url);

    expect(transport.requests[0].url).toBe(
      'https://www.skyscanner.net/g/carhire-quotes/US/en-US/USD/21/27544008/27544009/2026-07-01T10:00/2026-07-08T10:00/'
    );
  });
});
