import { describe, expect, it, vi } from 'vitest';
import { CaptchaBanError, IncompleteSearchError, TransportError, ValidationError } from '../types/errors.js';
import { airportPlace, calendarDate, specialDate, specialPlace } from '../types/skyscanner.js';
import {
  FakeTransport,
  IST,
  MXP,
  complete,
  fixedClock,
  incomplete,
  json,
  noSleep
} from '../test/fakeTransport.js';
import { type FlightPriceParams, SearchSessionController } from './searchSession.js';

const SEARCH_URL = 'https://www.skyscanner.net/g/radar/api/v2/unified-search/';

const baseParams: FlightPriceParams = {
  origin: IST,
  destination: airportPlace(MXP),
  departDate: calendarDate(2026, 6, 1),
  returnDate: calendarDate(2026, 6, 11)
};

const controllerFor = (transport: FakeTransport, maxRetries = 3, sleep = noSleep) =>
  new SearchSessionController(transport, { retryDelay: 2, maxRetries }, { clock: fixedClock, sleep });

describe('SearchSessionController validation', () => {
  const controller = controllerFor(new FakeTransport());

  it('accepts passenger counts within limits', () => {
    for (let adults = 1; adults <= 8; adults++) {
      expect(() => controller.validate({ ...baseParams, adults, childAges: [0, 5, 17, 17, 3, 2, 1, 9] }))
        .not.toThrow();
    }
  });

  it.each([
    ['zero adults', { adults: 0 }],
    ['nine adults', { adults: 9 }],
    ['nine children', { childAges: [1, 1, 1, 1, 1, 1, 1, 1, 1] }],
    ['child aged 18', { childAges: [18] }],
    ['negative child age', { childAges: [-1] }]
  ])('rejects %s', (_label, overrides) => {
    expect(() => controller.validate({ ...baseParams, ...overrides })).toThrow(ValidationError);
  });

  it('rejects a return date before the depart date', () => {
    expect(() => controller.validate({
      ...baseParams,
      departDate: calendarDate(2026, 6, 11),
      returnDate: calendarDate(2026, 6, 1)
    })).toThrow('Return date cannot be past departure');
  });

  it('rejects a depart date in the past regardless of the return date', () => {
    expect(() => controller.validate({
      ...baseParams,
      departDate: calendarDate(2026, 5, 9),
      returnDate: specialDate('anytime')
    })).toThrow('cannot be in the past');
    expect(() => controller.validate({ ...baseParams, departDate: calendarDate(2026, 5, 9), returnDate: undefined }))
      .toThrow('cannot be in the past');
  });

  it('accepts a depart date of today', () => {
    expect(() => controller.validate({ ...baseParams, departDate: calendarDate(2026, 5, 10) })).not.toThrow();
  });

  it('rejects non-economy cabins for flexible searches', () => {
    expect(() => controller.validate({
      ...baseParams,
      destination: specialPlace('everywhere'),
      returnDate: undefined,
      cabinClass: 'business'
    })).toThrow(ValidationError);
    expect(() => controller.validate({ ...baseParams, departDate: specialDate('anytime'), cabinClass: 'first' }))
      .toThrow(ValidationError);
  });

  it('allows economy for flexible searches', () => {
    expect(() => controller.validate({
      ...baseParams,
      destination: specialPlace('everywhere'),
      departDate: specialDate('anytime'),
      returnDate: undefined
    })).not.toThrow();
  });

  it('sends nothing when validation fails', async () => {
    const transport = new FakeTransport();
    await expect(controllerFor(transport).search({ ...baseParams, adults: 0 })).rejects.toThrow(ValidationError);
    expect(transport.requests).toHaveLength(0);
  });
});

describe('SearchSessionController.search', () => {
  it('returns immediately when the first response is complete', async () => {
    const transport = new FakeTransport([complete('final-session')]);
    const result = await controllerFor(transport).search(baseParams);

    expect(transport.requests).toHaveLength(1);
    expect(transport.requests[0].method).toBe('POST');
    expect(transport.requests[0].url).toBe(SEARCH_URL);
    expect(result.sessionId).toBe('final-session');
    expect(result.origin).toBe(IST);
    expect(result.searchPayload.legs).toHaveLength(2);
  });

  it('polls the most recently returned session id', async () => {
    const transport = new FakeTransport([
      incomplete('s1'),
      incomplete('s2'),
      incomplete('s3'),
      complete('s4')
    ]);
    const result = await controllerFor(transport, 5).search(baseParams);

    expect(transport.requests.map(req => req.url)).toEqual([
      SEARCH_URL,
      `${SEARCH_URL}s1`,
      `${SEARCH_URL}s2`,
      `${SEARCH_URL}s3`
    ]);
    expect(transport.requests.slice(1).every(req => req.method === 'GET')).toBe(true);
    expect(result.sessionId).toBe('s4');
  });

  it('fails after exactly maxRetries polls', async () => {
    const transport = new FakeTransport([
      incomplete('s0'),
      incomplete('s1'),
      incomplete('s2'),
      incomplete('s3')
    ]);
    const sleep = vi.fn(noSleep);

    await expect(controllerFor(transport, 3, sleep).search(baseParams)).rejects.toBeInstanceOf(IncompleteSearchError);
    expect(transport.requests).toHaveLength(4);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(2000);
  });

  it('leaves sessionId absent when the completed payload lacks it', async () => {
    const transport = new FakeTransport([json({ context: { status: 'complete', sessionId: 'top-level' } })]);
    const result = await controllerFor(transport).search(baseParams);

    expect(result.sessionId).toBeUndefined();
  });

  it('raises a captcha ban during polling', async () => {
    const transport = new FakeTransport([incomplete('s1'), { status: 403, body: '{"redirect_to":"/captcha"}' }]);

    await expect(controllerFor(transport).search(baseParams)).rejects.toThrow(CaptchaBanError);
  });

  it('raises a transport error for other statuses', async () => {
    const transport = new FakeTransport([incomplete('s1'), { status: 500, body: 'boom' }]);

    const error = await controllerFor(transport).search(baseParams).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(TransportError);
    if (error instanceof TransportError) {
      expect(error.statusCode).toBe(500);
      expect(error.body).toBe('boom');
    }
  });

  it('defaults the depart date to today', async () => {
    const transport = new FakeTransport([complete('s')]);
    await controllerFor(transport).search({ origin: IST, destination: airportPlace(MXP) });

    expect(transport.requests[0].json).toMatchObject({
      adults: 1,
      childAges: [],
      cabinClass: 'economy',
      legs: [{ dates: { '@type': 'date', year: 2026, month: 5, day: 10 } }]
    });
  });

  it('freezes the recorded search payload', async () => {
    const transport = new FakeTransport([complete('s')]);
    const result = await controllerFor(transport).search(baseParams);

    expect(Object.isFrozen(result.searchPayload)).toBe(true);
    expect(Object.isFrozen(result.searchPayload.legs[0])).toBe(true);
  });
});
