import { API_CONFIG } from '../config/api.js';
import { CaptchaBanError, TransportError } from '../types/errors.js';
import { logSearch } from '../utils/logger.js';
import type { HttpResponse } from './transport.js';

export type Classification =
  | { kind: 'success'; body: string }
  | { kind: 'captcha'; url: string }
  | { kind: 'transport-error'; statusCode: number; body: string };

type ParseResult<T> = { ok: true; value: T } | { ok: false };

function parseJson(body: string): ParseResult<unknown> {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch (error) {
    return { ok: false };
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Reads `redirect_to` from a 403 body, if there is one. */
export function parseRedirectPath(body: string): ParseResult<string> {
  const parsed = parseJson(body);
  if (!parsed.ok || !isRecord(parsed.value)) return { ok: false };

  const redirect = parsed.value.redirect_to;
  return typeof redirect === 'string' && redirect.length > 0
    ? { ok: true, value: redirect }
    : { ok: false };
}

export function captchaUrl(body: string, baseDomain: string = API_CONFIG.BASE_DOMAIN): string {
  const redirect = parseRedirectPath(body);
  return redirect.ok ? baseDomain + redirect.value : baseDomain;
}

export function classify(statusCode: number, body: string): Classification {
  if (statusCode === 403) {
    return { kind: 'captcha', url: captchaUrl(body) };
  }
  if (statusCode !== 200) {
    return { kind: 'transport-error', statusCode, body };
  }
  return { kind: 'success', body };
}

/** Returns the body of a successful response and throws for everything else. */
export function unwrap(response: HttpResponse, context: string): string {
  const result = classify(response.status, response.body);
  switch (result.kind) {
    case 'success':
      return result.body;
    case 'captcha':
      logSearch.banned(result.url);
      throw new CaptchaBanError(result.url);
    case 'transport-error':
      throw new TransportError(context, result.statusCode, result.body);
  }
}

/** Parses a JSON body that a 200 response promised. */
export function readJson(body: string, context: string): unknown {
  const parsed = parseJson(body);
  if (!parsed.ok) {
    throw new TransportError(`${context}: response is not valid JSON`, 200, body);
  }
  return parsed.value;
}

export type SearchStatus = 'complete' | 'incomplete';

export interface SearchStatusReading {
  status: SearchStatus;
  sessionId?: string;
  payload: Record<string, unknown>;
}

/**
 * Reads `context.status` / `context.sessionId` of a unified-search body.
 * Anything else than a recognised status is treated as a broken response.
 */
export function readSearchStatus(body: string): SearchStatusReading {
  const payload = readJson(body, 'Unified search');
  if (!isRecord(payload) || !isRecord(payload.context)) {
    throw new TransportError('Unified search: response has no search context', 200, body);
  }

  const context = payload.context;
  const status = context.status;
  if (status !== 'complete' && status !== 'incomplete') {
    throw new TransportError('Unified search: unrecognised search status', 200, body);
  }

  const sessionId = typeof context.sessionId === 'string' ? context.sessionId : undefined;
  return { status, sessionId, payload };
}

/** Session id of a completed search, found under `itineraries.context`. */
export function completedSessionId(payload: Record<string, unknown>): string | undefined {
  const itineraries = payload.itineraries;
  if (!isRecord(itineraries) || !isRecord(itineraries.context)) return undefined;
  const sessionId = itineraries.context.sessionId;
  return typeof sessionId === 'string' ? sessionId : undefined;
}
