import { IncompleteSearchError, TransportError } from '../types/errors.js';
import { type Sleep, sleep } from '../utils/clock.js';
import { logSearch } from '../utils/logger.js';
import type { CarRentalQuery } from './requestBuilder.js';
import { isRecord, readJson, unwrap } from './responseClassifier.js';
import type { HttpTransport } from './transport.js';
import type { PollingOptions } from './searchSession.js';

export interface CarRentalListing extends Record<string, unknown> {
  groups_count: number;
}

function readListing(body: string): CarRentalListing {
  const data = readJson(body, 'Car rental');
  if (!isRecord(data) || typeof data.groups_count !== 'number') {
    throw new TransportError('Car rental: response has no groups_count', 200, body);
  }
  return { ...data, groups_count: data.groups_count };
}

/**
 * Polls car rental quotes until two consecutive responses report the same
 * number of groups. The backend has no completion flag for this listing.
 */
export class StabilizationPoller {
  private readonly sleep: Sleep;

  constructor(
    private readonly transport: HttpTransport,
    private readonly options: PollingOptions,
    sleepFn: Sleep = sleep
  ) {
    this.sleep = sleepFn;
  }

  async poll(query: CarRentalQuery): Promise<CarRentalListing> {
    const params = { ...query.params };
    let requestNumber = Number(params.reqn ?? '0');
    // zero groups never counts as a baseline
    let baseline: number | undefined;

    for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
      params.reqn = String(requestNumber);
      const response = await this.transport.request({ method: 'GET', url: query.url, params: { ...params } });
      requestNumber++;

      const listing = readListing(unwrap(response, 'Error while scraping car rental'));
      const count = listing.groups_count;
      logSearch.carRentalPolled(attempt, count, baseline);

      if (baseline !== undefined && count === baseline) {
        logSearch.completed(attempt, undefined);
        return listing;
      }
      baseline = count > 0 ? count : undefined;

      if (attempt < this.options.maxRetries) {
        await this.sleep(this.options.retryDelay * 1000);
      }
    }

    logSearch.exhausted(this.options.maxRetries);
    throw new IncompleteSearchError(this.options.maxRetries);
  }
}
