// SerpAPI Google Flights provider
// One-way searches only; round trips are split into two legs by the orchestration layer

import { z } from 'zod';
import { env } from '../../env.js';
import { ProviderApiError } from '../../utils/errors.js';
import { getJson } from '../utilities/http.js';
import { FlightOfferSchema, type FlightOffer, type FlightProvider, type LegQuery } from './types.js';

const SERVICE = 'flight search';
const ONE_WAY = '2';

const SearchResponseSchema = z
  .object({
    error: z.string().optional(),
    best_flights: z.array(FlightOfferSchema).optional(),
    other_flights: z.array(FlightOfferSchema).optional(),
  })
  .passthrough();

const NO_RESULTS_REGEX = /hasn't returned any results|no results/i;

export interface SerpApiOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class SerpApiFlightProvider implements FlightProvider {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(options: SerpApiOptions = {}) {
    this.apiKey = options.apiKey ?? env.SERPAPI_API_KEY;
    this.baseUrl = options.baseUrl ?? env.SERPAPI_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? env.FLIGHT_TIMEOUT_MS;
  }

  async searchOneWay(query: LegQuery): Promise<FlightOffer[]> {
    if (!this.apiKey) {
      throw new ProviderApiError(SERVICE, 'SERPAPI_API_KEY is not configured');
    }

    const endpoint = new URL(this.baseUrl);
    endpoint.searchParams.set('engine', 'google_flights');
    endpoint.searchParams.set('departure_id', query.origin);
    endpoint.searchParams.set('arrival_id', query.destination);
    endpoint.searchParams.set('outbound_date', query.date);
    endpoint.searchParams.set('currency', query.currency);
    endpoint.searchParams.set('type', ONE_WAY);
    endpoint.searchParams.set('adults', String(query.passengers.adults));
    endpoint.searchParams.set('children', String(query.passengers.children));
    endpoint.searchParams.set('infants_in_seat', String(query.passengers.infants));
    endpoint.searchParams.set('travel_class', String(query.travelClass));
    endpoint.searchParams.set('api_key', this.apiKey);

    const raw = await getJson(SERVICE, endpoint, { timeoutMs: this.timeoutMs });
    const parsed = SearchResponseSchema.safeParse(raw);

    if (!parsed.success) {
      throw new ProviderApiError(SERVICE, `unexpected response shape (${parsed.error.issues.length} issues)`);
    }

    if (parsed.data.error) {
      if (NO_RESULTS_REGEX.test(parsed.data.error)) {
        return [];
      }
      throw new ProviderApiError(SERVICE, parsed.data.error);
    }

    return [...(parsed.data.best_flights ?? []), ...(parsed.data.other_flights ?? [])];
  }
}
