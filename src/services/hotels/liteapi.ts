// LiteAPI hotel provider
// Rate search (POST /hotels/rates) and hotel details (GET /data/hotel)

import { z } from 'zod';
import { env } from '../../env.js';
import { ProviderApiError, ProviderHttpError } from '../../utils/errors.js';
import { getJson, postJson } from '../utilities/http.js';
import { HotelOfferSchema, type HotelOffer, type HotelProvider, type HotelRatesQuery } from './types.js';

const SERVICE = 'hotel search';

const HotelListSchema = z.array(HotelOfferSchema);

const RatesResponseSchema = z.object({
  data: z
    .union([HotelListSchema, z.object({ offers: HotelListSchema.optional(), hotels: HotelListSchema.optional() })])
    .optional(),
  offers: HotelListSchema.optional(),
  hotels: HotelListSchema.optional(),
  error: z.unknown().optional(),
  errors: z.unknown().optional(),
});

const DetailsResponseSchema = z.object({
  data: z.record(z.unknown()).nullable().optional(),
  error: z.unknown().optional(),
  errors: z.unknown().optional(),
});

const MessageSchema = z.object({ message: z.string() });

function errorMessage(info: unknown): string {
  const first: unknown = Array.isArray(info) ? info[0] : info;
  const parsed = MessageSchema.safeParse(first);
  if (parsed.success) return parsed.data.message;
  return typeof first === 'string' && first ? first : 'unknown error';
}

export interface LiteApiOptions {
  apiKey?: string;
  baseUrl?: string;
  timeoutMs?: number;
  detailsTimeoutMs?: number;
}

export class LiteApiHotelProvider implements HotelProvider {
  private apiKey: string;
  private baseUrl: string;
  private timeoutMs: number;
  private detailsTimeoutMs: number;

  constructor(options: LiteApiOptions = {}) {
    this.apiKey = options.apiKey ?? env.LITEAPI_API_KEY;
    this.baseUrl = (options.baseUrl ?? env.LITEAPI_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? env.HOTEL_TIMEOUT_MS;
    this.detailsTimeoutMs = options.detailsTimeoutMs ?? env.HOTEL_DETAILS_TIMEOUT_MS;
  }

  private headers(): Record<string, string> {
    if (!this.apiKey) {
      throw new ProviderApiError(SERVICE, 'LITEAPI_API_KEY is not configured');
    }
    return { 'X-API-Key': this.apiKey };
  }

  async searchRates(query: HotelRatesQuery): Promise<HotelOffer[]> {
    const headers = this.headers();
    const body = {
      checkin: query.checkin,
      checkout: query.checkout,
      occupancies: query.occupancies,
      currency: query.currency,
      guestNationality: query.guestNationality,
      maxRatesPerHotel: query.maxRatesPerHotel,
      refundableRatesOnly: query.refundableRatesOnly,
      roomMapping: true,
      ...query.location,
    };

    const raw = await postJson(SERVICE, new URL(`${this.baseUrl}/hotels/rates`), body, {
      timeoutMs: this.timeoutMs,
      headers,
    });
    if (raw === null) return [];

    const parsed = RatesResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderApiError(SERVICE, `unexpected response shape (${parsed.error.issues.length} issues)`);
    }

    const response = parsed.data;
    const failure = response.errors ?? response.error;
    if (failure !== undefined && failure !== null) {
      throw new ProviderApiError(SERVICE, errorMessage(failure));
    }

    if (Array.isArray(response.data)) return response.data;
    return response.data?.offers ?? response.data?.hotels ?? response.offers ?? response.hotels ?? [];
  }

  async getHotel(hotelId: string, language?: string): Promise<Record<string, unknown> | null> {
    const headers = this.headers();
    const endpoint = new URL(`${this.baseUrl}/data/hotel`);
    endpoint.searchParams.set('hotelId', hotelId);
    if (language) endpoint.searchParams.set('language', language);

    let raw: unknown;
    try {
      raw = await getJson(SERVICE, endpoint, { timeoutMs: this.detailsTimeoutMs, headers });
    } catch (error) {
      if (error instanceof ProviderHttpError && error.status === 404) return null;
      throw error;
    }

    const parsed = DetailsResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProviderApiError(SERVICE, `unexpected response shape (${parsed.error.issues.length} issues)`);
    }
    const failure = parsed.data.errors ?? parsed.data.error;
    if (failure !== undefined && failure !== null) {
      throw new ProviderApiError(SERVICE, errorMessage(failure));
    }

    return parsed.data.data ?? null;
  }
}
