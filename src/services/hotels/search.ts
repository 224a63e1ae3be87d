// Hotel rate search and hotel details
// Validates inputs, resolves the location, orders offers by their cheapest room

import { ErrorCode, classifyProviderError, providerFailure, type ProviderFailure } from '../../utils/errors.js';
import { isIsoDate } from '../flights/filters.js';
import type { HotelLocation, HotelOffer, HotelProvider, Occupancy } from './types.js';

const SERVICE = 'hotel search';

export const MAX_HOTEL_RESULTS = 200;

export interface HotelSearchRequest {
  checkin: string;
  checkout: string;
  occupancies: Occupancy[];
  hotelIds?: string[];
  cityName?: string;
  countryCode?: string;
  iataCode?: string;
  currency: string;
  guestNationality: string;
  maxRatesPerHotel: number;
  refundableRatesOnly: boolean;
  sortBy?: 'price';
  k: number;
}

export type HotelSearchPayload = {
  error: false;
  hotels: HotelOffer[];
  count: number;
  search_params: {
    checkin: string;
    checkout: string;
    location: HotelLocation;
    sort_by: 'price' | null;
    k: number;
  };
  message?: string;
};

export type HotelDetailsPayload = {
  error: false;
  hotel: Record<string, unknown>;
};

export function validateHotelInputs(request: HotelSearchRequest): string | null {
  if (!isIsoDate(request.checkin)) {
    return `Invalid check-in date format: '${request.checkin}'. Expected format: YYYY-MM-DD (e.g., 2025-12-10).`;
  }
  if (!isIsoDate(request.checkout)) {
    return `Invalid check-out date format: '${request.checkout}'. Expected format: YYYY-MM-DD (e.g., 2025-12-17).`;
  }
  // ISO dates order lexically
  if (request.checkout <= request.checkin) {
    return `Check-out date '${request.checkout}' must be after check-in date '${request.checkin}'.`;
  }

  if (request.occupancies.length === 0) {
    return 'At least one occupancy is required. Please provide occupancies array with at least one room.';
  }
  for (const [index, occupancy] of request.occupancies.entries()) {
    if (!Number.isInteger(occupancy.adults) || occupancy.adults < 1) {
      return `Occupancy ${index + 1}: 'adults' must be a positive integer (at least 1).`;
    }
  }

  if (request.cityName && !request.countryCode) {
    return "If 'city_name' is provided, 'country_code' must also be provided.";
  }
  if (!resolveLocation(request)) {
    return 'At least one location identifier is required. Please provide either: hotel_ids, (city_name and country_code), or iata_code.';
  }

  if (request.k <= 0) {
    return `Invalid value for parameter 'k': ${request.k}. The parameter 'k' must be a positive integer (e.g., 1, 5, 10).`;
  }
  if (request.k > MAX_HOTEL_RESULTS) {
    return `Parameter 'k' (${request.k}) is too large. Maximum allowed is ${MAX_HOTEL_RESULTS} results.`;
  }

  return null;
}

// Hotel ids win over a city, a city over an airport code
export function resolveLocation(request: HotelSearchRequest): HotelLocation | null {
  const hotelIds = (request.hotelIds ?? []).map(id => id.trim()).filter(id => id.length > 0);
  if (hotelIds.length > 0) return { hotelIds };
  if (request.cityName && request.countryCode) {
    return { cityName: request.cityName.trim(), countryCode: request.countryCode.trim().toUpperCase() };
  }
  if (request.iataCode) return { iataCode: request.iataCode.trim().toUpperCase() };
  return null;
}

function toAmount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const parsed = Number.parseFloat(value.replace(/[^0-9.]/g, ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

// Cheapest room of an offer; offers without any readable amount sort last
export function hotelPrice(offer: HotelOffer): number {
  const amounts: number[] = [];
  for (const room of offer.roomTypes ?? []) {
    const retail = toAmount(room.offerRetailRate?.amount);
    if (retail !== null) amounts.push(retail);
    for (const rate of room.rates ?? []) {
      for (const total of rate.retailRate?.total ?? []) {
        const amount = toAmount(total.amount);
        if (amount !== null) amounts.push(amount);
      }
    }
  }
  if (amounts.length > 0) return Math.min(...amounts);

  return toAmount(offer.price) ?? toAmount(offer.amount) ?? Number.POSITIVE_INFINITY;
}

export function sortHotelsByPrice(offers: HotelOffer[]): HotelOffer[] {
  return offers
    .map((offer, index) => ({ offer, index, price: hotelPrice(offer) }))
    .sort((a, b) => (a.price === b.price ? a.index - b.index : a.price < b.price ? -1 : 1))
    .map(entry => entry.offer);
}

export async function searchHotelRates(
  provider: HotelProvider,
  request: HotelSearchRequest
): Promise<HotelSearchPayload | ProviderFailure> {
  const invalid = validateHotelInputs(request);
  const location = resolveLocation(request);
  if (invalid || !location) {
    return providerFailure(
      ErrorCode.VALIDATION_ERROR,
      invalid ?? 'At least one location identifier is required.',
      { hotels: [] },
      'Please correct the input parameters and try again.'
    );
  }

  let offers: HotelOffer[];
  try {
    offers = await provider.searchRates({
      checkin: request.checkin,
      checkout: request.checkout,
      occupancies: request.occupancies,
      location,
      currency: request.currency.trim().toUpperCase(),
      guestNationality: request.guestNationality.trim().toUpperCase(),
      maxRatesPerHotel: request.maxRatesPerHotel,
      refundableRatesOnly: request.refundableRatesOnly,
    });
  } catch (error) {
    return classifyProviderError(error, SERVICE, { hotels: [] });
  }

  const ordered = request.sortBy === 'price' ? sortHotelsByPrice(offers) : offers;
  const hotels = ordered.slice(0, request.k);

  const payload: HotelSearchPayload = {
    error: false,
    hotels,
    count: hotels.length,
    search_params: {
      checkin: request.checkin,
      checkout: request.checkout,
      location,
      sort_by: request.sortBy ?? null,
      k: request.k,
    },
  };
  if (hotels.length === 0) {
    payload.message =
      'No hotel rates found for the specified criteria. Try different dates, location, or search parameters.';
  }
  return payload;
}

export async function getHotelDetails(
  provider: HotelProvider,
  hotelId: string,
  language?: string
): Promise<HotelDetailsPayload | ProviderFailure> {
  let hotel: Record<string, unknown> | null;
  try {
    hotel = await provider.getHotel(hotelId.trim(), language);
  } catch (error) {
    return classifyProviderError(error, 'hotel details', { hotel: null });
  }

  if (!hotel) {
    return providerFailure(
      ErrorCode.DATA_UNAVAILABLE,
      `No details were found for hotel '${hotelId}'.`,
      { hotel: null },
      'Please verify the hotel ID is correct and try again.'
    );
  }

  return { error: false, hotel };
}
