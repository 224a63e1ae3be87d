// Flight search helpers
// Input normalization, validation, the filter pipeline and sorting

import type { FlightFilters, FlightOffer, SortKey, TripType } from './types.js';

const ISO_DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;
const UNKNOWN_DURATION = 10 ** 9;

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE_REGEX.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

export function addDays(date: string, days: number): string {
  const [year, month, day] = date.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, day + days)).toISOString().slice(0, 10);
}

// Every date within ±daysFlex of center, in calendar order
export function dateRange(center: string, daysFlex: number): string[] {
  const dates: string[] = [];
  for (let offset = -daysFlex; offset <= daysFlex; offset++) {
    dates.push(addDays(center, offset));
  }
  return dates;
}

// ---------------------------------------------------------------------------
// Normalization
// ---------------------------------------------------------------------------

export function normalizeTripType(input: string): TripType | null {
  const value = input.toLowerCase().trim();
  if (value === 'one-way' || value === 'oneway' || value === 'one way') return 'one-way';
  if (value === 'round-trip' || value === 'roundtrip' || value === 'round trip') return 'round-trip';
  return null;
}

const TRAVEL_CLASSES: Record<string, number> = {
  economy: 1,
  eco: 1,
  premium: 2,
  'premium economy': 2,
  business: 3,
  biz: 3,
  first: 4,
};

// Provider travel class code, 1 (economy) to 4 (first)
export function normalizeTravelClass(input: string | number): number {
  const clamp = (value: number) => Math.min(Math.max(value, 1), 4);

  if (typeof input === 'number') return clamp(Math.trunc(input));

  const value = input.trim().toLowerCase();
  if (/^\d+$/.test(value)) return clamp(parseInt(value, 10));
  return TRAVEL_CLASSES[value] ?? 1;
}

export interface FlightInputs {
  tripType: string;
  departure: string;
  arrival: string;
  departureDate: string;
  returnDate?: string;
  adults?: number;
  children?: number;
  infants?: number;
  maxPrice?: number;
  daysFlex?: number;
  maxDaysFlex?: number;
}

/**
 * Check a search request before any provider call.
 * Returns the user-facing message for the first problem found, or null.
 */
export function validateFlightInputs(inputs: FlightInputs): string | null {
  const tripType = normalizeTripType(inputs.tripType);
  if (!tripType) {
    return `Invalid trip type: '${inputs.tripType}'. Must be 'one-way' or 'round-trip'.`;
  }

  if (!inputs.departure.trim()) {
    return "Departure airport/city code is required and must be a non-empty string (e.g., 'JFK', 'NYC', 'LAX').";
  }
  if (!inputs.arrival.trim()) {
    return "Arrival airport/city code is required and must be a non-empty string (e.g., 'LAX', 'LHR', 'CDG').";
  }

  if (!isIsoDate(inputs.departureDate)) {
    return `Invalid departure date format: '${inputs.departureDate}'. Expected format: YYYY-MM-DD (e.g., 2025-12-10).`;
  }

  if (inputs.returnDate !== undefined && !isIsoDate(inputs.returnDate)) {
    return `Invalid return date format: '${inputs.returnDate}'. Expected format: YYYY-MM-DD (e.g., 2025-12-17).`;
  }

  if (tripType === 'round-trip' && inputs.returnDate === undefined && !inputs.daysFlex) {
    return 'Return date is required for round-trip flights unless a flexible date window is given (YYYY-MM-DD, e.g., 2025-12-17).';
  }

  for (const key of ['adults', 'children', 'infants'] as const) {
    const count = inputs[key];
    if (count !== undefined && count < 0) {
      return `Invalid number of ${key}: ${count}. Must be 0 or greater.`;
    }
  }

  if (inputs.maxPrice !== undefined && inputs.maxPrice <= 0) {
    return `Invalid max_price: ${inputs.maxPrice}. Must be a positive number.`;
  }

  const maxFlex = inputs.maxDaysFlex ?? 7;
  if (inputs.daysFlex !== undefined && (inputs.daysFlex < 0 || inputs.daysFlex > maxFlex)) {
    return `Invalid days_flex: ${inputs.daysFlex}. Must be between 0 and ${maxFlex}.`;
  }

  return null;
}

// ---------------------------------------------------------------------------
// Offer accessors
// ---------------------------------------------------------------------------

export function parsePrice(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return Infinity;
  const digits = value.replace(/[^\d.]/g, '');
  const parsed = parseFloat(digits);
  return isNaN(parsed) ? Infinity : parsed;
}

export function totalDuration(offer: FlightOffer): number {
  if (offer.flights.length > 0 && offer.flights.every(segment => segment.duration !== undefined)) {
    return offer.flights.reduce((sum, segment) => sum + (segment.duration ?? 0), 0);
  }
  return offer.total_duration ?? UNKNOWN_DURATION;
}

// "2025-12-10 08:35", "2025-12-10T08:35" or "08:35" -> minutes after midnight
export function timeToMinutes(value: string | undefined): number | null {
  if (!value) return null;
  const time = value.includes('T') ? value.split('T').pop() : value.split(' ').pop();
  const match = /^(\d{1,2}):(\d{2})/.exec(time ?? '');
  if (!match) return null;
  return parseInt(match[1], 10) * 60 + parseInt(match[2], 10);
}

function departureTime(offer: FlightOffer): string | undefined {
  return offer.flights[0]?.departure_airport.time;
}

function arrivalTime(offer: FlightOffer): string | undefined {
  return offer.flights[offer.flights.length - 1]?.arrival_airport.time;
}

function withinWindow(value: string | undefined, after?: string, before?: string): boolean {
  if (!after && !before) return true;
  const minutes = timeToMinutes(value);
  if (minutes === null) return false;
  const lower = timeToMinutes(after);
  const upper = timeToMinutes(before);
  return (lower === null || minutes >= lower) && (upper === null || minutes <= upper);
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

export function filterOffers<T extends FlightOffer>(offers: T[], filters: FlightFilters): T[] {
  let result = offers;

  if (filters.airline) {
    const airline = filters.airline.toLowerCase();
    result = result.filter(offer =>
      offer.flights.some(segment => (segment.airline ?? '').toLowerCase().includes(airline))
    );
  }

  if (filters.maxPrice !== undefined) {
    const maxPrice = filters.maxPrice;
    result = result.filter(offer => parsePrice(offer.price) <= maxPrice);
  }

  if (filters.directOnly) {
    result = result.filter(offer => offer.flights.length === 1);
  }

  if (filters.maxDurationMinutes !== undefined) {
    const maxDuration = filters.maxDurationMinutes;
    result = result.filter(offer => totalDuration(offer) <= maxDuration);
  }

  if (filters.departureAfter || filters.departureBefore) {
    result = result.filter(offer =>
      withinWindow(departureTime(offer), filters.departureAfter, filters.departureBefore)
    );
  }

  if (filters.arrivalAfter || filters.arrivalBefore) {
    result = result.filter(offer => withinWindow(arrivalTime(offer), filters.arrivalAfter, filters.arrivalBefore));
  }

  if (filters.stopover) {
    const stopover = filters.stopover.toUpperCase();
    result = result.filter(offer =>
      offer.flights.slice(0, -1).some(segment => (segment.arrival_airport.id ?? '').toUpperCase() === stopover)
    );
  }

  return result;
}

const SORT_KEYS: Record<SortKey, (offer: FlightOffer) => number> = {
  price: offer => parsePrice(offer.price),
  duration: totalDuration,
  departure: offer => timeToMinutes(departureTime(offer)) ?? UNKNOWN_DURATION,
  arrival: offer => timeToMinutes(arrivalTime(offer)) ?? UNKNOWN_DURATION,
};

// Stable sort; returns a new array
export function sortOffers<T extends FlightOffer>(offers: T[], by: SortKey = 'price', ascending: boolean = true): T[] {
  const key = SORT_KEYS[by];
  const direction = ascending ? 1 : -1;
  return [...offers].sort((a, b) => {
    const left = key(a);
    const right = key(b);
    if (left === right) return 0;
    return left < right ? -direction : direction;
  });
}

export function applyFilters<T extends FlightOffer>(offers: T[], filters: FlightFilters): T[] {
  const filtered = filterOffers(offers, filters);
  return filters.sortBy ? sortOffers(filtered, filters.sortBy, filters.ascending ?? true) : filtered;
}
