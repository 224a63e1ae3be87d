// Flight offer model
// Offers keep every provider field (passthrough); only what filters and the splitter read is typed

import { z } from 'zod';

export const AirportStopSchema = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    time: z.string().optional(),
  })
  .passthrough();

export const FlightSegmentSchema = z
  .object({
    departure_airport: AirportStopSchema.default({}),
    arrival_airport: AirportStopSchema.default({}),
    duration: z.number().optional(),
    airline: z.string().optional(),
    flight_number: z.string().optional(),
  })
  .passthrough();

export const FlightOfferSchema = z
  .object({
    flights: z.array(FlightSegmentSchema).default([]),
    total_duration: z.number().optional(),
    price: z.union([z.number(), z.string()]).optional(),
    type: z.string().optional(),
    booking_token: z.string().optional(),
    search_date: z.string().optional(),
  })
  .passthrough();

export type FlightSegment = z.infer<typeof FlightSegmentSchema>;
export type FlightOffer = z.infer<typeof FlightOfferSchema>;

export type FlightDirection = 'outbound' | 'return';

export type TaggedFlightOffer = FlightOffer & { direction: FlightDirection };

export type TripType = 'one-way' | 'round-trip';

export type SortKey = 'price' | 'duration' | 'departure' | 'arrival';

export interface Passengers {
  adults: number;
  children: number;
  infants: number;
}

export interface FlightFilters {
  airline?: string;
  maxPrice?: number;
  directOnly?: boolean;
  maxDurationMinutes?: number;
  departureAfter?: string;
  departureBefore?: string;
  arrivalAfter?: string;
  arrivalBefore?: string;
  stopover?: string;
  sortBy?: SortKey;
  ascending?: boolean;
}

// One directional search as sent to a provider
export interface LegQuery {
  origin: string;
  destination: string;
  date: string;
  currency: string;
  travelClass: number;
  passengers: Passengers;
}

export interface FlightProvider {
  searchOneWay(query: LegQuery): Promise<FlightOffer[]>;
}

export type FlightPayload = {
  error: false;
  flights: FlightOffer[];
  departure: string;
  arrival: string;
  departure_date: string;
  days_flex: number;
  searched_dates: string[];
  currency: string;
  passengers: Passengers;
};
