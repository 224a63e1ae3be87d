// Flight Tools
// One-direction leg search, and the trip-level search that splits round trips into legs

import { z } from 'zod';
import { env } from '../../env.js';
import { ErrorCode, classifyProviderError, providerFailure } from '../../utils/errors.js';
import { normalizeTravelClass, normalizeTripType, validateFlightInputs } from '../flights/filters.js';
import { searchLeg } from '../flights/search.js';
import type { FlightFilters, FlightPayload, FlightProvider } from '../flights/types.js';
import { DirectionalQuerySplitter, LEG_TOOL, type LegInvoker } from '../orchestration/round-trip.js';
import type { ToolRegistry } from './registry.js';
import type { ToolPayload } from './types.js';

const SERVICE = 'flight search';

const SORT_KEYS = ['price', 'duration', 'departure', 'arrival'] as const;

// Headroom for the splitter's own work between and after the two legs
export const TRIP_TIMEOUT_MARGIN_MS = 2000;

// Flexible round trips run their two legs one after the other, each bounded by the leg timeout
export function tripTimeoutMs(legTimeoutMs: number): number {
  return legTimeoutMs * 2 + TRIP_TIMEOUT_MARGIN_MS;
}

// Options every leg of a trip shares
const legOptionsShape = {
  currency: z.string().default('USD').describe('Currency code for prices (e.g., USD, EUR)'),
  travel_class: z.string().default('economy').describe('economy, premium, business or first'),
  adults: z.number().int().default(1).describe('Number of adult passengers'),
  children: z.number().int().default(0).describe('Number of child passengers'),
  infants: z.number().int().default(0).describe('Number of infants in seat'),
  max_price: z.number().optional().describe('Maximum price per offer'),
  airline: z.string().optional().describe('Only offers operated by this airline (name or code)'),
  direct_only: z.boolean().optional().describe('Only non-stop flights'),
  max_duration: z.number().int().optional().describe('Maximum total duration in minutes'),
  departure_after: z.string().optional().describe('Earliest departure time, HH:MM'),
  departure_before: z.string().optional().describe('Latest departure time, HH:MM'),
  arrival_after: z.string().optional().describe('Earliest arrival time, HH:MM'),
  arrival_before: z.string().optional().describe('Latest arrival time, HH:MM'),
  stopover: z.string().optional().describe('Only offers connecting through this airport code'),
  sort_by: z.enum(SORT_KEYS).optional().describe('Sort key'),
  ascending: z.boolean().default(true).describe('Sort direction'),
};

const LegOptionsSchema = z.object(legOptionsShape);
type LegOptions = z.infer<typeof LegOptionsSchema>;

function toFilters(options: LegOptions): FlightFilters {
  return {
    airline: options.airline,
    maxPrice: options.max_price,
    directOnly: options.direct_only,
    maxDurationMinutes: options.max_duration,
    departureAfter: options.departure_after,
    departureBefore: options.departure_before,
    arrivalAfter: options.arrival_after,
    arrivalBefore: options.arrival_before,
    stopover: options.stopover,
    sortBy: options.sort_by,
    ascending: options.ascending,
  };
}

// Leg arguments forwarded by the trip-level tool; unset options are left out
function forwardedOptions(options: LegOptions): ToolPayload {
  const out: ToolPayload = {};
  for (const key of Object.keys(legOptionsShape)) {
    const value: unknown = Reflect.get(options, key);
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export interface FlightToolDeps {
  provider: FlightProvider;
  // Leg searches of a trip go back through the dispatcher so each one is validated, timed and logged
  invoker: LegInvoker;
}

export function registerFlightTools(registry: ToolRegistry, deps: FlightToolDeps): void {
  registry.register({
    name: LEG_TOOL,
    kind: 'discovery',
    timeoutMs: env.FLIGHT_TIMEOUT_MS,
    description:
      'Search one-way flights in a single direction. With days_flex > 0 every date within ±days_flex of the ' +
      'requested date is searched, and each offer carries the search_date it matched.',
    returns: { type: 'object', description: 'Flight offers for one direction' },
    parameters: z.object({
      departure: z.string().describe('Origin airport or city code (e.g., JFK)'),
      arrival: z.string().describe('Destination airport or city code (e.g., LHR)'),
      date: z.string().describe('Travel date, YYYY-MM-DD'),
      days_flex: z.number().int().default(0).describe('Search ±N days around the date (0-7)'),
      ...legOptionsShape,
    }),
    execute: async args => {
      const invalid = validateFlightInputs({
        tripType: 'one-way',
        departure: args.departure,
        arrival: args.arrival,
        departureDate: args.date,
        adults: args.adults,
        children: args.children,
        infants: args.infants,
        maxPrice: args.max_price,
        daysFlex: args.days_flex,
        maxDaysFlex: env.FLIGHT_MAX_FLEX_DAYS,
      });
      if (invalid) {
        return providerFailure(ErrorCode.VALIDATION_ERROR, invalid, { flights: [] });
      }

      const passengers = { adults: args.adults, children: args.children, infants: args.infants };
      const departure = args.departure.trim().toUpperCase();
      const arrival = args.arrival.trim().toUpperCase();

      try {
        const { flights, searchedDates } = await searchLeg(deps.provider, {
          query: {
            origin: departure,
            destination: arrival,
            date: args.date,
            currency: args.currency.trim().toUpperCase(),
            travelClass: normalizeTravelClass(args.travel_class),
            passengers,
          },
          daysFlex: args.days_flex,
          filters: toFilters(args),
        });

        const payload: FlightPayload = {
          error: false,
          flights,
          departure,
          arrival,
          departure_date: args.date,
          days_flex: args.days_flex,
          searched_dates: searchedDates,
          currency: args.currency.trim().toUpperCase(),
          passengers,
        };
        return payload;
      } catch (error) {
        return classifyProviderError(error, SERVICE, { flights: [] });
      }
    },
  });

  const splitter = new DirectionalQuerySplitter(deps.invoker, { legTool: LEG_TOOL });

  registry.register({
    name: 'search_flights',
    kind: 'discovery',
    timeoutMs: tripTimeoutMs(env.FLIGHT_TIMEOUT_MS),
    description:
      'Search flights for a trip. Round trips are searched as an outbound and a return leg; give either ' +
      'return_date or days_flex. Offers are tagged with direction "outbound" or "return".',
    returns: { type: 'object', description: 'Outbound and return offers with per-leg status' },
    parameters: z.object({
      trip_type: z.string().default('round-trip').describe("'one-way' or 'round-trip'"),
      departure: z.string().describe('Origin airport or city code (e.g., JFK)'),
      arrival: z.string().describe('Destination airport or city code (e.g., LHR)'),
      departure_date: z.string().describe('Outbound date, YYYY-MM-DD'),
      return_date: z.string().optional().describe('Return date, YYYY-MM-DD (round trips)'),
      days_flex: z.number().int().default(0).describe('Flexible window in days (0-7)'),
      ...legOptionsShape,
    }),
    execute: async args => {
      const tripType = normalizeTripType(args.trip_type);
      const invalid = validateFlightInputs({
        tripType: args.trip_type,
        departure: args.departure,
        arrival: args.arrival,
        departureDate: args.departure_date,
        returnDate: args.return_date,
        adults: args.adults,
        children: args.children,
        infants: args.infants,
        maxPrice: args.max_price,
        daysFlex: args.days_flex,
        maxDaysFlex: env.FLIGHT_MAX_FLEX_DAYS,
      });
      if (invalid || !tripType) {
        return providerFailure(ErrorCode.VALIDATION_ERROR, invalid ?? `Invalid trip type: '${args.trip_type}'.`, {
          outbound: [],
          return: [],
        });
      }

      return splitter.search({
        tripType,
        departure: args.departure.trim().toUpperCase(),
        arrival: args.arrival.trim().toUpperCase(),
        departureDate: args.departure_date,
        returnDate: tripType === 'round-trip' ? args.return_date : undefined,
        daysFlex: args.days_flex,
        legOptions: forwardedOptions(args),
      });
    },
  });
}
