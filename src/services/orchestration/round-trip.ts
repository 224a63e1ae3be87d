// Directional Query Splitter
// Turns one trip request into one or two single-direction leg searches through the dispatcher.
// The return date is explicit, or derived from the date the cheapest outbound offer matched.

import { z } from 'zod';
import { env } from '../../env.js';
import { ErrorCode, defaultSuggestion, faultPolicy } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import { addDays } from '../flights/filters.js';
import {
  FlightOfferSchema,
  type FlightDirection,
  type FlightOffer,
  type TaggedFlightOffer,
  type TripType,
} from '../flights/types.js';
import type { InvocationResult, ToolPayload } from '../tools/types.js';

const log = createChildLogger('round-trip');

export const LEG_TOOL = 'search_flight_leg';

export interface LegInvoker {
  invoke(name: string, args: ToolPayload): Promise<InvocationResult>;
}

export interface TripRequest {
  tripType: TripType;
  departure: string;
  arrival: string;
  departureDate: string;
  returnDate?: string;
  daysFlex: number;
  // Passed to every leg unchanged: currency, passengers, travel class, filters
  legOptions: ToolPayload;
}

export type ReturnStatus =
  | 'ok'
  | 'not_requested'
  | 'return_date_undetermined'
  | 'no_return_offers'
  | 'return_leg_failed';

export type LegFailure = {
  code: string;
  message: string;
  suggestion: string;
};

export type RoundTripResult = {
  error: boolean;
  trip_type: TripType;
  departure: string;
  arrival: string;
  departure_date: string;
  return_date: string | null;
  days_flex: number;
  outbound: TaggedFlightOffer[];
  return: TaggedFlightOffer[];
  return_status: ReturnStatus;
  note?: string;
  failures?: { outbound?: LegFailure; return?: LegFailure };
  error_code?: string;
  error_message?: string;
  suggestion?: string;
};

type LegOutcome =
  | { ok: true; offers: TaggedFlightOffer[]; args: ToolPayload }
  | { ok: false; failure: LegFailure; args: ToolPayload };

const OfferListSchema = z.array(FlightOfferSchema);

function tag(offers: FlightOffer[], direction: FlightDirection): TaggedFlightOffer[] {
  return offers.map(offer => ({ ...offer, direction }));
}

export interface SplitterOptions {
  legTool?: string;
  returnFlexCap?: number;
}

export class DirectionalQuerySplitter {
  private legTool: string;
  private returnFlexCap: number;

  constructor(
    private invoker: LegInvoker,
    options: SplitterOptions = {}
  ) {
    this.legTool = options.legTool ?? LEG_TOOL;
    this.returnFlexCap = options.returnFlexCap ?? env.FLIGHT_RETURN_FLEX_CAP;
  }

  async search(request: TripRequest): Promise<RoundTripResult> {
    const outboundArgs = this.legArgs(
      request,
      request.departure,
      request.arrival,
      request.departureDate,
      request.daysFlex
    );

    if (request.tripType === 'one-way') {
      const outbound = await this.runLeg(outboundArgs, 'outbound');
      return this.assemble(request, outbound, null, null, 'not_requested');
    }

    const returnFlex = Math.min(request.daysFlex, this.returnFlexCap);

    // Explicit return date: the legs are independent
    if (request.returnDate) {
      const returnArgs = this.legArgs(request, request.arrival, request.departure, request.returnDate, returnFlex);
      const [outbound, inbound] = await Promise.all([
        this.runLeg(outboundArgs, 'outbound'),
        this.runLeg(returnArgs, 'return'),
      ]);
      return this.assemble(request, outbound, inbound, request.returnDate, this.returnStatus(inbound));
    }

    // Flexible: the return date depends on what the outbound leg matched
    const outbound = await this.runLeg(outboundArgs, 'outbound');
    const returnDate = this.deriveReturnDate(outbound, request.daysFlex);

    if (!returnDate) {
      return this.assemble(request, outbound, null, null, 'return_date_undetermined');
    }

    const returnArgs = this.legArgs(request, request.arrival, request.departure, returnDate, returnFlex);
    const inbound = await this.runLeg(returnArgs, 'return');
    return this.assemble(request, outbound, inbound, returnDate, this.returnStatus(inbound));
  }

  // First outbound offer's matched date + the requested window
  private deriveReturnDate(outbound: LegOutcome, daysFlex: number): string | null {
    if (!outbound.ok || outbound.offers.length === 0) return null;
    const first = outbound.offers[0];
    const matched = first.search_date ?? (typeof outbound.args.date === 'string' ? outbound.args.date : null);
    return matched ? addDays(matched, daysFlex) : null;
  }

  private legArgs(
    request: TripRequest,
    origin: string,
    destination: string,
    date: string,
    daysFlex: number
  ): ToolPayload {
    return {
      ...request.legOptions,
      departure: origin,
      arrival: destination,
      date,
      days_flex: daysFlex,
    };
  }

  private async runLeg(args: ToolPayload, direction: FlightDirection): Promise<LegOutcome> {
    log.info(
      { direction, departure: args.departure, arrival: args.arrival, date: args.date, days_flex: args.days_flex },
      'Searching leg'
    );
    const result = await this.invoker.invoke(this.legTool, args);

    if (!result.success) {
      log.warn({ direction, code: result.code }, 'Leg search failed');
      return {
        ok: false,
        args,
        failure: { code: faultPolicy(result.code).wireCode, message: result.message, suggestion: result.suggestion },
      };
    }

    const parsed = OfferListSchema.safeParse(result.payload.flights ?? []);
    if (!parsed.success) {
      return {
        ok: false,
        args,
        failure: {
          code: ErrorCode.API_ERROR,
          message: 'The flight search returned offers in an unexpected format.',
          suggestion: defaultSuggestion(ErrorCode.API_ERROR),
        },
      };
    }

    log.info({ direction, offers: parsed.data.length }, 'Leg search finished');
    return { ok: true, args, offers: tag(parsed.data, direction) };
  }

  private returnStatus(inbound: LegOutcome): ReturnStatus {
    if (!inbound.ok) return 'return_leg_failed';
    return inbound.offers.length === 0 ? 'no_return_offers' : 'ok';
  }

  private assemble(
    request: TripRequest,
    outbound: LegOutcome,
    inbound: LegOutcome | null,
    returnDate: string | null,
    returnStatus: ReturnStatus
  ): RoundTripResult {
    const result: RoundTripResult = {
      error: false,
      trip_type: request.tripType,
      departure: request.departure,
      arrival: request.arrival,
      departure_date: request.departureDate,
      return_date: returnDate,
      days_flex: request.daysFlex,
      outbound: outbound.ok ? outbound.offers : [],
      return: inbound && inbound.ok ? inbound.offers : [],
      return_status: returnStatus,
    };

    const failures: NonNullable<RoundTripResult['failures']> = {};
    if (!outbound.ok) failures.outbound = outbound.failure;
    if (inbound && !inbound.ok) failures.return = inbound.failure;
    if (failures.outbound || failures.return) result.failures = failures;

    switch (returnStatus) {
      case 'return_date_undetermined':
        result.note = outbound.ok
          ? 'No return date could be determined: the outbound search returned no offers.'
          : 'No return date could be determined: the outbound search failed.';
        break;
      case 'no_return_offers':
        result.note = `A return date (${returnDate}) was determined, but no return flights matched it.`;
        break;
      case 'return_leg_failed':
        result.note = `A return date (${returnDate}) was determined, but the return search failed: ${failures.return?.message ?? 'unknown error'}`;
        break;
    }

    // Without an outbound leg the trip cannot be satisfied; a failed return leg alone is partial
    if (!outbound.ok) {
      const both = inbound !== null && !inbound.ok;
      result.error = true;
      result.error_code = outbound.failure.code;
      result.error_message = both
        ? `Both flight searches failed. Outbound: ${outbound.failure.message} Return: ${failures.return?.message ?? ''}`.trim()
        : `Outbound flight search failed: ${outbound.failure.message}`;
      result.suggestion = outbound.failure.suggestion;
    }

    return result;
  }
}
