import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorCode, ProviderHttpError } from '../../../utils/errors.js';
import type { FlightOffer, FlightProvider, LegQuery } from '../../flights/types.js';
import { ToolDispatcher } from '../dispatcher.js';
import { TRIP_TIMEOUT_MARGIN_MS, registerFlightTools, tripTimeoutMs } from '../flight-tools.js';
import { ToolRegistry } from '../registry.js';

type Response = FlightOffer[] | Error;

class FakeFlightProvider implements FlightProvider {
  queries: LegQuery[] = [];
  responses: Map<string, Response> = new Map();

  respond(route: string, date: string, response: Response): void {
    this.responses.set(`${route} ${date}`, response);
  }

  async searchOneWay(query: LegQuery): Promise<FlightOffer[]> {
    this.queries.push(query);
    const response = this.responses.get(`${query.origin}-${query.destination} ${query.date}`) ?? [];
    if (response instanceof Error) throw response;
    return response;
  }
}

const priced = (price: number): FlightOffer => ({ price, flights: [] });

describe('Flight tools', () => {
  let provider: FakeFlightProvider;
  let registry: ToolRegistry;
  let dispatcher: ToolDispatcher;

  beforeEach(() => {
    registry = new ToolRegistry();
    provider = new FakeFlightProvider();
    dispatcher = new ToolDispatcher(registry);
    registerFlightTools(registry, { provider, invoker: dispatcher });
  });

  describe('search_flight_leg', () => {
    it('should search one direction with default options', async () => {
      provider.respond('JFK-LHR', '2025-12-10', [priced(300)]);

      const result = await dispatcher.invoke('search_flight_leg', {
        departure: 'jfk',
        arrival: ' lhr ',
        date: '2025-12-10',
      });

      expect(provider.queries).toEqual([
        {
          origin: 'JFK',
          destination: 'LHR',
          date: '2025-12-10',
          currency: 'USD',
          travelClass: 1,
          passengers: { adults: 1, children: 0, infants: 0 },
        },
      ]);
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.payload).toEqual({
        error: false,
        flights: [{ price: 300, flights: [], search_date: '2025-12-10' }],
        departure: 'JFK',
        arrival: 'LHR',
        departure_date: '2025-12-10',
        days_flex: 0,
        searched_dates: ['2025-12-10'],
        currency: 'USD',
        passengers: { adults: 1, children: 0, infants: 0 },
      });
    });

    it('should search a flexible window and pass class and currency through', async () => {
      provider.respond('JFK-LHR', '2025-12-09', [priced(300)]);
      provider.respond('JFK-LHR', '2025-12-10', [priced(100)]);
      provider.respond('JFK-LHR', '2025-12-11', [priced(200)]);

      const result = await dispatcher.invoke('search_flight_leg', {
        departure: 'JFK',
        arrival: 'LHR',
        date: '2025-12-10',
        days_flex: 1,
        travel_class: 'business',
        currency: 'eur',
      });

      expect(provider.queries.map(q => [q.date, q.travelClass, q.currency])).toEqual([
        ['2025-12-09', 3, 'EUR'],
        ['2025-12-10', 3, 'EUR'],
        ['2025-12-11', 3, 'EUR'],
      ]);
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.payload.searched_dates).toEqual(['2025-12-09', '2025-12-10', '2025-12-11']);
      expect(result.payload.flights).toEqual([
        { price: 100, flights: [], search_date: '2025-12-10' },
        { price: 200, flights: [], search_date: '2025-12-11' },
        { price: 300, flights: [], search_date: '2025-12-09' },
      ]);
    });

    it('should report invalid inputs as VALIDATION_ERROR without calling the provider', async () => {
      const badDate = await dispatcher.invoke('search_flight_leg', {
        departure: 'JFK',
        arrival: 'LHR',
        date: '10/12/2025',
      });
      const wideWindow = await dispatcher.invoke('search_flight_leg', {
        departure: 'JFK',
        arrival: 'LHR',
        date: '2025-12-10',
        days_flex: 9,
      });

      expect(badDate).toMatchObject({
        success: false,
        code: ErrorCode.VALIDATION_ERROR,
        message: "Invalid departure date format: '10/12/2025'. Expected format: YYYY-MM-DD (e.g., 2025-12-10).",
        retriable: false,
      });
      expect(wideWindow).toMatchObject({
        success: false,
        code: ErrorCode.VALIDATION_ERROR,
        message: 'Invalid days_flex: 9. Must be between 0 and 7.',
      });
      expect(provider.queries).toHaveLength(0);
    });

    it('should map a provider HTTP 429 onto a retriable HTTP_ERROR', async () => {
      provider.respond('JFK-LHR', '2025-12-10', new ProviderHttpError('flight search', 429));

      const result = await dispatcher.invoke('search_flight_leg', {
        departure: 'JFK',
        arrival: 'LHR',
        date: '2025-12-10',
      });

      expect(result).toMatchObject({
        success: false,
        code: ErrorCode.HTTP_ERROR,
        message: 'Too many requests. Please wait a moment and try again.',
        retriable: true,
      });
      if (result.success) return;
      expect(result.details?.payload).toMatchObject({ flights: [] });
    });
  });

  describe('search_flights', () => {
    it('should split a round trip into an outbound and a return leg', async () => {
      provider.respond('JFK-LHR', '2025-12-10', [priced(250)]);
      provider.respond('LHR-JFK', '2025-12-17', [priced(180)]);

      const result = await dispatcher.invoke('search_flights', {
        departure: 'jfk',
        arrival: 'lhr',
        departure_date: '2025-12-10',
        return_date: '2025-12-17',
        currency: 'eur',
      });

      expect(provider.queries.map(q => `${q.origin}-${q.destination} ${q.date} ${q.currency}`).sort()).toEqual([
        'JFK-LHR 2025-12-10 EUR',
        'LHR-JFK 2025-12-17 EUR',
      ]);
      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.payload).toMatchObject({
        error: false,
        trip_type: 'round-trip',
        departure: 'JFK',
        arrival: 'LHR',
        return_date: '2025-12-17',
        return_status: 'ok',
        outbound: [{ price: 250, flights: [], search_date: '2025-12-10', direction: 'outbound' }],
        return: [{ price: 180, flights: [], search_date: '2025-12-17', direction: 'return' }],
      });
    });

    it('should search a single leg for one-way trips even when a return date is given', async () => {
      provider.respond('JFK-LHR', '2025-12-10', [priced(250)]);

      const result = await dispatcher.invoke('search_flights', {
        trip_type: 'one way',
        departure: 'JFK',
        arrival: 'LHR',
        departure_date: '2025-12-10',
        return_date: '2025-12-17',
      });

      expect(provider.queries).toHaveLength(1);
      expect(result).toMatchObject({ success: true, payload: { trip_type: 'one-way', return_status: 'not_requested' } });
    });

    it('should require a return date or a flexible window for round trips', async () => {
      const result = await dispatcher.invoke('search_flights', {
        departure: 'JFK',
        arrival: 'LHR',
        departure_date: '2025-12-10',
      });

      expect(result).toMatchObject({
        success: false,
        code: ErrorCode.VALIDATION_ERROR,
        message:
          'Return date is required for round-trip flights unless a flexible date window is given (YYYY-MM-DD, e.g., 2025-12-17).',
      });
      expect(provider.queries).toHaveLength(0);
    });

    it('should fail with the outbound code when both legs fail', async () => {
      provider.respond('JFK-LHR', '2025-12-10', new Error('fetch failed'));
      provider.respond('LHR-JFK', '2025-12-17', new Error('fetch failed'));

      const result = await dispatcher.invoke('search_flights', {
        departure: 'JFK',
        arrival: 'LHR',
        departure_date: '2025-12-10',
        return_date: '2025-12-17',
      });

      expect(result).toMatchObject({ success: false, code: ErrorCode.NETWORK_ERROR, retriable: true });
      if (result.success) return;
      expect(result.message).toBe(
        'Both flight searches failed. ' +
          'Outbound: Network error: Unable to connect to the flight search service. fetch failed ' +
          'Return: Network error: Unable to connect to the flight search service. fetch failed'
      );
    });
  });

  it('should give the trip search more time than its two legs together', () => {
    const leg = registry.resolve('search_flight_leg')?.timeoutMs ?? 0;
    const trip = registry.resolve('search_flights')?.timeoutMs ?? 0;

    expect(tripTimeoutMs(1000)).toBe(2000 + TRIP_TIMEOUT_MARGIN_MS);
    expect(leg).toBeGreaterThan(0);
    expect(trip).toBe(leg * 2 + TRIP_TIMEOUT_MARGIN_MS);
  });
});
