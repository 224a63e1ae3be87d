import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { InMemoryPlanStore } from '../../planner/plan-store.js';
import { registerPlannerTools } from '../../tools/planner-tools.js';
import { ToolRegistry } from '../../tools/registry.js';
import { ArgumentNormalizer, coerceValue, indexFlightOptions } from '../normalizer.js';
import { TaskState } from '../task-state.js';

const outboundOne = {
  price: 250,
  flights: [
    {
      airline: 'Air One',
      departure_airport: { id: 'JFK', time: '2025-12-10 08:00' },
      arrival_airport: { id: 'LHR', time: '2025-12-10 20:00' },
      duration: 420,
    },
  ],
};

const outboundTwo = {
  price: 320,
  flights: [
    {
      airline: 'Air Two',
      departure_airport: { id: 'JFK', time: '2025-12-10 09:00' },
      arrival_airport: { id: 'LHR', time: '2025-12-10 21:00' },
      duration: 420,
    },
  ],
};

const returnOne = {
  price: 280,
  flights: [
    {
      airline: 'Air Three',
      departure_airport: { id: 'LHR', time: '2025-12-17 10:00' },
      arrival_airport: { id: 'JFK', time: '2025-12-17 13:00' },
      duration: 480,
    },
  ],
};

const flightResult = { error: false, outbound: [outboundOne, outboundTwo], return: [returnOne] };

describe('Argument Normalizer', () => {
  let registry: ToolRegistry;
  let normalizer: ArgumentNormalizer;

  beforeEach(() => {
    registry = new ToolRegistry();
    registry.register({
      name: 'search_flights',
      kind: 'discovery',
      description: 'Search flights',
      parameters: z.object({
        departure: z.string(),
        adults: z.number().int().default(1),
        direct_only: z.boolean().optional(),
        max_price: z.number().optional(),
      }),
      execute: () => ({ outbound: [] }),
    });
    registerPlannerTools(registry, new InMemoryPlanStore());
    normalizer = new ArgumentNormalizer(registry);
  });

  describe('coercion and defaults', () => {
    it('should coerce numeric and boolean strings', () => {
      const state = new TaskState('s-1');
      const call = normalizer.normalize(
        'search_flights',
        { departure: 'JFK', adults: '2', direct_only: 'TRUE', max_price: ' 400.5 ' },
        { taskDescription: 'find flights to London', state }
      );

      expect(call.arguments).toEqual({ departure: 'JFK', adults: 2, direct_only: true, max_price: 400.5 });
      expect(call.rewrite.action).toBe('none');
    });

    it('should leave non-numeric strings alone', () => {
      expect(coerceValue('two', { type: 'integer' })).toBe('two');
      expect(coerceValue('yes', { type: 'boolean' })).toBe('yes');
      expect(coerceValue('12', { type: 'string' })).toBe('12');
    });

    it('should coerce array items by their schema', () => {
      expect(coerceValue(['1', '2'], { type: 'array', items: { type: 'number' } })).toEqual([1, 2]);
    });

    it('should inject defaults for absent optional fields', () => {
      const state = new TaskState('s-1');
      const call = normalizer.normalize('search_flights', { departure: 'JFK' }, { taskDescription: 'find flights', state });

      expect(call.arguments).toEqual({ departure: 'JFK', adults: 1 });
    });

    it('should inject the session id when the tool takes one', () => {
      const state = new TaskState('s-1');
      const call = normalizer.normalize(
        'add_plan_item',
        { title: 'Hotel Lisboa', details: { name: 'Hotel Lisboa' } },
        { taskDescription: 'save the hotel', state }
      );

      expect(call.arguments).toEqual({
        title: 'Hotel Lisboa',
        details: { name: 'Hotel Lisboa' },
        type: 'other',
        status: 'not_booked',
        session_id: 's-1',
      });
    });

    it('should pass unknown tools through untouched', () => {
      const state = new TaskState('s-1');
      const call = normalizer.normalize('mystery', { a: '1' }, { taskDescription: 'book it', state });

      expect(call).toEqual({ tool: 'mystery', arguments: { a: '1' }, rewrite: { action: 'none', reason: 'unknown tool' } });
    });
  });

  describe('intent rewriting', () => {
    it('should rewrite a search into saving the referenced offer', () => {
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize(
        'search_flights',
        { departure: 'JFK' },
        { taskDescription: 'Book outbound option 2', state }
      );

      expect(call.tool).toBe('add_plan_item');
      expect(call.rewrite).toEqual({ action: 'rewritten', reason: 'completion intent; selected outbound_option_2' });
      expect(call.arguments).toEqual({
        session_id: 's-1',
        title: 'Outbound flight option 2: JFK → LHR (Air Two)',
        type: 'flight',
        details: { ...outboundTwo, direction: 'outbound' },
      });
    });

    it('should pick the return list when the task asks for the return flight', () => {
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize(
        'search_flights',
        { departure: 'LHR' },
        { taskDescription: 'Book the return flight, option 1', state }
      );

      expect(call.tool).toBe('add_plan_item');
      expect(call.arguments.title).toBe('Return flight option 1: LHR → JFK (Air Three)');
      expect(call.arguments.details).toEqual({ ...returnOne, direction: 'return' });
    });

    it('should block a search when the choice cannot be identified', () => {
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize('search_flights', { departure: 'JFK' }, { taskDescription: 'Book it', state });

      expect(call.tool).toBe('search_flights');
      expect(call.rewrite.action).toBe('blocked');
    });

    it('should pass a search through when there are no prior results', () => {
      const state = new TaskState('s-1');
      const call = normalizer.normalize('search_flights', { departure: 'JFK' }, { taskDescription: 'Book option 1', state });

      expect(call.tool).toBe('search_flights');
      expect(call.rewrite).toEqual({ action: 'none', reason: 'no prior results to complete from' });
    });

    it('should leave a hotel search alone under completion intent', () => {
      registry.register({
        name: 'get_hotel_rates',
        kind: 'discovery',
        description: 'Search hotels',
        parameters: z.object({ iata_code: z.string() }),
        execute: () => ({ hotels: [] }),
      });
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize(
        'get_hotel_rates',
        { iata_code: 'LHR' },
        { taskDescription: 'Book option 2', state }
      );

      expect(call).toEqual({ tool: 'get_hotel_rates', arguments: { iata_code: 'LHR' }, rewrite: { action: 'none' } });
    });

    it('should not rewrite when the task also asks to search', () => {
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize(
        'search_flights',
        { departure: 'JFK' },
        { taskDescription: 'Find and book a flight', state }
      );

      expect(call.tool).toBe('search_flights');
      expect(call.rewrite.action).toBe('none');
    });

    it('should replace a string reference with the full offer', () => {
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize(
        'add_plan_item',
        { title: 'Flight out', details: 'outbound_option_1' },
        { taskDescription: 'Save outbound_option_1', state }
      );

      expect(call.rewrite).toEqual({ action: 'injected', reason: 'expanded outbound_option_1 to the full offer' });
      expect(call.arguments.type).toBe('flight');
      expect(call.arguments.details).toEqual({ ...outboundOne, direction: 'outbound' });
    });

    it('should correct the direction of a reference to match the task', () => {
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize(
        'add_plan_item',
        { title: 'Flight back', type: 'flight', details: 'outbound_option_1' },
        { taskDescription: 'Save the return flight', state }
      );

      expect(call.rewrite).toEqual({ action: 'injected', reason: 'corrected outbound_option_1 to return_option_1' });
      expect(call.arguments.details).toEqual({ ...returnOne, direction: 'return' });
    });

    it('should leave an unresolvable reference for validation to reject', () => {
      const state = new TaskState('s-1', { flight_result: flightResult });
      const call = normalizer.normalize(
        'add_plan_item',
        { title: 'Flight', details: 'outbound_option_9' },
        { taskDescription: 'Save outbound_option_9', state }
      );

      expect(call.rewrite).toEqual({ action: 'none', reason: 'unresolved reference "outbound_option_9"' });
      expect(call.arguments.details).toBe('outbound_option_9');
    });
  });

  describe('indexFlightOptions', () => {
    it('should index single-leg results as outbound', () => {
      const index = indexFlightOptions({ flights: [outboundOne] });
      expect(Array.from(index.keys())).toEqual(['outbound_option_1']);
    });

    it('should return an empty index without prior results', () => {
      expect(indexFlightOptions(undefined).size).toBe(0);
    });
  });
});
