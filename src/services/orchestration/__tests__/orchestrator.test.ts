import { describe, it, expect, beforeEach } from 'vitest';
import { z } from 'zod';
import { ErrorCode, defaultSuggestion, providerFailure } from '../../../utils/errors.js';
import { InMemoryPlanStore } from '../../planner/plan-store.js';
import { ToolDispatcher } from '../../tools/dispatcher.js';
import { registerHotelTools } from '../../tools/hotel-tools.js';
import { registerPlannerTools } from '../../tools/planner-tools.js';
import { ToolRegistry } from '../../tools/registry.js';
import { AGENTS } from '../agents.js';
import type { DecisionRequest, ToolDecider, ToolDecision } from '../decider.js';
import { StepOrchestrator } from '../orchestrator.js';
import { TaskState } from '../task-state.js';

class ScriptedDecider implements ToolDecider {
  requests: DecisionRequest[] = [];
  private turn = 0;

  constructor(private script: Array<ToolDecision | Error>) {}

  async decide(request: DecisionRequest): Promise<ToolDecision> {
    this.requests.push(request);
    const next = this.script[Math.min(this.turn, this.script.length - 1)];
    this.turn++;
    if (next instanceof Error) throw next;
    return next;
  }
}

const decide = (...calls: Array<[string, Record<string, unknown>]>): ToolDecision => ({
  calls: calls.map(([tool, args]) => ({ tool, arguments: args })),
  content: '',
});

const offer = (airline: string, price: number, from: string, to: string) => ({
  price,
  flights: [
    {
      airline,
      departure_airport: { id: from, time: '2025-12-10 08:00' },
      arrival_airport: { id: to, time: '2025-12-10 20:00' },
    },
  ],
});

const flightResult = {
  error: false,
  outbound: [offer('Air One', 250, 'JFK', 'LHR'), offer('Air Two', 320, 'JFK', 'LHR')],
  return: [offer('Air Three', 280, 'LHR', 'JFK')],
};

describe('Step Orchestrator', () => {
  let registry: ToolRegistry;
  let dispatcher: ToolDispatcher;
  let store: InMemoryPlanStore;
  let state: TaskState;

  beforeEach(() => {
    registry = new ToolRegistry();
    dispatcher = new ToolDispatcher(registry, { defaultTimeoutMs: 1000 });
    store = new InMemoryPlanStore();
    state = new TaskState('s-1');

    registry.register({
      name: 'search_flights',
      kind: 'discovery',
      description: 'Search flights',
      parameters: z.object({ departure: z.string() }),
      execute: () => structuredClone(flightResult),
    });
    registry.register({
      name: 'get_weather',
      description: 'Forecast for a location',
      parameters: z.object({ location: z.string() }),
      execute: args =>
        args.location === 'Atlantis'
          ? providerFailure(ErrorCode.DATA_UNAVAILABLE, 'No forecast for Atlantis', { forecast: [] })
          : { error: false, location: args.location, forecast: [{ day: 1 }] },
    });
    registerPlannerTools(registry, store);
  });

  const orchestrate = (decider: ToolDecider) => new StepOrchestrator(registry, dispatcher, decider, { maxAttempts: 2 });

  it('should dispatch the decided call and store the result under the agent key', async () => {
    const decider = new ScriptedDecider([decide(['search_flights', { departure: 'JFK' }])]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.flight, task: 'Find flights from JFK' }, state);

    expect(report.agent).toBe('flight');
    expect(report.terminal).toBe('Accepted');
    expect(report.attempts).toBe(1);
    expect(report.storedAs).toBe('flight_result');
    expect(state.get('flight_result')).toEqual(flightResult);
    expect(report.rewrites).toEqual([{ tool: 'search_flights', target: 'search_flights', action: 'none' }]);
    expect(decider.requests[0].tools.map(tool => tool.name)).toEqual(['search_flights']);
    expect(decider.requests[0].feedback).toBeNull();
  });

  it('should reject a tool outside the agent allow-list without dispatching it', async () => {
    const decider = new ScriptedDecider([decide(['get_weather', { location: 'Paris' }])]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.flight, task: 'Find flights' }, state);

    expect(report.attempts).toBe(1);
    expect(report.terminal).toBe('Accepted');
    expect(report.storedAs).toBe('flight_result');
    expect(report.result).toMatchObject({
      success: false,
      tool: 'get_weather',
      code: ErrorCode.BAD_REQUEST,
      message: 'Tool "get_weather" is not allowed for the flight agent',
      details: { allowed: ['search_flights', 'search_flight_leg'] },
    });
    expect(state.failure('flight_result')?.code).toBe(ErrorCode.BAD_REQUEST);
    expect(state.has('utilities_result')).toBe(false);
  });

  it('should save the chosen offer instead of searching again and keep the offers', async () => {
    state = new TaskState('s-1', { flight_result: flightResult });
    const decider = new ScriptedDecider([decide(['search_flights', { departure: 'JFK' }])]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.flight, task: 'Book outbound option 2' }, state);

    expect(report.rewrites).toEqual([
      {
        tool: 'search_flights',
        target: 'add_plan_item',
        action: 'rewritten',
        reason: 'completion intent; selected outbound_option_2',
      },
    ]);
    expect(report.result.tool).toBe('add_plan_item');
    expect(report.storedAs).toBe('plan_result');
    expect(state.get('plan_result')).toMatchObject({
      error: false,
      action: 'added',
      item: { session_id: 's-1', title: 'Outbound flight option 2: JFK → LHR (Air Two)', type: 'flight' },
    });
    expect(state.get('flight_result')).toEqual(flightResult);

    const saved = await store.list('s-1');
    expect(saved).toHaveLength(1);
    expect(saved[0].details).toEqual({ ...flightResult.outbound[1], direction: 'outbound' });
  });

  it('should block a search when the chosen option cannot be identified', async () => {
    state = new TaskState('s-1', { flight_result: flightResult });
    const decider = new ScriptedDecider([decide(['search_flights', { departure: 'JFK' }])]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.flight, task: 'Book it' }, state);

    expect(report.attempts).toBe(1);
    expect(report.result).toMatchObject({
      success: false,
      code: ErrorCode.BAD_REQUEST,
      message: 'The request is to finalize a choice, but no option could be identified from prior results.',
    });
    expect(report.rewrites[0].action).toBe('blocked');
    expect(report.storedAs).toBe('flight_result');
    expect(state.get('flight_result')).toEqual(flightResult);
    expect(state.failure('flight_result')?.code).toBe(ErrorCode.BAD_REQUEST);
  });

  it('should still save the chosen offer when the first decision fails', async () => {
    state = new TaskState('s-1', { flight_result: flightResult });
    const decider = new ScriptedDecider([new Error('model offline'), decide(['search_flights', { departure: 'JFK' }])]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.flight, task: 'Book outbound option 2' }, state);

    expect(report.attempts).toBe(2);
    expect(report.terminal).toBe('Accepted');
    expect(report.result.tool).toBe('add_plan_item');
    expect(report.rewrites.map(note => note.action)).toEqual(['rewritten']);
    expect(report.storedAs).toBe('plan_result');
    expect(state.get('flight_result')).toEqual(flightResult);
    expect(await store.list('s-1')).toHaveLength(1);
  });

  it('should store hotel searches under the hotel key and leave flight offers alone', async () => {
    const hotels = [{ hotelId: 'h-1', name: 'Harbour Inn', price: 140 }];
    registerHotelTools(registry, { searchRates: async () => hotels, getHotel: async () => null });
    state = new TaskState('s-1', { flight_result: flightResult });
    const search = { checkin: '2025-12-10', checkout: '2025-12-17', occupancies: [{ adults: 1 }], iata_code: 'LHR' };
    const decider = new ScriptedDecider([decide(['get_hotel_rates', search])]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.hotel, task: 'Book option 2 near Heathrow' }, state);

    expect(report.terminal).toBe('Accepted');
    expect(report.storedAs).toBe('hotel_result');
    expect(report.rewrites).toEqual([{ tool: 'get_hotel_rates', target: 'get_hotel_rates', action: 'none' }]);
    expect(state.get('hotel_result')).toMatchObject({ error: false, hotels, count: 1 });
    expect(state.get('flight_result')).toEqual(flightResult);
    expect(decider.requests[0].tools.map(tool => tool.name)).toEqual(['get_hotel_rates', 'get_hotel_details']);
  });

  it('should merge several calls of one turn in their original order', async () => {
    const decider = new ScriptedDecider([
      decide(
        ['get_weather', { location: 'Paris' }],
        ['get_weather', { location: 'Atlantis' }],
        ['search_flights', { departure: 'CDG' }]
      ),
    ]);

    const report = await orchestrate(decider).runStep(
      { agent: AGENTS.utilities, task: 'Weather in Paris and Atlantis' },
      state
    );

    expect(report.terminal).toBe('Accepted');
    expect(report.storedAs).toBe('utilities_result');
    expect(report.result.tool).toBe('multiple_tools');
    expect(state.get('utilities_result')).toEqual({
      multiple_results: true,
      results: [
        { tool: 'get_weather', result: { error: false, location: 'Paris', forecast: [{ day: 1 }] } },
        {
          tool: 'get_weather',
          result: {
            error: true,
            error_code: 'DATA_UNAVAILABLE',
            error_message: 'No forecast for Atlantis',
            suggestion: defaultSuggestion(ErrorCode.DATA_UNAVAILABLE),
          },
        },
        {
          tool: 'search_flights',
          result: {
            error: true,
            error_code: 'BAD_REQUEST',
            error_message: 'Tool "search_flights" is not allowed for the utilities agent',
            suggestion: defaultSuggestion(ErrorCode.BAD_REQUEST),
          },
        },
      ],
    });
  });

  it('should retry when the decision model fails and pass the failure on as feedback', async () => {
    const decider = new ScriptedDecider([new Error('model offline'), decide(['get_weather', { location: 'Paris' }])]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.utilities, task: 'Weather in Paris' }, state);

    expect(report.attempts).toBe(2);
    expect(report.terminal).toBe('Accepted');
    expect(decider.requests[1].feedback).toBe(
      'The previous call to tool_decision failed (EXECUTION_ERROR): Tool decision failed: model offline\n\n' +
        defaultSuggestion(ErrorCode.EXECUTION_ERROR)
    );
    expect(state.get('utilities_result')).toEqual({ error: false, location: 'Paris', forecast: [{ day: 1 }] });
  });

  it('should force-accept when the decision model never calls a tool', async () => {
    const decider = new ScriptedDecider([{ calls: [], content: 'I cannot help with that' }]);

    const report = await orchestrate(decider).runStep({ agent: AGENTS.utilities, task: 'Weather' }, state);

    expect(report.attempts).toBe(2);
    expect(report.terminal).toBe('ForceAccepted');
    expect(report.result).toMatchObject({
      success: false,
      tool: 'tool_decision',
      code: ErrorCode.EXECUTION_ERROR,
      details: { content: 'I cannot help with that' },
    });
    expect(state.failure('utilities_result')?.message).toBe('The decision model did not request any tool call.');
  });

  it('should run the steps of a task in order against the same state', async () => {
    const decider = new ScriptedDecider([
      decide(['search_flights', { departure: 'JFK' }]),
      decide(['add_plan_item', { title: 'Flight out', details: 'outbound_option_1' }]),
    ]);

    const reports = await orchestrate(decider).runTask(
      [
        { agent: AGENTS.flight, task: 'Find flights from JFK to LHR' },
        { agent: AGENTS.planner, task: 'Save outbound_option_1' },
      ],
      state
    );

    expect(reports.map(report => report.storedAs)).toEqual(['flight_result', 'plan_result']);
    expect(decider.requests[1].available).toEqual(['flight_result']);
    expect(reports[1].rewrites[0]).toEqual({
      tool: 'add_plan_item',
      target: 'add_plan_item',
      action: 'injected',
      reason: 'expanded outbound_option_1 to the full offer',
    });
    expect(state.get('plan_result')).toMatchObject({
      action: 'added',
      item: { title: 'Flight out', type: 'flight', details: { price: 250, direction: 'outbound' } },
    });
  });
});
