import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { taskRoutes } from '../tasks.js';
import type { DecisionRequest, ToolDecider, ToolDecision } from '../../services/orchestration/decider.js';
import { StepOrchestrator } from '../../services/orchestration/orchestrator.js';
import { InMemoryPlanStore } from '../../services/planner/plan-store.js';
import { ToolDispatcher } from '../../services/tools/dispatcher.js';
import { registerPlannerTools } from '../../services/tools/planner-tools.js';
import { ToolRegistry } from '../../services/tools/registry.js';
import { ErrorCode, defaultSuggestion } from '../../utils/errors.js';

class FixedDecider implements ToolDecider {
  requests: DecisionRequest[] = [];

  constructor(private decision: ToolDecision) {}

  async decide(request: DecisionRequest): Promise<ToolDecision> {
    this.requests.push(request);
    return this.decision;
  }
}

const outboundOffer = {
  price: 250,
  flights: [
    {
      airline: 'Air One',
      departure_airport: { id: 'JFK', time: '2025-12-10 08:00' },
      arrival_airport: { id: 'LHR', time: '2025-12-10 20:00' },
    },
  ],
};

async function buildApp(decider: ToolDecider | null): Promise<FastifyInstance> {
  const registry = new ToolRegistry();
  registerPlannerTools(registry, new InMemoryPlanStore());
  const dispatcher = new ToolDispatcher(registry);
  const orchestrator = decider ? new StepOrchestrator(registry, dispatcher, decider, { maxAttempts: 2 }) : null;

  const app = Fastify({ logger: false });
  await app.register(taskRoutes, { prefix: '/v1', orchestrator });
  await app.ready();
  return app;
}

describe('Task Routes (POST /v1/tasks/run)', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  describe('request checks', () => {
    beforeEach(async () => {
      app = await buildApp(null);
    });

    it('should reject an empty task', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/tasks/run',
        payload: { agent: 'flight', task: '' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error.code).toBe('VALIDATION_ERROR');
    });

    it('should reject an unknown agent', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/tasks/run',
        payload: { agent: 'cruise', task: 'Find a cruise' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: {
          code: 'BAD_REQUEST',
          message: 'Unknown agent "cruise"',
          suggestion: defaultSuggestion(ErrorCode.BAD_REQUEST),
          details: { agents: ['flight', 'hotel', 'utilities', 'planner'] },
        },
      });
    });

    it('should answer 503 when no decision model is configured', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/tasks/run',
        payload: { agent: 'flight', task: 'Find flights' },
      });

      expect(response.statusCode).toBe(503);
      expect(response.json()).toEqual({
        error: {
          code: 'API_ERROR',
          message: 'No decision model is configured',
          suggestion: 'Set OPENAI_API_KEY to enable task orchestration.',
        },
      });
    });
  });

  it('should run one step against the supplied results', async () => {
    const decider = new FixedDecider({
      calls: [{ tool: 'add_plan_item', arguments: { title: 'Flight out', details: 'outbound_option_1' } }],
      content: '',
    });
    app = await buildApp(decider);

    const response = await app.inject({
      method: 'POST',
      url: '/v1/tasks/run',
      payload: {
        agent: 'planner',
        task: 'Save outbound_option_1',
        session_id: 's-9',
        results: { flight_result: { outbound: [outboundOffer], return: [] } },
      },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body).toMatchObject({
      session_id: 's-9',
      agent: 'planner',
      status: 'accepted',
      attempts: 1,
      transitions: ['Invoking', 'Judging', 'Accepted'],
      stored_as: 'plan_result',
      error: null,
      result: { error: false, action: 'added', item: { title: 'Flight out', type: 'flight', session_id: 's-9' } },
    });
    expect(body.rewrites).toEqual([
      {
        tool: 'add_plan_item',
        target: 'add_plan_item',
        action: 'injected',
        reason: 'expanded outbound_option_1 to the full offer',
      },
    ]);
    expect(Object.keys(body.state.results).sort()).toEqual(['flight_result', 'plan_result']);
    expect(body.state.retry_counters).toEqual({
      plan_result: { attempts: 1, retries: 0, last_terminal: 'Accepted' },
    });
    expect(decider.requests[0].available).toEqual(['flight_result']);
  });

  it('should report an accepted failure with its wire code', async () => {
    app = await buildApp(new FixedDecider({ calls: [{ tool: 'get_weather', arguments: {} }], content: '' }));

    const response = await app.inject({
      method: 'POST',
      url: '/v1/tasks/run',
      payload: { agent: 'utilities', task: 'Weather in Paris' },
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.status).toBe('accepted');
    expect(body.result).toBeNull();
    expect(body.error).toEqual({
      code: 'NOT_FOUND',
      message: 'Tool "get_weather" not found',
      suggestion: defaultSuggestion(ErrorCode.NOT_FOUND),
    });
    expect(typeof body.session_id).toBe('string');
  });
});
