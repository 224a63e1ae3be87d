import { randomUUID } from 'crypto';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { AGENTS, isAgentName } from '../services/orchestration/agents.js';
import type { StepOrchestrator } from '../services/orchestration/orchestrator.js';
import { TaskState } from '../services/orchestration/task-state.js';
import { AppError, ErrorCode, faultPolicy, formatErrorResponse } from '../utils/errors.js';

const RunTaskSchema = z.object({
  agent: z.string().min(1),
  task: z.string().min(1).max(4000),
  session_id: z.string().min(1).optional(),
  // Results of earlier steps, e.g. a flight_result the planner should pick from
  results: z.record(z.record(z.unknown())).optional().default({}),
});

export type TaskRouteOptions = {
  // null when no decision model is configured
  orchestrator: StepOrchestrator | null;
};

export async function taskRoutes(server: FastifyInstance, options: TaskRouteOptions) {
  server.post('/tasks/run', async (request, reply) => {
    const parsed = RunTaskSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      const error = AppError.validationError('Invalid task request', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
      });
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    const { agent, task, session_id, results } = parsed.data;

    if (!isAgentName(agent)) {
      const error = AppError.badRequest(`Unknown agent "${agent}"`, { agents: Object.keys(AGENTS) });
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    if (!options.orchestrator) {
      const error = new AppError(
        ErrorCode.API_ERROR,
        'No decision model is configured',
        503,
        'Set OPENAI_API_KEY to enable task orchestration.'
      );
      return reply.code(error.statusCode).send(formatErrorResponse(error));
    }

    const state = new TaskState(session_id ?? randomUUID(), results);
    const report = await options.orchestrator.runStep({ agent: AGENTS[agent], task }, state);
    const outcome = report.result;

    request.log.info(
      { agent, terminal: report.terminal, attempts: report.attempts, storedAs: report.storedAs },
      'Task step finished'
    );

    return {
      session_id: state.sessionId,
      agent,
      status: report.terminal === 'Accepted' ? 'accepted' : 'force_accepted',
      attempts: report.attempts,
      transitions: report.transitions,
      stored_as: report.storedAs,
      result: outcome.success ? outcome.payload : null,
      error: outcome.success
        ? null
        : {
            code: faultPolicy(outcome.code).wireCode,
            message: outcome.message,
            suggestion: outcome.suggestion,
          },
      rewrites: report.rewrites,
      state: state.snapshot(),
    };
  });
}
