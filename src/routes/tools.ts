import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { ToolDispatcher } from '../services/tools/dispatcher.js';
import type { ToolRegistry } from '../services/tools/registry.js';
import type { InvocationFailure } from '../services/tools/types.js';
import { AppError, faultPolicy, formatErrorResponse, type ErrorResponse } from '../utils/errors.js';

const InvokeToolSchema = z.object({
  tool: z.string().min(1),
  parameters: z.record(z.unknown()).optional().default({}),
});

export type ToolRouteOptions = {
  registry: ToolRegistry;
  dispatcher: ToolDispatcher;
};

function failureResponse(failure: InvocationFailure): ErrorResponse {
  const response: ErrorResponse = {
    error: {
      code: faultPolicy(failure.code).wireCode,
      message: failure.message,
      suggestion: failure.suggestion,
    },
  };
  if (failure.details) {
    response.error.details = failure.details;
  }
  return response;
}

export async function toolRoutes(server: FastifyInstance, options: ToolRouteOptions) {
  const { registry, dispatcher } = options;

  // What an orchestrating agent may call
  server.get('/tools', async () => {
    return { tools: registry.toListing() };
  });

  server.post('/tools/invoke', async (request, reply) => {
    const parsed = InvokeToolSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      const error = AppError.validationError('Invalid tool invocation request', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.') || '(body)'}: ${issue.message}`),
      });
      return reply.code(error.statusCode).send(formatErrorResponse(error, true));
    }

    const result = await dispatcher.invoke(parsed.data.tool, parsed.data.parameters);

    if (result.success) {
      return { result: result.payload };
    }

    return reply.code(faultPolicy(result.code).statusCode).send(failureResponse(result));
  });
}
