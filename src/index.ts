// Travel Tool Gateway
// Tool listing, tool invocation and task orchestration over HTTP

// Load environment variables from .env file
import 'dotenv/config';

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { env, logConfiguration } from './env.js';
import { findProvider } from './providers/index.js';
import { taskRoutes } from './routes/tasks.js';
import { toolRoutes } from './routes/tools.js';
import { LlmToolDecider } from './services/orchestration/decider.js';
import { LlmJudge } from './services/orchestration/judge.js';
import { StepOrchestrator } from './services/orchestration/orchestrator.js';
import { ToolDispatcher, ToolRegistry, initializeTools } from './services/tools/index.js';

const PORT = env.PORT;
const HOST = env.HOST;

const server = Fastify({
  logger: {
    level: env.LOG_LEVEL,
    ...(env.NODE_ENV === 'development'
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : {}),
  },
});

await server.register(cors, {
  origin: ['http://localhost:3000', 'http://127.0.0.1:3000', 'http://localhost:8080', 'http://127.0.0.1:8080'],
  credentials: true,
});

// One registry per process, built before traffic and read thereafter
const registry = new ToolRegistry();
const dispatcher = new ToolDispatcher(registry);
initializeTools(registry, dispatcher);

const decisionProvider = findProvider('openai');
const orchestrator = decisionProvider
  ? new StepOrchestrator(registry, dispatcher, new LlmToolDecider(decisionProvider, env.DECISION_MODEL), {
      judge: env.JUDGE_ENABLED ? new LlmJudge(decisionProvider, env.JUDGE_MODEL) : null,
      maxAttempts: env.FEEDBACK_MAX_ATTEMPTS,
    })
  : null;

server.get('/v1/health', async () => {
  return {
    status: 'ok',
    timestamp: new Date().toISOString(),
    tools: registry.list().length,
    orchestration: orchestrator !== null,
  };
});

await server.register(toolRoutes, { prefix: '/v1', registry, dispatcher });
await server.register(taskRoutes, { prefix: '/v1', orchestrator });

try {
  await server.listen({ port: PORT, host: HOST });
  server.log.info(`Travel tool gateway listening on http://${HOST}:${PORT}`);
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
