// Step Orchestrator
// One orchestration step: decide -> allow-list -> normalize -> dispatch, run inside the feedback controller.
// Steps of one task run one after another against the same TaskState.

import { ErrorCode, defaultSuggestion, faultPolicy } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { ToolDispatcher } from '../tools/dispatcher.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { InvocationFailure, InvocationRequest, InvocationResult } from '../tools/types.js';
import { AGENTS, isAllowed, type AgentProfile } from './agents.js';
import type { ToolDecider, ToolDecision } from './decider.js';
import { FeedbackController } from './feedback-controller.js';
import { ArgumentNormalizer, type RewriteAction } from './normalizer.js';
import type { TaskState } from './task-state.js';
import type { Judge, MultiResultPayload, StepOutcome } from './types.js';

const log = createChildLogger('orchestrator');

// Pseudo tool names for failures that happen before any tool runs
const DECISION = 'tool_decision';
const MULTIPLE = 'multiple_tools';

export interface StepRequest {
  agent: AgentProfile;
  task: string;
}

export interface RewriteNote {
  tool: string;
  // Tool actually dispatched; differs from `tool` when the call was rewritten
  target: string;
  action: RewriteAction;
  reason?: string;
}

export interface StepReport extends StepOutcome {
  agent: string;
  rewrites: RewriteNote[];
}

export interface StepOrchestratorOptions {
  judge?: Judge | null;
  maxAttempts?: number;
}

type PreparedCall = { ok: true; call: InvocationRequest } | { ok: false; failure: InvocationFailure };

function stepFailure(
  tool: string,
  code: ErrorCode,
  message: string,
  startTime: number,
  details?: Record<string, unknown>
): InvocationFailure {
  return {
    success: false,
    tool,
    code,
    message,
    retriable: faultPolicy(code).retriable,
    suggestion: defaultSuggestion(code),
    ...(details ? { details } : {}),
    durationMs: Date.now() - startTime,
  };
}

// Results of a rewritten call belong to the agent that owns the tool it was rewritten to
function ownerKey(agent: AgentProfile, tool: string, rewrites: readonly RewriteNote[]): string {
  const rewritten = rewrites.some(note => note.target === tool && note.target !== note.tool);
  if (!rewritten || isAllowed(agent, tool)) return agent.resultKey;
  const owner = Object.values(AGENTS).find(profile => isAllowed(profile, tool));
  return owner ? owner.resultKey : agent.resultKey;
}

export class StepOrchestrator {
  private controller: FeedbackController;
  private normalizer: ArgumentNormalizer;

  constructor(
    private registry: ToolRegistry,
    private dispatcher: ToolDispatcher,
    private decider: ToolDecider,
    options: StepOrchestratorOptions = {}
  ) {
    this.controller = new FeedbackController(options.judge ?? null, { maxAttempts: options.maxAttempts });
    this.normalizer = new ArgumentNormalizer(registry);
  }

  async runStep(request: StepRequest, state: TaskState): Promise<StepReport> {
    const rewrites: RewriteNote[] = [];

    const outcome = await this.controller.run(
      {
        key: request.agent.resultKey,
        taskDescription: request.task,
        invoke: feedback => this.attempt(request, state, feedback, rewrites),
        resultKey: result => ownerKey(request.agent, result.tool, rewrites),
      },
      state
    );

    return { ...outcome, agent: request.agent.name, rewrites };
  }

  async runTask(requests: readonly StepRequest[], state: TaskState): Promise<StepReport[]> {
    const reports: StepReport[] = [];
    for (const request of requests) {
      reports.push(await this.runStep(request, state));
    }
    return reports;
  }

  private async attempt(
    request: StepRequest,
    state: TaskState,
    feedback: string | null,
    rewrites: RewriteNote[]
  ): Promise<InvocationResult> {
    const startTime = Date.now();
    const { agent, task } = request;

    let decision: ToolDecision;
    try {
      decision = await this.decider.decide({
        agent,
        task,
        tools: this.registry.toFunctionDefinitions(agent.tools),
        feedback,
        available: state.keys(),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ agent: agent.name, err: error }, 'Tool decision failed');
      return stepFailure(DECISION, ErrorCode.EXECUTION_ERROR, `Tool decision failed: ${message}`, startTime);
    }

    if (decision.calls.length === 0) {
      return stepFailure(
        DECISION,
        ErrorCode.EXECUTION_ERROR,
        'The decision model did not request any tool call.',
        startTime,
        { content: decision.content }
      );
    }

    const prepared = decision.calls.map(call => this.prepare(request, state, call, rewrites, startTime));

    if (prepared.length === 1) {
      const only = prepared[0];
      return only.ok ? this.dispatcher.invoke(only.call.tool, only.call.arguments) : only.failure;
    }

    // Independent calls of one turn run concurrently and are joined before the step continues
    const runnable = prepared.flatMap(entry => (entry.ok ? [entry.call] : []));
    const dispatched = await this.dispatcher.invokeAll(runnable);
    let next = 0;
    const results = prepared.map(entry => (entry.ok ? dispatched[next++] : entry.failure));

    const payload: MultiResultPayload = {
      multiple_results: true,
      results: results.map(result => ({
        tool: result.tool,
        result: result.success
          ? result.payload
          : {
              error: true,
              error_code: result.code,
              error_message: result.message,
              suggestion: result.suggestion,
            },
      })),
    };

    return { success: true, tool: MULTIPLE, payload, durationMs: Date.now() - startTime };
  }

  private prepare(
    request: StepRequest,
    state: TaskState,
    call: InvocationRequest,
    rewrites: RewriteNote[],
    startTime: number
  ): PreparedCall {
    const { agent, task } = request;

    if (!isAllowed(agent, call.tool)) {
      log.warn({ agent: agent.name, tool: call.tool }, 'Tool outside the agent allow-list');
      return {
        ok: false,
        failure: stepFailure(
          call.tool,
          ErrorCode.BAD_REQUEST,
          `Tool "${call.tool}" is not allowed for the ${agent.name} agent`,
          startTime,
          { allowed: [...agent.tools] }
        ),
      };
    }

    const normalized = this.normalizer.normalize(call.tool, call.arguments, { taskDescription: task, state });
    rewrites.push({ tool: call.tool, target: normalized.tool, ...normalized.rewrite });

    if (normalized.rewrite.action === 'blocked') {
      return {
        ok: false,
        failure: stepFailure(
          call.tool,
          ErrorCode.BAD_REQUEST,
          normalized.rewrite.reason ?? `Call to "${call.tool}" was blocked`,
          startTime
        ),
      };
    }

    return { ok: true, call: { tool: normalized.tool, arguments: normalized.arguments } };
  }
}
