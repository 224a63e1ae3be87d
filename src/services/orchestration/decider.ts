// Tool decision
// Asks the decision model which tool(s) to call for one step, using native function calling

import type { ChatMessage, ChatProvider, ProviderTool } from '../../providers/types.js';
import { createChildLogger } from '../../utils/logger.js';
import type { FunctionDefinition } from '../tools/registry.js';
import type { InvocationRequest, ToolPayload } from '../tools/types.js';
import type { AgentProfile } from './agents.js';

const log = createChildLogger('decider');

export interface DecisionRequest {
  agent: AgentProfile;
  task: string;
  tools: FunctionDefinition[];
  feedback: string | null;
  // Keys of results already accepted in this task, e.g. flight_result
  available: string[];
}

export interface ToolDecision {
  calls: InvocationRequest[];
  content: string;
}

export interface ToolDecider {
  decide(request: DecisionRequest): Promise<ToolDecision>;
}

function parseArguments(raw: string, tool: string): ToolPayload {
  if (!raw.trim()) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
    log.warn({ tool }, 'Tool call arguments are not an object');
  } catch (error) {
    log.warn({ tool, err: error }, 'Tool call arguments are not valid JSON');
  }
  // Left empty: the dispatcher's validation reports what is missing
  return {};
}

export class LlmToolDecider implements ToolDecider {
  constructor(
    private provider: ChatProvider,
    private model: string
  ) {}

  async decide(request: DecisionRequest): Promise<ToolDecision> {
    const system = [
      request.agent.instructions,
      'Call the tools needed for the task. Do not answer from memory.',
      request.available.length > 0 ? `Results already available: ${request.available.join(', ')}.` : '',
    ]
      .filter(Boolean)
      .join('\n');

    const user = request.feedback
      ? `${request.task}\n\nFeedback on the previous attempt:\n${request.feedback}`
      : request.task;

    const messages: ChatMessage[] = [
      { role: 'system', content: system },
      { role: 'user', content: user },
    ];

    const tools: ProviderTool[] = request.tools.map(tool => ({ type: 'function', function: tool }));

    const response = await this.provider.sendChat(messages, {
      model: this.model,
      temperature: 0,
      maxTokens: 1024,
      tools,
      tool_choice: 'required',
    });

    const calls = response.toolCalls.map(call => ({
      tool: call.name,
      arguments: parseArguments(call.arguments, call.name),
    }));

    log.debug({ agent: request.agent.name, calls: calls.map(c => c.tool) }, 'Decision received');
    return { calls, content: response.content };
  }
}
