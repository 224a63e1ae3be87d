// Result judgment
// Deterministic verdicts first; anything they cannot settle goes to a semantic judge,
// which only ever sees a compact summary of the result.

import { z } from 'zod';
import type { ChatProvider } from '../../providers/types.js';
import { ErrorCode, faultClassOf, isErrorCode } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { InvocationResult, ToolPayload } from '../tools/types.js';
import type { Judge, Judgment, JudgmentRequest, ResultSummary } from './types.js';

const log = createChildLogger('judge');

const SAMPLE_SIZE = 2;

type Primitive = string | number | boolean | null;

function isPrimitive(value: unknown): value is Primitive {
  return value === null || ['string', 'number', 'boolean'].includes(typeof value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function truncateText(value: Primitive): Primitive {
  return typeof value === 'string' && value.length > 200 ? `${value.slice(0, 200)}…` : value;
}

// One level deep: primitives kept, lists reduced to their length, nested objects to their primitives
function compactItem(item: unknown): unknown {
  if (!isRecord(item)) return isPrimitive(item) ? truncateText(item) : typeof item;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(item)) {
    if (isPrimitive(value)) {
      out[key] = truncateText(value);
    } else if (Array.isArray(value)) {
      out[`${key}_count`] = value.length;
    } else if (isRecord(value)) {
      const inner: Record<string, Primitive> = {};
      for (const [innerKey, innerValue] of Object.entries(value)) {
        if (isPrimitive(innerValue)) inner[innerKey] = truncateText(innerValue);
      }
      out[key] = inner;
    }
  }
  return out;
}

function summarizePayload(payload: ToolPayload): Pick<ResultSummary, 'counts' | 'samples' | 'fields'> {
  const counts: Record<string, number> = {};
  const samples: Record<string, unknown[]> = {};
  const fields: Record<string, Primitive> = {};

  for (const [key, value] of Object.entries(payload)) {
    if (Array.isArray(value)) {
      counts[key] = value.length;
      samples[key] = value.slice(0, SAMPLE_SIZE).map(compactItem);
    } else if (isPrimitive(value)) {
      fields[key] = truncateText(value);
    }
  }

  return { counts, samples, fields };
}

function errorCodeOf(payload: unknown): string | undefined {
  if (!isRecord(payload) || payload.error !== true) return undefined;
  return typeof payload.error_code === 'string' ? payload.error_code : ErrorCode.API_ERROR;
}

const MultiResultSchema = z.object({
  multiple_results: z.literal(true),
  results: z.array(z.object({ tool: z.string(), result: z.record(z.unknown()) })),
});

/**
 * Compact view of an invocation result: counts and at most two sample items per list,
 * the error code and message, never the raw payload.
 */
export function summarizeForJudgment(result: InvocationResult): ResultSummary {
  if (!result.success) {
    return {
      success: false,
      tool: result.tool,
      error: { code: result.code, message: result.message, retriable: result.retriable },
      counts: {},
      samples: {},
      fields: {},
    };
  }

  const summary: ResultSummary = { success: true, tool: result.tool, ...summarizePayload(result.payload) };

  const multi = MultiResultSchema.safeParse(result.payload);
  if (multi.success) {
    summary.multiple_results = multi.data.results.map(item => ({
      tool: item.tool,
      error_code: errorCodeOf(item.result),
      counts: summarizePayload(item.result).counts,
    }));
    delete summary.samples.results;
  }

  return summary;
}

function pass(feedback: string): Judgment {
  return { status: 'pass', feedback_message: feedback, suggested_action: '', source: 'deterministic' };
}

/**
 * Verdicts that need no semantic judgment. Returns null when the result must be judged on content.
 *
 * - absence (DATA_UNAVAILABLE) and internal faults pass: retrying cannot change them
 * - caller faults pass: they are surfaced to the orchestrating layer, not retried
 * - transient faults ask for a retry
 * - a multi-call result where every call found no data passes
 */
export function deterministicVerdict(result: InvocationResult): Judgment | null {
  if (!result.success) {
    const faultClass = faultClassOf(result.code);
    if (faultClass === 'absence') return pass(`No data available: ${result.message}`);
    if (faultClass === 'internal') return pass(`Internal fault accepted without retry: ${result.message}`);
    if (faultClass === 'client') return pass(`Caller fault surfaced without retry: ${result.message}`);
    return {
      status: 'need_retry',
      feedback_message: `The previous call to ${result.tool} failed (${result.code}): ${result.message}`,
      suggested_action: result.suggestion,
      source: 'deterministic',
    };
  }

  const multi = MultiResultSchema.safeParse(result.payload);
  if (multi.success && multi.data.results.length > 0) {
    const codes = multi.data.results.map(item => errorCodeOf(item.result));
    if (codes.every(code => code === ErrorCode.DATA_UNAVAILABLE)) {
      return pass('No data available for any of the requested items');
    }
    if (codes.every(code => code !== undefined && isErrorCode(code) && faultClassOf(code) === 'transient')) {
      return {
        status: 'need_retry',
        feedback_message: 'Every call in the previous turn failed with a temporary error.',
        suggested_action: 'Repeat the same calls.',
        source: 'deterministic',
      };
    }
  }

  return null;
}

// Used when no semantic judge is configured
export class AcceptingJudge implements Judge {
  async judge(): Promise<Judgment> {
    return { status: 'pass', feedback_message: '', suggested_action: '', source: 'fallback' };
  }
}

const JUDGE_SYSTEM_PROMPT = `You review the result of one step of a travel assistant.
Given the step's task and a compact summary of the tool result, decide whether the result satisfies the task.
Respond with raw JSON only:
{"status":"pass"|"need_retry","feedback_message":"what is wrong","suggested_action":"how the next call should differ"}
Only ask for a retry when a different tool call could plausibly produce a better result.`;

const JudgmentSchema = z.object({
  status: z.enum(['pass', 'need_retry']),
  feedback_message: z.string().default(''),
  suggested_action: z.string().default(''),
});

export class LlmJudge implements Judge {
  constructor(
    private provider: ChatProvider,
    private model: string
  ) {}

  async judge(request: JudgmentRequest): Promise<Judgment> {
    const user = [
      `Step: ${request.stepKey} (attempt ${request.attempt})`,
      `Task: ${request.taskDescription}`,
      `Result summary: ${JSON.stringify(request.summary)}`,
    ].join('\n');

    try {
      const response = await this.provider.sendChat(
        [
          { role: 'system', content: JUDGE_SYSTEM_PROMPT },
          { role: 'user', content: user },
        ],
        { model: this.model, temperature: 0, maxTokens: 400, jsonResponse: true }
      );

      const parsed = JudgmentSchema.safeParse(JSON.parse(response.content));
      if (!parsed.success) {
        log.warn({ step: request.stepKey }, 'Judge returned an unreadable verdict, accepting result');
        return { status: 'pass', feedback_message: '', suggested_action: '', source: 'fallback' };
      }
      return { ...parsed.data, source: 'semantic' };
    } catch (error) {
      log.warn({ step: request.stepKey, err: error }, 'Judge call failed, accepting result');
      return { status: 'pass', feedback_message: '', suggested_action: '', source: 'fallback' };
    }
  }
}
