// Argument Normalizer
// Shapes a decision model's tool call before dispatch: schema-guided coercion, default injection,
// then intent-based rewriting. Best-effort; never throws.

import { z } from 'zod';
import { FlightOfferSchema, type FlightDirection, type FlightOffer } from '../flights/types.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { JsonSchema, ToolPayload } from '../tools/types.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  detectIntent,
  extractOptionReference,
  hasCompletionIntent,
  optionKey,
  requestedDirection,
  type IntentSignals,
} from './intent.js';
import type { TaskState } from './task-state.js';

const log = createChildLogger('normalizer');

const NUMERIC_REGEX = /^-?\d+(?:\.\d+)?$/;
const OPTION_KEY_REGEX = /^(outbound|return)_option_(\d+)$/i;
const OPTION_NUMBER_REGEX = /option[_\s]*(\d+)/i;

export const FLIGHT_RESULT_KEY = 'flight_result';
export const PLAN_COMPLETION_TOOL = 'add_plan_item';

// Only these searches are answered by offers under FLIGHT_RESULT_KEY
export const FLIGHT_SEARCH_TOOLS: ReadonlySet<string> = new Set(['search_flights', 'search_flight_leg']);

export type RewriteAction = 'none' | 'rewritten' | 'blocked' | 'injected';

export interface NormalizationContext {
  taskDescription: string;
  state: TaskState;
}

export interface NormalizedCall {
  tool: string;
  arguments: ToolPayload;
  rewrite: { action: RewriteAction; reason?: string };
}

// ---------------------------------------------------------------------------
// (a) coercion, (b) defaults
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function coerceValue(value: unknown, schema: JsonSchema): unknown {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if ((schema.type === 'number' || schema.type === 'integer') && NUMERIC_REGEX.test(trimmed)) {
      return Number(trimmed);
    }
    if (schema.type === 'boolean') {
      const lowered = trimmed.toLowerCase();
      if (lowered === 'true') return true;
      if (lowered === 'false') return false;
    }
    return value;
  }

  if (schema.type === 'array' && Array.isArray(value) && schema.items) {
    const items = schema.items;
    return value.map(item => coerceValue(item, items));
  }

  if (schema.type === 'object' && isRecord(value) && schema.properties) {
    return coerceObject(value, schema.properties);
  }

  return value;
}

function coerceObject(value: Record<string, unknown>, properties: Record<string, JsonSchema>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    const schema = properties[key];
    out[key] = schema ? coerceValue(inner, schema) : inner;
  }
  return out;
}

export function injectDefaults(args: ToolPayload, properties: Record<string, JsonSchema>): ToolPayload {
  const out: ToolPayload = { ...args };
  for (const [key, schema] of Object.entries(properties)) {
    if (out[key] === undefined && schema.default !== undefined) {
      out[key] = structuredClone(schema.default);
    }
  }
  return out;
}

// ---------------------------------------------------------------------------
// (c) intent-based rewriting
// ---------------------------------------------------------------------------

const OfferListSchema = z.array(FlightOfferSchema);

/**
 * Index prior flight offers as `outbound_option_N` / `return_option_N` (1-based).
 * Single-leg payloads (`flights`) count as outbound.
 */
export function indexFlightOptions(payload: ToolPayload | undefined): Map<string, FlightOffer> {
  const index = new Map<string, FlightOffer>();
  if (!payload) return index;

  const lists: Array<[FlightDirection, unknown]> = [
    ['outbound', payload.outbound ?? payload.flights],
    ['return', payload.return],
  ];

  for (const [direction, raw] of lists) {
    const parsed = OfferListSchema.safeParse(raw ?? []);
    if (!parsed.success) continue;
    parsed.data.forEach((offer, i) => index.set(optionKey(direction, i + 1), offer));
  }

  return index;
}

function resolveOption(
  options: Map<string, FlightOffer>,
  option: number,
  preferred: FlightDirection | null
): { key: string; offer: FlightOffer } | null {
  const order: FlightDirection[] = preferred === 'return' ? ['return', 'outbound'] : ['outbound', 'return'];
  const directions = preferred ? [preferred] : order;
  for (const direction of directions) {
    const key = optionKey(direction, option);
    const offer = options.get(key);
    if (offer) return { key, offer: structuredClone(offer) };
  }
  return null;
}

/**
 * Resolve a string reference such as "outbound_option_2" to the full offer. When the task
 * asks for the other direction and that option exists, the reference is corrected.
 */
export function resolveFlightReference(
  reference: string,
  options: Map<string, FlightOffer>,
  signals: IntentSignals
): { key: string; offer: FlightOffer; corrected: boolean } | null {
  const wanted = requestedDirection(signals);
  const keyed = OPTION_KEY_REGEX.exec(reference.trim());

  if (keyed) {
    const referenced: FlightDirection = keyed[1].toLowerCase() === 'return' ? 'return' : 'outbound';
    const option = parseInt(keyed[2], 10);

    if (wanted && wanted !== referenced) {
      const corrected = resolveOption(options, option, wanted);
      if (corrected) return { ...corrected, corrected: true };
    }

    const direct = options.get(optionKey(referenced, option));
    if (direct) return { key: optionKey(referenced, option), offer: structuredClone(direct), corrected: false };
    return null;
  }

  const numbered = OPTION_NUMBER_REGEX.exec(reference) ?? /(\d+)/.exec(reference);
  if (!numbered) return null;

  const resolved = resolveOption(options, parseInt(numbered[1], 10), wanted);
  return resolved ? { ...resolved, corrected: false } : null;
}

function describeOffer(direction: FlightDirection, option: number, offer: FlightOffer): string {
  const first = offer.flights[0];
  const last = offer.flights[offer.flights.length - 1];
  const route = first && last ? ` ${first.departure_airport.id ?? '?'} → ${last.arrival_airport.id ?? '?'}` : '';
  const airline = first?.airline ? ` (${first.airline})` : '';
  const label = direction === 'return' ? 'Return' : 'Outbound';
  return `${label} flight option ${option}:${route}${airline}`.trim();
}

export class ArgumentNormalizer {
  constructor(private registry: ToolRegistry) {}

  normalize(tool: string, raw: ToolPayload, context: NormalizationContext): NormalizedCall {
    try {
      return this.apply(tool, raw, context);
    } catch (error) {
      log.warn({ tool, err: error }, 'Normalization failed, passing arguments through');
      return { tool, arguments: raw, rewrite: { action: 'none', reason: 'normalization failed' } };
    }
  }

  private apply(tool: string, raw: ToolPayload, context: NormalizationContext): NormalizedCall {
    const descriptor = this.registry.resolve(tool);
    if (!descriptor) {
      return { tool, arguments: raw, rewrite: { action: 'none', reason: 'unknown tool' } };
    }

    const properties = descriptor.inputSchema.properties;
    let args = coerceObject(raw, properties);
    args = injectDefaults(args, properties);
    if (properties.session_id && args.session_id === undefined) {
      args.session_id = context.state.sessionId;
    }

    const signals = detectIntent(context.taskDescription);

    if (descriptor.kind === 'discovery' && FLIGHT_SEARCH_TOOLS.has(tool) && hasCompletionIntent(signals)) {
      return this.rewriteDiscovery(tool, args, signals, context);
    }

    if (descriptor.kind === 'completion' && typeof args.details === 'string') {
      // An item type the caller did not choose is taken from the injected offer
      const typed = 'type' in properties && typeof raw.type !== 'string';
      return this.injectOffer(tool, args, args.details, signals, context, typed);
    }

    return { tool, arguments: args, rewrite: { action: 'none' } };
  }

  // The user is choosing among offers they already have, so a new search is the wrong call
  private rewriteDiscovery(
    tool: string,
    args: ToolPayload,
    signals: IntentSignals,
    context: NormalizationContext
  ): NormalizedCall {
    const prior = context.state.get(FLIGHT_RESULT_KEY);
    const options = indexFlightOptions(prior);

    if (options.size === 0) {
      return { tool, arguments: args, rewrite: { action: 'none', reason: 'no prior results to complete from' } };
    }

    const reference = extractOptionReference(context.taskDescription);
    const completionTool = this.registry.resolve(PLAN_COMPLETION_TOOL);
    const direction = reference?.direction ?? requestedDirection(signals);
    const resolved = reference ? resolveOption(options, reference.option, direction) : null;

    if (!resolved || !reference || !completionTool) {
      log.info({ tool, reference }, 'Blocked discovery call under completion intent');
      return {
        tool,
        arguments: args,
        rewrite: {
          action: 'blocked',
          reason: 'The request is to finalize a choice, but no option could be identified from prior results.',
        },
      };
    }

    const resolvedDirection: FlightDirection = resolved.key.startsWith('return') ? 'return' : 'outbound';
    const rewritten: ToolPayload = {
      session_id: context.state.sessionId,
      title: describeOffer(resolvedDirection, reference.option, resolved.offer),
      type: 'flight',
      details: { ...resolved.offer, direction: resolvedDirection },
    };

    log.info({ from: tool, to: PLAN_COMPLETION_TOOL, option: resolved.key }, 'Rewrote discovery call to completion');
    return {
      tool: PLAN_COMPLETION_TOOL,
      arguments: rewritten,
      rewrite: { action: 'rewritten', reason: `completion intent; selected ${resolved.key}` },
    };
  }

  private injectOffer(
    tool: string,
    args: ToolPayload,
    reference: string,
    signals: IntentSignals,
    context: NormalizationContext,
    setType: boolean
  ): NormalizedCall {
    const options = indexFlightOptions(context.state.get(FLIGHT_RESULT_KEY));
    const resolved = resolveFlightReference(reference, options, signals);

    if (!resolved) {
      return { tool, arguments: args, rewrite: { action: 'none', reason: `unresolved reference "${reference}"` } };
    }

    const direction: FlightDirection = resolved.key.startsWith('return') ? 'return' : 'outbound';
    const reason = resolved.corrected
      ? `corrected ${reference} to ${resolved.key}`
      : `expanded ${reference} to the full offer`;

    return {
      tool,
      arguments: { ...args, ...(setType ? { type: 'flight' } : {}), details: { ...resolved.offer, direction } },
      rewrite: { action: 'injected', reason },
    };
  }
}
