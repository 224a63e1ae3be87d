// Planner Tools
// Save, list, update and remove the items a user has chosen for a trip

import { z } from 'zod';
import { env } from '../../env.js';
import { ErrorCode, providerFailure } from '../../utils/errors.js';
import type { PlanStore } from '../planner/plan-store.js';
import type { ToolRegistry } from './registry.js';

const STATUSES = ['not_booked', 'booked', 'cancelled'] as const;

const sessionId = z.string().min(1).describe('Session the plan belongs to');

// References such as "outbound_option_2" are swapped for the full offer before dispatch;
// one that reaches the tool was never resolved
const offerDetails = z
  .union([z.string(), z.record(z.unknown())])
  .refine((value): value is Record<string, unknown> => typeof value !== 'string', {
    message: 'Offer reference could not be resolved from earlier results; pass the full offer',
  });

function missingItem(title: string) {
  return providerFailure(
    ErrorCode.DATA_UNAVAILABLE,
    `No plan item titled '${title}' was found.`,
    { title },
    'List the plan items to see the exact titles.'
  );
}

export function registerPlannerTools(registry: ToolRegistry, store: PlanStore): void {
  registry.register({
    name: 'add_plan_item',
    kind: 'completion',
    timeoutMs: env.PLANNER_TIMEOUT_MS,
    description:
      'Save a chosen flight, hotel or activity to the plan. details is the full selected offer or a reference ' +
      'to one such as "outbound_option_2"; saving the same item twice updates it instead of duplicating it.',
    returns: { type: 'object', description: 'The saved plan item and whether it was added or updated' },
    parameters: z.object({
      session_id: sessionId,
      title: z.string().min(1).describe('Short label, e.g. "Outbound flight option 1"'),
      type: z.string().default('other').describe('flight, hotel, activity or other'),
      status: z.enum(STATUSES).default('not_booked').describe('Booking status'),
      details: offerDetails.default({}).describe('The selected offer, or a reference such as "outbound_option_2"'),
    }),
    execute: async args => {
      const { item, action } = await store.add(args.session_id, {
        title: args.title,
        type: args.type,
        status: args.status,
        details: args.details,
      });
      return { error: false, action, item };
    },
  });

  registry.register({
    name: 'get_plan_items',
    kind: 'utility',
    timeoutMs: env.PLANNER_TIMEOUT_MS,
    description: 'List the items saved to the plan, optionally by type or status.',
    returns: { type: 'object', description: 'Saved plan items' },
    parameters: z.object({
      session_id: sessionId,
      type: z.string().optional().describe('Only items of this type'),
      status: z.enum(STATUSES).optional().describe('Only items with this status'),
    }),
    execute: async args => {
      const items = await store.list(args.session_id, { type: args.type, status: args.status });
      return { error: false, items, count: items.length };
    },
  });

  registry.register({
    name: 'update_plan_item',
    kind: 'completion',
    timeoutMs: env.PLANNER_TIMEOUT_MS,
    description: 'Update the status or details of a saved plan item, found by its title.',
    returns: { type: 'object', description: 'The updated plan item' },
    parameters: z.object({
      session_id: sessionId,
      title: z.string().min(1).describe('Title of the item to update'),
      status: z.enum(STATUSES).optional().describe('New booking status'),
      details: z.record(z.unknown()).optional().describe('Fields to merge into the details'),
    }),
    execute: async args => {
      const item = await store.update(args.session_id, args.title, { status: args.status, details: args.details });
      return item ? { error: false, item } : missingItem(args.title);
    },
  });

  registry.register({
    name: 'delete_plan_item',
    kind: 'utility',
    timeoutMs: env.PLANNER_TIMEOUT_MS,
    description: 'Remove a saved plan item, found by its title.',
    returns: { type: 'object', description: 'Confirmation of the removal' },
    parameters: z.object({
      session_id: sessionId,
      title: z.string().min(1).describe('Title of the item to remove'),
    }),
    execute: async args => {
      const removed = await store.remove(args.session_id, args.title);
      return removed ? { error: false, deleted: true, title: args.title } : missingItem(args.title);
    },
  });
}
