// Plan store
// Items the user has chosen (flights, hotels, activities), kept per session.
// Durable persistence lives behind the PlanStore interface; the in-memory store serves a single process.

import { createHash, randomUUID } from 'crypto';

export type PlanItemStatus = 'not_booked' | 'booked' | 'cancelled';

export interface PlanItem {
  id: string;
  session_id: string;
  title: string;
  type: string;
  status: PlanItemStatus;
  details: Record<string, unknown>;
  normalized_key: string;
  created_at: string;
  updated_at: string;
}

export interface NewPlanItem {
  title: string;
  type: string;
  status?: PlanItemStatus;
  details: Record<string, unknown>;
}

export interface PlanItemPatch {
  details?: Record<string, unknown>;
  status?: PlanItemStatus;
}

export interface PlanItemFilter {
  type?: string;
  status?: PlanItemStatus;
}

export interface PlanStore {
  add(sessionId: string, item: NewPlanItem): Promise<{ item: PlanItem; action: 'added' | 'updated' }>;
  list(sessionId: string, filter?: PlanItemFilter): Promise<PlanItem[]>;
  update(sessionId: string, title: string, patch: PlanItemPatch): Promise<PlanItem | null>;
  remove(sessionId: string, title: string): Promise<boolean>;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      out[key] = canonicalize(Reflect.get(value, key));
    }
    return out;
  }
  if (typeof value === 'string') return value.trim().toLowerCase();
  return value;
}

/**
 * Deterministic identity of a plan item: same type and same details (ignoring key order,
 * case and surrounding whitespace) give the same key. Items without details fall back to the title.
 */
export function normalizedKey(type: string, details: Record<string, unknown>, title: string = ''): string {
  const payload: Record<string, unknown> = {
    type: type.trim().toLowerCase(),
    details: canonicalize(details),
  };
  if (Object.keys(details).length === 0) {
    payload.title = title.toLowerCase().replace(/[^a-z0-9]/g, '');
  }
  return createHash('sha256').update(JSON.stringify(payload)).digest('hex');
}

function sameTitle(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export class InMemoryPlanStore implements PlanStore {
  private sessions: Map<string, PlanItem[]> = new Map();

  private items(sessionId: string): PlanItem[] {
    let items = this.sessions.get(sessionId);
    if (!items) {
      items = [];
      this.sessions.set(sessionId, items);
    }
    return items;
  }

  async add(sessionId: string, input: NewPlanItem): Promise<{ item: PlanItem; action: 'added' | 'updated' }> {
    const items = this.items(sessionId);
    const key = normalizedKey(input.type, input.details, input.title);
    const now = new Date().toISOString();
    const existing = items.find(item => item.normalized_key === key);

    if (existing) {
      existing.title = input.title;
      existing.status = input.status ?? existing.status;
      existing.details = structuredClone(input.details);
      existing.updated_at = now;
      return { item: structuredClone(existing), action: 'updated' };
    }

    const item: PlanItem = {
      id: randomUUID(),
      session_id: sessionId,
      title: input.title,
      type: input.type.trim().toLowerCase(),
      status: input.status ?? 'not_booked',
      details: structuredClone(input.details),
      normalized_key: key,
      created_at: now,
      updated_at: now,
    };
    items.push(item);
    return { item: structuredClone(item), action: 'added' };
  }

  async list(sessionId: string, filter: PlanItemFilter = {}): Promise<PlanItem[]> {
    return this.items(sessionId)
      .filter(item => !filter.type || item.type === filter.type.trim().toLowerCase())
      .filter(item => !filter.status || item.status === filter.status)
      .map(item => structuredClone(item));
  }

  async update(sessionId: string, title: string, patch: PlanItemPatch): Promise<PlanItem | null> {
    const item = this.items(sessionId).find(candidate => sameTitle(candidate.title, title));
    if (!item) return null;

    if (patch.details) {
      item.details = { ...item.details, ...structuredClone(patch.details) };
      item.normalized_key = normalizedKey(item.type, item.details, item.title);
    }
    if (patch.status) {
      item.status = patch.status;
    }
    item.updated_at = new Date().toISOString();
    return structuredClone(item);
  }

  async remove(sessionId: string, title: string): Promise<boolean> {
    const items = this.items(sessionId);
    const index = items.findIndex(item => sameTitle(item.title, title));
    if (index === -1) return false;
    items.splice(index, 1);
    return true;
  }
}
