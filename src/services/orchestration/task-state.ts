// Shared task state
// One mutable accumulator per user-visible task. Only the orchestration loop writes to it;
// everything downstream reads snapshots.

import type { InvocationFailure, ToolPayload } from '../tools/types.js';
import type { TerminalState } from './types.js';

export interface StepCounters {
  attempts: number;
  retries: number;
  last_terminal: TerminalState | null;
}

export interface TaskStateSnapshot {
  session_id: string;
  current_step: string | null;
  results: Record<string, ToolPayload>;
  failures: Record<string, { code: string; message: string; suggestion: string }>;
  retry_counters: Record<string, StepCounters>;
}

export class TaskState {
  currentStep: string | null = null;
  private results: Map<string, ToolPayload> = new Map();
  private failures: Map<string, InvocationFailure> = new Map();
  private counters: Map<string, StepCounters> = new Map();

  constructor(
    public readonly sessionId: string,
    initial: Record<string, ToolPayload> = {}
  ) {
    for (const [key, payload] of Object.entries(initial)) {
      this.results.set(key, structuredClone(payload));
    }
  }

  get(key: string): ToolPayload | undefined {
    return this.results.get(key);
  }

  keys(): string[] {
    return Array.from(this.results.keys());
  }

  has(key: string): boolean {
    return this.results.has(key);
  }

  set(key: string, payload: ToolPayload): void {
    this.results.set(key, payload);
    this.failures.delete(key);
  }

  // A failure is kept beside the last accepted result for the key, never in its place
  recordFailure(key: string, failure: InvocationFailure): void {
    this.failures.set(key, failure);
  }

  failure(key: string): InvocationFailure | undefined {
    return this.failures.get(key);
  }

  stepCounters(key: string): StepCounters {
    let counters = this.counters.get(key);
    if (!counters) {
      counters = { attempts: 0, retries: 0, last_terminal: null };
      this.counters.set(key, counters);
    }
    return counters;
  }

  recordAttempt(key: string): void {
    this.stepCounters(key).attempts++;
  }

  recordRetry(key: string): void {
    this.stepCounters(key).retries++;
  }

  recordTerminal(key: string, terminal: TerminalState): void {
    this.stepCounters(key).last_terminal = terminal;
  }

  snapshot(): TaskStateSnapshot {
    const failures: TaskStateSnapshot['failures'] = {};
    for (const [key, failure] of this.failures) {
      failures[key] = { code: failure.code, message: failure.message, suggestion: failure.suggestion };
    }

    const retryCounters: Record<string, StepCounters> = {};
    for (const [key, counters] of this.counters) {
      retryCounters[key] = { ...counters };
    }

    return structuredClone({
      session_id: this.sessionId,
      current_step: this.currentStep,
      results: Object.fromEntries(this.results),
      failures,
      retry_counters: retryCounters,
    });
  }
}
