// Orchestration types
// Shared by the feedback controller, judges and the step orchestrator

import type { InvocationResult, ToolPayload } from '../tools/types.js';

export type JudgmentStatus = 'pass' | 'need_retry';

export interface Judgment {
  status: JudgmentStatus;
  feedback_message: string;
  suggested_action: string;
  // deterministic verdicts are never sent to the semantic judge
  source?: 'deterministic' | 'semantic' | 'fallback';
}

export interface ResultSummary {
  success: boolean;
  tool: string;
  error?: { code: string; message: string; retriable: boolean };
  counts: Record<string, number>;
  samples: Record<string, unknown[]>;
  fields: Record<string, string | number | boolean | null>;
  multiple_results?: Array<{ tool: string; error_code?: string; counts: Record<string, number> }>;
}

export interface JudgmentRequest {
  stepKey: string;
  taskDescription: string;
  attempt: number;
  summary: ResultSummary;
}

export interface Judge {
  judge(request: JudgmentRequest): Promise<Judgment>;
}

export type ControllerState = 'Invoking' | 'Judging' | 'Retrying' | 'Accepted' | 'ForceAccepted';

export type TerminalState = Extract<ControllerState, 'Accepted' | 'ForceAccepted'>;

export interface RetryContext {
  attempt_count: number;
  max_attempts: number;
  last_feedback: string | null;
  // Outcome of the latest attempt; dropped when the step moves on to a retry
  last_result: InvocationResult | null;
}

export interface ControlledStep {
  key: string;
  taskDescription: string;
  invoke(feedback: string | null, context: Readonly<RetryContext>): Promise<InvocationResult>;
  // Where a result is stored; defaults to `key`
  resultKey?(result: InvocationResult): string;
}

export interface StepOutcome {
  key: string;
  // Task state key the final result was stored under
  storedAs: string;
  terminal: TerminalState;
  attempts: number;
  result: InvocationResult;
  judgment: Judgment;
  transitions: ControllerState[];
}

// Multi-call payload stored when one turn issues several independent tool calls
export type MultiResultPayload = {
  multiple_results: true;
  results: Array<{ tool: string; result: ToolPayload }>;
};
