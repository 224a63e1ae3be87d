// Retry/Feedback Controller
// Bounded loop around one orchestration step:
//   Invoking -> Judging -> Accepted
//                       -> Retrying -> Invoking (budget left) | ForceAccepted (budget spent)
// Attempts are strictly sequential; each retry carries the previous judgment as feedback.

import { env } from '../../env.js';
import { faultClassOf } from '../../utils/errors.js';
import { createChildLogger } from '../../utils/logger.js';
import type { InvocationResult } from '../tools/types.js';
import { AcceptingJudge, deterministicVerdict, summarizeForJudgment } from './judge.js';
import type { TaskState } from './task-state.js';
import type {
  ControlledStep,
  ControllerState,
  Judge,
  Judgment,
  RetryContext,
  StepOutcome,
  TerminalState,
} from './types.js';

const log = createChildLogger('feedback-controller');

export interface FeedbackControllerOptions {
  maxAttempts?: number;
}

export function formatFeedback(judgment: Judgment): string {
  const message = judgment.feedback_message.trim();
  const action = judgment.suggested_action.trim();
  return action ? `${message}\n\n${action}` : message;
}

function storageKey(step: ControlledStep, result: InvocationResult): string {
  return step.resultKey ? step.resultKey(result) : step.key;
}

export class FeedbackController {
  private judge: Judge;
  private maxAttempts: number;

  constructor(judge: Judge | null = null, options: FeedbackControllerOptions = {}) {
    this.judge = judge ?? new AcceptingJudge();
    this.maxAttempts = Math.max(1, options.maxAttempts ?? env.FEEDBACK_MAX_ATTEMPTS);
  }

  async run(step: ControlledStep, state: TaskState): Promise<StepOutcome> {
    const context: RetryContext = {
      attempt_count: 0,
      max_attempts: this.maxAttempts,
      last_feedback: null,
      last_result: null,
    };
    const transitions: ControllerState[] = [];
    const enter = (next: ControllerState) => {
      transitions.push(next);
      log.debug({ step: step.key, state: next, attempt: context.attempt_count }, 'Controller transition');
    };

    state.currentStep = step.key;

    for (;;) {
      enter('Invoking');
      const result = await step.invoke(context.last_feedback, { ...context });
      context.attempt_count++;
      context.last_result = result;
      state.recordAttempt(step.key);

      enter('Judging');
      const judgment = await this.evaluate(step, result, context.attempt_count);

      if (judgment.status === 'pass') {
        return this.finish(step, state, 'Accepted', result, judgment, context, transitions);
      }

      enter('Retrying');
      if (context.attempt_count >= context.max_attempts) {
        log.warn({ step: step.key, attempts: context.attempt_count }, 'Retry budget spent, force-accepting result');
        return this.finish(step, state, 'ForceAccepted', result, judgment, context, transitions);
      }

      // Earlier accepted results in the task state stay untouched
      context.last_result = null;
      state.recordRetry(step.key);
      context.last_feedback = formatFeedback(judgment);
      log.info({ step: step.key, attempt: context.attempt_count, feedback: context.last_feedback }, 'Retrying step');
    }
  }

  private async evaluate(step: ControlledStep, result: InvocationResult, attempt: number): Promise<Judgment> {
    const verdict = deterministicVerdict(result);
    if (verdict) {
      return verdict;
    }

    return this.judge.judge({
      stepKey: step.key,
      taskDescription: step.taskDescription,
      attempt,
      summary: summarizeForJudgment(result),
    });
  }

  private finish(
    step: ControlledStep,
    state: TaskState,
    terminal: TerminalState,
    result: InvocationResult,
    judgment: Judgment,
    context: RetryContext,
    transitions: ControllerState[]
  ): StepOutcome {
    transitions.push(terminal);
    const storedAs = storageKey(step, result);

    if (result.success) {
      state.set(storedAs, result.payload);
    } else {
      if (faultClassOf(result.code) === 'internal') {
        log.error({ step: step.key, code: result.code, details: result.details }, 'Accepted internal fault');
      }
      state.recordFailure(storedAs, result);
    }
    state.recordTerminal(step.key, terminal);

    log.info(
      { step: step.key, storedAs, terminal, attempts: context.attempt_count, success: result.success },
      'Step finished'
    );

    return {
      key: step.key,
      storedAs,
      terminal,
      attempts: context.attempt_count,
      result,
      judgment,
      transitions,
    };
  }
}
