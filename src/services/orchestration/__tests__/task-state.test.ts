import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../../utils/errors.js';
import type { InvocationFailure } from '../../tools/types.js';
import { TaskState } from '../task-state.js';

const timeout: InvocationFailure = {
  success: false,
  tool: 'search_flights',
  code: ErrorCode.TIMEOUT,
  message: 'Too slow',
  retriable: true,
  suggestion: 'Try again.',
  durationMs: 5,
};

describe('TaskState', () => {
  it('should copy the results it starts from', () => {
    const seed = { flight_result: { outbound: [{ price: 1 }] } };
    const state = new TaskState('s-1', seed);
    seed.flight_result.outbound.push({ price: 2 });

    expect(state.get('flight_result')).toEqual({ outbound: [{ price: 1 }] });
    expect(state.keys()).toEqual(['flight_result']);
  });

  it('should keep the last accepted result beside a later failure', () => {
    const state = new TaskState('s-1');

    state.set('flight_result', { outbound: [{ price: 1 }] });
    state.recordFailure('flight_result', timeout);
    expect(state.get('flight_result')).toEqual({ outbound: [{ price: 1 }] });
    expect(state.failure('flight_result')).toBe(timeout);

    state.set('flight_result', { outbound: [{ price: 2 }] });
    expect(state.failure('flight_result')).toBeUndefined();
    expect(state.get('flight_result')).toEqual({ outbound: [{ price: 2 }] });
  });

  it('should count attempts and retries per step', () => {
    const state = new TaskState('s-1');

    state.recordAttempt('flight_result');
    state.recordRetry('flight_result');
    state.recordAttempt('flight_result');
    state.recordTerminal('flight_result', 'ForceAccepted');

    expect(state.stepCounters('flight_result')).toEqual({ attempts: 2, retries: 1, last_terminal: 'ForceAccepted' });
    expect(state.stepCounters('plan_result')).toEqual({ attempts: 0, retries: 0, last_terminal: null });
  });

  it('should produce a detached snapshot', () => {
    const state = new TaskState('s-1');
    state.currentStep = 'flight_result';
    state.set('flight_result', { outbound: [{ price: 1 }] });
    state.recordFailure('utilities_result', timeout);
    state.recordAttempt('flight_result');

    const snapshot = state.snapshot();

    expect(snapshot).toEqual({
      session_id: 's-1',
      current_step: 'flight_result',
      results: { flight_result: { outbound: [{ price: 1 }] } },
      failures: { utilities_result: { code: 'TIMEOUT', message: 'Too slow', suggestion: 'Try again.' } },
      retry_counters: { flight_result: { attempts: 1, retries: 0, last_terminal: null } },
    });

    snapshot.results.flight_result.outbound = [];
    expect(state.get('flight_result')).toEqual({ outbound: [{ price: 1 }] });
  });
});
