// Tool Dispatcher
// Resolves a tool by name, validates arguments, executes it under a timeout and
// maps every outcome onto an InvocationResult. Never throws.

import { env } from '../../env.js';
import {
  ErrorCode,
  defaultSuggestion,
  faultPolicy,
  isErrorCode,
  isNetworkError,
  isTimeoutError,
} from '../../utils/errors.js';
import { createChildLogger, redactSensitive, truncateForLog } from '../../utils/logger.js';
import type { ToolRegistry } from './registry.js';
import type {
  InvocationFailure,
  InvocationRequest,
  InvocationResult,
  ToolPayload,
} from './types.js';

const log = createChildLogger('dispatcher');

export interface DispatcherOptions {
  defaultTimeoutMs?: number;
  requestLogLimit?: number;
  responseLogLimit?: number;
}

export class ToolTimeoutError extends Error {
  constructor(
    public tool: string,
    public timeoutMs: number
  ) {
    super(`Tool "${tool}" timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

function isStructuredFailure(payload: ToolPayload): boolean {
  return payload.error === true;
}

export class ToolDispatcher {
  private defaultTimeoutMs: number;
  private requestLogLimit: number;
  private responseLogLimit: number;

  constructor(
    private registry: ToolRegistry,
    options: DispatcherOptions = {}
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? env.TOOL_DEFAULT_TIMEOUT_MS;
    this.requestLogLimit = options.requestLogLimit ?? env.TOOL_REQUEST_LOG_LIMIT;
    this.responseLogLimit = options.responseLogLimit ?? env.TOOL_RESPONSE_LOG_LIMIT;
  }

  async invoke(name: string, args: ToolPayload = {}): Promise<InvocationResult> {
    const startTime = Date.now();

    log.info(
      { tool: name, args: truncateForLog(redactSensitive(args), this.requestLogLimit) },
      'tool.invoke.start'
    );

    const result = await this.dispatch(name, args, startTime);

    if (result.success) {
      log.info(
        {
          tool: name,
          success: true,
          durationMs: result.durationMs,
          result: truncateForLog(result.payload, this.responseLogLimit),
        },
        'tool.invoke.end'
      );
    } else {
      const level = faultPolicy(result.code).faultClass === 'transient' ? 'warn' : 'info';
      log[level](
        {
          tool: name,
          success: false,
          code: result.code,
          message: result.message,
          durationMs: result.durationMs,
          details: truncateForLog(result.details ?? {}, this.responseLogLimit),
        },
        'tool.invoke.end'
      );
    }

    return result;
  }

  // Independent calls run concurrently; the returned array follows input order
  async invokeAll(calls: readonly InvocationRequest[]): Promise<InvocationResult[]> {
    return Promise.all(calls.map(call => this.invoke(call.tool, call.arguments)));
  }

  private async dispatch(name: string, args: ToolPayload, startTime: number): Promise<InvocationResult> {
    const tool = this.registry.resolve(name);

    if (!tool) {
      return this.failure(name, ErrorCode.NOT_FOUND, `Tool "${name}" not found`, startTime);
    }

    const prepared = tool.implementation.prepare(args);
    if (!prepared.ok) {
      return this.failure(
        name,
        ErrorCode.BAD_ARGUMENTS,
        `Invalid arguments for "${name}": ${prepared.issues.join('; ')}`,
        startTime,
        { issues: prepared.issues }
      );
    }

    let payload: ToolPayload;
    try {
      payload = await this.withTimeout(name, prepared.run(), tool.timeoutMs ?? this.defaultTimeoutMs);
    } catch (error) {
      return this.fromThrown(name, error, startTime);
    }

    if (isStructuredFailure(payload)) {
      return this.fromStructuredFailure(name, payload, startTime);
    }

    return {
      success: true,
      tool: name,
      payload,
      durationMs: Date.now() - startTime,
    };
  }

  // The in-flight call is not aborted on timeout; its eventual result is discarded
  private async withTimeout<T>(name: string, work: Promise<T>, timeoutMs: number): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new ToolTimeoutError(name, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private fromThrown(name: string, error: unknown, startTime: number): InvocationFailure {
    const message = error instanceof Error ? error.message : String(error);
    const details: Record<string, unknown> = {
      error: message,
      errorName: error instanceof Error ? error.name : typeof error,
    };

    if (isTimeoutError(error)) {
      return this.failure(name, ErrorCode.TIMEOUT, message, startTime, details);
    }
    if (isNetworkError(error)) {
      return this.failure(name, ErrorCode.NETWORK_ERROR, message, startTime, details);
    }

    log.error({ tool: name, err: error }, 'Tool raised an exception');
    return this.failure(name, ErrorCode.EXECUTION_ERROR, `Tool "${name}" failed: ${message}`, startTime, details);
  }

  private fromStructuredFailure(name: string, payload: ToolPayload, startTime: number): InvocationFailure {
    const code = isErrorCode(payload.error_code) ? payload.error_code : ErrorCode.API_ERROR;
    const message =
      typeof payload.error_message === 'string' ? payload.error_message : `Tool "${name}" reported a failure`;
    const suggestion = typeof payload.suggestion === 'string' ? payload.suggestion : defaultSuggestion(code);

    return this.failure(name, code, message, startTime, { payload }, suggestion);
  }

  private failure(
    tool: string,
    code: ErrorCode,
    message: string,
    startTime: number,
    details?: Record<string, unknown>,
    suggestion: string = defaultSuggestion(code)
  ): InvocationFailure {
    return {
      success: false,
      tool,
      code,
      message,
      retriable: faultPolicy(code).retriable,
      suggestion,
      ...(details ? { details } : {}),
      durationMs: Date.now() - startTime,
    };
  }
}
