// Fault taxonomy shared by the dispatcher, the feedback controller and the HTTP routes.
// Every code belongs to exactly one fault class; the class decides retry policy and status code.

export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  TIMEOUT = 'TIMEOUT',
  NETWORK_ERROR = 'NETWORK_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
  API_ERROR = 'API_ERROR',
  UNEXPECTED_ERROR = 'UNEXPECTED_ERROR',
  DATA_UNAVAILABLE = 'DATA_UNAVAILABLE',
  // Dispatcher-internal; rendered on the wire as VALIDATION_ERROR / UNEXPECTED_ERROR
  BAD_ARGUMENTS = 'BAD_ARGUMENTS',
  EXECUTION_ERROR = 'EXECUTION_ERROR',
}

export type WireErrorCode = Exclude<ErrorCode, ErrorCode.BAD_ARGUMENTS | ErrorCode.EXECUTION_ERROR>;

/**
 * client    - the caller did something wrong; never retried automatically
 * absence   - the data legitimately does not exist
 * transient - provider or network trouble; retriable under the step budget
 * internal  - we have a bug
 */
export type FaultClass = 'client' | 'absence' | 'transient' | 'internal';

export interface FaultPolicy {
  faultClass: FaultClass;
  statusCode: number;
  retriable: boolean;
  wireCode: WireErrorCode;
  suggestion: string;
}

const FAULT_POLICIES: Record<ErrorCode, FaultPolicy> = {
  [ErrorCode.VALIDATION_ERROR]: {
    faultClass: 'client',
    statusCode: 400,
    retriable: false,
    wireCode: ErrorCode.VALIDATION_ERROR,
    suggestion: 'Please check the request parameters and try again.',
  },
  [ErrorCode.BAD_ARGUMENTS]: {
    faultClass: 'client',
    statusCode: 400,
    retriable: false,
    wireCode: ErrorCode.VALIDATION_ERROR,
    suggestion: 'Please check the request parameters and try again.',
  },
  [ErrorCode.BAD_REQUEST]: {
    faultClass: 'client',
    statusCode: 400,
    retriable: false,
    wireCode: ErrorCode.BAD_REQUEST,
    suggestion: 'Please rephrase the request with the missing details.',
  },
  [ErrorCode.NOT_FOUND]: {
    faultClass: 'client',
    statusCode: 404,
    retriable: false,
    wireCode: ErrorCode.NOT_FOUND,
    suggestion: 'The requested operation is not available.',
  },
  [ErrorCode.TIMEOUT]: {
    faultClass: 'transient',
    statusCode: 504,
    retriable: true,
    wireCode: ErrorCode.TIMEOUT,
    suggestion: 'Please try again in a few moments. If the problem persists, the service may be temporarily unavailable.',
  },
  [ErrorCode.NETWORK_ERROR]: {
    faultClass: 'transient',
    statusCode: 502,
    retriable: true,
    wireCode: ErrorCode.NETWORK_ERROR,
    suggestion: 'Please check your internet connection and try again. If the problem persists, the service may be temporarily unavailable.',
  },
  [ErrorCode.HTTP_ERROR]: {
    faultClass: 'transient',
    statusCode: 502,
    retriable: true,
    wireCode: ErrorCode.HTTP_ERROR,
    suggestion: 'Please verify your search parameters and try again. If the problem persists, contact support.',
  },
  [ErrorCode.API_ERROR]: {
    faultClass: 'transient',
    statusCode: 502,
    retriable: true,
    wireCode: ErrorCode.API_ERROR,
    suggestion: 'Please try again. If the problem persists, contact support.',
  },
  [ErrorCode.EXECUTION_ERROR]: {
    faultClass: 'transient',
    statusCode: 500,
    retriable: true,
    wireCode: ErrorCode.UNEXPECTED_ERROR,
    suggestion: 'Please try again. If the problem persists, contact support.',
  },
  [ErrorCode.UNEXPECTED_ERROR]: {
    faultClass: 'internal',
    statusCode: 500,
    retriable: false,
    wireCode: ErrorCode.UNEXPECTED_ERROR,
    suggestion: 'Something went wrong on our side. Please try again later.',
  },
  [ErrorCode.DATA_UNAVAILABLE]: {
    faultClass: 'absence',
    statusCode: 422,
    retriable: false,
    wireCode: ErrorCode.DATA_UNAVAILABLE,
    suggestion: 'The requested information is not available. Try a different date or location.',
  },
};

const KNOWN_CODES = new Set<string>(Object.values(ErrorCode));

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && KNOWN_CODES.has(value);
}

export function faultPolicy(code: ErrorCode): FaultPolicy {
  return FAULT_POLICIES[code];
}

export function faultClassOf(code: ErrorCode): FaultClass {
  return FAULT_POLICIES[code].faultClass;
}

export function defaultSuggestion(code: ErrorCode): string {
  return FAULT_POLICIES[code].suggestion;
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public statusCode: number = faultPolicy(code).statusCode,
    public suggestion: string = defaultSuggestion(code),
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }

  static badRequest(message: string = 'Bad request', details?: Record<string, unknown>): AppError {
    return new AppError(ErrorCode.BAD_REQUEST, message, 400, defaultSuggestion(ErrorCode.BAD_REQUEST), details);
  }

  static validationError(message: string, details?: Record<string, unknown>): AppError {
    return new AppError(ErrorCode.VALIDATION_ERROR, message, 400, defaultSuggestion(ErrorCode.VALIDATION_ERROR), details);
  }
}

export interface ErrorResponse {
  error: {
    code: WireErrorCode;
    message: string;
    suggestion: string;
    details?: Record<string, unknown>;
  };
}

export function formatErrorResponse(error: AppError, includeDetails: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: {
      code: faultPolicy(error.code).wireCode,
      message: error.message,
      suggestion: error.suggestion,
    },
  };

  if (includeDetails && error.details) {
    response.error.details = error.details;
  }

  return response;
}

// ---------------------------------------------------------------------------
// Provider-side failures
// ---------------------------------------------------------------------------

/**
 * The declared failure shape providers return instead of throwing.
 * Downstream formatting reads `error_message` and `suggestion` directly.
 */
export type ProviderFailure = {
  error: true;
  error_code: WireErrorCode;
  error_message: string;
  suggestion: string;
  [key: string]: unknown;
};

export function providerFailure(
  code: WireErrorCode,
  message: string,
  extras: Record<string, unknown> = {},
  suggestion: string = defaultSuggestion(code)
): ProviderFailure {
  return {
    ...extras,
    error: true,
    error_code: code,
    error_message: message,
    suggestion,
  };
}

export class ProviderHttpError extends Error {
  constructor(
    public service: string,
    public status: number,
    public body: string = ''
  ) {
    super(`${service} responded with HTTP ${status}`);
    this.name = 'ProviderHttpError';
  }
}

export class ProviderApiError extends Error {
  constructor(
    public service: string,
    message: string
  ) {
    super(message);
    this.name = 'ProviderApiError';
  }
}

const HTTP_STATUS_MESSAGES: Record<number, string> = {
  400: 'Invalid search parameters. Please check your input data and try again.',
  401: 'Authentication failed. Please contact support.',
  403: 'Access denied. Please contact support.',
  404: 'Service endpoint not found. The service may be temporarily unavailable.',
  429: 'Too many requests. Please wait a moment and try again.',
  500: 'Internal server error. Please try again later.',
  503: 'Service temporarily unavailable. Please try again later.',
};

export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const name = error.name.toLowerCase();
  const message = error.message.toLowerCase();
  return name === 'timeouterror' || name === 'aborterror' || message.includes('timeout') || message.includes('timed out');
}

export function isNetworkError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const message = error.message.toLowerCase();
  const cause = error.cause instanceof Error ? error.cause.message.toLowerCase() : '';
  const haystack = `${message} ${cause}`;
  return (
    haystack.includes('fetch failed') ||
    haystack.includes('econnrefused') ||
    haystack.includes('econnreset') ||
    haystack.includes('enotfound') ||
    haystack.includes('etimedout') ||
    haystack.includes('network')
  );
}

/**
 * Map a thrown provider error onto the declared failure shape.
 * `extras` carries the empty result lists the caller's formatter expects.
 */
export function classifyProviderError(
  error: unknown,
  service: string,
  extras: Record<string, unknown> = {}
): ProviderFailure {
  if (error instanceof ProviderHttpError) {
    const message = HTTP_STATUS_MESSAGES[error.status] ?? `The ${service} service returned an error. Please try again.`;
    return providerFailure(ErrorCode.HTTP_ERROR, message, extras);
  }

  if (isTimeoutError(error)) {
    return providerFailure(
      ErrorCode.TIMEOUT,
      `The ${service} request took too long to complete. The service may be slow or unavailable.`,
      extras
    );
  }

  if (isNetworkError(error)) {
    const detail = error instanceof Error ? error.message : String(error);
    return providerFailure(
      ErrorCode.NETWORK_ERROR,
      `Network error: Unable to connect to the ${service} service. ${detail}`,
      extras
    );
  }

  if (error instanceof ProviderApiError) {
    return providerFailure(ErrorCode.API_ERROR, `${service} API error: ${error.message}`, extras);
  }

  const detail = error instanceof Error ? error.message : String(error);
  return providerFailure(
    ErrorCode.UNEXPECTED_ERROR,
    `An unexpected error occurred in the ${service} service: ${detail}`,
    extras
  );
}
