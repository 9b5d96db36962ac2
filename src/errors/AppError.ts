export type AppErrorShape = {
  code: string;
  message: string;
  httpStatus: number;
  retryable?: boolean;
  details?: Record<string, unknown>;
  cause?: unknown;
};

export class AppError extends Error {
  code: string;
  httpStatus: number;
  retryable: boolean;
  details?: Record<string, unknown>;

  constructor(opts: AppErrorShape) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.httpStatus = opts.httpStatus;
    this.retryable = opts.retryable ?? false;
    this.details = opts.details;
  }

  // What a client is allowed to see
  publicMessage(): string {
    return this.message;
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      details: this.details,
    };
  }
}

// Deliberately vague: callers never learn which signature check failed
export class UnauthorizedError extends AppError {
  constructor() {
    super({ code: 'UNAUTHORIZED', message: 'Unauthorized', httpStatus: 401 });
    this.name = 'UnauthorizedError';
  }
}

export class BadRequestError extends AppError {
  constructor(details?: Record<string, unknown>) {
    super({ code: 'BAD_REQUEST', message: 'Invalid request body', httpStatus: 422, details });
    this.name = 'BadRequestError';
  }
}

export class ConflictError extends AppError {
  constructor(jobId: string) {
    super({ code: 'CONFLICT', message: `Job ${jobId} already exists`, httpStatus: 409, details: { jobId } });
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends AppError {
  constructor(jobId: string) {
    super({ code: 'NOT_FOUND', message: `Job ${jobId} not found`, httpStatus: 404, details: { jobId } });
    this.name = 'NotFoundError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(jobId: string, from: string, to: string) {
    super({
      code: 'INVALID_TRANSITION',
      message: `Job ${jobId} cannot move from ${from} to ${to}`,
      httpStatus: 409,
      details: { jobId, from, to },
    });
    this.name = 'InvalidTransitionError';
  }
}

export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super({ code: 'SERVICE_UNAVAILABLE', message, httpStatus: 503, retryable: true });
    this.name = 'ServiceUnavailableError';
  }
}

export type AnalysisErrorCode = 'UPSTREAM_UNAVAILABLE' | 'UPSTREAM_TIMEOUT' | 'UPSTREAM_INVALID_RESPONSE';

const ANALYSIS_STATUS: Record<AnalysisErrorCode, number> = {
  UPSTREAM_UNAVAILABLE: 503,
  UPSTREAM_TIMEOUT: 504,
  UPSTREAM_INVALID_RESPONSE: 502,
};

export class AnalysisError extends AppError {
  declare code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string, cause?: unknown) {
    super({
      code,
      message,
      httpStatus: ANALYSIS_STATUS[code],
      retryable: code !== 'UPSTREAM_INVALID_RESPONSE',
      cause,
    });
    this.name = 'AnalysisError';
  }

  // Upstream internals stay in the logs
  publicMessage(): string {
    return 'Job analysis failed';
  }
}

export class DeliveryExhaustedError extends AppError {
  constructor(jobId: string, attempts: number, reason: string) {
    super({
      code: 'DELIVERY_EXHAUSTED',
      message: `Callback for job ${jobId} not accepted after ${attempts} attempt(s): ${reason}`,
      httpStatus: 502,
      details: { jobId, attempts, reason },
    });
    this.name = 'DeliveryExhaustedError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

// Reads a string `code` off whatever was thrown (axios, node net errors, ...)
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function toAppError(err: unknown, fallbackCode = 'INTERNAL_ERROR'): AppError {
  if (isAppError(err)) return err;

  return new AppError({
    code: fallbackCode,
    message: errorMessage(err),
    httpStatus: 500,
    cause: err,
  });
}
