import {
  AnalysisResult,
  CallbackEnvelope,
  DeliveryOutcome,
  DeliveryState,
  DispatchResult,
  JobRecord,
  JobTransition,
  NewJob,
} from '../types/domain';
import { AnalysisError } from '../errors/AppError';

// Job persistence. Implementations serialise writes per job id.
export interface IJobStore {
  create(job: NewJob): Promise<JobRecord>;
  get(jobId: string): Promise<JobRecord>;
  exists(jobId: string): Promise<boolean>;
  transition(jobId: string, next: JobTransition): Promise<JobRecord>;
  recordDeliveryAttempt(jobId: string, attempt: Pick<DeliveryState, 'lastStatusCode' | 'lastError'>): Promise<JobRecord>;
  recordDeliveryOutcome(jobId: string, outcome: DeliveryOutcome): Promise<JobRecord>;
  listTerminal(): Promise<JobRecord[]>;
  delete(jobId: string): Promise<boolean>;
  healthCheck(): Promise<boolean>;
}

export type AnalysisOutcome =
  | { ok: true; result: AnalysisResult }
  | { ok: false; error: AnalysisError };

// Boundary to the analysis backend - resolves, never rejects
export interface IAnalysisExecutor {
  analyze(url: string, jobId: string): Promise<AnalysisOutcome>;
  isAvailable(): boolean;
}

export interface ICallbackDeliveryClient {
  deliver(callbackUrl: string, envelope: CallbackEnvelope, secret: string): Promise<DeliveryOutcome>;
}

export type TaskOutcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

export interface PoolTask<T> {
  name: string;
  run(): Promise<T>;
  onSettled(outcome: TaskOutcome<T>): Promise<void> | void;
}

export type TaskPoolStats = {
  active: number;
  queued: number;
  completed: number;
  failed: number;
};

// Background work outside the request/response cycle
export interface ITaskPool {
  submit<T>(task: PoolTask<T>): void;
  isSaturated(): boolean;
  onIdle(): Promise<void>;
  getStats(): TaskPoolStats;
  shutdown(): Promise<void>;
}

export interface IDispatcher {
  handleWebhook(rawBody: Buffer, signatureHeader: string | undefined, secret: string): Promise<DispatchResult>;
}

export interface IRetentionPolicy {
  shouldEvict(record: JobRecord, now: Date): boolean;
}

// Logging interface
export interface ILogger {
  info(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: unknown): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

// Configuration interface
export interface IConfiguration {
  get(key: string): string | undefined;
  getNumber(key: string, defaultValue?: number): number;
  getBoolean(key: string, defaultValue?: boolean): boolean;
}
