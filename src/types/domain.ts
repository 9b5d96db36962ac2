// Core domain interfaces and types

// Lifecycle of one analysis job. Every webhook walks these states in the
// dispatcher's request log; only async jobs are persisted, starting at 'accepted'.
export type JobState =
  | 'received'
  | 'validating'
  | 'rejected'
  | 'executing'
  | 'accepted'
  | 'succeeded'
  | 'failed';

export const TERMINAL_STATES: readonly JobState[] = ['rejected', 'succeeded', 'failed'];

export type DeliveryStatus = 'not_requested' | 'pending' | 'delivered' | 'exhausted';

// Whatever the analysis upstream produced - the envelope never looks inside
export type AnalysisResult = Record<string, unknown>;

export interface JobError {
  code: string;
  message: string;
}

export interface DeliveryState {
  status: DeliveryStatus;
  attempts: number;
  lastStatusCode?: number;
  lastError?: string;
  completedAt?: Date;
}

export interface JobRecord {
  jobId: string;
  state: JobState;
  url: string;
  callbackUrl?: string;
  result?: AnalysisResult;
  error?: JobError;
  delivery: DeliveryState;
  createdAt: Date;
  updatedAt: Date;
}

// Parsed and validated inbound envelope
export interface WebhookRequest {
  jobId: string;
  url: string;
  asyncProcessing: boolean;
  callbackUrl?: string;
}

export type JobTransition =
  | { state: 'executing' }
  | { state: 'succeeded'; result: AnalysisResult }
  | { state: 'failed'; error: JobError };

export interface NewJob {
  jobId: string;
  url: string;
  callbackUrl?: string;
}

// Outbound callback body; snake_case because it goes on the wire as-is
export interface CallbackEnvelope {
  job_id: string;
  status: 'completed' | 'failed';
  result?: AnalysisResult;
  error?: JobError;
  message: string;
  timestamp: string;
}

export type DeliveryOutcome =
  | { status: 'delivered'; attempts: number; statusCode: number }
  | { status: 'exhausted'; attempts: number; reason: string; statusCode?: number };

export type SyncResult = { kind: 'completed'; jobId: string; result: AnalysisResult };
export type AsyncAccepted = { kind: 'accepted'; jobId: string };
export type DispatchResult = SyncResult | AsyncAccepted;

export interface AppConfig {
  port: number;
  nodeEnv: string;
  apiPrefix: string;
  webhookSecret: string;
  maxPayloadBytes: number;
  allowInsecureUrls: boolean;
  analysis: {
    upstreamUrl: string;
    apiKey?: string;
    timeoutMs: number;
    breakerFailureThreshold: number;
    breakerRecoveryMs: number;
    breakerWindowMs: number;
  };
  callback: {
    maxAttempts: number;
    backoffBaseMs: number;
    timeoutMs: number;
  };
  worker: {
    concurrency: number;
    maxQueue: number;
  };
  store: {
    driver: 'memory' | 'mongo';
    mongoUrl: string;
  };
  retention: {
    maxAgeMs?: number;
    sweepIntervalMs: number;
  };
  logging: {
    level: string;
    dir?: string;
  };
}
