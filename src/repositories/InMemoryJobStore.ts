import _ from 'lodash';
import { IJobStore, ILogger } from '../interfaces/services';
import { DeliveryOutcome, DeliveryState, JobRecord, JobTransition, NewJob } from '../types/domain';
import { ConflictError, InvalidTransitionError, NotFoundError } from '../errors/AppError';
import { canTransition, isTerminal } from './transitionRules';

// Default store. Every method does its check-and-set without awaiting in
// between, so writes for one job id are applied one at a time.
// Callers get deep copies - records are only changed through these methods.
export class InMemoryJobStore implements IJobStore {
  private jobs = new Map<string, JobRecord>();

  constructor(
    private logger: ILogger,
    private now: () => Date = () => new Date()
  ) {}

  async create(job: NewJob): Promise<JobRecord> {
    if (this.jobs.has(job.jobId)) {
      throw new ConflictError(job.jobId);
    }

    const timestamp = this.now();
    const record: JobRecord = {
      jobId: job.jobId,
      state: 'accepted',
      url: job.url,
      callbackUrl: job.callbackUrl,
      delivery: {
        status: job.callbackUrl ? 'pending' : 'not_requested',
        attempts: 0,
      },
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.jobs.set(job.jobId, record);

    this.logger.debug('Job record created', { jobId: job.jobId, state: record.state });
    return _.cloneDeep(record);
  }

  async get(jobId: string): Promise<JobRecord> {
    return _.cloneDeep(this.require(jobId));
  }

  async exists(jobId: string): Promise<boolean> {
    return this.jobs.has(jobId);
  }

  async transition(jobId: string, next: JobTransition): Promise<JobRecord> {
    const current = this.require(jobId);

    if (!canTransition(current.state, next.state)) {
      throw new InvalidTransitionError(jobId, current.state, next.state);
    }

    const updated: JobRecord = {
      ...current,
      state: next.state,
      updatedAt: this.now(),
    };
    if (next.state === 'succeeded') {
      updated.result = _.cloneDeep(next.result);
    } else if (next.state === 'failed') {
      updated.error = { ...next.error };
    }
    this.jobs.set(jobId, updated);

    this.logger.debug('Job state changed', { jobId, from: current.state, to: next.state });
    return _.cloneDeep(updated);
  }

  async recordDeliveryAttempt(
    jobId: string,
    attempt: Pick<DeliveryState, 'lastStatusCode' | 'lastError'>
  ): Promise<JobRecord> {
    const current = this.require(jobId);
    const updated: JobRecord = {
      ...current,
      delivery: {
        ...current.delivery,
        attempts: current.delivery.attempts + 1,
        lastStatusCode: attempt.lastStatusCode,
        lastError: attempt.lastError,
      },
      updatedAt: this.now(),
    };
    this.jobs.set(jobId, updated);
    return _.cloneDeep(updated);
  }

  async recordDeliveryOutcome(jobId: string, outcome: DeliveryOutcome): Promise<JobRecord> {
    const current = this.require(jobId);
    const timestamp = this.now();
    const updated: JobRecord = {
      ...current,
      delivery: {
        ...current.delivery,
        status: outcome.status,
        lastStatusCode: outcome.statusCode,
        lastError: outcome.status === 'exhausted' ? outcome.reason : undefined,
        completedAt: timestamp,
      },
      updatedAt: timestamp,
    };
    this.jobs.set(jobId, updated);
    return _.cloneDeep(updated);
  }

  async listTerminal(): Promise<JobRecord[]> {
    return Array.from(this.jobs.values())
      .filter((job) => isTerminal(job.state))
      .map((job) => _.cloneDeep(job));
  }

  async delete(jobId: string): Promise<boolean> {
    return this.jobs.delete(jobId);
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }

  private require(jobId: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError(jobId);
    }
    return job;
  }
}
