import mongoose from 'mongoose';
import { IJobStore, ILogger } from '../interfaces/services';
import {
  DeliveryOutcome,
  DeliveryState,
  JobRecord,
  JobTransition,
  NewJob,
  TERMINAL_STATES,
} from '../types/domain';
import { JobModel, IJobDocument } from '../models/Job';
import { ConflictError, InvalidTransitionError, NotFoundError, errorMessage } from '../errors/AppError';
import { sourcesOf } from './transitionRules';

const DUPLICATE_KEY = 11000;

function isDuplicateKeyError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;
}

// Mongo-backed store. Each write is one atomic document update whose filter
// names the states it may start from, so concurrent transitions on a job
// serialise in MongoDB and a losing writer sees no match instead of
// overwriting a terminal state.
export class MongoJobStore implements IJobStore {
  constructor(private logger: ILogger) {}

  async create(job: NewJob): Promise<JobRecord> {
    try {
      const doc = await JobModel.create({
        jobId: job.jobId,
        state: 'accepted',
        url: job.url,
        callbackUrl: job.callbackUrl ?? null,
        delivery: {
          status: job.callbackUrl ? 'pending' : 'not_requested',
          attempts: 0,
        },
      });

      this.logger.info('Job record created', { jobId: job.jobId });
      return this.mapDocumentToRecord(doc.toObject());
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ConflictError(job.jobId);
      }
      this.logger.error('Failed to create job record', error);
      throw new Error(`Failed to create job: ${errorMessage(error)}`);
    }
  }

  async get(jobId: string): Promise<JobRecord> {
    const doc = await JobModel.findOne({ jobId }).lean<IJobDocument>().exec();
    if (!doc) {
      throw new NotFoundError(jobId);
    }
    return this.mapDocumentToRecord(doc);
  }

  async exists(jobId: string): Promise<boolean> {
    const found = await JobModel.exists({ jobId }).exec();
    return found !== null;
  }

  async transition(jobId: string, next: JobTransition): Promise<JobRecord> {
    // A terminal job carries exactly one of result and error
    const set: Record<string, unknown> = { state: next.state };
    if (next.state === 'succeeded') {
      set.result = next.result;
      set.error = null;
    } else if (next.state === 'failed') {
      set.error = next.error;
      set.result = null;
    }

    const doc = await JobModel.findOneAndUpdate(
      { jobId, state: { $in: sourcesOf(next.state) } },
      { $set: set },
      { new: true }
    ).lean<IJobDocument>().exec();

    if (doc) {
      this.logger.debug('Job state changed', { jobId, to: next.state });
      return this.mapDocumentToRecord(doc);
    }

    // No match: either the job is missing or it is in a state we cannot leave
    const current = await JobModel.findOne({ jobId }).lean<IJobDocument>().exec();
    if (!current) {
      throw new NotFoundError(jobId);
    }
    throw new InvalidTransitionError(jobId, current.state, next.state);
  }

  async recordDeliveryAttempt(
    jobId: string,
    attempt: Pick<DeliveryState, 'lastStatusCode' | 'lastError'>
  ): Promise<JobRecord> {
    const doc = await JobModel.findOneAndUpdate(
      { jobId },
      {
        $inc: { 'delivery.attempts': 1 },
        $set: {
          'delivery.lastStatusCode': attempt.lastStatusCode ?? null,
          'delivery.lastError': attempt.lastError ?? null,
        },
      },
      { new: true }
    ).lean<IJobDocument>().exec();

    if (!doc) {
      throw new NotFoundError(jobId);
    }
    return this.mapDocumentToRecord(doc);
  }

  async recordDeliveryOutcome(jobId: string, outcome: DeliveryOutcome): Promise<JobRecord> {
    const doc = await JobModel.findOneAndUpdate(
      { jobId },
      {
        $set: {
          'delivery.status': outcome.status,
          'delivery.lastStatusCode': outcome.statusCode ?? null,
          'delivery.lastError': outcome.status === 'exhausted' ? outcome.reason : null,
          'delivery.completedAt': new Date(),
        },
      },
      { new: true }
    ).lean<IJobDocument>().exec();

    if (!doc) {
      throw new NotFoundError(jobId);
    }
    this.logger.info('Job delivery outcome recorded', { jobId, status: outcome.status, attempts: outcome.attempts });
    return this.mapDocumentToRecord(doc);
  }

  async listTerminal(): Promise<JobRecord[]> {
    const docs = await JobModel.find({ state: { $in: [...TERMINAL_STATES] } })
      .sort({ updatedAt: 1 })
      .lean<IJobDocument[]>()
      .exec();
    return docs.map((doc) => this.mapDocumentToRecord(doc));
  }

  async delete(jobId: string): Promise<boolean> {
    const result = await JobModel.deleteOne({ jobId }).exec();
    return result.deletedCount > 0;
  }

  async healthCheck(): Promise<boolean> {
    try {
      if (mongoose.connection.readyState !== 1) { // 1 = connected
        return false;
      }
      await JobModel.countDocuments().limit(1).exec();
      return true;
    } catch (error) {
      this.logger.error('Job store health check failed', error);
      return false;
    }
  }

  private mapDocumentToRecord(doc: IJobDocument): JobRecord {
    const record: JobRecord = {
      jobId: doc.jobId,
      state: doc.state,
      url: doc.url,
      delivery: {
        status: doc.delivery.status,
        attempts: doc.delivery.attempts,
      },
      createdAt: doc.createdAt,
      updatedAt: doc.updatedAt,
    };

    if (doc.callbackUrl) record.callbackUrl = doc.callbackUrl;
    if (doc.result) record.result = doc.result;
    if (doc.error) record.error = { code: doc.error.code, message: doc.error.message };
    if (doc.delivery.lastStatusCode != null) record.delivery.lastStatusCode = doc.delivery.lastStatusCode;
    if (doc.delivery.lastError) record.delivery.lastError = doc.delivery.lastError;
    if (doc.delivery.completedAt) record.delivery.completedAt = doc.delivery.completedAt;

    return record;
  }
}
