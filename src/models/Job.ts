import mongoose, { Schema, Model } from 'mongoose';
import { AnalysisResult, DeliveryStatus, JobError, JobState } from '../types/domain';
import { TRANSITION_RULES } from '../repositories/transitionRules';

// Job document - what an async job looks like in MongoDB
export interface IJobDocument {
  jobId: string;             // caller-assigned, primary key
  state: JobState;
  url: string;
  callbackUrl?: string | null;
  result?: AnalysisResult | null;
  error?: JobError | null;
  delivery: {
    status: DeliveryStatus;
    attempts: number;
    lastStatusCode?: number | null;
    lastError?: string | null;
    completedAt?: Date | null;
  };
  createdAt: Date;
  updatedAt: Date;
}

const DELIVERY_STATUSES: DeliveryStatus[] = ['not_requested', 'pending', 'delivered', 'exhausted'];

const JobErrorSchema = new Schema<JobError>({
  code: { type: String, required: true },
  message: { type: String, required: true, maxlength: [1000, 'Error message cannot exceed 1000 characters'] }
}, { _id: false });

const JobSchema = new Schema<IJobDocument>({
  jobId: {
    type: String,
    required: [true, 'Job ID is required'],
    unique: true,        // Duplicate submissions surface as Conflict
    trim: true
  },
  state: {
    type: String,
    required: [true, 'State is required'],
    enum: {
      values: Object.keys(TRANSITION_RULES),
      message: 'State must be a known job state'
    },
    default: 'accepted',
    index: true
  },
  url: {
    type: String,
    required: [true, 'URL is required']
  },
  callbackUrl: {
    type: String,
    default: null
  },
  result: {
    type: Schema.Types.Mixed,
    default: null
  },
  error: {
    type: JobErrorSchema,
    default: null
  },
  delivery: {
    status: {
      type: String,
      enum: DELIVERY_STATUSES,
      default: 'not_requested'
    },
    attempts: {
      type: Number,
      default: 0,
      min: 0
    },
    lastStatusCode: { type: Number, default: null },
    lastError: { type: String, default: null },
    completedAt: { type: Date, default: null }
  }
}, {
  timestamps: true, // Automatically manages createdAt and updatedAt
  collection: 'analysis_jobs',
  autoIndex: true, // The unique jobId index is what refuses duplicate jobs
  // No TTL index: retention is decided by the configured policy
});

// Terminal-state sweeps scan by state then age
JobSchema.index({ state: 1, updatedAt: 1 });

export type JobModelType = Model<IJobDocument>;

export const JobModel: JobModelType = mongoose.model<IJobDocument>('AnalysisJob', JobSchema);
