import {
  AnalysisOutcome,
  IAnalysisExecutor,
  ICallbackDeliveryClient,
  IDispatcher,
  IJobStore,
  ILogger,
  ITaskPool,
  TaskOutcome
} from '../interfaces/services';
import { CallbackEnvelope, DeliveryOutcome, DispatchResult, JobRecord, JobState, WebhookRequest } from '../types/domain';
import {
  AnalysisError,
  InvalidTransitionError,
  UnauthorizedError,
  ServiceUnavailableError,
  errorMessage
} from '../errors/AppError';
import { verify } from './SignatureCodec';
import { parseWebhookRequest, UrlRules } from '../utils/webhookValidation';
import { canTransition } from '../repositories/transitionRules';

export interface DispatcherDependencies {
  logger: ILogger;
  jobStore: IJobStore;
  executor: IAnalysisExecutor;
  deliveryClient: ICallbackDeliveryClient;
  taskPool: ITaskPool;
  urlRules: UrlRules;
  now?: () => Date;
}

// Request-level states, logged as one webhook moves through the dispatcher.
// Only async jobs get a stored record, which starts at 'accepted'.
export class RequestLifecycle {
  private current: JobState = 'received';
  private jobId?: string;

  constructor(private logger: ILogger) {
    this.logger.debug('Webhook request received');
  }

  get state(): JobState {
    return this.current;
  }

  identify(jobId: string): void {
    this.jobId = jobId;
  }

  moveTo(next: JobState, fields: Record<string, unknown> = {}): void {
    if (!canTransition(this.current, next)) {
      throw new InvalidTransitionError(this.jobId ?? 'request', this.current, next);
    }
    this.logger.debug(`Webhook request ${this.current} -> ${next}`, { jobId: this.jobId, ...fields });
    this.current = next;
  }
}

/**
 * Takes a signed webhook from raw bytes to either an inline result (sync)
 * or an accepted job that finishes in the background (async).
 *
 * Background jobs go accepted -> executing -> succeeded | failed. The
 * terminal state is written as soon as the executor answers; callback
 * delivery happens afterwards and only touches the delivery fields.
 */
export class Dispatcher implements IDispatcher {
  private logger: ILogger;
  private jobStore: IJobStore;
  private executor: IAnalysisExecutor;
  private deliveryClient: ICallbackDeliveryClient;
  private taskPool: ITaskPool;
  private urlRules: UrlRules;
  private now: () => Date;

  constructor(deps: DispatcherDependencies) {
    this.logger = deps.logger;
    this.jobStore = deps.jobStore;
    this.executor = deps.executor;
    this.deliveryClient = deps.deliveryClient;
    this.taskPool = deps.taskPool;
    this.urlRules = deps.urlRules;
    this.now = deps.now ?? (() => new Date());
  }

  async handleWebhook(rawBody: Buffer, signatureHeader: string | undefined, secret: string): Promise<DispatchResult> {
    const lifecycle = new RequestLifecycle(this.logger);

    // Nothing is parsed before the signature checks out
    if (!verify(secret, rawBody, signatureHeader)) {
      lifecycle.moveTo('rejected', { reason: 'signature' });
      this.logger.warn('Webhook rejected: signature verification failed', { bytes: rawBody.length });
      throw new UnauthorizedError();
    }

    lifecycle.moveTo('validating');
    let request: WebhookRequest;
    try {
      request = await parseWebhookRequest(rawBody, this.urlRules);
    } catch (error) {
      lifecycle.moveTo('rejected', { reason: 'payload' });
      this.logger.warn('Webhook rejected: invalid payload', { reason: errorMessage(error) });
      throw error;
    }
    lifecycle.identify(request.jobId);

    this.logger.info(`Processing job analysis for job_id: ${request.jobId}`, {
      asyncProcessing: request.asyncProcessing
    });

    return request.asyncProcessing
      ? this.accept(request, secret, lifecycle)
      : this.runInline(request, lifecycle);
  }

  // Sync path: no job record, failures go straight back to the caller
  private async runInline(request: WebhookRequest, lifecycle: RequestLifecycle): Promise<DispatchResult> {
    lifecycle.moveTo('executing');
    const outcome = await this.executor.analyze(request.url, request.jobId);
    if (!outcome.ok) {
      lifecycle.moveTo('failed', { code: outcome.error.code });
      this.logger.error(`Job analysis failed for job_id: ${request.jobId}`, outcome.error.toJSON());
      throw outcome.error;
    }

    lifecycle.moveTo('succeeded');
    this.logger.info(`Job analysis completed for job_id: ${request.jobId}`);
    return { kind: 'completed', jobId: request.jobId, result: outcome.result };
  }

  private async accept(request: WebhookRequest, secret: string, lifecycle: RequestLifecycle): Promise<DispatchResult> {
    if (this.taskPool.isSaturated()) {
      lifecycle.moveTo('rejected', { reason: 'saturated' });
      throw new ServiceUnavailableError('Too many jobs in progress');
    }

    try {
      // Throws ConflictError for a job id we already hold
      await this.jobStore.create({
        jobId: request.jobId,
        url: request.url,
        callbackUrl: request.callbackUrl
      });
    } catch (error) {
      lifecycle.moveTo('rejected', { reason: errorMessage(error) });
      throw error;
    }
    lifecycle.moveTo('accepted');

    try {
      this.taskPool.submit<AnalysisOutcome>({
        name: `analyze:${request.jobId}`,
        run: () => this.execute(request),
        onSettled: (outcome) => this.complete(request, secret, outcome)
      });
    } catch (error) {
      // Pool filled up between the check and the submit; close the record out
      lifecycle.moveTo('failed', { code: 'SERVICE_UNAVAILABLE' });
      await this.jobStore.transition(request.jobId, {
        state: 'failed',
        error: { code: 'SERVICE_UNAVAILABLE', message: errorMessage(error) }
      });
      throw error;
    }

    this.logger.info(`Job ${request.jobId} accepted for background analysis`);
    return { kind: 'accepted', jobId: request.jobId };
  }

  private async execute(request: WebhookRequest): Promise<AnalysisOutcome> {
    await this.jobStore.transition(request.jobId, { state: 'executing' });
    return this.executor.analyze(request.url, request.jobId);
  }

  private async complete(request: WebhookRequest, secret: string, task: TaskOutcome<AnalysisOutcome>): Promise<void> {
    const outcome: AnalysisOutcome = task.ok
      ? task.value
      : { ok: false, error: new AnalysisError('UPSTREAM_UNAVAILABLE', errorMessage(task.error), task.error) };

    const record = outcome.ok
      ? await this.jobStore.transition(request.jobId, { state: 'succeeded', result: outcome.result })
      : await this.jobStore.transition(request.jobId, {
          state: 'failed',
          error: { code: outcome.error.code, message: outcome.error.message }
        });

    this.logger.info(`Job ${request.jobId} finished`, { state: record.state });

    if (record.callbackUrl) {
      await this.scheduleDelivery(record.callbackUrl, this.buildEnvelope(record), secret);
    }
  }

  private async scheduleDelivery(callbackUrl: string, envelope: CallbackEnvelope, secret: string): Promise<void> {
    const task = {
      name: `callback:${envelope.job_id}`,
      run: () => this.deliveryClient.deliver(callbackUrl, envelope, secret),
      onSettled: (outcome: TaskOutcome<DeliveryOutcome>) => {
        if (!outcome.ok) {
          this.logger.error(`Callback delivery for job ${envelope.job_id} crashed`, outcome.error);
        }
      }
    };

    try {
      this.taskPool.submit<DeliveryOutcome>(task);
      return;
    } catch (error) {
      this.logger.warn(`Task pool full, delivering callback for job ${envelope.job_id} on the current worker`, {
        reason: errorMessage(error)
      });
    }

    try {
      task.onSettled({ ok: true, value: await task.run() });
    } catch (deliveryError) {
      task.onSettled({ ok: false, error: deliveryError });
    }
  }

  buildEnvelope(record: JobRecord): CallbackEnvelope {
    const timestamp = this.now().toISOString();

    if (record.state === 'succeeded') {
      return {
        job_id: record.jobId,
        status: 'completed',
        result: record.result,
        message: 'Job analysis completed successfully',
        timestamp
      };
    }

    return {
      job_id: record.jobId,
      status: 'failed',
      error: record.error ?? { code: 'UNKNOWN', message: 'Job failed without an error' },
      message: 'Job analysis failed',
      timestamp
    };
  }
}
