import axios from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { ICallbackDeliveryClient, IJobStore, ILogger } from '../interfaces/services';
import { AppConfig, CallbackEnvelope, DeliveryOutcome } from '../types/domain';
import { DeliveryExhaustedError, errorCode, errorMessage } from '../errors/AppError';
import { SIGNATURE_HEADER, signatureHeader } from './SignatureCodec';
import { canonicalStringify } from '../utils/canonicalJson';

export const DELIVERY_ID_HEADER = 'X-Delivery-ID';
const USER_AGENT = 'JobAnalysis-Callback/1.0';

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

type AttemptResult =
  | { kind: 'delivered'; statusCode: number }
  | { kind: 'retry'; statusCode?: number; reason: string }
  | { kind: 'permanent'; statusCode: number; reason: string };

/**
 * Posts signed callback envelopes to caller-supplied URLs.
 *
 * The envelope is serialised once; that exact byte string is signed and sent
 * on every attempt. Transport errors and 5xx answers are retried with
 * exponential backoff, anything else that is not 2xx ends the delivery.
 */
export class CallbackDeliveryClient implements ICallbackDeliveryClient {
  constructor(
    private logger: ILogger,
    private jobStore: IJobStore,
    private config: AppConfig['callback'],
    private sleep: Sleep = defaultSleep
  ) {}

  async deliver(callbackUrl: string, envelope: CallbackEnvelope, secret: string): Promise<DeliveryOutcome> {
    const jobId = envelope.job_id;
    const body = canonicalStringify(envelope);
    const headers = {
      'Content-Type': 'application/json',
      'User-Agent': USER_AGENT,
      [SIGNATURE_HEADER]: signatureHeader(secret, body),
      [DELIVERY_ID_HEADER]: uuidv4() // same id on every retry of this delivery
    };

    let last: AttemptResult = { kind: 'retry', reason: 'not attempted' };

    for (let attempt = 1; attempt <= this.config.maxAttempts; attempt++) {
      if (attempt > 1) {
        const delay = this.backoffDelay(attempt);
        this.logger.debug(`Retrying callback for job ${jobId} in ${delay}ms`, { attempt });
        await this.sleep(delay);
      }

      last = await this.attempt(callbackUrl, body, headers);
      await this.jobStore.recordDeliveryAttempt(jobId, {
        lastStatusCode: last.statusCode,
        lastError: last.kind === 'delivered' ? undefined : last.reason
      });

      if (last.kind === 'delivered') {
        const outcome: DeliveryOutcome = { status: 'delivered', attempts: attempt, statusCode: last.statusCode };
        await this.jobStore.recordDeliveryOutcome(jobId, outcome);
        this.logger.info(`Callback delivered for job ${jobId}`, { attempt, statusCode: last.statusCode });
        return outcome;
      }

      this.logger.warn(`Callback delivery failed (attempt ${attempt}/${this.config.maxAttempts})`, {
        jobId,
        statusCode: last.statusCode,
        reason: last.reason
      });

      if (last.kind === 'permanent') {
        return this.exhaust(jobId, attempt, last.reason, last.statusCode);
      }
    }

    return this.exhaust(jobId, this.config.maxAttempts, last.reason, last.statusCode);
  }

  // Delay before attempt n (n >= 2): base, 2*base, 4*base, ...
  backoffDelay(attempt: number): number {
    return this.config.backoffBaseMs * Math.pow(2, attempt - 2);
  }

  private async attempt(url: string, body: string, headers: Record<string, string>): Promise<AttemptResult> {
    try {
      const response = await axios.post<unknown>(url, body, {
        headers,
        timeout: this.config.timeoutMs,
        maxRedirects: 0,
        validateStatus: () => true,
        transformRequest: [(data: unknown) => data] // the signed bytes go out untouched
      });

      const statusCode = response.status;
      if (statusCode >= 200 && statusCode < 300) {
        return { kind: 'delivered', statusCode };
      }
      if (statusCode >= 500) {
        return { kind: 'retry', statusCode, reason: `receiver responded with status ${statusCode}` };
      }
      return { kind: 'permanent', statusCode, reason: `receiver rejected callback with status ${statusCode}` };
    } catch (error) {
      const code = errorCode(error);
      return { kind: 'retry', reason: code ? `${code}: ${errorMessage(error)}` : errorMessage(error) };
    }
  }

  private async exhaust(jobId: string, attempts: number, reason: string, statusCode?: number): Promise<DeliveryOutcome> {
    const outcome: DeliveryOutcome = { status: 'exhausted', attempts, reason, statusCode };
    await this.jobStore.recordDeliveryOutcome(jobId, outcome);

    const error = new DeliveryExhaustedError(jobId, attempts, reason);
    this.logger.error(error.message, error.toJSON());
    return outcome;
  }
}
