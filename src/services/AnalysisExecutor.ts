import axios, { AxiosResponse } from 'axios';
import { AnalysisOutcome, IAnalysisExecutor, ILogger } from '../interfaces/services';
import { AppConfig } from '../types/domain';
import { AnalysisError, errorCode, errorMessage } from '../errors/AppError';
import { CircuitBreaker, CircuitOpenError } from './CircuitBreaker';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Adapter for the external analysis backend. Every failure comes back as a
// typed AnalysisError inside the outcome; nothing is thrown to the caller.
// Only an unreachable or failing upstream counts against the breaker; an
// upstream that answers with a 4xx or a malformed body is still up.
export class HttpAnalysisExecutor implements IAnalysisExecutor {
  private breaker: CircuitBreaker;

  constructor(
    private logger: ILogger,
    private config: AppConfig['analysis'],
    breaker?: CircuitBreaker
  ) {
    this.breaker = breaker ?? new CircuitBreaker('analysis-upstream', {
      failureThreshold: config.breakerFailureThreshold,
      recoveryTimeout: config.breakerRecoveryMs,
      monitoringWindow: config.breakerWindowMs
    }, logger);
  }

  async analyze(url: string, jobId: string): Promise<AnalysisOutcome> {
    let outcome: AnalysisOutcome;
    try {
      outcome = await this.breaker.execute(() => this.callUpstream(url, jobId));
    } catch (error) {
      outcome = { ok: false, error: this.classify(error) };
    }

    if (outcome.ok) {
      this.logger.info(`Analysis upstream responded for job ${jobId}`);
    } else {
      this.logger.warn(`Analysis failed for job ${jobId}`, {
        code: outcome.error.code,
        reason: outcome.error.message
      });
    }
    return outcome;
  }

  isAvailable(): boolean {
    return !this.breaker.isOpen();
  }

  getBreaker(): CircuitBreaker {
    return this.breaker;
  }

  // Throws for failures that should trip the breaker, returns the rest
  private async callUpstream(url: string, jobId: string): Promise<AnalysisOutcome> {
    let response: AxiosResponse<unknown>;

    try {
      response = await axios.post<unknown>(this.config.upstreamUrl, { job_id: jobId, url }, {
        timeout: this.config.timeoutMs,
        headers: this.buildHeaders(jobId),
        validateStatus: () => true // statuses are classified below
      });
    } catch (error) {
      if (TIMEOUT_CODES.has(errorCode(error) ?? '')) {
        throw new AnalysisError('UPSTREAM_TIMEOUT', `Analysis upstream did not answer within ${this.config.timeoutMs}ms`, error);
      }
      throw new AnalysisError('UPSTREAM_UNAVAILABLE', `Analysis upstream unreachable: ${errorMessage(error)}`, error);
    }

    const { status } = response;
    if (status >= 500 || status === 429) {
      throw new AnalysisError('UPSTREAM_UNAVAILABLE', `Analysis upstream responded with status ${status}`);
    }
    if (status < 200 || status >= 300) {
      return this.invalidResponse(`Analysis upstream responded with status ${status}`);
    }

    return this.parseResult(response.data);
  }

  private parseResult(body: unknown): AnalysisOutcome {
    if (!isRecord(body) || !isRecord(body.result)) {
      return this.invalidResponse('Analysis upstream response has no result object');
    }
    return { ok: true, result: body.result };
  }

  private invalidResponse(message: string): AnalysisOutcome {
    return { ok: false, error: new AnalysisError('UPSTREAM_INVALID_RESPONSE', message) };
  }

  private buildHeaders(jobId: string): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Request-ID': jobId
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }
    return headers;
  }

  private classify(error: unknown): AnalysisError {
    if (error instanceof AnalysisError) {
      return error;
    }
    if (error instanceof CircuitOpenError) {
      return new AnalysisError('UPSTREAM_UNAVAILABLE', error.message, error);
    }
    return new AnalysisError('UPSTREAM_UNAVAILABLE', errorMessage(error), error);
  }
}
