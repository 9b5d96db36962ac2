import { ILogger } from '../interfaces/services';
import { errorMessage } from '../errors/AppError';

export enum CircuitBreakerState {
  CLOSED = 'CLOSED',     // Normal operation
  OPEN = 'OPEN',         // Failing fast
  HALF_OPEN = 'HALF_OPEN' // Testing if service recovered
}

export interface CircuitBreakerOptions {
  failureThreshold: number;      // Failures inside the window before opening
  recoveryTimeout: number;       // Time before attempting recovery (ms)
  monitoringWindow: number;      // Time window for failure tracking (ms)
}

export interface CircuitBreakerStats {
  state: CircuitBreakerState;
  recentFailures: number;
  successes: number;
  totalRequests: number;
  lastFailureTime: number | null;
  lastStateChange: number;
}

export class CircuitOpenError extends Error {
  constructor(serviceName: string) {
    super(`Circuit breaker is OPEN for ${serviceName}. Service unavailable.`);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitBreaker {
  private state: CircuitBreakerState = CircuitBreakerState.CLOSED;
  private failureTimes: number[] = [];
  private successes: number = 0;
  private totalRequests: number = 0;
  private lastFailureTime: number | null = null;
  private lastStateChange: number;

  constructor(
    private serviceName: string,
    private options: CircuitBreakerOptions,
    private logger: ILogger,
    private now: () => number = Date.now
  ) {
    this.lastStateChange = this.now();
    this.logger.info(`Circuit breaker initialized for ${serviceName}`, {
      failureThreshold: options.failureThreshold,
      recoveryTimeout: options.recoveryTimeout,
      monitoringWindow: options.monitoringWindow
    });
  }

  async execute<T>(operation: () => Promise<T>): Promise<T> {
    if (this.state === CircuitBreakerState.OPEN) {
      if (this.shouldAttemptReset()) {
        this.setState(CircuitBreakerState.HALF_OPEN);
      } else {
        throw new CircuitOpenError(this.serviceName);
      }
    }

    this.totalRequests++;

    try {
      const result = await operation();
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error);
      throw error;
    }
  }

  private onSuccess(): void {
    this.successes++;

    if (this.state === CircuitBreakerState.HALF_OPEN) {
      this.setState(CircuitBreakerState.CLOSED);
      this.failureTimes = [];
      this.logger.info(`Circuit breaker CLOSED for ${this.serviceName} - service recovered`);
    }
  }

  private onFailure(error: unknown): void {
    const now = this.now();
    this.lastFailureTime = now;
    this.failureTimes.push(now);
    this.pruneFailures();

    this.logger.warn(`Circuit breaker failure for ${this.serviceName}`, {
      error: errorMessage(error),
      recentFailures: this.failureTimes.length,
      state: this.state
    });

    // A failed trial call goes straight back to OPEN
    if (this.state === CircuitBreakerState.HALF_OPEN || this.failureTimes.length >= this.options.failureThreshold) {
      this.setState(CircuitBreakerState.OPEN);
      this.logger.error(`Circuit breaker OPENED for ${this.serviceName}`, {
        recentFailures: this.failureTimes.length
      });
    }
  }

  private shouldAttemptReset(): boolean {
    if (this.lastFailureTime === null) return true;
    return this.now() - this.lastFailureTime >= this.options.recoveryTimeout;
  }

  private setState(newState: CircuitBreakerState): void {
    const oldState = this.state;
    this.state = newState;
    this.lastStateChange = this.now();

    if (oldState !== newState) {
      this.logger.info(`Circuit breaker state changed for ${this.serviceName}`, {
        from: oldState,
        to: newState
      });
    }
  }

  private pruneFailures(): void {
    const cutoff = this.now() - this.options.monitoringWindow;
    this.failureTimes = this.failureTimes.filter(time => time > cutoff);
  }

  public getStats(): CircuitBreakerStats {
    this.pruneFailures();
    return {
      state: this.state,
      recentFailures: this.failureTimes.length,
      successes: this.successes,
      totalRequests: this.totalRequests,
      lastFailureTime: this.lastFailureTime,
      lastStateChange: this.lastStateChange
    };
  }

  public getState(): CircuitBreakerState {
    return this.state;
  }

  public isOpen(): boolean {
    return this.state === CircuitBreakerState.OPEN;
  }

  // Manual control (for testing/admin)
  public reset(): void {
    this.setState(CircuitBreakerState.CLOSED);
    this.failureTimes = [];
    this.successes = 0;
    this.totalRequests = 0;
    this.lastFailureTime = null;
    this.logger.info(`Circuit breaker RESET for ${this.serviceName}`);
  }
}
