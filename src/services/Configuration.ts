import { IConfiguration } from '../interfaces/services';
import { AppConfig } from '../types/domain';
import dotenv from 'dotenv';

// Configuration service - keeps all env vars in one place
// Components never see this class; they get the frozen AppConfig from toAppConfig()
export class Configuration implements IConfiguration {
  constructor(private env: NodeJS.ProcessEnv = process.env, loadDotenv: boolean = true) {
    if (loadDotenv) {
      dotenv.config(); // Load .env file
    }
  }

  get(key: string): string | undefined {
    const value = this.env[key];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  }

  getNumber(key: string, defaultValue: number = 0): number {
    const value = this.get(key);
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  // Only "true" (any case) is true
  getBoolean(key: string, defaultValue: boolean = false): boolean {
    const value = this.get(key);
    if (!value) return defaultValue;
    return value.toLowerCase() === 'true';
  }

  getPort(): number {
    return this.getNumber('PORT', 8000);
  }

  getNodeEnv(): string {
    return this.get('NODE_ENV') || 'development';
  }

  getWebhookSecret(): string {
    const secret = this.get('WEBHOOK_SECRET');
    if (!secret) {
      throw new Error('WEBHOOK_SECRET must be set - inbound webhooks cannot be verified without it');
    }
    return secret;
  }

  getStoreDriver(): 'memory' | 'mongo' {
    const driver = (this.get('JOB_STORE') || 'memory').toLowerCase();
    if (driver !== 'memory' && driver !== 'mongo') {
      throw new Error(`Unsupported JOB_STORE "${driver}" (expected memory or mongo)`);
    }
    return driver;
  }

  getMongoUrl(): string {
    return this.get('MONGO_URL') || 'mongodb://localhost:27017/job-analysis';
  }

  getAnalysisUpstreamUrl(): string {
    return this.get('ANALYSIS_UPSTREAM_URL') || 'http://localhost:3001/api/analyze';
  }

  toAppConfig(): AppConfig {
    const retentionMs = this.getNumber('JOB_RETENTION_MS', 0);

    const config: AppConfig = {
      port: this.getPort(),
      nodeEnv: this.getNodeEnv(),
      apiPrefix: this.get('API_PREFIX') || '/api/v1',
      webhookSecret: this.getWebhookSecret(),
      maxPayloadBytes: this.getNumber('MAX_PAYLOAD_BYTES', 1024 * 1024),
      allowInsecureUrls: this.getBoolean('ALLOW_INSECURE_URLS', false),
      analysis: {
        upstreamUrl: this.getAnalysisUpstreamUrl(),
        apiKey: this.get('ANALYSIS_API_KEY'),
        timeoutMs: this.getNumber('ANALYSIS_TIMEOUT_MS', 30000),
        breakerFailureThreshold: this.getNumber('ANALYSIS_BREAKER_FAILURE_THRESHOLD', 5),
        breakerRecoveryMs: this.getNumber('ANALYSIS_BREAKER_RECOVERY_MS', 30000),
        breakerWindowMs: this.getNumber('ANALYSIS_BREAKER_WINDOW_MS', 60000),
      },
      callback: {
        maxAttempts: Math.max(1, this.getNumber('CALLBACK_MAX_ATTEMPTS', 3)),
        backoffBaseMs: this.getNumber('CALLBACK_BACKOFF_BASE_MS', 1000),
        timeoutMs: this.getNumber('CALLBACK_TIMEOUT_MS', 10000),
      },
      worker: {
        concurrency: Math.max(1, this.getNumber('WORKER_CONCURRENCY', 4)),
        maxQueue: this.getNumber('WORKER_MAX_QUEUE', 100),
      },
      store: {
        driver: this.getStoreDriver(),
        mongoUrl: this.getMongoUrl(),
      },
      retention: {
        maxAgeMs: retentionMs > 0 ? retentionMs : undefined,
        sweepIntervalMs: this.getNumber('JOB_RETENTION_SWEEP_MS', 60000),
      },
      logging: {
        level: this.get('LOG_LEVEL') || 'info',
        dir: this.get('LOG_DIR'),
      },
    };

    return deepFreeze(config);
  }
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}
