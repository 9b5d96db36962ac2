import { Configuration } from '../src/services/Configuration';

function configFrom(env: NodeJS.ProcessEnv): Configuration {
  return new Configuration(env, false);
}

describe('Configuration', () => {
  test('should fill in defaults around the required secret', () => {
    const config = configFrom({ WEBHOOK_SECRET: 'test-secret' }).toAppConfig();

    expect(config).toEqual({
      port: 8000,
      nodeEnv: 'development',
      apiPrefix: '/api/v1',
      webhookSecret: 'test-secret',
      maxPayloadBytes: 1048576,
      allowInsecureUrls: false,
      analysis: {
        upstreamUrl: 'http://localhost:3001/api/analyze',
        apiKey: undefined,
        timeoutMs: 30000,
        breakerFailureThreshold: 5,
        breakerRecoveryMs: 30000,
        breakerWindowMs: 60000
      },
      callback: { maxAttempts: 3, backoffBaseMs: 1000, timeoutMs: 10000 },
      worker: { concurrency: 4, maxQueue: 100 },
      store: { driver: 'memory', mongoUrl: 'mongodb://localhost:27017/job-analysis' },
      retention: { maxAgeMs: undefined, sweepIntervalMs: 60000 },
      logging: { level: 'info', dir: undefined }
    });
  });

  test('should refuse to start without a webhook secret', () => {
    expect(() => configFrom({}).toAppConfig()).toThrow('WEBHOOK_SECRET must be set');
    expect(() => configFrom({ WEBHOOK_SECRET: '   ' }).toAppConfig()).toThrow('WEBHOOK_SECRET must be set');
  });

  test('should read overrides from the environment', () => {
    const config = configFrom({
      WEBHOOK_SECRET: 'test-secret',
      PORT: '9000',
      ALLOW_INSECURE_URLS: 'TRUE',
      CALLBACK_MAX_ATTEMPTS: '5',
      WORKER_CONCURRENCY: '8',
      JOB_STORE: 'Mongo',
      JOB_RETENTION_MS: '3600000',
      ANALYSIS_API_KEY: 'test-api-key'
    }).toAppConfig();

    expect(config.port).toBe(9000);
    expect(config.allowInsecureUrls).toBe(true);
    expect(config.callback.maxAttempts).toBe(5);
    expect(config.worker.concurrency).toBe(8);
    expect(config.store.driver).toBe('mongo');
    expect(config.retention.maxAgeMs).toBe(3600000);
    expect(config.analysis.apiKey).toBe('test-api-key');
  });

  test('should keep attempt and worker counts at one or more', () => {
    const config = configFrom({
      WEBHOOK_SECRET: 'test-secret',
      CALLBACK_MAX_ATTEMPTS: '0',
      WORKER_CONCURRENCY: '-2'
    }).toAppConfig();

    expect(config.callback.maxAttempts).toBe(1);
    expect(config.worker.concurrency).toBe(1);
  });

  test('should fall back to the default for unparsable numbers', () => {
    const configuration = configFrom({ CALLBACK_TIMEOUT_MS: 'soon' });
    expect(configuration.getNumber('CALLBACK_TIMEOUT_MS', 10000)).toBe(10000);
  });

  test('should reject an unknown job store driver', () => {
    expect(() => configFrom({ WEBHOOK_SECRET: 'test-secret', JOB_STORE: 'redis' }).toAppConfig())
      .toThrow('Unsupported JOB_STORE "redis"');
  });

  test('should return a frozen config', () => {
    const config = configFrom({ WEBHOOK_SECRET: 'test-secret' }).toAppConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.callback)).toBe(true);
  });
});
