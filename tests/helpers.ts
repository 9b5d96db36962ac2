import express from 'express';
import { AxiosHeaders, AxiosResponse } from 'axios';
import { Server } from 'http';
import { ILogger } from '../src/interfaces/services';
import { AppConfig } from '../src/types/domain';
import { signatureHeader } from '../src/services/SignatureCodec';

export const TEST_SECRET = 'test-secret';

export function createMockLogger(): jest.Mocked<ILogger> {
  return {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  };
}

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    port: 0,
    nodeEnv: 'test',
    apiPrefix: '/api/v1',
    webhookSecret: TEST_SECRET,
    maxPayloadBytes: 64 * 1024,
    allowInsecureUrls: true,
    analysis: {
      upstreamUrl: 'http://upstream.test/api/analyze',
      timeoutMs: 2000,
      breakerFailureThreshold: 5,
      breakerRecoveryMs: 30000,
      breakerWindowMs: 60000
    },
    callback: {
      maxAttempts: 3,
      backoffBaseMs: 1000,
      timeoutMs: 2000
    },
    worker: {
      concurrency: 2,
      maxQueue: 10
    },
    store: {
      driver: 'memory',
      mongoUrl: 'mongodb://localhost:27017/job-analysis-test'
    },
    retention: {
      sweepIntervalMs: 60000
    },
    logging: {
      level: 'error'
    },
    ...overrides
  };
}

// JSON body plus the header that signs exactly those bytes
export function signedBody(payload: unknown, secret: string = TEST_SECRET): { body: string; signature: string } {
  const body = JSON.stringify(payload);
  return { body, signature: signatureHeader(secret, body) };
}

export function axiosResponse<T>(status: number, data: T): AxiosResponse<T> {
  return {
    status,
    statusText: '',
    data,
    headers: {},
    config: { headers: new AxiosHeaders() }
  };
}

export function listenOnLoopback(app: express.Application): Promise<{ server: Server; baseUrl: string }> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      resolve({ server, baseUrl: `http://127.0.0.1:${address.port}` });
    });
  });
}

export function closeServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
