import { MaxAgeRetentionPolicy, RetentionSweeper } from '../src/services/RetentionSweeper';
import { InMemoryJobStore } from '../src/repositories/InMemoryJobStore';
import { JobRecord } from '../src/types/domain';
import { createMockLogger } from './helpers';

const HOUR = 60 * 60 * 1000;
const start = new Date('2024-05-01T00:00:00.000Z');

function record(overrides: Partial<JobRecord>): JobRecord {
  return {
    jobId: 'job-1',
    state: 'succeeded',
    url: 'https://jobs.example.com/1',
    delivery: { status: 'not_requested', attempts: 0 },
    createdAt: start,
    updatedAt: start,
    ...overrides
  };
}

describe('MaxAgeRetentionPolicy', () => {
  const policy = new MaxAgeRetentionPolicy(HOUR);
  const later = new Date(start.getTime() + HOUR);

  test('should evict finished records once they reach the age limit', () => {
    expect(policy.shouldEvict(record({}), later)).toBe(true);
    expect(policy.shouldEvict(record({}), new Date(later.getTime() - 1))).toBe(false);
  });

  test('should keep records that are still running', () => {
    expect(policy.shouldEvict(record({ state: 'executing' }), later)).toBe(false);
  });

  test('should keep records whose callback is still being delivered', () => {
    expect(policy.shouldEvict(record({ delivery: { status: 'pending', attempts: 1 } }), later)).toBe(false);
    expect(policy.shouldEvict(record({ delivery: { status: 'exhausted', attempts: 3 } }), later)).toBe(true);
  });
});

describe('RetentionSweeper', () => {
  test('should delete only the records the policy gives up', async () => {
    let clock = start;
    const logger = createMockLogger();
    const store = new InMemoryJobStore(logger, () => clock);

    await store.create({ jobId: 'old-done', url: 'https://jobs.example.com/1' });
    await store.transition('old-done', { state: 'failed', error: { code: 'UPSTREAM_TIMEOUT', message: 'too slow' } });
    await store.create({ jobId: 'old-pending', url: 'https://jobs.example.com/2', callbackUrl: 'https://hooks.example.com/cb' });
    await store.transition('old-pending', { state: 'succeeded', result: { score: 1 } });
    await store.create({ jobId: 'running', url: 'https://jobs.example.com/3' });
    await store.transition('running', { state: 'executing' });

    clock = new Date(start.getTime() + 2 * HOUR);
    const sweeper = new RetentionSweeper(store, new MaxAgeRetentionPolicy(HOUR), logger, 60000, () => clock);

    await expect(sweeper.sweep()).resolves.toBe(1);
    expect(await store.exists('old-done')).toBe(false);
    expect(await store.exists('old-pending')).toBe(true);
    expect(await store.exists('running')).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('Evicted finished jobs', { evicted: 1, scanned: 2 });
  });

  test('should sweep on its interval until stopped', async () => {
    jest.useFakeTimers();
    try {
      const logger = createMockLogger();
      const store = new InMemoryJobStore(logger);
      const listTerminal = jest.spyOn(store, 'listTerminal');
      const sweeper = new RetentionSweeper(store, new MaxAgeRetentionPolicy(HOUR), logger, 1000);

      sweeper.start();
      await jest.advanceTimersByTimeAsync(3000);
      expect(listTerminal).toHaveBeenCalledTimes(3);

      sweeper.stop();
      await jest.advanceTimersByTimeAsync(3000);
      expect(listTerminal).toHaveBeenCalledTimes(3);
    } finally {
      jest.useRealTimers();
    }
  });
});
