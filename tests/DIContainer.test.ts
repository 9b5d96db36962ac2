import mongoose from 'mongoose';
import { ApplicationContainer, DIContainer } from '../src/container/DIContainer';
import { JobModel } from '../src/models/Job';
import { MongoJobStore } from '../src/repositories/MongoJobStore';
import { Configuration } from '../src/services/Configuration';
import { Dispatcher } from '../src/services/Dispatcher';
import { InMemoryJobStore } from '../src/repositories/InMemoryJobStore';
import { RetentionSweeper } from '../src/services/RetentionSweeper';

describe('DIContainer', () => {
  interface Services {
    counter: { value: number };
    label: string;
  }

  test('should build each service once, on first use', () => {
    const container = new DIContainer<Services>();
    const factory = jest.fn(() => ({ value: 1 }));
    container.register('counter', factory);

    expect(factory).not.toHaveBeenCalled();
    expect(container.get('counter')).toBe(container.get('counter'));
    expect(factory).toHaveBeenCalledTimes(1);
  });

  test('should throw for a service that was never registered', () => {
    const container = new DIContainer<Services>();

    expect(container.has('label')).toBe(false);
    expect(() => container.get('label')).toThrow('Service label not registered');
  });
});

describe('ApplicationContainer', () => {
  function containerFor(env: NodeJS.ProcessEnv): ApplicationContainer {
    return new ApplicationContainer(new Configuration({ LOG_LEVEL: 'error', ...env }, false));
  }

  test('should wire the in-memory stack by default', async () => {
    const container = containerFor({ WEBHOOK_SECRET: 'test-secret' });
    await container.initialize();

    expect(container.getJobStore()).toBeInstanceOf(InMemoryJobStore);
    expect(container.getDispatcher()).toBeInstanceOf(Dispatcher);
    expect(container.getExecutor().isAvailable()).toBe(true);
    expect(container.getRetentionSweeper()).toBeNull();
    expect(container.getConfig().webhookSecret).toBe('test-secret');

    await container.shutdown();
  });

  test('should create a retention sweeper when a max age is configured', async () => {
    const container = containerFor({ WEBHOOK_SECRET: 'test-secret', JOB_RETENTION_MS: '60000' });
    await container.initialize();

    expect(container.getRetentionSweeper()).toBeInstanceOf(RetentionSweeper);

    await container.shutdown();
  });

  test('should sync the job indexes after connecting to MongoDB', async () => {
    const connect = jest.spyOn(mongoose, 'connect').mockResolvedValue(mongoose);
    const syncIndexes = jest.spyOn(JobModel, 'syncIndexes').mockResolvedValue([]);
    const disconnect = jest.spyOn(mongoose, 'disconnect').mockResolvedValue(undefined);

    const container = containerFor({
      WEBHOOK_SECRET: 'test-secret',
      NODE_ENV: 'production',
      JOB_STORE: 'mongo',
      MONGO_URL: 'mongodb://db.test:27017/jobs'
    });
    await container.initialize();

    expect(connect).toHaveBeenCalledWith('mongodb://db.test:27017/jobs', expect.any(Object));
    expect(syncIndexes).toHaveBeenCalledTimes(1);
    expect(container.getJobStore()).toBeInstanceOf(MongoJobStore);

    await container.shutdown();
    expect(disconnect).toHaveBeenCalledTimes(1);

    jest.restoreAllMocks();
  });

  test('should fail to initialize without a webhook secret', async () => {
    await expect(containerFor({}).initialize()).rejects.toThrow('WEBHOOK_SECRET must be set');
  });
});
