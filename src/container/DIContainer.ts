import mongoose from 'mongoose';
import { Configuration } from '../services/Configuration';
import { Logger } from '../services/Logger';
import { InMemoryJobStore } from '../repositories/InMemoryJobStore';
import { MongoJobStore } from '../repositories/MongoJobStore';
import { JobModel } from '../models/Job';
import { HttpAnalysisExecutor } from '../services/AnalysisExecutor';
import { CallbackDeliveryClient } from '../services/CallbackDeliveryClient';
import { TaskPool } from '../services/TaskPool';
import { Dispatcher } from '../services/Dispatcher';
import { MaxAgeRetentionPolicy, RetentionSweeper } from '../services/RetentionSweeper';
import {
  IAnalysisExecutor,
  ICallbackDeliveryClient,
  IDispatcher,
  IJobStore,
  ILogger,
  ITaskPool
} from '../interfaces/services';
import { AppConfig } from '../types/domain';

// Everything the HTTP layer needs, so tests can hand in a plain object
export interface ServiceProvider {
  getConfig(): AppConfig;
  getLogger(): ILogger;
  getJobStore(): IJobStore;
  getExecutor(): IAnalysisExecutor;
  getTaskPool(): ITaskPool;
  getDispatcher(): IDispatcher;
  getRetentionSweeper(): RetentionSweeper | null;
  shutdown(): Promise<void>;
}

export interface ServiceRegistry {
  config: AppConfig;
  logger: ILogger;
  jobStore: IJobStore;
  executor: IAnalysisExecutor;
  deliveryClient: ICallbackDeliveryClient;
  taskPool: ITaskPool;
  dispatcher: IDispatcher;
}

// Dependency Injection Container following Dependency Inversion Principle
export class DIContainer<S> {
  private factories: { [K in keyof S]?: () => S[K] } = {};
  private singletons: { [K in keyof S]?: S[K] } = {};

  // Register a service (created once, on first use)
  register<K extends keyof S>(name: K, factory: () => S[K]): void {
    this.factories[name] = factory;
    delete this.singletons[name];
  }

  get<K extends keyof S>(name: K): S[K] {
    const existing = this.singletons[name];
    if (existing !== undefined) {
      return existing;
    }

    const factory = this.factories[name];
    if (!factory) {
      throw new Error(`Service ${String(name)} not registered`);
    }

    const instance = factory();
    this.singletons[name] = instance;
    return instance;
  }

  // Check if service is registered
  has(name: keyof S): boolean {
    return this.factories[name] !== undefined;
  }
}

export class ApplicationContainer implements ServiceProvider {
  private container = new DIContainer<ServiceRegistry>();
  private mongooseConnection: typeof mongoose | null = null;
  private retentionSweeper: RetentionSweeper | null = null;

  constructor(private configuration: Configuration = new Configuration()) {}

  async initialize(): Promise<void> {
    // Register basic services first
    this.registerBasicServices();

    // Initialize external connections
    await this.initializeConnections();

    // Register services that depend on connections
    this.registerDataServices();

    // Register business logic services
    this.registerBusinessServices();
  }

  private registerBasicServices(): void {
    const config = this.configuration.toAppConfig();
    this.container.register('config', () => config);

    this.container.register('logger', () =>
      Logger.create('job-analysis-webhook', { level: config.logging.level, dir: config.logging.dir })
    );
  }

  private async initializeConnections(): Promise<void> {
    const config = this.getConfig();
    const logger = this.getLogger();

    if (config.store.driver !== 'mongo') {
      logger.info('Using in-memory job store');
      return;
    }

    try {
      await mongoose.connect(config.store.mongoUrl, {
        maxPoolSize: 20,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 5000,     // Fail fast if MongoDB is down
        socketTimeoutMS: 45000,
        connectTimeoutMS: 10000,
        retryWrites: true,
        retryReads: true
      });

      this.mongooseConnection = mongoose;

      // Duplicate job ids are only refused once the unique index exists
      const droppedIndexes = await JobModel.syncIndexes();
      logger.info('Job indexes synced', { dropped: droppedIndexes });

      logger.info('Connected to MongoDB via Mongoose', {
        database: mongoose.connection.db?.databaseName,
        host: mongoose.connection.host
      });

      mongoose.connection.on('error', (error) => {
        logger.error('Mongoose connection error:', error);
      });

      mongoose.connection.on('disconnected', () => {
        logger.warn('Mongoose disconnected');
      });
    } catch (error) {
      logger.error('Failed to initialize connections:', error);
      throw error;
    }
  }

  private registerDataServices(): void {
    const config = this.getConfig();

    this.container.register('jobStore', () =>
      config.store.driver === 'mongo'
        ? new MongoJobStore(this.getLogger())
        : new InMemoryJobStore(this.getLogger())
    );

    if (config.retention.maxAgeMs !== undefined) {
      this.retentionSweeper = new RetentionSweeper(
        this.getJobStore(),
        new MaxAgeRetentionPolicy(config.retention.maxAgeMs),
        this.getLogger(),
        config.retention.sweepIntervalMs
      );
    }
  }

  private registerBusinessServices(): void {
    const config = this.getConfig();

    this.container.register('executor', () =>
      new HttpAnalysisExecutor(this.getLogger(), config.analysis)
    );

    this.container.register('deliveryClient', () =>
      new CallbackDeliveryClient(this.getLogger(), this.getJobStore(), config.callback)
    );

    this.container.register('taskPool', () =>
      new TaskPool(this.getLogger(), config.worker)
    );

    this.container.register('dispatcher', () =>
      new Dispatcher({
        logger: this.getLogger(),
        jobStore: this.getJobStore(),
        executor: this.getExecutor(),
        deliveryClient: this.container.get('deliveryClient'),
        taskPool: this.getTaskPool(),
        urlRules: { allowInsecureUrls: config.allowInsecureUrls }
      })
    );
  }

  // Get container for dependency injection
  getContainer(): DIContainer<ServiceRegistry> {
    return this.container;
  }

  getConfig(): AppConfig {
    return this.container.get('config');
  }

  getLogger(): ILogger {
    return this.container.get('logger');
  }

  getJobStore(): IJobStore {
    return this.container.get('jobStore');
  }

  getExecutor(): IAnalysisExecutor {
    return this.container.get('executor');
  }

  getTaskPool(): ITaskPool {
    return this.container.get('taskPool');
  }

  getDispatcher(): IDispatcher {
    return this.container.get('dispatcher');
  }

  getRetentionSweeper(): RetentionSweeper | null {
    return this.retentionSweeper;
  }

  // Graceful shutdown: finish background work before closing the store
  async shutdown(): Promise<void> {
    const logger = this.getLogger();

    try {
      this.retentionSweeper?.stop();
      await this.getTaskPool().shutdown();

      if (this.mongooseConnection) {
        await mongoose.disconnect();
        logger.info('Mongoose connection closed');
      }

      logger.info('Application shutdown completed');
    } catch (error) {
      logger.error('Error during shutdown:', error);
    }
  }
}
