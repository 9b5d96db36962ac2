import express from 'express';
import cors from 'cors';
import { Server } from 'http';
import { v4 as uuidv4 } from 'uuid';
import { ServiceProvider } from './container/DIContainer';
import { DispatchResult, AppConfig } from './types/domain';
import { IDispatcher, IJobStore, ILogger, IAnalysisExecutor, ITaskPool } from './interfaces/services';
import { isAppError } from './errors/AppError';
import { SIGNATURE_HEADER } from './services/SignatureCodec';

export const REQUEST_ID_HEADER = 'X-Request-ID';

// body-parser attaches an http status to the errors it raises (413, 400, 415)
function clientErrorStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 500 ? error.status : undefined;
  }
  return undefined;
}

// HTTP front of the webhook service: signed job-analysis webhooks in,
// either an inline result or a 202 with the outcome delivered later.
export class JobAnalysisWebhookServer {
  private app: express.Application;
  private httpServer: Server | null = null;

  private logger: ILogger;
  private config: AppConfig;
  private dispatcher: IDispatcher;
  private jobStore: IJobStore;
  private executor: IAnalysisExecutor;
  private taskPool: ITaskPool;

  constructor(private container: ServiceProvider) {
    this.logger = container.getLogger();
    this.config = container.getConfig();
    this.dispatcher = container.getDispatcher();
    this.jobStore = container.getJobStore();
    this.executor = container.getExecutor();
    this.taskPool = container.getTaskPool();

    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(cors());

    this.app.use((req, res, next) => {
      const requestId = req.get(REQUEST_ID_HEADER) || uuidv4();
      res.setHeader(REQUEST_ID_HEADER, requestId);
      this.logger.info(`${req.method} ${req.path}`, {
        requestId,
        userAgent: req.get('User-Agent'),
        ip: req.ip
      });
      next();
    });
  }

  private setupRoutes(): void {
    const prefix = this.config.apiPrefix;

    this.app.get('/', (req, res) => {
      res.json({ message: 'Welcome to the Job Analysis API' });
    });

    this.app.get('/health', async (req, res) => {
      try {
        const health = await this.getHealthStatus();
        res.json(health);
      } catch (error) {
        this.logger.error('Health check failed:', error);
        res.status(503).json({
          status: 'unhealthy',
          timestamp: new Date().toISOString(),
          error: 'Service unavailable'
        });
      }
    });

    this.app.get(`${prefix}/webhooks/health`, (req, res) => {
      res.json({ status: 'healthy', service: 'webhook-handler' });
    });

    // The signature covers the exact bytes, so the body is never parsed here
    this.app.post(`${prefix}/webhooks/job-analysis`,
      express.raw({ type: '*/*', limit: this.config.maxPayloadBytes }),
      this.handleJobAnalysisWebhook.bind(this)
    );
  }

  private async handleJobAnalysisWebhook(
    req: express.Request,
    res: express.Response,
    next: express.NextFunction
  ): Promise<void> {
    try {
      const rawBody = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const result = await this.dispatcher.handleWebhook(
        rawBody,
        req.get(SIGNATURE_HEADER),
        this.config.webhookSecret
      );
      this.sendDispatchResult(res, result);
    } catch (error) {
      next(error);
    }
  }

  private sendDispatchResult(res: express.Response, result: DispatchResult): void {
    const timestamp = new Date().toISOString();

    if (result.kind === 'completed') {
      res.status(200).json({
        status: 'completed',
        job_id: result.jobId,
        result: result.result,
        message: 'Job analysis completed successfully',
        timestamp
      });
      return;
    }

    res.status(202).json({
      status: 'accepted',
      job_id: result.jobId,
      message: 'Job analysis started in background',
      timestamp
    });
  }

  private async getHealthStatus() {
    const storeHealthy = await this.jobStore.healthCheck();
    const analysisAvailable = this.executor.isAvailable();

    return {
      status: storeHealthy && analysisAvailable ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      components: {
        jobStore: storeHealthy ? 'healthy' : 'unhealthy',
        analysis: analysisAvailable ? 'available' : 'circuit_open',
        taskPool: this.taskPool.getStats()
      }
    };
  }

  private setupErrorHandling(): void {
    this.app.use((req, res) => {
      res.status(404).json({ error: 'Not found' });
    });

    this.app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
      if (res.headersSent) {
        return next(error);
      }

      if (isAppError(error)) {
        if (error.httpStatus >= 500) {
          this.logger.error(`Request failed: ${error.code}`, error);
        }
        res.status(error.httpStatus).json({ error: error.publicMessage() });
        return;
      }

      const clientStatus = clientErrorStatus(error);
      if (clientStatus !== undefined) {
        this.logger.warn('Request rejected by body parser', { status: clientStatus });
        res.status(clientStatus).json({ error: clientStatus === 413 ? 'Payload too large' : 'Bad request' });
        return;
      }

      this.logger.error('Unhandled error:', error);
      res.status(500).json({
        error: 'Internal server error',
        ...(this.config.nodeEnv === 'development' && error instanceof Error && {
          details: error.message,
          stack: error.stack
        })
      });
    });
  }

  start(): Promise<void> {
    const port = this.config.port;

    return new Promise((resolve) => {
      this.httpServer = this.app.listen(port, () => {
        this.logger.info(`Server running on port ${port}`, {
          environment: this.config.nodeEnv,
          port,
          apiPrefix: this.config.apiPrefix
        });

        this.container.getRetentionSweeper()?.start();
        resolve();
      });
    });
  }

  async shutdown(): Promise<void> {
    this.logger.info('Shutting down server...');

    const httpServer = this.httpServer;
    if (httpServer) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
      this.httpServer = null;
    }

    await this.container.shutdown();
  }

  getApp(): express.Application {
    return this.app;
  }
}
