import { ApplicationContainer } from './container/DIContainer';
import { JobAnalysisWebhookServer } from './server';

async function startApplication(): Promise<void> {
  const container = new ApplicationContainer();

  try {
    // Config, logger, job store, executor, worker pool
    await container.initialize();

    const server = new JobAnalysisWebhookServer(container);
    await server.start();

    // Stop taking requests, let background jobs and callbacks finish
    const shutdown = async () => {
      console.log('Received shutdown signal, gracefully shutting down...');
      try {
        await server.shutdown();
        process.exit(0);
      } catch (error) {
        console.error('Shutdown failed:', error);
        process.exit(1);
      }
    };

    process.on('SIGTERM', shutdown);
    process.on('SIGINT', shutdown);

  } catch (error) {
    console.error('Failed to start application:', error);
    process.exit(1);
  }
}

void startApplication();
