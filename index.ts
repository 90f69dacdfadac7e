import { serve } from '@hono/node-server';
import { createApiApp } from './src/api/server';
import { loadConfig } from './src/config';
import { WorkflowRunner } from './src/core/workflow/WorkflowRunner';
import { ConsoleLogger } from './src/logging/ConsoleLogger';
import { createDefaultWorkflowRegistry } from './src/workflows';

const config = loadConfig();
const logger = new ConsoleLogger({ level: config.logLevel, component: 'stepline' });
const registry = createDefaultWorkflowRegistry();
const runner = WorkflowRunner.fromConfig(config, logger.child('WorkflowRunner'));

const app = createApiApp({
  registry,
  runner,
  logger: logger.child('API'),
  feedbackDir: config.feedbackDir,
});

logger.info(`stepline API server starting on http://${config.host}:${config.port}...`);

const server = serve({
  fetch: app.fetch,
  port: config.port,
  hostname: config.host,
}, (info) => {
  logger.info(`stepline API server running at http://${info.address}:${info.port}/`);
  logger.info(`Registered workflows: ${registry.list().map(w => w.id).join(', ')}`);
});

// Graceful shutdown handling
function shutdown(signal: string): void {
  logger.info(`${signal} received. Shutting down stepline server...`);
  server.close((err?: Error) => {
    if (err) {
      logger.error(`Error during server shutdown: ${err.message}`);
      process.exit(1);
    }
    logger.info('Server closed.');
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${reason instanceof Error ? reason.message : String(reason)}`);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  shutdown('uncaughtException');
});
