import path from 'path';
import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { v4 as uuidv4 } from 'uuid';

import { isStepLineError, WorkflowValidationError } from '../core/errors';
import { toJsonSafe } from '../core/workflow/Feedback';
import type { Workflow } from '../core/workflow/Workflow';
import type { WorkflowRunner } from '../core/workflow/WorkflowRunner';
import type { ILogger } from '../interfaces/ILogger';
import type { WorkflowParams, WorkflowRegistry } from '../workflows/WorkflowRegistry';

export interface ApiDependencies {
  registry: WorkflowRegistry;
  runner: WorkflowRunner;
  logger: ILogger;
  // When set, each run's feedback is also written to `<feedbackDir>/<run id>.json`.
  feedbackDir?: string;
}

// Values JSON cannot represent become placeholders instead of failing the response.
function safeJson(c: Context, value: unknown, status: 200 | 400 | 500 = 200): Response {
  c.status(status);
  c.header('Content-Type', 'application/json; charset=UTF-8');
  return c.body(JSON.stringify(toJsonSafe(value)));
}

function isParams(value: unknown): value is WorkflowParams {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Thin HTTP relay over the workflow registry: build a workflow, run it, return its feedback.
 * Job persistence stays with the caller.
 */
export function createApiApp(deps: ApiDependencies): Hono {
  const { registry, runner, logger, feedbackDir } = deps;
  const app = new Hono();

  // Middleware
  app.use('*', cors());
  app.use('*', honoLogger((message, ...rest) => {
    logger.info([message, ...rest].join(' '));
  }));

  app.onError((err, c) => {
    logger.error(`Unhandled error on ${c.req.method} ${c.req.path}: ${err.message}`);
    const details = isStepLineError(err) ? { message: err.message, ...err.details } : err.message;
    return safeJson(c, { error: 'Internal server error', details }, 500);
  });

  // GET /status - Basic status endpoint
  app.get('/status', (c) => {
    return c.json({
      status: 'ok',
      message: 'stepline API is running.',
      workflows: registry.list().map(w => w.id),
    });
  });

  // GET /workflows - List registered workflows
  app.get('/workflows', (c) => c.json(registry.list()));

  // POST /workflows/:workflowId/runs - Build and execute a workflow, respond with its feedback
  app.post('/workflows/:workflowId/runs', async (c) => {
    const workflowId = c.req.param('workflowId');
    if (!registry.has(workflowId)) {
      return c.json({ error: `Workflow "${workflowId}" not found.` }, 404);
    }

    const raw = await c.req.text();
    let body: unknown = {};
    if (raw.trim().length > 0) {
      try {
        body = JSON.parse(raw);
      } catch {
        return c.json({ error: 'Invalid request: body must be a JSON object.' }, 400);
      }
    }
    if (!isParams(body)) {
      return c.json({ error: 'Invalid request: body must be a JSON object.' }, 400);
    }
    const params = body.params ?? {};
    if (!isParams(params)) {
      return c.json({ error: 'Invalid request: "params" must be a JSON object.' }, 400);
    }

    let workflow: Workflow;
    try {
      workflow = registry.build(workflowId, params);
    } catch (error) {
      if (error instanceof WorkflowValidationError) {
        return safeJson(c, { error: error.message, details: error.details }, 400);
      }
      throw error;
    }

    const runId = uuidv4();
    const sink = feedbackDir ? path.join(feedbackDir, `${runId}.json`) : undefined;
    const feedback = await runner.run(workflow, sink, runId);

    c.header('X-Run-Id', runId);
    return safeJson(c, feedback);
  });

  // Base route
  app.get('/', (c) => c.text('stepline workflow runner. Use /status for more info.'));

  return app;
}
