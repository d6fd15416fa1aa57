import express from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Config } from './config.js';
import type { Logger } from './logger.js';
import type { RunStore } from './store/types.js';
import type { RetryController } from './runner/retryController.js';
import { createAuthMiddleware } from './middleware/auth.js';
import { createErrorHandler, toErrorReply } from './middleware/errorHandler.js';
import { ConcurrencyGate } from './runner/concurrencyGate.js';
import { validateTask } from './security/policy.js';
import { readSandboxFile } from './files/readFile.js';
import { errorMessage } from './errors.js';

export type AppConfig = Pick<
  Config,
  'sandboxRoot' | 'denyGlobs' | 'accessToken' | 'maxConcurrent' | 'maxTaskBytes'
>;

export interface AppServices {
  controller: RetryController;
  store: RunStore;
  logger: Logger;
}

export function createApp(config: AppConfig, services: AppServices) {
  const { controller, store, logger } = services;
  const app = express();
  const gate = new ConcurrencyGate(config.maxConcurrent);
  const httpLog = logger.child('http');

  app.use(createAuthMiddleware(config.accessToken));

  // --- POST /run ---
  app.post('/run', async (req, res) => {
    const validation = validateTask(req.query.task, config.maxTaskBytes);
    if (!validation.valid) {
      res.status(400).json({ error: 'Invalid task input', errors: validation.errors });
      return;
    }

    const runId = uuidv4();
    if (!gate.acquire(runId)) {
      res.status(503).json({ error: 'Server busy', active_runs: gate.activeCount() });
      return;
    }

    try {
      const { outcome } = await controller.run(validation.task, runId);
      res.json(outcome);
    } finally {
      gate.release(runId);
    }
  });

  // --- GET /read ---
  app.get('/read', async (req, res) => {
    const requested = req.query.path;
    if (typeof requested !== 'string' || !requested) {
      res.status(400).json({ error: 'path query parameter is required' });
      return;
    }

    try {
      const content = await readSandboxFile(config.sandboxRoot, requested, config.denyGlobs);
      res.type('text/plain').send(content);
    } catch (err) {
      const reply = toErrorReply(err);
      httpLog.warn('Read failed', { path: requested, status: reply.status, error: errorMessage(err) });
      try {
        await store.appendError({ category: 'read', detail: `${requested}: ${errorMessage(err)}` });
      } catch (logErr) {
        httpLog.error('Recording read failure failed', { path: requested, error: logErr });
      }
      res.status(reply.status).json(reply.body);
    }
  });

  // --- GET /health ---
  app.get('/health', async (_req, res) => {
    const last = await store.getLastResult();
    res.json({
      status: 'ok',
      active_runs: gate.activeCount(),
      last_completed_at: last?.completed_at ?? null,
    });
  });

  app.use(createErrorHandler(httpLog));

  return app;
}
