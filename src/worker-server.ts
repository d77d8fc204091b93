import express, { type Express } from 'express';
import { z } from 'zod';
import { runBot } from './bot.js';
import { createRunConfig } from './config.js';
import { ConfigError, RunConflictError } from './errors.js';
import { RunRegistry, type RunListener } from './services/run-registry.js';
import { logger } from './utils/logger.js';

const startRunSchema = z
  .object({
    maxApplications: z.coerce.number().int().positive().optional(),
    headless: z.boolean().optional(),
    test: z.boolean().optional(),
  })
  .strict();

export function createWorkerApp(registry: RunRegistry, env: Record<string, string | undefined> = process.env): Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.get('/health', (_req, res) => {
    res.json({ ok: true, activeRun: registry.active?.id ?? null });
  });

  app.post('/runs', (req, res) => {
    const body = startRunSchema.safeParse(req.body ?? {});
    if (!body.success) {
      return res.status(400).json({
        error: 'Invalid request body.',
        issues: body.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
      });
    }

    try {
      // Runs started over HTTP have no screen to show a browser on
      const config = createRunConfig(env, {
        maxApplications: body.data.maxApplications,
        test: body.data.test,
        headless: body.data.headless ?? true,
      });
      const run = registry.start(config);
      return res.status(202).json({ runId: run.id });
    } catch (error) {
      if (error instanceof RunConflictError) {
        return res.status(409).json({ error: error.message, activeRunId: error.activeRunId });
      }
      if (error instanceof ConfigError) {
        return res.status(400).json({ error: error.message, issues: error.issues });
      }
      throw error;
    }
  });

  app.get('/runs/:id', (req, res) => {
    const run = registry.get(req.params.id);
    if (!run) {
      return res.status(404).json({ error: 'Run not found.' });
    }
    return res.json(registry.view(run));
  });

  app.get('/runs/:id/stream', (req, res) => {
    if (!registry.get(req.params.id)) {
      return res.status(404).end();
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache, no-transform');
    res.setHeader('Connection', 'keep-alive');

    let ended = false;
    const listener: RunListener = {
      send: (event, data) => {
        res.write(`event: ${event}\n`);
        res.write(`data: ${data.replace(/\n/g, '\\n')}\n\n`);
      },
      end: () => {
        if (ended) return;
        ended = true;
        res.end();
      },
    };

    const unsubscribe = registry.subscribe(req.params.id, listener);
    req.on('close', () => {
      ended = true;
      unsubscribe?.();
    });
    return undefined;
  });

  app.post('/runs/:id/end', (req, res) => {
    const result = registry.end(req.params.id);
    if (result === 'not-found') {
      return res.status(404).json({ error: 'Run not found.' });
    }
    if (result === 'not-running') {
      return res.status(409).json({ error: 'Run is no longer running.' });
    }
    return res.status(202).json({ ok: true });
  });

  return app;
}

export function startWorkerServer(port: number): void {
  const registry = new RunRegistry(runBot);
  const app = createWorkerApp(registry);
  app.listen(port, () => {
    logger.success(`Worker listening on :${port}`);
  });
}
