import 'dotenv/config';
import express from 'express';
import type { Express } from 'express';
import { preloadPrompts } from '../core/prompts.js';
import { createRuntime, type Runtime } from '../runtime.js';
import type { Logger } from '../util/logging.js';
import { router } from './routes.js';

function resOnFinish(res: express.Response, cb: () => void) {
  res.once('finish', cb);
}

export function createApp(runtime: Pick<Runtime, 'orchestrator' | 'memory'>, log: Logger): Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));

  // CORS support for frontend integration
  app.use((req, res, next) => {
    res.header('Access-Control-Allow-Origin', '*');
    res.header('Access-Control-Allow-Methods', 'GET, POST, DELETE, OPTIONS');
    res.header('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.sendStatus(200);
    } else {
      next();
    }
  });

  // Basic request logging
  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.get('/healthz', (_req, res) => {
    res.status(200).json({ ok: true, sessions: runtime.memory.size() });
  });
  app.use('/', router(runtime.orchestrator, log));

  // Malformed JSON bodies and other errors thrown by middleware
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'invalid_json' });
    }
    log.error({ err }, 'request failed');
    return res.status(500).json({ error: 'internal_error' });
  });

  return app;
}

async function main(): Promise<void> {
  const runtime = createRuntime();
  const { log } = runtime;
  const app = createApp(runtime, log);
  const port = Number(process.env.PORT ?? 3000);

  await preloadPrompts().catch((err: unknown) => log.warn({ err }, 'prompt_preload_failed'));
  const server = app.listen(port, () => log.info({ port }, 'HTTP server started'));

  const shutdown = (signal: string) => {
    log.info({ signal }, 'shutting down');
    server.close(() => {
      runtime.close().then(
        () => process.exit(0),
        (err: unknown) => {
          log.error({ err }, 'shutdown failed');
          process.exit(1);
        },
      );
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}
