import express from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { Services } from '../services.js';
import type { Logger } from '../util/logging.js';
import { router } from './routes.js';

function resOnFinish(res: Response, cb: () => void): void {
  res.once('finish', cb);
}

function isBodyParseError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(services: Services, log: Logger): express.Express {
  const app = express();

  app.use(express.json({ limit: '512kb' }));

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

  app.use((req, res, next) => {
    const start = Date.now();
    log.debug({ method: req.method, path: req.path }, 'req:start');
    resOnFinish(res, () => {
      log.debug({ method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, 'req:done');
    });
    next();
  });

  app.use('/', router(services, log));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'invalid_json' });
      return;
    }
    log.error({ err }, 'unhandled request error');
    res.status(500).json({ error: 'internal_error' });
  });

  return app;
}
