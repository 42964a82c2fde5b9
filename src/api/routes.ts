import type { Request, RequestHandler, Response, Router } from 'express';
import express from 'express';
import multer from 'multer';
import { ChatInput, ChatOutput } from '../schemas/chat.js';
import { TripPlanInput } from '../schemas/itinerary.js';
import { SESSION_ID, UploadFields } from '../schemas/upload.js';
import { DocumentTooLargeError, InputError } from '../tools/errors.js';
import type { Services } from '../services.js';
import type { Logger } from '../util/logging.js';
import { getPrometheusText, metricsContentType, observeRequest } from '../util/metrics.js';

type Route = 'chat' | 'plan' | 'upload';

function runMiddleware(handler: RequestHandler, req: Request, res: Response): Promise<void> {
  return new Promise((resolve, reject) => {
    handler(req, res, (err?: unknown) => (err ? reject(err) : resolve()));
  });
}

export const router = (services: Services, log: Logger): Router => {
  const r = express.Router();
  const limitMb = services.config.maxUploadSizeMb;
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: limitMb * 1024 * 1024, files: 1 },
  }).single('file');

  const fail = (res: Response, route: Route, err: unknown): Response => {
    const mapped = err instanceof multer.MulterError && err.code === 'LIMIT_FILE_SIZE' ? new DocumentTooLargeError(limitMb) : err;
    if (mapped instanceof InputError) {
      observeRequest(route, 'invalid');
      return res.status(mapped.status).json({ error: mapped.code, message: mapped.message });
    }
    observeRequest(route, 'error');
    log.error({ err: mapped, route }, `${route} failed`);
    return res.status(500).json({ error: 'internal_error' });
  };

  r.post('/chat', async (req, res) => {
    const parsed = ChatInput.safeParse(req.body);
    if (!parsed.success) {
      observeRequest('chat', 'invalid');
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const out = await services.chat.processMessage(parsed.data);
      observeRequest('chat', 'ok');
      return res.json(ChatOutput.parse(out));
    } catch (err: unknown) {
      return fail(res, 'chat', err);
    }
  });

  r.post('/plan', async (req, res) => {
    const parsed = TripPlanInput.safeParse(req.body);
    if (!parsed.success) {
      observeRequest('plan', 'invalid');
      return res.status(400).json({ error: parsed.error.flatten() });
    }
    try {
      const out = await services.planner.planTrip(parsed.data);
      observeRequest('plan', 'ok');
      return res.json(out);
    } catch (err: unknown) {
      return fail(res, 'plan', err);
    }
  });

  r.post('/upload', async (req, res) => {
    try {
      await runMiddleware(upload, req, res);
      const fields = UploadFields.safeParse(req.body ?? {});
      if (!fields.success) {
        observeRequest('upload', 'invalid');
        return res.status(400).json({ error: fields.error.flatten() });
      }
      if (!req.file) throw new InputError('missing_file', 'Attach a document in the "file" field.');

      const out = await services.ingest(req.file.originalname, req.file.buffer, fields.data.session_id);
      observeRequest('upload', 'ok');
      return res.json(out);
    } catch (err: unknown) {
      return fail(res, 'upload', err);
    }
  });

  r.get('/session/:id', async (req, res) => {
    const id = SESSION_ID.safeParse(req.params.id);
    if (!id.success) return res.status(400).json({ error: id.error.flatten() });
    try {
      const info = await services.store.info(id.data);
      return res.json({
        session_id: id.data,
        exists: info.exists,
        message_count: info.messages,
        document_chunks: info.count,
        created_at: info.createdAt,
      });
    } catch (err: unknown) {
      log.error({ err }, 'session lookup failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.delete('/session/:id', async (req, res) => {
    const id = SESSION_ID.safeParse(req.params.id);
    if (!id.success) return res.status(400).json({ error: id.error.flatten() });
    try {
      await services.store.clear(id.data);
      return res.json({ session_id: id.data, status: 'cleared' });
    } catch (err: unknown) {
      log.error({ err }, 'session clear failed');
      return res.status(500).json({ error: 'internal_error' });
    }
  });

  r.get('/healthz', async (_req, res) => {
    const connected = await services.generator.health();
    return res.json({
      status: connected ? 'healthy' : 'degraded',
      llm_provider: services.generator.provider,
      llm_connected: connected,
    });
  });

  r.get('/metrics', async (_req, res) => {
    const text = await getPrometheusText();
    res.setHeader('Content-Type', metricsContentType);
    return res.status(200).send(text);
  });

  return r;
};
