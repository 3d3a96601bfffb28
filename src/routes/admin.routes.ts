import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { checkDatabaseHealth } from '../config/database';
import { checkRedisHealth } from '../config/redis';
import { AdminService } from '../services/admin.service';
import { ValidationError } from '../utils/errors';

type Handler = (req: Request, res: Response) => Promise<void>;

const ctaResponseSchema = z.object({
  cta_type: z.enum(['consult', 'render']),
  response: z.string().trim().min(1, 'response is required'),
});

const renderStatusSchema = z.object({
  status: z.enum(['in_progress', 'complete']),
});

export function parseBody<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '));
  }
  return parsed.data;
}

function wrap(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createAdminRouter(admin: AdminService): Router {
  const router = Router();

  router.get('/health', wrap(async (_req, res) => {
    const [dbHealth, redisHealth] = await Promise.all([
      checkDatabaseHealth(),
      checkRedisHealth(),
    ]);

    const healthy = dbHealth.status === 'healthy' && redisHealth.status === 'healthy';

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      database: dbHealth,
      redis: redisHealth,
      timestamp: new Date().toISOString(),
    });
  }));

  router.get('/memory/:userId', wrap(async (req, res) => {
    const stats = await admin.getStats(req.params.userId);
    res.json({ success: true, stats });
  }));

  router.delete('/memory/:userId', wrap(async (req, res) => {
    const deleted = await admin.reset(req.params.userId);
    res.json({ success: true, deleted });
  }));

  router.post('/cleanup', wrap(async (_req, res) => {
    const removed = await admin.sweep();
    res.json({ success: true, removed });
  }));

  router.get('/renders/export', wrap(async (_req, res) => {
    const renders = await admin.exportCompletedRenders();
    res.json({ success: true, count: renders.length, renders });
  }));

  router.get('/render-status/:userId', wrap(async (req, res) => {
    res.json({ success: true, ...(await admin.renderStatus(req.params.userId)) });
  }));

  router.post('/cta-test/:userId', wrap(async (req, res) => {
    res.json({ success: true, ...(await admin.checkCta(req.params.userId)) });
  }));

  router.post('/memory/:userId/cta-response', wrap(async (req, res) => {
    const body = parseBody(ctaResponseSchema, req.body);
    const record = await admin.recordCtaResponse(req.params.userId, body.cta_type, body.response);
    res.json({
      success: true,
      buyer_stage: record.buyerStage,
      render_requested: record.renderRequested,
      render_status: record.renderStatus,
    });
  }));

  router.put('/memory/:userId/render-status', wrap(async (req, res) => {
    const body = parseBody(renderStatusSchema, req.body);
    const record = await admin.setRenderStatus(req.params.userId, body.status);
    res.json({ success: true, render_status: record.renderStatus });
  }));

  router.get('/conversation-stats', wrap(async (_req, res) => {
    res.json({ success: true, ...(await admin.conversationStats()) });
  }));

  return router;
}
