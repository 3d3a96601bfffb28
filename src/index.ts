import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { pool } from './config/database';
import { connectRedis, redis } from './config/redis';
import { maintenanceQueue, notificationQueue, scheduleSweep } from './config/queue';
import { createContainer, Container } from './container';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createAdminRouter } from './routes/admin.routes';
import { createChatRouter } from './routes/chat.routes';
import { createCleanupWorker } from './workers/cleanup.worker';
import { createNotificationWorker } from './workers/notification.worker';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

export function createApp(container: Container): express.Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  const limiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  app.use('/api/chat', createChatRouter(container.agent));
  app.use('/api/admin', apiKeyAuth(env.API_KEYS), createAdminRouter(container.admin));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  if (env.SENTRY_DSN) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}

async function start() {
  try {
    const container = createContainer();

    await connectRedis();

    const workers = [
      createCleanupWorker(container.store),
      createNotificationWorker({ mailer: container.mailer, renderTeamEmail: env.RENDER_TEAM_EMAIL }),
    ];

    await scheduleSweep(env.SWEEP_CRON).catch((err: unknown) => {
      logger.warn('Failed to schedule expiry sweep', { error: errorMessage(err) });
    });

    const server = createApp(container).listen(parseInt(env.PORT), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });

    const shutdown = async (signal: string) => {
      logger.info('Shutting down', { signal });
      server.close();
      await Promise.all(workers.map((worker) => worker.close()));
      await Promise.all([maintenanceQueue.close(), notificationQueue.close()]);
      await redis.quit();
      await pool.end();
      process.exit(0);
    };

    for (const signal of ['SIGINT', 'SIGTERM']) {
      process.once(signal, () => {
        shutdown(signal).catch((err: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(err) });
          process.exit(1);
        });
      });
    }
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

if (require.main === module) {
  void start();
}
