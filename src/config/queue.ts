import { Queue } from 'bullmq';
import { env } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const QUEUE_NAMES = {
  MEMORY_MAINTENANCE: 'memory-maintenance',
  NOTIFICATION: 'notifications',
} as const;

export const SWEEP_JOB_NAME = 'sweep-expired';

export interface RedisConnection {
  host: string;
  port: number;
  password?: string;
  tls?: Record<string, never>;
}

export function parseRedisUrl(url: string): RedisConnection {
  const parsed = new URL(url);
  const connection: RedisConnection = {
    host: parsed.hostname,
    port: parsed.port ? Number(parsed.port) : 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
  };
  if (parsed.protocol === 'rediss:') {
    connection.tls = {};
  }
  return connection;
}

export const connection = parseRedisUrl(env.REDIS_URL);

export const maintenanceQueue = new Queue(QUEUE_NAMES.MEMORY_MAINTENANCE, {
  connection,
  defaultJobOptions: {
    attempts: 2,
    backoff: { type: 'exponential', delay: 5000 },
    removeOnComplete: 50,
    removeOnFail: 100,
  },
});

export const notificationQueue = new Queue(QUEUE_NAMES.NOTIFICATION, {
  connection,
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: 100,
    removeOnFail: 500,
  },
});

for (const queue of [maintenanceQueue, notificationQueue]) {
  queue.on('error', (err: Error) => {
    logger.error('Queue error', { queue: queue.name, error: err.message });
  });
}

export interface SweepJobData {
  requestedBy: 'schedule' | 'admin';
}

export interface NotificationJobData {
  type: 'render_request_complete';
  userId: string;
  requestedItem: string;
  name: string;
  email: string;
  phone: string;
  readyBy: string | null;
}

/** Registers (or replaces) the repeatable expiry sweep. */
export async function scheduleSweep(pattern: string): Promise<void> {
  await maintenanceQueue.add(
    SWEEP_JOB_NAME,
    { requestedBy: 'schedule' } satisfies SweepJobData,
    { repeat: { pattern }, jobId: SWEEP_JOB_NAME }
  );
  logger.info('Expiry sweep scheduled', { pattern });
}

export async function addNotificationJob(data: NotificationJobData): Promise<void> {
  try {
    await notificationQueue.add('notify', data);
    logger.info('Notification job queued', { type: data.type, userId: data.userId });
  } catch (error) {
    logger.error('Failed to queue notification job', { userId: data.userId, error: errorMessage(error) });
  }
}
