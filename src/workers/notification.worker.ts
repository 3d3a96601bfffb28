import { Worker, Job } from 'bullmq';
import { connection, NotificationJobData, QUEUE_NAMES } from '../config/queue';
import { Mailer } from '../services/email/sendgrid.adapter';
import { logger } from '../utils/logger';

export interface NotificationDeps {
  mailer: Mailer;
  renderTeamEmail?: string;
}

export function renderRequestEmail(data: NotificationJobData): { subject: string; text: string } {
  const lines = [
    `A render request is ready for production: ${data.requestedItem}.`,
    '',
    `Name: ${data.name}`,
    `Email: ${data.email}`,
    `Phone: ${data.phone}`,
    `User ID: ${data.userId}`,
  ];
  if (data.readyBy) {
    lines.push(`Promised by: ${data.readyBy}`);
  }
  return { subject: `New render request: ${data.requestedItem}`, text: lines.join('\n') };
}

export type NotificationJob = Pick<Job<NotificationJobData>, 'id' | 'data' | 'attemptsMade'>;

export async function processNotification(job: NotificationJob, deps: NotificationDeps): Promise<void> {
  const { type, userId } = job.data;

  logger.info('Processing notification', { type, userId, attempt: job.attemptsMade + 1 });

  switch (type) {
    case 'render_request_complete': {
      if (!deps.renderTeamEmail) {
        logger.warn('RENDER_TEAM_EMAIL not set, render request not emailed', { userId });
        return;
      }
      const { subject, text } = renderRequestEmail(job.data);
      await deps.mailer.sendEmail(deps.renderTeamEmail, subject, text);
      break;
    }

    default:
      logger.warn('Unknown notification type', { type });
  }
}

export function createNotificationWorker(deps: NotificationDeps): Worker<NotificationJobData> {
  const worker = new Worker<NotificationJobData>(
    QUEUE_NAMES.NOTIFICATION,
    (job) => processNotification(job, deps),
    {
      connection,
      concurrency: 10,
      limiter: { max: 20, duration: 1000 },
    }
  );

  worker.on('completed', (job) => {
    logger.info('Notification job completed', { jobId: job.id, type: job.data.type });
  });

  worker.on('failed', (job, err) => {
    logger.error('Notification job failed', {
      jobId: job?.id,
      type: job?.data.type,
      error: err.message,
      attempts: job?.attemptsMade,
    });
  });

  return worker;
}
