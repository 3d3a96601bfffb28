import sgMail from '@sendgrid/mail';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface SendGridConfig {
  apiKey?: string;
  fromEmail?: string;
}

export interface Mailer {
  /** Resolves false when sending is not configured. */
  sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean>;
}

export class SendGridAdapter implements Mailer {
  constructor(private readonly config: SendGridConfig) {
    if (config.apiKey) {
      sgMail.setApiKey(config.apiKey);
    }
  }

  async sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean> {
    if (!this.config.apiKey || !this.config.fromEmail) {
      logger.warn('SendGrid not configured, skipping email', { subject });
      return false;
    }

    try {
      await sgMail.send({
        to,
        from: this.config.fromEmail,
        subject,
        text,
        html: html || text,
      });

      logger.info('Email sent', { to, subject });
      return true;
    } catch (error) {
      logger.error('SendGrid email failed', { to, subject, error: errorMessage(error) });
      throw error;
    }
  }
}
