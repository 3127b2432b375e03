import sgMail from '@sendgrid/mail';
import { logger } from '../../utils/logger';
import { ServiceError, errorMessage, toError } from '../../utils/errors';

export interface SendGridConfig {
  apiKey?: string;
  fromEmail?: string;
}

export interface OutgoingEmail {
  to: string;
  subject: string;
  body: string;
  isHtml: boolean;
}

export class SendGridAdapter {
  constructor(private readonly config: SendGridConfig) {
    if (config.apiKey) {
      sgMail.setApiKey(config.apiKey);
    }
  }

  async sendEmail(email: OutgoingEmail): Promise<void> {
    if (!this.config.apiKey || !this.config.fromEmail) {
      throw new ServiceError('SendGrid', 'sendEmail', new Error('SendGrid not configured'), false);
    }

    const content = email.isHtml ? { html: email.body } : { text: email.body };
    try {
      await sgMail.send({ to: email.to, from: this.config.fromEmail, subject: email.subject, ...content });
      logger.info('Email sent', { to: email.to, subject: email.subject });
    } catch (error) {
      logger.error('SendGrid email failed', { to: email.to, subject: email.subject, error: errorMessage(error) });
      throw new ServiceError('SendGrid', 'sendEmail', toError(error), false);
    }
  }
}
