import twilio from 'twilio';
import { logger } from '../../utils/logger';
import { SMSError, errorMessage, toError } from '../../utils/errors';

export interface TwilioConfig {
  accountSid?: string;
  authToken?: string;
  fromNumber?: string;
  maxRetries?: number;
  retryDelayMs?: number;
}

export interface MessageStatus {
  sid: string;
  status: string;
  to: string;
  from: string;
  dateSent: string | null;
  errorCode: number | null;
  errorMessage: string | null;
}

// Invalid or unreachable destination numbers; retrying will not help.
const PERMANENT_ERROR_CODES = new Set([21211, 21614]);

function errorCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'number' ? error.code : undefined;
  }
  return undefined;
}

export class TwilioService {
  private client: ReturnType<typeof twilio> | null = null;

  constructor(private readonly config: TwilioConfig) {}

  get configured(): boolean {
    return Boolean(this.config.accountSid && this.config.authToken && this.config.fromNumber);
  }

  private getClient(operation: string): ReturnType<typeof twilio> {
    if (!this.config.accountSid || !this.config.authToken) {
      throw new SMSError('twilio', operation, new Error('Missing Twilio credentials'), false);
    }
    if (!this.client) {
      this.client = twilio(this.config.accountSid, this.config.authToken);
    }
    return this.client;
  }

  async sendSMS(to: string, body: string): Promise<string> {
    const client = this.getClient('sendSMS');
    if (!this.config.fromNumber) {
      throw new SMSError('twilio', 'sendSMS', new Error('Missing Twilio phone number'), false);
    }

    const maxRetries = this.config.maxRetries ?? 3;
    const retryDelayMs = this.config.retryDelayMs ?? 1000;

    for (let attempt = 1; ; attempt++) {
      try {
        const result = await client.messages.create({ to, from: this.config.fromNumber, body });
        logger.info('SMS sent', { to, messageSid: result.sid, attempt });
        return result.sid;
      } catch (error) {
        const code = errorCode(error);
        if (attempt >= maxRetries || (code !== undefined && PERMANENT_ERROR_CODES.has(code))) {
          logger.error('Twilio send failed', { to, attempt, code, error: errorMessage(error) });
          throw new SMSError('twilio', 'sendSMS', toError(error), false);
        }

        logger.warn('Twilio send failed, retrying', { attempt, error: errorMessage(error) });
        await new Promise((resolve) => setTimeout(resolve, retryDelayMs * attempt));
      }
    }
  }

  async getStatus(sid: string): Promise<MessageStatus> {
    const client = this.getClient('getStatus');
    try {
      const message = await client.messages(sid).fetch();
      return {
        sid: message.sid,
        status: message.status,
        to: message.to,
        from: message.from,
        dateSent: message.dateSent ? message.dateSent.toISOString() : null,
        errorCode: message.errorCode ?? null,
        errorMessage: message.errorMessage ?? null,
      };
    } catch (error) {
      logger.error('Twilio status lookup failed', { sid, error: errorMessage(error) });
      throw new SMSError('twilio', 'getStatus', toError(error), false);
    }
  }
}
