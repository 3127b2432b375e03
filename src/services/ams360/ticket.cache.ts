import { logger } from '../../utils/logger';
import { AuthenticationFailedError, toError } from '../../utils/errors';

export interface CachedTicket {
  ticket: string;
  expiresAt: number;
}

export interface TicketCacheOptions {
  /** Identity the ticket belongs to, usually agency number plus login id. */
  key: string;
  login: () => Promise<string>;
  ttlMs: number;
  now?: () => number;
}

/**
 * Holds the legacy backend's session ticket and renews it once it expires.
 *
 * Concurrent callers share a single login: the in-flight promise is handed to everyone
 * who asks while it is pending.
 */
export class TicketCache {
  private cached: CachedTicket | null = null;
  private inFlight: Promise<string> | null = null;
  private readonly now: () => number;

  constructor(private readonly options: TicketCacheOptions) {
    this.now = options.now ?? Date.now;
  }

  get key(): string {
    return this.options.key;
  }

  async getValidTicket(): Promise<string> {
    if (this.cached && this.now() < this.cached.expiresAt) {
      return this.cached.ticket;
    }

    if (this.inFlight) {
      logger.debug('Joining in-flight ticket login', { key: this.options.key });
      return this.inFlight;
    }

    const pending = this.refresh();
    this.inFlight = pending;
    try {
      return await pending;
    } finally {
      this.inFlight = null;
    }
  }

  invalidate(): void {
    if (this.cached) {
      logger.info('Ticket invalidated', { key: this.options.key });
    }
    this.cached = null;
  }

  private async refresh(): Promise<string> {
    this.cached = null;
    let ticket: string;
    try {
      ticket = await this.options.login();
    } catch (error) {
      if (error instanceof AuthenticationFailedError) throw error;
      throw new AuthenticationFailedError('AMS360', toError(error));
    }

    this.cached = { ticket, expiresAt: this.now() + this.options.ttlMs };
    logger.info('Ticket refreshed', { key: this.options.key, expiresAt: new Date(this.cached.expiresAt).toISOString() });
    return ticket;
  }
}
