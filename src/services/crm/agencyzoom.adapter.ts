import { z } from 'zod';
import { CRMAdapter, CRMConfig, Contact, ContactQuery, LeadPayload } from '../../types/crm';
import { logger } from '../../utils/logger';
import { ExternalCallFailedError, toError } from '../../utils/errors';

const SERVICE = 'AgencyZoom';

const createLeadResponseSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    leadId: z.union([z.string(), z.number()]).optional(),
  })
  .passthrough();

const contactSchema = z
  .object({
    id: z.union([z.string(), z.number()]).transform(String),
    firstname: z.string().optional(),
    lastname: z.string().optional(),
    email: z.string().optional(),
    phone: z.string().optional(),
  })
  .passthrough();

const searchResponseSchema = z.object({
  contacts: z.array(contactSchema).default([]),
});

function normalizeBaseUrl(baseUrl: string): string {
  const trimmed = baseUrl.replace(/\/+$/, '');
  return trimmed.endsWith('/v1') ? trimmed : `${trimmed}/v1`;
}

/**
 * AgencyZoom REST client. Requests are made once; callers decide what a failure means.
 */
export class AgencyZoomAdapter implements CRMAdapter {
  private readonly baseUrl: string;

  constructor(private readonly config: CRMConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    if (!config.apiKey) {
      logger.warn('AgencyZoom API key not configured');
    }
  }

  private async request(method: 'GET' | 'POST', path: string, body?: object): Promise<unknown> {
    const operation = `${method} ${path}`;

    if (!this.config.apiKey) {
      throw new ExternalCallFailedError(SERVICE, operation, new Error('API key not configured'));
    }

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${path}`, {
        method,
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(15000),
      });
    } catch (error) {
      throw new ExternalCallFailedError(SERVICE, operation, toError(error));
    }

    if (!res.ok) {
      const errorBody = await res.text();
      throw new ExternalCallFailedError(
        SERVICE,
        operation,
        new Error(`returned ${res.status}: ${errorBody}`),
        res.status
      );
    }

    return res.json();
  }

  async createLead(payload: LeadPayload): Promise<string> {
    const body: LeadPayload = {
      pipelineId: this.config.pipelineId,
      stageId: this.config.stageId,
      leadSourceId: this.config.leadSourceId,
      assignTo: this.config.assignTo,
      ...payload,
    };

    logger.info('AgencyZoom creating lead', { email: payload.email });
    const raw = await this.request('POST', '/api/leads/create', body);

    const parsed = createLeadResponseSchema.safeParse(raw);
    const leadId = parsed.success ? parsed.data.id ?? parsed.data.leadId : undefined;
    if (leadId === undefined) {
      throw new ExternalCallFailedError(SERVICE, 'createLead', new Error('response did not include a lead id'));
    }

    logger.info('AgencyZoom lead created', { leadId });
    return String(leadId);
  }

  async searchContacts(query: ContactQuery): Promise<Contact[]> {
    const params = new URLSearchParams('phone' in query ? { phone: query.phone } : { email: query.email });
    const raw = await this.request('GET', `/contacts/search?${params.toString()}`);

    const parsed = searchResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ExternalCallFailedError(SERVICE, 'searchContacts', new Error('unexpected response shape'));
    }

    logger.info('AgencyZoom contact search completed', { by: 'phone' in query ? 'phone' : 'email', count: parsed.data.contacts.length });
    return parsed.data.contacts.map((c) => ({
      id: c.id,
      firstName: c.firstname,
      lastName: c.lastname,
      email: c.email,
      phone: c.phone,
    }));
  }
}
