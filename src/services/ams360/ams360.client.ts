import { XMLParser } from 'fast-xml-parser';
import { TicketCache } from './ticket.cache';
import {
  Ams360Config,
  CustomerDetails,
  PolicyBackend,
  PolicyDetails,
  PolicyLookup,
  PolicySummary,
} from '../../types/ams360';
import { logger } from '../../utils/logger';
import { AuthenticationFailedError, ExternalCallFailedError, toError } from '../../utils/errors';

const SERVICE = 'AMS360';
const NAMESPACE = 'http://www.WSAPI.AMS360.com/v3.0';
const DATA_CONTRACT = 'http://www.WSAPI.AMS360.com/v3.0/DataContract';
const DEFAULT_TIMEOUT_MS = 20000;

const AUTH_FAULT = /ticket|session|authenticat|login/i;

const parser = new XMLParser({ removeNSPrefix: true, ignoreAttributes: true, parseTagValue: false });

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: unknown, ...path: string[]): unknown {
  let current = node;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function text(node: unknown, key: string): string | undefined {
  const value = child(node, key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function asList(value: unknown): unknown[] {
  if (value === undefined || value === null || value === '') return [];
  return Array.isArray(value) ? value : [value];
}

function toSummary(node: unknown): PolicySummary | null {
  const policyId = text(node, 'PolicyId');
  const customerId = text(node, 'CustomerId');
  if (!policyId || !customerId) return null;
  return { policyId, customerId, policyNumber: text(node, 'PolicyNumber') };
}

function summaries(list: unknown): PolicySummary[] {
  return asList(child(list, 'PolicyInfo'))
    .map(toSummary)
    .filter((summary): summary is PolicySummary => summary !== null);
}

function scalars(node: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(node)) return result;
  for (const [key, value] of Object.entries(node)) {
    if (typeof value === 'string' && value !== '') result[key] = value;
  }
  return result;
}

export function soapEnvelope(operation: string, fields: Record<string, string>, ticket?: string): string {
  const header = ticket
    ? `<s:Header><WSAPISession xmlns="${NAMESPACE}"><Ticket>${escapeXml(ticket)}</Ticket></WSAPISession></s:Header>`
    : '';
  const body = Object.entries(fields)
    .map(([name, value]) => (value === '' ? `<a:${name}/>` : `<a:${name}>${escapeXml(value)}</a:${name}>`))
    .join('');

  return (
    '<?xml version="1.0" encoding="utf-8"?>' +
    '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/">' +
    header +
    `<s:Body><${operation} xmlns="${NAMESPACE}">` +
    `<Request xmlns:a="${DATA_CONTRACT}" xmlns:i="http://www.w3.org/2001/XMLSchema-instance">${body}</Request>` +
    `</${operation}></s:Body></s:Envelope>`
  );
}

/**
 * SOAP client for the AMS360 web service. Every operation except `login` carries the
 * cached session ticket; an authentication fault drops the ticket and retries once.
 */
export class Ams360Client implements PolicyBackend {
  readonly tickets: TicketCache;

  constructor(private readonly config: Ams360Config, tickets?: TicketCache) {
    this.tickets =
      tickets ??
      new TicketCache({
        key: `${config.agencyNo ?? ''}:${config.loginId ?? ''}`,
        ttlMs: config.ticketTtlMs,
        login: () => this.login(),
      });
  }

  async login(): Promise<string> {
    const { agencyNo, loginId, password } = this.config;
    if (!agencyNo || !loginId || !password) {
      throw new AuthenticationFailedError(SERVICE, new Error('credentials not configured'));
    }

    let doc: unknown;
    try {
      doc = await this.post('Login', soapEnvelope('Login', { AgencyNo: agencyNo, LoginId: loginId, Password: password, EmployeeCode: '' }));
    } catch (error) {
      throw new AuthenticationFailedError(SERVICE, toError(error));
    }

    const ticket =
      child(doc, 'Envelope', 'Header', 'WSAPISession', 'Ticket') ??
      child(doc, 'Envelope', 'Body', 'LoginResponse', 'LoginResult', 'Ticket');

    if (typeof ticket !== 'string' || ticket === '') {
      throw new AuthenticationFailedError(SERVICE, new Error('ticket not found in login response'));
    }

    logger.info('AMS360 login successful');
    return ticket;
  }

  async lookupPolicyByNumber(policyNumber: string): Promise<PolicyLookup | null> {
    const result = await this.call('PolicyGetListByPolicyNumber', { PolicyNumber: policyNumber });
    const [match] = summaries(child(result, 'PolicyInfoList'));

    if (!match) {
      logger.warn('AMS360 policy number not found', { policyNumber });
      return null;
    }

    const policy = await this.getPolicy(match.policyId);
    const customerPolicies = await this.getCustomerPolicies(match.customerId);
    const customer = await this.getCustomerDetails(match.customerId);

    logger.info('AMS360 policy lookup completed', { policyNumber, policyId: match.policyId });
    return { policy: policy ?? { policyId: match.policyId, policyNumber }, customerPolicies, customer };
  }

  async getPolicy(policyId: string): Promise<PolicyDetails | null> {
    const result = await this.call('PolicyGet', { PolicyId: policyId });
    const policy = child(result, 'Policy');
    if (!isRecord(policy)) return null;

    return {
      policyId: text(policy, 'PolicyId') ?? policyId,
      policyNumber: text(policy, 'PolicyNumber'),
      typeOfBusiness: text(policy, 'PolicyTypeOfBusiness'),
      effectiveDate: text(policy, 'PolicyEffectiveDate'),
      expirationDate: text(policy, 'PolicyExpirationDate'),
      fullTermPremium: text(policy, 'FullTermPremium'),
      status: text(policy, 'PolicyStatus'),
    };
  }

  async getCustomerPolicies(customerId: string): Promise<PolicySummary[]> {
    const result = await this.call('PolicyGetListByCustomerId', { CustomerId: customerId });
    const policies = summaries(child(result, 'PolicyInfoList'));
    logger.info('AMS360 customer policies retrieved', { customerId, count: policies.length });
    return policies;
  }

  async getCustomerDetails(customerId: string): Promise<CustomerDetails | null> {
    const result = await this.call('CustomerGetById', { CustomerId: customerId });
    const customer = scalars(child(result, 'Customer'));
    return Object.keys(customer).length > 0 ? customer : null;
  }

  /** Runs an authenticated operation and returns its `<Op>Result` element. */
  private async call(operation: string, fields: Record<string, string>, retried = false): Promise<unknown> {
    const ticket = await this.tickets.getValidTicket();

    try {
      const doc = await this.post(operation, soapEnvelope(operation, fields, ticket));
      return child(doc, 'Envelope', 'Body', `${operation}Response`, `${operation}Result`);
    } catch (error) {
      if (!retried && error instanceof ExternalCallFailedError && AUTH_FAULT.test(error.originalError.message)) {
        logger.warn('AMS360 rejected ticket, logging in again', { operation });
        this.tickets.invalidate();
        return this.call(operation, fields, true);
      }
      throw error;
    }
  }

  private async post(operation: string, envelope: string): Promise<unknown> {
    let res: Response;
    try {
      res = await fetch(this.config.baseUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'text/xml; charset=utf-8',
          SOAPAction: `"${NAMESPACE}/WSAPIServiceContract/${operation}"`,
        },
        body: envelope,
        signal: AbortSignal.timeout(this.config.timeoutMs ?? DEFAULT_TIMEOUT_MS),
      });
    } catch (error) {
      throw new ExternalCallFailedError(SERVICE, operation, toError(error));
    }

    const raw = await res.text();
    let doc: unknown;
    try {
      doc = parser.parse(raw);
    } catch (error) {
      throw new ExternalCallFailedError(SERVICE, operation, toError(error), res.status);
    }

    const fault = child(doc, 'Envelope', 'Body', 'Fault');
    if (fault !== undefined) {
      const reason = text(fault, 'faultstring') ?? 'SOAP fault';
      throw new ExternalCallFailedError(SERVICE, operation, new Error(reason), res.status);
    }

    if (!res.ok) {
      throw new ExternalCallFailedError(SERVICE, operation, new Error(`returned ${res.status}`), res.status);
    }

    return doc;
  }
}
