import { Ams360Client, soapEnvelope } from '../../src/services/ams360/ams360.client';
import { AuthenticationFailedError, ExternalCallFailedError } from '../../src/utils/errors';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

// Mock global fetch
const mockFetch = jest.fn();
global.fetch = mockFetch;

const ENVELOPE_OPEN = '<s:Envelope xmlns:s="http://schemas.xmlsoap.org/soap/envelope/">';

function xmlResponse(body: string, status = 200) {
  return { ok: status >= 200 && status < 300, status, text: async () => body };
}

function loginResponse(ticket: string) {
  return xmlResponse(
    `${ENVELOPE_OPEN}<s:Header><WSAPISession xmlns="http://www.WSAPI.AMS360.com/v3.0"><Ticket>${ticket}</Ticket></WSAPISession></s:Header>` +
      '<s:Body><LoginResponse xmlns="http://www.WSAPI.AMS360.com/v3.0"/></s:Body></s:Envelope>'
  );
}

function result(operation: string, inner: string) {
  return xmlResponse(
    `${ENVELOPE_OPEN}<s:Body><${operation}Response xmlns="http://www.WSAPI.AMS360.com/v3.0">` +
      `<${operation}Result xmlns:a="http://www.WSAPI.AMS360.com/v3.0/DataContract">${inner}</${operation}Result>` +
      `</${operation}Response></s:Body></s:Envelope>`
  );
}

function fault(message: string) {
  return xmlResponse(
    `${ENVELOPE_OPEN}<s:Body><s:Fault><faultcode>s:Client</faultcode><faultstring>${message}</faultstring></s:Fault></s:Body></s:Envelope>`,
    500
  );
}

function soapAction(callIndex: number): string {
  const [, init] = mockFetch.mock.calls[callIndex];
  return init.headers.SOAPAction;
}

function requestBody(callIndex: number): string {
  const [, init] = mockFetch.mock.calls[callIndex];
  return init.body;
}

const config = {
  baseUrl: 'https://ams.example.test/WSAPIService.svc',
  agencyNo: '1001',
  loginId: 'agent',
  password: 'test-secret',
  ticketTtlMs: 900_000,
};

describe('soapEnvelope', () => {
  it('should put the ticket in the session header and escape values', () => {
    const xml = soapEnvelope('PolicyGet', { PolicyId: 'A&B<1>' }, 'tk-1');

    expect(xml).toContain('<WSAPISession xmlns="http://www.WSAPI.AMS360.com/v3.0"><Ticket>tk-1</Ticket></WSAPISession>');
    expect(xml).toContain('<a:PolicyId>A&amp;B&lt;1&gt;</a:PolicyId>');
  });

  it('should write empty values as self-closing elements and omit the header without a ticket', () => {
    const xml = soapEnvelope('Login', { AgencyNo: '1001', EmployeeCode: '' });

    expect(xml).not.toContain('<s:Header>');
    expect(xml).toContain('<a:EmployeeCode/>');
  });
});

describe('Ams360Client', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should log in with the configured credentials', async () => {
    mockFetch.mockResolvedValueOnce(loginResponse('tk-1'));
    const client = new Ams360Client(config);

    await expect(client.login()).resolves.toBe('tk-1');
    expect(soapAction(0)).toBe('"http://www.WSAPI.AMS360.com/v3.0/WSAPIServiceContract/Login"');
    expect(requestBody(0)).toContain('<a:Password>test-secret</a:Password>');
  });

  it('should fail authentication when credentials are missing', async () => {
    const client = new Ams360Client({ ...config, password: undefined });

    await expect(client.login()).rejects.toBeInstanceOf(AuthenticationFailedError);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should fail authentication when the response has no ticket', async () => {
    mockFetch.mockResolvedValueOnce(xmlResponse(`${ENVELOPE_OPEN}<s:Body/></s:Envelope>`));
    const client = new Ams360Client(config);

    await expect(client.login()).rejects.toThrow('ticket not found in login response');
  });

  it('should list customer policies with the cached ticket', async () => {
    mockFetch
      .mockResolvedValueOnce(loginResponse('tk-1'))
      .mockResolvedValueOnce(
        result(
          'PolicyGetListByCustomerId',
          '<a:PolicyInfoList><a:PolicyInfo><a:CustomerId>C-9</a:CustomerId><a:PolicyId>P-1</a:PolicyId><a:PolicyNumber>HO-100</a:PolicyNumber></a:PolicyInfo>' +
            '<a:PolicyInfo><a:CustomerId>C-9</a:CustomerId><a:PolicyId>P-2</a:PolicyId></a:PolicyInfo></a:PolicyInfoList>'
        )
      )
      .mockResolvedValueOnce(result('PolicyGetListByCustomerId', '<a:PolicyInfoList/>'));
    const client = new Ams360Client(config);

    await expect(client.getCustomerPolicies('C-9')).resolves.toEqual([
      { policyId: 'P-1', customerId: 'C-9', policyNumber: 'HO-100' },
      { policyId: 'P-2', customerId: 'C-9', policyNumber: undefined },
    ]);
    await expect(client.getCustomerPolicies('C-10')).resolves.toEqual([]);

    expect(mockFetch).toHaveBeenCalledTimes(3);
    expect(requestBody(1)).toContain('<Ticket>tk-1</Ticket>');
    expect(requestBody(2)).toContain('<Ticket>tk-1</Ticket>');
  });

  it('should look up a policy number and fetch its details', async () => {
    mockFetch
      .mockResolvedValueOnce(loginResponse('tk-1'))
      .mockResolvedValueOnce(
        result(
          'PolicyGetListByPolicyNumber',
          '<a:PolicyInfoList><a:PolicyInfo><a:CustomerId>C-9</a:CustomerId><a:PolicyId>P-1</a:PolicyId></a:PolicyInfo></a:PolicyInfoList>'
        )
      )
      .mockResolvedValueOnce(
        result(
          'PolicyGet',
          '<a:Policy><a:PolicyId>P-1</a:PolicyId><a:PolicyNumber>HO-100</a:PolicyNumber><a:PolicyTypeOfBusiness>Homeowners</a:PolicyTypeOfBusiness>' +
            '<a:PolicyEffectiveDate>2030-01-01</a:PolicyEffectiveDate><a:PolicyExpirationDate>2031-01-01</a:PolicyExpirationDate>' +
            '<a:FullTermPremium>1200.00</a:FullTermPremium><a:PolicyStatus>Active</a:PolicyStatus></a:Policy>'
        )
      )
      .mockResolvedValueOnce(
        result(
          'PolicyGetListByCustomerId',
          '<a:PolicyInfoList><a:PolicyInfo><a:CustomerId>C-9</a:CustomerId><a:PolicyId>P-1</a:PolicyId></a:PolicyInfo></a:PolicyInfoList>'
        )
      )
      .mockResolvedValueOnce(
        result('CustomerGetById', '<a:Customer><a:CustomerId>C-9</a:CustomerId><a:FirstName>Jane</a:FirstName><a:Email/></a:Customer>')
      );
    const client = new Ams360Client(config);

    const lookup = await client.lookupPolicyByNumber('HO-100');

    expect(lookup).toEqual({
      policy: {
        policyId: 'P-1',
        policyNumber: 'HO-100',
        typeOfBusiness: 'Homeowners',
        effectiveDate: '2030-01-01',
        expirationDate: '2031-01-01',
        fullTermPremium: '1200.00',
        status: 'Active',
      },
      customerPolicies: [{ policyId: 'P-1', customerId: 'C-9', policyNumber: undefined }],
      customer: { CustomerId: 'C-9', FirstName: 'Jane' },
    });
    expect(soapAction(2)).toBe('"http://www.WSAPI.AMS360.com/v3.0/WSAPIServiceContract/PolicyGet"');
  });

  it('should return null for an unknown policy number', async () => {
    mockFetch
      .mockResolvedValueOnce(loginResponse('tk-1'))
      .mockResolvedValueOnce(result('PolicyGetListByPolicyNumber', '<a:PolicyInfoList/>'));
    const client = new Ams360Client(config);

    await expect(client.lookupPolicyByNumber('NOPE')).resolves.toBeNull();
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should log in again and retry once after an invalid ticket fault', async () => {
    mockFetch
      .mockResolvedValueOnce(loginResponse('tk-old'))
      .mockResolvedValueOnce(fault('Invalid or expired ticket'))
      .mockResolvedValueOnce(loginResponse('tk-new'))
      .mockResolvedValueOnce(result('CustomerGetById', '<a:Customer><a:CustomerId>C-9</a:CustomerId></a:Customer>'));
    const client = new Ams360Client(config);

    await expect(client.getCustomerDetails('C-9')).resolves.toEqual({ CustomerId: 'C-9' });
    expect(requestBody(3)).toContain('<Ticket>tk-new</Ticket>');
  });

  it('should not retry more than once on repeated ticket faults', async () => {
    mockFetch
      .mockResolvedValueOnce(loginResponse('tk-1'))
      .mockResolvedValueOnce(fault('Invalid ticket'))
      .mockResolvedValueOnce(loginResponse('tk-2'))
      .mockResolvedValueOnce(fault('Invalid ticket'));
    const client = new Ams360Client(config);

    await expect(client.getCustomerDetails('C-9')).rejects.toBeInstanceOf(ExternalCallFailedError);
    expect(mockFetch).toHaveBeenCalledTimes(4);
  });

  it('should surface other faults without logging in again', async () => {
    mockFetch.mockResolvedValueOnce(loginResponse('tk-1')).mockResolvedValueOnce(fault('Customer does not exist'));
    const client = new Ams360Client(config);

    await expect(client.getCustomerDetails('C-404')).rejects.toThrow('AMS360.CustomerGetById failed: Customer does not exist');
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it('should report non-2xx responses with their status', async () => {
    mockFetch.mockResolvedValueOnce(loginResponse('tk-1')).mockResolvedValueOnce(xmlResponse('', 503));
    const client = new Ams360Client(config);

    const error = await client.getCustomerPolicies('C-9').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExternalCallFailedError);
    if (error instanceof ExternalCallFailedError) {
      expect(error.status).toBe(503);
    }
  });
});
