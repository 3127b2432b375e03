export interface Ams360Config {
  baseUrl: string;
  agencyNo?: string;
  loginId?: string;
  password?: string;
  ticketTtlMs: number;
  timeoutMs?: number;
}

export interface PolicySummary {
  policyId: string;
  customerId: string;
  policyNumber?: string;
}

export interface PolicyDetails {
  policyId: string;
  policyNumber?: string;
  typeOfBusiness?: string;
  effectiveDate?: string;
  expirationDate?: string;
  fullTermPremium?: string;
  status?: string;
}

/** Scalar fields of the customer record, keyed by their element names. */
export type CustomerDetails = Record<string, string>;

export interface PolicyLookup {
  policy: PolicyDetails;
  customerPolicies: PolicySummary[];
  customer: CustomerDetails | null;
}

/** The slice of the legacy policy system that the agent's tools reach. */
export interface PolicyBackend {
  lookupPolicyByNumber(policyNumber: string): Promise<PolicyLookup | null>;
  getCustomerPolicies(customerId: string): Promise<PolicySummary[]>;
  getCustomerDetails(customerId: string): Promise<CustomerDetails | null>;
}
