export interface CustomField {
  fieldName: string;
  fieldValue: string[];
}

/** Lead payload in the shape of AgencyZoom's `/api/leads/create` endpoint. */
export interface LeadPayload {
  firstname: string;
  lastname: string;
  email: string;
  phone: string;
  pipelineId?: number;
  stageId?: number;
  leadSourceId?: number;
  assignTo?: number;
  notes?: string;
  streetAddress?: string;
  city?: string;
  state?: string;
  country?: string;
  zip?: string;
  customFields?: CustomField[];
}

export interface Contact {
  id: string;
  firstName?: string;
  lastName?: string;
  email?: string;
  phone?: string;
}

export type ContactQuery = { phone: string } | { email: string };

export interface CRMConfig {
  apiKey?: string;
  baseUrl: string;
  pipelineId: number;
  stageId: number;
  leadSourceId: number;
  assignTo: number;
}

export interface CRMAdapter {
  createLead(payload: LeadPayload): Promise<string>;
  searchContacts(query: ContactQuery): Promise<Contact[]>;
}
