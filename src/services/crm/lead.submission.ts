import { Address, InsuredRecord } from '../intake/intake.schemas';
import { CRMAdapter, CustomField, LeadPayload } from '../../types/crm';
import { PLACEHOLDER_EMAIL } from '../../types/intake';
import { logger } from '../../utils/logger';
import { ServiceError, errorMessage, toError } from '../../utils/errors';

export type SubmitResult = { ok: true; leadId: string } | { ok: false; error: Error };

export interface LeadSubmissionContext {
  record: InsuredRecord;
  sessionId: string;
  threadId?: string;
}

export function splitFullName(fullName: string): { firstname: string; lastname: string } {
  const trimmed = fullName.trim();
  const space = trimmed.indexOf(' ');
  if (space === -1) {
    return { firstname: trimmed || 'Unknown', lastname: '' };
  }
  return { firstname: trimmed.slice(0, space), lastname: trimmed.slice(space + 1).trim() };
}

function addressFields(address: Address): Pick<LeadPayload, 'streetAddress' | 'city' | 'state' | 'country' | 'zip'> {
  return {
    streetAddress: address.streetAddress,
    city: address.city,
    state: address.state,
    country: address.country,
    zip: address.zipCode,
  };
}

function field(fieldName: string, value: string | number | boolean | undefined): CustomField[] {
  return value === undefined || value === '' ? [] : [{ fieldName, fieldValue: [String(value)] }];
}

/**
 * Flattens an insured record into the CRM's lead schema. The first space of the insured's
 * full name splits first from last name; commercial leads use the business name.
 */
export function buildLeadPayload(context: LeadSubmissionContext): LeadPayload {
  const { record, sessionId } = context;
  const notes = `Quote submitted via AI agent. Session: ${sessionId}`;
  const base = (name: { firstname: string; lastname: string }, email: string, phone: string) => ({
    ...name,
    email: email || PLACEHOLDER_EMAIL,
    phone,
    notes,
  });

  switch (record.insuranceType) {
    case 'home': {
      const { data } = record;
      return {
        ...base(splitFullName(data.primaryInsured.fullName), data.contact.email, data.contact.phone),
        ...addressFields(data.property.address),
        customFields: [
          ...field('insurance_type', 'home'),
          ...field('date_of_birth', data.primaryInsured.dateOfBirth),
          ...field('current_provider', data.currentPolicy.currentProvider),
          ...field('roof_age', data.property.roofAge),
        ],
      };
    }
    case 'auto': {
      const { data } = record;
      const [driver] = data.drivers;
      const [vehicle] = data.vehicles;
      return {
        ...base(splitFullName(driver.fullName), data.contact.email, data.contact.phone),
        customFields: [
          ...field('insurance_type', 'auto'),
          ...field('vehicle_info', `${vehicle.make} ${vehicle.model}`),
          ...field('vin', vehicle.vin),
          ...field('coverage_type', vehicle.coverageType),
          ...field('current_provider', data.currentPolicy.currentProvider),
        ],
      };
    }
    case 'flood': {
      const { data } = record;
      return {
        ...base(splitFullName(data.fullName), data.email, data.phone),
        ...addressFields(data.homeAddress),
        customFields: field('insurance_type', 'flood'),
      };
    }
    case 'life': {
      const { data } = record;
      return {
        ...base(splitFullName(data.insured.fullName), data.contact.email, data.contact.phone),
        ...addressFields(data.address),
        customFields: [
          ...field('insurance_type', 'life'),
          ...field('appointment_requested', data.appointmentRequested),
          ...field('appointment_date', data.appointmentDate),
          ...field('policy_type', data.policyType),
        ],
      };
    }
    case 'commercial': {
      const { data } = record;
      return {
        ...base({ firstname: data.business.name, lastname: '' }, data.contact.email, data.contact.phone),
        ...addressFields(data.business.address),
        customFields: [
          ...field('insurance_type', 'commercial'),
          ...field('business_name', data.business.name),
          ...field('business_type', data.business.type),
          ...field('current_provider', data.currentPolicy.currentProvider),
        ],
      };
    }
  }
}

export class LeadSubmissionService {
  constructor(private readonly crm: CRMAdapter) {}

  async submit(context: LeadSubmissionContext): Promise<SubmitResult> {
    const payload = buildLeadPayload(context);

    try {
      const leadId = await this.crm.createLead(payload);
      logger.info('Intake record submitted to CRM', {
        sessionId: context.sessionId,
        insuranceType: context.record.insuranceType,
        leadId,
      });
      return { ok: true, leadId };
    } catch (error) {
      logger.error('CRM lead submission failed', {
        sessionId: context.sessionId,
        insuranceType: context.record.insuranceType,
        error: errorMessage(error),
        retryable: error instanceof ServiceError ? error.retryable : undefined,
      });
      return { ok: false, error: toError(error) };
    }
  }
}
