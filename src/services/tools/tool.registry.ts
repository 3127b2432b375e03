import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import {
  CreateLeadArgs,
  autoInsuranceArgs,
  commercialInsuranceArgs,
  createLeadArgs,
  customerIdArgs,
  emailSearchArgs,
  floodInsuranceArgs,
  homeInsuranceArgs,
  lifeInsuranceArgs,
  noArgs,
  phoneSearchArgs,
  policyNumberArgs,
  setUserActionArgs,
} from './tool.args';
import type { ThreadServices } from '../thread.store';
import { PolicyDetails } from '../../types/ams360';
import { ToolSchema } from '../../types/conversation';
import { CustomField, LeadPayload } from '../../types/crm';
import { ToolOutcome, failure, success } from '../../types/tools';
import { ValidationError } from '../../utils/errors';

export const TOOL_NAMES = [
  'set_user_action',
  'collect_home_insurance_data',
  'collect_auto_insurance_data',
  'collect_flood_insurance_data',
  'collect_life_insurance_data',
  'collect_commercial_insurance_data',
  'submit_quote_request',
  'get_policy_by_number',
  'get_customer_policies',
  'get_customer_details',
  'create_agencyzoom_lead',
  'search_agencyzoom_contact_by_phone',
  'search_agencyzoom_contact_by_email',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export interface ToolDefinition {
  name: ToolName;
  schema: ToolSchema;
  /** Validates raw arguments against the tool's zod schema, then runs the handler. */
  invoke(input: unknown, services: ThreadServices): Promise<ToolOutcome>;
}

const jsonObjectSchema = z.object({
  properties: z.record(z.unknown()).default({}),
  required: z.array(z.string()).optional(),
});

// Typed as ZodSchema, the exact parameter type of zodToJsonSchema.
export function toParameters(args: z.ZodSchema): ToolSchema['parameters'] {
  const { properties, required } = jsonObjectSchema.parse(zodToJsonSchema(args, { $refStrategy: 'none' }));
  return required && required.length > 0 ? { type: 'object', properties, required } : { type: 'object', properties };
}

function defineTool<S extends z.ZodSchema>(
  name: ToolName,
  description: string,
  args: S,
  run: (args: z.infer<S>, services: ThreadServices) => Promise<ToolOutcome>
): ToolDefinition {
  return {
    name,
    schema: { name, description, parameters: toParameters(args) },
    async invoke(input, services) {
      const parsed = args.safeParse(input);
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) =>
          issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
        );
        return failure(
          new ValidationError(`Invalid arguments for ${name}`, issues),
          `Invalid arguments for ${name}: ${issues.join('; ')}`
        );
      }
      return run(parsed.data, services);
    },
  };
}

function customField(fieldName: string, value: string | boolean | undefined): CustomField[] {
  return value === undefined || value === '' ? [] : [{ fieldName, fieldValue: [String(value)] }];
}

export function leadPayloadFromArgs(args: CreateLeadArgs): LeadPayload {
  return {
    firstname: args.first_name,
    lastname: args.last_name,
    email: args.email,
    phone: args.phone,
    notes: args.notes,
    streetAddress: args.address,
    customFields: [
      ...customField('insurance_type', args.insurance_type),
      ...customField('date_of_birth', args.date_of_birth),
      ...customField('current_provider', args.current_provider),
      ...customField('vehicle_info', args.vehicle_info),
      ...customField('property_info', args.property_info),
      ...customField('business_name', args.business_name),
      ...customField('appointment_requested', args.appointment_requested),
    ],
  };
}

/** AMS360 returns dateTime values; the date part is what the customer needs. */
function datePart(value: string | undefined): string {
  return value ? value.split('T')[0] : 'unknown';
}

function describePolicy(
  policyNumber: string,
  policy: Pick<PolicyDetails, 'typeOfBusiness' | 'status' | 'effectiveDate' | 'expirationDate' | 'fullTermPremium'>
): string {
  const parts = [
    `Type: ${policy.typeOfBusiness ?? 'unknown'}`,
    `Status: ${policy.status ?? 'unknown'}`,
    `Effective Date: ${datePart(policy.effectiveDate)}`,
    `Expiration Date: ${datePart(policy.expirationDate)}`,
  ];
  if (policy.fullTermPremium) parts.push(`Full Term Premium: $${policy.fullTermPremium}`);
  return `Found policy ${policyNumber}. ${parts.join(', ')}.`;
}

const definitions: ToolDefinition[] = [
  defineTool(
    'set_user_action',
    'Set the user action type (add/update) and insurance type. Call this before collecting any details.',
    setUserActionArgs,
    async (args, { intake }) => intake.setUserAction(args.action_type, args.insurance_type)
  ),
  defineTool(
    'collect_home_insurance_data',
    'Collect home insurance information from the user.',
    homeInsuranceArgs,
    (args, { intake }) => intake.collectHomeData(args)
  ),
  defineTool(
    'collect_auto_insurance_data',
    'Collect auto insurance information for one driver and one vehicle.',
    autoInsuranceArgs,
    (args, { intake }) => intake.collectAutoData(args)
  ),
  defineTool(
    'collect_flood_insurance_data',
    'Collect flood insurance information from the user.',
    floodInsuranceArgs,
    (args, { intake }) => intake.collectFloodData(args)
  ),
  defineTool(
    'collect_life_insurance_data',
    'Collect life insurance information, including an optional appointment request.',
    lifeInsuranceArgs,
    (args, { intake }) => intake.collectLifeData(args)
  ),
  defineTool(
    'collect_commercial_insurance_data',
    'Collect commercial insurance information for a business.',
    commercialInsuranceArgs,
    (args, { intake }) => intake.collectCommercialData(args)
  ),
  defineTool(
    'submit_quote_request',
    'Submit the collected insurance quote request. Only call this after the data has been collected.',
    noArgs,
    (_args, { intake }) => intake.submitQuoteRequest()
  ),
  defineTool(
    'get_policy_by_number',
    'Look up an existing policy by policy number in the policy management system.',
    policyNumberArgs,
    async (args, { policies }) => {
      const lookup = await policies.lookupPolicyByNumber(args.policy_number);
      if (!lookup) {
        return success(`No policy found with policy number ${args.policy_number}.`);
      }
      const customerId = lookup.customerPolicies[0]?.customerId;
      return success(
        `${describePolicy(args.policy_number, lookup.policy)}` +
          (customerId ? ` Customer ID: ${customerId}.` : '') +
          ` The customer has ${lookup.customerPolicies.length} policy record(s) on file.`
      );
    }
  ),
  defineTool(
    'get_customer_policies',
    'List the policies on file for a customer id from the policy management system.',
    customerIdArgs,
    async (args, { policies }) => {
      const found = await policies.getCustomerPolicies(args.customer_id);
      if (found.length === 0) {
        return success(`No policies found for customer ${args.customer_id}.`);
      }
      const numbers = found.map((policy) => policy.policyNumber ?? policy.policyId).join(', ');
      return success(`Found ${found.length} policy(ies) for customer ${args.customer_id}: ${numbers}.`);
    }
  ),
  defineTool(
    'get_customer_details',
    'Get the customer record for a customer id from the policy management system.',
    customerIdArgs,
    async (args, { policies }) => {
      const customer = await policies.getCustomerDetails(args.customer_id);
      if (!customer) {
        return success(`No customer found with id ${args.customer_id}.`);
      }
      return success(`Customer ${args.customer_id} details: ${JSON.stringify(customer)}`);
    }
  ),
  defineTool(
    'create_agencyzoom_lead',
    'Create a new lead in AgencyZoom with detailed information.',
    createLeadArgs,
    async (args, { crm }) => {
      const leadId = await crm.createLead(leadPayloadFromArgs(args));
      return success(`Successfully created lead ${leadId} in AgencyZoom for ${args.first_name} ${args.last_name}.`);
    }
  ),
  defineTool(
    'search_agencyzoom_contact_by_phone',
    'Search for a contact in AgencyZoom by phone number.',
    phoneSearchArgs,
    async (args, { crm }) => {
      const contacts = await crm.searchContacts({ phone: args.phone });
      return success(
        contacts.length > 0
          ? `Found ${contacts.length} contact(s) in AgencyZoom with phone number ${args.phone}.`
          : `No contact found in AgencyZoom with phone number ${args.phone}.`
      );
    }
  ),
  defineTool(
    'search_agencyzoom_contact_by_email',
    'Search for a contact in AgencyZoom by email address.',
    emailSearchArgs,
    async (args, { crm }) => {
      const contacts = await crm.searchContacts({ email: args.email });
      return success(
        contacts.length > 0
          ? `Found ${contacts.length} contact(s) in AgencyZoom with email ${args.email}.`
          : `No contact found in AgencyZoom with email ${args.email}.`
      );
    }
  ),
];

/**
 * The closed tool catalog. Built once at module load; the JSON schemas handed to the
 * model are derived from the same zod schemas that validate the arguments.
 */
export class ToolRegistry {
  private readonly byName = new Map<string, ToolDefinition>();

  constructor(tools: ToolDefinition[] = definitions) {
    for (const tool of tools) {
      this.byName.set(tool.name, tool);
    }
  }

  get(name: string): ToolDefinition | undefined {
    return this.byName.get(name);
  }

  schemas(): ToolSchema[] {
    return [...this.byName.values()].map((tool) => tool.schema);
  }
}

export const toolRegistry = new ToolRegistry();
