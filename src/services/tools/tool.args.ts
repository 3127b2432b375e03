import { z } from 'zod';

// Models occasionally quote numbers and booleans; accept the obvious spellings.
const numeric = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value)) ? Number(value) : value),
  z.number()
);

const flag = z.preprocess((value) => {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return value;
}, z.boolean());

const text = (description: string) => z.string().describe(description);
const optionalText = (description: string) => z.string().optional().describe(description);

const addressArgs = {
  street_address: text('Street address'),
  city: text('City'),
  state: text('State'),
  country: z.string().default('USA').describe('Country (defaults to USA)'),
  zip_code: text('ZIP or postal code'),
};

const priorPolicyArgs = {
  current_provider: optionalText('Current insurance provider (optional)'),
  renewal_date: optionalText('Current policy renewal date (YYYY-MM-DD format, optional)'),
  renewal_premium: numeric.optional().describe('Current renewal premium amount (optional)'),
};

export const setUserActionArgs = z.object({
  action_type: text("Either 'add' for new insurance or 'update' for an existing policy"),
  insurance_type: text("Type of insurance: 'home', 'auto', 'flood', 'life', or 'commercial'"),
});

export const homeInsuranceArgs = z.object({
  full_name: text('Full name of primary insured'),
  date_of_birth: text('Date of birth (YYYY-MM-DD format)'),
  phone: text('Phone number'),
  email: text('Email address'),
  ...addressArgs,
  spouse_name: optionalText('Spouse name (optional)'),
  spouse_dob: optionalText('Spouse date of birth (YYYY-MM-DD format, optional)'),
  has_solar_panels: flag.optional().describe('Whether property has solar panels'),
  has_pool: flag.optional().describe('Whether property has a pool'),
  roof_age: numeric.optional().describe('Age of roof in years'),
  has_pets: flag.optional().describe('Whether household has pets'),
  ...priorPolicyArgs,
});

export const autoInsuranceArgs = z.object({
  driver_name: text('Full name of driver'),
  driver_dob: text('Driver date of birth (YYYY-MM-DD format)'),
  license_number: text("Driver's license number"),
  qualification: optionalText('Driver educational qualification'),
  profession: optionalText('Driver profession'),
  gpa: numeric.optional().describe('GPA if driver is under 21 (0.0 to 4.0, optional)'),
  vin: text('Vehicle identification number (17 characters)'),
  vehicle_make: text('Vehicle make'),
  vehicle_model: text('Vehicle model'),
  coverage_type: optionalText("Coverage type: 'liability' or 'full' (defaults to full)"),
  phone: text('Phone number'),
  email: text('Email address'),
  ...priorPolicyArgs,
});

export const floodInsuranceArgs = z.object({
  full_name: text('Full name of insured'),
  email: text('Email address'),
  ...addressArgs,
  phone: optionalText('Phone number (optional)'),
});

export const lifeInsuranceArgs = z.object({
  full_name: text('Full name of insured'),
  date_of_birth: text('Date of birth (YYYY-MM-DD format)'),
  phone: text('Phone number'),
  email: optionalText('Email address'),
  ...addressArgs,
  appointment_requested: flag.describe('Whether the customer wants an appointment'),
  appointment_date: optionalText('Requested appointment date and time (YYYY-MM-DD HH:MM format, optional)'),
  policy_type: optionalText("Policy type: 'term', 'whole', 'universal', 'annuity', or 'long_term_care' (optional)"),
});

export const commercialInsuranceArgs = z.object({
  business_name: text('Legal name of the business'),
  business_type: optionalText('Type of business'),
  phone: text('Phone number'),
  email: optionalText('Email address'),
  ...addressArgs,
  inventory_limit: numeric.optional().describe('Inventory coverage limit (optional)'),
  building_coverage: flag.optional().describe('Whether building coverage is needed'),
  building_coverage_limit: numeric.optional().describe('Building coverage limit (required when building coverage is needed)'),
  ...priorPolicyArgs,
});

export const noArgs = z.object({});

export const policyNumberArgs = z.object({
  policy_number: text('The policy number to look up'),
});

export const customerIdArgs = z.object({
  customer_id: text('Legacy policy system customer ID'),
});

export const createLeadArgs = z.object({
  first_name: text('First name'),
  last_name: text('Last name'),
  email: text('Email address'),
  phone: text('Phone number'),
  insurance_type: text('Type of insurance the lead is interested in'),
  notes: optionalText('Free-form notes'),
  address: optionalText('Mailing address'),
  date_of_birth: optionalText('Date of birth'),
  current_provider: optionalText('Current insurance provider'),
  vehicle_info: optionalText('Vehicle description'),
  property_info: optionalText('Property description'),
  business_name: optionalText('Business name'),
  appointment_requested: flag.optional().describe('Whether an appointment was requested'),
});

export const phoneSearchArgs = z.object({
  phone: text('Phone number to search for'),
});

export const emailSearchArgs = z.object({
  email: text('Email address to search for'),
});

export type SetUserActionArgs = z.infer<typeof setUserActionArgs>;
export type HomeInsuranceArgs = z.infer<typeof homeInsuranceArgs>;
export type AutoInsuranceArgs = z.infer<typeof autoInsuranceArgs>;
export type FloodInsuranceArgs = z.infer<typeof floodInsuranceArgs>;
export type LifeInsuranceArgs = z.infer<typeof lifeInsuranceArgs>;
export type CommercialInsuranceArgs = z.infer<typeof commercialInsuranceArgs>;
export type CreateLeadArgs = z.infer<typeof createLeadArgs>;
