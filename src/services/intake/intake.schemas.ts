import { z } from 'zod';
import { DateTime } from 'luxon';
import { COVERAGE_TYPES, LIFE_POLICY_TYPES, PLACEHOLDER_EMAIL } from '../../types/intake';

const trimmed = z.string().trim().min(1, 'is required');

const isoDate = z
  .string()
  .trim()
  .refine((value) => DateTime.fromFormat(value, 'yyyy-MM-dd').isValid, {
    message: 'must be a date in YYYY-MM-DD format',
  });

const amount = z.number().nonnegative('must not be negative');

export const addressSchema = z.object({
  streetAddress: trimmed,
  city: trimmed,
  state: trimmed,
  country: trimmed,
  zipCode: trimmed,
});

export const contactSchema = z.object({
  phone: z.string().trim(),
  email: z.string().trim().email('must be a valid email address'),
});

export const policyInfoSchema = z.object({
  currentProvider: z.string().trim().min(1).optional(),
  renewalDate: isoDate.optional(),
  renewalPremium: amount.optional(),
});

/**
 * Builds the insured record schemas. Dates of birth are checked against `now`, so
 * callers with an injected clock validate against the same instant they timestamp with.
 */
export function createRecordSchemas(now: () => DateTime = () => DateTime.now()) {
  const pastDate = isoDate.refine((value) => DateTime.fromFormat(value, 'yyyy-MM-dd') < now(), {
    message: 'must be in the past',
  });

  const personSchema = z.object({
    fullName: trimmed,
    dateOfBirth: pastDate,
  });

  const home = z.object({
    primaryInsured: personSchema,
    spouse: personSchema.optional(),
    property: z.object({
      address: addressSchema,
      hasSolarPanels: z.boolean().default(false),
      hasPool: z.boolean().default(false),
      roofAge: z.number().int('must be a whole number of years').nonnegative().default(0),
    }),
    hasPets: z.boolean().default(false),
    currentPolicy: policyInfoSchema,
    contact: contactSchema.extend({ phone: trimmed }),
  });

  const driver = personSchema.extend({
    licenseNumber: trimmed,
    qualification: z.string().trim().default('Unknown'),
    profession: z.string().trim().default('Unknown'),
    gpa: z.number().min(0, 'must be between 0.0 and 4.0').max(4, 'must be between 0.0 and 4.0').optional(),
  });

  const vehicle = z.object({
    vin: z
      .string()
      .length(17, 'must be exactly 17 characters')
      .transform((value) => value.toUpperCase()),
    make: trimmed,
    model: trimmed,
    coverageType: z.enum(COVERAGE_TYPES).default('full'),
  });

  const auto = z.object({
    drivers: z.array(driver).min(1),
    vehicles: z.array(vehicle).min(1),
    currentPolicy: policyInfoSchema,
    contact: contactSchema.extend({ phone: trimmed }),
  });

  const flood = z.object({
    homeAddress: addressSchema,
    fullName: trimmed,
    phone: z.string().trim().default(''),
    email: z.string().trim().email('must be a valid email address'),
  });

  const life = z.object({
    insured: personSchema,
    address: addressSchema,
    appointmentRequested: z.boolean(),
    appointmentDate: z
      .string()
      .datetime({ offset: true, message: 'must be a date and time such as 2025-12-01 10:00' })
      .optional(),
    contact: contactSchema.extend({
      phone: trimmed,
      email: contactSchema.shape.email.default(PLACEHOLDER_EMAIL),
    }),
    policyType: z.enum(LIFE_POLICY_TYPES).optional(),
  });

  const commercial = z.object({
    business: z.object({
      name: trimmed,
      type: z.string().trim().min(1).default('General'),
      address: addressSchema,
    }),
    coverage: z
      .object({
        inventoryLimit: amount.optional(),
        buildingCoverage: z.boolean().default(false),
        buildingCoverageLimit: amount.optional(),
      })
      .refine((coverage) => !coverage.buildingCoverage || coverage.buildingCoverageLimit !== undefined, {
        message: 'is required when building coverage is requested',
        path: ['buildingCoverageLimit'],
      }),
    currentPolicy: policyInfoSchema,
    contact: contactSchema.extend({
      phone: trimmed,
      email: contactSchema.shape.email.default(PLACEHOLDER_EMAIL),
    }),
  });

  return { home, auto, flood, life, commercial };
}

export type RecordSchemas = ReturnType<typeof createRecordSchemas>;

export const {
  home: homeRecordSchema,
  auto: autoRecordSchema,
  flood: floodRecordSchema,
  life: lifeRecordSchema,
  commercial: commercialRecordSchema,
} = createRecordSchemas();

export type Address = z.infer<typeof addressSchema>;
export type PolicyInfo = z.infer<typeof policyInfoSchema>;
export type HomeRecord = z.infer<typeof homeRecordSchema>;
export type AutoRecord = z.infer<typeof autoRecordSchema>;
export type FloodRecord = z.infer<typeof floodRecordSchema>;
export type LifeRecord = z.infer<typeof lifeRecordSchema>;
export type CommercialRecord = z.infer<typeof commercialRecordSchema>;

export type InsuredRecord =
  | { insuranceType: 'home'; data: HomeRecord }
  | { insuranceType: 'auto'; data: AutoRecord }
  | { insuranceType: 'flood'; data: FloodRecord }
  | { insuranceType: 'life'; data: LifeRecord }
  | { insuranceType: 'commercial'; data: CommercialRecord };

/** Flattens zod issues into "field.path message" strings the model can repeat back. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path} ${issue.message}` : issue.message;
  });
}
