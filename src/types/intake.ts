export const ACTION_TYPES = ['add', 'update'] as const;
export type ActionType = (typeof ACTION_TYPES)[number];

export const INSURANCE_TYPES = ['home', 'auto', 'flood', 'life', 'commercial'] as const;
export type InsuranceType = (typeof INSURANCE_TYPES)[number];

export const COVERAGE_TYPES = ['liability', 'full'] as const;
export type CoverageType = (typeof COVERAGE_TYPES)[number];

export const LIFE_POLICY_TYPES = ['term', 'whole', 'universal', 'annuity', 'long_term_care'] as const;
export type LifePolicyType = (typeof LIFE_POLICY_TYPES)[number];

export const PLACEHOLDER_EMAIL = 'noemail@pending.com';

export type IntakeState = 'Uninitialized' | 'Collecting' | 'Collected' | 'Submitted';

export function isActionType(value: unknown): value is ActionType {
  return typeof value === 'string' && ACTION_TYPES.some((type) => type === value);
}

export function isInsuranceType(value: unknown): value is InsuranceType {
  return typeof value === 'string' && INSURANCE_TYPES.some((type) => type === value);
}
