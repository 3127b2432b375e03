import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import { v4 as uuidv4 } from 'uuid';
import { ZodError } from 'zod';
import {
  InsuredRecord,
  RecordSchemas,
  createRecordSchemas,
  describeIssues,
} from './intake.schemas';
import { SubmissionStore } from './submission.store';
import { LeadSubmissionService, SubmitResult } from '../crm/lead.submission';
import {
  AutoInsuranceArgs,
  CommercialInsuranceArgs,
  FloodInsuranceArgs,
  HomeInsuranceArgs,
  LifeInsuranceArgs,
} from '../tools/tool.args';
import { ActionType, InsuranceType, IntakeState, isActionType, isInsuranceType } from '../../types/intake';
import { ToolOutcome, failure, success } from '../../types/tools';
import { ValidationError, WorkflowStateError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface IntakeServiceOptions {
  store: SubmissionStore;
  leads?: LeadSubmissionService;
  threadId?: string;
  clock?: () => DateTime;
}

export interface IntakeSnapshot {
  sessionId: string;
  state: IntakeState;
  actionType: ActionType | null;
  insuranceType: InsuranceType | null;
  record: InsuredRecord | null;
  submitted: boolean;
}

type CrmStatus =
  | { status: 'pending' }
  | { status: 'skipped' }
  | { status: 'submitted'; leadId: string }
  | { status: 'failed'; error: string };

const COLLECTED_MESSAGES: Record<InsuranceType, string> = {
  home: "Perfect! I've collected all your home insurance information. Your quote request is ready to be submitted.",
  auto: "Excellent! I've collected all your auto insurance information. Your quote request is ready to be submitted.",
  flood: "Perfect! I've collected all your flood insurance information. Your quote request is ready to be submitted.",
  life: "Great! I've collected all your life insurance information. Your quote request is ready to be submitted.",
  commercial:
    "Excellent! I've collected all your commercial insurance information. Your quote request is ready to be submitted.",
};

function blank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

function address(args: { street_address: string; city: string; state: string; country: string; zip_code: string }) {
  return {
    streetAddress: args.street_address,
    city: args.city,
    state: args.state,
    country: args.country,
    zipCode: args.zip_code,
  };
}

function priorPolicy(args: { current_provider?: string; renewal_date?: string; renewal_premium?: number }) {
  return {
    currentProvider: blank(args.current_provider),
    renewalDate: blank(args.renewal_date),
    renewalPremium: args.renewal_premium,
  };
}

/**
 * Normalises an appointment time to an ISO timestamp. Unparseable text is returned as-is
 * so the record schema reports it.
 */
export function normalizeAppointment(value: string | undefined, now: DateTime): string | undefined {
  const input = blank(value);
  if (!input) return undefined;

  const formatted = DateTime.fromFormat(input, 'yyyy-MM-dd HH:mm');
  if (formatted.isValid) return formatted.toISO() ?? input;

  const iso = DateTime.fromISO(input);
  if (iso.isValid) return iso.toISO() ?? input;

  const natural = chrono.parseDate(input, now.toJSDate(), { forwardDate: true });
  if (natural) return DateTime.fromJSDate(natural).toISO() ?? input;

  return input;
}

/**
 * Per-thread quote intake workflow.
 *
 * Uninitialized -> Collecting(type) -> Collected(type) -> Submitted
 *
 * Every transition answers with a ToolOutcome instead of throwing; the dialogue has to
 * continue after a bad input, while `error.kind` keeps the cause distinguishable.
 */
export class IntakeService {
  readonly sessionId: string = uuidv4();

  private actionType: ActionType | null = null;
  private insuranceType: InsuranceType | null = null;
  private record: InsuredRecord | null = null;
  private submitted = false;
  private submitting: Promise<ToolOutcome> | null = null;

  private readonly store: SubmissionStore;
  private readonly leads?: LeadSubmissionService;
  private readonly threadId?: string;
  private readonly clock: () => DateTime;
  private readonly schemas: RecordSchemas;

  constructor(options: IntakeServiceOptions) {
    this.store = options.store;
    this.leads = options.leads;
    this.threadId = options.threadId;
    this.clock = options.clock ?? (() => DateTime.now());
    this.schemas = createRecordSchemas(this.clock);
    logger.debug('Intake session created', { sessionId: this.sessionId, threadId: this.threadId });
  }

  get state(): IntakeState {
    if (!this.actionType || !this.insuranceType) return 'Uninitialized';
    if (this.submitted) return 'Submitted';
    if (this.record) return 'Collected';
    return 'Collecting';
  }

  snapshot(): IntakeSnapshot {
    return {
      sessionId: this.sessionId,
      state: this.state,
      actionType: this.actionType,
      insuranceType: this.insuranceType,
      record: this.record,
      submitted: this.submitted,
    };
  }

  setUserAction(actionType: string, insuranceType: string): ToolOutcome {
    if (!isActionType(actionType)) {
      return failure(
        new WorkflowStateError('InvalidActionType', `Invalid action type: ${actionType}`),
        "Invalid action type. Please specify 'add' or 'update'."
      );
    }
    if (!isInsuranceType(insuranceType)) {
      return failure(
        new WorkflowStateError('InvalidInsuranceType', `Invalid insurance type: ${insuranceType}`),
        'Invalid insurance type. Please choose from: home, auto, flood, life, or commercial.'
      );
    }

    if (this.record && (this.record.insuranceType !== insuranceType || this.submitted)) {
      logger.info('Discarding previously collected record', {
        sessionId: this.sessionId,
        previous: this.record.insuranceType,
        next: insuranceType,
      });
      this.record = null;
    }

    this.actionType = actionType;
    this.insuranceType = insuranceType;
    this.submitted = false;

    logger.info('User action set', { sessionId: this.sessionId, actionType, insuranceType });
    return success(
      `Great! I'll help you ${actionType} ${insuranceType} insurance. Let me collect the necessary information from you.`
    );
  }

  async collectHomeData(args: HomeInsuranceArgs): Promise<ToolOutcome> {
    const blocked = this.checkCollectable('home');
    if (blocked) return blocked;

    const spouseName = blank(args.spouse_name);
    const spouseDob = blank(args.spouse_dob);
    const parsed = this.schemas.home.safeParse({
      primaryInsured: { fullName: args.full_name, dateOfBirth: args.date_of_birth },
      spouse: spouseName && spouseDob ? { fullName: spouseName, dateOfBirth: spouseDob } : undefined,
      property: {
        address: address(args),
        hasSolarPanels: args.has_solar_panels,
        hasPool: args.has_pool,
        roofAge: args.roof_age,
      },
      hasPets: args.has_pets,
      currentPolicy: priorPolicy(args),
      contact: { phone: args.phone, email: args.email },
    });

    if (!parsed.success) return this.rejected('home', parsed.error);
    return this.accept({ insuranceType: 'home', data: parsed.data });
  }

  async collectAutoData(args: AutoInsuranceArgs): Promise<ToolOutcome> {
    const blocked = this.checkCollectable('auto');
    if (blocked) return blocked;

    const parsed = this.schemas.auto.safeParse({
      drivers: [
        {
          fullName: args.driver_name,
          dateOfBirth: args.driver_dob,
          licenseNumber: args.license_number,
          qualification: blank(args.qualification),
          profession: blank(args.profession),
          gpa: args.gpa,
        },
      ],
      vehicles: [
        {
          vin: args.vin,
          make: args.vehicle_make,
          model: args.vehicle_model,
          coverageType: blank(args.coverage_type),
        },
      ],
      currentPolicy: priorPolicy(args),
      contact: { phone: args.phone, email: args.email },
    });

    if (!parsed.success) return this.rejected('auto', parsed.error);
    return this.accept({ insuranceType: 'auto', data: parsed.data });
  }

  async collectFloodData(args: FloodInsuranceArgs): Promise<ToolOutcome> {
    const blocked = this.checkCollectable('flood');
    if (blocked) return blocked;

    const parsed = this.schemas.flood.safeParse({
      homeAddress: address(args),
      fullName: args.full_name,
      phone: blank(args.phone),
      email: args.email,
    });

    if (!parsed.success) return this.rejected('flood', parsed.error);
    return this.accept({ insuranceType: 'flood', data: parsed.data });
  }

  async collectLifeData(args: LifeInsuranceArgs): Promise<ToolOutcome> {
    const blocked = this.checkCollectable('life');
    if (blocked) return blocked;

    const parsed = this.schemas.life.safeParse({
      insured: { fullName: args.full_name, dateOfBirth: args.date_of_birth },
      address: address(args),
      appointmentRequested: args.appointment_requested,
      appointmentDate: normalizeAppointment(args.appointment_date, this.clock()),
      contact: { phone: args.phone, email: blank(args.email) },
      policyType: blank(args.policy_type),
    });

    if (!parsed.success) return this.rejected('life', parsed.error);
    return this.accept({ insuranceType: 'life', data: parsed.data });
  }

  async collectCommercialData(args: CommercialInsuranceArgs): Promise<ToolOutcome> {
    const blocked = this.checkCollectable('commercial');
    if (blocked) return blocked;

    const parsed = this.schemas.commercial.safeParse({
      business: {
        name: args.business_name,
        type: blank(args.business_type),
        address: address(args),
      },
      coverage: {
        inventoryLimit: args.inventory_limit,
        buildingCoverage: args.building_coverage,
        buildingCoverageLimit: args.building_coverage_limit,
      },
      currentPolicy: priorPolicy(args),
      contact: { phone: args.phone, email: blank(args.email) },
    });

    if (!parsed.success) return this.rejected('commercial', parsed.error);
    return this.accept({ insuranceType: 'commercial', data: parsed.data });
  }

  /**
   * A submit that arrives while another is still writing or talking to the CRM joins the
   * one in flight instead of starting a second submission.
   */
  async submitQuoteRequest(): Promise<ToolOutcome> {
    if (this.submitting) {
      logger.warn('Submit joined an in-flight submission', { sessionId: this.sessionId });
      return this.submitting;
    }

    const pending = this.submit();
    this.submitting = pending;
    try {
      return await pending;
    } finally {
      this.submitting = null;
    }
  }

  private async submit(): Promise<ToolOutcome> {
    const insuranceType = this.insuranceType;
    if (!this.actionType || !insuranceType) {
      logger.warn('Submit called but no insurance type set', { sessionId: this.sessionId });
      return failure(
        new WorkflowStateError('NoActionSet', 'submit before set_user_action'),
        'No insurance type has been set. Please start by telling me what type of insurance you need.'
      );
    }
    if (this.submitted) {
      return failure(
        new WorkflowStateError('AlreadySubmitted', 'quote request already submitted'),
        `Your ${insuranceType} insurance quote request has already been submitted. To start another request, tell me which insurance you need.`
      );
    }

    const record = this.record;
    if (!record) {
      logger.warn('Submit called before data was collected', { sessionId: this.sessionId, insuranceType });
      return failure(
        new WorkflowStateError('NothingCollected', `no ${insuranceType} record collected`),
        `I haven't collected the ${insuranceType} insurance information yet. Please provide the required details first.`
      );
    }

    const submittedAt = this.clock();
    const envelope = (crm: CrmStatus) => ({
      submissionTimestamp: submittedAt.toISO(),
      sessionId: this.sessionId,
      threadId: this.threadId,
      status: 'submitted' as const,
      actionType: this.actionType,
      insuranceType,
      quoteRequest: record.data,
      crm,
    });

    const saved = await this.store.saveSubmission(insuranceType, submittedAt, this.sessionId, envelope({ status: 'pending' }));
    if (!saved) {
      logger.warn('Quote submission could not be written locally', { sessionId: this.sessionId, insuranceType });
    }

    const crmResult = this.leads
      ? await this.leads.submit({ record, sessionId: this.sessionId, threadId: this.threadId })
      : undefined;
    const crm = this.describeCrm(crmResult);

    if (saved) {
      await this.store.saveSubmission(insuranceType, submittedAt, this.sessionId, envelope(crm));
    }

    this.submitted = true;
    logger.info('Quote request submitted', { sessionId: this.sessionId, insuranceType, crm: crm.status });

    return success(
      `Perfect! Your ${insuranceType} insurance quote request has been submitted successfully. ` +
        'Our team will review your information and contact you shortly with a personalized quote. ' +
        'Is there anything else I can help you with today?'
    );
  }

  private describeCrm(result: SubmitResult | undefined): CrmStatus {
    if (!result) return { status: 'skipped' };
    return result.ok ? { status: 'submitted', leadId: result.leadId } : { status: 'failed', error: result.error.message };
  }

  private checkCollectable(type: InsuranceType): ToolOutcome | null {
    if (!this.actionType || !this.insuranceType) {
      return failure(
        new WorkflowStateError('NoActionSet', `collect ${type} before set_user_action`),
        'Please tell me whether you want to add or update insurance, and which type, before I collect your details.'
      );
    }
    if (this.insuranceType !== type) {
      return failure(
        new WorkflowStateError('InsuranceTypeMismatch', `collect ${type} while ${this.insuranceType} is active`),
        `We're currently working on a ${this.insuranceType} insurance request. ` +
          `If you'd like ${type} insurance instead, let me switch the request type first.`
      );
    }
    if (this.submitted) {
      return failure(
        new WorkflowStateError('AlreadySubmitted', `collect ${type} after submission`),
        `Your ${type} insurance quote request has already been submitted. To start another request, tell me which insurance you need.`
      );
    }
    return null;
  }

  private rejected(type: InsuranceType, error: ZodError): ToolOutcome {
    const issues = describeIssues(error);
    logger.info('Intake data rejected', { sessionId: this.sessionId, insuranceType: type, issues });
    return failure(
      new ValidationError(`Invalid ${type} insurance data`, issues),
      `I couldn't record the ${type} insurance details: ${issues.join('; ')}. Please verify the information and try again.`
    );
  }

  private async accept(record: InsuredRecord): Promise<ToolOutcome> {
    this.record = record;
    logger.info('Intake data collected', { sessionId: this.sessionId, insuranceType: record.insuranceType });

    const saved = await this.store.saveCollected(record.insuranceType, this.sessionId, {
      sessionId: this.sessionId,
      threadId: this.threadId,
      actionType: this.actionType,
      insuranceType: record.insuranceType,
      collectedAt: this.clock().toISO(),
      record: record.data,
    });

    if (!saved) {
      return success(
        `I've collected your ${record.insuranceType} insurance information, but there was an issue saving it. ` +
          'The data is still stored and can be submitted.'
      );
    }
    return success(COLLECTED_MESSAGES[record.insuranceType]);
  }
}
