import path from 'path';
import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { createApp } from './app';
import { logger } from './utils/logger';
import { KeyedMutex } from './utils/keyedMutex';
import { SYSTEM_PROMPT } from './utils/prompts';
import { parseApiKeys } from './middleware/auth';
import { Ams360Client } from './services/ams360/ams360.client';
import { CRMFactory } from './services/crm/crm.adapter';
import { SendGridAdapter } from './services/email/sendgrid.adapter';
import { SubmissionStore } from './services/intake/submission.store';
import { createModelProvider } from './services/llm/llm.factory';
import { SessionService } from './services/session.service';
import { TwilioService } from './services/sms/twilio.service';
import { ThreadStore, threadServicesFactory } from './services/thread.store';
import { ToolDispatcher } from './services/tools/tool.dispatcher';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

const locks = new KeyedMutex();

const crm = CRMFactory.create('agencyzoom', {
  apiKey: env.AGENCYZOOM_API_KEY,
  baseUrl: env.AGENCYZOOM_BASE_URL,
  pipelineId: env.AGENCYZOOM_PIPELINE_ID,
  stageId: env.AGENCYZOOM_STAGE_ID,
  leadSourceId: env.AGENCYZOOM_LEAD_SOURCE_ID,
  assignTo: env.AGENCYZOOM_ASSIGN_TO,
});

const policies = new Ams360Client({
  baseUrl: env.AMS360_BASE_URL,
  agencyNo: env.AMS360_AGENCY_NO,
  loginId: env.AMS360_LOGIN_ID,
  password: env.AMS360_PASSWORD,
  ticketTtlMs: env.AMS360_TICKET_TTL_MS,
});

const threads = new ThreadStore({
  systemPrompt: SYSTEM_PROMPT,
  createServices: threadServicesFactory({
    store: new SubmissionStore(path.resolve(env.INTAKE_DATA_DIR)),
    policies,
    crm,
  }),
  maxThreads: env.THREAD_MAX_COUNT,
  idleTtlMs: env.THREAD_IDLE_TTL_MS,
  isPinned: (threadId) => locks.isLocked(threadId),
});

const sessions = new SessionService({
  threads,
  provider: createModelProvider(env),
  executor: new ToolDispatcher(),
  locks,
  maxToolRounds: env.MAX_TOOL_ROUNDS,
  turnTimeoutMs: env.TURN_TIMEOUT_MS,
});

const app = createApp({
  sessions,
  sms: new TwilioService({
    accountSid: env.TWILIO_ACCOUNT_SID,
    authToken: env.TWILIO_AUTH_TOKEN,
    fromNumber: env.TWILIO_PHONE_NUMBER,
  }),
  email: new SendGridAdapter({ apiKey: env.SENDGRID_API_KEY, fromEmail: env.SENDGRID_FROM_EMAIL }),
  apiKeys: parseApiKeys(env.API_KEYS),
  beforeErrorHandler: env.SENTRY_DSN ? (instance) => Sentry.setupExpressErrorHandler(instance) : undefined,
});

app.listen(parseInt(env.PORT, 10), () => {
  logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV, llmProvider: env.LLM_PROVIDER });
});

export default app;
