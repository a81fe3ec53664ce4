import { z } from 'zod';
import { ConfigError } from './errors';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const int = (fallback: number, min = 0) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(fallback));

const str = (fallback: string) => z.preprocess(blankToUndefined, z.string().default(fallback));

const flag = (fallback: boolean) =>
  z.preprocess(
    (value) => {
      const v = blankToUndefined(value);
      return typeof v === 'string' ? v.trim().toLowerCase() === 'true' : v;
    },
    z.boolean().default(fallback)
  );

const EnvSchema = z.object({
  PORT: int(3000, 1),
  RATE_LIMIT_WINDOW_MS: int(60_000, 1),
  RATE_LIMIT_MAX: int(120, 1),

  RESTAURANT_NAME: str(''),
  NUM_REVIEWS: int(15, 1),
  RATING_THRESHOLD: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(5).default(3)),
  PRESENT_DELAY_MS: int(2000),
  MAX_MESSAGE_LENGTH: int(1500, 100),
  CHUNK_DELAY_MS: int(1000),
  REVISION_TIMEOUT_MS: int(60_000, 1),
  INGESTION_CONCURRENCY: int(1, 1),
  MANAGER_NAME: str(''),

  TWILIO_ACCOUNT_SID: str(''),
  TWILIO_AUTH_TOKEN: str(''),
  TWILIO_WHATSAPP_NUMBER: str(''),
  TEMPLATE_REVIEW_START: str(''),
  TEMPLATE_REVIEW_ACTIONS: str(''),
  TEMPLATE_COMPLETION: str(''),
  TEMPLATE_WELCOME: str(''),

  OPENAI_API_KEY: str(''),
  OPENAI_MODEL: str('gpt-4o-mini'),
  OLLAMA_API_URL: str('http://localhost:11434'),
  OLLAMA_MODEL: str('llama3'),
  LLM_TIMEOUT_MS: int(300_000, 1),

  GOOGLE_PLACES_API_KEY: str(''),

  DISABLE_SCHEDULER: flag(false),
  REMINDER_CRON: str('*/15 * * * *'),
  REMINDER_IDLE_MINUTES: int(120, 1),
  REMINDER_MAX: int(2),
  SCHEDULER_TZ: str('UTC'),
});

export interface TemplateIds {
  reviewStart: string;
  reviewActions: string;
  completion: string;
  welcome: string;
}

export interface AppConfig {
  port: number;
  rateLimit: { windowMs: number; max: number };
  workflow: {
    restaurantName: string;
    numReviews: number;
    ratingThreshold: number;
    presentDelayMs: number;
    maxMessageLength: number;
    revisionTimeoutMs: number;
    ingestionConcurrency: number;
    managerName: string;
  };
  twilio: {
    accountSid: string;
    authToken: string;
    fromNumber: string;
    chunkDelayMs: number;
  };
  templates: TemplateIds;
  llm: {
    openaiApiKey: string;
    openaiModel: string;
    ollamaUrl: string;
    ollamaModel: string;
    timeoutMs: number;
  };
  placesApiKey: string;
  reminders: {
    disabled: boolean;
    cron: string;
    timezone: string;
    idleMinutes: number;
    maxReminders: number;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`Invalid environment configuration:\n${issues.join('\n')}`);
  }
  const e = parsed.data;

  return {
    port: e.PORT,
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX },
    workflow: {
      restaurantName: e.RESTAURANT_NAME,
      numReviews: e.NUM_REVIEWS,
      ratingThreshold: e.RATING_THRESHOLD,
      presentDelayMs: e.PRESENT_DELAY_MS,
      maxMessageLength: e.MAX_MESSAGE_LENGTH,
      revisionTimeoutMs: e.REVISION_TIMEOUT_MS,
      ingestionConcurrency: e.INGESTION_CONCURRENCY,
      managerName: e.MANAGER_NAME,
    },
    twilio: {
      accountSid: e.TWILIO_ACCOUNT_SID,
      authToken: e.TWILIO_AUTH_TOKEN,
      fromNumber: e.TWILIO_WHATSAPP_NUMBER,
      chunkDelayMs: e.CHUNK_DELAY_MS,
    },
    templates: {
      reviewStart: e.TEMPLATE_REVIEW_START,
      reviewActions: e.TEMPLATE_REVIEW_ACTIONS,
      completion: e.TEMPLATE_COMPLETION,
      welcome: e.TEMPLATE_WELCOME,
    },
    llm: {
      openaiApiKey: e.OPENAI_API_KEY,
      openaiModel: e.OPENAI_MODEL,
      ollamaUrl: e.OLLAMA_API_URL,
      ollamaModel: e.OLLAMA_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    placesApiKey: e.GOOGLE_PLACES_API_KEY,
    reminders: {
      disabled: e.DISABLE_SCHEDULER,
      cron: e.REMINDER_CRON,
      timezone: e.SCHEDULER_TZ,
      idleMinutes: e.REMINDER_IDLE_MINUTES,
      maxReminders: e.REMINDER_MAX,
    },
  };
};
