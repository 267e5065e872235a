import { z } from 'zod';
import { ConfigurationError } from '../common/errors';

const flag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

const count = (fallback: number) =>
  z.coerce.number().int().min(0).default(fallback);

const list = (fallback: string[], separator = ',') =>
  z
    .string()
    .optional()
    .transform((value) =>
      value === undefined || value.trim() === ''
        ? fallback
        : value
            .split(separator)
            .map((item) => item.trim())
            .filter((item) => item.length > 0),
    );

const DEFAULT_SEARCH_QUERIES = [
  '"{organization}" recruiter',
  '"{organization}" talent acquisition',
  '"{organization}" founder OR CEO',
  'site:{domain} careers team',
];

export const DEFAULT_ROLE_KEYWORDS = [
  'recruiter',
  'recruiting',
  'talent',
  'hiring',
  'sourcer',
  'people',
  'hr',
  'founder',
  'co-founder',
  'ceo',
  'cto',
  'engineer',
];

export const DEFAULT_RECRUITING_KEYWORDS = [
  'recruit',
  'talent',
  'hiring',
  'sourcer',
  'people',
  'hr',
];

const envSchema = z
  .object({
    NODE_ENV: z.string().default('development'),
    LOG_LEVEL: z
      .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
      .default('info'),

    DB_TYPE: z.enum(['better-sqlite3', 'postgres']).default('better-sqlite3'),
    DATABASE_PATH: z.string().default('outreach.db'),
    DATABASE_URL: z.string().url().optional(),
    REDIS_URL: z.string().url().optional(),

    INPUT_CSV: z.string().default('organizations.csv'),
    OUTPUT_CSV: z.string().default('contacts_found.csv'),
    CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
    SKIP_PROCESSED: flag(true),

    SEARCH_PROVIDER: z.enum(['none', 'brave']).default('none'),
    BRAVE_API_KEY: z.string().min(1).optional(),
    SEARCH_QUERIES: list(DEFAULT_SEARCH_QUERIES, ';'),

    VERIFIER_PROVIDER: z.enum(['none', 'hunter']).default('none'),
    HUNTER_API_KEY: z.string().min(1).optional(),
    VERIFY_TOP_N: count(3),

    CRAWL_ENABLED: flag(true),
    MAX_PAGES_PER_ORG: z.coerce.number().int().min(1).default(25),
    CRAWL_FAILURE_BUDGET: count(5),
    CRAWL_EARLY_STOP_EMAILS: z.coerce.number().int().min(1).default(3),
    CRAWL_REQUEST_DELAY_MS: count(500),
    CRAWL_TIMEOUT_MS: z.coerce.number().int().min(1).default(15000),

    ROLE_KEYWORDS: list(DEFAULT_ROLE_KEYWORDS),
    RECRUITING_KEYWORDS: list(DEFAULT_RECRUITING_KEYWORDS),
    NAME_WINDOW: z.coerce.number().int().min(1).default(80),
    MAX_CONTACTS: z.coerce.number().int().min(1).default(5),

    SCORE_WEIGHT_OBSERVED: z.coerce.number().min(0).default(10),
    SCORE_WEIGHT_CONVENTIONALITY: z.coerce.number().min(0).default(5),
    SCORE_WEIGHT_ROLE: z.coerce.number().min(0).default(3),
    SCORE_WEIGHT_FUNCTIONAL_PENALTY: z.coerce.number().min(0).default(4),
    SCORE_WEIGHT_CONTEXT: z.coerce.number().min(0).default(3),
    SCORE_WEIGHT_URL: z.coerce.number().min(0).default(2),

    RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    RETRY_BASE_DELAY_MS: count(1000),
    RETRY_MAX_DELAY_MS: count(30000),

    SEND_ENABLED: flag(false),
    SEND_DRY_RUN: flag(true),
    SEND_LIMIT: z.coerce.number().int().min(0).optional(),
    SEND_MIN_DELAY_MS: count(30000),
    SEND_TRANSPORT: z.enum(['log', 'smtp']).default('log'),
    SMTP_HOST: z.string().min(1).optional(),
    SMTP_PORT: z.coerce.number().int().min(1).max(65535).default(587),
    SMTP_USER: z.string().min(1).optional(),
    SMTP_PASSWORD: z.string().min(1).optional(),
    TEXT_GENERATOR: z.enum(['template', 'gemini']).default('template'),
    GEMINI_API_KEY: z.string().min(1).optional(),
    SENDER_NAME: z.string().default('Outreach Team'),
    SENDER_EMAIL: z.string().email().optional(),
    OUTREACH_PITCH: z
      .string()
      .default('I would love to learn about open roles on your team.'),

    METRICS_PUSHGATEWAY_URL: z.string().url().optional(),
  })
  .superRefine((env, ctx) => {
    const demand = (when: boolean, key: string, reason: string) => {
      if (when) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: reason });
      }
    };
    demand(
      env.DB_TYPE === 'postgres' && !env.DATABASE_URL,
      'DATABASE_URL',
      'required when DB_TYPE=postgres',
    );
    demand(
      env.SEARCH_PROVIDER === 'brave' && !env.BRAVE_API_KEY,
      'BRAVE_API_KEY',
      'required when SEARCH_PROVIDER=brave',
    );
    demand(
      env.VERIFIER_PROVIDER === 'hunter' && !env.HUNTER_API_KEY,
      'HUNTER_API_KEY',
      'required when VERIFIER_PROVIDER=hunter',
    );
    demand(
      env.SEND_TRANSPORT === 'smtp' && !env.SMTP_HOST,
      'SMTP_HOST',
      'required when SEND_TRANSPORT=smtp',
    );
    demand(
      env.SEND_TRANSPORT === 'smtp' && !env.SENDER_EMAIL,
      'SENDER_EMAIL',
      'required when SEND_TRANSPORT=smtp',
    );
    demand(
      env.TEXT_GENERATOR === 'gemini' && !env.GEMINI_API_KEY,
      'GEMINI_API_KEY',
      'required when TEXT_GENERATOR=gemini',
    );
  });

export interface ScoringWeights {
  observed: number;
  conventionality: number;
  role: number;
  functionalPenalty: number;
  /** Added for recruiting words near an observed address, subtracted for off-topic ones. */
  context: number;
  /** Added when an address was observed on a careers-like URL. */
  url: number;
}

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface CrawlConfig {
  enabled: boolean;
  maxPages: number;
  failureBudget: number;
  earlyStopEmails: number;
  requestDelayMs: number;
  timeoutMs: number;
}

export interface DiscoveryConfig {
  roleKeywords: string[];
  recruitingKeywords: string[];
  nameWindow: number;
  maxContacts: number;
  verifyTopN: number;
}

export interface OutreachConfig {
  enabled: boolean;
  dryRun: boolean;
  sendLimit?: number;
  minDelayMs: number;
  transport: 'log' | 'smtp';
  smtp: { host?: string; port: number; user?: string; password?: string };
  textGenerator: 'template' | 'gemini';
  geminiApiKey?: string;
  senderName: string;
  senderEmail?: string;
  pitch: string;
}

export interface AppConfig {
  app: {
    env: string;
    logLevel: string;
    inputCsv: string;
    outputCsv: string;
    concurrency: number;
    skipProcessed: boolean;
  };
  database:
    | { type: 'better-sqlite3'; path: string }
    | { type: 'postgres'; url: string };
  redis: { url?: string };
  search: {
    provider: 'none' | 'brave';
    braveApiKey?: string;
    queries: string[];
  };
  verification: { provider: 'none' | 'hunter'; hunterApiKey?: string };
  crawl: CrawlConfig;
  discovery: DiscoveryConfig;
  scoring: ScoringWeights;
  retry: RetryConfig;
  outreach: OutreachConfig;
  metrics: { pushgatewayUrl?: string };
}

/**
 * Parses the environment into a typed configuration tree. Throws
 * ConfigurationError listing every problem, which aborts startup.
 */
export function configuration(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`,
      ),
    );
  }
  const e = parsed.data;

  return {
    app: {
      env: e.NODE_ENV,
      logLevel: e.LOG_LEVEL,
      inputCsv: e.INPUT_CSV,
      outputCsv: e.OUTPUT_CSV,
      concurrency: e.CONCURRENCY,
      skipProcessed: e.SKIP_PROCESSED,
    },
    database:
      e.DB_TYPE === 'postgres'
        ? { type: 'postgres', url: e.DATABASE_URL ?? '' }
        : { type: 'better-sqlite3', path: e.DATABASE_PATH },
    redis: { url: e.REDIS_URL },
    search: {
      provider: e.SEARCH_PROVIDER,
      braveApiKey: e.BRAVE_API_KEY,
      queries: e.SEARCH_QUERIES,
    },
    verification: {
      provider: e.VERIFIER_PROVIDER,
      hunterApiKey: e.HUNTER_API_KEY,
    },
    crawl: {
      enabled: e.CRAWL_ENABLED,
      maxPages: e.MAX_PAGES_PER_ORG,
      failureBudget: e.CRAWL_FAILURE_BUDGET,
      earlyStopEmails: e.CRAWL_EARLY_STOP_EMAILS,
      requestDelayMs: e.CRAWL_REQUEST_DELAY_MS,
      timeoutMs: e.CRAWL_TIMEOUT_MS,
    },
    discovery: {
      roleKeywords: e.ROLE_KEYWORDS.map((k) => k.toLowerCase()),
      recruitingKeywords: e.RECRUITING_KEYWORDS.map((k) => k.toLowerCase()),
      nameWindow: e.NAME_WINDOW,
      maxContacts: e.MAX_CONTACTS,
      verifyTopN: e.VERIFY_TOP_N,
    },
    scoring: {
      observed: e.SCORE_WEIGHT_OBSERVED,
      conventionality: e.SCORE_WEIGHT_CONVENTIONALITY,
      role: e.SCORE_WEIGHT_ROLE,
      functionalPenalty: e.SCORE_WEIGHT_FUNCTIONAL_PENALTY,
      context: e.SCORE_WEIGHT_CONTEXT,
      url: e.SCORE_WEIGHT_URL,
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: e.RETRY_MAX_DELAY_MS,
    },
    outreach: {
      enabled: e.SEND_ENABLED,
      dryRun: e.SEND_DRY_RUN,
      sendLimit: e.SEND_LIMIT,
      minDelayMs: e.SEND_MIN_DELAY_MS,
      transport: e.SEND_TRANSPORT,
      smtp: {
        host: e.SMTP_HOST,
        port: e.SMTP_PORT,
        user: e.SMTP_USER,
        password: e.SMTP_PASSWORD,
      },
      textGenerator: e.TEXT_GENERATOR,
      geminiApiKey: e.GEMINI_API_KEY,
      senderName: e.SENDER_NAME,
      senderEmail: e.SENDER_EMAIL,
      pitch: e.OUTREACH_PITCH,
    },
    metrics: { pushgatewayUrl: e.METRICS_PUSHGATEWAY_URL },
  };
}
