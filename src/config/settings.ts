/**
 * Application configuration
 *
 * Every setting comes from the environment (dotenv fills it from .env first).
 * Required: GOOGLE_DRIVE_FOLDER_ID, GEMINI_API_KEY, NOTION_API_KEY,
 * NOTION_DATABASE_ID. Anything missing or malformed is reported at once as a
 * ConfigurationError listing every problem.
 *
 * @module config/settings
 */

import { z } from 'zod';

import { ConfigurationError } from '../errors.js';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.5-flash';

export const AppConfigSchema = z.object({
  drive: z.object({
    folderId: z.string().min(1, 'GOOGLE_DRIVE_FOLDER_ID is required'),
    /** OAuth client secrets (installed or web app) */
    credentialsPath: z.string().default('credentials.json'),
    /** Saved OAuth tokens from a previous authorization */
    tokenPath: z.string().default('token.json'),
    /** Service account key; takes precedence over OAuth files when set */
    serviceAccountKeyPath: z.string().optional(),
    requestTimeoutMs: z.number().int().positive().default(60_000),
  }),

  gemini: z.object({
    apiKey: z.string().min(1, 'GEMINI_API_KEY is required'),
    model: z.string().default(DEFAULT_GEMINI_MODEL),
    temperature: z.number().min(0).max(2).default(0.2),
    maxOutputTokens: z.number().int().positive().default(8192),
    requestTimeoutMs: z.number().int().positive().default(120_000),
    requestsPerMinute: z.number().int().positive().default(10),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).default(3),
        baseDelayMs: z.number().int().min(0).default(2000),
        maxDelayMs: z.number().int().min(0).default(30_000),
      })
      .default({}),
    circuitBreaker: z
      .object({
        failureThreshold: z.number().int().min(1).default(5),
        recoveryTimeMs: z.number().int().min(0).default(60_000),
      })
      .default({}),
  }),

  notion: z.object({
    apiKey: z.string().min(1, 'NOTION_API_KEY is required'),
    databaseId: z.string().min(1, 'NOTION_DATABASE_ID is required'),
    requestsPerSecond: z.number().int().positive().default(3),
    requestTimeoutMs: z.number().int().positive().default(30_000),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).default(4),
        baseDelayMs: z.number().int().min(0).default(1000),
        maxDelayMs: z.number().int().min(0).default(30_000),
      })
      .default({}),
  }),

  ledger: z
    .object({
      backend: z.enum(['file', 'sqlite']).default('file'),
      path: z.string().optional(),
    })
    .default({}),

  extraction: z
    .object({
      maxPages: z.number().int().positive().default(30),
      maxChars: z.number().int().positive().default(30_000),
      minTextLength: z.number().int().min(0).default(100),
      parseTimeoutMs: z.number().int().positive().default(60_000),
    })
    .default({}),

  pipeline: z
    .object({
      intervalSeconds: z.number().int().positive().default(300),
      documentDelayMs: z.number().int().min(0).default(0),
    })
    .default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const DEFAULT_LEDGER_PATHS = {
  file: 'data/processed-documents.jsonl',
  sqlite: 'data/processed-documents.db',
} as const;

type Env = Record<string, string | undefined>;

function readString(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

function parseNumberEnv(env: Env, name: string, issues: string[]): number | undefined {
  const raw = readString(env, name);
  if (raw === undefined) return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    issues.push(`Invalid numeric env var ${name}: "${raw}"`);
    return undefined;
  }
  return parsed;
}

/**
 * Build the configuration from environment variables.
 *
 * @throws ConfigurationError listing every missing or invalid setting
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const issues: string[] = [];
  const num = (name: string): number | undefined => parseNumberEnv(env, name, issues);

  // undefined leaves fall through to the schema defaults
  const raw = {
    drive: {
      folderId: readString(env, 'GOOGLE_DRIVE_FOLDER_ID') ?? '',
      credentialsPath: readString(env, 'GOOGLE_CREDENTIALS_PATH'),
      tokenPath: readString(env, 'GOOGLE_TOKEN_PATH'),
      serviceAccountKeyPath: readString(env, 'GOOGLE_SERVICE_ACCOUNT_KEY'),
      requestTimeoutMs: num('REQUEST_TIMEOUT_MS'),
    },
    gemini: {
      apiKey: readString(env, 'GEMINI_API_KEY') ?? '',
      model: readString(env, 'GEMINI_MODEL'),
      temperature: num('GEMINI_TEMPERATURE'),
      requestsPerMinute: num('GEMINI_REQUESTS_PER_MINUTE'),
      retry: { maxAttempts: num('GEMINI_MAX_ATTEMPTS') },
    },
    notion: {
      apiKey: readString(env, 'NOTION_API_KEY') ?? '',
      databaseId: readString(env, 'NOTION_DATABASE_ID') ?? '',
      requestsPerSecond: num('NOTION_REQUESTS_PER_SECOND'),
      requestTimeoutMs: num('REQUEST_TIMEOUT_MS'),
    },
    ledger: rawLedger(env),
    extraction: {
      maxPages: num('EXTRACT_MAX_PAGES'),
      maxChars: num('EXTRACT_MAX_CHARS'),
      minTextLength: num('EXTRACT_MIN_TEXT'),
    },
    pipeline: {
      intervalSeconds: num('CHECK_INTERVAL'),
      documentDelayMs: num('DOCUMENT_DELAY_MS'),
    },
  };

  const parsed = AppConfigSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(`${issue.path.join('.')}: ${issue.message}`);
    }
  }
  if (issues.length > 0 || !parsed.success) {
    throw new ConfigurationError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }

  return parsed.data;
}

function rawLedger(env: Env): { backend?: string; path?: string } {
  return {
    backend: readString(env, 'LEDGER_BACKEND'),
    path: readString(env, 'LEDGER_PATH'),
  };
}

export type LedgerConfig = AppConfig['ledger'];

/**
 * Ledger settings alone, for commands that never reach the external services.
 *
 * @throws ConfigurationError on an unknown backend
 */
export function loadLedgerConfig(env: Env = process.env): LedgerConfig {
  const parsed = AppConfigSchema.shape.ledger.safeParse(rawLedger(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `ledger.${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }
  return parsed.data;
}

export function resolveLedgerPath(ledger: LedgerConfig): string {
  return ledger.path ?? DEFAULT_LEDGER_PATHS[ledger.backend];
}
