/**
 * Postline Configuration Module
 *
 * Centralizes all configuration reading from environment variables
 * with validation and defaults. Core modules receive the parsed value
 * explicitly and never read the environment themselves.
 */

import { z } from 'zod';
import { createLogger } from '../utils/logger.js';

const log = createLogger('config');

/**
 * Boolean env flag: accepts true/false/1/0/yes/no (case-insensitive).
 * z.coerce.boolean() would turn the string 'false' into true.
 */
const envBoolean = z
  .union([z.boolean(), z.string()])
  .transform((value, ctx) => {
    if (typeof value === 'boolean') {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (['true', '1', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['false', '0', 'no', 'off'].includes(normalized)) {
      return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid boolean: ${value}` });
    return z.NEVER;
  });

/**
 * Retry configuration schema
 */
const retryConfigSchema = z.object({
  /** Total attempts per phase, first attempt included (1-10) */
  maxAttempts: z.coerce.number().int().min(1).max(10).default(3),
  /** Delay before the first retry in milliseconds */
  backoffMs: z.coerce.number().int().min(0).max(600000).default(2000),
  /** Exponential backoff multiplier */
  backoffMultiplier: z.coerce.number().min(1).max(10).default(2),
  /** Upper bound on a single backoff delay in milliseconds */
  maxBackoffMs: z.coerce.number().int().min(0).max(3600000).default(60000),
  /** Add 0-25% random jitter to each delay */
  jitter: envBoolean.default(true),
  /** Per-attempt timeout for every external call in milliseconds */
  phaseTimeoutMs: z.coerce.number().int().min(100).max(3600000).default(120000),
});

export type RetryConfig = z.infer<typeof retryConfigSchema>;

/**
 * OpenAI configuration schema
 */
const openAIConfigSchema = z.object({
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).default('gpt-4'),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  maxTokens: z.coerce.number().int().min(1).max(32000).default(2500),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
});

export type OpenAIConfig = z.infer<typeof openAIConfigSchema>;

/**
 * Configuration schema with validation
 */
const configSchema = z.object({
  retry: retryConfigSchema,

  // Paths
  dataDir: z.string().min(1).default('.postline/data'),
  outboxDir: z.string().min(1).default('.postline/outbox'),
  outboxPublicUrl: z.string().url().optional(),
  templatePath: z.string().min(1).default('prompts/post-template.txt'),

  // File store locking
  lockTimeoutMs: z.coerce.number().int().min(100).max(600000).default(10000),

  openai: openAIConfigSchema,
});

export type PostlineConfig = z.infer<typeof configSchema>;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PostlineConfig {
  const raw = {
    retry: {
      maxAttempts: env['POSTLINE_MAX_ATTEMPTS'],
      backoffMs: env['POSTLINE_BACKOFF_MS'],
      backoffMultiplier: env['POSTLINE_BACKOFF_MULTIPLIER'],
      maxBackoffMs: env['POSTLINE_MAX_BACKOFF_MS'],
      jitter: env['POSTLINE_BACKOFF_JITTER'],
      phaseTimeoutMs: env['POSTLINE_PHASE_TIMEOUT_MS'],
    },
    dataDir: env['POSTLINE_DATA_DIR'],
    outboxDir: env['POSTLINE_OUTBOX_DIR'],
    outboxPublicUrl: env['POSTLINE_OUTBOX_PUBLIC_URL'] === '' ? undefined : env['POSTLINE_OUTBOX_PUBLIC_URL'],
    templatePath: env['POSTLINE_TEMPLATE_PATH'],
    lockTimeoutMs: env['POSTLINE_LOCK_TIMEOUT_MS'],
    openai: {
      apiKey: env['OPENAI_API_KEY'] === '' ? undefined : env['OPENAI_API_KEY'],
      model: env['OPENAI_MODEL'],
      baseUrl: env['OPENAI_BASE_URL'],
      maxTokens: env['OPENAI_MAX_TOKENS'],
      temperature: env['OPENAI_TEMPERATURE'],
    },
  };

  const result = configSchema.safeParse(raw);

  if (!result.success) {
    log.error({ errors: result.error.errors }, 'Invalid configuration');
    throw new Error(`Configuration validation failed: ${result.error.message}`);
  }

  log.info(
    {
      maxAttempts: result.data.retry.maxAttempts,
      backoffMs: result.data.retry.backoffMs,
      phaseTimeoutMs: result.data.retry.phaseTimeoutMs,
      dataDir: result.data.dataDir,
      openaiModel: result.data.openai.model,
      openaiKeyConfigured: result.data.openai.apiKey !== undefined,
    },
    'Configuration loaded'
  );

  return Object.freeze(result.data);
}

/**
 * Singleton configuration instance
 */
let configInstance: PostlineConfig | null = null;

/**
 * Get the configuration singleton
 */
export function getConfig(): PostlineConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Reset configuration (for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
