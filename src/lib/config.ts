import { z } from 'zod';
import { ConfigError } from './errors';
import { REMOTE_ADDR } from './ip';

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_MESSAGE = 'You have reached maximum request limit.';
export const DEFAULT_CONTENT_TYPE = 'text/plain; charset=utf-8';

const ttlSchema = z.number().int().positive().default(HOUR_MS);

export const ipLookupSchema = z.object({
  name: z.string().min(1).default(REMOTE_ADDR),
  indexFromRight: z.number().int().min(0).default(0),
});

export const limiterOptionsSchema = z.object({
  max: z.number().positive(),
  burst: z.number().positive().optional(),
  methods: z.array(z.string().min(1)).default([]),
  ipLookup: ipLookupSchema.default({}),
  tokenBucketTtlMs: ttlSchema,
  basicAuthTtlMs: ttlSchema,
  headerEntryTtlMs: ttlSchema,
  cleanupIntervalMs: z.number().int().min(0).default(60_000),
  message: z.string().default(DEFAULT_MESSAGE),
  messageContentType: z.string().min(1).default(DEFAULT_CONTENT_TYPE),
  statusCode: z.number().int().min(400).max(599).default(429),
  ignoreURL: z.boolean().default(false),
  ignoreAddress: z.boolean().default(false),
  basicAuthUsers: z.array(z.string().min(1)).default([]),
  headers: z.record(z.string().min(1), z.array(z.string())).default({}),
});

export type LimiterSettingsInput = z.input<typeof limiterOptionsSchema>;
export type LimiterSettings = z.output<typeof limiterOptionsSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseLimiterOptions(input: unknown): LimiterSettings {
  const result = limiterOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError('Invalid rate limiter options', formatIssues(result.error));
  }
  return result.data;
}

/** Validates a single value against one schema, for the limiter's setters. */
export function validateSetting<T extends z.ZodTypeAny>(name: string, schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid value for ${name}`, formatIssues(result.error));
  }
  return result.data;
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function envList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function definedOnly(values: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

/**
 * Reads limiter options from `RATE_LIMIT_*` environment variables. Variables
 * that are set override `defaults`; the schema fills in the rest.
 * `RATE_LIMIT_MAX` is required unless `defaults` carries `max`.
 */
export function loadLimiterOptionsFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  defaults: Partial<LimiterSettingsInput> = {},
): LimiterSettings {
  const ipLookup = definedOnly({
    name: env.RATE_LIMIT_IP_LOOKUP || undefined,
    indexFromRight: envNumber(env.RATE_LIMIT_IP_INDEX),
  });
  return parseLimiterOptions({
    ...defaults,
    ...definedOnly({
      max: envNumber(env.RATE_LIMIT_MAX),
      burst: envNumber(env.RATE_LIMIT_BURST),
      methods: envList(env.RATE_LIMIT_METHODS),
      tokenBucketTtlMs: envNumber(env.RATE_LIMIT_BUCKET_TTL_MS),
      basicAuthTtlMs: envNumber(env.RATE_LIMIT_BASIC_AUTH_TTL_MS),
      headerEntryTtlMs: envNumber(env.RATE_LIMIT_HEADER_TTL_MS),
      message: env.RATE_LIMIT_MESSAGE,
      statusCode: envNumber(env.RATE_LIMIT_STATUS_CODE),
    }),
    ipLookup: { ...defaults.ipLookup, ...ipLookup },
  });
}
