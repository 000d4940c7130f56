import { z } from 'zod';

export const MIN_TTL = 60;
export const MAX_TTL = 86400;
export const DEFAULT_TTL = 300;
export const MAX_SUBDOMAIN_LENGTH = 63;

/**
 * 单个 @ 表示根域名，否则为若干由点分隔的 label
 */
export const SUBDOMAIN_NAME_PATTERN =
  /^(@|[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?(\.[a-zA-Z0-9]([a-zA-Z0-9-]*[a-zA-Z0-9])?)*)$/;

export const ZONE_ID_PATTERN = /^[a-f0-9]{32}$/;

const TTL_RANGE_MESSAGE = `TTL must be between ${MIN_TTL} and ${MAX_TTL} seconds`;

const idSchema = z.string().min(1, 'ID must not be empty');

export const ttlSchema = z
  .number({ invalid_type_error: 'TTL must be an integer' })
  .int('TTL must be an integer')
  .min(MIN_TTL, TTL_RANGE_MESSAGE)
  .max(MAX_TTL, TTL_RANGE_MESSAGE);

export const subDomainNameSchema = z
  .string()
  .max(MAX_SUBDOMAIN_LENGTH, `Subdomain name must be at most ${MAX_SUBDOMAIN_LENGTH} characters`)
  .regex(SUBDOMAIN_NAME_PATTERN, 'Subdomain name must be a valid domain name or @');

export const zoneIdSchema = z
  .string()
  .regex(ZONE_ID_PATTERN, 'Zone ID must be a 32-character hexadecimal string');

const subDomainFields = {
  name: subDomainNameSchema,
  proxied: z.boolean().default(false),
  ttl: ttlSchema.default(DEFAULT_TTL),
};

// ---- 持久化结构（所有 id 必填） ----

export const subDomainSchema = z.object({ id: idSchema, ...subDomainFields }).strict();

export const zoneSchema = z
  .object({
    id: idSchema,
    zone_id: zoneIdSchema,
    domain: z.string(),
    subdomains: z.array(subDomainSchema).default([]),
  })
  .strict();

const apiKeySchema = z
  .object({
    api_key: z.string(),
    account_email: z.string(),
  })
  .strict();

export const authenticationSchema = z
  .object({
    api_token: z.string().nullable().default(null),
    api_key: apiKeySchema.nullable().default(null),
  })
  .strict();

export const accountSchema = z
  .object({
    id: idSchema,
    authentication: authenticationSchema,
    zones: z.array(zoneSchema).default([]),
  })
  .strict();

export const configSchema = z
  .object({
    cloudflare: z.array(accountSchema).default([]),
    a: z.boolean().default(true),
    aaaa: z.boolean().default(true),
    purgeUnknownRecords: z.boolean().default(false),
    ttl: ttlSchema.default(DEFAULT_TTL),
  })
  .strict();

// ---- 请求体结构 ----

export const subDomainCreateSchema = z.object(subDomainFields).strict();

export const subDomainInputSchema = z
  .object({ id: idSchema.optional(), ...subDomainFields })
  .strict();

export const zoneCreateSchema = z
  .object({
    zone_id: zoneIdSchema,
    domain: z.string(),
    subdomains: z.array(subDomainCreateSchema).default([]),
  })
  .strict();

export const zoneInputSchema = z
  .object({
    id: idSchema.optional(),
    zone_id: zoneIdSchema,
    domain: z.string(),
    subdomains: z.array(subDomainInputSchema).default([]),
  })
  .strict();

export const accountInputSchema = z
  .object({
    id: idSchema.optional(),
    authentication: authenticationSchema,
    zones: z.array(zoneInputSchema).default([]),
  })
  .strict();

export const settingsSchema = z
  .object({
    a: z.boolean(),
    aaaa: z.boolean(),
    purgeUnknownRecords: z.boolean(),
    ttl: ttlSchema,
  })
  .strict();

export const settingsPatchSchema = settingsSchema
  .partial()
  .refine((patch) => Object.keys(patch).length > 0, 'At least one setting must be provided');
