import type { z, ZodIssue, ZodTypeAny } from 'zod';
import {
  accountInputSchema,
  authenticationSchema,
  configSchema,
  settingsPatchSchema,
  zoneCreateSchema,
  zoneInputSchema,
} from '../schemas/config';
import type {
  AccountInput,
  Authentication,
  CloudflareAccount,
  Config,
  SettingsPatch,
  ZoneCreateInput,
  ZoneInput,
} from '../types';
import { ConflictError, ValidationError } from '../utils/errors';

export type ValidationFailure = ValidationError | ConflictError;

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationFailure };

type ZoneLike = { id?: string; zone_id: string; subdomains: ReadonlyArray<{ id?: string; name: string }> };
type AccountLike = { zones: ReadonlyArray<ZoneLike> };

export function formatIssue(issue: ZodIssue): string {
  const path = issue.path.map(String).join(' -> ');
  return path ? `Field '${path}': ${issue.message}` : issue.message;
}

/**
 * 结构校验：未知字段、类型、格式与取值范围，只报告第一个问题
 */
export function decode<S extends ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }

  const [first] = parsed.error.issues;
  return {
    ok: false,
    error: new ValidationError(first ? formatIssue(first) : 'Validation Error'),
  };
}

export function unwrap<T>(result: ValidationResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

function findDuplicate<T>(items: ReadonlyArray<T>, key: (item: T) => string): string | undefined {
  const seen = new Set<string>();
  for (const item of items) {
    const value = key(item);
    if (seen.has(value)) return value;
    seen.add(value);
  }
  return undefined;
}

function idsOf(items: ReadonlyArray<{ id?: string }>): string[] {
  return items.flatMap((item) => (item.id === undefined ? [] : [item.id]));
}

export function checkZone(zone: ZoneLike): ConflictError | undefined {
  const duplicateName = findDuplicate(zone.subdomains, (s) => s.name);
  if (duplicateName !== undefined) {
    return new ConflictError(`Duplicate subdomain name: ${duplicateName}`);
  }

  const duplicateId = findDuplicate(idsOf(zone.subdomains), (id) => id);
  return duplicateId === undefined ? undefined : new ConflictError(`Duplicate subdomain id: ${duplicateId}`);
}

export function checkAccount(account: AccountLike): ConflictError | undefined {
  for (const zone of account.zones) {
    const conflict = checkZone(zone);
    if (conflict) return conflict;
  }

  const duplicateZoneId = findDuplicate(account.zones, (z) => z.zone_id);
  if (duplicateZoneId !== undefined) {
    return new ConflictError(`Duplicate zone ID: ${duplicateZoneId}`);
  }

  // 按 id 寻址的记录 id 也必须唯一
  const duplicateId = findDuplicate(idsOf(account.zones), (id) => id);
  return duplicateId === undefined ? undefined : new ConflictError(`Duplicate zone record id: ${duplicateId}`);
}

function andThen<T>(
  result: ValidationResult<T>,
  check: (value: T) => ValidationFailure | undefined
): ValidationResult<T> {
  if (!result.ok) return result;
  const error = check(result.value);
  return error ? { ok: false, error } : result;
}

export function validateAccountInput(input: unknown): ValidationResult<AccountInput> {
  return andThen(decode(accountInputSchema, input), checkAccount);
}

export function validateAuthentication(input: unknown): ValidationResult<Authentication> {
  return decode(authenticationSchema, input);
}

export function validateZoneCreate(input: unknown): ValidationResult<ZoneCreateInput> {
  return andThen(decode(zoneCreateSchema, input), checkZone);
}

export function validateZoneInput(input: unknown): ValidationResult<ZoneInput> {
  return andThen(decode(zoneInputSchema, input), checkZone);
}

export function validateSettingsPatch(input: unknown): ValidationResult<SettingsPatch> {
  return decode(settingsPatchSchema, input);
}

/**
 * 校验磁盘上的完整配置（id 已补全）
 */
export function validateConfigDocument(input: unknown): ValidationResult<Config> {
  return andThen(decode(configSchema, input), (config) => {
    for (const account of config.cloudflare) {
      const conflict = checkAccount(account);
      if (conflict) return conflict;
    }
    return undefined;
  });
}

/**
 * 新账户的凭证不能与已有账户重复，按 token、key、email 的顺序逐个账户比较
 */
export function findCredentialConflict(
  candidate: Authentication,
  accounts: ReadonlyArray<CloudflareAccount>
): ConflictError | undefined {
  for (const existing of accounts) {
    const current = existing.authentication;

    if (candidate.api_token && candidate.api_token === current.api_token) {
      return new ConflictError('API Token already exists');
    }

    if (candidate.api_key && current.api_key) {
      if (candidate.api_key.api_key === current.api_key.api_key) {
        return new ConflictError('API Key already exists');
      }
      if (candidate.api_key.account_email === current.api_key.account_email) {
        return new ConflictError('Account email already exists');
      }
    }
  }

  return undefined;
}
