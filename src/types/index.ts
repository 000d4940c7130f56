import type { z } from 'zod';
import type {
  accountInputSchema,
  accountSchema,
  authenticationSchema,
  configSchema,
  settingsPatchSchema,
  settingsSchema,
  subDomainSchema,
  zoneCreateSchema,
  zoneInputSchema,
  zoneSchema,
} from '../schemas/config';

export type SubDomain = z.infer<typeof subDomainSchema>;
export type Zone = z.infer<typeof zoneSchema>;
export type Authentication = z.infer<typeof authenticationSchema>;
export type CloudflareAccount = z.infer<typeof accountSchema>;
export type Config = z.infer<typeof configSchema>;

/**
 * 更新策略相关的顶层字段
 */
export type Settings = z.infer<typeof settingsSchema>;
export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

// 请求体解码后的结构，嵌套 id 可能缺失
export type AccountInput = z.infer<typeof accountInputSchema>;
export type ZoneInput = z.infer<typeof zoneInputSchema>;
export type ZoneCreateInput = z.infer<typeof zoneCreateSchema>;

/**
 * 统一响应结构
 */
export interface ApiEnvelope<T = unknown> {
  error: boolean;
  data: T | null;
  message: string;
}

export interface ErrorDetail {
  detail: string;
}
