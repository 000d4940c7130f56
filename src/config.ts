import dotenv from 'dotenv';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  return Number(raw);
}

export interface RateLimitOptions {
  windowMs: number;
  max: number;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  corsOrigin: string;
  /** DDNS 配置文件路径 */
  configFile: string;
  rateLimit: {
    write: RateLimitOptions;
  };
}

export const config: AppConfig = {
  nodeEnv: process.env.NODE_ENV || 'development',
  port: intFromEnv('PORT', 8000),
  corsOrigin: process.env.CORS_ORIGIN || '*',
  configFile: process.env.CONFIG_FILE || 'config.json',
  rateLimit: {
    // 写操作（增删改）
    write: {
      windowMs: intFromEnv('WRITE_RATE_LIMIT_WINDOW_MS', 60 * 1000),
      max: intFromEnv('WRITE_RATE_LIMIT_MAX', 120),
    },
  },
};

/**
 * 启动前检查配置
 */
export function validateConfig(target: AppConfig = config): void {
  const errors: string[] = [];

  if (!Number.isInteger(target.port) || target.port < 0 || target.port > 65535) {
    errors.push('PORT must be an integer between 0 and 65535');
  }

  if (!target.configFile.trim()) {
    errors.push('CONFIG_FILE must not be empty');
  }

  const { windowMs, max } = target.rateLimit.write;
  if (!Number.isInteger(windowMs) || windowMs <= 0) {
    errors.push('WRITE_RATE_LIMIT_WINDOW_MS must be a positive integer');
  }
  if (!Number.isInteger(max) || max <= 0) {
    errors.push('WRITE_RATE_LIMIT_MAX must be a positive integer');
  }

  if (errors.length > 0) {
    throw new Error(`配置错误:\n  ${errors.join('\n  ')}`);
  }
}
