import crypto from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { configSchema } from '../schemas/config';
import type { Config } from '../types';
import { InternalError, errorMessage } from '../utils/errors';
import { validateConfigDocument } from './validation';

export interface LoadedConfig {
  config: Config;
  /** 补全的 id 数量 */
  backfilled: number;
}

/**
 * 配置的持久化接口，ConfigStore 只依赖于此
 */
export interface ConfigPersistence {
  load(): Promise<LoadedConfig>;
  save(config: Config): Promise<void>;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function children(parent: JsonObject, key: string): JsonObject[] {
  const value = parent[key];
  return Array.isArray(value) ? value.filter(isObject) : [];
}

function ensureId(entity: JsonObject): number {
  const id = entity.id;
  if (id === undefined || id === null || id === '') {
    entity.id = crypto.randomUUID();
    return 1;
  }
  return 0;
}

/**
 * 旧版配置文件中的账户、Zone、子域名可能没有 id，就地补全
 */
export function backfillIds(document: unknown): number {
  if (!isObject(document)) return 0;

  let count = 0;
  for (const account of children(document, 'cloudflare')) {
    count += ensureId(account);
    for (const zone of children(account, 'zones')) {
      count += ensureId(zone);
      for (const subdomain of children(zone, 'subdomains')) {
        count += ensureId(subdomain);
      }
    }
  }
  return count;
}

export function defaultConfig(): Config {
  return configSchema.parse({});
}

export function serializeConfig(config: Config): string {
  return `${JSON.stringify(config, null, 2)}\n`;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * JSON 配置文件，写入时先写临时文件再 rename
 */
export class ConfigFile implements ConfigPersistence {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  async load(): Promise<LoadedConfig> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { config: defaultConfig(), backfilled: 0 };
      }
      throw new InternalError(`Failed to read ${this.filePath}: ${errorMessage(error)}`);
    }

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch (error) {
      throw new InternalError(`Invalid JSON in ${this.filePath}: ${errorMessage(error)}`);
    }

    const backfilled = backfillIds(document);
    const result = validateConfigDocument(document);
    if (!result.ok) {
      throw new InternalError(`Invalid configuration in ${this.filePath}: ${result.error.message}`);
    }

    return { config: result.value, backfilled };
  }

  async save(config: Config): Promise<void> {
    const tempPath = `${this.filePath}.tmp`;
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    try {
      await fs.writeFile(tempPath, serializeConfig(config), 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
