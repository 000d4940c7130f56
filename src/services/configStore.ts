import crypto from 'crypto';
import type {
  AccountInput,
  Authentication,
  CloudflareAccount,
  Config,
  Settings,
  SubDomain,
  Zone,
  ZoneCreateInput,
  ZoneInput,
} from '../types';
import { ConflictError, InternalError, NotFoundError, errorMessage } from '../utils/errors';
import type { ConfigPersistence } from './configFile';
import {
  findCredentialConflict,
  unwrap,
  validateAccountInput,
  validateAuthentication,
  validateSettingsPatch,
  validateZoneCreate,
  validateZoneInput,
} from './validation';

type SubDomainDraft = Omit<SubDomain, 'id'> & { id?: string };
type ZoneDraft = Omit<Zone, 'id' | 'subdomains'> & { id?: string; subdomains: SubDomainDraft[] };

function newId(): string {
  return crypto.randomUUID();
}

function buildSubDomain(input: SubDomainDraft, id: string): SubDomain {
  return { id, name: input.name, proxied: input.proxied, ttl: input.ttl };
}

/**
 * 构造 Zone；fresh 为 true 时忽略传入的所有 id
 */
function buildZone(input: ZoneDraft, id: string, fresh: boolean): Zone {
  return {
    id,
    zone_id: input.zone_id,
    domain: input.domain,
    subdomains: input.subdomains.map((s) =>
      buildSubDomain(s, fresh ? newId() : s.id ?? newId())
    ),
  };
}

function buildAccount(input: AccountInput, id: string, fresh: boolean): CloudflareAccount {
  return {
    id,
    authentication: input.authentication,
    zones: input.zones.map((z) => buildZone(z, fresh ? newId() : z.id ?? newId(), fresh)),
  };
}

function pickSettings(config: Config): Settings {
  return {
    a: config.a,
    aaaa: config.aaaa,
    purgeUnknownRecords: config.purgeUnknownRecords,
    ttl: config.ttl,
  };
}

/**
 * 进程内唯一的配置树。
 *
 * 写操作串行执行：先在副本上修改，持久化成功后才替换当前树；
 * 读操作返回当前树的深拷贝。
 */
export class ConfigStore {
  private config: Config;
  private queue: Promise<void> = Promise.resolve();

  private constructor(private readonly persistence: ConfigPersistence, config: Config) {
    this.config = config;
  }

  static async open(persistence: ConfigPersistence): Promise<ConfigStore> {
    const { config, backfilled } = await persistence.load();
    if (backfilled > 0) {
      await persistence.save(config);
      console.log(`配置文件中补全了 ${backfilled} 个缺失的 id`);
    }
    return new ConfigStore(persistence, config);
  }

  private mutate<T>(apply: (draft: Config) => T): Promise<T> {
    const run = async (): Promise<T> => {
      const draft = structuredClone(this.config);
      const result = apply(draft);

      try {
        await this.persistence.save(draft);
      } catch (error) {
        throw new InternalError(`Failed to save configuration: ${errorMessage(error)}`);
      }

      this.config = draft;
      return result;
    };

    const pending = this.queue.then(run, run);
    this.queue = pending.then(
      () => undefined,
      () => undefined
    );
    return pending;
  }

  // ---- 账户 ----

  listAccounts(): CloudflareAccount[] {
    return structuredClone(this.config.cloudflare);
  }

  getAccount(accountId: string): CloudflareAccount {
    return structuredClone(findAccount(this.config, accountId));
  }

  async createAccount(candidate: unknown): Promise<CloudflareAccount> {
    const input = unwrap(validateAccountInput(candidate));

    return this.mutate((draft) => {
      const conflict = findCredentialConflict(input.authentication, draft.cloudflare);
      if (conflict) throw conflict;

      const account = buildAccount(input, newId(), true);
      draft.cloudflare.push(account);
      return structuredClone(account);
    });
  }

  /**
   * 整体替换账户内容，id 保持不变。与创建不同，这里不检查凭证是否与其它账户重复。
   */
  async updateAccount(accountId: string, candidate: unknown): Promise<CloudflareAccount> {
    const input = unwrap(validateAccountInput(candidate));

    return this.mutate((draft) => {
      const index = findAccountIndex(draft, accountId);
      const account = buildAccount(input, accountId, false);
      draft.cloudflare[index] = account;
      return structuredClone(account);
    });
  }

  async deleteAccount(accountId: string): Promise<void> {
    return this.mutate((draft) => {
      const index = findAccountIndex(draft, accountId);
      draft.cloudflare.splice(index, 1);
    });
  }

  async updateAuthentication(accountId: string, candidate: unknown): Promise<Authentication> {
    const auth = unwrap(validateAuthentication(candidate));

    return this.mutate((draft) => {
      const account = findAccount(draft, accountId);
      account.authentication = auth;
      return structuredClone(auth);
    });
  }

  // ---- Zone ----

  listZones(accountId: string): Zone[] {
    return structuredClone(findAccount(this.config, accountId).zones);
  }

  getZone(accountId: string, zoneId: string): Zone {
    const account = findAccount(this.config, accountId);
    return structuredClone(account.zones[findZoneIndex(account, zoneId)]);
  }

  async createZone(accountId: string, candidate: unknown): Promise<Zone> {
    const input: ZoneCreateInput = unwrap(validateZoneCreate(candidate));

    return this.mutate((draft) => {
      const account = findAccount(draft, accountId);
      if (account.zones.some((z) => z.zone_id === input.zone_id)) {
        throw new ConflictError(`Zone ${input.zone_id} already exists`);
      }

      const zone = buildZone(input, newId(), true);
      account.zones.push(zone);
      return structuredClone(zone);
    });
  }

  /**
   * 整体替换 Zone 内容，id 与 zone_id 都不允许变更
   */
  async updateZone(accountId: string, zoneId: string, candidate: unknown): Promise<Zone> {
    const input: ZoneInput = unwrap(validateZoneInput(candidate));

    return this.mutate((draft) => {
      const account = findAccount(draft, accountId);
      const index = findZoneIndex(account, zoneId);
      if (account.zones[index].zone_id !== input.zone_id) {
        throw new ConflictError('Zone ID cannot be changed');
      }

      const zone = buildZone(input, zoneId, false);
      account.zones[index] = zone;
      return structuredClone(zone);
    });
  }

  async deleteZone(accountId: string, zoneId: string): Promise<void> {
    return this.mutate((draft) => {
      const account = findAccount(draft, accountId);
      account.zones.splice(findZoneIndex(account, zoneId), 1);
    });
  }

  // ---- 全局设置 ----

  getSettings(): Settings {
    return pickSettings(this.config);
  }

  async updateSettings(candidate: unknown): Promise<Settings> {
    const patch = unwrap(validateSettingsPatch(candidate));

    return this.mutate((draft) => {
      if (patch.a !== undefined) draft.a = patch.a;
      if (patch.aaaa !== undefined) draft.aaaa = patch.aaaa;
      if (patch.purgeUnknownRecords !== undefined) draft.purgeUnknownRecords = patch.purgeUnknownRecords;
      if (patch.ttl !== undefined) draft.ttl = patch.ttl;
      return pickSettings(draft);
    });
  }
}

function findAccountIndex(config: Config, accountId: string): number {
  const index = config.cloudflare.findIndex((a) => a.id === accountId);
  if (index === -1) {
    throw new NotFoundError('Account not found');
  }
  return index;
}

function findAccount(config: Config, accountId: string): CloudflareAccount {
  return config.cloudflare[findAccountIndex(config, accountId)];
}

function findZoneIndex(account: CloudflareAccount, zoneId: string): number {
  const index = account.zones.findIndex((z) => z.id === zoneId);
  if (index === -1) {
    throw new NotFoundError('Zone not found');
  }
  return index;
}
