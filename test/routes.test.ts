import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Server } from 'http';
import { mkdtemp, readFile, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { createApp } from '../src/app';
import { config, type AppConfig } from '../src/config';
import { ConfigFile, defaultConfig, type ConfigPersistence } from '../src/services/configFile';
import { ConfigStore } from '../src/services/configStore';
import type { ApiEnvelope, Authentication, CloudflareAccount, Settings, Zone } from '../src/types';

const ZONE_ID = '0123456789abcdef0123456789abcdef';

interface ResponseData {
  account?: CloudflareAccount;
  accounts?: CloudflareAccount[];
  zone?: Zone;
  zones?: Zone[];
  auth?: Authentication;
  settings?: Settings;
  detail?: string;
}

interface TestResponse {
  status: number;
  body: ApiEnvelope<ResponseData>;
}

const testConfig: AppConfig = {
  ...config,
  rateLimit: { write: { windowMs: 60_000, max: 1000 } },
};

async function listen(store: ConfigStore, appConfig: AppConfig = testConfig) {
  const server = createApp(store, appConfig).listen(0, '127.0.0.1');
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));

  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }

  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server) {
  return new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
}

describe('HTTP API', () => {
  let dir: string;
  let file: ConfigFile;
  let server: Server;
  let baseUrl: string;

  async function request(method: string, url: string, body?: unknown, raw?: string): Promise<TestResponse> {
    const payload = raw ?? (body === undefined ? undefined : JSON.stringify(body));
    const res = await fetch(`${baseUrl}${url}`, {
      method,
      headers: payload === undefined ? undefined : { 'Content-Type': 'application/json' },
      body: payload,
    });
    return { status: res.status, body: JSON.parse(await res.text()) };
  }

  async function createAccount(token: string): Promise<CloudflareAccount> {
    const res = await request('POST', '/accounts', { authentication: { api_token: token }, zones: [] });
    const account = res.body.data?.account;
    if (!account) throw new Error(`account creation failed: ${res.body.message}`);
    return account;
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'ddns-api-'));
    file = new ConfigFile(path.join(dir, 'config.json'));
    ({ server, baseUrl } = await listen(await ConfigStore.open(file)));
  });

  afterEach(async () => {
    await close(server);
    await rm(dir, { recursive: true, force: true });
  });

  it('answers the health check', async () => {
    const res = await fetch(`${baseUrl}/health`);
    const body = JSON.parse(await res.text());
    expect(res.status).toBe(200);
    expect(body.status).toBe('ok');
  });

  describe('accounts', () => {
    it('creates an account and persists it', async () => {
      const res = await request('POST', '/accounts', {
        authentication: { api_token: 'tok1' },
        zones: [],
      });

      expect(res.status).toBe(200);
      expect(res.body.error).toBe(false);
      expect(res.body.message).toBe('Account added successfully');

      const account = res.body.data?.account;
      expect(account?.id).toEqual(expect.any(String));
      expect(account?.id).not.toBe('');

      const onDisk = (await file.load()).config;
      expect(onDisk.cloudflare).toEqual([
        { id: account?.id, authentication: { api_token: 'tok1', api_key: null }, zones: [] },
      ]);
    });

    it('rejects a duplicate token with 400', async () => {
      await createAccount('tok1');

      const res = await request('POST', '/accounts', { authentication: { api_token: 'tok1' }, zones: [] });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        error: true,
        data: { detail: 'API Token already exists' },
        message: 'API Token already exists',
      });
    });

    it('rejects unknown fields with 422', async () => {
      const res = await request('POST', '/accounts', {
        authentication: { api_token: 'tok1' },
        zones: [],
        nickname: 'home',
      });

      expect(res.status).toBe(422);
      expect(res.body.message).toBe("Unrecognized key(s) in object: 'nickname'");
      expect(res.body.data?.detail).toBe("Unrecognized key(s) in object: 'nickname'");
    });

    it('rejects malformed JSON with 422', async () => {
      const res = await request('POST', '/accounts', undefined, '{"authentication":');
      expect(res.status).toBe(422);
      expect(res.body.error).toBe(true);
      expect(res.body.message).toMatch(/^Invalid JSON body: /);
    });

    it('lists, gets, updates and deletes accounts', async () => {
      const first = await createAccount('tok1');
      const second = await createAccount('tok2');

      const list = await request('GET', '/accounts');
      expect(list.body.data?.accounts?.map((a) => a.id)).toEqual([first.id, second.id]);

      const got = await request('GET', `/accounts/${first.id}`);
      expect(got.body.data?.account).toEqual(first);

      const updated = await request('PUT', `/accounts/${first.id}`, {
        id: 'forged',
        authentication: { api_token: 'tok1-new' },
      });
      expect(updated.status).toBe(200);
      expect(updated.body.data?.account?.id).toBe(first.id);
      expect(updated.body.data?.account?.authentication.api_token).toBe('tok1-new');

      const deleted = await request('DELETE', `/accounts/${second.id}`);
      expect(deleted.status).toBe(200);
      expect(deleted.body).toEqual({ error: false, data: null, message: 'Account deleted successfully' });

      const after = await request('GET', '/accounts');
      expect(after.body.data?.accounts?.map((a) => a.id)).toEqual([first.id]);
    });

    it('returns 404 for unknown accounts and leaves the list unchanged', async () => {
      await createAccount('tok1');

      const missing = await request('GET', '/accounts/nope');
      expect(missing.status).toBe(404);
      expect(missing.body.message).toBe('Account not found');

      const deleted = await request('DELETE', '/accounts/nope');
      expect(deleted.status).toBe(404);
      expect((await request('GET', '/accounts')).body.data?.accounts).toHaveLength(1);
    });

    it('replaces authentication only', async () => {
      const account = await createAccount('tok1');

      const res = await request('PUT', `/accounts/${account.id}/auth`, {
        api_token: 'tok1',
        api_key: { api_key: 'test-key', account_email: 'ops@example.com' },
      });

      expect(res.status).toBe(200);
      expect(res.body.message).toBe('Authentication updated successfully');
      expect(res.body.data?.auth).toEqual({
        api_token: 'tok1',
        api_key: { api_key: 'test-key', account_email: 'ops@example.com' },
      });
    });
  });

  describe('zones', () => {
    it('walks a zone through its lifecycle', async () => {
      const account = await createAccount('tok1');
      const base = `/accounts/${account.id}/zones`;

      const created = await request('POST', base, {
        zone_id: ZONE_ID,
        domain: 'example.com',
        subdomains: [{ name: '@', proxied: true, ttl: 300 }, { name: 'home' }],
      });
      expect(created.status).toBe(200);
      const zone = created.body.data?.zone;
      if (!zone) throw new Error('zone missing from response');
      expect(zone.subdomains.map((s) => s.name)).toEqual(['@', 'home']);

      const list = await request('GET', base);
      expect(list.body.data?.zones).toEqual([zone]);

      const updated = await request('PUT', `${base}/${zone.id}`, {
        id: 'forged',
        zone_id: ZONE_ID,
        domain: 'example.com',
        subdomains: [{ name: 'vpn', ttl: 120 }],
      });
      expect(updated.status).toBe(200);
      expect(updated.body.data?.zone?.id).toBe(zone.id);
      expect(updated.body.data?.zone?.subdomains.map((s) => s.name)).toEqual(['vpn']);

      const deleted = await request('DELETE', `${base}/${zone.id}`);
      expect(deleted.body).toEqual({ error: false, data: null, message: 'Zone deleted successfully' });

      const gone = await request('GET', `${base}/${zone.id}`);
      expect(gone.status).toBe(404);
      expect(gone.body.message).toBe('Zone not found');
    });

    it('rejects a duplicate zone id in the same account', async () => {
      const account = await createAccount('tok1');
      await request('POST', `/accounts/${account.id}/zones`, { zone_id: ZONE_ID, domain: 'example.com' });

      const res = await request('POST', `/accounts/${account.id}/zones`, { zone_id: ZONE_ID, domain: 'example.com' });
      expect(res.status).toBe(400);
      expect(res.body.message).toBe(`Zone ${ZONE_ID} already exists`);
    });

    it('rejects duplicate subdomain names with 400', async () => {
      const account = await createAccount('tok1');

      const res = await request('POST', `/accounts/${account.id}/zones`, {
        zone_id: ZONE_ID,
        domain: 'example.com',
        subdomains: [{ name: 'www' }, { name: 'www' }],
      });
      expect(res.status).toBe(400);
      expect(res.body.data?.detail).toBe('Duplicate subdomain name: www');
      expect((await request('GET', `/accounts/${account.id}/zones`)).body.data?.zones).toEqual([]);
    });

    it('rejects an invalid ttl with 422', async () => {
      const account = await createAccount('tok1');

      const res = await request('POST', `/accounts/${account.id}/zones`, {
        zone_id: ZONE_ID,
        domain: 'example.com',
        subdomains: [{ name: 'www', ttl: 1 }],
      });
      expect(res.status).toBe(422);
      expect(res.body.message).toBe("Field 'subdomains -> 0 -> ttl': TTL must be between 60 and 86400 seconds");
    });

    it('reports the missing account before the missing zone', async () => {
      const res = await request('GET', '/accounts/nope/zones/nope');
      expect(res.status).toBe(404);
      expect(res.body.message).toBe('Account not found');
    });
  });

  describe('settings', () => {
    it('reads and updates the update policy', async () => {
      const initial = await request('GET', '/settings');
      expect(initial.body.data?.settings).toEqual({ a: true, aaaa: true, purgeUnknownRecords: false, ttl: 300 });

      const updated = await request('PUT', '/settings', { purgeUnknownRecords: true });
      expect(updated.status).toBe(200);
      expect(updated.body.data?.settings).toEqual({ a: true, aaaa: true, purgeUnknownRecords: true, ttl: 300 });
      expect((await file.load()).config.purgeUnknownRecords).toBe(true);
    });
  });

  it('answers unknown routes with the envelope', async () => {
    const res = await request('GET', '/records');
    expect(res.status).toBe(404);
    expect(res.body).toEqual({
      error: true,
      data: { detail: 'Route GET /records not found' },
      message: 'Route GET /records not found',
    });
  });
});

describe('HTTP API failure modes', () => {
  let server: Server | undefined;

  afterEach(async () => {
    if (server) await close(server);
    server = undefined;
    vi.restoreAllMocks();
  });

  it('returns 500 when the configuration cannot be saved', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing: ConfigPersistence = {
      load: async () => ({ config: defaultConfig(), backfilled: 0 }),
      save: async () => {
        throw new Error('disk full');
      },
    };

    const started = await listen(await ConfigStore.open(failing));
    server = started.server;

    const res = await fetch(`${started.baseUrl}/accounts`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ authentication: { api_token: 'tok1' } }),
    });
    const body = JSON.parse(await res.text());

    expect(res.status).toBe(500);
    expect(body).toEqual({
      error: true,
      data: { detail: 'Failed to save configuration: disk full' },
      message: 'Failed to save configuration: disk full',
    });

    const list = JSON.parse(await (await fetch(`${started.baseUrl}/accounts`)).text());
    expect(list.data.accounts).toEqual([]);
  });

  it('rate limits writes', async () => {
    const store = await ConfigStore.open({
      load: async () => ({ config: defaultConfig(), backfilled: 0 }),
      save: async () => undefined,
    });
    const started = await listen(store, { ...testConfig, rateLimit: { write: { windowMs: 60_000, max: 2 } } });
    server = started.server;

    const statuses: number[] = [];
    for (const token of ['tok1', 'tok2', 'tok3']) {
      const res = await fetch(`${started.baseUrl}/accounts`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ authentication: { api_token: token } }),
      });
      statuses.push(res.status);
      await res.text();
    }

    expect(statuses).toEqual([200, 200, 429]);
    const reads = await fetch(`${started.baseUrl}/accounts`);
    expect(reads.status).toBe(200);
    await reads.text();
  });
});
