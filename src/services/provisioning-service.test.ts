import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import os from 'os';
import { ProvisioningService, formatAccountId, validateAccountPrefix } from './provisioning-service.js';
import { FakeCloudApi, accountEmail } from '../testing/fake-cloud-api.js';
import { createRecordingLogger } from '../testing/recording-logger.js';
import { ApiError, FilesystemError, ProvisioningAbortedError, ValidationError } from '../utils/errors.js';

let tmpDir: string;
let api: FakeCloudApi;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sa-maker-provision-'));
  api = new FakeCloudApi();
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.remove(tmpDir);
});

function createService(client: FakeCloudApi = api) {
  const { logger, lines } = createRecordingLogger();
  return { service: new ProvisioningService(client, logger), lines };
}

describe('formatAccountId', () => {
  it('pads the account number to six digits', () => {
    expect(formatAccountId('svc', 0)).toBe('svc000000');
    expect(formatAccountId('svc', 42)).toBe('svc000042');
    expect(formatAccountId('svc', 1234567)).toBe('svc1234567');
  });
});

describe('validateAccountPrefix', () => {
  it('accepts a lowercase prefix', () => {
    expect(() => validateAccountPrefix('svc')).not.toThrow();
    expect(() => validateAccountPrefix('team-a')).not.toThrow();
  });

  it('rejects prefixes that IAM would refuse', () => {
    expect(() => validateAccountPrefix('Svc')).toThrow(ValidationError);
    expect(() => validateAccountPrefix('1svc')).toThrow(ValidationError);
    expect(() => validateAccountPrefix('svc_a')).toThrow(ValidationError);
    expect(() => validateAccountPrefix('')).toThrow(ValidationError);
    expect(() => validateAccountPrefix('a'.repeat(25))).toThrow(ValidationError);
  });
});

describe('ProvisioningService.provisionAccounts', () => {
  it('numbers accounts after the keys of previous runs', async () => {
    const { service } = createService();

    const first = await service.provisionAccounts({ prefix: 'svc', amount: 3, folder: tmpDir });
    const second = await service.provisionAccounts({ prefix: 'svc', amount: 2, folder: tmpDir });

    expect(first.start).toBe(0);
    expect(second.start).toBe(3);
    expect(second.directory).toBe(path.join(tmpDir, 'svc'));
    expect(second.created).toEqual([
      { accountNumber: 3, accountId: 'svc000003', email: accountEmail('svc000003'), keyPath: path.join(tmpDir, 'svc', '3.json') },
      { accountNumber: 4, accountId: 'svc000004', email: accountEmail('svc000004'), keyPath: path.join(tmpDir, 'svc', '4.json') },
    ]);
    expect((await fs.readdir(path.join(tmpDir, 'svc'))).sort()).toEqual(['0.json', '1.json', '2.json', '3.json', '4.json']);
    expect(api.accounts.map((account) => account.displayName)).toEqual([
      'svc000000',
      'svc000001',
      'svc000002',
      'svc000003',
      'svc000004',
    ]);
  });

  it('stores each key exactly as returned by the API', async () => {
    const { service } = createService();

    await service.provisionAccounts({ prefix: 'svc', amount: 1, folder: tmpDir });

    expect(await fs.readJSON(path.join(tmpDir, 'svc', '0.json'))).toEqual(api.keys[0]);
  });

  it('creates the account before its key, one account at a time', async () => {
    const { service } = createService();

    await service.provisionAccounts({ prefix: 'svc', amount: 2, folder: tmpDir });

    expect(api.calls).toEqual([
      'createServiceAccount:svc000000',
      `createServiceAccountKey:${accountEmail('svc000000')}`,
      'createServiceAccount:svc000001',
      `createServiceAccountKey:${accountEmail('svc000001')}`,
    ]);
  });

  it('continues after the highest existing key number', async () => {
    await fs.ensureDir(path.join(tmpDir, 'svc'));
    await fs.writeJSON(path.join(tmpDir, 'svc', '7.json'), {});
    const { service } = createService();

    const report = await service.provisionAccounts({ prefix: 'svc', amount: 1, folder: tmpDir });

    expect(report.created.map((account) => account.accountId)).toEqual(['svc000008']);
  });

  it('stops at the first failed account and keeps the keys already written', async () => {
    api.failOn('createServiceAccount', 'svc000001', { kind: 'api', status: 403, message: 'Permission denied' });
    const { service } = createService();

    const error: unknown = await service
      .provisionAccounts({ prefix: 'svc', amount: 3, folder: tmpDir })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProvisioningAbortedError);
    if (!(error instanceof ProvisioningAbortedError)) return;
    expect(error.failedNumber).toBe(1);
    expect(error.created).toEqual([accountEmail('svc000000')]);
    expect(error.cause).toBeInstanceOf(ApiError);
    expect(api.calls).not.toContain('createServiceAccount:svc000002');
    expect(await fs.readdir(path.join(tmpDir, 'svc'))).toEqual(['0.json']);

    const retry = await createService(new FakeCloudApi()).service.provisionAccounts({ prefix: 'svc', amount: 1, folder: tmpDir });
    expect(retry.start).toBe(1);
  });

  it('writes no key file when the key creation fails', async () => {
    api.failOn('createServiceAccountKey', accountEmail('svc000000'), { kind: 'api', status: 429, message: 'Quota exceeded' });
    const { service } = createService();

    const error: unknown = await service
      .provisionAccounts({ prefix: 'svc', amount: 2, folder: tmpDir })
      .catch((e: unknown) => e);

    expect(error instanceof ProvisioningAbortedError && error.failedNumber).toBe(0);
    expect(error instanceof ProvisioningAbortedError && error.created).toEqual([]);
    expect(await fs.readdir(path.join(tmpDir, 'svc'))).toEqual([]);
  });

  it('reports a key that cannot be written', async () => {
    vi.spyOn(fs, 'writeJSON').mockRejectedValueOnce(new Error('disk full'));
    const { service } = createService();

    const error: unknown = await service
      .provisionAccounts({ prefix: 'svc', amount: 1, folder: tmpDir })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProvisioningAbortedError);
    expect(error instanceof ProvisioningAbortedError && error.cause).toBeInstanceOf(FilesystemError);
  });

  it('validates the request before calling the API', async () => {
    const { service } = createService();

    await expect(service.provisionAccounts({ prefix: 'svc', amount: 0, folder: tmpDir })).rejects.toBeInstanceOf(ValidationError);
    await expect(service.provisionAccounts({ prefix: 'svc', amount: 1.5, folder: tmpDir })).rejects.toBeInstanceOf(ValidationError);
    await expect(service.provisionAccounts({ prefix: 'SVC', amount: 1, folder: tmpDir })).rejects.toBeInstanceOf(ValidationError);
    expect(api.calls).toEqual([]);
    expect(await fs.pathExists(path.join(tmpDir, 'SVC'))).toBe(false);
  });

  it('logs each created account and key', async () => {
    const { service, lines } = createService();

    await service.provisionAccounts({ prefix: 'svc', amount: 1, folder: tmpDir });

    expect(lines).toEqual([
      `Dossier des clés : ${path.join(tmpDir, 'svc')}`,
      'Création de 1 service account(s) à partir du numéro 0…',
      `Service account créé : ${accountEmail('svc000000')}`,
      `✅ Clé de ${accountEmail('svc000000')} enregistrée : ${path.join(tmpDir, 'svc', '0.json')}`,
    ]);
  });
});
