import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import os from 'os';
import { ConfigService, resolveRuntimePaths } from './config-service.js';
import { ConfigError } from '../utils/errors.js';

let tmpDir: string;
let configPath: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sa-maker-config-'));
  configPath = path.join(tmpDir, 'config.json');
});

afterEach(async () => {
  await fs.remove(tmpDir);
});

describe('resolveRuntimePaths', () => {
  it('uses the default file names in the base directory', () => {
    expect(resolveRuntimePaths({}, '/work')).toEqual({
      configPath: '/work/config.json',
      logPath: '/work/activity.log',
      tokenPath: '/work/token.json',
    });
  });

  it('keeps absolute paths and resolves relative ones', () => {
    expect(resolveRuntimePaths({ configPath: '/etc/sa/config.json', tokenPath: 'secrets/token.json' }, '/work')).toEqual({
      configPath: '/etc/sa/config.json',
      logPath: '/work/activity.log',
      tokenPath: '/work/secrets/token.json',
    });
  });
});

describe('ConfigService', () => {
  it('writes a template and fails when the file is missing', async () => {
    await expect(new ConfigService(configPath).getConfig()).rejects.toBeInstanceOf(ConfigError);

    expect(await fs.readJSON(configPath)).toEqual({
      client_id: '',
      client_secret: '',
      project_name: '',
      service_account_folder: './service_accounts',
      redirect_uri: 'http://localhost',
      teamdrive_role: 'organizer',
    });
  });

  it('loads a complete configuration', async () => {
    await fs.writeJSON(configPath, {
      client_id: 'test-client-id',
      client_secret: 'test-secret',
      project_name: 'test-project',
      service_account_folder: 'keys',
      redirect_uri: 'http://localhost:8080',
      teamdrive_role: 'writer',
    });

    await expect(new ConfigService(configPath).getConfig()).resolves.toEqual({
      clientId: 'test-client-id',
      clientSecret: 'test-secret',
      projectName: 'test-project',
      serviceAccountFolder: path.join(tmpDir, 'keys'),
      redirectUri: 'http://localhost:8080',
      teamDriveRole: 'writer',
    });
  });

  it('falls back to the default redirect URI and role', async () => {
    await fs.writeJSON(configPath, {
      client_id: 'test-client-id',
      client_secret: 'test-secret',
      project_name: 'test-project',
      service_account_folder: '/srv/keys',
    });

    const config = await new ConfigService(configPath).getConfig();

    expect(config.redirectUri).toBe('http://localhost');
    expect(config.teamDriveRole).toBe('organizer');
    expect(config.serviceAccountFolder).toBe('/srv/keys');
  });

  it('lists every missing or empty required key', async () => {
    await fs.writeJSON(configPath, { client_id: 'test-client-id', client_secret: '  ', service_account_folder: 'keys' });

    const error: unknown = await new ConfigService(configPath).getConfig().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error instanceof ConfigError && error.details).toEqual({
      configPath,
      missing: ['client_secret', 'project_name'],
    });
  });

  it('rejects a file that is not valid JSON', async () => {
    await fs.writeFile(configPath, '{ client_id: ', 'utf8');

    await expect(new ConfigService(configPath).getConfig()).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a JSON array', async () => {
    await fs.writeJSON(configPath, ['test-client-id']);

    await expect(new ConfigService(configPath).getConfig()).rejects.toThrow('doit être un objet JSON');
  });
});
