import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import os from 'os';
import { CredentialStore } from './credential-store.js';
import type { Credential } from '../types/auth.js';

let tmpDir: string;
let tokenPath: string;

const credential: Credential = {
  accessToken: 'test-access',
  refreshToken: 'test-refresh',
  expiresAt: 1700000000000,
  scope: 'https://www.googleapis.com/auth/drive',
  tokenType: 'Bearer',
};

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sa-maker-store-'));
  tokenPath = path.join(tmpDir, 'nested', 'token.json');
});

afterEach(async () => {
  await fs.remove(tmpDir);
});

describe('CredentialStore', () => {
  it('returns undefined when no token has been saved', async () => {
    const store = new CredentialStore(tokenPath);

    await expect(store.load()).resolves.toBeUndefined();
    await expect(store.exists()).resolves.toBe(false);
  });

  it('saves the credential as pretty JSON, creating the directory', async () => {
    const store = new CredentialStore(tokenPath);

    await store.save(credential);

    expect(await fs.readFile(tokenPath, 'utf8')).toBe(`${JSON.stringify(credential, null, 2)}\n`);
    await expect(store.load()).resolves.toEqual(credential);
    await expect(store.exists()).resolves.toBe(true);
  });

  it('treats a corrupt file as absent', async () => {
    await fs.outputFile(tokenPath, '{ not json');
    const store = new CredentialStore(tokenPath);

    await expect(store.load()).resolves.toBeUndefined();
    await expect(store.exists()).resolves.toBe(false);
  });

  it('treats a file without access token as absent', async () => {
    await fs.outputJSON(tokenPath, { refreshToken: 'test-refresh' });

    await expect(new CredentialStore(tokenPath).load()).resolves.toBeUndefined();
  });

  it('drops fields with an unexpected type', async () => {
    await fs.outputJSON(tokenPath, { accessToken: 'test-access', expiresAt: 'tomorrow' });

    await expect(new CredentialStore(tokenPath).load()).resolves.toEqual({ accessToken: 'test-access' });
  });

  it('clears the stored token', async () => {
    const store = new CredentialStore(tokenPath);
    await store.save(credential);

    await store.clear();

    expect(await fs.pathExists(tokenPath)).toBe(false);
  });
});
