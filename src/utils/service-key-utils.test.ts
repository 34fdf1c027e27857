import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs-extra';
import * as path from 'path';
import os from 'os';
import { getServiceAccountUsers, getServiceKeyEmail, keyFileName, writeServiceKey } from './service-key-utils.js';
import { FilesystemError, ValidationError } from './errors.js';
import { resolveStart } from '../services/account-numbering-service.js';
import { accountEmail, buildKey } from '../testing/fake-cloud-api.js';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sa-maker-keys-'));
});

afterEach(async () => {
  await fs.remove(tmpDir);
});

describe('getServiceKeyEmail', () => {
  it('reads client_email from the encoded credentials file', () => {
    const email = accountEmail('svc000000');

    expect(getServiceKeyEmail(buildKey(email, 'key-0'))).toBe(email);
  });

  it('falls back to the email in the key resource name', () => {
    const key = {
      name: 'projects/test-project/serviceAccounts/svc000001%40test-project.iam.gserviceaccount.com/keys/key-1',
      privateKeyData: Buffer.from('not json').toString('base64'),
    };

    expect(getServiceKeyEmail(key)).toBe('svc000001@test-project.iam.gserviceaccount.com');
  });

  it('returns undefined when nothing identifies the account', () => {
    expect(getServiceKeyEmail({ name: 'projects/test-project/keys/key-1' })).toBeUndefined();
    expect(getServiceKeyEmail('svc000000')).toBeUndefined();
  });
});

describe('writeServiceKey', () => {
  it('writes the key as indented JSON', async () => {
    const key = buildKey(accountEmail('svc000000'), 'key-0');
    const filePath = path.join(tmpDir, keyFileName(0));

    await writeServiceKey(filePath, key);

    expect(await fs.readFile(filePath, 'utf8')).toBe(`${JSON.stringify(key, null, 2)}\n`);
  });

  it('never overwrites an existing key file', async () => {
    const filePath = path.join(tmpDir, '0.json');
    await fs.writeFile(filePath, 'existing', 'utf8');

    await expect(writeServiceKey(filePath, buildKey(accountEmail('svc000000'), 'key-0'))).rejects.toBeInstanceOf(
      FilesystemError,
    );
    expect(await fs.readFile(filePath, 'utf8')).toBe('existing');
  });
});

describe('getServiceAccountUsers', () => {
  it('lists the accounts in numeric file order without duplicates', async () => {
    for (const [file, id] of [['10.json', 'svc000010'], ['2.json', 'svc000002'], ['1.json', 'svc000001'], ['3.json', 'svc000002']]) {
      await fs.writeJSON(path.join(tmpDir, file), buildKey(accountEmail(id), `key-${file}`));
    }
    await fs.writeFile(path.join(tmpDir, 'notes.txt'), 'ignored', 'utf8');

    await expect(getServiceAccountUsers(tmpDir)).resolves.toEqual([
      accountEmail('svc000001'),
      accountEmail('svc000002'),
      accountEmail('svc000010'),
    ]);
  });

  it('ignores JSON files that are not numbered key files', async () => {
    await fs.writeJSON(path.join(tmpDir, '0.json'), buildKey(accountEmail('svc000000'), 'key-0'));
    await fs.writeJSON(path.join(tmpDir, 'notes.json'), { comment: 'à partager vendredi' });
    await fs.writeJSON(path.join(tmpDir, '1.json.bak'), buildKey(accountEmail('svc000009'), 'key-9'));

    await expect(getServiceAccountUsers(tmpDir)).resolves.toEqual([accountEmail('svc000000')]);
    await expect(resolveStart(tmpDir)).resolves.toBe(1);
  });

  it('returns an empty list for an empty folder', async () => {
    await expect(getServiceAccountUsers(tmpDir)).resolves.toEqual([]);
  });

  it('fails on a missing folder', async () => {
    await expect(getServiceAccountUsers(path.join(tmpDir, 'missing'))).rejects.toBeInstanceOf(FilesystemError);
  });

  it('fails on an unreadable key file', async () => {
    await fs.writeFile(path.join(tmpDir, '0.json'), '{', 'utf8');

    await expect(getServiceAccountUsers(tmpDir)).rejects.toBeInstanceOf(FilesystemError);
  });

  it('fails on a key without identity', async () => {
    await fs.writeJSON(path.join(tmpDir, '0.json'), { type: 'service_account' });

    await expect(getServiceAccountUsers(tmpDir)).rejects.toBeInstanceOf(ValidationError);
  });
});
