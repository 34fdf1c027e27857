/**
 * @module services/credential-store
 * Persistance du token OAuth2 dans un fichier JSON.
 */

import fs from 'fs-extra';
import * as path from 'path';
import { mkdirp } from 'mkdirp';
import type { Credential } from '../types/auth.js';
import { isRecord, readNumber, readString } from '../utils/json-utils.js';

export class CredentialStore {
  constructor(private readonly tokenPath: string) {}

  public get path(): string {
    return this.tokenPath;
  }

  /**
   * Charge le token stocké.
   * @returns Le token, ou `undefined` si le fichier est absent, illisible ou corrompu.
   */
  public async load(): Promise<Credential | undefined> {
    if (!(await fs.pathExists(this.tokenPath))) {
      return undefined;
    }
    try {
      const data: unknown = await fs.readJSON(this.tokenPath);
      return toCredential(data);
    } catch {
      // fichier corrompu : traité comme absent, une nouvelle autorisation le réécrira
      return undefined;
    }
  }

  /** Sauvegarde le token sur disque. */
  public async save(credential: Credential): Promise<void> {
    await mkdirp(path.dirname(this.tokenPath));
    await fs.writeJSON(this.tokenPath, credential, { spaces: 2 });
  }

  public async exists(): Promise<boolean> {
    return (await this.load()) !== undefined;
  }

  /** Supprime le token stocké s’il existe. */
  public async clear(): Promise<void> {
    await fs.remove(this.tokenPath);
  }
}

function toCredential(data: unknown): Credential | undefined {
  if (!isRecord(data)) return undefined;
  const accessToken = readString(data, 'accessToken');
  if (!accessToken) return undefined;
  return {
    accessToken,
    refreshToken: readString(data, 'refreshToken'),
    expiresAt:    readNumber(data, 'expiresAt'),
    scope:        readString(data, 'scope'),
    tokenType:    readString(data, 'tokenType'),
  };
}
