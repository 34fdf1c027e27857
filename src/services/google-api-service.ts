/**
 * @module services/google-api-service
 * Client REST des API IAM v1 et Drive v3.
 *
 * Chaque opération résout un `ApiResult` : les erreurs HTTP, réseau ou d’authentification
 * sont converties en `ApiFault`, et les réponses sont validées ici une fois pour toutes
 * (un compte sans `email`, une clé sans `privateKeyData`… sont des échecs `validation`).
 */

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { randomUUID } from 'crypto';
import { DRIVE_API_URL, IAM_API_URL } from '../config/cli-config.js';
import type { AccessTokenProvider } from '../types/auth.js';
import type {
  ApiFault,
  ApiResult,
  CloudApiClient,
  Permission,
  ServiceAccount,
  ServiceAccountKey,
  TeamDrive,
} from '../types/google.js';
import { describeError } from '../utils/errors.js';
import { toApiFault } from '../utils/http-utils.js';
import { isRecord, readString } from '../utils/json-utils.js';
import type { Logger } from '../utils/logger.js';

const PAGE_SIZE = 100;

export interface GoogleApiServiceOptions {
  projectName: string;
  teamDriveRole: string;
  http?: AxiosInstance;
  logger?: Logger;
}

export class GoogleApiService implements CloudApiClient {
  private readonly projectName: string;
  private readonly teamDriveRole: string;
  private readonly http: AxiosInstance;
  private readonly logger?: Logger;

  constructor(private readonly auth: AccessTokenProvider, options: GoogleApiServiceOptions) {
    this.projectName   = options.projectName;
    this.teamDriveRole = options.teamDriveRole;
    this.http          = options.http ?? axios.create({ timeout: 60000 });
    this.logger        = options.logger;
  }

  /* ──────────────────────────────── IAM ──────────────────────────────── */

  async createServiceAccount(accountId: string): Promise<ApiResult<ServiceAccount>> {
    const result = await this.request({
      method: 'POST',
      url: `${IAM_API_URL}/projects/${encodeURIComponent(this.projectName)}/serviceAccounts`,
      data: { accountId, serviceAccount: { displayName: accountId } },
    });
    if (!result.ok) return result;
    const account = toServiceAccount(result.value);
    return account
      ? success(account)
      : invalid(`Service account ${accountId} créé sans email ni uniqueId`, result.value);
  }

  async createServiceAccountKey(email: string): Promise<ApiResult<ServiceAccountKey>> {
    const result = await this.request({
      method: 'POST',
      url: `${IAM_API_URL}/projects/-/serviceAccounts/${encodeURIComponent(email)}/keys`,
      data: { privateKeyType: 'TYPE_GOOGLE_CREDENTIALS_FILE', keyAlgorithm: 'KEY_ALG_RSA_2048' },
    });
    if (!result.ok) return result;
    const body = result.value;
    if (!isRecord(body)) return invalid(`Clé de ${email} : réponse inattendue`, body);
    const name = readString(body, 'name');
    const privateKeyData = readString(body, 'privateKeyData');
    if (!name || !privateKeyData) {
      return invalid(`Clé de ${email} renvoyée sans privateKeyData`, body);
    }
    return success({ ...body, name, privateKeyData });
  }

  async listServiceAccounts(): Promise<ApiResult<ServiceAccount[]>> {
    return this.collectPages(
      { method: 'GET', url: `${IAM_API_URL}/projects/${encodeURIComponent(this.projectName)}/serviceAccounts` },
      'accounts',
      toServiceAccount,
    );
  }

  /* ─────────────────────────────── Drive ─────────────────────────────── */

  async listTeamDrives(): Promise<ApiResult<TeamDrive[]>> {
    return this.collectPages(
      { method: 'GET', url: `${DRIVE_API_URL}/drives`, params: { fields: 'nextPageToken, drives(id, name)' } },
      'drives',
      toTeamDrive,
    );
  }

  async createTeamDrive(name: string): Promise<ApiResult<TeamDrive>> {
    const result = await this.request({
      method: 'POST',
      url: `${DRIVE_API_URL}/drives`,
      // requestId rend la création idempotente côté Drive
      params: { requestId: randomUUID() },
      data: { name },
    });
    if (!result.ok) return result;
    const drive = toTeamDrive(result.value);
    return drive ? success(drive) : invalid(`Team drive ${name} créée sans id`, result.value);
  }

  async listTeamDrivePermissions(driveId: string): Promise<ApiResult<Permission[]>> {
    return this.collectPages(
      {
        method: 'GET',
        url: `${DRIVE_API_URL}/files/${encodeURIComponent(driveId)}/permissions`,
        params: { supportsAllDrives: true, fields: 'nextPageToken, permissions(id, type, role, emailAddress)' },
      },
      'permissions',
      toPermission,
    );
  }

  async grantTeamDriveAccess(driveId: string, email: string): Promise<ApiResult<Permission>> {
    const result = await this.request({
      method: 'POST',
      url: `${DRIVE_API_URL}/files/${encodeURIComponent(driveId)}/permissions`,
      params: { supportsAllDrives: true, sendNotificationEmail: false },
      data: { role: this.teamDriveRole, type: 'user', emailAddress: email },
    });
    if (!result.ok) return result;
    const permission = toPermission(result.value);
    return permission ? success(permission) : invalid(`Permission pour ${email} renvoyée sans id`, result.value);
  }

  /* ────────────────────────────── Transport ────────────────────────────── */

  /**
   * Exécute une requête authentifiée. Ne lève jamais : tout échec devient un `ApiFault`.
   */
  private async request(config: AxiosRequestConfig): Promise<ApiResult<unknown>> {
    let token: string;
    try {
      token = await this.auth.getAccessToken();
    } catch (error) {
      return failure({ kind: 'auth', message: describeError(error) });
    }

    this.logger?.trace(`${config.method ?? 'GET'} ${config.url} ${config.params ? JSON.stringify(config.params) : ''}`);
    try {
      const resp = await this.http.request<unknown>({
        ...config,
        headers: { Authorization: `Bearer ${token}` },
      });
      return success(resp.data);
    } catch (error) {
      const fault = toApiFault(error);
      this.logger?.debug(`${config.method ?? 'GET'} ${config.url} → ${fault.status ?? fault.kind} ${fault.message}`);
      return failure(fault);
    }
  }

  /**
   * Parcourt toutes les pages d’une liste (`nextPageToken`) et valide chaque élément.
   */
  private async collectPages<T>(
    config: AxiosRequestConfig,
    field: string,
    parse: (item: unknown) => T | undefined,
  ): Promise<ApiResult<T[]>> {
    const items: T[] = [];
    let pageToken: string | undefined;
    do {
      const result = await this.request({
        ...config,
        params: { ...config.params, pageSize: PAGE_SIZE, ...(pageToken ? { pageToken } : {}) },
      });
      if (!result.ok) return result;
      const body = result.value;
      if (!isRecord(body)) return invalid(`Liste ${field} : réponse inattendue`, body);

      const page = body[field] ?? [];
      if (!Array.isArray(page)) return invalid(`Liste ${field} : champ ${field} invalide`, body);
      for (const raw of page) {
        const item = parse(raw);
        if (item === undefined) return invalid(`Liste ${field} : élément incomplet`, raw);
        items.push(item);
      }
      pageToken = readString(body, 'nextPageToken');
    } while (pageToken);
    return success(items);
  }
}

function success<T>(value: T): ApiResult<T> {
  return { ok: true, value };
}

function failure(error: ApiFault): { ok: false; error: ApiFault } {
  return { ok: false, error };
}

function invalid(message: string, payload: unknown): { ok: false; error: ApiFault } {
  return failure({ kind: 'validation', message, payload });
}

function toServiceAccount(raw: unknown): ServiceAccount | undefined {
  if (!isRecord(raw)) return undefined;
  const email = readString(raw, 'email');
  const uniqueId = readString(raw, 'uniqueId');
  if (!email || !uniqueId) return undefined;
  return {
    name:        readString(raw, 'name') ?? email,
    email,
    uniqueId,
    displayName: readString(raw, 'displayName'),
    projectId:   readString(raw, 'projectId'),
  };
}

function toTeamDrive(raw: unknown): TeamDrive | undefined {
  if (!isRecord(raw)) return undefined;
  const id = readString(raw, 'id');
  if (!id) return undefined;
  return { id, name: readString(raw, 'name') ?? '' };
}

function toPermission(raw: unknown): Permission | undefined {
  if (!isRecord(raw)) return undefined;
  const id = readString(raw, 'id');
  if (!id) return undefined;
  return {
    id,
    type:         readString(raw, 'type') ?? 'user',
    role:         readString(raw, 'role') ?? '',
    emailAddress: readString(raw, 'emailAddress'),
  };
}
