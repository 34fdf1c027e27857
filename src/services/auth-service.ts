/**
 * @module services/auth-service
 * Flux d’autorisation OAuth2 (URL de consentement → code → token) et
 * fourniture d’un `access_token` valide, renouvelé si besoin.
 */

import axios, { type AxiosInstance } from 'axios';
import { CredentialStore } from './credential-store.js';
import { GOOGLE_AUTH_URL, GOOGLE_SCOPES, GOOGLE_TOKEN_URL } from '../config/cli-config.js';
import { AuthState, type AccessTokenProvider, type Credential } from '../types/auth.js';
import type { OAuthClientConfig } from '../types/cli-config.js';
import { AuthExchangeError, AuthRequiredError } from '../utils/errors.js';
import { toApiFault, responsePayload } from '../utils/http-utils.js';
import { isRecord, readNumber, readString } from '../utils/json-utils.js';
import type { Logger } from '../utils/logger.js';

// marge avant expiration en dessous de laquelle le token est renouvelé
const EXPIRY_MARGIN_MS = 5000;
// durée de vie supposée si Google ne renvoie pas expires_in
const DEFAULT_TTL_SEC = 900;

export interface AuthServiceOptions {
  http?: AxiosInstance;
  logger?: Logger;
  now?: () => number;
}

/**
 * Construit l’URL de consentement Google. Aucun effet de bord.
 * `access_type=offline` et `prompt=consent` garantissent la présence d’un refresh token.
 */
export function buildAuthorizationUrl(client: OAuthClientConfig): string {
  const params = new URLSearchParams({
    client_id:     client.clientId,
    redirect_uri:  client.redirectUri,
    response_type: 'code',
    scope:         GOOGLE_SCOPES.join(' '),
    access_type:   'offline',
    prompt:        'consent',
    state:         client.projectName,
  });
  return `${GOOGLE_AUTH_URL}?${params.toString()}`;
}

/**
 * Accepte le code seul ou l’URL de redirection complète copiée depuis le navigateur.
 */
export function extractAuthorizationCode(input: string): string {
  const trimmed = input.trim();
  if (!/^https?:\/\//i.test(trimmed)) {
    return trimmed;
  }
  try {
    return new URL(trimmed).searchParams.get('code') ?? '';
  } catch {
    return trimmed;
  }
}

export class AuthService implements AccessTokenProvider {
  private state: AuthState = AuthState.UNAUTHENTICATED;
  private readonly http: AxiosInstance;
  private readonly logger?: Logger;
  private readonly now: () => number;

  constructor(
    private readonly client: OAuthClientConfig,
    private readonly store: CredentialStore,
    options: AuthServiceOptions = {},
  ) {
    this.http   = options.http ?? axios.create({ timeout: 30000 });
    this.logger = options.logger;
    this.now    = options.now ?? Date.now;
  }

  /**
   * `AUTHENTICATED` dès qu’un token est stocké, sinon l’état du flux en cours.
   */
  public async getState(): Promise<AuthState> {
    if (await this.store.exists()) {
      return AuthState.AUTHENTICATED;
    }
    return this.state;
  }

  /** Renvoie l’URL à visiter et passe en attente du code. */
  public beginAuthorization(): string {
    const url = buildAuthorizationUrl(this.client);
    this.state = AuthState.AWAITING_CODE;
    return url;
  }

  /**
   * Échange un code d’autorisation (à usage unique) contre un token, puis le stocke.
   * Aucun nouvel essai : un code refusé impose de relancer l’autorisation.
   * @throws AuthExchangeError si Google refuse le code ou ne renvoie pas d’access_token.
   */
  public async exchangeCode(input: string): Promise<Credential> {
    const code = extractAuthorizationCode(input);
    if (!code) {
      this.state = AuthState.UNAUTHENTICATED;
      throw new AuthExchangeError('Code d’autorisation vide.');
    }

    let data: unknown;
    try {
      const resp = await this.http.post(GOOGLE_TOKEN_URL, new URLSearchParams({
        code,
        client_id:     this.client.clientId,
        client_secret: this.client.clientSecret,
        redirect_uri:  this.client.redirectUri,
        grant_type:    'authorization_code',
      }));
      data = resp.data;
    } catch (error) {
      this.state = AuthState.UNAUTHENTICATED;
      throw new AuthExchangeError(`Échec de l’échange du code d’autorisation : ${toApiFault(error).message}`, {
        cause: error,
        details: { payload: responsePayload(error) },
      });
    }

    const credential = toCredential(data, undefined, this.now());
    if (!credential) {
      this.state = AuthState.UNAUTHENTICATED;
      throw new AuthExchangeError('La réponse du serveur ne contient pas d’access_token.', {
        details: { payload: data },
      });
    }

    await this.store.save(credential);
    this.state = AuthState.AUTHENTICATED;
    this.logger?.debug(`Token enregistré dans ${this.store.path}`);
    return credential;
  }

  /**
   * Renvoie un `access_token` valide (5s de marge), renouvelé via le refresh token si besoin.
   * Le token renouvelé est sauvegardé avant d’être renvoyé.
   * @throws AuthRequiredError si aucun token n’est stocké ou si le renouvellement échoue.
   */
  public async getAccessToken(): Promise<string> {
    const credential = await this.store.load();
    if (!credential) {
      throw new AuthRequiredError(`Aucun token valide dans ${this.store.path} : lancez \`sa-maker authorize\`.`);
    }

    // un token sans date d’expiration est traité comme expiré
    const now = this.now();
    if (credential.expiresAt !== undefined && now < credential.expiresAt - EXPIRY_MARGIN_MS) {
      return credential.accessToken;
    }

    if (!credential.refreshToken) {
      throw new AuthRequiredError('Token expiré et aucun refresh token disponible : lancez `sa-maker authorize`.');
    }

    const expiredAt = credential.expiresAt !== undefined ? new Date(credential.expiresAt).toISOString() : 'inconnu';
    this.logger?.debug(`Token expiré (${expiredAt}), renouvellement…`);
    let data: unknown;
    try {
      const resp = await this.http.post(GOOGLE_TOKEN_URL, new URLSearchParams({
        refresh_token: credential.refreshToken,
        client_id:     this.client.clientId,
        client_secret: this.client.clientSecret,
        grant_type:    'refresh_token',
      }));
      data = resp.data;
    } catch (error) {
      throw new AuthRequiredError(`Renouvellement du token impossible : ${toApiFault(error).message}`, {
        cause: error,
        details: { payload: responsePayload(error) },
      });
    }

    const refreshed = toCredential(data, credential.refreshToken, now);
    if (!refreshed) {
      throw new AuthRequiredError('Réponse de renouvellement sans access_token : lancez `sa-maker authorize`.', {
        details: { payload: data },
      });
    }
    await this.store.save(refreshed);
    this.logger?.debug(`Token renouvelé (valide jusqu’à ${new Date(refreshed.expiresAt).toISOString()}).`);
    return refreshed.accessToken;
  }
}

/**
 * Réponse du endpoint token → `Credential`. Google ne renvoie pas toujours le refresh token
 * lors d’un renouvellement : on conserve alors le précédent. Sans `expires_in`, le token
 * est considéré valide 15 minutes.
 */
function toCredential(
  data: unknown,
  previousRefreshToken: string | undefined,
  now: number,
): (Credential & { expiresAt: number }) | undefined {
  if (!isRecord(data)) return undefined;
  const accessToken = readString(data, 'access_token');
  if (!accessToken) return undefined;
  const expiresIn = readNumber(data, 'expires_in') ?? DEFAULT_TTL_SEC;
  return {
    accessToken,
    refreshToken: readString(data, 'refresh_token') ?? previousRefreshToken,
    expiresAt:    now + expiresIn * 1000,
    scope:        readString(data, 'scope'),
    tokenType:    readString(data, 'token_type'),
  };
}
