/**
 * @module types/auth
 * Définit les types liés au token OAuth2 persisté par le CLI.
 */

/**
 * Token OAuth2 tel qu’il est stocké sur disque.
 */
export interface Credential {
  /** Token d’accès envoyé en `Bearer` aux API Google. */
  accessToken: string;
  /** Token de renouvellement (absent si Google ne l’a pas fourni). */
  refreshToken?: string;
  /** Timestamp (ms) d’expiration du token d’accès. */
  expiresAt?: number;
  /** Scopes accordés, séparés par des espaces. */
  scope?: string;
  tokenType?: string;
}

/**
 * États successifs du flux d’autorisation.
 */
export enum AuthState {
  UNAUTHENTICATED = "unauthenticated",
  AWAITING_CODE = "awaiting_code",
  AUTHENTICATED = "authenticated",
}

/**
 * Tout ce qui sait fournir un token d’accès valide.
 */
export interface AccessTokenProvider {
  getAccessToken(): Promise<string>;
}
