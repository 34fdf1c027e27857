/**
 * @module types/cli-config
 * Définit la configuration du CLI (config.json) et les chemins d’exécution.
 */

/**
 * Contenu brut de config.json (clés snake_case).
 */
export interface RawMakerConfig {
  client_id?: string;
  client_secret?: string;
  project_name?: string;
  service_account_folder?: string;
  redirect_uri?: string;
  teamdrive_role?: string;
}

/**
 * Identifiants du client OAuth2 utilisés pour construire l’URL de consentement.
 */
export interface OAuthClientConfig {
  clientId: string;
  clientSecret: string;
  projectName: string;
  redirectUri: string;
}

/**
 * Configuration complète, validée, consommée en lecture seule par les services.
 */
export interface MakerConfig extends OAuthClientConfig {
  /** Dossier racine des clés (chemin absolu). */
  serviceAccountFolder: string;
  /** Rôle accordé aux service accounts sur une team drive. */
  teamDriveRole: string;
}

/**
 * Chemins résolus à partir des options globales / variables d’environnement.
 */
export interface RuntimePaths {
  configPath: string;
  logPath: string;
  tokenPath: string;
}
