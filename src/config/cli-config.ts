import type { RawMakerConfig } from "../types/cli-config.js";

/**
 * Préfixe des variables d’environnement lues par le CLI.
 */
export const ENV_PREFIX = "SA_MAKER";

/**
 * Fichiers par défaut, relatifs au dossier courant.
 */
export const DEFAULT_CONFIG_FILE = "config.json";
export const DEFAULT_LOG_FILE = "activity.log";
export const DEFAULT_TOKEN_FILE = "token.json";

/** Redirection loopback : le code est à copier depuis la barre d’adresse. */
export const DEFAULT_REDIRECT_URI = "http://localhost";

/** Rôle "Gestionnaire" d’un drive partagé. */
export const DEFAULT_TEAMDRIVE_ROLE = "organizer";

/**
 * Scopes demandés lors de l’autorisation : IAM (via cloud-platform) et Drive.
 */
export const GOOGLE_SCOPES = [
  "https://www.googleapis.com/auth/cloud-platform",
  "https://www.googleapis.com/auth/drive",
];

export const GOOGLE_AUTH_URL = "https://accounts.google.com/o/oauth2/v2/auth";
export const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";
export const IAM_API_URL = "https://iam.googleapis.com/v1";
export const DRIVE_API_URL = "https://www.googleapis.com/drive/v3";

/** Premier numéro de compte d’un dossier vide. */
export const ACCOUNT_NUMBER_BASE = 0;

/** Nombre de chiffres du suffixe numérique des comptes. */
export const ACCOUNT_NUMBER_DIGITS = 6;

/**
 * Configuration écrite lorsque config.json est absent, à compléter par l’utilisateur.
 */
export const defaultMakerConfig: RawMakerConfig = {
  client_id: "",
  client_secret: "",
  project_name: "",
  service_account_folder: "./service_accounts",
  redirect_uri: DEFAULT_REDIRECT_URI,
  teamdrive_role: DEFAULT_TEAMDRIVE_ROLE,
};
