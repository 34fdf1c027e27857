/**
 * @module types/google
 * Contrat du client des API Google (IAM + Drive) utilisé par les workflows.
 */

/** Catégorie d’échec remontée par le client. */
export type ApiFaultKind = "api" | "validation" | "transport" | "auth";

/**
 * Détail d’un appel en échec. `payload` contient la réponse brute quand il y en a une.
 */
export interface ApiFault {
  kind: ApiFaultKind;
  message: string;
  status?: number;
  payload?: unknown;
}

/**
 * Résultat d’un appel : jamais d’exception pour une erreur d’API ordinaire.
 */
export type ApiResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ApiFault };

export interface ServiceAccount {
  /** Nom de ressource (projects/…/serviceAccounts/…). */
  name: string;
  email: string;
  uniqueId: string;
  displayName?: string;
  projectId?: string;
}

/**
 * Clé d’un service account, conservée telle que renvoyée par IAM.
 * `privateKeyData` est le fichier de credentials encodé en base64.
 */
export interface ServiceAccountKey {
  name: string;
  privateKeyData: string;
  [field: string]: unknown;
}

export interface TeamDrive {
  id: string;
  name: string;
}

export interface Permission {
  id: string;
  type: string;
  role: string;
  emailAddress?: string;
}

/**
 * Opérations attendues du client Google. Chaque méthode résout un `ApiResult`.
 */
export interface CloudApiClient {
  createServiceAccount(accountId: string): Promise<ApiResult<ServiceAccount>>;
  createServiceAccountKey(email: string): Promise<ApiResult<ServiceAccountKey>>;
  listServiceAccounts(): Promise<ApiResult<ServiceAccount[]>>;
  listTeamDrives(): Promise<ApiResult<TeamDrive[]>>;
  createTeamDrive(name: string): Promise<ApiResult<TeamDrive>>;
  listTeamDrivePermissions(driveId: string): Promise<ApiResult<Permission[]>>;
  grantTeamDriveAccess(driveId: string, email: string): Promise<ApiResult<Permission>>;
}
