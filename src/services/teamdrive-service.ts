/**
 * @module services/teamdrive-service
 * Gestion des team drives : liste, création et partage avec les service accounts
 * d’un dossier de clés.
 */

import fs from 'fs-extra';
import * as path from 'path';
import type { CloudApiClient, TeamDrive } from '../types/google.js';
import {
  FilesystemError,
  ShareAbortedError,
  ValidationError,
  faultToError,
} from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { getServiceAccountUsers } from '../utils/service-key-utils.js';

export interface ShareRequest {
  driveName: string;
  /** Préfixe des comptes, c.-à-d. sous-dossier des clés. */
  keyPrefix: string;
  /** Dossier racine des clés (service_account_folder). */
  folder: string;
}

export interface ShareReport {
  drive: TeamDrive;
  /** Accès accordé pendant cette exécution. */
  granted: string[];
  /** Déjà présents dans les permissions du drive, ignorés. */
  alreadyShared: string[];
}

/**
 * Première team drive portant exactement `name`, dans l’ordre de la liste.
 */
export function findTeamDrive(drives: TeamDrive[], name: string): TeamDrive | undefined {
  return drives.find((drive) => drive.name === name);
}

export class TeamDriveService {
  constructor(
    private readonly api: CloudApiClient,
    private readonly logger: Logger,
  ) {}

  /** @throws ApiError si la liste ne peut pas être récupérée. */
  public async listTeamDrives(): Promise<TeamDrive[]> {
    const result = await this.api.listTeamDrives();
    if (!result.ok) {
      throw faultToError('Impossible de récupérer les team drives', result.error);
    }
    return result.value;
  }

  /** @throws ApiError si la création échoue. */
  public async createTeamDrive(name: string): Promise<TeamDrive> {
    const result = await this.api.createTeamDrive(name);
    if (!result.ok) {
      throw faultToError(`Échec de la création de la team drive "${name}"`, result.error);
    }
    return result.value;
  }

  /**
   * Donne accès à la team drive `driveName` à chaque service account dont la clé est
   * dans `folder/keyPrefix`. Les accès sont accordés un par un ; ceux déjà présents
   * sont ignorés.
   *
   * @throws FilesystemError si le dossier de clés n’existe pas ou est illisible.
   * @throws ValidationError si aucun compte n’est trouvé ou si la team drive est introuvable.
   * @throws ShareAbortedError au premier partage en échec.
   */
  public async shareTeamDrive(request: ShareRequest): Promise<ShareReport> {
    const { driveName, keyPrefix, folder } = request;
    const keyFolder = path.join(folder, keyPrefix);
    if (!(await fs.pathExists(keyFolder))) {
      throw new FilesystemError(`Le dossier de clés n’existe pas : ${keyFolder}`, { details: { keyFolder } });
    }

    const users = await getServiceAccountUsers(keyFolder);
    if (users.length === 0) {
      throw new ValidationError(`Aucune clé de service account dans ${keyFolder}`);
    }
    this.logger.debug(`${users.length} service account(s) trouvé(s) dans ${keyFolder}`);

    const drive = await this.resolveTeamDrive(driveName);

    const permissions = await this.api.listTeamDrivePermissions(drive.id);
    if (!permissions.ok) {
      throw faultToError(`Impossible de lire les permissions de la team drive "${driveName}"`, permissions.error);
    }
    const existing = new Set(
      permissions.value
        .map((permission) => permission.emailAddress?.toLowerCase())
        .filter((email): email is string => email !== undefined),
    );

    const alreadyShared = users.filter((user) => existing.has(user.toLowerCase()));
    const toGrant = users.filter((user) => !existing.has(user.toLowerCase()));
    for (const user of alreadyShared) {
      this.logger.info(`Accès à "${driveName}" déjà accordé à : ${user}`);
    }

    this.logger.info(`Partage de "${driveName}" avec ${toGrant.length} service account(s)…`);
    const granted: string[] = [];
    for (const [index, user] of toGrant.entries()) {
      const result = await this.api.grantTeamDriveAccess(drive.id, user);
      if (!result.ok) {
        throw new ShareAbortedError(
          `Échec du partage de "${driveName}" avec ${user} : ${result.error.message}`,
          granted,
          toGrant.slice(index),
          faultToError(`Échec du partage avec ${user}`, result.error),
        );
      }
      granted.push(user);
      this.logger.success(`Accès à "${driveName}" accordé à : ${user}`);
    }

    return { drive, granted, alreadyShared };
  }

  /**
   * Nom → team drive. Les noms ne sont pas uniques côté Drive : la première correspondance
   * est retenue et un avertissement signale les autres.
   */
  private async resolveTeamDrive(driveName: string): Promise<TeamDrive> {
    const drives = await this.listTeamDrives();
    const matches = drives.filter((drive) => drive.name === driveName);
    const drive = findTeamDrive(drives, driveName);
    if (!drive) {
      throw new ValidationError(`Aucune team drive nommée "${driveName}"`);
    }
    if (matches.length > 1) {
      this.logger.warn(
        `${matches.length} team drives nommées "${driveName}" : utilisation de la première (${drive.id}).`,
      );
    }
    return drive;
  }
}
